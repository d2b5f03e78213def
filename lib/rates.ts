'use strict';

import type { CounterSample, RateValidity } from './types';

export interface RateResult {
  /** Bytes per second, never negative. */
  rate: number;
  validity: RateValidity;
  /** The sample to compare the next reading against. */
  baseline: CounterSample;
}

export function computeRate(previous: CounterSample | undefined, current: CounterSample): RateResult {
  if (!previous) {
    return { rate: 0, validity: 'initial', baseline: current };
  }

  const deltaBytes = current.bytes - previous.bytes;
  if (deltaBytes < 0) {
    return { rate: 0, validity: 'reset', baseline: current };
  }

  // Duplicate poll or clock stepping backwards: keep the last good baseline.
  const deltaTime = current.timestamp - previous.timestamp;
  if (!(deltaTime > 0)) {
    return { rate: 0, validity: 'invalid-interval', baseline: previous };
  }

  return { rate: deltaBytes / deltaTime, validity: 'valid', baseline: current };
}
