import { describe, expect, it } from 'vitest';

import { computeRate } from '../rates';

describe('computeRate', () => {
  it('reports nothing on the first observation', () => {
    const current = { bytes: 1000, timestamp: 0 };

    expect(computeRate(undefined, current)).toEqual({ rate: 0, validity: 'initial', baseline: current });
  });

  it('divides the byte delta by the time delta', () => {
    const result = computeRate({ bytes: 1000, timestamp: 0 }, { bytes: 1500, timestamp: 10 });

    expect(result).toEqual({ rate: 50, validity: 'valid', baseline: { bytes: 1500, timestamp: 10 } });
  });

  it('handles fractional intervals', () => {
    const result = computeRate({ bytes: 0, timestamp: 100 }, { bytes: 300, timestamp: 102.5 });

    expect(result.rate).toBe(120);
  });

  it('treats a shrinking counter as a reset and rebases on the new reading', () => {
    const current = { bytes: 200, timestamp: 20 };

    expect(computeRate({ bytes: 50_000, timestamp: 10 }, current)).toEqual({
      rate: 0,
      validity: 'reset',
      baseline: current,
    });
  });

  it('keeps the previous sample when time does not advance', () => {
    const previous = { bytes: 1000, timestamp: 10 };

    expect(computeRate(previous, { bytes: 1200, timestamp: 10 })).toEqual({
      rate: 0,
      validity: 'invalid-interval',
      baseline: previous,
    });
    expect(computeRate(previous, { bytes: 1200, timestamp: 4 }).baseline).toBe(previous);
  });

  it('returns zero for an idle counter', () => {
    expect(computeRate({ bytes: 10, timestamp: 0 }, { bytes: 10, timestamp: 30 }).rate).toBe(0);
  });
});
