'use strict';

/** `no-sample`: the router listed the device online but reported no counter for it. */
export type RateValidity = 'initial' | 'reset' | 'invalid-interval' | 'valid' | 'no-sample';

export type RouterScheme = 'https' | 'http';

/** One cumulative counter reading; `timestamp` is in seconds. */
export interface CounterSample {
  bytes: number;
  timestamp: number;
}

export interface Device {
  identity: string;
  displayName: string;
  macs: string[];
  online: boolean;
  rxBytesTotal: number;
  txBytesTotal: number;
  rxRate: number;
  txRate: number;
  rxRateValidity: RateValidity;
  txRateValidity: RateValidity;
  lastSampleTime: number | null;
  lastSeenAt: number | null;
}

export interface RouterStatus {
  uptimeSeconds: number;
  firmwareVersion: string;
  model: string;
}

export type FetchCategory = 'devices' | 'counters' | 'status';

export type LastSuccessfulPoll = Record<FetchCategory, number | null>;

export interface Snapshot {
  cycle: number;
  publishedAt: number | null;
  devices: Device[];
  router: RouterStatus | null;
  lastSuccessfulPoll: LastSuccessfulPoll;
}

export interface Transition {
  identity: string;
  oldOnline: boolean;
  newOnline: boolean;
}

/** A device as reported by the router's device manager for one cycle. */
export interface ReportedDevice {
  identity: string;
  displayName: string;
  macs: string[];
  online: boolean;
}

export interface TrafficCounters {
  rxBytes: number;
  txBytes: number;
}
