'use strict';

import type { DeviceRegistry, DeviceBaseline, UpsertResult } from './DeviceRegistry';
import { DUMAOS_APPS, parseDeviceList, parseSystemInfo, parseTrafficCounters } from './dumaos';
import { TransportError, errorMessage } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { computeRate } from './rates';
import type { RouterTransport } from './RouterRpcClient';
import type { SnapshotPublisher } from './SnapshotPublisher';
import type {
  FetchCategory,
  ReportedDevice,
  RouterStatus,
  Snapshot,
  TrafficCounters,
  Transition,
} from './types';

export type CycleState = 'idle' | 'fetching' | 'merging' | 'publishing';

export type CycleOutcome = 'complete' | 'partial' | 'failed' | 'skipped';

export interface CycleReport {
  outcome: CycleOutcome;
  cycle: number;
  stale: FetchCategory[];
  transitions: Transition[];
  errors: Partial<Record<FetchCategory, TransportError>>;
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export interface PollCoordinatorOptions {
  transport: RouterTransport;
  registry: DeviceRegistry;
  publisher: SnapshotPublisher;
  retry?: RetryPolicy;
  logger?: Logger;
  /** Epoch milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type FetchResult<T> =
  | { ok: true; value: T; fetchedAt: number }
  | { ok: false; error: TransportError };

/** Upper bound for a single backoff pause. */
export const MAX_RETRY_DELAY_MS = 30_000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
};

const FETCH_CATEGORIES: FetchCategory[] = ['devices', 'counters', 'status'];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  return TransportError.unreachable(errorMessage(error), error);
}

export class PollCoordinator {

  private currentState: CycleState = 'idle';

  private inFlight: Promise<CycleReport> | null = null;

  private cycleCount = 0;

  private stopping = false;

  private readonly transport: RouterTransport;

  private readonly registry: DeviceRegistry;

  private readonly publisher: SnapshotPublisher;

  private readonly retry: RetryPolicy;

  private readonly logger: Logger;

  private readonly now: () => number;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: PollCoordinatorOptions) {
    this.transport = options.transport;
    this.registry = options.registry;
    this.publisher = options.publisher;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  get state(): CycleState {
    return this.currentState;
  }

  get cyclesStarted(): number {
    return this.cycleCount;
  }

  /**
   * Runs one poll cycle. A trigger that arrives while a cycle is in flight
   * is dropped and reported as `skipped`; it never starts a second cycle.
   */
  async runCycle(): Promise<CycleReport> {
    if (this.inFlight) {
      this.logger.log(`Poll cycle ${this.cycleCount} is still running; skipping this trigger.`);
      return {
        outcome: 'skipped',
        cycle: this.cycleCount,
        stale: [],
        transitions: [],
        errors: {},
      };
    }

    const run = this.executeCycle();
    this.inFlight = run;

    try {
      return await run;
    } finally {
      this.inFlight = null;
      this.currentState = 'idle';
    }
  }

  /** Stops scheduling retries; fetches already on the wire still finish. */
  stop(): void {
    this.stopping = true;
  }

  /** Resolves once the in-flight cycle, if any, has settled. */
  async whenIdle(): Promise<void> {
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
  }

  private async executeCycle(): Promise<CycleReport> {
    this.cycleCount += 1;
    const cycle = this.cycleCount;

    this.currentState = 'fetching';
    const [devices, counters, status] = await Promise.all([
      this.fetchWithRetry('devices', () => this.fetchDevices()),
      this.fetchWithRetry('counters', () => this.fetchCounters()),
      this.fetchWithRetry('status', () => this.fetchStatus()),
    ]);

    this.currentState = 'merging';
    const transitions = this.merge(devices, counters);

    this.currentState = 'publishing';
    const previous = this.publisher.getSnapshot();
    const snapshot: Snapshot = {
      cycle,
      publishedAt: this.now(),
      devices: this.registry.snapshotAll(),
      router: status.ok ? status.value : previous.router,
      lastSuccessfulPoll: {
        devices: devices.ok ? devices.fetchedAt : previous.lastSuccessfulPoll.devices,
        counters: counters.ok ? counters.fetchedAt : previous.lastSuccessfulPoll.counters,
        status: status.ok ? status.fetchedAt : previous.lastSuccessfulPoll.status,
      },
    };
    await this.publisher.publish(snapshot, transitions);

    const results = { devices, counters, status };
    const errors: Partial<Record<FetchCategory, TransportError>> = {};
    for (const category of FETCH_CATEGORIES) {
      const result = results[category];
      if (!result.ok) {
        errors[category] = result.error;
      }
    }

    const stale = FETCH_CATEGORIES.filter((category) => errors[category] !== undefined);
    let outcome: CycleOutcome = 'complete';
    if (stale.length === FETCH_CATEGORIES.length) {
      outcome = 'failed';
    } else if (stale.length) {
      outcome = 'partial';
    }

    if (outcome === 'complete') {
      const online = snapshot.devices.filter((device) => device.online).length;
      this.logger.log(`Poll cycle ${cycle} complete. Devices known: ${snapshot.devices.length}, online: ${online}.`);
    } else {
      this.logger.error(`Poll cycle ${cycle} ${outcome}. Stale: ${stale.join(', ')}.`);
    }

    return {
      outcome,
      cycle,
      stale,
      transitions,
      errors,
    };
  }

  private async fetchWithRetry<T>(category: FetchCategory, fetch: () => Promise<T>): Promise<FetchResult<T>> {
    const attempts = Math.max(1, this.retry.attempts);

    for (let attempt = 1; ; attempt += 1) {
      try {
        const value = await fetch();
        return { ok: true, value, fetchedAt: this.now() };
      } catch (caught) {
        const error = toTransportError(caught);

        if (!error.retryable || attempt >= attempts || this.stopping) {
          this.logger.error(`Fetching ${category} failed after ${attempt} attempt(s) (${error.kind}):`, error.message);
          return { ok: false, error };
        }

        const backoffMs = Math.min(this.retry.baseDelayMs * 2 ** (attempt - 1), MAX_RETRY_DELAY_MS);
        this.logger.log(`Fetching ${category} failed (${error.kind}); retrying in ${backoffMs}ms.`);
        await this.sleep(backoffMs);

        if (this.stopping) {
          this.logger.error(`Fetching ${category} abandoned during shutdown (${error.kind}):`, error.message);
          return { ok: false, error };
        }
      }
    }
  }

  private async fetchDevices(): Promise<ReportedDevice[]> {
    const [all, online] = await Promise.all([
      this.transport.fetch(DUMAOS_APPS.devices, 'get_all_devices'),
      this.transport.fetch(DUMAOS_APPS.devices, 'get_valid_online_interfaces'),
    ]);

    return parseDeviceList(all, online);
  }

  private async fetchCounters(): Promise<Map<string, TrafficCounters>> {
    const [download, upload] = await Promise.all([
      this.transport.fetch(DUMAOS_APPS.qos, 'get_download_tree'),
      this.transport.fetch(DUMAOS_APPS.qos, 'get_upload_tree'),
    ]);

    return parseTrafficCounters(download, upload);
  }

  private async fetchStatus(): Promise<RouterStatus> {
    return parseSystemInfo(await this.transport.fetch(DUMAOS_APPS.system, 'get_system_info'));
  }

  /**
   * Single writer for the registry. Nothing in here awaits, so the cycle's
   * merge cannot interleave with anything else.
   */
  private merge(
    devices: FetchResult<ReportedDevice[]>,
    counters: FetchResult<Map<string, TrafficCounters>>,
  ): Transition[] {
    const transitions: Transition[] = [];
    const sampleTime = counters.ok ? counters.fetchedAt / 1000 : null;

    if (!devices.ok) {
      // Without a device list nobody can be declared offline; only counters move.
      if (counters.ok && sampleTime !== null) {
        for (const [identity, traffic] of counters.value) {
          // Offline devices keep their last counters until the list marks them online again.
          if (!this.registry.get(identity)?.online) {
            continue;
          }

          const baseline = this.registry.baselineOf(identity);
          this.registry.updateCounters(identity, traffic.rxBytes, traffic.txBytes, sampleTime);
          this.applyRates(identity, baseline, traffic, sampleTime);
        }
      }

      return transitions;
    }

    const seen = new Set<string>();

    for (const reported of devices.value) {
      if (!reported.online) {
        this.registry.remember(reported.identity, reported.displayName, reported.macs);
        continue;
      }

      seen.add(reported.identity);

      const traffic = counters.ok ? counters.value.get(reported.identity) : undefined;
      let result: UpsertResult;
      if (traffic && sampleTime !== null) {
        result = this.recordSample(reported, traffic, sampleTime);
      } else {
        result = this.registry.markOnline(reported.identity, reported.displayName, reported.macs);
        if (counters.ok) {
          this.registry.clearRates(reported.identity, 'no-sample');
        }
      }

      if (!result.wasOnlineBefore) {
        transitions.push({ identity: reported.identity, oldOnline: false, newOnline: true });
      }
    }

    this.registry.touch(seen, devices.fetchedAt);

    for (const identity of this.registry.markAllUnseenOffline(seen)) {
      transitions.push({ identity, oldOnline: true, newOnline: false });
    }

    return transitions;
  }

  private recordSample(reported: ReportedDevice, traffic: TrafficCounters, sampleTime: number): UpsertResult {
    const baseline = this.registry.baselineOf(reported.identity);
    const result = this.registry.upsert(
      reported.identity,
      reported.displayName,
      traffic.rxBytes,
      traffic.txBytes,
      sampleTime,
      reported.macs,
    );

    this.applyRates(reported.identity, baseline, traffic, sampleTime);
    return result;
  }

  private applyRates(
    identity: string,
    baseline: DeviceBaseline | null,
    traffic: TrafficCounters,
    sampleTime: number,
  ): void {
    const rx = computeRate(baseline?.rx, { bytes: traffic.rxBytes, timestamp: sampleTime });
    const tx = computeRate(baseline?.tx, { bytes: traffic.txBytes, timestamp: sampleTime });

    if (rx.validity === 'reset' || tx.validity === 'reset') {
      this.logger.log(`Counter reset detected for device ${identity}; starting a new baseline.`);
    }

    this.registry.applyRates(identity, rx, tx);
  }

}
