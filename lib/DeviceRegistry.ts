'use strict';

import type { RateResult } from './rates';
import type { CounterSample, Device, RateValidity } from './types';

export interface UpsertResult {
  device: Device;
  wasOnlineBefore: boolean;
  isOnlineNow: boolean;
}

export interface DeviceBaseline {
  rx: CounterSample;
  tx: CounterSample;
}

interface DeviceEntry {
  device: Device;
  baseline: DeviceBaseline | null;
}

function compareIdentity(a: string, b: string): number {
  if (a < b) {
    return -1;
  }

  return a > b ? 1 : 0;
}

function copyDevice(device: Device): Device {
  return { ...device, macs: [...device.macs] };
}

/**
 * Known devices of one router and their last observed counters.
 *
 * Devices are only ever added. A device that drops out of the router's
 * report goes offline and keeps its last counters. Every method runs to
 * completion synchronously, so a device is never left half-updated.
 */
export class DeviceRegistry {

  private readonly entries = new Map<string, DeviceEntry>();

  get size(): number {
    return this.entries.size;
  }

  get(identity: string): Device | undefined {
    const entry = this.entries.get(identity);
    return entry ? copyDevice(entry.device) : undefined;
  }

  baselineOf(identity: string): DeviceBaseline | null {
    return this.entries.get(identity)?.baseline ?? null;
  }

  upsert(
    identity: string,
    displayName: string,
    rxBytesTotal: number,
    txBytesTotal: number,
    timestamp: number,
    macs?: string[],
  ): UpsertResult {
    const result = this.markOnline(identity, displayName, macs);
    const { device } = this.ensureEntry(identity, displayName);

    device.rxBytesTotal = rxBytesTotal;
    device.txBytesTotal = txBytesTotal;
    device.lastSampleTime = timestamp;

    return { ...result, device: copyDevice(device) };
  }

  markOnline(identity: string, displayName: string, macs?: string[]): UpsertResult {
    const { device } = this.ensureEntry(identity, displayName);
    const wasOnlineBefore = device.online;

    device.displayName = displayName;
    if (macs) {
      device.macs = [...macs];
    }
    device.online = true;

    return {
      device: copyDevice(device),
      wasOnlineBefore,
      isOnlineNow: true,
    };
  }

  /** Records a device the router knows about without touching its online flag. */
  remember(identity: string, displayName: string, macs?: string[]): Device {
    const { device } = this.ensureEntry(identity, displayName);

    device.displayName = displayName;
    if (macs) {
      device.macs = [...macs];
    }

    return copyDevice(device);
  }

  /** Counter update for an already-known device; unknown identities are ignored. */
  updateCounters(identity: string, rxBytesTotal: number, txBytesTotal: number, timestamp: number): Device | undefined {
    const entry = this.entries.get(identity);
    if (!entry) {
      return undefined;
    }

    entry.device.rxBytesTotal = rxBytesTotal;
    entry.device.txBytesTotal = txBytesTotal;
    entry.device.lastSampleTime = timestamp;

    return copyDevice(entry.device);
  }

  applyRates(identity: string, rx: RateResult, tx: RateResult): Device | undefined {
    const entry = this.entries.get(identity);
    if (!entry) {
      return undefined;
    }

    entry.baseline = { rx: rx.baseline, tx: tx.baseline };
    entry.device.rxRate = rx.rate;
    entry.device.txRate = tx.rate;
    entry.device.rxRateValidity = rx.validity;
    entry.device.txRateValidity = tx.validity;

    return copyDevice(entry.device);
  }

  /** Zeroes both rates and keeps the baseline, so the next reading spans the gap. */
  clearRates(identity: string, validity: RateValidity): Device | undefined {
    const entry = this.entries.get(identity);
    if (!entry) {
      return undefined;
    }

    entry.device.rxRate = 0;
    entry.device.txRate = 0;
    entry.device.rxRateValidity = validity;
    entry.device.txRateValidity = validity;

    return copyDevice(entry.device);
  }

  /**
   * Flips every online device missing from `seenIdentities` to offline and
   * returns those identities in order. Run once per cycle, after the
   * cycle's last upsert.
   */
  markAllUnseenOffline(seenIdentities: ReadonlySet<string>): string[] {
    const transitioned: string[] = [];

    for (const [identity, entry] of this.entries) {
      if (seenIdentities.has(identity) || !entry.device.online) {
        continue;
      }

      entry.device.online = false;
      entry.device.rxRate = 0;
      entry.device.txRate = 0;
      transitioned.push(identity);
    }

    return transitioned.sort(compareIdentity);
  }

  /**
   * Marks the devices seen this cycle with the cycle's time. Kept apart from
   * `upsert` so that repeating an upsert never changes the stored device.
   */
  touch(identities: Iterable<string>, seenAt: number): void {
    for (const identity of identities) {
      const entry = this.entries.get(identity);
      if (entry) {
        entry.device.lastSeenAt = seenAt;
      }
    }
  }

  snapshotAll(): Device[] {
    return [...this.entries.keys()]
      .sort(compareIdentity)
      .map((identity) => this.get(identity))
      .filter((device): device is Device => device !== undefined);
  }

  private ensureEntry(identity: string, displayName: string): DeviceEntry {
    const existing = this.entries.get(identity);
    if (existing) {
      return existing;
    }

    const entry: DeviceEntry = {
      device: {
        identity,
        displayName,
        macs: [],
        online: false,
        rxBytesTotal: 0,
        txBytesTotal: 0,
        rxRate: 0,
        txRate: 0,
        rxRateValidity: 'initial',
        txRateValidity: 'initial',
        lastSampleTime: null,
        lastSeenAt: null,
      },
      baseline: null,
    };

    this.entries.set(identity, entry);
    return entry;
  }

}
