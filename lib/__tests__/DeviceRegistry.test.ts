import { describe, expect, it } from 'vitest';

import { DeviceRegistry } from '../DeviceRegistry';
import { computeRate } from '../rates';

describe('DeviceRegistry', () => {
  it('inserts an unseen identity and reports it was offline before', () => {
    const registry = new DeviceRegistry();

    const result = registry.upsert('AA:BB:CC', 'laptop', 1000, 20, 0);

    expect(result.wasOnlineBefore).toBe(false);
    expect(result.isOnlineNow).toBe(true);
    expect(result.device).toMatchObject({
      identity: 'AA:BB:CC',
      displayName: 'laptop',
      online: true,
      rxBytesTotal: 1000,
      txBytesTotal: 20,
      lastSampleTime: 0,
    });
  });

  it('yields the same device when the same upsert is repeated', () => {
    const registry = new DeviceRegistry();

    const first = registry.upsert('1', 'laptop', 1000, 20, 5);
    const second = registry.upsert('1', 'laptop', 1000, 20, 5);

    expect(second.device).toEqual(first.device);
    expect(second.wasOnlineBefore).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('keeps devices with colliding display names apart', () => {
    const registry = new DeviceRegistry();

    registry.upsert('1', 'iPhone', 10, 10, 0);
    registry.upsert('2', 'iPhone', 99, 99, 0);

    expect(registry.snapshotAll().map((device) => [device.identity, device.rxBytesTotal])).toEqual([
      ['1', 10],
      ['2', 99],
    ]);
  });

  it('flips only previously online, unseen devices offline', () => {
    const registry = new DeviceRegistry();
    registry.upsert('c', 'tv', 1, 1, 0);
    registry.upsert('a', 'laptop', 1, 1, 0);
    registry.upsert('b', 'phone', 1, 1, 0);
    registry.remember('d', 'printer');

    const transitioned = registry.markAllUnseenOffline(new Set(['b']));

    expect(transitioned).toEqual(['a', 'c']);
    expect(registry.size).toBe(4);
    expect(registry.get('b')?.online).toBe(true);
    expect(registry.get('a')?.online).toBe(false);
    expect(registry.markAllUnseenOffline(new Set(['b']))).toEqual([]);
  });

  it('zeroes rates but keeps counters of devices going offline', () => {
    const registry = new DeviceRegistry();
    registry.upsert('a', 'laptop', 1000, 500, 0);
    registry.applyRates(
      'a',
      computeRate({ bytes: 0, timestamp: -10 }, { bytes: 1000, timestamp: 0 }),
      computeRate({ bytes: 0, timestamp: -10 }, { bytes: 500, timestamp: 0 }),
    );

    registry.markAllUnseenOffline(new Set());

    expect(registry.get('a')).toMatchObject({ rxRate: 0, txRate: 0, rxBytesTotal: 1000, txBytesTotal: 500 });
  });

  it('remembers devices without changing their online flag', () => {
    const registry = new DeviceRegistry();

    expect(registry.remember('1', 'printer', ['AA:BB:CC:DD:EE:FF']).online).toBe(false);

    registry.markOnline('1', 'printer');
    const renamed = registry.remember('1', 'office printer');

    expect(renamed).toMatchObject({ online: true, displayName: 'office printer', macs: ['AA:BB:CC:DD:EE:FF'] });
  });

  it('ignores counter updates for unknown devices', () => {
    const registry = new DeviceRegistry();

    expect(registry.updateCounters('ghost', 1, 1, 1)).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('stores the baseline chosen by the rate calculation', () => {
    const registry = new DeviceRegistry();
    registry.upsert('1', 'laptop', 1000, 0, 10);

    const previous = { bytes: 1000, timestamp: 10 };
    registry.applyRates(
      '1',
      computeRate(previous, { bytes: 1000, timestamp: 10 }),
      computeRate(undefined, { bytes: 0, timestamp: 10 }),
    );

    expect(registry.baselineOf('1')).toEqual({ rx: previous, tx: { bytes: 0, timestamp: 10 } });
    expect(registry.get('1')?.rxRateValidity).toBe('invalid-interval');
    expect(registry.get('1')?.txRateValidity).toBe('initial');
  });

  it('hands out copies that do not alias registry state', () => {
    const registry = new DeviceRegistry();
    registry.upsert('1', 'laptop', 1, 1, 0, ['AA:BB:CC:DD:EE:01']);

    const device = registry.snapshotAll()[0];
    device.online = false;
    device.macs.push('AA:BB:CC:DD:EE:02');

    expect(registry.get('1')).toMatchObject({ online: true, macs: ['AA:BB:CC:DD:EE:01'] });
  });

  it('records when devices were last seen', () => {
    const registry = new DeviceRegistry();
    registry.markOnline('1', 'laptop');

    registry.touch(['1', 'unknown'], 42_000);

    expect(registry.get('1')?.lastSeenAt).toBe(42_000);
    expect(registry.get('unknown')).toBeUndefined();
  });

  it('zeroes rates without moving the baseline', () => {
    const registry = new DeviceRegistry();
    registry.upsert('1', 'laptop', 1000, 0, 0);
    registry.applyRates('1', computeRate(undefined, { bytes: 1000, timestamp: 0 }), computeRate(undefined, { bytes: 0, timestamp: 0 }));
    registry.applyRates('1', computeRate({ bytes: 1000, timestamp: 0 }, { bytes: 3000, timestamp: 10 }), computeRate(undefined, { bytes: 0, timestamp: 10 }));

    const device = registry.clearRates('1', 'no-sample');

    expect(device).toMatchObject({ rxRate: 0, txRate: 0, rxRateValidity: 'no-sample', txRateValidity: 'no-sample' });
    expect(registry.baselineOf('1')?.rx).toEqual({ bytes: 3000, timestamp: 10 });
    expect(registry.clearRates('unknown', 'no-sample')).toBeUndefined();
  });
});
