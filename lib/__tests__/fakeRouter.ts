import type { TransportError } from '../errors';
import type { RouterTransport } from '../RouterRpcClient';

interface FakeDevice {
  devid: string;
  name: string;
  mac: string;
}

interface QueuedFailure {
  error: TransportError;
  remaining: number;
}

/** In-memory DumaOS router answering the RPC methods the coordinator uses. */
export class FakeRouter implements RouterTransport {

  readonly calls: string[] = [];

  system: Record<string, unknown> = { uptime: 3600, version: '3.0.301', board: 'XR1000' };

  private readonly devices = new Map<string, FakeDevice>();

  private readonly online = new Set<string>();

  private readonly rx = new Map<string, number>();

  private readonly tx = new Map<string, number>();

  private readonly failures = new Map<string, QueuedFailure>();

  private gate: Promise<void> | null = null;

  addDevice(devid: string, name: string, mac: string, counters: { rx?: number; tx?: number } = {}): this {
    this.devices.set(devid, { devid, name, mac });
    this.online.add(devid);
    this.setCounters(devid, counters.rx ?? 0, counters.tx ?? 0);
    return this;
  }

  setCounters(devid: string, rx: number, tx: number): this {
    this.rx.set(devid, rx);
    this.tx.set(devid, tx);
    return this;
  }

  /** Leaves the device listed but removes it from both QoS trees. */
  dropCounters(devid: string): this {
    this.rx.delete(devid);
    this.tx.delete(devid);
    return this;
  }

  disconnect(devid: string): this {
    this.online.delete(devid);
    return this;
  }

  forget(devid: string): this {
    this.devices.delete(devid);
    this.online.delete(devid);
    this.rx.delete(devid);
    this.tx.delete(devid);
    return this;
  }

  failWith(method: string, error: TransportError, times = Number.POSITIVE_INFINITY): this {
    this.failures.set(method, { error, remaining: times });
    return this;
  }

  /** Holds every call until the returned release function runs. */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = null;
        resolve();
      };
    });
    return release;
  }

  countCalls(method: string): number {
    return this.calls.filter((call) => call === method).length;
  }

  async fetch(_app: string, method: string): Promise<unknown> {
    this.calls.push(method);

    if (this.gate) {
      await this.gate;
    }

    const failure = this.failures.get(method);
    if (failure && failure.remaining > 0) {
      failure.remaining -= 1;
      throw failure.error;
    }

    switch (method) {
      case 'get_all_devices':
        return [...this.devices.values()].map((device) => ({
          devid: device.devid,
          uhost: device.name,
          interfaces: [{ mac: device.mac.toLowerCase(), ifname: 'wlan0' }],
        }));
      case 'get_valid_online_interfaces':
        return [...this.devices.values()]
          .filter((device) => this.online.has(device.devid))
          .map((device) => ({ mac: device.mac }));
      case 'get_download_tree':
        return [JSON.stringify(this.tree(this.rx))];
      case 'get_upload_tree':
        return [JSON.stringify(this.tree(this.tx))];
      case 'get_system_info':
        return [this.system];
      default:
        throw new Error(`Unexpected RPC method ${method}`);
    }
  }

  private tree(counters: Map<string, number>) {
    return {
      AutoAlloc: {
        bandwidth_allocations: [...counters.entries()].map(([devid, bytes]) => ({
          bytes,
          match: { devid },
        })),
      },
    };
  }

}
