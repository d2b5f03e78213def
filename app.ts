'use strict';

import { DeviceRegistry } from './lib/DeviceRegistry';
import type { MonitorConfig } from './lib/config';
import { errorMessage } from './lib/errors';
import type { Logger } from './lib/logger';
import { createConsoleLogger } from './lib/logger';
import type { CycleOutcome, CycleReport } from './lib/PollCoordinator';
import { PollCoordinator } from './lib/PollCoordinator';
import type { RouterTransport } from './lib/RouterRpcClient';
import { RouterRpcClient } from './lib/RouterRpcClient';
import { SnapshotPublisher } from './lib/SnapshotPublisher';
import type { Device, Snapshot } from './lib/types';

/** Everything that belongs to one router. Two routers means two contexts. */
export interface RouterContext {
  transport: RouterTransport;
  registry: DeviceRegistry;
  publisher: SnapshotPublisher;
  coordinator: PollCoordinator;
}

export interface RouterMonitorAppOptions {
  logger?: Logger;
  /** Replaces the HTTPS client, e.g. with an in-memory router. */
  transport?: RouterTransport;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface PollStatus {
  lastCycleAt: string | null;
  lastOutcome: CycleOutcome | null;
  lastError: string | null;
}

export interface Overview {
  snapshot: Snapshot;
  summary: {
    onlineCount: number;
    offlineCount: number;
    rxRate: number;
    txRate: number;
  };
  poll: PollStatus;
}

export function createRouterContext(config: MonitorConfig, options: RouterMonitorAppOptions = {}): RouterContext {
  const logger = options.logger ?? createConsoleLogger('router-monitor');

  const transport = options.transport ?? new RouterRpcClient({
    host: config.host,
    schemes: config.schemes,
    verifyTls: config.verifyTls,
    timeoutMs: config.requestTimeoutSeconds * 1000,
    username: config.username || undefined,
    password: config.password || undefined,
    logger,
  });
  const registry = new DeviceRegistry();
  const publisher = new SnapshotPublisher(logger);
  const coordinator = new PollCoordinator({
    transport,
    registry,
    publisher,
    retry: {
      attempts: config.retryAttempts,
      baseDelayMs: config.retryBaseDelayMs,
    },
    logger,
    now: options.now,
    sleep: options.sleep,
  });

  return {
    transport,
    registry,
    publisher,
    coordinator,
  };
}

export class RouterMonitorApp {

  private pollTimer: NodeJS.Timeout | null = null;

  private readonly context: RouterContext;

  private readonly logger: Logger;

  private readonly now: () => number;

  private pollStatus: PollStatus = {
    lastCycleAt: null,
    lastOutcome: null,
    lastError: null,
  };

  private unsubscribeTransitions: (() => void) | null = null;

  constructor(private readonly config: MonitorConfig, options: RouterMonitorAppOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger('router-monitor');
    this.now = options.now ?? Date.now;
    this.context = createRouterContext(config, { ...options, logger: this.logger });
  }

  get publisher(): SnapshotPublisher {
    return this.context.publisher;
  }

  async onInit() {
    this.logger.log(`Monitoring ${this.config.host} (${this.config.schemes.join(' or ')}) every ${this.config.pollIntervalSeconds}s (TLS verification: ${this.config.verifyTls}).`);

    this.unsubscribeTransitions = this.context.publisher.onTransition((identity, _oldOnline, newOnline) => {
      this.handleTransition(identity, newOnline);
    });
    this.schedulePolling();

    await this.pollRouterAndUpdate();
  }

  async onUninit() {
    this.clearPollingTimer();
    this.unsubscribeTransitions?.();
    this.unsubscribeTransitions = null;
    this.context.coordinator.stop();
    await this.context.coordinator.whenIdle();
    this.logger.log('Router monitor stopped.');
  }

  public getSnapshot(): Snapshot {
    return this.context.publisher.getSnapshot();
  }

  public getDevice(identity: string): Device | null {
    return this.getSnapshot().devices.find((device) => device.identity === identity) ?? null;
  }

  public async refreshNow(): Promise<Overview> {
    await this.pollRouterAndUpdate();
    return this.getOverview();
  }

  public getOverview(): Overview {
    const snapshot = this.getSnapshot();
    const online = snapshot.devices.filter((device) => device.online);

    return {
      snapshot,
      summary: {
        onlineCount: online.length,
        offlineCount: snapshot.devices.length - online.length,
        rxRate: online.reduce((total, device) => total + device.rxRate, 0),
        txRate: online.reduce((total, device) => total + device.txRate, 0),
      },
      poll: { ...this.pollStatus },
    };
  }

  private clearPollingTimer() {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private schedulePolling() {
    this.clearPollingTimer();

    const intervalMs = this.config.pollIntervalSeconds * 1000;
    this.pollTimer = setInterval(() => {
      this.pollRouterAndUpdate().catch((error) => {
        this.logger.error('Polling timer error:', errorMessage(error));
      });
    }, intervalMs);
  }

  private async pollRouterAndUpdate(): Promise<CycleReport | null> {
    let report: CycleReport;

    try {
      report = await this.context.coordinator.runCycle();
    } catch (error) {
      const message = errorMessage(error);
      this.pollStatus = {
        lastCycleAt: new Date(this.now()).toISOString(),
        lastOutcome: 'failed',
        lastError: message,
      };
      this.logger.error('Router polling failed:', message);
      return null;
    }

    if (report.outcome === 'skipped') {
      return report;
    }

    const firstError = Object.values(report.errors)[0];
    this.pollStatus = {
      lastCycleAt: new Date(this.now()).toISOString(),
      lastOutcome: report.outcome,
      lastError: firstError ? firstError.message : null,
    };

    return report;
  }

  private handleTransition(identity: string, newOnline: boolean) {
    const device = this.getDevice(identity);
    const name = device ? device.displayName : identity;
    this.logger.log(`Device ${name} (${identity}) ${newOnline ? 'came online' : 'went offline'}.`);
  }

}
