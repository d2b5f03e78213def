'use strict';

import type { Device, Snapshot } from './lib/types';
import type { Overview } from './app';

interface RouterMonitorApi {
  getSnapshot(): Snapshot;
  getDevice(identity: string): Device | null;
  getOverview(): Overview;
  refreshNow(): Promise<Overview>;
}

interface ApiArgs {
  app: RouterMonitorApi;
  query?: Record<string, string | undefined>;
}

export async function getOverview({ app }: ApiArgs) {
  return app.getOverview();
}

export async function getSnapshot({ app }: ApiArgs) {
  return app.getSnapshot();
}

export async function getDevice({ app, query }: ApiArgs) {
  const identity = query?.identity?.trim();
  if (!identity) {
    throw new Error('`identity` query parameter is required.');
  }

  const device = app.getDevice(identity);
  if (!device) {
    throw new Error(`Device ${identity} not found.`);
  }

  return device;
}

export async function postRefresh({ app }: ApiArgs) {
  return app.refreshNow();
}
