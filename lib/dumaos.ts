'use strict';

import { z } from 'zod';

import { TransportError } from './errors';
import type { ReportedDevice, RouterStatus, TrafficCounters } from './types';
import type { JsonRecord } from './values';
import {
  getFirstStringValue,
  isRecord,
  safeNormalizeMac,
  toNonNegativeInteger,
  tryParseJson,
} from './values';

export const DUMAOS_APPS = {
  devices: 'com.netdumasoftware.devicemanager',
  qos: 'com.netdumasoftware.smartqos',
  system: 'com.netdumasoftware.systeminfo',
} as const;

export const DEFAULT_ROUTER_MODEL = 'R3';

const identitySchema = z.union([
  z.string().trim().min(1),
  z.number().int().nonnegative(),
]).transform((value) => String(value));

const deviceEntrySchema = z.object({
  devid: identitySchema,
  interfaces: z.array(z.unknown()).optional(),
});

const qosTreeSchema = z.object({
  AutoAlloc: z.object({
    bandwidth_allocations: z.array(z.unknown()).optional(),
    BandwidthAllocations: z.array(z.unknown()).optional(),
  }),
});

const allocationSchema = z.object({
  bytes: z.unknown(),
  match: z.unknown().optional(),
});

const systemInfoSchema = z.object({
  uptime: z.union([z.number(), z.string()]),
  version: z.string().trim().min(1),
  board: z.string().optional(),
});

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid payload';
  }

  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/** Single-object results arrive bare, wrapped in a one-element list, or JSON-encoded. */
function unwrapSingle(result: unknown): unknown {
  const inner = Array.isArray(result) && result.length ? result[0] : result;

  if (typeof inner === 'string') {
    return tryParseJson(inner.trim());
  }

  return inner;
}

export function parseDeviceList(devicesResult: unknown, onlineResult: unknown): ReportedDevice[] {
  if (!Array.isArray(devicesResult)) {
    throw TransportError.malformed('Device list is not an array.');
  }

  if (!Array.isArray(onlineResult)) {
    throw TransportError.malformed('Online interface list is not an array.');
  }

  const onlineMacs = new Set<string>();
  for (const entry of onlineResult) {
    const mac = isRecord(entry) ? safeNormalizeMac(entry.mac) : null;
    if (mac) {
      onlineMacs.add(mac);
    }
  }

  const byIdentity = new Map<string, ReportedDevice>();

  devicesResult.forEach((entry, index) => {
    const parsed = deviceEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw TransportError.malformed(`Device entry ${index} is invalid (${describeIssue(parsed.error)}).`);
    }

    const identity = parsed.data.devid;
    const record: JsonRecord = isRecord(entry) ? entry : {};
    const displayName = getFirstStringValue(record, ['uhost', 'hostname']) ?? `device_${identity}`;

    const macs: string[] = [];
    for (const iface of parsed.data.interfaces ?? []) {
      const mac = isRecord(iface) ? safeNormalizeMac(iface.mac) : null;
      if (mac && !macs.includes(mac)) {
        macs.push(mac);
      }
    }

    const online = macs.some((mac) => onlineMacs.has(mac));
    const existing = byIdentity.get(identity);

    if (!existing) {
      byIdentity.set(identity, { identity, displayName, macs, online });
      return;
    }

    // The same devid listed twice: keep the first name, pool the interfaces.
    byIdentity.set(identity, {
      identity,
      displayName: existing.displayName,
      macs: [...existing.macs, ...macs.filter((mac) => !existing.macs.includes(mac))],
      online: existing.online || online,
    });
  });

  return [...byIdentity.values()];
}

function collectTreeBytes(result: unknown, label: string): Map<string, number> {
  const parsed = qosTreeSchema.safeParse(unwrapSingle(result));
  if (!parsed.success) {
    throw TransportError.malformed(`The ${label} tree is invalid (${describeIssue(parsed.error)}).`);
  }

  const allocations = parsed.data.AutoAlloc.bandwidth_allocations
    ?? parsed.data.AutoAlloc.BandwidthAllocations
    ?? [];
  const totals = new Map<string, number>();

  allocations.forEach((item, index) => {
    const allocation = allocationSchema.safeParse(item);
    if (!allocation.success) {
      throw TransportError.malformed(`The ${label} allocation ${index} is not an object.`);
    }

    const match = allocation.data.match;
    const devid = identitySchema.safeParse(isRecord(match) ? match.devid : undefined);
    if (!devid.success) {
      return;
    }

    const bytes = toNonNegativeInteger(allocation.data.bytes);
    if (bytes === null) {
      throw TransportError.malformed(`The ${label} allocation ${index} has no usable byte counter.`);
    }

    totals.set(devid.data, (totals.get(devid.data) ?? 0) + bytes);
  });

  return totals;
}

export function parseTrafficCounters(downloadTree: unknown, uploadTree: unknown): Map<string, TrafficCounters> {
  const rx = collectTreeBytes(downloadTree, 'download');
  const tx = collectTreeBytes(uploadTree, 'upload');
  const counters = new Map<string, TrafficCounters>();

  for (const identity of new Set([...rx.keys(), ...tx.keys()])) {
    counters.set(identity, {
      rxBytes: rx.get(identity) ?? 0,
      txBytes: tx.get(identity) ?? 0,
    });
  }

  return counters;
}

export function parseSystemInfo(result: unknown): RouterStatus {
  const parsed = systemInfoSchema.safeParse(unwrapSingle(result));
  if (!parsed.success) {
    throw TransportError.malformed(`System info is invalid (${describeIssue(parsed.error)}).`);
  }

  const { uptime, version, board } = parsed.data;
  const uptimeSeconds = typeof uptime === 'number' && Number.isFinite(uptime) && uptime >= 0
    ? Math.floor(uptime)
    : toNonNegativeInteger(uptime);

  if (uptimeSeconds === null) {
    throw TransportError.malformed('System info uptime is not a non-negative number.');
  }

  return {
    uptimeSeconds,
    firmwareVersion: version,
    model: board?.trim() || DEFAULT_ROUTER_MODEL,
  };
}
