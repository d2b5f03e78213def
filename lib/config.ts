'use strict';

import { z } from 'zod';

import { ConfigError } from './errors';
import type { RouterScheme } from './types';
import { cleanText, clampNumber } from './values';

export interface RouterAddress {
  /** Host name or IP address, with the port when one was given. */
  host: string;
  /** Schemes to try in order. Two when the host was configured without one. */
  schemes: RouterScheme[];
}

export interface MonitorConfig extends RouterAddress {
  verifyTls: boolean;
  username: string;
  password: string;
  pollIntervalSeconds: number;
  requestTimeoutSeconds: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
}

export const DEFAULT_MONITOR_CONFIG: Omit<MonitorConfig, keyof RouterAddress> = {
  verifyTls: true,
  username: '',
  password: '',
  pollIntervalSeconds: 20,
  requestTimeoutSeconds: 10,
  retryAttempts: 3,
  retryBaseDelayMs: 500,
};

const booleanFlag = z.union([z.boolean(), z.string()]).optional().transform((value, ctx) => {
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  if (!normalized) {
    return undefined;
  }

  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a boolean` });
  return z.NEVER;
});

const numeric = z.union([z.number(), z.string()]).optional();

const rawConfigSchema = z.object({
  host: z.string({ required_error: 'router host is required' }),
  verifyTls: booleanFlag,
  username: z.string().optional(),
  password: z.string().optional(),
  pollIntervalSeconds: numeric,
  requestTimeoutSeconds: numeric,
  retryAttempts: numeric,
  retryBaseDelayMs: numeric,
});

export type RawMonitorConfig = z.input<typeof rawConfigSchema>;

export function parseRouterAddress(value: string): RouterAddress {
  const text = cleanText(value, 256);

  if (!text) {
    throw new ConfigError('Router host is not configured.');
  }

  const explicit = /^(https?):\/\//i.exec(text);
  const withProtocol = explicit ? text : `https://${text}`;

  let url: URL;
  try {
    url = new URL(withProtocol);
  } catch (error) {
    throw new ConfigError(`Router host "${text}" is invalid.`);
  }

  return {
    host: url.host,
    schemes: url.protocol === 'http:' ? ['http'] : explicit ? ['https'] : ['https', 'http'],
  };
}

export function parseMonitorConfig(input: RawMonitorConfig): MonitorConfig {
  const parsed = rawConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'config';
    throw new ConfigError(`Invalid configuration (${where}): ${issue?.message ?? 'unknown problem'}.`);
  }

  const raw = parsed.data;
  const defaults = DEFAULT_MONITOR_CONFIG;

  return {
    ...parseRouterAddress(raw.host),
    verifyTls: raw.verifyTls ?? defaults.verifyTls,
    username: cleanText(raw.username, 128),
    password: cleanText(raw.password, 256),
    pollIntervalSeconds: clampNumber(raw.pollIntervalSeconds, 5, 3600, defaults.pollIntervalSeconds),
    requestTimeoutSeconds: clampNumber(raw.requestTimeoutSeconds, 1, 120, defaults.requestTimeoutSeconds),
    retryAttempts: clampNumber(raw.retryAttempts, 1, 10, defaults.retryAttempts),
    retryBaseDelayMs: clampNumber(raw.retryBaseDelayMs, 0, 30000, defaults.retryBaseDelayMs),
  };
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  return parseMonitorConfig({
    host: env.ROUTER_HOST ?? '',
    verifyTls: env.ROUTER_VERIFY_TLS,
    username: env.ROUTER_USERNAME,
    password: env.ROUTER_PASSWORD,
    pollIntervalSeconds: env.POLL_INTERVAL_SECONDS,
    requestTimeoutSeconds: env.REQUEST_TIMEOUT_SECONDS,
    retryAttempts: env.RETRY_ATTEMPTS,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
  });
}
