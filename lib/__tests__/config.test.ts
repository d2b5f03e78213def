import { describe, expect, it } from 'vitest';

import { DEFAULT_MONITOR_CONFIG, loadConfigFromEnv, parseMonitorConfig } from '../config';
import { ConfigError } from '../errors';

describe('parseMonitorConfig', () => {
  it('applies defaults and tries https before http for a bare host', () => {
    expect(parseMonitorConfig({ host: '192.168.77.1' })).toEqual({
      ...DEFAULT_MONITOR_CONFIG,
      host: '192.168.77.1',
      schemes: ['https', 'http'],
    });
  });

  it('keeps an explicit scheme and port but drops any path', () => {
    expect(parseMonitorConfig({ host: ' http://router.lan:8080/index.html ' })).toMatchObject({
      host: 'router.lan:8080',
      schemes: ['http'],
    });
    expect(parseMonitorConfig({ host: 'HTTPS://router.lan' })).toMatchObject({
      host: 'router.lan',
      schemes: ['https'],
    });
  });

  it('rejects a host that is not a URL authority', () => {
    expect(() => parseMonitorConfig({ host: 'router lan' })).toThrow('Router host "router lan" is invalid.');
  });

  it('caps the retry base delay', () => {
    expect(parseMonitorConfig({ host: 'router.lan', retryBaseDelayMs: 90_000 }).retryBaseDelayMs).toBe(30_000);
  });

  it('clamps numbers into range and falls back on garbage', () => {
    const config = parseMonitorConfig({
      host: 'router.lan',
      pollIntervalSeconds: '1',
      requestTimeoutSeconds: 99_999,
      retryAttempts: 'many',
      retryBaseDelayMs: '250.4',
    });

    expect(config.pollIntervalSeconds).toBe(5);
    expect(config.requestTimeoutSeconds).toBe(120);
    expect(config.retryAttempts).toBe(3);
    expect(config.retryBaseDelayMs).toBe(250);
  });

  it('parses the TLS verification flag', () => {
    expect(parseMonitorConfig({ host: 'router.lan', verifyTls: 'false' }).verifyTls).toBe(false);
    expect(parseMonitorConfig({ host: 'router.lan', verifyTls: 'YES' }).verifyTls).toBe(true);
    expect(parseMonitorConfig({ host: 'router.lan', verifyTls: '' }).verifyTls).toBe(true);
  });

  it('rejects a flag it cannot read', () => {
    expect(() => parseMonitorConfig({ host: 'router.lan', verifyTls: 'maybe' }))
      .toThrow('Invalid configuration (verifyTls): "maybe" is not a boolean.');
  });

  it('requires a host', () => {
    expect(() => parseMonitorConfig({ host: '  ' })).toThrow(ConfigError);
    expect(() => parseMonitorConfig({ host: '  ' })).toThrow('Router host is not configured.');
  });
});

describe('loadConfigFromEnv', () => {
  it('maps environment variables onto the config', () => {
    const config = loadConfigFromEnv({
      ROUTER_HOST: '10.0.0.1',
      ROUTER_VERIFY_TLS: '0',
      ROUTER_USERNAME: 'admin',
      ROUTER_PASSWORD: 'test-secret',
      POLL_INTERVAL_SECONDS: '30',
      REQUEST_TIMEOUT_SECONDS: '5',
    });

    expect(config).toEqual({
      host: '10.0.0.1',
      schemes: ['https', 'http'],
      verifyTls: false,
      username: 'admin',
      password: 'test-secret',
      pollIntervalSeconds: 30,
      requestTimeoutSeconds: 5,
      retryAttempts: 3,
      retryBaseDelayMs: 500,
    });
  });

  it('fails without ROUTER_HOST', () => {
    expect(() => loadConfigFromEnv({})).toThrow('Router host is not configured.');
  });
});
