import { describe, it, expect } from 'vitest';
import {
  InvalidConfigError,
  LINK_DEFAULTS,
  configFromEnv,
  parseLogLevel,
  resolveConfig,
} from '../src/index.js';

describe('resolveConfig', () => {
  it('fills every field from the defaults', () => {
    const config = resolveConfig();

    expect(config.deviceName).toBe('padlink');
    expect(config.logLevel).toBe('info');
    expect(config.tunnel).toEqual({
      port: LINK_DEFAULTS.TUNNEL_PORT,
      host: '127.0.0.1',
      acceptJsonHandshake: false,
      heartbeatIntervalMs: 1000,
      livenessMs: 3000,
      degradedAfterMs: 1500,
    });
    expect(config.lan.serviceType).toBe('padlink');
    expect(config.lan.heartbeatIntervalMs).toBe(2000);
    expect(config.lan.livenessMs).toBe(20000);
    expect(config.protocol).toEqual({
      major: 2,
      handshakeTimeoutMs: 3000,
      batchSize: 5,
      batchTimeoutMs: 10,
      maxBatchSize: 100,
      maxPendingBatches: 64,
    });
    expect(config.security.maxMessagesPerWindow).toBe(100);
  });

  it('merges sections field by field, later layers winning', () => {
    const config = resolveConfig(
      { deviceName: 'Studio', tunnel: { port: 9400, host: '0.0.0.0' } },
      { tunnel: { port: 9500 }, lan: { enabled: false } },
    );

    expect(config.deviceName).toBe('Studio');
    expect(config.tunnel.port).toBe(9500);
    expect(config.tunnel.host).toBe('0.0.0.0');
    expect(config.lan.enabled).toBe(false);
    expect(config.lan.autoConnect).toBe(true);
  });

  it('ignores undefined fields in a layer', () => {
    const config = resolveConfig({ tunnel: { port: 9400 } }, { tunnel: { port: undefined } });
    expect(config.tunnel.port).toBe(9400);
  });

  it('rejects a batch size above the batch cap', () => {
    let caught: unknown;
    try {
      resolveConfig({ protocol: { batchSize: 200 } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidConfigError);
    expect(caught).toMatchObject({ issues: ['protocol.batchSize: batchSize must not exceed maxBatchSize'] });
  });

  it('rejects a malformed service type', () => {
    expect(() => resolveConfig({ lan: { serviceType: '_Padlink._tcp' } })).toThrow(
      /lan\.serviceType: must be 1-15 lowercase letters, digits or dashes/,
    );
  });

  it('rejects an out-of-range tunnel port', () => {
    expect(() => resolveConfig({ tunnel: { port: 70000 } })).toThrow(/tunnel\.port/);
  });

  it('rejects a protocol major this side cannot speak', () => {
    expect(() => resolveConfig({ protocol: { major: 3 } })).toThrow(InvalidConfigError);
  });
});

describe('configFromEnv', () => {
  it('maps PADLINK_* variables', () => {
    const input = configFromEnv({
      PADLINK_DEVICE_NAME: 'Stage Mac',
      PADLINK_LOG_LEVEL: 'debug',
      PADLINK_TUNNEL_PORT: '9400',
      PADLINK_TUNNEL_HOST: '::1',
      PADLINK_SERVICE_TYPE: 'padlink-dev',
    });

    expect(input).toEqual({
      deviceName: 'Stage Mac',
      logLevel: 'debug',
      tunnel: { port: 9400, host: '::1' },
      lan: { serviceType: 'padlink-dev' },
    });
  });

  it('treats off-like PADLINK_LAN values as disabled', () => {
    expect(configFromEnv({ PADLINK_LAN: 'off' })).toEqual({ lan: { enabled: false } });
    expect(configFromEnv({ PADLINK_LAN: 'FALSE' })).toEqual({ lan: { enabled: false } });
    expect(configFromEnv({ PADLINK_LAN: '1' })).toEqual({ lan: { enabled: true } });
  });

  it('returns an empty layer for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });

  it('rejects an unknown log level', () => {
    expect(() => configFromEnv({ PADLINK_LOG_LEVEL: 'verbose' })).toThrow(InvalidConfigError);
  });

  it('leaves a non-numeric port to validation', () => {
    expect(() => resolveConfig(configFromEnv({ PADLINK_TUNNEL_PORT: 'abc' }))).toThrow(/tunnel\.port/);
  });
});

describe('parseLogLevel', () => {
  it('returns the fallback for a missing value', () => {
    expect(parseLogLevel(undefined, 'warn')).toBe('warn');
  });

  it('accepts known levels and rejects others', () => {
    expect(parseLogLevel('silent', 'info')).toBe('silent');
    expect(() => parseLogLevel('trace', 'info')).toThrow(
      'Invalid padlink configuration: log level: expected one of debug, info, warn, error, silent',
    );
  });
});
