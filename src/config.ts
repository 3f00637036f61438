/**
 * Configuration for a padlink coordinator.
 *
 * Defaults come from {@link LINK_DEFAULTS}; layers (environment, CLI flags,
 * code) are merged section by section and validated with zod.
 *
 * @module config
 */

import { z } from 'zod';

import { LOG_LEVELS, isLogLevel, type LogLevel } from './core/logger.js';
import { InvalidConfigError } from './link/errors.js';
import { LINK_DEFAULTS } from './link/types.js';
import { describeIssues } from './protocol/schemas.js';

// =============================================================================
// Schema
// =============================================================================

const ms = z.number().int().positive();
const count = z.number().int().positive();

const tunnelSchema = z.object({
  port: z.number().int().min(0).max(65535).default(LINK_DEFAULTS.TUNNEL_PORT),
  host: z.string().min(1).default(LINK_DEFAULTS.TUNNEL_HOST),
  acceptJsonHandshake: z.boolean().default(false),
  heartbeatIntervalMs: ms.default(LINK_DEFAULTS.TUNNEL_HEARTBEAT_INTERVAL_MS),
  livenessMs: ms.default(LINK_DEFAULTS.TUNNEL_LIVENESS_MS),
  degradedAfterMs: ms.default(LINK_DEFAULTS.TUNNEL_DEGRADED_AFTER_MS),
});

const lanSchema = z.object({
  enabled: z.boolean().default(true),
  serviceType: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]{0,14}$/, 'must be 1-15 lowercase letters, digits or dashes')
    .default(LINK_DEFAULTS.SERVICE_TYPE),
  autoConnect: z.boolean().default(true),
  connectTimeoutMs: ms.default(LINK_DEFAULTS.CONNECT_TIMEOUT_MS),
  discoveryRefreshMs: ms.default(LINK_DEFAULTS.DISCOVERY_REFRESH_MS),
  heartbeatIntervalMs: ms.default(LINK_DEFAULTS.LAN_HEARTBEAT_INTERVAL_MS),
  livenessMs: ms.default(LINK_DEFAULTS.LAN_LIVENESS_MS),
  degradedAfterMs: ms.default(LINK_DEFAULTS.LAN_DEGRADED_AFTER_MS),
});

const protocolSchema = z
  .object({
    major: z.number().int().min(1).max(LINK_DEFAULTS.MAX_SUPPORTED_MAJOR).default(LINK_DEFAULTS.PROTOCOL_MAJOR),
    handshakeTimeoutMs: ms.default(LINK_DEFAULTS.HANDSHAKE_TIMEOUT_MS),
    batchSize: count.default(LINK_DEFAULTS.BATCH_SIZE),
    batchTimeoutMs: ms.default(LINK_DEFAULTS.BATCH_TIMEOUT_MS),
    maxBatchSize: count.default(LINK_DEFAULTS.MAX_BATCH_SIZE),
    maxPendingBatches: count.default(LINK_DEFAULTS.MAX_PENDING_BATCHES),
  })
  .refine((p) => p.batchSize <= p.maxBatchSize, {
    message: 'batchSize must not exceed maxBatchSize',
    path: ['batchSize'],
  });

const securitySchema = z.object({
  maxConnectionAttempts: count.default(LINK_DEFAULTS.MAX_CONNECTION_ATTEMPTS),
  connectionWindowMs: ms.default(LINK_DEFAULTS.CONNECTION_WINDOW_MS),
  maxMessagesPerWindow: count.default(LINK_DEFAULTS.MAX_MESSAGES_PER_WINDOW),
  messageWindowMs: ms.default(LINK_DEFAULTS.MESSAGE_WINDOW_MS),
  maxBatchEntries: count.default(LINK_DEFAULTS.MAX_INBOUND_BATCH),
  acceptMidiInput: z.boolean().default(false),
  cleanupIntervalMs: ms.default(LINK_DEFAULTS.SECURITY_CLEANUP_INTERVAL_MS),
});

export const configSchema = z.object({
  deviceName: z.string().trim().min(1).max(63).default('padlink'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  statusIntervalMs: ms.default(LINK_DEFAULTS.STATUS_INTERVAL_MS),
  recoveryDelayMs: z.number().int().nonnegative().default(LINK_DEFAULTS.RECOVERY_DELAY_MS),
  tunnel: tunnelSchema.default({}),
  lan: lanSchema.default({}),
  protocol: protocolSchema.default({}),
  security: securitySchema.default({}),
});

/**
 * Fully resolved configuration.
 */
export type PadlinkConfig = z.output<typeof configSchema>;

/**
 * Partial configuration; omitted fields take their defaults.
 */
export type PadlinkConfigInput = z.input<typeof configSchema>;

type SectionKey = 'tunnel' | 'lan' | 'protocol' | 'security';
const SECTIONS: readonly SectionKey[] = ['tunnel', 'lan', 'protocol', 'security'];

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merges configuration layers (later wins, per field within each section)
 * and validates the result.
 *
 * @throws {InvalidConfigError} If any field is invalid
 *
 * @example
 * ```typescript
 * const config = resolveConfig(configFromEnv(process.env), { deviceName: 'Stage iPad' });
 * ```
 */
export function resolveConfig(...layers: readonly PadlinkConfigInput[]): PadlinkConfig {
  const merged: Record<string, unknown> = {};

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      if (isSection(key) && typeof value === 'object' && value !== null) {
        const previous = merged[key];
        merged[key] = {
          ...(typeof previous === 'object' && previous !== null ? previous : {}),
          ...dropUndefined(value),
        };
      } else {
        merged[key] = value;
      }
    }
  }

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Reads configuration from `PADLINK_*` environment variables.
 *
 * | Variable | Field |
 * |---|---|
 * | `PADLINK_DEVICE_NAME` | `deviceName` |
 * | `PADLINK_LOG_LEVEL` | `logLevel` |
 * | `PADLINK_TUNNEL_PORT` | `tunnel.port` |
 * | `PADLINK_TUNNEL_HOST` | `tunnel.host` |
 * | `PADLINK_LAN` | `lan.enabled` (`0`, `false`, `off` disable) |
 * | `PADLINK_SERVICE_TYPE` | `lan.serviceType` |
 */
export function configFromEnv(env: Readonly<Record<string, string | undefined>>): PadlinkConfigInput {
  const config: PadlinkConfigInput = {};
  const tunnel: z.input<typeof tunnelSchema> = {};
  const lan: z.input<typeof lanSchema> = {};

  const deviceName = env['PADLINK_DEVICE_NAME'];
  if (deviceName) config.deviceName = deviceName;

  const logLevel = env['PADLINK_LOG_LEVEL'];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new InvalidConfigError([`PADLINK_LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')}`]);
    }
    config.logLevel = logLevel;
  }

  const port = env['PADLINK_TUNNEL_PORT'];
  if (port) tunnel.port = Number(port);

  const host = env['PADLINK_TUNNEL_HOST'];
  if (host) tunnel.host = host;

  const lanFlag = env['PADLINK_LAN'];
  if (lanFlag) lan.enabled = !['0', 'false', 'off', 'no'].includes(lanFlag.toLowerCase());

  const serviceType = env['PADLINK_SERVICE_TYPE'];
  if (serviceType) lan.serviceType = serviceType;

  if (Object.keys(tunnel).length > 0) config.tunnel = tunnel;
  if (Object.keys(lan).length > 0) config.lan = lan;
  return config;
}

/**
 * Parses a log level, falling back when the value is missing.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  if (!isLogLevel(value)) {
    throw new InvalidConfigError([`log level: expected one of ${LOG_LEVELS.join(', ')}`]);
  }
  return value;
}

function isSection(key: string): key is SectionKey {
  return (SECTIONS as readonly string[]).includes(key);
}

function dropUndefined(value: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) out[key] = entry;
  }
  return out;
}
