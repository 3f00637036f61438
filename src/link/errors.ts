/**
 * Error taxonomy of the link layer.
 *
 * None of these ever escapes a socket callback. Transport and liveness errors
 * feed the reconnection scheduler, protocol errors drop the offending line,
 * security errors drop the offending message or connection attempt.
 *
 * @module link/errors
 */

import type { TransportKind } from './types.js';

export type TransportErrorCode =
  | 'bind_failed'
  | 'accept_failed'
  | 'connect_failed'
  | 'send_failed'
  | 'receive_failed';

export type ProtocolErrorCode = 'malformed_handshake' | 'unsupported_version' | 'malformed_frame';

export type SecurityErrorCode = 'rate_limited' | 'validation_failed';

/**
 * Socket-level failure on a transport.
 */
export class TransportError extends Error {
  override readonly name = 'TransportError' as const;

  constructor(
    readonly code: TransportErrorCode,
    readonly transport: TransportKind,
    override readonly cause?: Error | undefined,
  ) {
    super(
      cause
        ? `${transport} transport ${code.replace('_', ' ')}: ${cause.message}`
        : `${transport} transport ${code.replace('_', ' ')}`,
    );
  }
}

/**
 * Peer sent something that does not follow the line protocol.
 */
export class ProtocolError extends Error {
  override readonly name = 'ProtocolError' as const;

  constructor(
    readonly code: ProtocolErrorCode,
    readonly detail: string,
  ) {
    super(`Protocol error (${code}): ${detail}`);
  }
}

/**
 * Inbound traffic refused by the security gate.
 */
export class SecurityError extends Error {
  override readonly name = 'SecurityError' as const;

  constructor(
    readonly code: SecurityErrorCode,
    readonly fingerprint: string,
    readonly detail: string,
  ) {
    super(`Security violation (${code}) from ${fingerprint.slice(0, 12)}: ${detail}`);
  }
}

/**
 * Connection produced no inbound bytes within its liveness threshold.
 */
export class LivenessError extends Error {
  override readonly name = 'LivenessError' as const;

  constructor(
    readonly connectionId: string,
    readonly idleMs: number,
    readonly thresholdMs: number,
  ) {
    super(`Connection '${connectionId}' is stale: no data for ${idleMs}ms (limit ${thresholdMs}ms)`);
  }
}

/**
 * Outbound message failed range or shape checks at construction.
 */
export class InvalidMessageError extends Error {
  override readonly name = 'InvalidMessageError' as const;

  constructor(
    readonly messageType: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid ${messageType} message: ${issues.join('; ')}`);
  }
}

/**
 * Configuration failed validation.
 */
export class InvalidConfigError extends Error {
  override readonly name = 'InvalidConfigError' as const;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid padlink configuration: ${issues.join('; ')}`);
  }
}
