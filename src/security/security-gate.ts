/**
 * Ingress gate for inbound traffic.
 *
 * Two independent sliding-window limiters keyed by endpoint fingerprint
 * (connection attempts and messages), a type whitelist and per-field range
 * validation. Every refusal is silent on the wire: it is logged, counted and
 * reported through the `violation` event, and the sender hears nothing.
 *
 * @module security/security-gate
 */

import { createHash } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { systemClock, type Clock } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { TimerScope } from '../core/timer-scope.js';
import { SecurityError } from '../link/errors.js';
import { LINK_DEFAULTS, type TransportKind } from '../link/types.js';
import { isRecord } from '../protocol/framing.js';
import {
  batchSchema,
  describeIssues,
  linkMessageSchema,
  typedObjectSchema,
  type LinkMessage,
  type LinkMessageType,
} from '../protocol/schemas.js';
import { SlidingWindowLimiter } from './sliding-window.js';

// =============================================================================
// Types
// =============================================================================

export interface SecurityGateOptions {
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;

  readonly maxConnectionAttempts?: number | undefined;
  readonly connectionWindowMs?: number | undefined;

  readonly maxMessagesPerWindow?: number | undefined;
  readonly messageWindowMs?: number | undefined;

  /** Inbound batches with more entries are rejected wholesale */
  readonly maxBatchEntries?: number | undefined;

  /** Admit `midi_input` (device side receiving host feedback) */
  readonly acceptMidiInput?: boolean | undefined;

  readonly cleanupIntervalMs?: number | undefined;
}

export interface SecurityStats {
  readonly connectionsAdmitted: number;
  readonly connectionsRejected: number;
  readonly messagesAccepted: number;
  readonly messagesRejected: number;
  readonly rateLimited: number;
  readonly validationFailures: number;
  readonly trackedConnectionFingerprints: number;
  readonly trackedMessageFingerprints: number;
}

export interface SecurityGateEvents {
  violation: [error: SecurityError];
}

const BASE_TYPES: readonly LinkMessageType[] = [
  'midi_cc',
  'midi_note',
  'transport',
  'heartbeat',
  'handshake',
  'batch',
];

/**
 * Stable identifier for a remote endpoint: SHA-256 of `<kind>:<address>`.
 */
export function fingerprintOf(kind: TransportKind, address: string): string {
  return createHash('sha256').update(`${kind}:${address}`).digest('hex');
}

// =============================================================================
// SecurityGate
// =============================================================================

/**
 * @example
 * ```typescript
 * const gate = new SecurityGate({ logger });
 * const fp = fingerprintOf('tunnel', socket.remoteAddress ?? 'unknown');
 * if (!gate.admitConnection(fp)) socket.destroy();
 *
 * for (const message of gate.inspect(fp, parseFrame(line))) {
 *   route(message);
 * }
 * ```
 */
export class SecurityGate extends EventEmitter<SecurityGateEvents> {
  private readonly connectionLimiter: SlidingWindowLimiter;
  private readonly messageLimiter: SlidingWindowLimiter;
  private readonly allowedTypes: ReadonlySet<string>;
  private readonly maxBatchEntries: number;
  private readonly cleanupIntervalMs: number;
  private readonly logger: Logger;
  private readonly timers: TimerScope;
  private cleanupRunning = false;

  private connectionsAdmitted = 0;
  private connectionsRejected = 0;
  private messagesAccepted = 0;
  private messagesRejected = 0;
  private rateLimited = 0;
  private validationFailures = 0;

  constructor(options: SecurityGateOptions = {}) {
    super();
    const clock = options.clock ?? systemClock;

    this.connectionLimiter = new SlidingWindowLimiter({
      limit: options.maxConnectionAttempts ?? LINK_DEFAULTS.MAX_CONNECTION_ATTEMPTS,
      windowMs: options.connectionWindowMs ?? LINK_DEFAULTS.CONNECTION_WINDOW_MS,
      clock,
    });
    this.messageLimiter = new SlidingWindowLimiter({
      limit: options.maxMessagesPerWindow ?? LINK_DEFAULTS.MAX_MESSAGES_PER_WINDOW,
      windowMs: options.messageWindowMs ?? LINK_DEFAULTS.MESSAGE_WINDOW_MS,
      clock,
    });

    this.allowedTypes = new Set<string>(
      options.acceptMidiInput ? [...BASE_TYPES, 'midi_input'] : BASE_TYPES,
    );
    this.maxBatchEntries = options.maxBatchEntries ?? LINK_DEFAULTS.MAX_INBOUND_BATCH;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? LINK_DEFAULTS.SECURITY_CLEANUP_INTERVAL_MS;
    this.logger = options.logger ?? silentLogger;
    this.timers = new TimerScope(clock, 'security-gate');
  }

  // ===========================================================================
  // Connection Attempts
  // ===========================================================================

  /**
   * Records a connection attempt and reports whether it may proceed.
   */
  admitConnection(fingerprint: string): boolean {
    const result = this.connectionLimiter.consume(fingerprint);
    if (result.allowed) {
      this.connectionsAdmitted++;
      return true;
    }

    this.connectionsRejected++;
    this.rateLimited++;
    this.report(
      new SecurityError(
        'rate_limited',
        fingerprint,
        `${result.current}/${result.limit} connection attempts, retry in ${result.resetMs}ms`,
      ),
    );
    return false;
  }

  /**
   * Forgets the connection attempt history of one endpoint.
   */
  clearConnectionLimit(fingerprint: string): void {
    this.connectionLimiter.reset(fingerprint);
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  /**
   * Rate-limits and validates one inbound frame.
   *
   * A batch costs one message-rate unit per entry and is exploded; each entry
   * is re-parsed and validated on its own. Returns the messages that passed,
   * in order.
   */
  inspect(fingerprint: string, frame: Readonly<Record<string, unknown>>): LinkMessage[] {
    if (frame['type'] === 'batch') {
      return this.inspectBatch(fingerprint, frame);
    }

    if (!this.consumeRate(fingerprint, 1)) return [];

    const message = this.check(fingerprint, frame);
    return message ? [message] : [];
  }

  /**
   * Validates a single (non-batch) message without touching the rate ledger.
   * Returns null when the type is not whitelisted or a field is out of range.
   */
  validate(raw: unknown): LinkMessage | null {
    const typed = typedObjectSchema.safeParse(raw);
    if (!typed.success) return null;
    if (typed.data.type === 'batch' || !this.allowedTypes.has(typed.data.type)) return null;

    const result = linkMessageSchema.safeParse(raw);
    return result.success ? result.data : null;
  }

  // ===========================================================================
  // Maintenance
  // ===========================================================================

  /**
   * Drops ledger entries idle for more than two windows.
   */
  cleanup(): void {
    const removed = this.connectionLimiter.cleanup() + this.messageLimiter.cleanup();
    if (removed > 0) {
      this.logger.debug('security ledger pruned', { removed });
    }
  }

  /**
   * Starts periodic ledger cleanup.
   */
  start(): void {
    if (this.cleanupRunning) return;
    this.cleanupRunning = true;
    this.timers.every(this.cleanupIntervalMs, () => this.cleanup());
  }

  stop(): void {
    this.cleanupRunning = false;
    this.timers.cancelAll();
  }

  getStats(): SecurityStats {
    return {
      connectionsAdmitted: this.connectionsAdmitted,
      connectionsRejected: this.connectionsRejected,
      messagesAccepted: this.messagesAccepted,
      messagesRejected: this.messagesRejected,
      rateLimited: this.rateLimited,
      validationFailures: this.validationFailures,
      trackedConnectionFingerprints: this.connectionLimiter.size,
      trackedMessageFingerprints: this.messageLimiter.size,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private inspectBatch(fingerprint: string, frame: Readonly<Record<string, unknown>>): LinkMessage[] {
    const parsed = batchSchema.safeParse(frame);
    if (!parsed.success) {
      this.rejectInvalid(fingerprint, `batch: ${describeIssues(parsed.error).join('; ')}`);
      return [];
    }

    const entries = parsed.data.messages;
    if (entries.length > this.maxBatchEntries) {
      this.rejectInvalid(
        fingerprint,
        `batch of ${entries.length} entries exceeds ${this.maxBatchEntries}`,
        entries.length,
      );
      return [];
    }

    if (!this.consumeRate(fingerprint, Math.max(1, entries.length), entries.length)) return [];

    const accepted: LinkMessage[] = [];
    for (const entry of entries) {
      let inner: unknown;
      try {
        inner = JSON.parse(entry);
      } catch {
        this.rejectInvalid(fingerprint, 'batch entry is not valid JSON');
        continue;
      }

      if (isRecord(inner) && inner['type'] === 'batch') {
        this.rejectInvalid(fingerprint, 'nested batch');
        continue;
      }

      const message = this.check(fingerprint, inner);
      if (message) accepted.push(message);
    }
    return accepted;
  }

  private check(fingerprint: string, raw: unknown): LinkMessage | null {
    const message = this.validate(raw);
    if (message) {
      this.messagesAccepted++;
      return message;
    }

    const type = isRecord(raw) && typeof raw['type'] === 'string' ? raw['type'] : '<untyped>';
    this.rejectInvalid(
      fingerprint,
      this.allowedTypes.has(type) ? `invalid ${type} fields` : `type '${type}' not allowed`,
    );
    return null;
  }

  private consumeRate(fingerprint: string, cost: number, messages = 1): boolean {
    const result = this.messageLimiter.consume(fingerprint, cost);
    if (result.allowed) return true;

    this.messagesRejected += messages;
    this.rateLimited++;
    this.report(
      new SecurityError(
        'rate_limited',
        fingerprint,
        `${cost} message(s) over ${result.limit} per ${this.messageLimiter.windowMs}ms`,
      ),
    );
    return false;
  }

  private rejectInvalid(fingerprint: string, detail: string, messages = 1): void {
    this.messagesRejected += messages;
    this.validationFailures++;
    this.report(new SecurityError('validation_failed', fingerprint, detail));
  }

  private report(error: SecurityError): void {
    this.logger.warn(error.message, { code: error.code });
    this.emit('violation', error);
  }
}
