/**
 * Generic transport: one state machine, one reconnection scheduler and at
 * most one connection at a time.
 *
 * Concrete transports only decide where sockets come from (a listener for
 * the tunnel, discovery plus a dialer for the LAN). Everything between the
 * socket and a validated message is shared here.
 *
 * @module link/transport
 */

import type * as net from 'node:net';
import { EventEmitter } from 'node:events';

import { systemClock, type Clock } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { DiscoveredPeer } from '../discovery/service-discovery.js';
import type { HandshakeAuthenticator } from '../protocol/handshake.js';
import type { LinkMessage } from '../protocol/schemas.js';
import { SecurityGate, fingerprintOf } from '../security/security-gate.js';
import { ConnectionMachine, type LinkEvent, type WaitingPhase } from './connection-machine.js';
import { Connection, type HandshakeInfo } from './connection.js';
import { ReconnectionScheduler } from './reconnect.js';
import type {
  DisconnectReason,
  Endpoint,
  HandshakeRole,
  LinkState,
  TransportKind,
  TransportSnapshot,
} from './types.js';

// =============================================================================
// Public Interface
// =============================================================================

export interface TransportEvents {
  /** Every phase change */
  stateChange: [state: LinkState, previous: LinkState];

  /** Handshake completed; the transport can carry traffic */
  active: [snapshot: TransportSnapshot];

  /** The connection ended */
  disconnected: [reason: DisconnectReason, error: Error | null];

  /** A validated inbound message */
  message: [message: LinkMessage];

  /** A reconnection attempt was scheduled */
  reconnecting: [failures: number, delayMs: number];

  /** The set of dialable peers changed (discovery-based transports only) */
  peersChanged: [peers: readonly DiscoveredPeer[]];

  /** Non-fatal failure (only emitted when someone listens) */
  error: [error: Error];
}

/**
 * What the coordinator sees of a transport.
 */
export interface Transport extends EventEmitter<TransportEvents> {
  readonly kind: TransportKind;

  start(): Promise<void>;
  stop(): Promise<void>;

  /**
   * Tears down any connection and stops accepting or dialing new ones until
   * resumed.
   */
  suspend(): void;
  resume(): void;
  isSuspended(): boolean;

  /** A peer signalled availability: skip any pending backoff */
  notifyPeerAvailable(): void;

  /**
   * Queues a message on the active connection.
   *
   * @returns false when there is no handshaken connection
   */
  send(message: object): boolean;

  /** A handshaken connection exists */
  isActive(): boolean;

  getSnapshot(): TransportSnapshot;
}

export interface LinkTransportOptions {
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
  readonly gate?: SecurityGate | undefined;

  /** Name this side announces during the handshake */
  readonly localName?: string | undefined;
  readonly authenticator?: HandshakeAuthenticator | undefined;
  readonly protocolMajor?: number | undefined;
  readonly maxSupportedMajor?: number | undefined;

  readonly handshakeTimeoutMs?: number | undefined;
  readonly heartbeatIntervalMs?: number | undefined;
  readonly livenessMs?: number | undefined;

  readonly batchSize?: number | undefined;
  readonly batchTimeoutMs?: number | undefined;
  readonly maxBatchSize?: number | undefined;
  readonly maxPendingBatches?: number | undefined;
  readonly maxLineBytes?: number | undefined;

  /** Overrides the tiered backoff */
  readonly backoff?: ((failures: number) => number) | undefined;
}

// =============================================================================
// LinkTransport
// =============================================================================

export abstract class LinkTransport
  extends EventEmitter<TransportEvents>
  implements Transport
{
  abstract readonly kind: TransportKind;

  protected readonly clock: Clock;
  protected readonly logger: Logger;
  protected readonly gate: SecurityGate;
  protected readonly machine: ConnectionMachine;
  protected readonly scheduler: ReconnectionScheduler;

  private connection: Connection | null = null;
  private fingerprint: string | null = null;
  private connectionSeq = 0;
  private started = false;
  private suspended = false;
  private readonly heartbeatIntervalMs: number;
  private readonly livenessMs: number;

  protected constructor(
    private readonly role: HandshakeRole,
    waiting: WaitingPhase,
    protected readonly linkOptions: LinkTransportOptions,
    defaults: { readonly heartbeatIntervalMs: number; readonly livenessMs: number },
    scope: string,
  ) {
    super();
    this.clock = linkOptions.clock ?? systemClock;
    this.logger = (linkOptions.logger ?? silentLogger).child(scope);
    this.gate = linkOptions.gate ?? new SecurityGate({ clock: this.clock, logger: this.logger });
    this.heartbeatIntervalMs = linkOptions.heartbeatIntervalMs ?? defaults.heartbeatIntervalMs;
    this.livenessMs = linkOptions.livenessMs ?? defaults.livenessMs;

    this.machine = new ConnectionMachine(waiting);
    this.machine.on('transition', (from, to, event) => {
      this.logger.debug('state', { from: from.phase, to: to.phase, event: event.type });
      this.emit('stateChange', to, from);
    });

    this.scheduler = new ReconnectionScheduler({
      clock: this.clock,
      logger: this.logger,
      delayFor: linkOptions.backoff,
      attempt: () => this.attemptReconnect(),
    });
    this.scheduler.on('scheduled', (failures, delayMs) => {
      this.emit('reconnecting', failures, delayMs);
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    if (!this.suspended) this.scheduler.resume();
    this.machine.dispatch({ type: 'start' });

    try {
      await this.onStart();
    } catch (err) {
      this.reportError(err);
      this.scheduler.recordFailure();
    }
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.scheduler.suppress();

    const current = this.connection;
    if (current) {
      this.finishConnection(current, { type: 'stop' }, null);
    } else {
      this.machine.dispatch({ type: 'stop' });
    }
    this.machine.dispatch({ type: 'halt' });

    try {
      await this.onStop();
    } catch (err) {
      this.reportError(err);
    }
  }

  suspend(): void {
    if (this.suspended) return;
    this.suspended = true;
    this.scheduler.suppress();
    this.logger.info('suspended');

    const current = this.connection;
    if (current) {
      this.finishConnection(current, { type: 'stop' }, null);
    }
    this.onSuspend();
  }

  resume(): void {
    if (!this.suspended) return;
    this.suspended = false;
    this.logger.info('resumed');
    if (!this.started) return;

    this.scheduler.resume();
    this.onResume();
  }

  isSuspended(): boolean {
    return this.suspended;
  }

  isStarted(): boolean {
    return this.started;
  }

  notifyPeerAvailable(): void {
    if (!this.started || this.suspended || this.isActive()) return;
    this.logger.debug('peer available, retrying now');
    this.scheduler.retryNow();
  }

  // ===========================================================================
  // Traffic
  // ===========================================================================

  send(message: object): boolean {
    if (!this.isActive() || this.connection === null) return false;
    return this.connection.send(message);
  }

  isActive(): boolean {
    return this.machine.getPhase() === 'active' && this.connection?.isHandshaken() === true;
  }

  getSnapshot(): TransportSnapshot {
    const connection = this.connection;
    const handshake = connection?.getHandshake() ?? null;
    return {
      kind: this.kind,
      state: this.machine.getState(),
      suspended: this.suspended,
      connectionId: connection?.id ?? null,
      peer: connection ? { ...connection.endpoint, name: handshake?.peerName ?? connection.endpoint.name } : null,
      protocolMajor: handshake?.major ?? null,
      lastActivityAt: connection?.getLastActivityAt() ?? null,
      lastReceivedAt: connection?.getLastReceivedAt() ?? null,
      consecutiveFailures: this.scheduler.getFailureCount(),
      reconnectPending: this.scheduler.isPending(),
    };
  }

  // ===========================================================================
  // Hooks
  // ===========================================================================

  /** Begin waiting for sockets (bind, browse). May throw to trigger a retry. */
  protected abstract onStart(): Promise<void>;

  /** Release every resource acquired by onStart */
  protected abstract onStop(): Promise<void>;

  protected abstract onSuspend(): void;

  protected abstract onResume(): void;

  /** One reconnection attempt. Throws or rejects on failure. */
  protected abstract attemptReconnect(): void | Promise<void>;

  // ===========================================================================
  // Connection Management (for subclasses)
  // ===========================================================================

  /**
   * Marks a socket as in progress (dialing or just accepted).
   *
   * @returns the id the connection will carry, or null if the transport is
   *   not waiting for one
   */
  protected beginConnecting(): string | null {
    const current = this.connection;
    if (current) {
      this.logger.info('new socket supersedes current connection', { previous: current.id });
      this.finishConnection(current, { type: 'closed', connectionId: current.id }, null, false);
    }

    const id = `${this.kind}-${++this.connectionSeq}`;
    return this.machine.dispatch({ type: 'socket_ready', connectionId: id }) ? id : null;
  }

  /**
   * Dialing was called off before a socket was established. Not a failure.
   */
  protected abandonConnecting(): void {
    if (this.connection !== null || this.machine.getPhase() !== 'connecting') return;
    this.machine.dispatch({ type: 'stop' });
    this.machine.dispatch({ type: 'reset' });
  }

  /**
   * Dialing for `id` failed before a socket was established.
   */
  protected failConnecting(id: string, error: Error): void {
    if (this.connection !== null || this.machine.getPhase() !== 'connecting') return;
    this.machine.dispatch({ type: 'io_error', connectionId: id, error });
    this.machine.dispatch({ type: 'reset' });
  }

  /**
   * Wraps an established socket in a connection and opens it.
   */
  protected attachSocket(id: string, socket: net.Socket, endpoint: Endpoint): Connection {
    const connection = new Connection({
      id,
      socket,
      endpoint,
      role: this.role,
      clock: this.clock,
      logger: this.logger,
      localName: this.linkOptions.localName ?? 'padlink',
      authenticator: this.linkOptions.authenticator,
      protocolMajor: this.linkOptions.protocolMajor,
      maxSupportedMajor: this.linkOptions.maxSupportedMajor,
      acceptJsonHandshake: this.acceptsJsonHandshake(),
      handshakeTimeoutMs: this.linkOptions.handshakeTimeoutMs,
      heartbeatIntervalMs: this.heartbeatIntervalMs,
      livenessMs: this.livenessMs,
      batchSize: this.linkOptions.batchSize,
      batchTimeoutMs: this.linkOptions.batchTimeoutMs,
      maxBatchSize: this.linkOptions.maxBatchSize,
      maxPendingBatches: this.linkOptions.maxPendingBatches,
      maxLineBytes: this.linkOptions.maxLineBytes,
    });

    this.connection = connection;
    this.fingerprint = fingerprintOf(endpoint.kind, endpoint.address);
    const isCurrent = (): boolean => this.connection === connection;

    connection.on('handshake', (info) => {
      if (isCurrent()) this.handleHandshake(connection, info);
    });
    connection.on('frame', (frame) => {
      if (isCurrent()) this.handleFrame(frame);
    });
    connection.on('handshakeTimeout', () => {
      if (isCurrent()) {
        this.finishConnection(connection, { type: 'handshake_timeout', connectionId: id }, null);
      }
    });
    connection.on('stale', (error) => {
      if (isCurrent()) {
        this.finishConnection(connection, { type: 'liveness_expired', connectionId: id }, error);
      }
    });
    connection.on('closed', (error) => {
      if (!isCurrent()) return;
      const event: LinkEvent = error
        ? { type: 'io_error', connectionId: id, error }
        : { type: 'closed', connectionId: id };
      this.finishConnection(connection, event, error);
    });

    this.machine.dispatch({ type: 'established', connectionId: id });
    connection.open();
    return connection;
  }

  protected getConnection(): Connection | null {
    return this.connection;
  }

  /**
   * Closes the current connection on purpose, without scheduling a retry.
   */
  protected dropConnection(): void {
    const current = this.connection;
    if (current) {
      this.finishConnection(current, { type: 'stop' }, null, false);
    }
  }

  protected acceptsJsonHandshake(): boolean {
    return false;
  }

  /**
   * Logs a failure and forwards it as `error` when someone listens.
   */
  protected reportError(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.logger.warn(error.message, { error: error.name });
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private handleHandshake(connection: Connection, info: HandshakeInfo): void {
    this.scheduler.reset();
    this.machine.dispatch({ type: 'handshake_complete', connectionId: connection.id });
    this.logger.info('active', { connection: connection.id, peer: info.peerName ?? undefined });
    this.emit('active', this.getSnapshot());
  }

  private handleFrame(frame: Readonly<Record<string, unknown>>): void {
    const fingerprint = this.fingerprint;
    if (fingerprint === null) return;
    for (const message of this.gate.inspect(fingerprint, frame)) {
      this.emit('message', message);
    }
  }

  /**
   * Ends the current connection: timers and socket first, then the state
   * machine, then (unless stopped or suspended) the next attempt is scheduled.
   */
  private finishConnection(
    connection: Connection,
    event: LinkEvent,
    error: Error | null,
    reschedule = true,
  ): void {
    if (this.connection !== connection) return;
    this.connection = null;
    this.fingerprint = null;
    connection.close();

    this.machine.dispatch(event);
    const state = this.machine.getState();
    const reason: DisconnectReason = state.phase === 'disconnected' ? state.reason : 'error';

    if (this.started) {
      this.machine.dispatch({ type: 'reset' });
    }

    if (reschedule && reason !== 'user' && this.started && !this.suspended) {
      this.scheduler.recordFailure();
    }

    this.logger.info('disconnected', { connection: connection.id, reason });
    this.emit('disconnected', reason, error);
  }
}
