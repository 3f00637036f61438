/**
 * One live socket and everything it owns.
 *
 * A connection handles the handshake for its role, splits the byte stream
 * into lines, batches outgoing messages and runs the heartbeat. Its timers
 * live in a {@link TimerScope} tagged with the connection id; closing the
 * connection disposes the scope before the socket is destroyed.
 *
 * Validation and rate limiting happen one level up, in the transport.
 *
 * @module link/connection
 */

import type * as net from 'node:net';
import { EventEmitter } from 'node:events';

import { epochSeconds, type Clock, type ScheduledTimer } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import { TimerScope } from '../core/timer-scope.js';
import { OutgoingBatcher, type BatcherStats } from '../protocol/batcher.js';
import { LineDecoder, encodeFrame, parseFrame } from '../protocol/framing.js';
import {
  HandshakeCodec,
  LEGACY_ACK,
  nullAuthenticator,
  type HandshakeAuthenticator,
} from '../protocol/handshake.js';
import { Messages } from '../protocol/messages.js';
import { LivenessError, ProtocolError, TransportError } from './errors.js';
import { HeartbeatMonitor } from './heartbeat.js';
import { LINK_DEFAULTS, type Endpoint, type HandshakeRole } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ConnectionOptions {
  readonly id: string;
  readonly socket: net.Socket;
  readonly endpoint: Endpoint;
  readonly role: HandshakeRole;
  readonly clock: Clock;
  readonly logger: Logger;

  /** Name this side announces (initiator `name=`, JSON `server`) */
  readonly localName: string;

  readonly protocolMajor?: number | undefined;
  readonly maxSupportedMajor?: number | undefined;
  readonly authenticator?: HandshakeAuthenticator | undefined;

  /** Responder accepts `{"type":"handshake"}` as a first line */
  readonly acceptJsonHandshake?: boolean | undefined;

  readonly handshakeTimeoutMs?: number | undefined;
  readonly heartbeatIntervalMs: number;
  readonly livenessMs: number;

  readonly batchSize?: number | undefined;
  readonly batchTimeoutMs?: number | undefined;
  readonly maxBatchSize?: number | undefined;
  readonly maxPendingBatches?: number | undefined;
  readonly maxLineBytes?: number | undefined;
}

/**
 * Outcome of a completed handshake.
 */
export interface HandshakeInfo {
  readonly form: 'line' | 'legacy' | 'json';
  readonly major: number;
  readonly peerName: string | null;
  readonly auth: string | null;
  readonly features: readonly string[];

  /** Opaque token from the handshake (`hmac=` value), empty when unused */
  readonly token: string;
}

export interface ConnectionEvents {
  /** Handshake completed; data messages are accepted from now on */
  handshake: [info: HandshakeInfo];

  /** One post-handshake JSON object */
  frame: [frame: Record<string, unknown>];

  /** Handshake did not complete in time */
  handshakeTimeout: [];

  /** No inbound bytes within the liveness threshold */
  stale: [error: LivenessError];

  /** Line dropped for not following the protocol */
  protocolError: [error: ProtocolError];

  /** Socket closed by the peer or by an I/O error (not emitted for close()) */
  closed: [error: TransportError | null];
}

export interface ConnectionStats {
  readonly id: string;
  readonly endpoint: Endpoint;
  readonly role: HandshakeRole;
  readonly handshaken: boolean;
  readonly protocolMajor: number | null;
  readonly peerName: string | null;
  readonly openedAt: number;
  readonly handshakeAt: number | null;
  readonly lastActivityAt: number;
  readonly lastReceivedAt: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly framesReceived: number;
  readonly linesDropped: number;
  readonly batcher: BatcherStats;
}

// =============================================================================
// Connection
// =============================================================================

export class Connection extends EventEmitter<ConnectionEvents> {
  readonly id: string;
  readonly endpoint: Endpoint;
  readonly role: HandshakeRole;

  private readonly socket: net.Socket;
  private readonly timers: TimerScope;
  private readonly decoder: LineDecoder;
  private readonly batcher: OutgoingBatcher;
  private readonly heartbeat: HeartbeatMonitor;
  private readonly authenticator: HandshakeAuthenticator;
  private readonly logger: Logger;

  private handshake: HandshakeInfo | null = null;
  private handshakeTimer: ScheduledTimer | null = null;
  private sentNonce: string | null = null;
  private opened = false;
  private closed = false;
  private lastSocketError: Error | null = null;

  // Statistics
  private readonly openedAt: number;
  private handshakeAt: number | null = null;
  private bytesSent = 0;
  private bytesReceived = 0;
  private framesReceived = 0;
  private linesDropped = 0;

  constructor(private readonly options: ConnectionOptions) {
    super();
    this.id = options.id;
    this.endpoint = options.endpoint;
    this.role = options.role;
    this.socket = options.socket;
    this.logger = options.logger.child(options.id);
    this.authenticator = options.authenticator ?? nullAuthenticator;
    this.openedAt = options.clock.now();

    this.timers = new TimerScope(options.clock, options.id);
    this.decoder = new LineDecoder(options.maxLineBytes ?? LINK_DEFAULTS.MAX_LINE_BYTES, (error) =>
      this.reportProtocolError(error),
    );
    this.batcher = new OutgoingBatcher((frame) => this.write(frame), {
      timers: this.timers,
      clock: options.clock,
      batchSize: options.batchSize,
      batchTimeoutMs: options.batchTimeoutMs,
      maxBatchSize: options.maxBatchSize,
      maxPendingBatches: options.maxPendingBatches,
      logger: this.logger,
    });
    this.heartbeat = new HeartbeatMonitor({
      connectionId: options.id,
      clock: options.clock,
      timers: this.timers,
      intervalMs: options.heartbeatIntervalMs,
      livenessMs: options.livenessMs,
      sendHeartbeat: () => this.sendHeartbeat(),
    });
    this.heartbeat.on('stale', (error) => {
      this.logger.warn('connection stale', { idleMs: error.idleMs });
      this.emit('stale', error);
    });
  }

  /**
   * Attaches socket handlers, starts the handshake timer and, as initiator,
   * sends the hello line.
   */
  open(): void {
    if (this.opened || this.closed) return;
    this.opened = true;

    this.socket.on('data', (data: Buffer) => this.handleData(data));
    this.socket.on('error', (err) => this.handleSocketError(err));
    this.socket.on('close', () => this.handleSocketClose());
    this.socket.setNoDelay(true);

    this.handshakeTimer = this.timers.after(
      this.options.handshakeTimeoutMs ?? LINK_DEFAULTS.HANDSHAKE_TIMEOUT_MS,
      () => {
        this.handshakeTimer = null;
        if (this.handshake === null) {
          this.logger.warn('handshake timed out');
          this.emit('handshakeTimeout');
        }
      },
    );

    if (this.role === 'initiator') {
      this.sendHello();
    }
  }

  isHandshaken(): boolean {
    return this.handshake !== null;
  }

  getHandshake(): HandshakeInfo | null {
    return this.handshake;
  }

  getLastReceivedAt(): number {
    return this.heartbeat.getLastReceivedAt();
  }

  getLastActivityAt(): number {
    return this.heartbeat.getLastActivityAt();
  }

  /**
   * Queues a message for the next batch.
   *
   * @returns false before the handshake completes or after close
   */
  send(message: object): boolean {
    if (this.closed || this.handshake === null) return false;
    return this.batcher.enqueue(JSON.stringify(message));
  }

  /**
   * Closes the connection: timers first, then the batch queue, then the socket.
   * Does not emit `closed`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.timers.dispose();
    this.heartbeat.stop();
    const discarded = this.batcher.close();
    if (discarded > 0) {
      this.logger.debug('discarded unsent messages', { discarded });
    }

    this.socket.removeAllListeners('data');
    this.socket.removeAllListeners('close');
    this.socket.destroy();
  }

  getStats(): ConnectionStats {
    return {
      id: this.id,
      endpoint: this.endpoint,
      role: this.role,
      handshaken: this.handshake !== null,
      protocolMajor: this.handshake?.major ?? null,
      peerName: this.handshake?.peerName ?? null,
      openedAt: this.openedAt,
      handshakeAt: this.handshakeAt,
      lastActivityAt: this.heartbeat.getLastActivityAt(),
      lastReceivedAt: this.heartbeat.getLastReceivedAt(),
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      framesReceived: this.framesReceived,
      linesDropped: this.linesDropped,
      batcher: this.batcher.getStats(),
    };
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private handleData(data: Buffer): void {
    if (this.closed) return;

    this.bytesReceived += data.length;
    this.heartbeat.recordReceive();

    for (const line of this.decoder.push(data)) {
      if (this.closed) return;
      if (this.handshake === null) {
        this.handleHandshakeLine(line);
      } else {
        this.handleDataLine(line);
      }
    }
  }

  private handleDataLine(line: string): void {
    let frame: Record<string, unknown>;
    try {
      frame = parseFrame(line);
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.reportProtocolError(err);
        return;
      }
      throw err;
    }

    this.framesReceived++;
    this.emit('frame', frame);
  }

  private handleHandshakeLine(line: string): void {
    try {
      if (this.role === 'responder') {
        this.respondToHandshake(line);
      } else {
        this.acceptHandshakeReply(line);
      }
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.reportProtocolError(err);
        return;
      }
      throw err;
    }
  }

  private respondToHandshake(line: string): void {
    if (!HandshakeCodec.isHello(line)) {
      const json = this.options.acceptJsonHandshake ? HandshakeCodec.parseJsonHandshake(line) : null;
      if (json === null) {
        this.dropLine('awaiting handshake, ignoring line');
        return;
      }

      this.writeControl(HandshakeCodec.buildJsonHandshakeResponse(this.options.localName));
      this.completeHandshake({
        form: 'json',
        major: 1,
        peerName: json.name ?? json.client ?? null,
        auth: json.auth ?? null,
        features: [],
        token: '',
      });
      return;
    }

    const hello = HandshakeCodec.parseHello(line);

    if (hello.legacy) {
      this.writeControl(`${LEGACY_ACK}\n`);
      this.completeHandshake({
        form: 'legacy',
        major: 1,
        peerName: hello.displayName,
        auth: null,
        features: [],
        token: '',
      });
      return;
    }

    const maxMajor = this.options.maxSupportedMajor ?? LINK_DEFAULTS.MAX_SUPPORTED_MAJOR;
    if (hello.major < 1 || hello.major > maxMajor) {
      throw new ProtocolError('unsupported_version', `peer speaks CB/${hello.major}, max ${maxMajor}`);
    }

    if (!this.authenticator.verify(hello)) {
      throw new ProtocolError('malformed_handshake', `auth scheme '${hello.auth ?? ''}' refused`);
    }

    const hmac = this.authenticator.sign(hello);
    this.writeControl(HandshakeCodec.buildReply(hello.major, hmac));
    this.completeHandshake({
      form: 'line',
      major: hello.major,
      peerName: hello.displayName,
      auth: hello.auth,
      features: hello.features,
      token: hmac,
    });
  }

  private acceptHandshakeReply(line: string): void {
    const jsonMajor = HandshakeCodec.parseJsonHandshakeResponse(line);
    if (jsonMajor !== null) {
      this.completeHandshake({
        form: 'json',
        major: jsonMajor,
        peerName: this.endpoint.name,
        auth: this.authenticator.scheme,
        features: [],
        token: '',
      });
      return;
    }

    if (!line.startsWith('OK/') && line !== LEGACY_ACK) {
      this.dropLine('awaiting handshake reply, ignoring line');
      return;
    }

    const reply = HandshakeCodec.parseReply(line);
    if (!this.authenticator.verifyReply(reply, this.sentNonce)) {
      throw new ProtocolError('malformed_handshake', 'reply failed verification');
    }

    this.completeHandshake({
      form: reply.legacy ? 'legacy' : 'line',
      major: reply.major,
      peerName: this.endpoint.name,
      auth: this.authenticator.scheme,
      features: [],
      token: reply.hmac,
    });
  }

  private completeHandshake(info: HandshakeInfo): void {
    this.handshakeTimer?.cancel();
    this.handshakeTimer = null;
    this.handshake = info;
    this.handshakeAt = this.options.clock.now();

    this.logger.info('handshake complete', {
      form: info.form,
      major: info.major,
      peer: info.peerName ?? undefined,
    });

    this.heartbeat.start();
    this.emit('handshake', info);
  }

  private dropLine(reason: string): void {
    this.linesDropped++;
    this.logger.debug(reason);
  }

  private reportProtocolError(error: ProtocolError): void {
    this.linesDropped++;
    this.logger.warn(error.message, { code: error.code });
    this.emit('protocolError', error);
  }

  private handleSocketError(err: Error): void {
    this.lastSocketError = err;
    this.logger.debug('socket error', { error: err });
    // 'close' follows and tears the connection down
  }

  private handleSocketClose(): void {
    if (this.closed) return;
    this.closed = true;

    this.timers.dispose();
    this.heartbeat.stop();
    this.batcher.close();
    this.socket.removeAllListeners('data');

    const error = this.lastSocketError
      ? new TransportError('receive_failed', this.endpoint.kind, this.lastSocketError)
      : null;
    this.emit('closed', error);
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  private sendHello(): void {
    const nonce = this.options.clock.now().toString(36);
    this.sentNonce = nonce;
    this.writeControl(
      HandshakeCodec.buildHello({
        major: this.options.protocolMajor ?? LINK_DEFAULTS.PROTOCOL_MAJOR,
        auth: this.authenticator.scheme,
        nonce,
        ts: epochSeconds(this.options.clock),
        name: this.options.localName,
      }),
    );
  }

  private sendHeartbeat(): void {
    this.writeControl(encodeFrame(Messages.heartbeat(epochSeconds(this.options.clock))));
  }

  /**
   * Writes a handshake or heartbeat line directly, bypassing the batcher.
   */
  private writeControl(text: string): void {
    void this.write(text).catch((err: unknown) => {
      this.logger.debug('control write failed', {
        error: err instanceof Error ? err : String(err),
      });
    });
  }

  private write(text: string): Promise<void> {
    if (this.closed || this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new TransportError('send_failed', this.endpoint.kind));
    }

    return new Promise((resolve, reject) => {
      const payload = Buffer.from(text, 'utf8');
      this.socket.write(payload, (err) => {
        if (err) {
          reject(new TransportError('send_failed', this.endpoint.kind, err));
          return;
        }
        this.bytesSent += payload.length;
        this.heartbeat.recordActivity();
        resolve();
      });
    });
  }
}
