/**
 * USB tunnel transport.
 *
 * Listens on a loopback port that a host-side USB multiplexing forwarder
 * connects to, and answers the handshake as responder. A newer socket always
 * supersedes the current connection; the forwarder only ever holds one.
 *
 * @module link/tunnel-transport
 */

import * as net from 'node:net';

import { fingerprintOf } from '../security/security-gate.js';
import { TransportError } from './errors.js';
import { LinkTransport, type LinkTransportOptions } from './transport.js';
import { LINK_DEFAULTS } from './types.js';

export interface TunnelTransportOptions extends LinkTransportOptions {
  /** Port to bind. 0 picks a free port. */
  readonly port?: number | undefined;

  /** Interface to bind. Defaults to loopback. */
  readonly host?: string | undefined;

  /** Also accept the JSON `{"type":"handshake"}` first line */
  readonly acceptJsonHandshake?: boolean | undefined;

  /** Name reported for the peer until its handshake names it */
  readonly peerLabel?: string | undefined;
}

/**
 * @example
 * ```typescript
 * const tunnel = new TunnelTransport({ port: 9360, logger });
 * tunnel.on('active', (snapshot) => console.log('USB host', snapshot.peer?.name));
 * tunnel.on('message', (message) => route(message));
 * await tunnel.start();
 * ```
 */
export class TunnelTransport extends LinkTransport {
  override readonly kind = 'tunnel' as const;

  private server: net.Server | null = null;
  private boundPort: number | null = null;
  private readonly port: number;
  private readonly host: string;

  constructor(private readonly options: TunnelTransportOptions = {}) {
    super(
      'responder',
      'listening',
      options,
      {
        heartbeatIntervalMs: LINK_DEFAULTS.TUNNEL_HEARTBEAT_INTERVAL_MS,
        livenessMs: LINK_DEFAULTS.TUNNEL_LIVENESS_MS,
      },
      'tunnel',
    );
    this.port = options.port ?? LINK_DEFAULTS.TUNNEL_PORT;
    this.host = options.host ?? LINK_DEFAULTS.TUNNEL_HOST;
  }

  /**
   * Port the listener is bound to, or null while not listening.
   */
  getListeningPort(): number | null {
    return this.boundPort;
  }

  isListening(): boolean {
    return this.server !== null;
  }

  // ===========================================================================
  // Hooks
  // ===========================================================================

  protected override async onStart(): Promise<void> {
    await this.listen();
  }

  protected override async onStop(): Promise<void> {
    await this.closeServer();
  }

  protected override onSuspend(): void {
    void this.closeServer();
  }

  protected override onResume(): void {
    this.scheduler.retryNow();
  }

  /**
   * The peer dials us, so reconnecting means making sure we listen.
   */
  protected override attemptReconnect(): Promise<void> {
    if (this.server) return Promise.resolve();
    return this.listen();
  }

  protected override acceptsJsonHandshake(): boolean {
    return this.options.acceptJsonHandshake ?? false;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private listen(): Promise<void> {
    if (this.server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => this.handleIncomingConnection(socket));

      const onError = (err: Error): void => {
        server.removeListener('listening', onListening);
        reject(new TransportError('bind_failed', 'tunnel', err));
      };

      const onListening = (): void => {
        server.removeListener('error', onError);

        if (!this.isStarted() || this.isSuspended() || this.server !== null) {
          server.close();
          resolve();
          return;
        }

        server.on('error', (err) => this.handleServerError(server, err));
        this.server = server;
        const address = server.address();
        this.boundPort = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info('listening', { host: this.host, port: this.boundPort });
        resolve();
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.port, this.host);
    });
  }

  private handleIncomingConnection(socket: net.Socket): void {
    if (!this.isStarted() || this.isSuspended()) {
      socket.destroy();
      return;
    }

    const address = socket.remoteAddress ?? 'unknown';
    if (!this.gate.admitConnection(fingerprintOf('tunnel', address))) {
      socket.destroy();
      return;
    }

    const id = this.beginConnecting();
    if (id === null) {
      socket.destroy();
      return;
    }

    this.logger.debug('accepted', { connection: id, remote: `${address}:${socket.remotePort ?? 0}` });
    this.attachSocket(id, socket, {
      kind: 'tunnel',
      address,
      port: socket.remotePort ?? 0,
      name: this.options.peerLabel ?? 'USB host',
    });
  }

  private handleServerError(server: net.Server, err: Error): void {
    if (this.server !== server) return;
    this.reportError(new TransportError('accept_failed', 'tunnel', err));

    this.server = null;
    this.boundPort = null;
    server.close();
    this.scheduler.recordFailure();
  }

  private closeServer(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    this.server = null;
    this.boundPort = null;
    this.logger.info('listener closed');
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
