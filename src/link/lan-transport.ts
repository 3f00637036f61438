/**
 * LAN transport.
 *
 * Browses for peers through a {@link ServiceDiscovery}, dials one over TCP
 * and speaks the handshake first (initiator). A newly announced peer
 * short-circuits any pending backoff.
 *
 * @module link/lan-transport
 */

import * as net from 'node:net';

import type { ScheduledTimer } from '../core/clock.js';
import { TimerScope } from '../core/timer-scope.js';
import type { DiscoveredPeer, ServiceDiscovery } from '../discovery/service-discovery.js';
import { TransportError } from './errors.js';
import { LinkTransport, type LinkTransportOptions } from './transport.js';
import { LINK_DEFAULTS } from './types.js';

export interface LanTransportOptions extends LinkTransportOptions {
  readonly discovery: ServiceDiscovery;

  /** Dial discovered peers without an explicit connectTo(). Default true. */
  readonly autoConnect?: boolean | undefined;

  readonly connectTimeoutMs?: number | undefined;

  /** Browse refresh period while not active */
  readonly discoveryRefreshMs?: number | undefined;
}

interface PendingDial {
  readonly id: string;
  readonly socket: net.Socket;
  readonly timer: ScheduledTimer;
  readonly settle: (error: Error | null, aborted?: boolean) => void;
}

/**
 * @example
 * ```typescript
 * const lan = new LanTransport({ discovery: new BonjourDiscovery(), localName: 'Studio iPad' });
 * lan.on('peersChanged', (peers) => render(peers));
 * await lan.start();
 * lan.connectTo(peers[0].id);
 * ```
 */
export class LanTransport extends LinkTransport {
  override readonly kind = 'lan' as const;

  private readonly discovery: ServiceDiscovery;
  private readonly peers = new Map<string, DiscoveredPeer>();
  private readonly timers: TimerScope;
  private readonly autoConnect: boolean;
  private readonly connectTimeoutMs: number;
  private readonly discoveryRefreshMs: number;

  private preferredPeerId: string | null = null;
  private lastPeerId: string | null = null;
  private pendingDial: PendingDial | null = null;

  constructor(options: LanTransportOptions) {
    super(
      'initiator',
      'discovering',
      options,
      {
        heartbeatIntervalMs: LINK_DEFAULTS.LAN_HEARTBEAT_INTERVAL_MS,
        livenessMs: LINK_DEFAULTS.LAN_LIVENESS_MS,
      },
      'lan',
    );
    this.discovery = options.discovery;
    this.autoConnect = options.autoConnect ?? true;
    this.connectTimeoutMs = options.connectTimeoutMs ?? LINK_DEFAULTS.CONNECT_TIMEOUT_MS;
    this.discoveryRefreshMs = options.discoveryRefreshMs ?? LINK_DEFAULTS.DISCOVERY_REFRESH_MS;
    this.timers = new TimerScope(this.clock, 'lan-discovery');

    this.discovery.on('up', (peer) => this.handlePeerUp(peer));
    this.discovery.on('down', (peer) => this.handlePeerDown(peer));
  }

  /**
   * Peers currently advertising, in discovery order.
   */
  getPeers(): DiscoveredPeer[] {
    return [...this.peers.values()];
  }

  /**
   * Pins the transport to one peer and dials it unless suspended. An active
   * connection to a different peer is dropped first.
   *
   * @returns false if the peer is unknown
   */
  connectTo(peerId: string): boolean {
    if (!this.peers.has(peerId)) return false;
    this.preferredPeerId = peerId;

    if (!this.isStarted() || this.isSuspended()) return true;

    const current = this.getConnection();
    const peer = this.peers.get(peerId);
    const samePeer =
      current !== null &&
      peer !== undefined &&
      current.endpoint.address === peer.host &&
      current.endpoint.port === peer.port;
    if (current && !samePeer) {
      this.dropConnection();
    }
    this.abortDial();
    if (!this.isActive()) this.scheduler.retryNow();
    return true;
  }

  /**
   * Forgets a peer pinned with connectTo().
   */
  clearPreferredPeer(): void {
    this.preferredPeerId = null;
  }

  // ===========================================================================
  // Hooks
  // ===========================================================================

  protected override onStart(): Promise<void> {
    this.discovery.start();
    this.timers.every(this.discoveryRefreshMs, () => {
      if (!this.isActive()) this.discovery.refresh();
    });
    if (this.peers.size > 0) this.scheduler.retryNow();
    return Promise.resolve();
  }

  protected override async onStop(): Promise<void> {
    this.timers.cancelAll();
    this.abortDial();
    this.peers.clear();
    this.emit('peersChanged', []);
    await this.discovery.stop();
  }

  protected override onSuspend(): void {
    this.abortDial();
  }

  protected override onResume(): void {
    if (this.pickPeer()) this.scheduler.retryNow();
  }

  protected override attemptReconnect(): Promise<void> {
    if (this.isActive() || this.pendingDial) return Promise.resolve();

    const peer = this.pickPeer();
    if (!peer) {
      this.logger.debug('no peer to dial');
      return Promise.resolve();
    }
    return this.dial(peer);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private pickPeer(): DiscoveredPeer | null {
    if (this.preferredPeerId !== null) {
      return this.peers.get(this.preferredPeerId) ?? null;
    }
    if (!this.autoConnect) return null;
    if (this.lastPeerId !== null) {
      const last = this.peers.get(this.lastPeerId);
      if (last) return last;
    }
    const first = this.peers.values().next();
    return first.done ? null : first.value;
  }

  private dial(peer: DiscoveredPeer): Promise<void> {
    const id = this.beginConnecting();
    if (id === null) return Promise.resolve();

    this.logger.info('dialing', { connection: id, peer: peer.name, host: peer.host, port: peer.port });

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: peer.host, port: peer.port });

      const settle = (error: Error | null, aborted = false): void => {
        const pending = this.pendingDial;
        if (pending === null || pending.socket !== socket) return;
        pending.timer.cancel();
        this.pendingDial = null;
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);

        if (error === null) {
          this.lastPeerId = peer.id;
          this.attachSocket(id, socket, {
            kind: 'lan',
            address: peer.host,
            port: peer.port,
            name: peer.name,
          });
          resolve();
          return;
        }

        socket.destroy();
        if (aborted) {
          this.abandonConnecting();
          resolve();
          return;
        }
        this.failConnecting(id, error);
        reject(new TransportError('connect_failed', 'lan', error));
      };

      const onConnect = (): void => settle(null);
      const onError = (err: Error): void => settle(err);

      socket.once('connect', onConnect);
      socket.once('error', onError);

      const timer = this.clock.schedule(() => {
        settle(new Error(`connect timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      this.pendingDial = { id, socket, timer, settle };
    });
  }

  private abortDial(): void {
    const pending = this.pendingDial;
    if (!pending) return;
    this.logger.debug('dial aborted', { connection: pending.id });
    pending.settle(new Error('dial aborted'), true);
  }

  private handlePeerUp(peer: DiscoveredPeer): void {
    if (!this.isStarted()) return;

    const known = this.peers.has(peer.id);
    this.peers.set(peer.id, peer);
    if (!known) {
      this.emit('peersChanged', this.getPeers());
    }

    if (this.isSuspended() || this.isActive() || this.pendingDial) return;
    if (this.autoConnect || this.preferredPeerId === peer.id) {
      this.notifyPeerAvailable();
    }
  }

  private handlePeerDown(peer: DiscoveredPeer): void {
    if (this.peers.delete(peer.id)) {
      this.emit('peersChanged', this.getPeers());
    }
  }
}
