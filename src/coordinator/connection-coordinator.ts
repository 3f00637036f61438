/**
 * Owns both transports, decides which one is authoritative and exposes a
 * single send/receive API.
 *
 * Arbitration:
 * - the tunnel strictly preempts the LAN: when it becomes active, the LAN
 *   connection is torn down (the LAN keeps browsing but does not dial);
 * - if the tunnel drops while the LAN is active, the tunnel stays suspended
 *   until the LAN drops too, so the peer cannot bounce between the two;
 * - if the tunnel drops with no LAN connection, the LAN may take over.
 *
 * Transport events go through one inbox and are handled strictly one after
 * another, so a decision never observes a half-applied previous one.
 *
 * @module coordinator/connection-coordinator
 */

import { EventEmitter } from 'node:events';

import type { PadlinkConfig } from '../config.js';
import { epochSeconds, systemClock, type Clock } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { TimerScope } from '../core/timer-scope.js';
import type { DeviceEventSource } from '../devices/device-monitor.js';
import {
  BonjourDiscovery,
  type DiscoveredPeer,
  type ServiceDiscovery,
} from '../discovery/service-discovery.js';
import { InvalidMessageError } from '../link/errors.js';
import { LanTransport } from '../link/lan-transport.js';
import type { Transport } from '../link/transport.js';
import { TunnelTransport } from '../link/tunnel-transport.js';
import {
  LINK_DEFAULTS,
  type ActiveTransport,
  type DisconnectReason,
  type LinkStatus,
  type TransportKind,
  type TransportSnapshot,
} from '../link/types.js';
import { decodeMidiInput, type MidiFeedback, type MidiSink, type MidiSource } from '../midi/midi-bridge.js';
import { Messages, type ControlMetadata } from '../protocol/messages.js';
import type { LinkMessage } from '../protocol/schemas.js';
import { SecurityGate } from '../security/security-gate.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A transport whose peers are discovered and can be chosen by hand.
 */
export interface PeerTransport extends Transport {
  getPeers(): DiscoveredPeer[];
  connectTo(peerId: string): boolean;
  clearPreferredPeer(): void;
}

export interface CoordinatorOptions {
  readonly tunnel: Transport;
  readonly lan?: PeerTransport | null | undefined;

  readonly sink?: MidiSink | undefined;
  readonly source?: MidiSource | undefined;
  readonly devices?: DeviceEventSource | undefined;

  /** Shared ingress gate; its cleanup timer runs while the coordinator does */
  readonly gate?: SecurityGate | undefined;

  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;

  readonly statusIntervalMs?: number | undefined;
  readonly recoveryDelayMs?: number | undefined;
  readonly tunnelDegradedAfterMs?: number | undefined;
  readonly lanDegradedAfterMs?: number | undefined;
}

export interface CoordinatorEvents {
  activeTransportChanged: [active: ActiveTransport, previous: ActiveTransport];
  status: [status: LinkStatus, previous: LinkStatus];

  /** Every validated inbound message */
  message: [message: LinkMessage, from: TransportKind];

  /** Decoded `midi_input` from the peer */
  feedback: [feedback: MidiFeedback];

  /** Outbound message with no transport to carry it */
  dropped: [message: object];

  peers: [peers: readonly DiscoveredPeer[]];
}

export interface CoordinatorSnapshot {
  readonly activeTransport: ActiveTransport;
  readonly status: LinkStatus;
  readonly tunnel: TransportSnapshot;
  readonly lan: TransportSnapshot | null;
  readonly tunnelDeferred: boolean;
  readonly lanHeld: boolean;
}

/**
 * Collaborators for {@link ConnectionCoordinator.fromConfig}.
 */
export interface CoordinatorDependencies {
  readonly sink?: MidiSink | undefined;
  readonly source?: MidiSource | undefined;
  readonly devices?: DeviceEventSource | undefined;
  readonly discovery?: ServiceDiscovery | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

type InboxEvent =
  | { readonly type: 'active'; readonly kind: TransportKind }
  | { readonly type: 'disconnected'; readonly kind: TransportKind; readonly reason: DisconnectReason }
  | { readonly type: 'state'; readonly kind: TransportKind }
  | { readonly type: 'device_attached'; readonly deviceId: string };

// =============================================================================
// ConnectionCoordinator
// =============================================================================

/**
 * @example
 * ```typescript
 * const coordinator = ConnectionCoordinator.fromConfig(resolveConfig(), { sink, logger });
 * coordinator.on('status', (status) => badge.set(status));
 * await coordinator.start();
 *
 * coordinator.sendCC(1, 74, 100, { label: 'Cutoff' });
 * ```
 */
export class ConnectionCoordinator extends EventEmitter<CoordinatorEvents> {
  private readonly tunnel: Transport;
  private readonly lan: PeerTransport | null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timers: TimerScope;

  private activeTransport: ActiveTransport = 'none';
  private status: LinkStatus = 'disconnected';
  private started = false;

  /** Tunnel held back because the LAN carries traffic */
  private tunnelDeferred = false;

  /** LAN held back by disconnectLan() */
  private lanHeld = false;

  private readonly inbox: InboxEvent[] = [];
  private draining = false;
  private unsubscribeSource: (() => void) | null = null;

  private readonly onDeviceAttached = (deviceId: string): void => {
    this.enqueue({ type: 'device_attached', deviceId });
  };

  private readonly onDeviceDetached = (deviceId: string): void => {
    this.logger.info('device detached', { device: deviceId });
  };

  constructor(private readonly options: CoordinatorOptions) {
    super();
    this.tunnel = options.tunnel;
    this.lan = options.lan ?? null;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child('coordinator');
    this.timers = new TimerScope(this.clock, 'coordinator');

    this.wire(this.tunnel);
    if (this.lan) {
      this.wire(this.lan);
      this.lan.on('peersChanged', (peers) => this.emit('peers', peers));
    }
  }

  /**
   * Builds the tunnel and LAN transports, discovery and a shared security
   * gate from a resolved configuration.
   */
  static fromConfig(config: PadlinkConfig, deps: CoordinatorDependencies = {}): ConnectionCoordinator {
    const clock = deps.clock ?? systemClock;
    const logger = deps.logger ?? silentLogger;

    const gate = new SecurityGate({
      clock,
      logger: logger.child('security'),
      ...config.security,
    });

    const shared = {
      clock,
      logger,
      gate,
      localName: config.deviceName,
      protocolMajor: config.protocol.major,
      handshakeTimeoutMs: config.protocol.handshakeTimeoutMs,
      batchSize: config.protocol.batchSize,
      batchTimeoutMs: config.protocol.batchTimeoutMs,
      maxBatchSize: config.protocol.maxBatchSize,
      maxPendingBatches: config.protocol.maxPendingBatches,
    };

    const tunnel = new TunnelTransport({
      ...shared,
      port: config.tunnel.port,
      host: config.tunnel.host,
      acceptJsonHandshake: config.tunnel.acceptJsonHandshake,
      heartbeatIntervalMs: config.tunnel.heartbeatIntervalMs,
      livenessMs: config.tunnel.livenessMs,
    });

    const lan = config.lan.enabled
      ? new LanTransport({
          ...shared,
          discovery:
            deps.discovery ?? new BonjourDiscovery({ serviceType: config.lan.serviceType, logger }),
          autoConnect: config.lan.autoConnect,
          connectTimeoutMs: config.lan.connectTimeoutMs,
          discoveryRefreshMs: config.lan.discoveryRefreshMs,
          heartbeatIntervalMs: config.lan.heartbeatIntervalMs,
          livenessMs: config.lan.livenessMs,
        })
      : null;

    return new ConnectionCoordinator({
      tunnel,
      lan,
      gate,
      clock,
      logger,
      sink: deps.sink,
      source: deps.source,
      devices: deps.devices,
      statusIntervalMs: config.statusIntervalMs,
      recoveryDelayMs: config.recoveryDelayMs,
      tunnelDegradedAfterMs: config.tunnel.degradedAfterMs,
      lanDegradedAfterMs: config.lan.degradedAfterMs,
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.logger.info('starting', { lan: this.lan !== null });

    // A run begins with neither transport deferred nor held.
    this.resetArbitration();

    this.options.gate?.start();

    const devices = this.options.devices;
    if (devices) {
      devices.on('attached', this.onDeviceAttached);
      devices.on('detached', this.onDeviceDetached);
      devices.start();
    }

    const source = this.options.source;
    if (source) {
      this.unsubscribeSource = source.onMidiInput(([status, data1, data2]) => {
        this.forwardMidiInput(status, data1, data2);
      });
    }

    await Promise.all([this.tunnel.start(), this.lan?.start()]);

    this.timers.every(this.options.statusIntervalMs ?? LINK_DEFAULTS.STATUS_INTERVAL_MS, () =>
      this.updateStatus(),
    );
    this.updateStatus();
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.logger.info('stopping');

    this.timers.cancelAll();
    this.unsubscribeSource?.();
    this.unsubscribeSource = null;

    const devices = this.options.devices;
    if (devices) {
      devices.stop();
      devices.off('attached', this.onDeviceAttached);
      devices.off('detached', this.onDeviceDetached);
    }

    await Promise.all([this.tunnel.stop(), this.lan?.stop()]);
    this.options.gate?.stop();

    this.setActive('none');
    this.updateStatus();
  }

  /**
   * Stops both transports, waits briefly and starts them again with
   * arbitration state cleared.
   */
  async recover(): Promise<void> {
    this.logger.warn('forcing connection recovery');
    const wasStarted = this.started;
    await this.stop();

    await new Promise<void>((resolve) => {
      this.clock.schedule(resolve, this.options.recoveryDelayMs ?? LINK_DEFAULTS.RECOVERY_DELAY_MS);
    });

    if (wasStarted) await this.start();
    else this.resetArbitration();
  }

  /**
   * Re-synchronizes after the host process wakes up: corrects the active
   * transport if its connection is gone and makes sure something is trying
   * to connect.
   */
  checkHealth(): LinkStatus {
    if (!this.started) return this.status;

    this.syncActive();

    if (this.activeTransport === 'none') {
      if (!this.lan?.isActive()) {
        this.tunnelDeferred = false;
        this.tunnel.resume();
      }
      this.tunnel.notifyPeerAvailable();

      if (this.lan && !this.lanHeld) {
        this.lan.resume();
        this.lan.notifyPeerAvailable();
      }
    }

    this.updateStatus();
    return this.status;
  }

  // ===========================================================================
  // Manual LAN Control
  // ===========================================================================

  /**
   * Connects to a discovered LAN peer on request. The tunnel is suspended
   * until the LAN connection ends.
   *
   * @returns false if there is no LAN transport or the peer is unknown
   */
  connectLan(peerId: string): boolean {
    const lan = this.lan;
    if (!lan) return false;
    if (!lan.getPeers().some((peer) => peer.id === peerId)) return false;

    this.logger.info('manual LAN connect', { peer: peerId });
    this.lanHeld = false;
    this.tunnelDeferred = true;
    this.tunnel.suspend();
    lan.connectTo(peerId);
    lan.resume();
    return true;
  }

  /**
   * Drops the LAN connection and keeps the LAN from dialing until the next
   * connectLan(), recover() or restart.
   */
  disconnectLan(): void {
    const lan = this.lan;
    if (!lan) return;

    this.logger.info('manual LAN disconnect');
    this.lanHeld = true;
    lan.clearPreferredPeer();
    lan.suspend();
    this.releaseTunnel();
  }

  getPeers(): DiscoveredPeer[] {
    return this.lan?.getPeers() ?? [];
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  /**
   * Sends a message on the active transport, or on whichever transport has a
   * live connection when none is active.
   *
   * @returns false if no transport could take it (the message is dropped)
   */
  send(message: object): boolean {
    const target = this.routeTarget();
    if (target?.send(message)) return true;

    this.logger.debug('message dropped, no active transport');
    this.emit('dropped', message);
    return false;
  }

  /**
   * @throws {InvalidMessageError} If a field is out of range
   */
  sendCC(channel: number, cc: number, value: number, meta?: ControlMetadata): boolean {
    return this.send(Messages.cc(channel, cc, value, meta));
  }

  /**
   * @throws {InvalidMessageError} If a field is out of range
   */
  sendNote(channel: number, note: number, velocity: number, meta?: ControlMetadata): boolean {
    return this.send(Messages.note(channel, note, velocity, meta));
  }

  sendTransport(action: string): boolean {
    return this.send(Messages.transport(action, epochSeconds(this.clock)));
  }

  /**
   * @throws {InvalidMessageError} If the bytes are not a channel voice event
   */
  sendMidiInput(status: number, data1: number, data2: number): boolean {
    return this.send(Messages.midiInput(status, data1, data2));
  }

  // ===========================================================================
  // State
  // ===========================================================================

  getActiveTransport(): ActiveTransport {
    return this.activeTransport;
  }

  getStatus(): LinkStatus {
    return this.status;
  }

  getSnapshot(): CoordinatorSnapshot {
    return {
      activeTransport: this.activeTransport,
      status: this.status,
      tunnel: this.tunnel.getSnapshot(),
      lan: this.lan?.getSnapshot() ?? null,
      tunnelDeferred: this.tunnelDeferred,
      lanHeld: this.lanHeld,
    };
  }

  // ===========================================================================
  // Inbox
  // ===========================================================================

  private wire(transport: Transport): void {
    const kind = transport.kind;
    transport.on('active', () => this.enqueue({ type: 'active', kind }));
    transport.on('disconnected', (reason) => this.enqueue({ type: 'disconnected', kind, reason }));
    transport.on('stateChange', () => this.enqueue({ type: 'state', kind }));
    transport.on('message', (message) => this.route(message, kind));
    transport.on('error', (error) => {
      this.logger.warn(`${kind} transport error`, { error });
    });
  }

  private enqueue(event: InboxEvent): void {
    this.inbox.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.inbox.shift();
      while (next !== undefined) {
        this.handle(next);
        next = this.inbox.shift();
      }
    } finally {
      this.draining = false;
    }
    this.updateStatus();
  }

  private handle(event: InboxEvent): void {
    switch (event.type) {
      case 'active':
        this.handleActive(event.kind);
        break;
      case 'disconnected':
        this.handleDisconnected(event.kind, event.reason);
        break;
      case 'device_attached':
        this.handleDeviceAttached(event.deviceId);
        break;
      case 'state':
        break;
    }
  }

  private handleActive(kind: TransportKind): void {
    if (kind === 'tunnel') {
      if (!this.tunnel.isActive()) return;
      this.tunnelDeferred = false;
      if (this.lan && !this.lan.isSuspended()) {
        this.logger.info('tunnel active, tearing down LAN');
        this.lan.suspend();
      }
      this.setActive('tunnel');
      return;
    }

    const lan = this.lan;
    if (!lan?.isActive()) return;
    if (this.tunnel.isActive()) {
      this.logger.info('LAN came up while tunnel active, suspending LAN');
      lan.suspend();
      return;
    }
    this.setActive('lan');
  }

  private handleDisconnected(kind: TransportKind, reason: DisconnectReason): void {
    this.logger.info(`${kind} disconnected`, { reason });

    if (kind === 'tunnel') {
      if (this.activeTransport === 'tunnel') this.setActive('none');

      const lan = this.lan;
      if (!lan || !this.started) return;

      if (lan.isActive()) {
        if (!this.tunnel.isSuspended()) {
          this.logger.info('LAN active, deferring tunnel until LAN drops');
          this.tunnelDeferred = true;
          this.tunnel.suspend();
        }
        this.setActive('lan');
      } else if (!this.lanHeld && !this.tunnelDeferred) {
        lan.resume();
      }
      return;
    }

    if (this.activeTransport === 'lan') {
      this.setActive(this.tunnel.isActive() ? 'tunnel' : 'none');
    }
    if (this.started && !this.tunnel.isActive()) {
      this.releaseTunnel();
    }
  }

  private handleDeviceAttached(deviceId: string): void {
    this.logger.info('device attached', { device: deviceId });
    if (!this.started) return;

    if (this.tunnelDeferred) {
      this.tunnelDeferred = false;
      this.tunnel.resume();
    }
    this.tunnel.notifyPeerAvailable();
  }

  private resetArbitration(): void {
    this.tunnelDeferred = false;
    this.lanHeld = false;
    this.tunnel.resume();
    this.lan?.resume();
  }

  private releaseTunnel(): void {
    if (!this.tunnelDeferred && !this.tunnel.isSuspended()) return;
    this.logger.info('resuming tunnel');
    this.tunnelDeferred = false;
    this.tunnel.resume();
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private route(message: LinkMessage, from: TransportKind): void {
    const sink = this.options.sink;
    try {
      switch (message.type) {
        case 'midi_cc':
          sink?.controlChange(message);
          break;
        case 'midi_note':
          sink?.note(message);
          break;
        case 'transport':
          sink?.transport?.(message);
          break;
        case 'midi_input':
          this.emit('feedback', decodeMidiInput(message));
          break;
        case 'heartbeat':
        case 'handshake':
          break;
      }
    } catch (err) {
      this.logger.error('MIDI sink failed', {
        type: message.type,
        error: err instanceof Error ? err : String(err),
      });
    }

    this.emit('message', message, from);
  }

  private forwardMidiInput(status: number, data1: number, data2: number): void {
    try {
      this.sendMidiInput(status, data1, data2);
    } catch (err) {
      if (err instanceof InvalidMessageError) {
        this.logger.debug('ignoring MIDI input', { reason: err.message });
        return;
      }
      throw err;
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private routeTarget(): Transport | null {
    const active = this.transportFor(this.activeTransport);
    if (active?.isActive()) return active;
    if (this.tunnel.isActive()) return this.tunnel;
    if (this.lan?.isActive()) return this.lan;
    return null;
  }

  private transportFor(kind: ActiveTransport): Transport | null {
    if (kind === 'tunnel') return this.tunnel;
    if (kind === 'lan') return this.lan;
    return null;
  }

  private syncActive(): void {
    const current = this.transportFor(this.activeTransport);
    if (current?.isActive()) return;

    if (this.tunnel.isActive()) this.setActive('tunnel');
    else if (this.lan?.isActive()) this.setActive('lan');
    else this.setActive('none');
  }

  private setActive(next: ActiveTransport): void {
    const previous = this.activeTransport;
    if (previous === next) return;
    this.activeTransport = next;
    this.logger.info('active transport', { from: previous, to: next });
    this.emit('activeTransportChanged', next, previous);
  }

  private updateStatus(): void {
    const next = this.computeStatus();
    const previous = this.status;
    if (next === previous) return;
    this.status = next;
    this.emit('status', next, previous);
  }

  private computeStatus(): LinkStatus {
    const active = this.transportFor(this.activeTransport);
    if (active?.isActive()) {
      const snapshot = active.getSnapshot();
      const threshold =
        active.kind === 'tunnel'
          ? this.options.tunnelDegradedAfterMs ?? LINK_DEFAULTS.TUNNEL_DEGRADED_AFTER_MS
          : this.options.lanDegradedAfterMs ?? LINK_DEFAULTS.LAN_DEGRADED_AFTER_MS;
      const lastReceivedAt = snapshot.lastReceivedAt ?? this.clock.now();
      return this.clock.now() - lastReceivedAt > threshold ? 'degraded' : 'connected';
    }

    const inProgress = [this.tunnel, this.lan].some((transport) => {
      const phase = transport?.getSnapshot().state.phase;
      return phase === 'connecting' || phase === 'awaiting_handshake';
    });
    return inProgress ? 'connecting' : 'disconnected';
  }
}
