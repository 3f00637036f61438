import { EventEmitter } from 'node:events';
import type {
  Clock,
  DeviceEvents,
  DeviceEventSource,
  DisconnectReason,
  DiscoveredPeer,
  LinkMessage,
  LinkPhase,
  LinkState,
  MidiSource,
  PeerTransport,
  TransportEvents,
  TransportKind,
  TransportSnapshot,
} from '../../src/index.js';

type LivePhase = Exclude<LinkPhase, 'disconnected'>;

/**
 * Transport driven by the test: it goes up, down and delivers messages only
 * when told to.
 */
export class FakeTransport extends EventEmitter<TransportEvents> implements PeerTransport {
  readonly sent: object[] = [];
  peers: DiscoveredPeer[] = [];
  preferredPeerId: string | null = null;
  starts = 0;
  stops = 0;
  notified = 0;
  lastReceivedAt: number | null = null;

  private started = false;
  private suspended = false;
  private active = false;
  private phase: LivePhase = 'idle';

  constructor(
    readonly kind: TransportKind,
    private readonly clock: Clock,
  ) {
    super();
  }

  // Transport

  start(): Promise<void> {
    this.starts++;
    this.started = true;
    this.phase = this.waitingPhase();
    return Promise.resolve();
  }

  stop(): Promise<void> {
    this.stops++;
    if (this.active) this.goDown('user');
    this.started = false;
    this.phase = 'idle';
    return Promise.resolve();
  }

  suspend(): void {
    if (this.suspended) return;
    this.suspended = true;
    if (this.active) this.goDown('user');
  }

  resume(): void {
    this.suspended = false;
  }

  isSuspended(): boolean {
    return this.suspended;
  }

  isStarted(): boolean {
    return this.started;
  }

  notifyPeerAvailable(): void {
    this.notified++;
  }

  send(message: object): boolean {
    if (!this.active) return false;
    this.sent.push(message);
    return true;
  }

  isActive(): boolean {
    return this.active;
  }

  getSnapshot(): TransportSnapshot {
    const state: LinkState = { phase: this.phase };
    return {
      kind: this.kind,
      state,
      suspended: this.suspended,
      connectionId: this.active ? `${this.kind}-1` : null,
      peer: null,
      protocolMajor: this.active ? 2 : null,
      lastActivityAt: this.lastReceivedAt,
      lastReceivedAt: this.lastReceivedAt,
      consecutiveFailures: 0,
      reconnectPending: false,
    };
  }

  // PeerTransport

  getPeers(): DiscoveredPeer[] {
    return [...this.peers];
  }

  connectTo(peerId: string): boolean {
    if (!this.peers.some((peer) => peer.id === peerId)) return false;
    this.preferredPeerId = peerId;
    return true;
  }

  clearPreferredPeer(): void {
    this.preferredPeerId = null;
  }

  // Test controls

  goUp(): void {
    this.active = true;
    this.phase = 'active';
    this.lastReceivedAt = this.clock.now();
    this.emit('active', this.getSnapshot());
  }

  goDown(reason: DisconnectReason): void {
    this.active = false;
    this.phase = this.waitingPhase();
    this.emit('disconnected', reason, null);
  }

  /** Loses the connection without telling anyone (host asleep) */
  vanish(): void {
    this.active = false;
    this.phase = this.waitingPhase();
  }

  enterPhase(phase: LivePhase): void {
    const previous: LinkState = { phase: this.phase };
    this.phase = phase;
    this.emit('stateChange', { phase }, previous);
  }

  touch(): void {
    this.lastReceivedAt = this.clock.now();
  }

  deliver(message: LinkMessage): void {
    this.lastReceivedAt = this.clock.now();
    this.emit('message', message);
  }

  private waitingPhase(): LivePhase {
    return this.kind === 'tunnel' ? 'listening' : 'discovering';
  }
}

export class FakeDevices extends EventEmitter<DeviceEvents> implements DeviceEventSource {
  running = false;

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }
}

export class FakeMidiSource implements MidiSource {
  private readonly listeners = new Set<(bytes: readonly [number, number, number]) => void>();

  onMidiInput(listener: (bytes: readonly [number, number, number]) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(bytes: readonly [number, number, number]): void {
    for (const listener of this.listeners) listener(bytes);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
