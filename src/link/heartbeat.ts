/**
 * Per-connection heartbeat and liveness tracking.
 *
 * While running, the monitor sends a heartbeat every `intervalMs` and checks
 * how long ago the last inbound bytes arrived. Only receives count towards
 * liveness; sends merely update the activity timestamp.
 *
 * @module link/heartbeat
 */

import { EventEmitter } from 'node:events';

import type { Clock, ScheduledTimer } from '../core/clock.js';
import type { TimerScope } from '../core/timer-scope.js';
import { LivenessError } from './errors.js';

export interface HeartbeatOptions {
  readonly connectionId: string;
  readonly clock: Clock;
  readonly timers: TimerScope;

  /** Heartbeat send and liveness check period */
  readonly intervalMs: number;

  /** Inbound silence after which the connection is stale */
  readonly livenessMs: number;

  /** Sends one heartbeat frame */
  readonly sendHeartbeat: () => void;
}

export interface HeartbeatEvents {
  stale: [error: LivenessError];
}

export class HeartbeatMonitor extends EventEmitter<HeartbeatEvents> {
  private lastReceivedAt: number;
  private lastActivityAt: number;
  private ticker: ScheduledTimer | null = null;
  private expired = false;

  constructor(private readonly options: HeartbeatOptions) {
    super();
    const now = options.clock.now();
    this.lastReceivedAt = now;
    this.lastActivityAt = now;
  }

  /**
   * Starts sending heartbeats and checking liveness. The silence window
   * starts counting from now.
   */
  start(): void {
    if (this.ticker) return;
    this.expired = false;
    this.lastReceivedAt = this.options.clock.now();
    this.ticker = this.options.timers.every(this.options.intervalMs, () => this.tick());
  }

  stop(): void {
    this.ticker?.cancel();
    this.ticker = null;
  }

  isRunning(): boolean {
    return this.ticker !== null;
  }

  /**
   * Inbound bytes arrived.
   */
  recordReceive(): void {
    const now = this.options.clock.now();
    this.lastReceivedAt = now;
    this.lastActivityAt = now;
  }

  /**
   * Outbound bytes left.
   */
  recordActivity(): void {
    this.lastActivityAt = this.options.clock.now();
  }

  getLastReceivedAt(): number {
    return this.lastReceivedAt;
  }

  getLastActivityAt(): number {
    return this.lastActivityAt;
  }

  /**
   * Milliseconds since the last inbound bytes.
   */
  idleMs(): number {
    return this.options.clock.now() - this.lastReceivedAt;
  }

  /**
   * Runs one liveness check, and if still alive, sends a heartbeat.
   */
  private tick(): void {
    if (this.expired) return;

    const idle = this.idleMs();
    if (idle > this.options.livenessMs) {
      this.expired = true;
      this.stop();
      this.emit(
        'stale',
        new LivenessError(this.options.connectionId, idle, this.options.livenessMs),
      );
      return;
    }

    this.options.sendHeartbeat();
    this.recordActivity();
  }
}
