/**
 * USB device attach/detach events.
 *
 * The coordinator only needs to know that a device appeared so the tunnel can
 * skip its backoff. {@link CommandDeviceMonitor} gets there by polling a
 * device-listing command (by default `idevice_id -l`) and diffing the ids.
 *
 * @module devices/device-monitor
 */

import { execFile } from 'node:child_process';
import { EventEmitter } from 'node:events';

import { systemClock, type Clock } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { TimerScope } from '../core/timer-scope.js';
import { LINK_DEFAULTS } from '../link/types.js';

export interface DeviceEvents {
  attached: [deviceId: string];
  detached: [deviceId: string];
}

/**
 * Anything that reports device attach and detach.
 */
export interface DeviceEventSource extends EventEmitter<DeviceEvents> {
  start(): void;
  stop(): void;
}

/**
 * Runs the listing command and resolves with its stdout.
 */
export type ListCommand = (command: string, args: readonly string[]) => Promise<string>;

export const execListCommand: ListCommand = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { timeout: 5000 }, (err, stdout) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(stdout);
    });
  });

export interface CommandDeviceMonitorOptions {
  readonly command?: string | undefined;
  readonly args?: readonly string[] | undefined;
  readonly intervalMs?: number | undefined;
  readonly run?: ListCommand | undefined;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * @example
 * ```typescript
 * const devices = new CommandDeviceMonitor();
 * devices.on('attached', (id) => tunnel.notifyPeerAvailable());
 * devices.start();
 * ```
 */
export class CommandDeviceMonitor extends EventEmitter<DeviceEvents> implements DeviceEventSource {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly intervalMs: number;
  private readonly run: ListCommand;
  private readonly timers: TimerScope;
  private readonly logger: Logger;

  private known = new Set<string>();
  private running = false;
  private polling = false;
  private commandFailing = false;

  constructor(options: CommandDeviceMonitorOptions = {}) {
    super();
    this.command = options.command ?? 'idevice_id';
    this.args = options.args ?? ['-l'];
    this.intervalMs = options.intervalMs ?? LINK_DEFAULTS.DEVICE_POLL_INTERVAL_MS;
    this.run = options.run ?? execListCommand;
    this.timers = new TimerScope(options.clock ?? systemClock, 'device-monitor');
    this.logger = (options.logger ?? silentLogger).child('devices');
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    void this.poll();
    this.timers.every(this.intervalMs, () => {
      void this.poll();
    });
  }

  stop(): void {
    this.running = false;
    this.timers.cancelAll();
  }

  /**
   * Device ids seen on the last successful poll.
   */
  getDevices(): string[] {
    return [...this.known];
  }

  /**
   * Runs the command once and emits the differences.
   */
  async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;

    let current: Set<string>;
    try {
      const stdout = await this.run(this.command, this.args);
      current = new Set(
        stdout
          .split('\n')
          .map((line) => line.trim())
          .filter((line) => line.length > 0),
      );
      this.commandFailing = false;
    } catch (err) {
      if (!this.commandFailing) {
        this.logger.warn('device listing failed', {
          command: this.command,
          error: err instanceof Error ? err : String(err),
        });
      }
      this.commandFailing = true;
      current = new Set();
    } finally {
      this.polling = false;
    }

    if (!this.running) return;

    const previous = this.known;
    this.known = current;

    for (const id of current) {
      if (!previous.has(id)) {
        this.logger.info('device attached', { device: id });
        this.emit('attached', id);
      }
    }
    for (const id of previous) {
      if (!current.has(id)) {
        this.logger.info('device detached', { device: id });
        this.emit('detached', id);
      }
    }
  }
}
