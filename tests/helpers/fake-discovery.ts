import { EventEmitter } from 'node:events';
import type { DiscoveredPeer, ServiceDiscovery, ServiceDiscoveryEvents } from '../../src/index.js';

/**
 * In-process discovery: peers appear and vanish when the test says so.
 */
export class FakeDiscovery extends EventEmitter<ServiceDiscoveryEvents> implements ServiceDiscovery {
  running = false;
  refreshes = 0;

  start(): void {
    this.running = true;
  }

  stop(): Promise<void> {
    this.running = false;
    return Promise.resolve();
  }

  refresh(): void {
    this.refreshes++;
  }

  announce(peer: DiscoveredPeer): void {
    this.emit('up', peer);
  }

  withdraw(peer: DiscoveredPeer): void {
    this.emit('down', peer);
  }
}

export function peerAt(port: number, name = 'Stage iPad'): DiscoveredPeer {
  return { id: `${name}._padlink._tcp.local`, name, host: '127.0.0.1', port };
}
