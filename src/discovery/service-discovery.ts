/**
 * LAN service discovery.
 *
 * {@link ServiceDiscovery} is what the LAN transport depends on;
 * {@link BonjourDiscovery} implements it over mDNS / DNS-SD with
 * `bonjour-service`.
 *
 * @module discovery/service-discovery
 */

import { EventEmitter } from 'node:events';
import { isIPv4 } from 'node:net';

import { Bonjour } from 'bonjour-service';

import { silentLogger, type Logger } from '../core/logger.js';
import { stripLocalSuffix } from '../protocol/handshake.js';
import { LINK_DEFAULTS } from '../link/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A peer advertising the service.
 */
export interface DiscoveredPeer {
  /** Stable id for the advertisement (its fully qualified name) */
  readonly id: string;

  /** Human-readable label, `.local` stripped */
  readonly name: string;

  /** Address to dial, IPv4 preferred */
  readonly host: string;

  readonly port: number;
}

export interface ServiceDiscoveryEvents {
  up: [peer: DiscoveredPeer];
  down: [peer: DiscoveredPeer];
}

export interface ServiceDiscovery extends EventEmitter<ServiceDiscoveryEvents> {
  /** Starts browsing. Idempotent. */
  start(): void;

  /** Stops browsing and releases sockets */
  stop(): Promise<void>;

  /** Re-queries the network for advertisements */
  refresh(): void;
}

/**
 * The subset of a DNS-SD record the mapper reads.
 */
export interface ServiceRecord {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly fqdn?: string | undefined;
  readonly addresses?: readonly string[] | undefined;
}

/**
 * Maps a DNS-SD record to a peer. Returns null for records with no usable
 * address or port.
 */
export function toPeer(record: ServiceRecord): DiscoveredPeer | null {
  const addresses = record.addresses ?? [];
  const host = addresses.find((address) => isIPv4(address)) ?? addresses[0] ?? record.host.replace(/\.$/, '');

  if (!host || !Number.isInteger(record.port) || record.port <= 0 || record.port > 65535) {
    return null;
  }

  return {
    id: record.fqdn ?? `${record.name}@${record.host}`,
    name: stripLocalSuffix(record.name),
    host,
    port: record.port,
  };
}

// =============================================================================
// BonjourDiscovery
// =============================================================================

type BonjourBrowser = ReturnType<Bonjour['find']>;

export interface BonjourDiscoveryOptions {
  /** Service type without underscores or protocol, e.g. `padlink` */
  readonly serviceType?: string | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * @example
 * ```typescript
 * const discovery = new BonjourDiscovery({ serviceType: 'padlink' });
 * discovery.on('up', (peer) => console.log(`${peer.name} at ${peer.host}:${peer.port}`));
 * discovery.start();
 * ```
 */
export class BonjourDiscovery extends EventEmitter<ServiceDiscoveryEvents> implements ServiceDiscovery {
  private bonjour: Bonjour | null = null;
  private browser: BonjourBrowser | null = null;
  private readonly known = new Map<string, DiscoveredPeer>();
  private readonly serviceType: string;
  private readonly logger: Logger;

  constructor(options: BonjourDiscoveryOptions = {}) {
    super();
    this.serviceType = options.serviceType ?? LINK_DEFAULTS.SERVICE_TYPE;
    this.logger = (options.logger ?? silentLogger).child('discovery');
  }

  start(): void {
    if (this.browser) return;

    this.bonjour = new Bonjour();
    this.browser = this.bonjour.find({ type: this.serviceType });
    this.browser.on('up', (record: ServiceRecord) => this.handleUp(record));
    this.browser.on('down', (record: ServiceRecord) => this.handleDown(record));
    this.logger.info('browsing', { type: `_${this.serviceType}._tcp` });
  }

  refresh(): void {
    this.browser?.update();
  }

  stop(): Promise<void> {
    const bonjour = this.bonjour;
    this.browser?.stop();
    this.browser = null;
    this.bonjour = null;
    this.known.clear();

    if (!bonjour) return Promise.resolve();
    return new Promise((resolve) => {
      bonjour.destroy(() => resolve());
    });
  }

  private handleUp(record: ServiceRecord): void {
    const peer = toPeer(record);
    if (!peer) {
      this.logger.debug('ignoring unusable advertisement', { name: record.name });
      return;
    }
    this.known.set(peer.id, peer);
    this.logger.info('peer up', { name: peer.name, host: peer.host, port: peer.port });
    this.emit('up', peer);
  }

  private handleDown(record: ServiceRecord): void {
    const id = record.fqdn ?? `${record.name}@${record.host}`;
    const peer = this.known.get(id);
    if (!peer) return;
    this.known.delete(id);
    this.logger.info('peer down', { name: peer.name });
    this.emit('down', peer);
  }
}
