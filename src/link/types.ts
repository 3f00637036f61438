/**
 * Shared types and defaults for the link layer.
 *
 * @module link/types
 */

// =============================================================================
// Endpoints
// =============================================================================

/**
 * Physical transport carrying a connection.
 *
 * - `tunnel`: loopback TCP listener reached through a host-side USB forwarder
 * - `lan`: outbound TCP client to a peer found by service discovery
 */
export type TransportKind = 'tunnel' | 'lan';

/**
 * Resolved remote endpoint of a connection. Immutable once resolved.
 */
export interface Endpoint {
  readonly kind: TransportKind;
  readonly address: string;
  readonly port: number;
  /** Human-readable peer label, `.local` suffix already stripped */
  readonly name: string;
}

/**
 * Which side of the handshake a connection plays.
 *
 * The tunnel listener answers (`responder`), the LAN client speaks first
 * (`initiator`).
 */
export type HandshakeRole = 'initiator' | 'responder';

// =============================================================================
// Transport State
// =============================================================================

export type DisconnectReason = 'stale' | 'error' | 'user';

/**
 * Phase of a transport's state machine.
 */
export type LinkPhase =
  | 'idle'
  | 'listening'
  | 'discovering'
  | 'connecting'
  | 'awaiting_handshake'
  | 'active'
  | 'disconnected';

/**
 * Full transport state. `reason` is only present once disconnected.
 */
export type LinkState =
  | { readonly phase: Exclude<LinkPhase, 'disconnected'> }
  | { readonly phase: 'disconnected'; readonly reason: DisconnectReason };

/**
 * Coarse connection quality surfaced to the application.
 */
export type LinkStatus = 'disconnected' | 'connecting' | 'connected' | 'degraded';

export type ActiveTransport = TransportKind | 'none';

/**
 * Point-in-time view of a transport, as exposed through `getSnapshot()`.
 */
export interface TransportSnapshot {
  readonly kind: TransportKind;
  readonly state: LinkState;
  readonly suspended: boolean;
  readonly connectionId: string | null;
  readonly peer: Endpoint | null;
  readonly protocolMajor: number | null;
  readonly lastActivityAt: number | null;
  readonly lastReceivedAt: number | null;
  readonly consecutiveFailures: number;
  readonly reconnectPending: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

/**
 * Protocol constants and default tunables.
 */
export const LINK_DEFAULTS = {
  /** Loopback port the USB forwarder connects to */
  TUNNEL_PORT: 9360,

  /** Interface the tunnel listener binds */
  TUNNEL_HOST: '127.0.0.1',

  /** DNS-SD service type (`_padlink._tcp`) */
  SERVICE_TYPE: 'padlink',

  /** Protocol major spoken by this side */
  PROTOCOL_MAJOR: 2,

  /** Highest protocol major accepted from a peer */
  MAX_SUPPORTED_MAJOR: 2,

  /** Handshake must complete within this window */
  HANDSHAKE_TIMEOUT_MS: 3000,

  /** Maximum bytes in one line before the frame is rejected */
  MAX_LINE_BYTES: 64 * 1024,

  /** Flush when the current batch holds this many messages */
  BATCH_SIZE: 5,

  /** Flush this long after the first message entered the batch */
  BATCH_TIMEOUT_MS: 10,

  /** Hard cap on one batch; reaching it seals the batch immediately */
  MAX_BATCH_SIZE: 100,

  /** Sealed batches kept while a write is in flight */
  MAX_PENDING_BATCHES: 64,

  /** Heartbeat period on the tunnel */
  TUNNEL_HEARTBEAT_INTERVAL_MS: 1000,

  /** Heartbeat period on the LAN */
  LAN_HEARTBEAT_INTERVAL_MS: 2000,

  /** Inbound silence that marks a tunnel connection stale */
  TUNNEL_LIVENESS_MS: 3000,

  /** Inbound silence that marks a LAN connection stale */
  LAN_LIVENESS_MS: 20000,

  /** Inbound silence that degrades the reported tunnel status */
  TUNNEL_DEGRADED_AFTER_MS: 1500,

  /** Inbound silence that degrades the reported LAN status */
  LAN_DEGRADED_AFTER_MS: 10000,

  /** Maximum inner messages accepted in one inbound batch */
  MAX_INBOUND_BATCH: 50,

  /** Connection attempts allowed per fingerprint per window */
  MAX_CONNECTION_ATTEMPTS: 20,
  CONNECTION_WINDOW_MS: 60000,

  /** Inbound messages allowed per fingerprint per window */
  MAX_MESSAGES_PER_WINDOW: 100,
  MESSAGE_WINDOW_MS: 1000,

  /** How often idle ledger entries are pruned */
  SECURITY_CLEANUP_INTERVAL_MS: 60000,

  /** LAN browse refresh while not connected */
  DISCOVERY_REFRESH_MS: 30000,

  /** Outbound TCP connect timeout */
  CONNECT_TIMEOUT_MS: 5000,

  /** Coordinator status re-evaluation period */
  STATUS_INTERVAL_MS: 1000,

  /** Pause between stop and start during forced recovery */
  RECOVERY_DELAY_MS: 500,

  /** Device monitor poll period */
  DEVICE_POLL_INTERVAL_MS: 2000,
} as const;

/**
 * Reconnection backoff tiers: `delayMs` applies while the consecutive failure
 * count is at most `upTo`. The last tier is unbounded.
 */
export const BACKOFF_TIERS: readonly { readonly upTo: number; readonly delayMs: number }[] = [
  { upTo: 5, delayMs: 1000 },
  { upTo: 15, delayMs: 3000 },
  { upTo: Number.POSITIVE_INFINITY, delayMs: 10000 },
];
