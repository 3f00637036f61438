/**
 * padlink - Connection and protocol coordination for a touch MIDI controller
 *
 * This module provides the public API for the padlink library.
 */

export const VERSION = '0.1.0' as const;

// Core
export type { Clock, ScheduledTimer } from './core/clock.js';
export { systemClock, epochSeconds } from './core/clock.js';
export type { Logger, LogLevel, LogContext, LogSink, ConsoleLoggerOptions } from './core/logger.js';
export { createConsoleLogger, silentLogger, isLogLevel, LOG_LEVELS } from './core/logger.js';
export { TimerScope } from './core/timer-scope.js';

// Configuration
export type { PadlinkConfig, PadlinkConfigInput } from './config.js';
export { configSchema, resolveConfig, configFromEnv, parseLogLevel } from './config.js';

// Link types and errors
export type {
  TransportKind,
  Endpoint,
  HandshakeRole,
  DisconnectReason,
  LinkPhase,
  LinkState,
  LinkStatus,
  ActiveTransport,
  TransportSnapshot,
} from './link/types.js';
export { LINK_DEFAULTS, BACKOFF_TIERS } from './link/types.js';
export type { TransportErrorCode, ProtocolErrorCode, SecurityErrorCode } from './link/errors.js';
export {
  TransportError,
  ProtocolError,
  SecurityError,
  LivenessError,
  InvalidMessageError,
  InvalidConfigError,
} from './link/errors.js';

// Protocol
export type {
  MidiCcMessage,
  MidiNoteMessage,
  TransportMessage,
  HeartbeatMessage,
  HandshakeMessage,
  HandshakeResponseMessage,
  BatchMessage,
  MidiInputMessage,
  LinkMessage,
  LinkMessageType,
} from './protocol/schemas.js';
export {
  midiCcSchema,
  midiNoteSchema,
  transportSchema,
  heartbeatSchema,
  handshakeSchema,
  handshakeResponseSchema,
  batchSchema,
  midiInputSchema,
  linkMessageSchema,
  describeIssues,
} from './protocol/schemas.js';
export type { ControlMetadata } from './protocol/messages.js';
export { Messages } from './protocol/messages.js';
export type { HelloLine, HelloOptions, ReplyLine, HandshakeAuthenticator } from './protocol/handshake.js';
export {
  HandshakeCodec,
  nullAuthenticator,
  stripLocalSuffix,
  HELLO_PREFIX,
  REPLY_PREFIX,
  LEGACY_ACK,
} from './protocol/handshake.js';
export { LineDecoder, encodeFrame, parseFrame, isRecord } from './protocol/framing.js';
export type { FrameWriter, BatcherOptions, BatcherStats } from './protocol/batcher.js';
export { OutgoingBatcher } from './protocol/batcher.js';

// Security
export type { SlidingWindowOptions, RateLimitResult } from './security/sliding-window.js';
export { SlidingWindowLimiter } from './security/sliding-window.js';
export type { SecurityGateOptions, SecurityStats, SecurityGateEvents } from './security/security-gate.js';
export { SecurityGate, fingerprintOf } from './security/security-gate.js';

// Link
export type { HeartbeatOptions, HeartbeatEvents } from './link/heartbeat.js';
export { HeartbeatMonitor } from './link/heartbeat.js';
export type { ReconnectAttempt, ReconnectionSchedulerOptions, ReconnectionEvents } from './link/reconnect.js';
export { ReconnectionScheduler, backoffDelay } from './link/reconnect.js';
export type { LinkEvent, WaitingPhase, ConnectionMachineEvents } from './link/connection-machine.js';
export { ConnectionMachine, transition } from './link/connection-machine.js';
export type { ConnectionOptions, ConnectionEvents, ConnectionStats, HandshakeInfo } from './link/connection.js';
export { Connection } from './link/connection.js';
export type { Transport, TransportEvents, LinkTransportOptions } from './link/transport.js';
export { LinkTransport } from './link/transport.js';
export type { TunnelTransportOptions } from './link/tunnel-transport.js';
export { TunnelTransport } from './link/tunnel-transport.js';
export type { LanTransportOptions } from './link/lan-transport.js';
export { LanTransport } from './link/lan-transport.js';

// Discovery
export type {
  DiscoveredPeer,
  ServiceDiscovery,
  ServiceDiscoveryEvents,
  ServiceRecord,
  BonjourDiscoveryOptions,
} from './discovery/service-discovery.js';
export { BonjourDiscovery, toPeer } from './discovery/service-discovery.js';

// Devices
export type { DeviceEvents, DeviceEventSource, ListCommand, CommandDeviceMonitorOptions } from './devices/device-monitor.js';
export { CommandDeviceMonitor, execListCommand } from './devices/device-monitor.js';

// MIDI
export type { MidiSink, MidiSource, MidiFeedback } from './midi/midi-bridge.js';
export { decodeMidiInput, statusByte, MIDI_STATUS } from './midi/midi-bridge.js';

// Coordinator
export type {
  PeerTransport,
  CoordinatorOptions,
  CoordinatorEvents,
  CoordinatorSnapshot,
  CoordinatorDependencies,
} from './coordinator/connection-coordinator.js';
export { ConnectionCoordinator } from './coordinator/connection-coordinator.js';
