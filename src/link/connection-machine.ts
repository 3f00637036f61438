/**
 * Transport state machine.
 *
 * A single pure transition function decides every phase change; the
 * {@link ConnectionMachine} wrapper applies events in order, queuing events
 * dispatched from inside a transition listener until the current one is done.
 *
 * ```
 * idle ─start─▶ listening|discovering ─socket_ready─▶ connecting
 *   ─established─▶ awaiting_handshake ─handshake_complete─▶ active
 * awaiting_handshake ─handshake_timeout─▶ disconnected{error}
 * connecting|awaiting_handshake|active ─io_error|closed─▶ disconnected{error}
 * active ─liveness_expired─▶ disconnected{stale}
 * any live phase ─stop─▶ disconnected{user}
 * disconnected ─reset─▶ listening|discovering
 * any ─halt─▶ idle
 * ```
 *
 * @module link/connection-machine
 */

import { EventEmitter } from 'node:events';

import type { LinkPhase, LinkState } from './types.js';

// =============================================================================
// Events
// =============================================================================

export type LinkEvent =
  | { readonly type: 'start' }
  | { readonly type: 'socket_ready'; readonly connectionId: string }
  | { readonly type: 'established'; readonly connectionId: string }
  | { readonly type: 'handshake_complete'; readonly connectionId: string }
  | { readonly type: 'handshake_timeout'; readonly connectionId: string }
  | { readonly type: 'io_error'; readonly connectionId: string; readonly error: Error }
  | { readonly type: 'closed'; readonly connectionId: string }
  | { readonly type: 'liveness_expired'; readonly connectionId: string }
  | { readonly type: 'stop' }
  | { readonly type: 'reset' }
  | { readonly type: 'halt' };

/**
 * Phase a transport waits in between connections.
 */
export type WaitingPhase = Extract<LinkPhase, 'listening' | 'discovering'>;

// =============================================================================
// Transition Function
// =============================================================================

const SOCKET_PHASES: ReadonlySet<LinkPhase> = new Set(['connecting', 'awaiting_handshake', 'active']);

/**
 * Computes the next state, or null when the event does not apply.
 */
export function transition(
  state: LinkState,
  event: LinkEvent,
  waiting: WaitingPhase,
): LinkState | null {
  const phase = state.phase;

  switch (event.type) {
    case 'start':
      return phase === 'idle' || phase === 'disconnected' ? { phase: waiting } : null;

    case 'socket_ready':
      return phase === waiting ? { phase: 'connecting' } : null;

    case 'established':
      return phase === 'connecting' ? { phase: 'awaiting_handshake' } : null;

    case 'handshake_complete':
      return phase === 'awaiting_handshake' ? { phase: 'active' } : null;

    case 'handshake_timeout':
      return phase === 'awaiting_handshake' ? { phase: 'disconnected', reason: 'error' } : null;

    case 'io_error':
    case 'closed':
      return SOCKET_PHASES.has(phase) ? { phase: 'disconnected', reason: 'error' } : null;

    case 'liveness_expired':
      return phase === 'active' ? { phase: 'disconnected', reason: 'stale' } : null;

    case 'stop':
      return phase === 'idle' || phase === 'disconnected'
        ? null
        : { phase: 'disconnected', reason: 'user' };

    case 'reset':
      return phase === 'disconnected' ? { phase: waiting } : null;

    case 'halt':
      return phase === 'idle' ? null : { phase: 'idle' };
  }
}

// =============================================================================
// ConnectionMachine
// =============================================================================

export interface ConnectionMachineEvents {
  transition: [from: LinkState, to: LinkState, event: LinkEvent];
}

export class ConnectionMachine extends EventEmitter<ConnectionMachineEvents> {
  private state: LinkState = { phase: 'idle' };
  private readonly queue: LinkEvent[] = [];
  private dispatching = false;

  constructor(readonly waiting: WaitingPhase) {
    super();
  }

  getState(): LinkState {
    return this.state;
  }

  getPhase(): LinkPhase {
    return this.state.phase;
  }

  /**
   * Applies an event. Events dispatched while a transition listener runs are
   * queued and applied right after it, in order.
   *
   * @returns true if this event (when not queued) changed the state
   */
  dispatch(event: LinkEvent): boolean {
    this.queue.push(event);
    if (this.dispatching) return false;

    this.dispatching = true;
    let changed = false;
    try {
      let first = true;
      let next = this.queue.shift();
      while (next !== undefined) {
        const applied = this.apply(next);
        if (first) changed = applied;
        first = false;
        next = this.queue.shift();
      }
    } finally {
      this.dispatching = false;
    }
    return changed;
  }

  private apply(event: LinkEvent): boolean {
    const next = transition(this.state, event, this.waiting);
    if (next === null) return false;

    const previous = this.state;
    this.state = next;
    this.emit('transition', previous, next, event);
    return true;
  }
}
