import { describe, it, expect } from 'vitest';
import { ConnectionMachine, transition } from '../../src/index.js';
import type { LinkEvent, LinkState } from '../../src/index.js';

const id = 'tunnel-1';

describe('transition', () => {
  it('walks the happy path', () => {
    const events: LinkEvent[] = [
      { type: 'start' },
      { type: 'socket_ready', connectionId: id },
      { type: 'established', connectionId: id },
      { type: 'handshake_complete', connectionId: id },
    ];

    const phases: string[] = [];
    let state: LinkState = { phase: 'idle' };
    for (const event of events) {
      const next = transition(state, event, 'listening');
      expect(next).not.toBeNull();
      if (next) state = next;
      phases.push(state.phase);
    }

    expect(phases).toEqual(['listening', 'connecting', 'awaiting_handshake', 'active']);
  });

  it('uses the waiting phase of the transport', () => {
    expect(transition({ phase: 'idle' }, { type: 'start' }, 'discovering')).toEqual({ phase: 'discovering' });
    expect(transition({ phase: 'disconnected', reason: 'error' }, { type: 'reset' }, 'discovering')).toEqual({
      phase: 'discovering',
    });
  });

  it('only times out a pending handshake', () => {
    expect(
      transition({ phase: 'awaiting_handshake' }, { type: 'handshake_timeout', connectionId: id }, 'listening'),
    ).toEqual({ phase: 'disconnected', reason: 'error' });
    expect(
      transition({ phase: 'active' }, { type: 'handshake_timeout', connectionId: id }, 'listening'),
    ).toBeNull();
  });

  it('marks liveness expiry as stale', () => {
    expect(
      transition({ phase: 'active' }, { type: 'liveness_expired', connectionId: id }, 'listening'),
    ).toEqual({ phase: 'disconnected', reason: 'stale' });
    expect(
      transition({ phase: 'awaiting_handshake' }, { type: 'liveness_expired', connectionId: id }, 'listening'),
    ).toBeNull();
  });

  it('maps socket failures to error from any socket phase', () => {
    for (const phase of ['connecting', 'awaiting_handshake', 'active'] as const) {
      expect(transition({ phase }, { type: 'closed', connectionId: id }, 'listening')).toEqual({
        phase: 'disconnected',
        reason: 'error',
      });
    }
    expect(transition({ phase: 'listening' }, { type: 'closed', connectionId: id }, 'listening')).toBeNull();
  });

  it('stop is a user disconnect from any live phase', () => {
    expect(transition({ phase: 'listening' }, { type: 'stop' }, 'listening')).toEqual({
      phase: 'disconnected',
      reason: 'user',
    });
    expect(transition({ phase: 'idle' }, { type: 'stop' }, 'listening')).toBeNull();
  });

  it('refuses a second socket while one is in progress', () => {
    expect(transition({ phase: 'connecting' }, { type: 'socket_ready', connectionId: id }, 'listening')).toBeNull();
  });
});

describe('ConnectionMachine', () => {
  it('emits transitions and reports whether the event applied', () => {
    const machine = new ConnectionMachine('listening');
    const seen: string[] = [];
    machine.on('transition', (from, to) => seen.push(`${from.phase}->${to.phase}`));

    expect(machine.dispatch({ type: 'start' })).toBe(true);
    expect(machine.dispatch({ type: 'start' })).toBe(false);
    expect(seen).toEqual(['idle->listening']);
    expect(machine.getPhase()).toBe('listening');
  });

  it('queues events dispatched from a listener', () => {
    const machine = new ConnectionMachine('listening');
    const seen: string[] = [];
    machine.on('transition', (_from, to) => {
      seen.push(to.phase);
      if (to.phase === 'disconnected') {
        expect(machine.dispatch({ type: 'reset' })).toBe(false);
        seen.push('queued');
      }
    });

    machine.dispatch({ type: 'start' });
    machine.dispatch({ type: 'stop' });

    expect(seen).toEqual(['listening', 'disconnected', 'queued', 'listening']);
    expect(machine.getState()).toEqual({ phase: 'listening' });
  });
});
