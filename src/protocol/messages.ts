/**
 * Validated constructors for outbound messages.
 *
 * Every builder range-checks its input and throws
 * {@link InvalidMessageError} instead of clamping.
 *
 * @module protocol/messages
 */

import type { z } from 'zod';

import { InvalidMessageError } from '../link/errors.js';
import {
  batchSchema,
  describeIssues,
  heartbeatSchema,
  midiCcSchema,
  midiInputSchema,
  midiNoteSchema,
  transportSchema,
  type BatchMessage,
  type HeartbeatMessage,
  type MidiCcMessage,
  type MidiInputMessage,
  type MidiNoteMessage,
  type TransportMessage,
} from './schemas.js';

/**
 * Optional UI metadata carried by CC and note messages.
 */
export interface ControlMetadata {
  readonly label?: string | undefined;
  readonly buttonId?: string | undefined;
}

function build<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, type: string, candidate: unknown): T {
  const result = schema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidMessageError(type, describeIssues(result.error));
  }
  return result.data;
}

function withMetadata(
  base: Readonly<Record<string, unknown>>,
  meta: ControlMetadata | undefined,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  if (meta?.label !== undefined) out['label'] = meta.label;
  if (meta?.buttonId !== undefined) out['button_id'] = meta.buttonId;
  return out;
}

export const Messages = {
  /**
   * Control change. `channel` is 1-16.
   *
   * @throws {InvalidMessageError} If any field is out of range
   */
  cc(channel: number, cc: number, value: number, meta?: ControlMetadata): MidiCcMessage {
    return build(
      midiCcSchema,
      'midi_cc',
      withMetadata({ type: 'midi_cc', channel, cc, value }, meta),
    );
  },

  /**
   * Note on/off. A velocity of 0 is a note off.
   *
   * @throws {InvalidMessageError} If any field is out of range
   */
  note(channel: number, note: number, velocity: number, meta?: ControlMetadata): MidiNoteMessage {
    return build(
      midiNoteSchema,
      'midi_note',
      withMetadata({ type: 'midi_note', channel, note, velocity }, meta),
    );
  },

  transport(action: string, timestamp: number): TransportMessage {
    return build(transportSchema, 'transport', { type: 'transport', action, timestamp });
  },

  heartbeat(timestamp: number): HeartbeatMessage {
    return build(heartbeatSchema, 'heartbeat', { type: 'heartbeat', timestamp });
  },

  /**
   * Raw 3-byte channel voice event, host to device.
   */
  midiInput(status: number, data1: number, data2: number): MidiInputMessage {
    return build(midiInputSchema, 'midi_input', { type: 'midi_input', midi: [status, data1, data2] });
  },

  /**
   * Batch of already serialized messages.
   */
  batch(serialized: readonly string[], timestamp: number): BatchMessage {
    return build(batchSchema, 'batch', {
      type: 'batch',
      messages: [...serialized],
      count: serialized.length,
      timestamp,
    });
  },
} as const;
