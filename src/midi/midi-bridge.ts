/**
 * Seams to the MIDI engine.
 *
 * The link layer never talks to MIDI hardware. Validated control messages go
 * to a {@link MidiSink}; raw events from the host side come from a
 * {@link MidiSource} and travel as `midi_input`.
 *
 * @module midi/midi-bridge
 */

import type {
  MidiCcMessage,
  MidiInputMessage,
  MidiNoteMessage,
  TransportMessage,
} from '../protocol/schemas.js';

/**
 * Receives validated control messages from the active transport.
 */
export interface MidiSink {
  controlChange(message: MidiCcMessage): void;
  note(message: MidiNoteMessage): void;
  transport?(message: TransportMessage): void;
}

/**
 * Produces raw 3-byte channel voice events (DAW feedback).
 */
export interface MidiSource {
  /**
   * Registers a listener and returns a function that removes it.
   */
  onMidiInput(listener: (bytes: readonly [number, number, number]) => void): () => void;
}

/**
 * Decoded `midi_input` event. Channels are 1-16.
 */
export type MidiFeedback =
  | { readonly kind: 'cc'; readonly channel: number; readonly cc: number; readonly value: number }
  | { readonly kind: 'note_on'; readonly channel: number; readonly note: number; readonly velocity: number }
  | { readonly kind: 'note_off'; readonly channel: number; readonly note: number; readonly velocity: number }
  | { readonly kind: 'other'; readonly status: number; readonly data1: number; readonly data2: number };

const NOTE_OFF = 0x80;
const NOTE_ON = 0x90;
const CONTROL_CHANGE = 0xb0;

/**
 * Decodes a validated `midi_input` message. A note on with velocity 0 is
 * reported as note off.
 */
export function decodeMidiInput(message: MidiInputMessage): MidiFeedback {
  const [status, data1, data2] = message.midi;
  const kind = status & 0xf0;
  const channel = (status & 0x0f) + 1;

  switch (kind) {
    case CONTROL_CHANGE:
      return { kind: 'cc', channel, cc: data1, value: data2 };
    case NOTE_ON:
      return data2 === 0
        ? { kind: 'note_off', channel, note: data1, velocity: 0 }
        : { kind: 'note_on', channel, note: data1, velocity: data2 };
    case NOTE_OFF:
      return { kind: 'note_off', channel, note: data1, velocity: data2 };
    default:
      return { kind: 'other', status, data1, data2 };
  }
}

/**
 * Builds the status byte for a channel voice message. `channel` is 1-16.
 */
export function statusByte(kind: number, channel: number): number {
  return (kind & 0xf0) | ((channel - 1) & 0x0f);
}

export const MIDI_STATUS = {
  NOTE_OFF,
  NOTE_ON,
  CONTROL_CHANGE,
} as const;
