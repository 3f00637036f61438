/**
 * Wire schemas for post-handshake JSON messages.
 *
 * Numeric fields are range-checked, never clamped. Object schemas strip
 * unknown keys, so a validated message carries only the fields below.
 *
 * @module protocol/schemas
 */

import { z } from 'zod';

// =============================================================================
// Field Schemas
// =============================================================================

/** MIDI channel as shown to users (1-16) */
export const channelSchema = z.number().int().min(1).max(16);

/** 7-bit MIDI data byte (controller, note, value, velocity) */
export const data7Schema = z.number().int().min(0).max(127);

/** Epoch timestamp in seconds (fractional values tolerated) */
export const timestampSchema = z.number().nonnegative().finite();

/** Channel voice status byte: note off (0x80) through pitch bend (0xEx) */
export const statusByteSchema = z.number().int().min(0x80).max(0xef);

// =============================================================================
// Message Schemas
// =============================================================================

export const midiCcSchema = z.object({
  type: z.literal('midi_cc'),
  channel: channelSchema,
  cc: data7Schema,
  value: data7Schema,
  label: z.string().max(256).optional(),
  button_id: z.string().max(256).optional(),
});

export const midiNoteSchema = z.object({
  type: z.literal('midi_note'),
  channel: channelSchema,
  note: data7Schema,
  velocity: data7Schema,
  label: z.string().max(256).optional(),
  button_id: z.string().max(256).optional(),
});

export const transportSchema = z.object({
  type: z.literal('transport'),
  action: z.string().min(1).max(64),
  timestamp: timestampSchema.optional(),
});

export const heartbeatSchema = z.object({
  type: z.literal('heartbeat'),
  timestamp: timestampSchema,
});

export const handshakeSchema = z.object({
  type: z.literal('handshake'),
  version: z.union([z.number().int().nonnegative(), z.string().max(32)]).optional(),
  auth: z.string().max(64).optional(),
  name: z.string().max(256).optional(),
  client: z.string().max(256).optional(),
});

export const handshakeResponseSchema = z.object({
  type: z.literal('handshake_response'),
  ok: z.boolean(),
  server: z.string().max(256).optional(),
  proto: z.number().int().positive().optional(),
});

export const batchSchema = z.object({
  type: z.literal('batch'),
  messages: z.array(z.string()),
  count: z.number().int().nonnegative().optional(),
  timestamp: timestampSchema.optional(),
});

export const midiInputSchema = z.object({
  type: z.literal('midi_input'),
  midi: z.tuple([statusByteSchema, data7Schema, data7Schema]),
});

/**
 * Every message kind that may appear as a single validated message.
 * Batches are exploded before they reach application code.
 */
export const linkMessageSchema = z.discriminatedUnion('type', [
  midiCcSchema,
  midiNoteSchema,
  transportSchema,
  heartbeatSchema,
  handshakeSchema,
  midiInputSchema,
]);

/**
 * Envelope check used before dispatching on `type`.
 */
export const typedObjectSchema = z.object({ type: z.string() }).passthrough();

// =============================================================================
// Inferred Types
// =============================================================================

export type MidiCcMessage = z.infer<typeof midiCcSchema>;
export type MidiNoteMessage = z.infer<typeof midiNoteSchema>;
export type TransportMessage = z.infer<typeof transportSchema>;
export type HeartbeatMessage = z.infer<typeof heartbeatSchema>;
export type HandshakeMessage = z.infer<typeof handshakeSchema>;
export type HandshakeResponseMessage = z.infer<typeof handshakeResponseSchema>;
export type BatchMessage = z.infer<typeof batchSchema>;
export type MidiInputMessage = z.infer<typeof midiInputSchema>;

/**
 * A single validated message.
 */
export type LinkMessage = z.infer<typeof linkMessageSchema>;

export type LinkMessageType = LinkMessage['type'] | 'batch';

/**
 * Collects zod issues into short `path: message` strings.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
