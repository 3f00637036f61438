/**
 * Newline-delimited framing.
 *
 * Every frame is one UTF-8 line terminated by `\n`. `\r\n` is tolerated and
 * empty lines are skipped.
 *
 * @module protocol/framing
 */

import { ProtocolError } from '../link/errors.js';
import { LINK_DEFAULTS } from '../link/types.js';

const NEWLINE = 0x0a;

/**
 * Splits a byte stream into complete lines.
 *
 * @example
 * ```typescript
 * const decoder = new LineDecoder();
 * decoder.push(Buffer.from('{"type":"heart'));   // []
 * decoder.push(Buffer.from('beat"}\n'));         // ['{"type":"heartbeat"}']
 * ```
 */
export class LineDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(
    private readonly maxLineBytes: number = LINK_DEFAULTS.MAX_LINE_BYTES,
    private readonly onOverflow: (error: ProtocolError) => void = () => {},
  ) {}

  /**
   * Appends a chunk and returns every line it completed.
   *
   * An unterminated tail longer than the limit is discarded and reported to
   * `onOverflow` as `malformed_frame`; lines completed before it are still
   * returned.
   */
  push(chunk: Buffer): string[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const lines: string[] = [];
    let start = 0;
    let newline = this.buffer.indexOf(NEWLINE, start);

    while (newline !== -1) {
      let end = newline;
      if (end > start && this.buffer[end - 1] === 0x0d) end--;

      if (end > start) {
        lines.push(this.buffer.toString('utf8', start, end));
      }

      start = newline + 1;
      newline = this.buffer.indexOf(NEWLINE, start);
    }

    this.buffer = start === 0 ? this.buffer : this.buffer.subarray(start);

    if (this.buffer.length > this.maxLineBytes) {
      const size = this.buffer.length;
      this.buffer = Buffer.alloc(0);
      this.onOverflow(
        new ProtocolError('malformed_frame', `line exceeds ${this.maxLineBytes} bytes (${size} buffered)`),
      );
    }

    return lines;
  }

  /**
   * Bytes held for an incomplete line.
   */
  get pendingBytes(): number {
    return this.buffer.length;
  }
}

/**
 * Serializes one message into a frame.
 */
export function encodeFrame(message: unknown): string {
  return `${JSON.stringify(message)}\n`;
}

/**
 * Parses one frame's JSON.
 *
 * @throws {ProtocolError} `malformed_frame` if the line is not a JSON object
 */
export function parseFrame(line: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    throw new ProtocolError(
      'malformed_frame',
      err instanceof Error ? err.message : 'invalid JSON',
    );
  }

  if (!isRecord(value)) {
    throw new ProtocolError('malformed_frame', 'frame is not a JSON object');
  }
  return value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
