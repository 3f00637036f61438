/**
 * Line handshake codec.
 *
 * Initiator line:
 * ```
 * CB/<major>[ auth=<scheme>][ nonce=<n>][ features=<csv>][ ts=<epoch>][ name=<string>]\n
 * ```
 * Responder reply: `OK/<major> hmac=<opaque>\n`.
 *
 * The legacy pair `CB/1 HELLO` / `CB/1 HELLO_ACK` and an optional JSON form
 * (`{"type":"handshake"}` answered with `{"type":"handshake_response"}`) are
 * understood as well.
 *
 * @module protocol/handshake
 */

import { ProtocolError } from '../link/errors.js';
import { handshakeResponseSchema, handshakeSchema, type HandshakeMessage } from './schemas.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed initiator line.
 */
export interface HelloLine {
  readonly major: number;

  /** True for the literal `CB/1 HELLO` form */
  readonly legacy: boolean;

  readonly auth: string | null;
  readonly nonce: string | null;
  readonly features: readonly string[];
  readonly ts: number | null;

  /** Name as sent, including any `.local` suffix */
  readonly name: string | null;

  /** Name for display, `.local` suffix stripped */
  readonly displayName: string | null;

  /** Unrecognized `key=value` tokens */
  readonly extras: Readonly<Record<string, string>>;
}

export interface HelloOptions {
  readonly major: number;
  readonly auth?: string | undefined;
  readonly nonce?: string | undefined;
  readonly features?: readonly string[] | undefined;
  readonly ts?: number | undefined;
  readonly name?: string | undefined;
}

/**
 * Parsed responder reply.
 */
export interface ReplyLine {
  readonly major: number;
  readonly hmac: string;
  readonly legacy: boolean;
}

/**
 * Hook for authenticating the handshake.
 *
 * The wire protocol reserves `auth=` on the hello and `hmac=` on the reply
 * but defines no cryptography. The default authenticator signs with an empty
 * string and accepts every peer; it must not be mistaken for a security
 * boundary.
 */
export interface HandshakeAuthenticator {
  /** Scheme announced by initiators in `auth=` */
  readonly scheme: string;

  /** Responder side: value for the reply's `hmac=` */
  sign(hello: HelloLine): string;

  /** Responder side: accept or refuse a hello */
  verify(hello: HelloLine): boolean;

  /** Initiator side: accept or refuse a reply */
  verifyReply(reply: ReplyLine, nonce: string | null): boolean;
}

export const nullAuthenticator: HandshakeAuthenticator = {
  scheme: 'psk1',
  sign: () => '',
  verify: () => true,
  verifyReply: () => true,
};

// =============================================================================
// Constants
// =============================================================================

export const HELLO_PREFIX = 'CB/';
export const REPLY_PREFIX = 'OK/';
export const LEGACY_ACK = 'CB/1 HELLO_ACK';

const MAJOR_PATTERN = /^\d{1,4}$/;
const LOCAL_SUFFIX = /\.local\.?$/i;

// =============================================================================
// Helpers
// =============================================================================

function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, '').replace(/\r$/, '');
}

/**
 * Strips a trailing `.local` from an mDNS host or device name.
 */
export function stripLocalSuffix(name: string): string {
  return name.replace(LOCAL_SUFFIX, '');
}

function sanitizeToken(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').replace(/\s+/g, '_');
}

function parseMajor(token: string | undefined, line: string, prefix: string): number {
  if (token === undefined || !MAJOR_PATTERN.test(token)) {
    throw new ProtocolError('malformed_handshake', `missing protocol major in '${line.slice(0, 64)}' after ${prefix}`);
  }
  return Number.parseInt(token, 10);
}

function tryParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

// =============================================================================
// HandshakeCodec
// =============================================================================

export const HandshakeCodec = {
  /**
   * True when the line opens with the hello prefix.
   */
  isHello(line: string): boolean {
    return line.startsWith(HELLO_PREFIX);
  },

  /**
   * Parses an initiator line.
   *
   * Tokens are space separated. The first is the numeric major; unknown
   * `key=value` tokens are kept in `extras` and otherwise ignored. `name=`
   * takes the remainder of the line so names may contain spaces.
   *
   * @throws {ProtocolError} `malformed_handshake` if the prefix or major is missing
   */
  parseHello(raw: string): HelloLine {
    const line = stripLineEnding(raw);
    if (!line.startsWith(HELLO_PREFIX)) {
      throw new ProtocolError('malformed_handshake', `expected ${HELLO_PREFIX} prefix`);
    }

    const tokens = line.slice(HELLO_PREFIX.length).split(' ');
    const major = parseMajor(tokens[0], line, HELLO_PREFIX);

    let legacy = false;
    let auth: string | null = null;
    let nonce: string | null = null;
    let features: string[] = [];
    let ts: number | null = null;
    let name: string | null = null;
    const extras: Record<string, string> = {};

    for (let i = 1; i < tokens.length; i++) {
      const token = tokens[i];
      if (token === undefined || token === '') continue;

      if (token.startsWith('name=')) {
        name = [token.slice('name='.length), ...tokens.slice(i + 1)].join(' ').trim();
        break;
      }

      const eq = token.indexOf('=');
      if (eq <= 0) {
        if (token === 'HELLO' && major === 1) legacy = true;
        continue;
      }

      const key = token.slice(0, eq);
      const value = token.slice(eq + 1);
      switch (key) {
        case 'auth':
          auth = value;
          break;
        case 'nonce':
          nonce = value;
          break;
        case 'features':
          features = value.split(',').filter((f) => f.length > 0);
          break;
        case 'ts': {
          const parsed = Number(value);
          ts = Number.isFinite(parsed) ? parsed : null;
          break;
        }
        default:
          extras[key] = value;
      }
    }

    if (name === '') name = null;

    return {
      major,
      legacy,
      auth,
      nonce,
      features,
      ts,
      name,
      displayName: name === null ? null : stripLocalSuffix(name),
      extras,
    };
  },

  /**
   * Builds an initiator line. `name` is always written last.
   */
  buildHello(options: HelloOptions): string {
    const parts = [`${HELLO_PREFIX}${options.major}`];
    if (options.auth) parts.push(`auth=${sanitizeToken(options.auth)}`);
    if (options.nonce) parts.push(`nonce=${sanitizeToken(options.nonce)}`);
    if (options.features && options.features.length > 0) {
      parts.push(`features=${options.features.map(sanitizeToken).join(',')}`);
    }
    if (options.ts !== undefined) parts.push(`ts=${Math.floor(options.ts)}`);
    if (options.name) parts.push(`name=${options.name.replace(/[\r\n]+/g, ' ').trim()}`);
    return `${parts.join(' ')}\n`;
  },

  /**
   * Parses a responder reply, including the legacy acknowledgement.
   *
   * @throws {ProtocolError} `malformed_handshake` if the line is not a reply
   */
  parseReply(raw: string): ReplyLine {
    const line = stripLineEnding(raw);
    if (line === LEGACY_ACK) {
      return { major: 1, hmac: '', legacy: true };
    }
    if (!line.startsWith(REPLY_PREFIX)) {
      throw new ProtocolError('malformed_handshake', `expected ${REPLY_PREFIX} prefix`);
    }

    const tokens = line.slice(REPLY_PREFIX.length).split(' ');
    const major = parseMajor(tokens[0], line, REPLY_PREFIX);
    let hmac = '';
    for (const token of tokens.slice(1)) {
      if (token.startsWith('hmac=')) {
        hmac = token.slice('hmac='.length);
      }
    }
    return { major, hmac, legacy: false };
  },

  buildReply(major: number, hmac: string): string {
    return `${REPLY_PREFIX}${major} hmac=${sanitizeToken(hmac)}\n`;
  },

  /**
   * Returns the JSON handshake if the line is one, otherwise null.
   */
  parseJsonHandshake(line: string): HandshakeMessage | null {
    if (!line.startsWith('{')) return null;
    const result = handshakeSchema.safeParse(tryParseJson(line));
    return result.success ? result.data : null;
  },

  /**
   * Returns the major from a JSON handshake response, or null if the line is
   * not an accepting response.
   */
  parseJsonHandshakeResponse(line: string): number | null {
    if (!line.startsWith('{')) return null;
    const result = handshakeResponseSchema.safeParse(tryParseJson(line));
    if (!result.success || !result.data.ok) return null;
    return result.data.proto ?? 1;
  },

  buildJsonHandshakeResponse(serverName: string): string {
    return `${JSON.stringify({ type: 'handshake_response', server: serverName, ok: true, proto: 1 })}\n`;
  },
} as const;
