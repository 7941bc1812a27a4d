/**
 * Reply grammar for the SAMv3 commands this client sends.
 * Pure functions: each maps any reply string to exactly one outcome.
 */

import { I2PKeys, createKeys } from '../keys/keys.js';
import { SamError, SamErrorCode } from '../types/errors.js';
import { tokenize, stripHeader, tokenValue } from './tokenizer.js';
import {
  HELLO_OK,
  HELLO_NOVERSION,
  NAMING_REPLY_HEADER,
  SESSION_OK,
  SESSION_DUPLICATE_ID,
  SESSION_DUPLICATE_DEST,
  SESSION_INVALID_KEY,
  SESSION_I2P_ERROR,
} from './commands.js';

// ============================================================================
// HELLO
// ============================================================================

export type HelloOutcome =
  | { kind: 'ok' }
  | { kind: 'noversion' }
  | { kind: 'error'; reply: string };

export function classifyHelloReply(reply: string): HelloOutcome {
  if (reply === HELLO_OK) {
    return { kind: 'ok' };
  }
  if (reply === HELLO_NOVERSION) {
    return { kind: 'noversion' };
  }
  return { kind: 'error', reply };
}

// ============================================================================
// DEST GENERATE
// ============================================================================

/**
 * Parse `DEST REPLY PUB=<addr> PRIV=<key>`; PUB and PRIV may come in either order.
 * Errors carry no `detail`: the reply holds the private key.
 */
export function parseDestReply(reply: string): I2PKeys {
  let pub: string | null = null;
  let priv: string | null = null;

  for (const token of tokenize(reply)) {
    if (token === 'DEST' || token === 'REPLY') {
      continue;
    }
    const pubValue = tokenValue(token, 'PUB');
    if (pubValue !== null) {
      pub = pubValue;
      continue;
    }
    const privValue = tokenValue(token, 'PRIV');
    if (privValue !== null) {
      priv = privValue;
      continue;
    }
    throw new SamError(SamErrorCode.ERR_PARSE, 'Failed to parse keys');
  }

  if (!pub || !priv) {
    throw new SamError(
      SamErrorCode.ERR_PARSE,
      `Failed to parse keys: reply lacks ${pub ? 'PRIV' : 'PUB'}`
    );
  }

  return createKeys(pub, priv);
}

// ============================================================================
// NAMING LOOKUP
// ============================================================================

export type LookupOutcome =
  | { ok: true; address: string }
  | { ok: false; message: string };

/**
 * What a lookup token does to the scan: keep going (optionally adding error
 * text), finish with an address, or reject the reply.
 */
type LookupStep =
  | { action: 'continue'; append?: string }
  | { action: 'return'; address: string }
  | { action: 'reject' };

type LookupRule = (token: string, name: string) => LookupStep | null;

const LOOKUP_RULES: readonly LookupRule[] = [
  (token) => (token === 'RESULT=OK' ? { action: 'continue' } : null),
  (token) => (token === 'RESULT=INVALID_KEY' ? { action: 'continue', append: 'Invalid key.' } : null),
  (token, name) =>
    token === 'RESULT=KEY_NOT_FOUND' ? { action: 'continue', append: `Unable to resolve ${name}` } : null,
  (token, name) => (token === `NAME=${name}` ? { action: 'continue' } : null),
  (token) => {
    const value = tokenValue(token, 'VALUE');
    return value !== null ? { action: 'return', address: value } : null;
  },
  (token) => {
    const message = tokenValue(token, 'MESSAGE');
    return message !== null ? { action: 'continue', append: ` ${message}` } : null;
  },
];

function lookupStep(token: string, name: string): LookupStep {
  for (const rule of LOOKUP_RULES) {
    const step = rule(token, name);
    if (step) {
      return step;
    }
  }
  return { action: 'reject' };
}

/**
 * Parse `NAMING REPLY ...` for a lookup of `name`.
 * The first VALUE= token wins regardless of anything accumulated before it.
 */
export function parseNamingReply(reply: string, name: string): LookupOutcome {
  const body = stripHeader(reply, NAMING_REPLY_HEADER);
  if (body === null) {
    throw new SamError(SamErrorCode.ERR_PARSE, 'Failed to parse lookup reply', reply);
  }

  let message = '';
  for (const token of tokenize(body)) {
    const step = lookupStep(token, name);
    switch (step.action) {
      case 'continue':
        message += step.append ?? '';
        break;
      case 'return':
        return { ok: true, address: step.address };
      case 'reject':
        throw new SamError(SamErrorCode.ERR_PARSE, 'Failed to parse lookup reply', reply);
    }
  }

  return { ok: false, message };
}

// ============================================================================
// SESSION CREATE
// ============================================================================

export type SessionOutcome =
  | { kind: 'ok'; destination: string }
  | { kind: 'duplicated_id' }
  | { kind: 'duplicated_dest' }
  | { kind: 'invalid_key' }
  | { kind: 'i2p_error'; message: string }
  | { kind: 'unknown'; reply: string };

function trimNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}

export function classifySessionReply(reply: string): SessionOutcome {
  if (reply.startsWith(SESSION_OK)) {
    return { kind: 'ok', destination: trimNewline(reply.slice(SESSION_OK.length)) };
  }
  if (reply === SESSION_DUPLICATE_ID) {
    return { kind: 'duplicated_id' };
  }
  if (reply === SESSION_DUPLICATE_DEST) {
    return { kind: 'duplicated_dest' };
  }
  if (reply === SESSION_INVALID_KEY) {
    return { kind: 'invalid_key' };
  }
  if (reply.startsWith(SESSION_I2P_ERROR)) {
    return { kind: 'i2p_error', message: trimNewline(reply.slice(SESSION_I2P_ERROR.length)) };
  }
  return { kind: 'unknown', reply };
}
