/**
 * SESSION CREATE negotiation.
 *
 * Flow:
 * 1. Dial a second connection to the same endpoint and run HELLO on it
 * 2. -> SESSION CREATE STYLE=.. ID=.. DESTINATION=.. [OPTION=..]* [extra]*
 * 3. <- SESSION STATUS RESULT=...
 *
 * On success the new socket is handed to the caller open; on every failure it
 * is destroyed before the error propagates.
 */

import type { Duplex } from 'node:stream';
import { Endpoint, formatEndpoint } from '../types/endpoint.js';
import { SamError, SamErrorCode } from '../types/errors.js';
import { SamSession, SessionRequest, isSessionStyle } from '../types/session.js';
import { ResolvedSamConfig } from '../types/config.js';
import { serializeKeys } from '../keys/keys.js';
import { LineBuffer } from '../wire/line-buffer.js';
import { buildSessionCreate } from '../wire/commands.js';
import { classifySessionReply } from '../wire/replies.js';
import { dial } from '../transport/dialer.js';
import { readReply, writeFully } from '../transport/io.js';
import { performHandshake } from './handshake.js';
import { log, sanitizeForLog } from '../utils/log.js';

/**
 * Reject requests that cannot be written as a single well-formed line
 */
export function validateSessionRequest(request: SessionRequest): void {
  if (!isSessionStyle(request.style)) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Unknown session style: ${String(request.style)}`);
  }
  if (request.id.length === 0 || /\s/.test(request.id)) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, 'Session id must be a single non-empty token');
  }
  for (const option of request.options ?? []) {
    if (option.length === 0 || /\s/.test(option)) {
      throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Invalid session option: ${JSON.stringify(option)}`);
    }
  }
  for (const extra of request.extras ?? []) {
    if (extra.length === 0 || /\s/.test(extra)) {
      throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Invalid session argument: ${JSON.stringify(extra)}`);
    }
  }
}

/**
 * Send SESSION CREATE on an already handshaken socket and interpret the status line
 */
async function createOnSocket(
  socket: Duplex,
  buffer: LineBuffer,
  request: SessionRequest,
  config: ResolvedSamConfig
): Promise<SamSession> {
  const command = buildSessionCreate(request);
  log(config, `[${request.id}] Sending ${sanitizeForLog(command)}`);
  await writeFully(socket, command, { maxAttempts: config.maxWriteAttempts });

  const reply = await readReply(socket, buffer, config.replyTimeoutMs);
  log(config, `[${request.id}] Received ${sanitizeForLog(reply)}`);
  const outcome = classifySessionReply(reply);

  switch (outcome.kind) {
    case 'ok':
      if (outcome.destination !== serializeKeys(request.keys)) {
        throw new SamError(SamErrorCode.ERR_INTEGRITY);
      }
      return { id: request.id, style: request.style, keys: request.keys, socket };
    case 'duplicated_id':
      throw new SamError(SamErrorCode.ERR_DUPLICATE_SESSION_ID, `Duplicate tunnel name: ${request.id}`);
    case 'duplicated_dest':
      throw new SamError(SamErrorCode.ERR_DUPLICATE_DESTINATION);
    case 'invalid_key':
      throw new SamError(SamErrorCode.ERR_INVALID_KEY);
    case 'i2p_error':
      throw new SamError(SamErrorCode.ERR_REMOTE, `I2P error ${outcome.message}`, outcome.message);
    case 'unknown':
      throw new SamError(
        SamErrorCode.ERR_PARSE,
        `Unable to parse SAMv3 reply: ${outcome.reply.trimEnd()}`,
        outcome.reply
      );
  }
}

/**
 * Create a session over a new control connection to `endpoint`.
 * The returned session owns that connection; the caller closes it.
 */
export async function negotiateSession(
  endpoint: Endpoint,
  request: SessionRequest,
  config: ResolvedSamConfig
): Promise<SamSession> {
  validateSessionRequest(request);

  log(config, `[${request.id}] Opening session connection to ${formatEndpoint(endpoint)}...`);
  const socket = await dial(endpoint, {
    timeoutMs: config.connectTimeoutMs,
    socketFactory: config.socketFactory,
  });
  socket.on('error', (err: Error) => {
    log(config, `[${request.id}] Session socket error: ${err.message}`);
  });
  const buffer = new LineBuffer();

  try {
    await performHandshake(socket, buffer, config);
    const session = await createOnSocket(socket, buffer, request, config);

    // Whatever followed the status line belongs to the session's reader
    const rest = buffer.drain();
    if (rest.length > 0) {
      socket.unshift(rest);
    }

    log(config, `[${request.id}] ${request.style} session established`);
    return session;
  } catch (err) {
    log(config, `[${request.id}] Session creation failed, closing connection`);
    socket.destroy();
    throw err;
  }
}
