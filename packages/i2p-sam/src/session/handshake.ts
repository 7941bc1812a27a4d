/**
 * Version negotiation.
 *
 * Flow:
 * 1. -> HELLO VERSION MIN=3.0 MAX=3.0
 * 2. <- HELLO REPLY RESULT=OK VERSION=3.0   (anything else fails)
 *
 * One attempt: a malformed reply is the final answer.
 */

import type { Duplex } from 'node:stream';
import { LineBuffer } from '../wire/line-buffer.js';
import { HELLO_COMMAND } from '../wire/commands.js';
import { classifyHelloReply } from '../wire/replies.js';
import { readReply, writeFully } from '../transport/io.js';
import { SamError, SamErrorCode } from '../types/errors.js';
import { ResolvedSamConfig } from '../types/config.js';
import { log, sanitizeForLog } from '../utils/log.js';

/**
 * Run HELLO on a freshly connected socket
 */
export async function performHandshake(
  socket: Duplex,
  buffer: LineBuffer,
  config: ResolvedSamConfig
): Promise<void> {
  log(config, `Sending ${sanitizeForLog(HELLO_COMMAND)}`);
  await writeFully(socket, HELLO_COMMAND, { maxAttempts: config.maxWriteAttempts });

  const reply = await readReply(socket, buffer, config.replyTimeoutMs);
  const outcome = classifyHelloReply(reply);

  switch (outcome.kind) {
    case 'ok':
      log(config, 'Handshake complete (SAM 3.0)');
      return;
    case 'noversion':
      throw new SamError(SamErrorCode.ERR_VERSION_UNSUPPORTED);
    case 'error':
      throw new SamError(SamErrorCode.ERR_PROTOCOL, `Unexpected HELLO reply: ${outcome.reply.trimEnd()}`, outcome.reply);
  }
}
