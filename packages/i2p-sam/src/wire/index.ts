/**
 * Wire protocol exports
 */

export { tokenize, stripHeader, tokenValue } from './tokenizer.js';
export { MAX_REPLY_SIZE, LineBuffer } from './line-buffer.js';
export {
  HELLO_COMMAND,
  HELLO_OK,
  HELLO_NOVERSION,
  DEST_GENERATE_COMMAND,
  NAMING_REPLY_HEADER,
  SESSION_OK,
  SESSION_DUPLICATE_ID,
  SESSION_DUPLICATE_DEST,
  SESSION_INVALID_KEY,
  SESSION_I2P_ERROR,
  namingLookupCommand,
  buildSessionCreate,
} from './commands.js';
export type { HelloOutcome, LookupOutcome, SessionOutcome } from './replies.js';
export {
  classifyHelloReply,
  parseDestReply,
  parseNamingReply,
  classifySessionReply,
} from './replies.js';
