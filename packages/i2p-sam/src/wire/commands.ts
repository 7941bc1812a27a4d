/**
 * SAMv3 command lines and the fixed reply literals they are answered with.
 */

import { SessionRequest } from '../types/session.js';
import { serializeKeys } from '../keys/keys.js';

export const HELLO_COMMAND = 'HELLO VERSION MIN=3.0 MAX=3.0\n';
export const HELLO_OK = 'HELLO REPLY RESULT=OK VERSION=3.0\n';
export const HELLO_NOVERSION = 'HELLO REPLY RESULT=NOVERSION\n';

export const DEST_GENERATE_COMMAND = 'DEST GENERATE\n';

export const NAMING_REPLY_HEADER = 'NAMING REPLY ';

export const SESSION_OK = 'SESSION STATUS RESULT=OK DESTINATION=';
export const SESSION_DUPLICATE_ID = 'SESSION STATUS RESULT=DUPLICATED_ID\n';
export const SESSION_DUPLICATE_DEST = 'SESSION STATUS RESULT=DUPLICATED_DEST\n';
export const SESSION_INVALID_KEY = 'SESSION STATUS RESULT=INVALID_KEY\n';
export const SESSION_I2P_ERROR = 'SESSION STATUS RESULT=I2P_ERROR MESSAGE=';

export function namingLookupCommand(name: string): string {
  return `NAMING LOOKUP NAME=${name}\n`;
}

/**
 * Build the SESSION CREATE line.
 * Options become repeated `OPTION=<v>` tokens in input order, then extras follow verbatim.
 */
export function buildSessionCreate(request: SessionRequest): string {
  const tokens = [
    'SESSION',
    'CREATE',
    `STYLE=${request.style}`,
    `ID=${request.id}`,
    `DESTINATION=${serializeKeys(request.keys)}`,
    ...(request.options ?? []).map((option) => `OPTION=${option}`),
    ...(request.extras ?? []),
  ];
  return tokens.join(' ') + '\n';
}
