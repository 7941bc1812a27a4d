/**
 * Session request and result types
 */

import type { Duplex } from 'node:stream';
import type { I2PKeys } from '../keys/keys.js';

/** Transport kinds a SAM session can carry */
export type SessionStyle = 'STREAM' | 'DATAGRAM' | 'RAW';

export const SESSION_STYLES: readonly SessionStyle[] = ['STREAM', 'DATAGRAM', 'RAW'];

/**
 * Everything the bridge needs to create one session.
 * Lives only for the duration of a single negotiation.
 */
export interface SessionRequest {
  readonly style: SessionStyle;
  /** Caller-chosen nickname, unique per bridge */
  readonly id: string;
  readonly keys: I2PKeys;
  /** I2CP / streaming options, each `key=value`, sent as `OPTION=key=value` */
  readonly options?: readonly string[];
  /** Appended to the command verbatim, in order */
  readonly extras?: readonly string[];
}

/**
 * An established session. The socket belongs to the caller from here on:
 * closing it tears the session down on the bridge.
 *
 * The socket is handed over in paused mode with any bytes that followed the
 * status line still queued; attaching a `'data'` listener starts the flow.
 * Socket errors are logged through `logCallback` until the caller adds its own listener.
 */
export interface SamSession {
  readonly id: string;
  readonly style: SessionStyle;
  /** Keys confirmed by the bridge */
  readonly keys: I2PKeys;
  readonly socket: Duplex;
}

export function isSessionStyle(value: string): value is SessionStyle {
  return SESSION_STYLES.some((style) => style === value);
}
