/**
 * Transport exports
 */

export type { SocketFactory, DialOptions } from './dialer.js';
export { netSocketFactory, DEFAULT_CONNECT_TIMEOUT, dial } from './dialer.js';
export type { WriteOptions } from './io.js';
export { MAX_WRITE_ATTEMPTS, readReply, writeFully } from './io.js';
