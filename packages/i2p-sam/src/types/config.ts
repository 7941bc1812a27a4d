/**
 * Client configuration.
 */

import { LogConfig } from '../utils/log.js';
import { SocketFactory, netSocketFactory, DEFAULT_CONNECT_TIMEOUT } from '../transport/dialer.js';
import { MAX_WRITE_ATTEMPTS } from '../transport/io.js';

export interface SamConfig extends LogConfig {
  /** TCP connect timeout in ms (default: 10000, 0 disables) */
  connectTimeoutMs?: number;
  /**
   * Deadline for each reply in ms. Default 0: wait as long as the bridge takes,
   * which can stall a call indefinitely on a silent bridge.
   */
  replyTimeoutMs?: number;
  /** Attempts allowed to push SESSION CREATE into the socket (default: 15) */
  maxWriteAttempts?: number;
  /** Socket source (default: node:net) */
  socketFactory?: SocketFactory;
}

export type ResolvedSamConfig = Required<Omit<SamConfig, 'logCallback'>> & LogConfig;

export function resolveConfig(config: SamConfig = {}): ResolvedSamConfig {
  return {
    connectTimeoutMs: config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT,
    replyTimeoutMs: config.replyTimeoutMs ?? 0,
    maxWriteAttempts: config.maxWriteAttempts ?? MAX_WRITE_ATTEMPTS,
    socketFactory: config.socketFactory ?? netSocketFactory,
    logCallback: config.logCallback,
  };
}
