/**
 * TCP dialer for SAM control connections
 */

import * as net from 'node:net';
import type { Duplex } from 'node:stream';
import { Endpoint, formatEndpoint } from '../types/endpoint.js';
import { SamError, SamErrorCode } from '../types/errors.js';

/**
 * Abstraction for creating TCP sockets.
 * Allows injection of in-process sockets for testing.
 */
export interface SocketFactory {
  createConnection(options: { host: string; port: number }): Duplex;
}

export const netSocketFactory: SocketFactory = {
  createConnection: (options) => net.createConnection(options),
};

export interface DialOptions {
  /** Connection timeout in milliseconds; 0 waits indefinitely */
  timeoutMs?: number;
  socketFactory?: SocketFactory;
}

export const DEFAULT_CONNECT_TIMEOUT = 10000; // 10 seconds

/**
 * Dial a control connection to the bridge
 */
export function dial(endpoint: Endpoint, options: DialOptions = {}): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const timeout = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT;
    const factory = options.socketFactory ?? netSocketFactory;
    const socket = factory.createConnection({ host: endpoint.host, port: endpoint.port });
    let timeoutId: NodeJS.Timeout | null = null;

    const cleanup = () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      socket.removeListener('connect', onConnect);
      socket.removeListener('error', onError);
    };

    const onConnect = () => {
      cleanup();
      resolve(socket);
    };

    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(new SamError(SamErrorCode.ERR_TRANSPORT, `Connection to ${formatEndpoint(endpoint)} failed: ${err.message}`));
    };

    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new SamError(SamErrorCode.ERR_TIMEOUT, `Connection timeout after ${timeout}ms`));
      }, timeout);
    }

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}
