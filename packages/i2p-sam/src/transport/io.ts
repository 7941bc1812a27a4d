/**
 * Reading replies from and writing commands to a control connection.
 */

import type { Duplex } from 'node:stream';
import { LineBuffer, MAX_REPLY_SIZE } from '../wire/line-buffer.js';
import { SamError, SamErrorCode } from '../types/errors.js';

/** Attempts allowed to push one command into the socket */
export const MAX_WRITE_ATTEMPTS = 15;

/**
 * Read exactly one reply line from the socket.
 * Bytes past the newline stay in `buffer` for the next read.
 * Reads in paused mode through `'readable'`, so once the line is in the socket
 * holds later bytes until someone reads them or attaches a `'data'` listener.
 */
export function readReply(socket: Duplex, buffer: LineBuffer, timeoutMs: number = 0): Promise<string> {
  return new Promise((resolve, reject) => {
    let timeoutId: NodeJS.Timeout | null = null;

    const cleanup = () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      socket.removeListener('readable', onReadable);
      socket.removeListener('error', onError);
      socket.removeListener('end', onClose);
      socket.removeListener('close', onClose);
    };

    const tryRead = (): boolean => {
      const line = buffer.readLine();
      if (line !== null) {
        cleanup();
        resolve(line);
        return true;
      }
      if (buffer.overflows(MAX_REPLY_SIZE)) {
        cleanup();
        reject(new SamError(SamErrorCode.ERR_REPLY_TOO_LARGE, `Reply exceeds ${MAX_REPLY_SIZE} bytes`));
        return true;
      }
      return false;
    };

    const onReadable = () => {
      let chunk: unknown;
      while ((chunk = socket.read()) !== null) {
        if (Buffer.isBuffer(chunk)) {
          buffer.append(chunk);
        }
        if (tryRead()) return;
      }
    };

    const onError = (err: Error) => {
      cleanup();
      reject(new SamError(SamErrorCode.ERR_TRANSPORT, `Read failed: ${err.message}`));
    };

    const onClose = () => {
      cleanup();
      reject(new SamError(SamErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed before a full reply arrived'));
    };

    // Check if we already have a complete line
    if (tryRead()) return;

    if (socket.destroyed) {
      onClose();
      return;
    }

    if (timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        cleanup();
        reject(new SamError(SamErrorCode.ERR_TIMEOUT, `No reply after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    socket.once('error', onError);
    socket.once('end', onClose);
    socket.once('close', onClose);
    socket.on('readable', onReadable);
  });
}

export interface WriteOptions {
  /** Give up after this many attempts (default: 15) */
  maxAttempts?: number;
}

/**
 * Write a command, resuming from the first unwritten byte.
 * Each attempt hands the socket at most its high-water mark and waits for
 * `drain` when the socket pushes back.
 */
export function writeFully(socket: Duplex, payload: string, options: WriteOptions = {}): Promise<void> {
  const data = Buffer.from(payload, 'utf8');
  const maxAttempts = options.maxAttempts ?? MAX_WRITE_ATTEMPTS;
  const chunkSize = Math.max(socket.writableHighWaterMark, 1);

  return new Promise((resolve, reject) => {
    let offset = 0;
    let attempts = 0;
    let settled = false;

    const cleanup = () => {
      socket.removeListener('drain', step);
      socket.removeListener('error', onError);
      socket.removeListener('close', onClose);
    };

    const finish = (error?: SamError) => {
      if (settled) return;
      settled = true;
      cleanup();
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const onError = (err: Error) => {
      finish(new SamError(SamErrorCode.ERR_TRANSPORT, `Write failed: ${err.message}`));
    };

    const onClose = () => {
      finish(new SamError(SamErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed while writing'));
    };

    function step(): void {
      while (offset < data.length) {
        if (attempts >= maxAttempts) {
          finish(new SamError(SamErrorCode.ERR_TRANSPORT, 'writing to SAM failed'));
          return;
        }
        attempts++;

        const chunk = data.subarray(offset, offset + chunkSize);
        offset += chunk.length;
        const last = offset >= data.length;

        const accepted = socket.write(chunk, (err) => {
          if (err) {
            onError(err);
          } else if (last) {
            finish();
          }
        });

        if (!accepted && !last) {
          socket.once('drain', step);
          return;
        }
      }
    }

    if (socket.destroyed || !socket.writable) {
      onClose();
      return;
    }

    socket.on('error', onError);
    socket.once('close', onClose);
    step();
  });
}
