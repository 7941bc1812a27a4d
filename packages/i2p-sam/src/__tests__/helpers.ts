/**
 * Test doubles for SAM connections.
 * A MockSocket is an in-process Duplex; a MockBridge hands them out through
 * the SocketFactory seam and answers each command line like a SAM bridge would.
 */

import { Duplex, DuplexOptions } from 'node:stream';
import type { SocketFactory } from '../transport/dialer.js';
import { HELLO_OK } from '../wire/commands.js';

export type LineHandler = (line: string, connection: number) => string | null;

/**
 * Mock Socket - records writes, lets the test push replies
 */
export class MockSocket extends Duplex {
  public written: Buffer[] = [];
  private pending = '';
  private hungUp = false;

  constructor(
    private onLine: ((line: string) => void) | null = null,
    options: DuplexOptions = {}
  ) {
    super({ allowHalfOpen: false, ...options });
  }

  _read(): void {
    // Replies are pushed by the test or the bridge
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(chunk);
    this.pending += chunk.toString('utf8');

    let index = this.pending.indexOf('\n');
    while (index !== -1) {
      const line = this.pending.slice(0, index + 1);
      this.pending = this.pending.slice(index + 1);
      const onLine = this.onLine;
      if (onLine) {
        setImmediate(() => onLine(line));
      }
      index = this.pending.indexOf('\n');
    }

    setImmediate(() => callback());
  }

  /** Deliver bytes as if the bridge sent them */
  reply(text: string): void {
    if (this.hungUp || this.destroyed) {
      return;
    }
    this.push(Buffer.from(text, 'utf8'));
  }

  /** Bridge hangs up */
  hangUp(): void {
    this.hungUp = true;
    this.push(null);
  }

  getWrittenText(): string {
    return Buffer.concat(this.written).toString('utf8');
  }
}

/**
 * Mock Bridge - a SocketFactory whose sockets answer through `handler`
 */
export class MockBridge implements SocketFactory {
  public sockets: MockSocket[] = [];
  public connectError: Error | null = null;
  public connectOptions: Array<{ host: string; port: number }> = [];

  constructor(
    private handler: LineHandler = samHandler(),
    private socketOptions: DuplexOptions = {}
  ) {}

  createConnection(options: { host: string; port: number }): MockSocket {
    const connection = this.sockets.length;
    this.connectOptions.push(options);

    const socket: MockSocket = new MockSocket((line) => {
      const reply = this.handler(line, connection);
      if (reply !== null) {
        socket.reply(reply);
      }
    }, this.socketOptions);
    this.sockets.push(socket);

    setImmediate(() => {
      if (this.connectError) {
        socket.emit('error', this.connectError);
      } else {
        socket.emit('connect');
      }
    });

    return socket;
  }

  getLastSocket(): MockSocket | null {
    return this.sockets[this.sockets.length - 1] ?? null;
  }

  /** Every line written on connection `index` */
  getLines(index: number): string[] {
    const socket = this.sockets[index];
    if (!socket) {
      return [];
    }
    return socket.getWrittenText().split(/(?<=\n)/).filter((line) => line.length > 0);
  }
}

export const TEST_PUB = 'pubDest~test-AAAA';
export const TEST_PRIV = 'pubDest~test-AAAAprivBlob-BBBB';

export interface SamHandlerOptions {
  /** Reply to HELLO (default: version 3.0 accepted) */
  hello?: string;
  /** Reply to DEST GENERATE */
  dest?: string;
  /** Reply to NAMING LOOKUP, keyed by name */
  names?: Record<string, string>;
  /** Reply to SESSION CREATE; receives the requested DESTINATION= value */
  session?: (destination: string) => string;
}

/**
 * A scripted SAM bridge: well-behaved unless a reply is overridden
 */
export function samHandler(options: SamHandlerOptions = {}): LineHandler {
  return (line) => {
    if (line.startsWith('HELLO VERSION')) {
      return options.hello ?? HELLO_OK;
    }
    if (line === 'DEST GENERATE\n') {
      return options.dest ?? `DEST REPLY PUB=${TEST_PUB} PRIV=${TEST_PRIV}\n`;
    }
    if (line.startsWith('NAMING LOOKUP NAME=')) {
      const name = line.slice('NAMING LOOKUP NAME='.length, -1);
      return options.names?.[name] ?? `NAMING REPLY RESULT=KEY_NOT_FOUND NAME=${name}\n`;
    }
    if (line.startsWith('SESSION CREATE ')) {
      const destination = line.match(/DESTINATION=(\S+)/)?.[1] ?? '';
      return options.session
        ? options.session(destination)
        : `SESSION STATUS RESULT=OK DESTINATION=${destination}\n`;
    }
    return null;
  };
}

/**
 * Log helper for tests
 */
export class MockLogConfig {
  public logs: string[] = [];

  logCallback = (message: string) => {
    this.logs.push(message);
  };

  hasLog(pattern: string | RegExp): boolean {
    const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    return this.logs.some((entry) => regex.test(entry));
  }
}
