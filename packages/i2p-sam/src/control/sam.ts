/**
 * SamControl - the entry point for talking to a SAM bridge.
 *
 * One control object owns one handshaken connection. Key generation and name
 * lookups run over it one at a time; session creation dials a connection of
 * its own and consumes the control object.
 */

import type { Duplex } from 'node:stream';
import { EventEmitter } from 'node:events';
import { Endpoint, DEFAULT_SAM_ADDRESS, parseEndpoint, formatEndpoint } from '../types/endpoint.js';
import { SamError, SamErrorCode } from '../types/errors.js';
import { SamConfig, ResolvedSamConfig, resolveConfig } from '../types/config.js';
import { SamSession, SessionRequest } from '../types/session.js';
import { I2PKeys } from '../keys/keys.js';
import { LineBuffer } from '../wire/line-buffer.js';
import { DEST_GENERATE_COMMAND, namingLookupCommand } from '../wire/commands.js';
import { parseDestReply, parseNamingReply } from '../wire/replies.js';
import { dial } from '../transport/dialer.js';
import { readReply, writeFully } from '../transport/io.js';
import { performHandshake } from '../session/handshake.js';
import { negotiateSession } from '../session/negotiator.js';
import { OPTIONS_DEFAULT } from '../session/options.js';
import { log, sanitizeForLog } from '../utils/log.js';

// ============================================================================
// State Machine Type Definitions
// ============================================================================

/**
 * Control connection states
 */
export type ControlState =
  | 'READY'            // Handshake done, accepts one request
  | 'AWAITING_REPLY'   // Request written, reply outstanding
  | 'CONSUMED'         // Session creation was requested; only close() remains
  | 'CLOSED';          // Socket gone, by close() or by the bridge

export type ControlEvent =
  | 'REQUEST_SENT'
  | 'REPLY_RECEIVED'
  | 'SESSION_REQUESTED'
  | 'TRANSPORT_FAILED'
  | 'CLOSE_REQUESTED';

type StateTransitionTable = {
  [K in ControlState]: {
    [E in ControlEvent]?: ControlState;
  };
};

const STATE_TRANSITIONS: StateTransitionTable = {
  READY: {
    REQUEST_SENT: 'AWAITING_REPLY',
    SESSION_REQUESTED: 'CONSUMED',
    TRANSPORT_FAILED: 'CLOSED',
    CLOSE_REQUESTED: 'CLOSED',
  },
  AWAITING_REPLY: {
    REPLY_RECEIVED: 'READY',
    TRANSPORT_FAILED: 'CLOSED',
    CLOSE_REQUESTED: 'CLOSED',
  },
  CONSUMED: {
    TRANSPORT_FAILED: 'CLOSED',
    CLOSE_REQUESTED: 'CLOSED',
  },
  CLOSED: {
    TRANSPORT_FAILED: 'CLOSED',   // socket 'close' arriving after close()
  },
};

export interface SamControlEvents {
  close: [];
}

/** SAMv3 default protocol number for RAW sessions */
export const DEFAULT_RAW_PROTOCOL = 18;

// ============================================================================
// SamControl
// ============================================================================

export class SamControl extends EventEmitter<SamControlEvents> {
  readonly endpoint: Endpoint;

  private socket: Duplex;
  private buffer: LineBuffer;
  private state: ControlState = 'READY';
  private config: ResolvedSamConfig;

  private constructor(endpoint: Endpoint, socket: Duplex, buffer: LineBuffer, config: ResolvedSamConfig) {
    super();

    this.endpoint = endpoint;
    this.socket = socket;
    this.buffer = buffer;
    this.config = config;

    this.socket.on('error', (err: Error) => {
      log(this.config, `Control socket error: ${err.message}`);
      this.transition('TRANSPORT_FAILED');
    });
    this.socket.once('close', () => {
      log(this.config, 'Control socket closed');
      this.transition('TRANSPORT_FAILED');
      this.emit('close');
    });
  }

  /**
   * Connect to the bridge at `address` and negotiate SAM 3.0.
   * Resolves once the control connection is ready for requests.
   */
  static async connect(address: string | Endpoint = DEFAULT_SAM_ADDRESS, config: SamConfig = {}): Promise<SamControl> {
    const endpoint = typeof address === 'string' ? parseEndpoint(address) : address;
    const resolved = resolveConfig(config);

    log(resolved, `Connecting to SAM bridge at ${formatEndpoint(endpoint)}...`);
    const socket = await dial(endpoint, {
      timeoutMs: resolved.connectTimeoutMs,
      socketFactory: resolved.socketFactory,
    });
    const buffer = new LineBuffer();

    try {
      await performHandshake(socket, buffer, resolved);
    } catch (err) {
      socket.destroy();
      throw err;
    }

    return new SamControl(endpoint, socket, buffer, resolved);
  }

  /**
   * Get current state (for testing and debugging)
   */
  getState(): ControlState {
    return this.state;
  }

  /**
   * Ask the bridge for a fresh destination
   */
  async generateKeys(): Promise<I2PKeys> {
    const reply = await this.request(DEST_GENERATE_COMMAND);
    const keys = parseDestReply(reply);
    log(this.config, 'Generated new destination');
    return keys;
  }

  /**
   * Resolve a hostname (`example.i2p`, `<hash>.b32.i2p`, or `ME`) to a base64 destination
   */
  async lookup(name: string): Promise<string> {
    if (name.length === 0 || /\s/.test(name)) {
      throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, 'Name must be a single non-empty token');
    }

    const reply = await this.request(namingLookupCommand(name));
    const outcome = parseNamingReply(reply, name);
    if (outcome.ok) {
      return outcome.address;
    }

    log(this.config, `Lookup of ${name} failed: ${outcome.message}`);
    throw new SamError(
      SamErrorCode.ERR_NAME_NOT_RESOLVED,
      outcome.message.length > 0 ? outcome.message : undefined,
      outcome.message
    );
  }

  /**
   * Create a session on a new connection to the same bridge.
   *
   * This consumes the control object whether or not the bridge accepts the
   * session: afterwards only close() is allowed. The returned session owns
   * its socket and the caller is responsible for closing it.
   */
  async createSession(request: SessionRequest): Promise<SamSession> {
    this.assertUsable();
    this.transition('SESSION_REQUESTED');
    return negotiateSession(this.endpoint, request, this.config);
  }

  async createStreamSession(
    id: string,
    keys: I2PKeys,
    options: readonly string[] = OPTIONS_DEFAULT
  ): Promise<SamSession> {
    return this.createSession({ style: 'STREAM', id, keys, options });
  }

  /**
   * DATAGRAM session; `port` is where the bridge forwards datagrams (PORT=)
   */
  async createDatagramSession(
    id: string,
    keys: I2PKeys,
    options: readonly string[] = OPTIONS_DEFAULT,
    port?: number
  ): Promise<SamSession> {
    const extras: string[] = [];
    if (port !== undefined) {
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Invalid datagram port: ${port}`);
      }
      extras.push(`PORT=${port}`);
    }
    return this.createSession({ style: 'DATAGRAM', id, keys, options, extras });
  }

  /**
   * RAW session carrying I2CP protocol number `protocol` (PROTOCOL=)
   */
  async createRawSession(
    id: string,
    keys: I2PKeys,
    options: readonly string[] = OPTIONS_DEFAULT,
    protocol: number = DEFAULT_RAW_PROTOCOL
  ): Promise<SamSession> {
    if (!Number.isInteger(protocol) || protocol < 0 || protocol > 255) {
      throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Invalid raw protocol: ${protocol}`);
    }
    return this.createSession({ style: 'RAW', id, keys, options, extras: [`PROTOCOL=${protocol}`] });
  }

  /**
   * Close the control connection. Sessions created from it are unaffected.
   */
  close(): void {
    if (this.state === 'CLOSED') {
      return;
    }
    this.transition('CLOSE_REQUESTED');
    this.socket.destroy();
  }

  /**
   * Write one command and read its reply line.
   * Any failure leaves the stream position unknown, so the connection is dropped.
   */
  private async request(command: string): Promise<string> {
    this.assertUsable();
    this.transition('REQUEST_SENT');
    log(this.config, `Sending ${sanitizeForLog(command)}`);

    try {
      await writeFully(this.socket, command, { maxAttempts: this.config.maxWriteAttempts });
      const reply = await readReply(this.socket, this.buffer, this.config.replyTimeoutMs);
      log(this.config, `Received ${sanitizeForLog(reply)}`);
      this.transition('REPLY_RECEIVED');
      return reply;
    } catch (err) {
      this.transition('TRANSPORT_FAILED');
      this.socket.destroy();
      throw err;
    }
  }

  private assertUsable(): void {
    switch (this.state) {
      case 'READY':
        return;
      case 'AWAITING_REPLY':
        throw new SamError(SamErrorCode.ERR_BUSY, 'Protocol violation: request issued while a reply is outstanding');
      case 'CONSUMED':
        throw new SamError(SamErrorCode.ERR_CONSUMED);
      case 'CLOSED':
        throw new SamError(SamErrorCode.ERR_CONNECTION_CLOSED);
    }
  }

  /**
   * Validate and execute state transition
   * Throws if transition is invalid
   */
  private transition(event: ControlEvent): void {
    const nextState = STATE_TRANSITIONS[this.state][event];

    if (!nextState) {
      throw new SamError(
        SamErrorCode.ERR_UNKNOWN,
        `Invalid transition: ${this.state} + ${event} (no transition defined)`
      );
    }

    if (nextState !== this.state) {
      log(this.config, `${this.state} → ${nextState} (event: ${event})`);
    }
    this.state = nextState;
  }
}
