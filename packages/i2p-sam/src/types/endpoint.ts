/**
 * Endpoint identifies where the SAM bridge listens.
 * Immutable once parsed; session negotiation dials the same endpoint again.
 */

import { SamError, SamErrorCode } from './errors.js';

export interface Endpoint {
  /** Host address (IP or hostname) */
  readonly host: string;
  /** Port number */
  readonly port: number;
}

/** Where a stock I2P router exposes SAM */
export const DEFAULT_SAM_ADDRESS = '127.0.0.1:7656';

/**
 * Parse an endpoint string (host:port)
 */
export function parseEndpoint(address: string): Endpoint {
  const match = address.trim().match(/^([^:\s]+):(\d+)$/);
  if (!match) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Invalid SAM address: ${address}`);
  }

  return createEndpoint(match[1], parseInt(match[2], 10));
}

/**
 * Format an Endpoint to string
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

/**
 * Create an Endpoint, validating the port range
 */
export function createEndpoint(host: string, port: number): Endpoint {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, `Invalid port number: ${port}`);
  }
  return Object.freeze({ host, port });
}
