/**
 * i2p-sam - SAMv3 client for the I2P router bridge
 *
 * Negotiates the control protocol, generates destinations, resolves names
 * and creates STREAM, DATAGRAM and RAW sessions.
 */

// Core types
export * from './types/index.js';

// Wire protocol
export * from './wire/index.js';

// Transport
export * from './transport/index.js';

// Destination keys
export * from './keys/index.js';

// Handshake and session negotiation
export * from './session/index.js';

// Control connection (main entry point)
export * from './control/index.js';

// Logging
export * from './utils/index.js';
