/**
 * I2P address encodings.
 * Destinations travel in I2P's base64 variant (`-` and `~` replace `+` and `/`);
 * the short `.b32.i2p` form is the base32 SHA-256 of the raw destination.
 */

import { sha256 } from '@noble/hashes/sha256';
import { SamError, SamErrorCode } from '../types/errors.js';

const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567';

/** Shortest destination: 387 bytes (public key, signing key, null certificate) */
export const MIN_DESTINATION_LENGTH = 516;

export const B32_SUFFIX = '.b32.i2p';

/**
 * Validate that a string is I2P base64
 */
export function isValidI2PBase64(text: string): boolean {
  return text.length % 4 === 0 && /^[A-Za-z0-9~-]*={0,2}$/.test(text);
}

export function i2pBase64Encode(data: Uint8Array): string {
  return Buffer.from(data).toString('base64').replace(/\+/g, '-').replace(/\//g, '~');
}

export function i2pBase64Decode(text: string): Uint8Array {
  if (!isValidI2PBase64(text)) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, 'Invalid I2P base64 string');
  }
  const standard = text.replace(/-/g, '+').replace(/~/g, '/');
  return new Uint8Array(Buffer.from(standard, 'base64'));
}

/**
 * RFC 4648 base32, lowercase, without padding
 */
export function base32Encode(data: Uint8Array): string {
  let output = '';
  let bits = 0;
  let value = 0;

  for (const byte of data) {
    value = (value << 8) | byte;
    bits += 8;
    while (bits >= 5) {
      output += BASE32_ALPHABET[(value >>> (bits - 5)) & 0x1f];
      bits -= 5;
    }
  }
  if (bits > 0) {
    output += BASE32_ALPHABET[(value << (5 - bits)) & 0x1f];
  }

  return output;
}

/**
 * Check that a string looks like a full base64 destination
 */
export function isValidDestination(address: string): boolean {
  return address.length >= MIN_DESTINATION_LENGTH && isValidI2PBase64(address);
}

/**
 * Derive the `<52 chars>.b32.i2p` hostname for a base64 destination
 */
export function toBase32Address(address: string): string {
  const hash = sha256(i2pBase64Decode(address));
  return base32Encode(hash) + B32_SUFFIX;
}
