/**
 * Destination keys as handed out by the SAM bridge.
 */

import { SamError, SamErrorCode } from '../types/errors.js';

/**
 * A destination keypair.
 * Both halves are opaque I2P base64 strings; `privateKey` must only ever be
 * sent to the bridge that signs for the destination.
 */
export interface I2PKeys {
  /** Public destination (the address others send to) */
  readonly address: string;
  /** Private key blob from `DEST REPLY PRIV=`; it embeds the public destination */
  readonly privateKey: string;
}

/**
 * Create an immutable keypair, rejecting values that cannot travel as one token
 */
export function createKeys(address: string, privateKey: string): I2PKeys {
  if (address.length === 0 || /\s/.test(address)) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, 'Destination address must be a single non-empty token');
  }
  if (privateKey.length === 0 || /\s/.test(privateKey)) {
    throw new SamError(SamErrorCode.ERR_INVALID_ARGUMENT, 'Private key must be a single non-empty token');
  }
  return Object.freeze({ address, privateKey });
}

/**
 * The form sent as `DESTINATION=` in SESSION CREATE, and echoed back by the bridge.
 * The private blob already carries the public destination, so nothing is lost.
 */
export function serializeKeys(keys: I2PKeys): string {
  return keys.privateKey;
}

export function keysEqual(a: I2PKeys, b: I2PKeys): boolean {
  return a.address === b.address && a.privateKey === b.privateKey;
}
