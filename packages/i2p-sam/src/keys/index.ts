/**
 * Destination keys and address encodings
 */

export type { I2PKeys } from './keys.js';
export { createKeys, serializeKeys, keysEqual } from './keys.js';

export {
  MIN_DESTINATION_LENGTH,
  B32_SUFFIX,
  isValidI2PBase64,
  i2pBase64Encode,
  i2pBase64Decode,
  base32Encode,
  isValidDestination,
  toBase32Address,
} from './address.js';

export { DEFAULT_KEYS_DIR, storeKeys, loadKeys, parseKeysFile } from './store.js';
