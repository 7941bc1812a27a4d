/**
 * Persist destination keys to disk.
 * File format: the public destination on the first line, the private blob on the second.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { I2PKeys, createKeys } from './keys.js';
import { SamError, SamErrorCode } from '../types/errors.js';

export const DEFAULT_KEYS_DIR = path.join(os.homedir(), '.i2p-sam', 'keys');

/**
 * Write keys to `filePath`, readable by the owner only
 */
export async function storeKeys(filePath: string, keys: I2PKeys): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, `${keys.address}\n${keys.privateKey}\n`, { mode: 0o600 });
}

/**
 * Read keys written by storeKeys
 */
export async function loadKeys(filePath: string): Promise<I2PKeys> {
  const content = await fs.promises.readFile(filePath, 'utf8');
  return parseKeysFile(content);
}

export function parseKeysFile(content: string): I2PKeys {
  const lines = content.split(/\r?\n/).filter((line) => line.length > 0);
  if (lines.length !== 2) {
    throw new SamError(SamErrorCode.ERR_PARSE, `Keys file must hold 2 lines, found ${lines.length}`);
  }
  try {
    return createKeys(lines[0], lines[1]);
  } catch (err) {
    if (err instanceof SamError) {
      throw new SamError(SamErrorCode.ERR_PARSE, `Malformed keys file: ${err.message}`);
    }
    throw err;
  }
}
