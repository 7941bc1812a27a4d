/**
 * Keys command - Generate a fresh destination
 */

import * as path from 'node:path';
import { Command } from 'commander';
import { DEFAULT_KEYS_DIR, SamControl, storeKeys } from 'i2p-sam';
import { buildConfig, describeDestination, fail, globalOptions, resolveSamAddress } from '../shared.js';

export const keysCommand = new Command('keys')
  .description('Ask the bridge for a new destination keypair')
  .option('-o, --out <file>', 'Write the keys to a file (mode 600) instead of stdout')
  .option('-n, --name <name>', `Write the keys to ${DEFAULT_KEYS_DIR}/<name>.keys`)
  .action(async (options: { out?: string; name?: string }, command: Command) => {
    const globals = globalOptions(command);
    const out = options.out ?? (options.name ? path.join(DEFAULT_KEYS_DIR, `${options.name}.keys`) : undefined);

    try {
      const control = await SamControl.connect(resolveSamAddress(globals.sam), buildConfig(globals));
      const keys = await control.generateKeys();
      control.close();

      if (out) {
        await storeKeys(out, keys);
        console.log(`Keys written to ${out}`);
        console.log(`Address: ${describeDestination(keys.address)}`);
      } else {
        console.log(keys.address);
        console.log(keys.privateKey);
      }
    } catch (err) {
      fail('Key generation failed', err);
    }
  });
