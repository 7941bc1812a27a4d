/**
 * Lookup command - Resolve a hostname through the bridge
 */

import { Command } from 'commander';
import { SamControl, isValidDestination, toBase32Address } from 'i2p-sam';
import { buildConfig, fail, globalOptions, resolveSamAddress } from '../shared.js';

export const lookupCommand = new Command('lookup')
  .description('Resolve an .i2p or .b32.i2p name (or ME) to its destination')
  .argument('<name>', 'Name to resolve')
  .option('--b32', 'Also print the base32 hostname', false)
  .action(async (name: string, options: { b32: boolean }, command: Command) => {
    const globals = globalOptions(command);

    try {
      const control = await SamControl.connect(resolveSamAddress(globals.sam), buildConfig(globals));
      const address = await control.lookup(name);
      control.close();

      console.log(address);
      if (options.b32 && isValidDestination(address)) {
        console.log(toBase32Address(address));
      }
    } catch (err) {
      fail(`Lookup of ${name} failed`, err);
    }
  });
