/**
 * Hello command - Check that a SAM 3.0 bridge answers
 */

import { Command } from 'commander';
import { SamControl, formatEndpoint } from 'i2p-sam';
import { buildConfig, fail, globalOptions, resolveSamAddress } from '../shared.js';

export const helloCommand = new Command('hello')
  .description('Connect to the SAM bridge and negotiate protocol version 3.0')
  .action(async (_options: object, command: Command) => {
    const globals = globalOptions(command);
    const address = resolveSamAddress(globals.sam);

    try {
      const control = await SamControl.connect(address, buildConfig(globals));
      console.log(`SAM 3.0 bridge answering at ${formatEndpoint(control.endpoint)}`);
      control.close();
    } catch (err) {
      fail(`Handshake with ${address} failed`, err);
    }
  });
