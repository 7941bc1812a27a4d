#!/usr/bin/env tsx
/**
 * i2p-sam CLI
 */

import { Command } from 'commander';
import { helloCommand } from './commands/hello.js';
import { keysCommand } from './commands/keys.js';
import { lookupCommand } from './commands/lookup.js';
import { sessionCommand } from './commands/session.js';

const program = new Command();

program
  .name('i2p-sam')
  .description('Talk to the SAMv3 bridge of a local I2P router')
  .version('0.1.0')
  .option('--sam <address>', 'SAM bridge host:port (default: $SAM_ADDRESS or 127.0.0.1:7656)')
  .option('-v, --verbose', 'Log protocol traffic to stderr', false);

program.addCommand(helloCommand);
program.addCommand(keysCommand);
program.addCommand(lookupCommand);
program.addCommand(sessionCommand);

await program.parseAsync();
