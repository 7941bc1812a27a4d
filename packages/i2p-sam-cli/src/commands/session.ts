/**
 * Session command - Create a session and hold it open
 */

import { Command } from 'commander';
import { SamControl, loadKeys, storeKeys } from 'i2p-sam';
import type { I2PKeys, OptionPreset, SessionStyle } from 'i2p-sam';
import {
  buildConfig,
  collect,
  describeDestination,
  fail,
  globalOptions,
  parsePreset,
  parseStyle,
  resolveSamAddress,
  sessionOptions,
} from '../shared.js';

interface SessionCommandOptions {
  keys?: string;
  save?: string;
  style: SessionStyle;
  preset: OptionPreset;
  option: string[];
}

export const sessionCommand = new Command('session')
  .description('Create a session on the bridge and keep it open until Ctrl+C')
  .argument('<id>', 'Session nickname, unique on the bridge')
  .option('-k, --keys <file>', 'Use the destination stored in this keys file')
  .option('--save <file>', 'Store freshly generated keys here')
  .option('-s, --style <style>', 'STREAM, DATAGRAM or RAW', parseStyle, 'STREAM')
  .option('-p, --preset <preset>', 'Tunnel preset: default, small, medium, large or fast', parsePreset, 'default')
  .option('-O, --option <key=value>', 'Extra I2CP option (repeatable)', collect, [])
  .action(async (id: string, options: SessionCommandOptions, command: Command) => {
    const globals = globalOptions(command);
    const config = buildConfig(globals);

    try {
      const control = await SamControl.connect(resolveSamAddress(globals.sam), config);

      let keys: I2PKeys;
      if (options.keys) {
        keys = await loadKeys(options.keys);
      } else {
        keys = await control.generateKeys();
        if (options.save) {
          await storeKeys(options.save, keys);
          console.log(`Keys written to ${options.save}`);
        }
      }

      const session = await control.createSession({
        style: options.style,
        id,
        keys,
        options: sessionOptions(options.preset, options.option),
      });
      control.close();

      console.log(`${session.style} session ${session.id} established`);
      console.log(`Address: ${describeDestination(keys.address)}`);
      console.log('Holding the session open... (Ctrl+C to stop)');

      session.socket.on('data', (data: Buffer) => {
        config.logCallback?.(`Bridge sent ${data.length} bytes on the session connection`);
      });
      session.socket.on('error', (err: Error) => {
        console.error('Session connection error:', err.message);
      });
      session.socket.on('close', () => {
        console.log('Session closed');
        process.exit(0);
      });

      process.once('SIGINT', () => {
        console.log('\nClosing session...');
        session.socket.destroy();
      });
    } catch (err) {
      fail(`Session ${id} failed`, err);
    }
  });
