/**
 * Option handling shared by every command
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  DEFAULT_SAM_ADDRESS,
  OPTION_PRESETS,
  extractErrorMessage,
  isOptionPreset,
  isSessionStyle,
  isValidDestination,
  toBase32Address,
} from 'i2p-sam';
import type { OptionPreset, SamConfig, SessionStyle } from 'i2p-sam';

export interface GlobalOptions {
  sam?: string;
  verbose: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  const { sam, verbose } = command.optsWithGlobals();
  return {
    sam: typeof sam === 'string' ? sam : undefined,
    verbose: verbose === true,
  };
}

/**
 * --sam wins, then SAM_ADDRESS, then the router default
 */
export function resolveSamAddress(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return flag ?? env.SAM_ADDRESS ?? DEFAULT_SAM_ADDRESS;
}

export function buildConfig(options: GlobalOptions): SamConfig {
  if (!options.verbose) {
    return {};
  }
  return {
    logCallback: (message: string) => console.error(`[sam] ${message}`),
  };
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseStyle(value: string): SessionStyle {
  const style = value.toUpperCase();
  if (!isSessionStyle(style)) {
    throw new InvalidArgumentError('Expected STREAM, DATAGRAM or RAW.');
  }
  return style;
}

export function parsePreset(value: string): OptionPreset {
  const preset = value.toLowerCase();
  if (!isOptionPreset(preset)) {
    throw new InvalidArgumentError(`Expected one of: ${Object.keys(OPTION_PRESETS).join(', ')}.`);
  }
  return preset;
}

/**
 * Preset options first, then --option values; the bridge applies the last one it sees
 */
export function sessionOptions(preset: OptionPreset, extra: readonly string[]): string[] {
  return [...OPTION_PRESETS[preset], ...extra];
}

/** b32 hostname when the destination decodes, the raw text otherwise */
export function describeDestination(address: string): string {
  return isValidDestination(address) ? toBase32Address(address) : address;
}

export function fail(context: string, err: unknown): never {
  console.error(`${context}: ${extractErrorMessage(err)}`);
  process.exit(1);
}
