/**
 * I2CP and streaming-library options for SESSION CREATE.
 * Each entry is a `key=value` string and goes on the wire as `OPTION=key=value`.
 */

/** Router defaults */
export const OPTIONS_DEFAULT: readonly string[] = [];

/** Few tunnels: light traffic such as IRC or chat */
export const OPTIONS_SMALL: readonly string[] = [
  'inbound.length=3',
  'outbound.length=3',
  'inbound.quantity=1',
  'outbound.quantity=1',
  'inbound.backupQuantity=0',
  'outbound.backupQuantity=0',
];

/** General purpose web browsing or hosting */
export const OPTIONS_MEDIUM: readonly string[] = [
  'inbound.length=3',
  'outbound.length=3',
  'inbound.quantity=2',
  'outbound.quantity=2',
  'inbound.backupQuantity=1',
  'outbound.backupQuantity=1',
];

/** Busy services that serve many peers */
export const OPTIONS_LARGE: readonly string[] = [
  'inbound.length=3',
  'outbound.length=3',
  'inbound.quantity=4',
  'outbound.quantity=4',
  'inbound.backupQuantity=1',
  'outbound.backupQuantity=1',
];

/** Lower latency at the cost of anonymity: two-hop tunnels */
export const OPTIONS_FAST: readonly string[] = [
  'inbound.length=2',
  'outbound.length=2',
  'inbound.quantity=3',
  'outbound.quantity=3',
  'inbound.backupQuantity=1',
  'outbound.backupQuantity=1',
];

export type OptionPreset = 'default' | 'small' | 'medium' | 'large' | 'fast';

export const OPTION_PRESETS: Readonly<Record<OptionPreset, readonly string[]>> = {
  default: OPTIONS_DEFAULT,
  small: OPTIONS_SMALL,
  medium: OPTIONS_MEDIUM,
  large: OPTIONS_LARGE,
  fast: OPTIONS_FAST,
};

export function isOptionPreset(value: string): value is OptionPreset {
  return Object.prototype.hasOwnProperty.call(OPTION_PRESETS, value);
}

/**
 * Turn `{ 'inbound.length': 2 }` into `['inbound.length=2']`, in insertion order
 */
export function formatOptions(options: Readonly<Record<string, string | number | boolean>>): string[] {
  return Object.entries(options).map(([key, value]) => `${key}=${String(value)}`);
}
