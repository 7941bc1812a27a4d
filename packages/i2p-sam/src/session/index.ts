/**
 * Handshake and session negotiation
 */

export { performHandshake } from './handshake.js';
export { validateSessionRequest, negotiateSession } from './negotiator.js';
export type { OptionPreset } from './options.js';
export {
  OPTIONS_DEFAULT,
  OPTIONS_SMALL,
  OPTIONS_MEDIUM,
  OPTIONS_LARGE,
  OPTIONS_FAST,
  OPTION_PRESETS,
  isOptionPreset,
  formatOptions,
} from './options.js';
