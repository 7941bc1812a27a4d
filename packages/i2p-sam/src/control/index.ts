/**
 * Control connection
 */

export type { ControlState, ControlEvent, SamControlEvents } from './sam.js';
export { SamControl, DEFAULT_RAW_PROTOCOL } from './sam.js';
