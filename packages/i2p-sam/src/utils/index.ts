/**
 * Utility exports
 */

export type { LogConfig } from './log.js';
export { log, sanitizeForLog } from './log.js';
