/**
 * Type definitions for the SAM client
 */

export type { Endpoint } from './endpoint.js';
export {
  DEFAULT_SAM_ADDRESS,
  parseEndpoint,
  formatEndpoint,
  createEndpoint,
} from './endpoint.js';

export {
  SamErrorCode,
  getErrorMessage,
  SamError,
  isSamError,
  extractErrorMessage,
} from './errors.js';

export type {
  SessionStyle,
  SessionRequest,
  SamSession,
} from './session.js';
export { SESSION_STYLES, isSessionStyle } from './session.js';

export type { SamConfig, ResolvedSamConfig } from './config.js';
export { resolveConfig } from './config.js';
