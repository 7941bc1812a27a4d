/**
 * Error codes for the SAMv3 client.
 * Every failure surfaced by the library is a SamError carrying one of these.
 */

export enum SamErrorCode {
  /** Generic/unspecified error */
  ERR_UNKNOWN = 1,

  /** Connect, read or write failed on the underlying stream */
  ERR_TRANSPORT = 2,

  /** Bridge closed the connection before a full reply arrived */
  ERR_CONNECTION_CLOSED = 3,

  /** Connect or reply deadline elapsed */
  ERR_TIMEOUT = 4,

  /** Bridge does not speak SAM 3.0 */
  ERR_VERSION_UNSUPPORTED = 5,

  /** Reply to HELLO was not one of the known answers */
  ERR_PROTOCOL = 6,

  /** Reply did not match the expected grammar */
  ERR_PARSE = 7,

  /** Reply exceeded the maximum line length */
  ERR_REPLY_TOO_LARGE = 8,

  /** Session id already in use on the bridge */
  ERR_DUPLICATE_SESSION_ID = 9,

  /** Destination already bound to another session */
  ERR_DUPLICATE_DESTINATION = 10,

  /** Bridge rejected the destination keys */
  ERR_INVALID_KEY = 11,

  /** Bridge reported an I2P error with a message */
  ERR_REMOTE = 12,

  /** Bridge echoed different keys than the ones requested */
  ERR_INTEGRITY = 13,

  /** Naming lookup did not produce an address */
  ERR_NAME_NOT_RESOLVED = 14,

  /** Caller supplied a value that cannot go on the wire */
  ERR_INVALID_ARGUMENT = 15,

  /** Another request is still waiting for its reply */
  ERR_BUSY = 16,

  /** Control object was consumed by session creation */
  ERR_CONSUMED = 17,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: SamErrorCode): string {
  const messages: Record<SamErrorCode, string> = {
    [SamErrorCode.ERR_UNKNOWN]: 'Unknown error',
    [SamErrorCode.ERR_TRANSPORT]: 'Transport error',
    [SamErrorCode.ERR_CONNECTION_CLOSED]: 'Connection closed',
    [SamErrorCode.ERR_TIMEOUT]: 'Operation timed out',
    [SamErrorCode.ERR_VERSION_UNSUPPORTED]: 'That SAM bridge does not support SAMv3',
    [SamErrorCode.ERR_PROTOCOL]: 'Unexpected SAM reply',
    [SamErrorCode.ERR_PARSE]: 'Failed to parse SAM reply',
    [SamErrorCode.ERR_REPLY_TOO_LARGE]: 'SAM reply too large',
    [SamErrorCode.ERR_DUPLICATE_SESSION_ID]: 'Duplicate tunnel name',
    [SamErrorCode.ERR_DUPLICATE_DESTINATION]: 'Duplicate destination',
    [SamErrorCode.ERR_INVALID_KEY]: 'Invalid key',
    [SamErrorCode.ERR_REMOTE]: 'I2P error',
    [SamErrorCode.ERR_INTEGRITY]: 'bridge created a tunnel with different keys than requested',
    [SamErrorCode.ERR_NAME_NOT_RESOLVED]: 'Name could not be resolved',
    [SamErrorCode.ERR_INVALID_ARGUMENT]: 'Invalid argument',
    [SamErrorCode.ERR_BUSY]: 'Control connection is busy',
    [SamErrorCode.ERR_CONSUMED]: 'Control connection was consumed by session creation',
  };
  return messages[code] ?? 'Unknown error';
}

/**
 * Custom error class for SAM errors.
 * `detail` keeps the raw bridge reply (or remote message) where there is one.
 */
export class SamError extends Error {
  constructor(
    public readonly code: SamErrorCode,
    message?: string,
    public readonly detail?: string
  ) {
    super(message ?? getErrorMessage(code));
    this.name = 'SamError';
  }
}

/**
 * Check whether a thrown value is a SamError with the given code
 */
export function isSamError(error: unknown, code?: SamErrorCode): error is SamError {
  return error instanceof SamError && (code === undefined || error.code === code);
}

/**
 * Safely extract error message from any error type.
 */
export function extractErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error == null) {
    return fallback;
  }
  if (error instanceof Error) {
    return error.message || fallback;
  }
  if (typeof error === 'object' && 'message' in error) {
    return String(error.message) || fallback;
  }
  const message = String(error);
  return message || fallback;
}
