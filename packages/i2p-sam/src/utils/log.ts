/**
 * Logging hooks.
 * The library never writes to the console; callers route messages through
 * `logCallback` (the CLI sends them to stderr under --verbose).
 */

export interface LogConfig {
  /**
   * Optional callback for logging messages.
   */
  logCallback?: (message: string) => void;
}

/**
 * Log a message using the config callback if provided.
 */
export function log(config: LogConfig, message: string): void {
  if (config.logCallback) {
    config.logCallback(message);
  }
}

/**
 * Reduce a command or reply to its first two words and a byte count.
 * Replies such as `DEST REPLY` carry private keys, which must stay out of logs.
 *
 * Example: "DEST REPLY PUB=abc PRIV=xyz\n" → "DEST REPLY and 18 more bytes"
 */
export function sanitizeForLog(str: string): string {
  const match = str.match(/^\s*(\S+)(?:[ \t]+(\S+))?/);
  if (!match) {
    return `${str.length} bytes`;
  }
  const head = match[2] ? `${match[1]} ${match[2]}` : match[1];
  const remaining = str.length - match[0].length;
  return `${head} and ${remaining} more bytes`;
}
