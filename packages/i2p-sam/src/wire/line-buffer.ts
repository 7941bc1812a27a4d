/**
 * Newline framing for SAM replies.
 * Every SAM reply is a single line; bytes may arrive split across reads or
 * several lines may arrive in one read.
 */

/** Longest reply accepted before its newline (DEST REPLY with large keys fits) */
export const MAX_REPLY_SIZE = 16 * 1024;

const NEWLINE = 0x0a;

/**
 * Buffer for accumulating incoming data and cutting it into lines
 */
export class LineBuffer {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Append data to the buffer
   */
  append(data: Uint8Array): void {
    this.buffer = Buffer.concat([this.buffer, data]);
  }

  /**
   * Take one complete line (newline included) off the front of the buffer.
   * Returns null if no newline has arrived yet.
   */
  readLine(): string | null {
    const index = this.buffer.indexOf(NEWLINE);
    if (index === -1) {
      return null;
    }

    const line = this.buffer.subarray(0, index + 1).toString('utf8');
    this.buffer = this.buffer.subarray(index + 1);
    return line;
  }

  /**
   * True once the pending bytes exceed `limit` without a newline
   */
  overflows(limit: number = MAX_REPLY_SIZE): boolean {
    return this.buffer.indexOf(NEWLINE) === -1 && this.buffer.length > limit;
  }

  /**
   * Remove and return whatever is left in the buffer
   */
  drain(): Buffer {
    const rest = this.buffer;
    this.buffer = Buffer.alloc(0);
    return rest;
  }

  /**
   * Get the current buffer size
   */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Clear the buffer
   */
  clear(): void {
    this.buffer = Buffer.alloc(0);
  }
}
