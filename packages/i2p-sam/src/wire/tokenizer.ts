/**
 * Whitespace tokenizer for SAM replies.
 */

/**
 * Split a reply into whitespace-delimited tokens, dropping empty ones.
 */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Strip a fixed header from a reply.
 * Returns null unless the reply is strictly longer than the header and starts with it.
 */
export function stripHeader(reply: string, header: string): string | null {
  if (reply.length <= header.length || !reply.startsWith(header)) {
    return null;
  }
  return reply.slice(header.length);
}

/**
 * Value of a `KEY=value` token, or null when the token carries another key.
 */
export function tokenValue(token: string, key: string): string | null {
  const prefix = `${key}=`;
  return token.startsWith(prefix) ? token.slice(prefix.length) : null;
}
