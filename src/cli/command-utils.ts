/**
 * Token helpers for slash-command arguments.
 */

const WHITESPACE = /\s+/;

export function splitTokens(input: string): string[] {
  const normalized = input.trim();
  return normalized ? normalized.split(WHITESPACE).filter(Boolean) : [];
}

/** First token, lowercased; '' when there is none. */
export function firstToken(input: string): string {
  return splitTokens(input)[0]?.toLowerCase() ?? '';
}

/** Everything after the first token, with its original spacing. */
export function restOf(input: string): string {
  return input.trim().replace(/^\S+\s*/, '');
}

/** Show only the last four characters of a secret. */
export function maskSecret(secret: string): string {
  if (secret.length <= 4) return '****';
  return `****${secret.slice(-4)}`;
}
