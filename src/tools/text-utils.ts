/**
 * Text helpers for tool output.
 */

/** Strip ANSI escape sequences from a string. */
export function stripAnsi(s: string): string {
  return s
    .replace(/\u001b\[[0-9;]*[A-Za-z]/g, '')
    .replace(/\u001b\][^\u0007]*\u0007/g, '')
    .replace(/\u001b[()][AB012]/g, '');
}

/**
 * Cap a string at `maxBytes` of UTF-8, noting the total size when cut.
 * The cut may split a multibyte character; the decoder replaces it.
 */
export function truncateBytes(
  s: string,
  maxBytes: number,
  totalBytesHint?: number
): { text: string; truncated: boolean } {
  const b = Buffer.from(s, 'utf8');
  if (b.length <= maxBytes) return { text: s, truncated: false };
  const total = totalBytesHint ?? b.length;
  const cut = b.subarray(0, maxBytes);
  return { text: cut.toString('utf8') + `\n[truncated, ${total} bytes total]`, truncated: true };
}
