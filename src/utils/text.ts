/**
 * @fileoverview Character-safe string helpers.
 *
 * Lengths here count code points, so a cut never splits a surrogate pair.
 */

export function charLength(text: string): number {
  return Array.from(text).length;
}

/** First `limit` code points of `text`. */
export function truncateChars(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return Array.from(text).slice(0, limit).join('');
}
