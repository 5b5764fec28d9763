/**
 * Text helpers that count code points, not UTF-16 units
 */

export function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * First `max` code points of text
 */
export function truncateChars(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}
