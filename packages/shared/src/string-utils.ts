export const TRUNCATION_MARKER = '... [truncated]';

/**
 * Caps `text` at `maxLen` characters, marking the cut.
 */
export function truncateOutput(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  return text.slice(0, maxLen) + TRUNCATION_MARKER;
}

/**
 * Shortens a label to exactly `maxLen` characters, ending in `...`.
 */
export function truncateName(name: string, maxLen: number): string {
  if (name.length <= maxLen) {
    return name;
  }
  return name.slice(0, Math.max(0, maxLen - 3)) + '...';
}
