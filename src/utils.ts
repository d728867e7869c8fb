/**
 * Helpers for pulling a signal out of free-form model replies.
 */

/**
 * Parse the substring between the first `{` and the last `}` as JSON.
 * Returns undefined when there is no such substring or it is not valid JSON.
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/** First run of digits in the text as an integer, or null if there is none. */
export function extractFirstInteger(text: string): number | null {
  const match = /\d+/.exec(text);
  if (!match) return null;
  const value = parseInt(match[0], 10);
  return Number.isSafeInteger(value) ? value : null;
}

/** Truncate to at most `max` characters, marking the cut. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max)}\n[...truncated...]`;
}
