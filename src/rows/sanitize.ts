/**
 * Makes a free-text value safe to embed in one delimited field: whitespace runs
 * (newlines included) become a single space and quotes are doubled.
 *
 * A quote that is already doubled stays a pair, so applying this twice gives
 * the same result as applying it once.
 */
export function sanitizeField(value: string): string {
  if (!value) return '';

  return value.replace(/\s+/g, ' ').trim().replace(/""|"/g, '""');
}
