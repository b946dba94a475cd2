/**
 * Trim whitespace and collapse runs (including NBSP and other Unicode
 * spaces) to a single space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function emptyToNull(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null;
  const normalized = normalizeWhitespace(text);
  return normalized.length > 0 ? normalized : null;
}

const NORWEGIAN_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

/**
 * Convert a site-reported date to an ISO-8601 UTC string.
 * Accepts ISO strings, RFC 2822 dates and `dd.mm.yyyy`.
 * Returns null when the value cannot be read as a date.
 */
export function normalizeTimestamp(value: string | null | undefined): string | null {
  const text = emptyToNull(value);
  if (!text) return null;

  const dotted = text.match(NORWEGIAN_DATE);
  if (dotted) {
    const [, day, month, year] = dotted;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    const valid =
      date.getUTCFullYear() === Number(year) && date.getUTCMonth() === Number(month) - 1 && date.getUTCDate() === Number(day);
    return valid ? date.toISOString() : null;
  }

  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}
