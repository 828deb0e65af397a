/** Formats a date as UTC ISO-8601 with second precision, e.g. 2026-03-01T09:15:00Z. */
export function isoSecondsUtc(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
