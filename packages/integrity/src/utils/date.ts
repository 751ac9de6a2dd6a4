/**
 * Timestamps are stored as ISO 8601 strings in UTC, always with
 * milliseconds, so they sort correctly as strings.
 */
export function nowIso(): string {
  return new Date().toISOString();
}
