import { DateTime } from "luxon";

/**
 * Parse an event timestamp into an absolute Date.
 * Strings carrying an offset/zone keep it; bare strings are read as UTC.
 * Returns null when the input is not a usable timestamp.
 */
export function toUtc(input: string | Date | undefined | null): Date | null {
  if (input === undefined || input === null) return null;

  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? null : input;
  }

  const trimmed = input.trim();
  if (!trimmed) return null;

  let dt = DateTime.fromISO(trimmed, { zone: "utc", setZone: true });
  if (!dt.isValid) dt = DateTime.fromSQL(trimmed, { zone: "utc", setZone: true });
  if (!dt.isValid) return null;

  return dt.toUTC().toJSDate();
}

export function toIsoUtc(date: Date): string {
  return DateTime.fromJSDate(date, { zone: "utc" }).toISO() ?? date.toISOString();
}
