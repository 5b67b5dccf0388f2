import { DateTime } from "luxon";

// Messages are English whatever the host locale
const LOCALE = "en";

/**
 * Gets the current instant as a zone-aware DateTime (UTC).
 */
export function awareNow(): DateTime {
  return DateTime.utc();
}

/**
 * Seconds from `now` until `due`, negative when due is past.
 */
export function secondsUntil(due: DateTime, now: DateTime): number {
  return due.diff(now).as("seconds");
}

/**
 * Human relative time of `due` seen from `now`, e.g. "in 1 hour", "2 days ago".
 */
export function formatRelative(due: DateTime, now: DateTime): string {
  return due.toRelative({ base: now, locale: LOCALE }) ?? due.toISO() ?? "";
}

export function formatHours(hours: number): string {
  return `${hours} hour${hours === 1 ? "" : "s"}`;
}

/**
 * Formats a due instant in the given zone: weekday, dd/MM HH:mm
 */
export function formatForUser(dt: DateTime, timeZone: string): string {
  return dt.setZone(timeZone).toFormat("ccc dd/MM HH:mm", { locale: LOCALE });
}

/**
 * Whether `dt` falls on the same calendar day as `now` in the given zone.
 */
export function isSameDay(dt: DateTime, now: DateTime, timeZone: string): boolean {
  return dt.setZone(timeZone).hasSame(now.setZone(timeZone), "day");
}
