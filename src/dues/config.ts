type Bounds = { readonly min: number; readonly max: number };

// Minutes
export const UPDATE_INTERVAL_BOUNDS: Bounds = { min: 0.3, max: 60 * 24 };
// Hours
export const NOTIFICATION_INTERVAL_BOUNDS: Bounds = { min: 0.1, max: 24 };
export const PAST_DUE_LIMIT_BOUNDS: Bounds = { min: 1, max: 24 * 7 };
export const DUE_SOON_LIMIT_BOUNDS: Bounds = { min: 0, max: 24 };

/**
 * Settings shared by the reconciliation driver and the due scheduler.
 * The driver owns the instance; `/set` mutates it in place.
 */
export type SchedulerConfig = {
  updateIntervalMinutes: number;
  notificationIntervalHours: number | null; // null when notifications are off
  pastDueNotifLimitHours: number;
  dueSoonNotifLimitHours: number;
  timeZone: string;
};

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = {
  updateIntervalMinutes: 10,
  notificationIntervalHours: 1,
  pastDueNotifLimitHours: 24,
  dueSoonNotifLimitHours: 1,
  timeZone: "Europe/Paris",
};

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

export function clamp(value: number, bounds: Bounds): number {
  return Math.min(Math.max(value, bounds.min), bounds.max);
}

/**
 * Builds a config from partial overrides, clamping every bounded value.
 */
export function createSchedulerConfig(
  overrides: Partial<SchedulerConfig> = {},
): SchedulerConfig {
  const merged = { ...DEFAULT_SCHEDULER_CONFIG, ...overrides };
  return {
    updateIntervalMinutes: clamp(merged.updateIntervalMinutes, UPDATE_INTERVAL_BOUNDS),
    notificationIntervalHours:
      merged.notificationIntervalHours === null
        ? null
        : clamp(merged.notificationIntervalHours, NOTIFICATION_INTERVAL_BOUNDS),
    pastDueNotifLimitHours: clamp(merged.pastDueNotifLimitHours, PAST_DUE_LIMIT_BOUNDS),
    dueSoonNotifLimitHours: clamp(merged.dueSoonNotifLimitHours, DUE_SOON_LIMIT_BOUNDS),
    timeZone: merged.timeZone,
  };
}

function parseNumber(raw: string | undefined, label: string): number {
  const trimmed = raw?.trim() ?? "";
  const value = Number(trimmed);
  if (trimmed === "" || !Number.isFinite(value)) {
    throw new SettingsError(`Invalid ${label}: '${raw ?? ""}'`);
  }
  return value;
}

/**
 * Parses an update interval in minutes, clamped to [0.3, 1440].
 */
export function parseUpdateInterval(raw: string | undefined): number {
  return clamp(parseNumber(raw, "update interval"), UPDATE_INTERVAL_BOUNDS);
}

/**
 * Parses a notification interval in hours, clamped to [0.1, 24].
 * "off" disables the pending notification sweep and yields null.
 */
export function parseNotificationInterval(raw: string | undefined): number | null {
  if (raw?.trim().toLowerCase() === "off") {
    return null;
  }
  return clamp(parseNumber(raw, "notification interval"), NOTIFICATION_INTERVAL_BOUNDS);
}
