import { IANAZone } from "luxon";
import {
  DEFAULT_SCHEDULER_CONFIG,
  createSchedulerConfig,
  parseNotificationInterval,
  type SchedulerConfig,
} from "./dues/config";
import env from "./env";
import { type TrelloCredentials } from "./trello/client";

export type AppConfig = {
  telegramBotToken: string;
  authorizedUser: number;
  trello: TrelloCredentials;
  // Board ids whitelisted at startup; whitelists live in memory only
  initialBoards: string[];
  scheduler: SchedulerConfig;
};

/**
 * Reads the configuration from environment variables (and .env files).
 */
export function loadConfig(): AppConfig {
  const timeZone = env("TIMEZONE", "string", DEFAULT_SCHEDULER_CONFIG.timeZone);
  if (!IANAZone.isValidZone(timeZone)) {
    throw new Error(`Invalid TIMEZONE '${timeZone}'`);
  }

  const notificationInterval = env(
    "NOTIFICATION_INTERVAL_HOURS",
    "string",
    String(DEFAULT_SCHEDULER_CONFIG.notificationIntervalHours ?? "off"),
  );

  return {
    telegramBotToken: env("TELEGRAM_BOT_TOKEN"),
    authorizedUser: env("AUTHORIZED_USER_ID", "number"),
    trello: {
      apiKey: env("TRELLO_API_KEY"),
      token: env("TRELLO_TOKEN"),
    },
    initialBoards: env("TRELLO_BOARDS", "string", "")
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id !== ""),
    scheduler: createSchedulerConfig({
      updateIntervalMinutes: env(
        "UPDATE_INTERVAL_MINUTES",
        "number",
        DEFAULT_SCHEDULER_CONFIG.updateIntervalMinutes,
      ),
      notificationIntervalHours: parseNotificationInterval(notificationInterval),
      pastDueNotifLimitHours: env(
        "PAST_DUE_NOTIF_LIMIT_HOURS",
        "number",
        DEFAULT_SCHEDULER_CONFIG.pastDueNotifLimitHours,
      ),
      dueSoonNotifLimitHours: env(
        "DUE_SOON_NOTIF_LIMIT_HOURS",
        "number",
        DEFAULT_SCHEDULER_CONFIG.dueSoonNotifLimitHours,
      ),
      timeZone,
    }),
  };
}
