import {
  NOTIFICATION_INTERVAL_BOUNDS,
  SettingsError,
  UPDATE_INTERVAL_BOUNDS,
  parseNotificationInterval,
  parseUpdateInterval,
} from "../dues/config";
import { type ReconciliationDriver } from "../dues/driver";
import { formatHours } from "../dues/time";
import { type Messenger } from "../telegram/messenger";
import { type CommandDeps } from "./types";

function settingsHelp(driver: ReconciliationDriver): string {
  const { updateIntervalMinutes, notificationIntervalHours } = driver.config;
  const notifications =
    notificationIntervalHours === null ? "off" : `every ${formatHours(notificationIntervalHours)}`;

  return (
    `*Settings help*\n` +
    `/set interval [${UPDATE_INTERVAL_BOUNDS.min}:${UPDATE_INTERVAL_BOUNDS.max}] _update interval in minutes_\n` +
    `/set notifications [${NOTIFICATION_INTERVAL_BOUNDS.min}:${NOTIFICATION_INTERVAL_BOUNDS.max}|off] _past due notifications interval in hours_\n` +
    `/set quiet _make bot quieter_\n` +
    `/set verbose _make bot verbose_\n\n` +
    `*Current*: interval ${updateIntervalMinutes} minutes, ` +
    `notifications ${notifications}, ${driver.quiet ? "quiet" : "verbose"}`
  );
}

/**
 * Handles the /set command.
 * Anything malformed answers with the settings help and changes nothing.
 */
export async function handleSet(
  messenger: Messenger,
  args: string[],
  deps: CommandDeps,
): Promise<void> {
  const { driver } = deps;
  const [setting, value] = args;

  try {
    switch (setting) {
      case "interval": {
        const minutes = parseUpdateInterval(value);
        driver.setUpdateInterval(minutes);
        await messenger.send(`Interval set to ${minutes} minutes`);
        return;
      }
      case "notifications": {
        const hours = parseNotificationInterval(value);
        driver.setNotificationInterval(hours);
        await messenger.send(
          hours === null
            ? "Past due notifications turned off"
            : `Past due notifications every ${formatHours(hours)}`,
        );
        return;
      }
      case "quiet":
        driver.quiet = true;
        await messenger.send("I will be quieter now");
        return;
      case "verbose":
        driver.quiet = false;
        await messenger.send("I will talk a bit more now");
        return;
      default:
        throw new SettingsError(`Unknown setting '${setting ?? ""}'`);
    }
  } catch (e) {
    if (!(e instanceof SettingsError)) {
      throw e;
    }
    console.log(`[Bot] ${e.message}`);
    await messenger.send(settingsHelp(driver));
  }
}
