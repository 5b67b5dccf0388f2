import { type Messenger } from "../telegram/messenger";
import { listBoards } from "./boards";
import { type CommandDeps } from "./types";

/**
 * Handles the /start command.
 * Welcomes the user, lists boards, runs a first scan and starts the repeating jobs.
 */
export async function handleStart(messenger: Messenger, deps: CommandDeps): Promise<void> {
  const { driver } = deps;
  const quiet = driver.quiet;

  await messenger.send(
    "*Welcome!*\nI will keep an eye on the due dates of your boards.",
    { quiet },
  );

  try {
    await listBoards(messenger, deps);
    await driver.update(messenger, false);
    await messenger.send(`Refreshing every ${driver.config.updateIntervalMinutes} mins`, { quiet });
  } finally {
    // A failed first scan is retried by the update job
    driver.scheduleRepeatingUpdates(messenger);
    driver.scheduleRepeatingNotifications(messenger);
  }
}

/**
 * Handles the /update command: an explicit, verbose rescan.
 */
export async function handleUpdate(messenger: Messenger, deps: CommandDeps): Promise<void> {
  console.log("[Bot] Requested rescan");
  await deps.driver.rescan(messenger);
}
