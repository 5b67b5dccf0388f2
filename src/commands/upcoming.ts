import { type DueCard } from "../dues/scheduler";
import { formatForUser, isSameDay } from "../dues/time";
import { type Messenger } from "../telegram/messenger";
import { formatCard } from "../trello/format";
import { type CommandDeps } from "./types";

function byDue(a: DueCard, b: DueCard): number {
  return a.due.toMillis() - b.due.toMillis();
}

function trackedCards(deps: CommandDeps): DueCard[] {
  const { scheduler } = deps.driver;
  const scheduled = scheduler.scheduledCards();
  const ids = new Set(scheduled.map((card) => card.id));
  const pending = scheduler.pendingCards().filter((card) => !ids.has(card.id));
  return [...scheduled, ...pending].sort(byDue);
}

/**
 * Handles the /upcoming command.
 * Shows tracked cards, past dues in a separate message.
 */
export async function handleUpcoming(messenger: Messenger, deps: CommandDeps): Promise<void> {
  const { scheduler, config } = deps.driver;
  const cards = trackedCards(deps);

  if (cards.length === 0) {
    await messenger.send("No due dates tracked. Did you /start?");
    return;
  }

  const nowMs = scheduler.now().toMillis();
  const line = (card: DueCard) =>
    `\n - ${formatCard(card)} ${formatForUser(card.due, config.timeZone)}`;
  const past = cards.filter((card) => card.due.toMillis() < nowMs).map(line);
  const future = cards.filter((card) => card.due.toMillis() >= nowMs).map(line);

  await messenger.send(`*Past dues*:${past.join("")}`);
  await messenger.send(`*Dues*:${future.join("")}`);
}

/**
 * Handles the /today command.
 * Shows tracked cards due on the current day.
 */
export async function handleToday(messenger: Messenger, deps: CommandDeps): Promise<void> {
  const { scheduler, config } = deps.driver;
  const now = scheduler.now();
  const lines = trackedCards(deps)
    .filter((card) => isSameDay(card.due, now, config.timeZone))
    .map((card) => `\n - ${formatCard(card)} ${card.due.setZone(config.timeZone).toFormat("HH:mm")}`);

  await messenger.send(`*Due today*${lines.join("")}`);
}
