import { type DateTime } from "luxon";
import { formatCard } from "../trello/format";
import { type Card } from "../trello/schema";
import { type SchedulerConfig } from "./config";
import { formatReport, increment, mergeCounts, type DueCounts } from "./counters";
import { awareNow, formatHours, formatRelative, secondsUntil } from "./time";
import {
  type CardSource,
  type Notifier,
  type TimerHandle,
  type TimerService,
} from "./types";

/**
 * A card whose due date is set
 */
export type DueCard = Card & { readonly due: DateTime };

export function hasDue(card: Card): card is DueCard {
  return card.due !== null;
}

// One entry per card with an outstanding (or fired, not yet reconciled) timer
type ScheduledDue = {
  due: DateTime;
  handle: TimerHandle;
  card: DueCard;
};

export type BoardUpdate = {
  counts: DueCounts;
  scanned: Set<string>;
};

export type DueSchedulerOptions = {
  source: CardSource;
  timers: TimerService;
  config: SchedulerConfig;
  clock?: () => DateTime;
};

/**
 * Keeps due-date reminders in sync with the cards of the tracked boards.
 *
 * Each reconciliation pass compares the cards currently on Trello with the
 * timers scheduled so far: new dues get a timer (or an immediate notice),
 * changed dues are rescheduled, and completed or vanished cards lose their
 * timer. Cards that were due recently wait in a pending set until the next
 * notification sweep.
 */
export class DueScheduler {
  private readonly dues = new Map<string, ScheduledDue>();
  private readonly pending = new Map<string, DueCard>();
  // Card id -> due millis for which a "due soon" notice went out
  private readonly dueSoonNotified = new Map<string, number>();
  // Serializes full passes and sweeps
  private queue: Promise<unknown> = Promise.resolve();

  private readonly source: CardSource;
  private readonly timers: TimerService;
  private readonly config: SchedulerConfig;
  private readonly clock: () => DateTime;

  constructor(options: DueSchedulerOptions) {
    this.source = options.source;
    this.timers = options.timers;
    this.config = options.config;
    this.clock = options.clock ?? awareNow;
  }

  now(): DateTime {
    return this.clock();
  }

  isScheduled(cardId: string): boolean {
    return this.dues.has(cardId);
  }

  scheduledDue(cardId: string): DateTime | null {
    return this.dues.get(cardId)?.due ?? null;
  }

  scheduledCards(): DueCard[] {
    return [...this.dues.values()].map((entry) => entry.card);
  }

  pendingCards(): DueCard[] {
    return [...this.pending.values()];
  }

  /**
   * Decides what to do with a card having a due date.
   * Returns true only when a timer was actually registered.
   */
  async scheduleOrHandleDue(card: DueCard, notifier: Notifier): Promise<boolean> {
    if (card.dueComplete) {
      return false;
    }

    const pastDueWindow = this.config.pastDueNotifLimitHours * 3600;
    const dueSoonWindow = this.config.dueSoonNotifLimitHours * 3600;
    let delay = secondsUntil(card.due, this.clock());

    if (delay < 0) {
      if (-delay < pastDueWindow) {
        console.log(`[Scheduler] Pending card with recently past due ${card.id}`);
        if (!this.pending.has(card.id)) {
          this.pending.set(card.id, card);
        }
      } else {
        console.log(`[Scheduler] Ignoring card with far past due ${card.id}`);
      }
      return false;
    }

    // Notify some time *before* the actual due date
    delay -= dueSoonWindow;
    if (delay < 0) {
      await this.notifyDueSoon(card, notifier);
      return false;
    }

    if (this.dues.has(card.id)) {
      this.unscheduleDue(card.id);
    }
    const handle = this.timers.runOnce(() => this.cardNotification(notifier, card), delay);
    this.dues.set(card.id, { due: card.due, handle, card });
    console.log(
      `[Scheduler] Scheduled ${card.id} in ${Math.round(delay / 60)} minutes`,
    );
    return true;
  }

  /**
   * Fired by the timer service when a scheduled delay elapses.
   * The record stays in place until the next reconciliation.
   */
  async cardNotification(notifier: Notifier, card: DueCard): Promise<void> {
    const when = formatRelative(card.due, this.clock());
    await this.notify(notifier, `Card ${formatCard(card)} due ${when}`);
  }

  /**
   * Cancels the timer of a scheduled card and forgets it.
   * Throws if the card has no record: that would break the one-timer-per-card invariant.
   */
  unscheduleDue(cardId: string): void {
    const entry = this.dues.get(cardId);
    if (!entry) {
      throw new Error(`No scheduled due for card ${cardId}`);
    }
    entry.handle.cancel();
    this.dues.delete(cardId);
  }

  /**
   * Reconciles the scheduled dues with the current cards of one board.
   */
  async updateDue(boardId: string, notifier: Notifier): Promise<BoardUpdate> {
    const counts: DueCounts = new Map();
    const scanned = new Set<string>();

    for await (const card of this.source.fetchCards(boardId)) {
      scanned.add(card.id);
      const scheduled = this.dues.get(card.id);

      if (!hasDue(card)) {
        if (!scheduled) {
          increment(counts, "ignored");
        } else {
          // Due was recorded, but removed
          this.unscheduleDue(card.id);
          increment(counts, "unscheduled");
        }
        continue;
      }

      if (!scheduled) {
        if (card.dueComplete) {
          increment(counts, "ignored");
        } else if (await this.scheduleOrHandleDue(card, notifier)) {
          increment(counts, "scheduled");
        } else {
          // Past due, or notified immediately
          increment(counts, "ignored");
        }
        continue;
      }

      if (scheduled.due.toMillis() === card.due.toMillis()) {
        if (card.dueComplete) {
          this.unscheduleDue(card.id);
          increment(counts, "completed");
        } else {
          increment(counts, "unchanged");
        }
      } else {
        this.unscheduleDue(card.id);
        await this.scheduleOrHandleDue(card, notifier);
        increment(counts, "rescheduled");
      }
    }

    return { counts, scanned };
  }

  /**
   * Full reconciliation over every non-blacklisted board.
   * Records of cards no longer seen on any tracked board are dropped as "deleted".
   */
  checkDue(notifier: Notifier): Promise<DueCounts> {
    return this.serialize(async () => {
      const counts: DueCounts = new Map();
      const scanned = new Set<string>();

      for await (const board of this.source.fetchBoards()) {
        if (board.blacklisted) {
          continue;
        }
        const result = await this.updateDue(board.id, notifier);
        mergeCounts(counts, result.counts);
        for (const cardId of result.scanned) {
          scanned.add(cardId);
        }
      }

      for (const cardId of [...this.dues.keys()]) {
        if (!scanned.has(cardId)) {
          this.unscheduleDue(cardId);
          increment(counts, "deleted");
        }
      }
      for (const cardId of [...this.dueSoonNotified.keys()]) {
        if (!scanned.has(cardId)) {
          this.dueSoonNotified.delete(cardId);
        }
      }

      console.log(`[Scheduler] Reconciliation done: ${formatReport(counts) || "no cards"}`);
      return counts;
    });
  }

  /**
   * Sends the deferred "recently past due" messages, then empties the pending set
   * whatever happened to each message.
   */
  checkNotifications(notifier: Notifier): Promise<void> {
    return this.serialize(async () => {
      const now = this.clock();
      const limitHours = this.config.pastDueNotifLimitHours;
      const cards = [...this.pending.values()];

      try {
        for (const card of cards) {
          if (card.dueComplete) {
            continue;
          }
          const delay = secondsUntil(card.due, now);
          if (delay < 0 && -delay < limitHours * 3600) {
            await this.notify(
              notifier,
              `Card was due in the last ${formatHours(limitHours)}! ${formatCard(card)}`,
            );
          }
        }
      } finally {
        this.pending.clear();
      }

      console.log(`[Scheduler] Notification sweep done (${cards.length} pending cards)`);
    });
  }

  /**
   * Cancels every timer and forgets all state.
   */
  cancelAll(): void {
    for (const cardId of [...this.dues.keys()]) {
      this.unscheduleDue(cardId);
    }
    this.pending.clear();
    this.dueSoonNotified.clear();
  }

  private async notifyDueSoon(card: DueCard, notifier: Notifier): Promise<void> {
    const dueMs = card.due.toMillis();
    if (this.dueSoonNotified.get(card.id) === dueMs) {
      console.log(`[Scheduler] Due soon notice already sent for ${card.id}`);
      return;
    }

    const window = formatHours(this.config.dueSoonNotifLimitHours);
    const sent = await this.notify(
      notifier,
      `Card is due in less than ${window}! ${formatCard(card)}`,
    );
    if (sent) {
      this.dueSoonNotified.set(card.id, dueMs);
    }
  }

  private async notify(notifier: Notifier, text: string): Promise<boolean> {
    try {
      await notifier.send(text);
      return true;
    } catch (e) {
      console.error(`[Scheduler] Failed to send notification: ${e}`);
      return false;
    }
  }

  private serialize<T>(job: () => Promise<T>): Promise<T> {
    const run = this.queue.then(job);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
