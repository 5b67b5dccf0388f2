import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  FakeCardSource,
  FakeTimerService,
  NOW,
  RecordingNotifier,
  board,
  card,
  countsToRecord,
  fixedClock,
} from "../testing/fakes";
import { createSchedulerConfig } from "./config";
import { DueScheduler, hasDue } from "./scheduler";

function setup() {
  const source = new FakeCardSource();
  const timers = new FakeTimerService();
  const notifier = new RecordingNotifier();
  const scheduler = new DueScheduler({
    source,
    timers,
    config: createSchedulerConfig(),
    clock: fixedClock(),
  });
  source.boards = [board("b1")];
  return { source, timers, notifier, scheduler };
}

describe("DueScheduler", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  describe("updateDue", () => {
    it("ignores a card without due and without record", async () => {
      const { source, scheduler, notifier } = setup();
      source.cards.set("b1", [card("c1", null)]);

      const { counts, scanned } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ ignored: 1 });
      expect([...scanned]).toEqual(["c1"]);
    });

    it("schedules a new card, notifying one hour before its due", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);

      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ scheduled: 1 });
      expect(timers.active).toHaveLength(1);
      expect(timers.active[0].delaySeconds).toBe(2 * 3600);
      expect(scheduler.scheduledDue("c1")?.toMillis()).toBe(NOW.plus({ hours: 3 }).toMillis());
    });

    it("ignores a complete card without record", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }), true)]);

      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ ignored: 1 });
      expect(timers.timers).toHaveLength(0);
    });

    it("unschedules a card whose due was removed", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.updateDue("b1", notifier);

      source.cards.set("b1", [card("c1", null)]);
      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ unscheduled: 1 });
      expect(timers.active).toHaveLength(0);
      expect(scheduler.isScheduled("c1")).toBe(false);
    });

    it("marks a scheduled card completed when its due is checked", async () => {
      const { source, scheduler, timers, notifier } = setup();
      const due = NOW.plus({ hours: 3 });
      source.cards.set("b1", [card("c1", due)]);
      await scheduler.updateDue("b1", notifier);

      source.cards.set("b1", [card("c1", due, true)]);
      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ completed: 1 });
      expect(timers.active).toHaveLength(0);
      expect(scheduler.isScheduled("c1")).toBe(false);
    });

    it("leaves an unchanged card alone", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.updateDue("b1", notifier);

      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ unchanged: 1 });
      expect(timers.timers).toHaveLength(1);
      expect(timers.active).toHaveLength(1);
    });

    it("treats the same instant in another zone as unchanged", async () => {
      const { source, scheduler, notifier } = setup();
      const due = NOW.plus({ hours: 3 });
      source.cards.set("b1", [card("c1", due)]);
      await scheduler.updateDue("b1", notifier);

      source.cards.set("b1", [card("c1", due.setZone("Asia/Tokyo"))]);
      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ unchanged: 1 });
    });

    it("reschedules a card whose due changed", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.updateDue("b1", notifier);

      source.cards.set("b1", [card("c1", NOW.plus({ hours: 5 }))]);
      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ rescheduled: 1 });
      expect(timers.timers[0].cancelled).toBe(true);
      expect(timers.active).toHaveLength(1);
      expect(timers.active[0].delaySeconds).toBe(4 * 3600);
    });

    it("counts a reschedule into the past as rescheduled and drops the record", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.updateDue("b1", notifier);

      source.cards.set("b1", [card("c1", NOW.minus({ hours: 2 }))]);
      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ rescheduled: 1 });
      expect(timers.active).toHaveLength(0);
      expect(scheduler.isScheduled("c1")).toBe(false);
      expect(scheduler.pendingCards().map((c) => c.id)).toEqual(["c1"]);
    });

    it("is idempotent when nothing changes", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [
        card("c1", NOW.plus({ hours: 3 })),
        card("c2", NOW.plus({ days: 2 })),
        card("c3", null),
      ]);

      await scheduler.updateDue("b1", notifier);
      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ unchanged: 2, ignored: 1 });
      expect(timers.timers).toHaveLength(2);
      expect(timers.active).toHaveLength(2);
    });

    it("keeps at most one live timer per card across many changes", async () => {
      const { source, scheduler, timers, notifier } = setup();
      for (const hours of [3, 4, 5, 6]) {
        source.cards.set("b1", [card("c1", NOW.plus({ hours }))]);
        await scheduler.updateDue("b1", notifier);
      }

      expect(timers.timers).toHaveLength(4);
      expect(timers.active).toHaveLength(1);
      expect(timers.active[0].delaySeconds).toBe(5 * 3600);
    });

    it("handles the three-card board", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [
        card("c1", NOW.plus({ hours: 2 })),
        card("c2", NOW.minus({ minutes: 30 })),
        card("c3", NOW.minus({ days: 1 }), true),
      ]);

      const { counts } = await scheduler.updateDue("b1", notifier);

      expect(countsToRecord(counts)).toEqual({ scheduled: 1, ignored: 2 });
      expect(scheduler.pendingCards().map((c) => c.id)).toEqual(["c2"]);
      expect(scheduler.scheduledCards().map((c) => c.id)).toEqual(["c1"]);
      expect(timers.active[0].delaySeconds).toBe(3600);
      expect(notifier.messages).toEqual([]);
    });
  });

  describe("scheduleOrHandleDue", () => {
    it("sends a due soon notice once per due", async () => {
      const { scheduler, timers, notifier } = setup();
      const soon = card("c1", NOW.plus({ minutes: 30 }));
      if (!hasDue(soon)) throw new Error("card without due");

      expect(await scheduler.scheduleOrHandleDue(soon, notifier)).toBe(false);
      expect(await scheduler.scheduleOrHandleDue(soon, notifier)).toBe(false);

      expect(notifier.messages).toEqual([
        "Card is due in less than 1 hour! ☐ [Card c1](https://trello.test/c/c1)",
      ]);
      expect(timers.timers).toHaveLength(0);
    });

    it("sends a new due soon notice when the due moves", async () => {
      const { scheduler, notifier } = setup();
      const first = card("c1", NOW.plus({ minutes: 30 }));
      const second = card("c1", NOW.plus({ minutes: 40 }));
      if (!hasDue(first) || !hasDue(second)) throw new Error("card without due");

      await scheduler.scheduleOrHandleDue(first, notifier);
      await scheduler.scheduleOrHandleDue(second, notifier);

      expect(notifier.messages).toHaveLength(2);
    });

    it("retries a due soon notice that failed to send", async () => {
      const { scheduler } = setup();
      const soon = card("c1", NOW.plus({ minutes: 30 }));
      if (!hasDue(soon)) throw new Error("card without due");
      const send = vi
        .fn<(text: string) => Promise<void>>()
        .mockRejectedValueOnce(new Error("network down"))
        .mockResolvedValue(undefined);

      await scheduler.scheduleOrHandleDue(soon, { send });
      await scheduler.scheduleOrHandleDue(soon, { send });
      await scheduler.scheduleOrHandleDue(soon, { send });

      expect(send).toHaveBeenCalledTimes(2);
    });

    it("sends the due soon notice just inside the window", async () => {
      const { scheduler, timers, notifier } = setup();
      const c = card("c1", NOW.plus({ hours: 1 }).minus({ seconds: 1 }));
      if (!hasDue(c)) throw new Error("card without due");

      expect(await scheduler.scheduleOrHandleDue(c, notifier)).toBe(false);
      expect(notifier.messages).toEqual([
        "Card is due in less than 1 hour! ☐ [Card c1](https://trello.test/c/c1)",
      ]);
      expect(scheduler.isScheduled("c1")).toBe(false);
      expect(timers.timers).toHaveLength(0);
    });

    it("schedules exactly at the due soon boundary", async () => {
      const { scheduler, timers, notifier } = setup();
      const c = card("c1", NOW.plus({ hours: 1 }));
      if (!hasDue(c)) throw new Error("card without due");

      expect(await scheduler.scheduleOrHandleDue(c, notifier)).toBe(true);
      expect(timers.active[0].delaySeconds).toBe(0);
      expect(notifier.messages).toEqual([]);
    });

    it("adds a card just inside the past due window to pending", async () => {
      const { scheduler, notifier } = setup();
      const c = card("c1", NOW.minus({ hours: 24 }).plus({ seconds: 1 }));
      if (!hasDue(c)) throw new Error("card without due");

      expect(await scheduler.scheduleOrHandleDue(c, notifier)).toBe(false);
      expect(scheduler.pendingCards().map((p) => p.id)).toEqual(["c1"]);
    });

    it("ignores a card just outside the past due window", async () => {
      const { scheduler, notifier } = setup();
      const c = card("c1", NOW.minus({ hours: 24 }).minus({ seconds: 1 }));
      if (!hasDue(c)) throw new Error("card without due");

      expect(await scheduler.scheduleOrHandleDue(c, notifier)).toBe(false);
      expect(scheduler.pendingCards()).toEqual([]);
      expect(notifier.messages).toEqual([]);
    });
  });

  describe("cardNotification", () => {
    it("sends the relative due when the timer fires and keeps the record", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.updateDue("b1", notifier);

      await timers.fire(timers.active[0]);

      expect(notifier.messages).toEqual([
        "Card ☐ [Card c1](https://trello.test/c/c1) due in 3 hours",
      ]);
      expect(scheduler.isScheduled("c1")).toBe(true);
    });
  });

  describe("unscheduleDue", () => {
    it("throws for a card without record", () => {
      const { scheduler } = setup();
      expect(() => scheduler.unscheduleDue("missing")).toThrow(
        "No scheduled due for card missing",
      );
    });
  });

  describe("checkDue", () => {
    it("skips blacklisted boards", async () => {
      const { source, scheduler, notifier } = setup();
      source.boards = [board("b1"), board("b2", true)];
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      source.cards.set("b2", [card("c2", NOW.plus({ hours: 3 }))]);

      const counts = await scheduler.checkDue(notifier);

      expect(countsToRecord(counts)).toEqual({ scheduled: 1 });
      expect(source.cardFetches).toBe(1);
      expect(scheduler.isScheduled("c2")).toBe(false);
    });

    it("drops records of cards no longer seen", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.checkDue(notifier);

      source.cards.set("b1", []);
      const counts = await scheduler.checkDue(notifier);

      expect(countsToRecord(counts)).toEqual({ deleted: 1 });
      expect(timers.active).toHaveLength(0);
    });

    it("drops records of boards that got blacklisted", async () => {
      const { source, scheduler, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      await scheduler.checkDue(notifier);

      source.boards = [board("b1", true)];
      const counts = await scheduler.checkDue(notifier);

      expect(countsToRecord(counts)).toEqual({ deleted: 1 });
    });

    it("sums counters across boards", async () => {
      const { source, scheduler, notifier } = setup();
      source.boards = [board("b1"), board("b2")];
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 })), card("c2", null)]);
      source.cards.set("b2", [card("c3", NOW.plus({ hours: 4 }))]);

      const counts = await scheduler.checkDue(notifier);

      expect(countsToRecord(counts)).toEqual({ scheduled: 2, ignored: 1 });
    });

    it("runs passes one after the other", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);

      const [first, second] = await Promise.all([
        scheduler.checkDue(notifier),
        scheduler.checkDue(notifier),
      ]);

      expect(countsToRecord(first)).toEqual({ scheduled: 1 });
      expect(countsToRecord(second)).toEqual({ unchanged: 1 });
      expect(timers.timers).toHaveLength(1);
    });

    it("keeps serving passes after one fails", async () => {
      const { source, scheduler, notifier } = setup();
      const fetchBoards = source.fetchBoards.bind(source);
      source.fetchBoards = async function* () {
        throw new Error("trello down");
      };

      await expect(scheduler.checkDue(notifier)).rejects.toThrow("trello down");

      source.fetchBoards = fetchBoards;
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 }))]);
      expect(countsToRecord(await scheduler.checkDue(notifier))).toEqual({ scheduled: 1 });
    });
  });

  describe("checkNotifications", () => {
    it("notifies pending cards and empties the pending set", async () => {
      const { source, scheduler, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.minus({ hours: 2 }))]);
      await scheduler.checkDue(notifier);

      await scheduler.checkNotifications(notifier);

      expect(notifier.messages).toEqual([
        "Card was due in the last 24 hours! ☐ [Card c1](https://trello.test/c/c1)",
      ]);
      expect(scheduler.pendingCards()).toEqual([]);
    });

    it("keeps the first snapshot of a card already pending", async () => {
      const { source, scheduler, notifier } = setup();
      const due = NOW.minus({ hours: 2 });
      source.cards.set("b1", [card("c1", due)]);
      await scheduler.checkDue(notifier);

      source.cards.set("b1", [{ ...card("c1", due), name: "Renamed" }]);
      const counts = await scheduler.checkDue(notifier);

      expect(countsToRecord(counts)).toEqual({ ignored: 1 });
      expect(scheduler.pendingCards().map((c) => c.name)).toEqual(["Card c1"]);

      await scheduler.checkNotifications(notifier);
      expect(notifier.messages).toEqual([
        "Card was due in the last 24 hours! ☐ [Card c1](https://trello.test/c/c1)",
      ]);
    });

    it("empties the pending set even when sending fails", async () => {
      const { source, scheduler, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.minus({ hours: 2 })), card("c2", NOW.minus({ hours: 3 }))]);
      await scheduler.checkDue(notifier);
      const send = vi.fn<(text: string) => Promise<void>>().mockRejectedValue(new Error("boom"));

      await scheduler.checkNotifications({ send });

      expect(send).toHaveBeenCalledTimes(2);
      expect(scheduler.pendingCards()).toEqual([]);
    });

    it("skips cards that left the window since they became pending", async () => {
      const source = new FakeCardSource();
      source.boards = [board("b1")];
      source.cards.set("b1", [card("c1", NOW.minus({ hours: 23 }))]);
      let now = NOW;
      const scheduler = new DueScheduler({
        source,
        timers: new FakeTimerService(),
        config: createSchedulerConfig(),
        clock: () => now,
      });
      const notifier = new RecordingNotifier();
      await scheduler.checkDue(notifier);

      now = NOW.plus({ hours: 2 });
      await scheduler.checkNotifications(notifier);

      expect(notifier.messages).toEqual([]);
      expect(scheduler.pendingCards()).toEqual([]);
    });
  });

  describe("cancelAll", () => {
    it("cancels every timer", async () => {
      const { source, scheduler, timers, notifier } = setup();
      source.cards.set("b1", [card("c1", NOW.plus({ hours: 3 })), card("c2", NOW.plus({ hours: 4 }))]);
      await scheduler.checkDue(notifier);

      scheduler.cancelAll();

      expect(timers.active).toHaveLength(0);
      expect(scheduler.scheduledCards()).toEqual([]);
    });
  });
});
