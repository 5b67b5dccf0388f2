export type DueOutcome =
  | "ignored"
  | "scheduled"
  | "unscheduled"
  | "completed"
  | "unchanged"
  | "rescheduled"
  | "deleted";

/**
 * Outcome counters of a reconciliation pass, in first-seen order.
 */
export type DueCounts = Map<DueOutcome, number>;

export function increment(counts: DueCounts, outcome: DueOutcome, by = 1): void {
  counts.set(outcome, (counts.get(outcome) ?? 0) + by);
}

export function mergeCounts(target: DueCounts, source: DueCounts): void {
  for (const [outcome, count] of source) {
    increment(target, outcome, count);
  }
}

/**
 * e.g. "2 cards scheduled, 1 cards ignored"
 */
export function formatReport(counts: DueCounts): string {
  return [...counts].map(([outcome, count]) => `${count} cards ${outcome}`).join(", ");
}
