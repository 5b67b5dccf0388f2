import { type Board, type Card } from "../trello/schema";

/**
 * A pending one-shot callback that can be cancelled.
 */
export interface TimerHandle {
  cancel(): void;
}

/**
 * Runs callbacks after a delay on the event loop.
 */
export interface TimerService {
  runOnce(callback: () => void | Promise<void>, delaySeconds: number): TimerHandle;
}

/**
 * Where due notifications go. Abstracts away Telegram-specific details.
 */
export interface Notifier {
  send(text: string): Promise<unknown>;
}

/**
 * Read-only view of the task-tracking service used by reconciliation.
 */
export interface CardSource {
  fetchBoards(org?: string): AsyncIterable<Board>;
  fetchCards(boardId: string): AsyncIterable<Card>;
}
