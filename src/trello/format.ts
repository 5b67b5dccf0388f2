import { type Board, type Card, type Organization } from "./schema";

/**
 * Escapes the characters Telegram's legacy Markdown treats as entity markers.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, "\\$&");
}

/**
 * Markdown link to an organization or a board.
 */
export function formatLink(entity: Organization | Board): string {
  return `[${escapeMarkdown(entity.name)}](${entity.url})`;
}

/**
 * Markdown line for a card, with a checkbox reflecting completion.
 */
export function formatCard(card: Card): string {
  const box = card.dueComplete ? "☑" : "☐";
  return `${box} [${escapeMarkdown(card.name)}](${card.url})`;
}
