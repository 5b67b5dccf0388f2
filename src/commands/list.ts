import { type Messenger } from "../telegram/messenger";
import { escapeMarkdown } from "../trello/format";
import { type Board, type Organization } from "../trello/schema";
import { type CommandDeps } from "./types";

/**
 * Appends one line per entry, blacklisted entries last.
 */
async function appendEntries(
  message: Messenger,
  entries: AsyncIterable<Organization | Board>,
): Promise<void> {
  const later: string[] = [];
  for await (const entry of entries) {
    const line = ` - ${escapeMarkdown(entry.name)}`;
    if (entry.blacklisted) {
      later.push(line);
    } else {
      await message.append(`${line}\n`);
    }
  }
  if (later.length > 0) {
    await message.append("Blacklisted:\n");
    await message.append(later.join("\n"));
  }
}

/**
 * Handles the /ls command.
 * Without arguments lists organizations; with an organization id or name,
 * lists its boards.
 */
export async function handleList(
  messenger: Messenger,
  args: string[],
  deps: CommandDeps,
): Promise<void> {
  const { trello } = deps;

  if (args.length === 0) {
    await messenger.withSpawned("Listing Organizations:\n", (message) =>
      appendEntries(message, trello.fetchOrganizations()),
    );
    return;
  }

  const org = args.length === 1 ? await trello.findOrganization(args[0]) : null;
  if (!org) {
    await messenger.send("Sorry, I cannot list anything else right now.");
    return;
  }

  await messenger.withSpawned(`Listing Boards in org ${escapeMarkdown(args[0])}:\n`, (message) =>
    appendEntries(message, trello.fetchOrganizationBoards(org)),
  );
}
