import { type Messenger } from "../telegram/messenger";
import { formatLink } from "../trello/format";
import { type CommandDeps } from "./types";

/**
 * Sends three messages (allowed boards, not allowed boards, status)
 * and fills them while boards are fetched.
 */
export async function listBoards(messenger: Messenger, deps: CommandDeps): Promise<void> {
  const quiet = deps.driver.quiet;
  const allowed = await messenger.spawn("*Allowed boards*", { quiet });
  const denied = await messenger.spawn("*Not allowed boards*", { quiet });
  const status = await messenger.spawn("*Status*: fetching data", { quiet });

  try {
    for await (const board of deps.trello.fetchBoards()) {
      const target = board.blacklisted ? denied : allowed;
      await target.append(`\n - ${formatLink(board)} ${board.id}`);
    }
    await status.override("*Status*: Done.");
  } finally {
    await allowed.flush();
    await denied.flush();
    await status.flush();
  }
}

/**
 * Handles /wlb: whitelists the given board ids, or lists boards when none is given.
 */
export async function handleWhitelistBoards(
  messenger: Messenger,
  args: string[],
  deps: CommandDeps,
): Promise<void> {
  if (args.length === 0) {
    await listBoards(messenger, deps);
    return;
  }

  for (const boardId of args) {
    deps.trello.whitelistBoard(boardId);
  }
  await messenger.send("Boards whitelisted successfully.");
  await deps.driver.update(messenger, true);
}

/**
 * Handles /blb: blacklists the given board ids, or lists boards when none is given.
 */
export async function handleBlacklistBoards(
  messenger: Messenger,
  args: string[],
  deps: CommandDeps,
): Promise<void> {
  if (args.length === 0) {
    await listBoards(messenger, deps);
    return;
  }

  for (const boardId of args) {
    deps.trello.blacklistBoard(boardId);
  }
  await messenger.send("Boards blacklisted successfully.");
  await deps.driver.update(messenger, true);
}

/**
 * Handles /wlo: whitelists the given organization ids.
 */
export async function handleWhitelistOrgs(
  messenger: Messenger,
  args: string[],
  deps: CommandDeps,
): Promise<void> {
  if (args.length === 0) {
    await messenger.send("Usage: /wlo <organization id> [...]");
    return;
  }

  for (const orgId of args) {
    deps.trello.whitelistOrg(orgId);
  }
  await messenger.send("Organizations whitelisted successfully.");
}

/**
 * Handles /blo: blacklists the given organization ids.
 */
export async function handleBlacklistOrgs(
  messenger: Messenger,
  args: string[],
  deps: CommandDeps,
): Promise<void> {
  if (args.length === 0) {
    await messenger.send("Usage: /blo <organization id> [...]");
    return;
  }

  for (const orgId of args) {
    deps.trello.blacklistOrg(orgId);
  }
  await messenger.send("Organizations blacklisted successfully.");
}
