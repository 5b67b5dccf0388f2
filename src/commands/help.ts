import { type Messenger } from "../telegram/messenger";

/**
 * Handles the /help command.
 * Lists all available slash commands and their descriptions.
 */
export async function handleHelp(messenger: Messenger) {
  const helpMessage = `*Available commands*

/start - Start tracking due dates
/update - Rescan boards now
/upcoming - Show tracked dues
/today - Show cards due today
/ls - List organizations, or boards of an organization
/wlb - Whitelist boards (no ids: list boards)
/blb - Blacklist boards (no ids: list boards)
/wlo - Whitelist organizations
/blo - Blacklist organizations
/set - Change settings
/help - Show this list of commands`;

  await messenger.send(helpMessage, {
    keyboard: [
      ["/update", "/upcoming", "/today"],
      ["/wlb", "/set", "/help"],
    ],
  });
}
