import { Markup, Telegraf } from "telegraf";
import { parseCommandArgs } from "./commands/args";
import {
  handleBlacklistBoards,
  handleBlacklistOrgs,
  handleWhitelistBoards,
  handleWhitelistOrgs,
} from "./commands/boards";
import { handleHelp } from "./commands/help";
import { handleList } from "./commands/list";
import { handleSet } from "./commands/settings";
import { handleStart, handleUpdate } from "./commands/start";
import { type CommandDeps } from "./commands/types";
import { handleToday, handleUpcoming } from "./commands/upcoming";
import { loadConfig } from "./config";
import { ReconciliationDriver } from "./dues/driver";
import { DueScheduler } from "./dues/scheduler";
import { NodeTimerService } from "./dues/timers";
import { type ChatTransport, type Messenger } from "./telegram/messenger";
import { SecurityGate } from "./telegram/security";
import { createTrelloClient } from "./trello/client";
import { TrelloManager } from "./trello/manager";

const config = loadConfig();

const bot = new Telegraf(config.telegramBotToken);

/**
 * Creates a ChatTransport from the bot instance.
 */
function createChatTransport(): ChatTransport {
  return {
    sendMessage: async (chatId, text, options) => {
      const message = await bot.telegram.sendMessage(chatId, text, {
        parse_mode: "Markdown",
        disable_notification: options?.quiet,
        reply_markup: options?.keyboard
          ? Markup.keyboard(options.keyboard).resize().reply_markup
          : undefined,
      });
      return message.message_id;
    },
    editMessageText: async (chatId, messageId, text) => {
      await bot.telegram.editMessageText(chatId, messageId, undefined, text, {
        parse_mode: "Markdown",
      });
    },
  };
}

const timers = new NodeTimerService();
const trello = new TrelloManager(createTrelloClient(config.trello), config.initialBoards);
const scheduler = new DueScheduler({ source: trello, timers, config: config.scheduler });
const driver = new ReconciliationDriver({ scheduler, timers, config: config.scheduler });
const gate = new SecurityGate(config.authorizedUser, createChatTransport());
const deps: CommandDeps = { driver, trello };

type CommandHandler = (messenger: Messenger, args: string[]) => Promise<void>;

/**
 * Registers a command that only the authorized user can run.
 */
function command(name: string, handler: CommandHandler): void {
  bot.command(name, async (ctx) => {
    console.log(`[Bot] Requested /${name}`);
    const messenger = await gate.check(ctx.chat?.id);
    if (!messenger) {
      return;
    }
    await handler(messenger, parseCommandArgs(ctx.message.text));
  });
}

command("start", (messenger) => handleStart(messenger, deps));
command("update", (messenger) => handleUpdate(messenger, deps));
command("set", (messenger, args) => handleSet(messenger, args, deps));
command("wlb", (messenger, args) => handleWhitelistBoards(messenger, args, deps));
command("blb", (messenger, args) => handleBlacklistBoards(messenger, args, deps));
command("wlo", (messenger, args) => handleWhitelistOrgs(messenger, args, deps));
command("blo", (messenger, args) => handleBlacklistOrgs(messenger, args, deps));
command("ls", (messenger, args) => handleList(messenger, args, deps));
command("upcoming", (messenger) => handleUpcoming(messenger, deps));
command("today", (messenger) => handleToday(messenger, deps));
command("help", (messenger) => handleHelp(messenger));

/**
 * Wraps a promise with a timeout.
 * @param p The promise to wrap
 * @param ms Timeout in milliseconds
 * @param label Description for error message
 */
function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);

    p.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Validates the token, then starts polling. Scheduling begins on /start.
 */
async function main() {
  console.log("Starting bot...");

  console.log("Validating Telegram token...");
  const botInfo = await withTimeout(bot.telegram.getMe(), 15000, "getMe");
  console.log("Token validated...");

  // Polling runs indefinitely: do not await it
  console.log("Launching polling...");
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    console.error("Failed to launch polling:", err);
    console.error("Hint: Check network/proxy/firewall settings. Telegram API may be unreachable.");
    process.exit(1);
  });

  console.log(`Bot started as @${botInfo.username}`);
  if (config.initialBoards.length > 0) {
    console.log(`[Bot] Whitelisted boards from config: ${config.initialBoards.join(", ")}`);
  }
}

/**
 * Catches middleware errors that aren't caught by specific handlers.
 */
bot.catch((err, ctx) => {
  console.error("Telegraf error", err);
  if (ctx && ctx.from) {
    ctx.reply("An error occurred while processing your request.").catch(console.error);
  }
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, stopping...`);
  driver.stop();
  bot.stop(signal);
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

main().catch((err) => {
  console.error("Fatal error during startup:", err);
  process.exit(1);
});
