// src/index.ts
// Процесс бота: поллинг, маршрутизация апдейтов, sweeper просроченных секретов.
import TelegramBot from "node-telegram-bot-api";
import { ConfigError, loadBotConfig, type BotConfig } from "./config";
import { closeDb, initDb, waitForDb } from "./db";
import type { App } from "./bot/context";
import { handleInlineQuery } from "./bot/inline";
import { handleReaction, parseReactionUpdate } from "./bot/reactions";
import { handleCallback } from "./router/callback";
import { COMMANDS, handleCommand } from "./router/commands";
import { handleMessage } from "./router/message";
import { JobScheduler } from "./jobs/scheduler";
import { sweepDueShares } from "./jobs/sweeper";
import { FLOW_PRUNE_GRACE_MS, FlowStore } from "./lib/flowSession";
import { ErrorHandler } from "./lib/errorHandler";
import { logger, toError } from "./lib/logger";
import { PgShareRepo } from "./repo/shares";
import { PgUserRepo } from "./repo/users";

// message_reaction приходит только если явно запрошен в allowed_updates
const ALLOWED_UPDATES = ["message", "callback_query", "inline_query", "message_reaction"];

async function bootstrap(config: BotConfig, scheduler: JobScheduler): Promise<TelegramBot> {
  logger.info("Starting bot bootstrap process");
  await waitForDb();
  logger.info("Database connection established");

  const bot = new TelegramBot(config.botToken, {
    polling: { autoStart: false, params: { allowed_updates: ALLOWED_UPDATES } },
  });
  ErrorHandler.initialize(bot, config.ownerId);

  const me = await bot.getMe();
  const username = config.botUsername ?? me.username;
  if (!username) throw new Error("Bot username is unknown: set BOT_USERNAME");
  logger.info(`Bot identity: @${username}`, { action: "bootstrap", userId: me.id });

  const app: App = {
    bot,
    users: new PgUserRepo(),
    shares: new PgShareRepo(),
    flows: new FlowStore(),
    config,
    me: { id: me.id, username },
    now: () => new Date(),
  };

  bot.setMyCommands([...COMMANDS]).catch((error: unknown) => {
    logger.warn("setMyCommands failed", { action: "set_commands_failed", error: toError(error) });
  });

  bot.on("polling_error", (error) => {
    void ErrorHandler.handleBotError(error, "polling_error");
  });

  bot.onText(/^\/\w+/, async (msg) => {
    await handleCommand(app, msg);
  });

  bot.on("message", async (msg) => {
    await handleMessage(app, msg);
  });

  bot.on("callback_query", async (cq) => {
    await handleCallback(app, cq);
  });

  bot.on("inline_query", async (q) => {
    try {
      await handleInlineQuery(app, q);
    } catch (error) {
      await ErrorHandler.handleUserError(error, q.from.id, q.from.id, "inline_query");
    }
  });

  bot.on("message_reaction", async (raw: unknown) => {
    const update = parseReactionUpdate(raw);
    if (!update) return;
    try {
      await handleReaction(app, update);
    } catch (error) {
      await ErrorHandler.handleUserError(error, update.user.id, update.chatId, "message_reaction");
    }
  });

  scheduler.register({
    id: "sweep_expired",
    expression: "* * * * *",
    run: async () => {
      try {
        return await sweepDueShares(app);
      } catch (error) {
        await ErrorHandler.handleDatabaseError(error, "SELECT due shares", "sweep_expired");
        throw error;
      }
    },
  });
  scheduler.register({
    id: "prune_flows",
    expression: "17 * * * *",
    run: async () => {
      const removed = app.flows.prune(FLOW_PRUNE_GRACE_MS);
      if (removed) logger.info(`Pruned ${removed} abandoned flow sessions`, { action: "prune_flows" });
      return removed;
    },
  });
  scheduler.start();

  await bot.startPolling();
  logger.info("Bot polling started successfully");
  return bot;
}

// Запуск с retry логикой
async function startBot(): Promise<void> {
  let config: BotConfig;
  try {
    config = loadBotConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("Invalid configuration", { action: "config_error", problems: error.problems });
      process.exit(1);
    }
    throw error;
  }
  initDb(config.databaseUrl);

  const scheduler = new JobScheduler();
  let bot: TelegramBot | null = null;
  ErrorHandler.registerShutdown(async () => {
    scheduler.stop();
    if (bot) await bot.stopPolling();
    await closeDb();
  });

  const maxRetries = 3;
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      bot = await bootstrap(config, scheduler);
      return;
    } catch (error) {
      scheduler.stop();
      await ErrorHandler.handleBotError(error, "bootstrap");
      if (attempt >= maxRetries) {
        logger.error("All bootstrap attempts failed, exiting", { action: "bootstrap_final_failure", totalAttempts: attempt });
        process.exit(1);
      }
      // Экспоненциальная задержка между попытками
      const delay = Math.min(1000 * Math.pow(2, attempt - 1), 10000);
      logger.info(`Retrying bootstrap in ${delay}ms`, { action: "bootstrap_retry", attempt });
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

startBot().catch((error: unknown) => {
  logger.error("Fatal error", { action: "fatal", error: toError(error) });
  process.exit(1);
});
