// src/lib/errorHandler.ts
// Централизованная обработка ошибок с уведомлением владельца бота

import type TelegramBot from "node-telegram-bot-api";
import { logger, toError } from "./logger";
import { esc } from "./html";

type Notifier = Pick<TelegramBot, "sendMessage">;

export class ErrorHandler {
  private static bot: Notifier | null = null;
  private static ownerChatId: number | null = null;
  private static errorCounts = new Map<string, { count: number; since: number }>();
  private static readonly MAX_ERRORS_PER_MINUTE = 10;
  private static shuttingDown = false;

  static initialize(bot: Notifier, ownerChatId: number | null): void {
    this.bot = bot;
    this.ownerChatId = ownerChatId;
  }

  /** Сброс состояния — для тестов */
  static reset(): void {
    this.bot = null;
    this.ownerChatId = null;
    this.errorCounts.clear();
  }

  static async handleBotError(error: unknown, context: string, userId?: number, chatId?: number): Promise<void> {
    const err = toError(error);
    const errorKey = `${context}:${err.message}`;
    const now = Date.now();

    // Окно в минуту на каждую пару контекст+сообщение
    const entry = this.errorCounts.get(errorKey);
    const current = entry && now - entry.since < 60_000 ? entry : { count: 0, since: now };
    if (current.count >= this.MAX_ERRORS_PER_MINUTE) {
      logger.warn(`Error rate limit exceeded for ${context}`, {
        action: 'error_rate_limit',
        context,
        count: current.count,
      });
      return;
    }
    this.errorCounts.set(errorKey, { count: current.count + 1, since: current.since });

    logger.error(`Bot error in ${context}`, {
      action: 'bot_error',
      context,
      userId,
      chatId,
      error: err,
    });

    if (this.shouldNotifyOwner(err, context)) {
      await this.notifyOwner(err, context, userId, chatId);
    }
  }

  static async handleDatabaseError(error: unknown, query: string, context: string): Promise<void> {
    const err = toError(error);
    logger.error(`Database error in ${context}`, {
      action: 'database_error',
      context,
      query: query.substring(0, 100),
      error: err,
    });
    await this.notifyOwner(err, `database:${context}`, undefined, undefined, query);
  }

  static async handleUserError(error: unknown, userId: number, chatId: number, action: string): Promise<void> {
    const err = toError(error);
    logger.warn(`User error in ${action}`, {
      action: 'user_error',
      userAction: action,
      userId,
      chatId,
      error: err,
    });
    if (this.shouldNotifyOwner(err, action)) {
      await this.notifyOwner(err, action, userId, chatId);
    }
  }

  static shouldNotifyOwner(error: Error, context: string): boolean {
    const criticalPatterns = ['database', 'connection', 'fatal', 'bootstrap', 'migration'];
    return criticalPatterns.some(pattern =>
      context.toLowerCase().includes(pattern) ||
      error.message.toLowerCase().includes(pattern)
    );
  }

  private static async notifyOwner(
    error: Error,
    context: string,
    userId?: number,
    chatId?: number,
    query?: string
  ): Promise<void> {
    if (!this.bot || this.ownerChatId === null) return;

    const details = [`<b>Context:</b> ${esc(context)}`, `<b>Error:</b> ${esc(error.message)}`];
    if (userId) details.push(`<b>User ID:</b> ${userId}`);
    if (chatId) details.push(`<b>Chat ID:</b> ${chatId}`);
    if (query) details.push(`<b>Query:</b> <code>${esc(query.substring(0, 200))}</code>`);

    const lines = [`🚨 <b>Bot Error Alert</b>`, ``, ...details, ``, `<b>Time:</b> ${new Date().toISOString()}`];
    if (error.stack) lines.push(`<code>${esc(error.stack.substring(0, 1000))}</code>`);
    const message = lines.join('\n');

    try {
      await this.bot.sendMessage(this.ownerChatId, message, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
    } catch (notifyError) {
      logger.error('Failed to notify owner', {
        action: 'owner_notification_failed',
        originalError: error.message,
        error: toError(notifyError),
      });
    }
  }

  /** SIGTERM/SIGINT: закрываем ресурсы процесса и выходим */
  static registerShutdown(cleanup: () => Promise<void>): void {
    const handler = (signal: string) => {
      void this.gracefulShutdown(signal, cleanup);
    };
    process.once('SIGTERM', () => handler('SIGTERM'));
    process.once('SIGINT', () => handler('SIGINT'));
  }

  static async gracefulShutdown(signal: string, cleanup: () => Promise<void>): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`);
    try {
      await cleanup();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during graceful shutdown', {
        action: 'graceful_shutdown_error',
        error: toError(error),
      });
      process.exit(1);
    }
  }
}
