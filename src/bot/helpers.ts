// src/bot/helpers.ts
// Вспомогательные утилиты бота: ensureUser, роли, sendScreen (один живой экран), безопасное удаление.

import type { InlineKeyboardButton, Message } from "node-telegram-bot-api";
import type { App, BotApi } from "./context";
import type { Role, UserRecord } from "../types";
import { initialRole, isOwner, isPremium, isSudo, roleFlags, type AccessSubject } from "../lib/access";
import { logger, toError } from "../lib/logger";
import { isBlockedError, isDeleteForbidden, isMessageGone } from "../lib/tgErrors";
import { TXT } from "../ui/text";

export type TgUserLike = {
  id: number;
  first_name?: string;
  username?: string;
  is_bot?: boolean;
};

// Создаём пользователя при первом контакте; владелец и sudo из окружения всегда со своей ролью.
export async function ensureUser(app: App, from: TgUserLike): Promise<UserRecord> {
  const role = initialRole(from.id, app.config);
  const flags = roleFlags(role);
  let user = await app.users.upsert({
    userId: from.id,
    firstName: from.first_name ?? null,
    username: from.username ?? null,
    role,
    isPremium: flags.is_premium,
    isSudo: flags.is_sudo,
  });
  const promote = (role === "owner" && user.role !== "owner") || (role === "sudo" && (user.role === "free" || user.role === "premium"));
  if (promote) {
    user = (await setRole(app, user.user_id, role)) ?? user;
  }
  return applyPremiumExpiry(app, user);
}

/** Пользователь из БД с учётом истёкшего премиума */
export async function loadUser(app: App, userId: number): Promise<UserRecord | null> {
  const user = await app.users.get(userId);
  return user ? applyPremiumExpiry(app, user) : null;
}

export async function applyPremiumExpiry(app: App, user: UserRecord): Promise<UserRecord> {
  if (!user.premium_expiry || user.premium_expiry.getTime() > app.now().getTime()) return user;
  logger.info("Premium expired", { action: "premium_expired", userId: user.user_id });
  const patch = user.role === "premium"
    ? { role: "free" as const, is_premium: false, premium_expiry: null }
    : { premium_expiry: null };
  return (await app.users.update(user.user_id, patch)) ?? user;
}

/** Роль и синхронные с ней флаги */
export async function setRole(app: App, userId: number, role: Role, premiumExpiry?: Date | null): Promise<UserRecord | null> {
  return app.users.update(userId, {
    role,
    ...roleFlags(role),
    ...(premiumExpiry !== undefined ? { premium_expiry: premiumExpiry } : {}),
  });
}

export function subjectOf(user: UserRecord): AccessSubject {
  return { userId: user.user_id, user };
}

export function userIsPremium(app: App, user: UserRecord): boolean {
  return isPremium(subjectOf(user), app.config);
}

export function userIsSudo(app: App, user: UserRecord): boolean {
  return isSudo(subjectOf(user), app.config);
}

export function userIsOwner(app: App, user: UserRecord): boolean {
  return isOwner(user.user_id, app.config);
}

export type ScreenOptions = {
  text: string;
  keyboard?: InlineKeyboardButton[][];
};

// Один живой экран: удаляем предыдущий экран бота, шлём новый, запоминаем message_id.
export async function sendScreen(app: App, chatId: number, opts: ScreenOptions): Promise<Message> {
  const user = await app.users.get(chatId);
  const lastId = user?.last_screen_msg_id;
  if (lastId) await safeDelete(app.bot, chatId, lastId);

  // Пустой текст Telegram отклонит с 400
  const text = opts.text.trim() ? opts.text : "—";
  const sent = await app.bot.sendMessage(chatId, text, {
    parse_mode: "HTML",
    disable_web_page_preview: true,
    reply_markup: opts.keyboard ? { inline_keyboard: opts.keyboard } : undefined,
  });

  try {
    await app.users.update(chatId, { last_screen_msg_id: sent.message_id });
  } catch (error) {
    logger.warn("Failed to remember screen message", { action: "screen_store_failed", chatId, error: toError(error) });
  }
  return sent;
}

/** Убрать текущий экран, не показывая новый */
export async function clearScreen(app: App, chatId: number): Promise<void> {
  const user = await app.users.get(chatId);
  if (!user?.last_screen_msg_id) return;
  await safeDelete(app.bot, chatId, user.last_screen_msg_id);
  await app.users.update(chatId, { last_screen_msg_id: null });
}

export type DeleteOutcome = "deleted" | "missing" | "forbidden" | "failed";

export async function safeDelete(bot: Pick<BotApi, "deleteMessage">, chatId: number, messageId: number): Promise<DeleteOutcome> {
  try {
    await bot.deleteMessage(chatId, messageId);
    return "deleted";
  } catch (error) {
    if (isMessageGone(error)) return "missing";
    if (isDeleteForbidden(error) || isBlockedError(error)) return "forbidden";
    logger.warn("Failed to delete message", { action: "delete_message_failed", chatId, messageId, error: toError(error) });
    return "failed";
  }
}

/** Сообщение вне «живого экрана» (уведомления, квитанции). Ошибку логируем, но не пробрасываем. */
export async function notify(
  app: App,
  chatId: number,
  text: string,
  keyboard?: InlineKeyboardButton[][]
): Promise<Message | null> {
  try {
    return await app.bot.sendMessage(chatId, text, {
      parse_mode: "HTML",
      disable_web_page_preview: true,
      reply_markup: keyboard ? { inline_keyboard: keyboard } : undefined,
    });
  } catch (error) {
    logger.warn("Failed to send notification", { action: "notify_failed", chatId, error: toError(error) });
    return null;
  }
}

/** ensureUser + отсечка забаненных (владельца не баним) */
export async function guardUser(app: App, from: TgUserLike, chatId: number): Promise<UserRecord | null> {
  const user = await ensureUser(app, from);
  if (user.banned && !userIsOwner(app, user)) {
    logger.warn("Banned user interaction ignored", { action: "banned_user", userId: user.user_id, chatId });
    await notify(app, chatId, TXT.common.banned(user.ban_reason));
    return null;
  }
  return user;
}
