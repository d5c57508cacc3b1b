// src/bot/menu.ts
// Главное меню, /help, /start с диплинком, экран премиума.

import type { Message } from "node-telegram-bot-api";
import type { App } from "./context";
import { guardUser, notify, sendScreen, userIsPremium, userIsSudo } from "./helpers";
import { openShare, VIEW_LINK_PREFIX } from "./view";
import { Keyboards } from "../ui/keyboards";
import { TXT } from "../ui/text";
import { displayName, mention } from "../lib/html";
import { limitsFor } from "../limits";
import { logger } from "../lib/logger";
import type { UserRecord } from "../types";

export async function showMainMenu(app: App, chatId: number, user: UserRecord): Promise<void> {
  const name = displayName({ first_name: user.first_name, username: user.username, id: user.user_id });
  await sendScreen(app, chatId, {
    text: TXT.menu.main(name, userIsPremium(app, user)),
    keyboard: Keyboards.mainMenu(userIsSudo(app, user)),
  });
}

export async function showHelp(app: App, chatId: number, user: UserRecord): Promise<void> {
  await sendScreen(app, chatId, { text: TXT.menu.help, keyboard: Keyboards.mainMenu(userIsSudo(app, user)) });
}

export async function showPremium(app: App, chatId: number, user: UserRecord): Promise<void> {
  const premium = userIsPremium(app, user);
  await sendScreen(app, chatId, {
    text: TXT.menu.premium(premium, user.premium_expiry, limitsFor(premium), mention(app.config.ownerId, "the owner")),
    keyboard: Keyboards.backToMenu(),
  });
}

/** /start [payload]. viewsecret_<token> открывает секрет. */
export async function handleStart(app: App, msg: Message, payload?: string): Promise<void> {
  if (!msg.from) return;
  const chatId = msg.chat.id;
  const user = await guardUser(app, msg.from, chatId);
  if (!user) return;

  logger.userAction("command_start", user.user_id, chatId, payload ? { payload: payload.slice(0, 20) } : undefined);

  if (payload?.startsWith(VIEW_LINK_PREFIX)) {
    const result = await openShare(app, msg.from, chatId, payload.slice(VIEW_LINK_PREFIX.length));
    if (!result.ok) await notify(app, chatId, result.text);
    return;
  }

  app.flows.clear(user.user_id);
  await showMainMenu(app, chatId, user);
}

export async function handleCancel(app: App, chatId: number, user: UserRecord): Promise<void> {
  const had = app.flows.get(user.user_id) !== null;
  app.flows.clear(user.user_id);
  if (!had) {
    await notify(app, chatId, TXT.common.nothingToCancel);
    return;
  }
  await sendScreen(app, chatId, { text: TXT.common.cancelled, keyboard: Keyboards.mainMenu(userIsSudo(app, user)) });
}
