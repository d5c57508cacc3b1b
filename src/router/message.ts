// src/router/message.ts
// Текст и медиа вне команд: маршрутизация по текущему шагу диалога.
import type { Message } from "node-telegram-bot-api";
import type { App } from "../bot/context";
import { guardUser, sendScreen, userIsSudo } from "../bot/helpers";
import { handleRecipientInput, handleShareContent } from "../bot/share";
import { handleAdminUserInput, handleBanReason, handleBroadcastContent } from "../bot/admin";
import { showMainMenu } from "../bot/menu";
import { ErrorHandler } from "../lib/errorHandler";
import { logger, toError } from "../lib/logger";
import { Keyboards } from "../ui/keyboards";
import { TXT } from "../ui/text";

export async function handleMessage(app: App, msg: Message): Promise<void> {
  const from = msg.from;
  if (!from || msg.chat.type !== "private") return;
  if (msg.text?.startsWith("/")) return;
  const chatId = msg.chat.id;

  try {
    const user = await guardUser(app, from, chatId);
    if (!user) return;

    const flow = app.flows.lookup(user.user_id);
    if (flow.status === "expired") {
      logger.userAction("flow_timeout", user.user_id, chatId, { kind: flow.session.kind });
      await sendScreen(app, chatId, { text: TXT.common.flowTimeout, keyboard: Keyboards.mainMenu(userIsSudo(app, user)) });
      return;
    }
    if (flow.status === "none") {
      await showMainMenu(app, chatId, user);
      return;
    }

    const session = flow.session;
    switch (session.kind) {
      case "share":
        if (session.step === "share_content") return handleShareContent(app, msg, user, session);
        if (session.step === "share_recipient") return handleRecipientInput(app, msg, user, session);
        // На шагах с кнопками текст не ждём
        return;
      case "admin_user":
        if (!userIsSudo(app, user)) return;
        return handleAdminUserInput(app, msg, user);
      case "admin_ban_reason":
        if (!userIsSudo(app, user)) return;
        return handleBanReason(app, msg, user, session.targetId);
      case "admin_broadcast":
        if (!userIsSudo(app, user)) return;
        return handleBroadcastContent(app, msg, user);
      case "admin_broadcast_confirm":
        return;
    }
  } catch (error) {
    await ErrorHandler.handleUserError(error, from.id, chatId, "message_handler");
    await app.bot.sendMessage(chatId, TXT.common.error).catch((sendError: unknown) => {
      logger.warn("Failed to report error to user", { action: "error_reply_failed", chatId, error: toError(sendError) });
    });
  }
}
