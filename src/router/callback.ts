// src/router/callback.ts
// Нажатия inline-кнопок: разбор callback_data и маршрутизация по префиксу.
import type { CallbackQuery } from "node-telegram-bot-api";
import type { App } from "../bot/context";
import { guardUser, subjectOf } from "../bot/helpers";
import { handleCancel, showHelp, showMainMenu, showPremium } from "../bot/menu";
import {
  cancelShare,
  chooseRecipientType,
  chooseTtl,
  chooseViews,
  confirmShare,
  protectionDone,
  startShare,
  toggleProtection,
  type ShareFlowResult,
} from "../bot/share";
import { openShare } from "../bot/view";
import { revokeShare, showMySecrets, showSecretDetail } from "../bot/secrets";
import { showSettings, toggleSetting } from "../bot/settings";
import {
  adminAction,
  askBroadcast,
  askManageUser,
  confirmBroadcast,
  parseAdminAction,
  showAdminPanel,
  showStats,
} from "../bot/admin";
import { checkAccess } from "../lib/access";
import { ErrorHandler } from "../lib/errorHandler";
import { logger, toError } from "../lib/logger";
import { parseCb } from "../ui/cb";
import { TXT } from "../ui/text";
import { CB } from "../types";

async function ack(app: App, id: string, text?: string, alert = false): Promise<void> {
  try {
    await app.bot.answerCallbackQuery(id, text ? { text, show_alert: alert } : undefined);
  } catch (error) {
    // Запрос мог устареть (>15 сек), это не ошибка обработчика
    logger.debug("answerCallbackQuery failed", { action: "callback_ack_failed", error: toError(error) });
  }
}

function pageOf(raw: string | undefined): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : 1;
}

async function ackFlow(app: App, id: string, result: ShareFlowResult): Promise<void> {
  await ack(app, id, result === "stale" ? TXT.share.sessionGone : undefined, result === "stale");
}

export async function handleCallback(app: App, cq: CallbackQuery): Promise<void> {
  const chatId = cq.message?.chat.id;
  try {
    if (!chatId || !cq.data) {
      await ack(app, cq.id);
      return;
    }

    const parsed = parseCb(cq.data);
    if (!parsed) {
      await ack(app, cq.id, TXT.common.staleButton);
      return;
    }

    const user = await guardUser(app, cq.from, chatId);
    if (!user) {
      await ack(app, cq.id);
      return;
    }

    const { prefix, verb, id, arg } = parsed;
    logger.userAction(`callback_${prefix}_${verb}`, user.user_id, chatId, { id });

    // ===== SYS =====
    if (prefix === CB.SYS) {
      await ack(app, cq.id);
      if (verb === "menu") {
        app.flows.clear(user.user_id);
        await showMainMenu(app, chatId, user);
      } else if (verb === "help") {
        await showHelp(app, chatId, user);
      } else if (verb === "premium") {
        await showPremium(app, chatId, user);
      } else if (verb === "cancel") {
        await handleCancel(app, chatId, user);
      }
      return;
    }

    // ===== SHR (создание секрета) =====
    if (prefix === CB.SHR) {
      if (verb === "type" && (id === "message" || id === "file")) {
        await ack(app, cq.id);
        await startShare(app, chatId, user, id);
        return;
      }
      if (!id) {
        await ack(app, cq.id, TXT.share.sessionGone, true);
        return;
      }
      switch (verb) {
        case "rt": return ackFlow(app, cq.id, await chooseRecipientType(app, chatId, user, id, arg));
        case "tog": return ackFlow(app, cq.id, await toggleProtection(app, chatId, user, id, arg));
        case "prot_done": return ackFlow(app, cq.id, await protectionDone(app, chatId, user, id));
        case "ttl": return ackFlow(app, cq.id, await chooseTtl(app, chatId, user, id, arg));
        case "views": return ackFlow(app, cq.id, await chooseViews(app, chatId, user, id, arg));
        case "ok": return ackFlow(app, cq.id, await confirmShare(app, chatId, user, id));
        case "no": return ackFlow(app, cq.id, await cancelShare(app, chatId, user, id));
      }
    }

    // ===== VIEW =====
    if (prefix === CB.VIEW && verb === "open" && id) {
      const result = await openShare(app, cq.from, chatId, id);
      await ack(app, cq.id, result.ok ? undefined : result.text, !result.ok);
      return;
    }

    // ===== MY (мои секреты) =====
    if (prefix === CB.MY) {
      if (verb === "list") {
        await ack(app, cq.id);
        await showMySecrets(app, chatId, user.user_id, pageOf(id));
        return;
      }
      if (verb === "show" && id) {
        await ack(app, cq.id);
        await showSecretDetail(app, chatId, user.user_id, id, pageOf(arg));
        return;
      }
      if (verb === "revoke" && id) {
        const result = await revokeShare(app, user.user_id, id);
        await ack(app, cq.id, result.ok ? TXT.secrets.revoked : result.text, !result.ok);
        await showMySecrets(app, chatId, user.user_id, pageOf(arg));
        return;
      }
    }

    // ===== SET =====
    if (prefix === CB.SET) {
      await ack(app, cq.id);
      if (verb === "tog") await toggleSetting(app, chatId, user, id);
      else await showSettings(app, chatId, user);
      return;
    }

    // ===== ADM =====
    if (prefix === CB.ADM) {
      const access = checkAccess(subjectOf(user), "sudo", app.config);
      if (!access.allowed) {
        logger.warn("Admin callback denied", { action: "admin_denied", userId: user.user_id, callback: cq.data });
        await ack(app, cq.id, access.reason, true);
        return;
      }
      if (verb === "act") {
        const action = parseAdminAction(arg);
        const targetId = Number(id);
        if (!action || !Number.isInteger(targetId)) {
          await ack(app, cq.id, TXT.common.staleButton);
          return;
        }
        await ack(app, cq.id, await adminAction(app, chatId, user, targetId, action));
        return;
      }
      await ack(app, cq.id);
      switch (verb) {
        case "panel": app.flows.clear(user.user_id); return showAdminPanel(app, chatId);
        case "user": return askManageUser(app, chatId, user);
        case "bcast": return askBroadcast(app, chatId, user);
        case "stats": return showStats(app, chatId);
        case "bc_yes":
        case "bc_no": {
          const done = await confirmBroadcast(app, chatId, user, verb === "bc_yes");
          if (!done) await showAdminPanel(app, chatId);
          return;
        }
      }
    }

    logger.warn("Unknown callback received", { action: "unknown_callback", userId: user.user_id, chatId, callback: cq.data });
    await ack(app, cq.id, TXT.common.staleButton);
  } catch (error) {
    await ErrorHandler.handleUserError(error, cq.from.id, chatId ?? cq.from.id, "callback_handler");
    await ack(app, cq.id, TXT.common.error);
  }
}
