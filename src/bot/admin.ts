// src/bot/admin.ts
// Админ-панель: управление пользователями, рассылка, статистика. Доступ — sudo и выше.

import type { Message } from "node-telegram-bot-api";
import type { App } from "./context";
import { loadUser, notify, sendScreen, setRole, userIsOwner, userIsSudo } from "./helpers";
import { parseRecipientInput } from "./share";
import { checkAccess } from "../lib/access";
import { esc, mention } from "../lib/html";
import { logger, toError } from "../lib/logger";
import { retryAfterSeconds } from "../lib/tgErrors";
import { BROADCAST_TIMEOUT_MS, FLOW_TIMEOUT_MS, PREMIUM_GRANT_DAYS } from "../limits";
import { Keyboards } from "../ui/keyboards";
import { TXT } from "../ui/text";
import type { UserRecord } from "../types";

export type AdminAction = "sudo_on" | "sudo_off" | "prem_on" | "prem_off" | "ban" | "unban";

const ACTIONS: readonly AdminAction[] = ["sudo_on", "sudo_off", "prem_on", "prem_off", "ban", "unban"];

export function parseAdminAction(raw: string | undefined): AdminAction | null {
  return ACTIONS.find(a => a === raw) ?? null;
}

export async function showAdminPanel(app: App, chatId: number): Promise<void> {
  await sendScreen(app, chatId, { text: TXT.admin.title, keyboard: Keyboards.adminPanel() });
}

export async function askManageUser(app: App, chatId: number, actor: UserRecord): Promise<void> {
  app.flows.set(actor.user_id, { kind: "admin_user" }, FLOW_TIMEOUT_MS);
  await sendScreen(app, chatId, { text: TXT.admin.askUser, keyboard: Keyboards.cancelFlow() });
}

function userCard(u: UserRecord): string {
  return [
    `👤 <b>User</b> ${mention(u.user_id, u.first_name || u.username)}`,
    ``,
    `▫️ <b>ID:</b> <code>${u.user_id}</code>`,
    `▫️ <b>Username:</b> ${u.username ? `@${esc(u.username)}` : "—"}`,
    `▫️ <b>Role:</b> ${u.role}`,
    `▫️ <b>Premium:</b> ${u.is_premium ? "Yes" : "No"}${u.premium_expiry ? ` (until ${u.premium_expiry.toISOString().slice(0, 10)})` : ""}`,
    `▫️ <b>Sudo:</b> ${u.is_sudo ? "Yes" : "No"}`,
    `▫️ <b>Banned:</b> ${u.banned ? `Yes (${esc(u.ban_reason || "no reason")})` : "No"}`,
    `▫️ <b>Secrets sent:</b> ${u.shares_count}`,
    `▫️ <b>First seen:</b> ${u.first_seen.toISOString().slice(0, 10)}`,
  ].join("\n");
}

export async function showUserCard(app: App, chatId: number, actor: UserRecord, target: UserRecord): Promise<void> {
  await sendScreen(app, chatId, { text: userCard(target), keyboard: Keyboards.adminUser(target, userIsOwner(app, actor)) });
}

export async function handleAdminUserInput(app: App, msg: Message, actor: UserRecord): Promise<void> {
  const chatId = msg.chat.id;
  const input = parseRecipientInput(msg);
  let target: UserRecord | null = null;
  if (input?.kind === "username") {
    const found = await app.users.findByUsername(input.username);
    target = found ? await loadUser(app, found.user_id) : null;
  } else if (input) {
    target = await loadUser(app, input.id);
  }
  if (!target) {
    app.flows.set(actor.user_id, { kind: "admin_user" }, FLOW_TIMEOUT_MS);
    await sendScreen(app, chatId, { text: `${TXT.admin.userNotFound}\n\n${TXT.admin.askUser}`, keyboard: Keyboards.cancelFlow() });
    return;
  }
  app.flows.clear(actor.user_id);
  await showUserCard(app, chatId, actor, target);
}

/** Результат действия — текст для answerCallbackQuery */
export async function adminAction(app: App, chatId: number, actor: UserRecord, targetId: number, action: AdminAction): Promise<string> {
  const target = await loadUser(app, targetId);
  if (!target) return TXT.admin.userNotFound;

  const isSelf = target.user_id === actor.user_id;
  const targetIsOwner = target.role === "owner" || target.user_id === app.config.ownerId;
  const ownerOnly = checkAccess({ userId: actor.user_id, user: actor }, "owner", app.config);

  let updated: UserRecord | null = target;
  switch (action) {
    case "sudo_on":
    case "sudo_off": {
      if (!ownerOnly.allowed) return ownerOnly.reason;
      if (targetIsOwner) return TXT.admin.ownerImmutable;
      if (isSelf) return TXT.admin.notSelf;
      if (action === "sudo_on") {
        updated = await setRole(app, target.user_id, "sudo");
      } else {
        const stillPremium = target.premium_expiry !== null && target.premium_expiry.getTime() > app.now().getTime();
        updated = await setRole(app, target.user_id, stillPremium ? "premium" : "free");
      }
      break;
    }
    case "prem_on": {
      const expiry = new Date(app.now().getTime() + PREMIUM_GRANT_DAYS * 86_400_000);
      updated = target.role === "free"
        ? await setRole(app, target.user_id, "premium", expiry)
        : await app.users.update(target.user_id, { is_premium: true, premium_expiry: expiry });
      await notify(app, target.user_id, TXT.admin.youArePremium);
      break;
    }
    case "prem_off": {
      updated = target.role === "premium"
        ? await setRole(app, target.user_id, "free", null)
        : await app.users.update(target.user_id, { premium_expiry: null });
      break;
    }
    case "ban": {
      if (targetIsOwner) return TXT.admin.ownerImmutable;
      if (isSelf) return TXT.admin.notSelf;
      if (userIsSudo(app, target) && !ownerOnly.allowed) return ownerOnly.reason;
      app.flows.set(actor.user_id, { kind: "admin_ban_reason", targetId: target.user_id }, FLOW_TIMEOUT_MS);
      await sendScreen(app, chatId, { text: TXT.admin.askBanReason, keyboard: Keyboards.cancelFlow() });
      return TXT.admin.askBanReason;
    }
    case "unban": {
      updated = await app.users.update(target.user_id, { banned: false, ban_reason: null });
      await notify(app, target.user_id, TXT.admin.youAreUnbanned);
      break;
    }
  }

  logger.info(`Admin action: ${action}`, { action: "admin_action", userId: actor.user_id, target: target.user_id, op: action });
  await showUserCard(app, chatId, actor, updated ?? target);
  return TXT.admin.done;
}

export async function handleBanReason(app: App, msg: Message, actor: UserRecord, targetId: number): Promise<void> {
  const chatId = msg.chat.id;
  const reason = msg.text?.trim();
  if (!reason) {
    app.flows.set(actor.user_id, { kind: "admin_ban_reason", targetId }, FLOW_TIMEOUT_MS);
    await sendScreen(app, chatId, { text: TXT.admin.askBanReason, keyboard: Keyboards.cancelFlow() });
    return;
  }
  app.flows.clear(actor.user_id);
  const updated = await app.users.update(targetId, { banned: true, ban_reason: reason });
  if (!updated) {
    await sendScreen(app, chatId, { text: TXT.admin.userNotFound, keyboard: Keyboards.adminPanel() });
    return;
  }
  logger.info("User banned", { action: "admin_action", userId: actor.user_id, target: targetId, op: "ban" });
  await notify(app, targetId, TXT.admin.youAreBanned(reason));
  await showUserCard(app, chatId, actor, updated);
}

// ===== Рассылка =====
export async function askBroadcast(app: App, chatId: number, actor: UserRecord): Promise<void> {
  app.flows.set(actor.user_id, { kind: "admin_broadcast" }, BROADCAST_TIMEOUT_MS);
  await sendScreen(app, chatId, { text: TXT.admin.askBroadcast, keyboard: Keyboards.cancelFlow() });
}

export async function handleBroadcastContent(app: App, msg: Message, actor: UserRecord): Promise<void> {
  const chatId = msg.chat.id;
  const targets = await app.users.listBroadcastTargets(actor.user_id);
  const sent = await sendScreen(app, chatId, {
    text: TXT.admin.confirmBroadcast(targets.length),
    keyboard: Keyboards.broadcastConfirm(),
  });
  app.flows.set(
    actor.user_id,
    { kind: "admin_broadcast_confirm", fromChatId: chatId, messageId: msg.message_id, confirmMessageId: sent.message_id },
    BROADCAST_TIMEOUT_MS
  );
}

export type BroadcastReport = { sent: number; failed: number };

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Копирует сообщение всем незабаненным, кроме автора. На flood wait ждём и пробуем ещё раз. */
export async function runBroadcast(
  app: App,
  actorId: number,
  fromChatId: number,
  messageId: number,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<BroadcastReport> {
  const targets = await app.users.listBroadcastTargets(actorId);
  const report: BroadcastReport = { sent: 0, failed: 0 };
  for (const userId of targets) {
    try {
      await app.bot.copyMessage(userId, fromChatId, messageId);
      report.sent++;
    } catch (error) {
      const wait = retryAfterSeconds(error);
      if (wait === null) {
        report.failed++;
        logger.debug("Broadcast delivery failed", { action: "broadcast_failed", userId, error: toError(error) });
        continue;
      }
      await sleep(wait * 1000);
      try {
        await app.bot.copyMessage(userId, fromChatId, messageId);
        report.sent++;
      } catch (retryError) {
        report.failed++;
        logger.debug("Broadcast retry failed", { action: "broadcast_failed", userId, error: toError(retryError) });
      }
    }
  }
  logger.info("Broadcast finished", { action: "broadcast", userId: actorId, ...report });
  return report;
}

export async function confirmBroadcast(app: App, chatId: number, actor: UserRecord, yes: boolean): Promise<boolean> {
  const s = app.flows.get(actor.user_id);
  if (!s || s.kind !== "admin_broadcast_confirm") return false;
  app.flows.clear(actor.user_id);
  if (!yes) {
    await sendScreen(app, chatId, { text: TXT.admin.broadcastCancelled, keyboard: Keyboards.adminPanel() });
    return true;
  }
  const report = await runBroadcast(app, actor.user_id, s.fromChatId, s.messageId);
  await sendScreen(app, chatId, { text: TXT.admin.broadcastDone(report.sent, report.failed), keyboard: Keyboards.adminPanel() });
  return true;
}

export async function showStats(app: App, chatId: number): Promise<void> {
  const [users, shares] = await Promise.all([app.users.stats(), app.shares.stats()]);
  await sendScreen(app, chatId, { text: TXT.admin.stats(users, shares), keyboard: Keyboards.adminPanel() });
}
