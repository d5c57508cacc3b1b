// src/bot/secrets.ts
// «Мои секреты»: список с пагинацией, карточка, отзыв.
import type { App } from "./context";
import { safeDelete, sendScreen } from "./helpers";
import { Keyboards } from "../ui/keyboards";
import { TXT } from "../ui/text";
import { esc } from "../lib/html";
import { logger } from "../lib/logger";
import { formatMinutes, formatViews, MY_SECRETS_PAGE_SIZE } from "../limits";
import { STATUS_EMOJI, type ShareRecord, type ShareStatus } from "../types";

const LISTED: ShareStatus[] = ["active", "viewed"];

export function pageCount(total: number): number {
  return Math.max(1, Math.ceil(total / MY_SECRETS_PAGE_SIZE));
}

export async function showMySecrets(app: App, chatId: number, userId: number, page = 1): Promise<void> {
  const first = await app.shares.listBySender(userId, LISTED, MY_SECRETS_PAGE_SIZE, (Math.max(1, page) - 1) * MY_SECRETS_PAGE_SIZE);
  if (first.total === 0) {
    await sendScreen(app, chatId, { text: TXT.secrets.empty, keyboard: Keyboards.backToMenu() });
    return;
  }
  const pages = pageCount(first.total);
  // Страница могла опустеть после отзыва — показываем последнюю
  const current = Math.min(Math.max(1, page), pages);
  const data = current === page ? first : await app.shares.listBySender(userId, LISTED, MY_SECRETS_PAGE_SIZE, (current - 1) * MY_SECRETS_PAGE_SIZE);
  await sendScreen(app, chatId, {
    text: TXT.secrets.title(current, pages, data.total),
    keyboard: Keyboards.secretsList(data.items, current, pages),
  });
}

function fmtDate(d: Date | null): string {
  return d ? d.toISOString().replace("T", " ").slice(0, 16) + " UTC" : "—";
}

export function describeShare(s: ShareRecord): string {
  const recipient = s.recipient_type === "link"
    ? `Link${s.recipient_display_name ? ` (opened by ${esc(s.recipient_display_name)})` : ""}`
    : esc(s.recipient_display_name || String(s.recipient_id));
  return [
    `${STATUS_EMOJI[s.status]} <b>Secret</b> <code>${s.share_uuid.slice(0, 8)}</code>`,
    ``,
    `▫️ <b>Type:</b> ${s.share_type}${s.original_file_name ? ` (${esc(s.original_file_name)})` : ""}`,
    `▫️ <b>Recipient:</b> ${recipient}`,
    `▫️ <b>Status:</b> ${s.status}`,
    `▫️ <b>Views:</b> ${s.view_count} / ${formatViews(s.max_views)}`,
    `▫️ <b>Timer:</b> ${formatMinutes(s.self_destruct_minutes_set)}`,
    `▫️ <b>Created:</b> ${fmtDate(s.created_at)}`,
    `▫️ <b>Expires:</b> ${fmtDate(s.expires_at)}`,
    s.viewed_by_display_name ? `▫️ <b>Last viewer:</b> ${esc(s.viewed_by_display_name)}` : "",
  ].filter(Boolean).join("\n");
}

export async function showSecretDetail(app: App, chatId: number, userId: number, uuid: string, page: number): Promise<void> {
  const share = await app.shares.getByUuid(uuid);
  if (!share || share.sender_id !== userId) {
    await sendScreen(app, chatId, { text: TXT.secrets.notYours, keyboard: Keyboards.backToMenu() });
    return;
  }
  await sendScreen(app, chatId, { text: describeShare(share), keyboard: Keyboards.secretDetail(share, page) });
}

export type RevokeResult =
  | { ok: true; share: ShareRecord }
  | { ok: false; text: string };

/** Отзыв: только автор, только active/viewed. Убирает кнопку просмотра у получателя. */
export async function revokeShare(app: App, userId: number, uuid: string): Promise<RevokeResult> {
  const share = await app.shares.getByUuid(uuid);
  if (!share || share.sender_id !== userId) return { ok: false, text: TXT.secrets.notYours };

  const now = app.now();
  const revoked = await app.shares.transition(uuid, ["active", "viewed"], "revoked", { revoked_at: now, expires_at: now });
  if (!revoked) return { ok: false, text: TXT.secrets.cannotRevoke };

  if (revoked.recipient_type === "user" && revoked.recipient_id !== null && revoked.bot_message_id_to_recipient !== null) {
    await safeDelete(app.bot, revoked.recipient_id, revoked.bot_message_id_to_recipient);
  }
  if (revoked.share_type === "message_inline") {
    await safeDelete(app.bot, revoked.original_chat_id, revoked.original_message_id);
  }
  logger.userAction("secret_revoked", userId, userId, { share: uuid });
  return { ok: true, share: revoked };
}
