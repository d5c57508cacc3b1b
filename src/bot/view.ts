// src/bot/view.ts
// Открытие секрета по ссылке или кнопке: атомарный учёт просмотра, доставка, самоуничтожение.
import type { App } from "./context";
import { notify, safeDelete, type TgUserLike } from "./helpers";
import { deliverShare } from "./relay";
import type { ShareRecord } from "../types";
import { TXT } from "../ui/text";
import { displayName } from "../lib/html";
import { logger, toError } from "../lib/logger";

export const VIEW_LINK_PREFIX = "viewsecret_";

export type ViewFailure = "not_found" | "not_for_you" | "revoked" | "expired" | "gone" | "max_views" | "delivery_failed";

export type ViewResult =
  | { ok: true; share: ShareRecord; final: boolean }
  | { ok: false; reason: ViewFailure; text: string };

export function viewLink(botUsername: string, token: string): string {
  return `https://t.me/${botUsername}?start=${VIEW_LINK_PREFIX}${token}`;
}

function fail(reason: ViewFailure, text: string): ViewResult {
  return { ok: false, reason, text };
}

/** Почему секрет нельзя открыть; null — можно */
export function unavailableReason(share: ShareRecord, now: Date): ViewResult | null {
  switch (share.status) {
    case "revoked": return fail("revoked", TXT.view.revoked);
    case "expired": return fail("expired", TXT.view.expired);
    case "viewed":
    case "destructed": return fail("gone", TXT.view.gone);
    case "active": break;
  }
  if (share.expires_at && share.expires_at.getTime() <= now.getTime()) return fail("expired", TXT.view.expired);
  if (share.max_views > 0 && share.view_count >= share.max_views) return fail("max_views", TXT.view.maxViews);
  return null;
}

export async function openShare(app: App, viewer: TgUserLike, chatId: number, token: string): Promise<ViewResult> {
  const now = app.now();
  const share = await app.shares.getByToken(token);
  if (!share) return fail("not_found", TXT.view.notFound);

  if (share.recipient_type === "user" && share.recipient_id !== viewer.id) {
    logger.warn("Secret opened by a non-recipient", { action: "view_not_for_you", userId: viewer.id, share: share.share_uuid });
    return fail("not_for_you", TXT.view.notForYou);
  }
  const blocked = unavailableReason(share, now);
  if (blocked) return blocked;

  const viewerName = displayName(viewer);
  const viewed = await app.shares.registerView(token, { id: viewer.id, name: viewerName }, now);
  if (!viewed) {
    // Кто-то успел раньше: отвечаем по свежему состоянию
    const fresh = await app.shares.getByToken(token);
    return (fresh && unavailableReason(fresh, now)) || fail("gone", TXT.view.gone);
  }

  const final = viewed.status === "viewed";
  let delivered = true;
  try {
    await deliverShare(app.bot, chatId, viewed);
    logger.userAction("secret_viewed", viewer.id, chatId, { share: viewed.share_uuid, views: viewed.view_count, final });
  } catch (error) {
    delivered = false;
    logger.error("Secret delivery failed", { action: "deliver_failed", userId: viewer.id, share: viewed.share_uuid, error: toError(error) });
  }

  const result = final ? await finalizeViewed(app, viewed, now) : viewed;
  await notifySender(app, result, viewer, viewerName);

  if (!delivered) return fail("delivery_failed", TXT.view.deliveryFailed);
  return { ok: true, share: result, final };
}

// Последний просмотр: статус destructed, убираем кнопку у получателя и временное сообщение inline.
async function finalizeViewed(app: App, share: ShareRecord, now: Date): Promise<ShareRecord> {
  const done = await app.shares.transition(share.share_uuid, ["viewed"], "destructed", { destructed_at: now });
  if (share.recipient_type === "user" && share.recipient_id !== null && share.bot_message_id_to_recipient !== null) {
    await safeDelete(app.bot, share.recipient_id, share.bot_message_id_to_recipient);
  }
  if (share.share_type === "message_inline") {
    await safeDelete(app.bot, share.original_chat_id, share.original_message_id);
  }
  return done ?? share;
}

async function notifySender(app: App, share: ShareRecord, viewer: TgUserLike, viewerName: string): Promise<void> {
  if (viewer.id === share.sender_id) return;
  const sender = await app.users.get(share.sender_id);
  if (!sender?.settings.notify_on_view) return;
  const recipient = share.recipient_display_name || "link";
  await notify(app, share.sender_id, TXT.view.notifySender(recipient, viewerName));
}
