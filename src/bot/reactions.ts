// src/bot/reactions.ts
// Управление реакциями: 👀 открыть секрет, 👍/👎 подтвердить/отменить, 🔥 отозвать по квитанции.

import type { App } from "./context";
import { loadUser, notify, userIsOwner, userIsSudo, type TgUserLike } from "./helpers";
import { confirmBroadcast } from "./admin";
import { revokeShare } from "./secrets";
import { cancelShare, confirmShare } from "./share";
import { openShare } from "./view";
import { logger } from "../lib/logger";
import { TXT } from "../ui/text";

export const REACTION = {
  REVEAL: "👀",
  CONFIRM: "👍",
  CANCEL: "👎",
  REVOKE: "🔥",
} as const;

export type ReactionEvent = {
  chatId: number;
  messageId: number;
  user: TgUserLike;
  /** Эмодзи, которых не было в old_reaction */
  added: string[];
};

export type ReactionOutcome = "reveal" | "confirm" | "cancel" | "revoke" | "ignored";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function emojis(list: unknown): string[] {
  if (!Array.isArray(list)) return [];
  const out: string[] = [];
  for (const r of list) {
    if (isRecord(r) && r.type === "emoji" && typeof r.emoji === "string") out.push(r.emoji);
  }
  return out;
}

/** Разбор апдейта message_reaction; анонимные реакции (от имени чата) не берём */
export function parseReactionUpdate(raw: unknown): ReactionEvent | null {
  if (!isRecord(raw)) return null;
  const { chat, user, message_id } = raw;
  if (!isRecord(chat) || typeof chat.id !== "number") return null;
  if (!isRecord(user) || typeof user.id !== "number") return null;
  if (typeof message_id !== "number") return null;
  const before = new Set(emojis(raw.old_reaction));
  return {
    chatId: chat.id,
    messageId: message_id,
    user: {
      id: user.id,
      first_name: typeof user.first_name === "string" ? user.first_name : undefined,
      username: typeof user.username === "string" ? user.username : undefined,
      is_bot: user.is_bot === true,
    },
    added: emojis(raw.new_reaction).filter(e => !before.has(e)),
  };
}

export async function handleReaction(app: App, ev: ReactionEvent): Promise<ReactionOutcome> {
  if (!ev.added.length || ev.user.is_bot) return "ignored";
  const user = await loadUser(app, ev.user.id);
  if (!user || (user.banned && !userIsOwner(app, user))) return "ignored";

  for (const emoji of ev.added) {
    switch (emoji) {
      case REACTION.REVEAL: {
        const share = await app.shares.findByControlMessage(user.user_id, ev.messageId);
        if (!share) continue;
        const result = await openShare(app, ev.user, ev.chatId, share.access_token);
        if (!result.ok) await notify(app, ev.chatId, result.text);
        return "reveal";
      }
      case REACTION.CONFIRM:
      case REACTION.CANCEL: {
        const yes = emoji === REACTION.CONFIRM;
        const session = app.flows.get(user.user_id);
        if (session?.kind === "share" && session.step === "share_confirm" && session.draft.confirmMessageId === ev.messageId) {
          if (yes) await confirmShare(app, ev.chatId, user, session.draft.flowId);
          else await cancelShare(app, ev.chatId, user, session.draft.flowId);
          return yes ? "confirm" : "cancel";
        }
        if (session?.kind === "admin_broadcast_confirm" && session.confirmMessageId === ev.messageId && userIsSudo(app, user)) {
          await confirmBroadcast(app, ev.chatId, user, yes);
          return yes ? "confirm" : "cancel";
        }
        continue;
      }
      case REACTION.REVOKE: {
        const share = await app.shares.findByReceipt(user.user_id, ev.messageId);
        if (!share) continue;
        const result = await revokeShare(app, user.user_id, share.share_uuid);
        await notify(app, ev.chatId, result.ok ? TXT.secrets.revoked : result.text);
        return "revoke";
      }
      default:
        continue;
    }
  }
  logger.debug("Reaction ignored", { action: "reaction_ignored", userId: user.user_id, messageId: ev.messageId });
  return "ignored";
}
