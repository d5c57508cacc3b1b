// src/bot/inline.ts
// Inline-режим: «@bot текст» превращается в одноразовую ссылку на секрет.

import { randomUUID } from "node:crypto";
import type { InlineQuery, InlineQueryResultArticle, Message } from "node-telegram-bot-api";
import type { App } from "./context";
import { ensureUser, safeDelete } from "./helpers";
import { viewLink } from "./view";
import { displayName, mention } from "../lib/html";
import { logger, toError } from "../lib/logger";
import { isBlockedError, isPeerInvalid } from "../lib/tgErrors";
import { INLINE_CACHE_TIME_SEC, INLINE_SHARE_TTL_HOURS, MAX_SECRET_TEXT_LENGTH } from "../limits";
import { TXT } from "../ui/text";

function article(id: string, title: string, text: string, description?: string): InlineQueryResultArticle {
  return {
    type: "article",
    id,
    title,
    description,
    input_message_content: { message_text: text, disable_web_page_preview: true },
  };
}

async function answerNotice(app: App, q: InlineQuery, title: string, text: string): Promise<void> {
  await app.bot.answerInlineQuery(q.id, [article("notice", title, text)], { cache_time: 0, is_personal: true });
}

export async function handleInlineQuery(app: App, q: InlineQuery): Promise<void> {
  const text = q.query.trim();
  if (!text) {
    await app.bot.answerInlineQuery(q.id, [], { cache_time: 0, is_personal: true });
    return;
  }

  const known = await app.users.get(q.from.id);
  if (known?.banned && q.from.id !== app.config.ownerId) {
    await app.bot.answerInlineQuery(q.id, [], { cache_time: 0, is_personal: true });
    return;
  }
  if (text.length > MAX_SECRET_TEXT_LENGTH) {
    await answerNotice(app, q, TXT.inline.tooLongTitle, TXT.share.tooLong(MAX_SECRET_TEXT_LENGTH));
    return;
  }

  // Копия текста в личке отправителя: заодно проверка, что бот ему доступен
  let temp: Message;
  try {
    temp = await app.bot.sendMessage(q.from.id, TXT.inline.tempMessage(text), {
      parse_mode: "HTML",
      disable_notification: true,
      protect_content: true,
    });
  } catch (error) {
    if (isBlockedError(error) || isPeerInvalid(error)) {
      await answerNotice(app, q, TXT.inline.startFirstTitle, TXT.inline.startFirstText);
      return;
    }
    throw error;
  }

  const user = await ensureUser(app, q.from);
  const now = app.now();
  const shareUuid = randomUUID();
  const token = randomUUID();
  await app.shares.create({
    share_uuid: shareUuid,
    access_token: token,
    sender_id: user.user_id,
    sender_mention: mention(user.user_id, displayName(q.from)),
    recipient_id: null,
    recipient_display_name: null,
    recipient_type: "link",
    share_type: "message_inline",
    original_chat_id: q.from.id,
    original_message_id: temp.message_id,
    original_file_name: null,
    content_text: text,
    anonymous: true,
    show_forward_tag: user.settings.default_show_forward_tag,
    is_protected_content: user.settings.default_protected_content,
    bot_message_id_to_recipient: null,
    created_at: now,
    expires_at: new Date(now.getTime() + INLINE_SHARE_TTL_HOURS * 3_600_000),
    self_destruct_minutes_set: INLINE_SHARE_TTL_HOURS * 60,
    max_views: 1,
  });

  const link = viewLink(app.me.username, token);
  const preview = text.length > 40 ? `${text.slice(0, 40)}…` : text;
  const result: InlineQueryResultArticle = {
    ...article(token, TXT.inline.resultTitle, TXT.inline.resultText(link), preview),
    reply_markup: { inline_keyboard: [[{ text: "🔓 Open secret", url: link }]] },
  };

  try {
    await app.bot.answerInlineQuery(q.id, [result], { cache_time: INLINE_CACHE_TIME_SEC, is_personal: true });
    logger.userAction("inline_secret_created", user.user_id, q.from.id, { share: shareUuid });
  } catch (error) {
    // Ответ не ушёл — секрет никому не достанется
    logger.warn("Inline answer failed, rolling back secret", { action: "inline_rollback", userId: user.user_id, error: toError(error) });
    await app.shares.delete(shareUuid);
    await safeDelete(app.bot, q.from.id, temp.message_id);
  }
}
