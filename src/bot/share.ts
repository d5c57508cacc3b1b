// src/bot/share.ts
// Пошаговое создание секрета: тип → содержимое → получатель → защита → таймер → просмотры → подтверждение.

import { randomUUID } from "node:crypto";
import type { Message } from "node-telegram-bot-api";
import type { App } from "./context";
import { clearScreen, notify, safeDelete, sendScreen, userIsPremium, userIsSudo } from "./helpers";
import { viewLink } from "./view";
import type { FlowSession, ShareDraft, ShareStep } from "../lib/flowSession";
import { displayName, mention } from "../lib/html";
import { logger } from "../lib/logger";
import { isBlockedError, isPeerInvalid } from "../lib/tgErrors";
import {
  FLOW_TIMEOUT_MS,
  MAX_SECRET_TEXT_LENGTH,
  fileSizeAllowed,
  limitsFor,
  resolveDestructMinutes,
  resolveMaxViews,
} from "../limits";
import { Keyboards } from "../ui/keyboards";
import { TXT } from "../ui/text";
import type { ShareRecord, UserRecord } from "../types";

type ShareSession = Extract<FlowSession, { kind: "share" }>;

export type ShareFlowResult = "ok" | "stale";

function newFlowId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 10);
}

function save(app: App, userId: number, step: ShareStep, draft: ShareDraft): ShareSession {
  const session: ShareSession = { kind: "share", step, draft };
  app.flows.set(userId, session, FLOW_TIMEOUT_MS);
  return session;
}

/** Активная сессия с нужным flowId (и шагом, если задан) */
export function currentShare(app: App, userId: number, flowId?: string, steps?: ShareStep[]): ShareSession | null {
  const s = app.flows.get(userId);
  if (!s || s.kind !== "share") return null;
  if (flowId !== undefined && s.draft.flowId !== flowId) return null;
  if (steps && !steps.includes(s.step)) return null;
  return s;
}

// ===== Шаг 1: тип =====
export async function startShare(app: App, chatId: number, user: UserRecord, type: "message" | "file"): Promise<void> {
  const limits = limitsFor(userIsPremium(app, user));
  const active = await app.shares.countActiveBySender(user.user_id);
  if (active >= limits.maxActiveShares) {
    await sendScreen(app, chatId, { text: TXT.share.tooManyActive(limits.maxActiveShares), keyboard: Keyboards.backToMenu() });
    return;
  }

  save(app, user.user_id, "share_content", {
    flowId: newFlowId(),
    shareType: type,
    showForwardTag: user.settings.default_show_forward_tag,
    protectContent: user.settings.default_protected_content,
    anonymous: user.settings.default_anonymous,
  });
  logger.userAction("share_started", user.user_id, chatId, { type });
  await sendScreen(app, chatId, {
    text: type === "message" ? TXT.share.askMessage : TXT.share.askFile,
    keyboard: Keyboards.cancelFlow(),
  });
}

// ===== Шаг 2: содержимое =====
export type FileInfo = { kind: string; fileName: string | null; size?: number };

export function extractFile(msg: Message): FileInfo | null {
  if (msg.document) return { kind: "document", fileName: msg.document.file_name ?? null, size: msg.document.file_size };
  if (msg.photo && msg.photo.length) {
    const best = msg.photo[msg.photo.length - 1];
    return { kind: "photo", fileName: null, size: best.file_size };
  }
  if (msg.video) return { kind: "video", fileName: null, size: msg.video.file_size };
  if (msg.audio) return { kind: "audio", fileName: msg.audio.title ?? null, size: msg.audio.file_size };
  if (msg.voice) return { kind: "voice", fileName: null, size: msg.voice.file_size };
  if (msg.animation) return { kind: "animation", fileName: null, size: msg.animation.file_size };
  if (msg.video_note) return { kind: "video note", fileName: null, size: msg.video_note.file_size };
  if (msg.sticker) return { kind: "sticker", fileName: null, size: msg.sticker.file_size };
  return null;
}

function textPreview(text: string): string {
  return text.length > 50 ? `${text.slice(0, 50)}…` : text;
}

/** Принятое содержимое или текст ошибки */
export function validateContent(draft: ShareDraft, msg: Message, isPremium: boolean): { error: string } | { content: NonNullable<ShareDraft["content"]> } {
  if (draft.shareType === "message") {
    if (msg.text === undefined) return { error: TXT.share.notText };
    if (!msg.text.trim()) return { error: TXT.share.emptyText };
    if (msg.text.length > MAX_SECRET_TEXT_LENGTH) return { error: TXT.share.tooLong(MAX_SECRET_TEXT_LENGTH) };
    return { content: { chatId: msg.chat.id, messageId: msg.message_id, fileName: null, preview: textPreview(msg.text) } };
  }
  const file = extractFile(msg);
  if (!file) return { error: TXT.share.notFile };
  if (!fileSizeAllowed(file.size, isPremium)) return { error: TXT.share.fileTooLarge(limitsFor(isPremium).maxFileSizeMb) };
  return {
    content: {
      chatId: msg.chat.id,
      messageId: msg.message_id,
      fileName: file.fileName,
      preview: file.fileName ? `${file.kind}: ${file.fileName}` : file.kind,
    },
  };
}

export async function handleShareContent(app: App, msg: Message, user: UserRecord, session: ShareSession): Promise<void> {
  const chatId = msg.chat.id;
  const checked = validateContent(session.draft, msg, userIsPremium(app, user));
  if ("error" in checked) {
    // Шаг не меняем, продлеваем ожидание
    save(app, user.user_id, "share_content", session.draft);
    await sendScreen(app, chatId, { text: checked.error, keyboard: Keyboards.cancelFlow() });
    return;
  }
  const draft: ShareDraft = { ...session.draft, content: checked.content };
  save(app, user.user_id, "share_recipient_type", draft);
  await sendScreen(app, chatId, { text: TXT.share.askRecipientType, keyboard: Keyboards.recipientType(draft.flowId) });
}

// ===== Шаг 3: получатель =====
export async function chooseRecipientType(
  app: App,
  chatId: number,
  user: UserRecord,
  flowId: string,
  type: string | undefined
): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId, ["share_recipient_type"]);
  if (!s || (type !== "link" && type !== "user")) return "stale";
  if (type === "link") {
    const draft: ShareDraft = { ...s.draft, recipient: { type: "link" } };
    save(app, user.user_id, "share_protection", draft);
    await showProtection(app, chatId, draft);
    return "ok";
  }
  save(app, user.user_id, "share_recipient", s.draft);
  await sendScreen(app, chatId, { text: TXT.share.askRecipient, keyboard: Keyboards.cancelFlow() });
  return "ok";
}

export type RecipientInput =
  | { kind: "id"; id: number }
  | { kind: "username"; username: string }
  | { kind: "forward"; id: number; name: string; isBot: boolean };

export function parseRecipientInput(msg: Message): RecipientInput | null {
  if (msg.forward_from) {
    return {
      kind: "forward",
      id: msg.forward_from.id,
      name: displayName(msg.forward_from),
      isBot: msg.forward_from.is_bot,
    };
  }
  const text = msg.text?.trim() ?? "";
  if (/^\d{1,15}$/.test(text) && Number(text) > 0) return { kind: "id", id: Number(text) };
  const m = /^@([A-Za-z][A-Za-z0-9_]{3,31})$/.exec(text);
  if (m) return { kind: "username", username: m[1] };
  return null;
}

export type ResolvedRecipient = { ok: true; userId: number; name: string } | { ok: false; error: string };

export async function resolveRecipient(app: App, senderId: number, input: RecipientInput): Promise<ResolvedRecipient> {
  switch (input.kind) {
    case "forward":
      if (input.isBot || input.id === app.me.id) return { ok: false, error: TXT.share.recipientBot };
      if (input.id === senderId) return { ok: false, error: TXT.share.recipientSelf };
      return { ok: true, userId: input.id, name: input.name };
    case "id": {
      if (input.id === app.me.id) return { ok: false, error: TXT.share.recipientBot };
      if (input.id === senderId) return { ok: false, error: TXT.share.recipientSelf };
      const known = await app.users.get(input.id);
      const name = known ? displayName({ first_name: known.first_name, username: known.username, id: known.user_id }) : String(input.id);
      return { ok: true, userId: input.id, name };
    }
    case "username": {
      if (input.username.toLowerCase() === app.me.username.toLowerCase()) return { ok: false, error: TXT.share.recipientBot };
      const known = await app.users.findByUsername(input.username);
      if (!known) return { ok: false, error: TXT.share.recipientUnknown };
      if (known.user_id === senderId) return { ok: false, error: TXT.share.recipientSelf };
      return { ok: true, userId: known.user_id, name: displayName({ first_name: known.first_name, username: known.username, id: known.user_id }) };
    }
  }
}

export async function handleRecipientInput(app: App, msg: Message, user: UserRecord, session: ShareSession): Promise<void> {
  const chatId = msg.chat.id;
  const input = parseRecipientInput(msg);
  const resolved = input ? await resolveRecipient(app, user.user_id, input) : { ok: false as const, error: TXT.share.recipientInvalid };
  if (!resolved.ok) {
    save(app, user.user_id, "share_recipient", session.draft);
    await sendScreen(app, chatId, { text: `${resolved.error}\n\n${TXT.share.askRecipient}`, keyboard: Keyboards.cancelFlow() });
    return;
  }
  const draft: ShareDraft = { ...session.draft, recipient: { type: "user", userId: resolved.userId, name: resolved.name } };
  save(app, user.user_id, "share_protection", draft);
  await showProtection(app, chatId, draft);
}

// ===== Шаг 4: защита =====
async function showProtection(app: App, chatId: number, d: ShareDraft): Promise<void> {
  await sendScreen(app, chatId, {
    text: TXT.share.protection(d.showForwardTag, d.protectContent, d.anonymous),
    keyboard: Keyboards.protection(d.flowId, d.showForwardTag, d.protectContent, d.anonymous),
  });
}

export async function toggleProtection(
  app: App,
  chatId: number,
  user: UserRecord,
  flowId: string,
  which: string | undefined
): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId, ["share_protection"]);
  if (!s) return "stale";
  const d = { ...s.draft };
  if (which === "fwd") d.showForwardTag = !d.showForwardTag;
  else if (which === "prot") d.protectContent = !d.protectContent;
  else if (which === "anon") d.anonymous = !d.anonymous;
  else return "stale";
  save(app, user.user_id, "share_protection", d);
  await showProtection(app, chatId, d);
  return "ok";
}

export async function protectionDone(app: App, chatId: number, user: UserRecord, flowId: string): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId, ["share_protection"]);
  if (!s) return "stale";
  save(app, user.user_id, "share_ttl", s.draft);
  await sendScreen(app, chatId, {
    text: TXT.share.askTtl,
    keyboard: Keyboards.destructOptions(flowId, limitsFor(userIsPremium(app, user))),
  });
  return "ok";
}

// ===== Шаг 5: таймер =====
export async function chooseTtl(app: App, chatId: number, user: UserRecord, flowId: string, raw: string | undefined): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId, ["share_ttl"]);
  if (!s) return "stale";
  const premium = userIsPremium(app, user);
  const minutes = resolveDestructMinutes(Number(raw), premium);
  if (String(minutes) !== raw) {
    logger.warn("Invalid timer choice, using no timer", { action: "ttl_fallback", userId: user.user_id, raw });
  }
  save(app, user.user_id, "share_views", { ...s.draft, destructMinutes: minutes });
  await sendScreen(app, chatId, { text: TXT.share.askViews, keyboard: Keyboards.viewOptions(flowId, limitsFor(premium)) });
  return "ok";
}

// ===== Шаг 6: просмотры =====
export async function chooseViews(app: App, chatId: number, user: UserRecord, flowId: string, raw: string | undefined): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId, ["share_views"]);
  if (!s) return "stale";
  const draft: ShareDraft = { ...s.draft, maxViews: resolveMaxViews(Number(raw), userIsPremium(app, user)) };
  await showConfirmation(app, chatId, user.user_id, draft);
  return "ok";
}

async function showConfirmation(app: App, chatId: number, userId: number, d: ShareDraft): Promise<void> {
  const sent = await sendScreen(app, chatId, {
    text: TXT.share.confirm({
      type: d.shareType,
      recipient: d.recipient?.type === "user" ? d.recipient.name : "Anyone with the link",
      preview: d.content?.preview ?? "",
      anonymous: d.anonymous,
      forwardTag: d.showForwardTag,
      protect: d.protectContent,
      ttl: d.destructMinutes ?? 0,
      views: d.maxViews ?? 1,
    }),
    keyboard: Keyboards.confirm(d.flowId),
  });
  // id экрана подтверждения нужен реакциям 👍/👎
  save(app, userId, "share_confirm", { ...d, confirmMessageId: sent.message_id });
}

// ===== Шаг 7: подтверждение =====
export async function cancelShare(app: App, chatId: number, user: UserRecord, flowId: string): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId);
  if (!s) return "stale";
  app.flows.clear(user.user_id);
  logger.userAction("share_cancelled", user.user_id, chatId);
  await sendScreen(app, chatId, { text: TXT.common.cancelled, keyboard: Keyboards.mainMenu(userIsSudo(app, user)) });
  return "ok";
}

export async function confirmShare(app: App, chatId: number, user: UserRecord, flowId: string): Promise<ShareFlowResult> {
  const s = currentShare(app, user.user_id, flowId, ["share_confirm"]);
  if (!s) return "stale";
  const d = s.draft;
  const { content, recipient } = d;
  if (!content || !recipient || d.destructMinutes === undefined || d.maxViews === undefined) return "stale";
  // Повторное нажатие не должно создать второй секрет
  app.flows.clear(user.user_id);

  const limits = limitsFor(userIsPremium(app, user));
  if ((await app.shares.countActiveBySender(user.user_id)) >= limits.maxActiveShares) {
    await sendScreen(app, chatId, { text: TXT.share.tooManyActive(limits.maxActiveShares), keyboard: Keyboards.backToMenu() });
    return "ok";
  }

  const now = app.now();
  const shareUuid = randomUUID();
  const token = randomUUID();
  const senderName = displayName({ first_name: user.first_name, username: user.username, id: user.user_id });
  const senderMention = mention(user.user_id, senderName);

  let controlMessageId: number | null = null;
  if (recipient.type === "user") {
    const text = `${d.anonymous ? TXT.share.controlAnonymous : TXT.share.controlNamed(senderMention)}\n\n${TXT.share.controlFooter}`;
    try {
      const sent = await app.bot.sendMessage(recipient.userId, text, {
        parse_mode: "HTML",
        protect_content: true,
        reply_markup: { inline_keyboard: Keyboards.viewSecret(token) },
      });
      controlMessageId = sent.message_id;
    } catch (error) {
      if (isBlockedError(error) || isPeerInvalid(error)) {
        logger.warn("Recipient unreachable, secret not created", { action: "recipient_unreachable", userId: user.user_id, recipient: recipient.userId });
        await sendScreen(app, chatId, { text: TXT.share.recipientBlocked(recipient.name), keyboard: Keyboards.backToMenu() });
        return "ok";
      }
      throw error;
    }
  }

  let share: ShareRecord;
  try {
    share = await app.shares.create({
      share_uuid: shareUuid,
      access_token: token,
      sender_id: user.user_id,
      sender_mention: senderMention,
      recipient_id: recipient.type === "user" ? recipient.userId : null,
      recipient_display_name: recipient.type === "user" ? recipient.name : null,
      recipient_type: recipient.type,
      share_type: d.shareType,
      original_chat_id: content.chatId,
      original_message_id: content.messageId,
      original_file_name: content.fileName,
      content_text: null,
      anonymous: d.anonymous,
      show_forward_tag: d.showForwardTag,
      is_protected_content: d.protectContent,
      bot_message_id_to_recipient: controlMessageId,
      created_at: now,
      expires_at: d.destructMinutes > 0 ? new Date(now.getTime() + d.destructMinutes * 60_000) : null,
      self_destruct_minutes_set: d.destructMinutes,
      max_views: d.maxViews,
    });
  } catch (error) {
    // Без записи кнопка у получателя бесполезна
    if (recipient.type === "user" && controlMessageId !== null) {
      await safeDelete(app.bot, recipient.userId, controlMessageId);
    }
    throw error;
  }

  await app.users.incrementSharesCount(user.user_id);
  await clearScreen(app, chatId);

  const receiptText = recipient.type === "link"
    ? TXT.share.sentLink(viewLink(app.me.username, token), d.maxViews)
    : TXT.share.sentToUser(recipient.name);
  const receipt = await notify(app, chatId, receiptText, Keyboards.receipt());
  if (receipt) await app.shares.update(share.share_uuid, { sender_receipt_msg_id: receipt.message_id });

  logger.userAction("secret_created", user.user_id, chatId, {
    share: share.share_uuid,
    recipientType: recipient.type,
    type: d.shareType,
    maxViews: d.maxViews,
    minutes: d.destructMinutes,
  });
  return "ok";
}
