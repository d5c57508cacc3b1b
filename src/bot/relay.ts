// src/bot/relay.ts
// Доставка содержимого секрета получателю.
import type { BotApi } from "./context";
import type { ShareRecord } from "../types";

export type DeliveryMode = "text" | "copy" | "forward";

/** Анонимный секрет всегда копией: пересылка показала бы автора */
export function deliveryMode(share: Pick<ShareRecord, "share_type" | "anonymous" | "show_forward_tag">): DeliveryMode {
  if (share.share_type === "message_inline") return "text";
  if (!share.anonymous && share.show_forward_tag) return "forward";
  return "copy";
}

export async function deliverShare(
  bot: Pick<BotApi, "sendMessage" | "copyMessage" | "forwardMessage">,
  chatId: number,
  share: ShareRecord
): Promise<number> {
  const protect_content = share.is_protected_content;
  switch (deliveryMode(share)) {
    case "text": {
      const sent = await bot.sendMessage(chatId, share.content_text || "—", { protect_content });
      return sent.message_id;
    }
    case "forward": {
      const sent = await bot.forwardMessage(chatId, share.original_chat_id, share.original_message_id, { protect_content });
      return sent.message_id;
    }
    case "copy": {
      const sent = await bot.copyMessage(chatId, share.original_chat_id, share.original_message_id, { protect_content });
      return sent.message_id;
    }
  }
}
