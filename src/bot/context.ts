// src/bot/context.ts
// Всё, что нужно обработчикам: транспорт, хранилища, сессии, конфиг.
import type TelegramBot from "node-telegram-bot-api";
import type { BotConfig } from "../config";
import type { FlowStore } from "../lib/flowSession";
import type { ShareRepo } from "../repo/shares";
import type { UserRepo } from "../repo/users";

/** Узкий срез Bot API, которым пользуются обработчики */
export type BotApi = Pick<
  TelegramBot,
  | "sendMessage"
  | "deleteMessage"
  | "copyMessage"
  | "forwardMessage"
  | "answerCallbackQuery"
  | "answerInlineQuery"
>;

export type App = {
  bot: BotApi;
  users: UserRepo;
  shares: ShareRepo;
  flows: FlowStore;
  config: Pick<BotConfig, "ownerId" | "sudoUsers">;
  me: { id: number; username: string };
  now: () => Date;
};
