// src/router/commands.ts
// Slash-команды: /start [payload], /menu, /help, /cancel, /admin.
import type { Message } from "node-telegram-bot-api";
import type { App } from "../bot/context";
import { guardUser, notify, subjectOf } from "../bot/helpers";
import { handleCancel, handleStart, showHelp, showMainMenu } from "../bot/menu";
import { showAdminPanel } from "../bot/admin";
import { checkAccess } from "../lib/access";
import { ErrorHandler } from "../lib/errorHandler";
import { logger } from "../lib/logger";
import { TXT } from "../ui/text";

export type Command = "start" | "menu" | "help" | "cancel" | "admin";

export const COMMANDS: readonly { command: Command; description: string }[] = [
  { command: "start", description: "Main menu" },
  { command: "menu", description: "Main menu" },
  { command: "help", description: "How it works" },
  { command: "cancel", description: "Cancel the current step" },
  { command: "admin", description: "Admin panel (sudo)" },
];

/** "/start@bot payload" → { command, payload }; чужие и неизвестные команды — null */
export function parseCommand(text: string | undefined, botUsername: string): { command: Command; payload?: string } | null {
  const m = /^\/([a-z]+)(?:@(\w+))?(?:\s+(\S+))?\s*$/i.exec(text?.trim() ?? "");
  if (!m) return null;
  if (m[2] && m[2].toLowerCase() !== botUsername.toLowerCase()) return null;
  const command = COMMANDS.find(c => c.command === m[1].toLowerCase())?.command;
  if (!command) return null;
  return m[3] ? { command, payload: m[3] } : { command };
}

export async function handleCommand(app: App, msg: Message): Promise<void> {
  const from = msg.from;
  if (!from || msg.chat.type !== "private") return;
  const parsed = parseCommand(msg.text, app.me.username);
  if (!parsed) return;
  const chatId = msg.chat.id;

  try {
    if (parsed.command === "start") {
      await handleStart(app, msg, parsed.payload);
      return;
    }
    const user = await guardUser(app, from, chatId);
    if (!user) return;
    logger.userAction(`command_${parsed.command}`, user.user_id, chatId);

    switch (parsed.command) {
      case "menu":
        app.flows.clear(user.user_id);
        await showMainMenu(app, chatId, user);
        return;
      case "help":
        await showHelp(app, chatId, user);
        return;
      case "cancel":
        await handleCancel(app, chatId, user);
        return;
      case "admin": {
        const access = checkAccess(subjectOf(user), "sudo", app.config);
        if (!access.allowed) {
          await notify(app, chatId, access.reason);
          return;
        }
        app.flows.clear(user.user_id);
        await showAdminPanel(app, chatId);
        return;
      }
    }
  } catch (error) {
    await ErrorHandler.handleUserError(error, from.id, chatId, `command_${parsed.command}`);
    await notify(app, chatId, TXT.common.error);
  }
}
