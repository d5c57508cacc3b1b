// src/bot/settings.ts
import type { App } from "./context";
import { sendScreen } from "./helpers";
import { Keyboards } from "../ui/keyboards";
import { TXT } from "../ui/text";
import type { UserRecord, UserSettings } from "../types";

const TOGGLES = new Map<string, keyof UserSettings>([
  ["notify", "notify_on_view"],
  ["prot", "default_protected_content"],
  ["fwd", "default_show_forward_tag"],
  ["anon", "default_anonymous"],
]);

export async function showSettings(app: App, chatId: number, user: UserRecord): Promise<void> {
  await sendScreen(app, chatId, { text: TXT.settings.title, keyboard: Keyboards.settings(user.settings) });
}

export async function toggleSetting(app: App, chatId: number, user: UserRecord, key: string | undefined): Promise<void> {
  const field = key ? TOGGLES.get(key) : undefined;
  if (!field) {
    await showSettings(app, chatId, user);
    return;
  }
  const settings: UserSettings = { ...user.settings, [field]: !user.settings[field] };
  const updated = await app.users.update(user.user_id, { settings });
  await showSettings(app, chatId, updated ?? { ...user, settings });
}
