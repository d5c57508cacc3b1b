import { describe, it, expect, beforeEach } from "vitest";
import { ensureUser, guardUser, safeDelete, sendScreen, notify } from "../src/bot/helpers";
import type { App } from "../src/bot/context";
import { TXT } from "../src/ui/text";
import {
  OWNER_ID,
  makeApp,
  tgError,
  type Clock,
  type FakeBot,
  type InMemoryUserRepo,
} from "./fakes";

describe("bot helpers", () => {
  let app: App;
  let bot: FakeBot;
  let users: InMemoryUserRepo;
  let clock: Clock;

  beforeEach(() => {
    ({ app, bot, users, clock } = makeApp({ sudoUsers: [2000] }));
  });

  it("creates users with their configured role", async () => {
    expect(await ensureUser(app, { id: 10, first_name: "Alice" })).toMatchObject({ role: "free", is_premium: false });
    expect(await ensureUser(app, { id: 2000 })).toMatchObject({ role: "sudo", is_sudo: true, is_premium: true });
    expect(await ensureUser(app, { id: OWNER_ID })).toMatchObject({ role: "owner", is_sudo: true });
  });

  it("promotes a stored user who became the owner", async () => {
    users.seed({ user_id: OWNER_ID, role: "free" });
    expect(await ensureUser(app, { id: OWNER_ID })).toMatchObject({ role: "owner", is_premium: true, is_sudo: true });
  });

  it("drops premium after its expiry", async () => {
    users.seed({ user_id: 30, role: "premium", is_premium: true, premium_expiry: new Date(clock.ms - 1) });
    expect(await ensureUser(app, { id: 30 })).toMatchObject({ role: "free", is_premium: false, premium_expiry: null });
  });

  it("keeps a sudo user's role when the expiry passes", async () => {
    users.seed({ user_id: 2000, role: "sudo", is_premium: true, is_sudo: true, premium_expiry: new Date(clock.ms - 1) });
    expect(await ensureUser(app, { id: 2000 })).toMatchObject({ role: "sudo", is_premium: true, premium_expiry: null });
  });

  it("replaces the previous screen", async () => {
    users.seed({ user_id: 10, last_screen_msg_id: 42 });
    const sent = await sendScreen(app, 10, { text: "<b>hi</b>" });
    expect(bot.deleteMessage).toHaveBeenCalledWith(10, 42);
    expect(bot.sendMessage).toHaveBeenCalledWith(10, "<b>hi</b>", {
      parse_mode: "HTML",
      disable_web_page_preview: true,
      reply_markup: undefined,
    });
    expect((await users.get(10))?.last_screen_msg_id).toBe(sent.message_id);
  });

  it("classifies delete failures", async () => {
    expect(await safeDelete(bot, 10, 1)).toBe("deleted");
    bot.deleteMessage.mockRejectedValueOnce(tgError(400, "Bad Request: message to delete not found"));
    expect(await safeDelete(bot, 10, 1)).toBe("missing");
    bot.deleteMessage.mockRejectedValueOnce(tgError(403, "Forbidden: bot was blocked by the user"));
    expect(await safeDelete(bot, 10, 1)).toBe("forbidden");
    bot.deleteMessage.mockRejectedValueOnce(new Error("socket hang up"));
    expect(await safeDelete(bot, 10, 1)).toBe("failed");
  });

  it("returns null when a notification can't be sent", async () => {
    bot.sendMessage.mockRejectedValueOnce(tgError(403, "Forbidden: bot was blocked by the user"));
    expect(await notify(app, 10, "hello")).toBeNull();
  });

  it("stops banned users but lets the owner through", async () => {
    users.seed({ user_id: 30, banned: true, ban_reason: null });
    expect(await guardUser(app, { id: 30 }, 30)).toBeNull();
    expect(bot.sendMessage).toHaveBeenCalledWith(30, TXT.common.banned(null), {
      parse_mode: "HTML",
      disable_web_page_preview: true,
      reply_markup: undefined,
    });

    users.seed({ user_id: OWNER_ID, role: "owner", is_premium: true, is_sudo: true, banned: true });
    expect(await guardUser(app, { id: OWNER_ID }, OWNER_ID)).toMatchObject({ user_id: OWNER_ID });
  });
});
