import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  adminAction,
  confirmBroadcast,
  handleAdminUserInput,
  handleBanReason,
  handleBroadcastContent,
  parseAdminAction,
  runBroadcast,
  showStats,
} from "../src/bot/admin";
import type { App } from "../src/bot/context";
import { TXT } from "../src/ui/text";
import type { UserRecord } from "../src/types";
import {
  OWNER_ID,
  lastSentText,
  makeApp,
  message,
  newShareInput,
  tgError,
  type Clock,
  type FakeBot,
  type InMemoryShareRepo,
  type InMemoryUserRepo,
} from "./fakes";

const SUDO_ID = 2000;

describe("admin panel", () => {
  let app: App;
  let bot: FakeBot;
  let users: InMemoryUserRepo;
  let shares: InMemoryShareRepo;
  let clock: Clock;
  let owner: UserRecord;
  let sudo: UserRecord;

  beforeEach(() => {
    ({ app, bot, users, shares, clock } = makeApp());
    owner = users.seed({ user_id: OWNER_ID, role: "owner", is_premium: true, is_sudo: true });
    sudo = users.seed({ user_id: SUDO_ID, role: "sudo", is_premium: true, is_sudo: true });
    users.seed({ user_id: 30, first_name: "Carol", username: "carol" });
  });

  it("parses known actions only", () => {
    expect(parseAdminAction("prem_on")).toBe("prem_on");
    expect(parseAdminAction("delete")).toBeNull();
    expect(parseAdminAction(undefined)).toBeNull();
  });

  it("grants premium for the fixed period and tells the user", async () => {
    expect(await adminAction(app, OWNER_ID, owner, 30, "prem_on")).toBe(TXT.admin.done);
    expect(await users.get(30)).toMatchObject({
      role: "premium",
      is_premium: true,
      premium_expiry: new Date(clock.ms + 3000 * 86_400_000),
    });
    expect(lastSentText(bot, 30)).toBe(TXT.admin.youArePremium);
  });

  it("lets only the owner change sudo", async () => {
    expect(await adminAction(app, SUDO_ID, sudo, 30, "sudo_on")).toBe("This action is reserved for the bot owner.");
    expect(await adminAction(app, OWNER_ID, owner, OWNER_ID, "sudo_off")).toBe(TXT.admin.ownerImmutable);
    expect(await adminAction(app, OWNER_ID, owner, 30, "sudo_on")).toBe(TXT.admin.done);
    expect(await users.get(30)).toMatchObject({ role: "sudo", is_sudo: true, is_premium: true });
  });

  it("asks for a ban reason and then bans", async () => {
    expect(await adminAction(app, SUDO_ID, sudo, 30, "ban")).toBe(TXT.admin.askBanReason);
    expect(app.flows.get(SUDO_ID)).toEqual({ kind: "admin_ban_reason", targetId: 30 });

    await handleBanReason(app, message(SUDO_ID, 5, { text: "  spam  " }), sudo, 30);
    expect(await users.get(30)).toMatchObject({ banned: true, ban_reason: "spam" });
    expect(lastSentText(bot, 30)).toBe(TXT.admin.youAreBanned("spam"));
    expect(app.flows.get(SUDO_ID)).toBeNull();
  });

  it("keeps sudo users safe from other sudo users", async () => {
    users.seed({ user_id: 31, role: "sudo", is_premium: true, is_sudo: true });
    expect(await adminAction(app, SUDO_ID, sudo, 31, "ban")).toBe("This action is reserved for the bot owner.");
    expect(await adminAction(app, SUDO_ID, sudo, SUDO_ID, "ban")).toBe(TXT.admin.notSelf);
  });

  it("reports an unknown user", async () => {
    await handleAdminUserInput(app, message(OWNER_ID, 5, { text: "@nobody_here" }), owner);
    expect(lastSentText(bot, OWNER_ID)).toBe(`${TXT.admin.userNotFound}\n\n${TXT.admin.askUser}`);
    expect(app.flows.get(OWNER_ID)).toEqual({ kind: "admin_user" });
  });

  it("opens the card of a user found by username", async () => {
    await handleAdminUserInput(app, message(OWNER_ID, 5, { text: "@Carol" }), owner);
    expect(lastSentText(bot, OWNER_ID)?.split("\n")[0]).toBe('👤 <b>User</b> <a href="tg://user?id=30">Carol</a>');
    expect(app.flows.get(OWNER_ID)).toBeNull();
  });

  it("shows statistics", async () => {
    await shares.create(newShareInput());
    await showStats(app, OWNER_ID);
    expect(lastSentText(bot, OWNER_ID)).toBe(
      TXT.admin.stats({ total: 3, banned: 0, sudo: 2, premium: 2 }, { total: 1, active: 1, viewed: 0, finalized: 0 })
    );
  });
});

describe("broadcast", () => {
  let app: App;
  let bot: FakeBot;
  let users: InMemoryUserRepo;
  let owner: UserRecord;

  beforeEach(() => {
    ({ app, bot, users } = makeApp());
    owner = users.seed({ user_id: OWNER_ID, role: "owner", is_premium: true, is_sudo: true });
    users.seed({ user_id: 30 });
    users.seed({ user_id: 31 });
    users.seed({ user_id: 32 });
    users.seed({ user_id: 33, banned: true });
  });

  it("retries after a flood wait and counts failures", async () => {
    let floodSent = false;
    bot.copyMessage.mockImplementation(async chatId => {
      if (chatId === 31 && !floodSent) {
        floodSent = true;
        throw tgError(429, "Too Many Requests: retry after 2", 2);
      }
      if (chatId === 32) throw tgError(403, "Forbidden: bot was blocked by the user");
      return { message_id: 1 };
    });
    const sleep = vi.fn(async (_ms: number) => {});

    expect(await runBroadcast(app, OWNER_ID, OWNER_ID, 77, sleep)).toEqual({ sent: 2, failed: 1 });
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(bot.copyMessage.mock.calls.map(c => c[0])).toEqual([30, 31, 31, 32]);
  });

  it("asks for confirmation with the audience size", async () => {
    await handleBroadcastContent(app, message(OWNER_ID, 77, { text: "news" }), owner);
    expect(lastSentText(bot, OWNER_ID)).toBe(TXT.admin.confirmBroadcast(3));
    expect(app.flows.get(OWNER_ID)).toMatchObject({ kind: "admin_broadcast_confirm", fromChatId: OWNER_ID, messageId: 77 });
  });

  it("sends on yes and reports", async () => {
    await handleBroadcastContent(app, message(OWNER_ID, 77, { text: "news" }), owner);
    expect(await confirmBroadcast(app, OWNER_ID, owner, true)).toBe(true);
    expect(bot.copyMessage).toHaveBeenCalledTimes(3);
    expect(lastSentText(bot, OWNER_ID)).toBe(TXT.admin.broadcastDone(3, 0));
  });

  it("cancels on no and ignores a missing session", async () => {
    await handleBroadcastContent(app, message(OWNER_ID, 77, { text: "news" }), owner);
    expect(await confirmBroadcast(app, OWNER_ID, owner, false)).toBe(true);
    expect(lastSentText(bot, OWNER_ID)).toBe(TXT.admin.broadcastCancelled);
    expect(bot.copyMessage).not.toHaveBeenCalled();
    expect(await confirmBroadcast(app, OWNER_ID, owner, true)).toBe(false);
  });
});
