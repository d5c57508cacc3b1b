import { describe, it, expect, beforeEach } from "vitest";
import type { InlineQuery } from "node-telegram-bot-api";
import { handleInlineQuery } from "../src/bot/inline";
import { viewLink } from "../src/bot/view";
import type { App } from "../src/bot/context";
import { TXT } from "../src/ui/text";
import {
  BOT_USERNAME,
  makeApp,
  tgError,
  tgUser,
  type Clock,
  type FakeBot,
  type InMemoryShareRepo,
  type InMemoryUserRepo,
} from "./fakes";

function inlineQuery(query: string): InlineQuery {
  return { id: "q1", from: tgUser(10, { first_name: "Alice" }), query, offset: "" };
}

describe("inline secrets", () => {
  let app: App;
  let bot: FakeBot;
  let users: InMemoryUserRepo;
  let shares: InMemoryShareRepo;
  let clock: Clock;

  beforeEach(() => {
    ({ app, bot, users, shares, clock } = makeApp());
  });

  it("answers an empty query with no results", async () => {
    await handleInlineQuery(app, inlineQuery("   "));
    expect(bot.answerInlineQuery).toHaveBeenCalledWith("q1", [], { cache_time: 0, is_personal: true });
    expect(bot.sendMessage).not.toHaveBeenCalled();
  });

  it("creates a one-view link secret backed by a temporary message", async () => {
    await handleInlineQuery(app, inlineQuery("  meet at noon "));

    expect(bot.sendMessage).toHaveBeenCalledWith(10, TXT.inline.tempMessage("meet at noon"), {
      parse_mode: "HTML",
      disable_notification: true,
      protect_content: true,
    });
    const share = shares.only();
    expect(share).toMatchObject({
      sender_id: 10,
      recipient_type: "link",
      share_type: "message_inline",
      content_text: "meet at noon",
      original_chat_id: 10,
      original_message_id: 100,
      max_views: 1,
      is_protected_content: false,
      show_forward_tag: true,
    });
    expect(share.expires_at).toEqual(new Date(clock.ms + 87_600 * 3_600_000));
    expect(await users.get(10)).not.toBeNull();

    const [id, results, options] = bot.answerInlineQuery.mock.calls[0];
    expect(id).toBe("q1");
    expect(options).toEqual({ cache_time: 300, is_personal: true });
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      type: "article",
      id: share.access_token,
      title: TXT.inline.resultTitle,
      description: "meet at noon",
      input_message_content: { message_text: TXT.inline.resultText(viewLink(BOT_USERNAME, share.access_token)) },
    });
  });

  it("takes protection and forward tag from the sender's defaults", async () => {
    users.seed({
      user_id: 10,
      settings: { notify_on_view: true, default_protected_content: true, default_show_forward_tag: false, default_anonymous: true },
    });
    await handleInlineQuery(app, inlineQuery("meet at noon"));
    expect(shares.only()).toMatchObject({ is_protected_content: true, show_forward_tag: false });
  });

  it("rejects text above the limit", async () => {
    await handleInlineQuery(app, inlineQuery("x".repeat(4001)));
    const [, results, options] = bot.answerInlineQuery.mock.calls[0];
    expect(results[0]).toMatchObject({ id: "notice", title: TXT.inline.tooLongTitle });
    expect(options).toEqual({ cache_time: 0, is_personal: true });
    expect(shares.rows.size).toBe(0);
  });

  it("asks to start the bot when the private chat is closed", async () => {
    bot.sendMessage.mockRejectedValueOnce(tgError(403, "Forbidden: bot can't initiate conversation with a user"));
    await handleInlineQuery(app, inlineQuery("hello"));
    const [, results] = bot.answerInlineQuery.mock.calls[0];
    expect(results[0]).toMatchObject({ id: "notice", title: TXT.inline.startFirstTitle });
    expect(shares.rows.size).toBe(0);
  });

  it("ignores banned users", async () => {
    users.seed({ user_id: 10, banned: true });
    await handleInlineQuery(app, inlineQuery("hello"));
    expect(bot.answerInlineQuery).toHaveBeenCalledWith("q1", [], { cache_time: 0, is_personal: true });
    expect(bot.sendMessage).not.toHaveBeenCalled();
  });

  it("rolls the secret back when the answer fails", async () => {
    bot.answerInlineQuery.mockRejectedValueOnce(tgError(400, "Bad Request: query is too old"));
    await handleInlineQuery(app, inlineQuery("hello"));
    expect(shares.rows.size).toBe(0);
    expect(bot.deleteMessage).toHaveBeenCalledWith(10, 100);
  });
});
