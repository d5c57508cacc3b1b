import { describe, it, expect, beforeEach } from "vitest";
import { handleReaction, parseReactionUpdate, type ReactionEvent } from "../src/bot/reactions";
import type { App } from "../src/bot/context";
import { FLOW_TIMEOUT_MS } from "../src/limits";
import { TXT } from "../src/ui/text";
import {
  lastSentText,
  makeApp,
  newShareInput,
  type FakeBot,
  type InMemoryShareRepo,
  type InMemoryUserRepo,
} from "./fakes";

describe("parseReactionUpdate", () => {
  it("keeps only newly added emoji", () => {
    const ev = parseReactionUpdate({
      chat: { id: 20, type: "private" },
      user: { id: 20, is_bot: false, first_name: "Bob" },
      message_id: 70,
      date: 0,
      old_reaction: [{ type: "emoji", emoji: "👍" }],
      new_reaction: [
        { type: "emoji", emoji: "👍" },
        { type: "emoji", emoji: "👀" },
        { type: "custom_emoji", custom_emoji_id: "123" },
      ],
    });
    expect(ev).toEqual({ chatId: 20, messageId: 70, user: { id: 20, first_name: "Bob", is_bot: false }, added: ["👀"] });
  });

  it("drops reactions without a user", () => {
    expect(parseReactionUpdate({ chat: { id: -5 }, actor_chat: { id: -5 }, message_id: 1, new_reaction: [] })).toBeNull();
    expect(parseReactionUpdate("nope")).toBeNull();
  });
});

describe("handleReaction", () => {
  let app: App;
  let bot: FakeBot;
  let users: InMemoryUserRepo;
  let shares: InMemoryShareRepo;

  function reaction(userId: number, messageId: number, emoji: string): ReactionEvent {
    return { chatId: userId, messageId, user: { id: userId, first_name: `User${userId}` }, added: [emoji] };
  }

  beforeEach(() => {
    ({ app, bot, users, shares } = makeApp());
    users.seed({ user_id: 10, first_name: "Alice" });
    users.seed({ user_id: 20, first_name: "Bob" });
  });

  it("reveals a secret from its control message", async () => {
    await shares.create(newShareInput());
    expect(await handleReaction(app, reaction(20, 70, "👀"))).toBe("reveal");
    expect(bot.copyMessage).toHaveBeenCalledWith(20, 10, 50, { protect_content: false });
  });

  it("explains why a revealed secret is unavailable", async () => {
    const share = await shares.create(newShareInput());
    await shares.transition(share.share_uuid, ["active"], "revoked", { revoked_at: new Date() });
    expect(await handleReaction(app, reaction(20, 70, "👀"))).toBe("reveal");
    expect(lastSentText(bot, 20)).toBe(TXT.view.revoked);
  });

  it("confirms or cancels the share on its confirmation screen", async () => {
    const draft = {
      flowId: "f1",
      shareType: "message" as const,
      content: { chatId: 10, messageId: 50, fileName: null, preview: "hi" },
      recipient: { type: "link" as const },
      showForwardTag: true,
      protectContent: false,
      anonymous: true,
      destructMinutes: 0,
      maxViews: 1,
      confirmMessageId: 88,
    };
    app.flows.set(10, { kind: "share", step: "share_confirm", draft }, FLOW_TIMEOUT_MS);

    expect(await handleReaction(app, reaction(10, 87, "👍"))).toBe("ignored");
    expect(await handleReaction(app, reaction(10, 88, "👍"))).toBe("confirm");
    expect(shares.only()).toMatchObject({ sender_id: 10, recipient_type: "link", original_message_id: 50 });

    app.flows.set(10, { kind: "share", step: "share_confirm", draft }, FLOW_TIMEOUT_MS);
    expect(await handleReaction(app, reaction(10, 88, "👎"))).toBe("cancel");
    expect(app.flows.get(10)).toBeNull();
    expect(lastSentText(bot, 10)).toBe(TXT.common.cancelled);
  });

  it("revokes from the sender's receipt", async () => {
    const share = await shares.create(newShareInput());
    await shares.update(share.share_uuid, { sender_receipt_msg_id: 90 });
    expect(await handleReaction(app, reaction(10, 90, "🔥"))).toBe("revoke");
    expect((await shares.getByUuid(share.share_uuid))?.status).toBe("revoked");
    expect(lastSentText(bot, 10)).toBe(TXT.secrets.revoked);
  });

  it("ignores bots, strangers and banned users", async () => {
    await shares.create(newShareInput());
    expect(await handleReaction(app, { ...reaction(20, 70, "👀"), user: { id: 20, is_bot: true } })).toBe("ignored");
    expect(await handleReaction(app, reaction(55, 70, "👀"))).toBe("ignored");
    users.seed({ user_id: 20, banned: true });
    expect(await handleReaction(app, reaction(20, 70, "👀"))).toBe("ignored");
    expect(bot.copyMessage).not.toHaveBeenCalled();
  });
});
