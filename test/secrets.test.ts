import { describe, it, expect, beforeEach } from "vitest";
import { describeShare, pageCount, revokeShare, showMySecrets, showSecretDetail } from "../src/bot/secrets";
import type { App } from "../src/bot/context";
import { TXT } from "../src/ui/text";
import {
  lastKeyboard,
  lastSentText,
  makeApp,
  newShareInput,
  type Clock,
  type FakeBot,
  type InMemoryShareRepo,
  type InMemoryUserRepo,
} from "./fakes";

describe("my secrets", () => {
  let app: App;
  let bot: FakeBot;
  let users: InMemoryUserRepo;
  let shares: InMemoryShareRepo;
  let clock: Clock;

  beforeEach(() => {
    ({ app, bot, users, shares, clock } = makeApp());
    users.seed({ user_id: 10, first_name: "Alice" });
  });

  async function seedShares(n: number): Promise<void> {
    for (let i = 0; i < n; i++) {
      await shares.create(newShareInput({ created_at: new Date(Date.UTC(2024, 0, 1, 10, i)) }));
    }
  }

  it("counts at least one page", () => {
    expect(pageCount(0)).toBe(1);
    expect(pageCount(5)).toBe(1);
    expect(pageCount(6)).toBe(2);
  });

  it("shows an empty state", async () => {
    await showMySecrets(app, 10, 10);
    expect(lastSentText(bot, 10)).toBe(TXT.secrets.empty);
  });

  it("pages through active and viewed secrets", async () => {
    await seedShares(7);
    await showMySecrets(app, 10, 10, 2);
    expect(lastSentText(bot, 10)).toBe(TXT.secrets.title(2, 2, 7));
    const rows = lastKeyboard(bot, 10);
    expect(rows).toHaveLength(4);
    expect(rows[2]).toEqual([{ text: "◀", callback_data: "my:list:1" }]);
  });

  it("clamps a page beyond the end to the last one", async () => {
    await seedShares(6);
    await showMySecrets(app, 10, 10, 9);
    expect(lastSentText(bot, 10)).toBe(TXT.secrets.title(2, 2, 6));
  });

  it("leaves finalized secrets out of the list", async () => {
    await seedShares(1);
    const gone = await shares.create(newShareInput());
    await shares.transition(gone.share_uuid, ["active"], "destructed", { destructed_at: new Date(clock.ms) });
    await showMySecrets(app, 10, 10);
    expect(lastSentText(bot, 10)).toBe(TXT.secrets.title(1, 1, 1));
  });

  it("describes a secret", () => {
    const share = {
      ...newShareInput({ share_uuid: "abcdef12-0000-4000-8000-000000000001", self_destruct_minutes_set: 60 }),
      sender_receipt_msg_id: null,
      status: "active" as const,
      view_count: 0,
      viewed_at: null,
      viewed_by_user_id: null,
      viewed_by_display_name: null,
      revoked_at: null,
      destructed_at: null,
      expired_at: null,
      failure_reason: null,
    };
    const lines = describeShare(share).split("\n");
    expect(lines[0]).toBe("🟢 <b>Secret</b> <code>abcdef12</code>");
    expect(lines).toContain("▫️ <b>Recipient:</b> Bob");
    expect(lines).toContain("▫️ <b>Views:</b> 0 / 1");
    expect(lines).toContain("▫️ <b>Timer:</b> 1 hour(s)");
    expect(lines).toContain("▫️ <b>Created:</b> 2024-01-01 11:00 UTC");
  });

  it("hides another user's secret", async () => {
    const share = await shares.create(newShareInput());
    await showSecretDetail(app, 30, 30, share.share_uuid, 1);
    expect(lastSentText(bot, 30)).toBe(TXT.secrets.notYours);
  });

  it("revokes once and removes the recipient's button", async () => {
    const share = await shares.create(newShareInput());

    const result = await revokeShare(app, 10, share.share_uuid);
    expect(result).toMatchObject({ ok: true, share: { status: "revoked" } });
    expect(bot.deleteMessage).toHaveBeenCalledWith(20, 70);
    const stored = await shares.getByUuid(share.share_uuid);
    expect(stored?.revoked_at).toEqual(new Date(clock.ms));
    expect(stored?.expires_at).toEqual(new Date(clock.ms));

    expect(await revokeShare(app, 10, share.share_uuid)).toEqual({ ok: false, text: TXT.secrets.cannotRevoke });
  });

  it("refuses to revoke someone else's secret", async () => {
    const share = await shares.create(newShareInput());
    expect(await revokeShare(app, 30, share.share_uuid)).toEqual({ ok: false, text: TXT.secrets.notYours });
    expect((await shares.getByUuid(share.share_uuid))?.status).toBe("active");
  });
});
