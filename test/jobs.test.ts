import { describe, it, expect, beforeEach, vi } from "vitest";
import { sweepDueShares } from "../src/jobs/sweeper";
import { JobScheduler } from "../src/jobs/scheduler";
import type { App } from "../src/bot/context";
import { makeApp, newShareInput, tgError, type Clock, type FakeBot, type InMemoryShareRepo } from "./fakes";

describe("sweepDueShares", () => {
  let app: App;
  let bot: FakeBot;
  let shares: InMemoryShareRepo;
  let clock: Clock;
  let past: Date;

  beforeEach(() => {
    ({ app, bot, shares, clock } = makeApp());
    past = new Date(clock.ms - 1000);
  });

  it("destroys due secrets whose button was removed", async () => {
    const share = await shares.create(newShareInput({ expires_at: past }));
    expect(await sweepDueShares(app)).toEqual({ destructed: 1, expired: 0, skipped: 0 });
    expect(bot.deleteMessage).toHaveBeenCalledWith(20, 70);
    expect(await shares.getByUuid(share.share_uuid)).toMatchObject({ status: "destructed", destructed_at: new Date(clock.ms) });
  });

  it("marks secrets expired when the button could not be removed", async () => {
    bot.deleteMessage.mockRejectedValueOnce(tgError(400, "Bad Request: message can't be deleted"));
    const share = await shares.create(newShareInput({ expires_at: past }));
    expect(await sweepDueShares(app)).toEqual({ destructed: 0, expired: 1, skipped: 0 });
    expect(await shares.getByUuid(share.share_uuid)).toMatchObject({ status: "expired", failure_reason: "delete_forbidden" });
  });

  it("expires link secrets and removes inline temporary messages", async () => {
    const link = await shares.create(
      newShareInput({ recipient_type: "link", recipient_id: null, bot_message_id_to_recipient: null, expires_at: past })
    );
    const inline = await shares.create(
      newShareInput({
        recipient_type: "link",
        recipient_id: null,
        bot_message_id_to_recipient: null,
        share_type: "message_inline",
        original_message_id: 66,
        expires_at: past,
      })
    );
    expect(await sweepDueShares(app)).toEqual({ destructed: 0, expired: 2, skipped: 0 });
    expect(bot.deleteMessage).toHaveBeenCalledTimes(1);
    expect(bot.deleteMessage).toHaveBeenCalledWith(10, 66);
    expect(await shares.getByUuid(link.share_uuid)).toMatchObject({ status: "expired", failure_reason: null });
    expect((await shares.getByUuid(inline.share_uuid))?.status).toBe("expired");
  });

  it("leaves secrets without a due timer alone", async () => {
    await shares.create(newShareInput({ expires_at: null }));
    await shares.create(newShareInput({ expires_at: new Date(clock.ms + 60_000) }));
    expect(await sweepDueShares(app)).toEqual({ destructed: 0, expired: 0, skipped: 0 });
    expect(bot.deleteMessage).not.toHaveBeenCalled();
  });

  it("skips secrets finalized in the meantime", async () => {
    await shares.create(newShareInput({ expires_at: past }));
    vi.spyOn(shares, "transition").mockResolvedValueOnce(null);
    expect(await sweepDueShares(app)).toEqual({ destructed: 0, expired: 0, skipped: 1 });
  });
});

describe("JobScheduler", () => {
  it("validates jobs on registration", () => {
    const scheduler = new JobScheduler();
    const run = async () => undefined;
    expect(() => scheduler.register({ id: " ", expression: "* * * * *", run })).toThrow("Job id is required");
    expect(() => scheduler.register({ id: "sweep", expression: "every minute", run })).toThrow(
      "Invalid cron expression for job sweep: every minute"
    );
  });

  it("does not overlap runs of the same job", async () => {
    const scheduler = new JobScheduler();
    let release = () => {};
    const run = vi.fn(() => new Promise<void>(resolve => { release = () => resolve(); }));
    scheduler.register({ id: "sweep", expression: "* * * * *", run });

    const first = scheduler.runNow("sweep");
    expect(await scheduler.runNow("sweep")).toBe(false);
    release();
    expect(await first).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
    expect(await scheduler.runNow("unknown")).toBe(false);
  });

  it("reports a failed run", async () => {
    const scheduler = new JobScheduler();
    scheduler.register({ id: "boom", expression: "*/5 * * * *", run: async () => { throw new Error("db down"); } });
    expect(await scheduler.runNow("boom")).toBe(false);
    expect(await scheduler.runNow("boom")).toBe(false);
  });

  it("starts and stops scheduled tasks", () => {
    const scheduler = new JobScheduler();
    scheduler.register({ id: "sweep", expression: "* * * * *", run: async () => undefined });
    scheduler.start();
    scheduler.start();
    scheduler.stop();
    scheduler.stop();
  });
});
