// src/jobs/sweeper.ts
// Финализация просроченных секретов: кнопка у получателя удаляется, статус destructed/expired.
import type { App } from "../bot/context";
import { safeDelete } from "../bot/helpers";
import { logger } from "../lib/logger";
import type { ShareRecord } from "../types";

export type SweepDeps = Pick<App, "bot" | "shares" | "now">;

export type SweepReport = {
  destructed: number;
  expired: number;
  /** Уже финализированы кем-то ещё (просмотр, отзыв) */
  skipped: number;
};

export const SWEEP_BATCH = 200;

async function finalize(deps: SweepDeps, share: ShareRecord, now: Date): Promise<"destructed" | "expired" | "skipped"> {
  let outcome: "destructed" | "expired" = "expired";
  let failureReason: string | null = null;

  if (share.recipient_type === "user" && share.recipient_id !== null && share.bot_message_id_to_recipient !== null) {
    const deleted = await safeDelete(deps.bot, share.recipient_id, share.bot_message_id_to_recipient);
    if (deleted === "deleted" || deleted === "missing") outcome = "destructed";
    else failureReason = deleted === "forbidden" ? "delete_forbidden" : "delete_failed";
  }
  if (share.share_type === "message_inline") {
    await safeDelete(deps.bot, share.original_chat_id, share.original_message_id);
  }

  const patch = outcome === "destructed"
    ? { destructed_at: now }
    : { expired_at: now, failure_reason: failureReason };
  const done = await deps.shares.transition(share.share_uuid, ["active"], outcome, patch);
  return done ? outcome : "skipped";
}

export async function sweepDueShares(deps: SweepDeps, batch = SWEEP_BATCH): Promise<SweepReport> {
  const now = deps.now();
  const due = await deps.shares.listDue(now, batch);
  const report: SweepReport = { destructed: 0, expired: 0, skipped: 0 };
  for (const share of due) {
    report[await finalize(deps, share, now)]++;
  }
  if (due.length) logger.info("Expired secrets swept", { action: "sweep", ...report });
  return report;
}
