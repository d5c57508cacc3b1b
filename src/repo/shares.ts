// src/repo/shares.ts
// Хранилище секретов. Все смены статуса — условные UPDATE ... RETURNING,
// так что процессы и планировщик не применят переход дважды.
import { query } from "../db";
import type { ShareRecord, ShareStatus } from "../types";

export type NewShare = Pick<
  ShareRecord,
  | "share_uuid"
  | "access_token"
  | "sender_id"
  | "sender_mention"
  | "recipient_id"
  | "recipient_display_name"
  | "recipient_type"
  | "share_type"
  | "original_chat_id"
  | "original_message_id"
  | "original_file_name"
  | "content_text"
  | "anonymous"
  | "show_forward_tag"
  | "is_protected_content"
  | "bot_message_id_to_recipient"
  | "created_at"
  | "expires_at"
  | "self_destruct_minutes_set"
  | "max_views"
>;

export type SharePatch = Partial<
  Pick<
    ShareRecord,
    | "bot_message_id_to_recipient"
    | "sender_receipt_msg_id"
    | "revoked_at"
    | "destructed_at"
    | "expired_at"
    | "expires_at"
    | "failure_reason"
  >
>;

export type Viewer = { id: number; name: string };

export type ShareStats = {
  total: number;
  active: number;
  viewed: number;
  finalized: number;
};

export interface ShareRepo {
  create(share: NewShare): Promise<ShareRecord>;
  getByUuid(uuid: string): Promise<ShareRecord | null>;
  getByToken(token: string): Promise<ShareRecord | null>;
  findByControlMessage(recipientId: number, messageId: number): Promise<ShareRecord | null>;
  findByReceipt(senderId: number, messageId: number): Promise<ShareRecord | null>;
  countActiveBySender(senderId: number): Promise<number>;
  listBySender(
    senderId: number,
    statuses: ShareStatus[],
    limit: number,
    offset: number
  ): Promise<{ items: ShareRecord[]; total: number }>;
  /**
   * Атомарно засчитывает просмотр. null — секрет недоступен этому зрителю
   * (не активен, истёк, исчерпан или адресован другому).
   */
  registerView(token: string, viewer: Viewer, now: Date): Promise<ShareRecord | null>;
  update(uuid: string, patch: SharePatch): Promise<ShareRecord | null>;
  /** Переход статуса только из перечисленных состояний */
  transition(uuid: string, from: ShareStatus[], to: ShareStatus, patch?: SharePatch): Promise<ShareRecord | null>;
  delete(uuid: string): Promise<void>;
  /** Активные секреты с истёкшим expires_at */
  listDue(now: Date, limit: number): Promise<ShareRecord[]>;
  stats(): Promise<ShareStats>;
}

const PATCH_COLUMNS = [
  "bot_message_id_to_recipient",
  "sender_receipt_msg_id",
  "revoked_at",
  "destructed_at",
  "expired_at",
  "expires_at",
  "failure_reason",
] as const satisfies ReadonlyArray<keyof SharePatch>;

function patchSql(patch: SharePatch, params: unknown[]): string[] {
  const sets: string[] = [];
  for (const col of PATCH_COLUMNS) {
    const value = patch[col];
    if (value === undefined) continue;
    params.push(value);
    sets.push(`${col} = $${params.length}`);
  }
  return sets;
}

// Мусор из ссылки или callback_data не должен доходить до приведения к uuid в запросе
export function isUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(value);
}

export class PgShareRepo implements ShareRepo {
  async create(s: NewShare): Promise<ShareRecord> {
    const res = await query<ShareRecord>(
      `
      INSERT INTO shares (
        share_uuid, access_token, sender_id, sender_mention, recipient_id, recipient_display_name,
        recipient_type, share_type, original_chat_id, original_message_id, original_file_name,
        content_text, anonymous, show_forward_tag, is_protected_content, bot_message_id_to_recipient,
        status, created_at, expires_at, self_destruct_minutes_set, view_count, max_views
      ) VALUES (
        $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16,
        'active', $17, $18, $19, 0, $20
      )
      RETURNING *
      `,
      [
        s.share_uuid, s.access_token, s.sender_id, s.sender_mention, s.recipient_id, s.recipient_display_name,
        s.recipient_type, s.share_type, s.original_chat_id, s.original_message_id, s.original_file_name,
        s.content_text, s.anonymous, s.show_forward_tag, s.is_protected_content, s.bot_message_id_to_recipient,
        s.created_at, s.expires_at, s.self_destruct_minutes_set, s.max_views,
      ]
    );
    return res.rows[0];
  }

  async getByUuid(uuid: string): Promise<ShareRecord | null> {
    if (!isUuid(uuid)) return null;
    const res = await query<ShareRecord>(`SELECT * FROM shares WHERE share_uuid = $1`, [uuid]);
    return res.rows[0] ?? null;
  }

  async getByToken(token: string): Promise<ShareRecord | null> {
    if (!isUuid(token)) return null;
    const res = await query<ShareRecord>(`SELECT * FROM shares WHERE access_token = $1`, [token]);
    return res.rows[0] ?? null;
  }

  async findByControlMessage(recipientId: number, messageId: number): Promise<ShareRecord | null> {
    const res = await query<ShareRecord>(
      `SELECT * FROM shares WHERE recipient_id = $1 AND bot_message_id_to_recipient = $2 LIMIT 1`,
      [recipientId, messageId]
    );
    return res.rows[0] ?? null;
  }

  async findByReceipt(senderId: number, messageId: number): Promise<ShareRecord | null> {
    const res = await query<ShareRecord>(
      `SELECT * FROM shares WHERE sender_id = $1 AND sender_receipt_msg_id = $2 LIMIT 1`,
      [senderId, messageId]
    );
    return res.rows[0] ?? null;
  }

  async countActiveBySender(senderId: number): Promise<number> {
    const res = await query<{ n: number }>(
      `SELECT count(*)::int AS n FROM shares WHERE sender_id = $1 AND status = 'active'`,
      [senderId]
    );
    return res.rows[0]?.n ?? 0;
  }

  async listBySender(senderId: number, statuses: ShareStatus[], limit: number, offset: number) {
    const items = await query<ShareRecord>(
      `
      SELECT * FROM shares
       WHERE sender_id = $1 AND status = ANY($2::text[])
       ORDER BY created_at DESC
       LIMIT $3 OFFSET $4
      `,
      [senderId, statuses, limit, offset]
    );
    const total = await query<{ n: number }>(
      `SELECT count(*)::int AS n FROM shares WHERE sender_id = $1 AND status = ANY($2::text[])`,
      [senderId, statuses]
    );
    return { items: items.rows, total: total.rows[0]?.n ?? 0 };
  }

  async registerView(token: string, viewer: Viewer, now: Date): Promise<ShareRecord | null> {
    if (!isUuid(token)) return null;
    // В SET колонки читаются со старыми значениями
    const res = await query<ShareRecord>(
      `
      UPDATE shares SET
        view_count             = view_count + 1,
        viewed_at              = $3,
        viewed_by_user_id      = $2,
        viewed_by_display_name = $4,
        status = CASE WHEN max_views > 0 AND view_count + 1 >= max_views THEN 'viewed' ELSE status END,
        recipient_id = CASE
          WHEN recipient_type = 'link' AND max_views > 0 AND view_count + 1 >= max_views THEN $2
          ELSE recipient_id END,
        recipient_display_name = CASE
          WHEN recipient_type = 'link' AND max_views > 0 AND view_count + 1 >= max_views THEN $4
          ELSE recipient_display_name END
      WHERE access_token = $1
        AND status = 'active'
        AND (expires_at IS NULL OR expires_at > $3)
        AND (max_views <= 0 OR view_count < max_views)
        AND (recipient_type = 'link' OR recipient_id = $2)
      RETURNING *
      `,
      [token, viewer.id, now, viewer.name]
    );
    return res.rows[0] ?? null;
  }

  async update(uuid: string, patch: SharePatch): Promise<ShareRecord | null> {
    const params: unknown[] = [uuid];
    const sets = patchSql(patch, params);
    if (!sets.length) return this.getByUuid(uuid);
    const res = await query<ShareRecord>(
      `UPDATE shares SET ${sets.join(", ")} WHERE share_uuid = $1 RETURNING *`,
      params
    );
    return res.rows[0] ?? null;
  }

  async transition(uuid: string, from: ShareStatus[], to: ShareStatus, patch: SharePatch = {}): Promise<ShareRecord | null> {
    const params: unknown[] = [uuid, from, to];
    const sets = ["status = $3", ...patchSql(patch, params)];
    const res = await query<ShareRecord>(
      `UPDATE shares SET ${sets.join(", ")} WHERE share_uuid = $1 AND status = ANY($2::text[]) RETURNING *`,
      params
    );
    return res.rows[0] ?? null;
  }

  async delete(uuid: string): Promise<void> {
    await query(`DELETE FROM shares WHERE share_uuid = $1`, [uuid]);
  }

  async listDue(now: Date, limit: number): Promise<ShareRecord[]> {
    const res = await query<ShareRecord>(
      `
      SELECT * FROM shares
       WHERE status = 'active' AND expires_at IS NOT NULL AND expires_at <= $1
       ORDER BY expires_at
       LIMIT $2
      `,
      [now, limit]
    );
    return res.rows;
  }

  async stats(): Promise<ShareStats> {
    const res = await query<ShareStats>(
      `
      SELECT count(*)::int                                                             AS total,
             count(*) FILTER (WHERE status = 'active')::int                            AS active,
             count(*) FILTER (WHERE status = 'viewed')::int                            AS viewed,
             count(*) FILTER (WHERE status IN ('expired', 'revoked', 'destructed'))::int AS finalized
        FROM shares
      `
    );
    return res.rows[0];
  }
}
