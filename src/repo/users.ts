// src/repo/users.ts
// Хранилище пользователей. Бизнес-правила (роли, истечение премиума) — в bot/helpers.
import { query } from "../db";
import { DEFAULT_SETTINGS, type Role, type UserRecord, type UserSettings } from "../types";

export type NewUser = {
  userId: number;
  firstName: string | null;
  username: string | null;
  role: Role;
  isPremium: boolean;
  isSudo: boolean;
};

export type UserPatch = Partial<
  Pick<
    UserRecord,
    "role" | "is_premium" | "premium_expiry" | "is_sudo" | "banned" | "ban_reason" | "last_screen_msg_id" | "settings"
  >
>;

export type UserStats = {
  total: number;
  banned: number;
  sudo: number;
  premium: number;
};

export interface UserRepo {
  /** Создаёт при первом контакте, иначе обновляет имя и last_active */
  upsert(input: NewUser): Promise<UserRecord>;
  get(userId: number): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  update(userId: number, patch: UserPatch): Promise<UserRecord | null>;
  incrementSharesCount(userId: number): Promise<void>;
  listBroadcastTargets(excludeUserId: number): Promise<number[]>;
  stats(): Promise<UserStats>;
}

const SETTING_KEYS: ReadonlyArray<keyof UserSettings> = [
  "notify_on_view",
  "default_protected_content",
  "default_show_forward_tag",
  "default_anonymous",
];

/** Сохранённые настройки поверх значений по умолчанию */
export function normalizeSettings(raw: unknown): UserSettings {
  const out: UserSettings = { ...DEFAULT_SETTINGS };
  if (typeof raw !== "object" || raw === null) return out;
  for (const key of SETTING_KEYS) {
    const v: unknown = Reflect.get(raw, key);
    if (typeof v === "boolean") out[key] = v;
  }
  return out;
}

type UserRow = Omit<UserRecord, "settings"> & { settings: unknown };

function fromRow(row: UserRow): UserRecord {
  return { ...row, settings: normalizeSettings(row.settings) };
}

const PATCH_COLUMNS = [
  "role",
  "is_premium",
  "premium_expiry",
  "is_sudo",
  "banned",
  "ban_reason",
  "last_screen_msg_id",
  "settings",
] as const satisfies ReadonlyArray<keyof UserPatch>;

export class PgUserRepo implements UserRepo {
  async upsert(input: NewUser): Promise<UserRecord> {
    const res = await query<UserRow>(
      `
      INSERT INTO users (user_id, first_name, username, role, is_premium, is_sudo, first_seen, last_active)
      VALUES ($1, $2, $3, $4, $5, $6, now(), now())
      ON CONFLICT (user_id) DO UPDATE SET
        first_name  = COALESCE($2, users.first_name),
        username    = $3,
        last_active = now()
      RETURNING *
      `,
      [input.userId, input.firstName, input.username, input.role, input.isPremium, input.isSudo]
    );
    return fromRow(res.rows[0]);
  }

  async get(userId: number): Promise<UserRecord | null> {
    const res = await query<UserRow>(`SELECT * FROM users WHERE user_id = $1`, [userId]);
    return res.rows[0] ? fromRow(res.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const res = await query<UserRow>(
      `SELECT * FROM users WHERE lower(username) = lower($1) ORDER BY last_active DESC LIMIT 1`,
      [username.replace(/^@/, "")]
    );
    return res.rows[0] ? fromRow(res.rows[0]) : null;
  }

  async update(userId: number, patch: UserPatch): Promise<UserRecord | null> {
    const sets: string[] = [];
    const params: unknown[] = [userId];
    for (const col of PATCH_COLUMNS) {
      const value = patch[col];
      if (value === undefined) continue;
      params.push(col === "settings" ? JSON.stringify(value) : value);
      sets.push(col === "settings" ? `settings = $${params.length}::jsonb` : `${col} = $${params.length}`);
    }
    if (!sets.length) return this.get(userId);
    const res = await query<UserRow>(
      `UPDATE users SET ${sets.join(", ")} WHERE user_id = $1 RETURNING *`,
      params
    );
    return res.rows[0] ? fromRow(res.rows[0]) : null;
  }

  async incrementSharesCount(userId: number): Promise<void> {
    await query(`UPDATE users SET shares_count = shares_count + 1 WHERE user_id = $1`, [userId]);
  }

  async listBroadcastTargets(excludeUserId: number): Promise<number[]> {
    const res = await query<{ user_id: number }>(
      `SELECT user_id FROM users WHERE banned = false AND user_id <> $1 ORDER BY first_seen`,
      [excludeUserId]
    );
    return res.rows.map(r => r.user_id);
  }

  async stats(): Promise<UserStats> {
    const res = await query<UserStats>(
      `
      SELECT count(*)::int                                  AS total,
             count(*) FILTER (WHERE banned)::int            AS banned,
             count(*) FILTER (WHERE is_sudo)::int           AS sudo,
             count(*) FILTER (WHERE is_premium)::int        AS premium
        FROM users
      `
    );
    return res.rows[0];
  }
}
