// src/lib/flowSession.ts
// Сессии пошаговых диалогов (создание секрета, админ-ввод) в памяти процесса, с TTL шага.
import type { RecipientType } from "../types";

export type ShareStep =
  | "share_content"
  | "share_recipient_type"
  | "share_recipient"
  | "share_protection"
  | "share_ttl"
  | "share_views"
  | "share_confirm";

export type ShareDraft = {
  /** Короткий id черновика в callback_data, отсекает нажатия по старым экранам */
  flowId: string;
  shareType: "message" | "file";
  content?: {
    chatId: number;
    messageId: number;
    fileName: string | null;
    preview: string;
  };
  recipient?:
    | { type: Extract<RecipientType, "link"> }
    | { type: Extract<RecipientType, "user">; userId: number; name: string };
  showForwardTag: boolean;
  protectContent: boolean;
  anonymous: boolean;
  destructMinutes?: number;
  maxViews?: number;
  confirmMessageId?: number;
};

export type FlowSession =
  | { kind: "share"; step: ShareStep; draft: ShareDraft }
  | { kind: "admin_user" }
  | { kind: "admin_ban_reason"; targetId: number }
  | { kind: "admin_broadcast" }
  | { kind: "admin_broadcast_confirm"; fromChatId: number; messageId: number; confirmMessageId?: number };

export type FlowLookup =
  | { status: "none" }
  | { status: "expired"; session: FlowSession }
  | { status: "active"; session: FlowSession };

// Брошенные диалоги держим ещё сутки после таймаута, потом prune их выкидывает
export const FLOW_PRUNE_GRACE_MS = 24 * 60 * 60 * 1000;

type Entry = { session: FlowSession; expiresAt: number };

export class FlowStore {
  private readonly sessions = new Map<number, Entry>();

  constructor(private readonly clock: () => number = Date.now) {}

  set(userId: number, session: FlowSession, ttlMs: number): FlowSession {
    this.sessions.set(userId, { session, expiresAt: this.clock() + ttlMs });
    return session;
  }

  /** Просроченная сессия отдаётся один раз со статусом expired и удаляется */
  lookup(userId: number): FlowLookup {
    const entry = this.sessions.get(userId);
    if (!entry) return { status: "none" };
    if (this.clock() > entry.expiresAt) {
      this.sessions.delete(userId);
      return { status: "expired", session: entry.session };
    }
    return { status: "active", session: entry.session };
  }

  get(userId: number): FlowSession | null {
    const l = this.lookup(userId);
    return l.status === "active" ? l.session : null;
  }

  /**
   * Удаляет сессии, просроченные дольше graceMs. В пределах grace пользователь
   * ещё получит уведомление об истёкшем шаге при следующем сообщении.
   */
  prune(graceMs: number): number {
    const cutoff = this.clock() - graceMs;
    let removed = 0;
    for (const [userId, entry] of this.sessions) {
      if (entry.expiresAt < cutoff) {
        this.sessions.delete(userId);
        removed++;
      }
    }
    return removed;
  }

  clear(userId: number): void {
    this.sessions.delete(userId);
  }

  size(): number {
    return this.sessions.size;
  }
}
