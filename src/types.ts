// src/types.ts
// Общие типы домена

export type Role = "free" | "premium" | "sudo" | "owner";

export type UserSettings = {
  notify_on_view: boolean;
  default_protected_content: boolean;
  default_show_forward_tag: boolean;
  default_anonymous: boolean;
};

export const DEFAULT_SETTINGS: UserSettings = {
  notify_on_view: true,
  default_protected_content: false,
  default_show_forward_tag: true,
  default_anonymous: true,
};

export type UserRecord = {
  user_id: number;
  first_name: string | null;
  username: string | null;
  role: Role;
  is_premium: boolean;
  premium_expiry: Date | null;
  is_sudo: boolean;
  banned: boolean;
  ban_reason: string | null;
  first_seen: Date;
  last_active: Date;
  shares_count: number;
  last_screen_msg_id: number | null;
  settings: UserSettings;
};

export type ShareStatus = "active" | "viewed" | "expired" | "revoked" | "destructed";
export type ShareType = "message" | "file" | "message_inline";
export type RecipientType = "user" | "link";

export type ShareRecord = {
  share_uuid: string;
  access_token: string;
  sender_id: number;
  sender_mention: string;
  recipient_id: number | null;
  recipient_display_name: string | null;
  recipient_type: RecipientType;
  share_type: ShareType;
  original_chat_id: number;
  original_message_id: number;
  original_file_name: string | null;
  content_text: string | null;
  anonymous: boolean;
  show_forward_tag: boolean;
  is_protected_content: boolean;
  bot_message_id_to_recipient: number | null;
  sender_receipt_msg_id: number | null;
  status: ShareStatus;
  created_at: Date;
  expires_at: Date | null;
  self_destruct_minutes_set: number;
  view_count: number;
  max_views: number;
  viewed_at: Date | null;
  viewed_by_user_id: number | null;
  viewed_by_display_name: string | null;
  revoked_at: Date | null;
  destructed_at: Date | null;
  expired_at: Date | null;
  failure_reason: string | null;
};

export const STATUS_EMOJI: Record<ShareStatus, string> = {
  active: "🟢",
  viewed: "👁️",
  expired: "⏳",
  revoked: "❌",
  destructed: "🔥",
};

// Префиксы callback_data
export const CB = {
  SYS: "sys",
  SHR: "shr",
  VIEW: "v",
  MY: "my",
  SET: "set",
  ADM: "adm",
} as const;

export type CbPrefix = (typeof CB)[keyof typeof CB];
