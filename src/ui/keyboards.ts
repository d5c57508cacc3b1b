// src/ui/keyboards.ts
// Единая система клавиатур и кнопок

import type { InlineKeyboardButton } from "node-telegram-bot-api";
import { mkCb } from "./cb";
import { CB, STATUS_EMOJI, type ShareRecord, type UserRecord, type UserSettings } from "../types";
import { formatMinutes, formatViews, type TierLimits } from "../limits";

// ===== КОНСТАНТЫ КНОПОК =====
export const BUTTONS = {
  SHARE_MESSAGE: "✉️ Share Message",
  SHARE_FILE: "📎 Share File",
  MY_SECRETS: "🗂 My Secrets",
  SETTINGS: "⚙️ Settings",
  PREMIUM: "💎 Premium",
  HELP: "❓ Help",
  ADMIN: "🛠 Admin Panel",
  MENU: "🏠 Menu",
  BACK: "⬅️ Back",
  CANCEL: "❌ Cancel",
  CONFIRM: "✅ Confirm",
  NEXT: "➡️ Next",

  LINK: "🔗 Anyone with the link",
  USER: "👤 Specific user",

  VIEW: "👁️ View Secret",
  REVOKE: "❌ Revoke",

  ADM_USER: "👤 Manage User",
  ADM_BROADCAST: "📣 Broadcast",
  ADM_STATS: "📊 Stats",
  YES: "✅ Yes",
  NO: "❌ No",
} as const;

type Keyboard = InlineKeyboardButton[][];

function btn(text: string, callback_data: string): InlineKeyboardButton {
  return { text, callback_data };
}

function onOff(v: boolean): string {
  return v ? "✅" : "❌";
}

/** Раскладка вариантов по рядам */
function grid(buttons: InlineKeyboardButton[], perRow: number): Keyboard {
  const rows: Keyboard = [];
  for (let i = 0; i < buttons.length; i += perRow) rows.push(buttons.slice(i, i + perRow));
  return rows;
}

export const Keyboards = {
  mainMenu(isSudo: boolean): Keyboard {
    const rows: Keyboard = [
      [btn(BUTTONS.SHARE_MESSAGE, mkCb(CB.SHR, "type", "message")), btn(BUTTONS.SHARE_FILE, mkCb(CB.SHR, "type", "file"))],
      [btn(BUTTONS.MY_SECRETS, mkCb(CB.MY, "list", 1)), btn(BUTTONS.SETTINGS, mkCb(CB.SET, "open"))],
      [btn(BUTTONS.PREMIUM, mkCb(CB.SYS, "premium")), btn(BUTTONS.HELP, mkCb(CB.SYS, "help"))],
    ];
    if (isSudo) rows.push([btn(BUTTONS.ADMIN, mkCb(CB.ADM, "panel"))]);
    return rows;
  },

  backToMenu(): Keyboard {
    return [[btn(BUTTONS.MENU, mkCb(CB.SYS, "menu"))]];
  },

  cancelFlow(): Keyboard {
    return [[btn(BUTTONS.CANCEL, mkCb(CB.SYS, "cancel"))]];
  },

  recipientType(flowId: string): Keyboard {
    return [
      [btn(BUTTONS.LINK, mkCb(CB.SHR, "rt", flowId, "link"))],
      [btn(BUTTONS.USER, mkCb(CB.SHR, "rt", flowId, "user"))],
      [btn(BUTTONS.CANCEL, mkCb(CB.SYS, "cancel"))],
    ];
  },

  protection(flowId: string, fwd: boolean, prot: boolean, anon: boolean): Keyboard {
    return [
      [btn(`${onOff(anon)} Anonymous`, mkCb(CB.SHR, "tog", flowId, "anon"))],
      [btn(`${onOff(fwd)} Forward tag`, mkCb(CB.SHR, "tog", flowId, "fwd"))],
      [btn(`${onOff(prot)} Protect content`, mkCb(CB.SHR, "tog", flowId, "prot"))],
      [btn(BUTTONS.NEXT, mkCb(CB.SHR, "prot_done", flowId))],
      [btn(BUTTONS.CANCEL, mkCb(CB.SYS, "cancel"))],
    ];
  },

  destructOptions(flowId: string, l: TierLimits): Keyboard {
    const options = [0, ...l.destructOptions].map(m => btn(formatMinutes(m), mkCb(CB.SHR, "ttl", flowId, m)));
    return [...grid(options, 3), [btn(BUTTONS.CANCEL, mkCb(CB.SYS, "cancel"))]];
  },

  viewOptions(flowId: string, l: TierLimits): Keyboard {
    const options = l.viewOptions.map(v => btn(formatViews(v), mkCb(CB.SHR, "views", flowId, v)));
    return [...grid(options, 3), [btn(BUTTONS.CANCEL, mkCb(CB.SYS, "cancel"))]];
  },

  confirm(flowId: string): Keyboard {
    return [[btn(BUTTONS.CONFIRM, mkCb(CB.SHR, "ok", flowId)), btn(BUTTONS.CANCEL, mkCb(CB.SHR, "no", flowId))]];
  },

  viewSecret(token: string): Keyboard {
    return [[btn(BUTTONS.VIEW, mkCb(CB.VIEW, "open", token))]];
  },

  receipt(): Keyboard {
    return [[btn(BUTTONS.MY_SECRETS, mkCb(CB.MY, "list", 1)), btn(BUTTONS.MENU, mkCb(CB.SYS, "menu"))]];
  },

  secretsList(items: ShareRecord[], page: number, pages: number): Keyboard {
    const rows: Keyboard = items.map(s => [
      btn(
        `${STATUS_EMOJI[s.status]} ${s.recipient_display_name || (s.recipient_type === "link" ? "Link" : "User")} · ${s.share_type}`,
        mkCb(CB.MY, "show", s.share_uuid, page)
      ),
    ]);
    const nav: InlineKeyboardButton[] = [];
    if (page > 1) nav.push(btn("◀", mkCb(CB.MY, "list", page - 1)));
    if (page < pages) nav.push(btn("▶", mkCb(CB.MY, "list", page + 1)));
    if (nav.length) rows.push(nav);
    rows.push([btn(BUTTONS.MENU, mkCb(CB.SYS, "menu"))]);
    return rows;
  },

  secretDetail(share: ShareRecord, page: number): Keyboard {
    const rows: Keyboard = [];
    if (share.status === "active" || share.status === "viewed") {
      rows.push([btn(BUTTONS.REVOKE, mkCb(CB.MY, "revoke", share.share_uuid, page))]);
    }
    rows.push([btn(BUTTONS.BACK, mkCb(CB.MY, "list", page))]);
    return rows;
  },

  settings(s: UserSettings): Keyboard {
    return [
      [btn(`${onOff(s.notify_on_view)} Notify me on view`, mkCb(CB.SET, "tog", "notify"))],
      [btn(`${onOff(s.default_anonymous)} Anonymous by default`, mkCb(CB.SET, "tog", "anon"))],
      [btn(`${onOff(s.default_show_forward_tag)} Show forward tag by default`, mkCb(CB.SET, "tog", "fwd"))],
      [btn(`${onOff(s.default_protected_content)} Protect content by default`, mkCb(CB.SET, "tog", "prot"))],
      [btn(BUTTONS.MENU, mkCb(CB.SYS, "menu"))],
    ];
  },

  adminPanel(): Keyboard {
    return [
      [btn(BUTTONS.ADM_USER, mkCb(CB.ADM, "user"))],
      [btn(BUTTONS.ADM_BROADCAST, mkCb(CB.ADM, "bcast"))],
      [btn(BUTTONS.ADM_STATS, mkCb(CB.ADM, "stats"))],
      [btn(BUTTONS.MENU, mkCb(CB.SYS, "menu"))],
    ];
  },

  adminUser(target: UserRecord, actorIsOwner: boolean): Keyboard {
    const id = target.user_id;
    const rows: Keyboard = [];
    if (actorIsOwner && target.role !== "owner") {
      rows.push([
        target.is_sudo
          ? btn("⬇️ Demote sudo", mkCb(CB.ADM, "act", id, "sudo_off"))
          : btn("⬆️ Promote sudo", mkCb(CB.ADM, "act", id, "sudo_on")),
      ]);
    }
    rows.push([
      target.role === "premium"
        ? btn("➖ Revoke premium", mkCb(CB.ADM, "act", id, "prem_off"))
        : btn("💎 Grant premium", mkCb(CB.ADM, "act", id, "prem_on")),
    ]);
    if (target.role !== "owner") {
      rows.push([
        target.banned
          ? btn("✅ Unban", mkCb(CB.ADM, "act", id, "unban"))
          : btn("🚫 Ban", mkCb(CB.ADM, "act", id, "ban")),
      ]);
    }
    rows.push([btn(BUTTONS.BACK, mkCb(CB.ADM, "panel"))]);
    return rows;
  },

  broadcastConfirm(): Keyboard {
    return [[btn(BUTTONS.YES, mkCb(CB.ADM, "bc_yes")), btn(BUTTONS.NO, mkCb(CB.ADM, "bc_no"))]];
  },
};
