// src/lib/access.ts
// Проверка прав: owner > sudo > premium > none. Забаненным нельзя ничего.
import type { Role, UserRecord } from "../types";

export type AccessLevel = "owner" | "sudo" | "premium" | "none";

export type AccessConfig = {
  ownerId: number;
  sudoUsers: readonly number[];
};

export type AccessSubject = {
  userId: number;
  user: Pick<UserRecord, "is_sudo" | "is_premium" | "banned" | "ban_reason"> | null;
};

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

const RANK: Record<AccessLevel, number> = { none: 0, premium: 1, sudo: 2, owner: 3 };

export function isOwner(userId: number, cfg: AccessConfig): boolean {
  return userId === cfg.ownerId;
}

export function isSudo(subject: AccessSubject, cfg: AccessConfig): boolean {
  return isOwner(subject.userId, cfg) || cfg.sudoUsers.includes(subject.userId) || subject.user?.is_sudo === true;
}

export function isPremium(subject: AccessSubject, cfg: AccessConfig): boolean {
  return isSudo(subject, cfg) || subject.user?.is_premium === true;
}

export function levelOf(subject: AccessSubject, cfg: AccessConfig): AccessLevel {
  if (isOwner(subject.userId, cfg)) return "owner";
  if (isSudo(subject, cfg)) return "sudo";
  if (isPremium(subject, cfg)) return "premium";
  return "none";
}

export function checkAccess(subject: AccessSubject, required: AccessLevel, cfg: AccessConfig): AccessDecision {
  if (subject.user?.banned && !isOwner(subject.userId, cfg)) {
    return { allowed: false, reason: `You are banned. Reason: ${subject.user.ban_reason || "No reason provided"}` };
  }
  if (RANK[levelOf(subject, cfg)] >= RANK[required]) return { allowed: true };
  switch (required) {
    case "owner": return { allowed: false, reason: "This action is reserved for the bot owner." };
    case "sudo": return { allowed: false, reason: "This action requires sudo privileges." };
    default: return { allowed: false, reason: "This feature is available to premium users only." };
  }
}

/** Роль нового пользователя */
export function initialRole(userId: number, cfg: AccessConfig): Role {
  if (isOwner(userId, cfg)) return "owner";
  if (cfg.sudoUsers.includes(userId)) return "sudo";
  return "free";
}

/** Флаги, которые следуют из роли */
export function roleFlags(role: Role): { is_premium: boolean; is_sudo: boolean } {
  return {
    is_premium: role !== "free",
    is_sudo: role === "sudo" || role === "owner",
  };
}
