// src/limits.ts
// Лимиты тарифов. 0 в maxViews = без ограничения, 0 в таймере = без таймера.

export type Tier = "free" | "premium";

export type TierLimits = {
  maxFileSizeMb: number;
  destructOptions: readonly number[];
  viewOptions: readonly number[];
  defaultMaxViews: number;
  /** Потолок просмотров, null — без потолка */
  maxAllowedViews: number | null;
  maxActiveShares: number;
};

const FREE_DESTRUCT = [1, 5, 10, 30, 60, 120, 360, 720, 1440] as const;
const FREE_VIEWS = [1, 2, 30, 500, 10_000, 250_000, 5_000_000] as const;

export const LIMITS: Record<Tier, TierLimits> = {
  free: {
    maxFileSizeMb: 1024,
    destructOptions: FREE_DESTRUCT,
    viewOptions: FREE_VIEWS,
    defaultMaxViews: 1_000_000,
    maxAllowedViews: 5_000_000,
    maxActiveShares: 500,
  },
  premium: {
    maxFileSizeMb: 2048,
    destructOptions: [...FREE_DESTRUCT, 2880],
    viewOptions: [...FREE_VIEWS, 0],
    defaultMaxViews: 3_000_000,
    maxAllowedViews: null,
    maxActiveShares: 4000,
  },
};

export const MAX_SECRET_TEXT_LENGTH = 4000;
export const MY_SECRETS_PAGE_SIZE = 5;
export const INLINE_CACHE_TIME_SEC = 300;
export const INLINE_SHARE_TTL_HOURS = 87_600;
export const FLOW_TIMEOUT_MS = 300_000;
export const BROADCAST_TIMEOUT_MS = 600_000;
export const PREMIUM_GRANT_DAYS = 3000;

export function tierOf(isPremium: boolean): Tier {
  return isPremium ? "premium" : "free";
}

export function limitsFor(isPremium: boolean): TierLimits {
  return LIMITS[tierOf(isPremium)];
}

/** Неизвестный вариант таймера превращается в 0 (без таймера) */
export function resolveDestructMinutes(choice: number, isPremium: boolean): number {
  return limitsFor(isPremium).destructOptions.includes(choice) ? choice : 0;
}

export function resolveMaxViews(choice: number, isPremium: boolean): number {
  const l = limitsFor(isPremium);
  if (isPremium) return l.viewOptions.includes(choice) ? choice : l.defaultMaxViews;
  if (!Number.isInteger(choice) || choice <= 0) return l.defaultMaxViews;
  if (l.maxAllowedViews !== null && choice > l.maxAllowedViews) return l.defaultMaxViews;
  return choice;
}

export function fileSizeAllowed(bytes: number | undefined, isPremium: boolean): boolean {
  if (bytes === undefined) return true;
  return bytes <= limitsFor(isPremium).maxFileSizeMb * 1024 * 1024;
}

export function formatMinutes(minutes: number): string {
  if (minutes <= 0) return "No timer";
  if (minutes < 60) return `${minutes} min`;
  if (minutes % 1440 === 0) return `${minutes / 1440} day(s)`;
  if (minutes % 60 === 0) return `${minutes / 60} hour(s)`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function formatViews(views: number): string {
  return views <= 0 ? "Unlimited" : views.toLocaleString("en-US");
}
