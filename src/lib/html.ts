// src/lib/html.ts
// Экранирование для parse_mode="HTML"
export function esc(s: string | number | null | undefined): string {
  const x = (s ?? "").toString();
  return x
    .replace(/&/g, "&amp;")  // первым, иначе испортим остальные замены
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** Кликабельное упоминание пользователя */
export function mention(userId: number, name: string | null | undefined): string {
  return `<a href="tg://user?id=${userId}">${esc(name || String(userId))}</a>`;
}

export function displayName(u: { first_name?: string | null; username?: string | null; id?: number }): string {
  if (u.first_name) return u.first_name;
  if (u.username) return `@${u.username}`;
  return u.id !== undefined ? String(u.id) : "Unknown";
}
