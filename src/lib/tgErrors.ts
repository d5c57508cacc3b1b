// src/lib/tgErrors.ts
// Разбор ошибок Bot API (node-telegram-bot-api кладёт ответ в error.response.body)

export type TelegramFailure = {
  code: number;
  description: string;
  retryAfter?: number;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function telegramFailure(e: unknown): TelegramFailure | null {
  if (!isRecord(e)) return null;
  const response = e.response;
  if (!isRecord(response)) return null;
  const body = response.body;
  if (!isRecord(body)) return null;
  const code = typeof body.error_code === "number" ? body.error_code : null;
  if (code === null) return null;
  const description = typeof body.description === "string" ? body.description : "";
  const params = body.parameters;
  const retryAfter = isRecord(params) && typeof params.retry_after === "number" ? params.retry_after : undefined;
  return { code, description, retryAfter };
}

/** 403: пользователь заблокировал бота или удалён */
export function isBlockedError(e: unknown): boolean {
  const f = telegramFailure(e);
  return f !== null && f.code === 403;
}

/** 400: чат не найден / пользователь ни разу не писал боту */
export function isPeerInvalid(e: unknown): boolean {
  const f = telegramFailure(e);
  return f !== null && f.code === 400 && /chat not found|peer_id_invalid|user not found/i.test(f.description);
}

export function isMessageGone(e: unknown): boolean {
  const f = telegramFailure(e);
  return f !== null && f.code === 400 && /message to delete not found|message not found/i.test(f.description);
}

export function isDeleteForbidden(e: unknown): boolean {
  const f = telegramFailure(e);
  return f !== null && f.code === 400 && /message can't be deleted/i.test(f.description);
}

export function retryAfterSeconds(e: unknown): number | null {
  const f = telegramFailure(e);
  if (!f || f.code !== 429) return null;
  return f.retryAfter ?? 1;
}
