// src/ui/cb.ts
import type { CbPrefix } from "../types";

export type ParsedCb = {
  prefix: string;
  verb: string;
  id?: string;
  arg?: string;
  raw: string;
};

// Telegram ограничивает callback_data 64 байтами
export const CB_MAX_BYTES = 64;

export function parseCb(raw?: string): ParsedCb | null {
  const s = String(raw || "");
  if (!s) return null;
  const [prefix = "", verb = "", id, ...rest] = s.split(":");
  if (!prefix || !verb) return null;
  return { prefix, verb, id, arg: rest.length ? rest.join(":") : undefined, raw: s };
}

/** Сборка callback_data: <prefix>:<verb>[:<id>[:<arg>]] */
export function mkCb(prefix: CbPrefix, verb: string, id?: string | number, arg?: string | number): string {
  const parts: string[] = [prefix, verb];
  if (id !== undefined) parts.push(String(id));
  if (arg !== undefined) parts.push(String(arg));
  const data = parts.join(":");
  if (Buffer.byteLength(data, "utf8") > CB_MAX_BYTES) {
    throw new Error(`callback_data too long: ${data}`);
  }
  return data;
}
