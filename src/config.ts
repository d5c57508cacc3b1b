// src/config.ts
// Конфигурация из окружения. Каждый процесс (bot / web / ping) грузит свою часть
// и падает сразу, если чего-то не хватает.
import 'dotenv/config';

export type Env = NodeJS.ProcessEnv;

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export type BotConfig = {
  botToken: string;
  ownerId: number;
  databaseUrl: string;
  botUsername: string | null;
  /** Всегда содержит владельца */
  sudoUsers: number[];
  apiId: number | null;
  apiHash: string | null;
};

export type WebConfig = {
  port: number;
};

export type PingConfig = {
  pingUrl: string;
  pingIntervalSec: number;
};

export const DEFAULT_PING_INTERVAL_SEC = 20;
export const MAX_PING_INTERVAL_SEC = Math.floor(0x7fffffff / 1000);
export const DEFAULT_WEB_PORT = 8080;

function read(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

// Копим ошибки, чтобы показать все пропущенные переменные разом
class Collector {
  readonly problems: string[] = [];

  require(env: Env, name: string): string {
    const v = read(env, name);
    if (v === undefined) {
      this.problems.push(`Missing required env var: ${name}`);
      return "";
    }
    return v;
  }

  positiveInt(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined) return fallback;
    if (!/^\d+$/.test(raw) || Number(raw) <= 0 || !Number.isSafeInteger(Number(raw))) {
      this.problems.push(`${name} must be a positive integer, got "${raw}"`);
      return fallback;
    }
    return Number(raw);
  }

  throwIfAny(): void {
    if (this.problems.length) throw new ConfigError(this.problems);
  }
}

export function parseIdList(raw: string | undefined): { ids: number[]; invalid: string[] } {
  const ids: number[] = [];
  const invalid: string[] = [];
  for (const part of (raw ?? "").split(/[\s,]+/)) {
    if (!part) continue;
    const n = Number(part);
    if (/^\d+$/.test(part) && n > 0 && Number.isSafeInteger(n)) {
      if (!ids.includes(n)) ids.push(n);
    } else {
      invalid.push(part);
    }
  }
  return { ids, invalid };
}

export function loadBotConfig(env: Env = process.env): BotConfig {
  const c = new Collector();
  const botToken = c.require(env, "BOT_TOKEN");
  const ownerRaw = c.require(env, "OWNER_ID");
  const databaseUrl = c.require(env, "DATABASE_URL");
  const ownerId = ownerRaw ? c.positiveInt("OWNER_ID", ownerRaw, 0) : 0;

  // API_ID/API_HASH — MTProto-ключи, Bot API их не требует, но мусор не принимаем
  const apiIdRaw = read(env, "API_ID");
  const apiId = apiIdRaw === undefined ? null : c.positiveInt("API_ID", apiIdRaw, 0);

  const sudo = parseIdList(read(env, "SUDO_USERS"));
  for (const bad of sudo.invalid) c.problems.push(`SUDO_USERS contains a non-numeric id: "${bad}"`);

  c.throwIfAny();

  const sudoUsers = sudo.ids.includes(ownerId) ? sudo.ids : [ownerId, ...sudo.ids];
  const username = read(env, "BOT_USERNAME");

  return {
    botToken,
    ownerId,
    databaseUrl,
    botUsername: username ? username.replace(/^@/, "") : null,
    sudoUsers,
    apiId,
    apiHash: read(env, "API_HASH") ?? null,
  };
}

export function loadWebConfig(env: Env = process.env): WebConfig {
  const c = new Collector();
  const port = c.positiveInt("PORT", read(env, "PORT"), DEFAULT_WEB_PORT);
  c.throwIfAny();
  return { port };
}

export function loadPingConfig(env: Env = process.env): PingConfig {
  const c = new Collector();
  const pingUrl = c.require(env, "PING_URL");
  const pingIntervalSec = c.positiveInt("PING_INTERVAL", read(env, "PING_INTERVAL"), DEFAULT_PING_INTERVAL_SEC);
  // setInterval молча превращает задержку больше 2^31-1 мс в 1 мс
  if (pingIntervalSec > MAX_PING_INTERVAL_SEC) {
    c.problems.push(`PING_INTERVAL must be at most ${MAX_PING_INTERVAL_SEC} seconds, got "${pingIntervalSec}"`);
  }
  c.throwIfAny();
  return { pingUrl, pingIntervalSec };
}

/** Для миграций нужен только адрес базы */
export function loadDatabaseUrl(env: Env = process.env): string {
  const c = new Collector();
  const url = c.require(env, "DATABASE_URL");
  c.throwIfAny();
  return url;
}
