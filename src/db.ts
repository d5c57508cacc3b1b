// src/db.ts
import { Pool, types, type QueryResult, type QueryResultRow } from "pg";
import { logger, toError } from "./lib/logger";

// BIGINT (id пользователей Telegram) отдаём числом: в 2^53 они помещаются
types.setTypeParser(types.builtins.INT8, (v: string) => Number(v));

let pool: Pool | null = null;

export function initDb(connectionString: string): Pool {
  if (!pool) {
    pool = new Pool({ connectionString });
    pool.on("error", (e) => logger.error("Idle database client error", { action: "db_pool_error", error: e }));
  }
  return pool;
}

function getPool(): Pool {
  if (!pool) throw new Error("Database pool is not initialised");
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
  const startTime = Date.now();
  try {
    const res = await getPool().query<T>(text, params);
    logger.dbQuery(text, Date.now() - startTime);
    return res;
  } catch (e) {
    logger.dbQuery(text, undefined, toError(e));
    throw e;
  }
}

// Ждём доступности БД с ретраями, чтобы не упасть с ECONNREFUSED на старте
export async function waitForDb(tries = 30, delayMs = 1000): Promise<void> {
  let lastErr: unknown;
  for (let i = 1; i <= tries; i++) {
    try {
      await getPool().query("SELECT 1");
      return;
    } catch (e) {
      lastErr = e;
      logger.warn(`Database not ready (attempt ${i}/${tries})`, { action: "wait_for_db" });
      await new Promise(r => setTimeout(r, delayMs));
    }
  }
  throw lastErr;
}

export async function closeDb(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
