// src/tools/migrate.ts
// Простой раннер .sql миграций из папки migrations (по алфавиту).
import { Client } from "pg";
import fs from "fs";
import path from "path";
import { loadDatabaseUrl } from "../config";
import { logger, toError } from "../lib/logger";

export const MIGRATIONS_DIR = path.join(__dirname, "..", "..", "migrations");

/** Ещё не применённые .sql файлы, по имени */
export function pendingMigrations(files: string[], applied: ReadonlySet<string>): string[] {
  return files.filter(f => f.endsWith(".sql") && !applied.has(f)).sort();
}

export async function migrate(databaseUrl: string, dir = MIGRATIONS_DIR): Promise<string[]> {
  const client = new Client({ connectionString: databaseUrl });
  await client.connect();
  const done: string[] = [];
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id BIGSERIAL PRIMARY KEY,
        filename TEXT UNIQUE NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);

    const appliedRes = await client.query<{ filename: string }>(`SELECT filename FROM schema_migrations;`);
    const applied = new Set(appliedRes.rows.map(r => r.filename));
    const pending = pendingMigrations(fs.readdirSync(dir), applied);
    if (!pending.length) logger.info("No pending migrations", { action: "migrate" });

    for (const file of pending) {
      const sql = fs.readFileSync(path.join(dir, file), "utf-8");
      logger.info(`Applying ${file}`, { action: "migrate", file });
      try {
        await client.query("BEGIN");
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations(filename) VALUES($1)", [file]);
        await client.query("COMMIT");
        done.push(file);
      } catch (error) {
        await client.query("ROLLBACK");
        throw new Error(`Migration ${file} failed: ${toError(error).message}`);
      }
    }
  } finally {
    await client.end();
  }
  return done;
}

if (require.main === module) {
  migrate(loadDatabaseUrl())
    .then(applied => {
      logger.info("Migrations complete", { action: "migrate", applied });
    })
    .catch((error: unknown) => {
      logger.error("Migration failed", { action: "migration_failed", error: toError(error) });
      process.exit(1);
    });
}
