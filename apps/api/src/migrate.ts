import { readdir, readFile } from "fs/promises";
import path from "path";
import type { Database } from "./db";
import type { Logger } from "./logger";

// ─── Migrations ───────────────────────────────────────────
// Every *.sql file in the directory runs once, in file-name order.
// The file name without extension is the version, recorded in the same
// transaction as the file's statements.

const CREATE_VERSION_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version    TEXT PRIMARY KEY,
    applied_at TIMESTAMP NOT NULL DEFAULT NOW()
  )
`;

export async function listMigrations(dir: string): Promise<string[]> {
  const entries = await readdir(dir);
  return entries.filter((name) => name.endsWith(".sql")).sort();
}

export async function runMigrations(
  db: Database,
  dir: string,
  logger: Logger,
): Promise<string[]> {
  await db.query(CREATE_VERSION_TABLE);

  const done = await db.query<{ version: string }>(
    "SELECT version FROM schema_migrations",
  );
  const applied = new Set(done.map((row) => row.version));

  const ran: string[] = [];
  for (const file of await listMigrations(dir)) {
    const version = path.basename(file, ".sql");
    if (applied.has(version)) continue;

    const sql = await readFile(path.join(dir, file), "utf8");
    try {
      await db.transaction(async (tx) => {
        await tx.query(sql);
        await tx.query("INSERT INTO schema_migrations (version) VALUES ($1)", [version]);
      });
    } catch (err) {
      throw new Error(`migration ${version} failed`, { cause: err });
    }

    logger.info({ version }, "Applied migration");
    ran.push(version);
  }

  logger.info({ applied: ran.length }, "Database migrations completed");
  return ran;
}
