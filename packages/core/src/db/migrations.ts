/**
 * SQLite migrations runner.
 * Reads *.sql files from the migrations folder and applies them in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Runs all pending migrations from the migrations folder.
 * Creates the _migrations tracking table if it doesn't exist.
 *
 * Safe to run from several processes at once: every statement in the
 * migration files is idempotent and the tracking insert ignores duplicates.
 *
 * @returns Filenames applied by this call
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string
): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      filename TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    db
      .prepare("SELECT filename FROM _migrations")
      .all()
      .map((row) => (row as { filename: string }).filename)
  );

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const appliedNow: string[] = [];

  for (const filename of files) {
    if (applied.has(filename)) {
      continue;
    }

    const sql = readFileSync(join(migrationsDir, filename), "utf-8");

    db.transaction(() => {
      db.exec(sql);
      db.prepare(
        "INSERT OR IGNORE INTO _migrations (filename) VALUES (?)"
      ).run(filename);
    })();

    appliedNow.push(filename);
  }

  return appliedNow;
}

/**
 * Gets the default migrations directory path.
 * src/db/migrations.ts and dist/db/migrations.js both sit two levels
 * below the package root, next to migrations/.
 */
export function getDefaultMigrationsDir(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, "..", "..", "migrations");
}
