/**
 * SQL migration runner for relaywatch.
 *
 * Reads raw `.sql` files from a directory, tracks applied migrations in a
 * `_migrations` table, and applies unapplied ones in lexicographic order.
 *
 * The whole run is one transaction holding a transaction-scoped advisory
 * lock, so the lock lives on the same pooled connection as the work and is
 * released by COMMIT even if the process dies mid-run. Each file runs in
 * its own savepoint: a failing file is rolled back and recorded, and the
 * remaining files are still attempted. A missing or empty migrations
 * directory is a no-op.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type postgres from "postgres";
import type { Logger } from "pino";

/** Advisory lock ID, must be the same for every instance */
export const MIGRATION_LOCK_ID = 21114001;

/** Result of a migration run, reporting what happened for each file */
export interface MigrationResult {
  /** Migrations that were successfully applied in this run */
  applied: string[];
  /** Migrations that were already applied (skipped) */
  skipped: string[];
  /** Migrations that failed, with error messages */
  errors: Array<{ name: string; error: string }>;
}

/**
 * Run all pending SQL migrations from the given directory.
 *
 * When another instance is already migrating, the wait for its lock is
 * logged, then the run continues against whatever that instance applied.
 *
 * @param migrationsDir - Absolute path to the directory containing .sql files
 */
export async function runMigrations(
  sql: postgres.Sql,
  migrationsDir: string,
  logger: Logger,
): Promise<MigrationResult> {
  const result: MigrationResult = { applied: [], skipped: [], errors: [] };

  const migrationFiles = await readMigrationFiles(migrationsDir);
  if (migrationFiles.length === 0) {
    return result;
  }

  await sql.begin(async (tx) => {
    await acquireMigrationLock(tx, logger);

    await tx`
      CREATE TABLE IF NOT EXISTS _migrations (
        name       TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL
      )
    `;

    const applied = await tx<{ name: string }[]>`SELECT name FROM _migrations`;
    const appliedSet = new Set(applied.map((row) => row.name));

    for (const file of migrationFiles) {
      if (appliedSet.has(file.name)) {
        result.skipped.push(file.name);
        continue;
      }

      try {
        await tx.savepoint(async (sp) => {
          await sp.unsafe(file.content);
          await sp`INSERT INTO _migrations (name, applied_at) VALUES (${file.name}, now())`;
        });
        result.applied.push(file.name);
        logger.info({ migration: file.name }, "Migration applied");
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : "Unknown migration error";
        result.errors.push({ name: file.name, error: errorMessage });
        logger.error({ migration: file.name, error: errorMessage }, "Migration failed");
      }
    }
  });

  return result;
}

/** Take the migration lock for the rest of the transaction, logging any wait */
async function acquireMigrationLock(tx: postgres.TransactionSql, logger: Logger): Promise<void> {
  const [attempt] = await tx<{ locked: boolean }[]>`
    SELECT pg_try_advisory_xact_lock(${MIGRATION_LOCK_ID}) AS locked
  `;
  if (attempt?.locked) return;

  logger.info({ lock_id: MIGRATION_LOCK_ID }, "Waiting for migration lock held by another instance");
  const started = Date.now();
  await tx`SELECT pg_advisory_xact_lock(${MIGRATION_LOCK_ID})`;
  logger.info({ lock_id: MIGRATION_LOCK_ID, wait_ms: Date.now() - started }, "Migration lock acquired");
}

/** A migration file read from disk */
interface MigrationFile {
  /** Filename, used as the migration name */
  name: string;
  /** Raw SQL content */
  content: string;
}

/**
 * Read all .sql files from the migrations directory, sorted lexicographically.
 * Returns an empty array if the directory doesn't exist or has no .sql files.
 */
export async function readMigrationFiles(
  dir: string,
): Promise<MigrationFile[]> {
  let entries: string[];

  try {
    entries = await readdir(dir);
  } catch {
    // Directory doesn't exist: nothing to migrate
    return [];
  }

  const sqlFiles = entries.filter((f) => f.endsWith(".sql")).sort();

  const files: MigrationFile[] = [];
  for (const name of sqlFiles) {
    const content = await readFile(join(dir, name), "utf-8");
    files.push({ name, content });
  }

  return files;
}
