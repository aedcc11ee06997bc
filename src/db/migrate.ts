import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import type { Logger } from "pino";

const MIGRATIONS_TABLE = "schema_migrations";
const DEFAULT_MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "migrations");

export class MigrationChecksumError extends Error {
  constructor(
    readonly migrationId: string,
    readonly appliedChecksum: string,
    readonly currentChecksum: string,
  ) {
    super(`Migration ${migrationId} changed after it was applied (applied=${appliedChecksum} current=${currentChecksum})`);
    this.name = "MigrationChecksumError";
  }
}

const ensureMigrationsTable = (db: Database.Database) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
};

const migrationIdFromFile = (fileName: string): string => path.basename(fileName, path.extname(fileName));

const computeChecksum = (contents: string): string => createHash("sha256").update(contents).digest("hex");

/**
 * Applies every pending `.sql` file in name order, each in its own
 * transaction, and returns the ids applied.
 */
export const runMigrations = (
  db: Database.Database,
  logger: Logger,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
): string[] => {
  ensureMigrationsTable(db);

  const findApplied = db.prepare<[string], { checksum: string }>(
    `SELECT checksum FROM ${MIGRATIONS_TABLE} WHERE id = ?`,
  );
  const markApplied = db.prepare<{ id: string; checksum: string; applied_at: number }>(
    `INSERT INTO ${MIGRATIONS_TABLE} (id, checksum, applied_at) VALUES (@id, @checksum, @applied_at)`,
  );

  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort();

  const applied: string[] = [];
  for (const file of files) {
    const id = migrationIdFromFile(file);
    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    const checksum = computeChecksum(sql);

    const existing = findApplied.get(id);
    if (existing) {
      if (existing.checksum !== checksum) {
        throw new MigrationChecksumError(id, existing.checksum, checksum);
      }
      continue;
    }

    db.transaction(() => {
      db.exec(sql);
      markApplied.run({ id, checksum, applied_at: Date.now() });
    })();
    logger.info({ migration: id }, "Applied migration");
    applied.push(id);
  }

  return applied;
};
