/**
 * Database Migration Runner
 *
 * Executes SQL migration files from /migrations directory.
 * Tracks applied versions in _schema_version table.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

interface MigrationFile {
  version: number;
  filename: string;
  sql: string;
}

function getCurrentVersion(db: Database.Database): number {
  const table = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_schema_version'"
    )
    .get();
  if (!table) return 0;

  const row = db
    .prepare<[], { version: number | null }>(
      'SELECT MAX(version) AS version FROM _schema_version'
    )
    .get();
  return row?.version ?? 0;
}

/**
 * Load all migration files, sorted by version
 */
export function loadMigrations(dir: string = MIGRATIONS_DIR): MigrationFile[] {
  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  return files.map((filename) => {
    const match = filename.match(/^(\d+)_.+\.sql$/);
    if (!match) {
      throw new Error(
        `Invalid migration filename: ${filename}. Expected format: NNN_description.sql`
      );
    }

    return {
      version: Number.parseInt(match[1], 10),
      filename,
      sql: readFileSync(join(dir, filename), 'utf-8'),
    };
  });
}

/**
 * Run all pending migrations. Each file applies inside its own transaction.
 */
export function runMigrations(
  db: Database.Database,
  dir: string = MIGRATIONS_DIR
): {
  applied: string[];
  currentVersion: number;
} {
  const currentVersion = getCurrentVersion(db);
  const pending = loadMigrations(dir).filter(
    (m) => m.version > currentVersion
  );

  const applied: string[] = [];

  for (const migration of pending) {
    if (process.env.AUTOME_VERBOSE === 'true') {
      console.log(`[db] Applying migration: ${migration.filename}`);
    }

    db.transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO _schema_version (version) VALUES (?)').run(
        migration.version
      );
    })();

    applied.push(migration.filename);
  }

  const finalVersion = getCurrentVersion(db);

  if (applied.length > 0 && process.env.AUTOME_VERBOSE === 'true') {
    console.log(`[db] Migrations complete. Schema version: ${finalVersion}`);
  }

  return { applied, currentVersion: finalVersion };
}
