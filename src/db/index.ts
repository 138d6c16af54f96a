/**
 * Database Connection
 *
 * Lazily opened connection for the CLI process. Services never reach for it
 * directly; they receive a `Repositories` bundle at construction.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Repositories } from '../0_types.js';
import { runMigrations } from './migrate.js';
import {
  createSqliteNoteRepository,
  createSqliteTranscriptionAssetRepository,
  createSqliteTranscriptionJobRepository,
  createSqliteUploadSessionRepository,
} from './repositories/index.js';

let db: Database.Database | null = null;
let repositories: Repositories | null = null;

/**
 * Open a database file, configure pragmas and apply pending migrations
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const instance = new Database(dbPath);

  // Configure pragmas for performance and safety
  if (dbPath !== ':memory:') {
    instance.pragma('journal_mode = WAL');
    instance.pragma('synchronous = NORMAL');
  }
  instance.pragma('foreign_keys = ON');
  instance.pragma('busy_timeout = 5000');

  runMigrations(instance);

  return instance;
}

export function createRepositories(instance: Database.Database): Repositories {
  return {
    uploadSessions: createSqliteUploadSessionRepository(instance),
    jobs: createSqliteTranscriptionJobRepository(instance),
    assets: createSqliteTranscriptionAssetRepository(instance),
    notes: createSqliteNoteRepository(instance),
  };
}

/**
 * Get the process-wide repositories, opening `dbPath` on first use
 */
export function getRepositories(dbPath: string): Repositories {
  if (repositories) return repositories;

  db = openDatabase(dbPath);
  repositories = createRepositories(db);

  return repositories;
}

/**
 * Create a fresh set of repositories for testing (using in-memory DB)
 */
export function createTestRepositories(): Repositories & {
  db: Database.Database;
  cleanup: () => void;
} {
  const testDb = openDatabase(':memory:');

  return {
    ...createRepositories(testDb),
    db: testDb,
    cleanup: () => testDb.close(),
  };
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
    repositories = null;
  }
}
