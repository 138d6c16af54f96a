/**
 * Transcription Asset Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import {
  outputFormatSchema,
  type TranscriptionAsset,
  type TranscriptionAssetRepository,
} from '../../0_types.js';
import { generateId, nowISO } from '../helpers.js';
import type { DbTranscriptionAsset } from '../types.js';

function toAsset(row: DbTranscriptionAsset): TranscriptionAsset {
  return {
    id: row.id,
    jobId: row.job_id,
    kind: outputFormatSchema.parse(row.kind),
    storageKey: row.storage_key,
    fileSize: row.file_size,
    mimeType: row.mime_type,
    createdAt: row.created_at,
  };
}

export function createSqliteTranscriptionAssetRepository(
  db: Database.Database
): TranscriptionAssetRepository {
  const stmts = {
    insert: db.prepare<
      [string, string, string, string, number, string, string]
    >(`
      INSERT INTO transcription_assets (id, job_id, kind, storage_key, file_size, mime_type, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `),
    listForJob: db.prepare<[string], DbTranscriptionAsset>(
      'SELECT * FROM transcription_assets WHERE job_id = ? ORDER BY created_at ASC, rowid ASC'
    ),
    deleteForJob: db.prepare<[string]>(
      'DELETE FROM transcription_assets WHERE job_id = ?'
    ),
  };

  return {
    create(asset): TranscriptionAsset {
      const created: TranscriptionAsset = {
        ...asset,
        id: generateId(),
        createdAt: nowISO(),
      };
      stmts.insert.run(
        created.id,
        created.jobId,
        created.kind,
        created.storageKey,
        created.fileSize,
        created.mimeType,
        created.createdAt
      );
      return created;
    },

    listForJob(jobId: string): TranscriptionAsset[] {
      return stmts.listForJob.all(jobId).map(toAsset);
    },

    deleteForJob(jobId: string): number {
      return stmts.deleteForJob.run(jobId).changes;
    },
  };
}
