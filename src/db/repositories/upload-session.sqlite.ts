/**
 * Upload Session Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import type { UploadSession, UploadSessionRepository } from '../../0_types.js';
import type { DbUploadSession } from '../types.js';

function toUploadSession(
  row: DbUploadSession,
  chunks: readonly number[]
): UploadSession {
  return {
    id: row.id,
    userId: row.user_id,
    filename: row.filename,
    totalSize: row.total_size,
    mimeType: row.mime_type,
    chunkSize: row.chunk_size,
    chunksUploaded: new Set(chunks),
    contentHash: row.content_hash,
    status: row.status,
    storageKey: row.storage_key,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    completedAt: row.completed_at,
  };
}

export function createSqliteUploadSessionRepository(
  db: Database.Database
): UploadSessionRepository {
  const stmts = {
    findById: db.prepare<[string], DbUploadSession>(
      'SELECT * FROM upload_sessions WHERE id = ?'
    ),
    findChunks: db.prepare<[string], { chunk_index: number }>(
      'SELECT chunk_index FROM upload_session_chunks WHERE upload_id = ? ORDER BY chunk_index ASC'
    ),
    insert: db.prepare<
      [
        string,
        string | null,
        string,
        number,
        string,
        number,
        string | null,
        string,
        string | null,
        string,
        string,
        string | null,
      ]
    >(`
      INSERT INTO upload_sessions (
        id, user_id, filename, total_size, mime_type, chunk_size, content_hash,
        status, storage_key, created_at, expires_at, completed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    insertChunk: db.prepare<[string, number]>(
      'INSERT OR IGNORE INTO upload_session_chunks (upload_id, chunk_index) VALUES (?, ?)'
    ),
    complete: db.prepare<[string, string | null, string, string]>(`
      UPDATE upload_sessions
      SET status = 'completed', storage_key = ?, content_hash = COALESCE(?, content_hash), completed_at = ?
      WHERE id = ? AND status = 'active'
    `),
    updateStatus: db.prepare<[string, string]>(
      'UPDATE upload_sessions SET status = ? WHERE id = ?'
    ),
    deleteExpired: db.prepare<[string], { id: string }>(
      "DELETE FROM upload_sessions WHERE status != 'completed' AND expires_at < ? RETURNING id"
    ),
    delete: db.prepare<[string]>('DELETE FROM upload_sessions WHERE id = ?'),
  };

  const insertWithChunks = db.transaction((session: UploadSession) => {
    stmts.insert.run(
      session.id,
      session.userId,
      session.filename,
      session.totalSize,
      session.mimeType,
      session.chunkSize,
      session.contentHash,
      session.status,
      session.storageKey,
      session.createdAt,
      session.expiresAt,
      session.completedAt
    );
    for (const index of session.chunksUploaded) {
      stmts.insertChunk.run(session.id, index);
    }
  });

  return {
    create(session: UploadSession): void {
      insertWithChunks(session);
    },

    findById(id: string): UploadSession | null {
      const row = stmts.findById.get(id);
      if (!row) return null;
      const chunks = stmts.findChunks.all(id).map((c) => c.chunk_index);
      return toUploadSession(row, chunks);
    },

    addChunk(id: string, chunkIndex: number): boolean {
      return stmts.insertChunk.run(id, chunkIndex).changes > 0;
    },

    complete(
      id: string,
      storageKey: string,
      contentHash: string | null,
      completedAt: string
    ): boolean {
      return (
        stmts.complete.run(storageKey, contentHash, completedAt, id).changes > 0
      );
    },

    updateStatus(id, status): boolean {
      return stmts.updateStatus.run(status, id).changes > 0;
    },

    deleteExpired(now: string): string[] {
      return stmts.deleteExpired.all(now).map((row) => row.id);
    },

    delete(id: string): boolean {
      return stmts.delete.run(id).changes > 0;
    },
  };
}
