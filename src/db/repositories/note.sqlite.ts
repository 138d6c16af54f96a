/**
 * Legacy Note Repository - SQLite Implementation
 */

import type Database from 'better-sqlite3';
import type { Note, NoteRepository, NoteStatus } from '../../0_types.js';
import { generateId, nowISO, parseJsonObject } from '../helpers.js';
import type { DbNote } from '../types.js';

function toNote(row: DbNote): Note {
  return {
    id: row.id,
    title: row.title,
    kind: row.kind,
    userId: row.user_id,
    status: row.status,
    artifacts: parseJsonObject(row.artifacts),
    metrics: parseJsonObject(row.metrics),
    transcriptionJobId: row.transcription_job_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function createSqliteNoteRepository(
  db: Database.Database
): NoteRepository {
  const stmts = {
    findById: db.prepare<[string], DbNote>('SELECT * FROM notes WHERE id = ?'),
    findByJob: db.prepare<[string], DbNote>(
      'SELECT * FROM notes WHERE transcription_job_id = ? ORDER BY created_at ASC LIMIT 1'
    ),
    insert: db.prepare<
      [string, string, string, string | null, string | null, string, string]
    >(`
      INSERT INTO notes (id, title, kind, user_id, transcription_job_id, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `),
    updateStatus: db.prepare<[string, string, string]>(
      'UPDATE notes SET status = ?, updated_at = ? WHERE id = ?'
    ),
    writeArtifacts: db.prepare<[string, string, string]>(
      'UPDATE notes SET artifacts = ?, updated_at = ? WHERE id = ?'
    ),
    writeMetrics: db.prepare<[string, string, string]>(
      'UPDATE notes SET metrics = ?, updated_at = ? WHERE id = ?'
    ),
  };

  // Merged in JS so null values stay in the bag
  const mergeArtifacts = db.transaction(
    (id: string, patch: Record<string, unknown>) => {
      const row = stmts.findById.get(id);
      if (!row) return;
      const merged = { ...parseJsonObject(row.artifacts), ...patch };
      stmts.writeArtifacts.run(JSON.stringify(merged), nowISO(), id);
    }
  );

  const mergeMetrics = db.transaction(
    (id: string, patch: Record<string, unknown>) => {
      const row = stmts.findById.get(id);
      if (!row) return;
      const merged = { ...parseJsonObject(row.metrics), ...patch };
      stmts.writeMetrics.run(JSON.stringify(merged), nowISO(), id);
    }
  );

  return {
    create(note): Note {
      const id = generateId();
      const now = nowISO();
      stmts.insert.run(
        id,
        note.title,
        note.kind,
        note.userId,
        note.transcriptionJobId,
        now,
        now
      );
      const row = stmts.findById.get(id);
      if (!row) throw new Error(`Note ${id} not found after insert`);
      return toNote(row);
    },

    findById(id: string): Note | null {
      const row = stmts.findById.get(id);
      return row ? toNote(row) : null;
    },

    findByTranscriptionJobId(jobId: string): Note | null {
      const row = stmts.findByJob.get(jobId);
      return row ? toNote(row) : null;
    },

    updateStatus(id: string, status: NoteStatus): void {
      stmts.updateStatus.run(status, nowISO(), id);
    },

    setArtifacts(id: string, artifacts: Record<string, unknown>): void {
      mergeArtifacts(id, artifacts);
    },

    setMetrics(id: string, metrics: Record<string, unknown>): void {
      mergeMetrics(id, metrics);
    },
  };
}
