/**
 * Transcription Job Repository - SQLite Implementation
 *
 * Every write is a single statement (or a short transaction) keyed by id.
 * JSON bag columns are updated in place with json_set/json_remove, so a
 * checkpoint write never clobbers a concurrent progress update.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  type ErrorCode,
  errorCodeSchema,
  jobPrioritySchema,
  type MarkFailedOptions,
  type NewTranscriptionJob,
  outputFormatSchema,
  type TranscriptionJob,
  type TranscriptionJobRepository,
  type TranscriptionJobResults,
  type TranscriptionStage,
  type TranscriptionStatus,
  transcriptionStageSchema,
} from '../../0_types.js';
import {
  type CheckpointStage,
  parseCheckpoint,
  type StageCheckpoints,
} from '../../domain/checkpoint.js';
import {
  canRetry,
  canTransition,
  clampProgress,
  stageToStatus,
} from '../../domain/transcription-job.js';
import {
  generateId,
  nowISO,
  parseJsonArray,
  parseJsonObject,
  parseJsonRecord,
} from '../helpers.js';
import type { DbCount, DbTranscriptionJob } from '../types.js';

export const DEFAULT_JOB_MODEL = 'whisper-1';
const DEFAULT_PAGE_SIZE = 50;

function toJob(row: DbTranscriptionJob): TranscriptionJob {
  return {
    id: row.id,
    userId: row.user_id,
    uploadId: row.upload_id,

    filename: row.filename,
    totalSize: row.total_size,
    mimeType: row.mime_type,
    language: row.language,
    enableDiarization: row.enable_diarization === 1,
    model: row.model,
    outputFormats: parseJsonArray(row.output_formats, outputFormatSchema),
    priority: jobPrioritySchema.catch('normal').parse(row.priority),

    status: row.status,
    currentStage: transcriptionStageSchema.parse(row.current_stage),
    progress: row.progress,

    stageProgress: parseJsonRecord(row.stage_progress, z.number()),
    stageDurations: parseJsonRecord(row.stage_durations, z.number()),
    stageCheckpoints: parseJsonObject(row.stage_checkpoints),

    detectedLanguage: row.detected_language,
    confidenceScore: row.confidence_score,
    totalDuration: row.total_duration,
    wordCount: row.word_count,

    errorCode: errorCodeSchema
      .nullable()
      .catch('internal')
      .parse(row.error_code),
    errorMessage: row.error_message,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,

    createdAt: row.created_at,
    updatedAt: row.updated_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,

    storagePaths: parseJsonRecord(row.storage_paths, z.string()),
  };
}

/** JSON path for a top-level key of a bag column */
function bagPath(key: string): string {
  return `$."${key.replaceAll('"', '')}"`;
}

export function createSqliteTranscriptionJobRepository(
  db: Database.Database
): TranscriptionJobRepository {
  const stmts = {
    findById: db.prepare<[string], DbTranscriptionJob>(
      'SELECT * FROM transcription_jobs WHERE id = ?'
    ),
    insert: db.prepare<
      [
        string,
        string | null,
        string,
        string,
        number,
        string,
        string | null,
        number,
        string,
        string,
        string,
        number,
        string,
        string,
      ]
    >(`
      INSERT INTO transcription_jobs (
        id, user_id, upload_id, filename, total_size, mime_type, language,
        enable_diarization, model, output_formats, priority, max_retries,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `),
    advance: db.prepare<
      [
        string,
        string,
        number,
        string,
        number,
        string | null,
        string | null,
        string,
        string,
      ]
    >(`
      UPDATE transcription_jobs SET
        current_stage = ?,
        status = ?,
        progress = ?,
        stage_progress = json_set(stage_progress, ?, ?),
        started_at = ?,
        completed_at = ?,
        updated_at = ?
      WHERE id = ?
    `),
    setStageProgress: db.prepare<
      [string, number, string, number, string, string]
    >(`
      UPDATE transcription_jobs SET
        stage_progress = json_set(stage_progress, ?, ?),
        progress = CASE WHEN current_stage = ? THEN ? ELSE progress END,
        updated_at = ?
      WHERE id = ?
    `),
    setCheckpoint: db.prepare<[string, string, string, string]>(`
      UPDATE transcription_jobs SET
        stage_checkpoints = json_set(stage_checkpoints, ?, json(?)),
        updated_at = ?
      WHERE id = ?
    `),
    getCheckpoint: db.prepare<[string, string], { payload: string | null }>(
      'SELECT json_extract(stage_checkpoints, ?) AS payload FROM transcription_jobs WHERE id = ?'
    ),
    clearCheckpoint: db.prepare<[string, string, string]>(`
      UPDATE transcription_jobs SET
        stage_checkpoints = json_remove(stage_checkpoints, ?),
        updated_at = ?
      WHERE id = ?
    `),
    recordDuration: db.prepare<[string, number, string, string]>(`
      UPDATE transcription_jobs SET
        stage_durations = json_set(stage_durations, ?, ?),
        updated_at = ?
      WHERE id = ?
    `),
    setResults: db.prepare<
      [
        string | null,
        number | null,
        number | null,
        number | null,
        string,
        string,
      ]
    >(`
      UPDATE transcription_jobs SET
        detected_language = ?,
        confidence_score = ?,
        total_duration = ?,
        word_count = ?,
        updated_at = ?
      WHERE id = ?
    `),
    setStoragePath: db.prepare<[string, string, string, string]>(`
      UPDATE transcription_jobs SET
        storage_paths = json_set(storage_paths, ?, ?),
        updated_at = ?
      WHERE id = ?
    `),
    markFailed: db.prepare<[string, string, number, string, string]>(`
      UPDATE transcription_jobs SET
        status = 'failed',
        current_stage = 'failed',
        error_code = ?,
        error_message = ?,
        retry_count = CASE
          WHEN ? = 1 THEN MAX(retry_count + 1, max_retries)
          ELSE retry_count + 1
        END,
        updated_at = ?
      WHERE id = ? AND status != 'cancelled'
    `),
    requeue: db.prepare<[string, string]>(`
      UPDATE transcription_jobs SET
        status = 'processing',
        current_stage = 'queued',
        progress = 0,
        error_code = NULL,
        error_message = NULL,
        completed_at = NULL,
        updated_at = ?
      WHERE id = ? AND status = 'failed' AND retry_count < max_retries
    `),
    cancelActive: db.prepare<[string, string]>(`
      UPDATE transcription_jobs SET status = 'cancelled', updated_at = ?
      WHERE id = ? AND status IN ('created', 'processing')
    `),
    cancelFailed: db.prepare<[string, string]>(`
      UPDATE transcription_jobs SET
        retry_count = MAX(retry_count, max_retries),
        updated_at = ?
      WHERE id = ? AND status = 'failed'
    `),
    listRetryable: db.prepare<[number], DbTranscriptionJob>(`
      SELECT * FROM transcription_jobs
      WHERE status = 'failed' AND retry_count < max_retries
      ORDER BY created_at ASC, rowid ASC
      LIMIT ?
    `),
    listByStatus: db.prepare<[string, number], DbTranscriptionJob>(`
      SELECT * FROM transcription_jobs
      WHERE status = ?
      ORDER BY created_at ASC, rowid ASC
      LIMIT ?
    `),
    listForUser: db.prepare<[string, number], DbTranscriptionJob>(`
      SELECT * FROM transcription_jobs
      WHERE user_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `),
    countByStatus: db.prepare<[string], DbCount>(
      'SELECT COUNT(*) AS count FROM transcription_jobs WHERE status = ?'
    ),
    countRetryable: db.prepare<[], DbCount>(
      "SELECT COUNT(*) AS count FROM transcription_jobs WHERE status = 'failed' AND retry_count < max_retries"
    ),
    countForUpload: db.prepare<[string], DbCount>(
      'SELECT COUNT(*) AS count FROM transcription_jobs WHERE upload_id = ?'
    ),
    delete: db.prepare<[string]>('DELETE FROM transcription_jobs WHERE id = ?'),
  };

  function findOrThrow(id: string): TranscriptionJob {
    const row = stmts.findById.get(id);
    if (!row) throw new Error(`Transcription job not found: ${id}`);
    return toJob(row);
  }

  const advance = db.transaction(
    (id: string, stage: TranscriptionStage, progress: number) => {
      const job = findOrThrow(id);
      if (!canTransition(job, stage)) {
        throw new Error(
          `Invalid stage transition for job ${id}: ${job.currentStage} -> ${stage}`
        );
      }
      const now = nowISO();
      stmts.advance.run(
        stage,
        stageToStatus(stage),
        progress,
        bagPath(stage),
        progress,
        job.startedAt ?? (stage === 'created' ? null : now),
        stage === 'complete' ? now : job.completedAt,
        now,
        id
      );
    }
  );

  const mergeResults = db.transaction(
    (id: string, results: Partial<TranscriptionJobResults>) => {
      const job = findOrThrow(id);
      stmts.setResults.run(
        results.detectedLanguage !== undefined
          ? results.detectedLanguage
          : job.detectedLanguage,
        results.confidenceScore !== undefined
          ? results.confidenceScore
          : job.confidenceScore,
        results.totalDuration !== undefined
          ? results.totalDuration
          : job.totalDuration,
        results.wordCount !== undefined ? results.wordCount : job.wordCount,
        nowISO(),
        id
      );
    }
  );

  return {
    create(input: NewTranscriptionJob): TranscriptionJob {
      const id = generateId();
      const now = nowISO();
      stmts.insert.run(
        id,
        input.userId ?? null,
        input.uploadId,
        input.filename,
        input.totalSize,
        input.mimeType,
        input.language ?? null,
        input.enableDiarization ? 1 : 0,
        input.model ?? DEFAULT_JOB_MODEL,
        JSON.stringify(input.outputFormats ?? ['txt']),
        input.priority ?? 'normal',
        input.maxRetries ?? 3,
        now,
        now
      );
      return findOrThrow(id);
    },

    findById(id: string): TranscriptionJob | null {
      const row = stmts.findById.get(id);
      return row ? toJob(row) : null;
    },

    advanceStage(id: string, stage: TranscriptionStage, progress?: number) {
      const value = progress ?? (stage === 'complete' ? 100 : 0);
      advance(id, stage, clampProgress(value));
    },

    setStageProgress(id, stage, progress): void {
      const value = clampProgress(progress);
      stmts.setStageProgress.run(
        bagPath(stage),
        value,
        stage,
        value,
        nowISO(),
        id
      );
    },

    setCheckpoint<S extends CheckpointStage>(
      id: string,
      stage: S,
      payload: StageCheckpoints[S]
    ): void {
      stmts.setCheckpoint.run(
        bagPath(stage),
        JSON.stringify(payload),
        nowISO(),
        id
      );
    },

    getCheckpoint<S extends CheckpointStage>(
      id: string,
      stage: S
    ): StageCheckpoints[S] | null {
      const row = stmts.getCheckpoint.get(bagPath(stage), id);
      if (!row?.payload) return null;
      try {
        return parseCheckpoint(stage, JSON.parse(row.payload));
      } catch {
        return null;
      }
    },

    clearCheckpoint(id: string, stage: CheckpointStage): void {
      stmts.clearCheckpoint.run(bagPath(stage), nowISO(), id);
    },

    recordStageDuration(id, stage, seconds): void {
      stmts.recordDuration.run(bagPath(stage), seconds, nowISO(), id);
    },

    setResults(id, results): void {
      mergeResults(id, results);
    },

    setStoragePath(id, name, key): void {
      stmts.setStoragePath.run(bagPath(name), key, nowISO(), id);
    },

    markFailed(
      id: string,
      code: ErrorCode,
      message: string,
      options: MarkFailedOptions = {}
    ): void {
      stmts.markFailed.run(
        code,
        message,
        options.permanent ? 1 : 0,
        nowISO(),
        id
      );
    },

    requeue(id: string): TranscriptionJob {
      const job = findOrThrow(id);
      if (!canRetry(job)) {
        throw new Error(
          `Job ${id} cannot be retried (status=${job.status}, retries=${job.retryCount}/${job.maxRetries})`
        );
      }
      stmts.requeue.run(nowISO(), id);
      return findOrThrow(id);
    },

    cancel(id: string): boolean {
      const now = nowISO();
      if (stmts.cancelActive.run(now, id).changes > 0) return true;
      return stmts.cancelFailed.run(now, id).changes > 0;
    },

    listRetryable(limit = DEFAULT_PAGE_SIZE): TranscriptionJob[] {
      return stmts.listRetryable.all(limit).map(toJob);
    },

    listByStatus(
      status: TranscriptionStatus,
      limit = DEFAULT_PAGE_SIZE
    ): TranscriptionJob[] {
      return stmts.listByStatus.all(status, limit).map(toJob);
    },

    listForUser(userId: string, limit = DEFAULT_PAGE_SIZE): TranscriptionJob[] {
      return stmts.listForUser.all(userId, limit).map(toJob);
    },

    countByStatus(status: TranscriptionStatus): number {
      return stmts.countByStatus.get(status)?.count ?? 0;
    },

    countRetryable(): number {
      return stmts.countRetryable.get()?.count ?? 0;
    },

    countForUpload(uploadId: string): number {
      return stmts.countForUpload.get(uploadId)?.count ?? 0;
    },

    delete(id: string): boolean {
      // Assets cascade
      return stmts.delete.run(id).changes > 0;
    },
  };
}
