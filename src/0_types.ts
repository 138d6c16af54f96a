/**
 * AUTO-ME Pipeline - Core Types
 *
 * All types and interfaces in one place.
 */

import { z } from 'zod';
import type {
  CheckpointStage,
  StageCheckpoints,
} from './domain/checkpoint.js';

// =============================================================================
// PIPELINE STAGES & STATUS
// =============================================================================

export const transcriptionStageSchema = z.enum([
  'created',
  'queued',
  'validating',
  'transcoding',
  'segmenting',
  'detecting_language',
  'transcribing',
  'merging',
  'diarizing',
  'generating_outputs',
  'complete',
  'failed',
]);
export type TranscriptionStage = z.infer<typeof transcriptionStageSchema>;

export const transcriptionStatusSchema = z.enum([
  'created',
  'processing',
  'complete',
  'failed',
  'cancelled',
]);
export type TranscriptionStatus = z.infer<typeof transcriptionStatusSchema>;

export const errorCodeSchema = z.enum([
  'transient',
  'validation',
  'empty_result',
  'internal',
]);
export type ErrorCode = z.infer<typeof errorCodeSchema>;

export const outputFormatSchema = z.enum([
  'txt',
  'json',
  'srt',
  'vtt',
  'docx',
  'waveform',
]);
export type OutputFormat = z.infer<typeof outputFormatSchema>;

export const jobPrioritySchema = z.enum(['low', 'normal', 'high']);
export type JobPriority = z.infer<typeof jobPrioritySchema>;

// =============================================================================
// UPLOAD SESSION
// =============================================================================

export const uploadSessionStatusSchema = z.enum([
  'active',
  'completed',
  'expired',
  'failed',
  'cancelled',
]);
export type UploadSessionStatus = z.infer<typeof uploadSessionStatusSchema>;

export interface UploadSession {
  readonly id: string;
  readonly userId: string | null;
  readonly filename: string;
  readonly totalSize: number;
  readonly mimeType: string;
  readonly chunkSize: number;
  /** Distinct chunk indices received so far */
  readonly chunksUploaded: ReadonlySet<number>;
  readonly contentHash: string | null;
  readonly status: UploadSessionStatus;
  readonly storageKey: string | null;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly completedAt: string | null;
}

// =============================================================================
// TRANSCRIPTION JOB
// =============================================================================

export interface TranscriptionJobConfig {
  readonly filename: string;
  readonly totalSize: number;
  readonly mimeType: string;
  /** null = auto-detect */
  readonly language: string | null;
  readonly enableDiarization: boolean;
  readonly model: string;
  readonly outputFormats: readonly OutputFormat[];
  readonly priority: JobPriority;
}

export interface TranscriptionJobResults {
  readonly detectedLanguage: string | null;
  readonly confidenceScore: number | null;
  readonly totalDuration: number | null;
  readonly wordCount: number | null;
}

export interface TranscriptionJob
  extends TranscriptionJobConfig,
    TranscriptionJobResults {
  readonly id: string;
  readonly userId: string | null;
  readonly uploadId: string;

  readonly status: TranscriptionStatus;
  readonly currentStage: TranscriptionStage;
  readonly progress: number;

  readonly stageProgress: Readonly<Record<string, number>>;
  readonly stageDurations: Readonly<Record<string, number>>;
  /** Raw checkpoint documents; read them through the job repository */
  readonly stageCheckpoints: Readonly<Record<string, unknown>>;

  readonly errorCode: ErrorCode | null;
  readonly errorMessage: string | null;
  readonly retryCount: number;
  readonly maxRetries: number;

  readonly createdAt: string;
  readonly updatedAt: string;
  readonly startedAt: string | null;
  readonly completedAt: string | null;

  readonly storagePaths: Readonly<Record<string, string>>;
}

export interface NewTranscriptionJob extends Partial<TranscriptionJobConfig> {
  readonly userId?: string | null;
  readonly uploadId: string;
  readonly filename: string;
  readonly totalSize: number;
  readonly mimeType: string;
  readonly maxRetries?: number;
}

// =============================================================================
// ASSETS
// =============================================================================

export interface TranscriptionAsset {
  readonly id: string;
  readonly jobId: string;
  readonly kind: OutputFormat;
  readonly storageKey: string;
  readonly fileSize: number;
  readonly mimeType: string;
  readonly createdAt: string;
}

// =============================================================================
// LEGACY NOTES
// =============================================================================

export const noteStatusSchema = z.enum([
  'uploading',
  'processing',
  'ready',
  'failed',
]);
export type NoteStatus = z.infer<typeof noteStatusSchema>;

export interface Note {
  readonly id: string;
  readonly title: string;
  readonly kind: string;
  readonly userId: string | null;
  readonly status: NoteStatus;
  readonly artifacts: Readonly<Record<string, unknown>>;
  readonly metrics: Readonly<Record<string, unknown>>;
  readonly transcriptionJobId: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

// =============================================================================
// REPOSITORIES
// =============================================================================

export interface UploadSessionRepository {
  create(session: UploadSession): void;
  findById(id: string): UploadSession | null;
  /** Returns false when the index was already recorded */
  addChunk(id: string, chunkIndex: number): boolean;
  /** Returns false when the session is missing or already completed */
  complete(
    id: string,
    storageKey: string,
    contentHash: string | null,
    completedAt: string
  ): boolean;
  updateStatus(id: string, status: UploadSessionStatus): boolean;
  /** Deletes non-completed sessions past expiry; returns their ids */
  deleteExpired(now: string): string[];
  delete(id: string): boolean;
}

export interface MarkFailedOptions {
  /** Exhausts the retry budget so the job is never retried */
  permanent?: boolean;
}

export interface TranscriptionJobRepository {
  create(job: NewTranscriptionJob): TranscriptionJob;
  findById(id: string): TranscriptionJob | null;
  advanceStage(id: string, stage: TranscriptionStage, progress?: number): void;
  setStageProgress(
    id: string,
    stage: TranscriptionStage,
    progress: number
  ): void;
  setCheckpoint<S extends CheckpointStage>(
    id: string,
    stage: S,
    payload: StageCheckpoints[S]
  ): void;
  getCheckpoint<S extends CheckpointStage>(
    id: string,
    stage: S
  ): StageCheckpoints[S] | null;
  clearCheckpoint(id: string, stage: CheckpointStage): void;
  recordStageDuration(
    id: string,
    stage: TranscriptionStage,
    seconds: number
  ): void;
  setResults(id: string, results: Partial<TranscriptionJobResults>): void;
  setStoragePath(id: string, name: string, key: string): void;
  markFailed(
    id: string,
    code: ErrorCode,
    message: string,
    options?: MarkFailedOptions
  ): void;
  /** Moves a failed job back to `queued`; throws once the budget is spent */
  requeue(id: string): TranscriptionJob;
  cancel(id: string): boolean;
  listRetryable(limit?: number): TranscriptionJob[];
  listByStatus(status: TranscriptionStatus, limit?: number): TranscriptionJob[];
  listForUser(userId: string, limit?: number): TranscriptionJob[];
  countByStatus(status: TranscriptionStatus): number;
  countRetryable(): number;
  countForUpload(uploadId: string): number;
  delete(id: string): boolean;
}

export interface TranscriptionAssetRepository {
  create(
    asset: Omit<TranscriptionAsset, 'id' | 'createdAt'>
  ): TranscriptionAsset;
  listForJob(jobId: string): TranscriptionAsset[];
  deleteForJob(jobId: string): number;
}

export interface NoteRepository {
  create(note: {
    title: string;
    kind: string;
    userId: string | null;
    transcriptionJobId: string | null;
  }): Note;
  findById(id: string): Note | null;
  findByTranscriptionJobId(jobId: string): Note | null;
  updateStatus(id: string, status: NoteStatus): void;
  /** Merges into the existing bag */
  setArtifacts(id: string, artifacts: Record<string, unknown>): void;
  setMetrics(id: string, metrics: Record<string, unknown>): void;
}

export interface Repositories {
  uploadSessions: UploadSessionRepository;
  jobs: TranscriptionJobRepository;
  assets: TranscriptionAssetRepository;
  notes: NoteRepository;
}

// =============================================================================
// PORTS (Interfaces)
// =============================================================================

export interface TranscriptionResult {
  text: string;
  language?: string;
}

export interface TranscribeOptions {
  language?: string;
  signal?: AbortSignal;
}

export interface TranscriptionService {
  transcribe(
    audioPath: string,
    options?: TranscribeOptions
  ): Promise<TranscriptionResult>;
}

export interface MediaCommandOptions {
  signal?: AbortSignal;
}

export interface MediaService {
  /** Seconds, or null when the probe cannot tell */
  probeDuration(filePath: string): Promise<number | null>;
  encodeSegment(
    filePath: string,
    startSeconds: number,
    durationSeconds: number,
    outputPath: string,
    options?: MediaCommandOptions
  ): Promise<string>;
  transcode(
    filePath: string,
    outputPath: string,
    options?: MediaCommandOptions
  ): Promise<string>;
}

export interface AssembledUpload {
  storageKey: string;
  size: number;
  sha256: string;
}

export interface StorageService {
  writeChunk(
    uploadId: string,
    chunkIndex: number,
    data: Uint8Array
  ): Promise<void>;
  assembleChunks(
    uploadId: string,
    totalChunks: number,
    filename: string
  ): Promise<AssembledUpload>;
  removeChunks(uploadId: string): Promise<void>;
  /** Assembled source file of an upload */
  removeUpload(uploadId: string): Promise<void>;
  removeFile(storageKey: string): Promise<void>;
  resolvePath(storageKey: string): string;
  writeAsset(
    jobId: string,
    filename: string,
    content: string
  ): Promise<{ storageKey: string; size: number }>;
  readText(storageKey: string): Promise<string>;
  /** Creates the directory if needed */
  prepareJobWorkDir(jobId: string): Promise<string>;
  removeJobWorkDir(jobId: string): Promise<void>;
  /** Work dir and outputs */
  removeJobFiles(jobId: string): Promise<void>;
}

// =============================================================================
// CONFIG
// =============================================================================

const MIB = 1024 * 1024;

export const DEFAULT_ALLOWED_MIME_TYPES = [
  'audio/mpeg',
  'audio/wav',
  'audio/x-wav',
  'audio/mp4',
  'audio/m4a',
  'audio/aac',
  'audio/webm',
  'audio/ogg',
  'audio/flac',
  'video/mp4',
  'video/quicktime',
  'video/webm',
  'audio/*',
  'video/*',
];

export const pipelineConfigSchema = z.object({
  dbPath: z.string().default('~/.auto-me/auto-me.db'),
  dataDir: z.string().default('~/.auto-me/data'),

  // Uploads
  chunkSizeBytes: z.number().int().positive().default(5 * MIB),
  sessionTtlHours: z.number().positive().default(24),

  // Validation
  maxFileSizeBytes: z.number().int().positive().default(500 * MIB),
  maxDurationHours: z.number().positive().default(10),
  allowedMimeTypes: z.array(z.string()).default(DEFAULT_ALLOWED_MIME_TYPES),

  // Segmentation: just under the provider's 25MB hard limit
  maxProviderFileBytes: z.number().int().positive().default(24 * MIB),
  segmentDurationSeconds: z.number().positive().default(300),

  // Worker
  maxRetries: z.number().int().min(0).default(3),
  maxConcurrentJobs: z.number().int().min(1).default(1),
  maxConcurrentSegments: z.number().int().min(1).default(3),
  pollIntervalMs: z.number().int().min(0).default(10_000),
  retryDelayMs: z.number().int().min(0).default(60_000),
  errorBackoffMs: z.number().int().min(0).default(30_000),

  // Health thresholds
  degradedRetryableThreshold: z.number().int().min(0).default(10),
  degradedQueueThreshold: z.number().int().min(0).default(50),

  // Transcription provider
  transcriptionProvider: z.enum(['openai', 'whisper']).default('openai'),
  transcriptionEndpoint: z
    .string()
    .default('https://api.openai.com/v1/audio/transcriptions'),
  transcriptionApiKey: z.string().optional(),
  transcriptionModel: z.string().default('whisper-1'),
  transcriptionTimeoutMs: z.number().int().positive().default(60_000),
});
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export const whisperConfigSchema = z.object({
  binaryPath: z.string().default('whisper-cli'),
  model: z.string().default('large-v3'),
  cwd: z.string().optional(),
  language: z.string().optional(),
});
export type WhisperConfig = z.infer<typeof whisperConfigSchema>;
