/**
 * AUTO-ME - Submit Upload
 *
 * Turns a fully uploaded session into a transcription job and its legacy
 * note. Finalizes the session first when that has not happened yet.
 */

import type {
  JobPriority,
  OutputFormat,
  PipelineConfig,
  Repositories,
  TranscriptionJob,
} from '../0_types.js';
import { UploadError } from '../domain/errors.js';
import { log } from '../pipeline/context.js';
import {
  createLegacyNoteBridge,
  type LegacyNoteBridge,
} from '../services/legacy-note-bridge.js';
import type { UploadSessionManager } from '../services/upload-session-manager.js';

export interface SubmitUploadInput {
  uploadId: string;
  /** Checked against the assembled file when the session is finalized here */
  sha256?: string;
  language?: string | null;
  enableDiarization?: boolean;
  outputFormats?: OutputFormat[];
  priority?: JobPriority;
}

export interface SubmitUploadDeps {
  repos: Repositories;
  uploads: UploadSessionManager;
  config: Pick<PipelineConfig, 'maxRetries' | 'transcriptionModel'>;
  bridge?: LegacyNoteBridge;
}

export interface SubmittedJob {
  job: TranscriptionJob;
  noteId: string;
}

export async function submitUpload(
  input: SubmitUploadInput,
  deps: SubmitUploadDeps
): Promise<SubmittedJob> {
  const { repos, uploads, config } = deps;
  const bridge = deps.bridge ?? createLegacyNoteBridge(repos);

  let session = uploads.getSession(input.uploadId);
  if (!session) {
    throw new UploadError(
      'not_found',
      `Upload session not found: ${input.uploadId}`
    );
  }
  if (session.status === 'active') {
    session = await uploads.finalizeUpload(input.uploadId, input.sha256);
  } else if (session.status !== 'completed') {
    throw new UploadError(
      'inactive',
      `Upload session ${input.uploadId} is not active (${session.status})`
    );
  }

  const job = repos.jobs.create({
    userId: session.userId,
    uploadId: session.id,
    filename: session.filename,
    totalSize: session.totalSize,
    mimeType: session.mimeType,
    language: input.language ?? null,
    enableDiarization: input.enableDiarization ?? false,
    model: config.transcriptionModel,
    outputFormats: input.outputFormats,
    priority: input.priority,
    maxRetries: config.maxRetries,
  });
  const noteId = bridge.createNoteForJob(job);

  log('info', `Created transcription job ${job.id} for ${job.filename}`);
  return { job, noteId };
}
