/**
 * AUTO-ME - Delete Transcription Job
 *
 * Removes a job with everything stored for it: output assets, work files
 * and, once no other job points at it, the source upload and its session.
 * An active job is cancelled first so a running worker stops at its next
 * boundary check.
 */

import type { Repositories, StorageService } from '../0_types.js';
import { errorMessage } from '../domain/errors.js';
import { log } from '../pipeline/context.js';
import type { LegacyNoteBridge } from '../services/legacy-note-bridge.js';
import type { UploadSessionManager } from '../services/upload-session-manager.js';

export interface DeleteTranscriptionJobDeps {
  repos: Repositories;
  storage: StorageService;
  uploads: UploadSessionManager;
  /** Notes outlive their job; a cancelled job is synced before removal */
  bridge?: LegacyNoteBridge;
}

export interface DeletedJob {
  jobId: string;
  wasCancelled: boolean;
  assetsRemoved: number;
  uploadRemoved: boolean;
}

export async function deleteTranscriptionJob(
  jobId: string,
  deps: DeleteTranscriptionJobDeps
): Promise<DeletedJob | null> {
  const { repos, storage, uploads } = deps;

  const job = repos.jobs.findById(jobId);
  if (!job) return null;

  const wasCancelled =
    (job.status === 'created' || job.status === 'processing') &&
    repos.jobs.cancel(jobId);
  if (wasCancelled) {
    log('info', `🛑 Cancelled job ${jobId} before deletion`);
    deps.bridge?.syncJobToNote(jobId);
  }

  const assets = repos.assets.listForJob(jobId);
  for (const asset of assets) {
    try {
      await storage.removeFile(asset.storageKey);
    } catch (error) {
      log(
        'warn',
        `Failed to delete asset file ${asset.storageKey}: ${errorMessage(error)}`
      );
    }
  }
  await storage.removeJobFiles(jobId);

  repos.assets.deleteForJob(jobId);
  repos.jobs.delete(jobId);

  const uploadRemoved =
    repos.jobs.countForUpload(job.uploadId) === 0 &&
    (await uploads.deleteSession(job.uploadId));

  log('info', `🗑️ Deleted job ${jobId} (${assets.length} asset(s))`);
  return { jobId, wasCancelled, assetsRemoved: assets.length, uploadRemoved };
}
