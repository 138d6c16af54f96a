/**
 * AUTO-ME - Legacy Note Bridge
 *
 * One-way projection of a transcription job onto the legacy Note record
 * older clients read. The job is the source of truth; notes never feed back.
 */

import type {
  NoteStatus,
  Repositories,
  TranscriptionJob,
  TranscriptionStatus,
} from '../0_types.js';
import { log } from '../pipeline/context.js';

const NOTE_STATUS: Record<TranscriptionStatus, NoteStatus> = {
  created: 'uploading',
  processing: 'processing',
  complete: 'ready',
  failed: 'failed',
  cancelled: 'failed',
};

export function noteStatusForJob(status: TranscriptionStatus): NoteStatus {
  return NOTE_STATUS[status];
}

export function createLegacyNoteBridge(
  repos: Pick<Repositories, 'jobs' | 'assets' | 'notes'>
) {
  /**
   * Create the legacy note for a freshly created job
   */
  function createNoteForJob(job: TranscriptionJob): string {
    const note = repos.notes.create({
      title: job.filename,
      kind: 'audio',
      userId: job.userId,
      transcriptionJobId: job.id,
    });
    return note.id;
  }

  /**
   * Mirror status, transcript and metrics onto the linked note.
   * Returns false when the job or its note does not exist.
   */
  function syncJobToNote(jobId: string): boolean {
    const job = repos.jobs.findById(jobId);
    if (!job) return false;

    const note = repos.notes.findByTranscriptionJobId(jobId);
    if (!note) {
      log('debug', `No legacy note linked to job ${jobId}`);
      return false;
    }

    repos.notes.updateStatus(note.id, noteStatusForJob(job.status));

    if (job.status === 'complete') {
      const merged = repos.jobs.getCheckpoint(jobId, 'merging');
      const diarized = repos.jobs.getCheckpoint(jobId, 'diarizing');
      const artifacts: Record<string, unknown> = {
        transcript: merged?.transcript ?? '',
        assets: repos.assets.listForJob(jobId).map((asset) => ({
          kind: asset.kind,
          storage_key: asset.storageKey,
          mime_type: asset.mimeType,
          file_size: asset.fileSize,
        })),
      };
      if (diarized) {
        artifacts.diarized_transcript = diarized.diarizedTranscript;
        artifacts.speaker_count = diarized.speakerCount;
      }
      repos.notes.setArtifacts(note.id, artifacts);
    } else if (job.status === 'failed' || job.status === 'cancelled') {
      repos.notes.setArtifacts(note.id, {
        error:
          job.status === 'cancelled'
            ? 'Transcription was cancelled'
            : (job.errorMessage ?? 'Transcription failed'),
      });
    }

    repos.notes.setMetrics(note.id, {
      transcription_job_id: job.id,
      duration_seconds: job.totalDuration,
      confidence_score: job.confidenceScore,
      detected_language: job.detectedLanguage,
      word_count: job.wordCount,
      stage_durations: job.stageDurations,
    });

    return true;
  }

  return { createNoteForJob, syncJobToNote };
}

export type LegacyNoteBridge = ReturnType<typeof createLegacyNoteBridge>;
