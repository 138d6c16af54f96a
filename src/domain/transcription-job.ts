import type {
  TranscriptionJob,
  TranscriptionStage,
  TranscriptionStatus,
} from '../0_types.js';

/** Happy-path order; `failed` sits outside it */
export const STAGE_ORDER: readonly TranscriptionStage[] = [
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
];

/**
 * Coarse status implied by a fine-grained stage.
 * Every stage write goes through this so the two never disagree.
 */
export function stageToStatus(stage: TranscriptionStage): TranscriptionStatus {
  switch (stage) {
    case 'created':
      return 'created';
    case 'complete':
      return 'complete';
    case 'failed':
      return 'failed';
    default:
      return 'processing';
  }
}

export function stageIndex(stage: TranscriptionStage): number {
  return STAGE_ORDER.indexOf(stage);
}

export function isTerminalStatus(status: TranscriptionStatus): boolean {
  return status === 'complete' || status === 'cancelled';
}

type TransitionView = Pick<
  TranscriptionJob,
  'status' | 'currentStage' | 'retryCount' | 'maxRetries'
>;

export function canRetry(job: TransitionView): boolean {
  return job.status === 'failed' && job.retryCount < job.maxRetries;
}

/**
 * Stages only move forward (re-entering the current stage is allowed for
 * resumption). `failed` is reachable from anywhere; leaving it needs budget.
 */
export function canTransition(
  job: TransitionView,
  to: TranscriptionStage
): boolean {
  if (to === 'failed') return true;
  if (isTerminalStatus(job.status)) return false;
  if (job.currentStage === 'failed') return canRetry(job);
  return stageIndex(to) >= stageIndex(job.currentStage);
}

export function clampProgress(progress: number): number {
  if (Number.isNaN(progress)) return 0;
  return Math.min(100, Math.max(0, progress));
}
