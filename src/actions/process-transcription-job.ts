/**
 * AUTO-ME - Transcription Job Processor
 *
 * Drives one job through the pipeline:
 *   queued → validating → transcoding → segmenting → detecting_language
 *   → transcribing → merging → diarizing (optional) → generating_outputs
 *   → complete
 *
 * Every stage persists what the next run needs (storage paths, checkpoints),
 * so an interrupted job resumes where it stopped and a retried job skips the
 * segments it already transcribed.
 */

import { access, mkdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  MediaService,
  PipelineConfig,
  Repositories,
  StorageService,
  TranscriptionJob,
  TranscriptionService,
  TranscriptionStage,
} from '../0_types.js';
import type {
  AudioSegment,
  MergingCheckpoint,
  SegmentingCheckpoint,
  SegmentTranscript,
  TranscribingCheckpoint,
} from '../domain/checkpoint.js';
import {
  errorMessage,
  isAbortError,
  JobStoppedError,
  PipelineError,
  TranscriptionProviderError,
  toPipelineError,
} from '../domain/errors.js';
import { canRetry, stageIndex } from '../domain/transcription-job.js';
import { log, type RunType, step, withJob } from '../pipeline/context.js';
import {
  type AudioSegmentationService,
  createAudioSegmentationService,
} from '../services/audio-segmentation.js';
import { diarizeTranscript } from '../services/diarization.js';
import {
  FALLBACK_LANGUAGE,
  type LanguageGuess,
  pickSampleIndices,
  voteLanguage,
} from '../services/language-detection.js';
import {
  createLegacyNoteBridge,
  type LegacyNoteBridge,
} from '../services/legacy-note-bridge.js';
import { buildCues, renderOutput } from '../services/output-formats.js';
import {
  mergeSegmentTexts,
  type SegmentOutcome,
} from '../services/transcript-merge.js';
import { isMimeTypeAllowed } from '../services/upload-session-manager.js';
import { parallelMap } from '../utils/parallel.js';

export interface TranscriptionPipelineDeps {
  repos: Repositories;
  transcription: TranscriptionService;
  media: MediaService;
  storage: StorageService;
  config: PipelineConfig;
  bridge?: LegacyNoteBridge;
}

export interface ProcessJobOptions {
  /** Polled at job and segment boundaries */
  shouldStop?: () => boolean;
  /** Aborts in-flight I/O; the job is left `processing` for resumption */
  signal?: AbortSignal;
}

export type JobOutcome =
  | 'complete'
  | 'failed'
  | 'interrupted'
  | 'cancelled'
  | 'skipped';

interface ValidatedSource {
  sourcePath: string;
  duration: number;
}

interface TranscriptionRun {
  outcomes: SegmentOutcome[];
  transcripts: SegmentTranscript[];
  /** Message of the last provider failure, when every failure was one */
  providerFailure: string | null;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function sortedByIndex<T extends { index: number }>(items: Iterable<T>): T[] {
  return [...items].sort((a, b) => a.index - b.index);
}

/**
 * Process a transcription job. Never throws: failures are recorded on the
 * job and reported through the returned outcome.
 */
export async function processTranscriptionJob(
  jobId: string,
  deps: TranscriptionPipelineDeps,
  options: ProcessJobOptions = {}
): Promise<JobOutcome> {
  const { repos } = deps;
  const bridge = deps.bridge ?? createLegacyNoteBridge(repos);

  const syncNote = () => {
    try {
      bridge.syncJobToNote(jobId);
    } catch (error) {
      log(
        'error',
        `Legacy note sync failed for ${jobId}: ${errorMessage(error)}`
      );
    }
  };

  const cleanupWorkDir = async () => {
    try {
      await deps.storage.removeJobWorkDir(jobId);
    } catch (error) {
      log(
        'warn',
        `Could not remove work dir for ${jobId}: ${errorMessage(error)}`
      );
    }
  };

  try {
    const existing = repos.jobs.findById(jobId);
    if (!existing) {
      log('warn', `Transcription job ${jobId} not found`);
      return 'skipped';
    }
    if (existing.status === 'complete' || existing.status === 'cancelled') {
      return 'skipped';
    }

    let runType: RunType = 'initial';
    let job = existing;
    if (job.status === 'failed') {
      if (!canRetry(job)) return 'skipped';
      job = repos.jobs.requeue(jobId);
      runType = 'retry';
    } else if (job.status === 'processing' && job.currentStage !== 'queued') {
      runType = 'resume';
    }

    return await withJob<JobOutcome>(jobId, runType, async () => {
      try {
        await runPipeline(job, deps, options, syncNote);
        await cleanupWorkDir();
        syncNote();
        return 'complete';
      } catch (error) {
        if (error instanceof JobStoppedError && error.reason === 'cancelled') {
          log('info', `Job ${jobId} cancelled`);
          await cleanupWorkDir();
          syncNote();
          return 'cancelled';
        }

        if (
          error instanceof JobStoppedError ||
          isAbortError(error) ||
          options.signal?.aborted
        ) {
          log(
            'info',
            `Job ${jobId} interrupted; it will resume from its checkpoint`
          );
          return 'interrupted';
        }

        const failure = toPipelineError(error);
        repos.jobs.markFailed(jobId, failure.code, failure.message, {
          permanent: !failure.retryable,
        });
        log(
          'error',
          `Job ${jobId} failed (${failure.code}): ${failure.message}`
        );

        const failed = repos.jobs.findById(jobId);
        if (!failed || !canRetry(failed)) {
          await cleanupWorkDir();
        }
        syncNote();
        return 'failed';
      }
    });
  } catch (error) {
    // Only reachable if bookkeeping itself fails (e.g. database closed)
    log(
      'error',
      `Job ${jobId} could not be processed: ${errorMessage(error)}`
    );
    return 'failed';
  }
}

async function runPipeline(
  initial: TranscriptionJob,
  deps: TranscriptionPipelineDeps,
  options: ProcessJobOptions,
  syncNote: () => void
): Promise<void> {
  const { repos, config, storage } = deps;
  const jobId = initial.id;
  const segmentation = createAudioSegmentationService(deps.media, config);
  const signal = options.signal;

  // Stages before this one already ran; they are replayed from their
  // persisted outputs without moving the job backwards
  const resumeFrom: TranscriptionStage =
    initial.status === 'processing' ? initial.currentStage : 'queued';
  if (resumeFrom !== 'queued') {
    log('info', `Resuming from stage: ${resumeFrom}`);
  }

  const checkBoundary = () => {
    if (signal?.aborted) throw new JobStoppedError('stop', jobId);
    if (options.shouldStop?.()) throw new JobStoppedError('stop', jobId);
    if (repos.jobs.findById(jobId)?.status === 'cancelled') {
      throw new JobStoppedError('cancelled', jobId);
    }
  };

  const isReplay = (stage: TranscriptionStage) =>
    stageIndex(stage) < stageIndex(resumeFrom);

  async function runStage<T>(
    stage: TranscriptionStage,
    fn: (replay: boolean) => Promise<T>
  ): Promise<T> {
    checkBoundary();
    const replay = isReplay(stage);
    if (replay) return fn(true);

    repos.jobs.advanceStage(jobId, stage, 0);
    return step(stage, () => fn(false), {
      onComplete: (durationMs) => {
        repos.jobs.setStageProgress(jobId, stage, 100);
        repos.jobs.recordStageDuration(jobId, stage, durationMs / 1000);
      },
    });
  }

  if (initial.currentStage === 'created') {
    repos.jobs.advanceStage(jobId, 'queued', 0);
    syncNote();
  }

  const source = await runStage('validating', () =>
    validateSource(initial, deps, segmentation)
  );

  const workDir = await storage.prepareJobWorkDir(jobId);

  const normalizedPath = await runStage('transcoding', () =>
    transcodeSource(jobId, source.sourcePath, workDir, deps, signal)
  );

  // Normalized WAV probes reliably even when the upload did not
  let duration = source.duration;
  if (duration <= 0) {
    duration = await segmentation.getDuration(normalizedPath);
    if (duration > 0) {
      repos.jobs.setResults(jobId, { totalDuration: duration });
    }
  }

  const segmenting = await runStage('segmenting', () =>
    segmentAudio(
      jobId,
      normalizedPath,
      duration,
      workDir,
      deps,
      segmentation,
      signal
    )
  );

  const language = await runStage('detecting_language', (replay) =>
    detectLanguage(
      jobId,
      segmenting.segments,
      deps,
      replay,
      checkBoundary,
      signal
    )
  );

  const run = await runStage('transcribing', (replay) =>
    transcribeSegments(
      jobId,
      segmenting.segments,
      language,
      deps,
      replay,
      checkBoundary,
      options
    )
  );

  const merged = await runStage('merging', async () => {
    const result = mergeSegmentTexts(run.outcomes, segmenting.plannedCount);
    if (result.segmentCount === 0) {
      if (run.providerFailure) {
        throw new PipelineError('transient', run.providerFailure);
      }
      throw new PipelineError(
        'empty_result',
        'Transcription produced no text for any segment'
      );
    }

    const checkpoint: MergingCheckpoint = result;
    repos.jobs.setCheckpoint(jobId, 'merging', checkpoint);
    repos.jobs.setResults(jobId, { wordCount: result.wordCount });
    log(
      'info',
      `Merged ${result.segmentCount}/${segmenting.plannedCount} segments (${result.wordCount} words, ${result.failedSegments} failed)`
    );
    return result;
  });

  let diarizedTranscript: string | null = null;
  if (initial.enableDiarization) {
    diarizedTranscript = await runStage('diarizing', async () => {
      const diarized = diarizeTranscript(merged.transcript, duration);
      repos.jobs.setCheckpoint(jobId, 'diarizing', diarized);
      log('info', `Labelled ${diarized.speakerCount} speaker(s)`);
      return diarized.diarizedTranscript;
    });
  }

  await runStage('generating_outputs', () =>
    generateOutputs(
      initial,
      merged,
      diarizedTranscript,
      segmenting.segments,
      run.transcripts,
      language,
      duration,
      deps
    )
  );

  checkBoundary();
  repos.jobs.setResults(jobId, {
    detectedLanguage: language.language,
    confidenceScore: language.confidence,
    totalDuration: duration > 0 ? duration : null,
    wordCount: merged.wordCount,
  });
  repos.jobs.advanceStage(jobId, 'complete', 100);
  log('info', `Job ${jobId} complete`);
}

// =============================================================================
// STAGES
// =============================================================================

async function validateSource(
  job: TranscriptionJob,
  deps: TranscriptionPipelineDeps,
  segmentation: AudioSegmentationService
): Promise<ValidatedSource> {
  const { repos, storage, config } = deps;

  const session = repos.uploadSessions.findById(job.uploadId);
  if (!session || session.status !== 'completed' || !session.storageKey) {
    throw new PipelineError(
      'validation',
      `Upload session ${job.uploadId} is not completed`
    );
  }

  if (!isMimeTypeAllowed(job.mimeType, config.allowedMimeTypes)) {
    throw new PipelineError(
      'validation',
      `Unsupported file type: ${job.mimeType}`
    );
  }

  const sourcePath = storage.resolvePath(session.storageKey);
  let size: number;
  try {
    size = (await stat(sourcePath)).size;
  } catch {
    throw new PipelineError(
      'validation',
      `Source file not found: ${session.storageKey}`
    );
  }

  if (size === 0) {
    throw new PipelineError('validation', 'Source file is empty');
  }
  if (size !== job.totalSize) {
    throw new PipelineError(
      'validation',
      `File size mismatch. Expected: ${job.totalSize}, got: ${size}`
    );
  }
  if (size > config.maxFileSizeBytes) {
    throw new PipelineError(
      'validation',
      `File too large: ${size} bytes (max ${config.maxFileSizeBytes})`
    );
  }

  repos.jobs.setStageProgress(job.id, 'validating', 50);

  const duration = await segmentation.getDuration(sourcePath);
  const maxSeconds = config.maxDurationHours * 3600;
  if (duration > maxSeconds) {
    throw new PipelineError(
      'validation',
      `Audio too long: ${Math.round(duration)}s (max ${maxSeconds}s)`
    );
  }

  repos.jobs.setStoragePath(job.id, 'original', session.storageKey);
  if (duration > 0) {
    repos.jobs.setResults(job.id, { totalDuration: duration });
  }
  log(
    'info',
    `Validated ${job.filename}: ${size} bytes, ${duration > 0 ? `${Math.round(duration)}s` : 'unknown duration'}`
  );

  return { sourcePath, duration };
}

async function transcodeSource(
  jobId: string,
  sourcePath: string,
  workDir: string,
  deps: TranscriptionPipelineDeps,
  signal: AbortSignal | undefined
): Promise<string> {
  const previous = deps.repos.jobs.findById(jobId)?.storagePaths.normalized;
  if (previous && (await exists(previous))) {
    log('info', 'Reusing normalized audio from a previous run');
    return previous;
  }

  const outputPath = join(workDir, 'normalized.wav');
  try {
    await deps.media.transcode(sourcePath, outputPath, { signal });
  } catch (error) {
    await rm(outputPath, { force: true });
    if (isAbortError(error)) throw error;
    throw new PipelineError(
      'internal',
      `Transcoding failed: ${errorMessage(error)}`
    );
  }

  deps.repos.jobs.setStoragePath(jobId, 'normalized', outputPath);
  return outputPath;
}

async function segmentAudio(
  jobId: string,
  normalizedPath: string,
  duration: number,
  workDir: string,
  deps: TranscriptionPipelineDeps,
  segmentation: AudioSegmentationService,
  signal: AbortSignal | undefined
): Promise<SegmentingCheckpoint> {
  const { repos, config } = deps;

  const previous = repos.jobs.getCheckpoint(jobId, 'segmenting');
  if (previous && previous.segments.length > 0) {
    const present = await Promise.all(
      previous.segments.map((s) => exists(s.path))
    );
    if (present.every(Boolean)) {
      log(
        'info',
        `Reusing ${previous.segments.length} segment(s) from checkpoint`
      );
      return previous;
    }
  }

  const size = (await stat(normalizedPath)).size;
  let checkpoint: SegmentingCheckpoint;

  if (!segmentation.needsSegmentation(size) || duration <= 0) {
    if (duration <= 0) {
      log('warn', 'Unknown duration, sending the file as a single segment');
    }
    checkpoint = {
      segments: [
        {
          index: 0,
          path: normalizedPath,
          start: 0,
          duration: Math.max(0, duration),
        },
      ],
      plannedCount: 1,
      segmentDuration: Math.max(0, duration),
    };
  } else {
    const segmentsDir = join(workDir, 'segments');
    await mkdir(segmentsDir, { recursive: true });
    try {
      const encoded = await segmentation.encodeSegments(
        normalizedPath,
        duration,
        config.segmentDurationSeconds,
        segmentsDir,
        {
          signal,
          onProgress: (done, total) =>
            repos.jobs.setStageProgress(
              jobId,
              'segmenting',
              (done / total) * 100
            ),
        }
      );
      if (encoded.segments.length === 0) {
        throw new PipelineError('internal', 'No segments could be encoded');
      }
      checkpoint = {
        segments: encoded.segments,
        plannedCount: encoded.plannedCount,
        segmentDuration: config.segmentDurationSeconds,
      };
    } catch (error) {
      await rm(segmentsDir, { recursive: true, force: true });
      throw error;
    }
    repos.jobs.setStoragePath(jobId, 'segments_dir', segmentsDir);
    log(
      'info',
      `Split into ${checkpoint.segments.length}/${checkpoint.plannedCount} segments of ${config.segmentDurationSeconds}s`
    );
  }

  // Transcripts are keyed by index; a different plan invalidates them
  if (
    previous &&
    (previous.plannedCount !== checkpoint.plannedCount ||
      previous.segmentDuration !== checkpoint.segmentDuration)
  ) {
    repos.jobs.clearCheckpoint(jobId, 'transcribing');
  }

  repos.jobs.setCheckpoint(jobId, 'segmenting', checkpoint);
  return checkpoint;
}

async function detectLanguage(
  jobId: string,
  segments: readonly AudioSegment[],
  deps: TranscriptionPipelineDeps,
  replay: boolean,
  checkBoundary: () => void,
  signal: AbortSignal | undefined
): Promise<LanguageGuess> {
  const { repos } = deps;
  const job = repos.jobs.findById(jobId);

  if (job?.language) {
    const guess = { language: job.language, confidence: 1 };
    repos.jobs.setResults(jobId, {
      detectedLanguage: guess.language,
      confidenceScore: guess.confidence,
    });
    return guess;
  }
  if (job?.detectedLanguage && job.confidenceScore !== null) {
    return { language: job.detectedLanguage, confidence: job.confidenceScore };
  }
  if (replay) return FALLBACK_LANGUAGE;

  const checkpoint: TranscribingCheckpoint = repos.jobs.getCheckpoint(
    jobId,
    'transcribing'
  ) ?? { completed: [], failed: [] };
  const known = new Map(checkpoint.completed.map((t) => [t.index, t]));
  const languages: (string | undefined)[] = [];

  for (const position of pickSampleIndices(segments.length)) {
    const segment = segments[position];
    const cached = known.get(segment.index);
    if (cached) {
      languages.push(cached.language);
      continue;
    }

    checkBoundary();
    try {
      const result = await deps.transcription.transcribe(segment.path, {
        signal,
      });
      languages.push(result.language);
      // Sample text is kept so the transcribing stage does not redo it
      known.set(segment.index, {
        index: segment.index,
        text: result.text,
        language: result.language,
      });
      repos.jobs.setCheckpoint(jobId, 'transcribing', {
        completed: sortedByIndex(known.values()),
        failed: checkpoint.failed,
      });
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) throw error;
      log(
        'warn',
        `Language sample ${segment.index + 1} failed: ${errorMessage(error)}`
      );
    }
  }

  const guess = voteLanguage(languages) ?? FALLBACK_LANGUAGE;
  repos.jobs.setResults(jobId, {
    detectedLanguage: guess.language,
    confidenceScore: guess.confidence,
  });
  log(
    'info',
    `Detected language: ${guess.language} (confidence ${guess.confidence.toFixed(2)})`
  );
  return guess;
}

async function transcribeSegments(
  jobId: string,
  segments: readonly AudioSegment[],
  language: LanguageGuess,
  deps: TranscriptionPipelineDeps,
  replay: boolean,
  checkBoundary: () => void,
  options: ProcessJobOptions
): Promise<TranscriptionRun> {
  const { repos, config } = deps;
  const signal = options.signal;

  const checkpoint = repos.jobs.getCheckpoint(jobId, 'transcribing') ?? {
    completed: [],
    failed: [],
  };
  const completed = new Map(checkpoint.completed.map((t) => [t.index, t]));
  const failed = new Map<number, string>();
  const tally: {
    stopped: boolean;
    providerFailure: string | null;
    otherFailures: number;
  } = { stopped: false, providerFailure: null, otherFailures: 0 };

  // A replayed stage already finished; its failures stand as recorded
  if (replay) {
    for (const f of checkpoint.failed) failed.set(f.index, f.message);
  }

  const pending = replay
    ? []
    : segments.filter((s) => !completed.has(s.index));
  const languageHint =
    language.confidence > FALLBACK_LANGUAGE.confidence
      ? language.language
      : undefined;

  if (completed.size > 0 && pending.length > 0) {
    log(
      'info',
      `Found ${completed.size} already-transcribed segment(s), ${pending.length} remaining`
    );
  }

  const persist = () => {
    repos.jobs.setCheckpoint(jobId, 'transcribing', {
      completed: sortedByIndex(completed.values()),
      failed: sortedByIndex(
        [...failed].map(([index, message]) => ({ index, message }))
      ),
    });
    const done = segments.filter(
      (s) => completed.has(s.index) || failed.has(s.index)
    ).length;
    repos.jobs.setStageProgress(
      jobId,
      'transcribing',
      segments.length === 0 ? 100 : (done / segments.length) * 100
    );
  };

  await parallelMap(
    pending,
    async (segment) => {
      try {
        checkBoundary();
      } catch (error) {
        if (error instanceof JobStoppedError) {
          tally.stopped = true;
          return;
        }
        throw error;
      }

      try {
        const result = await deps.transcription.transcribe(segment.path, {
          language: languageHint,
          signal,
        });
        completed.set(segment.index, {
          index: segment.index,
          text: result.text,
          language: result.language,
        });
        log(
          'debug',
          `Segment ${segment.index + 1}/${segments.length} transcribed`
        );
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) throw error;
        const message = errorMessage(error);
        failed.set(segment.index, message);
        if (error instanceof TranscriptionProviderError) {
          tally.providerFailure = message;
        } else {
          tally.otherFailures++;
        }
        log('warn', `Segment ${segment.index + 1} failed: ${message}`);
      }
      persist();
    },
    config.maxConcurrentSegments
  );

  if (tally.stopped) {
    checkBoundary();
    throw new JobStoppedError('stop', jobId);
  }

  const outcomes: SegmentOutcome[] = segments.flatMap(
    (segment): SegmentOutcome[] => {
      const done = completed.get(segment.index);
      if (done) {
        return [
          {
            index: segment.index,
            ok: true,
            text: done.text,
            language: done.language,
          },
        ];
      }
      const message = failed.get(segment.index);
      return message === undefined
        ? []
        : [{ index: segment.index, ok: false, message }];
    }
  );

  return {
    outcomes,
    transcripts: sortedByIndex(completed.values()),
    providerFailure: tally.otherFailures === 0 ? tally.providerFailure : null,
  };
}

async function generateOutputs(
  job: TranscriptionJob,
  merged: MergingCheckpoint,
  diarizedTranscript: string | null,
  segments: readonly AudioSegment[],
  transcripts: readonly SegmentTranscript[],
  language: LanguageGuess,
  duration: number,
  deps: TranscriptionPipelineDeps
): Promise<void> {
  const { repos, storage } = deps;

  // Assets are immutable; a rerun replaces the whole set
  repos.assets.deleteForJob(job.id);

  const input = {
    transcript: merged.transcript,
    diarizedTranscript,
    cues: buildCues(segments, transcripts, duration > 0 ? duration : null),
    metadata: {
      language: language.language,
      duration: duration > 0 ? duration : null,
      wordCount: merged.wordCount,
      confidence: language.confidence,
    },
  };

  const formats = [...new Set(job.outputFormats)];
  const assetKinds: string[] = [];
  for (const [i, format] of formats.entries()) {
    const rendered = renderOutput(format, input);
    if (!rendered) {
      log('warn', `Output format ${format} is not supported, skipping`);
      continue;
    }

    const { storageKey, size } = await storage.writeAsset(
      job.id,
      rendered.filename,
      rendered.content
    );
    repos.assets.create({
      jobId: job.id,
      kind: format,
      storageKey,
      fileSize: size,
      mimeType: rendered.mimeType,
    });
    assetKinds.push(format);
    repos.jobs.setStageProgress(
      job.id,
      'generating_outputs',
      ((i + 1) / formats.length) * 100
    );
  }

  repos.jobs.setCheckpoint(job.id, 'generating_outputs', { assetKinds });
  log(
    'info',
    `Generated ${assetKinds.length} output(s): ${assetKinds.join(', ')}`
  );
}
