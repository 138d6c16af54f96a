/**
 * AUTO-ME - Pipeline Worker
 *
 * Polls the job store and runs jobs through processTranscriptionJob:
 * created jobs first, then `processing` jobs left behind by an interrupted
 * run, then failed jobs whose retry delay has passed. FIFO within each
 * group, at most `maxConcurrentJobs` at a time.
 */

import type { TranscriptionJob } from '../0_types.js';
import {
  type JobOutcome,
  processTranscriptionJob,
  type TranscriptionPipelineDeps,
} from '../actions/process-transcription-job.js';
import { errorMessage } from '../domain/errors.js';
import { sleep } from '../utils/parallel.js';
import { log } from './context.js';

export interface PipelineWorkerOptions {
  /** Clock used for the retry delay */
  now?: () => number;
}

export interface PipelineWorker {
  /** Runs the poll loop until `requestStop` or `abort`; resolves once drained */
  run(): Promise<void>;
  /** Starts every eligible job that fits in the free slots; returns their ids */
  pollOnce(): string[];
  processJob(jobId: string): Promise<JobOutcome>;
  /** Finish at the next job or segment boundary */
  requestStop(): void;
  /** Abort in-flight provider and media calls */
  abort(): void;
  isRunning(): boolean;
  activeJobIds(): string[];
}

export function createPipelineWorker(
  deps: TranscriptionPipelineDeps,
  options: PipelineWorkerOptions = {}
): PipelineWorker {
  const { repos, config } = deps;
  const now = options.now ?? Date.now;

  const inFlight = new Map<string, Promise<JobOutcome>>();
  let loop: Promise<void> | null = null;
  let stopRequested = false;
  // Wakes the idle sleep as soon as a stop is requested
  let wake = new AbortController();
  let abortController = new AbortController();

  function retryDue(job: TranscriptionJob): boolean {
    return now() - Date.parse(job.updatedAt) >= config.retryDelayMs;
  }

  function selectJobs(limit: number): TranscriptionJob[] {
    if (limit <= 0) return [];
    const fetchLimit = limit + inFlight.size;
    const idle = (job: TranscriptionJob) => !inFlight.has(job.id);

    const selected: TranscriptionJob[] = [];
    const take = (jobs: TranscriptionJob[]) => {
      for (const job of jobs) {
        if (selected.length >= limit) return;
        if (!selected.some((s) => s.id === job.id)) selected.push(job);
      }
    };

    take(repos.jobs.listByStatus('created', fetchLimit).filter(idle));
    take(repos.jobs.listByStatus('processing', fetchLimit).filter(idle));
    take(repos.jobs.listRetryable(fetchLimit).filter(idle).filter(retryDue));
    return selected;
  }

  function processJob(jobId: string): Promise<JobOutcome> {
    const running = inFlight.get(jobId);
    if (running) return running;

    const task = processTranscriptionJob(jobId, deps, {
      shouldStop: () => stopRequested,
      signal: abortController.signal,
    })
      .then((outcome) => {
        log('debug', `Job ${jobId} finished: ${outcome}`);
        return outcome;
      })
      .finally(() => {
        inFlight.delete(jobId);
      });

    inFlight.set(jobId, task);
    return task;
  }

  function pollOnce(): string[] {
    if (stopRequested) return [];
    const jobs = selectJobs(config.maxConcurrentJobs - inFlight.size);
    for (const job of jobs) {
      void processJob(job.id);
    }
    return jobs.map((job) => job.id);
  }

  /** Resolves after `ms`, when an in-flight job settles, or on stop */
  async function waitForWork(ms: number): Promise<void> {
    if (wake.signal.aborted) return;
    const done = new AbortController();
    const onWake = () => done.abort();
    wake.signal.addEventListener('abort', onWake, { once: true });
    try {
      await Promise.race([sleep(ms, done.signal), ...inFlight.values()]);
    } finally {
      wake.signal.removeEventListener('abort', onWake);
      done.abort();
    }
  }

  async function runLoop(): Promise<void> {
    log('info', '🚀 Pipeline worker started');

    while (!stopRequested) {
      try {
        const started = pollOnce();
        if (started.length > 0) {
          log('debug', `Started ${started.length} job(s)`);
        }
        if (stopRequested) break;
        await waitForWork(config.pollIntervalMs);
      } catch (error) {
        log('error', `Worker poll failed: ${errorMessage(error)}`);
        await sleep(config.errorBackoffMs, wake.signal);
      }
    }

    await Promise.allSettled(inFlight.values());
    log('info', '🛑 Pipeline worker stopped');
  }

  return {
    run(): Promise<void> {
      if (loop) return loop;
      stopRequested = false;
      wake = new AbortController();
      abortController = new AbortController();
      loop = runLoop().finally(() => {
        loop = null;
      });
      return loop;
    },

    pollOnce,
    processJob,

    requestStop(): void {
      stopRequested = true;
      wake.abort();
    },

    abort(): void {
      stopRequested = true;
      wake.abort();
      abortController.abort();
    },

    isRunning(): boolean {
      return loop !== null;
    },

    activeJobIds(): string[] {
      return [...inFlight.keys()];
    },
  };
}
