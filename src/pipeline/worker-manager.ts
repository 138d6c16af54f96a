/**
 * AUTO-ME - Worker Manager
 *
 * Owns the pipeline worker's background task: start/stop, status,
 * queue counts and a health probe for whatever hosts the process.
 */

import type {
  JobOutcome,
  TranscriptionPipelineDeps,
} from '../actions/process-transcription-job.js';
import { errorMessage } from '../domain/errors.js';
import { log } from './context.js';
import {
  createPipelineWorker,
  type PipelineWorker,
  type PipelineWorkerOptions,
} from './pipeline-worker.js';

export interface WorkerStatus {
  running: boolean;
  workerActive: boolean;
  taskRunning: boolean;
}

export interface QueueStatus {
  createdCount: number;
  processingCount: number;
  retryableCount: number;
  totalQueued: number;
  error?: string;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthReport {
  status: HealthStatus;
  reason?: string;
  queueSize?: number;
}

export interface WorkerManager {
  start(): void;
  stop(timeoutSeconds?: number): Promise<void>;
  status(): WorkerStatus;
  queueStatus(): QueueStatus;
  healthCheck(): HealthReport;
  processJob(jobId: string): Promise<JobOutcome>;
}

export function createWorkerManager(
  deps: TranscriptionPipelineDeps,
  options: PipelineWorkerOptions = {}
): WorkerManager {
  const { repos, config } = deps;

  let worker: PipelineWorker | null = null;
  let task: Promise<void> | null = null;
  let taskDone = false;
  let running = false;

  function queueStatus(): QueueStatus {
    try {
      const createdCount = repos.jobs.countByStatus('created');
      const processingCount = repos.jobs.countByStatus('processing');
      const retryableCount = repos.jobs.countRetryable();
      return {
        createdCount,
        processingCount,
        retryableCount,
        totalQueued: createdCount + processingCount,
      };
    } catch (error) {
      const message = errorMessage(error);
      log('error', `Failed to get queue status: ${message}`);
      return {
        createdCount: 0,
        processingCount: 0,
        retryableCount: 0,
        totalQueued: 0,
        error: message,
      };
    }
  }

  return {
    start(): void {
      if (running) {
        log('warn', 'Worker already running');
        return;
      }

      const current = createPipelineWorker(deps, options);
      worker = current;
      taskDone = false;
      task = current
        .run()
        .catch((error: unknown) => {
          log('error', `Pipeline worker crashed: ${errorMessage(error)}`);
        })
        .finally(() => {
          taskDone = true;
        });
      running = true;
      log('info', '🚀 Worker manager started pipeline worker');
    },

    async stop(timeoutSeconds = 30): Promise<void> {
      if (!running || !worker || !task) return;

      worker.requestStop();

      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), timeoutSeconds * 1000);
      });
      const expired = await Promise.race([task.then(() => false), timedOut]);
      clearTimeout(timer);

      if (expired) {
        log('warn', "Worker didn't stop gracefully, aborting in-flight work...");
        worker.abort();
        await task;
      }

      running = false;
      worker = null;
      task = null;
      log('info', '🛑 Worker manager stopped pipeline worker');
    },

    status(): WorkerStatus {
      return {
        running,
        workerActive: worker !== null,
        taskRunning: task !== null && !taskDone,
      };
    },

    queueStatus,

    healthCheck(): HealthReport {
      if (!running) {
        return { status: 'unhealthy', reason: 'Worker not running' };
      }

      const queue = queueStatus();
      if (queue.error) {
        return {
          status: 'unhealthy',
          reason: `Health check failed: ${queue.error}`,
        };
      }
      if (queue.retryableCount > config.degradedRetryableThreshold) {
        return { status: 'degraded', reason: 'Too many failed jobs in queue' };
      }
      if (queue.totalQueued > config.degradedQueueThreshold) {
        return { status: 'degraded', reason: 'Job queue backing up' };
      }
      return { status: 'healthy', queueSize: queue.totalQueued };
    },

    async processJob(jobId: string): Promise<JobOutcome> {
      if (!running || !worker) {
        throw new Error('Worker not running');
      }
      if (!repos.jobs.findById(jobId)) {
        throw new Error(`Job ${jobId} not found`);
      }
      return worker.processJob(jobId);
    },
  };
}
