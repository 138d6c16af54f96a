import { AsyncLocalStorage } from 'node:async_hooks';
import { performance } from 'node:perf_hooks';
import { generateId } from '../db/helpers.js';
import { errorMessage } from '../domain/errors.js';

export interface StepResult {
  name: string;
  durationMs: number;
  status: 'success' | 'error';
  error?: string;
}

export type RunType = 'initial' | 'resume' | 'retry';

export interface JobRunState {
  jobId: string;
  runId: string;
  runType: RunType;
  steps: StepResult[];
  verbose: boolean;
  startTime: number;
}

const storage = new AsyncLocalStorage<JobRunState>();

export function isVerbose(): boolean {
  return process.env.AUTOME_VERBOSE === 'true';
}

/**
 * Run `fn` inside a job scope: `step` and `log` calls made anywhere below it
 * are attributed to the job and summarised when it finishes.
 */
export function withJob<T>(
  jobId: string,
  runType: RunType,
  fn: () => Promise<T>
): Promise<T> {
  const state: JobRunState = {
    jobId,
    runId: generateId(),
    runType,
    steps: [],
    verbose: isVerbose(),
    startTime: performance.now(),
  };

  console.log(`\n🎙️  Job: [${jobId}] (${runType})`);

  return storage.run(state, async () => {
    try {
      return await fn();
    } finally {
      printSummary(state);
    }
  });
}

export interface StepOptions {
  itemsTotal?: number;
  /** Called with the elapsed time once the step succeeds */
  onComplete?: (durationMs: number) => void;
}

export async function step<T>(
  name: string,
  fn: () => Promise<T>,
  options?: StepOptions
): Promise<T> {
  const state = storage.getStore();
  const start = performance.now();

  if (state?.verbose) {
    console.log(`  ▶ ${name}`);
  }

  try {
    const result = await fn();
    const durationMs = performance.now() - start;
    state?.steps.push({ name, durationMs, status: 'success' });
    options?.onComplete?.(durationMs);

    if (!state) return result;

    const itemsInfo = options?.itemsTotal ? ` (${options.itemsTotal})` : '';
    if (!state.verbose) {
      console.log(
        `  ✅ ${name.padEnd(30, '.')} ${(durationMs / 1000).toFixed(1)}s${itemsInfo}`
      );
    } else {
      console.log(
        `  ✅ ${name} completed in ${(durationMs / 1000).toFixed(1)}s${itemsInfo}`
      );
    }

    return result;
  } catch (error) {
    const durationMs = performance.now() - start;
    const message = errorMessage(error);
    state?.steps.push({ name, durationMs, status: 'error', error: message });

    if (state) {
      console.error(
        `  ❌ ${name} failed after ${(durationMs / 1000).toFixed(1)}s: ${message}`
      );
    }
    throw error;
  }
}

export function log(
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string
): void {
  const state = storage.getStore();
  if (!state) {
    if (level === 'debug' && !isVerbose()) return;
    if (level === 'error') console.error(message);
    else if (level === 'warn') console.warn(message);
    else console.log(message);
    return;
  }

  if (level === 'debug' && !state.verbose) return;

  const prefix = level === 'info' ? '    ' : `    [${level}] `;
  if (level === 'error') console.error(`${prefix}${message}`);
  else console.log(`${prefix}${message}`);
}

function printSummary(state: JobRunState) {
  const totalDuration = (performance.now() - state.startTime) / 1000;
  const failed = state.steps.filter((s) => s.status === 'error').length;
  console.log('─'.repeat(50));
  console.log(`🏁 Job Finished: [${state.jobId}]`);
  console.log(
    `📊 Total Duration: ${totalDuration.toFixed(1)}s, ${state.steps.length} steps${failed ? `, ${failed} failed` : ''}`
  );
  console.log('─'.repeat(50));
}
