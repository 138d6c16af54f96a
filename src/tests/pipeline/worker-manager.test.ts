import { afterEach, describe, expect, it, vi } from 'vitest';
import type { TranscriptionResult } from '../../0_types.js';
import { createWorkerManager } from '../../pipeline/worker-manager.js';
import { createPipelineHarness, type PipelineHarness } from './harness.js';

describe('WorkerManager', () => {
  let h: PipelineHarness | null = null;

  afterEach(async () => {
    vi.restoreAllMocks();
    await h?.cleanup();
    h = null;
  });

  it('reports a stopped worker as unhealthy', async () => {
    h = await createPipelineHarness();
    const manager = createWorkerManager(h.deps);

    expect(manager.status()).toEqual({
      running: false,
      workerActive: false,
      taskRunning: false,
    });
    expect(manager.healthCheck()).toEqual({
      status: 'unhealthy',
      reason: 'Worker not running',
    });
    await expect(manager.processJob('anything')).rejects.toThrow(
      'Worker not running'
    );
    await expect(manager.stop()).resolves.toBeUndefined();
  });

  it('counts the queue', async () => {
    h = await createPipelineHarness();
    await h.submit();
    await h.submit();
    const processing = await h.submit();
    h.repos.jobs.advanceStage(processing.id, 'queued', 0);
    const failed = await h.submit();
    h.repos.jobs.markFailed(failed.id, 'transient', 'Provider returned 503');

    expect(createWorkerManager(h.deps).queueStatus()).toEqual({
      createdCount: 2,
      processingCount: 1,
      retryableCount: 1,
      totalQueued: 3,
    });
  });

  it('starts once and stops cleanly', async () => {
    h = await createPipelineHarness();
    const warn = vi.spyOn(console, 'warn');
    const manager = createWorkerManager(h.deps);

    manager.start();
    manager.start();

    expect(warn).toHaveBeenCalledWith('Worker already running');
    expect(manager.status()).toEqual({
      running: true,
      workerActive: true,
      taskRunning: true,
    });
    expect(manager.healthCheck()).toEqual({ status: 'healthy', queueSize: 0 });

    await manager.stop();

    expect(manager.status()).toEqual({
      running: false,
      workerActive: false,
      taskRunning: false,
    });
  });

  it('degrades when failed jobs pile up', async () => {
    h = await createPipelineHarness({
      degradedRetryableThreshold: 1,
      retryDelayMs: 60_000,
    });
    for (let i = 0; i < 2; i++) {
      const job = await h.submit();
      h.repos.jobs.markFailed(job.id, 'transient', 'Provider returned 503');
    }
    const manager = createWorkerManager(h.deps);

    manager.start();
    expect(manager.healthCheck()).toEqual({
      status: 'degraded',
      reason: 'Too many failed jobs in queue',
    });
    await manager.stop();
  });

  it('reports queue errors as unhealthy', async () => {
    h = await createPipelineHarness();
    vi.spyOn(h.repos.jobs, 'countByStatus').mockImplementation(() => {
      throw new Error('database is locked');
    });
    const manager = createWorkerManager(h.deps);

    expect(manager.queueStatus()).toEqual({
      createdCount: 0,
      processingCount: 0,
      retryableCount: 0,
      totalQueued: 0,
      error: 'database is locked',
    });

    manager.start();
    expect(manager.healthCheck()).toEqual({
      status: 'unhealthy',
      reason: 'Health check failed: database is locked',
    });
    await manager.stop();
  });

  it('rejects unknown jobs', async () => {
    h = await createPipelineHarness();
    const manager = createWorkerManager(h.deps);

    manager.start();
    await expect(manager.processJob('missing')).rejects.toThrow(
      'Job missing not found'
    );
    await manager.stop();
  });

  it('aborts in-flight work when the stop timeout expires', async () => {
    h = await createPipelineHarness();
    const harness = h;
    harness.transcribe.mockImplementation(
      (_path, options) =>
        new Promise<TranscriptionResult>((_resolve, reject) => {
          options?.signal?.addEventListener(
            'abort',
            () =>
              reject(
                Object.assign(new Error('The operation was aborted'), {
                  name: 'AbortError',
                })
              ),
            { once: true }
          );
        })
    );
    const job = await harness.submit({ language: 'en' });
    const manager = createWorkerManager(harness.deps);

    manager.start();
    await vi.waitFor(
      () => {
        expect(harness.transcribe).toHaveBeenCalled();
      },
      { timeout: 5000, interval: 10 }
    );
    await manager.stop(0.05);

    expect(manager.status().running).toBe(false);
    const interrupted = harness.repos.jobs.findById(job.id);
    expect(interrupted?.status).toBe('processing');
    expect(interrupted?.currentStage).toBe('transcribing');
    expect(interrupted?.retryCount).toBe(0);
  });
});
