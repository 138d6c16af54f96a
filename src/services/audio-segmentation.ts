/**
 * AUTO-ME - Audio Segmentation Service
 *
 * Splits long recordings into provider-sized WAV segments.
 * Strategy: fixed-length windows of `segmentDuration` seconds; the last one
 * takes the remainder. Unknown duration means "send the file whole".
 */

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import type { MediaService } from '../0_types.js';
import type { AudioSegment } from '../domain/checkpoint.js';
import { errorMessage, isAbortError } from '../domain/errors.js';
import { log } from '../pipeline/context.js';

export interface PlannedSegment {
  index: number;
  start: number;
  duration: number;
}

export interface EncodedSegments {
  segments: AudioSegment[];
  plannedCount: number;
}

export interface SegmentationOptions {
  signal?: AbortSignal;
  /** Called after each segment attempt, encoded or skipped */
  onProgress?: (done: number, total: number) => void;
}

// Millisecond precision keeps offsets like 3 * 0.1 from drifting
function roundMs(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Plan `ceil(duration / segmentDuration)` windows starting at 0, L, 2L, ...
 */
export function planSegments(
  duration: number,
  segmentDuration: number
): PlannedSegment[] {
  if (!(duration > 0) || !(segmentDuration > 0)) return [];

  const count = Math.ceil(duration / segmentDuration);
  const plan: PlannedSegment[] = [];
  for (let index = 0; index < count; index++) {
    const start = roundMs(index * segmentDuration);
    plan.push({
      index,
      start,
      duration: roundMs(Math.min(segmentDuration, duration - start)),
    });
  }
  return plan;
}

export function segmentFilename(index: number): string {
  return `segment_${index.toString().padStart(3, '0')}.wav`;
}

export function createAudioSegmentationService(
  media: MediaService,
  config: { maxProviderFileBytes: number }
) {
  /**
   * Duration in seconds; 0 when it cannot be determined.
   */
  async function getDuration(filePath: string): Promise<number> {
    try {
      const duration = await media.probeDuration(filePath);
      if (duration === null) {
        log('warn', `Could not determine duration of ${filePath}`);
        return 0;
      }
      return duration;
    } catch (error) {
      log(
        'warn',
        `Duration probe failed for ${filePath}: ${errorMessage(error)}`
      );
      return 0;
    }
  }

  function needsSegmentation(fileSizeBytes: number): boolean {
    return fileSizeBytes > config.maxProviderFileBytes;
  }

  /**
   * Encode every planned window into `outputDir`. Windows that fail to
   * encode are logged and left out; aborts propagate.
   */
  async function encodeSegments(
    filePath: string,
    duration: number,
    segmentDuration: number,
    outputDir: string,
    options: SegmentationOptions = {}
  ): Promise<EncodedSegments> {
    const plan = planSegments(duration, segmentDuration);
    const segments: AudioSegment[] = [];

    for (const planned of plan) {
      const outputPath = join(outputDir, segmentFilename(planned.index));
      try {
        await media.encodeSegment(
          filePath,
          planned.start,
          planned.duration,
          outputPath,
          { signal: options.signal }
        );
        segments.push({ ...planned, path: outputPath });
      } catch (error) {
        if (isAbortError(error)) throw error;
        log(
          'warn',
          `Skipping segment ${planned.index + 1}/${plan.length}: ${errorMessage(error)}`
        );
        await rm(outputPath, { force: true });
      }
      options.onProgress?.(planned.index + 1, plan.length);
    }

    return { segments, plannedCount: plan.length };
  }

  /**
   * Split `filePath` into WAV segments and return their paths in order.
   * Unknown duration returns `[filePath]`. The caller owns the files.
   */
  async function splitIntoSegments(
    filePath: string,
    segmentDurationSeconds: number,
    outputDir?: string,
    options: SegmentationOptions = {}
  ): Promise<string[]> {
    const duration = await getDuration(filePath);
    if (duration <= 0) return [filePath];

    const dir =
      outputDir ?? (await mkdtemp(join(os.tmpdir(), 'autome-segments-')));
    const { segments } = await encodeSegments(
      filePath,
      duration,
      segmentDurationSeconds,
      dir,
      options
    );
    return segments.map((s) => s.path);
  }

  /**
   * Delete segment files, never touching the paths in `keep`
   */
  async function removeSegments(
    paths: readonly string[],
    keep: readonly string[] = []
  ): Promise<void> {
    const protectedPaths = new Set(keep);
    await Promise.all(
      paths
        .filter((p) => !protectedPaths.has(p))
        .map((p) => rm(p, { force: true }))
    );
  }

  return {
    getDuration,
    needsSegmentation,
    encodeSegments,
    splitIntoSegments,
    removeSegments,
  };
}

export type AudioSegmentationService = ReturnType<
  typeof createAudioSegmentationService
>;
