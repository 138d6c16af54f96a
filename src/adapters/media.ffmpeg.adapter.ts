/**
 * FFmpeg Media Adapter
 *
 * Probes and re-encodes audio with the ffmpeg/ffprobe CLIs.
 * Everything downstream expects 16 kHz mono PCM WAV, the format
 * speech-to-text providers handle best.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { MediaCommandOptions, MediaService } from '../0_types.js';
import { errorMessage, isAbortError } from '../domain/errors.js';

const execFileAsync = promisify(execFile);

const PCM_16K_MONO = ['-ac', '1', '-ar', '16000', '-c:a', 'pcm_s16le'];

export interface FfmpegMediaConfig {
  ffmpegPath?: string;
  ffprobePath?: string;
  probeTimeoutMs?: number;
  encodeTimeoutMs?: number;
}

const probeOutputSchema = z.object({
  format: z
    .object({
      duration: z.union([z.string(), z.number()]).optional(),
    })
    .optional(),
});

/**
 * Extract `format.duration` from `ffprobe -of json` output.
 * Returns null when the field is missing, non-numeric or not positive.
 */
export function parseProbeDuration(stdout: string): number | null {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return null;
  }

  const parsed = probeOutputSchema.safeParse(json);
  const raw = parsed.success ? parsed.data.format?.duration : undefined;
  if (raw === undefined) return null;

  const duration = typeof raw === 'number' ? raw : Number.parseFloat(raw);
  return Number.isFinite(duration) && duration > 0 ? duration : null;
}

/**
 * Creates a MediaService that uses FFmpeg CLI
 */
export function createFfmpegMediaService(
  config: FfmpegMediaConfig = {}
): MediaService {
  const ffmpeg = config.ffmpegPath ?? 'ffmpeg';
  const ffprobe = config.ffprobePath ?? 'ffprobe';
  const probeTimeout = config.probeTimeoutMs ?? 30_000;
  const encodeTimeout = config.encodeTimeoutMs ?? 10 * 60 * 1000;

  async function runFfmpeg(
    args: string[],
    label: string,
    options?: MediaCommandOptions
  ): Promise<void> {
    try {
      await execFileAsync(ffmpeg, ['-v', 'error', '-y', ...args], {
        timeout: encodeTimeout,
        maxBuffer: 10 * 1024 * 1024,
        signal: options?.signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new Error(`${label} failed: ${errorMessage(error)}`);
    }
  }

  return {
    probeDuration: async (filePath) => {
      const { stdout } = await execFileAsync(
        ffprobe,
        [
          '-v',
          'error',
          '-show_entries',
          'format=duration',
          '-of',
          'json',
          filePath,
        ],
        { timeout: probeTimeout }
      );
      return parseProbeDuration(stdout);
    },

    encodeSegment: async (
      filePath,
      startSeconds,
      durationSeconds,
      outputPath,
      options
    ) => {
      // -ss before -i seeks the input instead of decoding up to the offset
      await runFfmpeg(
        [
          '-ss',
          String(startSeconds),
          '-t',
          String(durationSeconds),
          '-i',
          filePath,
          '-vn',
          ...PCM_16K_MONO,
          outputPath,
        ],
        `Segment encode at ${startSeconds}s`,
        options
      );
      return outputPath;
    },

    transcode: async (filePath, outputPath, options) => {
      await runFfmpeg(
        ['-i', filePath, '-vn', ...PCM_16K_MONO, outputPath],
        'Audio transcode',
        options
      );
      return outputPath;
    },
  };
}
