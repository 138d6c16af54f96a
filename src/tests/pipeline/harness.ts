/**
 * In-process pipeline fixture: in-memory database, temp data dir, fake
 * ffmpeg and a scripted transcription provider.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { type Mock, vi } from 'vitest';
import type {
  MediaService,
  OutputFormat,
  PipelineConfig,
  PipelineConfigInput,
  StorageService,
  TranscriptionJob,
  TranscriptionService,
} from '../../0_types.js';
import type { TranscriptionPipelineDeps } from '../../actions/process-transcription-job.js';
import { submitUpload } from '../../actions/submit-upload.js';
import { createFsStorageService } from '../../adapters/storage.fs.adapter.js';
import { loadConfig } from '../../config.js';
import { createTestRepositories } from '../../db/index.js';
import {
  createUploadSessionManager,
  type UploadSessionManager,
} from '../../services/upload-session-manager.js';

/** Index encoded in a segment filename; the unsplit file counts as 0 */
export function segmentIndex(path: string): number {
  const match = /segment_(\d+)\.wav$/.exec(path);
  return match ? Number(match[1]) : 0;
}

export function defaultText(path: string): string {
  return `part${segmentIndex(path)} words here`;
}

export interface SubmitOptions {
  content?: string;
  filename?: string;
  mimeType?: string;
  language?: string | null;
  enableDiarization?: boolean;
  outputFormats?: OutputFormat[];
}

export interface PipelineHarness {
  repos: ReturnType<typeof createTestRepositories>;
  config: PipelineConfig;
  dataDir: string;
  storage: StorageService;
  media: {
    probeDuration: Mock<MediaService['probeDuration']>;
    encodeSegment: Mock<MediaService['encodeSegment']>;
    transcode: Mock<MediaService['transcode']>;
  };
  transcribe: Mock<TranscriptionService['transcribe']>;
  uploads: UploadSessionManager;
  deps: TranscriptionPipelineDeps;
  submit(options?: SubmitOptions): Promise<TranscriptionJob>;
  workDir(jobId: string): string;
  cleanup(): Promise<void>;
}

/**
 * Defaults: 16 minutes of audio, 300s segments, and a provider limit small
 * enough that every normalized file gets split.
 */
export async function createPipelineHarness(
  overrides: PipelineConfigInput = {}
): Promise<PipelineHarness> {
  const repos = createTestRepositories();
  const dataDir = await mkdtemp(join(os.tmpdir(), 'autome-pipeline-test-'));
  const config = loadConfig(
    {},
    {
      dbPath: ':memory:',
      dataDir,
      maxProviderFileBytes: 10,
      segmentDurationSeconds: 300,
      maxConcurrentSegments: 1,
      pollIntervalMs: 10,
      errorBackoffMs: 10,
      ...overrides,
    }
  );
  const storage = createFsStorageService(dataDir);

  const media = {
    probeDuration: vi.fn<MediaService['probeDuration']>(async () => 960),
    encodeSegment: vi.fn<MediaService['encodeSegment']>(
      async (_input, _start, _duration, outputPath) => {
        await writeFile(outputPath, 'wav');
        return outputPath;
      }
    ),
    transcode: vi.fn<MediaService['transcode']>(async (_input, outputPath) => {
      await writeFile(outputPath, 'x'.repeat(100));
      return outputPath;
    }),
  };

  const transcribe = vi.fn<TranscriptionService['transcribe']>(
    async (audioPath) => ({ text: defaultText(audioPath), language: 'en' })
  );

  const uploads = createUploadSessionManager({
    uploadSessions: repos.uploadSessions,
    storage,
    config,
  });

  const deps: TranscriptionPipelineDeps = {
    repos,
    transcription: { transcribe },
    media,
    storage,
    config,
  };

  return {
    repos,
    config,
    dataDir,
    storage,
    media,
    transcribe,
    uploads,
    deps,

    async submit(options: SubmitOptions = {}): Promise<TranscriptionJob> {
      const content = options.content ?? 'fake-audio-bytes';
      const data = new TextEncoder().encode(content);
      const session = uploads.createSession({
        filename: options.filename ?? 'meeting.mp3',
        totalSize: data.length,
        mimeType: options.mimeType ?? 'audio/mpeg',
        chunkSize: 1024,
        userId: 'user-1',
      });
      await uploads.storeChunk(session.id, 0, data);

      const { job } = await submitUpload(
        {
          uploadId: session.id,
          language: options.language,
          enableDiarization: options.enableDiarization,
          outputFormats: options.outputFormats,
        },
        { repos, uploads, config }
      );
      return job;
    },

    workDir(jobId: string): string {
      return join(dataDir, 'jobs', jobId, 'work');
    },

    async cleanup(): Promise<void> {
      repos.cleanup();
      await rm(dataDir, { recursive: true, force: true });
    },
  };
}
