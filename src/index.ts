#!/usr/bin/env node
/**
 * AUTO-ME CLI Entry Point
 *
 * Runs the transcription worker and a few operator commands against the
 * local database.
 */

import { open, stat } from 'node:fs/promises';
import path from 'node:path';
import {
  type OutputFormat,
  outputFormatSchema,
  type PipelineConfig,
  type TranscriptionService,
} from './0_types.js';
import {
  processTranscriptionJob,
  type TranscriptionPipelineDeps,
} from './actions/process-transcription-job.js';
import { deleteTranscriptionJob } from './actions/delete-transcription-job.js';
import { submitUpload } from './actions/submit-upload.js';
import { createFfmpegMediaService } from './adapters/media.ffmpeg.adapter.js';
import { createFsStorageService } from './adapters/storage.fs.adapter.js';
import { createOpenAiTranscriptionService } from './adapters/transcription.openai.adapter.js';
import { createWhisperTranscriptionService } from './adapters/transcription.whisper.adapter.js';
import { expandHome, loadConfig, loadWhisperConfig } from './config.js';
import { closeDb, getRepositories } from './db/index.js';
import { errorMessage } from './domain/errors.js';
import { chunkCount } from './domain/upload-session.js';
import { createWorkerManager } from './pipeline/worker-manager.js';
import { createLegacyNoteBridge } from './services/legacy-note-bridge.js';
import { createUploadSessionManager } from './services/upload-session-manager.js';

const MIME_BY_EXTENSION: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.webm': 'audio/webm',
  '.flac': 'audio/flac',
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
};

interface ParsedArgs {
  command: string | null;
  positional: string[];
  help: boolean;
  file: string | null;
  language: string | null;
  formats: string | null;
  diarize: boolean;
  process: boolean;
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    showHelp();
    process.exit(args.help ? 0 : 1);
  }

  run(args)
    .then((exitCode) => {
      closeDb();
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error('Error:', errorMessage(error));
      if (error instanceof Error && error.stack) console.error(error.stack);
      closeDb();
      process.exit(1);
    });
}

function parseArgs(argsArray: string[]): ParsedArgs {
  const valueOf = (flag: string): string | null => {
    const index = argsArray.indexOf(flag);
    return index !== -1 ? argsArray[index + 1] || null : null;
  };

  const valueFlags = new Set(['--file', '--language', '--formats']);
  const positional = argsArray.filter(
    (arg, i) =>
      !arg.startsWith('-') && !valueFlags.has(argsArray[i - 1] ?? '')
  );

  return {
    command: positional[0] ?? null,
    positional: positional.slice(1),
    help: argsArray.includes('--help') || argsArray.includes('-h'),
    file: valueOf('--file'),
    language: valueOf('--language'),
    formats: valueOf('--formats'),
    diarize: argsArray.includes('--diarize'),
    process: argsArray.includes('--process'),
  };
}

function showHelp(): void {
  console.log(`
AUTO-ME - Large-file transcription pipeline

Usage:
  auto-me worker                        Run the pipeline worker until SIGINT/SIGTERM
  auto-me ingest --file <path>          Upload a local file in chunks and queue a job
      [--language <code>]               Skip language detection
      [--formats txt,srt,vtt,json]      Output formats (default: txt)
      [--diarize]                       Label speakers
      [--process]                       Process the job right away
  auto-me status                        Queue counts
  auto-me job <jobId>                   Show one job
  auto-me retry <jobId>                 Re-run a failed job now
  auto-me cancel <jobId>                Cancel a job
  auto-me delete <jobId>                Delete a job with its files and upload
  auto-me purge-uploads                 Delete expired upload sessions
  auto-me --help                        Show this help

Configuration is read from AUTOME_* environment variables.
`);
}

function createTranscriptionService(
  config: PipelineConfig
): TranscriptionService {
  if (config.transcriptionProvider === 'whisper') {
    return createWhisperTranscriptionService(loadWhisperConfig());
  }
  return createOpenAiTranscriptionService({
    endpoint: config.transcriptionEndpoint,
    apiKey: config.transcriptionApiKey,
    model: config.transcriptionModel,
    timeoutMs: config.transcriptionTimeoutMs,
  });
}

function createPipelineDeps(config: PipelineConfig): TranscriptionPipelineDeps {
  const repos = getRepositories(config.dbPath);
  return {
    repos,
    transcription: createTranscriptionService(config),
    media: createFfmpegMediaService({}),
    storage: createFsStorageService(config.dataDir),
    config,
    bridge: createLegacyNoteBridge(repos),
  };
}

function parseFormats(value: string | null): OutputFormat[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((format) => outputFormatSchema.parse(format.trim()));
}

async function run(args: ParsedArgs): Promise<number> {
  const config = loadConfig();
  const deps = createPipelineDeps(config);
  const { repos } = deps;

  switch (args.command) {
    case 'worker':
      await runWorker(deps);
      return 0;

    case 'ingest':
      return ingest(args, deps);

    case 'status': {
      const manager = createWorkerManager(deps);
      const queue = manager.queueStatus();
      console.log(`Created:    ${queue.createdCount}`);
      console.log(`Processing: ${queue.processingCount}`);
      console.log(`Retryable:  ${queue.retryableCount}`);
      console.log(`Queued:     ${queue.totalQueued}`);
      return queue.error ? 1 : 0;
    }

    case 'job': {
      const jobId = requireJobId(args);
      const job = repos.jobs.findById(jobId);
      if (!job) {
        console.error(`Job not found: ${jobId}`);
        return 1;
      }
      console.log(`${job.id}  ${job.filename}`);
      console.log(`Status: ${job.status} (${job.currentStage}, ${job.progress}%)`);
      console.log(`Retries: ${job.retryCount}/${job.maxRetries}`);
      if (job.errorMessage) {
        console.log(`Error: [${job.errorCode}] ${job.errorMessage}`);
      }
      if (job.wordCount !== null) {
        console.log(
          `Words: ${job.wordCount}, language: ${job.detectedLanguage ?? '-'}`
        );
      }
      for (const asset of repos.assets.listForJob(job.id)) {
        console.log(`  ${asset.kind}: ${deps.storage.resolvePath(asset.storageKey)}`);
      }
      return 0;
    }

    case 'retry': {
      const outcome = await processTranscriptionJob(requireJobId(args), deps);
      console.log(`Outcome: ${outcome}`);
      return outcome === 'complete' ? 0 : 1;
    }

    case 'cancel': {
      const jobId = requireJobId(args);
      const cancelled = repos.jobs.cancel(jobId);
      deps.bridge?.syncJobToNote(jobId);
      console.log(cancelled ? `Cancelled ${jobId}` : `Nothing to cancel for ${jobId}`);
      return cancelled ? 0 : 1;
    }

    case 'delete': {
      const jobId = requireJobId(args);
      const deleted = await deleteTranscriptionJob(jobId, {
        ...deps,
        uploads: createUploads(deps),
      });
      if (!deleted) {
        console.error(`Job not found: ${jobId}`);
        return 1;
      }
      console.log(
        `Deleted ${jobId} (${deleted.assetsRemoved} asset(s)${deleted.uploadRemoved ? ', upload removed' : ''})`
      );
      return 0;
    }

    case 'purge-uploads': {
      const uploads = createUploads(deps);
      const purged = await uploads.purgeExpired();
      console.log(`Purged ${purged} expired upload session(s)`);
      return 0;
    }

    default:
      console.error(`Unknown command: ${args.command}`);
      showHelp();
      return 1;
  }
}

function createUploads(deps: TranscriptionPipelineDeps) {
  return createUploadSessionManager({
    uploadSessions: deps.repos.uploadSessions,
    storage: deps.storage,
    config: deps.config,
  });
}

function requireJobId(args: ParsedArgs): string {
  const jobId = args.positional[0];
  if (!jobId) throw new Error(`Usage: auto-me ${args.command} <jobId>`);
  return jobId;
}

async function runWorker(deps: TranscriptionPipelineDeps): Promise<void> {
  const manager = createWorkerManager(deps);
  manager.start();

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`\nReceived ${signal}, shutting down gracefully...`);
      manager
        .stop()
        .catch((error: unknown) => {
          console.error(`Error stopping worker: ${errorMessage(error)}`);
        })
        .finally(resolve);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

async function ingest(
  args: ParsedArgs,
  deps: TranscriptionPipelineDeps
): Promise<number> {
  if (!args.file) {
    console.error('ingest requires --file <path>');
    return 1;
  }

  const filePath = expandHome(args.file);
  const { size } = await stat(filePath);
  const filename = path.basename(filePath);
  const mimeType =
    MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()] ??
    'application/octet-stream';

  const uploads = createUploads(deps);

  const session = uploads.createSession({ filename, totalSize: size, mimeType });
  const totalChunks = chunkCount(size, session.chunkSize);
  console.log(`Uploading ${filename} in ${totalChunks} chunk(s)...`);

  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(session.chunkSize);
    for (let index = 0; index < totalChunks; index++) {
      const { bytesRead } = await handle.read(
        buffer,
        0,
        session.chunkSize,
        index * session.chunkSize
      );
      await uploads.storeChunk(session.id, index, buffer.subarray(0, bytesRead));
    }
  } finally {
    await handle.close();
  }

  const { job, noteId } = await submitUpload(
    {
      uploadId: session.id,
      language: args.language,
      enableDiarization: args.diarize,
      outputFormats: parseFormats(args.formats),
    },
    { ...deps, uploads }
  );
  console.log(`Queued job ${job.id} (note ${noteId})`);

  if (!args.process) return 0;

  const outcome = await processTranscriptionJob(job.id, deps);
  console.log(`Outcome: ${outcome}`);
  return outcome === 'complete' ? 0 : 1;
}

main();
