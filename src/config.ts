/**
 * Pipeline configuration
 *
 * Defaults live in `pipelineConfigSchema`; AUTOME_* environment variables
 * override them. Invalid values fail fast with the zod error.
 */

import os from 'node:os';
import { join } from 'node:path';
import {
  type PipelineConfig,
  type PipelineConfigInput,
  pipelineConfigSchema,
  type WhisperConfig,
  whisperConfigSchema,
} from './0_types.js';

type Env = Record<string, string | undefined>;

const MIB = 1024 * 1024;

export function expandHome(path: string): string {
  if (path === '~') return os.homedir();
  if (path.startsWith('~/')) return join(os.homedir(), path.slice(2));
  return path;
}

function num(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function list(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function megabytes(value: string | undefined): number | undefined {
  const mb = num(value);
  return mb === undefined ? undefined : Math.floor(mb * MIB);
}

function seconds(value: string | undefined): number | undefined {
  const s = num(value);
  return s === undefined ? undefined : Math.round(s * 1000);
}

function provider(
  value: string | undefined
): 'openai' | 'whisper' | undefined {
  if (value === undefined) return undefined;
  return value === 'whisper' ? 'whisper' : 'openai';
}

/**
 * Build the pipeline config from environment variables.
 * `overrides` win over the environment (used by tests and the CLI).
 */
export function loadConfig(
  env: Env = process.env,
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  const fromEnv: PipelineConfigInput = {
    dbPath: env.AUTOME_DB_PATH,
    dataDir: env.AUTOME_DATA_DIR,
    chunkSizeBytes: megabytes(env.AUTOME_CHUNK_SIZE_MB),
    sessionTtlHours: num(env.AUTOME_SESSION_TTL_HOURS),
    maxFileSizeBytes: megabytes(env.AUTOME_MAX_FILE_MB),
    maxDurationHours: num(env.AUTOME_MAX_DURATION_HOURS),
    allowedMimeTypes: list(env.AUTOME_ALLOWED_MIME_TYPES),
    maxProviderFileBytes: megabytes(env.AUTOME_MAX_PROVIDER_FILE_MB),
    segmentDurationSeconds: num(env.AUTOME_SEGMENT_DURATION),
    maxRetries: num(env.AUTOME_MAX_RETRIES),
    maxConcurrentJobs: num(env.AUTOME_MAX_CONCURRENT_JOBS),
    maxConcurrentSegments: num(env.AUTOME_MAX_CONCURRENT_SEGMENTS),
    pollIntervalMs: seconds(env.AUTOME_POLL_INTERVAL_SECONDS),
    retryDelayMs: seconds(env.AUTOME_RETRY_DELAY_SECONDS),
    errorBackoffMs: seconds(env.AUTOME_ERROR_BACKOFF_SECONDS),
    degradedRetryableThreshold: num(env.AUTOME_DEGRADED_RETRYABLE),
    degradedQueueThreshold: num(env.AUTOME_DEGRADED_QUEUE),
    transcriptionProvider: provider(env.AUTOME_TRANSCRIPTION_PROVIDER),
    transcriptionEndpoint: env.AUTOME_TRANSCRIPTION_ENDPOINT,
    transcriptionApiKey: env.AUTOME_TRANSCRIPTION_API_KEY ?? env.OPENAI_API_KEY,
    transcriptionModel: env.AUTOME_TRANSCRIPTION_MODEL,
    transcriptionTimeoutMs: seconds(env.AUTOME_TRANSCRIPTION_TIMEOUT_SECONDS),
  };

  // Unset keys must not shadow schema defaults
  const defined = Object.fromEntries(
    Object.entries({ ...fromEnv, ...overrides }).filter(
      ([, value]) => value !== undefined
    )
  );

  const config = pipelineConfigSchema.parse(defined);
  return {
    ...config,
    dbPath:
      config.dbPath === ':memory:' ? config.dbPath : expandHome(config.dbPath),
    dataDir: expandHome(config.dataDir),
  };
}

export function loadWhisperConfig(env: Env = process.env): WhisperConfig {
  return whisperConfigSchema.parse({
    binaryPath: env.AUTOME_WHISPER_BINARY || undefined,
    model: env.AUTOME_WHISPER_MODEL || undefined,
    cwd: env.AUTOME_WHISPER_CWD || undefined,
    language: env.AUTOME_WHISPER_LANGUAGE || undefined,
  });
}
