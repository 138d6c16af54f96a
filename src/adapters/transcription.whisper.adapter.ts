/**
 * Whisper Adapter
 *
 * Transcribes audio locally with the whisper.cpp CLI.
 * Input must already be 16 kHz mono WAV (the pipeline's segment format).
 *
 * Prerequisites:
 * - whisper.cpp installed: brew install whisper-cpp
 */

import { execFile } from 'node:child_process';
import { readFile, rm } from 'node:fs/promises';
import { promisify } from 'node:util';
import { z } from 'zod';
import type {
  TranscribeOptions,
  TranscriptionResult,
  TranscriptionService,
  WhisperConfig,
} from '../0_types.js';
import {
  errorMessage,
  isAbortError,
  TranscriptionProviderError,
} from '../domain/errors.js';

const execFileAsync = promisify(execFile);

const HALLUCINATION_PATTERNS = [
  /untertitel.*amara\.org/i,
  /www\.amara\.org/i,
  /thanks for watching/i,
  /please subscribe/i,
  /like and subscribe/i,
  /(.{20,})\1{4,}/, // Repetition loops
];

export function filterHallucinations(text: string): string {
  let filtered = text;
  for (const pattern of HALLUCINATION_PATTERNS) {
    filtered = filtered.replace(pattern, '');
  }
  return filtered.trim();
}

// Whisper JSON output format (from whisper.cpp -oj)
const whisperJsonSchema = z.object({
  result: z.object({ language: z.string().optional() }).optional(),
  transcription: z.array(z.object({ text: z.string() })),
});

/**
 * Join whisper.cpp JSON segments into plain text
 */
export function parseWhisperJson(
  content: string
): { text: string; language?: string } | null {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = whisperJsonSchema.safeParse(json);
  if (!parsed.success) return null;

  return {
    text: parsed.data.transcription.map((s) => s.text.trim()).join(' '),
    language: parsed.data.result?.language,
  };
}

/**
 * Fallback: strip "[00:00:00.000 --> 00:00:05.000]" prefixes from stdout
 */
export function parseWhisperStdout(stdout: string): string {
  const timestampPrefix =
    /^\s*\[\d{2}:\d{2}:\d{2}\.\d{3}\s*-->\s*\d{2}:\d{2}:\d{2}\.\d{3}\]\s*/;
  return stdout
    .split('\n')
    .map((line) => line.replace(timestampPrefix, '').trim())
    .filter(Boolean)
    .join(' ');
}

/**
 * Creates a TranscriptionService that uses whisper CLI
 */
export function createWhisperTranscriptionService(
  config: Partial<WhisperConfig> = {}
): TranscriptionService {
  const resolved = {
    binaryPath: config.binaryPath ?? 'whisper-cli',
    model: config.model ?? 'large-v3',
    cwd: config.cwd,
    language: config.language,
  };

  return {
    async transcribe(
      audioPath: string,
      options: TranscribeOptions = {}
    ): Promise<TranscriptionResult> {
      const language = options.language ?? resolved.language;
      const args = ['-m', resolved.model, '-f', audioPath, '-oj'];
      if (language) args.push('-l', language);

      let stdout: string;
      try {
        ({ stdout } = await execFileAsync(resolved.binaryPath, args, {
          cwd: resolved.cwd,
          maxBuffer: 50 * 1024 * 1024, // 50MB buffer for large transcripts
          timeout: 10 * 60 * 1000,
          signal: options.signal,
        }));
      } catch (error) {
        if (isAbortError(error)) throw error;
        const killed =
          error instanceof Error && 'killed' in error && error.killed === true;
        const missing =
          error instanceof Error && 'code' in error && error.code === 'ENOENT';
        throw new TranscriptionProviderError(
          killed ? 'timeout' : missing ? 'unavailable' : 'server',
          `Whisper transcription failed: ${errorMessage(error)}`
        );
      }

      // whisper-cpp writes JSON to <input>.json
      const jsonOutputPath = `${audioPath}.json`;
      const fromJson = await readFile(jsonOutputPath, 'utf-8')
        .then(parseWhisperJson)
        .catch(() => null);
      await rm(jsonOutputPath, { force: true });

      const text = fromJson?.text ?? parseWhisperStdout(stdout);
      return {
        text: filterHallucinations(text),
        language: fromJson?.language ?? language,
      };
    },
  };
}
