/**
 * OpenAI-compatible Transcription Adapter
 *
 * Posts audio to a `/v1/audio/transcriptions` endpoint as multipart form data.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import type {
  TranscribeOptions,
  TranscriptionResult,
  TranscriptionService,
} from '../0_types.js';
import {
  errorMessage,
  type ProviderErrorKind,
  TranscriptionProviderError,
} from '../domain/errors.js';

export interface OpenAiTranscriptionConfig {
  endpoint: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  /** Injected in tests */
  fetch?: typeof fetch;
}

const transcriptionResponseSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
});

// verbose_json reports language names; the job model stores ISO 639-1 codes
const LANGUAGE_CODES: Record<string, string> = {
  english: 'en',
  spanish: 'es',
  french: 'fr',
  german: 'de',
  italian: 'it',
  portuguese: 'pt',
  dutch: 'nl',
  russian: 'ru',
  japanese: 'ja',
  chinese: 'zh',
  korean: 'ko',
  arabic: 'ar',
  hindi: 'hi',
  polish: 'pl',
  turkish: 'tr',
  ukrainian: 'uk',
};

export function normalizeLanguage(
  language: string | undefined
): string | undefined {
  if (!language) return undefined;
  const lower = language.trim().toLowerCase();
  if (lower.length === 2) return lower;
  return LANGUAGE_CODES[lower] ?? lower;
}

export function classifyHttpStatus(status: number): ProviderErrorKind {
  if (status === 429) return 'rate_limit';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 500) return 'server';
  return 'bad_request';
}

/**
 * Creates a TranscriptionService backed by an OpenAI-compatible HTTP API
 */
export function createOpenAiTranscriptionService(
  config: OpenAiTranscriptionConfig
): TranscriptionService {
  const doFetch = config.fetch ?? fetch;

  return {
    async transcribe(
      audioPath: string,
      options: TranscribeOptions = {}
    ): Promise<TranscriptionResult> {
      const audio = await readFile(audioPath);

      const form = new FormData();
      form.append('file', new Blob([new Uint8Array(audio)]), basename(audioPath));
      form.append('model', config.model);
      form.append('response_format', 'verbose_json');
      if (options.language) form.append('language', options.language);

      const timeout = AbortSignal.timeout(config.timeoutMs);
      const signal = options.signal
        ? AbortSignal.any([options.signal, timeout])
        : timeout;

      let response: Response;
      try {
        response = await doFetch(config.endpoint, {
          method: 'POST',
          headers: config.apiKey
            ? { Authorization: `Bearer ${config.apiKey}` }
            : undefined,
          body: form,
          signal,
        });
      } catch (error) {
        // Caller aborts propagate as-is; only our own timeout is a provider error
        if (options.signal?.aborted) throw error;
        if (timeout.aborted) {
          throw new TranscriptionProviderError(
            'timeout',
            `Transcription request timed out after ${config.timeoutMs}ms`
          );
        }
        throw new TranscriptionProviderError(
          'unavailable',
          `Transcription request failed: ${errorMessage(error)}`
        );
      }

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new TranscriptionProviderError(
          classifyHttpStatus(response.status),
          `Transcription provider returned ${response.status}${body ? `: ${body.slice(0, 300)}` : ''}`,
          response.status
        );
      }

      const body: unknown = await response.json().catch(() => null);
      const parsed = transcriptionResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new TranscriptionProviderError(
          'server',
          'Transcription provider returned an unexpected response body'
        );
      }

      return {
        text: parsed.data.text.trim(),
        language: normalizeLanguage(parsed.data.language),
      };
    },
  };
}
