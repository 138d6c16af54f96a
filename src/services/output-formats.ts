/**
 * AUTO-ME - Transcript Output Formats
 *
 * Renders the merged transcript as txt/json/srt/vtt. Cue timings come from
 * the segment windows, so subtitles are per segment rather than per phrase.
 */

import type { OutputFormat } from '../0_types.js';
import type {
  AudioSegment,
  SegmentTranscript,
} from '../domain/checkpoint.js';

export interface TimedCue {
  index: number;
  start: number;
  end: number;
  text: string;
}

export interface OutputInput {
  transcript: string;
  diarizedTranscript: string | null;
  cues: readonly TimedCue[];
  metadata: {
    language: string | null;
    duration: number | null;
    wordCount: number;
    confidence: number | null;
  };
}

export interface RenderedOutput {
  filename: string;
  content: string;
  mimeType: string;
}

export const OUTPUT_MIME_TYPES: Record<OutputFormat, string> = {
  txt: 'text/plain',
  json: 'application/json',
  srt: 'application/x-subrip',
  vtt: 'text/vtt',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  waveform: 'application/json',
};

function splitTime(seconds: number) {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const pad = (n: number, width = 2) => n.toString().padStart(width, '0');
  return {
    hh: pad(Math.floor(totalMs / 3_600_000)),
    mm: pad(Math.floor((totalMs % 3_600_000) / 60_000)),
    ss: pad(Math.floor((totalMs % 60_000) / 1000)),
    ms: pad(totalMs % 1000, 3),
  };
}

/** HH:MM:SS,mmm */
export function formatSrtTime(seconds: number): string {
  const { hh, mm, ss, ms } = splitTime(seconds);
  return `${hh}:${mm}:${ss},${ms}`;
}

/** HH:MM:SS.mmm */
export function formatVttTime(seconds: number): string {
  const { hh, mm, ss, ms } = splitTime(seconds);
  return `${hh}:${mm}:${ss}.${ms}`;
}

/**
 * Pair segment texts with their windows. A transcript without a window
 * (single unsplit file) spans the whole recording.
 */
export function buildCues(
  segments: readonly AudioSegment[],
  transcripts: readonly SegmentTranscript[],
  totalDuration: number | null
): TimedCue[] {
  const windows = new Map(segments.map((s) => [s.index, s]));
  return [...transcripts]
    .sort((a, b) => a.index - b.index)
    .filter((t) => t.text.trim())
    .map((t) => {
      const window = windows.get(t.index);
      const start = window?.start ?? 0;
      const end = window ? window.start + window.duration : (totalDuration ?? 0);
      return { index: t.index, start, end, text: t.text.trim() };
    });
}

export function renderSrt(cues: readonly TimedCue[]): string {
  return cues
    .flatMap((cue, i) => [
      String(i + 1),
      `${formatSrtTime(cue.start)} --> ${formatSrtTime(cue.end)}`,
      cue.text,
      '',
    ])
    .join('\n');
}

export function renderVtt(cues: readonly TimedCue[]): string {
  return [
    'WEBVTT',
    '',
    ...cues.flatMap((cue) => [
      `${formatVttTime(cue.start)} --> ${formatVttTime(cue.end)}`,
      cue.text,
      '',
    ]),
  ].join('\n');
}

export function renderJson(input: OutputInput): string {
  return JSON.stringify(
    {
      transcript: input.transcript,
      diarized_transcript: input.diarizedTranscript ?? input.transcript,
      segments: input.cues.map((c) => ({
        index: c.index,
        start_time: c.start,
        end_time: c.end,
        text: c.text,
      })),
      metadata: {
        language: input.metadata.language,
        duration: input.metadata.duration,
        word_count: input.metadata.wordCount,
        confidence: input.metadata.confidence,
      },
    },
    null,
    2
  );
}

/**
 * Render one format; null for formats this pipeline does not produce
 */
export function renderOutput(
  format: OutputFormat,
  input: OutputInput
): RenderedOutput | null {
  const file = (content: string): RenderedOutput => ({
    filename: `transcript.${format}`,
    content,
    mimeType: OUTPUT_MIME_TYPES[format],
  });

  switch (format) {
    case 'txt':
      return file(input.diarizedTranscript ?? input.transcript);
    case 'json':
      return file(renderJson(input));
    case 'srt':
      return file(renderSrt(input.cues));
    case 'vtt':
      return file(renderVtt(input.cues));
    case 'docx':
    case 'waveform':
      return null;
  }
}
