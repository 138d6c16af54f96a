/**
 * AUTO-ME - Transcript Merge
 *
 * Segment results arrive in any order; the transcript is always assembled
 * by segment index.
 */

export const SEGMENT_ERROR_TEXT = 'Error processing this segment';

export type SegmentOutcome =
  | { index: number; ok: true; text: string; language?: string }
  | { index: number; ok: false; message: string };

export interface MergedTranscript {
  transcript: string;
  wordCount: number;
  /** Segments that produced non-empty text */
  segmentCount: number;
  failedSegments: number;
}

/** 1-based, as users read it */
export function partTag(index: number): string {
  return `[Part ${index + 1}]`;
}

export function segmentPlaceholder(index: number): string {
  return `${partTag(index)} ${SEGMENT_ERROR_TEXT}`;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Join outcomes in index order. Part tags are added only when the file was
 * planned as more than one segment; failures always carry theirs.
 */
export function mergeSegmentTexts(
  outcomes: readonly SegmentOutcome[],
  plannedCount: number
): MergedTranscript {
  const tagged = plannedCount > 1;
  const parts: string[] = [];
  let wordCount = 0;
  let segmentCount = 0;
  let failedSegments = 0;

  const ordered = [...outcomes].sort((a, b) => a.index - b.index);
  for (const outcome of ordered) {
    if (!outcome.ok) {
      failedSegments++;
      parts.push(segmentPlaceholder(outcome.index));
      continue;
    }

    const text = outcome.text.trim();
    if (!text) continue;

    segmentCount++;
    wordCount += countWords(text);
    parts.push(tagged ? `${partTag(outcome.index)} ${text}` : text);
  }

  return {
    transcript: parts.join(' '),
    wordCount,
    segmentCount,
    failedSegments,
  };
}
