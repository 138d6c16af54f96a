/**
 * AUTO-ME - Heuristic Speaker Labelling
 *
 * No acoustic model: long transcripts with conversational markers are split
 * into two speakers at the word midpoint, everything else is one speaker.
 */

import type { DiarizingCheckpoint } from '../domain/checkpoint.js';

const CONVERSATION_MARKERS = [': ', '- ', 'Q:', 'A:', 'Speaker', 'Person'];
const MIN_CONVERSATION_CHARS = 1000;

export function diarizeTranscript(
  transcript: string,
  durationSeconds: number
): DiarizingCheckpoint {
  const conversational =
    transcript.length > MIN_CONVERSATION_CHARS &&
    CONVERSATION_MARKERS.some((marker) => transcript.includes(marker));

  if (!conversational) {
    return {
      diarizedTranscript: `Speaker 1: ${transcript}`,
      speakerCount: 1,
      speakers: [
        { id: 'Speaker 1', duration: durationSeconds, confidence: 0.9 },
      ],
      method: 'simple_heuristic',
    };
  }

  const words = transcript.split(/\s+/).filter(Boolean);
  const mid = Math.floor(words.length / 2);
  const half = durationSeconds / 2;

  return {
    diarizedTranscript: `Speaker 1: ${words.slice(0, mid).join(' ')}\n\nSpeaker 2: ${words.slice(mid).join(' ')}`,
    speakerCount: 2,
    speakers: [
      { id: 'Speaker 1', duration: half, confidence: 0.6 },
      { id: 'Speaker 2', duration: half, confidence: 0.6 },
    ],
    method: 'simple_heuristic',
  };
}
