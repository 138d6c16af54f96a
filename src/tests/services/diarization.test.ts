import { describe, expect, it } from 'vitest';
import { diarizeTranscript } from '../../services/diarization.js';

describe('diarizeTranscript', () => {
  it('labels short transcripts as one speaker', () => {
    const result = diarizeTranscript('Hello there', 30);

    expect(result.diarizedTranscript).toBe('Speaker 1: Hello there');
    expect(result.speakerCount).toBe(1);
    expect(result.speakers).toEqual([
      { id: 'Speaker 1', duration: 30, confidence: 0.9 },
    ]);
    expect(result.method).toBe('simple_heuristic');
  });

  it('splits long conversational transcripts at the word midpoint', () => {
    const firstHalf = Array.from({ length: 150 }, () => 'alpha').join(' ');
    const secondHalf = Array.from({ length: 150 }, () => 'omega').join(' ');
    const transcript = `Q: ${firstHalf} ${secondHalf}`;

    const result = diarizeTranscript(transcript, 600);

    // 301 words: "Q:" + 150 alpha + 150 omega; midpoint 150
    const words = transcript.split(' ');
    expect(result.speakerCount).toBe(2);
    expect(result.diarizedTranscript).toBe(
      `Speaker 1: ${words.slice(0, 150).join(' ')}\n\nSpeaker 2: ${words.slice(150).join(' ')}`
    );
    expect(result.speakers.map((s) => s.duration)).toEqual([300, 300]);
    expect(result.speakers.every((s) => s.confidence === 0.6)).toBe(true);
  });

  it('keeps one speaker for long text without conversation markers', () => {
    const transcript = Array.from({ length: 300 }, () => 'word').join(' ');
    expect(diarizeTranscript(transcript, 10).speakerCount).toBe(1);
  });
});
