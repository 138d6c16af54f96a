import { describe, expect, it } from 'vitest';
import {
  countWords,
  mergeSegmentTexts,
  type SegmentOutcome,
  segmentPlaceholder,
} from '../../services/transcript-merge.js';

describe('mergeSegmentTexts', () => {
  it('tags parts when the file was split', () => {
    const outcomes: SegmentOutcome[] = [
      { index: 0, ok: true, text: 'one two' },
      { index: 1, ok: true, text: 'three' },
      { index: 2, ok: true, text: 'four five six' },
      { index: 3, ok: true, text: 'seven' },
    ];

    const merged = mergeSegmentTexts(outcomes, 4);

    expect(merged.transcript).toBe(
      '[Part 1] one two [Part 2] three [Part 3] four five six [Part 4] seven'
    );
    expect(merged.wordCount).toBe(7);
    expect(merged.segmentCount).toBe(4);
    expect(merged.failedSegments).toBe(0);
  });

  it('orders by index regardless of arrival', () => {
    const merged = mergeSegmentTexts(
      [
        { index: 2, ok: true, text: 'c' },
        { index: 0, ok: true, text: 'a' },
        { index: 1, ok: true, text: 'b' },
      ],
      3
    );
    expect(merged.transcript).toBe('[Part 1] a [Part 2] b [Part 3] c');
  });

  it('leaves a single segment untagged', () => {
    const merged = mergeSegmentTexts([{ index: 0, ok: true, text: ' hello world ' }], 1);
    expect(merged.transcript).toBe('hello world');
    expect(merged.wordCount).toBe(2);
  });

  it('puts a placeholder where a segment failed', () => {
    const merged = mergeSegmentTexts(
      [
        { index: 0, ok: true, text: 'a' },
        { index: 1, ok: true, text: 'b' },
        { index: 2, ok: false, message: 'timeout' },
        { index: 3, ok: true, text: 'd' },
      ],
      4
    );

    expect(merged.transcript).toBe(
      '[Part 1] a [Part 2] b [Part 3] Error processing this segment [Part 4] d'
    );
    expect(merged.wordCount).toBe(3);
    expect(merged.segmentCount).toBe(3);
    expect(merged.failedSegments).toBe(1);
  });

  it('skips empty texts and counts no real segments when all fail', () => {
    const merged = mergeSegmentTexts(
      [
        { index: 0, ok: true, text: '   ' },
        { index: 1, ok: false, message: 'server error' },
      ],
      2
    );

    expect(merged.transcript).toBe(segmentPlaceholder(1));
    expect(merged.segmentCount).toBe(0);
    expect(merged.wordCount).toBe(0);
  });
});

describe('countWords', () => {
  it('splits on any whitespace', () => {
    expect(countWords('a  b\tc\nd')).toBe(4);
    expect(countWords('   ')).toBe(0);
  });
});
