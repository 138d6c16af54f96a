import { describe, expect, it } from 'vitest';
import {
  pickSampleIndices,
  voteLanguage,
} from '../../services/language-detection.js';

describe('pickSampleIndices', () => {
  it('samples first, middle and last', () => {
    expect(pickSampleIndices(10)).toEqual([0, 5, 9]);
  });

  it('deduplicates for short files', () => {
    expect(pickSampleIndices(1)).toEqual([0]);
    expect(pickSampleIndices(2)).toEqual([0, 1]);
    expect(pickSampleIndices(0)).toEqual([]);
  });
});

describe('voteLanguage', () => {
  it('picks the majority with its vote share', () => {
    const guess = voteLanguage(['es', 'en', 'es']);
    expect(guess?.language).toBe('es');
    expect(guess?.confidence).toBeCloseTo(2 / 3);
  });

  it('breaks ties by first sample', () => {
    expect(voteLanguage(['fr', 'de'])).toEqual({ language: 'fr', confidence: 0.5 });
  });

  it('ignores samples without a language', () => {
    expect(voteLanguage([undefined, 'de', undefined])).toEqual({
      language: 'de',
      confidence: 1,
    });
  });

  it('returns null with no votes', () => {
    expect(voteLanguage([undefined])).toBeNull();
    expect(voteLanguage([])).toBeNull();
  });
});
