import { describe, expect, it } from 'vitest';
import { parseProbeDuration } from '../adapters/media.ffmpeg.adapter.js';

describe('parseProbeDuration', () => {
  it('reads string and numeric durations', () => {
    expect(parseProbeDuration('{"format":{"duration":"960.250000"}}')).toBe(
      960.25
    );
    expect(parseProbeDuration('{"format":{"duration":42}}')).toBe(42);
  });

  it('returns null when ffprobe cannot tell', () => {
    expect(parseProbeDuration('{"format":{}}')).toBeNull();
    expect(parseProbeDuration('{"format":{"duration":"N/A"}}')).toBeNull();
    expect(parseProbeDuration('{"format":{"duration":"0.000000"}}')).toBeNull();
    expect(parseProbeDuration('')).toBeNull();
  });
});
