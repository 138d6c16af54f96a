import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MediaService } from '../../0_types.js';
import {
  createAudioSegmentationService,
  planSegments,
  segmentFilename,
} from '../../services/audio-segmentation.js';

function fakeMedia(duration: number | null): MediaService {
  return {
    probeDuration: vi.fn(async () => duration),
    encodeSegment: vi.fn(
      async (_input: string, _start: number, _duration: number, out: string) => {
        await writeFile(out, 'wav');
        return out;
      }
    ),
    transcode: vi.fn(async (_input: string, out: string) => out),
  };
}

describe('planSegments', () => {
  it('plans ceil(D / L) windows with the remainder last', () => {
    expect(planSegments(960, 300)).toEqual([
      { index: 0, start: 0, duration: 300 },
      { index: 1, start: 300, duration: 300 },
      { index: 2, start: 600, duration: 300 },
      { index: 3, start: 900, duration: 60 },
    ]);
  });

  it('plans a single window for short audio', () => {
    expect(planSegments(42.5, 300)).toEqual([
      { index: 0, start: 0, duration: 42.5 },
    ]);
  });

  it('plans exact multiples without an empty tail', () => {
    expect(planSegments(600, 300)).toHaveLength(2);
  });

  it('plans nothing for unknown duration', () => {
    expect(planSegments(0, 300)).toEqual([]);
    expect(planSegments(100, 0)).toEqual([]);
  });
});

describe('segmentFilename', () => {
  it('zero-pads the index', () => {
    expect(segmentFilename(7)).toBe('segment_007.wav');
  });
});

describe('AudioSegmentationService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(os.tmpdir(), 'autome-seg-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns 0 when the duration cannot be probed', async () => {
    const failing: MediaService = {
      ...fakeMedia(null),
      probeDuration: vi.fn(async () => {
        throw new Error('ffprobe exited with code 1');
      }),
    };

    expect(
      await createAudioSegmentationService(fakeMedia(null), {
        maxProviderFileBytes: 100,
      }).getDuration('/x.wav')
    ).toBe(0);
    expect(
      await createAudioSegmentationService(failing, {
        maxProviderFileBytes: 100,
      }).getDuration('/x.wav')
    ).toBe(0);
  });

  it('needs segmentation only above the provider limit', () => {
    const service = createAudioSegmentationService(fakeMedia(10), {
      maxProviderFileBytes: 24 * 1024 * 1024,
    });
    expect(service.needsSegmentation(24 * 1024 * 1024)).toBe(false);
    expect(service.needsSegmentation(24 * 1024 * 1024 + 1)).toBe(true);
  });

  it('splits into windows starting at 0, L, 2L', async () => {
    const media = fakeMedia(700);
    const service = createAudioSegmentationService(media, {
      maxProviderFileBytes: 100,
    });

    const paths = await service.splitIntoSegments('/in.wav', 300, dir);

    expect(paths).toEqual([
      join(dir, 'segment_000.wav'),
      join(dir, 'segment_001.wav'),
      join(dir, 'segment_002.wav'),
    ]);
    expect(vi.mocked(media.encodeSegment).mock.calls.map((c) => [c[1], c[2]])).toEqual([
      [0, 300],
      [300, 300],
      [600, 100],
    ]);
  });

  it('returns the input when the duration is unknown', async () => {
    const media = fakeMedia(null);
    const service = createAudioSegmentationService(media, {
      maxProviderFileBytes: 100,
    });

    expect(await service.splitIntoSegments('/in.wav', 300, dir)).toEqual([
      '/in.wav',
    ]);
    expect(media.encodeSegment).not.toHaveBeenCalled();
  });

  it('skips segments that fail to encode', async () => {
    const media = fakeMedia(900);
    vi.mocked(media.encodeSegment).mockImplementation(
      async (_input, start, _duration, out) => {
        if (start === 300) throw new Error('encoder crashed');
        await writeFile(out, 'wav');
        return out;
      }
    );
    const onProgress = vi.fn();
    const service = createAudioSegmentationService(media, {
      maxProviderFileBytes: 100,
    });

    const result = await service.encodeSegments('/in.wav', 900, 300, dir, {
      onProgress,
    });

    expect(result.plannedCount).toBe(3);
    expect(result.segments.map((s) => s.index)).toEqual([0, 2]);
    expect(onProgress).toHaveBeenLastCalledWith(3, 3);
  });

  it('propagates aborts', async () => {
    const media = fakeMedia(900);
    vi.mocked(media.encodeSegment).mockRejectedValue(
      Object.assign(new Error('The operation was aborted'), {
        name: 'AbortError',
      })
    );
    const service = createAudioSegmentationService(media, {
      maxProviderFileBytes: 100,
    });

    await expect(
      service.encodeSegments('/in.wav', 900, 300, dir)
    ).rejects.toThrow('The operation was aborted');
  });

  it('removes segments but never the kept paths', async () => {
    const a = join(dir, 'a.wav');
    const b = join(dir, 'b.wav');
    await writeFile(a, 'x');
    await writeFile(b, 'x');
    const service = createAudioSegmentationService(fakeMedia(1), {
      maxProviderFileBytes: 100,
    });

    await service.removeSegments([a, b], [b]);

    expect(existsSync(a)).toBe(false);
    expect(existsSync(b)).toBe(true);
  });
});
