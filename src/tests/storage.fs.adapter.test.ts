import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createFsStorageService,
  sanitizeFilename,
} from '../adapters/storage.fs.adapter.js';

describe('sanitizeFilename', () => {
  it('keeps only the base name with safe characters', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('team call (final).mp3')).toBe('team_call_final_.mp3');
    expect(sanitizeFilename('.hidden')).toBe('hidden');
    expect(sanitizeFilename('...')).toBe('upload');
  });
});

describe('FsStorageService', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(os.tmpdir(), 'autome-storage-test-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('refuses keys outside the data directory', () => {
    const storage = createFsStorageService(dataDir);

    expect(storage.resolvePath('uploads/a/file.mp3')).toBe(
      join(dataDir, 'uploads', 'a', 'file.mp3')
    );
    expect(() => storage.resolvePath('../outside.txt')).toThrow(
      'Storage key escapes data directory: ../outside.txt'
    );
  });

  it('assembles chunks in index order and hashes them', async () => {
    const storage = createFsStorageService(dataDir);
    const encoder = new TextEncoder();
    await storage.writeChunk('up-1', 1, encoder.encode(' world'));
    await storage.writeChunk('up-1', 0, encoder.encode('hello'));

    const assembled = await storage.assembleChunks('up-1', 2, 'greeting.txt');

    expect(assembled.storageKey).toBe(join('uploads', 'up-1', 'greeting.txt'));
    expect(assembled.size).toBe(11);
    expect(assembled.sha256).toBe(
      'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
    );
    expect(
      await readFile(storage.resolvePath(assembled.storageKey), 'utf-8')
    ).toBe('hello world');

    await storage.removeChunks('up-1');
    expect(existsSync(join(dataDir, 'chunks', 'up-1'))).toBe(false);
  });

  it('writes assets and clears the work directory', async () => {
    const storage = createFsStorageService(dataDir);

    const asset = await storage.writeAsset('job-1', 'transcript.txt', 'héllo');
    expect(asset).toEqual({
      storageKey: join('jobs', 'job-1', 'outputs', 'transcript.txt'),
      size: 6,
    });
    expect(await storage.readText(asset.storageKey)).toBe('héllo');

    const work = await storage.prepareJobWorkDir('job-1');
    expect(work).toBe(join(dataDir, 'jobs', 'job-1', 'work'));
    await storage.removeJobWorkDir('job-1');
    expect(existsSync(work)).toBe(false);
  });

  it('removes uploads, single files and whole job directories', async () => {
    const storage = createFsStorageService(dataDir);
    await storage.writeChunk('up-2', 0, new TextEncoder().encode('abc'));
    await storage.assembleChunks('up-2', 1, 'a.mp3');
    const txt = await storage.writeAsset('job-2', 'transcript.txt', 'one');
    const srt = await storage.writeAsset('job-2', 'transcript.srt', 'two');
    await storage.prepareJobWorkDir('job-2');

    await storage.removeUpload('up-2');
    expect(existsSync(join(dataDir, 'uploads', 'up-2'))).toBe(false);
    expect(existsSync(join(dataDir, 'chunks', 'up-2', 'chunk_000000'))).toBe(true);

    await storage.removeFile(txt.storageKey);
    expect(existsSync(storage.resolvePath(txt.storageKey))).toBe(false);
    expect(existsSync(storage.resolvePath(srt.storageKey))).toBe(true);
    await storage.removeFile(txt.storageKey);

    await storage.removeJobFiles('job-2');
    expect(existsSync(join(dataDir, 'jobs', 'job-2'))).toBe(false);
  });
});
