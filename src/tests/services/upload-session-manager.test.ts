import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { StorageService } from '../../0_types.js';
import { createFsStorageService } from '../../adapters/storage.fs.adapter.js';
import { createTestRepositories } from '../../db/index.js';
import { UploadError } from '../../domain/errors.js';
import {
  createUploadSessionManager,
  isMimeTypeAllowed,
  type UploadSessionManager,
} from '../../services/upload-session-manager.js';

const MIB = 1024 * 1024;
const bytes = (text: string) => new TextEncoder().encode(text);

describe('isMimeTypeAllowed', () => {
  it('matches exact types and wildcards', () => {
    expect(isMimeTypeAllowed('audio/mpeg', ['audio/mpeg'])).toBe(true);
    expect(isMimeTypeAllowed('audio/x-custom', ['audio/*'])).toBe(true);
    expect(isMimeTypeAllowed('text/plain', ['audio/*', 'video/mp4'])).toBe(false);
  });
});

describe('UploadSessionManager', () => {
  let testRepos: ReturnType<typeof createTestRepositories>;
  let dataDir: string;
  let storage: StorageService;
  let manager: UploadSessionManager;
  let now: Date;

  beforeEach(async () => {
    testRepos = createTestRepositories();
    dataDir = await mkdtemp(join(os.tmpdir(), 'autome-upload-test-'));
    storage = createFsStorageService(dataDir);
    now = new Date('2026-01-20T10:00:00.000Z');
    manager = createUploadSessionManager({
      uploadSessions: testRepos.uploadSessions,
      storage,
      config: { chunkSizeBytes: 5 * MIB, sessionTtlHours: 24 },
      now: () => now,
    });
  });

  afterEach(async () => {
    testRepos.cleanup();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('creates an active session that expires after the ttl', () => {
    const session = manager.createSession({
      filename: 'interview.mp3',
      totalSize: 50 * MIB,
      mimeType: 'audio/mpeg',
      userId: 'u1',
    });

    expect(session.status).toBe('active');
    expect(session.chunkSize).toBe(5 * MIB);
    expect(session.createdAt).toBe('2026-01-20T10:00:00.000Z');
    expect(session.expiresAt).toBe('2026-01-21T10:00:00.000Z');
    expect(manager.getSession(session.id)?.userId).toBe('u1');
  });

  it('is complete only once every chunk is recorded', () => {
    const { id } = manager.createSession({
      filename: 'interview.mp3',
      totalSize: 50 * MIB,
      mimeType: 'audio/mpeg',
    });

    for (let i = 0; i < 9; i++) manager.recordChunkUploaded(id, i);
    expect(manager.isComplete(id, 10)).toBe(false);

    expect(manager.recordChunkUploaded(id, 9)).toBe(true);
    expect(manager.isComplete(id, 10)).toBe(true);

    expect(manager.recordChunkUploaded(id, 9)).toBe(false);
    expect(manager.getSession(id)?.chunksUploaded.size).toBe(10);
  });

  it('ignores chunk indices outside the session', () => {
    const { id } = manager.createSession({
      filename: 'interview.mp3',
      totalSize: 50 * MIB,
      mimeType: 'audio/mpeg',
    });

    for (let i = 0; i < 9; i++) manager.recordChunkUploaded(id, i);
    expect(manager.recordChunkUploaded(id, 42)).toBe(false);
    expect(manager.recordChunkUploaded(id, 10)).toBe(false);
    expect(manager.recordChunkUploaded(id, -1)).toBe(false);
    expect(manager.recordChunkUploaded(id, 1.5)).toBe(false);

    expect(manager.getSession(id)?.chunksUploaded.size).toBe(9);
    expect(manager.isComplete(id, 10)).toBe(false);
  });

  it('ignores chunks for unknown sessions', () => {
    expect(manager.recordChunkUploaded('missing', 0)).toBe(false);
    expect(manager.isComplete('missing', 0)).toBe(false);
  });

  it('rejects completing a session twice', () => {
    const { id } = manager.createSession({
      filename: 'a.mp3',
      totalSize: 10,
      mimeType: 'audio/mpeg',
    });

    const completed = manager.completeSession(id, 'uploads/a.mp3', 'hash');
    expect(completed.status).toBe('completed');
    expect(completed.completedAt).toBe('2026-01-20T10:00:00.000Z');

    expect(() => manager.completeSession(id, 'uploads/b.mp3')).toThrow(
      `Upload session ${id} is already completed`
    );
  });

  it('purges expired sessions but keeps completed ones', async () => {
    const stale = manager.createSession({
      filename: 'a.mp3',
      totalSize: 10,
      mimeType: 'audio/mpeg',
    });
    const done = manager.createSession({
      filename: 'b.mp3',
      totalSize: 10,
      mimeType: 'audio/mpeg',
    });
    manager.completeSession(done.id, 'uploads/b.mp3');
    await manager.storeChunk(stale.id, 0, bytes('0123456789'));
    await mkdir(join(dataDir, 'uploads', stale.id), { recursive: true });
    await writeFile(join(dataDir, 'uploads', stale.id, 'a.mp3'), 'partial');

    now = new Date('2026-01-21T11:00:00.000Z');
    const fresh = manager.createSession({
      filename: 'c.mp3',
      totalSize: 10,
      mimeType: 'audio/mpeg',
    });

    expect(await manager.purgeExpired()).toBe(1);
    expect(manager.getSession(stale.id)).toBeNull();
    expect(manager.getSession(done.id)).not.toBeNull();
    expect(manager.getSession(fresh.id)).not.toBeNull();
    expect(existsSync(join(dataDir, 'chunks', stale.id))).toBe(false);
    expect(existsSync(join(dataDir, 'uploads', stale.id))).toBe(false);
  });

  describe('chunk storage', () => {
    function createSmallSession() {
      return manager.createSession({
        filename: 'note.m4a',
        totalSize: 12,
        mimeType: 'audio/mp4',
        chunkSize: 5,
      });
    }

    it('validates chunk index and length', async () => {
      const { id } = createSmallSession();

      await expect(manager.storeChunk(id, 3, bytes('hello'))).rejects.toThrow(
        'Invalid chunk index 3 (expected 0-2)'
      );
      await expect(manager.storeChunk(id, 0, bytes('hey'))).rejects.toThrow(
        'Invalid chunk size. Expected: 5, got: 3'
      );
      await expect(manager.storeChunk(id, 2, bytes('hello'))).rejects.toThrow(
        'Invalid chunk size. Expected: 2, got: 5'
      );
    });

    it('treats a repeated chunk as a duplicate', async () => {
      const { id } = createSmallSession();

      expect(await manager.storeChunk(id, 0, bytes('hello'))).toEqual({
        chunkIndex: 0,
        duplicate: false,
      });
      expect(await manager.storeChunk(id, 0, bytes('hello'))).toEqual({
        chunkIndex: 0,
        duplicate: true,
      });
    });

    it('reports upload progress', async () => {
      const { id } = createSmallSession();
      await manager.storeChunk(id, 0, bytes('hello'));
      await manager.storeChunk(id, 2, bytes('d!'));

      const status = manager.getUploadStatus(id);
      expect(status?.uploadedChunks).toEqual([0, 2]);
      expect(status?.missingChunks).toEqual([1]);
      expect(status?.bytesUploaded).toBe(7);
      expect(status?.totalChunks).toBe(3);
      expect(status?.progress).toBeCloseTo(66.667, 2);
      expect(manager.getUploadStatus('missing')).toBeNull();
    });

    it('refuses to finalize with missing chunks', async () => {
      const { id } = createSmallSession();
      await manager.storeChunk(id, 0, bytes('hello'));

      await expect(manager.finalizeUpload(id)).rejects.toThrow(
        'Missing chunks: 1, 2'
      );
    });

    it('assembles chunks in order and verifies the hash', async () => {
      const { id } = createSmallSession();
      await manager.storeChunk(id, 2, bytes('d!'));
      await manager.storeChunk(id, 0, bytes('hello'));
      await manager.storeChunk(id, 1, bytes(' worl'));
      const sha256 = createHash('sha256').update('hello world!').digest('hex');

      const session = await manager.finalizeUpload(id, sha256.toUpperCase());

      expect(session.status).toBe('completed');
      expect(session.contentHash).toBe(sha256);
      expect(session.storageKey).toBe(join('uploads', id, 'note.m4a'));
      expect(await storage.readText(join('uploads', id, 'note.m4a'))).toBe(
        'hello world!'
      );
      expect(existsSync(join(dataDir, 'chunks', id))).toBe(false);
    });

    it('fails integrity on a hash mismatch', async () => {
      const { id } = createSmallSession();
      await manager.storeChunk(id, 0, bytes('hello'));
      await manager.storeChunk(id, 1, bytes(' worl'));
      await manager.storeChunk(id, 2, bytes('d!'));

      const error = await manager.finalizeUpload(id, 'deadbeef').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UploadError);
      expect(error instanceof UploadError ? error.code : null).toBe('integrity');
      expect(manager.getSession(id)?.status).toBe('active');
      expect(existsSync(join(dataDir, 'uploads', id))).toBe(false);
      expect(existsSync(join(dataDir, 'chunks', id, 'chunk_000000'))).toBe(true);
    });

    it('shares one assembly between concurrent finalize calls', async () => {
      const { id } = createSmallSession();
      await manager.storeChunk(id, 0, bytes('hello'));
      await manager.storeChunk(id, 1, bytes(' worl'));
      await manager.storeChunk(id, 2, bytes('d!'));

      const [first, second] = await Promise.all([
        manager.finalizeUpload(id),
        manager.finalizeUpload(id),
      ]);

      expect(second).toBe(first);
      expect(first.status).toBe('completed');
      expect(await storage.readText(join('uploads', id, 'note.m4a'))).toBe(
        'hello world!'
      );
      await expect(manager.finalizeUpload(id)).rejects.toThrow(
        `Upload session ${id} is not active (completed)`
      );
    });

    it('cancels an active session and rejects further chunks', async () => {
      const { id } = createSmallSession();
      await manager.storeChunk(id, 0, bytes('hello'));
      await mkdir(join(dataDir, 'uploads', id), { recursive: true });
      await writeFile(join(dataDir, 'uploads', id, 'note.m4a'), 'hello');

      expect(await manager.cancelSession(id)).toBe(true);
      expect(existsSync(join(dataDir, 'chunks', id))).toBe(false);
      expect(existsSync(join(dataDir, 'uploads', id))).toBe(false);
      expect(manager.getSession(id)?.status).toBe('cancelled');
      await expect(manager.storeChunk(id, 1, bytes(' worl'))).rejects.toThrow(
        `Upload session ${id} is not active (cancelled)`
      );
      expect(await manager.cancelSession('missing')).toBe(false);
    });
  });

  it('deletes a session', async () => {
    const { id } = manager.createSession({
      filename: 'a.mp3',
      totalSize: 10,
      mimeType: 'audio/mpeg',
    });
    expect(await manager.deleteSession(id)).toBe(true);
    expect(manager.getSession(id)).toBeNull();
  });

  it('deletes the assembled file of a completed session', async () => {
    const { id } = manager.createSession({
      filename: 'a.mp3',
      totalSize: 10,
      mimeType: 'audio/mpeg',
    });
    await manager.storeChunk(id, 0, bytes('0123456789'));
    const session = await manager.finalizeUpload(id);
    expect(existsSync(join(dataDir, 'uploads', id, 'a.mp3'))).toBe(true);

    expect(await manager.deleteSession(session.id)).toBe(true);
    expect(existsSync(join(dataDir, 'uploads', id))).toBe(false);
  });
});
