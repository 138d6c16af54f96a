/**
 * AUTO-ME - Upload Session Manager
 *
 * Resumable chunked uploads. A session tracks which chunk indices arrived;
 * finalizing assembles them in order into one stored file.
 */

import type {
  PipelineConfig,
  StorageService,
  UploadSession,
  UploadSessionRepository,
} from '../0_types.js';
import { generateId } from '../db/helpers.js';
import { UploadError } from '../domain/errors.js';
import {
  chunkCount,
  computeExpiry,
  expectedChunkLength,
  missingChunks,
} from '../domain/upload-session.js';
import { log } from '../pipeline/context.js';

export interface UploadSessionManagerDeps {
  uploadSessions: UploadSessionRepository;
  storage: StorageService;
  config: Pick<PipelineConfig, 'chunkSizeBytes' | 'sessionTtlHours'>;
  now?: () => Date;
}

export interface CreateSessionInput {
  filename: string;
  totalSize: number;
  mimeType: string;
  chunkSize?: number;
  userId?: string | null;
}

export interface UploadStatus {
  uploadId: string;
  filename: string;
  status: UploadSession['status'];
  totalChunks: number;
  uploadedChunks: number[];
  missingChunks: number[];
  bytesUploaded: number;
  /** 0-100 */
  progress: number;
  expiresAt: string;
}

export interface StoreChunkResult {
  chunkIndex: number;
  /** True when the index had already been received; nothing was written */
  duplicate: boolean;
}

/**
 * `allowed` may contain wildcards like `audio/*`
 */
export function isMimeTypeAllowed(
  mimeType: string,
  allowed: readonly string[]
): boolean {
  return allowed.some(
    (pattern) =>
      pattern === mimeType ||
      (pattern.endsWith('/*') && mimeType.startsWith(pattern.slice(0, -1)))
  );
}

export function createUploadSessionManager(deps: UploadSessionManagerDeps) {
  const { uploadSessions, storage, config } = deps;
  const now = deps.now ?? (() => new Date());
  const finalizing = new Map<string, Promise<UploadSession>>();

  function requireSession(uploadId: string): UploadSession {
    const session = uploadSessions.findById(uploadId);
    if (!session) {
      throw new UploadError('not_found', `Upload session not found: ${uploadId}`);
    }
    return session;
  }

  function requireActive(uploadId: string): UploadSession {
    const session = requireSession(uploadId);
    if (session.status !== 'active') {
      throw new UploadError(
        'inactive',
        `Upload session ${uploadId} is not active (${session.status})`
      );
    }
    return session;
  }

  function createSession(input: CreateSessionInput): UploadSession {
    const createdAt = now();
    const session: UploadSession = {
      id: generateId(),
      userId: input.userId ?? null,
      filename: input.filename,
      totalSize: input.totalSize,
      mimeType: input.mimeType,
      chunkSize: input.chunkSize ?? config.chunkSizeBytes,
      chunksUploaded: new Set(),
      contentHash: null,
      status: 'active',
      storageKey: null,
      createdAt: createdAt.toISOString(),
      expiresAt: computeExpiry(createdAt, config.sessionTtlHours),
      completedAt: null,
    };
    uploadSessions.create(session);

    log(
      'info',
      `Created upload session ${session.id} for ${session.filename} (${session.totalSize} bytes, ${chunkCount(session.totalSize, session.chunkSize)} chunks)`
    );
    return session;
  }

  function getSession(uploadId: string): UploadSession | null {
    return uploadSessions.findById(uploadId);
  }

  function isValidChunkIndex(session: UploadSession, chunkIndex: number) {
    return (
      Number.isInteger(chunkIndex) &&
      chunkIndex >= 0 &&
      chunkIndex < chunkCount(session.totalSize, session.chunkSize)
    );
  }

  /**
   * Idempotent. Unknown sessions and out-of-range indices are ignored with
   * a warning. Returns true when the index was newly recorded.
   */
  function recordChunkUploaded(uploadId: string, chunkIndex: number): boolean {
    const session = uploadSessions.findById(uploadId);
    if (!session) {
      log('warn', `Chunk ${chunkIndex} for unknown upload session ${uploadId}`);
      return false;
    }
    if (!isValidChunkIndex(session, chunkIndex)) {
      log('warn', `Ignoring chunk index ${chunkIndex} for upload ${uploadId}`);
      return false;
    }
    return uploadSessions.addChunk(uploadId, chunkIndex);
  }

  /** Every index in `0..totalChunks-1` must be present */
  function isComplete(uploadId: string, totalChunks: number): boolean {
    const session = uploadSessions.findById(uploadId);
    if (!session) return false;
    for (let i = 0; i < totalChunks; i++) {
      if (!session.chunksUploaded.has(i)) return false;
    }
    return true;
  }

  function completeSession(
    uploadId: string,
    storageKey: string,
    contentHash?: string | null
  ): UploadSession {
    const session = requireSession(uploadId);
    if (session.status === 'completed') {
      throw new UploadError(
        'already_completed',
        `Upload session ${uploadId} is already completed`
      );
    }
    const completed = uploadSessions.complete(
      uploadId,
      storageKey,
      contentHash ?? null,
      now().toISOString()
    );
    if (!completed) {
      throw new UploadError(
        'inactive',
        `Upload session ${uploadId} is not active (${session.status})`
      );
    }
    return requireSession(uploadId);
  }

  async function removeFiles(uploadId: string): Promise<void> {
    await storage.removeChunks(uploadId);
    await storage.removeUpload(uploadId);
  }

  /**
   * Deletes every non-completed session past its expiry, files included
   */
  async function purgeExpired(): Promise<number> {
    const ids = uploadSessions.deleteExpired(now().toISOString());
    await Promise.all(ids.map(removeFiles));
    if (ids.length > 0) {
      log('info', `Purged ${ids.length} expired upload session(s)`);
    }
    return ids.length;
  }

  async function deleteSession(uploadId: string): Promise<boolean> {
    await removeFiles(uploadId);
    return uploadSessions.delete(uploadId);
  }

  function getUploadStatus(uploadId: string): UploadStatus | null {
    const session = uploadSessions.findById(uploadId);
    if (!session) return null;

    const totalChunks = chunkCount(session.totalSize, session.chunkSize);
    const uploadedChunks = [...session.chunksUploaded].sort((a, b) => a - b);
    const bytesUploaded = uploadedChunks.reduce(
      (sum, index) => sum + expectedChunkLength(session, index),
      0
    );

    return {
      uploadId: session.id,
      filename: session.filename,
      status: session.status,
      totalChunks,
      uploadedChunks,
      missingChunks: missingChunks(session),
      bytesUploaded,
      progress:
        totalChunks === 0 ? 0 : (uploadedChunks.length / totalChunks) * 100,
      expiresAt: session.expiresAt,
    };
  }

  async function storeChunk(
    uploadId: string,
    chunkIndex: number,
    data: Uint8Array
  ): Promise<StoreChunkResult> {
    const session = requireActive(uploadId);
    const totalChunks = chunkCount(session.totalSize, session.chunkSize);

    if (!isValidChunkIndex(session, chunkIndex)) {
      throw new UploadError(
        'invalid_chunk',
        `Invalid chunk index ${chunkIndex} (expected 0-${totalChunks - 1})`
      );
    }

    if (session.chunksUploaded.has(chunkIndex)) {
      log('debug', `Chunk ${chunkIndex} already uploaded for ${uploadId}`);
      return { chunkIndex, duplicate: true };
    }

    const expected = expectedChunkLength(session, chunkIndex);
    if (data.length !== expected) {
      throw new UploadError(
        'invalid_chunk',
        `Invalid chunk size. Expected: ${expected}, got: ${data.length}`
      );
    }

    await storage.writeChunk(uploadId, chunkIndex, data);
    uploadSessions.addChunk(uploadId, chunkIndex);

    log('debug', `Uploaded chunk ${chunkIndex + 1}/${totalChunks} for ${uploadId}`);
    return { chunkIndex, duplicate: false };
  }

  async function assembleVerified(
    session: UploadSession,
    expectedSha256: string | undefined
  ): Promise<UploadSession> {
    const assembled = await storage.assembleChunks(
      session.id,
      chunkCount(session.totalSize, session.chunkSize),
      session.filename
    );

    if (assembled.size !== session.totalSize) {
      throw new UploadError(
        'integrity',
        `File size mismatch. Expected: ${session.totalSize}, got: ${assembled.size}`
      );
    }
    if (
      expectedSha256 &&
      expectedSha256.toLowerCase() !== assembled.sha256.toLowerCase()
    ) {
      throw new UploadError(
        'integrity',
        'File integrity check failed - SHA256 mismatch'
      );
    }

    return completeSession(session.id, assembled.storageKey, assembled.sha256);
  }

  async function assembleAndComplete(
    session: UploadSession,
    expectedSha256: string | undefined
  ): Promise<UploadSession> {
    const uploadId = session.id;
    const completed = await assembleVerified(session, expectedSha256).catch(
      async (error: unknown) => {
        await storage.removeUpload(uploadId);
        throw error;
      }
    );
    await storage.removeChunks(uploadId);

    log('info', `Finalized upload ${uploadId} -> ${completed.storageKey}`);
    return completed;
  }

  /**
   * Assemble all chunks, verify size and optional SHA-256, then complete.
   * Concurrent calls for one upload share the same result.
   */
  function finalizeUpload(
    uploadId: string,
    expectedSha256?: string
  ): Promise<UploadSession> {
    const inFlight = finalizing.get(uploadId);
    if (inFlight) return inFlight;

    let session: UploadSession;
    try {
      session = requireActive(uploadId);
      const missing = missingChunks(session);
      if (missing.length > 0) {
        throw new UploadError(
          'incomplete',
          `Missing chunks: ${missing.join(', ')}`
        );
      }
    } catch (error) {
      return Promise.reject(error);
    }

    const pending = assembleAndComplete(session, expectedSha256).finally(() => {
      finalizing.delete(uploadId);
    });
    finalizing.set(uploadId, pending);
    return pending;
  }

  async function cancelSession(uploadId: string): Promise<boolean> {
    const session = uploadSessions.findById(uploadId);
    if (!session || session.status === 'completed') return false;

    uploadSessions.updateStatus(uploadId, 'cancelled');
    await removeFiles(uploadId);
    return true;
  }

  return {
    createSession,
    getSession,
    recordChunkUploaded,
    isComplete,
    completeSession,
    purgeExpired,
    deleteSession,
    getUploadStatus,
    storeChunk,
    finalizeUpload,
    cancelSession,
  };
}

export type UploadSessionManager = ReturnType<
  typeof createUploadSessionManager
>;
