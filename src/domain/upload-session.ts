import type { UploadSession } from '../0_types.js';

export function chunkCount(totalSize: number, chunkSize: number): number {
  if (totalSize <= 0 || chunkSize <= 0) return 0;
  return Math.ceil(totalSize / chunkSize);
}

/**
 * Byte length a chunk must have. Only the last chunk may be shorter.
 */
export function expectedChunkLength(
  session: Pick<UploadSession, 'totalSize' | 'chunkSize'>,
  chunkIndex: number
): number {
  const total = chunkCount(session.totalSize, session.chunkSize);
  if (chunkIndex !== total - 1) return session.chunkSize;
  const remainder = session.totalSize % session.chunkSize;
  return remainder === 0 ? session.chunkSize : remainder;
}

export function missingChunks(
  session: Pick<UploadSession, 'totalSize' | 'chunkSize' | 'chunksUploaded'>
): number[] {
  const total = chunkCount(session.totalSize, session.chunkSize);
  const missing: number[] = [];
  for (let i = 0; i < total; i++) {
    if (!session.chunksUploaded.has(i)) missing.push(i);
  }
  return missing;
}

export function computeExpiry(now: Date, ttlHours: number): string {
  return new Date(now.getTime() + ttlHours * 60 * 60 * 1000).toISOString();
}
