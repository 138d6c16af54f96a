/**
 * Filesystem Storage Adapter
 *
 * Layout under the data directory:
 *   chunks/<uploadId>/chunk_000000     raw upload chunks
 *   uploads/<uploadId>/<filename>      assembled source files
 *   jobs/<jobId>/work/                 normalized audio and segments
 *   jobs/<jobId>/outputs/<file>        transcript assets
 */

import { createHash } from 'node:crypto';
import { mkdir, open, readFile, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, relative, resolve, sep } from 'node:path';
import type { AssembledUpload, StorageService } from '../0_types.js';

export function sanitizeFilename(filename: string): string {
  const cleaned = basename(filename).replace(/[^\w.-]+/g, '_');
  return cleaned.replace(/^\.+/, '') || 'upload';
}

function chunkName(index: number): string {
  return `chunk_${index.toString().padStart(6, '0')}`;
}

export function createFsStorageService(dataDir: string): StorageService {
  const root = resolve(dataDir);

  function resolvePath(storageKey: string): string {
    const full = resolve(root, storageKey);
    if (full !== root && !full.startsWith(root + sep)) {
      throw new Error(`Storage key escapes data directory: ${storageKey}`);
    }
    return full;
  }

  const chunksDir = (uploadId: string) =>
    resolvePath(join('chunks', uploadId));
  const uploadDir = (uploadId: string) =>
    resolvePath(join('uploads', uploadId));
  const jobDir = (jobId: string) => resolvePath(join('jobs', jobId));
  const workDir = (jobId: string) => join(jobDir(jobId), 'work');

  return {
    resolvePath,

    async writeChunk(uploadId, chunkIndex, data): Promise<void> {
      const dir = chunksDir(uploadId);
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, chunkName(chunkIndex)), data);
    },

    async assembleChunks(
      uploadId,
      totalChunks,
      filename
    ): Promise<AssembledUpload> {
      const storageKey = join('uploads', uploadId, sanitizeFilename(filename));
      const target = resolvePath(storageKey);
      await mkdir(dirname(target), { recursive: true });

      const hash = createHash('sha256');
      let size = 0;
      const handle = await open(target, 'w');
      try {
        for (let i = 0; i < totalChunks; i++) {
          const chunk = await readFile(join(chunksDir(uploadId), chunkName(i)));
          hash.update(chunk);
          await handle.write(chunk);
          size += chunk.length;
        }
      } finally {
        await handle.close();
      }

      return {
        storageKey: relative(root, target),
        size,
        sha256: hash.digest('hex'),
      };
    },

    async removeChunks(uploadId): Promise<void> {
      await rm(chunksDir(uploadId), { recursive: true, force: true });
    },

    async removeUpload(uploadId): Promise<void> {
      await rm(uploadDir(uploadId), { recursive: true, force: true });
    },

    async removeFile(storageKey): Promise<void> {
      await rm(resolvePath(storageKey), { force: true });
    },

    async writeAsset(jobId, filename, content) {
      const storageKey = join('jobs', jobId, 'outputs', sanitizeFilename(filename));
      const target = resolvePath(storageKey);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf-8');
      return { storageKey, size: Buffer.byteLength(content, 'utf-8') };
    },

    async readText(storageKey): Promise<string> {
      return readFile(resolvePath(storageKey), 'utf-8');
    },

    async prepareJobWorkDir(jobId): Promise<string> {
      const dir = workDir(jobId);
      await mkdir(dir, { recursive: true });
      return dir;
    },

    async removeJobWorkDir(jobId): Promise<void> {
      await rm(workDir(jobId), { recursive: true, force: true });
    },

    async removeJobFiles(jobId): Promise<void> {
      await rm(jobDir(jobId), { recursive: true, force: true });
    },
  };
}
