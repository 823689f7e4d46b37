import fs from 'node:fs/promises';
import fsSync from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { pipeline } from 'node:stream/promises';
import type { CdnBackend } from './cloudinary';
import { FOLDER_PATTERN } from './config';
import { StorageError, errorMessage } from './errors';
import type { ListedArtifact, StoredArtifact } from './types';
import { sleep as defaultSleep, timeoutError, type Sleep } from './utils/async';
import type { OpenResult } from './veo';

export const MAX_LIST_RESULTS = 500;
export const LOCAL_URL_PREFIX = '/videos';

const STAGING_DIR = path.join(os.tmpdir(), 'prompt-video-staging');

export interface ArtifactStore {
  readonly cdnEnabled: boolean;
  persist(resultRef: string, suggestedFilename: string): Promise<StoredArtifact>;
  list(folder: string, maxResults: number): Promise<ListedArtifact[]>;
}

export interface ArtifactStoreOptions {
  // null puts the store in local-only mode; the CDN is then never attempted.
  cdn: CdnBackend | null;
  openResult: OpenResult;
  folder: string;
  localDir: string;
  uploadRetryDelayMs: number;
  downloadTimeoutMs: number;
  sleep?: Sleep;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `<prefix>_YYYYMMDD_HHMMSS.mp4`, UTC, second precision. */
export function buildArtifactFilename(prefix: string, date: Date = new Date()) {
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${prefix}_${stamp}.mp4`;
}

export function assertValidFolder(folder: string) {
  if (!FOLDER_PATTERN.test(folder)) {
    throw new StorageError(`Invalid folder "${folder}".`);
  }
}

function assertValidFilename(filename: string) {
  if (!/^[A-Za-z0-9_-]+\.mp4$/.test(filename)) {
    throw new StorageError(`Invalid artifact filename "${filename}".`);
  }
}

export function buildPublicUrl(folder: string, filename: string) {
  return `${LOCAL_URL_PREFIX}/${folder}/${filename}`;
}

export function createArtifactStore(options: ArtifactStoreOptions): ArtifactStore {
  const { cdn, openResult, folder, localDir, uploadRetryDelayMs, downloadTimeoutMs } = options;
  const sleep = options.sleep ?? defaultSleep;

  const stage = async (resultRef: string) => {
    await fs.mkdir(STAGING_DIR, { recursive: true });
    const stagingPath = path.join(STAGING_DIR, `${randomUUID()}.mp4`);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(timeoutError(downloadTimeoutMs)), downloadTimeoutMs);
    try {
      const body = await openResult(resultRef, controller.signal);
      await pipeline(body, fsSync.createWriteStream(stagingPath), { signal: controller.signal });
    } catch (err) {
      await fs.rm(stagingPath, { force: true });
      throw new StorageError(`Failed to fetch generated video: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
    const { size } = await fs.stat(stagingPath);
    return { stagingPath, size };
  };

  const uploadWithRetry = async (stagingPath: string, filename: string) => {
    if (!cdn) return null;
    const publicId = filename.replace(/\.mp4$/, '');
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        return await cdn.upload(stagingPath, { folder, publicId });
      } catch (err) {
        console.warn('[Storage] CDN upload failed', { filename, attempt, error: errorMessage(err) });
        if (attempt === 1) await sleep(uploadRetryDelayMs);
      }
    }
    return null;
  };

  const writeLocal = async (stagingPath: string, filename: string) => {
    const targetDir = path.join(localDir, folder);
    const target = path.join(targetDir, filename);
    try {
      await fs.mkdir(targetDir, { recursive: true });
      // copy rather than rename: the staging dir may sit on another device.
      await fs.copyFile(stagingPath, target);
    } catch (err) {
      throw new StorageError(`Local write failed: ${errorMessage(err)}`, { cause: err });
    }
    return target;
  };

  const listLocal = async (listFolder: string, maxResults: number): Promise<ListedArtifact[]> => {
    const dir = path.join(localDir, listFolder);
    if (!fsSync.existsSync(dir)) return [];
    const names = (await fs.readdir(dir)).filter((name) => name.endsWith('.mp4')).sort().reverse();
    return Promise.all(
      names.slice(0, maxResults).map(async (name) => {
        const stat = await fs.stat(path.join(dir, name));
        return {
          uri: buildPublicUrl(listFolder, name),
          backend: 'LOCAL' as const,
          bytesSize: stat.size,
          filename: name,
          publicId: `${listFolder}/${name.replace(/\.mp4$/, '')}`,
          format: 'mp4',
          createdAt: stat.mtime.toISOString(),
        };
      })
    );
  };

  return {
    cdnEnabled: Boolean(cdn),

    async persist(resultRef, suggestedFilename) {
      assertValidFilename(suggestedFilename);
      const { stagingPath, size } = await stage(resultRef);

      try {
        const uploaded = await uploadWithRetry(stagingPath, suggestedFilename);
        if (uploaded) {
          console.log('[Storage] uploaded to CDN', { filename: suggestedFilename, url: uploaded.secureUrl });
          return {
            uri: uploaded.secureUrl,
            backend: 'CDN',
            bytesSize: uploaded.bytes || size,
            filename: suggestedFilename,
          };
        }

        await writeLocal(stagingPath, suggestedFilename);
        console.log('[Storage] stored locally', {
          filename: suggestedFilename,
          reason: cdn ? 'cdn upload failed' : 'cdn not configured',
        });
        return {
          uri: buildPublicUrl(folder, suggestedFilename),
          backend: 'LOCAL',
          bytesSize: size,
          filename: suggestedFilename,
        };
      } finally {
        await fs.rm(stagingPath, { force: true });
      }
    },

    async list(listFolder, maxResults) {
      assertValidFolder(listFolder);
      if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > MAX_LIST_RESULTS) {
        throw new StorageError(`max_results must be an integer between 1 and ${MAX_LIST_RESULTS}.`);
      }
      if (cdn) return cdn.search(listFolder, maxResults);
      return listLocal(listFolder, maxResults);
    },
  };
}
