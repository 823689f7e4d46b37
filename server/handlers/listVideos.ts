import { z } from 'zod';
import { FOLDER_PATTERN } from '../config';
import { MAX_LIST_RESULTS } from '../storage';
import type { ListedArtifact } from '../types';
import type { ParsedBody } from './generateVideoRequest';

export interface ListVideosQuery {
  folder: string;
  maxResults: number;
}

export function parseListVideosQuery(query: unknown, defaultFolder: string): ParsedBody<ListVideosQuery> {
  const schema = z.object({
    folder: z.string().regex(FOLDER_PATTERN, 'Invalid folder.').default(defaultFolder),
    max_results: z.coerce.number().int().min(1).max(MAX_LIST_RESULTS).default(MAX_LIST_RESULTS),
  });
  const parsed = schema.safeParse(query ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `${issue?.path.join('.') || 'query'}: ${issue?.message ?? 'Invalid query.'}` };
  }
  return { ok: true, value: { folder: parsed.data.folder, maxResults: parsed.data.max_results } };
}

export function buildListVideosResponse(folder: string, videos: ListedArtifact[]) {
  return {
    total: videos.length,
    folder,
    videos: videos.map((video) => ({
      public_id: video.publicId,
      url: video.uri,
      backend: video.backend,
      filename: video.filename,
      format: video.format ?? null,
      width: video.width ?? null,
      height: video.height ?? null,
      bytes: video.bytesSize,
      duration: video.durationSec ?? null,
      created_at: video.createdAt ?? null,
    })),
  };
}
