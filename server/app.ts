import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { ServerConfig } from './config';
import { errorMessage } from './errors';
import type { GenerationOrchestrator } from './generate';
import { parseGenerateVideoBody } from './handlers/generateVideoRequest';
import { buildErrorResponse, buildGenerateVideoResponse } from './handlers/generateVideoResponse';
import { buildListVideosResponse, parseListVideosQuery } from './handlers/listVideos';
import { LOCAL_URL_PREFIX } from './storage';
import { safeJson } from './utils/safeJson';

export interface AppDeps {
  orchestrator: GenerationOrchestrator;
  cdnEnabled: boolean;
  config: Pick<ServerConfig, 'clientOrigins' | 'storage'>;
}

export function createApp({ orchestrator, cdnEnabled, config }: AppDeps) {
  const app = express();
  const inFlight = new Set<AbortController>();

  const allowedOrigins = config.clientOrigins;
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) return callback(null, true);
        if (!allowedOrigins.length) return callback(null, true);
        return callback(null, allowedOrigins.includes(origin.replace(/\/+$/, '')));
      },
    })
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    safeJson(res, {
      message: 'Prompt-to-video generation API',
      endpoints: {
        generate: '/api/generate-video',
        list_videos: '/api/videos',
        health: '/health',
      },
    });
  });

  app.get('/health', (_req, res) => {
    safeJson(res, { status: 'healthy' });
  });

  app.get('/api/health', (_req, res) => {
    safeJson(res, { ok: true, cdn: cdnEnabled });
  });

  app.post('/api/generate-video', async (req: Request, res: Response) => {
    const parsed = parseGenerateVideoBody(req.body);
    if (!parsed.ok) {
      return safeJson(res, { error: { kind: 'INVALID_REQUEST', message: parsed.error } }, 400);
    }

    // Client disconnects stop local polling; the remote job is left alone.
    const controller = new AbortController();
    inFlight.add(controller);
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
    });

    try {
      const result = await orchestrator.generate(parsed.value, { signal: controller.signal });
      return safeJson(res, buildGenerateVideoResponse(result, parsed.value.enhance));
    } catch (err) {
      const { status, body } = buildErrorResponse(err);
      if (res.headersSent || res.destroyed) return;
      return safeJson(res, body, status);
    } finally {
      inFlight.delete(controller);
    }
  });

  app.get('/api/videos', async (req: Request, res: Response) => {
    const parsed = parseListVideosQuery(req.query, config.storage.folder);
    if (!parsed.ok) {
      return safeJson(res, { error: { kind: 'INVALID_REQUEST', message: parsed.error } }, 400);
    }
    try {
      const videos = await orchestrator.listStoredArtifacts(parsed.value.folder, parsed.value.maxResults);
      return safeJson(res, buildListVideosResponse(parsed.value.folder, videos));
    } catch (err) {
      console.error('[server] Failed to list videos', errorMessage(err));
      return safeJson(res, { error: { kind: 'INTERNAL', message: `Failed to retrieve videos: ${errorMessage(err)}` } }, 500);
    }
  });

  app.use(LOCAL_URL_PREFIX, express.static(config.storage.localDir, { fallthrough: false }));

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
      return safeJson(res, { error: { kind: 'INVALID_REQUEST', message: 'Malformed JSON body.' } }, 400);
    }
    if (typeof err === 'object' && err !== null && 'status' in err && err.status === 404) {
      return safeJson(res, { error: { kind: 'NOT_FOUND', message: 'File not found.' } }, 404);
    }
    console.error('[server] Unhandled error', errorMessage(err));
    return safeJson(res, { error: { kind: 'INTERNAL', message: 'Internal Server Error' } }, 500);
  });

  const abortAll = (reason: string) => {
    for (const controller of inFlight) controller.abort(new Error(reason));
  };

  return { app, abortAll, inFlightCount: () => inFlight.size };
}
