// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health, POST /ingest (kick a run in the background) and GET /ingest/status (scheduler status plus
//      the last run persisted by the metadata store), and mounts /rank and /documents.

import { Router, Request, Response, NextFunction } from 'express';
import type { AppContext } from '../context.js';
import type { IngestionReport, RankingEntry } from '../models/types.js';
import type { PeriodicJob } from '../services/scheduler.js';
import documentsRouter from './documents.js';
import rankRouter from './rank.js';

export interface Jobs {
  ingest: PeriodicJob<IngestionReport>;
  rerank: PeriodicJob<RankingEntry[]>;
}

export function createRouter(ctx: AppContext, jobs: Jobs): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  router.post('/ingest', (_req: Request, res: Response) => {
    const alreadyRunning = jobs.ingest.isRunning;
    if (!alreadyRunning) void jobs.ingest.runIfIdle();
    res.status(202).json({ accepted: !alreadyRunning, status: jobs.ingest.status() });
  });

  router.get('/ingest/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const lastRun = await ctx.metadataStore.getLastIngestionRun();
      res.json({ scheduler: jobs.ingest.status(), last_run: lastRun });
    } catch (err) {
      next(err);
    }
  });

  router.use('/rank', rankRouter(ctx, jobs.rerank));
  router.use('/documents', documentsRouter(ctx));

  return router;
}
