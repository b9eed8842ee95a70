// src/routes/rank.ts
// What: /rank routes.
// How: POST / validates the body with zod; omitted seedIds means "every seed-role document" and an omitted topN
//      means the configured RANK_TOP_N. The engine re-validates and raises InvalidInput, which the central handler
//      maps to 400. GET /latest returns the scheduled re-rank.

import { Router, Request, Response, NextFunction } from 'express';
import type { AppContext } from '../context.js';
import { z } from 'zod';
import { InvalidInput } from '../errors.js';
import type { RankingEntry } from '../models/types.js';
import { rankRequestSchema } from '../services/ranking.js';
import type { PeriodicJob } from '../services/scheduler.js';

const bodySchema = rankRequestSchema.extend({
  seedIds: rankRequestSchema.shape.seedIds.optional(),
  topN: z.number().int().positive().optional(),
});

export default function rankRouter(ctx: AppContext, rerank: PeriodicJob<RankingEntry[]>): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = bodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new InvalidInput(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '));
      }
      const { filter } = parsed.data;
      const topN = parsed.data.topN ?? ctx.config.RANK_TOP_N;
      const seedIds =
        parsed.data.seedIds ?? (await ctx.metadataStore.getDocuments({ role: 'seed' })).map((d) => d.id);

      const results = await ctx.ranking.rank({ seedIds, filter, topN });
      res.json({ seedIds, topN, count: results.length, results });
    } catch (err) {
      next(err);
    }
  });

  router.get('/latest', (_req: Request, res: Response) => {
    const status = rerank.status();
    res.json({
      generated_at: status.last_run_end ?? null,
      error: status.last_error ?? null,
      results: status.last_result ?? [],
    });
  });

  return router;
}
