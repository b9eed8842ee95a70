/**
 * src/routes/documents.ts
 * What: /documents routes to list ingested documents, fetch one, and get its (cached) summary.
 * How:
 *  - GET /documents?role=seed|corpus: metadata rows ordered by id.
 *  - GET /documents/:id: one metadata row or 404.
 *  - GET /documents/:id/summary: read-through summary cache; the first call generates, later calls hit the cache.
 */
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { InvalidInput, NotFoundError } from '../errors.js';

const listQuery = z.object({
  role: z.enum(['seed', 'corpus']).optional(),
});

export default function documentsRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = listQuery.safeParse(req.query);
      if (!parsed.success) throw new InvalidInput(parsed.error.message);
      const items = await ctx.metadataStore.getDocuments(parsed.data.role ? { role: parsed.data.role } : {});
      res.json({ items, total: items.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const doc = await ctx.metadataStore.getDocument(String(req.params.id));
      if (!doc) throw new NotFoundError(`Document ${req.params.id} not found`);
      res.json(doc);
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      const summary = await ctx.summaries.getSummary(id);
      res.json({ document_id: id, summary });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
