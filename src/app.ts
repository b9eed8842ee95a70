// src/app.ts
// What: Express application factory.
// How: JSON body limit, root router, and a centralized error handler returning { error: { message, code } } with
//      the status carried by AppError (InvalidInput 400, NotFound 404, ProviderUnavailable 503, ...); anything
//      else is a 500. Kept separate from server.ts so tests can mount it without booting schedulers.

import express, { NextFunction, Request, Response } from 'express';
import type { AppContext } from './context.js';
import { isAppError } from './errors.js';
import logger from './logging.js';
import { createRouter, type Jobs } from './routes/index.js';

export function createApp(ctx: AppContext, jobs: Jobs): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createRouter(ctx, jobs));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(err)) {
      if (err.status >= 500) logger.error({ err, code: err.code }, 'Request failed');
      res.status(err.status).json({ error: { message: err.message, code: err.code } });
      return;
    }
    // body-parser marks its errors with a 4xx status
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    const message = status < 500 && err instanceof Error ? err.message : 'Internal Server Error';
    logger.error({ err, status }, 'Unhandled error');
    res.status(status).json({ error: { message } });
  });

  return app;
}
