// src/server.ts
// What: HTTP server entrypoint.
// How: Loads config, builds the app context, starts the ingestion scheduler (immediate first run) and the
//      fortnightly re-rank scheduler, mounts the Express app and listens on PORT. SIGTERM/SIGINT stop the timers
//      and close the pool.

import { getConfig } from './config/env.js';
import { createAppContext, rankAgainstAllSeeds } from './context.js';
import { createApp } from './app.js';
import logger from './logging.js';
import { PeriodicJob } from './services/scheduler.js';

const config = getConfig();
const ctx = createAppContext(config);

const jobs = {
  ingest: new PeriodicJob('ingest', config.INGEST_INTERVAL_MS, () => ctx.pipeline.ingestAll()),
  rerank: new PeriodicJob('rerank', config.RERANK_INTERVAL_MS, () => rankAgainstAllSeeds(ctx, config.RANK_TOP_N)),
};

const app = createApp(ctx, jobs);

jobs.ingest.start({ runImmediately: true });
jobs.rerank.start();

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT }, 'Server listening');
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  jobs.ingest.stop();
  jobs.rerank.stop();
  server.close(() => {
    ctx.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Failed to close database pool');
        process.exit(1);
      },
    );
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
