#!/usr/bin/env node
// src/cli.ts
// What: Command-line entry for batch runs: ingest, rank, summary, status.
// How: Parses flags (util/args.ts), runs the matching core entry point against the configured stores and prints
//      JSON to stdout. Typed errors exit non-zero with their code.

import { getConfig } from './config/env.js';
import { createAppContext, type AppContext } from './context.js';
import { isAppError } from './errors.js';
import { filterFromArgs, intFlag, parseFlags, type ParsedArgs } from './util/args.js';

const USAGE = [
  'Usage:',
  '  paper-explorer ingest [--force] [--prune]',
  '  paper-explorer rank [--top-n <n>] [--seed <id>]... [--year-min <y>] [--year-max <y>] [--author <s>] [--venue <s>] [--keyword <k>]...',
  '  paper-explorer summary <documentId>',
  '  paper-explorer status',
].join('\n');

async function run(ctx: AppContext, cmd: string | undefined, parsed: ParsedArgs): Promise<unknown> {
  switch (cmd) {
    case 'ingest': {
      const controller = new AbortController();
      // First Ctrl-C stops new documents from starting; in-flight ones finish.
      process.once('SIGINT', () => controller.abort());
      return ctx.pipeline.ingestAll({
        force: parsed.booleans.has('force'),
        prune: parsed.booleans.has('prune'),
        signal: controller.signal,
      });
    }
    case 'rank': {
      const seedIds = parsed.lists.seed ?? (await ctx.metadataStore.getDocuments({ role: 'seed' })).map((d) => d.id);
      const topN = intFlag(parsed.flags, 'top-n') ?? ctx.config.RANK_TOP_N;
      return ctx.ranking.rank({ seedIds, filter: filterFromArgs(parsed), topN });
    }
    case 'summary': {
      const id = parsed.positional[0];
      if (!id) throw new Error(`Document id required.\n${USAGE}`);
      return { document_id: id, summary: await ctx.summaries.getSummary(id) };
    }
    case 'status': {
      const [seeds, corpus, lastRun] = await Promise.all([
        ctx.metadataStore.getDocuments({ role: 'seed' }),
        ctx.metadataStore.getDocuments({ role: 'corpus' }),
        ctx.metadataStore.getLastIngestionRun(),
      ]);
      return {
        documents: { seed: seeds.length, corpus: corpus.length },
        last_ingestion: lastRun
          ? {
              run_id: lastRun.runId,
              finished_at: lastRun.finishedAt,
              succeeded: lastRun.succeeded,
              failed: lastRun.failed.length,
              aborted: lastRun.aborted,
            }
          : null,
      };
    }
    default:
      return undefined;
  }
}

async function main(): Promise<void> {
  const [cmd, ...rest] = process.argv.slice(2);
  const parsed = parseFlags(rest);
  if (!cmd || !['ingest', 'rank', 'summary', 'status'].includes(cmd)) {
    console.log(USAGE);
    return;
  }
  const ctx = createAppContext(getConfig());
  try {
    const result = await run(ctx, cmd, parsed);
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await ctx.close();
  }
}

main().catch((err: unknown) => {
  if (isAppError(err)) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
