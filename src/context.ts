// src/context.ts
// What: Wires configuration into the concrete stores, providers and core services.
// How: One pg pool backs both stores, one OpenAI client backs embeddings and summaries; the retry policy built
//      from EMBED_* settings is shared by the embedding gateway and the summarizer. close() ends the pool.

import type { Pool } from 'pg';
import type { AppConfig } from './config/env.js';
import { PgMetadataStore } from './db/metadataStore.js';
import { createPool } from './db/pool.js';
import { PgVectorStore } from './db/vectorStore.js';
import type { MetadataStore, RankingEntry, VectorStore } from './models/types.js';
import { EmbeddingGateway } from './services/embeddings.js';
import { IngestionPipeline } from './services/indexer.js';
import { MarkitDownExtractor } from './services/markitdown.js';
import { createOpenAIClient, OpenAIEmbeddingProvider, OpenAISummarizer } from './services/openai.js';
import { AGGREGATION_STRATEGIES, RankingEngine } from './services/ranking.js';
import type { RetryPolicy } from './services/retry.js';
import { FilesystemDocumentSource } from './services/scanner.js';
import { SummaryService } from './services/summaries.js';

export interface AppContext {
  config: Pick<AppConfig, 'RANK_TOP_N' | 'INGEST_INTERVAL_MS' | 'RERANK_INTERVAL_MS'>;
  metadataStore: MetadataStore;
  vectorStore: VectorStore;
  pipeline: IngestionPipeline;
  ranking: RankingEngine;
  summaries: SummaryService;
  close(): Promise<void>;
}

export function retryPolicyFrom(config: AppConfig): RetryPolicy {
  return {
    maxAttempts: config.EMBED_MAX_ATTEMPTS,
    baseDelayMs: config.EMBED_RETRY_BASE_MS,
    maxDelayMs: config.EMBED_RETRY_MAX_MS,
    jitter: 0.25,
  };
}

export function createAppContext(config: AppConfig, pool: Pool = createPool(config.DATABASE_URL)): AppContext {
  const metadataStore = new PgMetadataStore(pool);
  const vectorStore = new PgVectorStore(pool);
  const openai = createOpenAIClient(config.OPENAI_API_KEY);
  const retry = retryPolicyFrom(config);

  const gateway = new EmbeddingGateway(
    new OpenAIEmbeddingProvider(openai, config.OPENAI_EMBED_MODEL, config.EMBEDDING_DIMENSIONS),
    {
      batchSize: config.EMBED_BATCH_SIZE,
      concurrency: config.EMBED_CONCURRENCY,
      dimensions: config.EMBEDDING_DIMENSIONS,
      retry,
    },
  );

  const pipeline = new IngestionPipeline({
    source: new FilesystemDocumentSource(config.LIBRARY_DIR),
    extractor: new MarkitDownExtractor({
      pythonBin: config.PYTHON_BIN,
      pythonEnv: config.PYTHON_ENV,
      timeoutMs: config.MARKITDOWN_TIMEOUT_MS,
      maxBytes: config.MARKITDOWN_MAX_BYTES,
    }),
    embedder: gateway,
    vectorStore,
    metadataStore,
    chunkSize: config.CHUNK_SIZE,
    concurrency: config.INGEST_CONCURRENCY,
  });

  const ranking = new RankingEngine({
    vectorStore,
    metadataStore,
    aggregation: AGGREGATION_STRATEGIES[config.RANK_AGGREGATION],
  });

  const summaries = new SummaryService({
    metadataStore,
    vectorStore,
    summarizer: new OpenAISummarizer(openai, config.OPENAI_CHAT_MODEL, retry),
    chunkLimit: config.SUMMARY_CHUNKS,
  });

  return {
    config,
    metadataStore,
    vectorStore,
    pipeline,
    ranking,
    summaries,
    close: () => pool.end(),
  };
}

/** Ranks the corpus against every seed-role document; the scheduled re-rank and default requests use it. */
export async function rankAgainstAllSeeds(
  ctx: Pick<AppContext, 'metadataStore' | 'ranking'>,
  topN: number,
): Promise<RankingEntry[]> {
  const seeds = await ctx.metadataStore.getDocuments({ role: 'seed' });
  return ctx.ranking.rank({ seedIds: seeds.map((s) => s.id), topN });
}
