// src/services/embeddings.ts
// What: Embedding gateway between the ingestion pipeline and the embedding provider.
// How: Splits the input into sub-batches of batchSize, issues them through p-limit (concurrency cap), retries each
//      sub-batch under the injected RetryPolicy, and writes every result back at its sub-batch offset so output
//      order equals input order regardless of completion order. Validates counts and dimensions.

import pLimit from 'p-limit';
import { DataIntegrityError } from '../errors.js';
import logger from '../logging.js';
import type { EmbeddingProvider } from '../models/types.js';
import { withRetry, type RetryPolicy } from './retry.js';

export interface EmbeddingGatewayOptions {
  batchSize: number;
  concurrency: number;
  dimensions: number;
  retry: RetryPolicy;
}

interface SubBatch {
  offset: number;
  texts: string[];
}

export class EmbeddingGateway {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingGatewayOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    this.limit = pLimit(Math.max(1, options.concurrency));
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const batches: SubBatch[] = [];
    for (let offset = 0; offset < texts.length; offset += this.options.batchSize) {
      batches.push({ offset, texts: texts.slice(offset, offset + this.options.batchSize) });
    }

    const out: number[][] = new Array(texts.length);
    await Promise.all(
      batches.map((batch, n) =>
        this.limit(async () => {
          const vectors = await withRetry(`embed batch ${n + 1}/${batches.length}`, this.options.retry, () =>
            this.provider.embedBatch(batch.texts),
          );
          this.validate(batch, vectors);
          vectors.forEach((v, i) => {
            out[batch.offset + i] = v;
          });
          logger.debug({ batch: n + 1, of: batches.length, size: batch.texts.length }, 'Embedded sub-batch');
        }),
      ),
    );
    return out;
  }

  private validate(batch: SubBatch, vectors: number[][]): void {
    if (vectors.length !== batch.texts.length) {
      throw new DataIntegrityError(
        `Provider returned ${vectors.length} vectors for ${batch.texts.length} inputs (offset ${batch.offset})`,
      );
    }
    for (const v of vectors) {
      if (v.length !== this.options.dimensions) {
        throw new DataIntegrityError(`Unexpected embedding size; expected ${this.options.dimensions}, got ${v.length}`);
      }
    }
  }
}
