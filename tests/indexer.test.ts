import { describe, it, expect } from 'vitest';
import { IngestionPipeline, type IngestionDeps } from '../src/services/indexer.js';
import { EmbeddingGateway } from '../src/services/embeddings.js';
import { immediateRetry } from '../src/services/retry.js';
import { RankingEngine } from '../src/services/ranking.js';
import { computeContentHash } from '../src/services/scanner.js';
import { ProviderAuthError, TransientProviderError } from '../src/errors.js';
import type { DocumentRecord, EmbeddingProvider, ExtractedText } from '../src/models/types.js';
import {
  FakeEmbeddingProvider,
  FakeExtractor,
  MemoryMetadataStore,
  MemorySource,
  MemoryVectorStore,
} from './support/fakes.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

function setup(files: Record<string, string>, overrides: Partial<IngestionDeps> = {}) {
  const source = new MemorySource(files);
  const extractor = new FakeExtractor();
  const provider = new FakeEmbeddingProvider();
  const vectorStore = new MemoryVectorStore();
  const metadataStore = new MemoryMetadataStore();
  const deps: IngestionDeps = {
    source,
    extractor,
    embedder: new EmbeddingGateway(provider, { batchSize: 4, concurrency: 1, dimensions: 2, retry: immediateRetry(2) }),
    vectorStore,
    metadataStore,
    chunkSize: 8,
    concurrency: 2,
    now: () => NOW,
    ...overrides,
  };
  return { pipeline: new IngestionPipeline(deps), source, extractor, provider, vectorStore, metadataStore };
}

const LIBRARY = {
  'seed/s1.txt': 'alpha beta gamma',
  'corpus/c1.txt': 'delta epsilon',
  'corpus/c2.txt': 'CORRUPT bytes',
};

describe('IngestionPipeline.ingestAll', () => {
  it('persists valid documents and reports the corrupt one without aborting', async () => {
    const { pipeline, vectorStore, metadataStore } = setup(LIBRARY);
    const report = await pipeline.ingestAll();

    expect(report.discovered).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.unchanged).toBe(0);
    expect(report.aborted).toBe(false);
    expect(report.cancelled).toEqual([]);
    expect(report.failed).toEqual([
      { documentId: 'c2', reasonCode: 'ExtractionError', stage: 'extraction', message: 'Cannot parse corpus/c2.txt' },
    ]);
    expect(report.startedAt).toBe('2024-05-01T12:00:00.000Z');

    expect([...vectorStore.chunks.keys()].sort()).toEqual(['c1', 's1']);
    expect([...metadataStore.docs.keys()].sort()).toEqual(['c1', 's1']);
    expect(metadataStore.runs).toEqual([report]);
  });

  it('stores chunk texts, vectors and metadata for a persisted document', async () => {
    const { pipeline, vectorStore, metadataStore } = setup(LIBRARY);
    await pipeline.ingestAll();

    expect(vectorStore.chunks.get('s1')).toEqual([
      { chunkIndex: 0, text: 'alpha ', vector: [6, 3] },
      { chunkIndex: 1, text: 'beta ', vector: [5, 2] },
      { chunkIndex: 2, text: 'gamma', vector: [5, 3] },
    ]);
    const expected: DocumentRecord = {
      id: 's1',
      role: 'seed',
      source_locator: 'seed/s1.txt',
      content_hash: computeContentHash(Buffer.from('alpha beta gamma', 'utf8')),
      chunk_count: 3,
      ingested_at: '2024-05-01T12:00:00.000Z',
      title: 's1',
      authors: [],
      year: 2021,
      venue: null,
      keywords: [],
    };
    expect(metadataStore.docs.get('s1')).toEqual(expected);
  });

  it('skips unchanged documents on a second run', async () => {
    const { pipeline, extractor, provider, vectorStore, metadataStore } = setup(LIBRARY);
    await pipeline.ingestAll();
    const batchesAfterFirst = provider.batches.length;
    const vectorsBefore = JSON.stringify([...vectorStore.chunks]);
    const docsBefore = JSON.stringify([...metadataStore.docs]);

    const second = await pipeline.ingestAll();
    expect(second.succeeded).toBe(2);
    expect(second.unchanged).toBe(2);
    expect(second.failed.map((f) => f.documentId)).toEqual(['c2']);
    expect(second.outcomes.map((o) => [o.documentId, o.status])).toEqual([
      ['c1', 'unchanged'],
      ['c2', 'failed'],
      ['s1', 'unchanged'],
    ]);
    // Only the corrupt file is extracted again; nothing new is embedded or written
    expect(extractor.calls).toBe(4);
    expect(provider.batches.length).toBe(batchesAfterFirst);
    expect(vectorStore.upserts).toBe(2);
    expect(JSON.stringify([...vectorStore.chunks])).toBe(vectorsBefore);
    expect(JSON.stringify([...metadataStore.docs])).toBe(docsBefore);
  });

  it('re-ingests changed content and everything under force', async () => {
    const { pipeline, source, vectorStore } = setup(LIBRARY);
    await pipeline.ingestAll();

    source.files.set('corpus/c1.txt', 'delta epsilon zeta');
    const changed = await pipeline.ingestAll();
    expect(changed.outcomes.find((o) => o.documentId === 'c1')).toEqual({
      documentId: 'c1',
      role: 'corpus',
      status: 'persisted',
      chunks: 3,
    });
    expect(vectorStore.upserts).toBe(3);

    const forced = await pipeline.ingestAll({ force: true });
    expect(forced.unchanged).toBe(0);
    expect(vectorStore.upserts).toBe(5);
  });

  it('fails whitespace-only documents at the empty stage', async () => {
    const { pipeline, metadataStore } = setup({ 'corpus/blank.txt': '  \n\t ' });
    const report = await pipeline.ingestAll();
    expect(report.failed).toEqual([
      {
        documentId: 'blank',
        reasonCode: 'EmptyContentError',
        stage: 'empty',
        message: 'No text extracted from corpus/blank.txt',
      },
    ]);
    expect(metadataStore.docs.size).toBe(0);
  });

  it('records ProviderUnavailable at the embedding stage and continues', async () => {
    let calls = 0;
    const flaky: EmbeddingProvider = {
      embedBatch: async (texts) => {
        calls++;
        if (texts.some((t) => t.startsWith('delta'))) throw new TransientProviderError('503');
        return texts.map(() => [1, 1]);
      },
    };
    const { pipeline, metadataStore } = setup(
      { 'seed/s1.txt': 'alpha', 'corpus/c1.txt': 'delta' },
      {
        embedder: new EmbeddingGateway(flaky, { batchSize: 4, concurrency: 1, dimensions: 2, retry: immediateRetry(2) }),
      },
    );
    const report = await pipeline.ingestAll();
    expect(report.failed).toEqual([
      {
        documentId: 'c1',
        reasonCode: 'ProviderUnavailable',
        stage: 'embedding',
        message: 'embed batch 1/1 failed after 2 attempts: 503',
      },
    ]);
    expect(report.succeeded).toBe(1);
    expect(metadataStore.docs.has('c1')).toBe(false);
    expect(calls).toBe(3);
  });

  it('leaves a document without metadata when the metadata write fails, and retries it next run', async () => {
    class FailingOnce extends MemoryMetadataStore {
      failed = false;
      override async upsertDocument(rec: DocumentRecord): Promise<void> {
        if (!this.failed) {
          this.failed = true;
          throw new Error('connection reset');
        }
        return super.upsertDocument(rec);
      }
    }
    const metadataStore = new FailingOnce();
    const { pipeline, vectorStore } = setup({ 'corpus/c1.txt': 'delta' }, { metadataStore });

    const first = await pipeline.ingestAll();
    expect(first.failed).toEqual([
      { documentId: 'c1', reasonCode: 'UnknownError', stage: 'persist', message: 'connection reset' },
    ]);
    expect(vectorStore.chunks.has('c1')).toBe(true);
    expect(metadataStore.docs.has('c1')).toBe(false);

    const second = await pipeline.ingestAll();
    expect(second.outcomes).toEqual([{ documentId: 'c1', role: 'corpus', status: 'persisted', chunks: 1 }]);
  });

  it('keeps re-embedded vectors out of ranking until their metadata write succeeds', async () => {
    class FailingFor extends MemoryMetadataStore {
      failFor: string | null = null;
      override async upsertDocument(rec: DocumentRecord): Promise<void> {
        if (rec.id === this.failFor) throw new Error('connection reset');
        return super.upsertDocument(rec);
      }
    }
    const metadataStore = new FailingFor();
    const { pipeline, source, vectorStore } = setup({ 'seed/s1.txt': 'aaaa', 'corpus/c1.txt': 'bbbb' }, { metadataStore });
    const ranking = new RankingEngine({ vectorStore, metadataStore });

    await pipeline.ingestAll();
    const before = await ranking.rank({ seedIds: ['s1'] });
    expect(before.map((r) => r.documentId)).toEqual(['c1']);
    expect(before[0]?.score).toBeCloseTo(21 / Math.sqrt(41 * 17), 10);

    source.files.set('corpus/c1.txt', 'aaaa');
    metadataStore.failFor = 'c1';
    const failedRun = await pipeline.ingestAll();
    expect(failedRun.failed).toEqual([
      { documentId: 'c1', reasonCode: 'UnknownError', stage: 'persist', message: 'connection reset' },
    ]);
    expect(metadataStore.docs.get('c1')?.content_hash).toBe(computeContentHash(Buffer.from('bbbb', 'utf8')));
    expect(await ranking.rank({ seedIds: ['s1'] })).toEqual([]);

    metadataStore.failFor = null;
    await pipeline.ingestAll();
    const after = await ranking.rank({ seedIds: ['s1'] });
    expect(after.map((r) => r.documentId)).toEqual(['c1']);
    expect(after[0]?.score).toBeCloseTo(1, 10);
  });

  it('attributes a failed unchanged check to the lookup stage', async () => {
    class UnreadableStore extends MemoryMetadataStore {
      override async getDocument(): Promise<DocumentRecord | null> {
        throw new Error('connection refused');
      }
    }
    const { pipeline, extractor } = setup({ 'corpus/c1.txt': 'delta' }, { metadataStore: new UnreadableStore() });
    const report = await pipeline.ingestAll();
    expect(report.failed).toEqual([
      { documentId: 'c1', reasonCode: 'UnknownError', stage: 'lookup', message: 'connection refused' },
    ]);
    expect(extractor.calls).toBe(0);
  });

  it('halts on a provider authentication error and cancels documents not yet started', async () => {
    const denied: EmbeddingProvider = {
      embedBatch: async () => {
        throw new ProviderAuthError('invalid api key');
      },
    };
    const { pipeline, metadataStore } = setup(LIBRARY, {
      concurrency: 1,
      embedder: new EmbeddingGateway(denied, { batchSize: 4, concurrency: 1, dimensions: 2, retry: immediateRetry(3) }),
    });

    await expect(pipeline.ingestAll()).rejects.toBeInstanceOf(ProviderAuthError);
    expect(metadataStore.runs).toHaveLength(1);
    expect(metadataStore.runs[0]).toMatchObject({ aborted: true, cancelled: ['c1', 'c2'], outcomes: [] });
    expect(metadataStore.docs.size).toBe(0);
  });

  it('stops starting documents once the signal is aborted', async () => {
    const controller = new AbortController();
    class AbortingExtractor extends FakeExtractor {
      override async extractText(bytes: Buffer, info: { filename: string }): Promise<ExtractedText> {
        controller.abort();
        return super.extractText(bytes, info);
      }
    }
    const { pipeline } = setup(LIBRARY, { concurrency: 1, extractor: new AbortingExtractor() });

    const report = await pipeline.ingestAll({ signal: controller.signal, prune: true });
    expect(report.aborted).toBe(true);
    expect(report.outcomes.map((o) => [o.documentId, o.status])).toEqual([['s1', 'persisted']]);
    expect(report.cancelled).toEqual(['c1', 'c2']);
    expect(report.removed).toEqual([]);
  });

  it('prunes stored documents the source no longer lists', async () => {
    const { pipeline, source, vectorStore, metadataStore } = setup(LIBRARY);
    await pipeline.ingestAll();
    await metadataStore.putSummary('c1', 'cached');

    source.files.delete('corpus/c1.txt');
    const withoutPrune = await pipeline.ingestAll();
    expect(withoutPrune.removed).toEqual([]);
    expect(metadataStore.docs.has('c1')).toBe(true);

    const pruned = await pipeline.ingestAll({ prune: true });
    expect(pruned.removed).toEqual(['c1']);
    expect(metadataStore.docs.has('c1')).toBe(false);
    expect(vectorStore.chunks.has('c1')).toBe(false);
    expect(await metadataStore.getSummary('c1')).toBeNull();
  });

  it('reports a failed prune per document, records the run and retries the leftover chunks next time', async () => {
    class FailingDelete extends MemoryVectorStore {
      broken = true;
      override async deleteAll(documentId: string): Promise<void> {
        if (this.broken) throw new Error('db down');
        return super.deleteAll(documentId);
      }
    }
    const vectorStore = new FailingDelete();
    const { pipeline, source, metadataStore } = setup({ 'seed/s1.txt': 'alpha', 'corpus/c1.txt': 'delta' }, { vectorStore });
    await pipeline.ingestAll();

    source.files.delete('corpus/c1.txt');
    source.files.set('corpus/c2.txt', 'epsilon');
    const report = await pipeline.ingestAll({ prune: true });
    expect(report.failed).toEqual([{ documentId: 'c1', reasonCode: 'UnknownError', stage: 'prune', message: 'db down' }]);
    expect(report.removed).toEqual([]);
    expect(report.pruneError).toBeNull();
    expect(report.succeeded).toBe(2);
    expect(metadataStore.runs).toHaveLength(2);
    expect(metadataStore.runs[1]).toEqual(report);
    expect(metadataStore.docs.has('c2')).toBe(true);
    expect(metadataStore.docs.has('c1')).toBe(false);
    expect(vectorStore.chunks.has('c1')).toBe(true);

    vectorStore.broken = false;
    const retried = await pipeline.ingestAll({ prune: true });
    expect(retried.removed).toEqual(['c1']);
    expect(retried.failed).toEqual([]);
    expect(vectorStore.chunks.has('c1')).toBe(false);
  });

  it('records a failure to list stored documents for pruning on the report', async () => {
    class UnlistableStore extends MemoryVectorStore {
      override async listDocumentIds(): Promise<string[]> {
        throw new Error('db down');
      }
    }
    const { pipeline, metadataStore } = setup({ 'corpus/c1.txt': 'delta' }, { vectorStore: new UnlistableStore() });
    const report = await pipeline.ingestAll({ prune: true });
    expect(report.pruneError).toBe('db down');
    expect(report.removed).toEqual([]);
    expect(report.failed).toEqual([]);
    expect(metadataStore.runs).toEqual([report]);
  });
});
