// src/services/summaries.ts
// What: Cache-or-compute document summaries.
// How: readThrough() is the generic read-through cache over a get/put store. SummaryService plugs the metadata
//      store's summary table in as that store and a loader that summarises the document's leading chunks.
//      Concurrent misses for the same id share one in-flight generation; the store write is an upsert, so a
//      duplicate generation from another process only overwrites the same row.

import { DataIntegrityError, NotFoundError } from '../errors.js';
import baseLogger, { type Logger } from '../logging.js';
import type { DocumentRecord, MetadataStore, Summarizer, VectorStore } from '../models/types.js';

export interface CacheStore<K, V> {
  get(key: K): Promise<V | null>;
  put(key: K, value: V): Promise<void>;
}

export async function readThrough<K, V>(key: K, store: CacheStore<K, V>, loader: (key: K) => Promise<V>): Promise<V> {
  const hit = await store.get(key);
  if (hit !== null) return hit;
  const value = await loader(key);
  await store.put(key, value);
  return value;
}

export interface SummaryServiceDeps {
  metadataStore: MetadataStore;
  vectorStore: VectorStore;
  summarizer: Summarizer;
  // Leading chunks fed to the summarizer
  chunkLimit: number;
  logger?: Logger;
}

export class SummaryService {
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly store: CacheStore<string, string>;
  private readonly log: Logger;

  constructor(private readonly deps: SummaryServiceDeps) {
    this.log = deps.logger ?? baseLogger;
    this.store = {
      get: (id) => deps.metadataStore.getSummary(id),
      put: (id, summary) => deps.metadataStore.putSummary(id, summary),
    };
  }

  getSummary(documentId: string): Promise<string> {
    const pending = this.inFlight.get(documentId);
    if (pending) return pending;

    const run = this.resolve(documentId).finally(() => {
      this.inFlight.delete(documentId);
    });
    this.inFlight.set(documentId, run);
    return run;
  }

  private async resolve(documentId: string): Promise<string> {
    const doc = await this.deps.metadataStore.getDocument(documentId);
    if (!doc) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }
    return readThrough(documentId, this.store, () => this.generate(doc));
  }

  private async generate(doc: DocumentRecord): Promise<string> {
    const documentId = doc.id;
    const texts = await this.deps.vectorStore.fetchChunkTexts(doc, this.deps.chunkLimit);
    if (texts.length === 0) {
      throw new DataIntegrityError(`Document ${documentId} has no stored chunks to summarize`);
    }
    const started = Date.now();
    const summary = await this.deps.summarizer.summarize(texts.join(''));
    this.log.info({ documentId, ms: Date.now() - started, length: summary.length }, 'Summary generated');
    return summary;
  }
}
