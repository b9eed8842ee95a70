// src/services/indexer.ts
// What: Orchestrates list → extract → chunk → embed → upsert vectors → upsert metadata for every source document.
// How: Documents run concurrently under p-limit and each one either reaches Persisted, is skipped as unchanged
//      (same content hash and role already recorded), or ends in Failed(stage) with a reason code; a single
//      failure never aborts the run. Vectors are written before metadata, stamped with the content hash they were
//      embedded from; readers only use chunks whose hash matches the metadata row, so a document whose metadata
//      write failed stays out of ranking until a later run confirms its new vectors.
//      ProviderAuthError stops new documents from starting and is rethrown once in-flight work settles. An
//      AbortSignal is honoured between documents. Pruning failures are reported per document.

import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import pLimit from 'p-limit';
import { EmptyContentError, ProviderAuthError, errorMessage, isAppError } from '../errors.js';
import baseLogger, { type Logger } from '../logging.js';
import type {
  DocumentOutcome,
  DocumentRecord,
  DocumentSource,
  IngestionFailure,
  IngestionReport,
  IngestionStage,
  MetadataStore,
  SourceDocument,
  TextExtractor,
  VectorStore,
} from '../models/types.js';
import { chunkText } from './chunking.js';
import type { EmbeddingGateway } from './embeddings.js';
import { mergeMetadata } from './metadataHints.js';
import { computeContentHash } from './scanner.js';

export interface IngestionDeps {
  source: DocumentSource;
  extractor: TextExtractor;
  embedder: Pick<EmbeddingGateway, 'embed'>;
  vectorStore: VectorStore;
  metadataStore: MetadataStore;
  chunkSize: number;
  concurrency: number;
  logger?: Logger;
  now?: () => Date;
}

export interface IngestOptions {
  // Re-ingest even when the stored content hash matches
  force?: boolean;
  // Remove stored documents that the source no longer lists
  prune?: boolean;
  signal?: AbortSignal;
}

export class IngestionPipeline {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: IngestionDeps) {
    this.log = deps.logger ?? baseLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async ingestAll(opts: IngestOptions = {}): Promise<IngestionReport> {
    const runId = uuidv4();
    const log = this.log.child({ runId });
    const startedAt = this.now().toISOString();

    const docs = [
      ...(await this.deps.source.listDocuments('seed')),
      ...(await this.deps.source.listDocuments('corpus')),
    ];
    log.info({ discovered: docs.length, force: Boolean(opts.force) }, 'Ingestion run starting');

    const limit = pLimit(Math.max(1, this.deps.concurrency));
    const outcomes: DocumentOutcome[] = [];
    const cancelled: string[] = [];
    const halt: { err?: ProviderAuthError } = {};

    await Promise.all(
      docs.map((doc) =>
        limit(async () => {
          if (halt.err || opts.signal?.aborted) {
            cancelled.push(doc.id);
            return;
          }
          try {
            outcomes.push(await this.ingestDocument(doc, { force: opts.force, log }));
          } catch (err) {
            if (!(err instanceof ProviderAuthError)) throw err;
            halt.err ??= err;
          }
        }),
      ),
    );

    const fatal = halt.err;
    const aborted = Boolean(fatal) || cancelled.length > 0;
    const pruned: PruneResult =
      opts.prune && !aborted
        ? await this.pruneMissing(new Set(docs.map((d) => d.id)), log)
        : { removed: [], failures: [], error: null };
    const removed = pruned.removed;

    outcomes.sort((a, b) => a.documentId.localeCompare(b.documentId));
    cancelled.sort((a, b) => a.localeCompare(b));

    const report: IngestionReport = {
      runId,
      startedAt,
      finishedAt: this.now().toISOString(),
      discovered: docs.length,
      succeeded: outcomes.filter((o) => o.status !== 'failed').length,
      unchanged: outcomes.filter((o) => o.status === 'unchanged').length,
      failed: [
        ...outcomes.flatMap((o) =>
          o.status === 'failed'
            ? [{ documentId: o.documentId, reasonCode: o.reasonCode, stage: o.stage, message: o.message }]
            : [],
        ),
        ...pruned.failures,
      ],
      cancelled,
      removed,
      pruneError: pruned.error,
      aborted,
      outcomes,
    };

    if (fatal) {
      log.error({ err: fatal, cancelled: cancelled.length }, 'Ingestion halted by provider authentication failure');
      try {
        await this.deps.metadataStore.recordIngestionRun(report);
      } catch (recordErr) {
        log.error({ err: recordErr }, 'Could not record halted ingestion run');
      }
      throw fatal;
    }

    await this.deps.metadataStore.recordIngestionRun(report);
    log.info(
      {
        discovered: report.discovered,
        succeeded: report.succeeded,
        unchanged: report.unchanged,
        failed: report.failed.length,
        cancelled: cancelled.length,
        removed: removed.length,
      },
      'Ingestion run finished',
    );
    return report;
  }

  /**
   * Runs one document through the state machine. Resolves with its outcome for every per-document failure;
   * rejects only with ProviderAuthError.
   */
  async ingestDocument(
    doc: SourceDocument,
    opts: { force?: boolean; log?: Logger } = {},
  ): Promise<DocumentOutcome> {
    const log = (opts.log ?? this.log).child({ documentId: doc.id });
    let stage: IngestionStage = 'extraction';

    try {
      const bytes = await this.deps.source.fetchBytes(doc.sourceLocator);
      const contentHash = computeContentHash(bytes);

      stage = 'lookup';
      const existing = await this.deps.metadataStore.getDocument(doc.id);
      if (!opts.force && existing && existing.content_hash === contentHash && existing.role === doc.role) {
        log.debug('Unchanged; skipping');
        return { documentId: doc.id, role: doc.role, status: 'unchanged' };
      }

      stage = 'extraction';
      const extracted = await this.deps.extractor.extractText(bytes, { filename: doc.sourceLocator });

      stage = 'empty';
      if (extracted.text.trim().length === 0) {
        throw new EmptyContentError(`No text extracted from ${doc.sourceLocator}`);
      }
      const chunks = chunkText(extracted.text, this.deps.chunkSize);

      stage = 'embedding';
      const vectors = await this.deps.embedder.embed(chunks);

      stage = 'persist';
      await this.deps.vectorStore.upsert(
        doc.id,
        contentHash,
        chunks.map((text, chunkIndex) => ({ chunkIndex, text, vector: vectors[chunkIndex] })),
      );
      const record: DocumentRecord = {
        id: doc.id,
        role: doc.role,
        source_locator: doc.sourceLocator,
        content_hash: contentHash,
        chunk_count: chunks.length,
        ingested_at: this.now().toISOString(),
        ...mergeMetadata(doc.sourceLocator, extracted.hints),
      };
      await this.deps.metadataStore.upsertDocument(record);

      log.debug({ chunks: chunks.length }, 'Document persisted');
      return { documentId: doc.id, role: doc.role, status: 'persisted', chunks: chunks.length };
    } catch (err) {
      if (err instanceof ProviderAuthError) throw err;
      const reasonCode = isAppError(err) ? err.code : 'UnknownError';
      log.warn({ err, stage, reasonCode, locator: doc.sourceLocator }, 'Document ingestion failed');
      return { documentId: doc.id, role: doc.role, status: 'failed', stage, reasonCode, message: errorMessage(err) };
    }
  }

  /**
   * Removes documents the source no longer lists. Chunks left behind by an earlier failed delete have no metadata
   * row, so the vector store's own ids are swept as well.
   */
  private async pruneMissing(listed: Set<string>, log: Logger): Promise<PruneResult> {
    let withMetadata: Set<string>;
    let withVectors: string[];
    try {
      withMetadata = new Set((await this.deps.metadataStore.getDocuments({})).map((d) => d.id));
      withVectors = await this.deps.vectorStore.listDocumentIds();
    } catch (err) {
      log.error({ err }, 'Could not list stored documents for pruning');
      return { removed: [], failures: [], error: errorMessage(err) };
    }

    const missing = [...new Set([...withMetadata, ...withVectors])]
      .filter((id) => !listed.has(id))
      .sort((a, b) => a.localeCompare(b));
    const removed: string[] = [];
    const failures: IngestionFailure[] = [];
    for (const id of missing) {
      try {
        // Metadata first: once it is gone ranking no longer sees the document
        if (withMetadata.has(id)) await this.deps.metadataStore.deleteDocument(id);
        await this.deps.vectorStore.deleteAll(id);
        removed.push(id);
      } catch (err) {
        const reasonCode = isAppError(err) ? err.code : 'UnknownError';
        log.warn({ err, documentId: id, reasonCode }, 'Prune failed');
        failures.push({ documentId: id, reasonCode, stage: 'prune', message: errorMessage(err) });
      }
    }
    if (removed.length > 0) log.info({ removed }, 'Pruned documents missing from source');
    return { removed, failures, error: null };
  }
}

interface PruneResult {
  removed: string[];
  failures: IngestionFailure[];
  error: string | null;
}

// Helper to create correlation IDs for scheduled runs
export function newCorrelationId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, '');
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}
