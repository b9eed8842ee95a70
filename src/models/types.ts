// src/models/types.ts
// What: Shared TypeScript types for documents, chunks, rankings and ingestion reports,
//       plus the boundary interfaces of every external collaborator.
// How: Interfaces mirror DB columns where they are persisted; adapters in src/db and src/services implement them.

export type DocumentRole = 'seed' | 'corpus';

export interface DocumentMetadata {
  title: string;
  authors: string[];
  year: number | null;
  venue: string | null;
  keywords: string[];
}

export interface DocumentRecord extends DocumentMetadata {
  id: string;
  role: DocumentRole;
  source_locator: string;
  content_hash: string;
  chunk_count: number;
  ingested_at: string; // ISO timestamp
}

export interface DocumentFilter {
  role?: DocumentRole;
  ids?: string[];
  yearMin?: number;
  yearMax?: number;
  author?: string;
  venue?: string;
  keywords?: string[];
}

export interface SourceDocument {
  id: string;
  role: DocumentRole;
  sourceLocator: string;
}

export interface ChunkVector {
  chunkIndex: number;
  vector: number[];
  text: string;
}

export interface ExtractedText {
  text: string;
  hints?: Partial<DocumentMetadata>;
}

export interface RankingEntry {
  documentId: string;
  metadata: DocumentMetadata;
  score: number;
}

export type IngestionStage = 'lookup' | 'extraction' | 'empty' | 'embedding' | 'persist' | 'prune';

export type DocumentOutcome =
  | { documentId: string; role: DocumentRole; status: 'persisted'; chunks: number }
  | { documentId: string; role: DocumentRole; status: 'unchanged' }
  | { documentId: string; role: DocumentRole; status: 'failed'; stage: IngestionStage; reasonCode: string; message: string };

export interface IngestionFailure {
  documentId: string;
  reasonCode: string;
  stage: IngestionStage;
  message: string;
}

export interface IngestionReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  discovered: number;
  succeeded: number; // persisted this run + unchanged
  unchanged: number;
  failed: IngestionFailure[];
  cancelled: string[];
  removed: string[];
  pruneError: string | null; // set when the stored documents could not be listed for pruning
  aborted: boolean;
  outcomes: DocumentOutcome[];
}

// Boundary contracts

export interface DocumentSource {
  listDocuments(role: DocumentRole): Promise<SourceDocument[]>;
  fetchBytes(sourceLocator: string): Promise<Buffer>;
}

export interface TextExtractor {
  extractText(bytes: Buffer, info: { filename: string }): Promise<ExtractedText>;
}

// Chunks are stamped with the content hash they were embedded from. Reads only return chunks whose hash matches
// the one on the document's metadata row, so vectors count once the metadata write that confirms them succeeds.
export type VectorKey = Pick<DocumentRecord, 'id' | 'content_hash'>;

export interface VectorStore {
  upsert(documentId: string, contentHash: string, chunks: ChunkVector[]): Promise<void>;
  fetchVectors(docs: VectorKey[]): Promise<Map<string, number[][]>>;
  fetchChunkTexts(doc: VectorKey, limit: number): Promise<string[]>;
  listDocumentIds(): Promise<string[]>;
  deleteAll(documentId: string): Promise<void>;
}

export interface MetadataStore {
  upsertDocument(record: DocumentRecord): Promise<void>;
  getDocument(id: string): Promise<DocumentRecord | null>;
  getDocuments(filter: DocumentFilter): Promise<DocumentRecord[]>;
  deleteDocument(id: string): Promise<void>;
  getSummary(documentId: string): Promise<string | null>;
  putSummary(documentId: string, summary: string): Promise<void>;
  recordIngestionRun(report: IngestionReport): Promise<void>;
  getLastIngestionRun(): Promise<IngestionReport | null>;
}

export interface EmbeddingProvider {
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface Summarizer {
  summarize(text: string): Promise<string>;
}
