// src/db/metadataStore.ts
// What: Postgres metadata store: document metadata, cached summaries and ingestion run history.
// How: Upserts by primary key (ON CONFLICT ... DO UPDATE) so re-ingestion and duplicate summary writes replace
//      rows instead of appending. Filters are compiled by buildDocumentWhere(); timestamps come back as ISO strings.

import type { Db } from './pool.js';
import type { DocumentFilter, DocumentRecord, DocumentRole, IngestionReport, MetadataStore } from '../models/types.js';
import { buildDocumentWhere } from '../util/sql.js';

interface DocumentRow {
  id: string;
  role: DocumentRole;
  title: string;
  authors: string[] | null;
  year: number | null;
  venue: string | null;
  keywords: string[] | null;
  source_locator: string;
  content_hash: string;
  chunk_count: number;
  ingested_at: Date;
}

const DOCUMENT_COLUMNS =
  'id, role, title, authors, year, venue, keywords, source_locator, content_hash, chunk_count, ingested_at';

function toRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    role: row.role,
    title: row.title,
    authors: row.authors ?? [],
    year: row.year,
    venue: row.venue,
    keywords: row.keywords ?? [],
    source_locator: row.source_locator,
    content_hash: row.content_hash,
    chunk_count: Number(row.chunk_count),
    ingested_at: new Date(row.ingested_at).toISOString(),
  };
}

export class PgMetadataStore implements MetadataStore {
  constructor(private readonly db: Db) {}

  async upsertDocument(record: DocumentRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO documents (${DOCUMENT_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (id) DO UPDATE SET
         role = EXCLUDED.role,
         title = EXCLUDED.title,
         authors = EXCLUDED.authors,
         year = EXCLUDED.year,
         venue = EXCLUDED.venue,
         keywords = EXCLUDED.keywords,
         source_locator = EXCLUDED.source_locator,
         content_hash = EXCLUDED.content_hash,
         chunk_count = EXCLUDED.chunk_count,
         ingested_at = EXCLUDED.ingested_at,
         updated_at = NOW()`,
      [
        record.id,
        record.role,
        record.title,
        record.authors,
        record.year,
        record.venue,
        record.keywords,
        record.source_locator,
        record.content_hash,
        record.chunk_count,
        record.ingested_at,
      ],
    );
  }

  async getDocument(id: string): Promise<DocumentRecord | null> {
    const res = await this.db.query<DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1 LIMIT 1`, [id]);
    const row = res.rows[0];
    return row ? toRecord(row) : null;
  }

  async getDocuments(filter: DocumentFilter): Promise<DocumentRecord[]> {
    const { where, params } = buildDocumentWhere(filter);
    const res = await this.db.query<DocumentRow>(`SELECT ${DOCUMENT_COLUMNS} FROM documents ${where} ORDER BY id`, params);
    return res.rows.map(toRecord);
  }

  async deleteDocument(id: string): Promise<void> {
    // summaries cascade
    await this.db.query('DELETE FROM documents WHERE id = $1', [id]);
  }

  async getSummary(documentId: string): Promise<string | null> {
    const res = await this.db.query<{ summary: string }>('SELECT summary FROM summaries WHERE document_id = $1', [
      documentId,
    ]);
    return res.rows[0]?.summary ?? null;
  }

  async putSummary(documentId: string, summary: string): Promise<void> {
    await this.db.query(
      `INSERT INTO summaries (document_id, summary, generated_at) VALUES ($1, $2, NOW())
       ON CONFLICT (document_id) DO UPDATE SET summary = EXCLUDED.summary, generated_at = NOW()`,
      [documentId, summary],
    );
  }

  async recordIngestionRun(report: IngestionReport): Promise<void> {
    await this.db.query(
      `INSERT INTO ingestion_runs (id, started_at, finished_at, succeeded, failed_count, aborted, report)
       VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)`,
      [
        report.runId,
        report.startedAt,
        report.finishedAt,
        report.succeeded,
        report.failed.length,
        report.aborted,
        JSON.stringify(report),
      ],
    );
  }

  async getLastIngestionRun(): Promise<IngestionReport | null> {
    const res = await this.db.query<{ report: IngestionReport }>(
      'SELECT report FROM ingestion_runs ORDER BY finished_at DESC LIMIT 1',
    );
    return res.rows[0]?.report ?? null;
  }
}
