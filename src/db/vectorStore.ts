// src/db/vectorStore.ts
// What: pgvector-backed vector store for chunk embeddings.
// How: upsert replaces a document's chunks wholesale inside one short transaction (DELETE then multi-row INSERT
//      with ::vector casting); reads go through pool.query so no client is held between calls. Every row carries the
//      content hash it was embedded from and reads only return rows matching the caller's hash. Embeddings are
//      read back as embedding::text and parsed, ordered by chunk index.

import logger from '../logging.js';
import type { Db } from './pool.js';
import type { ChunkVector, VectorKey, VectorStore } from '../models/types.js';
import { parseVectorLiteral, vectorToParam } from '../util/sql.js';

// Rows per INSERT statement; 5 params per row keeps well below the 65535 bind limit
const INSERT_BATCH = 200;

export class PgVectorStore implements VectorStore {
  constructor(private readonly db: Db) {}

  async upsert(documentId: string, contentHash: string, chunks: ChunkVector[]): Promise<void> {
    const client = await this.db.connect();
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;
      await client.query('DELETE FROM chunks WHERE document_id = $1', [documentId]);

      for (let offset = 0; offset < chunks.length; offset += INSERT_BATCH) {
        const batch = chunks.slice(offset, offset + INSERT_BATCH);
        const params: unknown[] = [];
        const values = batch.map((c) => {
          params.push(documentId, c.chunkIndex, contentHash, c.text, vectorToParam(c.vector));
          const n = params.length;
          return `($${n - 4}, $${n - 3}, $${n - 2}, $${n - 1}, $${n}::vector)`;
        });
        await client.query(
          `INSERT INTO chunks (document_id, chunk_index, content_hash, content, embedding) VALUES ${values.join(', ')}`,
          params,
        );
      }

      await client.query('COMMIT');
      inTx = false;
    } catch (err) {
      if (inTx) {
        await client.query('ROLLBACK').catch((rbErr: unknown) => {
          logger.warn({ err: rbErr, documentId }, 'Rollback failed');
        });
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async fetchVectors(docs: VectorKey[]): Promise<Map<string, number[][]>> {
    const out = new Map<string, number[][]>();
    if (docs.length === 0) return out;
    const res = await this.db.query<{ document_id: string; embedding: string }>(
      `SELECT c.document_id, c.embedding::text AS embedding
       FROM chunks c
       JOIN unnest($1::text[], $2::text[]) AS k(id, content_hash)
         ON k.id = c.document_id AND k.content_hash = c.content_hash
       ORDER BY c.document_id, c.chunk_index`,
      [docs.map((d) => d.id), docs.map((d) => d.content_hash)],
    );
    for (const row of res.rows) {
      const list = out.get(row.document_id) ?? [];
      list.push(parseVectorLiteral(row.embedding));
      out.set(row.document_id, list);
    }
    return out;
  }

  async fetchChunkTexts(doc: VectorKey, limit: number): Promise<string[]> {
    const res = await this.db.query<{ content: string }>(
      'SELECT content FROM chunks WHERE document_id = $1 AND content_hash = $2 ORDER BY chunk_index LIMIT $3',
      [doc.id, doc.content_hash, limit],
    );
    return res.rows.map((r) => r.content);
  }

  async listDocumentIds(): Promise<string[]> {
    const res = await this.db.query<{ document_id: string }>(
      'SELECT DISTINCT document_id FROM chunks ORDER BY document_id',
    );
    return res.rows.map((r) => r.document_id);
  }

  async deleteAll(documentId: string): Promise<void> {
    await this.db.query('DELETE FROM chunks WHERE document_id = $1', [documentId]);
  }
}
