// src/services/ranking.ts
// What: Ranks filtered corpus documents against a set of seed documents by embedding similarity.
// How: Validates the request with zod before touching any store, resolves seeds and the filtered corpus from the
//      metadata store (documents without metadata are never ranked), fetches chunk vectors, scores each corpus
//      document with a pluggable aggregation over (seed chunk, corpus chunk) cosine similarities, then sorts by
//      score desc / id asc and truncates to topN.

import { z } from 'zod';
import { DataIntegrityError, InvalidInput } from '../errors.js';
import baseLogger, { type Logger } from '../logging.js';
import type {
  DocumentFilter,
  DocumentMetadata,
  DocumentRecord,
  MetadataStore,
  RankingEntry,
  VectorStore,
} from '../models/types.js';

export const DEFAULT_TOP_N = 20;

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new DataIntegrityError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (!Number.isFinite(dot) || !Number.isFinite(denom)) {
    throw new DataIntegrityError('Vector contains non-finite components');
  }
  if (denom === 0) {
    throw new DataIntegrityError('Zero-magnitude vector cannot be scored');
  }
  // Clamp rounding drift so identical vectors score exactly within [-1, 1]
  return Math.min(1, Math.max(-1, dot / denom));
}

/**
 * Reduces the cosine similarities between one corpus document's chunks and every seed's chunks to one score.
 * `seeds` holds one entry per seed document, each the list of that seed's chunk vectors.
 */
export type AggregationStrategy = (seeds: number[][][], corpus: number[][]) => number;

/** Unweighted mean over every (seed chunk, corpus chunk) pair across all seeds. */
export const meanOfAllPairs: AggregationStrategy = (seeds, corpus) => {
  let sum = 0;
  let n = 0;
  for (const seed of seeds) {
    for (const s of seed) {
      for (const c of corpus) {
        sum += cosineSimilarity(s, c);
        n++;
      }
    }
  }
  return sum / n;
};

export const maxOfAllPairs: AggregationStrategy = (seeds, corpus) => {
  let best = -Infinity;
  for (const seed of seeds) {
    for (const s of seed) {
      for (const c of corpus) {
        best = Math.max(best, cosineSimilarity(s, c));
      }
    }
  }
  return best;
};

/** Mean over seeds of each seed's pairwise mean; every seed document counts once whatever its length. */
export const meanOfSeedMeans: AggregationStrategy = (seeds, corpus) => {
  const perSeed = seeds.map((seed) => meanOfAllPairs([seed], corpus));
  return perSeed.reduce((acc, x) => acc + x, 0) / perSeed.length;
};

export const AGGREGATION_STRATEGIES = {
  mean: meanOfAllPairs,
  max: maxOfAllPairs,
  'document-mean': meanOfSeedMeans,
} satisfies Record<string, AggregationStrategy>;

/** Pure metadata predicate; stores apply the same rules in their own query language. */
export function matchesFilter(doc: DocumentRecord, filter: DocumentFilter): boolean {
  if (filter.role && doc.role !== filter.role) return false;
  if (filter.ids && !filter.ids.includes(doc.id)) return false;
  if (filter.yearMin !== undefined || filter.yearMax !== undefined) {
    if (doc.year === null) return false;
    if (filter.yearMin !== undefined && doc.year < filter.yearMin) return false;
    if (filter.yearMax !== undefined && doc.year > filter.yearMax) return false;
  }
  if (filter.author) {
    const needle = filter.author.toLowerCase();
    if (!doc.authors.some((a) => a.toLowerCase().includes(needle))) return false;
  }
  if (filter.venue) {
    const needle = filter.venue.toLowerCase();
    if (!doc.venue || !doc.venue.toLowerCase().includes(needle)) return false;
  }
  if (filter.keywords && filter.keywords.length > 0) {
    const wanted = new Set(filter.keywords.map((k) => k.toLowerCase()));
    if (!doc.keywords.some((k) => wanted.has(k.toLowerCase()))) return false;
  }
  return true;
}

const trimmed = z.string().trim().min(1);

export const rankFilterSchema = z
  .object({
    yearMin: z.number().int().optional(),
    yearMax: z.number().int().optional(),
    author: trimmed.optional(),
    venue: trimmed.optional(),
    keywords: z.array(trimmed).optional(),
  })
  .strict()
  .refine((f) => f.yearMin === undefined || f.yearMax === undefined || f.yearMin <= f.yearMax, {
    message: 'yearMin must not exceed yearMax',
  });

export const rankRequestSchema = z.object({
  seedIds: z.array(trimmed).min(1, 'at least one seed document is required'),
  filter: rankFilterSchema.optional().default({}),
  topN: z.number().int().positive().optional().default(DEFAULT_TOP_N),
});

export type RankRequest = z.input<typeof rankRequestSchema>;

export interface RankingEngineDeps {
  vectorStore: VectorStore;
  metadataStore: MetadataStore;
  aggregation?: AggregationStrategy;
  logger?: Logger;
}

function metadataOf(doc: DocumentRecord): DocumentMetadata {
  return { title: doc.title, authors: doc.authors, year: doc.year, venue: doc.venue, keywords: doc.keywords };
}

export function compareEntries(a: RankingEntry, b: RankingEntry): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0;
}

export class RankingEngine {
  private readonly aggregate: AggregationStrategy;
  private readonly log: Logger;

  constructor(private readonly deps: RankingEngineDeps) {
    this.aggregate = deps.aggregation ?? meanOfAllPairs;
    this.log = deps.logger ?? baseLogger;
  }

  async rank(request: RankRequest): Promise<RankingEntry[]> {
    const parsed = rankRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidInput(parsed.error.errors.map((e) => `${e.path.join('.') || 'request'}: ${e.message}`).join('; '));
    }
    const seedIds = [...new Set(parsed.data.seedIds)];
    const { filter, topN } = parsed.data;

    const seedDocs = await this.deps.metadataStore.getDocuments({ ids: seedIds });
    const known = new Set(seedDocs.map((d) => d.id));
    const unknown = seedIds.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new InvalidInput(`Unknown seed document(s): ${unknown.join(', ')}`);
    }

    const seedSet = new Set(seedIds);
    const candidates = (await this.deps.metadataStore.getDocuments({ ...filter, role: 'corpus' })).filter(
      (d) => !seedSet.has(d.id),
    );
    if (candidates.length === 0) return [];

    const vectors = await this.deps.vectorStore.fetchVectors([...seedDocs, ...candidates]);

    const seedVectors = seedIds.map((id) => {
      const v = vectors.get(id) ?? [];
      if (v.length === 0) {
        throw new DataIntegrityError(`Seed document ${id} has metadata but no stored vectors`);
      }
      return v;
    });

    const entries: RankingEntry[] = [];
    const excluded: string[] = [];
    for (const doc of candidates) {
      const corpusVectors = vectors.get(doc.id) ?? [];
      if (corpusVectors.length === 0) {
        excluded.push(doc.id);
        continue;
      }
      entries.push({ documentId: doc.id, metadata: metadataOf(doc), score: this.aggregate(seedVectors, corpusVectors) });
    }
    if (excluded.length > 0) {
      this.log.warn({ excluded }, 'Corpus documents without vectors excluded from ranking');
    }

    entries.sort(compareEntries);
    this.log.debug({ seeds: seedIds.length, candidates: candidates.length, scored: entries.length, topN }, 'Ranked corpus');
    return entries.slice(0, topN);
  }
}
