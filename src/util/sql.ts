// src/util/sql.ts
// What: SQL helpers for pgvector literals and document filters.
// How: vectorToParam formats an array for ::vector casting and parseVectorLiteral reads embedding::text back.
//      buildDocumentWhere turns a DocumentFilter into a parameterised WHERE clause with the same semantics
//      as matchesFilter() in services/ranking.ts.

import { DataIntegrityError } from '../errors.js';
import type { DocumentFilter } from '../models/types.js';

export function vectorToParam(v: number[]): string {
  // Postgres vector literal: [0.1,0.2,...]
  return `[${v.join(',')}]`;
}

export function parseVectorLiteral(literal: string): number[] {
  const body = literal.trim();
  if (!body.startsWith('[') || !body.endsWith(']')) {
    throw new DataIntegrityError(`Malformed vector literal: ${body.slice(0, 40)}`);
  }
  const inner = body.slice(1, -1).trim();
  if (inner === '') return [];
  return inner.split(',').map((part) => {
    const n = Number(part);
    if (part.trim() === '' || !Number.isFinite(n)) {
      throw new DataIntegrityError(`Malformed vector component: ${part}`);
    }
    return n;
  });
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

export function buildDocumentWhere(filter: DocumentFilter, startIndex = 1): { where: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const next = (value: unknown): string => {
    params.push(value);
    return `$${startIndex + params.length - 1}`;
  };

  if (filter.role) conditions.push(`role = ${next(filter.role)}`);
  if (filter.ids) conditions.push(`id = ANY(${next(filter.ids)}::text[])`);
  if (filter.yearMin !== undefined) conditions.push(`year >= ${next(filter.yearMin)}`);
  if (filter.yearMax !== undefined) conditions.push(`year <= ${next(filter.yearMax)}`);
  if (filter.author) {
    conditions.push(`EXISTS (SELECT 1 FROM unnest(authors) AS a WHERE a ILIKE ${next(`%${escapeLike(filter.author)}%`)})`);
  }
  if (filter.venue) conditions.push(`venue ILIKE ${next(`%${escapeLike(filter.venue)}%`)}`);
  if (filter.keywords && filter.keywords.length > 0) {
    const wanted = filter.keywords.map((k) => k.toLowerCase());
    conditions.push(`EXISTS (SELECT 1 FROM unnest(keywords) AS k WHERE lower(k) = ANY(${next(wanted)}::text[]))`);
  }

  return { where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '', params };
}
