// src/services/metadataHints.ts
// What: Heuristic paper metadata (title, authors, year, venue, keywords) from the first page of extracted text.
// How: Looks only at the leading FIRST_PAGE_CHARS characters. Title = first substantial non-shouting line,
//      authors = first short line of capitalised names separated by commas/"and", year = first 19xx/20xx token,
//      venue = first "Proceedings of…/Conference on…/Journal of…" style phrase, keywords = "Keywords:" line.
//      Anything not found is left out so callers can layer extractor hints and defaults on top.

import path from 'path';
import type { DocumentMetadata } from '../models/types.js';

const FIRST_PAGE_CHARS = 4000;

const VENUE_PATTERNS = [
  /Proceedings of[^.\n]*/i,
  /International Conference[^.\n]*/i,
  /Conference on[^.\n]*/i,
  /Journal of[^.\n]*/i,
  /\bIEEE\b[^.\n]*/,
  /\bACM\b[^.\n]*/,
];

const NAME = /^[A-Z][\p{L}'’.-]*(?:\s+[A-Z][\p{L}'’.-]*){1,3}$/u;

function cleanLine(line: string): string {
  return line.replace(/^[#>*\s]+/, '').replace(/[*_`]+/g, '').trim();
}

function firstPageLines(text: string): string[] {
  return text
    .slice(0, FIRST_PAGE_CHARS)
    .split(/\r?\n/)
    .map(cleanLine)
    .filter((l) => l.length > 0);
}

export function inferTitle(lines: string[]): string | undefined {
  return lines.slice(0, 10).find((l) => l.length > 10 && l !== l.toUpperCase() && !/^abstract\b/i.test(l));
}

export function inferAuthors(lines: string[], title?: string): string[] | undefined {
  for (const line of lines.slice(0, 15)) {
    if (line === title || line.split(/\s+/).length >= 12) continue;
    if (!/,|\band\b/.test(line)) continue;
    const parts = line
      .split(/\s*,\s*|\s+and\s+/)
      .map((p) => p.replace(/[\d*†‡§]+$/u, '').trim())
      .filter((p) => p.length > 0);
    if (parts.length > 0 && parts.every((p) => NAME.test(p))) {
      return parts;
    }
  }
  return undefined;
}

export function inferYear(page: string): number | undefined {
  const m = page.match(/\b(19|20)\d{2}\b/);
  return m ? Number(m[0]) : undefined;
}

export function inferVenue(page: string): string | undefined {
  for (const pattern of VENUE_PATTERNS) {
    const m = page.match(pattern);
    if (m) return m[0].trim();
  }
  return undefined;
}

export function inferKeywords(page: string): string[] | undefined {
  const m = page.match(/\b(?:keywords?|index terms)\s*[:\-—–]\s*([^\n]+)/i);
  if (!m) return undefined;
  const keywords = m[1]
    .split(/[,;·•]/)
    .map((k) => k.trim().replace(/\.$/, ''))
    .filter((k) => k.length > 0);
  return keywords.length > 0 ? keywords : undefined;
}

export function inferMetadataHints(text: string): Partial<DocumentMetadata> {
  const page = text.slice(0, FIRST_PAGE_CHARS);
  const lines = firstPageLines(text);
  const title = inferTitle(lines);
  const hints: Partial<DocumentMetadata> = {};
  if (title) hints.title = title;
  const authors = inferAuthors(lines, title);
  if (authors) hints.authors = authors;
  const year = inferYear(page);
  if (year !== undefined) hints.year = year;
  const venue = inferVenue(page);
  if (venue) hints.venue = venue;
  const keywords = inferKeywords(page);
  if (keywords) hints.keywords = keywords;
  return hints;
}

/**
 * Merge metadata layers; earlier layers win. The title falls back to the file name without extension.
 * Keywords are de-duplicated case-insensitively, keeping the first spelling.
 */
export function mergeMetadata(sourceLocator: string, ...layers: Array<Partial<DocumentMetadata> | undefined>): DocumentMetadata {
  const pick = <K extends keyof DocumentMetadata>(key: K): DocumentMetadata[K] | undefined => {
    for (const layer of layers) {
      const value = layer?.[key];
      if (value !== undefined && value !== null && !(Array.isArray(value) && value.length === 0) && value !== '') {
        return value;
      }
    }
    return undefined;
  };

  const seen = new Set<string>();
  const keywords = (pick('keywords') ?? []).filter((k) => {
    const key = k.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return {
    title: pick('title') ?? path.basename(sourceLocator, path.extname(sourceLocator)),
    authors: pick('authors') ?? [],
    year: pick('year') ?? null,
    venue: pick('venue') ?? null,
    keywords,
  };
}
