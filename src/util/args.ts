// src/util/args.ts
// What: Hand-rolled CLI flag parsing.
// How: --name value pairs, repeatable --seed/--keyword collected into lists, bare --force/--prune as booleans;
//      everything else is positional.

import type { DocumentFilter } from '../models/types.js';

const BOOLEAN_FLAGS = new Set(['force', 'prune']);
const REPEATABLE_FLAGS = new Set(['seed', 'keyword']);

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string>;
  lists: Record<string, string[]>;
  booleans: Set<string>;
}

export function parseFlags(args: string[]): ParsedArgs {
  const out: ParsedArgs = { positional: [], flags: {}, lists: {}, booleans: new Set() };
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      out.positional.push(arg);
      i++;
      continue;
    }
    const name = arg.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      out.booleans.add(name);
      i++;
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Flag --${name} needs a value`);
    }
    if (REPEATABLE_FLAGS.has(name)) {
      (out.lists[name] ??= []).push(value);
    } else {
      out.flags[name] = value;
    }
    i += 2;
  }
  return out;
}

export function intFlag(flags: Record<string, string>, name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`--${name} must be an integer, got "${raw}"`);
  return n;
}

export function filterFromArgs(parsed: ParsedArgs): Omit<DocumentFilter, 'role' | 'ids'> {
  const filter: Omit<DocumentFilter, 'role' | 'ids'> = {};
  const yearMin = intFlag(parsed.flags, 'year-min');
  const yearMax = intFlag(parsed.flags, 'year-max');
  if (yearMin !== undefined) filter.yearMin = yearMin;
  if (yearMax !== undefined) filter.yearMax = yearMax;
  if (parsed.flags.author) filter.author = parsed.flags.author;
  if (parsed.flags.venue) filter.venue = parsed.flags.venue;
  if (parsed.lists.keyword) filter.keywords = parsed.lists.keyword;
  return filter;
}
