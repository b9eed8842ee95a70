/**
 * src/config/env.ts
 * What: Environment configuration loader/validator with venv-aware Python interpreter resolution.
 * How: Loads .env via dotenv, validates with zod, and then computes the Python interpreter used by markitdown:
 *        - If PYTHON_BIN is set and non-empty: use it exactly. Do NOT set VIRTUAL_ENV or modify PATH.
 *        - Else if VENV_DIR points to a valid venv (platform-aware python path exists): use it and set
 *          PYTHON_ENV overlay with VIRTUAL_ENV and PATH (venv bin dir prepended).
 *        - Else default to "python3" and rely on PATH resolution at spawn time.
 *      loadConfig() is pure over the env object it receives; getConfig() validates process.env once, on first use.
 */

import 'dotenv/config';
import { z } from 'zod';
import fs from 'fs';
import path from 'path';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().int().positive().default(def),
  );

export const AGGREGATIONS = ['mean', 'max', 'document-mean'] as const;
export type AggregationName = (typeof AGGREGATIONS)[number];

const schema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  LIBRARY_DIR: z.string().min(1, 'LIBRARY_DIR is required'),
  OPENAI_EMBED_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: intWithDefault(1536),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  CHUNK_SIZE: intWithDefault(10_000),
  EMBED_BATCH_SIZE: intWithDefault(64),
  EMBED_CONCURRENCY: intWithDefault(2),
  INGEST_CONCURRENCY: intWithDefault(2),
  EMBED_MAX_ATTEMPTS: intWithDefault(4),
  EMBED_RETRY_BASE_MS: intWithDefault(500),
  EMBED_RETRY_MAX_MS: intWithDefault(20_000),
  RANK_AGGREGATION: z.enum(AGGREGATIONS).default('mean'),
  RANK_TOP_N: intWithDefault(20),
  SUMMARY_CHUNKS: intWithDefault(3),
  INGEST_INTERVAL_MS: intWithDefault(24 * 60 * 60 * 1000),
  // Fortnightly
  RERANK_INTERVAL_MS: intWithDefault(14 * 24 * 60 * 60 * 1000),
  MARKITDOWN_TIMEOUT_MS: intWithDefault(300_000),
  MARKITDOWN_MAX_BYTES: intWithDefault(50 * 1024 * 1024),
  PORT: intWithDefault(3000),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
});

export type ParsedEnv = z.infer<typeof schema>;

export interface AppConfig extends ParsedEnv {
  PYTHON_BIN: string; // Final resolved Python interpreter used for markitdown
  // Only defined when a venv interpreter is selected from VENV_DIR.
  PYTHON_ENV?: Record<string, string>;
}

function resolvePython(
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform,
): { bin: string; overlay?: Record<string, string> } {
  const rawPythonBin = (env.PYTHON_BIN ?? '').trim();
  if (rawPythonBin) return { bin: rawPythonBin };

  const rawVenvDir = (env.VENV_DIR ?? '').trim();
  if (!rawVenvDir) return { bin: 'python3' };

  const venvDirAbs = path.isAbsolute(rawVenvDir) ? rawVenvDir : path.resolve(process.cwd(), rawVenvDir);
  const isWin = platform === 'win32';
  const venvBinDir = isWin ? path.join(venvDirAbs, 'Scripts') : path.join(venvDirAbs, 'bin');
  const candidates = isWin
    ? [path.join(venvBinDir, 'python.exe')]
    : [path.join(venvBinDir, 'python3'), path.join(venvBinDir, 'python')];

  const found = candidates.find((p) => fs.existsSync(p));
  if (!found) return { bin: 'python3' };
  return {
    bin: found,
    overlay: {
      VIRTUAL_ENV: venvDirAbs,
      PATH: `${venvBinDir}${path.delimiter}${env.PATH || ''}`,
    },
  };
}

export function loadConfig(env: NodeJS.ProcessEnv, platform: NodeJS.Platform = process.platform): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const python = resolvePython(env, platform);
  return {
    ...parsed.data,
    PYTHON_BIN: python.bin,
    PYTHON_ENV: python.overlay,
  };
}

let cached: AppConfig | undefined;

// Resolved on first use so modules that only need types never trip validation.
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig(process.env);
  return cached;
}
