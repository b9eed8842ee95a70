/**
 * src/services/markitdown.ts
 * What: Text extraction for source documents. PDFs (and other office formats) go through Python microsoft/markitdown,
 *       plain text and Markdown are decoded directly.
 * How: Spawns PYTHON_BIN with "-m markitdown -x <ext>", pipes the source bytes to stdin, may inject venv env via
 *      PYTHON_ENV, enforces timeout and max stdout size, captures stdout as Markdown, and rejects with a
 *      MarkitDownError (an ExtractionError) including a stderr excerpt on failures.
 */

import { spawn } from 'child_process';
import path from 'path';
import { ExtractionError } from '../errors.js';
import type { ExtractedText, TextExtractor } from '../models/types.js';
import { inferMetadataHints } from './metadataHints.js';

export type MarkitDownErrorCode = 'EXIT_NON_ZERO' | 'TIMEOUT' | 'SIZE_EXCEEDED';

export class MarkitDownError extends ExtractionError {
  readonly reason: MarkitDownErrorCode;
  constructor(reason: MarkitDownErrorCode, message: string, stderr?: string) {
    super(message, { stderr });
    this.reason = reason;
  }
}

export interface MarkitDownOptions {
  pythonBin: string;
  pythonEnv?: Record<string, string>;
  timeoutMs?: number; // default 300_000
  maxBytes?: number; // default 50MB
}

export function convertToMarkdown(bytes: Buffer, extension: string, opts: MarkitDownOptions): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? 300_000;
  const maxBytes = opts.maxBytes ?? 50 * 1024 * 1024;
  return new Promise((resolve, reject) => {
    const proc = spawn(opts.pythonBin, ['-m', 'markitdown', '-x', extension.replace(/^\./, '')], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...(opts.pythonEnv ?? {}) },
    });

    let settled = false;
    const fail = (err: MarkitDownError) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    };

    let stdoutBytes = 0;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    const timer = setTimeout(() => {
      proc.kill('SIGKILL');
      fail(new MarkitDownError('TIMEOUT', `markitdown timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    proc.stdout.on('data', (chunk: Buffer) => {
      stdoutBytes += chunk.length;
      if (stdoutBytes > maxBytes) {
        proc.kill('SIGKILL');
        fail(new MarkitDownError('SIZE_EXCEEDED', `markitdown output exceeded ${maxBytes} bytes`));
        return;
      }
      stdoutChunks.push(chunk);
    });

    proc.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    // EPIPE when the child exits before consuming stdin; the close handler reports the real failure.
    proc.stdin.on('error', () => undefined);

    proc.on('error', (err: Error) => {
      fail(new MarkitDownError('EXIT_NON_ZERO', `Failed to spawn markitdown: ${err.message}`));
    });

    proc.on('close', (code: number | null) => {
      if (settled) return;
      const stderrText = Buffer.concat(stderrChunks).toString('utf8');
      if (code !== 0) {
        fail(new MarkitDownError('EXIT_NON_ZERO', `markitdown exited with code ${code}`, stderrText.slice(0, 2000)));
        return;
      }
      settled = true;
      clearTimeout(timer);
      resolve(Buffer.concat(stdoutChunks).toString('utf8'));
    });

    proc.stdin.end(bytes);
  });
}

const PLAIN_TEXT = new Set(['.txt', '.md', '.markdown']);

export class MarkitDownExtractor implements TextExtractor {
  constructor(private readonly opts: MarkitDownOptions) {}

  async extractText(bytes: Buffer, info: { filename: string }): Promise<ExtractedText> {
    const ext = path.extname(info.filename).toLowerCase();
    const text = PLAIN_TEXT.has(ext) ? decodeUtf8(bytes, info.filename) : await convertToMarkdown(bytes, ext, this.opts);
    return { text, hints: inferMetadataHints(text) };
  }
}

export function decodeUtf8(bytes: Buffer, filename: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ExtractionError(`${filename} is not valid UTF-8`, { cause: err });
  }
}
