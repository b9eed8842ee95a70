// src/services/scanner.ts
// What: Filesystem document source.
// How: Recursively walks <LIBRARY_DIR>/seed and <LIBRARY_DIR>/corpus; the directory a file sits under decides its
//      role. Locators are POSIX-style paths relative to the library root; ids are derived from the locator as
//      "<basename>_<first 8 hex of md5(locator)>", so the same file keeps its id across runs.

import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { ExtractionError } from '../errors.js';
import type { DocumentRole, DocumentSource, SourceDocument } from '../models/types.js';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.markdown'];

export function documentIdFor(sourceLocator: string): string {
  const base = path.posix.basename(sourceLocator, path.posix.extname(sourceLocator));
  const suffix = createHash('md5').update(sourceLocator).digest('hex').slice(0, 8);
  return `${base}_${suffix}`;
}

export function computeContentHash(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export class FilesystemDocumentSource implements DocumentSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async listDocuments(role: DocumentRole): Promise<SourceDocument[]> {
    const out: SourceDocument[] = [];
    const dir = path.join(this.root, role);
    try {
      await walk(dir, this.root, out, role);
    } catch (err) {
      // A missing role directory is an empty role, not an error
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }
    return out.sort((a, b) => a.sourceLocator.localeCompare(b.sourceLocator));
  }

  async fetchBytes(sourceLocator: string): Promise<Buffer> {
    const full = path.resolve(this.root, sourceLocator);
    if (!full.startsWith(this.root + path.sep)) {
      throw new ExtractionError(`Locator escapes library root: ${sourceLocator}`);
    }
    try {
      return await fs.readFile(full);
    } catch (err) {
      throw new ExtractionError(`Cannot read ${sourceLocator}`, { cause: err });
    }
  }
}

async function walk(dir: string, root: string, acc: SourceDocument[], role: DocumentRole): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      await walk(full, root, acc, role);
    } else if (e.isFile() && SUPPORTED_EXTENSIONS.includes(path.extname(e.name).toLowerCase())) {
      const sourceLocator = path.relative(root, full).split(path.sep).join('/');
      acc.push({ id: documentIdFor(sourceLocator), role, sourceLocator });
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
