import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FilesystemDocumentSource, computeContentHash, documentIdFor } from '../src/services/scanner.js';
import { ExtractionError } from '../src/errors.js';
import { MarkitDownExtractor, decodeUtf8 } from '../src/services/markitdown.js';

describe('documentIdFor', () => {
  it('is stable and distinguishes same-named files in different folders', () => {
    expect(documentIdFor('corpus/a/paper.pdf')).toBe(documentIdFor('corpus/a/paper.pdf'));
    expect(documentIdFor('corpus/a/paper.pdf')).toMatch(/^paper_[0-9a-f]{8}$/);
    expect(documentIdFor('corpus/a/paper.pdf')).not.toBe(documentIdFor('corpus/b/paper.pdf'));
  });
});

describe('computeContentHash', () => {
  it('is the sha256 hex digest of the bytes', () => {
    expect(computeContentHash(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });
});

describe('FilesystemDocumentSource', () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'library-'));
    fs.mkdirSync(path.join(root, 'seed'));
    fs.mkdirSync(path.join(root, 'corpus', 'nested'), { recursive: true });
    fs.writeFileSync(path.join(root, 'seed', 'mine.md'), '# My paper');
    fs.writeFileSync(path.join(root, 'corpus', 'b.txt'), 'bee');
    fs.writeFileSync(path.join(root, 'corpus', 'nested', 'a.PDF'), '%PDF-1.4');
    fs.writeFileSync(path.join(root, 'corpus', 'notes.docx'), 'ignored');
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists supported files under each role directory, sorted by locator', async () => {
    const source = new FilesystemDocumentSource(root);
    expect((await source.listDocuments('corpus')).map((d) => [d.sourceLocator, d.role])).toEqual([
      ['corpus/b.txt', 'corpus'],
      ['corpus/nested/a.PDF', 'corpus'],
    ]);
    expect(await source.listDocuments('seed')).toEqual([
      { id: documentIdFor('seed/mine.md'), role: 'seed', sourceLocator: 'seed/mine.md' },
    ]);
  });

  it('treats a missing role directory as empty', async () => {
    const source = new FilesystemDocumentSource(path.join(root, 'corpus'));
    expect(await source.listDocuments('seed')).toEqual([]);
  });

  it('reads bytes by locator and refuses paths outside the root', async () => {
    const source = new FilesystemDocumentSource(root);
    expect((await source.fetchBytes('corpus/b.txt')).toString('utf8')).toBe('bee');
    await expect(source.fetchBytes('../outside.txt')).rejects.toBeInstanceOf(ExtractionError);
    await expect(source.fetchBytes('corpus/missing.txt')).rejects.toBeInstanceOf(ExtractionError);
  });
});

describe('plain-text extraction', () => {
  it('decodes text files directly and attaches inferred hints', async () => {
    const extractor = new MarkitDownExtractor({ pythonBin: 'python3' });
    const result = await extractor.extractText(Buffer.from('A Study of Things in 2020\nbody'), { filename: 'x.txt' });
    expect(result).toEqual({ text: 'A Study of Things in 2020\nbody', hints: { title: 'A Study of Things in 2020', year: 2020 } });
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(() => decodeUtf8(Buffer.from([0xff, 0xfe, 0x00]), 'bad.txt')).toThrow(ExtractionError);
  });
});
