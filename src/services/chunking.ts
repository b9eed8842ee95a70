// src/services/chunking.ts
// What: Bounded-size chunking of extracted document text.
// How: Walks the text in windows of at most maxSize characters. Each window is cut after the last
//      whitespace run it contains so words stay whole; windows without whitespace are hard-cut,
//      keeping surrogate pairs together.
//      No character is trimmed or dropped: joining the chunks in order yields the input exactly.

import { InvalidInput } from '../errors.js';

export function chunkText(text: string, maxSize: number): string[] {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new InvalidInput(`maxSize must be a positive integer, got ${maxSize}`);
  }

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    const remaining = text.length - start;
    if (remaining <= maxSize) {
      chunks.push(text.slice(start));
      break;
    }
    const end = start + cutPoint(text.slice(start, start + maxSize), text.charAt(start + maxSize));
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

// Length of the prefix of `window` to emit. `next` is the first character after the window.
function cutPoint(window: string, next: string): number {
  // The window already ends on a word boundary
  if (/\s/.test(next)) {
    return window.length;
  }
  for (let i = window.length - 1; i >= 0; i--) {
    if (/\s/.test(window.charAt(i))) {
      return i + 1;
    }
  }
  return hardCut(window, next);
}

// A hard cut never separates a surrogate pair; a one-unit window takes the whole pair instead.
function hardCut(window: string, next: string): number {
  const last = window.charCodeAt(window.length - 1);
  const following = next.charCodeAt(0);
  if (last >= 0xd800 && last <= 0xdbff && following >= 0xdc00 && following <= 0xdfff) {
    return window.length > 1 ? window.length - 1 : window.length + 1;
  }
  return window.length;
}
