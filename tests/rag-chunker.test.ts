// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { chunkByLines, chunkId, splitLines } from '../src/rag/chunker.js';
import { numberedLines } from './helpers/workspace.js';

describe('splitLines', () => {
  it('returns no lines for empty content', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('keeps line terminators', () => {
    expect(splitLines('a\nb\n')).toEqual(['a\n', 'b\n']);
  });

  it('keeps a final line without a terminator', () => {
    expect(splitLines('a\nb')).toEqual(['a\n', 'b']);
  });
});

describe('chunkByLines', () => {
  it('splits 250 lines into windows of 120, 120 and 10', () => {
    const chunks = chunkByLines(numberedLines(250), 'src/big.py', 100);

    expect(chunks.map((c) => [c.startLine, c.endLine])).toEqual([
      [1, 120],
      [121, 240],
      [241, 250],
    ]);
    expect(chunks.map((c) => c.id)).toEqual(['src/big.py:1-120', 'src/big.py:121-240', 'src/big.py:241-250']);
  });

  it('reconstructs the file when chunk texts are concatenated', () => {
    const content = numberedLines(250);
    const chunks = chunkByLines(content, 'a.txt', 1);
    expect(chunks.map((c) => c.text).join('')).toBe(content);
  });

  it('reconstructs content without a trailing newline', () => {
    const content = 'first\nsecond\nthird';
    const chunks = chunkByLines(content, 'a.txt', 1, 2);
    expect(chunks.map((c) => c.text)).toEqual(['first\nsecond\n', 'third']);
    expect(chunks[1].endLine).toBe(3);
  });

  it('produces a single chunk for a one-line file', () => {
    const chunks = chunkByLines('print("hi")\n', 'main.py', 1);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toEqual({
      id: 'main.py:1-1',
      path: 'main.py',
      startLine: 1,
      endLine: 1,
      text: 'print("hi")\n',
      embedding: [],
      modifiedTime: 1,
    });
  });

  it('returns nothing for an empty file', () => {
    expect(chunkByLines('', 'empty.md', 1)).toEqual([]);
  });

  it('skips windows that hold only whitespace', () => {
    const content = 'a\nb\n\n  \nc\n';
    const chunks = chunkByLines(content, 'x.md', 1, 2);
    expect(chunks.map((c) => c.id)).toEqual(['x.md:1-2', 'x.md:5-5']);
  });

  it('records the modification time on every chunk', () => {
    const chunks = chunkByLines(numberedLines(5), 'x.md', 1234.5, 2);
    expect(chunks.every((c) => c.modifiedTime === 1234.5)).toBe(true);
  });

  it('rejects a non-positive window size', () => {
    expect(() => chunkByLines('a\n', 'x.md', 1, 0)).toThrow(RangeError);
    expect(() => chunkByLines('a\n', 'x.md', 1, 1.5)).toThrow(RangeError);
  });
});

describe('chunkId', () => {
  it('joins path and line range', () => {
    expect(chunkId('src/a.ts', 3, 9)).toBe('src/a.ts:3-9');
  });
});
