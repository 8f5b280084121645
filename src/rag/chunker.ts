// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Line Chunker
 *
 * Splits a file into consecutive, non-overlapping windows of a fixed number
 * of lines. Windows that hold only whitespace are dropped.
 */

import type { Chunk } from './types.js';

export const DEFAULT_CHUNK_LINES = 120;

/**
 * Split content into lines, keeping each line's terminator so that joining
 * the lines gives back the original text.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  return content.split(/(?<=\n)/);
}

/**
 * Build the chunk id for a line range.
 */
export function chunkId(relativePath: string, startLine: number, endLine: number): string {
  return `${relativePath}:${startLine}-${endLine}`;
}

/**
 * Chunk one file's content.
 * Chunks come back with an empty embedding; the indexer fills it in.
 *
 * @param relativePath - Workspace-relative path, forward slashes
 * @param modifiedTime - File mtime in epoch seconds
 */
export function chunkByLines(
  content: string,
  relativePath: string,
  modifiedTime: number,
  chunkLines: number = DEFAULT_CHUNK_LINES
): Chunk[] {
  if (!Number.isInteger(chunkLines) || chunkLines < 1) {
    throw new RangeError(`chunkLines must be a positive integer, got ${chunkLines}`);
  }

  const lines = splitLines(content);
  const chunks: Chunk[] = [];

  for (let i = 0; i < lines.length; i += chunkLines) {
    const text = lines.slice(i, i + chunkLines).join('');
    if (text.trim().length === 0) continue;

    const startLine = i + 1;
    const endLine = Math.min(i + chunkLines, lines.length);
    chunks.push({
      id: chunkId(relativePath, startLine, endLine),
      path: relativePath,
      startLine,
      endLine,
      text,
      embedding: [],
      modifiedTime,
    });
  }

  return chunks;
}
