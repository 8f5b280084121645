// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vector Store
 *
 * JSON-file persistence for one workspace's chunk index. Every save writes
 * the complete chunk set; there is no append or merge.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Chunk } from './types.js';
import { IndexFormatError } from '../errors.js';
import { WorkspacePaths } from '../paths.js';

/**
 * On-disk shape of one chunk.
 */
interface ChunkRecord {
  id: string;
  path: string;
  start_line: number;
  end_line: number;
  text: string;
  embedding: number[];
  /** Written as 0; scores belong to a single retrieval call */
  score: number;
  modified_time: number;
}

function isChunkRecord(value: unknown): value is ChunkRecord {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === 'string' &&
    typeof record.path === 'string' &&
    typeof record.start_line === 'number' &&
    typeof record.end_line === 'number' &&
    typeof record.text === 'string' &&
    Array.isArray(record.embedding) &&
    record.embedding.every((n: unknown) => typeof n === 'number') &&
    typeof record.modified_time === 'number'
  );
}

function toRecord(chunk: Chunk): ChunkRecord {
  return {
    id: chunk.id,
    path: chunk.path,
    start_line: chunk.startLine,
    end_line: chunk.endLine,
    text: chunk.text,
    embedding: chunk.embedding,
    score: 0,
    modified_time: chunk.modifiedTime,
  };
}

function fromRecord(record: ChunkRecord): Chunk {
  return {
    id: record.id,
    path: record.path,
    startLine: record.start_line,
    endLine: record.end_line,
    text: record.text,
    embedding: record.embedding,
    modifiedTime: record.modified_time,
  };
}

/**
 * File-backed chunk store.
 */
export class VectorStore {
  private indexPath: string;

  /**
   * @param workspaceRoot - Workspace whose index this store owns
   * @param indexPath - Explicit index file; defaults to the hidden file in the workspace root
   */
  constructor(workspaceRoot: string, indexPath?: string) {
    this.indexPath = indexPath ?? WorkspacePaths.ragIndex(workspaceRoot);
  }

  /**
   * Get the index file path.
   */
  getPath(): string {
    return this.indexPath;
  }

  /**
   * Check whether an index has been persisted.
   */
  exists(): boolean {
    return fs.existsSync(this.indexPath);
  }

  /**
   * Load every persisted chunk, in stored order.
   * Returns an empty list when no index file exists.
   */
  async load(): Promise<Chunk[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.indexPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new IndexFormatError(
        `Index file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        this.indexPath
      );
    }

    if (!Array.isArray(data)) {
      throw new IndexFormatError('Index file does not contain an array of chunks', this.indexPath);
    }

    const chunks: Chunk[] = [];
    for (let i = 0; i < data.length; i++) {
      const item: unknown = data[i];
      if (!isChunkRecord(item)) {
        throw new IndexFormatError(`Malformed chunk record at position ${i}`, this.indexPath);
      }
      chunks.push(fromRecord(item));
    }
    return chunks;
  }

  /**
   * Replace the persisted index with the given chunks.
   */
  async save(chunks: Chunk[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.indexPath), { recursive: true });
    const records = chunks.map(toRecord);
    await fs.promises.writeFile(this.indexPath, JSON.stringify(records, null, 2), 'utf-8');
  }

  /**
   * Delete the index file.
   */
  async clear(): Promise<void> {
    await fs.promises.rm(this.indexPath, { force: true });
  }
}
