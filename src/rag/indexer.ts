// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Indexer
 *
 * Walks a workspace, chunks files into line windows, embeds them and
 * persists the full chunk set.
 * Features:
 * - Full rebuilds
 * - Incremental updates (only new or modified files are re-embedded)
 * - Explicit accounting of chunks the embedding service returned no vector for
 */

import * as fs from 'fs';
import type {
  Chunk,
  IndexBuildResult,
  IndexerOptions,
  IndexProgressCallback,
} from './types.js';
import { DEFAULT_INDEXER_OPTIONS } from './types.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import { VectorStore } from './vector-store.js';
import { chunkByLines } from './chunker.js';
import { assertWorkspace, findIndexableFiles, type WorkspaceFile } from './walker.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Earliest recorded modification time per indexed path.
 */
export function indexedModifiedTimes(chunks: Chunk[]): Map<string, number> {
  const times = new Map<string, number>();
  for (const chunk of chunks) {
    const seen = times.get(chunk.path);
    if (seen === undefined || chunk.modifiedTime < seen) {
      times.set(chunk.path, chunk.modifiedTime);
    }
  }
  return times;
}

/**
 * Builds and updates the chunk index for one workspace.
 */
export class Indexer {
  private readonly workspaceRoot: string;
  private readonly embeddingProvider: BaseEmbeddingProvider;
  private readonly vectorStore: VectorStore;
  private readonly options: IndexerOptions;

  /** Progress callback */
  onProgress: IndexProgressCallback | null = null;

  constructor(
    workspaceRoot: string,
    embeddingProvider: BaseEmbeddingProvider,
    vectorStore?: VectorStore,
    options: Partial<IndexerOptions> = {}
  ) {
    this.workspaceRoot = workspaceRoot;
    this.embeddingProvider = embeddingProvider;
    this.vectorStore = vectorStore ?? new VectorStore(workspaceRoot);
    this.options = { ...DEFAULT_INDEXER_OPTIONS, ...options };
  }

  /**
   * Get the vector store instance.
   */
  getVectorStore(): VectorStore {
    return this.vectorStore;
  }

  getWorkspaceRoot(): string {
    return this.workspaceRoot;
  }

  /**
   * Count the files a build would walk.
   */
  async countEligibleFiles(): Promise<number> {
    await assertWorkspace(this.workspaceRoot);
    const files = await findIndexableFiles(this.workspaceRoot, this.options);
    return files.length;
  }

  /**
   * Rebuild the index from scratch and persist it.
   */
  async buildIndex(): Promise<IndexBuildResult> {
    await assertWorkspace(this.workspaceRoot);
    const files = await findIndexableFiles(this.workspaceRoot, this.options);

    const chunks: Chunk[] = [];
    for (let i = 0; i < files.length; i++) {
      const fileChunks = await this.chunkFile(files[i]);
      if (fileChunks) chunks.push(...fileChunks);
      this.reportProgress(i + 1, files.length, files[i].relativePath);
    }

    const missingEmbeddings = await this.embedInto(chunks);
    await this.vectorStore.save(chunks);

    logger.verbose(`Indexed ${files.length} files into ${chunks.length} chunks`);
    return {
      chunks,
      totalFiles: files.length,
      changedFiles: files.length,
      embeddedChunks: chunks.length,
      carriedChunks: 0,
      missingEmbeddings,
    };
  }

  /**
   * Update the persisted index, re-embedding only new or modified files and
   * files with a chunk that has no vector. Files that no longer exist drop
   * out of the index.
   */
  async buildIndexIncremental(): Promise<IndexBuildResult> {
    await assertWorkspace(this.workspaceRoot);
    const existing = await this.vectorStore.load();
    const recordedTimes = indexedModifiedTimes(existing);

    const existingByPath = new Map<string, Chunk[]>();
    for (const chunk of existing) {
      const list = existingByPath.get(chunk.path);
      if (list) {
        list.push(chunk);
      } else {
        existingByPath.set(chunk.path, [chunk]);
      }
    }

    const files = await findIndexableFiles(this.workspaceRoot, this.options);
    const chunks: Chunk[] = [];
    const changed: Chunk[] = [];
    let changedFiles = 0;
    let carriedChunks = 0;

    for (let i = 0; i < files.length; i++) {
      const file = files[i];
      this.reportProgress(i + 1, files.length, file.relativePath);

      const recorded = recordedTimes.get(file.relativePath);
      if (recorded !== undefined) {
        const current = await this.modifiedTime(file);
        const carried = existingByPath.get(file.relativePath) ?? [];
        // Chunks stored without a vector get another embedding attempt
        if (current !== null && current <= recorded && carried.every((chunk) => chunk.embedding.length > 0)) {
          chunks.push(...carried);
          carriedChunks += carried.length;
          continue;
        }
      }

      const fileChunks = await this.chunkFile(file);
      if (!fileChunks) continue;
      changedFiles++;
      chunks.push(...fileChunks);
      changed.push(...fileChunks);
    }

    const missingEmbeddings = changed.length > 0 ? await this.embedInto(changed) : 0;
    await this.vectorStore.save(chunks);

    logger.verbose(
      `Index updated: ${changedFiles} changed files, ${changed.length} chunks embedded, ${carriedChunks} carried forward`
    );
    return {
      chunks,
      totalFiles: files.length,
      changedFiles,
      embeddedChunks: changed.length,
      carriedChunks,
      missingEmbeddings,
    };
  }

  /**
   * Embed chunk texts in one batched call and attach vectors by position.
   * @returns Number of chunks left without a vector
   */
  private async embedInto(chunks: Chunk[]): Promise<number> {
    if (chunks.length === 0) return 0;

    const vectors = await this.embeddingProvider.embedAligned(chunks.map((c) => c.text));
    let missing = 0;
    for (let i = 0; i < chunks.length; i++) {
      const vector = vectors[i] ?? null;
      if (vector) {
        chunks[i].embedding = vector;
      } else {
        chunks[i].embedding = [];
        missing++;
      }
    }

    if (missing > 0) {
      logger.warn(`${missing} of ${chunks.length} chunks received no embedding and will never match a query`);
    }
    return missing;
  }

  /**
   * Read and chunk one file. Unreadable files are logged and skipped.
   */
  private async chunkFile(file: WorkspaceFile): Promise<Chunk[] | null> {
    try {
      const stat = await fs.promises.stat(file.absolutePath);
      const content = await fs.promises.readFile(file.absolutePath, 'utf-8');
      return chunkByLines(content, file.relativePath, stat.mtimeMs / 1000, this.options.chunkLines);
    } catch (error) {
      logger.warn(`Skipping ${file.relativePath}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async modifiedTime(file: WorkspaceFile): Promise<number | null> {
    try {
      const stat = await fs.promises.stat(file.absolutePath);
      return stat.mtimeMs / 1000;
    } catch {
      return null;
    }
  }

  private reportProgress(current: number, total: number, file: string): void {
    logger.indexProgress(current, total, file);
    this.onProgress?.(current, total, file);
  }
}
