// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG System Types
 *
 * Defines interfaces for the Retrieval-Augmented Generation system
 * including chunks, configuration, and retrieval results.
 */

import { EXCLUDED_DIR_PARTS } from '../paths.js';

/**
 * A fixed-size line window of one file, with its embedding.
 */
export interface Chunk {
  /** `path:start-end`, unique within one index generation */
  id: string;
  /** Path relative to the workspace root, forward slashes */
  path: string;
  /** Line number where chunk starts (1-indexed, inclusive) */
  startLine: number;
  /** Line number where chunk ends (1-indexed, inclusive) */
  endLine: number;
  /** Raw text, line terminators included */
  text: string;
  /** Embedding vector; empty when the service returned none for this chunk */
  embedding: number[];
  /** Source file modification time at index time, epoch seconds */
  modifiedTime: number;
}

/**
 * Result from a RAG query. Scores live here, never on the stored chunk.
 */
export interface ScoredChunk {
  chunk: Chunk;
  /** Cosine similarity (-1 to 1, higher is more similar) */
  score: number;
}

/**
 * Per-workspace RAG settings.
 */
export interface RagSettings {
  enabled: boolean;
  topK: number;
}

export const DEFAULT_RAG_SETTINGS: RagSettings = {
  enabled: true,
  topK: 6,
};

/**
 * Options controlling which files are indexed and how they are chunked.
 */
export interface IndexerOptions {
  /** File name suffixes that are indexed */
  includeExtensions: string[];
  /** Directory name fragments to skip (substring match) */
  excludedDirs: string[];
  /** Lines per chunk window */
  chunkLines: number;
}

export const DEFAULT_INDEXER_OPTIONS: IndexerOptions = {
  includeExtensions: ['.py', '.ts', '.tsx', '.js', '.jsx', '.md', '.txt', '.json', '.yaml', '.yml'],
  excludedDirs: [...EXCLUDED_DIR_PARTS],
  chunkLines: 120,
};

/**
 * Outcome of an index build.
 */
export interface IndexBuildResult {
  chunks: Chunk[];
  /** Files walked in this build */
  totalFiles: number;
  /** Files that were re-chunked (all of them for a full build) */
  changedFiles: number;
  /** Chunks sent to the embedding service */
  embeddedChunks: number;
  /** Chunks reused from the previous index */
  carriedChunks: number;
  /** Chunks for which the service returned no vector */
  missingEmbeddings: number;
}

/**
 * Progress callback for indexing operations.
 */
export type IndexProgressCallback = (current: number, total: number, file: string) => void;
