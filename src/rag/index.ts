// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG System Exports
 *
 * Main entry point for the RAG (Retrieval-Augmented Generation) system.
 */

// Types
export type {
  Chunk,
  ScoredChunk,
  RagSettings,
  IndexerOptions,
  IndexBuildResult,
  IndexProgressCallback,
} from './types.js';

export { DEFAULT_RAG_SETTINGS, DEFAULT_INDEXER_OPTIONS } from './types.js';

// Embedding providers
export {
  BaseEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
  normalizeEmbeddingsEndpoint,
  parseEmbeddingResponse,
} from './embeddings/index.js';
export type { EmbeddingConfig } from './embeddings/index.js';

// Core components
export { VectorStore } from './vector-store.js';
export { chunkByLines, splitLines, DEFAULT_CHUNK_LINES } from './chunker.js';
export { findIndexableFiles, assertWorkspace } from './walker.js';
export { Indexer } from './indexer.js';
export { Retriever, rankChunks } from './retriever.js';
export {
  isIndexStale,
  ensureRagIndexBuilt,
  sampleWithoutReplacement,
  DEFAULT_STALENESS_SAMPLE_SIZE,
  MAX_STARTUP_INDEX_FILES,
} from './staleness.js';
export type { IndexStartupStatus, StalenessOptions } from './staleness.js';
