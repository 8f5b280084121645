// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * RAG Retriever
 *
 * Ranks indexed chunks against a query by cosine similarity.
 */

import type { Chunk, ScoredChunk } from './types.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import type { Indexer } from './indexer.js';
import { cosineSimilarity } from '../utils/vector.js';

/**
 * Rank chunks against a query vector.
 * The sort is stable, so equal scores keep their index order.
 */
export function rankChunks(queryVector: number[], chunks: Chunk[], topK: number): ScoredChunk[] {
  if (topK <= 0) return [];
  return chunks
    .map((chunk) => ({ chunk, score: cosineSimilarity(queryVector, chunk.embedding) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, topK);
}

/**
 * Retriever for querying the chunk index.
 */
export class Retriever {
  private indexer: Indexer;
  private embeddingProvider: BaseEmbeddingProvider;

  constructor(indexer: Indexer, embeddingProvider: BaseEmbeddingProvider) {
    this.indexer = indexer;
    this.embeddingProvider = embeddingProvider;
  }

  /**
   * Load the persisted index, building it first when it is empty.
   */
  async loadIndex(): Promise<Chunk[]> {
    const chunks = await this.indexer.getVectorStore().load();
    if (chunks.length > 0) {
      return chunks;
    }
    const result = await this.indexer.buildIndex();
    return result.chunks;
  }

  /**
   * Return the topK chunks most similar to the query, best first.
   * An empty list means the query produced no embedding or nothing is indexed.
   */
  async retrieve(query: string, topK: number): Promise<ScoredChunk[]> {
    const chunks = await this.loadIndex();
    const queryVector = await this.embeddingProvider.embedOne(query);
    if (!queryVector) {
      return [];
    }
    return rankChunks(queryVector, chunks, topK);
  }

  /**
   * Format results as evidence text: a `path:start-end (score=…)` header
   * followed by the chunk text, one block per result.
   */
  formatAsEvidence(results: ScoredChunk[]): string {
    return results
      .map(({ chunk, score }) =>
        `${chunk.path}:${chunk.startLine}-${chunk.endLine} (score=${score.toFixed(3)})\n${chunk.text.trim()}`
      )
      .join('\n\n');
  }
}
