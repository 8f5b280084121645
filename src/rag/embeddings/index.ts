// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Provider Factory
 */

import { BaseEmbeddingProvider } from './base.js';
import { OllamaEmbeddingProvider, type EmbeddingConfig } from './ollama.js';

export { BaseEmbeddingProvider, QueryEmbeddingCache } from './base.js';
export type { QueryCacheOptions } from './base.js';
export {
  OllamaEmbeddingProvider,
  normalizeEmbeddingsEndpoint,
  parseEmbeddingResponse,
  DEFAULT_EMBEDDING_CONFIG,
  EMBED_BATCH_SIZE,
} from './ollama.js';
export type { EmbeddingConfig, EmbeddingResponse } from './ollama.js';

/**
 * Create the embedding provider for a resolved configuration.
 */
export function createEmbeddingProvider(config: Partial<EmbeddingConfig> = {}): BaseEmbeddingProvider {
  return new OllamaEmbeddingProvider(config);
}
