// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 */

import type { EmbeddingConfig } from '../rag/embeddings/index.js';

/**
 * Settings read from the environment once, at the CLI boundary, and passed
 * down explicitly from there.
 */
export interface EnvironmentConfig {
  /** Embedding service settings */
  embedding: EmbeddingConfig;
  /** Ollama server root for text generation (scheme + host, no path) */
  ollamaBaseUrl: string;
  /** API key for the hosted model backend */
  anthropicApiKey?: string;
  /** Model profile requested through the environment */
  modelProfile?: string;
}
