// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Environment Configuration
 *
 * The only place that reads process.env for the retrieval stack.
 */

import {
  DEFAULT_EMBEDDING_CONFIG,
  DEFAULT_EMBED_MODEL,
  DEFAULT_OLLAMA_HOST,
} from '../rag/embeddings/ollama.js';
import { logger } from '../logger.js';
import type { EnvironmentConfig } from './types.js';

/**
 * Reduce an OLLAMA_HOST value to `scheme://host[:port]`.
 */
export function normalizeOllamaBaseUrl(host: string): string {
  let normalized = host.trim();
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    normalized = `http://${normalized}`;
  }
  return normalized.replace(/\/+$/, '');
}

/**
 * Parse a timeout given in whole seconds.
 * @returns Milliseconds, or undefined when the value is unusable
 */
export function parseTimeoutSeconds(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) return undefined;
  return seconds * 1000;
}

/**
 * Resolve configuration from environment variables.
 *
 * - OLLAMA_HOST: embedding and local generation server (default http://127.0.0.1:11434)
 * - OLLAMA_EMBED_TIMEOUT: per-request embedding timeout in seconds (default 60)
 * - ASK_EMBED_MODEL: embedding model (default nomic-embed-text)
 * - ANTHROPIC_API_KEY: key for the hosted backend
 * - ASK_MODEL: default model profile
 */
export function resolveEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const host = env.OLLAMA_HOST?.trim() || DEFAULT_OLLAMA_HOST;

  let timeoutMs = DEFAULT_EMBEDDING_CONFIG.timeoutMs;
  if (env.OLLAMA_EMBED_TIMEOUT !== undefined) {
    const parsed = parseTimeoutSeconds(env.OLLAMA_EMBED_TIMEOUT);
    if (parsed === undefined) {
      logger.warn(`Ignoring OLLAMA_EMBED_TIMEOUT=${env.OLLAMA_EMBED_TIMEOUT}: expected whole seconds`);
    } else {
      timeoutMs = parsed;
    }
  }

  return {
    embedding: {
      ...DEFAULT_EMBEDDING_CONFIG,
      model: env.ASK_EMBED_MODEL?.trim() || DEFAULT_EMBED_MODEL,
      host,
      timeoutMs,
    },
    ollamaBaseUrl: normalizeOllamaBaseUrl(host),
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    modelProfile: env.ASK_MODEL?.trim() || undefined,
  };
}
