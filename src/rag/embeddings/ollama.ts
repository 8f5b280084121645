// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama Embedding Provider
 *
 * Calls an Ollama-compatible embeddings endpoint, one request per text.
 */

import { BaseEmbeddingProvider } from './base.js';
import { EmbeddingTransportError, errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';

/** Texts per batch; bounds how much work one progress step covers */
export const EMBED_BATCH_SIZE = 100;

/** Default per-request timeout */
export const DEFAULT_EMBED_TIMEOUT_MS = 60_000;

export const DEFAULT_EMBED_MODEL = 'nomic-embed-text';

export const DEFAULT_OLLAMA_HOST = 'http://127.0.0.1:11434';

/**
 * Everything the provider needs, resolved by the caller.
 */
export interface EmbeddingConfig {
  /** Embedding model name */
  model: string;
  /** Host in OLLAMA_HOST form (`host:port`, with or without scheme) */
  host: string;
  /** Full endpoint URL; takes precedence over `host` when set */
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Texts per batch */
  batchSize: number;
}

export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  model: DEFAULT_EMBED_MODEL,
  host: DEFAULT_OLLAMA_HOST,
  timeoutMs: DEFAULT_EMBED_TIMEOUT_MS,
  batchSize: EMBED_BATCH_SIZE,
};

/**
 * The response shapes the embeddings endpoint is known to produce.
 */
export type EmbeddingResponse =
  | { kind: 'single'; embedding: number[] }
  | { kind: 'list'; embedding: number[] }
  | { kind: 'unrecognized' };

/**
 * Normalize an OLLAMA_HOST value into the full embeddings URL.
 */
export function normalizeEmbeddingsEndpoint(host: string): string {
  let normalized = host.trim();
  if (!normalized.startsWith('http://') && !normalized.startsWith('https://')) {
    normalized = `http://${normalized}`;
  }
  normalized = normalized.replace(/\/+$/, '');
  return `${normalized}/api/embeddings`;
}

function isVector(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify a decoded response body.
 *
 * `{ embedding: [...] }` is Ollama's native shape; `{ data: [{ embedding }] }`
 * is the OpenAI-compatible one. Anything else carries no vector.
 */
export function parseEmbeddingResponse(data: unknown): EmbeddingResponse {
  if (!isRecord(data)) {
    return { kind: 'unrecognized' };
  }
  if ('embedding' in data) {
    return isVector(data.embedding)
      ? { kind: 'single', embedding: data.embedding }
      : { kind: 'unrecognized' };
  }
  if (Array.isArray(data.data)) {
    const first: unknown = data.data[0];
    if (isRecord(first) && isVector(first.embedding)) {
      return { kind: 'list', embedding: first.embedding };
    }
  }
  return { kind: 'unrecognized' };
}

/**
 * Ollama embedding provider implementation.
 */
export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
  private readonly endpoint: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly batchSize: number;

  constructor(config: Partial<EmbeddingConfig> = {}) {
    super();
    const resolved = { ...DEFAULT_EMBEDDING_CONFIG, ...config };
    this.model = resolved.model;
    this.endpoint = resolved.baseUrl
      ? resolved.baseUrl.replace(/\/+$/, '')
      : normalizeEmbeddingsEndpoint(resolved.host);
    this.timeoutMs = resolved.timeoutMs;
    this.batchSize = Math.max(1, resolved.batchSize);
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  /**
   * Embed a single text. Returns null when the body has no vector.
   */
  private async embedSingle(text: string): Promise<number[] | null> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new EmbeddingTransportError(
        `Embedding request to ${this.endpoint} failed: ${errorMessage(error)}`,
        this.endpoint
      );
    }

    if (!response.ok) {
      throw new EmbeddingTransportError(
        `Embedding request failed: ${response.status} ${response.statusText}`,
        this.endpoint,
        response.status
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new EmbeddingTransportError(
        `Embedding service returned invalid JSON: ${errorMessage(error)}`,
        this.endpoint,
        response.status
      );
    }

    const parsed = parseEmbeddingResponse(data);
    if (parsed.kind === 'unrecognized') {
      logger.debug(`No embedding in response from ${this.endpoint}`);
      return null;
    }
    return parsed.embedding;
  }

  async embedAligned(texts: string[]): Promise<Array<number[] | null>> {
    if (texts.length === 0) return [];

    // The endpoint takes one prompt per request; batches only bound progress steps
    const results: Array<number[] | null> = [];
    const totalBatches = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      logger.embeddingBatch(i / this.batchSize + 1, totalBatches, batch.length);

      for (const text of batch) {
        results.push(text.length === 0 ? null : await this.embedSingle(text));
      }
    }

    return results;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const tagsUrl = this.endpoint.replace(/\/api\/embeddings$/, '/api/tags');
      const response = await fetch(tagsUrl, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        return false;
      }

      const data: unknown = await response.json();
      if (!isRecord(data) || !Array.isArray(data.models)) {
        return false;
      }
      return data.models.some(
        (m: unknown) =>
          isRecord(m) &&
          typeof m.name === 'string' &&
          (m.name === this.model || m.name.startsWith(`${this.model}:`))
      );
    } catch {
      return false;
    }
  }
}
