// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Embedding Provider
 *
 * Providers implement `embedAligned`; the base class derives the dense and
 * single-query forms from it and caches query vectors.
 */

import { createHash } from 'crypto';

export interface QueryCacheOptions {
  /** Entries kept before the least recently used one is evicted */
  maxEntries?: number;
  /** Entry lifetime in milliseconds */
  ttlMs?: number;
  /** Clock, in epoch milliseconds */
  now?: () => number;
}

/**
 * LRU map of query text to vector, with expiry.
 * Map insertion order doubles as recency order.
 */
export class QueryEmbeddingCache {
  private readonly entries = new Map<string, { vector: number[]; storedAt: number }>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: QueryCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
    this.ttlMs = options.ttlMs ?? 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  static keyFor(provider: string, model: string, text: string): string {
    const digest = createHash('sha256').update(text).digest('hex').slice(0, 16);
    return `${provider}:${model}:${digest}`;
  }

  get(key: string): number[] | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    this.entries.delete(key);
    if (this.now() - entry.storedAt > this.ttlMs) {
      return undefined;
    }
    this.entries.set(key, entry);
    return entry.vector;
  }

  set(key: string, vector: number[]): void {
    this.entries.delete(key);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) break;
      this.entries.delete(oldest);
    }
    this.entries.set(key, { vector, storedAt: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// One cache for the process; keys carry the provider and model
const queryCache = new QueryEmbeddingCache();

export abstract class BaseEmbeddingProvider {
  /** Display name, e.g. "Ollama" */
  abstract getName(): string;

  abstract getModel(): string;

  /**
   * Embed each text, returning one slot per input in the same order.
   * A slot is null when the text was empty or the service returned no
   * usable vector for it. Transport failures reject the whole call.
   */
  abstract embedAligned(texts: string[]): Promise<Array<number[] | null>>;

  /**
   * Whether the service is reachable and serves this model.
   */
  abstract isAvailable(): Promise<boolean>;

  /**
   * Vectors for the texts that produced one. Positions are not preserved;
   * use embedAligned() when they matter.
   */
  async embed(texts: string[]): Promise<number[][]> {
    const aligned = await this.embedAligned(texts);
    return aligned.filter((vector): vector is number[] => vector !== null);
  }

  /**
   * Embed one query, served from the query cache when possible.
   * Null results are not cached.
   */
  async embedOne(text: string): Promise<number[] | null> {
    const key = QueryEmbeddingCache.keyFor(this.getName(), this.getModel(), text);
    const cached = queryCache.get(key);
    if (cached) return cached;

    const [vector] = await this.embedAligned([text]);
    if (!vector) return null;
    queryCache.set(key, vector);
    return vector;
  }

  static queryCacheSize(): number {
    return queryCache.size;
  }

  static clearQueryCache(): void {
    queryCache.clear();
  }
}
