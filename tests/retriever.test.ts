// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Retriever, rankChunks } from '../src/rag/retriever.js';
import { Indexer } from '../src/rag/indexer.js';
import { BaseEmbeddingProvider } from '../src/rag/embeddings/base.js';
import type { Chunk } from '../src/rag/types.js';
import { FakeEmbeddingProvider } from './helpers/fake-embeddings.js';
import { createWorkspace, removeWorkspace } from './helpers/workspace.js';

function makeChunk(id: string, embedding: number[]): Chunk {
  return { id, path: id, startLine: 1, endLine: 1, text: `${id} text\n`, embedding, modifiedTime: 1 };
}

describe('rankChunks', () => {
  const chunks = [
    makeChunk('low', [0, 1]),
    makeChunk('high', [1, 0]),
    makeChunk('mid', [1, 1]),
  ];

  it('orders by descending similarity', () => {
    const ranked = rankChunks([1, 0], chunks, 3);
    expect(ranked.map((r) => r.chunk.id)).toEqual(['high', 'mid', 'low']);
    expect(ranked[0].score).toBe(1);
    expect(ranked[1].score).toBeCloseTo(Math.SQRT1_2, 10);
    expect(ranked[2].score).toBe(0);
  });

  it('truncates to topK', () => {
    expect(rankChunks([1, 0], chunks, 1).map((r) => r.chunk.id)).toEqual(['high']);
  });

  it('returns everything when topK exceeds the index', () => {
    expect(rankChunks([1, 0], chunks, 10)).toHaveLength(3);
  });

  it('returns nothing for a non-positive topK', () => {
    expect(rankChunks([1, 0], chunks, 0)).toEqual([]);
    expect(rankChunks([1, 0], chunks, -2)).toEqual([]);
  });

  it('keeps index order for equal scores', () => {
    const tied = [makeChunk('first', [2, 0]), makeChunk('second', [1, 0]), makeChunk('third', [3, 0])];
    expect(rankChunks([1, 0], tied, 3).map((r) => r.chunk.id)).toEqual(['first', 'second', 'third']);
  });

  it('scores chunks without a vector as 0', () => {
    const ranked = rankChunks([1, 0], [makeChunk('empty', []), makeChunk('match', [1, 0])], 2);
    expect(ranked.map((r) => [r.chunk.id, r.score])).toEqual([
      ['match', 1],
      ['empty', 0],
    ]);
  });
});

describe('Retriever', () => {
  let root: string;
  let embeddings: FakeEmbeddingProvider;
  let retriever: Retriever;

  beforeEach(async () => {
    BaseEmbeddingProvider.clearQueryCache();
    root = await createWorkspace({
      'a.md': 'alpha notes\n',
      'b.md': 'beta notes\n',
      'c.md': 'plain notes\n',
    });
    embeddings = new FakeEmbeddingProvider();
    retriever = new Retriever(new Indexer(root, embeddings), embeddings);
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('builds the index on first use', async () => {
    await retriever.retrieve('alpha', 3);
    expect(await new Indexer(root, embeddings).getVectorStore().load()).toHaveLength(3);
  });

  it('returns the best matches first', async () => {
    const results = await retriever.retrieve('alpha', 3);

    expect(results.map((r) => r.chunk.path)).toEqual(['a.md', 'c.md', 'b.md']);
    expect(results.map((r) => r.score.toFixed(3))).toEqual(['1.000', '0.707', '0.500']);
  });

  it('truncates to topK', async () => {
    const results = await retriever.retrieve('alpha', 2);
    expect(results.map((r) => r.chunk.path)).toEqual(['a.md', 'c.md']);
  });

  it('reuses a persisted index', async () => {
    await retriever.retrieve('alpha', 1);
    await retriever.retrieve('beta', 1);
    // One call to index, one per distinct query
    expect(embeddings.calls.map((c) => c.length)).toEqual([3, 1, 1]);
  });

  it('returns nothing when the query gets no vector', async () => {
    embeddings.missing.add('alpha');
    expect(await retriever.retrieve('alpha', 3)).toEqual([]);
  });

  it('formats results as evidence blocks', async () => {
    const results = await retriever.retrieve('alpha', 2);
    expect(retriever.formatAsEvidence(results)).toBe(
      'a.md:1-1 (score=1.000)\nalpha notes\n\nc.md:1-1 (score=0.707)\nplain notes'
    );
  });
});
