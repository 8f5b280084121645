// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { cosineSimilarity } from '../src/utils/vector.js';

describe('cosineSimilarity', () => {
  it('returns 1 for a vector compared with itself', () => {
    expect(cosineSimilarity([0.3, -1.2, 4.5], [0.3, -1.2, 4.5])).toBeCloseTo(1, 12);
  });

  it('returns 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 12);
  });

  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 1], [5, 5])).toBeCloseTo(1, 12);
  });

  it('returns 0 for empty vectors', () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([], [1, 2])).toBe(0);
  });

  it('returns 0 for vectors of different lengths', () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2])).toBe(0);
  });

  it('returns 0 when either vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('computes a known angle', () => {
    expect(cosineSimilarity([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });

  it('handles vectors of very large or very small magnitude', () => {
    expect(cosineSimilarity([1e100, 2e100], [1e100, 2e100])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1e-100], [1e-100])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1e150, 0], [0, 1e150])).toBe(0);
  });

  it('stays within [-1, 1]', () => {
    const v = [0.1, 0.2, 0.3, 0.7, 1.9, -3.3];
    const scores = [cosineSimilarity(v, v), cosineSimilarity(v, v.map((x) => -x))];
    for (const score of scores) {
      expect(score).toBeLessThanOrEqual(1);
      expect(score).toBeGreaterThanOrEqual(-1);
    }
  });
});
