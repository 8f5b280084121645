// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { KeywordSearcher, KeywordSearchOutcome } from '../../src/search/keyword-search.js';

/**
 * Keyword searcher returning a fixed outcome and recording its calls.
 */
export class FakeSearcher implements KeywordSearcher {
  calls: Array<{ query: string; directories: string[] }> = [];

  constructor(private outcome: KeywordSearchOutcome = { kind: 'no-matches' }) {}

  async search(query: string, directories: string[]): Promise<KeywordSearchOutcome> {
    this.calls.push({ query, directories: [...directories] });
    return this.outcome;
  }
}
