// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Evidence Aggregator
 *
 * Collects keyword matches, semantic retrieval hits, referenced files, the
 * README and a file listing into one Markdown bundle for a question.
 * Every section degrades to a placeholder on failure; gathering never throws.
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadRagSettings } from '../config/loader.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { createEmbeddingProvider, type EmbeddingConfig } from '../rag/embeddings/index.js';
import { Indexer } from '../rag/indexer.js';
import { Retriever } from '../rag/retriever.js';
import type { RagSettings } from '../rag/types.js';
import { RipgrepSearcher, type KeywordSearcher } from '../search/keyword-search.js';
import { gatherDirectFileSnippets } from './direct-files.js';
import { findReadme, formatFileListing, listProjectFiles } from './file-listing.js';
import { QUESTION_TYPE_POLICIES, capSearchLines, truncateReadme, type QuestionTypePolicy } from './filters.js';
import { SECTION_HEADERS, type EvidenceRequest, type EvidenceSections } from './types.js';

/**
 * Builds a retriever bound to one workspace.
 */
export type RetrieverFactory = (workspaceRoot: string) => Retriever;

export interface EvidenceDependencies {
  searcher?: KeywordSearcher;
  createRetriever?: RetrieverFactory;
  loadSettings?: (workspaceRoot: string) => RagSettings;
  /** Used by the default retriever factory */
  embedding?: Partial<EmbeddingConfig>;
}

/**
 * Retriever over the workspace's persisted index, embedding through Ollama.
 */
export function createWorkspaceRetriever(workspaceRoot: string, embedding: Partial<EmbeddingConfig> = {}): Retriever {
  const provider = createEmbeddingProvider(embedding);
  return new Retriever(new Indexer(workspaceRoot, provider), provider);
}

/**
 * Join section bodies under their headers.
 */
export function renderEvidence(sections: EvidenceSections): string {
  const parts = [
    `${SECTION_HEADERS.query}\n${sections.query}`,
    `${SECTION_HEADERS.searchSnippets}\n${sections.searchSnippets}`,
    `${SECTION_HEADERS.ragSnippets}\n${sections.ragSnippets}`,
    `${SECTION_HEADERS.ragStatus}\n${sections.ragStatus}`,
    `${SECTION_HEADERS.directFileSnippets}\n${sections.directFileSnippets}`,
  ];
  if (sections.readme !== null) {
    parts.push(`${SECTION_HEADERS.readme}\n${sections.readme}`);
  }
  parts.push(`${SECTION_HEADERS.fileListing}\n${sections.fileListing}`);
  return parts.join('\n\n');
}

async function timed<T>(section: string, work: () => Promise<T>): Promise<T> {
  const start = Date.now();
  try {
    return await work();
  } finally {
    logger.sectionTiming(section, Date.now() - start);
  }
}

export class EvidenceAggregator {
  private readonly searcher: KeywordSearcher;
  private readonly createRetriever: RetrieverFactory;
  private readonly loadSettings: (workspaceRoot: string) => RagSettings;

  constructor(deps: EvidenceDependencies = {}) {
    this.searcher = deps.searcher ?? new RipgrepSearcher();
    const embedding = deps.embedding ?? {};
    this.createRetriever = deps.createRetriever ?? ((root) => createWorkspaceRetriever(root, embedding));
    this.loadSettings = deps.loadSettings ?? loadRagSettings;
  }

  /**
   * Gather the evidence bundle for a question.
   */
  async gather(request: EvidenceRequest): Promise<string> {
    const workspaceRoot = path.resolve(request.workspaceRoot ?? process.cwd());
    logger.verbose(`Gathering evidence in ${workspaceRoot} for: ${request.query}`);
    try {
      return renderEvidence(await this.gatherSections(request, workspaceRoot));
    } catch (error) {
      logger.error('Evidence gathering failed', error instanceof Error ? error : undefined);
      return `Error while analyzing codebase: ${errorMessage(error)}`;
    }
  }

  async gatherSections(request: EvidenceRequest, workspaceRoot: string): Promise<EvidenceSections> {
    const policy = request.questionType ? QUESTION_TYPE_POLICIES[request.questionType] : undefined;
    const query = request.query;

    const searchSnippets = await timed('search', () => this.searchSection(query, workspaceRoot, request.focusAreas, policy));
    const rag = await timed('rag', () => this.ragSections(query, workspaceRoot));
    const directFileSnippets = await timed('direct-files', () => this.directFileSection(query, workspaceRoot));
    const entries = await timed('listing', () => this.listEntries(workspaceRoot));
    const readme = await timed('readme', () => this.readmeSection(entries, workspaceRoot, policy));

    return {
      query,
      searchSnippets,
      ragSnippets: rag.snippets,
      ragStatus: rag.status,
      directFileSnippets,
      readme,
      fileListing: formatFileListing(entries),
    };
  }

  private async searchSection(
    query: string,
    workspaceRoot: string,
    focusAreas: string[] | undefined,
    policy: QuestionTypePolicy | undefined
  ): Promise<string> {
    const noMatches = 'No direct matches found for the query.';
    if (!query.trim()) return noMatches;

    const areas = focusAreas && focusAreas.length > 0 ? focusAreas : policy?.defaultFocus;
    const candidates = areas ? areas.map((area) => path.resolve(workspaceRoot, area)) : [workspaceRoot];
    const directories = candidates.filter((dir) => fs.existsSync(dir));
    if (directories.length === 0) return noMatches;

    try {
      const outcome = await this.searcher.search(query, directories);
      switch (outcome.kind) {
        case 'unavailable':
          return 'ripgrep (`rg`) is not installed, so code search is unavailable.';
        case 'no-matches':
          return noMatches;
        case 'error':
          return `Keyword search failed: ${outcome.message}`;
        case 'matches':
          return policy ? capSearchLines(outcome.output, policy.maxSearchMatches) : outcome.output;
      }
    } catch (error) {
      return `Keyword search failed: ${errorMessage(error)}`;
    }
  }

  private async ragSections(query: string, workspaceRoot: string): Promise<{ snippets: string; status: string }> {
    let settings: RagSettings;
    try {
      settings = this.loadSettings(workspaceRoot);
    } catch (error) {
      return { snippets: 'RAG retrieval failed; see RAG Status.', status: `RAG retrieval failed: ${errorMessage(error)}` };
    }

    if (!settings.enabled) {
      return { snippets: 'RAG disabled by workspace configuration.', status: 'RAG disabled by workspace configuration.' };
    }
    if (!query.trim()) {
      return { snippets: 'RAG skipped for an empty query.', status: 'RAG skipped (empty query).' };
    }

    try {
      const retriever = this.createRetriever(workspaceRoot);
      const results = await retriever.retrieve(query, settings.topK);
      if (results.length === 0) {
        return { snippets: 'No RAG matches found.', status: 'RAG completed (no matches).' };
      }
      return { snippets: retriever.formatAsEvidence(results), status: 'RAG completed.' };
    } catch (error) {
      logger.debug(`RAG retrieval failed: ${errorMessage(error)}`);
      return { snippets: 'RAG retrieval failed; see RAG Status.', status: `RAG retrieval failed: ${errorMessage(error)}` };
    }
  }

  private async directFileSection(query: string, workspaceRoot: string): Promise<string> {
    try {
      const snippets = await gatherDirectFileSnippets(query, workspaceRoot);
      return snippets || 'No direct file references found in the query.';
    } catch (error) {
      logger.warn(`Direct file lookup failed: ${errorMessage(error)}`);
      return 'No direct file references found in the query.';
    }
  }

  private async listEntries(workspaceRoot: string): Promise<string[]> {
    try {
      return await listProjectFiles(workspaceRoot);
    } catch (error) {
      logger.warn(`File listing failed: ${errorMessage(error)}`);
      return [];
    }
  }

  private async readmeSection(
    entries: string[],
    workspaceRoot: string,
    policy: QuestionTypePolicy | undefined
  ): Promise<string | null> {
    if (policy?.readme === 'omit') return null;

    const readme = findReadme(entries);
    if (!readme) return 'No README file found.';

    let content: string;
    try {
      content = await fs.promises.readFile(path.join(workspaceRoot, readme), 'utf-8');
    } catch (error) {
      return `Error reading README: ${errorMessage(error)}`;
    }

    const body = policy?.readme === 'summary' ? truncateReadme(content) : content;
    return body.trim() ? body : 'No README file found.';
  }
}

/**
 * Gather evidence with the default searcher and retriever.
 */
export async function gatherEvidence(request: EvidenceRequest, deps: EvidenceDependencies = {}): Promise<string> {
  return new EvidenceAggregator(deps).gather(request);
}
