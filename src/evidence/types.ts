// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Evidence Types
 */

/**
 * Hint describing what kind of answer a question wants.
 */
export type QuestionType = 'overview' | 'lookup' | 'implementation' | 'configuration';

export const QUESTION_TYPES: readonly QuestionType[] = ['overview', 'lookup', 'implementation', 'configuration'];

export function isQuestionType(value: unknown): value is QuestionType {
  return typeof value === 'string' && QUESTION_TYPES.some((type) => type === value);
}

export interface EvidenceRequest {
  query: string;
  /** Directories to restrict keyword search to, relative to the workspace root */
  focusAreas?: string[];
  /** Defaults to the process working directory */
  workspaceRoot?: string;
  questionType?: QuestionType;
}

/**
 * Section bodies of one evidence bundle, in output order.
 */
export interface EvidenceSections {
  query: string;
  searchSnippets: string;
  ragSnippets: string;
  ragStatus: string;
  directFileSnippets: string;
  /** null when the question type drops the README */
  readme: string | null;
  fileListing: string;
}

/** Section headers, in output order */
export const SECTION_HEADERS: Record<keyof EvidenceSections, string> = {
  query: '## Query',
  searchSnippets: '## Search Snippets',
  ragSnippets: '## RAG Snippets',
  ragStatus: '## RAG Status',
  directFileSnippets: '## Direct File Snippets',
  readme: '## README',
  fileListing: '## Project File Listing (partial)',
};
