// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Codebase Search Tool
 *
 * Gathers the evidence bundle for a question: keyword matches, semantic
 * retrieval hits, referenced files, the README and a file listing.
 */

import { BaseTool, optionalString, optionalStringList, requireString } from './base.js';
import type { ToolDefinition } from '../types.js';
import {
  EvidenceAggregator,
  QUESTION_TYPES,
  isQuestionType,
  type EvidenceDependencies,
  type EvidenceRequest,
  type QuestionType,
} from '../evidence/index.js';

export interface SearchCodebaseInput {
  query: string;
  focusAreas?: string[];
  workspaceRoot?: string;
  questionType?: QuestionType;
}

/**
 * Gather evidence for a query. Never throws; failures become section placeholders.
 */
export async function searchCodebase(input: SearchCodebaseInput, deps: EvidenceDependencies = {}): Promise<string> {
  return new EvidenceAggregator(deps).gather(input);
}

export class SearchCodebaseTool extends BaseTool {
  private readonly aggregator: EvidenceAggregator;

  constructor(deps: EvidenceDependencies = {}) {
    super();
    this.aggregator = new EvidenceAggregator(deps);
  }

  getDefinition(): ToolDefinition {
    return {
      name: 'search_codebase',
      description: `Search the workspace for evidence that answers a question about the codebase.
Returns Markdown sections: keyword search snippets, semantic (RAG) snippets with
similarity scores, excerpts of files the question names, the README and a partial
file listing.`,
      input_schema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'The question or search text',
          },
          focus_areas: {
            type: 'array',
            items: { type: 'string' },
            description: 'Directories to restrict keyword search to, relative to the workspace root (optional)',
          },
          workspace_root: {
            type: 'string',
            description: 'Workspace to search (optional, defaults to the current directory)',
          },
          question_type: {
            type: 'string',
            enum: [...QUESTION_TYPES],
            description: 'Kind of answer wanted; trims the README and keyword output to fit (optional)',
          },
        },
        required: ['query'],
      },
    };
  }

  async execute(input: Record<string, unknown>): Promise<string> {
    const request: EvidenceRequest = {
      query: requireString(input, 'query'),
      focusAreas: optionalStringList(input, 'focus_areas'),
      workspaceRoot: optionalString(input, 'workspace_root'),
    };

    const questionType = optionalString(input, 'question_type');
    if (questionType !== undefined) {
      if (!isQuestionType(questionType)) {
        throw new Error(`Unknown question_type "${questionType}". Valid options: ${QUESTION_TYPES.join(', ')}`);
      }
      request.questionType = questionType;
    }

    return this.aggregator.gather(request);
  }
}
