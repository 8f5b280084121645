// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { BaseTool, optionalString, requireString } from './base.js';
import type { ToolDefinition } from '../types.js';
import { logger } from '../logger.js';

/**
 * Lay out a question, an analysis and supporting snippets as one Markdown answer.
 */
export function formatResponse(originalQuestion: string, analysis: string, codeSnippets: string): string {
  return (
    `## Your Question:\n${originalQuestion}\n\n` +
    `## Agent Analysis:\n${analysis}\n\n` +
    `## Relevant Code/Information:\n${codeSnippets}\n\n`
  );
}

export class FormatResponseTool extends BaseTool {
  getDefinition(): ToolDefinition {
    return {
      name: 'format_response',
      description: 'Format the analyzed question and supporting code snippets into a single answer for the user.',
      input_schema: {
        type: 'object',
        properties: {
          original_question: {
            type: 'string',
            description: 'The question as the user asked it',
          },
          analysis: {
            type: 'string',
            description: 'The answer or analysis text',
          },
          code_snippets: {
            type: 'string',
            description: 'Supporting code or evidence',
          },
          workspace_root: {
            type: 'string',
            description: 'Workspace the answer refers to (optional, informational)',
          },
        },
        required: ['original_question', 'analysis', 'code_snippets'],
      },
    };
  }

  async execute(input: Record<string, unknown>): Promise<string> {
    const question = requireString(input, 'original_question');
    const workspaceRoot = optionalString(input, 'workspace_root');
    logger.debug(`Formatting response for: ${question} (workspace: ${workspaceRoot ?? 'cwd'})`);
    return formatResponse(question, requireString(input, 'analysis'), requireString(input, 'code_snippets'));
  }
}
