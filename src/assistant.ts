// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Assistant
 *
 * Answers a question about a workspace: gather evidence with the
 * search_codebase tool, then have a model summarize it with citations.
 */

import type { BaseProvider } from './providers/base.js';
import {
  DEFAULT_MODEL_PROFILE,
  getProfileNames,
  isModelProfileName,
  type ModelProfileName,
} from './providers/index.js';
import type { ToolRegistry } from './tools/registry.js';
import type { QuestionType } from './evidence/types.js';
import { DEFAULT_LOOKUP_ROOTS } from './paths.js';
import { DEFAULT_INDEXER_OPTIONS } from './rag/types.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

/**
 * Strip quotes, brackets and sentence punctuation around a word.
 */
function cleanToken(token: string): string {
  return token.replace(/^[("'`]+/, '').replace(/[)"'`?!.]+$/, '');
}

/**
 * Guess which directories a question is about.
 *
 * Path-like words contribute their first segment and file names contribute
 * themselves. With no such words the standard source directories are used.
 */
export function inferFocusFromQuestion(question: string): string[] {
  const focus = new Set<string>();
  const words = question.replace(/[,:]/g, ' ').split(/\s+/).map(cleanToken).filter(Boolean);

  for (const word of words) {
    if (word.includes('/')) {
      const segment = word.split('/').find((part) => part !== '');
      if (segment) focus.add(segment);
    } else if (DEFAULT_INDEXER_OPTIONS.includeExtensions.some((ext) => word.endsWith(ext))) {
      focus.add(word);
    }
  }

  return focus.size > 0 ? [...focus] : [...DEFAULT_LOOKUP_ROOTS];
}

const QUESTION_TYPE_PATTERNS: Array<[QuestionType, RegExp]> = [
  ['overview', /\b(what (is|does) (this|the) (project|codebase|repo|repository|tool)|overview|summar(y|ize)|purpose|architecture)\b/],
  ['configuration', /\b(config|configure|configured|configuration|settings?|env(ironment)? var(iable)?s?|yaml|options?)\b/],
  ['lookup', /\b(where|which file|locate|find|defined)\b/],
  ['implementation', /\b(how (does|do|is|are)|implement(ed|ation)?|algorithm|works?)\b/],
];

/**
 * Classify a question by keyword. Returns undefined when nothing matches.
 */
export function inferQuestionType(question: string): QuestionType | undefined {
  const lowered = question.toLowerCase();
  for (const [type, pattern] of QUESTION_TYPE_PATTERNS) {
    if (pattern.test(lowered)) return type;
  }
  return undefined;
}

/**
 * Prompt asking the model to answer strictly from the evidence, with citations.
 */
export function buildSummaryPrompt(question: string, evidence: string): string {
  return `You are helping answer a question about a codebase.

User's question: ${question}

Search results (structured):
${evidence}

Ground rules:
- If Direct File Snippets exist, answer ONLY from those and cite their paths/line ranges exactly.
- Otherwise, use RAG Snippets; cite their paths/line ranges exactly.
- Otherwise, use Search Snippets; cite file paths/lines if present.
- If nothing usable is available, say so explicitly; do NOT invent details or rely on README.

Always include a short RAG status if present.
Every claim must include an inline citation of the form path:line-range taken from the provided snippets (e.g., src/rag/retriever.ts:56-67). If you cannot cite, say so and stop; do not guess or invent line numbers.
Output 1-2 short paragraphs.`;
}

export interface AnswerOptions {
  provider: BaseProvider;
  registry: ToolRegistry;
  focusAreas?: string[];
  workspaceRoot?: string;
  /** Inferred from the question when omitted */
  questionType?: QuestionType | null;
}

let callCounter = 0;

/**
 * Gather evidence through the search_codebase tool.
 */
export async function gatherEvidenceForQuestion(
  question: string,
  options: Omit<AnswerOptions, 'provider'>
): Promise<string> {
  const questionType = options.questionType === undefined ? inferQuestionType(question) : options.questionType;
  const input: Record<string, unknown> = { query: question };
  if (options.focusAreas) input.focus_areas = options.focusAreas;
  if (options.workspaceRoot) input.workspace_root = options.workspaceRoot;
  if (questionType) input.question_type = questionType;

  const result = await options.registry.execute({
    id: `search_${++callCounter}`,
    name: 'search_codebase',
    input,
  });
  if (result.is_error) {
    logger.warn(`search_codebase failed: ${result.content}`);
  }
  return result.content;
}

/**
 * Answer a question. A failing model yields the raw evidence after the error.
 */
export async function answerQuestion(question: string, options: AnswerOptions): Promise<string> {
  const evidence = await gatherEvidenceForQuestion(question, options);
  logger.trace(`Evidence:\n${evidence}`);

  try {
    return await options.provider.generate(buildSummaryPrompt(question, evidence));
  } catch (error) {
    return `Error summarizing results: ${errorMessage(error)}\n\nRaw results:\n${evidence}`;
  }
}

export interface CommandOutcome<T> {
  value: T;
  message: string;
}

/**
 * Handle `/model` (report) and `/model <name>` (switch).
 */
export function handleModelCommand(command: string, current: ModelProfileName): CommandOutcome<ModelProfileName> {
  const parts = command.trim().split(/\s+/);
  const available = getProfileNames().join(', ');

  if (parts.length === 1) {
    return { value: current, message: `Current model: ${current}\nAvailable models: ${available}` };
  }

  const target = parts[1].toLowerCase();
  if (!isModelProfileName(target)) {
    return { value: current, message: `Unknown model '${target}'. Valid options: ${available}` };
  }
  if (target === current) {
    return { value: current, message: `Already using '${target}'.` };
  }
  return { value: target, message: `Switched model to '${target}'.` };
}

/**
 * Handle `/focus dir...` (set) and `/focus` (clear).
 */
export function handleFocusCommand(command: string): CommandOutcome<string[] | null> {
  const dirs = command.trim().split(/\s+/).slice(1);
  if (dirs.length === 0) {
    return { value: null, message: 'Cleared focus (using auto-inferred/default).' };
  }
  return { value: dirs, message: `Focus set to: ${dirs.join(', ')}` };
}

/**
 * Resolve the profile to start with: explicit choice, then environment, then default.
 */
export function resolveInitialProfile(requested?: string, fromEnv?: string): ModelProfileName {
  for (const candidate of [requested, fromEnv]) {
    if (candidate === undefined) continue;
    const name = candidate.toLowerCase();
    if (isModelProfileName(name)) return name;
    logger.warn(`Unknown model profile '${candidate}'; using ${DEFAULT_MODEL_PROFILE}`);
  }
  return DEFAULT_MODEL_PROFILE;
}
