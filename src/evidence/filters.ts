// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Question-type filters applied to computed evidence sections.
 */

import type { QuestionType } from './types.js';

/** Output lines for one keyword match: the match plus one context line each side */
export const LINES_PER_MATCH = 3;

/** README lines kept for overview questions */
export const README_SUMMARY_LINES = 50;

export interface QuestionTypePolicy {
  /** How the README section is rendered */
  readme: 'summary' | 'omit';
  /** Keyword matches' worth of search output to keep */
  maxSearchMatches: number;
  /** Focus directories used when the caller gives none */
  defaultFocus?: readonly string[];
}

export const QUESTION_TYPE_POLICIES: Record<QuestionType, QuestionTypePolicy> = {
  overview: { readme: 'summary', maxSearchMatches: 3 },
  lookup: { readme: 'omit', maxSearchMatches: 5 },
  implementation: { readme: 'omit', maxSearchMatches: 3 },
  configuration: { readme: 'omit', maxSearchMatches: 3, defaultFocus: ['config', 'docs'] },
};

/**
 * Keep the README head: at most `maxLines` lines, stopping before the first
 * `## ` heading after the opening line.
 */
export function truncateReadme(content: string, maxLines: number = README_SUMMARY_LINES): string {
  const lines = content.split('\n');
  let end = Math.min(lines.length, maxLines);
  for (let i = 1; i < end; i++) {
    if (lines[i].startsWith('## ')) {
      end = i;
      break;
    }
  }
  return lines.slice(0, end).join('\n').trimEnd();
}

/**
 * Cap keyword search output at `maxMatches` matches' worth of lines.
 */
export function capSearchLines(output: string, maxMatches: number): string {
  const maxLines = maxMatches * LINES_PER_MATCH;
  const lines = output.split('\n');
  if (lines.length <= maxLines) return output;
  return lines.slice(0, maxLines).join('\n');
}
