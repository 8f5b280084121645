// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

export { EvidenceAggregator, gatherEvidence, renderEvidence, createWorkspaceRetriever } from './aggregator.js';
export type { EvidenceDependencies, RetrieverFactory } from './aggregator.js';
export { QUESTION_TYPES, SECTION_HEADERS, isQuestionType } from './types.js';
export type { QuestionType, EvidenceRequest, EvidenceSections } from './types.js';
export { QUESTION_TYPE_POLICIES, truncateReadme, capSearchLines, LINES_PER_MATCH } from './filters.js';
export { listProjectFiles, formatFileListing, findReadme, MAX_LISTED_FILES } from './file-listing.js';
export { gatherDirectFileSnippets, extractPathTokens, formatExcerpt } from './direct-files.js';
