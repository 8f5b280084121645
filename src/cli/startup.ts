// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Startup indexing for the CLI.
 */

import chalk from 'chalk';
import { loadRagSettings } from '../config/index.js';
import {
  Indexer,
  createEmbeddingProvider,
  ensureRagIndexBuilt,
  type EmbeddingConfig,
  type IndexStartupStatus,
} from '../rag/index.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { spinner } from '../spinner.js';

/**
 * One-line summary of what the startup check did.
 */
export function describeStartupStatus(status: IndexStartupStatus): string {
  switch (status.status) {
    case 'disabled':
      return 'RAG disabled by workspace configuration; skipping indexing.';
    case 'too-large':
      return `Skipping RAG indexing: ${status.eligibleFiles} files exceeds the ${status.limit}-file limit.`;
    case 'built':
      return `Built RAG index: ${status.result.totalFiles} files, ${status.result.chunks.length} chunks.`;
    case 'updated':
      return `Updated RAG index: ${status.result.changedFiles} changed files, ${status.result.embeddedChunks} chunks re-embedded.`;
    case 'fresh':
      return `RAG index up to date (${status.chunkCount} chunks).`;
  }
}

/**
 * Build or refresh the workspace index before answering questions.
 * Failures are reported and leave the CLI usable without semantic search.
 */
export async function prepareRagIndex(workspaceRoot: string, embedding: Partial<EmbeddingConfig>): Promise<void> {
  const provider = createEmbeddingProvider(embedding);
  const indexer = new Indexer(workspaceRoot, provider);
  indexer.onProgress = (current, total, file) => spinner.indexing(current, total, file);

  try {
    const status = await ensureRagIndexBuilt(indexer, loadRagSettings(workspaceRoot));
    const summary = describeStartupStatus(status);
    if (status.status === 'built' || status.status === 'updated') {
      spinner.succeed(chalk.green(summary));
    } else {
      spinner.stop();
    }
    logger.verbose(summary);
  } catch (error) {
    spinner.fail(chalk.red('RAG indexing failed'));
    logger.warn(`RAG indexing failed: ${errorMessage(error)}. Continuing without a fresh index.`);
  }
}
