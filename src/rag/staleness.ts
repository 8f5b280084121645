// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Staleness Checks
 *
 * Decides whether the persisted index needs an update without statting
 * every indexed file. The check samples a bounded number of files, so it is
 * probabilistic: a change in an unsampled file can go unnoticed until a
 * later check happens to pick it.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Chunk, IndexBuildResult, RagSettings } from './types.js';
import type { Indexer } from './indexer.js';
import { indexedModifiedTimes } from './indexer.js';
import { logger } from '../logger.js';

/** Files checked per staleness test */
export const DEFAULT_STALENESS_SAMPLE_SIZE = 50;

/** Workspaces with more eligible files than this are not indexed on startup */
export const MAX_STARTUP_INDEX_FILES = 1000;

export interface StalenessOptions {
  /** Maximum number of distinct files to check */
  sampleSize?: number;
  /** Uniform random source in [0, 1); inject a seeded one for reproducible samples */
  random?: () => number;
}

/**
 * Pick `size` items uniformly at random without replacement.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], size: number, random: () => number): T[] {
  const pool = [...items];
  const count = Math.min(Math.max(0, size), pool.length);
  // Partial Fisher-Yates: the first `count` slots end up as the sample
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

/**
 * Check a sample of indexed files against the filesystem.
 * Stale when a sampled file is gone or has a newer modification time than
 * the one recorded in the index.
 */
export async function isIndexStale(
  chunks: Chunk[],
  workspaceRoot: string,
  options: StalenessOptions = {}
): Promise<boolean> {
  const sampleSize = options.sampleSize ?? DEFAULT_STALENESS_SAMPLE_SIZE;
  const random = options.random ?? Math.random;

  const entries = [...indexedModifiedTimes(chunks).entries()];
  const sample = entries.length > sampleSize
    ? sampleWithoutReplacement(entries, sampleSize, random)
    : entries;

  for (const [relativePath, recorded] of sample) {
    let current: number;
    try {
      const stat = await fs.promises.stat(path.join(workspaceRoot, relativePath));
      current = stat.mtimeMs / 1000;
    } catch {
      logger.debug(`Index stale: ${relativePath} no longer exists`);
      return true;
    }
    if (current > recorded) {
      logger.debug(`Index stale: ${relativePath} modified since indexing`);
      return true;
    }
  }

  return false;
}

/**
 * What the startup check did.
 */
export type IndexStartupStatus =
  | { status: 'disabled' }
  | { status: 'too-large'; eligibleFiles: number; limit: number }
  | { status: 'built'; result: IndexBuildResult }
  | { status: 'updated'; result: IndexBuildResult }
  | { status: 'fresh'; chunkCount: number };

export interface StartupIndexOptions extends StalenessOptions {
  /** File-count ceiling above which indexing is skipped */
  maxFiles?: number;
}

/**
 * Bring the index up to date on startup.
 *
 * Skips work when RAG is disabled or the workspace is too large, builds the
 * index when none exists, and runs an incremental update only when the
 * sampled staleness check says so. Indexing errors propagate.
 */
export async function ensureRagIndexBuilt(
  indexer: Indexer,
  settings: RagSettings,
  options: StartupIndexOptions = {}
): Promise<IndexStartupStatus> {
  if (!settings.enabled) {
    return { status: 'disabled' };
  }

  const limit = options.maxFiles ?? MAX_STARTUP_INDEX_FILES;
  const eligibleFiles = await indexer.countEligibleFiles();
  if (eligibleFiles > limit) {
    logger.verbose(`Skipping RAG indexing: ${eligibleFiles} files exceeds the ${limit}-file limit`);
    return { status: 'too-large', eligibleFiles, limit };
  }

  const chunks = await indexer.getVectorStore().load();
  if (chunks.length === 0) {
    return { status: 'built', result: await indexer.buildIndex() };
  }

  if (await isIndexStale(chunks, indexer.getWorkspaceRoot(), options)) {
    return { status: 'updated', result: await indexer.buildIndexIncremental() };
  }

  return { status: 'fresh', chunkCount: chunks.length };
}
