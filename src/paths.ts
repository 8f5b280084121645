// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized path management.
 *
 * Everything the assistant reads or writes inside a workspace is named here,
 * so the indexer, the file listing and the settings loader agree on them.
 */

import { join } from 'node:path';

/** Hidden file holding the persisted chunk index */
export const INDEX_FILE_NAME = '.ask_rag_index.json';

/** Directories skipped when walking or listing a workspace (substring match) */
export const EXCLUDED_DIR_PARTS: readonly string[] = ['.git', 'venv', '__pycache__', 'node_modules'];

/** Subdirectories searched when a query names a file by a partial path */
export const DEFAULT_LOOKUP_ROOTS: readonly string[] = ['src', 'docs', 'config', 'tests'];

export const WorkspacePaths = {
  /**
   * Persisted RAG index for a workspace
   */
  ragIndex: (workspaceRoot: string): string => join(workspaceRoot, INDEX_FILE_NAME),

  /**
   * YAML document holding the rag_profile settings
   */
  memoryConfig: (workspaceRoot: string): string => join(workspaceRoot, 'config', 'memory.yaml'),
} as const;

/**
 * Check whether a workspace-relative path falls under an excluded directory.
 * Matching is by substring, so `.git` also excludes `.github`.
 */
export function isExcludedPath(relativePath: string, excluded: readonly string[] = EXCLUDED_DIR_PARTS): boolean {
  const normalized = relativePath.replace(/\\/g, '/');
  return excluded.some((part) => normalized.includes(part));
}

/**
 * Normalize a relative path to forward slashes.
 */
export function toPosix(relativePath: string): string {
  return relativePath.replace(/\\/g, '/');
}
