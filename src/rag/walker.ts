// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Workspace walking for the indexer.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { IndexerOptions } from './types.js';
import { WorkspaceNotFoundError } from '../errors.js';
import { INDEX_FILE_NAME, isExcludedPath } from '../paths.js';

export interface WorkspaceFile {
  absolutePath: string;
  /** Forward-slash path relative to the workspace root */
  relativePath: string;
}

/**
 * Throw unless the workspace root is an existing directory.
 */
export async function assertWorkspace(workspaceRoot: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(workspaceRoot);
    if (!stat.isDirectory()) {
      throw new WorkspaceNotFoundError(workspaceRoot);
    }
  } catch (error) {
    if (error instanceof WorkspaceNotFoundError) throw error;
    throw new WorkspaceNotFoundError(workspaceRoot);
  }
}

/**
 * Check if a file name carries one of the indexed extensions.
 */
export function hasIncludedExtension(fileName: string, extensions: readonly string[]): boolean {
  return extensions.some((ext) => fileName.endsWith(ext));
}

/**
 * Find every file the indexer should chunk, sorted by relative path.
 *
 * A file is skipped when its directory path contains an excluded fragment,
 * when its extension is not included, or when it is the index file itself.
 */
export async function findIndexableFiles(
  workspaceRoot: string,
  options: Pick<IndexerOptions, 'includeExtensions' | 'excludedDirs'>
): Promise<WorkspaceFile[]> {
  const matches = await glob('**/*', {
    cwd: workspaceRoot,
    nodir: true,
    dot: true,
    posix: true,
    // Prune excluded directories; the substring check below is authoritative
    ignore: options.excludedDirs.map((part) => `**/*${part}*/**`),
  });

  const files: WorkspaceFile[] = [];
  for (const match of matches) {
    const relativePath = match.replace(/\\/g, '/');
    if (relativePath === INDEX_FILE_NAME) continue;

    const dir = path.posix.dirname(relativePath);
    if (dir !== '.' && isExcludedPath(dir, options.excludedDirs)) continue;
    if (!hasIncludedExtension(path.posix.basename(relativePath), options.includeExtensions)) continue;

    files.push({
      absolutePath: path.join(workspaceRoot, relativePath),
      relativePath,
    });
  }

  files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  return files;
}
