// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Project file listing and README discovery.
 */

import { glob } from 'glob';
import { EXCLUDED_DIR_PARTS, isExcludedPath } from '../paths.js';

/** Entries shown in the listing section */
export const MAX_LISTED_FILES = 200;

function depth(entry: string): number {
  return entry.replace(/\/$/, '').split('/').length;
}

/**
 * List every non-hidden path under the workspace, shallowest first.
 * Directories carry a trailing `/`. Paths under excluded directories are dropped.
 */
export async function listProjectFiles(
  workspaceRoot: string,
  excluded: readonly string[] = EXCLUDED_DIR_PARTS
): Promise<string[]> {
  const entries = await glob('**/*', {
    cwd: workspaceRoot,
    dot: false,
    mark: true,
    posix: true,
    ignore: excluded.map((part) => `**/*${part}*/**`),
  });

  return entries
    .map((entry) => entry.replace(/\\/g, '/'))
    .filter((entry) => !isExcludedPath(entry, excluded))
    .sort((a, b) => depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Render the listing section body.
 */
export function formatFileListing(entries: string[], limit: number = MAX_LISTED_FILES): string {
  if (entries.length === 0) {
    return 'No files were listed.';
  }
  let listing = entries.slice(0, limit).join('\n');
  if (entries.length > limit) {
    listing += `\n... and ${entries.length - limit} more files`;
  }
  return listing;
}

/**
 * First listed file whose name contains "readme", case-insensitively.
 */
export function findReadme(entries: string[]): string | undefined {
  return entries.find((entry) => {
    if (entry.endsWith('/')) return false;
    const name = entry.slice(entry.lastIndexOf('/') + 1);
    return name.toLowerCase().includes('readme');
  });
}
