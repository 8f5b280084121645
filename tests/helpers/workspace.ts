// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Temporary workspace directories for filesystem tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Create a workspace under the OS temp dir holding the given files.
 * Keys are relative paths; parent directories are created as needed.
 */
export async function createWorkspace(files: Record<string, string> = {}): Promise<string> {
  const root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'ask-test-'));
  for (const [relative, content] of Object.entries(files)) {
    await writeWorkspaceFile(root, relative, content);
  }
  return fs.promises.realpath(root);
}

export async function writeWorkspaceFile(root: string, relative: string, content: string): Promise<void> {
  const target = path.join(root, relative);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, content, 'utf-8');
}

/**
 * Set a file's modification time, in epoch seconds.
 */
export async function setModifiedTime(root: string, relative: string, seconds: number): Promise<void> {
  await fs.promises.utimes(path.join(root, relative), seconds, seconds);
}

export async function removeWorkspace(root: string): Promise<void> {
  await fs.promises.rm(root, { recursive: true, force: true });
}

/**
 * `count` numbered lines, each ending in a newline.
 */
export function numberedLines(count: number, prefix = 'line'): string {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}\n`).join('');
}
