// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Direct file snippets: files the question names by path or file name.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_LOOKUP_ROOTS, toPosix } from '../paths.js';
import { DEFAULT_INDEXER_OPTIONS } from '../rag/types.js';
import { splitLines } from '../rag/chunker.js';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

/** Lines excerpted per referenced file */
export const MAX_EXCERPT_LINES = 200;

/** Excerpted when nothing is referenced and the question is about retrieval */
export const FALLBACK_CONTEXT_FILE = 'src/context.ts';

const FALLBACK_KEYWORDS = ['context', 'rag', 'retrieval'];

/**
 * Split a question into path-like tokens, adding `dir/` + following-token joins.
 */
export function extractPathTokens(query: string): string[] {
  const tokens = query.match(/[A-Za-z0-9_./:-]+/g) ?? [];
  const combined: string[] = [];
  for (let i = 0; i + 1 < tokens.length; i++) {
    if (tokens[i].endsWith('/')) {
      combined.push(`${tokens[i].replace(/\/+$/, '')}/${tokens[i + 1].replace(/^\/+/, '')}`);
    }
  }
  return [...tokens, ...combined];
}

/**
 * Whether a token looks like a file reference.
 */
export function isFileReference(token: string, extensions: readonly string[] = DEFAULT_INDEXER_OPTIONS.includeExtensions): boolean {
  return token.includes('/') || extensions.some((ext) => token.endsWith(ext));
}

function candidatePaths(token: string, workspaceRoot: string): string[] {
  if (path.isAbsolute(token)) return [token];
  const stripped = token.replace(/^\/+/, '');
  return [
    path.join(workspaceRoot, token),
    ...DEFAULT_LOOKUP_ROOTS.map((root) => path.join(workspaceRoot, root, stripped)),
  ];
}

function isInside(realPath: string, realRoot: string): boolean {
  return realPath === realRoot || realPath.startsWith(realRoot.endsWith(path.sep) ? realRoot : realRoot + path.sep);
}

/**
 * Render a numbered excerpt headed by `relative:1-M`.
 */
export function formatExcerpt(relativePath: string, content: string, maxLines: number = MAX_EXCERPT_LINES): string {
  const lines = splitLines(content);
  const shown = lines.slice(0, maxLines);
  const numbered = shown.map((line, i) => `${i + 1}: ${line.trimEnd()}`);
  return `${relativePath}:1-${shown.length}\n${numbered.join('\n')}`;
}

async function readExcerpt(realPath: string, realRoot: string): Promise<string> {
  const content = await fs.promises.readFile(realPath, 'utf-8');
  return formatExcerpt(toPosix(path.relative(realRoot, realPath)), content);
}

/**
 * Excerpt every existing file the question references.
 * Only files that resolve inside the workspace are read.
 */
export async function gatherDirectFileSnippets(query: string, workspaceRoot: string): Promise<string> {
  let realRoot: string;
  try {
    realRoot = await fs.promises.realpath(workspaceRoot);
  } catch {
    return '';
  }

  const seen = new Set<string>();
  const snippets: string[] = [];

  for (const token of extractPathTokens(query)) {
    if (!isFileReference(token)) continue;

    for (const candidate of candidatePaths(token, realRoot)) {
      let realPath: string;
      try {
        realPath = await fs.promises.realpath(candidate);
        const stat = await fs.promises.stat(realPath);
        if (stat.isDirectory()) continue;
      } catch {
        continue;
      }
      if (!isInside(realPath, realRoot) || seen.has(realPath)) continue;
      seen.add(realPath);

      try {
        snippets.push(await readExcerpt(realPath, realRoot));
        break;
      } catch (error) {
        logger.debug(`Could not read ${candidate}: ${errorMessage(error)}`);
      }
    }
  }

  const lowered = query.toLowerCase();
  if (snippets.length === 0 && FALLBACK_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
    const fallback = path.join(realRoot, FALLBACK_CONTEXT_FILE);
    try {
      const realFallback = await fs.promises.realpath(fallback);
      if (isInside(realFallback, realRoot)) {
        snippets.push(await readExcerpt(realFallback, realRoot));
      }
    } catch {
      logger.debug(`No fallback context file at ${FALLBACK_CONTEXT_FILE}`);
    }
  }

  return snippets.join('\n\n');
}
