// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Keyword Search
 *
 * Literal code search through ripgrep. The process runner is injectable so
 * callers can substitute an in-process fake.
 */

import { execFile } from 'child_process';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';

const TIMEOUT_MS = 30000;
const MAX_BUFFER = 10 * 1024 * 1024;

/** Matches reported per searched directory */
export const MATCHES_PER_DIRECTORY = 5;

/** Context lines printed on each side of a match */
export const CONTEXT_LINES = 1;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable with arguments.
 * Resolves with the exit status; rejects when the process cannot be started.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export type KeywordSearchOutcome =
  | { kind: 'unavailable' }
  | { kind: 'no-matches' }
  | { kind: 'matches'; output: string }
  | { kind: 'error'; message: string };

export interface KeywordSearcher {
  /**
   * Search each directory for the literal query and collect the output.
   */
  search(query: string, directories: string[]): Promise<KeywordSearchOutcome>;
}

/**
 * Runner built on child_process.execFile.
 */
export const execFileRunner: CommandRunner = (file, args) =>
  new Promise<CommandResult>((resolve, reject) => {
    execFile(file, args, { timeout: TIMEOUT_MS, maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
      } else if (typeof error.code === 'number') {
        resolve({ exitCode: error.code, stdout, stderr });
      } else {
        reject(error);
      }
    });
  });

function isCommandNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Build the ripgrep argument list for one directory.
 */
export function ripgrepArgs(query: string, directory: string): string[] {
  return [
    '--max-filesize', '1M',
    '--max-count', String(MATCHES_PER_DIRECTORY),
    '-n',
    '--context', String(CONTEXT_LINES),
    '-e', query,
    directory,
  ];
}

export class RipgrepSearcher implements KeywordSearcher {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner = execFileRunner) {
    this.runner = runner;
  }

  /**
   * A directory that fails still contributes whatever rg printed. The search
   * is an error only when no directory produced output.
   */
  async search(query: string, directories: string[]): Promise<KeywordSearchOutcome> {
    const outputs: string[] = [];
    let failure: string | undefined;

    for (const directory of directories) {
      const args = ripgrepArgs(query, directory);
      logger.debug(`rg ${args.join(' ')}`);

      let result: CommandResult;
      try {
        result = await this.runner('rg', args);
      } catch (error) {
        if (isCommandNotFound(error)) {
          return { kind: 'unavailable' };
        }
        failure ??= errorMessage(error);
        continue;
      }

      const output = result.stdout.trimEnd();
      // Exit status 1 means nothing matched
      if (result.exitCode !== 0 && result.exitCode !== 1) {
        const detail = result.stderr.trim() || `exit status ${result.exitCode}`;
        logger.debug(`rg exited with ${result.exitCode} in ${directory}: ${detail}`);
        if (!output) failure ??= `rg failed: ${detail}`;
      }
      if (output) outputs.push(output);
    }

    if (outputs.length > 0) {
      return { kind: 'matches', output: outputs.join('\n\n') };
    }
    return failure === undefined ? { kind: 'no-matches' } : { kind: 'error', message: failure };
  }
}
