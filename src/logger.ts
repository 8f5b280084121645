// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware console output: NORMAL → VERBOSE → DEBUG → TRACE.
 */

import chalk from 'chalk';

export enum LogLevel {
  /** Answers, warnings and errors only */
  NORMAL = 0,
  /** Indexing progress and embedding batches */
  VERBOSE = 1,
  /** Section timing, tool calls, search commands and LLM requests */
  DEBUG = 2,
  /** Full prompts and evidence */
  TRACE = 3,
}

/**
 * Map CLI flags to a level; the most detailed flag wins.
 */
export function parseLogLevel(options: { verbose?: boolean; debug?: boolean; trace?: boolean }): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

const PROMPT_PREVIEW_CHARS = 500;

/**
 * Strip control characters and make line breaks visible.
 */
function sanitize(text: string): string {
  return text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/\r?\n/g, '\\n')
    .replace(/\t/g, '\\t');
}

class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  private write(level: LogLevel, text: string, style: (text: string) => string = chalk.dim): void {
    if (this.isLevelEnabled(level)) {
      console.log(style(text));
    }
  }

  verbose(message: string): void {
    this.write(LogLevel.VERBOSE, message);
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, `[Debug] ${message}`);
  }

  trace(message: string): void {
    this.write(LogLevel.TRACE, `[Trace] ${message}`, chalk.gray);
  }

  indexProgress(current: number, total: number, file: string): void {
    this.write(LogLevel.VERBOSE, `[Index] ${current}/${total} ${file}`);
  }

  /**
   * Batches are only worth reporting when there is more than one.
   */
  embeddingBatch(batch: number, totalBatches: number, size: number): void {
    if (totalBatches > 1) {
      this.write(LogLevel.VERBOSE, `  Embedding batch ${batch}/${totalBatches} (${size} texts)...`);
    }
  }

  sectionTiming(section: string, durationMs: number): void {
    this.write(LogLevel.DEBUG, `[Evidence] ${section} (${(durationMs / 1000).toFixed(2)}s)`);
  }

  /**
   * Request summary at DEBUG; a prompt preview at TRACE.
   */
  llmRequest(provider: string, model: string, prompt: string): void {
    this.write(LogLevel.DEBUG, `[LLM] Sending to ${provider}/${model} (${prompt.length.toLocaleString()} chars)...`);
    const preview = prompt.length > PROMPT_PREVIEW_CHARS ? `${prompt.slice(0, PROMPT_PREVIEW_CHARS)}...` : prompt;
    this.write(LogLevel.TRACE, `  prompt: "${sanitize(preview)}"`, chalk.gray);
  }

  llmResponse(chars: number, durationSeconds: number): void {
    this.write(LogLevel.DEBUG, `[LLM] Response: ${chars.toLocaleString()} chars, ${durationSeconds.toFixed(2)}s`);
  }

  /**
   * Always printed; the stack follows at DEBUG.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.isLevelEnabled(LogLevel.DEBUG)) {
      console.error(chalk.dim(error.stack ?? 'No stack trace available'));
    }
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

export const logger = new Logger();
