// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Interactive question loop.
 */

import { createInterface } from 'readline';
import chalk from 'chalk';
import { handleFocusCommand, handleModelCommand } from '../assistant.js';
import type { ModelProfileName } from '../providers/index.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';

export interface ReplState {
  model: ModelProfileName;
  /** Directories set with /focus; null means infer from each question */
  focus: string[] | null;
}

export type ReplAction =
  | { type: 'exit' }
  | { type: 'noop' }
  | { type: 'message'; text: string }
  | { type: 'ask'; question: string };

const EXIT_WORDS = ['/quit', '/exit', 'quit', 'exit'];

/**
 * Interpret one input line. `/model` and `/focus` update the state in place.
 */
export function interpretReplInput(line: string, state: ReplState): ReplAction {
  const input = line.trim();
  if (!input) return { type: 'noop' };

  if (EXIT_WORDS.includes(input.toLowerCase())) {
    return { type: 'exit' };
  }

  if (input.startsWith('/model')) {
    const outcome = handleModelCommand(input, state.model);
    state.model = outcome.value;
    return { type: 'message', text: outcome.message };
  }

  if (input.startsWith('/focus')) {
    const outcome = handleFocusCommand(input);
    state.focus = outcome.value;
    return { type: 'message', text: outcome.message };
  }

  return { type: 'ask', question: input };
}

export interface ReplOptions {
  state: ReplState;
  answer: (question: string, state: ReplState) => Promise<string>;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Read questions until /quit, /exit or end of input.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const output = options.output ?? process.stdout;
  const rl = createInterface({
    input: options.input ?? process.stdin,
    output,
    terminal: false,
  });
  const write = (text: string) => output.write(`${text}\n`);

  write("Type '/quit' or '/exit' to quit, or type your question.");
  write(chalk.dim('Commands: /model [name], /focus [dirs...]'));
  output.write(chalk.bold.cyan('\n> '));

  try {
    for await (const line of rl) {
      const action = interpretReplInput(line, options.state);
      if (action.type === 'exit') break;

      if (action.type === 'message') {
        write(action.text);
      } else if (action.type === 'ask') {
        try {
          write(`\n${await options.answer(action.question, options.state)}`);
        } catch (error) {
          logger.error(errorMessage(error), error instanceof Error ? error : undefined);
        }
      }
      output.write(chalk.bold.cyan('\n> '));
    }
  } finally {
    rl.close();
  }
  write('Goodbye!');
}
