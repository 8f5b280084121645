#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { program } from 'commander';
import chalk from 'chalk';
import { VERSION } from './version.js';
import { spinner } from './spinner.js';
import { logger, parseLogLevel, LogLevel } from './logger.js';
import { resolveEnvironmentConfig } from './config/index.js';
import { createProvider, getProfileNames, type ModelProfileName } from './providers/index.js';
import { createToolRegistry } from './tools/index.js';
import { answerQuestion, inferFocusFromQuestion, resolveInitialProfile } from './assistant.js';
import { prepareRagIndex } from './cli/startup.js';
import { runRepl, type ReplState } from './cli/repl.js';
import { errorMessage } from './errors.js';

// CLI setup
program
  .name('ask')
  .description('Ask questions about the codebase in the current directory')
  .version(VERSION, '-v, --version', 'Output the current version')
  .argument('[question]', 'Question to answer; starts an interactive session when omitted')
  .option('-m, --model <profile>', `Model profile to use (${getProfileNames().join(', ')})`)
  .option('--skip-rag', 'Skip RAG indexing for this session')
  .option('--verbose', 'Show indexing progress and section timing')
  .option('--debug', 'Show search commands and model requests')
  .option('--trace', 'Show full prompts and evidence')
  .parse();

const options = program.opts<{
  model?: string;
  skipRag?: boolean;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}>();

async function main(): Promise<void> {
  const logLevel = parseLogLevel(options);
  logger.setLevel(logLevel);
  // Spinners conflict with verbose output
  if (logLevel > LogLevel.NORMAL) {
    spinner.setEnabled(false);
  }

  const env = resolveEnvironmentConfig(process.env);
  const workspaceRoot = process.cwd();
  const registry = createToolRegistry({ embedding: env.embedding });
  const connections = { anthropicApiKey: env.anthropicApiKey, ollamaBaseUrl: env.ollamaBaseUrl };

  if (!options.skipRag) {
    await prepareRagIndex(workspaceRoot, env.embedding);
  }

  const answer = async (question: string, model: ModelProfileName, focus: string[] | null): Promise<string> => {
    spinner.searching();
    try {
      return await answerQuestion(question, {
        provider: createProvider(model, connections),
        registry,
        focusAreas: focus ?? inferFocusFromQuestion(question),
        workspaceRoot,
      });
    } finally {
      spinner.stop();
    }
  };

  const initialModel = resolveInitialProfile(options.model, env.modelProfile);
  const question = program.args[0];

  if (question) {
    console.log(`\n${await answer(question, initialModel, null)}`);
    return;
  }

  const state: ReplState = { model: initialModel, focus: null };
  console.log(chalk.bold('Starting codebase assistant...'));
  await runRepl({
    state,
    answer: (q, current) => answer(q, current.model, current.focus),
  });
}

main().catch((error: unknown) => {
  console.error(chalk.red(`An unexpected error occurred: ${errorMessage(error)}`));
  console.error('Please ensure your configuration files are correct and all dependencies are installed.');
  process.exit(1);
});
