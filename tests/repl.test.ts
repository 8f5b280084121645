// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { PassThrough, Writable } from 'stream';
import chalk, { type ColorSupportLevel } from 'chalk';
import { interpretReplInput, runRepl, type ReplState } from '../src/cli/repl.js';

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

const INTRO = "Type '/quit' or '/exit' to quit, or type your question.\nCommands: /model [name], /focus [dirs...]\n";

describe('interpretReplInput', () => {
  it('recognizes exit words case-insensitively', () => {
    const state: ReplState = { model: 'haiku', focus: null };
    for (const word of ['/quit', '/exit', 'quit', 'EXIT']) {
      expect(interpretReplInput(word, state)).toEqual({ type: 'exit' });
    }
  });

  it('ignores blank lines', () => {
    expect(interpretReplInput('   ', { model: 'haiku', focus: null })).toEqual({ type: 'noop' });
  });

  it('applies /model and /focus to the state', () => {
    const state: ReplState = { model: 'haiku', focus: null };
    expect(interpretReplInput('/model llama', state)).toEqual({ type: 'message', text: "Switched model to 'llama'." });
    expect(interpretReplInput('/focus src', state)).toEqual({ type: 'message', text: 'Focus set to: src' });
    expect(state).toEqual({ model: 'llama', focus: ['src'] });
    interpretReplInput('/focus', state);
    expect(state.focus).toBeNull();
  });

  it('treats anything else as a question', () => {
    expect(interpretReplInput('  What is this?  ', { model: 'haiku', focus: null })).toEqual({
      type: 'ask',
      question: 'What is this?',
    });
  });
});

describe('runRepl', () => {
  let level: ColorSupportLevel;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers questions until /quit', async () => {
    const input = new PassThrough();
    const output = collector();
    const state: ReplState = { model: 'haiku', focus: null };
    input.end('/model llama\nWhat is here?\n/quit\nnever read\n');

    await runRepl({
      state,
      input,
      output: output.stream,
      answer: async (question, current) => `answer to ${question} with ${current.model}`,
    });

    expect(output.text()).toBe(
      INTRO + '\n> ' + "Switched model to 'llama'.\n" + '\n> ' + '\nanswer to What is here? with llama\n' + '\n> ' + 'Goodbye!\n'
    );
  });

  it('stops at the end of input', async () => {
    const input = new PassThrough();
    const output = collector();
    input.end();

    await runRepl({ state: { model: 'haiku', focus: null }, input, output: output.stream, answer: async () => '' });
    expect(output.text()).toBe(INTRO + '\n> ' + 'Goodbye!\n');
  });

  it('keeps going after a failed answer', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const input = new PassThrough();
    const output = collector();
    const answer = vi.fn(async (question: string) => {
      if (question === 'bad') throw new Error('boom');
      return 'fine';
    });
    input.end('bad\ngood\n');

    await runRepl({ state: { model: 'haiku', focus: null }, input, output: output.stream, answer });
    expect(console.error).toHaveBeenCalledWith('Error: boom');
    expect(answer).toHaveBeenCalledTimes(2);
    expect(output.text()).toBe(INTRO + '\n> ' + '\n> ' + '\nfine\n' + '\n> ' + 'Goodbye!\n');
  });
});
