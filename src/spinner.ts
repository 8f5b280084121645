// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * One ora spinner at a time, for startup indexing and evidence gathering.
 * Spinners only render when stderr is a terminal.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

export type SpinnerPhase = 'indexing' | 'searching';

type Outcome = 'succeed' | 'fail' | 'stop';

class SpinnerManager {
  private current: { spinner: Ora; phase: SpinnerPhase } | null = null;
  private enabled: boolean;

  constructor() {
    this.enabled = process.stderr.isTTY ?? false;
  }

  /**
   * Turn spinners on or off. Turning them off stops the running one.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) this.finish('stop');
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getPhase(): SpinnerPhase | null {
    return this.current?.phase ?? null;
  }

  searching(): void {
    this.begin('searching', chalk.cyan('Searching codebase...'));
  }

  /**
   * Show per-file indexing progress, reusing the running indexing spinner.
   */
  indexing(current: number, total: number, file?: string): void {
    const text = chalk.blue(file ? `Indexing ${current}/${total}: ${file}` : `Indexing ${current}/${total} files...`);
    if (this.current?.phase === 'indexing') {
      this.current.spinner.text = text;
      return;
    }
    this.begin('indexing', text);
  }

  succeed(text?: string): void {
    this.finish('succeed', text);
  }

  fail(text?: string): void {
    this.finish('fail', text);
  }

  /**
   * Clear the spinner without a status symbol.
   */
  stop(): void {
    this.finish('stop');
  }

  private begin(phase: SpinnerPhase, text: string): void {
    this.finish('stop');
    if (!this.enabled) return;

    try {
      const spinner = ora({ text, color: 'cyan', spinner: 'dots', discardStdin: false }).start();
      this.current = { spinner, phase };
    } catch {
      // Output still works without a spinner
      this.current = null;
    }
  }

  private finish(outcome: Outcome, text?: string): void {
    const active = this.current;
    if (!active) return;
    this.current = null;

    try {
      if (outcome === 'succeed') active.spinner.succeed(text);
      else if (outcome === 'fail') active.spinner.fail(text);
      else active.spinner.stop();
    } catch {
      // The terminal may already be gone at exit
    }
  }
}

export const spinner = new SpinnerManager();
