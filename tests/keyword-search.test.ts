// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi } from 'vitest';
import { RipgrepSearcher, ripgrepArgs, type CommandRunner } from '../src/search/keyword-search.js';

function enoent(): Error {
  return Object.assign(new Error('spawn rg ENOENT'), { code: 'ENOENT' });
}

describe('ripgrepArgs', () => {
  it('limits file size, match count and context', () => {
    expect(ripgrepArgs('needle', '/work/src')).toEqual([
      '--max-filesize', '1M',
      '--max-count', '5',
      '-n',
      '--context', '1',
      '-e', 'needle',
      '/work/src',
    ]);
  });

  it('passes a query that starts with a dash as a pattern', () => {
    expect(ripgrepArgs('--help', '.')).toContain('--help');
    expect(ripgrepArgs('--help', '.').indexOf('--help')).toBe(ripgrepArgs('--help', '.').indexOf('-e') + 1);
  });
});

describe('RipgrepSearcher', () => {
  it('runs rg once per directory and joins the output', async () => {
    const runner = vi.fn<CommandRunner>()
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'src/a.ts:3:needle\n', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'docs/b.md:7:needle\n', stderr: '' });
    const searcher = new RipgrepSearcher(runner);

    const outcome = await searcher.search('needle', ['/w/src', '/w/docs']);

    expect(outcome).toEqual({ kind: 'matches', output: 'src/a.ts:3:needle\n\ndocs/b.md:7:needle' });
    expect(runner).toHaveBeenCalledTimes(2);
    expect(runner.mock.calls[0]).toEqual(['rg', ripgrepArgs('needle', '/w/src')]);
  });

  it('treats exit status 1 as no matches', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 1, stdout: '', stderr: '' });
    expect(await new RipgrepSearcher(runner).search('needle', ['/w'])).toEqual({ kind: 'no-matches' });
  });

  it('skips directories without matches', async () => {
    const runner = vi.fn<CommandRunner>()
      .mockResolvedValueOnce({ exitCode: 1, stdout: '', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'b.md:1:needle\n', stderr: '' });
    expect(await new RipgrepSearcher(runner).search('needle', ['/a', '/b'])).toEqual({
      kind: 'matches',
      output: 'b.md:1:needle',
    });
  });

  it('reports rg as unavailable when it is not installed', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(enoent());
    expect(await new RipgrepSearcher(runner).search('needle', ['/w'])).toEqual({ kind: 'unavailable' });
  });

  it('reports other exit statuses as errors', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 2, stdout: '', stderr: 'regex parse error\n' });
    expect(await new RipgrepSearcher(runner).search('(', ['/w'])).toEqual({
      kind: 'error',
      message: 'rg failed: regex parse error',
    });
  });

  it('keeps output printed alongside a file error and searches later directories', async () => {
    const runner = vi.fn<CommandRunner>()
      .mockResolvedValueOnce({
        exitCode: 2,
        stdout: 'a.py:3:def target()\n',
        stderr: '/w/src/secret: Permission denied (os error 13)\n',
      })
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'b.md:1:target\n', stderr: '' });

    expect(await new RipgrepSearcher(runner).search('target', ['/w/src', '/w/docs'])).toEqual({
      kind: 'matches',
      output: 'a.py:3:def target()\n\nb.md:1:target',
    });
    expect(runner).toHaveBeenCalledTimes(2);
  });

  it('keeps matches from other directories when one directory fails outright', async () => {
    const runner = vi.fn<CommandRunner>()
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'a.py:3:target\n', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 2, stdout: '', stderr: '/w/docs: No such file or directory\n' });

    expect(await new RipgrepSearcher(runner).search('target', ['/w/src', '/w/docs'])).toEqual({
      kind: 'matches',
      output: 'a.py:3:target',
    });
  });

  it('reports the first failure when no directory produced output', async () => {
    const runner = vi.fn<CommandRunner>()
      .mockResolvedValueOnce({ exitCode: 2, stdout: '', stderr: 'first problem\n' })
      .mockResolvedValueOnce({ exitCode: 1, stdout: '', stderr: '' })
      .mockResolvedValueOnce({ exitCode: 2, stdout: '', stderr: '' });

    expect(await new RipgrepSearcher(runner).search('target', ['/a', '/b', '/c'])).toEqual({
      kind: 'error',
      message: 'rg failed: first problem',
    });
    expect(runner).toHaveBeenCalledTimes(3);
  });

  it('reports a process that could not run as an error', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn EACCES'));
    expect(await new RipgrepSearcher(runner).search('needle', ['/w'])).toEqual({
      kind: 'error',
      message: 'spawn EACCES',
    });
  });

  it('returns no matches when there is nothing to search', async () => {
    const runner = vi.fn<CommandRunner>();
    expect(await new RipgrepSearcher(runner).search('needle', [])).toEqual({ kind: 'no-matches' });
    expect(runner).not.toHaveBeenCalled();
  });
});
