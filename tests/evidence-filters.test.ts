// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QUESTION_TYPE_POLICIES, capSearchLines, truncateReadme } from '../src/evidence/filters.js';
import { findReadme, formatFileListing, listProjectFiles } from '../src/evidence/file-listing.js';
import { createWorkspace, numberedLines, removeWorkspace } from './helpers/workspace.js';

describe('truncateReadme', () => {
  it('stops before the first second-level heading', () => {
    expect(truncateReadme('# Title\n\nIntro\n## Install\nsteps')).toBe('# Title\n\nIntro');
  });

  it('keeps at most 50 lines', () => {
    const readme = truncateReadme(numberedLines(60));
    expect(readme.split('\n')).toHaveLength(50);
    expect(readme.endsWith('line 50')).toBe(true);
  });

  it('keeps a heading on the first line', () => {
    expect(truncateReadme('## Only section\nbody')).toBe('## Only section\nbody');
  });
});

describe('capSearchLines', () => {
  const output = ['l1', 'l2', 'l3', 'l4', 'l5', 'l6', 'l7'].join('\n');

  it('keeps three lines per match', () => {
    expect(capSearchLines(output, 2)).toBe('l1\nl2\nl3\nl4\nl5\nl6');
  });

  it('leaves short output alone', () => {
    expect(capSearchLines(output, 3)).toBe(output);
  });
});

describe('QUESTION_TYPE_POLICIES', () => {
  it('summarizes the README only for overview questions', () => {
    expect(QUESTION_TYPE_POLICIES.overview.readme).toBe('summary');
    expect(QUESTION_TYPE_POLICIES.lookup.readme).toBe('omit');
  });

  it('focuses configuration questions on config and docs', () => {
    expect(QUESTION_TYPE_POLICIES.configuration.defaultFocus).toEqual(['config', 'docs']);
  });
});

describe('listProjectFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace({
      'README.md': '# Readme\n',
      'main.py': 'print(1)\n',
      'src/a.ts': 'export {};\n',
      'src/deep/b.ts': 'export {};\n',
      '.git/config': '[core]\n',
      '.hidden.md': 'hidden\n',
      'node_modules/x/index.js': 'module.exports = {};\n',
      'venv/bin/python': '',
    });
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('lists visible paths shallowest first with directories marked', async () => {
    expect(await listProjectFiles(root)).toEqual([
      'README.md',
      'main.py',
      'src/',
      'src/a.ts',
      'src/deep/',
      'src/deep/b.ts',
    ]);
  });

  it('drops nested excluded directories and paths that only contain an excluded name', async () => {
    const nested = await createWorkspace({
      'pkg/index.ts': 'export {};\n',
      'pkg/node_modules/dep/index.js': 'module.exports = {};\n',
      'pkg/__pycache__/mod.pyc': '',
      'notes_venv.md': 'notes\n',
    });
    try {
      expect(await listProjectFiles(nested)).toEqual(['pkg/', 'pkg/index.ts']);
    } finally {
      await removeWorkspace(nested);
    }
  });
});

describe('formatFileListing', () => {
  it('caps the listing and counts the rest', () => {
    expect(formatFileListing(['a', 'b', 'c'], 2)).toBe('a\nb\n... and 1 more files');
  });

  it('lists everything under the cap', () => {
    expect(formatFileListing(['a', 'b'])).toBe('a\nb');
  });

  it('has a placeholder for an empty listing', () => {
    expect(formatFileListing([])).toBe('No files were listed.');
  });
});

describe('findReadme', () => {
  it('matches file names case-insensitively', () => {
    expect(findReadme(['docs/', 'docs/readme.txt', 'README.md'])).toBe('docs/readme.txt');
  });

  it('ignores directories', () => {
    expect(findReadme(['readme/', 'notes.md'])).toBeUndefined();
  });
});
