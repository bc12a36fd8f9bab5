/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { discoverNotebooks, findFiles, notebookName } from './discovery.js';

describe('notebookName', () => {
  it('strips the extension and flattens directories', () => {
    expect(notebookName('intro.py')).toBe('intro');
    expect(notebookName('sub/intro.py')).toBe('sub_intro');
    expect(notebookName('a\\b\\c.py')).toBe('a_b_c');
  });
});

describe('discoverNotebooks', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'marimo-docs-discovery-'));
    mkdirSync(join(dir, 'sub'));
    mkdirSync(join(dir, '__pycache__'));
    mkdirSync(join(dir, '.ipynb_checkpoints'));
    writeFileSync(join(dir, 'intro.py'), '');
    writeFileSync(join(dir, 'notes.md'), '');
    writeFileSync(join(dir, 'sub', 'deep.py'), '');
    writeFileSync(join(dir, '__pycache__', 'intro.py'), '');
    writeFileSync(join(dir, '.ipynb_checkpoints', 'intro.py'), '');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds .py files recursively, skipping caches and hidden entries', () => {
    expect(discoverNotebooks(dir)).toEqual([
      { path: join(dir, 'intro.py'), relativePath: 'intro.py', name: 'intro' },
      { path: join(dir, 'sub', 'deep.py'), relativePath: 'sub/deep.py', name: 'sub_deep' },
    ]);
  });

  it('returns nothing for a missing directory', () => {
    expect(findFiles(join(dir, 'missing'), '.py')).toEqual([]);
    expect(discoverNotebooks(join(dir, 'missing'))).toEqual([]);
  });
});
