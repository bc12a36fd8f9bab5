/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { existsSync, readdirSync, statSync } from 'fs';
import { join, relative, sep } from 'path';

export const NOTEBOOK_EXTENSION = '.py';

export interface NotebookSource {
  /** Absolute path */
  path: string;
  /** Path relative to the notebook directory, always with `/` separators */
  relativePath: string;
  /** Manifest key and output file stem */
  name: string;
}

/**
 * Manifest name of a notebook: its relative path without the `.py`
 * suffix, with directory separators flattened to `_`.
 *
 * `intro.py` -> `intro`, `sub/intro.py` -> `sub_intro`
 */
export function notebookName(relativePath: string): string {
  const withoutExt = relativePath.endsWith(NOTEBOOK_EXTENSION)
    ? relativePath.slice(0, -NOTEBOOK_EXTENSION.length)
    : relativePath;
  return withoutExt.replace(/[\\/]/g, '_');
}

/** Recursively list files under `dir` that end with `extension`, sorted */
export function findFiles(dir: string, extension: string): string[] {
  if (!existsSync(dir)) return [];
  const found: string[] = [];

  const walk = (current: string) => {
    for (const entry of readdirSync(current)) {
      if (entry.startsWith('.') || entry === '__pycache__') continue;
      const full = join(current, entry);
      if (statSync(full).isDirectory()) {
        walk(full);
      } else if (entry.endsWith(extension)) {
        found.push(full);
      }
    }
  };

  walk(dir);
  return found.sort();
}

/** Discover notebook sources under the notebook directory */
export function discoverNotebooks(notebookDir: string): NotebookSource[] {
  return findFiles(notebookDir, NOTEBOOK_EXTENSION).map(path => {
    const relativePath = relative(notebookDir, path).split(sep).join('/');
    return { path, relativePath, name: notebookName(relativePath) };
  });
}
