/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { copyFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from '@marimo-docs/shared';

const log = createLogger('StaticAssets');

export const CSS_FILE = 'marimo-embed.css';
/** Built from @marimo-docs/client by `vite build` */
export const LOADER_FILE = 'marimo-loader.js';

/** Files the host page links, relative to the static marimo root */
export const STATIC_FILES = [CSS_FILE, LOADER_FILE] as const;

// static/ sits beside src/; tsc output under dist/ is four levels below the root
const ASSET_DIR_CANDIDATES = ['../static/', '../../../../packages/extension/static/'];

/** First candidate holding the stylesheet, relative to the given module */
export function resolveAssetsDir(moduleUrl: string | URL): string {
  const candidates = ASSET_DIR_CANDIDATES.map(path => fileURLToPath(new URL(path, moduleUrl)));
  return candidates.find(dir => existsSync(join(dir, CSS_FILE))) ?? candidates[0];
}

/** Directory holding the stylesheet and the built loader bundle */
export const ASSETS_DIR = resolveAssetsDir(import.meta.url);

/**
 * Copy the stylesheet and loader script into the static marimo root.
 * A missing file is logged, not fatal: pages still render, just without
 * the loader.
 */
export function setupStaticFiles(staticDir: string, assetsDir = ASSETS_DIR): string[] {
  mkdirSync(staticDir, { recursive: true });
  const copied: string[] = [];

  for (const file of STATIC_FILES) {
    const from = join(assetsDir, file);
    if (!existsSync(from)) {
      log.warn(`${file} not found in ${assetsDir}; run the client build first`);
      continue;
    }
    copyFileSync(from, join(staticDir, file));
    copied.push(file);
  }
  return copied;
}
