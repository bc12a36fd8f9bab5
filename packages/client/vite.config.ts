/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { defineConfig } from 'vite';
import path from 'path';
import { fileURLToPath } from 'url';

const here = path.dirname(fileURLToPath(import.meta.url));

// Builds the single script pages load; the extension copies it from ../extension/static
export default defineConfig({
  resolve: {
    alias: {
      '@marimo-docs/shared': path.resolve(here, '../shared/src/index.ts'),
    },
  },
  build: {
    target: 'es2019',
    outDir: path.resolve(here, '../extension/static'),
    emptyOutDir: false,
    lib: {
      entry: path.resolve(here, 'src/main.ts'),
      name: 'MarimoDocs',
      formats: ['iife'],
      fileName: () => 'marimo-loader.js',
    },
  },
});
