/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * marimo-docs CLI entry
 *
 * Usage:
 *   marimo-docs build <srcDir> <outDir> [--config file.json]
 *   marimo-docs render <page.rst> <srcDir> <outDir> [--config file.json]
 *   marimo-docs info
 */

import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error('\nError:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
