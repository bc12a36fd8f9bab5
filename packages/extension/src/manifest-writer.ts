/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { MANIFEST_FILENAME, MANIFEST_VERSION, isManifest, type Manifest } from '@marimo-docs/shared';
import type { ExportResult } from './exporter.js';

/** Build a manifest from export results, keeping successes in order */
export function createManifest(results: ExportResult[]): Manifest {
  const notebooks: Record<string, string> = {};
  for (const result of results) {
    if (result.success) notebooks[result.name] = result.url;
  }
  return { version: MANIFEST_VERSION, notebooks };
}

/** Write a manifest into `dir`; returns the file path */
export function writeManifest(dir: string, manifest: Manifest, filename = MANIFEST_FILENAME): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, filename);
  writeFileSync(path, `${JSON.stringify(manifest, null, 2)}\n`);
  return path;
}

/** Read a manifest back; null when absent or not a manifest */
export function readManifest(dir: string, filename = MANIFEST_FILENAME): Manifest | null {
  const path = join(dir, filename);
  if (!existsSync(path)) return null;
  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return isManifest(data) ? data : null;
}
