/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { NOTEBOOK_NAMESPACE, createLogger, type Manifest } from '@marimo-docs/shared';
import { discoverNotebooks, type NotebookSource } from './discovery.js';
import type { ExportFailure, ExportResult, NotebookExporter } from './exporter.js';
import { createManifest, writeManifest } from './manifest-writer.js';

const log = createLogger('NotebookBuilder');

export interface BuildSummary {
  results: ExportResult[];
  manifest: Manifest;
  manifestPath: string;
}

/**
 * Exports every notebook under the notebook directory and writes the
 * manifest the browser loader reads.
 */
export class NotebookBuilder {
  constructor(
    private readonly notebookDir: string,
    private readonly staticDir: string,
    private readonly exporter: NotebookExporter,
  ) {}

  async buildAll(): Promise<BuildSummary> {
    const sources = discoverNotebooks(this.notebookDir);
    if (sources.length === 0) {
      log.warn(`No notebooks found in ${this.notebookDir}`);
    }

    // Sequential: one external process at a time
    const results: ExportResult[] = [];
    const claimed = new Map<string, string>();
    for (const source of sources) {
      const owner = claimed.get(source.name);
      if (owner !== undefined) {
        results.push(this.duplicate(source, owner));
        continue;
      }
      claimed.set(source.name, source.relativePath);
      results.push(await this.exporter.export(source.path, NOTEBOOK_NAMESPACE, source.name));
    }

    const manifest = createManifest(results);
    const manifestPath = writeManifest(this.staticDir, manifest);

    const failed = results.length - Object.keys(manifest.notebooks).length;
    if (failed > 0) {
      log.warn(`${failed} of ${results.length} notebooks failed to export and were left out of the manifest`);
    }
    log.info(`Exported ${results.length - failed} notebooks`, { operation: 'buildAll' });

    return { results, manifest, manifestPath };
  }

  /** `sub/a.py` and `sub_a.py` flatten to one name; the first in path order keeps it */
  private duplicate(source: NotebookSource, owner: string): ExportFailure {
    const error = `notebook name "${source.name}" is already used by ${owner}`;
    log.error(`Skipping ${source.relativePath}`, undefined, { operation: 'buildAll', notebook: source.name, data: { error } });
    return {
      success: false,
      source: source.path,
      name: source.name,
      outputDir: this.exporter.outputDirFor(NOTEBOOK_NAMESPACE, source.name),
      error,
    };
  }
}
