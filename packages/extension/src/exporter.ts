/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Exporter invoker - shells out to `marimo export html-wasm` and publishes
 * the bundle into the static output tree.
 *
 * Layout after a successful export of `intro` in the `notebooks` namespace:
 *
 *   <buildDir>/notebooks/intro/index.html   (raw exporter output)
 *   <buildDir>/notebooks/intro/assets/...
 *   <staticDir>/notebooks/intro.html        (published page)
 *   <staticDir>/notebooks/assets/...        (shared by every page in the namespace)
 *
 * Raw output directories are created when absent and never emptied here;
 * the documentation build's clean step owns them.
 */

import { cpSync, existsSync, mkdirSync, readdirSync, rmSync } from 'fs';
import { basename, extname, join } from 'path';
import { bundleUrl, createLogger } from '@marimo-docs/shared';
import { ExportCache } from './cache.js';
import { describeFailure, runCommand, type CommandRunner } from './command.js';
import type { ExportMode } from './config.js';

const log = createLogger('Exporter');

const BUNDLE_ENTRY = 'index.html';

export interface ExporterOptions {
  /** Absolute scratch directory for raw exporter output */
  buildDir: string;
  /** Absolute static marimo root that bundles are published into */
  staticDir: string;
  /** Notebook tool executable (default: marimo) */
  command?: string;
  mode?: ExportMode;
  /** Absolute cache directory; omit or null to disable */
  cacheDir?: string | null;
  runner?: CommandRunner;
}

export interface ExportSuccess {
  success: true;
  source: string;
  name: string;
  /** Raw exporter output directory */
  outputDir: string;
  /** Absolute path of the published page */
  bundlePath: string;
  /** Page URL relative to the static marimo root */
  url: string;
  fromCache: boolean;
}

export interface ExportFailure {
  success: false;
  source: string;
  name: string;
  outputDir: string;
  error: string;
}

export type ExportResult = ExportSuccess | ExportFailure;

export type ConvertResult = { success: true; output: string } | { success: false; error: string };

export class NotebookExporter {
  private readonly command: string;
  private readonly mode: ExportMode;
  private readonly runner: CommandRunner;
  private readonly cache: ExportCache | null;

  constructor(private readonly options: ExporterOptions) {
    this.command = options.command ?? 'marimo';
    this.mode = options.mode ?? 'edit';
    this.runner = options.runner ?? runCommand;
    this.cache = options.cacheDir ? new ExportCache(options.cacheDir) : null;
  }

  /**
   * Export one notebook. Failures are returned, never thrown, so a bad
   * notebook cannot stop the rest of the build.
   */
  async export(sourcePath: string, namespace: string, name = stem(sourcePath)): Promise<ExportResult> {
    const outputDir = this.outputDirFor(namespace, name);
    const fail = (error: string): ExportFailure => {
      log.error('Export failed', undefined, { operation: 'export', notebook: name, data: { error } });
      return { success: false, source: sourcePath, name, outputDir, error };
    };

    if (!existsSync(sourcePath)) {
      return fail(`notebook source not found: ${sourcePath}`);
    }

    const settings = [this.command, this.mode, namespace];
    const cacheKey = this.cache?.key(sourcePath, settings);
    let fromCache = false;

    mkdirSync(outputDir, { recursive: true });

    if (this.cache && cacheKey && this.cache.has(cacheKey)) {
      this.cache.restore(cacheKey, outputDir);
      fromCache = true;
      log.debug('Restored from cache', cacheKey, { notebook: name });
    } else {
      const args = ['export', 'html-wasm', sourcePath, '-o', outputDir, '--mode', this.mode];
      log.debug('Running', [this.command, ...args].join(' '), { notebook: name });
      const result = await this.runner(this.command, args);
      if (result.code !== 0) {
        return fail(describeFailure(this.command, args, result));
      }
    }

    if (!existsSync(join(outputDir, BUNDLE_ENTRY))) {
      return fail(`${this.command} produced no ${BUNDLE_ENTRY} in ${outputDir}`);
    }

    if (this.cache && cacheKey && !fromCache) {
      this.cache.store(cacheKey, outputDir);
    }

    const bundlePath = this.publish(outputDir, namespace, name);
    log.info(`Exported ${name}${fromCache ? ' (cached)' : ''}`, { operation: 'export' });
    return {
      success: true,
      source: sourcePath,
      name,
      outputDir,
      bundlePath,
      url: bundleUrl(namespace, name),
      fromCache,
    };
  }

  /** Raw exporter output directory for a notebook */
  outputDirFor(namespace: string, name: string): string {
    return join(this.options.buildDir, namespace, name);
  }

  /** Convert a Jupyter notebook into marimo's `.py` format */
  async convert(ipynbPath: string, outputPath: string): Promise<ConvertResult> {
    // marimo convert refuses to overwrite
    rmSync(outputPath, { force: true });
    const args = ['convert', ipynbPath, '-o', outputPath];
    const result = await this.runner(this.command, args);
    if (result.code !== 0) {
      return { success: false, error: describeFailure(this.command, args, result) };
    }
    if (!existsSync(outputPath)) {
      return { success: false, error: `${this.command} convert produced no ${outputPath}` };
    }
    return { success: true, output: outputPath };
  }

  /** Copy the bundle into `<staticDir>/<namespace>/`, renaming its entry page */
  private publish(outputDir: string, namespace: string, name: string): string {
    const targetDir = join(this.options.staticDir, namespace);
    mkdirSync(targetDir, { recursive: true });

    for (const entry of readdirSync(outputDir)) {
      const from = join(outputDir, entry);
      const to = entry === BUNDLE_ENTRY ? join(targetDir, `${name}.html`) : join(targetDir, entry);
      cpSync(from, to, { recursive: true });
    }
    return join(targetDir, `${name}.html`);
  }
}

function stem(path: string): string {
  return basename(path, extname(path));
}
