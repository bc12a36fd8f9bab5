/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Gallery bridge - turns the Jupyter notebooks a gallery generator leaves
 * in `_downloads` into marimo bundles, and tells gallery pages which
 * bundle belongs to them.
 */

import { existsSync, mkdirSync } from 'fs';
import { basename, dirname, join } from 'path';
import {
  GALLERY_MANIFEST_FILENAME,
  GALLERY_NAMESPACE,
  createLogger,
  type NotebookPageInfo,
} from '@marimo-docs/shared';
import { findFiles } from './discovery.js';
import type { ExportResult, ExportSuccess, NotebookExporter } from './exporter.js';
import type { ExtensionHandle } from './host.js';
import { createManifest, writeManifest } from './manifest-writer.js';
import { transformNotebookFile, type TransformOptions } from './transform.js';

const log = createLogger('GalleryBridge');

/** Name the gallery generator registers under */
export const GALLERY_EXTENSION = 'sphinx-gallery';
/** Where the gallery generator puts downloadable notebooks, under the HTML output directory */
export const GALLERY_DOWNLOADS_DIR = '_downloads';

export type GalleryBridgeState =
  | { status: 'inactive' }
  | { status: 'active'; galleryDirs: string[]; downloadsDir: string };

export interface GalleryBridgeOptions {
  /** HTML output directory */
  outDir: string;
  /** Absolute scratch directory */
  buildDir: string;
  /** Absolute static marimo root */
  staticDir: string;
  /** Static marimo root relative to the HTML output directory, with `/` separators */
  staticUrlPath: string;
  exporter: NotebookExporter;
  transform?: TransformOptions;
  buttonText?: string;
  showFooterButton?: boolean;
  showSidebarButton?: boolean;
}

function readGalleryDirs(config: Record<string, unknown>): string[] {
  const value = config.galleryDirs;
  const dirs = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  return dirs
    .filter((dir): dir is string => typeof dir === 'string' && dir.length > 0)
    .map(dir => dir.replace(/^\.\/|\/+$/g, ''));
}

export class GalleryBridge {
  private state: GalleryBridgeState = { status: 'inactive' };
  private readonly converted = new Map<string, ExportSuccess>();

  constructor(private readonly options: GalleryBridgeOptions) {}

  get status(): GalleryBridgeState['status'] {
    return this.state.status;
  }

  /**
   * Activate when the gallery extension is registered and has gallery
   * directories configured. Called once, at config time.
   */
  activate(gallery: ExtensionHandle | undefined): boolean {
    if (!gallery) {
      log.debug('Gallery extension not registered; launcher disabled');
      return false;
    }
    const galleryDirs = readGalleryDirs(gallery.config);
    if (galleryDirs.length === 0) {
      log.debug('Gallery extension has no galleryDirs; launcher disabled');
      return false;
    }

    const downloads = gallery.config.downloadsDir;
    const downloadsDir = typeof downloads === 'string' && downloads
      ? downloads
      : join(this.options.outDir, GALLERY_DOWNLOADS_DIR);

    this.state = { status: 'active', galleryDirs, downloadsDir };
    log.info(`Gallery detected (${galleryDirs.join(', ')}); launcher enabled`);
    return true;
  }

  /**
   * Convert and export every gallery notebook, then write the gallery
   * manifest. A no-op while inactive.
   */
  async convertAll(): Promise<ExportResult[]> {
    if (this.state.status === 'inactive') return [];
    const { downloadsDir } = this.state;

    if (!existsSync(downloadsDir)) {
      log.warn(`Gallery notebooks directory not found: ${downloadsDir}`);
      return [];
    }

    const notebooks = findFiles(downloadsDir, '.ipynb');
    log.info(`Found ${notebooks.length} gallery notebooks to convert`);

    const sourceDir = join(this.options.buildDir, `${GALLERY_NAMESPACE}-src`);
    mkdirSync(sourceDir, { recursive: true });

    const results: ExportResult[] = [];
    for (const [index, ipynb] of notebooks.entries()) {
      const name = basename(ipynb, '.ipynb');
      const result = await this.convertOne(ipynb, join(sourceDir, `${name}.py`), name);
      results.push(result);
      if (result.success) {
        this.converted.set(name, result);
        log.info(`Converted ${index + 1}/${notebooks.length}: ${name}`);
      }
    }

    writeManifest(this.options.staticDir, createManifest(results), GALLERY_MANIFEST_FILENAME);
    log.info(`Converted ${this.converted.size} of ${notebooks.length} gallery notebooks`);
    return results;
  }

  private async convertOne(ipynb: string, pyPath: string, name: string): Promise<ExportResult> {
    const { exporter, transform } = this.options;

    const converted = await exporter.convert(ipynb, pyPath);
    if (!converted.success) {
      log.error('Conversion failed', undefined, { operation: 'convert', notebook: name, data: { error: converted.error } });
      return {
        success: false,
        source: ipynb,
        name,
        outputDir: join(this.options.buildDir, GALLERY_NAMESPACE, name),
        error: converted.error,
      };
    }

    if (transform && (transform.prependMarkdown || transform.moveImportsToTop)) {
      try {
        transformNotebookFile(pyPath, transform);
      } catch (err) {
        log.warn(`Transform skipped: ${err instanceof Error ? err.message : String(err)}`, { notebook: name });
      }
    }

    return exporter.export(pyPath, GALLERY_NAMESPACE, name);
  }

  /** Whether a page belongs to one of the configured galleries */
  isGalleryPage(docname: string): boolean {
    if (this.state.status === 'inactive') return false;
    return this.state.galleryDirs.some(dir => docname === dir || docname.startsWith(`${dir}/`));
  }

  /**
   * Launcher info for a gallery page, or null when the page is not in a
   * gallery or its notebook failed to export.
   */
  getNotebookInfo(docname: string): NotebookPageInfo | null {
    if (!this.isGalleryPage(docname)) return null;

    const name = basename(docname);
    const exported = this.converted.get(name);
    if (!exported) return null;

    const depth = dirname(docname) === '.' ? 0 : dirname(docname).split('/').length;
    const info: NotebookPageInfo = {
      notebookName: name,
      notebookUrl: `${'../'.repeat(depth)}${this.options.staticUrlPath}/${exported.url}`,
      showFooterButton: this.options.showFooterButton ?? true,
      showSidebarButton: this.options.showSidebarButton ?? true,
    };
    if (this.options.buttonText) info.buttonText = this.options.buttonText;
    return info;
  }
}
