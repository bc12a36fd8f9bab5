/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Build-phase orchestration: registers config, the directive and static
 * files with a host, and hooks the export work into its lifecycle.
 *
 *   config-inited  validate config, detect the gallery extension
 *   build-start    export notebooks, write manifests, copy static files
 *   page-built     add launcher metadata to gallery pages
 */

import { resolve } from 'path';
import {
  DATA_NOTEBOOK_NAME,
  PAGE_INFO_GLOBAL,
  createLogger,
  type NotebookPageInfo,
} from '@marimo-docs/shared';
import { NotebookBuilder, type BuildSummary } from './builder.js';
import type { CommandRunner } from './command.js';
import { DEFAULT_CONFIG, readConfig, type MarimoConfig } from './config.js';
import { DIRECTIVE_NAME, createMarimoDirective } from './directive.js';
import { DirectiveError } from './errors.js';
import { NotebookExporter, type ExportResult } from './exporter.js';
import { GALLERY_EXTENSION, GalleryBridge } from './gallery.js';
import type { DirectiveHandler, DocsHost, ExtensionMetadata, PageContext } from './host.js';
import { CSS_FILE, LOADER_FILE, setupStaticFiles } from './static-assets.js';

const log = createLogger('MarimoExtension');

export const VERSION = '0.1.0';

export interface ExtensionOptions {
  /** Replaces the child-process runner (tests, dry runs) */
  runner?: CommandRunner;
  /** Directory holding the stylesheet and loader bundle */
  assetsDir?: string;
}

export interface BuildReport {
  notebooks: BuildSummary;
  gallery: ExportResult[];
  staticFiles: string[];
}

interface Runtime {
  config: MarimoConfig;
  staticDir: string;
  builder: NotebookBuilder;
  bridge: GalleryBridge;
  directive: DirectiveHandler;
}

/** Inline script body that exposes launcher info to the page */
export function renderPageInfoScript(info: NotebookPageInfo): string {
  // `<` escaped so the JSON cannot close the script element
  const json = JSON.stringify(info).replace(/</g, '\\u003c');
  return `window.${PAGE_INFO_GLOBAL} = ${json};`;
}

export class MarimoExtension {
  private runtime: Runtime | null = null;

  constructor(
    private readonly host: DocsHost,
    private readonly options: ExtensionOptions = {},
  ) {}

  get config(): MarimoConfig | null {
    return this.runtime?.config ?? null;
  }

  get galleryStatus(): 'inactive' | 'active' {
    return this.runtime?.bridge.status ?? 'inactive';
  }

  onConfigInited(values: Record<string, unknown>): void {
    const config = readConfig(values);
    const { srcDir, outDir } = this.host;
    const staticDir = resolve(outDir, config.marimoOutputDir);
    const buildDir = resolve(outDir, config.marimoBuildDir);
    const notebookDir = resolve(srcDir, config.marimoNotebookDir);

    const exporter = new NotebookExporter({
      buildDir,
      staticDir,
      command: config.marimoCommand,
      mode: config.marimoExportMode,
      cacheDir: config.marimoCacheDir ? resolve(srcDir, config.marimoCacheDir) : null,
      runner: this.options.runner,
    });

    const bridge = new GalleryBridge({
      outDir,
      buildDir,
      staticDir,
      staticUrlPath: config.marimoOutputDir.replace(/\\/g, '/').replace(/\/+$/, ''),
      exporter,
      transform: {
        prependMarkdown: config.marimoPrependMarkdown,
        moveImportsToTop: config.marimoMoveImportsToTop,
      },
      buttonText: config.marimoButtonText,
      showFooterButton: config.marimoShowFooterButton,
      showSidebarButton: config.marimoShowSidebarButton,
    });
    bridge.activate(this.host.getExtension(GALLERY_EXTENSION));

    this.runtime = {
      config,
      staticDir,
      builder: new NotebookBuilder(notebookDir, staticDir, exporter),
      bridge,
      directive: createMarimoDirective({
        notebookDir,
        defaults: {
          height: config.marimoDefaultHeight,
          width: config.marimoDefaultWidth,
          theme: config.marimoDefaultTheme,
        },
      }),
    };

    this.host.addCssFile(`${config.marimoOutputDir}/${CSS_FILE}`);
    this.host.addJsFile(`${config.marimoOutputDir}/${LOADER_FILE}`, { defer: 'defer' });
  }

  async onBuildStart(): Promise<BuildReport> {
    const runtime = this.requireRuntime();
    const notebooks = await runtime.builder.buildAll();
    const gallery = await runtime.bridge.convertAll();
    const staticFiles = setupStaticFiles(runtime.staticDir, this.options.assetsDir);
    return { notebooks, gallery, staticFiles };
  }

  onPageBuilt(page: PageContext): void {
    const runtime = this.requireRuntime();
    const { marimoShowFooterButton, marimoShowSidebarButton } = runtime.config;
    if (!marimoShowFooterButton && !marimoShowSidebarButton) return;

    const info = runtime.bridge.getNotebookInfo(page.docname);
    if (!info) return;

    page.addScript(renderPageInfoScript(info), { [DATA_NOTEBOOK_NAME]: info.notebookName });
    log.debug('Added launcher info', info.notebookUrl, { notebook: info.notebookName });
  }

  /** Directive entry point; delegates once config is known */
  readonly directive: DirectiveHandler = (invocation, context) => {
    if (!this.runtime) {
      throw new DirectiveError('marimo directive used before config-inited', context.docname, invocation.line);
    }
    return this.runtime.directive(invocation, context);
  };

  private requireRuntime(): Runtime {
    if (!this.runtime) {
      throw new Error('marimo extension used before config-inited');
    }
    return this.runtime;
  }
}

/**
 * Register the extension with a documentation host.
 */
export function setup(host: DocsHost, options: ExtensionOptions = {}): ExtensionMetadata {
  const extension = new MarimoExtension(host, options);

  for (const [key, value] of Object.entries(DEFAULT_CONFIG)) {
    host.addConfigValue(key, value);
  }
  host.addDirective(DIRECTIVE_NAME, extension.directive);

  host.on('config-inited', values => extension.onConfigInited(values));
  host.on('build-start', async () => {
    await extension.onBuildStart();
  });
  host.on('page-built', page => extension.onPageBuilt(page));

  return {
    version: VERSION,
    parallelReadSafe: true,
    parallelWriteSafe: true,
  };
}
