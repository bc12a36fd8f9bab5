/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @marimo-docs/extension
 *
 * Exports marimo notebooks to WASM bundles during a documentation build
 * and embeds them with a `marimo` directive.
 *
 * @example
 * ```typescript
 * import { StaticDocsHost, setup } from '@marimo-docs/extension';
 *
 * const host = new StaticDocsHost({ srcDir: 'docs', outDir: 'docs/_build/html' });
 * setup(host);
 * await host.init();
 * await host.startBuild();
 * await host.writePage('index', '.. marimo:: intro.py\n   :height: 400px\n');
 * ```
 */

export { setup, MarimoExtension, renderPageInfoScript, VERSION, type ExtensionOptions, type BuildReport } from './extension.js';
export { DEFAULT_CONFIG, readConfig, type MarimoConfig, type ExportMode } from './config.js';
export { DirectiveError, MissingNotebookError, ConfigError } from './errors.js';
export {
  NotebookExporter,
  type ExporterOptions,
  type ExportResult,
  type ExportSuccess,
  type ExportFailure,
  type ConvertResult,
} from './exporter.js';
export { runCommand, describeFailure, type CommandRunner, type CommandResult } from './command.js';
export { ExportCache } from './cache.js';
export { NotebookBuilder, type BuildSummary } from './builder.js';
export { createManifest, writeManifest, readManifest } from './manifest-writer.js';
export { discoverNotebooks, findFiles, notebookName, type NotebookSource } from './discovery.js';
export {
  GalleryBridge,
  GALLERY_EXTENSION,
  GALLERY_DOWNLOADS_DIR,
  type GalleryBridgeOptions,
  type GalleryBridgeState,
} from './gallery.js';
export {
  parseNotebook,
  serializeNotebook,
  prependMarkdown,
  moveImportsToTop,
  transformNotebook,
  transformNotebookFile,
  type ParsedNotebook,
  type TransformOptions,
} from './transform.js';
export {
  createMarimoDirective,
  resolveEmbedOptions,
  renderEmbed,
  pageOptionField,
  DIRECTIVE_NAME,
  DIRECTIVE_OPTIONS,
  type EmbedOptions,
  type DirectiveOption,
  type MarimoDirectiveSettings,
} from './directive.js';
export { findDirectives, expandDirectives, readPageMetadata, escapeHtml, type DirectiveBlock } from './markup.js';
export { setupStaticFiles, resolveAssetsDir, ASSETS_DIR, CSS_FILE, LOADER_FILE, STATIC_FILES } from './static-assets.js';
export { createProgram, loadConfig, CONFIG_FILE, type ProgramOptions } from './program.js';
export { StaticDocsHost, type StaticDocsHostOptions, type RenderedPage, type PageScript } from './static-host.js';
export type {
  DocsHost,
  DirectiveHandler,
  DirectiveContext,
  DirectiveInvocation,
  PageContext,
  HostEventMap,
  HostEventCallback,
  ExtensionHandle,
  ExtensionMetadata,
} from './host.js';
