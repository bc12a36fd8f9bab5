/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * StaticDocsHost - a small in-process documentation host.
 *
 * Expands registered directives in `.rst` pages and wraps the result in an
 * HTML shell that links the registered CSS/JS files. Text outside
 * directives is passed through untouched. Used by the CLI and by tests
 * that drive the whole extension lifecycle.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import type {
  DirectiveContext,
  DirectiveHandler,
  DocsHost,
  ExtensionHandle,
  HostEventCallback,
  HostEventMap,
  PageContext,
} from './host.js';
import { escapeHtml, expandDirectives, readPageMetadata } from './markup.js';

export interface StaticDocsHostOptions {
  srcDir: string;
  outDir: string;
  /** User config values; they win over registered defaults */
  config?: Record<string, unknown>;
  /** Other extensions visible to capability queries */
  extensions?: ExtensionHandle[];
  title?: string;
}

export interface PageScript {
  body: string;
  attributes: Record<string, string>;
}

export interface RenderedPage {
  docname: string;
  metadata: Record<string, string>;
  body: string;
  scripts: PageScript[];
  html: string;
}

type ListenerTable = { [K in keyof HostEventMap]: Array<HostEventCallback<HostEventMap[K]>> };

function renderAttributes(attributes: Record<string, string>): string {
  return Object.entries(attributes)
    .map(([key, value]) => ` ${key}="${escapeHtml(value)}"`)
    .join('');
}

export class StaticDocsHost implements DocsHost {
  readonly srcDir: string;
  readonly outDir: string;
  readonly config: Record<string, unknown>;
  readonly cssFiles: string[] = [];
  readonly jsFiles: Array<{ path: string; attributes: Record<string, string> }> = [];

  private readonly title: string;
  private readonly extensions: ExtensionHandle[];
  private readonly directives = new Map<string, DirectiveHandler>();
  private readonly serials = new Map<string, number>();
  private readonly listeners: ListenerTable = {
    'config-inited': [],
    'build-start': [],
    'page-built': [],
  };

  constructor(options: StaticDocsHostOptions) {
    this.srcDir = options.srcDir;
    this.outDir = options.outDir;
    this.config = { ...options.config };
    this.extensions = options.extensions ?? [];
    this.title = options.title ?? 'Documentation';
  }

  // --- DocsHost ---

  addConfigValue(name: string, defaultValue: unknown): void {
    if (!(name in this.config)) this.config[name] = defaultValue;
  }

  addDirective(name: string, handler: DirectiveHandler): void {
    this.directives.set(name, handler);
  }

  addCssFile(path: string): void {
    if (!this.cssFiles.includes(path)) this.cssFiles.push(path);
  }

  addJsFile(path: string, attributes: Record<string, string> = {}): void {
    if (!this.jsFiles.some(file => file.path === path)) this.jsFiles.push({ path, attributes });
  }

  on<K extends keyof HostEventMap>(event: K, callback: HostEventCallback<HostEventMap[K]>): void {
    this.listeners[event].push(callback);
  }

  getExtension(name: string): ExtensionHandle | undefined {
    return this.extensions.find(ext => ext.name === name);
  }

  // --- Lifecycle ---

  /** Fire config-inited; config is final after this */
  async init(): Promise<void> {
    await this.emit('config-inited', this.config);
  }

  /** Fire build-start */
  async startBuild(): Promise<void> {
    await this.emit('build-start', undefined);
  }

  /** Render one page. Directive errors propagate and fail the page. */
  async renderPage(docname: string, source: string): Promise<RenderedPage> {
    const metadata = readPageMetadata(source);
    const context: DirectiveContext = {
      docname,
      metadata,
      nextSerial: key => {
        const next = (this.serials.get(key) ?? 0) + 1;
        this.serials.set(key, next);
        return next;
      },
    };
    const body = expandDirectives(source, this.directives, context);

    const scripts: PageScript[] = [];
    const page: PageContext = {
      docname,
      metadata,
      addScript: (scriptBody, attributes = {}) => scripts.push({ body: scriptBody, attributes }),
    };
    await this.emit('page-built', page);

    return { docname, metadata, body, scripts, html: this.renderHtml(docname, body, scripts) };
  }

  /** Render a page and write it to `<outDir>/<docname>.html` */
  async writePage(docname: string, source: string): Promise<string> {
    const page = await this.renderPage(docname, source);
    const target = join(this.outDir, `${docname}.html`);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, page.html);
    return target;
  }

  private async emit<K extends keyof HostEventMap>(event: K, data: HostEventMap[K]): Promise<void> {
    for (const callback of this.listeners[event]) {
      await callback(data);
    }
  }

  private renderHtml(docname: string, body: string, scripts: PageScript[]): string {
    const root = '../'.repeat(docname.split('/').length - 1);
    const head = [
      '<meta charset="utf-8">',
      `<title>${escapeHtml(this.title)}</title>`,
      ...this.cssFiles.map(path => `<link rel="stylesheet" href="${escapeHtml(root + path)}">`),
      ...scripts.map(script => `<script${renderAttributes(script.attributes)}>${script.body}</script>`),
      ...this.jsFiles.map(file => `<script src="${escapeHtml(root + file.path)}"${renderAttributes(file.attributes)}></script>`),
    ];
    return [
      '<!DOCTYPE html>',
      '<html>',
      '<head>',
      ...head.map(line => `  ${line}`),
      '</head>',
      '<body>',
      body,
      '</body>',
      '</html>',
      '',
    ].join('\n');
  }
}
