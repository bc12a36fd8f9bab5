/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * The slice of a documentation builder this extension talks to.
 *
 * A host owns the build: it parses sources, renders pages and fires the
 * lifecycle events below. The extension only registers config values,
 * a directive, static files and event callbacks against it.
 */

// ============================================================================
// Directives
// ============================================================================

/** A directive occurrence as found in page source */
export interface DirectiveInvocation {
  /** The single required argument (the notebook path) */
  argument: string;
  /** Raw option values, keyed by option name */
  options: Record<string, string>;
  /** 1-based line of the directive in its page */
  line: number;
}

/** Context the host passes to a directive while rendering a page */
export interface DirectiveContext {
  /** Name of the page being rendered, without extension */
  docname: string;
  /** Page-level metadata (front matter / field list) */
  metadata: Record<string, string>;
  /** Build-wide serial counter for stable element ids */
  nextSerial(key: string): number;
}

/** Returns raw HTML to put in place of the directive */
export type DirectiveHandler = (invocation: DirectiveInvocation, context: DirectiveContext) => string;

// ============================================================================
// Lifecycle events
// ============================================================================

/** Context for a page that has just been rendered */
export interface PageContext {
  docname: string;
  metadata: Record<string, string>;
  /** Add an inline script to the page head */
  addScript(body: string, attributes?: Record<string, string>): void;
}

export interface HostEventMap {
  /** Config values are final; validate them here */
  'config-inited': Record<string, unknown>;
  /** Before any page is read */
  'build-start': void;
  /** After a page has been rendered, before it is written */
  'page-built': PageContext;
}

export type HostEventCallback<T> = (data: T) => void | Promise<void>;

// ============================================================================
// Host
// ============================================================================

/** Registration handle of another extension, as returned by a capability query */
export interface ExtensionHandle {
  name: string;
  config: Record<string, unknown>;
}

export interface DocsHost {
  /** Source directory of the documentation */
  readonly srcDir: string;
  /** HTML output directory */
  readonly outDir: string;
  /** Merged config values (user values over registered defaults) */
  readonly config: Record<string, unknown>;

  addConfigValue(name: string, defaultValue: unknown): void;
  addDirective(name: string, handler: DirectiveHandler): void;
  /** Path relative to the HTML output directory */
  addCssFile(path: string): void;
  /** Path relative to the HTML output directory */
  addJsFile(path: string, attributes?: Record<string, string>): void;

  on<K extends keyof HostEventMap>(event: K, callback: HostEventCallback<HostEventMap[K]>): void;

  /** Capability query: the named extension's handle if it is registered */
  getExtension(name: string): ExtensionHandle | undefined;
}

/** What `setup` reports back to the host */
export interface ExtensionMetadata {
  version: string;
  parallelReadSafe: boolean;
  parallelWriteSafe: boolean;
}
