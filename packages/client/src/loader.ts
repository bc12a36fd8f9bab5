/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * MarimoLoader - fills `marimo` directive containers with iframes pointing
 * at exported notebook bundles, and keeps each iframe's height in sync
 * with the resize messages its bundle posts.
 *
 * @example
 * ```typescript
 * const loader = new MarimoLoader({ manifestUrl: '/_static/marimo/manifest.json' });
 * await loader.loadAll();
 * ```
 */

import {
  DATA_HEIGHT,
  DATA_NOTEBOOK,
  DATA_STATE,
  DATA_THEME,
  DATA_WIDTH,
  ERROR_CLASS,
  LOADING_CLASS,
  PLACEHOLDER_CLASS,
  createInitMessage,
  createLogger,
  isManifest,
  isResizeMessage,
  isTheme,
  type EmbedState,
  type Manifest,
} from '@marimo-docs/shared';

const log = createLogger('Loader');

/** The part of `fetch` the loader uses */
export type FetchLike = (url: string) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface LoaderOptions {
  /** Absolute URL of manifest.json */
  manifestUrl: string;
  fetch?: FetchLike;
  /** Window to listen on and document to search (defaults to the global ones) */
  window?: Window;
}

export class MarimoLoader {
  private readonly manifestUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly win: Window;
  private manifestPromise: Promise<Manifest> | null = null;
  private readonly frames = new Map<MessageEventSource, HTMLIFrameElement>();
  private destroyed = false;

  constructor(opts: LoaderOptions) {
    this.manifestUrl = opts.manifestUrl;
    this.win = opts.window ?? window;
    this.fetchImpl = opts.fetch ?? (url => this.win.fetch(url));
    this.win.addEventListener('message', this.onMessage);
  }

  // --- Manifest ---

  /** Fetch the manifest once; later calls share the same promise */
  manifest(): Promise<Manifest> {
    if (!this.manifestPromise) {
      this.manifestPromise = this.fetchManifest();
    }
    return this.manifestPromise;
  }

  /** Absolute bundle URL for a notebook name */
  async resolve(name: string): Promise<string> {
    const manifest = await this.manifest();
    if (!Object.prototype.hasOwnProperty.call(manifest.notebooks, name)) {
      throw new Error(`Notebook not in manifest: ${name}`);
    }
    return new URL(manifest.notebooks[name], this.manifestUrl).href;
  }

  private async fetchManifest(): Promise<Manifest> {
    const response = await this.fetchImpl(this.manifestUrl);
    if (!response.ok) {
      throw new Error(`Manifest request failed with status ${response.status}`);
    }
    const data = await response.json();
    if (!isManifest(data)) {
      throw new Error('Manifest has an unexpected format');
    }
    log.info(`Loaded manifest with ${Object.keys(data.notebooks).length} notebooks`);
    return data;
  }

  // --- Containers ---

  /**
   * Replace a container's placeholder with the notebook iframe. A container
   * is handled once; later calls return the existing iframe (or null).
   */
  async load(container: HTMLElement, name = container.getAttribute(DATA_NOTEBOOK)): Promise<HTMLIFrameElement | null> {
    if (this.destroyed) return null;
    if (container.hasAttribute(DATA_STATE)) {
      return container.querySelector('iframe');
    }
    if (!name) {
      this.showError(container, 'no notebook name given');
      return null;
    }

    this.setState(container, 'loading');
    const doc = container.ownerDocument;
    const loading = doc.createElement('div');
    loading.className = LOADING_CLASS;
    loading.textContent = 'Loading notebook...';
    container.appendChild(loading);

    let url: string;
    try {
      url = await this.resolve(name);
    } catch (err) {
      log.error('Could not resolve notebook', err, { notebook: name });
      loading.remove();
      this.showError(container, `Failed to load notebook: ${name}`);
      return null;
    }

    const iframe = this.createFrame(container, name, url);
    iframe.addEventListener('load', () => {
      loading.remove();
      this.setState(container, 'loaded');
      const attribute = container.getAttribute(DATA_THEME);
      const theme = isTheme(attribute) ? attribute : 'light';
      iframe.contentWindow?.postMessage(createInitMessage(name, theme), '*');
    });
    iframe.addEventListener('error', () => {
      loading.remove();
      this.showError(container, `Failed to load notebook: ${name}`);
    });

    container.querySelector(`.${PLACEHOLDER_CLASS}`)?.remove();
    container.appendChild(iframe);
    if (iframe.contentWindow) this.frames.set(iframe.contentWindow, iframe);
    return iframe;
  }

  /** Load every container under `root` that has not been handled yet */
  async loadAll(root: ParentNode = this.win.document): Promise<void> {
    const containers = root.querySelectorAll<HTMLElement>(`[${DATA_NOTEBOOK}]:not([${DATA_STATE}])`);
    await Promise.all(Array.from(containers, container => this.load(container)));
  }

  /** Stop listening for resize messages */
  destroy() {
    this.destroyed = true;
    this.win.removeEventListener('message', this.onMessage);
    this.frames.clear();
  }

  // --- Internals ---

  private createFrame(container: HTMLElement, name: string, url: string): HTMLIFrameElement {
    const iframe = container.ownerDocument.createElement('iframe');
    iframe.src = url;
    iframe.title = `marimo notebook: ${name}`;
    iframe.setAttribute('loading', 'lazy');
    iframe.setAttribute('allow', 'fullscreen');
    iframe.style.width = container.getAttribute(DATA_WIDTH) ?? '100%';
    iframe.style.height = container.getAttribute(DATA_HEIGHT) ?? '600px';
    return iframe;
  }

  private setState(container: HTMLElement, state: EmbedState) {
    container.setAttribute(DATA_STATE, state);
  }

  private showError(container: HTMLElement, message: string) {
    container.querySelector(`.${PLACEHOLDER_CLASS}`)?.remove();
    container.querySelector('iframe')?.remove();
    const error = container.ownerDocument.createElement('div');
    error.className = ERROR_CLASS;
    error.textContent = message;
    container.appendChild(error);
    this.setState(container, 'error');
  }

  private onMessage = (event: MessageEvent) => {
    if (!event.source || !isResizeMessage(event.data)) return;
    const iframe = this.frames.get(event.source);
    if (!iframe) return;
    iframe.style.height = `${Math.ceil(event.data.height)}px`;
  };
}
