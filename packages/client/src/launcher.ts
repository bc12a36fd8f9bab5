/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * GalleryLauncher - adds "launch marimo" links to gallery example pages.
 *
 * Links go into the gallery's download footer (next to the .py/.ipynb
 * downloads) and into the secondary sidebar. Pages without a gallery
 * footer get a standalone link instead. Nothing is added to pages the
 * build did not annotate with per-page notebook info.
 * Every insertion checks for its own marker first, so `inject()` can run
 * any number of times.
 */

import {
  DATA_NOTEBOOK_NAME,
  DEFAULT_BUTTON_TEXT,
  GALLERY_STATIC_PATH,
  createLogger,
  isNotebookPageInfo,
  type NotebookPageInfo,
} from '@marimo-docs/shared';

const log = createLogger('GalleryLauncher');

// Gallery / theme markup this launcher hooks into
export const FOOTER_SELECTOR = '.sphx-glr-footer.sphx-glr-footer-example';
export const SIGNATURE_SELECTOR = 'p.sphx-glr-signature';
export const SIDEBAR_SELECTOR = '.bd-sidebar-secondary';
export const SIDEBAR_ITEM_CLASS = 'sidebar-secondary-item';
export const PAGE_MENU_CLASS = 'this-page-menu';

// Markers of what this launcher inserted
export const FOOTER_MARKER_CLASS = 'sphx-glr-download-marimo';
export const SIDEBAR_MARKER_CLASS = 'marimo-sidebar-button';
export const GENERIC_MARKER_CLASS = 'marimo-launcher-container';

const GENERIC_TARGETS = [SIDEBAR_SELECTOR, '.sidebar', '.content'];

export interface LauncherOptions {
  document?: Document;
  window?: Window;
  /** Defaults to the window's location */
  location?: Pick<Location, 'origin' | 'pathname'>;
  /** Gallery output directories that mark gallery page URLs */
  galleryDirs?: string[];
}

/** Read the per-page info global, if a valid one is present */
export function readPageInfo(win: Window): NotebookPageInfo | null {
  const info = win.marimoNotebookInfo;
  return isNotebookPageInfo(info) ? info : null;
}

/** Split text into docutils-style literal spans: one per word and per space */
function literalSpans(doc: Document, text: string): HTMLElement[] {
  return text.split(/( )/).filter(Boolean).map(part => {
    const span = doc.createElement('span');
    span.className = 'pre';
    span.textContent = part;
    return span;
  });
}

export class GalleryLauncher {
  private readonly doc: Document;
  private readonly win: Window;
  private readonly location: Pick<Location, 'origin' | 'pathname'>;
  private readonly galleryDirs: string[];

  constructor(opts: LauncherOptions = {}) {
    this.win = opts.window ?? window;
    this.doc = opts.document ?? this.win.document;
    this.location = opts.location ?? this.win.location;
    this.galleryDirs = opts.galleryDirs ?? ['auto_examples'];
  }

  /**
   * Insert every applicable link; returns how many were added this call.
   * Pages without valid notebook info get nothing: the build leaves it
   * out when both buttons are off or the gallery export failed.
   */
  inject(): number {
    const info = readPageInfo(this.win);
    if (!info) return 0;
    const footers = this.doc.querySelectorAll<HTMLElement>(FOOTER_SELECTOR);
    let added = 0;

    if (info.showFooterButton ?? true) {
      footers.forEach(footer => {
        if (this.addFooterButton(footer, info)) added++;
      });
    }
    if (footers.length > 0 && (info.showSidebarButton ?? true) && this.addSidebarButton(info)) {
      added++;
    }
    if (footers.length === 0 && this.addGenericButton(info)) {
      added++;
    }
    return added;
  }

  /** Add the launch link to a gallery download footer, before its signature */
  addFooterButton(footer: HTMLElement, info: NotebookPageInfo): boolean {
    if (footer.querySelector(`.${FOOTER_MARKER_CLASS}`)) return false;
    const name = this.extractNotebookName() ?? info.notebookName;

    const container = this.doc.createElement('div');
    container.className = `sphx-glr-download ${FOOTER_MARKER_CLASS} docutils container`;

    const link = this.createLink(name, 'reference external', this.resolveNotebookUrl(info));
    const code = this.doc.createElement('code');
    code.className = 'xref download docutils literal notranslate';
    for (const span of literalSpans(this.doc, `Launch marimo notebook: ${name}.html`)) {
      code.appendChild(span);
    }
    link.appendChild(code);

    const paragraph = this.doc.createElement('p');
    paragraph.appendChild(link);
    container.appendChild(paragraph);

    const signature = footer.querySelector(SIGNATURE_SELECTOR);
    if (signature) {
      footer.insertBefore(container, signature);
    } else {
      footer.appendChild(container);
    }
    return true;
  }

  /** Add a launch link to the secondary sidebar's page menu */
  addSidebarButton(info: NotebookPageInfo): boolean {
    const sidebar = this.doc.querySelector(SIDEBAR_SELECTOR);
    if (!sidebar) return false;
    if (sidebar.querySelector(`.${SIDEBAR_MARKER_CLASS}`)) return false;
    const name = this.extractNotebookName() ?? info.notebookName;

    const link = this.createLink(name, SIDEBAR_MARKER_CLASS, this.resolveNotebookUrl(info));
    link.textContent = 'Launch marimo';
    const item = this.doc.createElement('li');
    item.appendChild(link);

    let section = sidebar.querySelector(`.${SIDEBAR_ITEM_CLASS}`);
    let menu = section?.querySelector(`.${PAGE_MENU_CLASS}`) ?? null;
    if (menu) {
      menu.appendChild(item);
      return true;
    }

    // Build the whole section before touching the page
    const note = this.doc.createElement('div');
    note.setAttribute('role', 'note');
    note.setAttribute('aria-label', 'marimo link');
    const heading = this.doc.createElement('h3');
    heading.textContent = 'Launch Interactive';
    menu = this.doc.createElement('ul');
    menu.className = PAGE_MENU_CLASS;
    menu.appendChild(item);
    note.appendChild(heading);
    note.appendChild(menu);

    if (!section) {
      section = this.doc.createElement('div');
      section.className = SIDEBAR_ITEM_CLASS;
      section.appendChild(note);
      sidebar.appendChild(section);
    } else {
      section.appendChild(note);
    }
    return true;
  }

  /** Standalone link for pages with notebook info but no gallery footer */
  addGenericButton(info: NotebookPageInfo): boolean {
    if (this.doc.querySelector(`.${GENERIC_MARKER_CLASS}`)) return false;

    let target: Element | null = null;
    for (const selector of GENERIC_TARGETS) {
      target = this.doc.querySelector(selector);
      if (target) break;
    }
    if (!target) return false;

    const container = this.doc.createElement('div');
    container.className = GENERIC_MARKER_CLASS;
    const link = this.createLink(info.notebookName, 'marimo-gallery-launcher', this.resolveNotebookUrl(info));
    link.textContent = info.buttonText || DEFAULT_BUTTON_TEXT;
    container.appendChild(link);
    target.appendChild(container);
    return true;
  }

  /**
   * Notebook name for the current page: the URL's trailing `*.html`
   * segment, else a `data-notebook-name` script tag, else the page info.
   */
  extractNotebookName(): string | null {
    const match = /([^/]+)\.html?$/.exec(this.location.pathname);
    if (match) return decodeURIComponent(match[1]);

    const script = this.doc.querySelector(`script[${DATA_NOTEBOOK_NAME}]`);
    const fromScript = script?.getAttribute(DATA_NOTEBOOK_NAME);
    if (fromScript) return fromScript;

    return readPageInfo(this.win)?.notebookName ?? null;
  }

  /**
   * Absolute bundle URL for the page. `notebookUrl` is written by the
   * build relative to the page; the path-derived URL covers info without one.
   */
  resolveNotebookUrl(info: NotebookPageInfo): string {
    if (!info.notebookUrl) return this.getNotebookUrl(info.notebookName);
    const { origin, pathname } = this.location;
    return new URL(info.notebookUrl, `${origin}${pathname}`).href;
  }

  /**
   * Gallery bundle URL derived from the page path: the documentation root is the part of the path
   * before the gallery directory (or the current directory otherwise).
   *
   * `/docs/auto_examples/plot_x.html` -> `/docs/_static/marimo/gallery/plot_x.html`
   */
  getNotebookUrl(name: string): string {
    const { origin, pathname } = this.location;
    const marker = this.galleryDirs.map(dir => `/${dir}/`).find(m => pathname.includes(m));
    const base = marker
      ? pathname.slice(0, pathname.indexOf(marker) + 1)
      : pathname.replace(/[^/]*$/, '');
    return `${origin}${base}${GALLERY_STATIC_PATH}/${encodeURIComponent(name)}.html`;
  }

  /** Report a launch to Google Analytics when the page has it */
  trackLaunch(name: string) {
    const gtag = this.win.gtag;
    if (typeof gtag === 'function') {
      gtag('event', 'marimo_launch', { notebook_name: name, event_category: 'gallery' });
    }
    log.debug('Launch clicked', name);
  }

  private createLink(name: string, className: string, href: string): HTMLAnchorElement {
    const link = this.doc.createElement('a');
    link.className = className;
    link.href = href;
    link.target = '_blank';
    link.rel = 'noopener noreferrer';
    link.addEventListener('click', () => this.trackLaunch(name));
    return link;
  }
}
