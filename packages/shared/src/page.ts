/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Names shared between the markup the build emits and the script that
 * reads it in the browser.
 */

// ============================================================================
// Embed container
// ============================================================================

export const EMBED_CLASS = 'marimo-embed';
export const PLACEHOLDER_CLASS = 'marimo-placeholder';
export const LOADING_CLASS = 'marimo-loading';
export const ERROR_CLASS = 'marimo-error';

export const DATA_NOTEBOOK = 'data-marimo-notebook';
export const DATA_HEIGHT = 'data-height';
export const DATA_WIDTH = 'data-width';
export const DATA_THEME = 'data-theme';
/** Set by the loader; its presence means the container was already handled */
export const DATA_STATE = 'data-marimo-state';

export type EmbedState = 'loading' | 'loaded' | 'error';

// ============================================================================
// Gallery launcher
// ============================================================================

/** Attribute on the script tag that carries per-page notebook info */
export const DATA_NOTEBOOK_NAME = 'data-notebook-name';

/** Global the per-page script assigns */
export const PAGE_INFO_GLOBAL = 'marimoNotebookInfo';

/** Static path of gallery bundles, relative to the documentation root */
export const GALLERY_STATIC_PATH = '_static/marimo/gallery';

export const DEFAULT_BUTTON_TEXT = 'launch marimo';

/** Per-page notebook info injected into gallery pages at build time */
export interface NotebookPageInfo {
  notebookName: string;
  notebookUrl: string;
  buttonText?: string;
  showFooterButton?: boolean;
  showSidebarButton?: boolean;
}

/** Type guard for the injected page info global */
export function isNotebookPageInfo(data: unknown): data is NotebookPageInfo {
  if (data === null || typeof data !== 'object') return false;
  if (!('notebookName' in data) || typeof data.notebookName !== 'string') return false;
  if (!('notebookUrl' in data) || typeof data.notebookUrl !== 'string') return false;
  if ('buttonText' in data && data.buttonText !== undefined && typeof data.buttonText !== 'string') return false;
  return true;
}
