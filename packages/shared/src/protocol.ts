/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * postMessage protocol between a documentation page and the exported
 * notebook bundle running inside its iframe.
 *
 * The page sends INIT once the frame has loaded; the bundle may post RESIZE
 * whenever its content height changes.
 */

// ============================================================================
// Message Types
// ============================================================================

export const INIT_MESSAGE = 'marimo-init' as const;
export const RESIZE_MESSAGE = 'marimo-resize' as const;

export const THEMES = ['light', 'dark', 'auto'] as const;

export type Theme = typeof THEMES[number];

/** Page -> frame: identifies the notebook and the page theme */
export interface InitMessage {
  type: typeof INIT_MESSAGE;
  notebook: string;
  theme: Theme;
}

/** Frame -> page: requested content height in CSS pixels */
export interface ResizeMessage {
  type: typeof RESIZE_MESSAGE;
  height: number;
}

export type FrameMessage = InitMessage | ResizeMessage;

// ============================================================================
// Helpers
// ============================================================================

export function isTheme(value: unknown): value is Theme {
  return THEMES.some(theme => theme === value);
}

export function createInitMessage(notebook: string, theme: Theme): InitMessage {
  return { type: INIT_MESSAGE, notebook, theme };
}

/** Type guard: a resize request with a usable height */
export function isResizeMessage(data: unknown): data is ResizeMessage {
  if (data === null || typeof data !== 'object') return false;
  if (!('type' in data) || data.type !== RESIZE_MESSAGE) return false;
  return 'height' in data
    && typeof data.height === 'number'
    && Number.isFinite(data.height)
    && data.height > 0;
}
