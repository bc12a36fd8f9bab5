/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @marimo-docs/shared - types and helpers used on both sides of the
 * build/browser boundary
 */

export {
  INIT_MESSAGE,
  RESIZE_MESSAGE,
  THEMES,
  createInitMessage,
  isResizeMessage,
  isTheme,
  type Theme,
  type InitMessage,
  type ResizeMessage,
  type FrameMessage,
} from './protocol.js';

export {
  MANIFEST_VERSION,
  MANIFEST_FILENAME,
  GALLERY_MANIFEST_FILENAME,
  NOTEBOOK_NAMESPACE,
  GALLERY_NAMESPACE,
  isManifest,
  bundleUrl,
  type Manifest,
} from './manifest.js';

export {
  EMBED_CLASS,
  PLACEHOLDER_CLASS,
  LOADING_CLASS,
  ERROR_CLASS,
  DATA_NOTEBOOK,
  DATA_HEIGHT,
  DATA_WIDTH,
  DATA_THEME,
  DATA_STATE,
  DATA_NOTEBOOK_NAME,
  PAGE_INFO_GLOBAL,
  GALLERY_STATIC_PATH,
  DEFAULT_BUTTON_TEXT,
  isNotebookPageInfo,
  type EmbedState,
  type NotebookPageInfo,
} from './page.js';

export { createLogger, DEBUG_FLAG, type Logger, type LogLevel, type LogContext } from './logger.js';
