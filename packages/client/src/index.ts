/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @marimo-docs/client
 *
 * Browser side of the extension: the iframe loader for `marimo` directive
 * containers and the gallery launch buttons.
 */

import './globals.js';

export { MarimoLoader, type LoaderOptions, type FetchLike } from './loader.js';
export {
  GalleryLauncher,
  readPageInfo,
  FOOTER_SELECTOR,
  FOOTER_MARKER_CLASS,
  SIDEBAR_SELECTOR,
  SIDEBAR_MARKER_CLASS,
  GENERIC_MARKER_CLASS,
  type LauncherOptions,
} from './launcher.js';
export { onDomReady, watchAndInject, DEFAULT_SETTLE_MS, type WatchOptions } from './when-ready.js';
