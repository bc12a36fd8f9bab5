/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { GalleryLauncher } from './launcher.js';
import type { MarimoLoader } from './loader.js';

declare global {
  interface Window {
    /** Assigned by the per-page script on gallery pages */
    marimoNotebookInfo?: unknown;
    /** Google Analytics, when the site loads it */
    gtag?: (...args: unknown[]) => void;
    MarimoLoader?: MarimoLoader;
    MarimoGalleryLauncher?: GalleryLauncher;
  }
}

export {};
