/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Browser entry point, bundled as `marimo-loader.js`.
 *
 * The manifest is looked up next to this script, so the bundle works from
 * any page depth without configuration.
 */

import { MANIFEST_FILENAME, createLogger } from '@marimo-docs/shared';
import './globals.js';
import { GalleryLauncher } from './launcher.js';
import { MarimoLoader } from './loader.js';
import { watchAndInject } from './when-ready.js';

const log = createLogger('Client');

/** Manifest URL beside the running script, falling back to the page's base */
export function manifestUrlFor(doc: Document): string {
  const script = doc.currentScript;
  const base = script instanceof HTMLScriptElement && script.src ? script.src : doc.baseURI;
  return new URL(MANIFEST_FILENAME, base).href;
}

export function bootstrap(win: Window = window): () => void {
  const loader = new MarimoLoader({ manifestUrl: manifestUrlFor(win.document), window: win });
  const launcher = new GalleryLauncher({ window: win });
  win.MarimoLoader = loader;
  win.MarimoGalleryLauncher = launcher;

  return watchAndInject(() => {
    loader.loadAll().catch(err => log.error('Loading notebooks failed', err));
    launcher.inject();
  }, { window: win });
}

bootstrap();
