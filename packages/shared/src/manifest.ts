/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Manifest written once per build and read by the browser loader.
 *
 * Maps a notebook name to its bundle URL, relative to the directory the
 * manifest lives in (the static marimo root for embedded notebooks).
 */

export const MANIFEST_VERSION = 1 as const;
export const MANIFEST_FILENAME = 'manifest.json';
export const GALLERY_MANIFEST_FILENAME = 'gallery-manifest.json';

/** Output namespace for notebooks embedded through the directive */
export const NOTEBOOK_NAMESPACE = 'notebooks';
/** Output namespace for notebooks converted from gallery examples */
export const GALLERY_NAMESPACE = 'gallery';

export interface Manifest {
  version: typeof MANIFEST_VERSION;
  notebooks: Record<string, string>;
}

/** Type guard: a manifest this loader understands */
export function isManifest(data: unknown): data is Manifest {
  if (data === null || typeof data !== 'object') return false;
  if (!('version' in data) || data.version !== MANIFEST_VERSION) return false;
  if (!('notebooks' in data)) return false;
  const notebooks = data.notebooks;
  if (notebooks === null || typeof notebooks !== 'object' || Array.isArray(notebooks)) return false;
  return Object.values(notebooks).every(url => typeof url === 'string');
}

/** Bundle URL of a namespaced notebook, relative to the static marimo root */
export function bundleUrl(namespace: string, name: string): string {
  return `${namespace}/${name}.html`;
}
