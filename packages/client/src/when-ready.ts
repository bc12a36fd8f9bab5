/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Page-ready scheduling for the client.
 *
 * Themes render the secondary sidebar late and gallery footers can be
 * moved after load, so injection reruns on DOM mutations until the page
 * has settled, then the observer is disconnected.
 */

export const DEFAULT_SETTLE_MS = 2000;

export interface WatchOptions {
  window?: Window;
  /** How long after window load to keep watching for mutations */
  settleMs?: number;
}

/** Run `callback` once the DOM is parsed (immediately if it already is) */
export function onDomReady(callback: () => void, doc: Document = document) {
  if (doc.readyState === 'loading') {
    doc.addEventListener('DOMContentLoaded', () => callback(), { once: true });
  } else {
    callback();
  }
}

/**
 * Run `inject` when the DOM is ready and again on every mutation until
 * `settleMs` after window load. Returns a function that stops watching.
 */
export function watchAndInject(inject: () => void, options: WatchOptions = {}): () => void {
  const win = options.window ?? window;
  const doc = win.document;
  const settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;

  let scheduled = false;
  let stopped = false;
  let settleTimer: ReturnType<typeof setTimeout> | undefined;

  // Coalesce bursts of mutations into one pass; our own insertions retrigger once
  const observer = new MutationObserver(() => {
    if (scheduled || stopped) return;
    scheduled = true;
    queueMicrotask(() => {
      scheduled = false;
      if (!stopped) inject();
    });
  });

  const stop = () => {
    if (stopped) return;
    stopped = true;
    observer.disconnect();
    if (settleTimer !== undefined) clearTimeout(settleTimer);
    win.removeEventListener('load', onLoad);
  };

  const onLoad = () => {
    settleTimer = setTimeout(stop, settleMs);
  };

  onDomReady(() => {
    if (stopped) return;
    inject();
    observer.observe(doc.body, { childList: true, subtree: true });
  }, doc);

  if (doc.readyState === 'complete') {
    onLoad();
  } else {
    win.addEventListener('load', onLoad, { once: true });
  }

  return stop;
}
