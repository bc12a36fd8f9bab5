// @vitest-environment jsdom
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Manifest } from '@marimo-docs/shared';
import { MarimoLoader, type FetchLike } from './loader.js';

const MANIFEST_URL = 'https://docs.test/_static/marimo/manifest.json';

const MANIFEST: Manifest = {
  version: 1,
  notebooks: {
    intro: 'notebooks/intro.html',
    sub_deep: 'notebooks/sub_deep.html',
  },
};

function container(name: string, height = '600px'): string {
  return `<div class="marimo-embed" id="marimo-${name}-1" data-marimo-notebook="${name}" data-height="${height}" data-width="100%" data-theme="light">`
    + `<div class="marimo-placeholder">Loading notebook: ${name}</div></div>`;
}

function fetchReturning(body: unknown, ok = true) {
  return vi.fn<FetchLike>(async () => ({ ok, status: ok ? 200 : 404, json: async () => body }));
}

describe('MarimoLoader', () => {
  let loader: MarimoLoader;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    loader.destroy();
    document.body.innerHTML = '';
    vi.restoreAllMocks();
  });

  it('resolves bundle URLs against the manifest location', async () => {
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning(MANIFEST) });
    await expect(loader.resolve('intro')).resolves.toBe('https://docs.test/_static/marimo/notebooks/intro.html');
    await expect(loader.resolve('missing')).rejects.toThrow('Notebook not in manifest: missing');
  });

  it('sends the container theme once the frame loads', async () => {
    document.body.innerHTML = container('intro').replace('data-theme="light"', 'data-theme="dark"')
      + container('sub_deep').replace('data-theme="light"', 'data-theme="sepia"');
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning(MANIFEST) });
    await loader.loadAll();

    const [intro, deep] = Array.from(document.querySelectorAll('iframe'));
    if (!intro.contentWindow || !deep.contentWindow) throw new Error('frames not attached');
    const introPost = vi.spyOn(intro.contentWindow, 'postMessage').mockImplementation(() => {});
    const deepPost = vi.spyOn(deep.contentWindow, 'postMessage').mockImplementation(() => {});
    intro.dispatchEvent(new Event('load'));
    deep.dispatchEvent(new Event('load'));

    expect(introPost).toHaveBeenLastCalledWith({ type: 'marimo-init', notebook: 'intro', theme: 'dark' }, '*');
    expect(deepPost).toHaveBeenLastCalledWith({ type: 'marimo-init', notebook: 'sub_deep', theme: 'light' }, '*');
  });

  it('replaces the placeholder with an iframe', async () => {
    document.body.innerHTML = container('intro', '400px');
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning(MANIFEST) });

    await loader.loadAll();

    const embed = document.getElementById('marimo-intro-1');
    const iframe = embed?.querySelector('iframe');
    expect(embed?.querySelector('.marimo-placeholder')).toBeNull();
    expect(iframe?.src).toBe('https://docs.test/_static/marimo/notebooks/intro.html');
    expect(iframe?.title).toBe('marimo notebook: intro');
    expect(iframe?.getAttribute('loading')).toBe('lazy');
    expect(iframe?.style.height).toBe('400px');
    expect(iframe?.style.width).toBe('100%');
    expect(['loading', 'loaded']).toContain(embed?.getAttribute('data-marimo-state'));
  });

  it('fetches the manifest once and handles each container once', async () => {
    document.body.innerHTML = container('intro') + container('sub_deep');
    const fetch = fetchReturning(MANIFEST);
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch });

    await loader.loadAll();
    await loader.loadAll();

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(MANIFEST_URL);
    expect(document.querySelectorAll('iframe')).toHaveLength(2);

    const embed = document.getElementById('marimo-intro-1');
    if (!embed) throw new Error('missing container');
    await expect(loader.load(embed)).resolves.toBe(embed.querySelector('iframe'));
    expect(embed.querySelectorAll('iframe')).toHaveLength(1);
  });

  it('shows an error for notebooks missing from the manifest', async () => {
    document.body.innerHTML = container('other');
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning(MANIFEST) });

    await loader.loadAll();

    const embed = document.getElementById('marimo-other-1');
    expect(embed?.getAttribute('data-marimo-state')).toBe('error');
    expect(embed?.querySelector('.marimo-error')?.textContent).toBe('Failed to load notebook: other');
    expect(embed?.querySelector('.marimo-placeholder')).toBeNull();
    expect(embed?.querySelector('.marimo-loading')).toBeNull();
    expect(embed?.querySelector('iframe')).toBeNull();
  });

  it('shows errors when the manifest cannot be used', async () => {
    document.body.innerHTML = container('intro');
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning({}, false) });
    await loader.loadAll();
    expect(document.querySelector('.marimo-error')?.textContent).toBe('Failed to load notebook: intro');

    loader.destroy();
    document.body.innerHTML = container('intro');
    loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning({ version: 3 }) });
    await expect(loader.manifest()).rejects.toThrow('Manifest has an unexpected format');
  });

  describe('resize messages', () => {
    const post = (data: unknown, source: MessageEventSource | null) => {
      const event = new MessageEvent('message', { data });
      Object.defineProperty(event, 'source', { value: source });
      window.dispatchEvent(event);
    };

    it('sizes the iframe that sent the message', async () => {
      document.body.innerHTML = container('intro') + container('sub_deep');
      loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning(MANIFEST) });
      await loader.loadAll();
      const [first, second] = Array.from(document.querySelectorAll('iframe'));

      post({ type: 'marimo-resize', height: 812.4 }, first.contentWindow);

      expect(first.style.height).toBe('813px');
      expect(second.style.height).toBe('600px');
    });

    it('ignores unknown senders, bad messages and messages after destroy', async () => {
      document.body.innerHTML = container('intro');
      loader = new MarimoLoader({ manifestUrl: MANIFEST_URL, fetch: fetchReturning(MANIFEST) });
      await loader.loadAll();
      const iframe = document.querySelector('iframe');
      if (!iframe) throw new Error('missing iframe');

      post({ type: 'marimo-resize', height: 900 }, window);
      post({ type: 'marimo-resize', height: -1 }, iframe.contentWindow);
      post({ type: 'other', height: 900 }, iframe.contentWindow);
      expect(iframe.style.height).toBe('600px');

      loader.destroy();
      post({ type: 'marimo-resize', height: 900 }, iframe.contentWindow);
      expect(iframe.style.height).toBe('600px');
    });
  });
});
