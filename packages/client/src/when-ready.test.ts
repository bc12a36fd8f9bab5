// @vitest-environment jsdom
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { onDomReady, watchAndInject } from './when-ready.js';

const tick = (ms = 0) => new Promise(resolve => setTimeout(resolve, ms));

function addNode() {
  document.body.appendChild(document.createElement('div'));
}

describe('onDomReady', () => {
  it('runs at once on a parsed document', () => {
    expect(document.readyState).not.toBe('loading');
    const callback = vi.fn();
    onDomReady(callback);
    expect(callback).toHaveBeenCalledTimes(1);
  });
});

describe('watchAndInject', () => {
  let stop: (() => void) | undefined;

  afterEach(() => {
    stop?.();
    stop = undefined;
    document.body.innerHTML = '';
  });

  it('injects immediately and again after DOM changes', async () => {
    const inject = vi.fn();
    stop = watchAndInject(inject, { settleMs: 1000 });
    expect(inject).toHaveBeenCalledTimes(1);

    addNode();
    await tick();
    expect(inject).toHaveBeenCalledTimes(2);
  });

  it('coalesces a burst of mutations into one pass', async () => {
    const inject = vi.fn();
    stop = watchAndInject(inject, { settleMs: 1000 });

    addNode();
    addNode();
    addNode();
    await tick();
    expect(inject).toHaveBeenCalledTimes(2);
  });

  it('stops watching when stopped', async () => {
    const inject = vi.fn();
    stop = watchAndInject(inject, { settleMs: 1000 });
    stop();

    addNode();
    await tick();
    expect(inject).toHaveBeenCalledTimes(1);
  });

  it('stops watching once the page has settled', async () => {
    const inject = vi.fn();
    stop = watchAndInject(inject, { settleMs: 10 });

    await tick(50);
    addNode();
    await tick();
    expect(inject).toHaveBeenCalledTimes(1);
  });
});
