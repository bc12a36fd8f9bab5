/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Minimal reStructuredText-style markup scanning: directive blocks with
 * option field lists, and a page-level field list at the top of a file.
 *
 *   .. marimo:: intro.py
 *      :height: 400px
 */

import type { DirectiveContext, DirectiveHandler, DirectiveInvocation } from './host.js';

const DIRECTIVE_LINE = /^(\s*)\.\.\s+([\w-]+)::\s*(.*)$/;
const FIELD_LINE = /^(\s*):([\w-]+):\s*(.*)$/;

export interface DirectiveBlock {
  name: string;
  invocation: DirectiveInvocation;
  /** First line index of the block (0-based) */
  start: number;
  /** One past the last line index of the block */
  end: number;
}

export function findDirectives(source: string): DirectiveBlock[] {
  const lines = source.split('\n');
  const blocks: DirectiveBlock[] = [];

  for (let i = 0; i < lines.length; i++) {
    const match = DIRECTIVE_LINE.exec(lines[i]);
    if (!match) continue;

    const indent = match[1].length;
    const options: Record<string, string> = {};
    let end = i + 1;
    while (end < lines.length) {
      const field = FIELD_LINE.exec(lines[end]);
      if (!field || field[1].length <= indent) break;
      options[field[2]] = field[3].trim();
      end++;
    }

    blocks.push({
      name: match[2],
      invocation: { argument: match[3].trim(), options, line: i + 1 },
      start: i,
      end,
    });
    i = end - 1;
  }

  return blocks;
}

/** Field list at the very top of a page, e.g. `:marimo-height: 800px` */
export function readPageMetadata(source: string): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const line of source.split('\n')) {
    const field = FIELD_LINE.exec(line);
    if (!field || field[1].length > 0) break;
    metadata[field[2]] = field[3].trim();
  }
  return metadata;
}

/**
 * Replace every directive that has a handler with the handler's HTML.
 * Directives without a handler are left as they are. Handler errors
 * propagate.
 */
export function expandDirectives(
  source: string,
  handlers: ReadonlyMap<string, DirectiveHandler>,
  context: DirectiveContext,
): string {
  const lines = source.split('\n');
  const out: string[] = [];
  let cursor = 0;

  for (const block of findDirectives(source)) {
    const handler = handlers.get(block.name);
    if (!handler) continue;
    out.push(...lines.slice(cursor, block.start));
    out.push(handler(block.invocation, context));
    cursor = block.end;
  }
  out.push(...lines.slice(cursor));
  return out.join('\n');
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
