/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * The `marimo` directive: validates the notebook path and emits the
 * container the browser loader fills with an iframe.
 */

import { existsSync, statSync } from 'fs';
import { isAbsolute, relative, resolve, sep } from 'path';
import {
  DATA_HEIGHT,
  DATA_NOTEBOOK,
  DATA_THEME,
  DATA_WIDTH,
  EMBED_CLASS,
  PLACEHOLDER_CLASS,
} from '@marimo-docs/shared';
import { notebookName } from './discovery.js';
import { DirectiveError, MissingNotebookError } from './errors.js';
import type { DirectiveContext, DirectiveHandler } from './host.js';
import { escapeHtml } from './markup.js';

export const DIRECTIVE_NAME = 'marimo';

export const DIRECTIVE_OPTIONS = ['height', 'width', 'class', 'theme'] as const;
export type DirectiveOption = typeof DIRECTIVE_OPTIONS[number];

/** Page-level field that sets a document default for a directive option */
export function pageOptionField(option: DirectiveOption): string {
  return `${DIRECTIVE_NAME}-${option}`;
}

export interface EmbedOptions {
  height: string;
  width: string;
  theme: string;
  /** Extra class added next to `marimo-embed` */
  cssClass: string | null;
}

export interface MarimoDirectiveSettings {
  /** Absolute notebook directory */
  notebookDir: string;
  defaults: Pick<EmbedOptions, 'height' | 'width' | 'theme'>;
}

function isDirectiveOption(name: string): name is DirectiveOption {
  return (DIRECTIVE_OPTIONS as readonly string[]).includes(name);
}

/**
 * Resolve options with directive values over page values over config
 * defaults.
 */
export function resolveEmbedOptions(
  directive: Partial<Record<DirectiveOption, string>>,
  page: Record<string, string>,
  defaults: MarimoDirectiveSettings['defaults'],
): EmbedOptions {
  const pick = (option: DirectiveOption): string | undefined =>
    directive[option] || page[pageOptionField(option)] || undefined;

  return {
    height: pick('height') ?? defaults.height,
    width: pick('width') ?? defaults.width,
    theme: pick('theme') ?? defaults.theme,
    cssClass: pick('class') ?? null,
  };
}

export function renderEmbed(name: string, id: string, options: EmbedOptions): string {
  const classes = options.cssClass ? `${EMBED_CLASS} ${options.cssClass}` : EMBED_CLASS;
  const attrs = [
    `class="${escapeHtml(classes)}"`,
    `id="${escapeHtml(id)}"`,
    `${DATA_NOTEBOOK}="${escapeHtml(name)}"`,
    `${DATA_HEIGHT}="${escapeHtml(options.height)}"`,
    `${DATA_WIDTH}="${escapeHtml(options.width)}"`,
    `${DATA_THEME}="${escapeHtml(options.theme)}"`,
  ].join(' ');
  const style = `height: ${escapeHtml(options.height)}; width: ${escapeHtml(options.width)}`;

  return [
    `<div ${attrs}>`,
    `  <div class="${PLACEHOLDER_CLASS}" style="${style}">Loading notebook: ${escapeHtml(name)}</div>`,
    '</div>',
  ].join('\n');
}

/** Resolve a directive argument to a notebook name, or throw */
function resolveNotebook(argument: string, settings: MarimoDirectiveSettings, docname: string, line: number): string {
  const absolute = resolve(settings.notebookDir, argument);
  const rel = relative(settings.notebookDir, absolute);
  const inside = rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
  if (!inside || !existsSync(absolute) || !statSync(absolute).isFile()) {
    throw new MissingNotebookError(argument, settings.notebookDir, docname, line);
  }
  return notebookName(rel.split(sep).join('/'));
}

export function createMarimoDirective(settings: MarimoDirectiveSettings): DirectiveHandler {
  return (invocation, context: DirectiveContext) => {
    const { argument, options, line } = invocation;
    if (!argument) {
      throw new DirectiveError('marimo directive requires a notebook path', context.docname, line);
    }

    const directiveOptions: Partial<Record<DirectiveOption, string>> = {};
    for (const [key, value] of Object.entries(options)) {
      if (!isDirectiveOption(key)) {
        throw new DirectiveError(
          `unknown option :${key}: (expected one of ${DIRECTIVE_OPTIONS.join(', ')})`,
          context.docname,
          line,
        );
      }
      directiveOptions[key] = value;
    }

    const name = resolveNotebook(argument, settings, context.docname, line);
    const resolved = resolveEmbedOptions(directiveOptions, context.metadata, settings.defaults);
    const id = `marimo-${name}-${context.nextSerial(DIRECTIVE_NAME)}`;
    return renderEmbed(name, id, resolved);
  };
}
