/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Cell-level rewrites of marimo `.py` notebooks, applied to converted
 * gallery notebooks before export.
 *
 * A marimo file is a preamble (`import marimo`, `app = marimo.App()`),
 * a run of `@app.cell`-decorated functions, and an `if __name__` block.
 * The rewrites only reorder or insert whole cells; cell bodies are kept
 * byte for byte.
 */

import { readFileSync, writeFileSync } from 'fs';

export interface ParsedNotebook {
  preamble: string;
  /** Each cell starts with its decorator and keeps its trailing blank lines */
  cells: string[];
  postamble: string;
}

export interface TransformOptions {
  prependMarkdown?: string | null;
  moveImportsToTop?: boolean;
}

const CELL_DECORATOR = /(@app\.cell(?:\([^)]*\))?)/;
const MAIN_GUARD = 'if __name__';
const MO_IMPORT = /\bimport\s+marimo\s+as\s+mo\b/;
const MARIMO_IMPORT = /\bimport\s+marimo\b/;

export function parseNotebook(content: string): ParsedNotebook {
  // split() with a capture group keeps the decorators at odd indices
  const parts = content.split(CELL_DECORATOR);
  const preamble = parts[0] ?? '';
  const cells: string[] = [];
  let postamble = '';

  for (let i = 1; i < parts.length; i += 2) {
    const decorator = parts[i];
    const body = parts[i + 1] ?? '';
    const isLast = i + 2 >= parts.length;

    if (isLast && body.includes(MAIN_GUARD)) {
      const lines = body.split('\n');
      const guardAt = lines.findIndex(line => line.trim().startsWith(MAIN_GUARD));
      if (guardAt !== -1) {
        cells.push(`${decorator}${lines.slice(0, guardAt).join('\n')}\n`);
        postamble = lines.slice(guardAt).join('\n');
        continue;
      }
    }
    cells.push(decorator + body);
  }

  return { preamble, cells, postamble };
}

export function serializeNotebook(notebook: ParsedNotebook): string {
  return notebook.preamble + notebook.cells.join('') + notebook.postamble;
}

function indent(text: string, prefix: string): string {
  return text
    .trim()
    .split('\n')
    .map(line => (line.trim() ? prefix + line : ''))
    .join('\n');
}

function markdownCell(markdown: string): string {
  return [
    '@app.cell(hide_code=True)',
    'def _(mo):',
    '    mo.md(',
    '        r"""',
    indent(markdown, '        '),
    '        """',
    '    )',
    '    return',
    '',
    '',
    '',
  ].join('\n');
}

const IMPORT_CELL = [
  '@app.cell',
  'def _():',
  '    import marimo as mo',
  '    return (mo,)',
  '',
  '',
  '',
].join('\n');

/**
 * Insert a hidden markdown cell at the top. Reuses an existing
 * `import marimo as mo` cell; otherwise an import cell goes first.
 */
export function prependMarkdown(content: string, markdown: string): string {
  const notebook = parseNotebook(content);
  const hasMoImport = notebook.cells.some(cell => MO_IMPORT.test(cell));
  const added = hasMoImport ? [markdownCell(markdown)] : [IMPORT_CELL, markdownCell(markdown)];
  return serializeNotebook({ ...notebook, cells: [...added, ...notebook.cells] });
}

/** Stable-partition cells so the ones importing marimo come first */
export function moveImportsToTop(content: string): string {
  const notebook = parseNotebook(content);
  const imports = notebook.cells.filter(cell => MARIMO_IMPORT.test(cell));
  const rest = notebook.cells.filter(cell => !MARIMO_IMPORT.test(cell));
  return serializeNotebook({ ...notebook, cells: [...imports, ...rest] });
}

/** Reorder first so the prepended markdown stays the first visible cell */
export function transformNotebook(content: string, options: TransformOptions): string {
  let result = content;
  if (options.moveImportsToTop) {
    result = moveImportsToTop(result);
  }
  if (options.prependMarkdown) {
    result = prependMarkdown(result, options.prependMarkdown);
  }
  return result;
}

/** Rewrite a notebook file in place (or into `outputPath`) */
export function transformNotebookFile(path: string, options: TransformOptions, outputPath = path): string {
  const content = readFileSync(path, 'utf-8');
  writeFileSync(outputPath, transformNotebook(content, options));
  return outputPath;
}
