/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * marimo-docs command line
 *
 * Builds a directory of `.rst` pages with the StaticDocsHost: exports the
 * notebooks, writes the manifests, copies the loader and renders each page.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { join, relative, resolve, sep } from 'path';
import { DEBUG_FLAG } from '@marimo-docs/shared';
import { DEFAULT_CONFIG } from './config.js';
import { findFiles } from './discovery.js';
import { VERSION, setup, type ExtensionOptions } from './extension.js';
import { GALLERY_EXTENSION } from './gallery.js';
import type { ExtensionHandle } from './host.js';
import { StaticDocsHost } from './static-host.js';

export const CONFIG_FILE = 'marimo-docs.json';

const CONFIG_HELP = `
Config file:
  Keys are the extension's config names (marimoNotebookDir, marimoDefaultHeight, ...).
  A "gallery" object ({ "galleryDirs": ["auto_examples"] }) registers the
  gallery extension so gallery notebooks are converted.

Environment Variables:
  ${DEBUG_FLAG}=true   Verbose build logging
`;

export interface ProgramOptions {
  /** Passed to the extension of every host the program creates */
  extension?: ExtensionOptions;
  /** Receives command output (default: stdout) */
  write?: (text: string) => void;
}

interface ConfigOption {
  config?: string;
}

interface LoadedConfig {
  values: Record<string, unknown>;
  extensions: ExtensionHandle[];
}

/** Read `<srcDir>/marimo-docs.json` or an explicit config file */
export function loadConfig(srcDir: string, configPath?: string): LoadedConfig {
  const path = configPath ? resolve(configPath) : join(srcDir, CONFIG_FILE);
  if (!existsSync(path)) {
    if (configPath) throw new Error(`Config file not found: ${path}`);
    return { values: {}, extensions: [] };
  }

  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    throw new Error(`${path} must contain a JSON object`);
  }

  const values: Record<string, unknown> = { ...data };
  const extensions: ExtensionHandle[] = [];
  const gallery = values.gallery;
  delete values.gallery;
  if (gallery !== null && typeof gallery === 'object' && !Array.isArray(gallery)) {
    extensions.push({ name: GALLERY_EXTENSION, config: { ...gallery } });
  }
  return { values, extensions };
}

function docnameOf(srcDir: string, page: string): string {
  return relative(srcDir, page).split(sep).join('/').replace(/\.rst$/, '');
}

export function createProgram(options: ProgramOptions = {}): Command {
  const write = options.write ?? ((text: string) => process.stdout.write(text));

  const createHost = async (srcDir: string, outDir: string, configPath?: string) => {
    const { values, extensions } = loadConfig(srcDir, configPath);
    const host = new StaticDocsHost({ srcDir, outDir, config: values, extensions });
    setup(host, options.extension);
    await host.init();
    await host.startBuild();
    return host;
  };

  const program = new Command();

  program
    .name('marimo-docs')
    .description('Embed marimo notebooks in documentation')
    .version(VERSION)
    .addHelpText('after', CONFIG_HELP);

  program
    .command('build')
    .description('Export notebooks and render every .rst page')
    .argument('<srcDir>', 'Documentation source directory')
    .argument('<outDir>', 'Output directory')
    .option('-c, --config <file>', `JSON config (default: <srcDir>/${CONFIG_FILE})`)
    .action(async (src: string, out: string, opts: ConfigOption) => {
      const srcDir = resolve(src);
      const outDir = resolve(out);

      const host = await createHost(srcDir, outDir, opts.config);
      const pages = findFiles(srcDir, '.rst');
      for (const page of pages) {
        await host.writePage(docnameOf(srcDir, page), readFileSync(page, 'utf-8'));
      }
      write(`Built ${pages.length} pages into ${outDir}\n`);
    });

  program
    .command('render')
    .description('Render one page to stdout')
    .argument('<page>', 'Path to the .rst page')
    .argument('<srcDir>', 'Documentation source directory')
    .argument('<outDir>', 'Output directory')
    .option('-c, --config <file>', `JSON config (default: <srcDir>/${CONFIG_FILE})`)
    .action(async (page: string, src: string, out: string, opts: ConfigOption) => {
      const srcDir = resolve(src);
      const host = await createHost(srcDir, resolve(out), opts.config);
      const rendered = await host.renderPage(docnameOf(srcDir, resolve(page)), readFileSync(page, 'utf-8'));
      write(rendered.html);
    });

  program
    .command('info')
    .description('Show version and config defaults')
    .action(() => {
      const lines = [`marimo-docs v${VERSION}`, '', 'Config defaults:'];
      for (const [key, value] of Object.entries(DEFAULT_CONFIG)) {
        lines.push(`  ${key.padEnd(26)} ${JSON.stringify(value)}`);
      }
      write(`${lines.join('\n')}\n`);
    });

  return program;
}
