/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { DEFAULT_BUTTON_TEXT } from '@marimo-docs/shared';
import { ConfigError } from './errors.js';

export type ExportMode = 'edit' | 'run';

export interface MarimoConfig {
  /** Notebook sources, relative to the documentation source directory */
  marimoNotebookDir: string;
  /** Scratch directory for exporter output, relative to the HTML output directory */
  marimoBuildDir: string;
  /** Static marimo root, relative to the HTML output directory */
  marimoOutputDir: string;
  marimoDefaultHeight: string;
  marimoDefaultWidth: string;
  marimoDefaultTheme: string;
  marimoShowFooterButton: boolean;
  marimoShowSidebarButton: boolean;
  /** Markdown prepended as a hidden first cell of gallery notebooks */
  marimoPrependMarkdown: string | null;
  marimoMoveImportsToTop: boolean;
  /** Executable of the external notebook tool */
  marimoCommand: string;
  marimoExportMode: ExportMode;
  /** Export cache directory, relative to the source directory; null disables caching */
  marimoCacheDir: string | null;
  marimoButtonText: string;
}

export const DEFAULT_CONFIG: Readonly<MarimoConfig> = Object.freeze({
  marimoNotebookDir: 'notebooks',
  marimoBuildDir: '_build/marimo',
  marimoOutputDir: '_static/marimo',
  marimoDefaultHeight: '600px',
  marimoDefaultWidth: '100%',
  marimoDefaultTheme: 'light',
  marimoShowFooterButton: true,
  marimoShowSidebarButton: true,
  marimoPrependMarkdown: null,
  marimoMoveImportsToTop: false,
  marimoCommand: 'marimo',
  marimoExportMode: 'edit',
  marimoCacheDir: null,
  marimoButtonText: DEFAULT_BUTTON_TEXT,
});

function readString(values: Record<string, unknown>, key: keyof MarimoConfig, fallback: string): string {
  const value = values[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value === '') throw new ConfigError(key, 'a non-empty string', value);
  return value;
}

function readOptionalString(values: Record<string, unknown>, key: keyof MarimoConfig, fallback: string | null): string | null {
  const value = values[key];
  if (value === undefined) return fallback;
  if (value === null || value === '') return null;
  if (typeof value !== 'string') throw new ConfigError(key, 'a string or null', value);
  return value;
}

function readBoolean(values: Record<string, unknown>, key: keyof MarimoConfig, fallback: boolean): boolean {
  const value = values[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new ConfigError(key, 'a boolean', value);
  return value;
}

/**
 * Narrow raw host config values to a MarimoConfig, filling in defaults.
 * Keys that do not belong to this extension are ignored.
 */
export function readConfig(values: Record<string, unknown>): MarimoConfig {
  const d = DEFAULT_CONFIG;
  const mode = readString(values, 'marimoExportMode', d.marimoExportMode);
  if (mode !== 'edit' && mode !== 'run') {
    throw new ConfigError('marimoExportMode', "'edit' or 'run'", mode);
  }

  return {
    marimoNotebookDir: readString(values, 'marimoNotebookDir', d.marimoNotebookDir),
    marimoBuildDir: readString(values, 'marimoBuildDir', d.marimoBuildDir),
    marimoOutputDir: readString(values, 'marimoOutputDir', d.marimoOutputDir),
    marimoDefaultHeight: readString(values, 'marimoDefaultHeight', d.marimoDefaultHeight),
    marimoDefaultWidth: readString(values, 'marimoDefaultWidth', d.marimoDefaultWidth),
    marimoDefaultTheme: readString(values, 'marimoDefaultTheme', d.marimoDefaultTheme),
    marimoShowFooterButton: readBoolean(values, 'marimoShowFooterButton', d.marimoShowFooterButton),
    marimoShowSidebarButton: readBoolean(values, 'marimoShowSidebarButton', d.marimoShowSidebarButton),
    marimoPrependMarkdown: readOptionalString(values, 'marimoPrependMarkdown', d.marimoPrependMarkdown),
    marimoMoveImportsToTop: readBoolean(values, 'marimoMoveImportsToTop', d.marimoMoveImportsToTop),
    marimoCommand: readString(values, 'marimoCommand', d.marimoCommand),
    marimoExportMode: mode,
    marimoCacheDir: readOptionalString(values, 'marimoCacheDir', d.marimoCacheDir),
    marimoButtonText: readString(values, 'marimoButtonText', d.marimoButtonText),
  };
}
