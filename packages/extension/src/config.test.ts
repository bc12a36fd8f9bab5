/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, readConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('readConfig', () => {
  it('fills every key from the defaults', () => {
    expect(readConfig({})).toEqual(DEFAULT_CONFIG);
    expect(readConfig({}).marimoDefaultHeight).toBe('600px');
  });

  it('takes user values and ignores foreign keys', () => {
    const config = readConfig({
      marimoDefaultHeight: '800px',
      marimoShowSidebarButton: false,
      marimoExportMode: 'run',
      html_theme: 'furo',
    });
    expect(config.marimoDefaultHeight).toBe('800px');
    expect(config.marimoShowSidebarButton).toBe(false);
    expect(config.marimoExportMode).toBe('run');
    expect(config).not.toHaveProperty('html_theme');
  });

  it('treats an empty optional string as unset', () => {
    expect(readConfig({ marimoCacheDir: '' }).marimoCacheDir).toBeNull();
    expect(readConfig({ marimoPrependMarkdown: null }).marimoPrependMarkdown).toBeNull();
    expect(readConfig({ marimoPrependMarkdown: '# Hi' }).marimoPrependMarkdown).toBe('# Hi');
  });

  it('rejects values of the wrong type', () => {
    expect(() => readConfig({ marimoDefaultHeight: 400 })).toThrow(
      'config value marimoDefaultHeight must be a non-empty string, got 400',
    );
    expect(() => readConfig({ marimoShowFooterButton: 'yes' })).toThrow(ConfigError);
    expect(() => readConfig({ marimoCommand: '' })).toThrow(ConfigError);
  });

  it('rejects unknown export modes', () => {
    expect(() => readConfig({ marimoExportMode: 'fast' })).toThrow(
      `config value marimoExportMode must be 'edit' or 'run', got "fast"`,
    );
  });
});
