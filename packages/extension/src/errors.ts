/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** A `marimo` directive that cannot be rendered. Fails the page. */
export class DirectiveError extends Error {
  constructor(
    message: string,
    public readonly docname: string,
    public readonly line: number,
  ) {
    super(`${docname}:${line}: ${message}`);
    this.name = 'DirectiveError';
  }
}

/** The directive's notebook path does not resolve under the notebook directory */
export class MissingNotebookError extends DirectiveError {
  constructor(
    public readonly notebookPath: string,
    public readonly notebookDir: string,
    docname: string,
    line: number,
  ) {
    super(`notebook not found: ${notebookPath} (searched in ${notebookDir})`, docname, line);
    this.name = 'MissingNotebookError';
  }
}

/** A config value has the wrong type */
export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    public readonly expected: string,
    public readonly actual: unknown,
  ) {
    super(`config value ${key} must be ${expected}, got ${JSON.stringify(actual)}`);
    this.name = 'ConfigError';
  }
}
