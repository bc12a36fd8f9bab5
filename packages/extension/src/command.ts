/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { spawn } from 'child_process';

export interface CommandResult {
  /** Exit code; null when the process could not be started or was killed */
  code: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started (e.g. ENOENT) */
  spawnError?: Error;
}

/** Runs an external command to completion. Never rejects. */
export type CommandRunner = (command: string, args: string[], cwd?: string) => Promise<CommandResult>;

/**
 * Default runner: spawn without a shell and collect output.
 * There is no timeout; a hung process blocks the build.
 */
export const runCommand: CommandRunner = (command, args, cwd) => {
  return new Promise(resolve => {
    let stdout = '';
    let stderr = '';
    let settled = false;
    const settle = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });

    child.on('error', err => settle({ code: null, stdout, stderr, spawnError: err }));
    child.on('close', code => settle({ code, stdout, stderr }));
  });
};

/** One-line description of a failed command for logs and export results */
export function describeFailure(command: string, args: string[], result: CommandResult): string {
  const cmdline = [command, ...args].join(' ');
  if (result.spawnError) {
    const code = 'code' in result.spawnError ? result.spawnError.code : undefined;
    if (code === 'ENOENT') {
      return `${command} not found on PATH (is marimo installed?)`;
    }
    return `could not run ${cmdline}: ${result.spawnError.message}`;
  }
  const parts = [`${cmdline} exited with code ${result.code}`];
  if (result.stdout.trim()) parts.push(`stdout: ${result.stdout.trim()}`);
  if (result.stderr.trim()) parts.push(`stderr: ${result.stderr.trim()}`);
  return parts.join('\n');
}
