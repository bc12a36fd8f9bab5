/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createHash } from 'crypto';
import { cpSync, existsSync, mkdirSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';

/**
 * Content-addressed store of exported bundles. A bundle is reused when the
 * notebook bytes and every export setting that affects the output match.
 */
export class ExportCache {
  constructor(private readonly dir: string) {}

  key(sourcePath: string, settings: string[]): string {
    const hash = createHash('sha256');
    for (const setting of settings) {
      hash.update(setting);
      hash.update('\0');
    }
    hash.update(readFileSync(sourcePath));
    return hash.digest('hex');
  }

  has(key: string): boolean {
    return existsSync(join(this.dir, key));
  }

  /** Copy a cached bundle into `targetDir` */
  restore(key: string, targetDir: string): void {
    mkdirSync(targetDir, { recursive: true });
    cpSync(join(this.dir, key), targetDir, { recursive: true });
  }

  /** Store a freshly exported bundle, replacing any partial entry */
  store(key: string, bundleDir: string): void {
    const entry = join(this.dir, key);
    rmSync(entry, { recursive: true, force: true });
    mkdirSync(this.dir, { recursive: true });
    cpSync(bundleDir, entry, { recursive: true });
  }
}
