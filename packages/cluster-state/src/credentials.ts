/**
 * Locally cached join-credential material, one directory per node:
 *   <root>/<nodeName>/...
 */

import { readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import type { CredentialStore } from './types.js';
import { isDnsLabel } from './network.js';

export class FileCredentialStore implements CredentialStore {
  constructor(readonly root: string) {}

  private dirFor(nodeName: string): string {
    // Node names are DNS labels; anything else could escape the root.
    if (!isDnsLabel(nodeName)) throw new Error(`Refusing credential path for node name "${nodeName}"`);
    return path.join(this.root, nodeName);
  }

  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && isDnsLabel(e.name))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
  }

  async has(nodeName: string): Promise<boolean> {
    try {
      return (await stat(this.dirFor(nodeName))).isDirectory();
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  async purge(nodeName: string): Promise<void> {
    await rm(this.dirFor(nodeName), { recursive: true, force: true });
  }
}
