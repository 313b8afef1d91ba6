/**
 * Artifact stores.
 *
 * Layout of the file store:
 *   <root>/nodes/<name>.yaml    one artifact per node
 *   <root>/deploy-nodes.json    aggregate descriptor
 *
 * replaceAll() writes the complete next tree into a sibling staging directory
 * and swaps it in with two renames. The current tree is never written in place.
 */

import { mkdir, mkdtemp, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ArtifactSnapshot, ArtifactStore } from './types.js';
import { ArtifactWriteError, errorMessage } from './errors.js';
import { debug, warn } from './logger.js';

const NODES_DIR       = 'nodes';
const DESCRIPTOR_FILE = 'deploy-nodes.json';
const ARTIFACT_EXT    = '.yaml';

export type WriteFileFn = (filePath: string, data: string) => Promise<void>;

export const defaultWriteFile: WriteFileFn = (filePath, data) => writeFile(filePath, data, 'utf8');

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return false;
    throw err;
  }
}

async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return undefined;
    throw err;
  }
}

// ── File store ────────────────────────────────────────────────────────────────

export class FileArtifactStore implements ArtifactStore {
  private readonly backup: string;

  constructor(
    readonly root: string,
    private readonly writeFn: WriteFileFn = defaultWriteFile
  ) {
    this.backup = `${root}.previous`;
  }

  private artifactPath(base: string, nodeName: string): string {
    return path.join(base, NODES_DIR, `${nodeName}${ARTIFACT_EXT}`);
  }

  /**
   * Settle a swap that never completed: a backup without a live tree is
   * restored, a backup beside a live tree is stale and removed.
   */
  private async recover(): Promise<void> {
    if (!(await exists(this.backup))) return;
    if (await exists(this.root)) {
      warn(`[ArtifactStore] Removing stale ${this.backup} left by an interrupted swap`);
      await rm(this.backup, { recursive: true, force: true });
    } else {
      warn(`[ArtifactStore] Restoring ${this.root} from interrupted swap`);
      await rename(this.backup, this.root);
    }
  }

  async list(): Promise<string[]> {
    await this.recover();
    let entries: string[];
    try {
      entries = await readdir(path.join(this.root, NODES_DIR));
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return [];
      throw err;
    }
    return entries
      .filter((entry) => entry.endsWith(ARTIFACT_EXT))
      .map((entry) => entry.slice(0, -ARTIFACT_EXT.length))
      .sort();
  }

  async read(nodeName: string): Promise<string | undefined> {
    return readOptional(this.artifactPath(this.root, nodeName));
  }

  async readDescriptor(): Promise<string | undefined> {
    return readOptional(path.join(this.root, DESCRIPTOR_FILE));
  }

  async replaceAll(snapshot: ArtifactSnapshot): Promise<void> {
    await this.recover();
    const parent = path.dirname(this.root);
    await mkdir(parent, { recursive: true });
    const staging = await mkdtemp(path.join(parent, `${path.basename(this.root)}.staging-`));

    try {
      await mkdir(path.join(staging, NODES_DIR));
      for (const artifact of snapshot.artifacts) {
        await this.writeFn(this.artifactPath(staging, artifact.nodeName), artifact.content);
      }
      await this.writeFn(path.join(staging, DESCRIPTOR_FILE), snapshot.descriptor);
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      throw new ArtifactWriteError(`staging write failed, ${this.root} left unchanged: ${errorMessage(err)}`, { cause: err });
    }

    const hadCurrent = await exists(this.root);
    try {
      if (hadCurrent) await rename(this.root, this.backup);
      await rename(staging, this.root);
    } catch (err) {
      if (hadCurrent && !(await exists(this.root))) await rename(this.backup, this.root);
      await rm(staging, { recursive: true, force: true });
      throw new ArtifactWriteError(`swap into ${this.root} failed: ${errorMessage(err)}`, { cause: err });
    }

    await rm(this.backup, { recursive: true, force: true });
    debug(`[ArtifactStore] Swapped in ${snapshot.artifacts.length} artifact(s) at ${this.root}`);
  }
}

// ── In-memory store ───────────────────────────────────────────────────────────

export class MemoryArtifactStore implements ArtifactStore {
  private artifacts = new Map<string, string>();
  private descriptor: string | undefined;
  /** Number of replaceAll() calls that reached the store */
  writes = 0;

  async list(): Promise<string[]> {
    return [...this.artifacts.keys()].sort();
  }

  async read(nodeName: string): Promise<string | undefined> {
    return this.artifacts.get(nodeName);
  }

  async readDescriptor(): Promise<string | undefined> {
    return this.descriptor;
  }

  async replaceAll(snapshot: ArtifactSnapshot): Promise<void> {
    this.writes += 1;
    this.artifacts = new Map(snapshot.artifacts.map((a) => [a.nodeName, a.content]));
    this.descriptor = snapshot.descriptor;
  }
}
