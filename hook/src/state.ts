/**
 * Persistent state storage. Hooks run in a fresh process each time, so any
 * state a module keeps between hooks goes through one of these.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

/**
 * PersistentState is used to save and load named blobs.
 */
export interface PersistentState {
  /** Resolves to null when nothing has been saved under name. */
  load(name: string): Promise<Buffer | null>;
  save(name: string, data: Buffer): Promise<void>;
}

/** File name used for the root namespace, which has an empty name. */
const ROOT_STATE_NAME = "_";

/**
 * DiskState stores each blob as <dir>/<name>.json. Names are slash-separated
 * namespace paths and map onto subdirectories.
 */
export class DiskState implements PersistentState {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  path(name: string): string {
    return join(this.dir, `${name === "" ? ROOT_STATE_NAME : name}.json`);
  }

  async load(name: string): Promise<Buffer | null> {
    try {
      return await readFile(this.path(name));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async save(name: string, data: Buffer): Promise<void> {
    const path = this.path(name);
    await mkdir(dirname(path), { recursive: true });
    // Write beside the target and rename over it so a crash never leaves a
    // truncated blob behind.
    const tmp = `${path}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, data, { mode: 0o600 });
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}

/**
 * MemoryState keeps blobs in memory; state survives only as long as the
 * object, which is what tests want.
 */
export class MemoryState implements PersistentState {
  readonly blobs = new Map<string, Buffer>();

  async load(name: string): Promise<Buffer | null> {
    const data = this.blobs.get(name);
    return data ? Buffer.from(data) : null;
  }

  async save(name: string, data: Buffer): Promise<void> {
    this.blobs.set(name, Buffer.from(data));
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
