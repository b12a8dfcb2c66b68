/**
 * Scratch Directory
 *
 * One private working directory per run, holding synthesized tracks and
 * staged outputs. Created once before the batch and released once after it.
 */

import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, ensureDir, removeDir } from '@tracksmith/utils';

const log = createLogger({ module: 'scratch' });

export const SCRATCH_PREFIX = 'tracksmith-';

export class ScratchDirectory {
  readonly path: string;
  private released = false;

  private constructor(path: string) {
    this.path = path;
  }

  /**
   * Create a fresh directory under `parent` (the OS temp directory by default)
   */
  static async create(parent: string = tmpdir()): Promise<ScratchDirectory> {
    await ensureDir(parent);
    const path = await mkdtemp(join(parent, SCRATCH_PREFIX));
    log.debug({ path }, 'Created scratch directory');
    return new ScratchDirectory(path);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Remove the directory and everything in it. Safe to call more than once.
   */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await removeDir(this.path);
    log.debug({ path: this.path }, 'Released scratch directory');
  }
}
