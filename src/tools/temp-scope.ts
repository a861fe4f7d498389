/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const liveScopes = new Set<string>();

export interface TempScope {
  readonly dir: string;
  release(): Promise<void>;
}

export const createTempScope = async (
  prefix: string,
  root: string = tmpdir(),
): Promise<TempScope> => {
  const dir = await fs.mkdtemp(join(root, prefix));
  liveScopes.add(dir);
  let released = false;
  return {
    dir,
    release: async () => {
      if (released) {
        return;
      }
      released = true;
      await fs.rm(dir, { recursive: true, force: true });
      liveScopes.delete(dir);
    },
  };
};

/**
 * Runs `fn` inside a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves, rejects or is aborted.
 */
export const withTempScope = async <T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
  root?: string,
): Promise<T> => {
  const scope = await createTempScope(prefix, root);
  try {
    return await fn(scope.dir);
  } finally {
    await scope.release();
  }
};

export const activeTempScopes = (): string[] => [...liveScopes];

/**
 * Synchronous cleanup for signal and `exit` handlers, where pending promises
 * will never settle.
 */
export const releaseActiveScopesSync = (): void => {
  for (const dir of liveScopes) {
    rmSync(dir, { recursive: true, force: true });
    liveScopes.delete(dir);
  }
};
