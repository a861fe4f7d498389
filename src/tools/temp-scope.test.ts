/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync, promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  activeTempScopes,
  createTempScope,
  releaseActiveScopesSync,
  withTempScope,
} from './temp-scope.js';

describe('temp scopes', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(join(tmpdir(), 'clf-scope-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('removes the directory after the callback resolves', async () => {
    let seen = '';
    const result = await withTempScope(
      'run-',
      async (dir) => {
        seen = dir;
        await fs.writeFile(join(dir, 'a.log'), 'x');
        return 42;
      },
      root,
    );
    expect(result).toBe(42);
    expect(existsSync(seen)).toBe(false);
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('removes the directory after the callback rejects', async () => {
    await expect(
      withTempScope(
        'run-',
        async () => {
          throw new Error('boom');
        },
        root,
      ),
    ).rejects.toThrow('boom');
    expect(await fs.readdir(root)).toEqual([]);
    expect(activeTempScopes()).toEqual([]);
  });

  it('releases live scopes synchronously', async () => {
    const scope = await createTempScope('live-', root);
    expect(activeTempScopes()).toContain(scope.dir);

    releaseActiveScopesSync();

    expect(existsSync(scope.dir)).toBe(false);
    expect(activeTempScopes()).toEqual([]);
    await scope.release();
  });
});
