/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync, promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PARTIAL_SUFFIX, writeArtifacts } from './artifact-writer.js';

describe('writeArtifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'clf-artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes every artifact and leaves no partial files', async () => {
    const textPath = join(dir, 'out', 'report.txt');
    const htmlPath = join(dir, 'out', 'report.html');

    await writeArtifacts([
      { path: textPath, content: 'text' },
      { path: htmlPath, content: '<html></html>' },
    ]);

    expect(await fs.readFile(textPath, 'utf8')).toBe('text');
    expect(await fs.readFile(htmlPath, 'utf8')).toBe('<html></html>');
    expect((await fs.readdir(join(dir, 'out'))).sort()).toEqual(['report.html', 'report.txt']);
  });

  it('removes everything it wrote when one artifact fails', async () => {
    const textPath = join(dir, 'report.txt');
    const htmlPath = join(dir, 'report.html');
    await fs.mkdir(`${htmlPath}${PARTIAL_SUFFIX}`);

    await expect(
      writeArtifacts([
        { path: textPath, content: 'text' },
        { path: htmlPath, content: '<html></html>' },
      ]),
    ).rejects.toMatchObject({ code: 'OutputWriteFailed' });

    expect(existsSync(textPath)).toBe(false);
    expect(existsSync(`${textPath}${PARTIAL_SUFFIX}`)).toBe(false);
    expect(existsSync(htmlPath)).toBe(false);
  });
});
