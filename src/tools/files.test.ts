/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readLogLines, splitLogText } from './files.js';

describe('splitLogText', () => {
  it('keeps empty lines but not a trailing newline', () => {
    expect(splitLogText('a\r\nb  \n\nc\n')).toEqual(['a', 'b', '', 'c']);
    expect(splitLogText('x')).toEqual(['x']);
    expect(splitLogText('')).toEqual([]);
  });

  it('treats a bare carriage return as a line break', () => {
    expect(splitLogText('ACK one\rNACK two\rthree\r')).toEqual(['ACK one', 'NACK two', 'three']);
    expect(splitLogText('a\r\rb\r\nc')).toEqual(['a', '', 'b', 'c']);
  });
});

describe('readLogLines', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'clf-files-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('drops a UTF-8 byte order mark', async () => {
    const path = join(dir, 'bom.log');
    await fs.writeFile(path, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('hi\n')]));
    expect(await readLogLines(path)).toEqual(['hi']);
  });

  it('numbers lines of a file with carriage-return line endings', async () => {
    const path = join(dir, 'mac.log');
    await fs.writeFile(path, 'ACK one\rNACK two\rthree\r');
    expect(await readLogLines(path)).toEqual(['ACK one', 'NACK two', 'three']);
  });

  it('rejects invalid UTF-8', async () => {
    const path = join(dir, 'binary.log');
    await fs.writeFile(path, Buffer.from([0x41, 0xff, 0x42]));
    await expect(readLogLines(path)).rejects.toBeInstanceOf(TypeError);
  });
});
