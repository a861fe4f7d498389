/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveIngester, compareNames } from './archive-ingester.js';

describe('ArchiveIngester', () => {
  let dir: string;
  let tempRoot: string;
  let ingester: ArchiveIngester;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'clf-archive-'));
    tempRoot = await fs.mkdtemp(join(tmpdir(), 'clf-archive-tmp-'));
    ingester = new ArchiveIngester({ tempRoot });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  const writeZip = (name: string, entries: Record<string, Buffer | string>): string => {
    const zip = new AdmZip();
    for (const [entryName, content] of Object.entries(entries)) {
      zip.addFile(entryName, Buffer.isBuffer(content) ? content : Buffer.from(content));
    }
    const path = join(dir, name);
    zip.writeZip(path);
    return path;
  };

  it('extracts log entries in entry-name order with provenance', async () => {
    const path = writeZip('bundle.zip', {
      'logs/b.log': '0x10 NACK received\nidle\n',
      'a.LOG': '0x11 ACK\n',
      'readme.txt': 'not a log',
    });

    const { files, warnings } = await ingester.expand(path);

    expect(warnings).toEqual([]);
    expect(files.map((file) => file.source)).toEqual(['bundle.zip!a.LOG', 'bundle.zip!logs/b.log']);
    expect(files[1].origin).toEqual({
      kind: 'archive',
      archiveName: 'bundle.zip',
      entryPath: 'logs/b.log',
    });
    expect(files[0].lines).toEqual(['0x11 ACK']);
    expect(files[1].lines).toEqual(['0x10 NACK received', 'idle']);
  });

  it('releases the extraction directory after expanding', async () => {
    const path = writeZip('bundle.zip', { 'a.log': 'ACK\n' });
    await ingester.expand(path);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('turns a corrupted archive into a warning', async () => {
    const path = join(dir, 'bad.zip');
    await fs.writeFile(path, 'this is not a zip archive');

    const { files, warnings } = await ingester.expand(path);

    expect(files).toEqual([]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ code: 'ArchiveUnreadable', source: 'bad.zip' });
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('turns an archive with a damaged central directory into a warning', async () => {
    const zip = new AdmZip();
    zip.addFile('a.log', Buffer.from('ACK\n'));
    const bytes = zip.toBuffer();
    const central = bytes.indexOf(Buffer.from([0x50, 0x4b, 0x01, 0x02]));
    expect(central).toBeGreaterThan(0);
    bytes[central + 2] = 0x09;
    const path = join(dir, 'damaged.zip');
    await fs.writeFile(path, bytes);

    const { files, warnings } = await ingester.expand(path);

    expect(files).toEqual([]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ code: 'ArchiveUnreadable', source: 'damaged.zip' });
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('skips an unreadable entry and keeps the others', async () => {
    const path = writeZip('mixed.zip', {
      'a.log': 'ACK\n',
      'c.log': Buffer.from([0x41, 0xff]),
    });

    const { files, warnings } = await ingester.expand(path);

    expect(files.map((file) => file.source)).toEqual(['mixed.zip!a.log']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ code: 'LogFileUnreadable', source: 'mixed.zip!c.log' });
  });

  it('releases the extraction directory when aborted', async () => {
    const path = writeZip('bundle.zip', { 'a.log': 'ACK\n' });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(ingester.expand(path, { signal: controller.signal })).rejects.toThrow('stop');
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });
});

describe('compareNames', () => {
  it('orders by code unit, uppercase first', () => {
    expect(['b.log', 'a.log', 'C.LOG'].sort(compareNames)).toEqual(['C.LOG', 'a.log', 'b.log']);
  });
});
