/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { basename, join, posix } from 'node:path';
import AdmZip from 'adm-zip';
import { describeError } from '../core/errors.js';
import type { LogFile, RunWarning } from '../core/types.js';
import { readLogLines } from './files.js';
import { withTempScope } from './temp-scope.js';

export const LOG_FILE_PATTERN = /\.log$/i;
export const ARCHIVE_FILE_PATTERN = /\.zip$/i;

export const isLogFileName = (name: string): boolean => LOG_FILE_PATTERN.test(name);
export const isArchiveFileName = (name: string): boolean => ARCHIVE_FILE_PATTERN.test(name);

/** Code-unit ordering, independent of locale and platform. */
export const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export interface ArchiveExpansion {
  files: LogFile[];
  warnings: RunWarning[];
}

export interface ArchiveIngesterOptions {
  /** Parent directory for extraction scopes. Defaults to the OS temp directory. */
  tempRoot?: string;
}

export interface ExpandOptions {
  signal?: AbortSignal;
}

/**
 * Extracts the log entries of ZIP archives into a scoped temporary directory
 * and reads them back as log files tagged with their archive provenance.
 */
export class ArchiveIngester {
  constructor(private readonly options: ArchiveIngesterOptions = {}) {}

  async expand(archivePath: string, options: ExpandOptions = {}): Promise<ArchiveExpansion> {
    const archiveName = basename(archivePath);
    let entries: ReturnType<AdmZip['getEntries']>;
    try {
      entries = new AdmZip(archivePath)
        .getEntries()
        .filter((entry) => !entry.isDirectory && isLogFileName(entry.entryName))
        .sort((a, b) => compareNames(a.entryName, b.entryName));
    } catch (error) {
      return {
        files: [],
        warnings: [
          {
            code: 'ArchiveUnreadable',
            source: archiveName,
            message: `Archive cannot be opened: ${describeError(error)}`,
          },
        ],
      };
    }
    if (entries.length === 0) {
      return { files: [], warnings: [] };
    }

    return withTempScope(
      'can-log-filter-',
      async (dir) => {
        const files: LogFile[] = [];
        const warnings: RunWarning[] = [];
        for (const [index, entry] of entries.entries()) {
          options.signal?.throwIfAborted();
          const source = `${archiveName}!${entry.entryName}`;
          const target = join(
            dir,
            `${String(index).padStart(4, '0')}-${posix.basename(entry.entryName)}`,
          );
          try {
            await fs.writeFile(target, entry.getData());
            const lines = await readLogLines(target);
            files.push({
              path: target,
              source,
              origin: { kind: 'archive', archiveName, entryPath: entry.entryName },
              lines,
            });
          } catch (error) {
            warnings.push({
              code: 'LogFileUnreadable',
              source,
              message: `Archive entry cannot be read: ${describeError(error)}`,
            });
          }
        }
        return { files, warnings };
      },
      this.options.tempRoot,
    );
  }
}
