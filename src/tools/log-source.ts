/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { LogFilterError, describeError } from '../core/errors.js';
import type { LogFile, RunWarning } from '../core/types.js';
import {
  ArchiveIngester,
  compareNames,
  isArchiveFileName,
  isLogFileName,
} from './archive-ingester.js';
import { errorCode, readLogLines } from './files.js';

export interface LogEnumeration {
  files: LogFile[];
  warnings: RunWarning[];
}

export interface EnumerateOptions {
  includeArchives?: boolean;
  signal?: AbortSignal;
}

export interface LogSourceOptions {
  ingester?: ArchiveIngester;
}

/**
 * Plain files and symbolic links that resolve to one. A dangling link is not a
 * file; any other stat failure is left for the read to report.
 */
const isFileEntry = async (directory: string, entry: Dirent): Promise<boolean> => {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return (await fs.stat(join(directory, entry.name))).isFile();
  } catch (error) {
    const code = errorCode(error);
    return code !== 'ENOENT' && code !== 'ELOOP';
  }
};

/**
 * Lists the log files of one directory (non-recursive): direct `.log` files by
 * name, then the log entries of each `.zip` archive by archive name and entry
 * name. Source names are unique: a later file whose name is taken is skipped
 * with a warning.
 */
export class LogSource {
  private readonly ingester: ArchiveIngester;

  constructor(options: LogSourceOptions = {}) {
    this.ingester = options.ingester ?? new ArchiveIngester();
  }

  async enumerate(directory: string, options: EnumerateOptions = {}): Promise<LogEnumeration> {
    const includeArchives = options.includeArchives ?? true;
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new LogFilterError(
        'NoInputFound',
        `Input directory cannot be listed: ${directory} (${describeError(error)})`,
        { cause: error },
      );
    }
    const names: string[] = [];
    for (const entry of entries) {
      if (await isFileEntry(directory, entry)) {
        names.push(entry.name);
      }
    }
    names.sort(compareNames);

    const files: LogFile[] = [];
    const warnings: RunWarning[] = [];
    const sources = new Set<string>();
    const accept = (file: LogFile): void => {
      if (sources.has(file.source)) {
        warnings.push({
          code: 'LogFileUnreadable',
          source: file.source,
          message: 'Another log file already uses this source name',
        });
        return;
      }
      sources.add(file.source);
      files.push(file);
    };

    for (const name of names.filter(isLogFileName)) {
      options.signal?.throwIfAborted();
      const path = join(directory, name);
      try {
        accept({ path, source: name, origin: { kind: 'direct' }, lines: await readLogLines(path) });
      } catch (error) {
        warnings.push({
          code: 'LogFileUnreadable',
          source: name,
          message: `Log file cannot be read: ${describeError(error)}`,
        });
      }
    }

    if (includeArchives) {
      for (const name of names.filter(isArchiveFileName)) {
        options.signal?.throwIfAborted();
        const expansion = await this.ingester.expand(join(directory, name), {
          signal: options.signal,
        });
        warnings.push(...expansion.warnings);
        expansion.files.forEach(accept);
      }
    }

    return { files, warnings };
  }
}
