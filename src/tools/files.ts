/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Splits decoded log text into lines on `\r\n`, `\n` or a bare `\r`. A trailing
 * line break does not produce an extra empty line; trailing whitespace is
 * trimmed from every line.
 */
export const splitLogText = (text: string): string[] => {
  const parts = text.split(/\r\n|\r|\n/);
  if (parts.length > 0 && parts[parts.length - 1] === '') {
    parts.pop();
  }
  return parts.map((line) => line.trimEnd());
};

/**
 * Reads a log file as strict UTF-8 (a leading BOM is dropped). Invalid byte
 * sequences reject with a TypeError from the decoder.
 */
export const readLogLines = async (filePath: string): Promise<string[]> => {
  const buffer = await fs.readFile(filePath);
  return splitLogText(utf8.decode(buffer));
};

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

export interface WriteJsonOptions {
  /** Fail with EEXIST instead of replacing an existing file. */
  exclusive?: boolean;
}

export const writeJsonFile = async (
  filePath: string,
  data: unknown,
  options: WriteJsonOptions = {},
): Promise<void> => {
  await ensureDirectory(dirname(filePath));
  await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, {
    encoding: 'utf8',
    flag: options.exclusive ? 'wx' : 'w',
  });
};

export const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};
