/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { LogFilterError, describeError } from '../../core/errors.js';
import { ensureDirectory } from '../files.js';

export interface ArtifactContent {
  path: string;
  content: string;
}

export const PARTIAL_SUFFIX = '.partial';

/**
 * Writes every artifact to `<path>.partial` first and renames them into place
 * once all writes succeeded. On failure nothing from this call is left behind,
 * neither partial files nor artifacts already renamed.
 */
export async function writeArtifacts(artifacts: readonly ArtifactContent[]): Promise<void> {
  const staged: string[] = [];
  const committed: string[] = [];
  try {
    for (const artifact of artifacts) {
      await ensureDirectory(dirname(artifact.path));
      const partial = `${artifact.path}${PARTIAL_SUFFIX}`;
      staged.push(partial);
      await fs.writeFile(partial, artifact.content, 'utf8');
    }
    for (const artifact of artifacts) {
      await fs.rename(`${artifact.path}${PARTIAL_SUFFIX}`, artifact.path);
      committed.push(artifact.path);
    }
  } catch (error) {
    await Promise.allSettled([...staged, ...committed].map((path) => fs.rm(path, { force: true })));
    throw new LogFilterError(
      'OutputWriteFailed',
      `Unable to write report artifacts: ${describeError(error)}`,
      { cause: error },
    );
  }
}
