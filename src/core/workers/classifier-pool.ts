/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { classifyFile } from '../classifier.js';
import type { RuleSet } from '../rule-set.js';
import type { ClassifiedRecord, LogFile } from '../types.js';

export interface ClassifierPoolOptions {
  concurrency?: number;
}

export interface FileClassification {
  file: LogFile;
  records: ClassifiedRecord[];
}

export interface ClassifyAllOptions {
  signal?: AbortSignal;
  onFileClassified?(result: FileClassification, index: number): void;
}

/**
 * Classifies files in concurrent lanes. Lanes pull the next unclaimed file, so
 * completion order is unspecified, but results always come back in input order.
 */
export class ClassifierPool {
  constructor(private readonly options: ClassifierPoolOptions = {}) {}

  get concurrency(): number {
    return Math.max(1, Math.floor(this.options.concurrency ?? 1));
  }

  async classifyAll(
    ruleSet: RuleSet,
    files: readonly LogFile[],
    options: ClassifyAllOptions = {},
  ): Promise<FileClassification[]> {
    const results = new Array<FileClassification | undefined>(files.length);
    let next = 0;

    const lane = async (): Promise<void> => {
      while (next < files.length) {
        options.signal?.throwIfAborted();
        const index = next;
        next += 1;
        const file = files[index];
        const result = { file, records: classifyFile(ruleSet, file) };
        results[index] = result;
        options.onFileClassified?.(result, index);
        await yieldToEventLoop();
      }
    };

    const lanes = Array.from({ length: Math.min(this.concurrency, files.length) }, () => lane());
    await Promise.all(lanes);

    return results.map((result, index) => {
      if (!result) {
        throw new Error(`File ${index} was not classified.`);
      }
      return result;
    });
  }
}
