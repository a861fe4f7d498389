/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { ConfigStore } from '../config/config-store.js';
import type { ConsoleLogger } from '../core/logging.js';
import { FilterPipeline } from '../core/pipeline/index.js';
import type { Configuration, RunSummary } from '../core/types.js';
import { ClassifierPool } from '../core/workers/classifier-pool.js';
import { ArchiveIngester } from '../tools/archive-ingester.js';
import { LogSource } from '../tools/log-source.js';
import type { FilterObserver } from '../types/observer.js';

export interface LogFilterOptions {
  directory: string;
  outputPrefix: string;
  configPath: string;
  includeArchives?: boolean;
  createConfigIfMissing?: boolean;
  concurrency?: number;
  tempRoot?: string;
  observer?: FilterObserver;
  signal?: AbortSignal;
  log?: ConsoleLogger;
}

/**
 * Main entry point: wires the default collaborators and runs one filter pass.
 */
export async function runLogFilter(options: LogFilterOptions): Promise<RunSummary> {
  const pipeline = new FilterPipeline({
    configStore: new ConfigStore(),
    logSource: new LogSource({ ingester: new ArchiveIngester({ tempRoot: options.tempRoot }) }),
    classifierPool: new ClassifierPool({ concurrency: options.concurrency }),
    observer: options.observer,
    log: options.log,
  });
  return pipeline.run({
    directory: resolve(options.directory),
    configPath: resolve(options.configPath),
    outputPrefix: resolve(options.outputPrefix),
    includeArchives: options.includeArchives,
    createConfigIfMissing: options.createConfigIfMissing,
    signal: options.signal,
  });
}

export async function createDefaultConfig(
  configPath: string,
  options: { force?: boolean } = {},
): Promise<Configuration> {
  return new ConfigStore().createDefault(resolve(configPath), options);
}
