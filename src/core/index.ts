/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './matchers.js';
export * from './rule-set.js';
export * from './classifier.js';
export * from './workers/classifier-pool.js';
export { logConsole, silentLogger, type ConsoleLogger, type LogLevel } from './logging.js';
export {
  FilterPipeline,
  artifactPaths,
  type FilterPipelineDeps,
  type FilterRunOptions,
} from './pipeline/index.js';
export type { FilterObserver, StateChangeEvent } from '../types/observer.js';
