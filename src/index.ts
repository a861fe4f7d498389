/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { runLogFilter, createDefaultConfig, type LogFilterOptions } from './runner/index.js';
export * from './core/index.js';
export * from './config/index.js';
export * from './tools/index.js';
