/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runLogFilter,
  createDefaultConfig,
  type LogFilterOptions,
} from './run-log-filter.js';
