/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './files.js';
export * from './temp-scope.js';
export * from './archive-ingester.js';
export * from './log-source.js';
export * from './reports/report-builder.js';
export * from './reports/text-report.js';
export * from './reports/html-report.js';
export * from './reports/report-composer.js';
export * from './reports/artifact-writer.js';
