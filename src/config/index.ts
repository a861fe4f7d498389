/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config-store.js';
export * from './defaults.js';
export * from './env.js';
export { ConfigFileSchema, RULE_ID_PATTERN, type ConfigFileInput } from './schema.js';
