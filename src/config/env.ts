/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_CONFIG_PATH } from './defaults.js';

export const DEFAULT_OUTPUT_PREFIX = 'filtered_log_results';
export const DEFAULT_DIRECTORY = '.';

export interface FilterEnvConfig {
  directory: string;
  outputPrefix: string;
  configPath: string;
}

/**
 * Option defaults, overridable through the environment. Command-line flags take
 * precedence over both.
 */
export function resolveFilterEnv(env: NodeJS.ProcessEnv = process.env): FilterEnvConfig {
  return {
    directory: nonEmpty(env['CAN_LOG_FILTER_DIRECTORY']) ?? DEFAULT_DIRECTORY,
    outputPrefix: nonEmpty(env['CAN_LOG_FILTER_OUTPUT_PREFIX']) ?? DEFAULT_OUTPUT_PREFIX,
    configPath: nonEmpty(env['CAN_LOG_FILTER_CONFIG']) ?? DEFAULT_CONFIG_PATH,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
