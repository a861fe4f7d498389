/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ConfigFileInput } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'log_filter_config.json';

/**
 * Baseline rule set written by `--create-config`. A line carrying both words
 * is a mismatch.
 */
export const DEFAULT_CONFIG_FILE: ConfigFileInput = {
  version: 1,
  rules: [
    {
      id: 'mismatch',
      match: { type: 'keywords', words: ['mismatch'] },
      category: 'mismatch',
      style: { color: 'red' },
    },
    {
      id: 'match',
      match: { type: 'keywords', words: ['match'] },
      category: 'match',
      style: { color: 'green' },
    },
    {
      id: 'configuration-file',
      match: { type: 'literal', text: 'Configuration file:' },
      category: 'neutral',
      style: { color: 'blue' },
    },
    {
      id: 'ccp-epk',
      match: { type: 'literal', text: 'CCP: EPK' },
      category: 'neutral',
      style: { color: 'yellow' },
    },
  ],
};
