/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import prompts from 'prompts';
import type { RunnerOptions } from './args.js';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'directory',
        message: 'Directory containing .log and .zip files',
        initial: options.directory,
      },
      {
        type: 'text',
        name: 'configPath',
        message: 'Rule configuration file',
        initial: options.configPath,
      },
      {
        type: 'text',
        name: 'outputPrefix',
        message: 'Prefix for the .txt and .html reports',
        initial: options.outputPrefix,
      },
      {
        type: 'confirm',
        name: 'includeArchives',
        message: 'Process log files inside ZIP archives?',
        initial: options.includeArchives,
      },
      {
        type: 'confirm',
        name: 'initConfig',
        message: 'Create the default configuration if it is missing?',
        initial: options.initConfig,
      },
      {
        type: 'number',
        name: 'concurrency',
        message: 'Files classified concurrently',
        initial: options.concurrency ?? 1,
        min: 1,
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.directory === 'string' && responses.directory.trim()) {
    options.directory = responses.directory.trim();
  }
  if (typeof responses.configPath === 'string' && responses.configPath.trim()) {
    options.configPath = responses.configPath.trim();
  }
  if (typeof responses.outputPrefix === 'string' && responses.outputPrefix.trim()) {
    options.outputPrefix = responses.outputPrefix.trim();
  }
  if (typeof responses.includeArchives === 'boolean') {
    options.includeArchives = responses.includeArchives;
  }
  if (typeof responses.initConfig === 'boolean') {
    options.initConfig = responses.initConfig;
  }
  if (typeof responses.concurrency === 'number' && Number.isInteger(responses.concurrency)) {
    options.concurrency = Math.max(1, responses.concurrency);
  }
}
