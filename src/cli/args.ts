/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolveFilterEnv } from '../config/env.js';

export interface RunnerOptions {
  directory: string;
  outputPrefix: string;
  configPath: string;
  createConfig: boolean;
  force: boolean;
  initConfig: boolean;
  includeArchives: boolean;
  concurrency?: number;
  interactive?: boolean;
}

const FLAGS: ReadonlySet<string> = new Set([
  '--directory',
  '-d',
  '--output-prefix',
  '-o',
  '--config',
  '-c',
  '--create-config',
  '--force',
  '--init-config',
  '--no-zip',
  '--concurrency',
  '--interactive',
]);

export const parseArgs = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunnerOptions => {
  const defaults = resolveFilterEnv(env);
  const options: RunnerOptions = {
    directory: defaults.directory,
    outputPrefix: defaults.outputPrefix,
    configPath: defaults.configPath,
    createConfig: false,
    force: false,
    initConfig: false,
    includeArchives: true,
  };

  const valueAfter = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--') || FLAGS.has(value)) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--directory':
      case '-d':
        options.directory = valueAfter(i++, arg);
        break;
      case '--output-prefix':
      case '-o':
        options.outputPrefix = valueAfter(i++, arg);
        break;
      case '--config':
      case '-c':
        options.configPath = valueAfter(i++, arg);
        break;
      case '--create-config':
        options.createConfig = true;
        break;
      case '--force':
        options.force = true;
        break;
      case '--init-config':
        options.initConfig = true;
        break;
      case '--no-zip':
        options.includeArchives = false;
        break;
      case '--concurrency': {
        const value = Number(valueAfter(i++, arg));
        if (!Number.isInteger(value) || value < 1) {
          throw new Error(`--concurrency expects a positive integer`);
        }
        options.concurrency = value;
        break;
      }
      case '--interactive':
        options.interactive = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};
