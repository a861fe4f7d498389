/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { LogFilterError, describeError } from '../core/errors.js';
import type { Configuration } from '../core/types.js';
import { errorCode, writeJsonFile } from '../tools/files.js';
import { DEFAULT_CONFIG_FILE } from './defaults.js';
import {
  ConfigFileSchema,
  formatIssues,
  toConfiguration,
  type ConfigFileInput,
} from './schema.js';

export interface LoadConfigOptions {
  /** Write the default rule set when the file does not exist yet. */
  createIfMissing?: boolean;
}

export interface CreateDefaultOptions {
  force?: boolean;
}

export interface ConfigStoreOptions {
  defaults?: ConfigFileInput;
}

/**
 * Loads, validates and creates rule configuration files.
 */
export class ConfigStore {
  private readonly defaults: ConfigFileInput;

  constructor(options: ConfigStoreOptions = {}) {
    this.defaults = options.defaults ?? DEFAULT_CONFIG_FILE;
  }

  async load(path: string, options: LoadConfigOptions = {}): Promise<Configuration> {
    let text: string;
    try {
      text = await fs.readFile(path, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        if (options.createIfMissing) {
          return this.createDefault(path);
        }
        throw new LogFilterError(
          'ConfigNotFound',
          `Configuration file not found: ${path}. Create one with --create-config.`,
          { cause: error },
        );
      }
      throw new LogFilterError(
        'ConfigMalformed',
        `Configuration file ${path} cannot be read: ${describeError(error)}`,
        { cause: error },
      );
    }
    return this.parse(text, path);
  }

  parse(text: string, origin = '<inline>'): Configuration {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new LogFilterError(
        'ConfigMalformed',
        `Configuration ${origin} is not valid JSON: ${describeError(error)}`,
        { cause: error },
      );
    }
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LogFilterError(
        'ConfigMalformed',
        `Configuration ${origin} is invalid: ${formatIssues(parsed.error)}`,
        { cause: parsed.error },
      );
    }
    return toConfiguration(parsed.data);
  }

  /**
   * Writes the baseline rule set. An existing file is only replaced when
   * `force` is set.
   */
  async createDefault(path: string, options: CreateDefaultOptions = {}): Promise<Configuration> {
    const configuration = this.parse(JSON.stringify(this.defaults), '<defaults>');
    try {
      await writeJsonFile(path, this.defaults, { exclusive: !options.force });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new LogFilterError(
          'ConfigAlreadyExists',
          `Configuration file already exists: ${path}. Pass --force to overwrite it.`,
          { cause: error },
        );
      }
      throw new LogFilterError(
        'OutputWriteFailed',
        `Unable to write configuration file ${path}: ${describeError(error)}`,
        { cause: error },
      );
    }
    return configuration;
  }
}
