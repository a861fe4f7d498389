#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isLogFilterError, logConsole, type RunSummary } from '../core/index.js';
import { createDefaultConfig } from '../runner/index.js';
import { releaseActiveScopesSync } from '../tools/temp-scope.js';
import { FilterApp } from '../ui/filter-app.js';
import { parseArgs } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const EXIT_CANCELLED = 130;

export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const options = parseArgs(argv);

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  if (options.createConfig) {
    try {
      const configuration = await createDefaultConfig(options.configPath, { force: options.force });
      logConsole('info', 'Default configuration created', [
        ['path', options.configPath],
        ['rules', configuration.rules.length],
      ]);
      return 0;
    } catch (error) {
      if (isLogFilterError(error)) {
        logConsole('error', 'Configuration not created', [
          ['code', error.code],
          ['reason', error.message],
        ]);
        return 1;
      }
      throw error;
    }
  }

  const controller = new AbortController();
  const onSigint = (): void => controller.abort(new Error('Interrupted by user.'));
  process.once('SIGINT', onSigint);
  process.once('exit', releaseActiveScopesSync);

  const outcome: { summary?: RunSummary } = {};
  try {
    const { waitUntilExit } = render(
      <FilterApp
        options={{
          directory: options.directory,
          outputPrefix: options.outputPrefix,
          configPath: options.configPath,
          includeArchives: options.includeArchives,
          createConfigIfMissing: options.initConfig,
          concurrency: options.concurrency,
          signal: controller.signal,
        }}
        onComplete={(result) => {
          outcome.summary = result;
        }}
      />,
      { exitOnCtrlC: false },
    );
    await waitUntilExit();
  } catch (error) {
    if (controller.signal.aborted) {
      return EXIT_CANCELLED;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
    releaseActiveScopesSync();
  }

  return outcome.summary?.status === 'done' ? 0 : 1;
};

const invokedDirectly = (): boolean => {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (invokedDirectly()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Failed to run log filter:', error);
      process.exit(1);
    });
}
