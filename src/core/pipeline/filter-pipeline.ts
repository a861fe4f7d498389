/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ConfigStore, LoadConfigOptions } from '../../config/config-store.js';
import type { LogSource } from '../../tools/log-source.js';
import { writeArtifacts } from '../../tools/reports/artifact-writer.js';
import { ReportComposer } from '../../tools/reports/report-composer.js';
import type { FilterObserver } from '../../types/observer.js';
import { LogFilterError, describeError, isLogFilterError } from '../errors.js';
import { logConsole, type ConsoleLogger } from '../logging.js';
import { RuleSet } from '../rule-set.js';
import {
  emptyCounts,
  type ClassifiedRecord,
  type FileSummary,
  type PipelineState,
  type RunArtifacts,
  type RunSummary,
  type RunWarning,
} from '../types.js';
import { ClassifierPool } from '../workers/classifier-pool.js';
import { PipelineStateMachine, isTerminalState } from './state-machine.js';

export interface FilterPipelineDeps {
  configStore: Pick<ConfigStore, 'load'>;
  logSource: Pick<LogSource, 'enumerate'>;
  classifierPool?: ClassifierPool;
  observer?: FilterObserver;
  log?: ConsoleLogger;
}

export interface FilterRunOptions {
  directory: string;
  configPath: string;
  outputPrefix: string;
  includeArchives?: boolean;
  createConfigIfMissing?: boolean;
  signal?: AbortSignal;
}

export const artifactPaths = (outputPrefix: string): RunArtifacts => ({
  textPath: `${outputPrefix}.txt`,
  htmlPath: `${outputPrefix}.html`,
});

const summarizeFile = (source: string, records: readonly ClassifiedRecord[]): FileSummary => {
  const summary: FileSummary = { source, records: records.length, ...emptyCounts() };
  for (const record of records) {
    summary[record.category] += 1;
  }
  return summary;
};

/**
 * Runs one filter pass: load rules, enumerate inputs, classify, render both
 * reports. Per-file problems become warnings; configuration, input and output
 * problems end the run in the `Failed` state.
 */
export class FilterPipeline {
  private readonly machine: PipelineStateMachine;
  private readonly pool: ClassifierPool;
  private readonly log: ConsoleLogger;
  private readonly warnings: RunWarning[] = [];
  private readonly files: FileSummary[] = [];

  constructor(private readonly deps: FilterPipelineDeps) {
    this.pool = deps.classifierPool ?? new ClassifierPool();
    this.log = deps.log ?? logConsole;
    this.machine = new PipelineStateMachine((from, to, message) =>
      deps.observer?.onStateChange?.({ from, to, message }),
    );
  }

  get state(): PipelineState {
    return this.machine.state;
  }

  async run(options: FilterRunOptions): Promise<RunSummary> {
    if (this.machine.state !== 'Idle') {
      throw new Error('A FilterPipeline instance runs only once.');
    }
    const { signal } = options;
    const artifacts = artifactPaths(options.outputPrefix);

    try {
      const loadOptions: LoadConfigOptions = { createIfMissing: options.createConfigIfMissing };
      const ruleSet = RuleSet.compile(await this.deps.configStore.load(options.configPath, loadOptions));
      this.machine.transition('ConfigLoaded', `${ruleSet.rules.length} rules from ${options.configPath}`);

      signal?.throwIfAborted();
      this.machine.transition('Enumerating', options.directory);
      const enumeration = await this.deps.logSource.enumerate(options.directory, {
        includeArchives: options.includeArchives ?? true,
        signal,
      });
      enumeration.warnings.forEach((warning) => this.warn(warning));
      this.deps.observer?.onEnumerated?.({
        files: enumeration.files.length,
        warnings: enumeration.warnings.length,
      });
      if (enumeration.files.length === 0) {
        throw new LogFilterError('NoInputFound', `No readable .log files found in ${options.directory}`);
      }

      this.machine.transition('Classifying', `${enumeration.files.length} files`);
      const classified = await this.pool.classifyAll(ruleSet, enumeration.files, {
        signal,
        onFileClassified: (result, index) =>
          this.deps.observer?.onFileClassified?.({
            summary: summarizeFile(result.file.source, result.records),
            index,
            total: enumeration.files.length,
          }),
      });

      this.machine.transition('Reporting', options.outputPrefix);
      const composer = new ReportComposer(ruleSet);
      for (const { file, records } of classified) {
        composer.append(records);
        this.files.push(summarizeFile(file.source, records));
        this.deps.observer?.onRecords?.(records);
      }
      const reports = composer.finalize();
      signal?.throwIfAborted();
      await writeArtifacts([
        { path: artifacts.textPath, content: reports.text },
        { path: artifacts.htmlPath, content: reports.html },
      ]);

      this.machine.transition('Done');
      const summary = this.buildSummary('done', artifacts);
      this.log('info', 'Reports written', [
        ['text', artifacts.textPath],
        ['html', artifacts.htmlPath],
        ['files', summary.files.length],
        ['records', summary.totals.records],
        ['match', summary.totals.match],
        ['mismatch', summary.totals.mismatch],
        ['warnings', summary.warnings.length],
      ]);
      return summary;
    } catch (error) {
      if (!isTerminalState(this.machine.state)) {
        this.machine.transition('Failed', describeError(error));
      }
      if (isLogFilterError(error) && error.fatal) {
        this.log('error', 'Run failed', [
          ['code', error.code],
          ['reason', error.message],
        ]);
        return this.buildSummary('failed', undefined, { code: error.code, message: error.message });
      }
      throw error;
    }
  }

  private warn(warning: RunWarning): void {
    this.warnings.push(warning);
    this.deps.observer?.onWarning?.(warning);
    this.log('warn', 'Skipped input', [
      ['code', warning.code],
      ['source', warning.source],
      ['reason', warning.message],
    ]);
  }

  private buildSummary(
    status: RunSummary['status'],
    artifacts?: RunArtifacts,
    fatal?: RunSummary['fatal'],
  ): RunSummary {
    const totals = { records: 0, ...emptyCounts() };
    for (const file of this.files) {
      totals.records += file.records;
      totals.match += file.match;
      totals.mismatch += file.mismatch;
      totals.neutral += file.neutral;
    }
    return Object.freeze({
      status,
      state: this.machine.state,
      files: Object.freeze(this.files.map((file) => Object.freeze({ ...file }))),
      totals: Object.freeze(totals),
      warnings: Object.freeze(this.warnings.map((warning) => Object.freeze({ ...warning }))),
      fatal,
      artifacts,
    });
  }
}
