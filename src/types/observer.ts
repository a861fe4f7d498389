/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Filter pipeline observer interface.
 * All hooks are optional and invoked synchronously from the pipeline.
 */

import type {
  ClassifiedRecord,
  FileSummary,
  PipelineState,
  RunWarning,
} from '../core/types.js';

export interface StateChangeEvent {
  from: PipelineState;
  to: PipelineState;
  message?: string;
}

export interface FilterObserver {
  onStateChange?(event: StateChangeEvent): void;
  onEnumerated?(info: { files: number; warnings: number }): void;
  onFileClassified?(info: { summary: FileSummary; index: number; total: number }): void;
  onRecords?(records: readonly ClassifiedRecord[]): void;
  onWarning?(warning: RunWarning): void;
}
