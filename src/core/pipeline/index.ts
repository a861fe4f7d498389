/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  FilterPipeline,
  artifactPaths,
  type FilterPipelineDeps,
  type FilterRunOptions,
} from './filter-pipeline.js';
export { PipelineStateMachine, isTerminalState } from './state-machine.js';
