/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { PipelineState } from '../types.js';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  Idle: ['ConfigLoaded', 'Failed'],
  ConfigLoaded: ['Enumerating', 'Failed'],
  Enumerating: ['Classifying', 'Failed'],
  Classifying: ['Reporting', 'Failed'],
  Reporting: ['Done', 'Failed'],
  Done: [],
  Failed: [],
};

export const isTerminalState = (state: PipelineState): boolean =>
  TRANSITIONS[state].length === 0;

export class PipelineStateMachine {
  private current: PipelineState = 'Idle';

  constructor(
    private readonly onChange?: (from: PipelineState, to: PipelineState, message?: string) => void,
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  transition(to: PipelineState, message?: string): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal pipeline transition ${from} -> ${to}`);
    }
    this.current = to;
    this.onChange?.(from, to, message);
  }
}
