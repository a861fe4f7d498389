/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { emptyCounts, type CategoryCounts, type ClassifiedRecord } from '../../core/types.js';

export interface ReportBuilder {
  append(records: readonly ClassifiedRecord[]): void;
  finalize(): string;
}

/**
 * Shared bookkeeping for report builders: record order, per-category totals
 * and the append-after-finalize guard.
 */
export abstract class BaseReportBuilder implements ReportBuilder {
  protected readonly records: ClassifiedRecord[] = [];
  protected readonly counts: CategoryCounts = emptyCounts();
  private finalized = false;

  append(records: readonly ClassifiedRecord[]): void {
    if (this.finalized) {
      throw new Error(`${this.constructor.name} is already finalized.`);
    }
    for (const record of records) {
      this.records.push(record);
      this.counts[record.category] += 1;
    }
  }

  finalize(): string {
    this.finalized = true;
    return this.render();
  }

  protected summaryLine(): string {
    return [
      `Records: ${this.records.length}`,
      `Match: ${this.counts.match}`,
      `Mismatch: ${this.counts.mismatch}`,
      `Neutral: ${this.counts.neutral}`,
    ].join(' | ');
  }

  protected abstract render(): string;
}
