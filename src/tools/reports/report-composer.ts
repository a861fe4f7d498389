/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RuleSet } from '../../core/rule-set.js';
import type { ClassifiedRecord } from '../../core/types.js';
import { HtmlReportBuilder } from './html-report.js';
import type { ReportBuilder } from './report-builder.js';
import { TextReportBuilder } from './text-report.js';

export interface ComposedReports {
  text: string;
  html: string;
}

/**
 * Feeds one classified stream to both renderings so the text and HTML reports
 * can never diverge.
 */
export class ReportComposer {
  private readonly text: ReportBuilder;
  private readonly html: ReportBuilder;

  constructor(ruleSet: RuleSet) {
    this.text = new TextReportBuilder(ruleSet.configuration);
    this.html = new HtmlReportBuilder(ruleSet);
  }

  append(records: readonly ClassifiedRecord[]): void {
    this.text.append(records);
    this.html.append(records);
  }

  finalize(): ComposedReports {
    return { text: this.text.finalize(), html: this.html.finalize() };
  }
}
