/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Category, ClassifiedRecord, Configuration } from '../../core/types.js';
import { BaseReportBuilder } from './report-builder.js';

export const TEXT_TAGS: Record<Category, string> = {
  match: '[MATCH   ]',
  mismatch: '[MISMATCH]',
  neutral: '[        ]',
};

const RULE_WIDTH = 50;

export const formatTextRecord = (record: ClassifiedRecord): string => {
  const rule = record.ruleId ? ` [${record.ruleId}]` : '';
  return `${TEXT_TAGS[record.category]} ${record.source} - Line ${record.lineNumber}${rule}: ${record.raw}`;
};

/**
 * Plain-text rendering: a summary header followed by one line per record.
 */
export class TextReportBuilder extends BaseReportBuilder {
  constructor(private readonly configuration: Configuration) {
    super();
  }

  protected render(): string {
    const divider = '='.repeat(RULE_WIDTH);
    const rules = this.configuration.rules
      .map((rule) => `${rule.id} -> ${rule.category}`)
      .join(', ');
    const lines = [
      'CAN log filter results',
      divider,
      this.summaryLine(),
      `Rules: ${rules}`,
      divider,
      '',
      ...this.records.map(formatTextRecord),
    ];
    return `${lines.join('\n')}\n`;
  }
}
