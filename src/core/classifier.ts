/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RuleSet } from './rule-set.js';
import type { Category, ClassifiedRecord, LogFile } from './types.js';

export interface LineClassification {
  lineNumber: number;
  raw: string;
  category: Category;
  ruleId?: string;
}

/**
 * Classifies every line in order. The first rule that applies decides the
 * category; lines no rule applies to are neutral.
 */
export const classify = (
  ruleSet: RuleSet,
  lines: readonly string[],
): LineClassification[] =>
  lines.map((raw, index): LineClassification => {
    const rule = ruleSet.firstMatch(raw);
    if (!rule) {
      return { lineNumber: index + 1, raw, category: 'neutral' };
    }
    return { lineNumber: index + 1, raw, category: rule.category, ruleId: rule.id };
  });

export const classifyFile = (ruleSet: RuleSet, file: LogFile): ClassifiedRecord[] =>
  classify(ruleSet, file.lines).map((entry) => ({ source: file.source, ...entry }));
