/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const CATEGORIES = ['match', 'mismatch', 'neutral'] as const;
export type Category = (typeof CATEGORIES)[number];

export const HIGHLIGHT_COLORS = ['red', 'green', 'blue', 'yellow', 'none'] as const;
export type HighlightColor = (typeof HIGHLIGHT_COLORS)[number];

export interface LiteralExpression {
  kind: 'literal';
  text: string;
  caseSensitive: boolean;
}

export interface PatternExpression {
  kind: 'pattern';
  pattern: string;
  flags: string;
}

export interface KeywordSetExpression {
  kind: 'keywords';
  words: readonly string[];
  mode: 'any' | 'all';
  caseSensitive: boolean;
}

export type MatchExpression = LiteralExpression | PatternExpression | KeywordSetExpression;

export interface RuleStyle {
  color: HighlightColor;
}

export interface Rule {
  id: string;
  match: MatchExpression;
  category: Category;
  style: RuleStyle;
}

/**
 * Rule configuration for a single run. Values are deep-frozen once loaded and
 * handed explicitly to the classifier and the report builders.
 */
export interface Configuration {
  readonly version: 1;
  readonly rules: readonly Rule[];
}

export type LogOrigin =
  | { kind: 'direct' }
  | { kind: 'archive'; archiveName: string; entryPath: string };

export interface LogFile {
  /** Location the lines were read from (an extracted copy for archive entries). */
  path: string;
  /** Display identity used in reports: the file name, or `<archive>!<entry>`. */
  source: string;
  origin: LogOrigin;
  lines: readonly string[];
}

export interface ClassifiedRecord {
  source: string;
  lineNumber: number;
  raw: string;
  category: Category;
  ruleId?: string;
}

export type CategoryCounts = Record<Category, number>;

export interface FileSummary extends CategoryCounts {
  source: string;
  records: number;
}

export type WarningCode = 'ArchiveUnreadable' | 'LogFileUnreadable';

export interface RunWarning {
  code: WarningCode;
  source: string;
  message: string;
}

export const PIPELINE_STATES = [
  'Idle',
  'ConfigLoaded',
  'Enumerating',
  'Classifying',
  'Reporting',
  'Done',
  'Failed',
] as const;
export type PipelineState = (typeof PIPELINE_STATES)[number];

export interface RunArtifacts {
  textPath: string;
  htmlPath: string;
}

export interface RunSummary {
  status: 'done' | 'failed';
  state: PipelineState;
  files: readonly FileSummary[];
  totals: CategoryCounts & { records: number };
  warnings: readonly RunWarning[];
  fatal?: { code: string; message: string };
  artifacts?: RunArtifacts;
}

export const emptyCounts = (): CategoryCounts => ({ match: 0, mismatch: 0, neutral: 0 });
