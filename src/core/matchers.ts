/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { MatchExpression } from './types.js';

export interface Span {
  start: number;
  end: number;
}

export interface LineMatcher {
  appliesTo(line: string): boolean;
  /** Character ranges responsible for the match, sorted and non-overlapping. */
  locate(line: string): Span[];
}

export const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Matcher backed by one or more probes. `any` applies when a single probe hits,
 * `all` when every probe does.
 */
class ProbeMatcher implements LineMatcher {
  private readonly globalProbes: RegExp[];

  constructor(
    private readonly probes: RegExp[],
    private readonly mode: 'any' | 'all',
  ) {
    this.globalProbes = probes.map((probe) => new RegExp(probe.source, `${probe.flags}g`));
  }

  appliesTo(line: string): boolean {
    return this.mode === 'all'
      ? this.probes.every((probe) => probe.test(line))
      : this.probes.some((probe) => probe.test(line));
  }

  locate(line: string): Span[] {
    if (!this.appliesTo(line)) {
      return [];
    }
    const spans: Span[] = [];
    for (const probe of this.globalProbes) {
      for (const match of line.matchAll(probe)) {
        if (match[0].length === 0 || match.index === undefined) {
          continue;
        }
        spans.push({ start: match.index, end: match.index + match[0].length });
      }
    }
    return mergeSpans(spans);
  }
}

export const mergeSpans = (spans: Span[]): Span[] => {
  const sorted = [...spans].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: Span[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start < last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ ...span });
    }
  }
  return merged;
};

const wholeWord = (word: string): string => `(?<!\\w)${escapeRegExp(word)}(?!\\w)`;

/**
 * Compiles a match expression into its line matcher. Throws a SyntaxError for
 * an invalid pattern source.
 */
export const compileMatcher = (expression: MatchExpression): LineMatcher => {
  switch (expression.kind) {
    case 'literal':
      return new ProbeMatcher(
        [new RegExp(escapeRegExp(expression.text), expression.caseSensitive ? '' : 'i')],
        'any',
      );
    case 'pattern':
      return new ProbeMatcher([new RegExp(expression.pattern, expression.flags)], 'any');
    case 'keywords': {
      const flags = expression.caseSensitive ? '' : 'i';
      return new ProbeMatcher(
        expression.words.map((word) => new RegExp(wholeWord(word), flags)),
        expression.mode,
      );
    }
    default: {
      const exhaustive: never = expression;
      throw new Error(`Unsupported match expression: ${JSON.stringify(exhaustive)}`);
    }
  }
};
