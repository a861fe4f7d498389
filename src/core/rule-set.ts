/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { compileMatcher, type LineMatcher, type Span } from './matchers.js';
import type { Configuration, Rule } from './types.js';

export interface CompiledRule {
  rule: Rule;
  matcher: LineMatcher;
}

/**
 * Configuration rules compiled once per run, kept in declared order.
 */
export class RuleSet {
  private readonly compiled: readonly CompiledRule[];
  private readonly byId: ReadonlyMap<string, CompiledRule>;

  private constructor(readonly configuration: Configuration) {
    this.compiled = configuration.rules.map((rule) => ({
      rule,
      matcher: compileMatcher(rule.match),
    }));
    this.byId = new Map(this.compiled.map((entry) => [entry.rule.id, entry]));
  }

  static compile(configuration: Configuration): RuleSet {
    return new RuleSet(configuration);
  }

  get rules(): readonly Rule[] {
    return this.configuration.rules;
  }

  /** First rule in declared order whose matcher applies to the line. */
  firstMatch(line: string): Rule | undefined {
    for (const entry of this.compiled) {
      if (entry.matcher.appliesTo(line)) {
        return entry.rule;
      }
    }
    return undefined;
  }

  getRule(id: string): Rule | undefined {
    return this.byId.get(id)?.rule;
  }

  locate(ruleId: string, line: string): Span[] {
    return this.byId.get(ruleId)?.matcher.locate(line) ?? [];
  }
}
