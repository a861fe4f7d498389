/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { CATEGORIES, HIGHLIGHT_COLORS, type Configuration, type Rule } from '../core/types.js';

export const RULE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const LiteralSchema = z.object({
  type: z.literal('literal'),
  text: z.string().min(1),
  caseSensitive: z.boolean().default(false),
});

const PatternSchema = z.object({
  type: z.literal('pattern'),
  pattern: z.string().min(1),
  flags: z
    .string()
    .regex(/^(?!.*(.).*\1)[imsu]*$/, 'flags must be distinct characters from "imsu"')
    .default('i'),
});

const KeywordsSchema = z.object({
  type: z.literal('keywords'),
  words: z.array(z.string().min(1)).min(1),
  mode: z.enum(['any', 'all']).default('any'),
  caseSensitive: z.boolean().default(false),
});

export const MatchSchema = z.discriminatedUnion('type', [
  LiteralSchema,
  PatternSchema,
  KeywordsSchema,
]);

export const RuleSchema = z.object({
  id: z.string().regex(RULE_ID_PATTERN, 'id must be letters, digits, "_", "." or "-"'),
  match: MatchSchema,
  category: z.enum(CATEGORIES),
  style: z.object({ color: z.enum(HIGHLIGHT_COLORS) }).default({ color: 'none' }),
});

export const ConfigFileSchema = z
  .object({
    version: z.literal(1).default(1),
    rules: z.array(RuleSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.rules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'id'],
          message: `duplicate rule id "${rule.id}"`,
        });
      }
      seen.add(rule.id);
      if (rule.match.type === 'pattern') {
        try {
          new RegExp(rule.match.pattern, rule.match.flags);
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rules', index, 'match', 'pattern'],
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
    });
  });

/** On-disk shape, as written by `createDefault`. */
export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
type ConfigFile = z.output<typeof ConfigFileSchema>;
type RuleEntry = ConfigFile['rules'][number];

const toRule = (entry: RuleEntry): Rule => {
  const { match } = entry;
  switch (match.type) {
    case 'literal':
      return {
        id: entry.id,
        category: entry.category,
        style: { color: entry.style.color },
        match: { kind: 'literal', text: match.text, caseSensitive: match.caseSensitive },
      };
    case 'pattern':
      return {
        id: entry.id,
        category: entry.category,
        style: { color: entry.style.color },
        match: { kind: 'pattern', pattern: match.pattern, flags: match.flags },
      };
    case 'keywords':
      return {
        id: entry.id,
        category: entry.category,
        style: { color: entry.style.color },
        match: {
          kind: 'keywords',
          words: Object.freeze([...match.words]),
          mode: match.mode,
          caseSensitive: match.caseSensitive,
        },
      };
  }
};

const freezeRule = (rule: Rule): Rule => {
  Object.freeze(rule.match);
  Object.freeze(rule.style);
  return Object.freeze(rule);
};

export const toConfiguration = (file: ConfigFile): Configuration =>
  Object.freeze({
    version: file.version,
    rules: Object.freeze(file.rules.map((entry) => freezeRule(toRule(entry)))),
  });

export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
