/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createHash } from 'node:crypto';
import type { Span } from '../../core/matchers.js';
import type { RuleSet } from '../../core/rule-set.js';
import type { ClassifiedRecord } from '../../core/types.js';
import { BaseReportBuilder } from './report-builder.js';

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Anchor id for a record. The slug keeps ids readable, the digest keeps
 * sources that slug identically apart.
 */
export function recordAnchor(source: string, lineNumber: number): string {
  const slug = source.replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '') || 'log';
  const digest = createHash('sha1').update(source).digest('hex').slice(0, 8);
  return `rec-${slug}-${digest}-L${lineNumber}`;
}

export function highlightHtml(text: string, spans: readonly Span[], className: string): string {
  let html = '';
  let cursor = 0;
  for (const span of spans) {
    html += escapeHtml(text.slice(cursor, span.start));
    html += `<mark class="${className}">${escapeHtml(text.slice(span.start, span.end))}</mark>`;
    cursor = span.end;
  }
  return html + escapeHtml(text.slice(cursor));
}

const STYLES = `    body { font-family: Arial, sans-serif; margin: 20px; }
    h1 { color: #333; }
    .summary { margin: 20px 0; padding: 10px; background-color: #f0f0f0; border-radius: 5px; }
    .file-index li { margin: 2px 0; }
    .counts { color: #777; font-size: 0.9em; }
    .record { margin: 2px 0; padding: 4px 6px; border-bottom: 1px solid #eee; font-family: monospace; white-space: pre-wrap; }
    .record.match { background-color: #eaffea; border-left: 4px solid #008800; }
    .record.mismatch { background-color: #ffecec; border-left: 4px solid #cc0000; }
    .record.neutral { border-left: 4px solid transparent; }
    .record:target { outline: 2px solid #0066cc; }
    .line-ref { color: #555; font-weight: bold; text-decoration: none; }
    mark { font-weight: bold; }
    .hl-red { background-color: #FFCCCC; color: #CC0000; }
    .hl-green { background-color: #CCFFCC; color: #008800; }
    .hl-blue { background-color: #CCE5FF; color: #0066CC; }
    .hl-yellow { background-color: #FFFFCC; color: #888800; }`;

interface FileEntry {
  source: string;
  anchor: string;
  records: number;
  match: number;
  mismatch: number;
}

/**
 * Standalone HTML rendering. Every record becomes one `div.record` carrying a
 * stable anchor, its category as class and the rule's highlighted spans.
 */
export class HtmlReportBuilder extends BaseReportBuilder {
  constructor(private readonly ruleSet: RuleSet) {
    super();
  }

  protected render(): string {
    const lines = [
      '<!DOCTYPE html>',
      '<html lang="en">',
      '<head>',
      '  <meta charset="UTF-8">',
      '  <title>CAN Log Filter Results</title>',
      '  <style>',
      STYLES,
      '  </style>',
      '</head>',
      '<body>',
      '  <h1>CAN Log Filter Results</h1>',
      '  <div class="summary">',
      `    <p>${escapeHtml(this.summaryLine())}</p>`,
      '  </div>',
      ...this.renderFileIndex(),
      '  <main class="records">',
      ...this.records.map((record) => `    ${this.renderRecord(record)}`),
      '  </main>',
      '</body>',
      '</html>',
    ];
    return `${lines.join('\n')}\n`;
  }

  private renderFileIndex(): string[] {
    const files = new Map<string, FileEntry>();
    for (const record of this.records) {
      let entry = files.get(record.source);
      if (!entry) {
        entry = {
          source: record.source,
          anchor: recordAnchor(record.source, record.lineNumber),
          records: 0,
          match: 0,
          mismatch: 0,
        };
        files.set(record.source, entry);
      }
      entry.records += 1;
      if (record.category === 'match') entry.match += 1;
      if (record.category === 'mismatch') entry.mismatch += 1;
    }
    if (files.size === 0) {
      return [];
    }
    return [
      '  <nav class="file-index">',
      '    <h2>Files</h2>',
      '    <ul>',
      ...[...files.values()].map(
        (entry) =>
          `      <li><a href="#${entry.anchor}">${escapeHtml(entry.source)}</a> ` +
          `<span class="counts">${entry.records} records, ${entry.match} match, ${entry.mismatch} mismatch</span></li>`,
      ),
      '    </ul>',
      '  </nav>',
    ];
  }

  private renderRecord(record: ClassifiedRecord): string {
    const anchor = recordAnchor(record.source, record.lineNumber);
    const rule = record.ruleId ? this.ruleSet.getRule(record.ruleId) : undefined;
    const text =
      rule && rule.style.color !== 'none'
        ? highlightHtml(record.raw, this.ruleSet.locate(rule.id, record.raw), `hl-${rule.style.color}`)
        : escapeHtml(record.raw);
    const attributes = [
      `class="record ${record.category}"`,
      `id="${anchor}"`,
      `data-source="${escapeHtml(record.source)}"`,
      `data-line="${record.lineNumber}"`,
      `data-category="${record.category}"`,
      `data-rule="${escapeHtml(record.ruleId ?? '')}"`,
    ].join(' ');
    return (
      `<div ${attributes}>` +
      `<a class="line-ref" href="#${anchor}">${escapeHtml(record.source)} - Line ${record.lineNumber}</a> ` +
      `<span class="text">${text}</span></div>`
    );
  }
}
