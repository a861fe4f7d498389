/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ConfigStore } from '../../config/config-store.js';
import { RuleSet } from '../../core/rule-set.js';
import { HtmlReportBuilder, escapeHtml, highlightHtml, recordAnchor } from './html-report.js';

const ruleSet = RuleSet.compile(
  new ConfigStore().parse(
    JSON.stringify({
      rules: [
        {
          id: 'nack',
          match: { type: 'literal', text: 'NACK' },
          category: 'mismatch',
          style: { color: 'red' },
        },
        {
          id: 'ack',
          match: { type: 'literal', text: 'ACK' },
          category: 'match',
          style: { color: 'green' },
        },
        { id: 'plain', match: { type: 'literal', text: 'boot' }, category: 'neutral' },
      ],
    }),
  ),
);

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#039;');
  });
});

describe('recordAnchor', () => {
  it('is stable and readable', () => {
    const anchor = recordAnchor('a.log', 3);
    expect(anchor).toMatch(/^rec-a-log-[0-9a-f]{8}-L3$/);
    expect(recordAnchor('a.log', 3)).toBe(anchor);
  });

  it('keeps sources with the same slug apart', () => {
    expect(recordAnchor('a.b.log', 1)).not.toBe(recordAnchor('a-b.log', 1));
  });
});

describe('highlightHtml', () => {
  it('escapes around and inside highlighted spans', () => {
    expect(highlightHtml('x<ACK>y', [{ start: 2, end: 5 }], 'hl-green')).toBe(
      'x&lt;<mark class="hl-green">ACK</mark>&gt;y',
    );
  });
});

describe('HtmlReportBuilder', () => {
  const render = (): string => {
    const builder = new HtmlReportBuilder(ruleSet);
    builder.append([
      { source: 'a.log', lineNumber: 1, raw: '0x11 ACK ok', category: 'match', ruleId: 'ack' },
      { source: 'a.log', lineNumber: 2, raw: 'boot <init>', category: 'neutral', ruleId: 'plain' },
      { source: 'b.log', lineNumber: 1, raw: '0x10 NACK', category: 'mismatch', ruleId: 'nack' },
    ]);
    return builder.finalize();
  };

  it('renders one anchored element per record', () => {
    const html = render();
    const anchor = recordAnchor('a.log', 1);

    expect(html.match(/<div class="record /g)).toHaveLength(3);
    expect(html).toContain(
      `<div class="record match" id="${anchor}" data-source="a.log" data-line="1" data-category="match" data-rule="ack">` +
        `<a class="line-ref" href="#${anchor}">a.log - Line 1</a> ` +
        '<span class="text">0x11 <mark class="hl-green">ACK</mark> ok</span></div>',
    );
  });

  it('escapes text of rules without a highlight colour', () => {
    expect(render()).toContain('<span class="text">boot &lt;init&gt;</span>');
  });

  it('links every source from the file index', () => {
    const html = render();
    expect(html).toContain(
      `<li><a href="#${recordAnchor('a.log', 1)}">a.log</a> <span class="counts">2 records, 1 match, 0 mismatch</span></li>`,
    );
    expect(html).toContain(
      `<li><a href="#${recordAnchor('b.log', 1)}">b.log</a> <span class="counts">1 records, 0 match, 1 mismatch</span></li>`,
    );
  });

  it('summarizes the totals', () => {
    expect(render()).toContain('<p>Records: 3 | Match: 1 | Mismatch: 1 | Neutral: 1</p>');
  });
});
