/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { ConfigStore } from '../../config/config-store.js';
import { TextReportBuilder, formatTextRecord } from './text-report.js';

const configuration = new ConfigStore().parse(
  JSON.stringify({
    rules: [
      { id: 'nack', match: { type: 'literal', text: 'NACK' }, category: 'mismatch' },
      { id: 'ack', match: { type: 'literal', text: 'ACK' }, category: 'match' },
    ],
  }),
);

describe('TextReportBuilder', () => {
  it('renders a header and one line per record in append order', () => {
    const builder = new TextReportBuilder(configuration);
    builder.append([
      { source: 'a.log', lineNumber: 1, raw: '0x10 NACK received', category: 'mismatch', ruleId: 'nack' },
      { source: 'a.log', lineNumber: 2, raw: 'idle', category: 'neutral' },
    ]);
    builder.append([
      { source: 'b.zip!c.log', lineNumber: 1, raw: 'ACK', category: 'match', ruleId: 'ack' },
    ]);

    expect(builder.finalize()).toBe(
      [
        'CAN log filter results',
        '==================================================',
        'Records: 3 | Match: 1 | Mismatch: 1 | Neutral: 1',
        'Rules: nack -> mismatch, ack -> match',
        '==================================================',
        '',
        '[MISMATCH] a.log - Line 1 [nack]: 0x10 NACK received',
        '[        ] a.log - Line 2: idle',
        '[MATCH   ] b.zip!c.log - Line 1 [ack]: ACK',
        '',
      ].join('\n'),
    );
  });

  it('renders an empty run with the header only', () => {
    const builder = new TextReportBuilder(configuration);
    expect(builder.finalize().split('\n')[2]).toBe('Records: 0 | Match: 0 | Mismatch: 0 | Neutral: 0');
  });

  it('refuses records after finalize', () => {
    const builder = new TextReportBuilder(configuration);
    builder.finalize();
    expect(() => builder.append([])).toThrow('TextReportBuilder is already finalized.');
  });
});

describe('formatTextRecord', () => {
  it('uses fixed-width tags', () => {
    const lines = (['match', 'mismatch', 'neutral'] as const).map((category) =>
      formatTextRecord({ source: 's', lineNumber: 9, raw: 'x', category }),
    );
    expect(lines.map((line) => line.indexOf(' s - Line 9'))).toEqual([10, 10, 10]);
  });
});
