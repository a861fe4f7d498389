/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type ConsoleLogger = (
  level: LogLevel,
  label: string,
  fields: Array<[string, string | number | undefined | null]>,
) => void;

/**
 * Unified console logger with structured, multiline output.
 * Each non-empty field is printed on its own line for readability.
 */
export const logConsole: ConsoleLogger = (level, label, fields) => {
  const filtered: Array<[string, string | number]> = [];
  for (const [key, value] of fields) {
    if (value !== undefined && value !== null && value !== '') {
      filtered.push([key, value]);
    }
  }
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[can-log-filter] ${label}:`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  const output = lines.join('\n');
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

export const silentLogger: ConsoleLogger = () => undefined;
