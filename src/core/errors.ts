/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogFilterErrorCode =
  | 'ConfigNotFound'
  | 'ConfigMalformed'
  | 'ConfigAlreadyExists'
  | 'ArchiveUnreadable'
  | 'LogFileUnreadable'
  | 'NoInputFound'
  | 'OutputWriteFailed';

const FATAL_CODES: ReadonlySet<LogFilterErrorCode> = new Set([
  'ConfigNotFound',
  'ConfigMalformed',
  'ConfigAlreadyExists',
  'NoInputFound',
  'OutputWriteFailed',
]);

export class LogFilterError extends Error {
  readonly code: LogFilterErrorCode;

  constructor(code: LogFilterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LogFilterError';
    this.code = code;
  }

  /** Configuration- and output-scoped errors end the run; file-scoped ones do not. */
  get fatal(): boolean {
    return FATAL_CODES.has(this.code);
  }
}

export const isLogFilterError = (error: unknown): error is LogFilterError =>
  error instanceof LogFilterError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
