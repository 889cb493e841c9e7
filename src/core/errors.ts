/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FieldName } from './types.js';

/** Report column name for a field: `filtStartDt` becomes `filt_start_dt`. */
export const columnNameOf = (field: FieldName): string =>
  field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);

export type ReportErrorKind = 'filesystem' | 'missing-field' | 'malformed-value' | 'output-write';

/**
 * Base class for every failure the report pipeline raises on purpose.
 * `kind` discriminates the concrete error.
 */
export abstract class ReportError extends Error {
  abstract readonly kind: ReportErrorKind;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** The crawl root is missing, unreadable or not a directory. Fatal. */
export class FilesystemError extends ReportError {
  readonly kind = 'filesystem' as const;

  constructor(
    readonly path: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`${path}: ${reason}`, cause);
  }
}

/** A required rule found no match in the log text. */
export class MissingFieldError extends ReportError {
  readonly kind = 'missing-field' as const;
  readonly column: string;

  constructor(
    readonly field: FieldName,
    pattern: RegExp,
  ) {
    super(`Required field "${columnNameOf(field)}" not found (pattern ${pattern.source})`);
    this.column = columnNameOf(field);
  }
}

/** A rule matched, but the captured text could not be converted. */
export class MalformedValueError extends ReportError {
  readonly kind = 'malformed-value' as const;
  readonly column: string;

  constructor(
    readonly field: FieldName,
    readonly raw: string,
    reason: string,
  ) {
    super(`Field "${columnNameOf(field)}" has malformed value "${raw}": ${reason}`);
    this.column = columnNameOf(field);
  }
}

/** The report table could not be persisted. Fatal. */
export class OutputWriteError extends ReportError {
  readonly kind = 'output-write' as const;

  constructor(
    readonly path: string,
    cause?: unknown,
  ) {
    super(`Unable to write report to ${path}`, cause);
  }
}

export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

/** Short label for diagnostics: the report kind, or the native error name. */
export const describeErrorKind = (error: Error): string =>
  isReportError(error) ? error.kind : error.name;
