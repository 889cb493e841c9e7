/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { MalformedValueError } from '../errors.js';
import { parseTimestamp, type FractionSeparator } from '../timestamp.js';
import type { FieldName, Timestamp } from '../types.js';

/** Turns the captured text of a rule into its semantic value, or throws. */
export type FieldConverter<T> = (raw: string, field: FieldName) => T;

const INTEGER_LITERAL = /^[-+]?\d+$/;
const FLOAT_LITERAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

export const toInteger: FieldConverter<number> = (raw, field) => {
  const text = raw.trim();
  if (!INTEGER_LITERAL.test(text)) {
    throw new MalformedValueError(field, raw, 'expected an integer');
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedValueError(field, raw, 'integer out of range');
  }
  return value;
};

export const toFloat: FieldConverter<number> = (raw, field) => {
  const text = raw.trim();
  if (!FLOAT_LITERAL.test(text)) {
    throw new MalformedValueError(field, raw, 'expected a decimal number');
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new MalformedValueError(field, raw, 'number is not finite');
  }
  return value;
};

export const toTimestamp =
  (separator: FractionSeparator): FieldConverter<Timestamp> =>
  (raw, field) => {
    const timestamp = parseTimestamp(raw.trim(), separator);
    if (!timestamp) {
      const shape = separator === ',' ? 'YYYY-MM-DD HH:MM:SS,mmm' : 'YYYY-MM-DD HH:MM:SS.ffffff';
      throw new MalformedValueError(field, raw, `expected a timestamp shaped ${shape}`);
    }
    return timestamp;
  };
