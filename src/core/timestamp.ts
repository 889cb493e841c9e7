/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Timestamp } from './types.js';

export type FractionSeparator = ',' | '.';

const TIMESTAMP_SHAPE =
  /^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})([,.])(\d{1,6})$/;

const MICROS_PER_SECOND = 1_000_000n;

/**
 * Parses `YYYY-MM-DD HH:MM:SS<sep>f` where the fraction holds one to six
 * digits and is padded on the right to microseconds.
 * Returns undefined when the text is not a real calendar date and time.
 */
export const parseTimestamp = (
  raw: string,
  separator: FractionSeparator,
): Timestamp | undefined => {
  const match = TIMESTAMP_SHAPE.exec(raw);
  if (!match || match[7] !== separator) {
    return undefined;
  }
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const timestamp: Timestamp = {
    year,
    month,
    day,
    hour,
    minute,
    second,
    microsecond: Number(match[8].padEnd(6, '0')),
  };
  return isValidTimestamp(timestamp) ? timestamp : undefined;
};

const toUtcDate = (timestamp: Timestamp): Date => {
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(timestamp.year, timestamp.month - 1, timestamp.day);
  date.setUTCHours(timestamp.hour, timestamp.minute, timestamp.second, 0);
  return date;
};

export const isValidTimestamp = (timestamp: Timestamp): boolean => {
  if (timestamp.year < 1 || timestamp.microsecond < 0 || timestamp.microsecond > 999_999) {
    return false;
  }
  const date = toUtcDate(timestamp);
  return (
    date.getUTCFullYear() === timestamp.year &&
    date.getUTCMonth() === timestamp.month - 1 &&
    date.getUTCDate() === timestamp.day &&
    date.getUTCHours() === timestamp.hour &&
    date.getUTCMinutes() === timestamp.minute &&
    date.getUTCSeconds() === timestamp.second
  );
};

export const toEpochMicroseconds = (timestamp: Timestamp): bigint =>
  BigInt(toUtcDate(timestamp).getTime()) * 1000n + BigInt(timestamp.microsecond);

/**
 * Whole seconds from `start` to `end`, truncated toward zero.
 * Negative when `end` precedes `start`.
 */
export const wholeSecondsBetween = (start: Timestamp, end: Timestamp): number =>
  Number((toEpochMicroseconds(end) - toEpochMicroseconds(start)) / MICROS_PER_SECOND);

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/**
 * ISO-8601 without zone. The fraction is printed as six digits and only
 * when non-zero.
 */
export const formatIsoTimestamp = (timestamp: Timestamp): string => {
  const date = `${pad(timestamp.year, 4)}-${pad(timestamp.month, 2)}-${pad(timestamp.day, 2)}`;
  const time = `${pad(timestamp.hour, 2)}:${pad(timestamp.minute, 2)}:${pad(timestamp.second, 2)}`;
  const fraction = timestamp.microsecond === 0 ? '' : `.${pad(timestamp.microsecond, 6)}`;
  return `${date}T${time}${fraction}`;
};
