/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { logConsole } from './logging.js';
import { formatIsoTimestamp, wholeSecondsBetween } from './timestamp.js';
import type { DerivedFields, ExtractedFields, LogRecord } from './types.js';

/**
 * Midpoint of a span: the lower bound plus half the absolute extent.
 * Same as `south + |north - south| / 2` when south <= north; measuring up
 * from the smaller value keeps inverted bounds inside the box, where the
 * literal formula would overshoot.
 */
const midpoint = (a: number, b: number): number => Math.min(a, b) + Math.abs(b - a) / 2;

export const deriveFields = (fields: ExtractedFields): DerivedFields => {
  const derived: DerivedFields = {
    filterGeoDeltaSecs: wholeSecondsBetween(fields.filtStartDt, fields.geocodingStartDt),
    lat: midpoint(fields.south, fields.north),
    lon: midpoint(fields.west, fields.east),
  };
  logConsole('debug', 'derive', `filterGeoDeltaSecs: ${derived.filterGeoDeltaSecs}`);
  logConsole('debug', 'derive', `lat: ${derived.lat}`);
  logConsole('debug', 'derive', `lon: ${derived.lon}`);
  return derived;
};

export const buildLogRecord = (
  id: string,
  fields: ExtractedFields,
  derived: DerivedFields,
): LogRecord =>
  Object.freeze({
    id,
    masterAscNodeTime: formatIsoTimestamp(fields.masterAscNodeTime),
    slaveAscNodeTime: formatIsoTimestamp(fields.slaveAscNodeTime),
    filtStartDt: formatIsoTimestamp(fields.filtStartDt),
    geocodingStartDt: formatIsoTimestamp(fields.geocodingStartDt),
    filterGeoDeltaSecs: derived.filterGeoDeltaSecs,
    length: fields.length,
    width: fields.width,
    alks: fields.alks,
    rlks: fields.rlks,
    east: fields.east,
    west: fields.west,
    north: fields.north,
    south: fields.south,
    lat: derived.lat,
    lon: derived.lon,
  });
