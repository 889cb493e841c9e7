/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Naive (zone-less) wall-clock timestamp with microsecond resolution,
 * as written by the processing pipeline.
 */
export interface Timestamp {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly microsecond: number;
}

/** Primitive fields pulled out of a single `isce.log`. */
export interface ExtractedFields {
  alks: number;
  rlks: number;
  east: number;
  west: number;
  north: number;
  south: number;
  length: number;
  width: number;
  filtStartDt: Timestamp;
  geocodingStartDt: Timestamp;
  masterAscNodeTime: Timestamp;
  slaveAscNodeTime: Timestamp;
}

export type FieldName = keyof ExtractedFields;

export interface DerivedFields {
  filterGeoDeltaSecs: number;
  lat: number;
  lon: number;
}

/** One report row. Built in one piece from a single source file. */
export interface LogRecord {
  readonly id: string;
  readonly masterAscNodeTime: string;
  readonly slaveAscNodeTime: string;
  readonly filtStartDt: string;
  readonly geocodingStartDt: string;
  readonly filterGeoDeltaSecs: number;
  readonly length: number;
  readonly width: number;
  readonly alks: number;
  readonly rlks: number;
  readonly east: number;
  readonly west: number;
  readonly north: number;
  readonly south: number;
  readonly lat: number;
  readonly lon: number;
}

export type FileOutcome = FileSuccess | FileFailure;

export interface FileSuccess {
  ok: true;
  path: string;
  record: LogRecord;
}

export interface FileFailure {
  ok: false;
  path: string;
  error: Error;
}
