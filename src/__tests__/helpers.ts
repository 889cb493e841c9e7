/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LogRecord } from '../core/types.js';

export const VALID_LOG = readFileSync(
  fileURLToPath(new URL('./fixtures/isce.log', import.meta.url)),
  'utf8',
);

/** Drops every line containing `marker`. */
export const withoutLinesContaining = (text: string, marker: string): string =>
  text
    .split('\n')
    .filter((line) => !line.includes(marker))
    .join('\n');

/** Replaces the first line starting with `prefix`. */
export const replaceLine = (text: string, prefix: string, replacement: string): string => {
  const lines = text.split('\n');
  const index = lines.findIndex((line) => line.startsWith(prefix));
  if (index < 0) {
    throw new Error(`No line starts with ${prefix}`);
  }
  lines[index] = replacement;
  return lines.join('\n');
};

export const makeRecord = (overrides: Partial<LogRecord> = {}): LogRecord => ({
  id: 'A',
  masterAscNodeTime: '2019-12-30T17:22:41.123456',
  slaveAscNodeTime: '2019-12-18T17:22:40.500000',
  filtStartDt: '2020-01-01T00:00:00',
  geocodingStartDt: '2020-01-01T00:05:30.500000',
  filterGeoDeltaSecs: 330,
  length: 1500,
  width: 2400,
  alks: 7,
  rlks: 19,
  east: 10,
  west: 2,
  north: 8,
  south: 4,
  lat: 6,
  lon: 6,
  ...overrides,
});

/** Writes `<root>/<...segments>/isce.log` and returns its path. */
export const writeLog = (root: string, segments: string[], content: string): string => {
  const dir = join(root, ...segments);
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, 'isce.log');
  writeFileSync(filePath, content, 'utf8');
  return filePath;
};

export const VALID_ROW =
  '2019-12-30T17:22:41.123456,2019-12-18T17:22:40.500000,2020-01-01T00:00:00,' +
  '2020-01-01T00:05:30.500000,330,1500,2400,7,19,10.0,2.0,8.0,4.0,6.0,6.0';

export const CSV_HEADER =
  'id,master_asc_node_time,slave_asc_node_time,filt_start_dt,geocoding_start_dt,' +
  'filter_geo_delta_secs,length,width,alks,rlks,east,west,north,south,lat,lon';
