/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LogRecord } from './types.js';

export type ColumnKind = 'string' | 'integer' | 'float';

export interface ReportColumn {
  header: string;
  kind: ColumnKind;
  value: (record: LogRecord) => string | number;
}

/** Output contract: `id` first, then the data columns in report order. */
export const REPORT_COLUMNS: readonly ReportColumn[] = Object.freeze([
  { header: 'id', kind: 'string', value: (r) => r.id },
  { header: 'master_asc_node_time', kind: 'string', value: (r) => r.masterAscNodeTime },
  { header: 'slave_asc_node_time', kind: 'string', value: (r) => r.slaveAscNodeTime },
  { header: 'filt_start_dt', kind: 'string', value: (r) => r.filtStartDt },
  { header: 'geocoding_start_dt', kind: 'string', value: (r) => r.geocodingStartDt },
  { header: 'filter_geo_delta_secs', kind: 'integer', value: (r) => r.filterGeoDeltaSecs },
  { header: 'length', kind: 'integer', value: (r) => r.length },
  { header: 'width', kind: 'integer', value: (r) => r.width },
  { header: 'alks', kind: 'integer', value: (r) => r.alks },
  { header: 'rlks', kind: 'integer', value: (r) => r.rlks },
  { header: 'east', kind: 'float', value: (r) => r.east },
  { header: 'west', kind: 'float', value: (r) => r.west },
  { header: 'north', kind: 'float', value: (r) => r.north },
  { header: 'south', kind: 'float', value: (r) => r.south },
  { header: 'lat', kind: 'float', value: (r) => r.lat },
  { header: 'lon', kind: 'float', value: (r) => r.lon },
] satisfies ReportColumn[]);

/** Floats always show a decimal part, so `6` prints as `6.0`. */
export const formatFloat = (value: number): string =>
  Number.isInteger(value) && Math.abs(value) < 1e21 ? value.toFixed(1) : String(value);

export const formatCell = (column: ReportColumn, record: LogRecord): string => {
  const value = column.value(record);
  if (typeof value === 'number' && column.kind === 'float') {
    return formatFloat(value);
  }
  return String(value);
};

/**
 * Report rows keyed by `id`, in first-insertion order.
 * Inserting an existing `id` replaces that row in place.
 */
export class RecordTable {
  private readonly rows = new Map<string, LogRecord>();

  /** Returns true when an earlier row with the same id was replaced. */
  upsert(record: LogRecord): boolean {
    const replaced = this.rows.has(record.id);
    this.rows.set(record.id, record);
    return replaced;
  }

  get(id: string): LogRecord | undefined {
    return this.rows.get(id);
  }

  get size(): number {
    return this.rows.size;
  }

  records(): LogRecord[] {
    return [...this.rows.values()];
  }
}
