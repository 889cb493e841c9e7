/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { REPORT_COLUMNS, formatCell, type RecordTable } from '../core/record-table.js';

const COLUMN_GAP = '  ';

/**
 * Human-readable grid of the table for the console. The `id` column is
 * left-aligned, the rest right-aligned, with a row/column count footer.
 */
export const formatTable = (table: RecordTable): string => {
  const [indexColumn, ...dataColumns] = REPORT_COLUMNS;
  if (table.size === 0) {
    return ['Empty table', `Columns: ${dataColumns.map((c) => c.header).join(', ')}`].join('\n');
  }
  const grid = [
    REPORT_COLUMNS.map((column) => column.header),
    ...table.records().map((record) => REPORT_COLUMNS.map((column) => formatCell(column, record))),
  ];
  const widths = REPORT_COLUMNS.map((_, index) =>
    grid.reduce((max, row) => Math.max(max, row[index].length), 0),
  );
  const lines = grid.map((row) =>
    row
      .map((cell, index) =>
        REPORT_COLUMNS[index] === indexColumn
          ? cell.padEnd(widths[index])
          : cell.padStart(widths[index]),
      )
      .join(COLUMN_GAP),
  );
  lines.push('', `[${table.size} rows x ${dataColumns.length} columns]`);
  return lines.join('\n');
};
