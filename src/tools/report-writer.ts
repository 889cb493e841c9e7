/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { OutputWriteError } from '../core/errors.js';
import { REPORT_COLUMNS, formatCell, type RecordTable } from '../core/record-table.js';
import { ensureDirectory } from './files.js';

export const DEFAULT_REPORT_FILE = 'isce_log.csv';

export interface RecordTableWriteOptions {
  filePath: string;
  delimiter?: string;
}

/** Header line plus one line per row, each terminated by `\n`. */
export const serializeRecordTable = (table: RecordTable, delimiter = ','): string => {
  const header = REPORT_COLUMNS.map((column) => formatCsvValue(column.header, delimiter));
  const rows = table
    .records()
    .map((record) =>
      REPORT_COLUMNS.map((column) => formatCsvValue(formatCell(column, record), delimiter)),
    );
  return [header, ...rows].map((columns) => `${columns.join(delimiter)}\n`).join('');
};

/**
 * Persists the table as delimited text.
 *
 * @throws OutputWriteError when the file or its directory cannot be written
 */
export const writeRecordTable = async (
  table: RecordTable,
  options: RecordTableWriteOptions,
): Promise<void> => {
  const serialized = serializeRecordTable(table, options.delimiter);
  try {
    await ensureDirectory(dirname(options.filePath));
    await fs.writeFile(options.filePath, serialized, 'utf8');
  } catch (error) {
    throw new OutputWriteError(options.filePath, error);
  }
};

export const formatCsvValue = (value: string, delimiter: string): string => {
  const needsQuoting =
    value.includes(delimiter) || value.includes('\n') || value.includes('\r') || value.includes('"');
  if (!needsQuoting) {
    return value;
  }
  const escaped = value.replace(/"/g, '""');
  return `"${escaped}"`;
};
