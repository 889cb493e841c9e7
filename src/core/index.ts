/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './logging.js';
export * from './timestamp.js';
export * from './extraction/index.js';
export { deriveFields, buildLogRecord } from './derivation.js';
export {
  RecordTable,
  REPORT_COLUMNS,
  formatCell,
  formatFloat,
  type ColumnKind,
  type ReportColumn,
} from './record-table.js';
