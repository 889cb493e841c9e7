/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runIsceLogReport,
  processLogFile,
  type IsceLogReportOptions,
  type IsceLogReportResult,
} from './runner/index.js';
export * from './core/index.js';
export {
  locateLogFiles,
  recordIdFor,
  serializeRecordTable,
  writeRecordTable,
  formatTable,
  DEFAULT_REPORT_FILE,
  LOG_FILE_NAME,
} from './tools/index.js';
export type { ReportObserver, ReportProgressSummary } from './types/index.js';
export { main as runCli } from './cli/main.js';
