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
} from './isce-log-report.js';
