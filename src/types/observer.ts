/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Progress callbacks for a report run.
 * All hooks are optional and called synchronously, in processing order.
 */

import type { FileFailure, LogRecord } from '../core/types.js';

export interface ReportProgressSummary {
  filesSeen: number;
  recordsWritten: number;
  skipped: number;
  outputPath: string;
}

export interface ReportObserver {
  onFile?(info: { path: string; index: number }): void;
  onRecord?(info: { record: LogRecord; replaced: boolean }): void;
  onSkip?(failure: FileFailure): void;
  onComplete?(summary: ReportProgressSummary): void;
}
