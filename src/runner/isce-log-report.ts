/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { describeErrorKind, toError } from '../core/errors.js';
import { deriveFields, buildLogRecord } from '../core/derivation.js';
import { FieldExtractor } from '../core/extraction/index.js';
import { configureLogging, logConsole } from '../core/logging.js';
import { RecordTable } from '../core/record-table.js';
import type { FileFailure, FileOutcome } from '../core/types.js';
import {
  DEFAULT_REPORT_FILE,
  formatTable,
  locateLogFiles,
  readLogText,
  recordIdFor,
  writeRecordTable,
} from '../tools/index.js';
import type { ReportObserver } from '../types/index.js';

export interface IsceLogReportOptions {
  /** Directory tree to crawl for `isce.log` files. */
  root: string;
  /** Defaults to `isce_log.csv` in the current working directory. */
  outputPath?: string;
  /** Enables field-by-field debug tracing. */
  verbose?: boolean;
  extractor?: FieldExtractor;
  /** Receives the human-readable table before it is written. */
  print?: (text: string) => void;
  observer?: ReportObserver;
}

export interface IsceLogReportResult {
  outputPath: string;
  filesSeen: number;
  table: RecordTable;
  failures: FileFailure[];
}

/**
 * Reads, extracts and derives one log file. Never throws: every failure
 * becomes the `ok: false` variant.
 */
export async function processLogFile(
  filePath: string,
  extractor: FieldExtractor,
): Promise<FileOutcome> {
  try {
    const id = recordIdFor(filePath);
    const text = await readLogText(filePath);
    const fields = extractor.extract(text);
    const record = buildLogRecord(id, fields, deriveFields(fields));
    return { ok: true, path: filePath, record };
  } catch (error) {
    return { ok: false, path: filePath, error: toError(error) };
  }
}

/**
 * Crawls `root`, builds one row per parseable `isce.log`, prints the table
 * and writes it out. Files that fail are logged and left out.
 *
 * @throws FilesystemError when the root cannot be walked
 * @throws OutputWriteError when the report cannot be written
 */
export async function runIsceLogReport(
  options: IsceLogReportOptions,
): Promise<IsceLogReportResult> {
  const outputPath = options.outputPath ?? resolve(process.cwd(), DEFAULT_REPORT_FILE);
  const extractor = options.extractor ?? new FieldExtractor();
  const print = options.print ?? ((text: string) => console.log(text));
  const observer = options.observer;
  const previousLogging = configureLogging({ verbose: options.verbose ?? false });

  try {
    const table = new RecordTable();
    const failures: FileFailure[] = [];
    let filesSeen = 0;

    for await (const filePath of locateLogFiles(options.root)) {
      observer?.onFile?.({ path: filePath, index: filesSeen });
      filesSeen += 1;
      logConsole('debug', 'crawl', `Parsing ${filePath}`);

      const outcome = await processLogFile(filePath, extractor);
      if (!outcome.ok) {
        logConsole('error', 'parse', `Got error parsing ${outcome.path}`, [
          ['kind', describeErrorKind(outcome.error)],
          ['error', outcome.error.message],
          ['stack', outcome.error.stack],
        ]);
        failures.push(outcome);
        observer?.onSkip?.(outcome);
        continue;
      }

      const replaced = table.upsert(outcome.record);
      if (replaced) {
        logConsole('warn', 'aggregate', `Duplicate id "${outcome.record.id}", keeping the later row`, [
          ['path', outcome.path],
        ]);
      }
      observer?.onRecord?.({ record: outcome.record, replaced });
    }

    print(formatTable(table));
    await writeRecordTable(table, { filePath: outputPath });

    logConsole('info', 'report', 'Report written', [
      ['output', outputPath],
      ['files', filesSeen],
      ['rows', table.size],
      ['skipped', failures.length],
    ]);
    observer?.onComplete?.({
      filesSeen,
      recordsWritten: table.size,
      skipped: failures.length,
      outputPath,
    });

    return { outputPath, filesSeen, table, failures };
  } finally {
    configureLogging(previousLogging);
  }
}
