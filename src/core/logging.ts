/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogField = [string, string | number | undefined | null];

export interface LoggingSettings {
  verbose: boolean;
}

let settings: LoggingSettings = { verbose: false };

/**
 * Replaces the logging settings and returns the previous ones so callers
 * can restore them.
 */
export const configureLogging = (next: Partial<LoggingSettings>): LoggingSettings => {
  const previous = settings;
  settings = { ...settings, ...next };
  return previous;
};

export const isVerbose = (): boolean => settings.verbose;

/**
 * Unified console logger with structured, multiline output.
 * The first line carries level, operation and message; each non-empty
 * field follows on its own line.
 */
export const logConsole = (
  level: LogLevel,
  operation: string,
  message: string,
  fields: LogField[] = [],
): void => {
  if (level === 'debug' && !settings.verbose) {
    return;
  }
  const filtered = fields.filter(
    (field): field is [string, string | number] =>
      field[1] !== undefined && field[1] !== null && field[1] !== '',
  );
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[isce-log-report] ${level.toUpperCase()} ${operation}: ${message}`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  const output = lines.join('\n');
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else if (level === 'debug') {
    console.debug(output);
  } else {
    console.log(output);
  }
};
