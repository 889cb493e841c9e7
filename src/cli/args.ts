/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface RunnerOptions {
  root: string;
}

export const USAGE = 'Usage: isce-log-report <root-directory>';

export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = { root: '' };

  for (const arg of argv) {
    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
    }
    if (options.root) {
      throw new Error(`Unexpected extra argument: ${arg}\n${USAGE}`);
    }
    options.root = arg;
  }

  return options;
};
