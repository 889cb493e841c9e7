#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { render } from 'ink';
import { IsceLogReportApp } from '../ui/isce-log-report-app.js';
import { parseArgs, USAGE } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));

  if (!options.root && process.stdin.isTTY) {
    await runInteractiveSetup(options);
  }

  if (!options.root) {
    throw new Error(`Missing root directory argument.\n${USAGE}`);
  }

  const { waitUntilExit } = render(<IsceLogReportApp options={{ root: options.root }} />);
  await waitUntilExit();
};

const isEntryPoint = (): boolean => {
  const invokedPath = process.argv[1];
  if (!invokedPath) {
    return false;
  }
  try {
    return realpathSync(invokedPath) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Failed to run isce log report:', error);
    process.exit(1);
  });
}
