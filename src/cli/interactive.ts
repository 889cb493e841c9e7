/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import prompts from 'prompts';
import type { RunnerOptions } from './args.js';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    {
      type: 'text',
      name: 'root',
      message: 'Directory to crawl for isce.log files',
      initial: options.root || process.cwd(),
      validate: (value: string) =>
        value.trim().length > 0 ? true : 'A root directory is required',
    },
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  const root: unknown = responses.root;
  if (typeof root === 'string' && root.trim()) {
    options.root = root.trim();
  }
}
