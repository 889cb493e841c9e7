/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs, type Dirent } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { FilesystemError } from '../core/errors.js';
import { logConsole } from '../core/logging.js';

export const LOG_FILE_NAME = 'isce.log';

/**
 * Walks `root` top-down, following symbolic links, and yields every file
 * named `fileName`. Within a directory its files are emitted before any
 * subdirectory is entered; both lists are sorted.
 *
 * @throws FilesystemError when `root` is missing, unreadable or not a directory
 */
export async function* locateLogFiles(
  root: string,
  fileName: string = LOG_FILE_NAME,
): AsyncGenerator<string> {
  const stat = await fs.stat(root).catch((error: unknown) => {
    throw new FilesystemError(root, 'does not exist or cannot be accessed', error);
  });
  if (!stat.isDirectory()) {
    throw new FilesystemError(root, 'is not a directory');
  }
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new FilesystemError(root, 'cannot be read', error);
  }
  const ancestors = new Set<string>([await fs.realpath(root)]);
  yield* walkEntries(root, entries, fileName, ancestors);
}

/**
 * `ancestors` holds the real paths of the directories on the current
 * descent path only; a directory reached again through a link elsewhere
 * in the tree is walked again.
 */
async function* walkDirectory(
  dir: string,
  fileName: string,
  ancestors: Set<string>,
): AsyncGenerator<string> {
  let realPath: string;
  let entries: Dirent[];
  try {
    realPath = await fs.realpath(dir);
    if (ancestors.has(realPath)) {
      logConsole('warn', 'locate', 'Link points back to an enclosing directory, skipping', [
        ['path', dir],
        ['target', realPath],
      ]);
      return;
    }
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logConsole('warn', 'locate', 'Skipping unreadable directory', [
      ['path', dir],
      ['error', error instanceof Error ? error.message : String(error)],
    ]);
    return;
  }
  ancestors.add(realPath);
  try {
    yield* walkEntries(dir, entries, fileName, ancestors);
  } finally {
    ancestors.delete(realPath);
  }
}

async function* walkEntries(
  dir: string,
  entries: Dirent[],
  fileName: string,
  ancestors: Set<string>,
): AsyncGenerator<string> {
  const directories: string[] = [];
  const files: string[] = [];
  for (const entry of entries) {
    if (await isDirectoryEntry(dir, entry)) {
      directories.push(entry.name);
    } else {
      files.push(entry.name);
    }
  }
  files.sort(compareCodePoints);
  directories.sort(compareCodePoints);
  for (const name of files) {
    if (name === fileName) {
      yield join(dir, name);
    }
  }
  for (const name of directories) {
    yield* walkDirectory(join(dir, name), fileName, ancestors);
  }
}

/** Orders names by Unicode code point rather than UTF-16 code unit. */
export const compareCodePoints = (a: string, b: string): number => {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
};

const isDirectoryEntry = async (dir: string, entry: Dirent): Promise<boolean> => {
  if (entry.isDirectory()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return (await fs.stat(join(dir, entry.name))).isDirectory();
  } catch {
    // dangling link: reported as a file
    return false;
  }
};

/** Row id for a log file: the name of the directory that holds it. */
export const recordIdFor = (filePath: string): string => basename(dirname(resolve(filePath)));

export const readLogText = async (filePath: string): Promise<string> =>
  fs.readFile(filePath, 'utf8');

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};
