/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FilesystemError } from '../../core/errors.js';
import { compareCodePoints, locateLogFiles, recordIdFor } from '../files.js';
import { writeLog } from '../../__tests__/helpers.js';

const collect = async (source: AsyncIterable<string>): Promise<string[]> => {
  const paths: string[] = [];
  for await (const path of source) {
    paths.push(path);
  }
  return paths;
};

describe('locateLogFiles', () => {
  let root: string;
  let outside: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'isce-locate-'));
    outside = mkdtempSync(join(tmpdir(), 'isce-outside-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    rmSync(outside, { recursive: true, force: true });
  });

  it('emits files before descending, with sorted directories', async () => {
    writeLog(root, ['b'], 'b');
    writeLog(root, ['a', 'nested'], 'nested');
    writeLog(root, ['a'], 'a');
    writeLog(root, [], 'top');
    writeFileSync(join(root, 'a', 'other.log'), 'ignored');
    mkdirSync(join(root, 'c'));

    expect(await collect(locateLogFiles(root))).toEqual([
      join(root, 'isce.log'),
      join(root, 'a', 'isce.log'),
      join(root, 'a', 'nested', 'isce.log'),
      join(root, 'b', 'isce.log'),
    ]);
  });

  it('sorts names by code point', async () => {
    writeLog(root, ['\u{1F600}'], 'astral');
    writeLog(root, ['\uFF01'], 'fullwidth');

    expect(await collect(locateLogFiles(root))).toEqual([
      join(root, '\uFF01', 'isce.log'),
      join(root, '\u{1F600}', 'isce.log'),
    ]);
  });

  it('only matches the exact file name', async () => {
    writeFileSync(join(root, 'isce.log.bak'), 'x');
    writeFileSync(join(root, 'ISCE.log'), 'x');

    expect(await collect(locateLogFiles(root))).toEqual([]);
  });

  it('follows directory links', async () => {
    writeLog(outside, ['run'], 'linked');
    symlinkSync(join(outside, 'run'), join(root, 'linked-run'));

    expect(await collect(locateLogFiles(root))).toEqual([join(root, 'linked-run', 'isce.log')]);
  });

  it('walks a sibling directory again through a link that aliases it', async () => {
    writeLog(root, ['B'], 'b');
    symlinkSync(join(root, 'B'), join(root, 'A'));

    expect(await collect(locateLogFiles(root))).toEqual([
      join(root, 'A', 'isce.log'),
      join(root, 'B', 'isce.log'),
    ]);
  });

  it('walks a directory nested under a linked alias as well', async () => {
    writeLog(root, ['data', 'run'], 'run');
    symlinkSync(join(root, 'data'), join(root, 'alias'));

    expect(await collect(locateLogFiles(root))).toEqual([
      join(root, 'alias', 'run', 'isce.log'),
      join(root, 'data', 'run', 'isce.log'),
    ]);
  });

  it('does not follow a link back to an enclosing directory', async () => {
    writeLog(root, ['a'], 'a');
    symlinkSync(root, join(root, 'a', 'loop'));

    expect(await collect(locateLogFiles(root))).toEqual([join(root, 'a', 'isce.log')]);
  });

  it('yields dangling links named isce.log', async () => {
    mkdirSync(join(root, 'broken'));
    symlinkSync(join(outside, 'missing.log'), join(root, 'broken', 'isce.log'));

    expect(await collect(locateLogFiles(root))).toEqual([join(root, 'broken', 'isce.log')]);
  });

  it('fails with FilesystemError for a missing root', async () => {
    await expect(collect(locateLogFiles(join(root, 'missing')))).rejects.toBeInstanceOf(
      FilesystemError,
    );
  });

  it('fails with FilesystemError when the root is a file', async () => {
    const file = writeLog(root, [], 'top');

    await expect(collect(locateLogFiles(file))).rejects.toThrow('is not a directory');
  });
});

describe('compareCodePoints', () => {
  it('places BMP characters above U+D7FF before astral ones', () => {
    expect(['\u{1F600}', '\uFF01'].sort(compareCodePoints)).toEqual(['\uFF01', '\u{1F600}']);
  });

  it('orders a prefix first', () => {
    expect(['ab', 'a', 'B'].sort(compareCodePoints)).toEqual(['B', 'a', 'ab']);
  });
});

describe('recordIdFor', () => {
  it('uses the immediate parent directory name', () => {
    expect(recordIdFor('/data/track-64/run-42/isce.log')).toBe('run-42');
  });

  it('resolves relative paths first', () => {
    expect(recordIdFor('isce.log')).toBe(basename(process.cwd()));
  });
});
