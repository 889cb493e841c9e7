/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { IsceLogReportOptions, IsceLogReportResult } from '../runner/index.js';
import { runIsceLogReport } from '../runner/index.js';
import type { ReportObserver } from '../types/index.js';

interface Stats {
  files: number;
  parsed: number;
  skipped: number;
  duplicates: number;
}

interface AppState {
  stats: Stats;
  lastEvent: string;
}

const initialState: AppState = {
  stats: { files: 0, parsed: 0, skipped: 0, duplicates: 0 },
  lastEvent: 'Initializing...',
};

export interface IsceLogReportAppProps {
  options: IsceLogReportOptions;
}

export const IsceLogReportApp: React.FC<IsceLogReportAppProps> = ({ options }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<IsceLogReportResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: ReportObserver = {
      onFile: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          stats: { ...prev.stats, files: info.index + 1 },
          lastEvent: `Parsing ${info.path}`,
        }));
      },

      onRecord: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          stats: {
            ...prev.stats,
            parsed: prev.stats.parsed + 1,
            duplicates: prev.stats.duplicates + (info.replaced ? 1 : 0),
          },
          lastEvent: `Row ${info.record.id}`,
        }));
      },

      onSkip: (failure) => {
        if (cancelled) return;
        setState((prev) => ({
          stats: { ...prev.stats, skipped: prev.stats.skipped + 1 },
          lastEvent: `[skipped] ${failure.path}: ${failure.error.message}`,
        }));
      },
    };

    runIsceLogReport({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          ISCE LOG REPORT
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Root: </Text>
          <Text color="white">{options.root}</Text>
        </Box>
        <Box>
          <Text dimColor>Files: </Text>
          <Text>{state.stats.files}</Text>
          <Text dimColor> | Parsed: </Text>
          <Text color="greenBright">{state.stats.parsed}</Text>
          <Text dimColor> | Skipped: </Text>
          <Text color="red">{state.stats.skipped}</Text>
          <Text dimColor> | Duplicate ids: </Text>
          <Text color="yellow">{state.stats.duplicates}</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Processed {result.filesSeen} files | Rows {result.table.size} | Skipped {result.failures.length}
          </Text>
          <Text dimColor>Report: {result.outputPath}</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};
