/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { basename } from 'node:path';
import type { ReportConfig } from '../config/report-config.js';
import { describeError } from '../core/errors.js';
import type { ReportLogger } from '../core/logging.js';
import type { IngestStats } from '../core/types.js';
import { runSessionReport, type SessionReportResult } from '../runner/index.js';
import type { ReportObserver } from '../types/observer.js';

interface Progress {
  currentFile: number;
  totalFiles: number;
  failedFiles: number;
  events: number;
}

interface AppState {
  progress: Progress;
  lastEvent: string;
  stats?: IngestStats;
}

const initialState: AppState = {
  progress: { currentFile: 0, totalFiles: 0, failedFiles: 0, events: 0 },
  lastEvent: 'Initializing...',
};

export interface SessionReportAppProps {
  config: ReportConfig;
  logger: ReportLogger;
}

export const SessionReportApp: React.FC<SessionReportAppProps> = ({ config, logger }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<SessionReportResult | undefined>();
  const [error, setError] = useState<Error | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: ReportObserver = {
      onStage: (event) => {
        if (cancelled) return;
        setState((prev) => ({ ...prev, lastEvent: `[${event.stage}] ${event.message}` }));
      },

      onFileStart: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, currentFile: info.index, totalFiles: info.total },
          lastEvent: `Processing ${basename(info.file)}...`,
        }));
      },

      onFileDone: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, events: prev.progress.events + info.events },
          lastEvent: `Read ${info.lines} line(s) from ${basename(info.file)}`,
        }));
      },

      onFileError: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, failedFiles: prev.progress.failedFiles + 1 },
          lastEvent: `[skipped] ${basename(info.file)}: ${info.reason}`,
        }));
      },

      onIngestStats: (stats) => {
        if (cancelled) return;
        setState((prev) => ({ ...prev, stats }));
      },
    };

    runSessionReport(config, { logger, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err : new Error(describeError(err)));
      });

    return () => {
      cancelled = true;
    };
  }, [config, logger]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          SESSION REPORT
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>User: </Text>
          <Text color="white">{config.peer}</Text>
          <Text dimColor> | Range: </Text>
          <Text color="cyan">
            {config.startDate} .. {config.endDate}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Files: </Text>
          <Text>
            {state.progress.currentFile}/{state.progress.totalFiles || '?'}
          </Text>
          <Text dimColor> | Skipped: </Text>
          <Text color="red">{state.progress.failedFiles}</Text>
          <Text dimColor> | Events: </Text>
          <Text color="greenBright">{state.progress.events}</Text>
        </Box>
        {state.stats && (
          <Box>
            <Text dimColor>Lines: </Text>
            <Text>{state.stats.linesRead}</Text>
            <Text dimColor> | Rejected: </Text>
            <Text color="yellow">{state.stats.linesRejected}</Text>
            <Text dimColor> | Out of range: </Text>
            <Text>{state.stats.outOfRange}</Text>
          </Box>
        )}
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
            Sessions: {result.sessions.length} | Closed {result.closedSessions} | Ongoing {result.openSessions}
          </Text>
          {result.watermark && <Text dimColor>Last log entry: {result.watermark.text}</Text>}
          {result.notice && <Text color="yellow">{result.notice}</Text>}
          {result.reportPath && <Text dimColor>Report: {result.reportPath}</Text>}
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error.message}</Text>
        </Box>
      )}
    </Box>
  );
};
