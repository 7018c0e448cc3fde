/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { basename } from 'node:path';
import { NoLogSourcesError, describeError } from '../core/errors.js';
import { parseLogLine } from '../core/line-parser.js';
import type { ReportLogger } from '../core/logging.js';
import type { PeerNameResolver } from '../core/peer-name-resolver.js';
import { calendarDateOf } from '../core/timestamp.js';
import {
  ALL_PEERS,
  emptyIngestStats,
  type IngestStats,
  type ResolvedLogEvent,
} from '../core/types.js';
import { listLogSources, readLogSourceLines } from '../tools/log-sources.js';
import type { ReportObserver } from '../types/observer.js';

export interface EventStreamOptions {
  logDir: string;
  logPrefix: string;
  /** Inclusive `YYYY-MM-DD` bounds, compared against each event's own calendar date. */
  startDate: string;
  endDate: string;
  /** Resolved peer name to keep, or `all`. */
  peer: string;
  resolver: PeerNameResolver;
  logger: ReportLogger;
  observer?: ReportObserver;
}

export interface EventStream {
  events: ResolvedLogEvent[];
  stats: IngestStats;
}

interface FileScan {
  events: ResolvedLogEvent[];
  lines: number;
}

const byTimestamp = (a: ResolvedLogEvent, b: ResolvedLogEvent): number =>
  a.timestamp.epochMs - b.timestamp.epochMs;

async function scanLogSource(
  filePath: string,
  options: EventStreamOptions,
  stats: IngestStats,
): Promise<FileScan> {
  const file = basename(filePath);
  const events: ResolvedLogEvent[] = [];
  let lineNumber = 0;

  for await (const line of readLogSourceLines(filePath)) {
    lineNumber += 1;
    stats.linesRead += 1;

    const parsed = parseLogLine(line);
    if (!parsed.ok) {
      stats.linesRejected += 1;
      if (parsed.reason === 'bad-timestamp') {
        stats.badTimestamps += 1;
        options.logger.warn('Skipping line due to timestamp parse error', [
          ['file', file],
          ['line', lineNumber],
          ['timestamp', parsed.timestamp],
        ]);
      }
      continue;
    }

    const { event } = parsed;
    const date = calendarDateOf(event.timestamp);
    if (date < options.startDate || date > options.endDate) {
      stats.outOfRange += 1;
      continue;
    }

    const peerName = options.resolver.resolve(event.peerKey, event.peerNameHint);
    if (options.peer !== ALL_PEERS && peerName !== options.peer) {
      stats.filteredByPeer += 1;
      continue;
    }

    events.push({ ...event, peerName, source: { file, line: lineNumber } });
  }

  return { events, lines: lineNumber };
}

/**
 * Reads every log source matching the prefix, keeps the events inside the date
 * range and peer selection, and returns them in timestamp order. Sources are
 * drained one at a time; a source that fails is skipped with a warning and
 * contributes nothing. Throws {@link NoLogSourcesError} when no source could be
 * processed at all.
 */
export async function buildEventStream(options: EventStreamOptions): Promise<EventStream> {
  const { logger, observer } = options;
  const stats = emptyIngestStats();

  let sources: string[] = [];
  try {
    sources = await listLogSources(options.logDir, options.logPrefix);
  } catch (error) {
    logger.warn('Could not list log directory', [
      ['dir', options.logDir],
      ['reason', describeError(error)],
    ]);
  }
  stats.filesFound = sources.length;
  observer?.onStage?.({
    stage: 'scan',
    message: `Found ${sources.length} log file(s) matching ${options.logPrefix}*`,
    data: { logDir: options.logDir },
  });
  logger.info('Scanning log files', [
    ['dir', options.logDir],
    ['prefix', `${options.logPrefix}*`],
    ['files', sources.length],
  ]);

  const events: ResolvedLogEvent[] = [];
  for (const [index, filePath] of sources.entries()) {
    observer?.onFileStart?.({ file: filePath, index: index + 1, total: sources.length });
    try {
      const scan = await scanLogSource(filePath, options, stats);
      events.push(...scan.events);
      stats.filesProcessed += 1;
      observer?.onFileDone?.({ file: filePath, lines: scan.lines, events: scan.events.length });
    } catch (error) {
      stats.filesFailed += 1;
      const reason = describeError(error);
      logger.warn('Could not process file', [
        ['file', filePath],
        ['reason', reason],
      ]);
      observer?.onFileError?.({ file: filePath, reason });
    }
  }

  if (stats.filesProcessed === 0) {
    throw new NoLogSourcesError(options.logDir, options.logPrefix);
  }

  observer?.onStage?.({ stage: 'sort', message: `Sorting ${events.length} log entries` });
  events.sort(byTimestamp);
  stats.eventsKept = events.length;
  observer?.onIngestStats?.(stats);

  return { events, stats };
}
