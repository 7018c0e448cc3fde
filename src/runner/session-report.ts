/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ReportConfig } from '../config/report-config.js';
import { consoleReportLogger, type ReportLogger } from '../core/logging.js';
import { createPeerNameResolver } from '../core/peer-name-resolver.js';
import { reconstructSessions } from '../core/session-reconstructor.js';
import type { ZonedTimestamp } from '../core/timestamp.js';
import type { IngestStats, Session } from '../core/types.js';
import { loadPeerNameMap } from '../tools/peer-map.js';
import { writeSessionReport } from '../tools/report-writer.js';
import type { ReportObserver } from '../types/observer.js';
import { buildEventStream } from './event-stream-builder.js';

export const NO_EVENTS_NOTICE = 'No relevant log entries found for the specified user and date range.';
export const NO_SESSIONS_NOTICE = 'No sessions to write to CSV.';

export interface SessionReportDeps {
  logger?: ReportLogger;
  observer?: ReportObserver;
}

export interface SessionReportResult {
  sessions: Session[];
  closedSessions: number;
  openSessions: number;
  watermark?: ZonedTimestamp;
  stats: IngestStats;
  /** Set only when a CSV file was written. */
  reportPath?: string;
  notice?: string;
}

/**
 * Runs the whole report: peer map, event stream, session reconstruction and
 * CSV output. An empty result is not an error; it ends with a notice and no
 * report file.
 */
export async function runSessionReport(
  config: ReportConfig,
  deps: SessionReportDeps = {},
): Promise<SessionReportResult> {
  const logger = deps.logger ?? consoleReportLogger;
  const observer = deps.observer;

  observer?.onStage?.({ stage: 'peer-map', message: `Loading peer map ${config.mapFile}` });
  const peerMap = await loadPeerNameMap(config.mapFile, logger);

  const { events, stats } = await buildEventStream({
    logDir: config.logDir,
    logPrefix: config.logPrefix,
    startDate: config.startDate,
    endDate: config.endDate,
    peer: config.peer,
    resolver: createPeerNameResolver(peerMap),
    logger,
    observer,
  });

  if (events.length === 0) {
    logger.info(NO_EVENTS_NOTICE, [
      ['user', config.peer],
      ['range', `${config.startDate} .. ${config.endDate}`],
    ]);
    observer?.onStage?.({ stage: 'done', message: NO_EVENTS_NOTICE });
    return { sessions: [], closedSessions: 0, openSessions: 0, stats, notice: NO_EVENTS_NOTICE };
  }

  observer?.onStage?.({ stage: 'reconstruct', message: `Calculating sessions from ${events.length} entries` });
  const { sessions, watermark } = reconstructSessions(events);
  const openSessions = sessions.filter((session) => session.open).length;
  const summary = {
    sessions,
    closedSessions: sessions.length - openSessions,
    openSessions,
    watermark,
    stats,
  };
  logger.info('Calculated sessions', [
    ['sessions', sessions.length],
    ['ongoing', openSessions],
    ['last log', watermark?.text],
  ]);

  if (sessions.length === 0) {
    logger.info(NO_SESSIONS_NOTICE);
    observer?.onStage?.({ stage: 'done', message: NO_SESSIONS_NOTICE });
    return { ...summary, notice: NO_SESSIONS_NOTICE };
  }

  observer?.onStage?.({ stage: 'write', message: `Writing report to ${config.output}` });
  await writeSessionReport(sessions, { filePath: config.output });
  logger.info('CSV report generated', [['file', config.output]]);
  observer?.onStage?.({ stage: 'done', message: `Report written to ${config.output}` });

  return { ...summary, reportPath: config.output };
}
