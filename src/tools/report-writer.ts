/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { formatDuration } from '../core/duration.js';
import { ReportWriteError } from '../core/errors.js';
import type { Session } from '../core/types.js';
import { ensureParentDirectory } from './files.js';

export const REPORT_HEADER = [
  'PeerName',
  'SessionStart',
  'SessionEnd',
  'Duration (HH:MM:SS)',
  'EndpointIP',
] as const;

export type ReportRow = [string, string, string, string, string];

export interface SessionReportOptions {
  filePath: string;
  delimiter?: string;
}

export const toReportRow = (session: Session): ReportRow => {
  const duration = formatDuration(session.durationSeconds);
  if (session.open || !session.end) {
    return [
      session.peerName,
      session.start.text,
      `Ongoing (as of ${session.watermark?.text ?? 'N/A'})`,
      `${duration} (up to last log)`,
      session.endpoint || 'N/A',
    ];
  }
  return [session.peerName, session.start.text, session.end.text, duration, session.endpoint || 'N/A'];
};

export const formatCsvValue = (value: string, delimiter: string): string => {
  const needsQuoting =
    value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r');
  if (!needsQuoting) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
};

export const renderSessionReport = (sessions: Session[], delimiter = ','): string => {
  const rows: string[][] = [[...REPORT_HEADER], ...sessions.map(toReportRow)];
  return rows
    .map((columns) => columns.map((value) => formatCsvValue(value, delimiter)).join(delimiter))
    .map((line) => `${line}\r\n`)
    .join('');
};

/**
 * Writes the session report as CSV. Failures surface as {@link ReportWriteError}.
 */
export const writeSessionReport = async (
  sessions: Session[],
  options: SessionReportOptions,
): Promise<void> => {
  try {
    await ensureParentDirectory(options.filePath);
    await fs.writeFile(options.filePath, renderSessionReport(sessions, options.delimiter), 'utf8');
  } catch (error) {
    throw new ReportWriteError(options.filePath, error);
  }
};
