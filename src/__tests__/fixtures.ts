/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';
import type { LogFields, LogLevel, ReportLogger } from '../core/logging.js';
import { parseZonedTimestamp, type ZonedTimestamp } from '../core/timestamp.js';
import type { ResolvedLogEvent } from '../core/types.js';

export const at = (text: string): ZonedTimestamp => {
  const timestamp = parseZonedTimestamp(text);
  if (!timestamp) {
    throw new Error(`bad fixture timestamp ${text}`);
  }
  return timestamp;
};

export const event = (
  timestamp: string,
  kind: string,
  peerKey: string,
  peerName = 'Unknown',
  endpoint = '198.51.100.7',
): ResolvedLogEvent => ({
  timestamp: at(timestamp),
  kind,
  peerKey,
  peerNameHint: peerName,
  peerName,
  endpoint,
});

export const logLine = (
  timestamp: string,
  eventField: string,
  peerName: string,
  peerKey: string,
  endpoint = '198.51.100.7',
): string => `${timestamp} ${eventField} PeerName='${peerName}' PeerKey=${peerKey} Endpoint=${endpoint}`;

export interface RecordedLog {
  level: LogLevel;
  label: string;
  fields: LogFields;
}

export const createRecordingLogger = (): { logger: ReportLogger; entries: RecordedLog[] } => {
  const entries: RecordedLog[] = [];
  const record =
    (level: LogLevel) =>
    (label: string, fields: LogFields = []): void => {
      entries.push({ level, label, fields });
    };
  return {
    entries,
    logger: { info: record('info'), warn: record('warn'), error: record('error') },
  };
};

export const makeTempDir = (): Promise<string> => fs.mkdtemp(join(tmpdir(), 'session-report-'));

export const writeLogFile = async (dir: string, name: string, lines: string[]): Promise<string> => {
  const filePath = join(dir, name);
  const content = `${lines.join('\n')}\n`;
  await fs.writeFile(filePath, name.endsWith('.gz') ? gzipSync(content) : content);
  return filePath;
};
