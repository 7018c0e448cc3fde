/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { EventKind } from './event-kind.js';
import type { ZonedTimestamp } from './timestamp.js';

export const UNKNOWN_PEER_NAME = 'Unknown';

export const ALL_PEERS = 'all';

export interface LogEvent {
  timestamp: ZonedTimestamp;
  kind: EventKind;
  qualifier?: string;
  peerKey: string;
  peerNameHint: string;
  endpoint: string;
}

export interface LogSourcePosition {
  file: string;
  line: number;
}

/** A parsed event after name resolution, as fed to session reconstruction. */
export interface ResolvedLogEvent extends LogEvent {
  peerName: string;
  source?: LogSourcePosition;
}

export type PeerNameMap = ReadonlyMap<string, string>;

export type PeerStatus = 'disconnected' | 'connected';

export interface PeerSessionState {
  status: PeerStatus;
  sessionStart?: ZonedTimestamp;
  sessionEndpoint?: string;
  resolvedName: string;
}

export interface Session {
  peerName: string;
  peerKey: string;
  start: ZonedTimestamp;
  /** Absent while the session is still open at the watermark. */
  end?: ZonedTimestamp;
  watermark?: ZonedTimestamp;
  durationSeconds: number;
  endpoint: string;
  open: boolean;
}

export interface IngestStats {
  filesFound: number;
  filesProcessed: number;
  filesFailed: number;
  linesRead: number;
  linesRejected: number;
  badTimestamps: number;
  outOfRange: number;
  filteredByPeer: number;
  eventsKept: number;
}

export const emptyIngestStats = (): IngestStats => ({
  filesFound: 0,
  filesProcessed: 0,
  filesFailed: 0,
  linesRead: 0,
  linesRejected: 0,
  badTimestamps: 0,
  outOfRange: 0,
  filteredByPeer: 0,
  eventsKept: 0,
});
