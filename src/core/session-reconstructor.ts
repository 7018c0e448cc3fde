/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isConnectKind, isDisconnectKind } from './event-kind.js';
import { diffSeconds, type ZonedTimestamp } from './timestamp.js';
import {
  UNKNOWN_PEER_NAME,
  type PeerSessionState,
  type ResolvedLogEvent,
  type Session,
} from './types.js';

export interface ReconstructionResult {
  /** Closed sessions in closing order, followed by sessions still open at the watermark. */
  sessions: Session[];
  peers: Map<string, PeerSessionState>;
  /** Timestamp of the last event in the stream; undefined for an empty stream. */
  watermark?: ZonedTimestamp;
}

const createPeerState = (): PeerSessionState => ({
  status: 'disconnected',
  resolvedName: UNKNOWN_PEER_NAME,
});

/** Never lets a known name fall back to the unknown placeholder. */
const adoptName = (state: PeerSessionState, name: string): void => {
  if (name !== UNKNOWN_PEER_NAME) {
    state.resolvedName = name;
  }
};

const stateFor = (peers: Map<string, PeerSessionState>, peerKey: string): PeerSessionState => {
  let state = peers.get(peerKey);
  if (!state) {
    state = createPeerState();
    peers.set(peerKey, state);
  }
  return state;
};

const applyEvent = (
  state: PeerSessionState,
  event: ResolvedLogEvent,
  sessions: Session[],
): void => {
  adoptName(state, event.peerName);

  if (isConnectKind(event.kind)) {
    if (state.status === 'disconnected') {
      state.status = 'connected';
      state.sessionStart = event.timestamp;
      state.sessionEndpoint = event.endpoint;
    }
    return;
  }

  if (isDisconnectKind(event.kind) && state.status === 'connected') {
    const start = state.sessionStart ?? event.timestamp;
    sessions.push({
      peerName: state.resolvedName,
      peerKey: event.peerKey,
      start,
      end: event.timestamp,
      durationSeconds: Math.max(0, diffSeconds(start, event.timestamp)),
      endpoint: state.sessionEndpoint ?? event.endpoint,
      open: false,
    });
    state.status = 'disconnected';
    state.sessionStart = undefined;
    state.sessionEndpoint = undefined;
  }
};

/**
 * Turns a timestamp-ordered event stream into sessions, one state machine per
 * peer key. Peers still connected after the last event get an open session
 * bounded by the stream-wide watermark, not by their own last event.
 *
 * `peers` is owned by the caller; a fresh map is used when omitted.
 */
export function reconstructSessions(
  events: readonly ResolvedLogEvent[],
  peers: Map<string, PeerSessionState> = new Map(),
): ReconstructionResult {
  const sessions: Session[] = [];

  for (const event of events) {
    applyEvent(stateFor(peers, event.peerKey), event, sessions);
  }

  const watermark = events.length > 0 ? events[events.length - 1].timestamp : undefined;
  if (!watermark) {
    return { sessions, peers };
  }

  for (const [peerKey, state] of peers) {
    if (state.status !== 'connected' || !state.sessionStart) {
      continue;
    }
    sessions.push({
      peerName: state.resolvedName,
      peerKey,
      start: state.sessionStart,
      watermark,
      durationSeconds: Math.max(0, diffSeconds(state.sessionStart, watermark)),
      endpoint: state.sessionEndpoint ?? '',
      open: true,
    });
  }

  return { sessions, peers, watermark };
}
