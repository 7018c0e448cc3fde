/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Primary event classifiers written by the connection logger. The qualifier in
 * `DISCONNECT (Timeout)` or `UPDATE (IP Change)` is not part of the kind.
 * Unrecognized tokens pass through unchanged.
 */
export type EventKind =
  | 'CONNECT'
  | 'RECONNECT/UPDATE'
  | 'UPDATE'
  | 'DISCONNECT'
  | (string & Record<never, never>);

const CONNECT_KINDS: ReadonlySet<string> = new Set(['CONNECT', 'RECONNECT/UPDATE']);

export const isConnectKind = (kind: EventKind): boolean => CONNECT_KINDS.has(kind);

export const isDisconnectKind = (kind: EventKind): boolean => kind.startsWith('DISCONNECT');

/** First whitespace-delimited token of an event field. */
export const primaryClassifier = (eventField: string): EventKind =>
  eventField.trim().split(/\s+/, 1)[0] ?? '';
