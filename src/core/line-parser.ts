/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { primaryClassifier } from './event-kind.js';
import { TIMESTAMP_SHAPE, parseZonedTimestamp } from './timestamp.js';
import type { LogEvent } from './types.js';

/*
 * Grammar, fields separated by whitespace runs:
 *
 *   <timestamp> <kind>[ (<qualifier>)] PeerName='<name>' PeerKey=<key> Endpoint=<endpoint> [ignored...]
 */

export type LineParseResult =
  | { ok: true; event: LogEvent }
  | { ok: false; reason: 'no-match' }
  | { ok: false; reason: 'bad-timestamp'; timestamp: string };

const NO_MATCH: LineParseResult = { ok: false, reason: 'no-match' };

const isWhitespace = (char: string | undefined): boolean =>
  char !== undefined && /\s/.test(char);

/** Cursor over a single line. */
class LineScanner {
  private position = 0;

  constructor(private readonly text: string) {}

  get offset(): number {
    return this.position;
  }

  rewind(offset: number): void {
    this.position = offset;
  }

  /** Consumes a whitespace run; false when there was none. */
  skipWhitespace(): boolean {
    const start = this.position;
    while (isWhitespace(this.text[this.position])) {
      this.position += 1;
    }
    return this.position > start;
  }

  /** Reads a run of non-whitespace characters. */
  readWord(): string | undefined {
    const start = this.position;
    while (this.position < this.text.length && !isWhitespace(this.text[this.position])) {
      this.position += 1;
    }
    return this.position > start ? this.text.slice(start, this.position) : undefined;
  }

  consumeLiteral(literal: string): boolean {
    if (!this.text.startsWith(literal, this.position)) {
      return false;
    }
    this.position += literal.length;
    return true;
  }

  /** Reads up to (not including) `terminator` and consumes the terminator. */
  readUntil(terminator: string): string | undefined {
    const end = this.text.indexOf(terminator, this.position);
    if (end < 0) {
      return undefined;
    }
    const value = this.text.slice(this.position, end);
    this.position = end + terminator.length;
    return value;
  }
}

const readQualifier = (scanner: LineScanner): string | undefined => {
  const checkpoint = scanner.offset;
  if (scanner.skipWhitespace() && scanner.consumeLiteral('(')) {
    const qualifier = scanner.readUntil(')');
    if (qualifier !== undefined && qualifier.length > 0) {
      return qualifier;
    }
  }
  scanner.rewind(checkpoint);
  return undefined;
};

const readField = (scanner: LineScanner, key: string): string | undefined => {
  if (!scanner.skipWhitespace() || !scanner.consumeLiteral(`${key}=`)) {
    return undefined;
  }
  return scanner.readWord();
};

/**
 * Parses one connection log line into a {@link LogEvent}.
 * Shape mismatches and impossible timestamps are reported, never thrown.
 */
export function parseLogLine(line: string): LineParseResult {
  const scanner = new LineScanner(line.replace(/[\r\n]+$/, ''));

  const timestampText = scanner.readWord();
  if (!timestampText || !TIMESTAMP_SHAPE.test(timestampText)) {
    return NO_MATCH;
  }
  if (!scanner.skipWhitespace()) {
    return NO_MATCH;
  }
  const eventToken = scanner.readWord();
  if (!eventToken) {
    return NO_MATCH;
  }
  const qualifier = readQualifier(scanner);

  if (!scanner.skipWhitespace() || !scanner.consumeLiteral("PeerName='")) {
    return NO_MATCH;
  }
  const peerNameHint = scanner.readUntil("'");
  if (peerNameHint === undefined) {
    return NO_MATCH;
  }
  const peerKey = readField(scanner, 'PeerKey');
  if (!peerKey) {
    return NO_MATCH;
  }
  const endpoint = readField(scanner, 'Endpoint');
  if (!endpoint) {
    return NO_MATCH;
  }

  const timestamp = parseZonedTimestamp(timestampText);
  if (!timestamp) {
    return { ok: false, reason: 'bad-timestamp', timestamp: timestampText };
  }

  return {
    ok: true,
    event: {
      timestamp,
      kind: primaryClassifier(eventToken),
      qualifier,
      peerKey,
      peerNameHint,
      endpoint,
    },
  };
}

/** Writes an event back in the logger's line format. */
export function formatLogLine(event: LogEvent): string {
  const qualifier = event.qualifier ? ` (${event.qualifier})` : '';
  return (
    `${event.timestamp.text} ${event.kind}${qualifier} ` +
    `PeerName='${event.peerNameHint}' PeerKey=${event.peerKey} Endpoint=${event.endpoint}`
  );
}
