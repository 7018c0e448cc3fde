/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { NoLogSourcesError } from '../core/errors.js';
import { createPeerNameResolver } from '../core/peer-name-resolver.js';
import { buildEventStream, type EventStreamOptions } from '../runner/event-stream-builder.js';
import { listLogSources } from '../tools/log-sources.js';
import { createRecordingLogger, logLine, makeTempDir, writeLogFile } from './fixtures.js';

const PREFIX = 'wireguard-connections.log';

const optionsFor = (
  logDir: string,
  overrides: Partial<EventStreamOptions> = {},
): EventStreamOptions => ({
  logDir,
  logPrefix: PREFIX,
  startDate: '2024-05-01',
  endDate: '2024-05-02',
  peer: 'all',
  resolver: createPeerNameResolver(new Map([['K1', 'alice']])),
  logger: createRecordingLogger().logger,
  ...overrides,
});

const writeRotatedLogs = async (dir: string): Promise<void> => {
  await writeLogFile(dir, PREFIX, [
    logLine('2024-05-02T09:00:00+08:00', 'DISCONNECT (Timeout)', 'Unknown', 'K1'),
    'not a connection log line',
    logLine('2024-05-02T08:00:00+08:00', 'RECONNECT/UPDATE', 'Unknown', 'K2', '203.0.113.9'),
  ]);
  await writeLogFile(dir, `${PREFIX}.1.gz`, [
    logLine('2024-05-01T22:00:00+08:00', 'CONNECT', 'Unknown', 'K1'),
    logLine('2024-04-30T23:59:59+08:00', 'CONNECT', 'Eve', 'K2', '203.0.113.9'),
    logLine('2024-02-30T10:00:00+08:00', 'CONNECT', 'Eve', 'K2', '203.0.113.9'),
  ]);
  await writeLogFile(dir, 'syslog', [logLine('2024-05-01T12:00:00+08:00', 'CONNECT', 'Mallory', 'K7')]);
};

describe('listLogSources', () => {
  it('lists prefixed files newest rotation first', async () => {
    const dir = await makeTempDir();
    await writeRotatedLogs(dir);
    await writeLogFile(dir, `${PREFIX}.2.gz`, []);

    expect(await listLogSources(dir, PREFIX)).toEqual([
      join(dir, `${PREFIX}.2.gz`),
      join(dir, `${PREFIX}.1.gz`),
      join(dir, PREFIX),
    ]);
  });

  it('returns nothing for a missing directory', async () => {
    const dir = await makeTempDir();
    expect(await listLogSources(join(dir, 'absent'), PREFIX)).toEqual([]);
  });
});

describe('buildEventStream', () => {
  it('merges plain and gzip sources into one time-ordered stream', async () => {
    const dir = await makeTempDir();
    await writeRotatedLogs(dir);
    const { logger, entries } = createRecordingLogger();

    const { events, stats } = await buildEventStream(optionsFor(dir, { logger }));

    expect(events.map((e) => [e.timestamp.text, e.kind, e.peerKey, e.peerName])).toEqual([
      ['2024-05-01T22:00:00+08:00', 'CONNECT', 'K1', 'alice'],
      ['2024-05-02T08:00:00+08:00', 'RECONNECT/UPDATE', 'K2', 'Unknown'],
      ['2024-05-02T09:00:00+08:00', 'DISCONNECT', 'K1', 'alice'],
    ]);
    expect(events[0].source).toEqual({ file: `${PREFIX}.1.gz`, line: 1 });
    expect(stats).toEqual({
      filesFound: 2,
      filesProcessed: 2,
      filesFailed: 0,
      linesRead: 6,
      linesRejected: 2,
      badTimestamps: 1,
      outOfRange: 1,
      filteredByPeer: 0,
      eventsKept: 3,
    });
    expect(entries.filter((entry) => entry.level === 'warn').map((entry) => entry.label)).toEqual([
      'Skipping line due to timestamp parse error',
    ]);
  });

  it('filters on the resolved peer name', async () => {
    const dir = await makeTempDir();
    await writeRotatedLogs(dir);

    const { events, stats } = await buildEventStream(optionsFor(dir, { peer: 'alice' }));

    expect(events.map((e) => e.peerKey)).toEqual(['K1', 'K1']);
    expect(stats.filteredByPeer).toBe(1);
  });

  it('includes the last second of the end date and excludes the next day', async () => {
    const dir = await makeTempDir();
    await writeLogFile(dir, PREFIX, [
      logLine('2024-05-02T23:59:59+08:00', 'CONNECT', 'alice', 'K1'),
      logLine('2024-05-03T00:00:00+08:00', 'DISCONNECT', 'alice', 'K1'),
      logLine('2024-05-03T01:00:00+09:00', 'DISCONNECT', 'alice', 'K1'),
    ]);

    const { events } = await buildEventStream(optionsFor(dir));

    expect(events.map((e) => e.timestamp.text)).toEqual(['2024-05-02T23:59:59+08:00']);
  });

  it('keeps encounter order for equal timestamps', async () => {
    const dir = await makeTempDir();
    await writeLogFile(dir, PREFIX, [
      logLine('2024-05-01T10:00:00+08:00', 'CONNECT', 'b', 'K2'),
      logLine('2024-05-01T10:00:00+08:00', 'CONNECT', 'a', 'K3'),
      logLine('2024-05-01T02:00:00+00:00', 'DISCONNECT', 'b', 'K2'),
    ]);

    const { events } = await buildEventStream(optionsFor(dir));

    expect(events.map((e) => [e.peerKey, e.kind])).toEqual([
      ['K2', 'CONNECT'],
      ['K3', 'CONNECT'],
      ['K2', 'DISCONNECT'],
    ]);
  });

  it('skips a corrupt compressed file and keeps the others', async () => {
    const dir = await makeTempDir();
    await writeRotatedLogs(dir);
    await fs.writeFile(join(dir, `${PREFIX}.2.gz`), 'this is not gzip data');
    const { logger, entries } = createRecordingLogger();
    const onFileError = vi.fn();

    const { events, stats } = await buildEventStream(optionsFor(dir, { logger, observer: { onFileError } }));

    expect(events).toHaveLength(3);
    expect(stats.filesFound).toBe(3);
    expect(stats.filesProcessed).toBe(2);
    expect(stats.filesFailed).toBe(1);
    expect(onFileError).toHaveBeenCalledTimes(1);
    expect(onFileError.mock.calls[0][0].file).toBe(join(dir, `${PREFIX}.2.gz`));
    expect(entries.some((entry) => entry.level === 'warn' && entry.label === 'Could not process file')).toBe(true);
  });

  it('returns an empty stream when nothing matches the filters', async () => {
    const dir = await makeTempDir();
    await writeRotatedLogs(dir);

    const { events, stats } = await buildEventStream(optionsFor(dir, { peer: 'nobody' }));

    expect(events).toEqual([]);
    expect(stats.filesProcessed).toBe(2);
  });

  it('fails when no source file exists', async () => {
    const dir = await makeTempDir();
    await writeLogFile(dir, 'syslog', ['unrelated']);

    await expect(buildEventStream(optionsFor(dir))).rejects.toBeInstanceOf(NoLogSourcesError);
  });

  it('fails when every source file is unreadable', async () => {
    const dir = await makeTempDir();
    await fs.writeFile(join(dir, `${PREFIX}.1.gz`), 'garbage');

    await expect(buildEventStream(optionsFor(dir))).rejects.toBeInstanceOf(NoLogSourcesError);
  });
});
