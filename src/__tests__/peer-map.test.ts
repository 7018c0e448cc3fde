/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { createPeerNameResolver } from '../core/peer-name-resolver.js';
import { buildPeerNameMap, loadPeerNameMap } from '../tools/peer-map.js';
import { createRecordingLogger, makeTempDir } from './fixtures.js';

describe('buildPeerNameMap', () => {
  it('maps public keys to display names and skips entries without a key', () => {
    const peerMap = buildPeerNameMap({
      alice: { publicKey: 'K1', address: '10.0.0.2' },
      bob: { publicKey: 'K2' },
      printer: { address: '10.0.0.9' },
      legacy: 'K3',
    });
    expect([...peerMap.entries()]).toEqual([
      ['K1', 'alice'],
      ['K2', 'bob'],
    ]);
  });

  it('rejects a top-level array', () => {
    expect(() => buildPeerNameMap([{ publicKey: 'K1' }])).toThrow();
  });
});

describe('loadPeerNameMap', () => {
  it('loads a valid file', async () => {
    const dir = await makeTempDir();
    const mapFile = join(dir, 'peers.json');
    await fs.writeFile(mapFile, JSON.stringify({ alice: { publicKey: 'K1' } }));
    const { logger, entries } = createRecordingLogger();

    const peerMap = await loadPeerNameMap(mapFile, logger);

    expect(peerMap.get('K1')).toBe('alice');
    expect(entries.filter((entry) => entry.level === 'warn')).toEqual([]);
  });

  it('degrades to an empty map when the file is missing', async () => {
    const dir = await makeTempDir();
    const { logger, entries } = createRecordingLogger();

    const peerMap = await loadPeerNameMap(join(dir, 'missing.json'), logger);

    expect(peerMap.size).toBe(0);
    expect(entries.map((entry) => [entry.level, entry.label])).toEqual([
      ['warn', 'Peer map file not found, names might be Unknown'],
    ]);
  });

  it('degrades to an empty map when the file is not valid JSON', async () => {
    const dir = await makeTempDir();
    const mapFile = join(dir, 'peers.json');
    await fs.writeFile(mapFile, '{ "alice": ');
    const { logger, entries } = createRecordingLogger();

    const peerMap = await loadPeerNameMap(mapFile, logger);

    expect(peerMap.size).toBe(0);
    expect(entries.map((entry) => [entry.level, entry.label])).toEqual([
      ['warn', 'Could not load or parse peer map file'],
    ]);
  });
});

describe('createPeerNameResolver', () => {
  const resolver = createPeerNameResolver(new Map([['K', 'Bob']]));

  it('prefers the declared name over the recorded one', () => {
    expect(resolver.resolve('K', 'Eve')).toBe('Bob');
  });

  it('falls back to the recorded name', () => {
    expect(resolver.resolve('X', 'Eve')).toBe('Eve');
    expect(resolver.resolve('X', 'Unknown')).toBe('Unknown');
  });
});
