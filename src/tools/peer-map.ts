/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { describeError } from '../core/errors.js';
import type { ReportLogger } from '../core/logging.js';
import type { PeerNameMap } from '../core/types.js';
import { fileExists, readJsonFile } from './files.js';

/**
 * Peer map file: top-level keys are display names, each value describes a
 * peer and carries at least its public key.
 *
 *   { "alice-laptop": { "publicKey": "...", "address": "10.0.0.2" } }
 */
export const PeerMapFileSchema = z.record(z.string(), z.unknown());

export const PeerMapEntrySchema = z
  .object({
    publicKey: z.string().min(1),
  })
  .passthrough();

export type PeerMapEntry = z.infer<typeof PeerMapEntrySchema>;

/** Builds the public key to display name lookup. Entries without a public key are ignored. */
export function buildPeerNameMap(data: unknown): Map<string, string> {
  const file = PeerMapFileSchema.parse(data);
  const peerMap = new Map<string, string>();
  for (const [name, details] of Object.entries(file)) {
    const entry = PeerMapEntrySchema.safeParse(details);
    if (entry.success) {
      peerMap.set(entry.data.publicKey, name);
    }
  }
  return peerMap;
}

/**
 * Loads the peer map; a missing or unreadable file degrades to an empty map
 * with a warning.
 */
export async function loadPeerNameMap(
  mapFile: string,
  logger: ReportLogger,
): Promise<PeerNameMap> {
  if (!(await fileExists(mapFile))) {
    logger.warn('Peer map file not found, names might be Unknown', [['file', mapFile]]);
    return new Map();
  }
  try {
    const peerMap = buildPeerNameMap(await readJsonFile(mapFile));
    logger.info('Loaded peer map', [
      ['file', mapFile],
      ['peers', peerMap.size],
    ]);
    return peerMap;
  } catch (error) {
    logger.warn('Could not load or parse peer map file', [
      ['file', mapFile],
      ['reason', describeError(error)],
    ]);
    return new Map();
  }
}
