/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { PeerNameMap } from './types.js';

export interface PeerNameResolver {
  resolve(peerKey: string, nameHint: string): string;
}

/**
 * Declared names from the peer map are authoritative; the name recorded in the
 * log line is only a fallback. Resolution runs per event because the recorded
 * name can change from line to line.
 */
export const createPeerNameResolver = (peerMap: PeerNameMap): PeerNameResolver => ({
  resolve: (peerKey, nameHint) => peerMap.get(peerKey) ?? nameHint,
});
