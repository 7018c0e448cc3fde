/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './errors.js';
export * from './event-kind.js';
export * from './timestamp.js';
export * from './duration.js';
export * from './logging.js';
export { parseLogLine, formatLogLine, type LineParseResult } from './line-parser.js';
export { createPeerNameResolver, type PeerNameResolver } from './peer-name-resolver.js';
export { reconstructSessions, type ReconstructionResult } from './session-reconstructor.js';
