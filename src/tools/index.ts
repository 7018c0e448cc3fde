/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './files.js';
export * from './log-sources.js';
export * from './peer-map.js';
export * from './report-writer.js';
