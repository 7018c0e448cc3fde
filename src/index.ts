/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './tools/index.js';
export * from './types/index.js';
export * from './runner/index.js';
export { resolveReportConfig, type ReportConfig, type ReportOptions } from './config/report-config.js';
export { main as runCli } from './cli/main.js';
