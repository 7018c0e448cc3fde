/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  runSessionReport,
  NO_EVENTS_NOTICE,
  NO_SESSIONS_NOTICE,
  type SessionReportDeps,
  type SessionReportResult,
} from './session-report.js';

export {
  buildEventStream,
  type EventStream,
  type EventStreamOptions,
} from './event-stream-builder.js';
