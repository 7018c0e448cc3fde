/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Progress callbacks for a report run, used by the terminal view.
 */

import type { IngestStats } from '../core/types.js';

export type ReportStage = 'peer-map' | 'scan' | 'read' | 'sort' | 'reconstruct' | 'write' | 'done';

export interface StageEvent {
  stage: ReportStage;
  message: string;
  data?: Record<string, unknown>;
}

export interface ReportObserver {
  onStage?(event: StageEvent): void;
  onFileStart?(info: { file: string; index: number; total: number }): void;
  onFileDone?(info: { file: string; lines: number; events: number }): void;
  onFileError?(info: { file: string; reason: string }): void;
  onIngestStats?(stats: IngestStats): void;
}
