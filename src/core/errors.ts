/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Run-level failures. Anything thrown as one of these ends the run with a non-zero status. */
export class SessionReportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ReportConfigError extends SessionReportError {}

export class NoLogSourcesError extends SessionReportError {
  constructor(
    readonly logDir: string,
    readonly logPrefix: string,
    options?: { cause?: unknown },
  ) {
    super(`No log files found or processed matching ${logPrefix}* in ${logDir}.`, options);
  }
}

export class ReportWriteError extends SessionReportError {
  constructor(
    readonly filePath: string,
    cause: unknown,
  ) {
    super(`Error writing CSV file ${filePath}: ${describeError(cause)}`, { cause });
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
