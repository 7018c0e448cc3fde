/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogFields = Array<[string, string | number | undefined | null]>;

/** Sink for diagnostics emitted while a report runs. */
export interface ReportLogger {
  info(label: string, fields?: LogFields): void;
  warn(label: string, fields?: LogFields): void;
  error(label: string, fields?: LogFields): void;
}

/**
 * Renders a label and its non-empty fields as an aligned block.
 */
export const formatLogBlock = (label: string, fields: LogFields = []): string => {
  const filtered: Array<[string, string | number]> = [];
  for (const [key, value] of fields) {
    if (value !== undefined && value !== null && value !== '') {
      filtered.push([key, value]);
    }
  }
  const width = filtered.reduce((max, [key]) => Math.max(max, key.length), 0);
  const lines: string[] = [`[session-report] ${label}`];
  for (const [key, value] of filtered) {
    lines.push(`  ${key.padEnd(width)} = ${value}`);
  }
  return lines.join('\n');
};

/**
 * Unified console logger with structured, multiline output.
 * Warnings and errors go to stderr, everything else to stdout.
 */
export const logConsole = (level: LogLevel, label: string, fields: LogFields = []): void => {
  const output = formatLogBlock(label, fields);
  if (level === 'warn') {
    console.warn(output);
  } else if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
};

export const consoleReportLogger: ReportLogger = {
  info: (label, fields) => logConsole('info', label, fields),
  warn: (label, fields) => logConsole('warn', label, fields),
  error: (label, fields) => logConsole('error', label, fields),
};

/** Logger that only prints warnings and errors; used while the progress view owns stdout. */
export const quietReportLogger: ReportLogger = {
  info: () => undefined,
  warn: consoleReportLogger.warn,
  error: consoleReportLogger.error,
};
