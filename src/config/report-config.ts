/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ReportConfigError } from '../core/errors.js';
import { addCalendarDays, isCalendarDate, localCalendarDate } from '../core/timestamp.js';
import { ALL_PEERS } from '../core/types.js';

export const DEFAULT_MAP_FILE = '/root/script/ipaddr-map.json';
export const DEFAULT_LOG_DIR = '/var/log';
export const DEFAULT_LOG_PREFIX = 'wireguard-connections.log';
export const DEFAULT_DAYS = 3;

export interface ReportOptions {
  peer?: string;
  startDate?: string;
  endDate?: string;
  days?: number;
  output?: string;
  mapFile?: string;
  logDir?: string;
  logPrefix?: string;
}

export interface ReportConfig {
  peer: string;
  startDate: string;
  endDate: string;
  output: string;
  mapFile: string;
  logDir: string;
  logPrefix: string;
}

export type ReportEnv = Record<string, string | undefined>;

const parseDate = (value: string, flag: string): string => {
  const trimmed = value.trim();
  if (!isCalendarDate(trimmed)) {
    throw new ReportConfigError(`Invalid ${flag} "${value}": expected YYYY-MM-DD.`);
  }
  return trimmed;
};

const resolveDays = (options: ReportOptions, env: ReportEnv): number => {
  const raw = options.days ?? (env['SESSION_REPORT_DAYS'] ? Number(env['SESSION_REPORT_DAYS']) : DEFAULT_DAYS);
  if (!Number.isInteger(raw) || raw < 1) {
    throw new ReportConfigError(`Invalid --days value "${raw}": expected a positive integer.`);
  }
  return raw;
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

/**
 * Resolves CLI options against environment defaults and built-in defaults.
 * The end date defaults to `today`; the start date to `days` days ending on
 * the end date. Throws {@link ReportConfigError} before any I/O happens.
 */
export function resolveReportConfig(
  options: ReportOptions,
  env: ReportEnv = process.env,
  today: Date = new Date(),
): ReportConfig {
  const output = nonEmpty(options.output);
  if (!output) {
    throw new ReportConfigError('Missing --output <path> argument.');
  }

  const days = resolveDays(options, env);
  const endDate = options.endDate ? parseDate(options.endDate, '--end-date') : localCalendarDate(today);
  const startDate = options.startDate
    ? parseDate(options.startDate, '--start-date')
    : addCalendarDays(endDate, -(days - 1));

  if (startDate > endDate) {
    throw new ReportConfigError(`Start date (${startDate}) cannot be after end date (${endDate}).`);
  }

  return {
    peer: nonEmpty(options.peer) ?? ALL_PEERS,
    startDate,
    endDate,
    output,
    mapFile: nonEmpty(options.mapFile) ?? nonEmpty(env['SESSION_REPORT_MAP_FILE']) ?? DEFAULT_MAP_FILE,
    logDir: nonEmpty(options.logDir) ?? nonEmpty(env['SESSION_REPORT_LOG_DIR']) ?? DEFAULT_LOG_DIR,
    logPrefix:
      nonEmpty(options.logPrefix) ?? nonEmpty(env['SESSION_REPORT_LOG_PREFIX']) ?? DEFAULT_LOG_PREFIX,
  };
}
