/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import {
  DEFAULT_DAYS,
  DEFAULT_LOG_DIR,
  DEFAULT_LOG_PREFIX,
  DEFAULT_MAP_FILE,
} from '../config/report-config.js';
import { isCalendarDate } from '../core/timestamp.js';
import { ALL_PEERS } from '../core/types.js';
import type { RunnerOptions } from './args.js';

const validateOptionalDate = (value: string): boolean | string =>
  value.trim() === '' || isCalendarDate(value.trim()) || 'Use YYYY-MM-DD or leave empty';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'peer',
        message: "Peer name to report on ('all' for every peer)",
        initial: options.peer ?? ALL_PEERS,
      },
      {
        type: 'text',
        name: 'startDate',
        message: 'Start date (YYYY-MM-DD, empty for --days before the end date)',
        initial: options.startDate ?? '',
        validate: validateOptionalDate,
      },
      {
        type: 'text',
        name: 'endDate',
        message: 'End date (YYYY-MM-DD, empty for today)',
        initial: options.endDate ?? '',
        validate: validateOptionalDate,
      },
      {
        type: 'number',
        name: 'days',
        message: 'Days to cover when no start date is given',
        initial: options.days ?? DEFAULT_DAYS,
        min: 1,
      },
      {
        type: 'text',
        name: 'logDir',
        message: 'Directory containing the connection logs',
        initial: options.logDir ?? DEFAULT_LOG_DIR,
      },
      {
        type: 'text',
        name: 'logPrefix',
        message: 'Log file name prefix',
        initial: options.logPrefix ?? DEFAULT_LOG_PREFIX,
      },
      {
        type: 'text',
        name: 'mapFile',
        message: 'Peer map JSON file',
        initial: options.mapFile ?? DEFAULT_MAP_FILE,
      },
      {
        type: 'text',
        name: 'output',
        message: 'Path for the output CSV file',
        initial: options.output ?? '',
        validate: (value: string) => value.trim().length > 0 || 'An output path is required',
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.peer === 'string' && responses.peer.trim()) {
    options.peer = responses.peer.trim();
  }
  if (typeof responses.startDate === 'string' && responses.startDate.trim()) {
    options.startDate = responses.startDate.trim();
  }
  if (typeof responses.endDate === 'string' && responses.endDate.trim()) {
    options.endDate = responses.endDate.trim();
  }
  if (typeof responses.days === 'number' && !Number.isNaN(responses.days)) {
    options.days = responses.days;
  }
  if (typeof responses.logDir === 'string' && responses.logDir.trim()) {
    options.logDir = responses.logDir.trim();
  }
  if (typeof responses.logPrefix === 'string' && responses.logPrefix.trim()) {
    options.logPrefix = responses.logPrefix.trim();
  }
  if (typeof responses.mapFile === 'string' && responses.mapFile.trim()) {
    options.mapFile = responses.mapFile.trim();
  }
  if (typeof responses.output === 'string' && responses.output.trim()) {
    options.output = resolve(responses.output.trim());
  }
}
