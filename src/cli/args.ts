/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import type { ReportOptions } from '../config/report-config.js';

export interface RunnerOptions extends ReportOptions {
  interactive?: boolean;
  plain?: boolean;
  help?: boolean;
}

export const USAGE = `Usage: session-report -o <report.csv> [options]

Options:
  -u, --user <name>        Peer name to report on, or 'all' (default: all)
  -s, --start-date <date>  Start date, YYYY-MM-DD (default: --days before end date)
  -e, --end-date <date>    End date, YYYY-MM-DD (default: today)
  -o, --output <path>      Path for the output CSV file (required)
      --map-file <path>    JSON peer map used to resolve names
      --log-dir <dir>      Directory containing log files (default: /var/log)
      --log-prefix <name>  Prefix of the log files (default: wireguard-connections.log)
      --days <n>           Days covered when no start date is given (default: 3)
      --interactive        Prompt for the options
      --plain              Print progress as plain log lines
  -h, --help               Show this help`;

const takeValue = (argv: string[], index: number, flag: string): string => {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}.`);
  }
  return value;
};

export const parseArgs = (argv: string[]): RunnerOptions => {
  const options: RunnerOptions = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--user':
      case '-u':
        options.peer = takeValue(argv, ++i, arg);
        break;
      case '--start-date':
      case '-s':
        options.startDate = takeValue(argv, ++i, arg);
        break;
      case '--end-date':
      case '-e':
        options.endDate = takeValue(argv, ++i, arg);
        break;
      case '--output':
      case '-o':
        options.output = resolve(takeValue(argv, ++i, arg));
        break;
      case '--map-file':
        options.mapFile = takeValue(argv, ++i, arg);
        break;
      case '--log-dir':
        options.logDir = takeValue(argv, ++i, arg);
        break;
      case '--log-prefix':
        options.logPrefix = takeValue(argv, ++i, arg);
        break;
      case '--days':
        options.days = Number(takeValue(argv, ++i, arg));
        break;
      case '--interactive':
        options.interactive = true;
        break;
      case '--plain':
        options.plain = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
};
