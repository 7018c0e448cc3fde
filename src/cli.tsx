#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './cli/main.js';
import { SessionReportError } from './core/errors.js';
import { logConsole } from './core/logging.js';

main().catch((error: unknown) => {
  if (error instanceof SessionReportError) {
    logConsole('error', error.message);
  } else {
    console.error('[session-report] Failed to run session report:', error);
  }
  process.exit(1);
});
