/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import { resolveReportConfig } from '../config/report-config.js';
import { consoleReportLogger, quietReportLogger } from '../core/logging.js';
import { runSessionReport } from '../runner/index.js';
import { SessionReportApp } from '../ui/session-report-app.js';
import { USAGE, parseArgs } from './args.js';
import { runInteractiveSetup } from './interactive.js';

export const main = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  const options = parseArgs(argv);

  if (options.help) {
    console.log(USAGE);
    return;
  }

  if (options.interactive) {
    await runInteractiveSetup(options);
  }

  const config = resolveReportConfig(options);

  if (options.plain || !process.stdout.isTTY) {
    await runSessionReport(config, { logger: consoleReportLogger });
    return;
  }

  const { waitUntilExit } = render(<SessionReportApp config={config} logger={quietReportLogger} />);
  await waitUntilExit();
};
