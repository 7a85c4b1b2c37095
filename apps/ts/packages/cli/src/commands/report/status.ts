/**
 * Report - Status Command
 * One status check, no execution
 */

import { FlexReportClient } from '@flexreport/clients-ts';
import type { StatusSnapshot } from '@flexreport/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { commonArgs, resolveApiKey } from '../../utils/api-key.js';
import { CLI_NAME } from '../../utils/constants.js';
import { displayFooter, displayHeader, displayKeyValue, formatStatus } from '../../utils/display-helpers.js';
import { handleCommandError, REPORT_TIPS } from '../../utils/error-handling.js';
import { applyDebugFlag } from '../../utils/format-helpers.js';
import { requireHandle } from './run.js';

export interface ShowStatusOptions {
  handle: string;
  apiKey: string;
  debug?: boolean;
}

export async function showStatus(options: ShowStatusOptions, client = new FlexReportClient()): Promise<StatusSnapshot> {
  applyDebugFlag(options.debug ?? false);
  const spinner = ora('Checking report status...').start();

  try {
    const session = await client.authenticate(options.apiKey);
    const snapshot = await client.pollStatus(session, options.handle);
    spinner.stop();

    displayHeader(snapshot.reportName ?? options.handle);
    displayKeyValue('Handle', options.handle, 0);
    displayKeyValue('Status', formatStatus(snapshot.status, snapshot.rawStatus), 0);
    displayKeyValue('Last update', snapshot.updatedOn ?? chalk.gray('unknown'), 0);
    displayKeyValue('Download', snapshot.artifactUrl ? chalk.green('available') : chalk.gray('not available'), 0);
    displayFooter();

    return snapshot;
  } catch (error) {
    handleCommandError(error, spinner, {
      failMessage: 'Failed to read report status',
      debug: options.debug,
      tips: REPORT_TIPS.run,
    });
  }
}

export const statusCommand = define({
  name: 'status',
  description: 'Show the current status of a report without executing it',
  args: {
    handle: {
      type: 'positional',
      description: 'Report handle',
    },
    ...commonArgs,
  },
  examples: `${CLI_NAME} report status crn:1234:flexreports/0a1b2c3d`,
  run: async (ctx) => {
    const handle = requireHandle(ctx.values.handle);
    const apiKey = resolveApiKey(ctx.values['api-key']);
    await showStatus({ handle, apiKey, debug: ctx.values.debug ?? false });
  },
});
