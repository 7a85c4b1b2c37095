/**
 * Report - Run Command
 * Execute one report, wait for it and download the CSV
 */

import {
  ArtifactDownloader,
  FlexReportClient,
  FlexReportJobRunner,
  type JobRunOutcome,
  type JobRunnerOptions,
} from '@flexreport/clients-ts';
import { describeFailure, type JobStage, type PollingConfig, type Session } from '@flexreport/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { commonArgs, resolveApiKey } from '../../utils/api-key.js';
import { CLI_NAME } from '../../utils/constants.js';
import { formatStatus } from '../../utils/display-helpers.js';
import {
  CLIError,
  CLIValidationError,
  displayTroubleshootingTips,
  handleCommandError,
  REPORT_TIPS,
} from '../../utils/error-handling.js';
import { applyDebugFlag, formatBytes, logDebug } from '../../utils/format-helpers.js';

export interface RunReportOptions {
  handle: string;
  apiKey: string;
  outDir: string;
  output?: string;
  initialDelaySeconds?: number;
  maxAttempts?: number;
  debug?: boolean;
}

export interface RunReportDeps {
  client?: FlexReportClient;
  downloader?: ArtifactDownloader;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Positional values arrive unchecked from the command line
 */
export function requireHandle(handle: string | undefined): string {
  const trimmed = handle?.trim();
  if (!trimmed) {
    throw new CLIValidationError('Report handle is required');
  }
  return trimmed;
}

export function pollingOverrides(options: Pick<RunReportOptions, 'initialDelaySeconds' | 'maxAttempts'>): Partial<PollingConfig> {
  const overrides: Partial<PollingConfig> = {};
  if (options.initialDelaySeconds !== undefined) {
    if (!Number.isFinite(options.initialDelaySeconds) || options.initialDelaySeconds < 0) {
      throw new CLIValidationError('--initial-delay must be a non-negative number of seconds');
    }
    overrides.initialDelaySeconds = options.initialDelaySeconds;
  }
  if (options.maxAttempts !== undefined) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new CLIValidationError('--max-attempts must be a positive integer');
    }
    overrides.maxAttempts = options.maxAttempts;
  }
  return overrides;
}

const STAGE_LABELS: Partial<Record<JobStage, string>> = {
  lookup: 'Looking up report',
  submit: 'Executing',
  poll: 'Waiting for',
  download: 'Downloading',
};

function reportOutcome(outcome: JobRunOutcome, spinner: ReturnType<typeof ora>, debug: boolean): void {
  switch (outcome.status) {
    case 'downloaded':
      spinner.succeed(`Saved ${chalk.cyan(outcome.file)} (${formatBytes(outcome.bytes)})`);
      return;

    case 'queued':
      spinner.warn(chalk.yellow(`"${outcome.job.name}" is still QUEUED after ${outcome.attempts} status check(s)`));
      displayTroubleshootingTips(REPORT_TIPS.queued);
      throw new CLIError(`Report "${outcome.job.name}" is queued`, 1, true);

    case 'failed': {
      const message = describeFailure(outcome.error);
      spinner.fail(chalk.red(message));
      if (debug && outcome.error.stack) {
        console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${outcome.error.stack}`));
      }
      displayTroubleshootingTips(outcome.error.code === 'POLL_TIMEOUT' ? REPORT_TIPS.timeout : REPORT_TIPS.run);
      throw new CLIError(message, 1, true, { cause: outcome.error });
    }
  }
}

/**
 * Authenticate, then drive the report through submit, poll and download
 */
export async function runReport(options: RunReportOptions, deps: RunReportDeps = {}): Promise<JobRunOutcome> {
  const debug = options.debug ?? false;
  applyDebugFlag(debug);
  const polling = pollingOverrides(options);
  const client = deps.client ?? new FlexReportClient();
  const downloader = deps.downloader ?? new ArtifactDownloader();

  logDebug(debug, `Handle: ${options.handle}, Output: ${options.output ?? options.outDir}`);

  const spinner = ora('Authenticating...').start();

  let session: Session;
  try {
    session = await client.authenticate(options.apiKey);
  } catch (error) {
    handleCommandError(error, spinner, { failMessage: 'Authentication failed', debug, tips: REPORT_TIPS.run });
  }

  const runnerOptions: JobRunnerOptions = {
    polling,
    outDir: options.outDir,
    output: options.output,
    sleep: deps.sleep,
    onStage: (stage, job) => {
      spinner.start(`${STAGE_LABELS[stage] ?? stage} ${chalk.cyan(job.name)}...`);
    },
    onWait: (delaySeconds, nextAttempt) => {
      spinner.start(`Waiting ${delaySeconds}s before status check #${nextAttempt}...`);
    },
    onPoll: (attempt, snapshot) => {
      spinner.info(`Status check #${attempt}: ${formatStatus(snapshot.status, snapshot.rawStatus)}`);
    },
  };

  const outcome = await new FlexReportJobRunner(client, downloader, runnerOptions).run(session, options.handle);
  reportOutcome(outcome, spinner, debug);
  return outcome;
}

export const runCommand = define({
  name: 'run',
  description: 'Execute a report, wait for it to complete and download the CSV',
  args: {
    handle: {
      type: 'positional',
      description: 'Report handle (e.g. crn:1234:flexreports/<uuid>)',
    },
    'out-dir': {
      type: 'string',
      description: 'Directory for <report name>.csv',
      default: '.',
    },
    output: {
      type: 'string',
      description: 'Exact output file path (overrides --out-dir)',
    },
    'initial-delay': {
      type: 'number',
      description: 'Seconds to wait before the first status check (default: 15)',
    },
    'max-attempts': {
      type: 'number',
      description: 'Maximum number of status checks (default: 5)',
    },
    ...commonArgs,
  },
  examples: `
EXAMPLES:
  # Run a report and save it as "<report name>.csv" in the current directory
  ${CLI_NAME} report run crn:1234:flexreports/0a1b2c3d

  # Save to a specific file and wait longer
  ${CLI_NAME} report run crn:1234:flexreports/0a1b2c3d --output cost.csv --max-attempts 8
  `.trim(),
  run: async (ctx) => {
    const values = ctx.values;
    const handle = requireHandle(values.handle);
    const apiKey = resolveApiKey(values['api-key']);

    await runReport({
      handle,
      apiKey,
      outDir: values['out-dir'] ?? '.',
      output: values.output,
      initialDelaySeconds: values['initial-delay'],
      maxAttempts: values['max-attempts'],
      debug: values.debug ?? false,
    });
  },
});
