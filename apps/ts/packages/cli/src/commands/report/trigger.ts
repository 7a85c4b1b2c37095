/**
 * Report - Trigger Command
 * Fire-and-forget execution of every report in a job list
 */

import { FlexReportClient, type TriggerResult, triggerJobs } from '@flexreport/clients-ts';
import {
  describeFailure,
  type JobListIssue,
  type JobRef,
  type ParsedJobList,
  readJobList,
  type Session,
} from '@flexreport/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { commonArgs, resolveApiKey } from '../../utils/api-key.js';
import { CLI_NAME, DEFAULT_JOB_LIST_FILE } from '../../utils/constants.js';
import { displayError, displayList, displayWarning } from '../../utils/display-helpers.js';
import {
  CLIError,
  CLINotFoundError,
  CLIValidationError,
  displayTroubleshootingTips,
  handleCommandError,
  REPORT_TIPS,
} from '../../utils/error-handling.js';
import { applyDebugFlag, logDebug } from '../../utils/format-helpers.js';

export interface TriggerReportsOptions {
  listFile: string;
  apiKey: string;
  quiet?: boolean;
  debug?: boolean;
}

export interface TriggerSummary {
  triggered: JobRef[];
  failed: JobRef[];
  /** Jobs never attempted because the batch stopped early */
  skipped: JobRef[];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function formatIssue(issue: JobListIssue): string {
  return `Line ${issue.line}: ${issue.reason} (${issue.content})`;
}

export function summarizeTrigger(jobs: JobRef[], results: TriggerResult[]): TriggerSummary {
  return {
    triggered: results.filter(({ result }) => result.ok).map(({ job }) => job),
    failed: results.filter(({ result }) => !result.ok).map(({ job }) => job),
    skipped: jobs.slice(results.length),
  };
}

async function loadJobs(listFile: string): Promise<JobRef[]> {
  let parsed: ParsedJobList;
  try {
    parsed = await readJobList(listFile);
  } catch (error) {
    if (isMissingFile(error)) {
      throw new CLINotFoundError(`Job list not found: ${listFile}`, { cause: error });
    }
    throw error;
  }

  for (const issue of parsed.issues) {
    displayWarning(`Skipping ${formatIssue(issue)}`);
  }
  if (parsed.jobs.length === 0) {
    throw new CLIValidationError(`No jobs found in ${listFile}`);
  }
  return parsed.jobs;
}

export async function triggerReports(
  options: TriggerReportsOptions,
  client = new FlexReportClient()
): Promise<TriggerSummary> {
  const quiet = options.quiet ?? false;
  const debug = options.debug ?? false;
  applyDebugFlag(debug);
  const jobs = await loadJobs(options.listFile);
  logDebug(debug, `Loaded ${jobs.length} job(s) from ${options.listFile}`);

  const spinner = ora('Authenticating...').start();
  let session: Session;
  try {
    session = await client.authenticate(options.apiKey);
    spinner.stop();
  } catch (error) {
    handleCommandError(error, spinner, { failMessage: 'Authentication failed', debug, tips: REPORT_TIPS.trigger });
  }

  const results = await triggerJobs(client, session, jobs, {
    onJobStart: (job) => {
      if (!quiet) console.log(`${job.name} is executing`);
    },
    onJobDone: (job, result) => {
      if (result.ok) {
        if (!quiet) console.log(chalk.green(`> Executed ${job.name}`));
        return;
      }
      displayError(describeFailure(result.error));
    },
  });

  const summary = summarizeTrigger(jobs, results);
  const unfinished = [...summary.failed, ...summary.skipped];
  if (unfinished.length > 0) {
    console.error(chalk.red(`\n${unfinished.length} of ${jobs.length} job(s) were not executed:`));
    displayList(
      unfinished.map((job) => `${job.name} (${job.handle})`),
      { color: 'red', maxItems: unfinished.length }
    );
    displayTroubleshootingTips(REPORT_TIPS.trigger);
    throw new CLIError(`${unfinished.length} of ${jobs.length} job(s) were not executed`, 1, true);
  }

  return summary;
}

export const triggerCommand = define({
  name: 'trigger',
  description: 'Trigger every report in a job list without waiting for completion',
  args: {
    list: {
      type: 'positional',
      description: `Job list file with one "Name,handle" per line (default: ${DEFAULT_JOB_LIST_FILE})`,
    },
    quiet: {
      type: 'boolean',
      description: 'Only print failures',
    },
    ...commonArgs,
  },
  examples: `
EXAMPLES:
  # Trigger the reports listed in ./${DEFAULT_JOB_LIST_FILE}
  ${CLI_NAME} report trigger

  # Use another list and keep the output quiet
  ${CLI_NAME} report trigger weekly-list.txt --quiet
  `.trim(),
  run: async (ctx) => {
    const apiKey = resolveApiKey(ctx.values['api-key']);
    await triggerReports({
      listFile: ctx.values.list?.trim() || DEFAULT_JOB_LIST_FILE,
      apiKey,
      quiet: ctx.values.quiet ?? false,
      debug: ctx.values.debug ?? false,
    });
  },
});
