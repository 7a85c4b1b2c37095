/**
 * Report - Create Command
 * Create FlexReports from a JSON file of definitions
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { FlexReportClient, ReportDefinitionFileSchema } from '@flexreport/clients-ts';
import {
  type FlexReportDefinition,
  type FlexReportError,
  getErrorMessage,
  type ReportSummary,
  runStage,
  type Session,
} from '@flexreport/shared';
import chalk from 'chalk';
import { define } from 'gunshi';
import ora from 'ora';
import { commonArgs, resolveApiKey } from '../../utils/api-key.js';
import { CLI_NAME, CREATED_IDS_FILE, CREATED_NAMES_FILE } from '../../utils/constants.js';
import { displayError, displayKeyValue, displayList, displaySuccess } from '../../utils/display-helpers.js';
import {
  CLIError,
  CLINotFoundError,
  CLIValidationError,
  displayTroubleshootingTips,
  handleCommandError,
  REPORT_TIPS,
} from '../../utils/error-handling.js';
import { applyDebugFlag, logDebug } from '../../utils/format-helpers.js';

const SUFFIX_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const SUFFIX_LENGTH = 6;

export interface CreateFailure {
  name: string;
  error: FlexReportError;
}

export interface CreateReportsResult {
  created: ReportSummary[];
  failed: CreateFailure[];
}

export interface CreateReportsOptions {
  file: string;
  apiKey: string;
  outDir: string;
  debug?: boolean;
}

/**
 * Random `[A-Z0-9]{6}` suffix that keeps re-created reports from clashing by name
 */
export function randomSuffix(random: () => number = Math.random): string {
  let suffix = '';
  for (let i = 0; i < SUFFIX_LENGTH; i++) {
    suffix += SUFFIX_ALPHABET.charAt(Math.floor(random() * SUFFIX_ALPHABET.length));
  }
  return suffix;
}

/**
 * Parse and validate a definitions file
 */
export function parseDefinitions(content: string, source: string): FlexReportDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CLIValidationError(`${source} is not valid JSON: ${getErrorMessage(error)}`, { cause: error });
  }

  const parsed = ReportDefinitionFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CLIValidationError(`Invalid report definitions in ${source}:\n  ${details.join('\n  ')}`, {
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export async function loadDefinitions(file: string): Promise<FlexReportDefinition[]> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    throw new CLINotFoundError(`Cannot read definitions file ${file}: ${getErrorMessage(error)}`, { cause: error });
  }
  return parseDefinitions(content, file);
}

/**
 * Create every definition in order; a failed report does not stop the rest
 */
export async function createReports(
  client: FlexReportClient,
  session: Session,
  definitions: FlexReportDefinition[],
  options: { random?: () => number; onCreated?: (report: ReportSummary) => void; onFailed?: (failure: CreateFailure) => void } = {}
): Promise<CreateReportsResult> {
  const result: CreateReportsResult = { created: [], failed: [] };

  for (const definition of definitions) {
    const name = `${definition.name} ${randomSuffix(options.random)}`;
    const outcome = await runStage('create', undefined, () => client.createReport(session, { ...definition, name }));

    if (outcome.ok) {
      result.created.push(outcome.value);
      options.onCreated?.(outcome.value);
    } else {
      const failure = { name, error: outcome.error };
      result.failed.push(failure);
      options.onFailed?.(failure);
    }
  }

  return result;
}

/**
 * Record created ids for cleanup and created names for the operator.
 * The id list is always rewritten; the name list only when something was created.
 */
export async function writeRunLists(outDir: string, created: ReportSummary[]): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const idsFile = path.join(outDir, CREATED_IDS_FILE);
  await writeFile(idsFile, created.map((report) => `${report.handle}\n`).join(''), 'utf-8');
  const written = [idsFile];

  if (created.length > 0) {
    const namesFile = path.join(outDir, CREATED_NAMES_FILE);
    await writeFile(namesFile, created.map((report) => `${report.name}\n`).join(''), 'utf-8');
    written.push(namesFile);
  }

  return written;
}

export async function createFromFile(
  options: CreateReportsOptions,
  client = new FlexReportClient()
): Promise<CreateReportsResult> {
  const debug = options.debug ?? false;
  applyDebugFlag(debug);
  const definitions = await loadDefinitions(options.file);
  logDebug(debug, `Loaded ${definitions.length} definition(s) from ${options.file}`);

  const spinner = ora('Authenticating...').start();
  let session: Session;
  try {
    session = await client.authenticate(options.apiKey);
  } catch (error) {
    handleCommandError(error, spinner, { failMessage: 'Authentication failed', debug, tips: REPORT_TIPS.create });
  }

  spinner.text = `Creating ${definitions.length} report(s)...`;
  const result = await createReports(client, session, definitions, {
    onCreated: (report) => spinner.succeed(`Created ${chalk.cyan(report.name)} (${report.handle})`),
    onFailed: (failure) => spinner.fail(`${failure.name}: ${failure.error.message}`),
  });
  spinner.stop();

  const files = await writeRunLists(options.outDir, result.created);
  for (const file of files) {
    displayKeyValue('Wrote', chalk.cyan(file), 0);
  }

  if (result.failed.length > 0) {
    displayError(`${result.failed.length} of ${definitions.length} report(s) could not be created`);
    displayList(
      result.failed.map((failure) => failure.name),
      { color: 'red', maxItems: result.failed.length }
    );
    displayTroubleshootingTips(REPORT_TIPS.create);
    throw new CLIError(`${result.failed.length} report(s) could not be created`, 1, true);
  }

  displaySuccess(`Created ${result.created.length} report(s)`);
  return result;
}

export const createCommand = define({
  name: 'create',
  description: 'Create FlexReports from a JSON file of report definitions',
  args: {
    file: {
      type: 'positional',
      description: 'JSON array of report definitions',
    },
    'out-dir': {
      type: 'string',
      description: `Directory for ${CREATED_IDS_FILE} and ${CREATED_NAMES_FILE}`,
      default: '.',
    },
    ...commonArgs,
  },
  examples: `
DEFINITION FORMAT:
  [
    {
      "name": "EC2 Cost by Account",
      "description": "Monthly EC2 cost",
      "sqlStatement": "SELECT ...",
      "dataGranularity": "MONTHLY",
      "limit": 1000,
      "timeRange": 3,
      "backlinking": false,
      "excludeCurrent": true
    }
  ]

EXAMPLES:
  ${CLI_NAME} report create good-practice-reports.json
  ${CLI_NAME} report create reports.json --out-dir ./runs
  `.trim(),
  run: async (ctx) => {
    const file = ctx.values.file?.trim();
    if (!file) {
      throw new CLIValidationError('Definitions file is required');
    }
    const apiKey = resolveApiKey(ctx.values['api-key']);

    await createFromFile({
      file,
      apiKey,
      outDir: ctx.values['out-dir'] ?? '.',
      debug: ctx.values.debug ?? false,
    });
  },
});
