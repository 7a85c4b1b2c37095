/**
 * Error Handling Utilities
 * Common error handling patterns for CLI commands
 */

import { describeFailure, isFlexReportError } from '@flexreport/shared';
import chalk from 'chalk';
import type ora from 'ora';

/**
 * Base error class for CLI operations
 * Provides structured error handling with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly silent: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CLIError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class CLIValidationError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, false, options);
    this.name = 'CLIValidationError';
  }
}

/**
 * Error thrown when a required resource is not found
 */
export class CLINotFoundError extends CLIError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 1, false, options);
    this.name = 'CLINotFoundError';
  }
}

const DEFAULT_TROUBLESHOOTING_TIPS = [
  'Check that CLOUDHEALTH_API_KEY (or --api-key) holds a valid API key',
  'Try with --debug flag for more information',
];

/**
 * Display troubleshooting tips
 */
export function displayTroubleshootingTips(tips: string[]): void {
  console.error(chalk.gray('\n💡 Troubleshooting tips:'));
  for (const tip of tips) {
    console.error(chalk.gray(`   • ${tip}`));
  }
}

/**
 * Message for any failure, naming the stage and job for FlexReport errors
 */
export function formatErrorMessage(error: unknown): string {
  if (isFlexReportError(error)) {
    return describeFailure(error);
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle command error with consistent formatting
 */
export function handleCommandError(
  error: unknown,
  spinner: ReturnType<typeof ora>,
  options: {
    failMessage: string;
    debug?: boolean;
    tips?: string[];
  }
): never {
  // Re-throw CLIError directly to preserve original exitCode/silent flags
  if (error instanceof CLIError) {
    spinner.stop();
    throw error;
  }

  spinner.fail(options.failMessage);

  const errorMessage = formatErrorMessage(error);
  console.error(chalk.red(`\nError: ${errorMessage}`));

  if (options.debug && error instanceof Error && error.stack) {
    console.error(chalk.gray(`\n[DEBUG] Stack trace:\n${error.stack}`));
  }

  displayTroubleshootingTips(options.tips ?? DEFAULT_TROUBLESHOOTING_TIPS);

  throw new CLIError(errorMessage, 1, true, { cause: error });
}

export const REPORT_TIPS = {
  run: [
    'Verify the report handle with: flexreport report status <handle>',
    'Check that CLOUDHEALTH_API_KEY (or --api-key) holds a valid API key',
    'Try with --debug flag for more information',
  ],
  queued: [
    'The report is still queued on the service side; rerun later',
    'Check for other executions of the same report',
  ],
  timeout: [
    'Use --max-attempts or --initial-delay to wait longer',
    'Large reports can take several minutes; rerun the command later',
  ],
  trigger: [
    'Check the handles in the job list file',
    'Try with --debug flag for more information',
  ],
  create: [
    'Validate the definitions file: every entry needs name, sqlStatement and dataGranularity',
    'Try with --debug flag for more information',
  ],
};

export const PERSPECTIVE_TIPS = {
  list: [
    'Check that CLOUDHEALTH_API_KEY (or --api-key) holds a valid API key',
    'Set CLOUDHEALTH_REST_URL when your tenant uses a regional endpoint',
    'Try with --debug flag for more information',
  ],
};
