/**
 * Error hierarchy for FlexReport job processing
 *
 * Every failure raised while working on a job carries:
 * - A stable error code for programmatic handling
 * - The lifecycle stage that failed
 * - The job it belongs to, once known
 */

import type { JobRef, JobStage } from '../types/flexreport.js';

export interface FlexReportErrorOptions {
  stage: JobStage;
  job?: JobRef;
  cause?: unknown;
}

/**
 * Abstract base class for all FlexReport errors.
 */
export abstract class FlexReportError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;
  readonly stage: JobStage;
  job?: JobRef;

  constructor(message: string, options: FlexReportErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.stage = options.stage;
    this.job = options.job;
  }

  /**
   * Attach the job this error belongs to, keeping an already attached one
   */
  withJob(job: JobRef): this {
    if (!this.job) {
      this.job = job;
    }
    return this;
  }
}

/**
 * Network-level failure: connection refused, timeout, or a non-2xx HTTP status
 */
export class TransportError extends FlexReportError {
  readonly code = 'TRANSPORT_ERROR';
}

/**
 * The credential was rejected or no usable access token came back
 */
export class AuthenticationError extends FlexReportError {
  readonly code = 'AUTHENTICATION_FAILED';

  constructor(message: string, options: Omit<FlexReportErrorOptions, 'stage'> = {}) {
    super(message, { ...options, stage: 'authenticate' });
  }
}

/**
 * The service answered but refused the request
 */
export class RemoteRejectedError extends FlexReportError {
  readonly code = 'REMOTE_REJECTED';
}

/**
 * The response did not have the shape the client relies on
 */
export class MalformedResponseError extends FlexReportError {
  readonly code = 'MALFORMED_RESPONSE';
}

/**
 * Polling gave up before the job reached a terminal state
 */
export class TimeoutError extends FlexReportError {
  readonly code = 'POLL_TIMEOUT';
  readonly attempts: number;
  readonly elapsedMs: number;

  constructor(message: string, attempts: number, elapsedMs: number, options: Omit<FlexReportErrorOptions, 'stage'> = {}) {
    super(message, { ...options, stage: 'poll' });
    this.attempts = attempts;
    this.elapsedMs = elapsedMs;
  }
}

/**
 * The artifact could not be transferred to local storage
 */
export class DownloadError extends FlexReportError {
  readonly code = 'DOWNLOAD_FAILED';
  readonly status?: number;

  constructor(message: string, options: Omit<FlexReportErrorOptions, 'stage'> & { status?: number } = {}) {
    super(message, { ...options, stage: 'download' });
    this.status = options.status;
  }
}

/**
 * Type guard to check if an error is a FlexReportError
 */
export function isFlexReportError(error: unknown): error is FlexReportError {
  return error instanceof FlexReportError;
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * One-line description naming the failing stage and job
 */
export function describeFailure(error: FlexReportError): string {
  const subject = error.job ? ` for "${error.job.name}"` : '';
  return `${error.stage} failed${subject}: ${error.message}`;
}
