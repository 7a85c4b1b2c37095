/**
 * Tagged stage outcomes
 *
 * Each stage of a job returns a StageResult instead of exiting the process,
 * so callers decide whether to stop, skip the job, or carry on.
 */

import { FlexReportError, TransportError, getErrorMessage } from '../errors/index.js';
import type { JobRef, JobStage } from '../types/flexreport.js';

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: FlexReportError };

export function succeed<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: FlexReportError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Normalize anything thrown during a stage into a FlexReportError tied to the job
 */
export function toStageError(error: unknown, stage: JobStage, job?: JobRef): FlexReportError {
  if (error instanceof FlexReportError) {
    return job ? error.withJob(job) : error;
  }
  return new TransportError(getErrorMessage(error), { stage, job, cause: error });
}

/**
 * Run one stage and capture its failure as a tagged result
 */
export async function runStage<T>(stage: JobStage, job: JobRef | undefined, fn: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return succeed(await fn());
  } catch (error) {
    return fail(toStageError(error, stage, job));
  }
}
