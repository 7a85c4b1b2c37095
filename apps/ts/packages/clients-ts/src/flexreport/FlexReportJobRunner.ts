/**
 * Drives one report end to end: lookup, submit, poll, download.
 *
 * Every stage returns a tagged result; the runner turns the first failure into
 * a `failed` outcome instead of throwing, so batch callers can carry on.
 */

import * as path from 'node:path';
import {
  AuthenticationError,
  type FlexReportError,
  getConfig,
  type JobRef,
  type JobStage,
  MalformedResponseError,
  type PollingConfig,
  RemoteRejectedError,
  runStage,
  type Session,
  type StageResult,
  sanitizeFilename,
} from '@flexreport/shared';
import type { ArtifactDownloader } from '../artifact/ArtifactDownloader.js';
import type { FlexReportClient } from './FlexReportClient.js';
import { type PollHooks, pollUntilTerminal } from './job-poller.js';

export type JobRunOutcome =
  | { status: 'downloaded'; job: JobRef; file: string; bytes: number; attempts: number }
  | { status: 'queued'; job: JobRef; attempts: number }
  | { status: 'failed'; job: JobRef; stage: JobStage; error: FlexReportError };

export interface JobRunnerOptions extends PollHooks {
  polling?: Partial<PollingConfig>;
  /** Directory for `<report name>.csv` when no explicit output file is given */
  outDir?: string;
  output?: string;
  /** Called when a stage starts */
  onStage?: (stage: JobStage, job: JobRef) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function reportFileName(reportName: string): string {
  return `${sanitizeFilename(reportName)}.csv`;
}

function failed(job: JobRef, error: FlexReportError): JobRunOutcome {
  return { status: 'failed', job, stage: error.stage, error };
}

export class FlexReportJobRunner {
  constructor(
    private readonly client: FlexReportClient,
    private readonly downloader: ArtifactDownloader,
    private readonly options: JobRunnerOptions = {}
  ) {}

  async run(session: Session, handle: string): Promise<JobRunOutcome> {
    const { onStage } = this.options;
    const unnamed: JobRef = { name: handle, handle };

    onStage?.('lookup', unnamed);
    const lookup = await runStage('lookup', unnamed, () => this.client.describeReport(session, handle));
    if (!lookup.ok) return failed(unnamed, lookup.error);
    const job: JobRef = { name: lookup.value.name, handle };

    onStage?.('submit', job);
    const submitted = await runStage('submit', job, () => this.client.submitJob(session, handle));
    if (!submitted.ok) return failed(job, submitted.error);

    onStage?.('poll', job);
    const polled = await runStage('poll', job, () =>
      pollUntilTerminal(() => this.client.pollStatus(session, handle), {
        ...getConfig().polling,
        ...this.options.polling,
        onPoll: this.options.onPoll,
        onWait: this.options.onWait,
        sleep: this.options.sleep,
        now: this.options.now,
      })
    );
    if (!polled.ok) return failed(job, polled.error);

    const { state, snapshot, attempts } = polled.value;
    if (state === 'queued') {
      return { status: 'queued', job, attempts };
    }
    if (state === 'failed') {
      return failed(job, new RemoteRejectedError('Report execution failed', { stage: 'poll', job }));
    }
    if (!snapshot.artifactUrl) {
      return failed(job, new MalformedResponseError('Failed to retrieve download URL', { stage: 'poll', job }));
    }

    const artifactUrl = snapshot.artifactUrl;
    const destination = this.options.output ?? path.join(this.options.outDir ?? '.', reportFileName(job.name));

    onStage?.('download', job);
    const downloaded = await runStage('download', job, () => this.downloader.fetchArtifact(artifactUrl, destination));
    if (!downloaded.ok) return failed(job, downloaded.error);

    return { status: 'downloaded', job, file: downloaded.value.path, bytes: downloaded.value.bytes, attempts };
  }
}

export interface TriggerHooks {
  onJobStart?: (job: JobRef) => void;
  onJobDone?: (job: JobRef, result: StageResult<true>) => void;
}

export interface TriggerResult {
  job: JobRef;
  result: StageResult<true>;
}

/**
 * Trigger a list of reports in order without waiting for them.
 * A rejected job is recorded and the batch moves on; an invalid session stops it.
 */
export async function triggerJobs(
  client: FlexReportClient,
  session: Session,
  jobs: JobRef[],
  hooks: TriggerHooks = {}
): Promise<TriggerResult[]> {
  const results: TriggerResult[] = [];

  for (const job of jobs) {
    hooks.onJobStart?.(job);
    const result = await runStage('submit', job, () => client.submitJob(session, job.handle));
    hooks.onJobDone?.(job, result);
    results.push({ job, result });

    if (!result.ok && result.error instanceof AuthenticationError) {
      break;
    }
  }

  return results;
}
