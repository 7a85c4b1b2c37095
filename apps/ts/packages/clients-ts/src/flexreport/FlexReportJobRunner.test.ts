import {
  AuthenticationError,
  DownloadError,
  RemoteRejectedError,
  type Session,
  type StatusSnapshot,
  TransportError,
} from '@flexreport/shared';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ArtifactDownloader } from '../artifact/ArtifactDownloader.js';
import { FlexReportClient } from './FlexReportClient.js';
import { FlexReportJobRunner, reportFileName, triggerJobs } from './FlexReportJobRunner.js';

const session: Session = { accessToken: 'test-token', issuedAt: new Date('2024-01-01T00:00:00Z') };
const HANDLE = 'crn:1:flexreport/abc';

const completed: StatusSnapshot = {
  status: 'COMPLETED',
  rawStatus: 'COMPLETED',
  artifactUrl: 'https://files.example.test/report.csv?sig=1',
};

describe('reportFileName', () => {
  it('sanitizes the report name and adds .csv', () => {
    expect(reportFileName('AWS Cost / Daily')).toBe('AWS_Cost___Daily.csv');
  });
});

describe('FlexReportJobRunner', () => {
  let client: FlexReportClient;
  let downloader: ArtifactDownloader;
  const noSleep = async () => {};

  beforeEach(() => {
    client = new FlexReportClient({ graphqlUrl: 'https://graph.example.test/graphql' });
    downloader = new ArtifactDownloader({ timeoutMs: 1000 });
    vi.spyOn(client, 'describeReport').mockResolvedValue({ handle: HANDLE, name: 'Daily Cost' });
    vi.spyOn(client, 'submitJob').mockResolvedValue(true);
  });

  it('runs lookup, submit, poll and download in order', async () => {
    vi.spyOn(client, 'pollStatus').mockResolvedValue(completed);
    const fetchArtifact = vi
      .spyOn(downloader, 'fetchArtifact')
      .mockResolvedValue({ path: 'reports/Daily_Cost.csv', bytes: 42 });
    const stages: string[] = [];

    const runner = new FlexReportJobRunner(client, downloader, {
      outDir: 'reports',
      sleep: noSleep,
      onStage: (stage) => stages.push(stage),
    });
    const outcome = await runner.run(session, HANDLE);

    expect(outcome).toEqual({
      status: 'downloaded',
      job: { name: 'Daily Cost', handle: HANDLE },
      file: 'reports/Daily_Cost.csv',
      bytes: 42,
      attempts: 1,
    });
    expect(stages).toEqual(['lookup', 'submit', 'poll', 'download']);
    expect(fetchArtifact).toHaveBeenCalledWith(completed.artifactUrl, 'reports/Daily_Cost.csv');
  });

  it('writes to an explicit output path when one is given', async () => {
    vi.spyOn(client, 'pollStatus').mockResolvedValue(completed);
    const fetchArtifact = vi.spyOn(downloader, 'fetchArtifact').mockResolvedValue({ path: 'out.csv', bytes: 1 });

    const runner = new FlexReportJobRunner(client, downloader, { output: 'out.csv', sleep: noSleep });
    await runner.run(session, HANDLE);

    expect(fetchArtifact).toHaveBeenCalledWith(completed.artifactUrl, 'out.csv');
  });

  it('stops at lookup and labels the failure with the handle', async () => {
    vi.spyOn(client, 'describeReport').mockRejectedValue(new TransportError('HTTP 502: Bad Gateway', { stage: 'lookup' }));
    const submit = vi.spyOn(client, 'submitJob');

    const outcome = await new FlexReportJobRunner(client, downloader, { sleep: noSleep }).run(session, HANDLE);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'lookup', job: { name: HANDLE, handle: HANDLE } });
    expect(submit).not.toHaveBeenCalled();
  });

  it('returns queued without downloading', async () => {
    vi.spyOn(client, 'pollStatus').mockResolvedValue({ status: 'QUEUED', rawStatus: 'QUEUED' });
    const fetchArtifact = vi.spyOn(downloader, 'fetchArtifact');

    const outcome = await new FlexReportJobRunner(client, downloader, { sleep: noSleep }).run(session, HANDLE);

    expect(outcome).toEqual({ status: 'queued', job: { name: 'Daily Cost', handle: HANDLE }, attempts: 1 });
    expect(fetchArtifact).not.toHaveBeenCalled();
  });

  it('turns a FAILED report into a rejected poll stage', async () => {
    vi.spyOn(client, 'pollStatus').mockResolvedValue({ status: 'FAILED', rawStatus: 'FAILED' });

    const outcome = await new FlexReportJobRunner(client, downloader, { sleep: noSleep }).run(session, HANDLE);

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.stage).toBe('poll');
      expect(outcome.error).toBeInstanceOf(RemoteRejectedError);
      expect(outcome.error.message).toBe('Report execution failed');
    }
  });

  it('fails when a completed report has no download URL', async () => {
    vi.spyOn(client, 'pollStatus').mockResolvedValue({ status: 'COMPLETED', rawStatus: 'COMPLETED' });

    const outcome = await new FlexReportJobRunner(client, downloader, { sleep: noSleep }).run(session, HANDLE);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'poll' });
  });

  it('times out after the configured number of checks', async () => {
    const poll = vi.spyOn(client, 'pollStatus').mockResolvedValue({ status: 'RUNNING', rawStatus: 'RUNNING' });

    const outcome = await new FlexReportJobRunner(client, downloader, {
      sleep: noSleep,
      polling: { maxAttempts: 2 },
    }).run(session, HANDLE);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'poll', error: { code: 'POLL_TIMEOUT' } });
    expect(poll).toHaveBeenCalledTimes(2);
  });

  it('reports download failures with the job attached', async () => {
    vi.spyOn(client, 'pollStatus').mockResolvedValue(completed);
    vi.spyOn(downloader, 'fetchArtifact').mockRejectedValue(new DownloadError('Download failed with HTTP 403 Forbidden'));

    const outcome = await new FlexReportJobRunner(client, downloader, { sleep: noSleep }).run(session, HANDLE);

    expect(outcome).toMatchObject({
      status: 'failed',
      stage: 'download',
      error: { job: { name: 'Daily Cost', handle: HANDLE } },
    });
  });
});

describe('triggerJobs', () => {
  const jobs = [
    { name: 'First', handle: 'h-1' },
    { name: 'Second', handle: 'h-2' },
    { name: 'Third', handle: 'h-3' },
  ];

  it('carries on past a rejected job', async () => {
    const client = new FlexReportClient({ graphqlUrl: 'https://graph.example.test/graphql' });
    vi.spyOn(client, 'submitJob')
      .mockResolvedValueOnce(true)
      .mockRejectedValueOnce(new RemoteRejectedError('No such report', { stage: 'submit' }))
      .mockResolvedValueOnce(true);

    const results = await triggerJobs(client, session, jobs);

    expect(results.map(({ result }) => result.ok)).toEqual([true, false, true]);
    const rejected = results[1]?.result;
    expect(rejected?.ok === false && rejected.error.job).toEqual({ name: 'Second', handle: 'h-2' });
  });

  it('stops the batch when the session is rejected', async () => {
    const client = new FlexReportClient({ graphqlUrl: 'https://graph.example.test/graphql' });
    const submit = vi
      .spyOn(client, 'submitJob')
      .mockRejectedValueOnce(new AuthenticationError('Session is not valid; authenticate first'));
    const onJobDone = vi.fn();

    const results = await triggerJobs(client, session, jobs, { onJobDone });

    expect(results).toHaveLength(1);
    expect(submit).toHaveBeenCalledTimes(1);
    expect(onJobDone).toHaveBeenCalledTimes(1);
  });
});
