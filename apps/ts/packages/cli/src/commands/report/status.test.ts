import { FlexReportClient } from '@flexreport/clients-ts';
import { MalformedResponseError, type Session } from '@flexreport/shared';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { CLIError } from '../../utils/error-handling.js';
import { showStatus } from './status.js';

const session: Session = { accessToken: 'test-token', issuedAt: new Date('2024-01-01T00:00:00Z') };

describe('showStatus', () => {
  let client: FlexReportClient;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    client = new FlexReportClient({ graphqlUrl: 'https://graph.example.test/graphql' });
    vi.spyOn(client, 'authenticate').mockResolvedValue(session);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the report status without executing it', async () => {
    const submit = vi.spyOn(client, 'submitJob');
    vi.spyOn(client, 'pollStatus').mockResolvedValue({
      status: 'RUNNING',
      rawStatus: 'RUNNING',
      reportName: 'Daily Cost',
      updatedOn: '2024-01-02T03:04:05Z',
    });

    const snapshot = await showStatus({ handle: 'h-1', apiKey: 'test-key' }, client);

    expect(snapshot.status).toBe('RUNNING');
    expect(submit).not.toHaveBeenCalled();
    const lines = logSpy.mock.calls.map((call) => String(call[0] ?? ''));
    expect(lines.some((line) => line.includes('Daily Cost'))).toBe(true);
    expect(lines.some((line) => line.includes('Last update: 2024-01-02T03:04:05Z'))).toBe(true);
  });

  it('wraps failures in a silent CLIError', async () => {
    vi.spyOn(client, 'pollStatus').mockRejectedValue(
      new MalformedResponseError('Failed to retrieve report status', { stage: 'poll' })
    );

    const error = await showStatus({ handle: 'h-1', apiKey: 'test-key' }, client).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CLIError);
    expect(error).toMatchObject({ message: 'poll failed: Failed to retrieve report status', silent: true });
  });
});
