import { describe, expect, it } from 'vitest';
import {
  AuthenticationError,
  DownloadError,
  describeFailure,
  FlexReportError,
  getErrorMessage,
  isFlexReportError,
  MalformedResponseError,
  RemoteRejectedError,
  TimeoutError,
  TransportError,
} from '../index.js';

describe('FlexReportError hierarchy', () => {
  it('sets name, code and stage for each subclass', () => {
    const transport = new TransportError('connection refused', { stage: 'submit' });
    expect(transport.name).toBe('TransportError');
    expect(transport.code).toBe('TRANSPORT_ERROR');
    expect(transport.stage).toBe('submit');

    const auth = new AuthenticationError('bad key');
    expect(auth.name).toBe('AuthenticationError');
    expect(auth.code).toBe('AUTHENTICATION_FAILED');
    expect(auth.stage).toBe('authenticate');

    const rejected = new RemoteRejectedError('nope', { stage: 'submit' });
    expect(rejected.code).toBe('REMOTE_REJECTED');

    const malformed = new MalformedResponseError('no status', { stage: 'poll' });
    expect(malformed.code).toBe('MALFORMED_RESPONSE');

    const timeout = new TimeoutError('still running', 5, 134000);
    expect(timeout.stage).toBe('poll');
    expect(timeout.attempts).toBe(5);
    expect(timeout.elapsedMs).toBe(134000);

    const download = new DownloadError('HTTP 403', { status: 403 });
    expect(download.stage).toBe('download');
    expect(download.status).toBe(403);
  });

  it('is an instance of Error and FlexReportError', () => {
    const error = new TransportError('x', { stage: 'poll' });
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(FlexReportError);
    expect(isFlexReportError(error)).toBe(true);
    expect(isFlexReportError(new Error('plain'))).toBe(false);
  });

  it('keeps the cause when provided', () => {
    const cause = new TypeError('fetch failed');
    const error = new TransportError('network down', { stage: 'authenticate', cause });
    expect(error.cause).toBe(cause);
  });

  it('attaches a job only once', () => {
    const first = { name: 'Daily Cost', handle: 'crn:1:flexreports/a' };
    const second = { name: 'Other', handle: 'crn:1:flexreports/b' };
    const error = new RemoteRejectedError('rejected', { stage: 'submit' });

    expect(error.withJob(first).job).toEqual(first);
    expect(error.withJob(second).job).toEqual(first);
  });
});

describe('describeFailure', () => {
  it('names the stage and the job', () => {
    const error = new DownloadError('HTTP 403 Forbidden', {
      job: { name: 'Monthly Cost Report', handle: 'crn:1:flexreports/a' },
    });
    expect(describeFailure(error)).toBe('download failed for "Monthly Cost Report": HTTP 403 Forbidden');
  });

  it('omits the job when none is attached', () => {
    const error = new AuthenticationError('Access token missing from login response');
    expect(describeFailure(error)).toBe('authenticate failed: Access token missing from login response');
  });
});

describe('getErrorMessage', () => {
  it('returns message for Error instances', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('stringifies other values', () => {
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage(42)).toBe('42');
  });
});
