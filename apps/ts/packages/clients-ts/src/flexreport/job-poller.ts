/**
 * Poll a submitted report until it reaches a state the caller must act on.
 *
 * Sequence: initial delay, then up to `maxAttempts` status checks separated
 * by a growing backoff (10, 15, 22, 33 seconds with the defaults).
 * COMPLETED and FAILED are terminal. QUEUED also stops the loop: a report
 * sitting in the queue after the initial delay needs an operator to look at it.
 */

import {
  logger,
  nextBackoffDelay,
  type PollingConfig,
  type StatusSnapshot,
  TimeoutError,
  toTimerDelay,
} from '@flexreport/shared';

export type PollResult =
  | { state: 'completed'; snapshot: StatusSnapshot; attempts: number }
  | { state: 'failed'; snapshot: StatusSnapshot; attempts: number }
  | { state: 'queued'; snapshot: StatusSnapshot; attempts: number };

export interface PollHooks {
  /** Called after every status check */
  onPoll?: (attempt: number, snapshot: StatusSnapshot) => void;
  /** Called before each wait with the delay and the attempt it precedes */
  onWait?: (delaySeconds: number, nextAttempt: number) => void;
}

export interface PollOptions extends PollingConfig, PollHooks {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const log = logger.child({ component: 'job-poller' });

export async function pollUntilTerminal(
  checkStatus: () => Promise<StatusSnapshot>,
  options: PollOptions
): Promise<PollResult> {
  const wait = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const maxAttempts = Math.max(1, Math.trunc(options.maxAttempts));
  const ceilingMs = options.maxElapsedSeconds > 0 ? options.maxElapsedSeconds * 1000 : undefined;
  let delaySeconds = Math.trunc(options.intervalSeconds);

  const startedAt = now();
  options.onWait?.(options.initialDelaySeconds, 1);
  await wait(toTimerDelay(options.initialDelaySeconds));

  for (let attempt = 1; ; attempt++) {
    const snapshot = await checkStatus();
    options.onPoll?.(attempt, snapshot);
    log.debug(`Status check #${attempt}: ${snapshot.rawStatus}`);

    switch (snapshot.status) {
      case 'COMPLETED':
        return { state: 'completed', snapshot, attempts: attempt };
      case 'FAILED':
        return { state: 'failed', snapshot, attempts: attempt };
      case 'QUEUED':
        return { state: 'queued', snapshot, attempts: attempt };
      case 'RUNNING':
        break;
    }

    const elapsedMs = now() - startedAt;
    if (attempt >= maxAttempts) {
      throw new TimeoutError(`Report still running after ${attempt} status checks`, attempt, elapsedMs);
    }
    if (ceilingMs !== undefined && elapsedMs > ceilingMs) {
      throw new TimeoutError(
        `Report still running after ${Math.floor(elapsedMs / 1000)}s (limit ${options.maxElapsedSeconds}s)`,
        attempt,
        elapsedMs
      );
    }

    options.onWait?.(delaySeconds, attempt + 1);
    await wait(toTimerDelay(delaySeconds));
    delaySeconds = nextBackoffDelay(delaySeconds, options.backoffMultiplier);
  }
}
