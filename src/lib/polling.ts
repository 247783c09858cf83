/**
 * Poll-until-ready primitive shared by the certificate and distribution waiters
 */

import { formatError } from './errors.js';
import type { WaitOutcome } from '../types.js';

/**
 * Time source and sleep, injectable so waits can run on a fake clock
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * What a single observed status means for the wait
 */
export type PollDecision<T> =
  | { state: 'ready'; value: T }
  | { state: 'pending'; detail?: string }
  | { state: 'failed'; reason: string };

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  /** Called after every pending observation */
  onPending?: (attempt: number, elapsedMs: number, detail?: string) => void;
}

/**
 * Poll `fetchStatus` until `evaluate` reports ready or failed, or until the
 * timeout elapses.
 *
 * The final sleep is clamped to the remaining time, so the last poll starts at
 * the deadline. A result only counts if its poll started no later than the
 * deadline; a pending result once the deadline has passed ends the wait as
 * `timedOut`. A thrown fetch error ends the wait as `failed`; callers wrap
 * transient errors in their own retry beforehand.
 *
 * @example
 * ```typescript
 * const outcome = await pollUntil(
 *   () => cdn.describeStatus(id),
 *   status => status === 'Deployed' ? { state: 'ready', value: status } : { state: 'pending' },
 *   { intervalMs: 45_000, timeoutMs: 30 * 60_000 }
 * );
 * ```
 */
export async function pollUntil<S, T>(
  fetchStatus: () => Promise<S>,
  evaluate: (status: S) => PollDecision<T>,
  options: PollOptions
): Promise<WaitOutcome<T>> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();

  for (let attempt = 1; ; attempt++) {
    const polledAt = clock.now() - startedAt;
    if (polledAt > options.timeoutMs) {
      return { status: 'timedOut', elapsedMs: polledAt };
    }

    let decision: PollDecision<T>;
    try {
      decision = evaluate(await fetchStatus());
    } catch (error) {
      return { status: 'failed', reason: formatError(error), elapsedMs: clock.now() - startedAt };
    }

    if (decision.state === 'ready') {
      return { status: 'ready', value: decision.value, elapsedMs: clock.now() - startedAt };
    }
    if (decision.state === 'failed') {
      return { status: 'failed', reason: decision.reason, elapsedMs: clock.now() - startedAt };
    }

    options.onPending?.(attempt, polledAt, decision.detail);

    const elapsedMs = clock.now() - startedAt;
    if (elapsedMs >= options.timeoutMs) {
      return { status: 'timedOut', elapsedMs };
    }

    await clock.sleep(Math.min(options.intervalMs, options.timeoutMs - elapsedMs));
  }
}
