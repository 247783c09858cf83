/**
 * Waits for a new CloudFront distribution to finish propagating to the edge
 * (typically 10-20 minutes)
 */

import { pollUntil, systemClock, type Clock, type PollDecision } from '../polling.js';
import { DEFAULT_DISTRIBUTION_POLL_SECONDS } from '../constants.js';
import { createSilentLogger, type StructuredLogger } from '../../monitoring/structured-logger.js';
import type { ICdnManager } from '../interfaces.js';
import type { WaitOutcome } from '../../types.js';

export function evaluateDistributionStatus(status: string): PollDecision<'Deployed'> {
  if (status === 'Deployed') {
    return { state: 'ready', value: 'Deployed' };
  }
  if (status === 'InProgress') {
    return { state: 'pending', detail: status };
  }
  return { state: 'failed', reason: `Unexpected distribution status ${status}` };
}

export interface DistributionWaiterOptions {
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: StructuredLogger;
}

export class DistributionWaiter {
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;

  constructor(private readonly cdn: ICdnManager, options: DistributionWaiterOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_DISTRIBUTION_POLL_SECONDS * 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
  }

  awaitDeployed(
    distributionId: string,
    timeoutMs: number,
    onPending?: (attempt: number, elapsedMs: number) => void
  ): Promise<WaitOutcome<'Deployed'>> {
    return pollUntil(
      () => this.cdn.describeStatus(distributionId),
      evaluateDistributionStatus,
      {
        intervalMs: this.pollIntervalMs,
        timeoutMs,
        clock: this.clock,
        onPending: (attempt, elapsedMs) => {
          this.logger.debug('Distribution still deploying', { distributionId, attempt, elapsedMs });
          onPending?.(attempt, elapsedMs);
        },
      }
    );
  }
}
