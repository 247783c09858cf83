/**
 * Certificate Waiter
 *
 * Waits for ACM to issue a DNS-validated certificate. Validation usually
 * completes a few minutes after the CNAMEs resolve but can take up to 30.
 */

import { StepFailure, formatError } from '../lib/errors.js';
import { calculateBackoff } from '../lib/aws-retry.js';
import { pollUntil, systemClock, type Clock, type PollDecision } from '../lib/polling.js';
import { DEFAULT_CERTIFICATE_POLL_SECONDS } from '../lib/constants.js';
import { createSilentLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import type { ICertificateIssuer } from '../lib/interfaces.js';
import type { CertificateStatus, CertificateStatusReport, ValidationRecord, WaitOutcome } from '../types.js';

/**
 * Statuses from which a certificate can never become ISSUED
 */
const TERMINAL_FAILURES: ReadonlySet<string> = new Set<CertificateStatus>([
  'VALIDATION_TIMED_OUT',
  'FAILED',
  'REVOKED',
  'INACTIVE',
  'EXPIRED',
]);

export interface CertificateWaiterOptions {
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: StructuredLogger;
  /** Attempts for getValidationRecords (default 10) */
  recordAttempts?: number;
  recordBaseDelayMs?: number;
  recordMaxDelayMs?: number;
}

/**
 * Maps one observed certificate status onto the wait
 */
export function evaluateCertificateStatus(report: CertificateStatusReport): PollDecision<'ISSUED'> {
  if (report.status === 'ISSUED') {
    return { state: 'ready', value: 'ISSUED' };
  }
  if (report.status === 'PENDING_VALIDATION') {
    return { state: 'pending', detail: report.status };
  }
  if (TERMINAL_FAILURES.has(report.status)) {
    const reason = report.failureReason ? ` (${report.failureReason})` : '';
    return { state: 'failed', reason: `Certificate status ${report.status}${reason}` };
  }
  return { state: 'failed', reason: `Unexpected certificate status ${report.status}` };
}

export class CertificateWaiter {
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;
  private readonly recordAttempts: number;
  private readonly recordBaseDelayMs: number;
  private readonly recordMaxDelayMs: number;

  constructor(private readonly issuer: ICertificateIssuer, options: CertificateWaiterOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_CERTIFICATE_POLL_SECONDS * 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
    this.recordAttempts = options.recordAttempts ?? 10;
    this.recordBaseDelayMs = options.recordBaseDelayMs ?? 2000;
    this.recordMaxDelayMs = options.recordMaxDelayMs ?? 10000;
  }

  /**
   * Poll until the certificate is ISSUED, fails, or `timeoutMs` elapses
   */
  awaitIssued(
    certificateArn: string,
    timeoutMs: number,
    onPending?: (attempt: number, elapsedMs: number) => void
  ): Promise<WaitOutcome<'ISSUED'>> {
    return pollUntil(
      () => this.issuer.describeStatus(certificateArn),
      evaluateCertificateStatus,
      {
        intervalMs: this.pollIntervalMs,
        timeoutMs,
        clock: this.clock,
        onPending: (attempt, elapsedMs, detail) => {
          this.logger.debug('Certificate not issued yet', { certificateArn, attempt, elapsedMs, status: detail });
          onPending?.(attempt, elapsedMs);
        },
      }
    );
  }

  /**
   * Validation records for a freshly requested certificate
   *
   * ACM generates the records a few seconds after the request; until then the
   * set is empty. Retries with exponential backoff before giving up.
   *
   * @throws {StepFailure} ValidationRecordsUnavailable, carrying the certificate ARN
   */
  async getValidationRecords(certificateArn: string): Promise<ValidationRecord[]> {
    let lastError = '';

    for (let attempt = 0; attempt < this.recordAttempts; attempt++) {
      try {
        const records = await this.issuer.describeValidationRecords(certificateArn);
        if (records.length > 0) {
          return records;
        }
        lastError = '';
      } catch (error) {
        lastError = formatError(error);
      }

      if (attempt < this.recordAttempts - 1) {
        const delay = calculateBackoff(attempt, this.recordBaseDelayMs, this.recordMaxDelayMs, false);
        this.logger.debug('Validation records not available yet', { certificateArn, attempt: attempt + 1, delay });
        await this.clock.sleep(delay);
      }
    }

    const detail = lastError ? `: ${lastError}` : '';
    throw new StepFailure(
      'ValidationRecordsUnavailable',
      `Validation records for ${certificateArn} not available after ${this.recordAttempts} attempts${detail}`,
      { certificateArn }
    );
  }
}
