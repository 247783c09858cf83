import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { CertificateWaiter, evaluateCertificateStatus } from './certificate-waiter.js';
import { StepFailure } from '../lib/errors.js';
import { FakeCertificateIssuer, FakeClock, type CallLog } from '../test-mocks.js';

const MINUTE = 60_000;

describe('evaluateCertificateStatus', () => {
  it('treats ISSUED as ready', () => {
    assert.deepEqual(evaluateCertificateStatus({ status: 'ISSUED' }), { state: 'ready', value: 'ISSUED' });
  });

  it('keeps waiting while validation is pending', () => {
    assert.equal(evaluateCertificateStatus({ status: 'PENDING_VALIDATION' }).state, 'pending');
  });

  it('fails terminal statuses with the ACM reason', () => {
    assert.deepEqual(evaluateCertificateStatus({ status: 'FAILED', failureReason: 'CAA_ERROR' }), {
      state: 'failed',
      reason: 'Certificate status FAILED (CAA_ERROR)',
    });
    assert.deepEqual(evaluateCertificateStatus({ status: 'VALIDATION_TIMED_OUT' }), {
      state: 'failed',
      reason: 'Certificate status VALIDATION_TIMED_OUT',
    });
    assert.equal(evaluateCertificateStatus({ status: 'REVOKED' }).state, 'failed');
    assert.equal(evaluateCertificateStatus({ status: 'EXPIRED' }).state, 'failed');
  });

  it('fails unknown statuses', () => {
    assert.deepEqual(evaluateCertificateStatus({ status: 'SOMETHING_NEW' }), {
      state: 'failed',
      reason: 'Unexpected certificate status SOMETHING_NEW',
    });
  });
});

describe('CertificateWaiter.awaitIssued', () => {
  let calls: CallLog;
  let issuer: FakeCertificateIssuer;
  let clock: FakeClock;

  beforeEach(() => {
    calls = [];
    issuer = new FakeCertificateIssuer(calls);
    clock = new FakeClock();
  });

  it('returns ready once the certificate is issued', async () => {
    issuer.statuses = [{ status: 'PENDING_VALIDATION' }, { status: 'PENDING_VALIDATION' }, { status: 'ISSUED' }];
    const waiter = new CertificateWaiter(issuer, { clock, pollIntervalMs: 20_000 });

    const outcome = await waiter.awaitIssued('cert/demo', 30 * MINUTE);

    assert.deepEqual(outcome, { status: 'ready', value: 'ISSUED', elapsedMs: 40_000 });
    assert.deepEqual(clock.sleeps, [20_000, 20_000]);
  });

  it('fails immediately on a terminal status', async () => {
    issuer.statuses = [{ status: 'PENDING_VALIDATION' }, { status: 'VALIDATION_TIMED_OUT' }];
    const waiter = new CertificateWaiter(issuer, { clock, pollIntervalMs: 20_000 });

    const outcome = await waiter.awaitIssued('cert/demo', 30 * MINUTE);

    assert.deepEqual(outcome, {
      status: 'failed',
      reason: 'Certificate status VALIDATION_TIMED_OUT',
      elapsedMs: 20_000,
    });
  });

  it('times out when validation stays pending', async () => {
    issuer.statuses = [{ status: 'PENDING_VALIDATION' }];
    const waiter = new CertificateWaiter(issuer, { clock, pollIntervalMs: 20_000 });

    const outcome = await waiter.awaitIssued('cert/demo', 1 * MINUTE);

    assert.deepEqual(outcome, { status: 'timedOut', elapsedMs: MINUTE });
    // polls at 0, 20s, 40s and 60s
    assert.equal(calls.length, 4);
  });

  it('reports each pending poll', async () => {
    issuer.statuses = [{ status: 'PENDING_VALIDATION' }, { status: 'ISSUED' }];
    const waiter = new CertificateWaiter(issuer, { clock, pollIntervalMs: 20_000 });
    const pending: number[] = [];

    await waiter.awaitIssued('cert/demo', MINUTE, attempt => pending.push(attempt));

    assert.deepEqual(pending, [1]);
  });
});

describe('CertificateWaiter.getValidationRecords', () => {
  let calls: CallLog;
  let issuer: FakeCertificateIssuer;
  let clock: FakeClock;

  beforeEach(() => {
    calls = [];
    issuer = new FakeCertificateIssuer(calls);
    clock = new FakeClock();
  });

  it('returns records as soon as they appear', async () => {
    const record = { name: '_v.example.com.', value: '_t.acm-validations.aws.' };
    issuer.recordSets = [[], [], [record]];
    const waiter = new CertificateWaiter(issuer, { clock });

    const records = await waiter.getValidationRecords('cert/demo');

    assert.deepEqual(records, [record]);
    assert.deepEqual(clock.sleeps, [2000, 4000]);
  });

  it('gives up with ValidationRecordsUnavailable after the attempt budget', async () => {
    issuer.recordSets = [[]];
    const waiter = new CertificateWaiter(issuer, { clock });

    await assert.rejects(waiter.getValidationRecords('cert/demo'), (error: unknown) => {
      assert.ok(error instanceof StepFailure);
      assert.equal(error.kind, 'ValidationRecordsUnavailable');
      assert.equal(error.message, 'Validation records for cert/demo not available after 10 attempts');
      assert.deepEqual(error.partial, { certificateArn: 'cert/demo' });
      return true;
    });
    assert.equal(calls.length, 10);
    assert.deepEqual(clock.sleeps, [2000, 4000, 8000, 10000, 10000, 10000, 10000, 10000, 10000]);
  });

  it('keeps trying through lookup errors and reports the last one', async () => {
    const failing = new FakeCertificateIssuer(calls);
    failing.describeValidationRecords = async () => {
      throw new Error('Certificate not found');
    };
    const waiter = new CertificateWaiter(failing, { clock, recordAttempts: 2 });

    await assert.rejects(waiter.getValidationRecords('cert/demo'), {
      kind: 'ValidationRecordsUnavailable',
      message: 'Validation records for cert/demo not available after 2 attempts: Certificate not found',
    });
  });
});
