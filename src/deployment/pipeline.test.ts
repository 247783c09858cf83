/**
 * Tests for the deployment pipeline, run against fake collaborators on a fake clock
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { DeploymentPipeline, type PipelineProgressListener } from './pipeline.js';
import { ConfigurationError, PipelineError, StepFailure } from '../lib/errors.js';
import { createFakeServices, createRecordingLogger, type FakeServices } from '../test-mocks.js';
import type { PipelineRequest } from '../types.js';

const MINUTE = 60_000;

function request(overrides: Partial<PipelineRequest> = {}): PipelineRequest {
  return {
    appDir: '/work/site',
    install: true,
    bucketName: 'site-bucket',
    s3Prefix: '',
    makePublic: true,
    domain: 'demo.example.com',
    certificateTimeoutMs: 30 * MINUTE,
    distributionTimeoutMs: 30 * MINUTE,
    ...overrides,
  };
}

async function expectPipelineError(promise: Promise<unknown>): Promise<PipelineError> {
  try {
    await promise;
  } catch (error) {
    assert.ok(error instanceof PipelineError, `expected PipelineError, got ${String(error)}`);
    return error;
  }
  assert.fail('expected the pipeline to fail');
}

describe('DeploymentPipeline.run', () => {
  let fakes: FakeServices;

  beforeEach(() => {
    fakes = createFakeServices();
  });

  it('deploys end to end once certificate and distribution are ready', async () => {
    fakes.issuer.statuses = [{ status: 'PENDING_VALIDATION' }, { status: 'PENDING_VALIDATION' }, { status: 'ISSUED' }];
    fakes.cdn.statuses = ['InProgress', 'InProgress', 'Deployed'];
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const result = await pipeline.run(request());

    assert.deepEqual(result, {
      url: 'https://demo.example.com',
      distributionId: 'E1DEMO',
      distributionDomain: 'd111.cdn.example',
      certificateArn: 'cert/demo',
    });
    assert.deepEqual(fakes.calls, [
      'install:/work/site',
      'build:/work/site:default',
      'upload:/work/site/out:site-bucket::public',
      'findCertificates:demo.example.com',
      'requestCertificate:demo.example.com:www',
      'describeValidationRecords:cert/demo',
      'findZoneId:demo.example.com',
      'upsertRecords:ZONE123:CNAME _v.example.com.',
      'describeCertificateStatus:cert/demo',
      'describeCertificateStatus:cert/demo',
      'describeCertificateStatus:cert/demo',
      'createDistribution:site-bucket:demo.example.com:cert/demo',
      'describeDistributionStatus:E1DEMO',
      'describeDistributionStatus:E1DEMO',
      'describeDistributionStatus:E1DEMO',
      'upsertRecords:ZONE123:A demo.example.com,CNAME www.demo.example.com',
    ]);
  });

  it('points the apex alias and www CNAME at the distribution', async () => {
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    await pipeline.run(request());

    assert.deepEqual(fakes.zones.batches[1], [
      { type: 'A', name: 'demo.example.com', aliasTarget: { dnsName: 'd111.cdn.example', hostedZoneId: 'Z2FDTNDATAQYW2' } },
      { type: 'CNAME', name: 'www.demo.example.com', value: 'd111.cdn.example', ttl: 300 },
    ]);
  });

  it('times out at step 8 when the distribution never deploys', async () => {
    fakes.cdn.statuses = ['InProgress'];
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.run(request()));

    assert.equal(error.stepIndex, 8);
    assert.equal(error.stepName, 'await-distribution');
    assert.equal(error.kind, 'DistributionDeployTimedOut');
    assert.equal(
      error.message,
      'Step 8 (await-distribution) failed [DistributionDeployTimedOut]: Distribution was not deployed within 30 minutes'
    );
    assert.deepEqual(error.known, {
      uploadedFileCount: 2,
      certificateArn: 'cert/demo',
      hostedZoneId: 'ZONE123',
      distributionId: 'E1DEMO',
      distributionDomain: 'd111.cdn.example',
    });
    assert.equal(fakes.calls.filter(c => c === 'describeDistributionStatus:E1DEMO').length, 41);
    assert.ok(!fakes.calls.some(c => c.includes('A demo.example.com')));
  });

  it('stops at step 2 without touching the cloud when the build fails', async () => {
    fakes.builder.buildError = new Error('next build exited with code 1');
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.run(request({ install: false })));

    assert.equal(error.stepIndex, 2);
    assert.equal(error.stepName, 'build');
    assert.equal(error.kind, 'BuildFailed');
    assert.equal(error.reason, 'next build exited with code 1');
    assert.deepEqual(error.known, {});
    assert.deepEqual(fakes.calls, ['build:/work/site:default']);
  });

  it('keeps the kind a collaborator reports', async () => {
    fakes.uploader.uploadError = new StepFailure('UploadFailed', 'Access Denied', { uploadedFileCount: 4 });
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.run(request()));

    assert.equal(error.stepIndex, 3);
    assert.equal(error.kind, 'UploadFailed');
    assert.deepEqual(error.known, { uploadedFileCount: 4 });
  });

  it('reports the certificate ARN when validation records never appear', async () => {
    fakes.issuer.recordSets = [[]];
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.run(request()));

    assert.equal(error.stepIndex, 4);
    assert.equal(error.kind, 'ValidationRecordsUnavailable');
    assert.equal(error.known.certificateArn, 'cert/demo');
    assert.ok(!fakes.calls.some(c => c.startsWith('findZoneId')));
  });

  it('fails step 6 when ACM rejects the certificate', async () => {
    fakes.issuer.statuses = [{ status: 'FAILED', failureReason: 'CAA_ERROR' }];
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.run(request()));

    assert.equal(error.stepIndex, 6);
    assert.equal(error.kind, 'CertificateIssuanceFailed');
    assert.equal(error.reason, 'Certificate status FAILED (CAA_ERROR)');
    assert.ok(!fakes.calls.some(c => c.startsWith('createDistribution')));
  });

  it('times out step 6 when validation stays pending', async () => {
    fakes.issuer.statuses = [{ status: 'PENDING_VALIDATION' }];
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.run(request({ certificateTimeoutMs: 5 * MINUTE })));

    assert.equal(error.stepIndex, 6);
    assert.equal(error.kind, 'CertificateIssuanceTimedOut');
    assert.equal(error.reason, 'Certificate was not issued within 5 minutes');
    assert.equal(error.known.certificateArn, 'cert/demo');
    assert.ok(!fakes.calls.some(c => c.startsWith('createDistribution')));
    assert.ok(!fakes.calls.some(c => c.startsWith('upsertRecords:ZONE123:A')));
  });

  it('creates the distribution over the uploaded prefix', async () => {
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    await pipeline.run(request({ s3Prefix: 'v2' }));

    assert.ok(fakes.calls.includes('upload:/work/site/out:site-bucket:v2:public'));
    assert.ok(fakes.calls.includes('createDistribution:site-bucket:demo.example.com:cert/demo:v2'));
  });

  it('uploads public objects even when the request says otherwise', async () => {
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    await pipeline.run(request({ makePublic: false, s3Prefix: 'v2' }));

    assert.ok(fakes.calls.includes('upload:/work/site/out:site-bucket:v2:public'));
  });

  it('normalizes the domain before using it', async () => {
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const result = await pipeline.run(request({ domain: 'https://Demo.Example.com/' }));

    assert.equal(result.url, 'https://demo.example.com');
  });

  it('rejects an invalid domain before running any step', async () => {
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    await assert.rejects(pipeline.run(request({ domain: 'not a domain' })), ConfigurationError);
    assert.deepEqual(fakes.calls, []);
  });

  it('rejects a non-positive timeout', async () => {
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    await assert.rejects(pipeline.run(request({ distributionTimeoutMs: 0 })), {
      message: 'Invalid distribution timeout: must be a positive duration',
    });
  });

  it('warns about certificates left by earlier runs', async () => {
    fakes.issuer.existing = [{ arn: 'cert/old', domain: 'demo.example.com', status: 'PENDING_VALIDATION' }];
    const { logger, entries } = createRecordingLogger();
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock, logger });

    await pipeline.run(request());

    const warning = entries.find(e => e.level === 'warn');
    assert.equal(warning?.message, 'Found 1 existing certificate(s) for demo.example.com; requesting a new one');
    assert.deepEqual(warning?.context, { step: 'request-certificate', certificates: ['cert/old (PENDING_VALIDATION)'] });
  });

  it('logs known identifiers at error level on failure', async () => {
    fakes.cdn.createError = new Error('Too many distributions');
    const { logger, entries } = createRecordingLogger();
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock, logger });

    await expectPipelineError(pipeline.run(request()));

    const failure = entries.find(e => e.level === 'error');
    assert.equal(failure?.message, 'Step 7 (create-distribution) failed');
    assert.deepEqual(failure?.context, {
      step: 'create-distribution',
      kind: 'DistributionCreateFailed',
      uploadedFileCount: 2,
      certificateArn: 'cert/demo',
      hostedZoneId: 'ZONE123',
    });
  });

  it('reports step lifecycle events to the listener', async () => {
    fakes.cdn.statuses = ['InProgress', 'Deployed'];
    const events: string[] = [];
    const listener: PipelineProgressListener = {
      onStepStart: (step, total) => events.push(`start ${step.index}/${total} ${step.name}`),
      onStepProgress: step => events.push(`progress ${step.index}`),
      onStepComplete: step => events.push(`done ${step.index}`),
    };
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock, listener });

    await pipeline.run(request());

    assert.deepEqual(events, [
      'start 1/9 install-dependencies', 'done 1',
      'start 2/9 build', 'done 2',
      'start 3/9 upload', 'progress 3', 'done 3',
      'start 4/9 request-certificate', 'done 4',
      'start 5/9 write-validation-records', 'done 5',
      'start 6/9 await-certificate', 'done 6',
      'start 7/9 create-distribution', 'done 7',
      'start 8/9 await-distribution', 'progress 8', 'done 8',
      'start 9/9 point-dns', 'done 9',
    ]);
  });

  it('measures step durations on the injected clock', async () => {
    fakes.cdn.statuses = ['InProgress', 'Deployed'];
    const durations = new Map<string, number>();
    const pipeline = new DeploymentPipeline(fakes.services, {
      clock: fakes.clock,
      listener: { onStepComplete: (step, durationMs) => durations.set(step.name, durationMs) },
    });

    await pipeline.run(request());

    assert.equal(durations.get('await-distribution'), 45_000);
    assert.equal(durations.get('build'), 0);
  });
});

describe('DeploymentPipeline.publish', () => {
  it('runs install, build and upload only', async () => {
    const fakes = createFakeServices();
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const summary = await pipeline.publish({
      appDir: '/work/site',
      buildCommand: 'make site',
      install: false,
      bucketName: 'site-bucket',
      s3Prefix: 'preview',
      makePublic: false,
    });

    assert.deepEqual(summary, { fileCount: 2, keys: ['preview/index.html', 'preview/assets/app.js'] });
    assert.deepEqual(fakes.calls, [
      'build:/work/site:make site',
      'upload:/work/site/out:site-bucket:preview:private',
    ]);
  });

  it('produces the same keys when re-run', async () => {
    const fakes = createFakeServices();
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });
    const buildRequest = {
      appDir: '/work/site',
      install: false,
      bucketName: 'site-bucket',
      s3Prefix: '',
      makePublic: true,
    };

    const first = await pipeline.publish(buildRequest);
    const second = await pipeline.publish(buildRequest);

    assert.deepEqual(first, second);
  });

  it('fails with InstallFailed at step 1', async () => {
    const fakes = createFakeServices();
    fakes.builder.installError = new Error('lockfile out of date');
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.publish({
      appDir: '/work/site',
      install: true,
      bucketName: 'site-bucket',
      s3Prefix: '',
      makePublic: false,
    }));

    assert.equal(error.stepIndex, 1);
    assert.equal(error.kind, 'InstallFailed');
  });
});

describe('DeploymentPipeline.deployLocal', () => {
  it('runs install, build and copy, and touches no cloud service', async () => {
    const fakes = createFakeServices();
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const summary = await pipeline.deployLocal({
      appDir: '/work/site',
      install: true,
      destination: '/srv/preview',
      clean: false,
      timestamp: true,
    });

    assert.deepEqual(summary, { destination: '/srv/preview', fileCount: 2 });
    assert.deepEqual(fakes.calls, [
      'install:/work/site',
      'build:/work/site:default',
      'copy:/work/site/out:/srv/preview:merge+timestamp',
    ]);
  });

  it('reports a copy failure at step 3', async () => {
    const fakes = createFakeServices();
    fakes.localPublisher.copyError = new Error('EACCES: permission denied');
    const pipeline = new DeploymentPipeline(fakes.services, { clock: fakes.clock });

    const error = await expectPipelineError(pipeline.deployLocal({
      appDir: '/work/site',
      install: false,
      destination: '/srv/preview',
      clean: true,
      timestamp: false,
    }));

    assert.equal(error.stepIndex, 3);
    assert.equal(error.stepName, 'copy-output');
    assert.equal(error.kind, 'LocalCopyFailed');
    assert.equal(error.reason, 'EACCES: permission denied');
  });
});
