/**
 * The fixed deployment sequence
 *
 * Each step declares the state fields it reads and writes. The executor
 * enforces both: a step sees only what it requires, and may return only what
 * it produces.
 */

import { StepFailure, formatError } from '../lib/errors.js';
import { validationRecordChanges, websiteRecordChanges } from '../lib/route53/zone-writer.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import type { CertificateWaiter } from '../certificates/certificate-waiter.js';
import type { DistributionWaiter } from '../lib/cloudfront/distribution-waiter.js';
import type {
  IBuildRunner,
  ICdnManager,
  ICertificateIssuer,
  ILocalPublisher,
  IStorageUploader,
  IZoneWriter,
} from '../lib/interfaces.js';
import type {
  BuildRequest,
  LocalDeployRequest,
  PipelineErrorKind,
  PipelineRequest,
  SourceRequest,
} from '../types.js';
import type { StateField, StatePatch, StateReader } from './pipeline-state.js';

/**
 * Collaborators the steps call
 */
export interface PipelineServices {
  builder: IBuildRunner;
  localPublisher: ILocalPublisher;
  uploader: IStorageUploader;
  certificates: ICertificateIssuer;
  certificateWaiter: CertificateWaiter;
  zones: IZoneWriter;
  cdn: ICdnManager;
  distributionWaiter: DistributionWaiter;
}

export interface StepContext<R extends SourceRequest> {
  request: Readonly<R>;
  state: StateReader;
  services: PipelineServices;
  logger: StructuredLogger;
  /** Report intermediate progress (poll attempts and the like) */
  progress(message: string): void;
}

export type StepName =
  | 'install-dependencies'
  | 'build'
  | 'copy-output'
  | 'upload'
  | 'request-certificate'
  | 'write-validation-records'
  | 'await-certificate'
  | 'create-distribution'
  | 'await-distribution'
  | 'point-dns';

export interface StepDescriptor {
  /** 1-based position in its sequence */
  index: number;
  name: StepName;
  title: string;
}

export interface PipelineStep<R extends SourceRequest = PipelineRequest> extends StepDescriptor {
  /** Kind reported when the step throws something other than a StepFailure */
  failureKind: PipelineErrorKind;
  requires: readonly StateField[];
  produces: readonly StateField[];
  run(ctx: StepContext<R>): Promise<StatePatch>;
}

function minutes(ms: number): string {
  const count = Math.round(ms / 60_000);
  return `${count} minute${count === 1 ? '' : 's'}`;
}

const installDependencies: PipelineStep<SourceRequest> = {
  index: 1,
  name: 'install-dependencies',
  title: 'Install dependencies',
  failureKind: 'InstallFailed',
  requires: [],
  produces: [],
  async run({ request, services, logger }) {
    if (!request.install) {
      logger.debug('Dependency install not requested');
      return {};
    }
    await services.builder.install(request.appDir);
    return {};
  },
};

const build: PipelineStep<SourceRequest> = {
  index: 2,
  name: 'build',
  title: 'Build',
  failureKind: 'BuildFailed',
  requires: [],
  produces: ['outputDir'],
  async run({ request, services }) {
    const outputDir = await services.builder.build(request.appDir, request.buildCommand);
    return { outputDir };
  },
};

const copyOutput: PipelineStep<LocalDeployRequest> = {
  index: 3,
  name: 'copy-output',
  title: 'Copy to output directory',
  failureKind: 'LocalCopyFailed',
  requires: ['outputDir'],
  produces: ['localPath', 'localFileCount'],
  async run({ request, state, services, progress }) {
    const summary = await services.localPublisher.copyOutput(state.get('outputDir'), request.destination, {
      clean: request.clean,
      timestamp: request.timestamp,
    });
    progress(`${summary.fileCount} files copied to ${summary.destination}`);
    return { localPath: summary.destination, localFileCount: summary.fileCount };
  },
};

const upload: PipelineStep<BuildRequest> = {
  index: 3,
  name: 'upload',
  title: 'Upload to S3',
  failureKind: 'UploadFailed',
  requires: ['outputDir'],
  produces: ['uploadedFileCount', 'uploadedKeys'],
  async run({ request, state, services, progress }) {
    const summary = await services.uploader.upload(
      state.get('outputDir'),
      request.bucketName,
      request.s3Prefix,
      request.makePublic
    );
    progress(`${summary.fileCount} files uploaded to s3://${request.bucketName}`);
    return { uploadedFileCount: summary.fileCount, uploadedKeys: summary.keys };
  },
};

const requestCertificate: PipelineStep = {
  index: 4,
  name: 'request-certificate',
  title: 'Request certificate',
  failureKind: 'CertificateRequestFailed',
  requires: [],
  produces: ['certificateArn', 'validationRecords'],
  async run({ request, services, logger }) {
    // A previous run may have left certificates behind; they are reported, not reused
    try {
      const existing = await services.certificates.findCertificates(request.domain);
      if (existing.length > 0) {
        logger.warn(`Found ${existing.length} existing certificate(s) for ${request.domain}; requesting a new one`, {
          certificates: existing.map(c => `${c.arn} (${c.status})`),
        });
      }
    } catch (error) {
      logger.warn('Could not list existing certificates', { reason: formatError(error) });
    }

    const certificateArn = await services.certificates.requestCertificate(request.domain, true);
    try {
      const validationRecords = await services.certificateWaiter.getValidationRecords(certificateArn);
      return { certificateArn, validationRecords };
    } catch (error) {
      if (error instanceof StepFailure) {
        throw error.withPartial({ certificateArn });
      }
      throw new StepFailure('CertificateRequestFailed', formatError(error), { certificateArn });
    }
  },
};

const writeValidationRecords: PipelineStep = {
  index: 5,
  name: 'write-validation-records',
  title: 'Write validation records',
  failureKind: 'DnsWriteFailed',
  requires: ['validationRecords'],
  produces: ['hostedZoneId', 'validationChangeId'],
  async run({ request, state, services }) {
    const hostedZoneId = await services.zones.findZoneId(request.domain);
    try {
      const validationChangeId = await services.zones.upsertRecords(
        hostedZoneId,
        validationRecordChanges([...state.get('validationRecords')])
      );
      return { hostedZoneId, validationChangeId };
    } catch (error) {
      if (error instanceof StepFailure) {
        throw error.withPartial({ hostedZoneId });
      }
      throw error;
    }
  },
};

const awaitCertificate: PipelineStep = {
  index: 6,
  name: 'await-certificate',
  title: 'Wait for certificate',
  failureKind: 'CertificateIssuanceFailed',
  requires: ['certificateArn'],
  produces: [],
  async run({ request, state, services, progress }) {
    const outcome = await services.certificateWaiter.awaitIssued(
      state.get('certificateArn'),
      request.certificateTimeoutMs,
      (attempt, elapsedMs) => progress(`Certificate pending validation (check ${attempt}, ${Math.round(elapsedMs / 1000)}s)`)
    );
    if (outcome.status === 'timedOut') {
      throw new StepFailure(
        'CertificateIssuanceTimedOut',
        `Certificate was not issued within ${minutes(request.certificateTimeoutMs)}`
      );
    }
    if (outcome.status === 'failed') {
      throw new StepFailure('CertificateIssuanceFailed', outcome.reason);
    }
    return {};
  },
};

const createDistribution: PipelineStep = {
  index: 7,
  name: 'create-distribution',
  title: 'Create CloudFront distribution',
  failureKind: 'DistributionCreateFailed',
  requires: ['certificateArn'],
  produces: ['distributionId', 'distributionDomain'],
  async run({ request, state, services }) {
    const distribution = await services.cdn.createDistribution(
      request.bucketName,
      request.domain,
      state.get('certificateArn'),
      request.s3Prefix
    );
    return { distributionId: distribution.id, distributionDomain: distribution.domain };
  },
};

const awaitDistribution: PipelineStep = {
  index: 8,
  name: 'await-distribution',
  title: 'Wait for distribution',
  failureKind: 'DistributionDeployFailed',
  requires: ['distributionId'],
  produces: [],
  async run({ request, state, services, progress }) {
    const outcome = await services.distributionWaiter.awaitDeployed(
      state.get('distributionId'),
      request.distributionTimeoutMs,
      (attempt, elapsedMs) => progress(`Distribution deploying (check ${attempt}, ${Math.round(elapsedMs / 1000)}s)`)
    );
    if (outcome.status === 'timedOut') {
      throw new StepFailure(
        'DistributionDeployTimedOut',
        `Distribution was not deployed within ${minutes(request.distributionTimeoutMs)}`
      );
    }
    if (outcome.status === 'failed') {
      throw new StepFailure('DistributionDeployFailed', outcome.reason);
    }
    return {};
  },
};

const pointDns: PipelineStep = {
  index: 9,
  name: 'point-dns',
  title: 'Point DNS at distribution',
  failureKind: 'DnsWriteFailed',
  requires: ['hostedZoneId', 'distributionDomain'],
  produces: ['dnsChangeId'],
  async run({ request, state, services }) {
    const dnsChangeId = await services.zones.upsertRecords(
      state.get('hostedZoneId'),
      websiteRecordChanges(request.domain, state.get('distributionDomain'))
    );
    return { dnsChangeId };
  },
};

/**
 * Build into a local directory: install, build, copy
 */
export const LOCAL_STEPS: readonly PipelineStep<LocalDeployRequest>[] = [installDependencies, build, copyOutput];

/**
 * Local half: install, build, upload
 */
export const BUILD_STEPS: readonly PipelineStep<BuildRequest>[] = [installDependencies, build, upload];

/**
 * The full sequence, in execution order
 */
export const PIPELINE_STEPS: readonly PipelineStep[] = [
  ...BUILD_STEPS,
  requestCertificate,
  writeValidationRecords,
  awaitCertificate,
  createDistribution,
  awaitDistribution,
  pointDns,
];
