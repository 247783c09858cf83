/**
 * Wires the pipeline's collaborators to real AWS clients and the local toolchain
 */

import { createAwsClients } from '../lib/aws-clients.js';
import { createS3Api, S3Uploader } from '../lib/s3/uploader.js';
import { createAcmApi, AcmCertificateIssuer } from '../certificates/acm-issuer.js';
import { CertificateWaiter } from '../certificates/certificate-waiter.js';
import { createCloudFrontApi, CloudFrontManager } from '../lib/cloudfront/distribution-manager.js';
import { DistributionWaiter } from '../lib/cloudfront/distribution-waiter.js';
import { createRoute53Api, Route53ZoneWriter } from '../lib/route53/zone-writer.js';
import { BuildRunner, execaExecutor, type CommandExecutor } from './build-runner.js';
import { LocalDirectoryPublisher } from './local-publisher.js';
import { createSilentLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import type { Clock } from '../lib/polling.js';
import type { PipelineServices } from './steps.js';
import type { AwsSettings } from '../types.js';

export interface ServiceOptions {
  logger?: StructuredLogger;
  clock?: Clock;
  certificatePollIntervalMs?: number;
  distributionPollIntervalMs?: number;
  executor?: CommandExecutor;
}

export function createAwsServices(settings: AwsSettings, options: ServiceOptions = {}): PipelineServices {
  const logger = options.logger ?? createSilentLogger();
  const clients = createAwsClients(settings);

  const certificates = new AcmCertificateIssuer(createAcmApi(clients.acm), logger.child({ service: 'acm' }));
  const cdn = new CloudFrontManager(createCloudFrontApi(clients.cloudfront), settings.region, {
    logger: logger.child({ service: 'cloudfront' }),
  });

  return {
    builder: new BuildRunner(options.executor ?? execaExecutor, logger.child({ service: 'build' })),
    localPublisher: new LocalDirectoryPublisher(logger.child({ service: 'local' })),
    uploader: new S3Uploader(createS3Api(clients.s3), logger.child({ service: 's3' })),
    certificates,
    certificateWaiter: new CertificateWaiter(certificates, {
      pollIntervalMs: options.certificatePollIntervalMs,
      clock: options.clock,
      logger: logger.child({ service: 'acm' }),
    }),
    zones: new Route53ZoneWriter(createRoute53Api(clients.route53), logger.child({ service: 'route53' })),
    cdn,
    distributionWaiter: new DistributionWaiter(cdn, {
      pollIntervalMs: options.distributionPollIntervalMs,
      clock: options.clock,
      logger: logger.child({ service: 'cloudfront' }),
    }),
  };
}
