/**
 * sitelaunch
 *
 * Deploys a static site to S3 and publishes it under a custom domain through
 * CloudFront, with an ACM certificate validated over Route53 DNS.
 */

export { DeploymentPipeline } from './deployment/pipeline.js';
export type { PipelineOptions, PipelineProgressListener } from './deployment/pipeline.js';
export { createAwsServices } from './deployment/services.js';
export type { ServiceOptions } from './deployment/services.js';
export { BUILD_STEPS, LOCAL_STEPS, PIPELINE_STEPS } from './deployment/steps.js';
export type { PipelineServices, PipelineStep, StepDescriptor, StepName } from './deployment/steps.js';
export { BuildRunner } from './deployment/build-runner.js';
export { LocalDirectoryPublisher } from './deployment/local-publisher.js';
export { S3Uploader } from './lib/s3/uploader.js';
export { AcmCertificateIssuer } from './certificates/acm-issuer.js';
export { CertificateWaiter } from './certificates/certificate-waiter.js';
export { CloudFrontManager } from './lib/cloudfront/distribution-manager.js';
export { DistributionWaiter } from './lib/cloudfront/distribution-waiter.js';
export { Route53ZoneWriter } from './lib/route53/zone-writer.js';
export { Route53DomainRegistrar, registrationFileSchema } from './lib/route53/domain-registrar.js';
export type { RegistrationFile } from './lib/route53/domain-registrar.js';
export { ConfigurationError, DeploymentError, PipelineError, StepFailure } from './lib/errors.js';
export type { KnownIdentifiers } from './lib/errors.js';
export { StructuredLogger } from './monitoring/structured-logger.js';
export type { Clock } from './lib/polling.js';
export type {
  AwsSettings,
  BuildRequest,
  LocalCopySummary,
  LocalDeployRequest,
  PipelineRequest,
  PipelineResult,
  PipelineErrorKind,
  SourceRequest,
  UploadSummary,
} from './types.js';

// Version
export const VERSION = '1.0.0';
