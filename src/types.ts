/**
 * Core types for the sitelaunch deployment pipeline
 */

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

/**
 * Immutable AWS access settings shared by every collaborator
 */
export interface AwsSettings {
  /** Region for S3 and Route53 calls (ACM and CloudFront always use us-east-1) */
  readonly region: string;
  /** Named profile from the shared AWS config files */
  readonly profile?: string;
  /** Static credentials; when absent the SDK default provider chain is used */
  readonly credentials?: AwsCredentials;
}

/**
 * What every deploy starts with: an app to install and build
 */
export interface SourceRequest {
  /** Application directory containing package.json */
  appDir: string;
  /** Build command override (default: derived from the detected package manager) */
  buildCommand?: string;
  /** Install dependencies before building */
  install: boolean;
}

/**
 * Install, build, then copy the output to a local directory
 */
export interface LocalDeployRequest extends SourceRequest {
  /** Target directory (created if missing) */
  destination: string;
  /** Remove an existing destination before copying; otherwise files are merged over it */
  clean: boolean;
  /** Suffix the destination folder with `_YYYYMMDD_HHMMSS` */
  timestamp: boolean;
}

/**
 * Input for the local half of the pipeline (install, build, upload)
 */
export interface BuildRequest extends SourceRequest {
  /** Target S3 bucket */
  bucketName: string;
  /** Key prefix inside the bucket ('' for the bucket root) */
  s3Prefix: string;
  /** Upload objects with the public-read ACL */
  makePublic: boolean;
}

/**
 * Input for the full nine-step pipeline
 */
export interface PipelineRequest extends BuildRequest {
  /** Domain the site is published under, e.g. example.com */
  domain: string;
  /** Maximum wait for ACM to issue the certificate */
  certificateTimeoutMs: number;
  /** Maximum wait for CloudFront to report the distribution as Deployed */
  distributionTimeoutMs: number;
}

export interface PipelineResult {
  url: string;
  distributionId: string;
  distributionDomain: string;
  certificateArn: string;
}

export interface UploadSummary {
  fileCount: number;
  keys: string[];
}

export interface LocalCopySummary {
  /** Absolute path the output was copied to */
  destination: string;
  fileCount: number;
}

/**
 * DNS validation CNAME requested by ACM
 */
export interface ValidationRecord {
  name: string;
  value: string;
}

export interface DistributionInfo {
  id: string;
  domain: string;
}

/**
 * ACM certificate lifecycle states
 */
export type CertificateStatus =
  | 'PENDING_VALIDATION'
  | 'ISSUED'
  | 'INACTIVE'
  | 'EXPIRED'
  | 'VALIDATION_TIMED_OUT'
  | 'REVOKED'
  | 'FAILED';

export interface CertificateStatusReport {
  /** Raw status reported by ACM */
  status: string;
  failureReason?: string;
}

export interface CertificateSummary {
  arn: string;
  domain: string;
  status: string;
}

/**
 * Record change written to a Route53 hosted zone
 */
export type DnsRecordChange =
  | { type: 'CNAME'; name: string; value: string; ttl: number }
  | { type: 'A'; name: string; aliasTarget: { dnsName: string; hostedZoneId: string } };

export type PipelineErrorKind =
  | 'InstallFailed'
  | 'BuildFailed'
  | 'LocalCopyFailed'
  | 'UploadFailed'
  | 'CertificateRequestFailed'
  | 'ValidationRecordsUnavailable'
  | 'CertificateIssuanceFailed'
  | 'CertificateIssuanceTimedOut'
  | 'DnsWriteFailed'
  | 'DistributionCreateFailed'
  | 'DistributionDeployFailed'
  | 'DistributionDeployTimedOut';

/**
 * Outcome of a polling wait. A wait never reports ready after its deadline.
 */
export type WaitOutcome<T> =
  | { status: 'ready'; value: T; elapsedMs: number }
  | { status: 'timedOut'; elapsedMs: number }
  | { status: 'failed'; reason: string; elapsedMs: number };
