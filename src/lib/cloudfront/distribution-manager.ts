/**
 * CloudFront distribution manager
 *
 * Creates a distribution in front of an S3 static-website endpoint and reads
 * its deployment status.
 */

import {
  CloudFrontClient,
  CreateDistributionCommand,
  GetDistributionCommand,
  type CreateDistributionCommandInput,
  type CreateDistributionCommandOutput,
  type DistributionConfig,
  type GetDistributionCommandInput,
  type GetDistributionCommandOutput,
} from '@aws-sdk/client-cloudfront';
import { StepFailure, formatError } from '../errors.js';
import { retryWithBackoff, type RetryOptions } from '../aws-retry.js';
import { CACHING_OPTIMIZED_POLICY_ID } from '../constants.js';
import { wwwDomain } from '../domain-utils.js';
import { createSilentLogger, type StructuredLogger } from '../../monitoring/structured-logger.js';
import type { ICdnManager } from '../interfaces.js';
import type { DistributionInfo } from '../../types.js';

/**
 * The CloudFront calls the manager makes
 */
export interface CloudFrontApi {
  createDistribution(input: CreateDistributionCommandInput): Promise<CreateDistributionCommandOutput>;
  getDistribution(input: GetDistributionCommandInput): Promise<GetDistributionCommandOutput>;
}

export function createCloudFrontApi(client: CloudFrontClient): CloudFrontApi {
  return {
    createDistribution: input => client.send(new CreateDistributionCommand(input)),
    getDistribution: input => client.send(new GetDistributionCommand(input)),
  };
}

/**
 * S3 static-website hostname for a bucket (HTTP only; CloudFront terminates TLS)
 */
export function websiteEndpoint(bucket: string, region: string): string {
  return `${bucket}.s3-website-${region}.amazonaws.com`;
}

/**
 * CloudFront origin path for an S3 key prefix ('' serves the bucket root)
 */
export function toOriginPath(prefix: string): string {
  const clean = prefix.replace(/^\/+|\/+$/g, '');
  return clean ? `/${clean}` : '';
}

export interface DistributionConfigInput {
  bucket: string;
  region: string;
  domain: string;
  certificateArn?: string;
  /** Key prefix the site was uploaded under */
  prefix?: string;
  callerReference: string;
}

/**
 * Distribution settings for a static site
 *
 * With a certificate the apex and www hostnames are served over HTTPS (SNI)
 * and HTTP redirects. Without one the distribution keeps CloudFront's default
 * certificate and hostname and accepts both protocols.
 */
export function buildDistributionConfig(input: DistributionConfigInput): DistributionConfig {
  const originId = `s3-website-${input.bucket}`;
  const aliases = input.certificateArn ? [input.domain, wwwDomain(input.domain)] : [];

  return {
    CallerReference: input.callerReference,
    Comment: `Static site for ${input.domain}`,
    Enabled: true,
    DefaultRootObject: 'index.html',
    Aliases: {
      Quantity: aliases.length,
      Items: aliases,
    },
    Origins: {
      Quantity: 1,
      Items: [
        {
          Id: originId,
          DomainName: websiteEndpoint(input.bucket, input.region),
          OriginPath: toOriginPath(input.prefix ?? ''),
          CustomOriginConfig: {
            HTTPPort: 80,
            HTTPSPort: 443,
            // Website endpoints do not speak HTTPS
            OriginProtocolPolicy: 'http-only',
          },
        },
      ],
    },
    DefaultCacheBehavior: {
      TargetOriginId: originId,
      ViewerProtocolPolicy: input.certificateArn ? 'redirect-to-https' : 'allow-all',
      CachePolicyId: CACHING_OPTIMIZED_POLICY_ID,
      Compress: true,
      AllowedMethods: {
        Quantity: 2,
        Items: ['GET', 'HEAD'],
        CachedMethods: {
          Quantity: 2,
          Items: ['GET', 'HEAD'],
        },
      },
    },
    ViewerCertificate: input.certificateArn
      ? {
          ACMCertificateArn: input.certificateArn,
          SSLSupportMethod: 'sni-only',
          MinimumProtocolVersion: 'TLSv1.2_2021',
        }
      : {
          CloudFrontDefaultCertificate: true,
        },
  };
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

export interface DistributionManagerOptions {
  logger?: StructuredLogger;
  retry?: RetryOptions;
  /** Unique per create call; CloudFront rejects a reused reference with a different config */
  callerReference?: (domain: string) => string;
}

export class CloudFrontManager implements ICdnManager {
  private readonly logger: StructuredLogger;
  private readonly retry: RetryOptions;
  private readonly callerReference: (domain: string) => string;

  constructor(
    private readonly api: CloudFrontApi,
    private readonly bucketRegion: string,
    options: DistributionManagerOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.retry = options.retry ?? {};
    this.callerReference = options.callerReference ?? (domain => `sitelaunch-${domain}-${Date.now()}`);
  }

  async createDistribution(
    bucket: string,
    domain: string,
    certificateArn?: string,
    prefix = ''
  ): Promise<DistributionInfo> {
    const config = buildDistributionConfig({
      bucket,
      region: this.bucketRegion,
      domain,
      certificateArn,
      prefix,
      callerReference: this.callerReference(domain),
    });

    let response: CreateDistributionCommandOutput;
    try {
      response = await this.api.createDistribution({ DistributionConfig: config });
    } catch (error) {
      if (errorName(error) === 'CNAMEAlreadyExists') {
        throw new StepFailure(
          'DistributionCreateFailed',
          `${domain} is already an alias of another CloudFront distribution; remove it there or deploy under a different domain`
        );
      }
      throw new StepFailure('DistributionCreateFailed', `Failed to create distribution for ${domain}: ${formatError(error)}`);
    }

    const distribution = response.Distribution;
    if (!distribution?.Id || !distribution.DomainName) {
      throw new StepFailure('DistributionCreateFailed', `CloudFront returned no distribution id for ${domain}`);
    }

    this.logger.info('Created distribution', { distributionId: distribution.Id, domain: distribution.DomainName });
    return { id: distribution.Id, domain: distribution.DomainName };
  }

  async describeStatus(distributionId: string): Promise<string> {
    const response = await retryWithBackoff(
      () => this.api.getDistribution({ Id: distributionId }),
      this.retry
    );
    const status = response.Distribution?.Status;
    if (!status) {
      throw new Error(`Distribution ${distributionId} has no status`);
    }
    return status;
  }
}
