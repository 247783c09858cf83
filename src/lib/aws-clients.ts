/**
 * AWS SDK client construction from immutable settings
 *
 * Nothing here reads the environment; the CLI resolves region, profile and
 * credentials once and passes them in.
 */

import { ACMClient } from '@aws-sdk/client-acm';
import { CloudFrontClient } from '@aws-sdk/client-cloudfront';
import { S3Client } from '@aws-sdk/client-s3';
import { Route53Client } from '@aws-sdk/client-route-53';
import { Route53DomainsClient } from '@aws-sdk/client-route-53-domains';
import { GLOBAL_SERVICES_REGION } from './constants.js';
import type { AwsCredentials, AwsSettings } from '../types.js';

interface ClientConfig {
  region: string;
  profile?: string;
  credentials?: AwsCredentials;
}

export function clientConfig(settings: AwsSettings, region: string = settings.region): ClientConfig {
  const config: ClientConfig = { region };
  if (settings.credentials) {
    config.credentials = settings.credentials;
  } else if (settings.profile) {
    config.profile = settings.profile;
  }
  return config;
}

export interface AwsClients {
  s3: S3Client;
  acm: ACMClient;
  cloudfront: CloudFrontClient;
  route53: Route53Client;
}

/**
 * Clients for the deploy pipeline. ACM and CloudFront are pinned to us-east-1
 * (certificates used by CloudFront must live there).
 */
export function createAwsClients(settings: AwsSettings): AwsClients {
  return {
    s3: new S3Client(clientConfig(settings)),
    acm: new ACMClient(clientConfig(settings, GLOBAL_SERVICES_REGION)),
    cloudfront: new CloudFrontClient(clientConfig(settings, GLOBAL_SERVICES_REGION)),
    route53: new Route53Client(clientConfig(settings)),
  };
}

export function createDomainsClient(settings: AwsSettings): Route53DomainsClient {
  return new Route53DomainsClient(clientConfig(settings, GLOBAL_SERVICES_REGION));
}
