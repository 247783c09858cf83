/**
 * CDN Command
 *
 * `cdn create --bucket <name> --domain <domain>` puts a CloudFront
 * distribution in front of a bucket that was already published.
 */

import chalk from 'chalk';
import { ConfigurationError } from '../../lib/errors.js';
import { normalizeDomain, validateDomain } from '../../lib/domain-utils.js';
import { createAwsClients } from '../../lib/aws-clients.js';
import { CloudFrontManager, createCloudFrontApi, toOriginPath } from '../../lib/cloudfront/distribution-manager.js';
import { getFlag, positionals } from '../utils/args.js';
import { isValidBucketName } from '../utils/config-validator.js';
import type { ICdnManager } from '../../lib/interfaces.js';
import type { StructuredLogger } from '../../monitoring/structured-logger.js';
import type { AwsSettings } from '../../types.js';

export interface CdnCommandContext {
  settings: AwsSettings;
  logger: StructuredLogger;
  /** Replaces the CloudFront manager */
  cdn?: ICdnManager;
}

export interface CdnCreateRequest {
  bucket: string;
  domain: string;
  prefix: string;
  certificateArn?: string;
}

const VALUE_FLAGS = ['bucket', 'domain', 's3-prefix', 'certificate-arn', 'region', 'profile', 'log-format'];

export function parseCdnCreateArgs(args: string[]): CdnCreateRequest {
  const bucket = getFlag(args, 'bucket');
  if (!bucket) {
    throw new ConfigurationError('Missing --bucket <name>. Usage: sitelaunch cdn create --bucket <name> --domain <domain>');
  }
  if (!isValidBucketName(bucket)) {
    throw new ConfigurationError(`Invalid S3 bucket name: ${bucket}`);
  }

  const domainInput = getFlag(args, 'domain');
  if (!domainInput) {
    throw new ConfigurationError('Missing --domain <domain>. Usage: sitelaunch cdn create --bucket <name> --domain <domain>');
  }
  const domain = normalizeDomain(domainInput);
  try {
    validateDomain(domain);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  return {
    bucket,
    domain,
    prefix: getFlag(args, 's3-prefix') ?? '',
    certificateArn: getFlag(args, 'certificate-arn'),
  };
}

async function createCdn(request: CdnCreateRequest, cdn: ICdnManager): Promise<void> {
  const distribution = await cdn.createDistribution(
    request.bucket,
    request.domain,
    request.certificateArn,
    request.prefix
  );
  const origin = `${request.bucket}${toOriginPath(request.prefix)}`;

  console.log(chalk.green(`\n✅ Distribution ${distribution.id} created for ${origin}`));
  console.log(chalk.gray(`   CloudFront domain: ${distribution.domain}`));
  if (!request.certificateArn) {
    console.log(chalk.gray(`   No certificate given: served on ${distribution.domain} only`));
  }
  console.log(chalk.bold('\nNext step:'));
  console.log(`  sitelaunch domain setup-dns ${request.domain} --cdn-domain ${distribution.domain}`);
}

export async function handleCdnCommand(args: string[], context: CdnCommandContext): Promise<void> {
  const [subcommand]: (string | undefined)[] = positionals(args, VALUE_FLAGS);

  switch (subcommand) {
    case 'create': {
      const request = parseCdnCreateArgs(args);
      const cdn =
        context.cdn ??
        new CloudFrontManager(createCloudFrontApi(createAwsClients(context.settings).cloudfront), context.settings.region, {
          logger: context.logger,
        });
      await createCdn(request, cdn);
      return;
    }
    default:
      throw new ConfigurationError(`Unknown cdn subcommand: ${subcommand ?? '(none)'}. Use "cdn create"`);
  }
}
