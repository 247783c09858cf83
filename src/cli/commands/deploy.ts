/**
 * Deploy Command
 *
 * With --output: install, build and copy to a local directory.
 * Without --domain: install, build and upload (steps 1-3).
 * With --domain: the full nine-step pipeline behind CloudFront and HTTPS.
 */

import chalk from 'chalk';
import { resolve } from 'path';
import { ConfigurationError, PipelineError } from '../../lib/errors.js';
import { normalizeDomain, validateDomain } from '../../lib/domain-utils.js';
import {
  DEFAULT_CERTIFICATE_TIMEOUT_MINUTES,
  DEFAULT_DISTRIBUTION_TIMEOUT_MINUTES,
} from '../../lib/constants.js';
import { DeploymentPipeline } from '../../deployment/pipeline.js';
import { createAwsServices } from '../../deployment/services.js';
import { BUILD_STEPS, LOCAL_STEPS, PIPELINE_STEPS, type PipelineServices } from '../../deployment/steps.js';
import {
  formatLocalSummary,
  formatPublishSummary,
  printDeploymentFailureSummary,
  printDeploymentSummary,
} from '../../deployment/deployment-printer.js';
import { SpinnerProgressListener } from '../utils/progress-listener.js';
import { getFlag, getPositiveNumberFlag, hasFlag } from '../utils/args.js';
import { isValidBucketName, type FileConfig } from '../utils/config-validator.js';
import type { StructuredLogger } from '../../monitoring/structured-logger.js';
import type { AwsSettings, BuildRequest, LocalDeployRequest, PipelineRequest, SourceRequest } from '../../types.js';

export type DeployPlan =
  | { mode: 'local'; request: LocalDeployRequest }
  | { mode: 'publish'; request: BuildRequest }
  | { mode: 'full'; request: PipelineRequest };

export interface DeployCommandContext {
  cwd: string;
  settings: AwsSettings;
  fileConfig: FileConfig;
  logger: StructuredLogger;
  /** Replaces the AWS-backed collaborators */
  services?: PipelineServices;
  /** No spinners */
  silent?: boolean;
}

const MINUTE_MS = 60_000;

/**
 * Turn flags and config file into a request
 *
 * `--output` selects the local target; a bucket from the config file does not
 * override it. Without `--output`, a bucket (flag or file) selects S3 and an
 * `output` from the file is the fallback.
 *
 * @throws {ConfigurationError} If no target is given or a value is invalid
 */
export function parseDeployArgs(args: string[], fileConfig: FileConfig, cwd: string): DeployPlan {
  const source: SourceRequest = {
    appDir: resolve(cwd, getFlag(args, 'app-dir') ?? fileConfig.appDir ?? '.'),
    buildCommand: getFlag(args, 'build-cmd') ?? fileConfig.buildCommand,
    install: hasFlag(args, 'install') || (fileConfig.install ?? false),
  };

  const outputFlag = getFlag(args, 'output');
  const bucketFlag = getFlag(args, 's3-bucket');
  if (outputFlag !== undefined && (bucketFlag !== undefined || getFlag(args, 'domain') !== undefined)) {
    throw new ConfigurationError('--output deploys locally; it cannot be combined with --s3-bucket or --domain');
  }

  const bucketName = bucketFlag ?? fileConfig.bucket;
  const output = outputFlag ?? (bucketName ? undefined : fileConfig.output);
  if (output !== undefined) {
    return {
      mode: 'local',
      request: {
        ...source,
        destination: resolve(cwd, output),
        clean: !hasFlag(args, 'no-clean'),
        timestamp: hasFlag(args, 'timestamp'),
      },
    };
  }

  if (!bucketName) {
    throw new ConfigurationError(
      'Missing deploy target: pass --s3-bucket or --output, or set "bucket" or "output" in .sitelaunch.json'
    );
  }
  if (!isValidBucketName(bucketName)) {
    throw new ConfigurationError(`Invalid S3 bucket name: ${bucketName}`);
  }

  const build: BuildRequest = {
    ...source,
    bucketName,
    s3Prefix: getFlag(args, 's3-prefix') ?? fileConfig.prefix ?? '',
    makePublic: hasFlag(args, 'public') || (fileConfig.public ?? false),
  };

  const domainInput = getFlag(args, 'domain') ?? fileConfig.domain;
  if (!domainInput) {
    return { mode: 'publish', request: build };
  }

  const domain = normalizeDomain(domainInput);
  try {
    validateDomain(domain);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }

  const certificateMinutes =
    getPositiveNumberFlag(args, 'cert-timeout') ??
    fileConfig.certificateTimeoutMinutes ??
    DEFAULT_CERTIFICATE_TIMEOUT_MINUTES;
  const distributionMinutes =
    getPositiveNumberFlag(args, 'distribution-timeout') ??
    fileConfig.distributionTimeoutMinutes ??
    DEFAULT_DISTRIBUTION_TIMEOUT_MINUTES;

  return {
    mode: 'full',
    request: {
      ...build,
      domain,
      certificateTimeoutMs: certificateMinutes * MINUTE_MS,
      distributionTimeoutMs: distributionMinutes * MINUTE_MS,
    },
  };
}

function describeTarget(plan: DeployPlan): string {
  switch (plan.mode) {
    case 'full':
      return plan.request.domain;
    case 'publish':
      return `s3://${plan.request.bucketName}`;
    case 'local':
      return plan.request.destination;
  }
}

/**
 * @throws {PipelineError} After printing the failure summary
 */
export async function handleDeployCommand(args: string[], context: DeployCommandContext): Promise<void> {
  const plan = parseDeployArgs(args, context.fileConfig, context.cwd);
  const steps = plan.mode === 'full' ? PIPELINE_STEPS : plan.mode === 'publish' ? BUILD_STEPS : LOCAL_STEPS;

  console.log(chalk.bold.cyan(`\n🚀 Deploying ${plan.request.appDir} to ${describeTarget(plan)}`));
  console.log(
    chalk.gray(plan.mode === 'local' ? `   ${steps.length} steps\n` : `   ${steps.length} steps, region ${context.settings.region}\n`)
  );

  const listener = new SpinnerProgressListener(
    steps.map(s => s.title),
    { silent: context.silent }
  );
  const pipeline = new DeploymentPipeline(
    context.services ?? createAwsServices(context.settings, { logger: context.logger }),
    { logger: context.logger, listener }
  );

  try {
    if (plan.mode === 'full') {
      const result = await pipeline.run(plan.request);
      printDeploymentSummary(result, listener.timings());
    } else if (plan.mode === 'local') {
      const summary = await pipeline.deployLocal(plan.request);
      formatLocalSummary(summary).forEach(line => console.log(line));
    } else {
      const summary = await pipeline.publish(plan.request);
      formatPublishSummary(summary, plan.request.bucketName, plan.request.s3Prefix).forEach(line => console.log(line));
    }
  } catch (error) {
    if (error instanceof PipelineError) {
      printDeploymentFailureSummary(error, listener.timings());
    }
    throw error;
  }
}
