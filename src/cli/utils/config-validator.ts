/**
 * Configuration loading, validation and resolution
 *
 * Sources, highest precedence first: command-line flags, environment,
 * `.sitelaunch.json` in the working directory, built-in defaults.
 */

import chalk from 'chalk';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../../lib/errors.js';
import { DEFAULT_REGION } from '../../lib/constants.js';
import { isValidDomain, normalizeDomain } from '../../lib/domain-utils.js';
import type { LogFormat, LogLevel } from '../../monitoring/structured-logger.js';
import type { AwsSettings } from '../../types.js';

export const CONFIG_FILE_NAME = '.sitelaunch.json';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
const LogFormatSchema = z.enum(['pretty', 'json']);

/** S3 bucket naming rules, minus the IP-address form */
const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

export function isValidBucketName(name: string): boolean {
  return BUCKET_NAME_PATTERN.test(name);
}

export const fileConfigSchema = z
  .object({
    appDir: z.string().min(1).optional(),
    install: z.boolean().optional(),
    buildCommand: z.string().min(1).optional(),
    bucket: z.string().regex(BUCKET_NAME_PATTERN, 'must be a valid S3 bucket name').optional(),
    prefix: z.string().optional(),
    output: z.string().min(1).optional(),
    public: z.boolean().optional(),
    domain: z
      .string()
      .transform(normalizeDomain)
      .refine(isValidDomain, 'must be a valid domain name')
      .optional(),
    certificateTimeoutMinutes: z.number().positive().optional(),
    distributionTimeoutMinutes: z.number().positive().optional(),
    aws: z
      .object({
        region: z.string().min(1).optional(),
        profile: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    logLevel: LogLevelSchema.optional(),
    logFormat: LogFormatSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config?: FileConfig;
}

/**
 * Validate configuration structure
 */
export function validateConfig(raw: unknown): ValidationResult {
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
      warnings: [],
    };
  }

  const config = parsed.data;
  const warnings: string[] = [];
  if (config.domain && config.public === false) {
    warnings.push('public: false is ignored when deploying under a domain (the S3 website endpoint needs public objects)');
  }

  return { valid: true, errors: [], warnings, config };
}

/**
 * Read and validate `.sitelaunch.json` from `cwd`; an absent file is an empty config
 *
 * @throws {ConfigurationError} If the file is not JSON or fails validation
 */
export function loadConfigFile(cwd: string): ValidationResult & { config: FileConfig } {
  const configPath = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return { valid: true, errors: [], warnings: [], config: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not parse ${CONFIG_FILE_NAME}: ${reason}`, configPath);
  }

  const result = validateConfig(raw);
  if (!result.valid || !result.config) {
    throw new ConfigurationError(`Invalid configuration in ${CONFIG_FILE_NAME}`, configPath, result.errors);
  }
  return { ...result, config: result.config };
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * AWS settings from flags, environment and config file
 *
 * @throws {ConfigurationError} If only half of a static key pair is set
 */
export function resolveSettings(
  fileConfig: FileConfig,
  env: Environment,
  flags: { region?: string; profile?: string } = {}
): AwsSettings {
  const region = flags.region ?? env.AWS_REGION ?? fileConfig.aws?.region ?? DEFAULT_REGION;
  const profile = flags.profile ?? env.AWS_PROFILE ?? fileConfig.aws?.profile;

  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
  if (Boolean(accessKeyId) !== Boolean(secretAccessKey)) {
    throw new ConfigurationError('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together');
  }

  // An explicit profile flag wins over static keys left in the environment
  if (accessKeyId && secretAccessKey && !flags.profile) {
    return {
      region,
      credentials: {
        accessKeyId,
        secretAccessKey,
        ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
      },
    };
  }
  return profile ? { region, profile } : { region };
}

/**
 * @throws {ConfigurationError} If LOG_LEVEL is not a known level
 */
export function resolveLogLevel(env: Environment, fileConfig: FileConfig, verbose: boolean): LogLevel {
  if (verbose) return 'debug';

  const fromEnv = env.LOG_LEVEL?.toLowerCase();
  if (fromEnv) {
    const parsed = LogLevelSchema.safeParse(fromEnv);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid LOG_LEVEL "${env.LOG_LEVEL}" (expected one of ${LogLevelSchema.options.join(', ')})`);
    }
    return parsed.data;
  }
  return fileConfig.logLevel ?? 'info';
}

/**
 * Log line format: `--log-format`, then LOG_FORMAT, then the config file
 *
 * @throws {ConfigurationError} If the chosen value is not pretty or json
 */
export function resolveLogFormat(env: Environment, fileConfig: FileConfig, flag?: string): LogFormat {
  const requested = flag ?? env.LOG_FORMAT;
  if (requested === undefined || requested === '') {
    return fileConfig.logFormat ?? 'pretty';
  }

  const parsed = LogFormatSchema.safeParse(requested.toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid log format "${requested}" (expected one of ${LogFormatSchema.options.join(', ')})`);
  }
  return parsed.data;
}

/**
 * Print validation result
 */
export function printValidationResult(result: ValidationResult): void {
  if (result.errors.length > 0) {
    console.log(chalk.red('\n❌ Configuration errors:'));
    for (const error of result.errors) {
      console.log(chalk.red(`   • ${error}`));
    }
  }

  if (result.warnings.length > 0) {
    console.log(chalk.yellow('\n⚠️  Configuration warnings:'));
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`   • ${warning}`));
    }
  }
}
