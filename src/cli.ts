#!/usr/bin/env node
/**
 * sitelaunch CLI Entry Point
 * Static site deployment to S3 behind CloudFront with an ACM certificate
 */

import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { handleCdnCommand } from './cli/commands/cdn.js';
import { handleDeployCommand } from './cli/commands/deploy.js';
import { handleDomainCommand } from './cli/commands/domain.js';
import { getFlag, hasFlag } from './cli/utils/args.js';
import {
  loadConfigFile,
  printValidationResult,
  resolveLogFormat,
  resolveLogLevel,
  resolveSettings,
} from './cli/utils/config-validator.js';
import { ConfigurationError, PipelineError, formatError } from './lib/errors.js';
import { StructuredLogger } from './monitoring/structured-logger.js';

const args = process.argv.slice(2);
const command = args[0];

function readVersion(): string {
  // One level up from dist/ (or src/ under tsx)
  try {
    const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), '../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch {
    return 'unknown';
  }
  return 'unknown';
}

async function cli(): Promise<void> {
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    printHelpMessage();
    return;
  }

  if (command === '--version' || command === '-v') {
    console.log(`sitelaunch ${readVersion()}`);
    return;
  }

  const cwd = process.cwd();
  const verbose = hasFlag(args, 'verbose');
  const loaded = loadConfigFile(cwd);
  if (loaded.warnings.length > 0) {
    printValidationResult(loaded);
  }

  const logger = new StructuredLogger({
    minLevel: resolveLogLevel(process.env, loaded.config, verbose),
    format: resolveLogFormat(process.env, loaded.config, getFlag(args, 'log-format')),
    version: readVersion(),
  });
  const settings = resolveSettings(loaded.config, process.env, {
    region: getFlag(args, 'region'),
    profile: getFlag(args, 'profile'),
  });
  logger.debug('Resolved AWS settings', {
    region: settings.region,
    profile: settings.profile,
    staticCredentials: settings.credentials !== undefined,
  });

  switch (command) {
    case 'deploy':
      await handleDeployCommand(args.slice(1), { cwd, settings, fileConfig: loaded.config, logger });
      return;

    case 'domain':
      await handleDomainCommand(args.slice(1), { settings, logger });
      return;

    case 'cdn':
      await handleCdnCommand(args.slice(1), { settings, logger });
      return;

    default:
      throw new ConfigurationError(`Unknown command: ${command}. Run: sitelaunch --help`);
  }
}

cli().catch((error: unknown) => {
  if (error instanceof PipelineError) {
    console.error(chalk.red(`\n❌ ${error.message}`));
  } else if (error instanceof ConfigurationError) {
    console.error(chalk.red(`\n❌ ${error.message}`));
    error.validationErrors?.forEach(issue => console.error(chalk.red(`   • ${issue}`)));
  } else {
    console.error(chalk.red('\n❌ Fatal error:'));
    console.error(chalk.red(formatError(error)));
  }
  process.exit(1);
});

function printHelpMessage(): void {
  console.log(chalk.bold.cyan('\n🚀 sitelaunch: static sites on S3 + CloudFront\n'));

  console.log(chalk.bold('USAGE'));
  console.log('  sitelaunch <command> [options]\n');

  console.log(chalk.bold('COMMANDS'));
  console.log(chalk.green('  deploy') + '              Build and upload; with --domain, publish behind CloudFront;');
  console.log('                      with --output, copy the build to a local directory');
  console.log('    --app-dir <path>              Application directory (default: .)');
  console.log('    --install                     Install dependencies first');
  console.log('    --build-cmd <cmd>             Build command (default: <package manager> run build)');
  console.log('    --s3-bucket <name>            Target bucket');
  console.log('    --s3-prefix <path>            Key prefix inside the bucket (and CloudFront origin path)');
  console.log('    --public                      Upload objects publicly readable');
  console.log('    --domain <domain>             Run the full pipeline for this domain');
  console.log('    --cert-timeout <minutes>      Certificate wait (default: 30)');
  console.log('    --distribution-timeout <min>  Distribution wait (default: 30)');
  console.log('    --output <dir>                Copy the build here instead of uploading');
  console.log('    --no-clean                    Keep existing files in the output directory');
  console.log('    --timestamp                   Append _YYYYMMDD_HHMMSS to the output directory\n');

  console.log(chalk.green('  cdn create') + '          CloudFront distribution for an uploaded bucket');
  console.log('    --bucket <name>               Origin bucket');
  console.log('    --domain <domain>             Site domain');
  console.log('    --s3-prefix <path>            Origin path inside the bucket');
  console.log('    --certificate-arn <arn>       ACM certificate (us-east-1) for HTTPS on the domain\n');

  console.log(chalk.green('  domain check <domain>[,...]') + '     Availability; similar names for a single domain');
  console.log(chalk.green('  domain list') + '                     Domains registered to the account');
  console.log(chalk.green('  domain info <domain>') + '            Registration details');
  console.log(chalk.green('  domain setup-dns <domain>') + '       Point the hosted zone at a distribution');
  console.log('    --cdn-domain <host>           CloudFront domain, e.g. d111abcdef8.cloudfront.net');
  console.log(chalk.green('  domain register <domain>') + '        Register a domain through Route53');
  console.log('    --contact <file.json>         Registrant contact details');
  console.log('    --years <n>                   Registration period (default: 1)');
  console.log('    --yes                         Skip the confirmation\n');

  console.log(chalk.bold('GLOBAL OPTIONS'));
  console.log('  --region <region>               AWS region for S3 and Route53 (default: AWS_REGION or us-east-1)');
  console.log('  --profile <name>                AWS profile (default: AWS_PROFILE)');
  console.log('  --verbose                       Debug logging');
  console.log('  --log-format <pretty|json>      Log line format (default: LOG_FORMAT or pretty)');
  console.log('  --help, --version\n');

  console.log(chalk.bold('CONFIGURATION'));
  console.log(chalk.gray('  Defaults for every deploy flag can live in .sitelaunch.json in the working directory.\n'));
}
