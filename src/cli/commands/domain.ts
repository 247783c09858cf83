/**
 * Domain Command
 *
 * Registrar operations through Route53 Domains (`check`, `register`, `list`,
 * `info`) and `setup-dns`, which points a hosted zone at an existing
 * CloudFront distribution.
 */

import chalk from 'chalk';
import prompts from 'prompts';
import { readFileSync } from 'fs';
import { ConfigurationError } from '../../lib/errors.js';
import { isValidDomain, normalizeDomain, validateDomain } from '../../lib/domain-utils.js';
import { createAwsClients, createDomainsClient } from '../../lib/aws-clients.js';
import { createRoute53Api, Route53ZoneWriter, websiteRecordChanges } from '../../lib/route53/zone-writer.js';
import {
  createRoute53DomainsApi,
  registrationFileSchema,
  Route53DomainRegistrar,
  type RegistrationFile,
} from '../../lib/route53/domain-registrar.js';
import { getFlag, getPositiveNumberFlag, hasFlag, positionals } from '../utils/args.js';
import type { DomainDetails, IDomainRegistrar, IZoneWriter, OwnedDomain } from '../../lib/interfaces.js';
import type { StructuredLogger } from '../../monitoring/structured-logger.js';
import type { AwsSettings } from '../../types.js';

export interface DomainCommandContext {
  settings: AwsSettings;
  logger: StructuredLogger;
  /** Replaces the Route53 Domains registrar */
  registrar?: IDomainRegistrar;
  /** Replaces the Route53 hosted-zone writer */
  zones?: IZoneWriter;
  /** Replaces the interactive confirmation */
  confirm?: (message: string) => Promise<boolean>;
}

const SUGGESTION_COUNT = 5;
const MAX_REGISTRATION_YEARS = 10;
const VALUE_FLAGS = ['contact', 'years', 'cdn-domain', 'region', 'profile', 'log-format'];
const SUBCOMMANDS = '"domain check", "domain register", "domain list", "domain info" or "domain setup-dns"';

async function confirmWithPrompt(message: string): Promise<boolean> {
  const { proceed } = await prompts({ type: 'confirm', name: 'proceed', message, initial: false });
  return proceed === true;
}

function parseDomainArg(value: string | undefined, usage: string): string {
  if (!value) {
    throw new ConfigurationError(`Missing domain. Usage: ${usage}`);
  }
  const domain = normalizeDomain(value);
  try {
    validateDomain(domain);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
  return domain;
}

/**
 * Read and validate a contact file
 *
 * @throws {ConfigurationError} If the file is unreadable, not JSON, or incomplete
 */
export function loadRegistrationFile(path: string): RegistrationFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read contact file: ${reason}`, path);
  }

  const parsed = registrationFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid contact file',
      path,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function parseYears(args: string[]): number {
  const years = getPositiveNumberFlag(args, 'years') ?? 1;
  if (!Number.isInteger(years) || years > MAX_REGISTRATION_YEARS) {
    throw new ConfigurationError(`--years must be a whole number from 1 to ${MAX_REGISTRATION_YEARS}`);
  }
  return years;
}

function formatDate(date: Date | undefined): string {
  return date ? date.toISOString().slice(0, 10) : 'n/a';
}

export function formatOwnedDomains(domains: OwnedDomain[]): string[] {
  if (domains.length === 0) {
    return ['No domains are registered to this account'];
  }
  return [
    `Registered domains (${domains.length}):`,
    ...domains.map(
      d => `  ${d.domain.padEnd(40)} auto-renew: ${d.autoRenew ? 'on ' : 'off'}  expires: ${formatDate(d.expiresAt)}`
    ),
  ];
}

export function formatDomainDetails(details: DomainDetails): string[] {
  return [
    `Domain: ${details.domain}`,
    `  Registrar:   ${details.registrar ?? 'n/a'}`,
    `  Created:     ${formatDate(details.createdAt)}`,
    `  Expires:     ${formatDate(details.expiresAt)}`,
    `  Auto-renew:  ${details.autoRenew ? 'on' : 'off'}`,
    `  Privacy:     ${details.privacy ? 'on' : 'off'}`,
    `  Status:      ${details.statuses.length > 0 ? details.statuses.join(', ') : 'n/a'}`,
    `  Nameservers: ${details.nameservers.length > 0 ? details.nameservers.join(', ') : 'n/a'}`,
  ];
}

/**
 * Domains from `a.com,b.net` or several positionals, normalized and de-duplicated
 */
export function parseDomainList(values: string[], usage: string): string[] {
  const domains = values
    .flatMap(value => value.split(','))
    .map(value => value.trim())
    .filter(value => value !== '')
    .map(value => parseDomainArg(value, usage));
  if (domains.length === 0) {
    throw new ConfigurationError(`Missing domain. Usage: ${usage}`);
  }
  return [...new Set(domains)];
}

async function checkDomains(domains: string[], registrar: IDomainRegistrar): Promise<void> {
  console.log(chalk.bold(`\nAvailability of ${domains.length} domains:`));
  for (const domain of domains) {
    const availability = await registrar.checkAvailability(domain);
    const label = availability.available
      ? chalk.green('✅ available')
      : chalk.red(`❌ taken (${availability.status})`);
    console.log(`  ${domain.padEnd(40)} ${label}`);
  }
}

async function checkDomain(domain: string, registrar: IDomainRegistrar): Promise<void> {
  const availability = await registrar.checkAvailability(domain);

  if (!availability.available) {
    console.log(chalk.yellow(`\n⚠️  ${domain} is not available (${availability.status})`));
    return;
  }

  console.log(chalk.green(`\n✅ ${domain} is available`));
  const suggestions = await registrar.getSuggestions(domain, SUGGESTION_COUNT);
  if (suggestions.length > 0) {
    console.log(chalk.gray('\nSimilar available domains:'));
    suggestions.slice(0, SUGGESTION_COUNT).forEach(s => console.log(chalk.gray(`  • ${s}`)));
  }
}

async function registerDomain(
  domain: string,
  args: string[],
  registrar: IDomainRegistrar,
  confirm: (message: string) => Promise<boolean>
): Promise<void> {
  const contactPath = getFlag(args, 'contact');
  if (!contactPath) {
    throw new ConfigurationError('Missing --contact <file.json> for domain register');
  }
  const file = loadRegistrationFile(contactPath);
  const years = parseYears(args);

  const availability = await registrar.checkAvailability(domain);
  if (!availability.available) {
    throw new ConfigurationError(`${domain} is not available for registration (${availability.status})`);
  }

  if (!hasFlag(args, 'yes')) {
    const proceed = await confirm(
      `Register ${domain} for ${years} year${years === 1 ? '' : 's'}? This is billed to the AWS account.`
    );
    if (!proceed) {
      console.log(chalk.gray('Registration cancelled'));
      return;
    }
  }

  const operationId = await registrar.register(domain, file, years);
  console.log(chalk.green(`\n✅ Registration submitted for ${domain}`));
  console.log(chalk.gray(`   Operation: ${operationId}`));
  console.log(chalk.gray('   Route53 creates the hosted zone once the registration completes'));
}

/**
 * Apex alias A record and www CNAME pointing at a CloudFront hostname
 */
async function setupDns(domain: string, args: string[], zones: IZoneWriter): Promise<void> {
  const cdnInput = getFlag(args, 'cdn-domain');
  if (!cdnInput) {
    throw new ConfigurationError('Missing --cdn-domain <host>, e.g. --cdn-domain d111abcdef8.cloudfront.net');
  }
  const cdnDomain = normalizeDomain(cdnInput);
  if (!isValidDomain(cdnDomain)) {
    throw new ConfigurationError(`Invalid CloudFront domain: ${cdnInput}`);
  }

  const zoneId = await zones.findZoneId(domain);
  const changeId = await zones.upsertRecords(zoneId, websiteRecordChanges(domain, cdnDomain));

  console.log(chalk.green(`\n✅ ${domain} now points at ${cdnDomain}`));
  console.log(chalk.gray(`   Hosted zone: ${zoneId}`));
  console.log(chalk.gray(`   Change: ${changeId}`));
  console.log(chalk.gray('   The distribution must list the domain as an alternate name to serve it'));
}

export async function handleDomainCommand(args: string[], context: DomainCommandContext): Promise<void> {
  const [subcommand, ...rest]: (string | undefined)[] = positionals(args, VALUE_FLAGS);
  const domainArg = rest[0];
  const registrar =
    context.registrar ??
    new Route53DomainRegistrar(createRoute53DomainsApi(createDomainsClient(context.settings)), context.logger);

  switch (subcommand) {
    case 'check': {
      const domains = parseDomainList(
        rest.flatMap(value => (value === undefined ? [] : [value])),
        'sitelaunch domain check <domain>[,<domain>...]'
      );
      if (domains.length === 1) {
        await checkDomain(domains[0], registrar);
      } else {
        await checkDomains(domains, registrar);
      }
      return;
    }
    case 'register':
      await registerDomain(
        parseDomainArg(domainArg, 'sitelaunch domain register <domain> --contact <file.json>'),
        args,
        registrar,
        context.confirm ?? confirmWithPrompt
      );
      return;
    case 'list':
      formatOwnedDomains(await registrar.listDomains()).forEach(line => console.log(line));
      return;
    case 'info':
      formatDomainDetails(
        await registrar.getDomainDetails(parseDomainArg(domainArg, 'sitelaunch domain info <domain>'))
      ).forEach(line => console.log(line));
      return;
    case 'setup-dns':
      await setupDns(
        parseDomainArg(domainArg, 'sitelaunch domain setup-dns <domain> --cdn-domain <host>'),
        args,
        context.zones ??
          new Route53ZoneWriter(createRoute53Api(createAwsClients(context.settings).route53), context.logger)
      );
      return;
    default:
      throw new ConfigurationError(`Unknown domain subcommand: ${subcommand ?? '(none)'}. Use ${SUBCOMMANDS}`);
  }
}
