/**
 * Route53 Domains registrar
 *
 * Availability checks, suggestions, registration and the account's own
 * domains. The Route53 Domains API is only served from us-east-1.
 */

import {
  Route53DomainsClient,
  CheckDomainAvailabilityCommand,
  GetDomainDetailCommand,
  GetDomainSuggestionsCommand,
  ListDomainsCommand,
  RegisterDomainCommand,
  ContactType,
  CountryCode,
  type ContactDetail,
  type CheckDomainAvailabilityCommandInput,
  type CheckDomainAvailabilityCommandOutput,
  type GetDomainDetailCommandInput,
  type GetDomainDetailCommandOutput,
  type GetDomainSuggestionsCommandInput,
  type GetDomainSuggestionsCommandOutput,
  type ListDomainsCommandInput,
  type ListDomainsCommandOutput,
  type RegisterDomainCommandInput,
  type RegisterDomainCommandOutput,
} from '@aws-sdk/client-route-53-domains';
import { z } from 'zod';
import { DeploymentError, formatError } from '../errors.js';
import { retryWithBackoff, type RetryOptions } from '../aws-retry.js';
import { createSilentLogger, type StructuredLogger } from '../../monitoring/structured-logger.js';
import type { DomainAvailability, DomainDetails, IDomainRegistrar, OwnedDomain } from '../interfaces.js';

/**
 * The Route53 Domains calls the registrar makes
 */
export interface Route53DomainsApi {
  checkDomainAvailability(input: CheckDomainAvailabilityCommandInput): Promise<CheckDomainAvailabilityCommandOutput>;
  getDomainSuggestions(input: GetDomainSuggestionsCommandInput): Promise<GetDomainSuggestionsCommandOutput>;
  registerDomain(input: RegisterDomainCommandInput): Promise<RegisterDomainCommandOutput>;
  listDomains(input: ListDomainsCommandInput): Promise<ListDomainsCommandOutput>;
  getDomainDetail(input: GetDomainDetailCommandInput): Promise<GetDomainDetailCommandOutput>;
}

export function createRoute53DomainsApi(client: Route53DomainsClient): Route53DomainsApi {
  return {
    checkDomainAvailability: input => client.send(new CheckDomainAvailabilityCommand(input)),
    getDomainSuggestions: input => client.send(new GetDomainSuggestionsCommand(input)),
    registerDomain: input => client.send(new RegisterDomainCommand(input)),
    listDomains: input => client.send(new ListDomainsCommand(input)),
    getDomainDetail: input => client.send(new GetDomainDetailCommand(input)),
  };
}

const CONTACT_TYPES = new Set<string>(Object.values(ContactType));
const COUNTRY_CODES = new Set<string>(Object.values(CountryCode));

function isContactType(value: string): value is ContactType {
  return CONTACT_TYPES.has(value);
}

function isCountryCode(value: string): value is CountryCode {
  return COUNTRY_CODES.has(value);
}

/**
 * Registrant details as the registry requires them
 */
export const contactDetailSchema = z.object({
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  contactType: z.string().refine(isContactType, { message: `Must be one of ${[...CONTACT_TYPES].join(', ')}` }),
  organizationName: z.string().min(1).optional(),
  addressLine1: z.string().min(1),
  addressLine2: z.string().min(1).optional(),
  city: z.string().min(1),
  state: z.string().min(1).optional(),
  countryCode: z.string().refine(isCountryCode, { message: 'Must be an ISO 3166-1 alpha-2 country code' }),
  zipCode: z.string().min(1),
  phoneNumber: z.string().regex(/^\+\d{1,3}\.\d{4,14}$/, 'Must look like +1.5555551234'),
  email: z.string().email(),
});

export type ContactInfo = z.infer<typeof contactDetailSchema>;

/**
 * Contact file for `domain register`
 *
 * `registrant` is used for the admin and tech contacts unless those are given.
 */
export const registrationFileSchema = z.object({
  registrant: contactDetailSchema,
  admin: contactDetailSchema.optional(),
  tech: contactDetailSchema.optional(),
  privacy: z.boolean().default(true),
  autoRenew: z.boolean().default(true),
});

export type RegistrationFile = z.infer<typeof registrationFileSchema>;

export function toContactDetail(contact: ContactInfo): ContactDetail {
  return {
    FirstName: contact.firstName,
    LastName: contact.lastName,
    ContactType: contact.contactType,
    OrganizationName: contact.organizationName,
    AddressLine1: contact.addressLine1,
    AddressLine2: contact.addressLine2,
    City: contact.city,
    State: contact.state,
    CountryCode: contact.countryCode,
    ZipCode: contact.zipCode,
    PhoneNumber: contact.phoneNumber,
    Email: contact.email,
  };
}

export function buildRegistrationInput(domain: string, file: RegistrationFile, years: number): RegisterDomainCommandInput {
  const registrant = toContactDetail(file.registrant);
  return {
    DomainName: domain,
    DurationInYears: years,
    RegistrantContact: registrant,
    AdminContact: file.admin ? toContactDetail(file.admin) : registrant,
    TechContact: file.tech ? toContactDetail(file.tech) : registrant,
    PrivacyProtectRegistrantContact: file.privacy,
    PrivacyProtectAdminContact: file.privacy,
    PrivacyProtectTechContact: file.privacy,
    AutoRenew: file.autoRenew,
  };
}

export class Route53DomainRegistrar implements IDomainRegistrar {
  constructor(
    private readonly api: Route53DomainsApi,
    private readonly logger: StructuredLogger = createSilentLogger(),
    private readonly retry: RetryOptions = {}
  ) {}

  async checkAvailability(domain: string): Promise<DomainAvailability> {
    try {
      const response = await retryWithBackoff(
        () => this.api.checkDomainAvailability({ DomainName: domain }),
        this.retry
      );
      const status = response.Availability ?? 'UNKNOWN';
      this.logger.debug('Checked domain availability', { domain, status });
      return { domain, available: status === 'AVAILABLE', status };
    } catch (error) {
      throw new DeploymentError(`Failed to check availability of ${domain}: ${formatError(error)}`, 'DOMAIN_CHECK_FAILED', { domain });
    }
  }

  async getSuggestions(domain: string, count = 10): Promise<string[]> {
    try {
      const response = await retryWithBackoff(
        () => this.api.getDomainSuggestions({ DomainName: domain, SuggestionCount: count, OnlyAvailable: true }),
        this.retry
      );
      return (response.SuggestionsList ?? []).flatMap(s => (s.DomainName ? [s.DomainName] : []));
    } catch (error) {
      throw new DeploymentError(`Failed to get suggestions for ${domain}: ${formatError(error)}`, 'DOMAIN_CHECK_FAILED', { domain });
    }
  }

  /**
   * Every domain registered to the account, across pages
   */
  async listDomains(): Promise<OwnedDomain[]> {
    const domains: OwnedDomain[] = [];
    let marker: string | undefined;
    try {
      do {
        const current = marker;
        const page = await retryWithBackoff(() => this.api.listDomains({ Marker: current }), this.retry);
        for (const summary of page.Domains ?? []) {
          if (!summary.DomainName) continue;
          domains.push({ domain: summary.DomainName, autoRenew: summary.AutoRenew ?? false, expiresAt: summary.Expiry });
        }
        marker = page.NextPageMarker;
      } while (marker);
    } catch (error) {
      throw new DeploymentError(`Failed to list registered domains: ${formatError(error)}`, 'DOMAIN_LOOKUP_FAILED');
    }
    return domains;
  }

  async getDomainDetails(domain: string): Promise<DomainDetails> {
    let response: GetDomainDetailCommandOutput;
    try {
      response = await retryWithBackoff(() => this.api.getDomainDetail({ DomainName: domain }), this.retry);
    } catch (error) {
      throw new DeploymentError(`Failed to get details of ${domain}: ${formatError(error)}`, 'DOMAIN_LOOKUP_FAILED', { domain });
    }

    return {
      domain: response.DomainName ?? domain,
      registrar: response.RegistrarName,
      createdAt: response.CreationDate,
      expiresAt: response.ExpirationDate,
      autoRenew: response.AutoRenew ?? false,
      privacy: response.RegistrantPrivacy ?? false,
      statuses: response.StatusList ?? [],
      nameservers: (response.Nameservers ?? []).flatMap(ns => (ns.Name ? [ns.Name] : [])),
    };
  }

  /**
   * Submit a registration; returns the Route53 Domains operation id
   *
   * Registration is billed, so it is never retried.
   */
  async register(domain: string, file: RegistrationFile, years = 1): Promise<string> {
    let response: RegisterDomainCommandOutput;
    try {
      response = await this.api.registerDomain(buildRegistrationInput(domain, file, years));
    } catch (error) {
      throw new DeploymentError(`Failed to register ${domain}: ${formatError(error)}`, 'DOMAIN_REGISTRATION_FAILED', { domain });
    }
    if (!response.OperationId) {
      throw new DeploymentError(`Route53 Domains returned no operation id for ${domain}`, 'DOMAIN_REGISTRATION_FAILED', { domain });
    }
    this.logger.info('Submitted domain registration', { domain, years, operationId: response.OperationId });
    return response.OperationId;
  }
}
