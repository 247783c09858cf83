/**
 * Interface definitions for the pipeline's external collaborators
 *
 * Each is a thin wrapper around one cloud SDK or the local toolchain. The
 * pipeline depends only on these, so tests can substitute fakes.
 */

import type {
  CertificateStatusReport,
  CertificateSummary,
  DistributionInfo,
  DnsRecordChange,
  LocalCopySummary,
  UploadSummary,
  ValidationRecord,
} from '../types.js';
import type { RegistrationFile } from './route53/domain-registrar.js';

/**
 * Local dependency install and build
 */
export interface IBuildRunner {
  /**
   * Install dependencies with the detected package manager
   */
  install(appDir: string): Promise<void>;

  /**
   * Run the build and return the absolute path of the output directory
   */
  build(appDir: string, command?: string): Promise<string>;
}

/**
 * Object storage upload
 */
export interface IStorageUploader {
  /**
   * Upload every file under `sourceDir`, keyed by prefix + relative path
   */
  upload(sourceDir: string, bucket: string, prefix: string, makePublic: boolean): Promise<UploadSummary>;
}

export interface LocalCopyOptions {
  /** Remove an existing destination first */
  clean: boolean;
  /** Suffix the destination folder with the current time */
  timestamp: boolean;
}

/**
 * Local directory target
 */
export interface ILocalPublisher {
  /**
   * Copy every file under `sourceDir` to `destination`
   */
  copyOutput(sourceDir: string, destination: string, options: LocalCopyOptions): Promise<LocalCopySummary>;
}

/**
 * Certificate authority (ACM)
 */
export interface ICertificateIssuer {
  requestCertificate(domain: string, includeWww: boolean): Promise<string>;

  /**
   * Validation CNAMEs for the certificate; empty until ACM has generated all of them
   */
  describeValidationRecords(certificateArn: string): Promise<ValidationRecord[]>;

  describeStatus(certificateArn: string): Promise<CertificateStatusReport>;

  /**
   * Issued or pending certificates whose primary domain is `domain`
   */
  findCertificates(domain: string): Promise<CertificateSummary[]>;
}

/**
 * Authoritative DNS zone (Route53)
 */
export interface IZoneWriter {
  /**
   * Id of the public hosted zone that is authoritative for `domain`
   */
  findZoneId(domain: string): Promise<string>;

  /**
   * Submit an UPSERT batch and return the change id without waiting for propagation
   */
  upsertRecords(zoneId: string, records: DnsRecordChange[]): Promise<string>;
}

/**
 * CDN (CloudFront)
 */
export interface ICdnManager {
  /**
   * Distribution over the bucket's website endpoint; `prefix` becomes the origin path
   */
  createDistribution(bucket: string, domain: string, certificateArn?: string, prefix?: string): Promise<DistributionInfo>;

  describeStatus(distributionId: string): Promise<string>;
}

export interface DomainAvailability {
  domain: string;
  available: boolean;
  status: string;
}

export interface OwnedDomain {
  domain: string;
  autoRenew: boolean;
  expiresAt?: Date;
}

export interface DomainDetails {
  domain: string;
  registrar?: string;
  createdAt?: Date;
  expiresAt?: Date;
  autoRenew: boolean;
  /** Registrant contact hidden from WHOIS */
  privacy: boolean;
  /** EPP status codes, e.g. clientTransferProhibited */
  statuses: string[];
  nameservers: string[];
}

/**
 * Domain registrar (Route53 Domains)
 */
export interface IDomainRegistrar {
  checkAvailability(domain: string): Promise<DomainAvailability>;

  getSuggestions(domain: string, count?: number): Promise<string[]>;

  /**
   * Submit a registration and return the registrar's operation id
   */
  register(domain: string, file: RegistrationFile, years?: number): Promise<string>;

  /**
   * Domains registered to the account
   */
  listDomains(): Promise<OwnedDomain[]>;

  getDomainDetails(domain: string): Promise<DomainDetails>;
}
