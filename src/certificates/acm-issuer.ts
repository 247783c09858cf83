/**
 * AWS ACM (AWS Certificate Manager) wrapper
 * Handles certificate requests, validation record lookup, and status checks
 *
 * CloudFront only accepts certificates from us-east-1, so the client passed in
 * must be bound to that region.
 */

import {
  ACMClient,
  RequestCertificateCommand,
  DescribeCertificateCommand,
  ListCertificatesCommand,
  type CertificateDetail,
  type RequestCertificateCommandInput,
  type RequestCertificateCommandOutput,
  type DescribeCertificateCommandInput,
  type DescribeCertificateCommandOutput,
  type ListCertificatesCommandInput,
  type ListCertificatesCommandOutput,
} from '@aws-sdk/client-acm';
import { StepFailure, formatError } from '../lib/errors.js';
import { retryWithBackoff, type RetryOptions } from '../lib/aws-retry.js';
import { wwwDomain } from '../lib/domain-utils.js';
import { createSilentLogger, type StructuredLogger } from '../monitoring/structured-logger.js';
import type { ICertificateIssuer } from '../lib/interfaces.js';
import type { CertificateStatusReport, CertificateSummary, ValidationRecord } from '../types.js';

/**
 * The ACM calls the issuer makes
 */
export interface AcmApi {
  requestCertificate(input: RequestCertificateCommandInput): Promise<RequestCertificateCommandOutput>;
  describeCertificate(input: DescribeCertificateCommandInput): Promise<DescribeCertificateCommandOutput>;
  listCertificates(input: ListCertificatesCommandInput): Promise<ListCertificatesCommandOutput>;
}

export function createAcmApi(client: ACMClient): AcmApi {
  return {
    requestCertificate: input => client.send(new RequestCertificateCommand(input)),
    describeCertificate: input => client.send(new DescribeCertificateCommand(input)),
    listCertificates: input => client.send(new ListCertificatesCommand(input)),
  };
}

/**
 * DNS validation records from certificate details
 *
 * ACM fills in the records asynchronously after the request. Until every
 * domain on the certificate has its record, the set is reported as empty so
 * callers never write a partial set.
 */
export function extractValidationRecords(detail: CertificateDetail | undefined): ValidationRecord[] {
  const options = detail?.DomainValidationOptions ?? [];
  if (options.length === 0) {
    return [];
  }

  const byName = new Map<string, ValidationRecord>();
  for (const option of options) {
    const record = option.ResourceRecord;
    if (!record?.Name || !record.Value) {
      return [];
    }
    // apex and www can share one record when ACM reuses a validation
    byName.set(record.Name, { name: record.Name, value: record.Value });
  }
  return [...byName.values()];
}

export class AcmCertificateIssuer implements ICertificateIssuer {
  constructor(
    private readonly api: AcmApi,
    private readonly logger: StructuredLogger = createSilentLogger(),
    private readonly retry: RetryOptions = {}
  ) {}

  async requestCertificate(domain: string, includeWww: boolean): Promise<string> {
    let response: RequestCertificateCommandOutput;
    try {
      response = await this.api.requestCertificate({
        DomainName: domain,
        SubjectAlternativeNames: includeWww ? [domain, wwwDomain(domain)] : [domain],
        ValidationMethod: 'DNS',
      });
    } catch (error) {
      throw new StepFailure('CertificateRequestFailed', `Failed to request certificate for ${domain}: ${formatError(error)}`);
    }

    if (!response.CertificateArn) {
      throw new StepFailure('CertificateRequestFailed', `ACM returned no certificate ARN for ${domain}`);
    }
    this.logger.info('Requested certificate', { domain, certificateArn: response.CertificateArn });
    return response.CertificateArn;
  }

  async describeValidationRecords(certificateArn: string): Promise<ValidationRecord[]> {
    const detail = await this.describe(certificateArn);
    return extractValidationRecords(detail);
  }

  async describeStatus(certificateArn: string): Promise<CertificateStatusReport> {
    const detail = await this.describe(certificateArn);
    if (!detail?.Status) {
      throw new Error(`Certificate ${certificateArn} has no status`);
    }
    return detail.FailureReason
      ? { status: detail.Status, failureReason: detail.FailureReason }
      : { status: detail.Status };
  }

  async findCertificates(domain: string): Promise<CertificateSummary[]> {
    const matches: CertificateSummary[] = [];
    let nextToken: string | undefined;

    do {
      const token = nextToken;
      const page = await retryWithBackoff(
        () => this.api.listCertificates({
          CertificateStatuses: ['ISSUED', 'PENDING_VALIDATION'],
          NextToken: token,
        }),
        this.retry
      );
      for (const summary of page.CertificateSummaryList ?? []) {
        if (summary.CertificateArn && summary.DomainName === domain) {
          matches.push({
            arn: summary.CertificateArn,
            domain: summary.DomainName,
            status: summary.Status ?? 'UNKNOWN',
          });
        }
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return matches;
  }

  private async describe(certificateArn: string): Promise<CertificateDetail | undefined> {
    const response = await retryWithBackoff(
      () => this.api.describeCertificate({ CertificateArn: certificateArn }),
      this.retry
    );
    return response.Certificate;
  }
}
