import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type {
  CertificateDetail,
  ListCertificatesCommandInput,
  RequestCertificateCommandInput,
} from '@aws-sdk/client-acm';
import { AcmCertificateIssuer, extractValidationRecords, type AcmApi } from './acm-issuer.js';
import { StepFailure } from '../lib/errors.js';

const CERT_ARN = 'arn:aws:acm:us-east-1:000000000000:certificate/test-cert';

function fakeAcm(overrides: Partial<AcmApi> = {}): AcmApi {
  return {
    async requestCertificate() {
      return { $metadata: {}, CertificateArn: CERT_ARN };
    },
    async describeCertificate() {
      return { $metadata: {}, Certificate: { CertificateArn: CERT_ARN, Status: 'PENDING_VALIDATION' } };
    },
    async listCertificates() {
      return { $metadata: {}, CertificateSummaryList: [] };
    },
    ...overrides,
  };
}

describe('extractValidationRecords', () => {
  it('returns one record per domain', () => {
    const detail: CertificateDetail = {
      DomainValidationOptions: [
        { DomainName: 'example.com', ResourceRecord: { Name: '_a.example.com.', Type: 'CNAME', Value: '_x.acm-validations.aws.' } },
        { DomainName: 'www.example.com', ResourceRecord: { Name: '_b.www.example.com.', Type: 'CNAME', Value: '_y.acm-validations.aws.' } },
      ],
    };

    assert.deepEqual(extractValidationRecords(detail), [
      { name: '_a.example.com.', value: '_x.acm-validations.aws.' },
      { name: '_b.www.example.com.', value: '_y.acm-validations.aws.' },
    ]);
  });

  it('returns nothing while any domain is still missing its record', () => {
    const detail: CertificateDetail = {
      DomainValidationOptions: [
        { DomainName: 'example.com', ResourceRecord: { Name: '_a.example.com.', Type: 'CNAME', Value: '_x.acm-validations.aws.' } },
        { DomainName: 'www.example.com' },
      ],
    };

    assert.deepEqual(extractValidationRecords(detail), []);
  });

  it('collapses records shared between domains', () => {
    const shared = { Name: '_a.example.com.', Type: 'CNAME' as const, Value: '_x.acm-validations.aws.' };
    const detail: CertificateDetail = {
      DomainValidationOptions: [
        { DomainName: 'example.com', ResourceRecord: shared },
        { DomainName: 'www.example.com', ResourceRecord: shared },
      ],
    };

    assert.equal(extractValidationRecords(detail).length, 1);
  });

  it('handles missing details', () => {
    assert.deepEqual(extractValidationRecords(undefined), []);
    assert.deepEqual(extractValidationRecords({}), []);
  });
});

describe('AcmCertificateIssuer', () => {
  it('requests a DNS-validated certificate for apex and www', async () => {
    const requests: RequestCertificateCommandInput[] = [];
    const issuer = new AcmCertificateIssuer(fakeAcm({
      async requestCertificate(input) {
        requests.push(input);
        return { $metadata: {}, CertificateArn: CERT_ARN };
      },
    }));

    const arn = await issuer.requestCertificate('example.com', true);

    assert.equal(arn, CERT_ARN);
    assert.deepEqual(requests, [{
      DomainName: 'example.com',
      SubjectAlternativeNames: ['example.com', 'www.example.com'],
      ValidationMethod: 'DNS',
    }]);
  });

  it('maps request errors to CertificateRequestFailed', async () => {
    const issuer = new AcmCertificateIssuer(fakeAcm({
      async requestCertificate() {
        throw Object.assign(new Error('Limit exceeded'), { name: 'LimitExceededException' });
      },
    }));

    await assert.rejects(issuer.requestCertificate('example.com', true), (error: unknown) => {
      assert.ok(error instanceof StepFailure);
      assert.equal(error.kind, 'CertificateRequestFailed');
      assert.equal(error.message, 'Failed to request certificate for example.com: Limit exceeded');
      return true;
    });
  });

  it('rejects a response without an ARN', async () => {
    const issuer = new AcmCertificateIssuer(fakeAcm({
      async requestCertificate() {
        return { $metadata: {} };
      },
    }));

    await assert.rejects(issuer.requestCertificate('example.com', false), { kind: 'CertificateRequestFailed' });
  });

  it('reports status with the failure reason', async () => {
    const issuer = new AcmCertificateIssuer(fakeAcm({
      async describeCertificate() {
        return { $metadata: {}, Certificate: { Status: 'FAILED', FailureReason: 'CAA_ERROR' } };
      },
    }));

    assert.deepEqual(await issuer.describeStatus(CERT_ARN), { status: 'FAILED', failureReason: 'CAA_ERROR' });
  });

  it('retries throttled status lookups', async () => {
    let calls = 0;
    const issuer = new AcmCertificateIssuer(
      fakeAcm({
        async describeCertificate() {
          calls++;
          if (calls < 3) {
            throw Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });
          }
          return { $metadata: {}, Certificate: { Status: 'ISSUED' } };
        },
      }),
      undefined,
      { sleep: async () => undefined }
    );

    assert.deepEqual(await issuer.describeStatus(CERT_ARN), { status: 'ISSUED' });
    assert.equal(calls, 3);
  });

  it('finds certificates for the domain across pages', async () => {
    const inputs: ListCertificatesCommandInput[] = [];
    const issuer = new AcmCertificateIssuer(fakeAcm({
      async listCertificates(input) {
        inputs.push(input);
        if (!input.NextToken) {
          return {
            $metadata: {},
            NextToken: 'page-2',
            CertificateSummaryList: [
              { CertificateArn: 'cert/other', DomainName: 'other.com', Status: 'ISSUED' },
            ],
          };
        }
        return {
          $metadata: {},
          CertificateSummaryList: [
            { CertificateArn: 'cert/demo', DomainName: 'example.com', Status: 'PENDING_VALIDATION' },
          ],
        };
      },
    }));

    const found = await issuer.findCertificates('example.com');

    assert.deepEqual(found, [{ arn: 'cert/demo', domain: 'example.com', status: 'PENDING_VALIDATION' }]);
    assert.deepEqual(inputs.map(i => i.NextToken), [undefined, 'page-2']);
  });
});
