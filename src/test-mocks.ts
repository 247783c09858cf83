/**
 * Test doubles for the pipeline's collaborators
 *
 * Each fake records its calls in a shared log so tests can assert on the
 * exact sequence of cloud operations.
 */

import type {
  IBuildRunner,
  ICdnManager,
  ICertificateIssuer,
  ILocalPublisher,
  IStorageUploader,
  LocalCopyOptions,
  IZoneWriter,
} from './lib/interfaces.js';
import type { Clock } from './lib/polling.js';
import type {
  CertificateStatusReport,
  CertificateSummary,
  DistributionInfo,
  DnsRecordChange,
  LocalCopySummary,
  UploadSummary,
  ValidationRecord,
} from './types.js';
import { StructuredLogger, type LogEntry } from './monitoring/structured-logger.js';
import { CertificateWaiter } from './certificates/certificate-waiter.js';
import { DistributionWaiter } from './lib/cloudfront/distribution-waiter.js';
import type { PipelineServices } from './deployment/steps.js';

/**
 * Clock whose sleep advances time instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export type CallLog = string[];

/**
 * Returns queued values in order, then keeps returning the last one
 */
function nextFrom<T>(queue: T[], index: number): T {
  return queue[Math.min(index, queue.length - 1)];
}

export class FakeBuildRunner implements IBuildRunner {
  buildError?: Error;
  installError?: Error;

  constructor(private readonly calls: CallLog, private readonly outputDir = '/work/site/out') {}

  async install(appDir: string): Promise<void> {
    this.calls.push(`install:${appDir}`);
    if (this.installError) throw this.installError;
  }

  async build(appDir: string, command?: string): Promise<string> {
    this.calls.push(`build:${appDir}:${command ?? 'default'}`);
    if (this.buildError) throw this.buildError;
    return this.outputDir;
  }
}

export class FakeLocalPublisher implements ILocalPublisher {
  copyError?: Error;

  constructor(private readonly calls: CallLog, private readonly fileCount = 2) {}

  async copyOutput(sourceDir: string, destination: string, options: LocalCopyOptions): Promise<LocalCopySummary> {
    const flags = [options.clean ? 'clean' : 'merge', ...(options.timestamp ? ['timestamp'] : [])];
    this.calls.push(`copy:${sourceDir}:${destination}:${flags.join('+')}`);
    if (this.copyError) throw this.copyError;
    return { destination, fileCount: this.fileCount };
  }
}

export class FakeUploader implements IStorageUploader {
  uploadError?: Error;

  constructor(private readonly calls: CallLog, private readonly keys = ['index.html', 'assets/app.js']) {}

  async upload(sourceDir: string, bucket: string, prefix: string, makePublic: boolean): Promise<UploadSummary> {
    this.calls.push(`upload:${sourceDir}:${bucket}:${prefix}:${makePublic ? 'public' : 'private'}`);
    if (this.uploadError) throw this.uploadError;
    const keys = this.keys.map(key => (prefix ? `${prefix}/${key}` : key));
    return { fileCount: keys.length, keys };
  }
}

export class FakeCertificateIssuer implements ICertificateIssuer {
  /** Status reports returned by successive describeStatus calls */
  statuses: CertificateStatusReport[] = [{ status: 'ISSUED' }];
  /** Record sets returned by successive describeValidationRecords calls */
  recordSets: ValidationRecord[][] = [[{ name: '_v.example.com.', value: '_t.acm-validations.aws.' }]];
  existing: CertificateSummary[] = [];
  requestError?: Error;
  private statusCalls = 0;
  private recordCalls = 0;

  constructor(private readonly calls: CallLog, private readonly arn = 'cert/demo') {}

  async requestCertificate(domain: string, includeWww: boolean): Promise<string> {
    this.calls.push(`requestCertificate:${domain}:${includeWww ? 'www' : 'apex'}`);
    if (this.requestError) throw this.requestError;
    return this.arn;
  }

  async describeValidationRecords(certificateArn: string): Promise<ValidationRecord[]> {
    this.calls.push(`describeValidationRecords:${certificateArn}`);
    return nextFrom(this.recordSets, this.recordCalls++);
  }

  async describeStatus(certificateArn: string): Promise<CertificateStatusReport> {
    this.calls.push(`describeCertificateStatus:${certificateArn}`);
    return nextFrom(this.statuses, this.statusCalls++);
  }

  async findCertificates(domain: string): Promise<CertificateSummary[]> {
    this.calls.push(`findCertificates:${domain}`);
    return this.existing;
  }
}

export class FakeZoneWriter implements IZoneWriter {
  readonly batches: DnsRecordChange[][] = [];
  upsertError?: Error;
  private changeCount = 0;

  constructor(private readonly calls: CallLog, private readonly zoneId = 'ZONE123') {}

  async findZoneId(domain: string): Promise<string> {
    this.calls.push(`findZoneId:${domain}`);
    return this.zoneId;
  }

  async upsertRecords(zoneId: string, records: DnsRecordChange[]): Promise<string> {
    this.calls.push(`upsertRecords:${zoneId}:${records.map(r => `${r.type} ${r.name}`).join(',')}`);
    if (this.upsertError) throw this.upsertError;
    this.batches.push(records);
    this.changeCount++;
    return `change-${this.changeCount}`;
  }
}

export class FakeCdnManager implements ICdnManager {
  /** Statuses returned by successive describeStatus calls */
  statuses: string[] = ['Deployed'];
  createError?: Error;
  private statusCalls = 0;

  constructor(
    private readonly calls: CallLog,
    private readonly distribution: DistributionInfo = { id: 'E1DEMO', domain: 'd111.cdn.example' }
  ) {}

  async createDistribution(
    bucket: string,
    domain: string,
    certificateArn?: string,
    prefix = ''
  ): Promise<DistributionInfo> {
    const origin = prefix ? `:${prefix}` : '';
    this.calls.push(`createDistribution:${bucket}:${domain}:${certificateArn ?? 'none'}${origin}`);
    if (this.createError) throw this.createError;
    return this.distribution;
  }

  async describeStatus(distributionId: string): Promise<string> {
    this.calls.push(`describeDistributionStatus:${distributionId}`);
    return nextFrom(this.statuses, this.statusCalls++);
  }
}

/**
 * Logger that keeps every entry in memory
 */
export function createRecordingLogger(): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ minLevel: 'debug', sink: entry => entries.push(entry) });
  return { logger, entries };
}

export interface FakeServices {
  services: PipelineServices;
  calls: CallLog;
  clock: FakeClock;
  builder: FakeBuildRunner;
  localPublisher: FakeLocalPublisher;
  uploader: FakeUploader;
  issuer: FakeCertificateIssuer;
  zones: FakeZoneWriter;
  cdn: FakeCdnManager;
}

/**
 * Pipeline services backed by fakes sharing one call log and one fake clock
 */
export function createFakeServices(): FakeServices {
  const calls: CallLog = [];
  const clock = new FakeClock();
  const builder = new FakeBuildRunner(calls);
  const localPublisher = new FakeLocalPublisher(calls);
  const uploader = new FakeUploader(calls);
  const issuer = new FakeCertificateIssuer(calls);
  const zones = new FakeZoneWriter(calls);
  const cdn = new FakeCdnManager(calls);

  return {
    services: {
      builder,
      localPublisher,
      uploader,
      certificates: issuer,
      certificateWaiter: new CertificateWaiter(issuer, { clock }),
      zones,
      cdn,
      distributionWaiter: new DistributionWaiter(cdn, { clock }),
    },
    calls,
    clock,
    builder,
    localPublisher,
    uploader,
    issuer,
    zones,
    cdn,
  };
}
