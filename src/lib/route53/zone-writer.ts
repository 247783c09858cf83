import {
  Route53Client,
  ListHostedZonesCommand,
  ChangeResourceRecordSetsCommand,
  type Change,
  type HostedZone,
  type ListHostedZonesCommandInput,
  type ListHostedZonesCommandOutput,
  type ChangeResourceRecordSetsCommandInput,
  type ChangeResourceRecordSetsCommandOutput,
} from '@aws-sdk/client-route-53';
import { StepFailure, formatError } from '../errors.js';
import { retryWithBackoff, type RetryOptions } from '../aws-retry.js';
import { isWithinZone, normalizeDomain, wwwDomain } from '../domain-utils.js';
import { CLOUDFRONT_HOSTED_ZONE_ID, VALIDATION_RECORD_TTL, WEBSITE_RECORD_TTL } from '../constants.js';
import { createSilentLogger, type StructuredLogger } from '../../monitoring/structured-logger.js';
import type { IZoneWriter } from '../interfaces.js';
import type { DnsRecordChange, ValidationRecord } from '../../types.js';

/**
 * The Route53 calls the zone writer makes
 */
export interface Route53Api {
  listHostedZones(input: ListHostedZonesCommandInput): Promise<ListHostedZonesCommandOutput>;
  changeResourceRecordSets(input: ChangeResourceRecordSetsCommandInput): Promise<ChangeResourceRecordSetsCommandOutput>;
}

export function createRoute53Api(client: Route53Client): Route53Api {
  return {
    listHostedZones: input => client.send(new ListHostedZonesCommand(input)),
    changeResourceRecordSets: input => client.send(new ChangeResourceRecordSetsCommand(input)),
  };
}

/**
 * Strips the "/hostedzone/" prefix Route53 puts on zone ids
 */
export function bareZoneId(id: string): string {
  return id.replace(/^\/hostedzone\//, '');
}

/**
 * The public zone authoritative for `domain`: among zones containing it, the
 * one with the longest name (so `app.example.com.` wins over `example.com.`)
 */
export function selectHostedZone(zones: HostedZone[], domain: string): HostedZone | undefined {
  let best: HostedZone | undefined;
  for (const zone of zones) {
    if (zone.Config?.PrivateZone || !zone.Name || !isWithinZone(domain, zone.Name)) {
      continue;
    }
    if (!best?.Name || normalizeDomain(zone.Name).length > normalizeDomain(best.Name).length) {
      best = zone;
    }
  }
  return best;
}

/**
 * CNAMEs ACM checks to validate domain ownership
 */
export function validationRecordChanges(records: ValidationRecord[]): DnsRecordChange[] {
  return records.map((record): DnsRecordChange => ({
    type: 'CNAME',
    name: record.name,
    value: record.value,
    ttl: VALIDATION_RECORD_TTL,
  }));
}

/**
 * Apex alias and www CNAME pointing the site at its distribution
 *
 * The apex cannot be a CNAME, so it uses an alias A record into CloudFront's
 * fixed hosted zone.
 */
export function websiteRecordChanges(domain: string, distributionDomain: string): DnsRecordChange[] {
  return [
    {
      type: 'A',
      name: domain,
      aliasTarget: { dnsName: distributionDomain, hostedZoneId: CLOUDFRONT_HOSTED_ZONE_ID },
    },
    {
      type: 'CNAME',
      name: wwwDomain(domain),
      value: distributionDomain,
      ttl: WEBSITE_RECORD_TTL,
    },
  ];
}

export function toUpsertChange(record: DnsRecordChange): Change {
  if (record.type === 'A') {
    return {
      Action: 'UPSERT',
      ResourceRecordSet: {
        Name: record.name,
        Type: 'A',
        AliasTarget: {
          DNSName: record.aliasTarget.dnsName,
          HostedZoneId: record.aliasTarget.hostedZoneId,
          EvaluateTargetHealth: false,
        },
      },
    };
  }
  return {
    Action: 'UPSERT',
    ResourceRecordSet: {
      Name: record.name,
      Type: 'CNAME',
      TTL: record.ttl,
      ResourceRecords: [{ Value: record.value }],
    },
  };
}

/**
 * Route53 zone writer
 *
 * All writes are UPSERTs, so writing the same records twice leaves the zone
 * unchanged. Changes are submitted without waiting for INSYNC.
 *
 * @example
 * ```typescript
 * const writer = new Route53ZoneWriter(createRoute53Api(new Route53Client({})));
 * const zoneId = await writer.findZoneId('example.com');
 * await writer.upsertRecords(zoneId, websiteRecordChanges('example.com', 'd111.cloudfront.net'));
 * ```
 */
export class Route53ZoneWriter implements IZoneWriter {
  constructor(
    private readonly api: Route53Api,
    private readonly logger: StructuredLogger = createSilentLogger(),
    private readonly retry: RetryOptions = {}
  ) {}

  async findZoneId(domain: string): Promise<string> {
    let zones: HostedZone[];
    try {
      zones = await this.listHostedZones();
    } catch (error) {
      throw new StepFailure('DnsWriteFailed', `Could not list hosted zones: ${formatError(error)}`);
    }

    const zone = selectHostedZone(zones, domain);
    if (!zone?.Id) {
      throw new StepFailure('DnsWriteFailed', `No public Route53 hosted zone found for ${domain}`);
    }
    const zoneId = bareZoneId(zone.Id);
    this.logger.debug('Found hosted zone', { domain, zoneId, zone: zone.Name });
    return zoneId;
  }

  async upsertRecords(zoneId: string, records: DnsRecordChange[]): Promise<string> {
    if (records.length === 0) {
      throw new StepFailure('DnsWriteFailed', `No DNS records to write to zone ${zoneId}`);
    }

    let response: ChangeResourceRecordSetsCommandOutput;
    try {
      response = await this.api.changeResourceRecordSets({
        HostedZoneId: zoneId,
        ChangeBatch: {
          Comment: 'sitelaunch',
          Changes: records.map(toUpsertChange),
        },
      });
    } catch (error) {
      throw new StepFailure('DnsWriteFailed', `Failed to update DNS records in zone ${zoneId}: ${formatError(error)}`);
    }

    const changeId = response.ChangeInfo?.Id;
    if (!changeId) {
      throw new StepFailure('DnsWriteFailed', `Route53 returned no change id for zone ${zoneId}`);
    }
    this.logger.info('Submitted DNS change', { zoneId, changeId, records: records.map(r => `${r.type} ${r.name}`) });
    return changeId;
  }

  private async listHostedZones(): Promise<HostedZone[]> {
    const zones: HostedZone[] = [];
    let marker: string | undefined;

    do {
      const current = marker;
      const page = await retryWithBackoff(() => this.api.listHostedZones({ Marker: current }), this.retry);
      zones.push(...(page.HostedZones ?? []));
      marker = page.IsTruncated ? page.NextMarker : undefined;
    } while (marker);

    return zones;
  }
}
