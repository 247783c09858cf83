import { describe, it, before, after, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import {
  formatDomainDetails,
  formatOwnedDomains,
  handleDomainCommand,
  loadRegistrationFile,
  parseDomainList,
} from './domain.js';
import { ConfigurationError } from '../../lib/errors.js';
import { createSilentLogger } from '../../monitoring/structured-logger.js';
import { cleanupTempDir, createTempDir, writeTree } from '../../test-utils.js';
import { FakeZoneWriter } from '../../test-mocks.js';
import type { DomainAvailability, DomainDetails, IDomainRegistrar, OwnedDomain } from '../../lib/interfaces.js';
import type { RegistrationFile } from '../../lib/route53/domain-registrar.js';

const registrant = {
  firstName: 'Test',
  lastName: 'Owner',
  contactType: 'PERSON',
  addressLine1: '1 Test Street',
  city: 'Testville',
  countryCode: 'US',
  zipCode: '00000',
  phoneNumber: '+1.5550000000',
  email: 'owner@example.com',
};

class FakeRegistrar implements IDomainRegistrar {
  readonly calls: string[] = [];
  status = 'AVAILABLE';
  suggestions = ['demo-site.com', 'demo-app.com'];
  owned: OwnedDomain[] = [];
  /** Domains reported as taken regardless of `status` */
  taken = new Set<string>();

  async checkAvailability(domain: string): Promise<DomainAvailability> {
    this.calls.push(`check:${domain}`);
    if (this.taken.has(domain)) {
      return { domain, available: false, status: 'UNAVAILABLE' };
    }
    return { domain, available: this.status === 'AVAILABLE', status: this.status };
  }

  async getSuggestions(domain: string, count?: number): Promise<string[]> {
    this.calls.push(`suggest:${domain}:${count ?? 'default'}`);
    return this.suggestions;
  }

  async register(domain: string, file: RegistrationFile, years?: number): Promise<string> {
    this.calls.push(`register:${domain}:${years ?? 1}:${file.registrant.email}`);
    return 'op-1';
  }

  async listDomains(): Promise<OwnedDomain[]> {
    this.calls.push('list');
    return this.owned;
  }

  async getDomainDetails(domain: string): Promise<DomainDetails> {
    this.calls.push(`details:${domain}`);
    return {
      domain,
      registrar: 'Test Registrar',
      createdAt: new Date('2024-03-01T00:00:00Z'),
      expiresAt: new Date('2027-03-01T00:00:00Z'),
      autoRenew: true,
      privacy: false,
      statuses: ['clientTransferProhibited'],
      nameservers: ['ns-1.example.net', 'ns-2.example.org'],
    };
  }
}

describe('parseDomainList', () => {
  it('splits commas and positionals, normalizing and de-duplicating', () => {
    assert.deepEqual(parseDomainList(['Demo.com,demo.net', ' demo.org ', 'demo.com'], 'usage'), [
      'demo.com',
      'demo.net',
      'demo.org',
    ]);
  });

  it('rejects an empty list', () => {
    assert.throws(() => parseDomainList([',', ''], 'check <domain>'), {
      message: 'Missing domain. Usage: check <domain>',
    });
  });

  it('rejects an invalid entry', () => {
    assert.throws(() => parseDomainList(['demo.com,not a domain'], 'usage'), ConfigurationError);
  });
});

describe('domain formatting', () => {
  it('lists owned domains with their expiry', () => {
    assert.deepEqual(
      formatOwnedDomains([
        { domain: 'demo.com', autoRenew: true, expiresAt: new Date('2027-05-04T12:00:00Z') },
        { domain: 'demo.net', autoRenew: false },
      ]),
      [
        'Registered domains (2):',
        `  ${'demo.com'.padEnd(40)} auto-renew: on   expires: 2027-05-04`,
        `  ${'demo.net'.padEnd(40)} auto-renew: off  expires: n/a`,
      ]
    );
  });

  it('says so when nothing is registered', () => {
    assert.deepEqual(formatOwnedDomains([]), ['No domains are registered to this account']);
  });

  it('prints n/a for missing details', () => {
    assert.deepEqual(
      formatDomainDetails({ domain: 'demo.com', autoRenew: false, privacy: true, statuses: [], nameservers: [] }),
      [
        'Domain: demo.com',
        '  Registrar:   n/a',
        '  Created:     n/a',
        '  Expires:     n/a',
        '  Auto-renew:  off',
        '  Privacy:     on',
        '  Status:      n/a',
        '  Nameservers: n/a',
      ]
    );
  });
});

describe('domain command', () => {
  const originalLog = console.log;
  let output: string[];
  let dir: string;
  let contactPath: string;

  before(() => {
    dir = createTempDir();
    writeTree(dir, {
      'contact.json': JSON.stringify({ registrant }),
      'broken.json': JSON.stringify({ registrant: { ...registrant, email: 'nope' } }),
    });
    contactPath = join(dir, 'contact.json');
  });

  after(() => {
    cleanupTempDir(dir);
  });

  beforeEach(() => {
    output = [];
    console.log = (...parts: unknown[]) => {
      output.push(parts.map(String).join(' '));
    };
  });

  afterEach(() => {
    console.log = originalLog;
  });

  function context(registrar: IDomainRegistrar, answer = true) {
    return {
      settings: { region: 'us-east-1' },
      logger: createSilentLogger(),
      registrar,
      confirm: async () => answer,
    };
  }

  it('checks availability and lists five suggestions', async () => {
    const registrar = new FakeRegistrar();

    await handleDomainCommand(['check', 'Demo.com'], context(registrar));

    assert.deepEqual(registrar.calls, ['check:demo.com', 'suggest:demo.com:5']);
    assert.ok(output.some(line => line.includes('demo-site.com')));
  });

  it('checks several domains without suggestions', async () => {
    const registrar = new FakeRegistrar();
    registrar.taken.add('demo.net');

    await handleDomainCommand(['check', 'demo.com,demo.net', 'demo.org'], context(registrar));

    assert.deepEqual(registrar.calls, ['check:demo.com', 'check:demo.net', 'check:demo.org']);
    const rows = output.filter(line => line.startsWith('  demo.'));
    assert.equal(rows.length, 3);
    assert.ok(rows[1].includes('taken (UNAVAILABLE)'));
    assert.ok(rows[2].includes('available'));
  });

  it('lists registered domains', async () => {
    const registrar = new FakeRegistrar();
    registrar.owned = [{ domain: 'demo.com', autoRenew: true }];

    await handleDomainCommand(['list'], context(registrar));

    assert.deepEqual(registrar.calls, ['list']);
    assert.equal(output[0], 'Registered domains (1):');
  });

  it('prints registration details', async () => {
    const registrar = new FakeRegistrar();

    await handleDomainCommand(['info', 'Demo.com'], context(registrar));

    assert.deepEqual(registrar.calls, ['details:demo.com']);
    assert.deepEqual(output, [
      'Domain: demo.com',
      '  Registrar:   Test Registrar',
      '  Created:     2024-03-01',
      '  Expires:     2027-03-01',
      '  Auto-renew:  on',
      '  Privacy:     off',
      '  Status:      clientTransferProhibited',
      '  Nameservers: ns-1.example.net, ns-2.example.org',
    ]);
  });

  it('points the zone at a distribution with setup-dns', async () => {
    const calls: string[] = [];
    const zones = new FakeZoneWriter(calls);

    await handleDomainCommand(
      ['setup-dns', 'demo.com', '--cdn-domain', 'D111.cdn.example'],
      { ...context(new FakeRegistrar()), zones }
    );

    assert.deepEqual(calls, ['findZoneId:demo.com', 'upsertRecords:ZONE123:A demo.com,CNAME www.demo.com']);
    assert.deepEqual(zones.batches[0][1], { type: 'CNAME', name: 'www.demo.com', value: 'd111.cdn.example', ttl: 300 });
    assert.ok(output.some(line => line.includes('Change: change-1')));
  });

  it('requires --cdn-domain for setup-dns', async () => {
    const calls: string[] = [];

    await assert.rejects(
      handleDomainCommand(['setup-dns', 'demo.com'], { ...context(new FakeRegistrar()), zones: new FakeZoneWriter(calls) }),
      ConfigurationError
    );
    assert.deepEqual(calls, []);
  });

  it('skips suggestions when the domain is taken', async () => {
    const registrar = new FakeRegistrar();
    registrar.status = 'UNAVAILABLE';

    await handleDomainCommand(['check', 'demo.com'], context(registrar));

    assert.deepEqual(registrar.calls, ['check:demo.com']);
  });

  it('registers after confirmation', async () => {
    const registrar = new FakeRegistrar();

    await handleDomainCommand(['register', 'demo.com', '--contact', contactPath, '--years', '2'], context(registrar));

    assert.deepEqual(registrar.calls, ['check:demo.com', 'register:demo.com:2:owner@example.com']);
  });

  it('does nothing when the confirmation is declined', async () => {
    const registrar = new FakeRegistrar();

    await handleDomainCommand(['register', 'demo.com', '--contact', contactPath], context(registrar, false));

    assert.deepEqual(registrar.calls, ['check:demo.com']);
  });

  it('skips the confirmation with --yes', async () => {
    const registrar = new FakeRegistrar();
    const ctx = {
      ...context(registrar),
      confirm: async (): Promise<boolean> => {
        throw new Error('should not ask');
      },
    };

    await handleDomainCommand(['register', 'demo.com', '--contact', contactPath, '--yes'], ctx);

    assert.deepEqual(registrar.calls, ['check:demo.com', 'register:demo.com:1:owner@example.com']);
  });

  it('refuses to register an unavailable domain', async () => {
    const registrar = new FakeRegistrar();
    registrar.status = 'UNAVAILABLE';

    await assert.rejects(
      handleDomainCommand(['register', 'demo.com', '--contact', contactPath, '--yes'], context(registrar)),
      { message: 'demo.com is not available for registration (UNAVAILABLE)' }
    );
  });

  it('rejects out-of-range years', async () => {
    await assert.rejects(
      handleDomainCommand(['register', 'demo.com', '--contact', contactPath, '--years', '11'], context(new FakeRegistrar())),
      ConfigurationError
    );
  });

  it('rejects an unknown subcommand', async () => {
    await assert.rejects(handleDomainCommand(['transfer', 'demo.com'], context(new FakeRegistrar())), {
      message:
        'Unknown domain subcommand: transfer. Use "domain check", "domain register", "domain list", "domain info" or "domain setup-dns"',
    });
  });

  it('reports contact file problems by path', () => {
    try {
      loadRegistrationFile(join(dir, 'broken.json'));
      assert.fail('expected ConfigurationError');
    } catch (error) {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.validationErrors?.length, 1);
      assert.ok(error.validationErrors?.[0].startsWith('registrant.email: '));
    }
  });
});
