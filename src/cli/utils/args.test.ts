import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { getFlag, getPositiveNumberFlag, hasFlag, positionals } from './args.js';
import { ConfigurationError } from '../../lib/errors.js';

describe('CLI args', () => {
  it('reads separate and inline flag values', () => {
    const args = ['deploy', '--s3-bucket', 'site-bucket', '--domain=demo.example.com'];

    assert.equal(getFlag(args, 's3-bucket'), 'site-bucket');
    assert.equal(getFlag(args, 'domain'), 'demo.example.com');
    assert.equal(getFlag(args, 's3-prefix'), undefined);
  });

  it('keeps = signs inside inline values', () => {
    assert.equal(getFlag(['--build-cmd=make SITE=1'], 'build-cmd'), 'make SITE=1');
  });

  it('rejects a flag with no value', () => {
    assert.throws(() => getFlag(['--s3-bucket', '--public'], 's3-bucket'), ConfigurationError);
    assert.throws(() => getFlag(['--s3-bucket'], 's3-bucket'), { message: 'Flag --s3-bucket needs a value' });
  });

  it('rejects an empty inline value', () => {
    assert.throws(() => getFlag(['deploy', '--domain='], 'domain'), { message: 'Flag --domain needs a value' });
    assert.throws(() => getFlag(['--s3-prefix= '], 's3-prefix'), ConfigurationError);
  });

  it('detects boolean flags', () => {
    assert.equal(hasFlag(['deploy', '--install'], 'install'), true);
    assert.equal(hasFlag(['deploy'], 'install'), false);
  });

  it('parses positive numbers', () => {
    assert.equal(getPositiveNumberFlag(['--cert-timeout', '45'], 'cert-timeout'), 45);
    assert.throws(() => getPositiveNumberFlag(['--cert-timeout=0'], 'cert-timeout'), {
      message: 'Flag --cert-timeout must be a positive number, got "0"',
    });
  });

  it('collects positionals around flags', () => {
    const args = ['register', '--contact', 'contact.json', 'example.com', '--yes', '--years=2'];

    assert.deepEqual(positionals(args, ['contact', 'years']), ['register', 'example.com']);
  });
});
