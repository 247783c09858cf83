/**
 * Domain name utilities for DNS, ACM and CloudFront operations
 */

const DOMAIN_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/;

/**
 * Normalizes user input to a bare lowercase domain name
 *
 * @example
 * normalizeDomain(' https://Example.com/ ') // => 'example.com'
 * normalizeDomain('example.com.') // => 'example.com'
 */
export function normalizeDomain(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/\/+$/, '')
    .replace(/\.$/, '');
}

export function isValidDomain(domain: string): boolean {
  return domain.length <= 253 && DOMAIN_PATTERN.test(domain);
}

/**
 * Validates that a domain name is well-formed
 *
 * @throws {Error} If domain is invalid
 */
export function validateDomain(domain: string): void {
  if (!domain) {
    throw new Error('Domain name cannot be empty');
  }
  if (!isValidDomain(domain)) {
    throw new Error(`Invalid domain: ${domain}`);
  }
}

export function wwwDomain(domain: string): string {
  return `www.${domain}`;
}

/**
 * True when `domain` equals `zone` or lies underneath it (trailing dots ignored)
 */
export function isWithinZone(domain: string, zone: string): boolean {
  const d = normalizeDomain(domain);
  const z = normalizeDomain(zone);
  return d === z || d.endsWith(`.${z}`);
}
