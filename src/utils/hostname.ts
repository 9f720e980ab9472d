/**
 * Hostname validation and normalization
 */

const DOMAIN_REGEX = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const LABEL_REGEX = /^[a-zA-Z0-9_](?:[a-zA-Z0-9_-]{0,61}[a-zA-Z0-9])?$/;

/**
 * Validate a registrable domain (at least one dot, alphabetic TLD)
 */
export function isValidDomain(domain: string): boolean {
  return domain.length <= 253 && DOMAIN_REGEX.test(domain);
}

/**
 * Validate any DNS hostname. Underscores are accepted since some CT entries carry them.
 */
export function isValidHostname(hostname: string): boolean {
  if (hostname.length === 0 || hostname.length > 253) {
    return false;
  }
  return hostname.split('.').every((label) => LABEL_REGEX.test(label));
}

/**
 * Lower-case and drop a trailing dot
 */
export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Reduce user input such as `https://Example.com:8443/path` to `example.com`
 */
export function normalizeTarget(input: string): string {
  let value = input.trim();
  value = value.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '');
  value = value.split(/[/?#]/, 1)[0] ?? '';
  value = value.replace(/:\d+$/, '');
  return normalizeHostname(value);
}
