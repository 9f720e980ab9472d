/**
 * Selection of scan hosts and web endpoints from earlier stage outputs
 */

import type { ProbeTarget } from './scanner.js';
import type { DiscoveryOutput, PortScanOutput, ResolvedHost } from './types.js';

const WEB_PORTS = new Map<number, 'http' | 'https'>([
  [80, 'http'],
  [8000, 'http'],
  [8080, 'http'],
  [8888, 'http'],
  [443, 'https'],
  [8443, 'https'],
]);

/**
 * Hosts for the port phase: discovered hosts (optionally only HTTP-active ones),
 * else the bare target when it resolved
 */
export function selectScanHosts(
  discovery: DiscoveryOutput | null,
  targetHost: ResolvedHost | null,
  options: { activeOnly?: boolean } = {}
): ProbeTarget[] {
  let hosts: ResolvedHost[] = discovery?.hosts.filter((host) => host.success) ?? [];

  const active = discovery?.active;
  if (options.activeOnly && active) {
    const activeSet = new Set(active);
    hosts = hosts.filter((host) => activeSet.has(host.hostname));
  }

  if (hosts.length === 0 && targetHost?.success) {
    hosts = [targetHost];
  }

  return hosts.flatMap((host) => {
    const address = host.addresses[0];
    return address ? [{ hostname: host.hostname, address }] : [];
  });
}

/**
 * URLs to fingerprint and capture. Without port results every host gets both schemes.
 */
export function collectWebEndpoints(ports: PortScanOutput | null, hosts: ProbeTarget[]): string[] {
  const urls = new Set<string>();

  if (!ports) {
    for (const host of hosts) {
      urls.add(`https://${host.hostname}`);
      urls.add(`http://${host.hostname}`);
    }
    return [...urls];
  }

  for (const scan of ports.hosts) {
    for (const result of scan.ports) {
      const scheme = WEB_PORTS.get(result.port);
      if (result.state === 'open' && scheme) {
        urls.add(buildUrl(scheme, scan.hostname, result.port));
      }
    }
  }
  return [...urls];
}

/**
 * Default ports are left out of the URL
 */
export function buildUrl(scheme: 'http' | 'https', hostname: string, port: number): string {
  const isDefault = (scheme === 'http' && port === 80) || (scheme === 'https' && port === 443);
  return isDefault ? `${scheme}://${hostname}` : `${scheme}://${hostname}:${port}`;
}
