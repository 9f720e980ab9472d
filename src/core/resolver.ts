/**
 * DNS resolution with timeouts, retries and caching
 */

import { promises as dns } from 'dns';
import { CacheManager } from './cache.js';
import { DeadlineExceededError, InvalidHostnameError, errorCode } from './errors.js';
import { retryWithBackoff, withDeadline } from '../utils/concurrency.js';
import { isValidHostname, normalizeHostname } from '../utils/hostname.js';
import type { ResolutionFailureKind, ResolvedHost } from './types.js';

/**
 * Record lookups the resolver needs. Rejections carry Node's DNS error codes.
 */
export interface DnsBackend {
  resolve4(hostname: string, signal: AbortSignal): Promise<string[]>;
  resolve6(hostname: string, signal: AbortSignal): Promise<string[]>;
}

export interface ResolveOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HostResolver {
  resolve(hostname: string, options?: ResolveOptions): Promise<ResolvedHost>;
}

export interface DnsResolverOptions {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  servers?: string[];
  cacheSize?: number;
  cacheTtlMs?: number;
  backend?: DnsBackend;
}

const TRANSIENT_CODES = new Set(['ETIMEOUT', 'ESERVFAIL', 'ECONNREFUSED', 'EOF']);

const FAILURE_KINDS: Record<string, ResolutionFailureKind> = {
  ENOTFOUND: 'nxdomain',
  ENODATA: 'nodata',
  ETIMEOUT: 'timeout',
  ESERVFAIL: 'servfail',
  EREFUSED: 'refused',
  ECONNREFUSED: 'refused',
};

/**
 * Backend on node's resolver. One Resolver per query so it can be cancelled alone.
 */
export class SystemDnsBackend implements DnsBackend {
  private timeoutMs: number;
  private servers: string[];

  constructor(timeoutMs = 3000, servers: string[] = []) {
    this.timeoutMs = timeoutMs;
    this.servers = servers;
  }

  resolve4(hostname: string, signal: AbortSignal): Promise<string[]> {
    return this.query(signal, (resolver) => resolver.resolve4(hostname));
  }

  resolve6(hostname: string, signal: AbortSignal): Promise<string[]> {
    return this.query(signal, (resolver) => resolver.resolve6(hostname));
  }

  private async query(
    signal: AbortSignal,
    lookup: (resolver: dns.Resolver) => Promise<string[]>
  ): Promise<string[]> {
    const resolver = new dns.Resolver({ timeout: this.timeoutMs, tries: 1 });
    if (this.servers.length > 0) {
      resolver.setServers(this.servers);
    }

    const onAbort = () => resolver.cancel();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await lookup(resolver);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Resolves hostnames to addresses. Lookup failures come back as unsuccessful results.
 */
export class DnsResolver implements HostResolver {
  private backend: DnsBackend;
  private cache: CacheManager<ResolvedHost>;
  private timeoutMs: number;
  private retries: number;
  private retryDelayMs: number;

  constructor(options: DnsResolverOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.retries = options.retries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.backend = options.backend ?? new SystemDnsBackend(this.timeoutMs, options.servers);
    this.cache = new CacheManager<ResolvedHost>(options.cacheSize ?? 5000, options.cacheTtlMs ?? 3600000);
  }

  async resolve(hostname: string, options: ResolveOptions = {}): Promise<ResolvedHost> {
    const name = normalizeHostname(hostname);
    if (!isValidHostname(name)) {
      throw new InvalidHostnameError(hostname);
    }

    const cached = this.cache.get(name);
    if (cached) {
      return { ...cached, addresses: [...cached.addresses] };
    }

    let result: ResolvedHost;
    try {
      const addresses = await withDeadline(
        (signal) => this.lookup(name, signal),
        options.timeoutMs ?? this.timeoutMs,
        options.signal
      );
      result =
        addresses.length > 0
          ? { hostname: name, addresses, success: true }
          : { hostname: name, addresses: [], success: false, failure: 'nodata' };
    } catch (error) {
      result = { hostname: name, addresses: [], success: false, failure: classifyFailure(error) };
    }

    // timeouts and server errors may clear up; definitive answers are cached
    if (result.success || result.failure === 'nxdomain' || result.failure === 'nodata') {
      this.cache.set(name, result);
    }

    return { ...result, addresses: [...result.addresses] };
  }

  /**
   * A records first, AAAA when the name exists without any
   */
  private async lookup(name: string, signal: AbortSignal): Promise<string[]> {
    const ipv4 = await this.query(() => this.backend.resolve4(name, signal), signal);
    if (ipv4.length > 0) {
      return sortUnique(ipv4);
    }
    return sortUnique(await this.query(() => this.backend.resolve6(name, signal), signal));
  }

  private async query(lookup: () => Promise<string[]>, signal: AbortSignal): Promise<string[]> {
    try {
      return await retryWithBackoff(lookup, {
        retries: this.retries,
        delayMs: this.retryDelayMs,
        shouldRetry: (error) => TRANSIENT_CODES.has(errorCode(error) ?? ''),
        signal,
      });
    } catch (error) {
      if (errorCode(error) === 'ENODATA') {
        return [];
      }
      throw error;
    }
  }
}

/**
 * Map a lookup error onto a failure kind
 */
export function classifyFailure(error: unknown): ResolutionFailureKind {
  if (error instanceof DeadlineExceededError) {
    return 'timeout';
  }
  return FAILURE_KINDS[errorCode(error) ?? ''] ?? 'error';
}

function sortUnique(addresses: string[]): string[] {
  return [...new Set(addresses)].sort();
}
