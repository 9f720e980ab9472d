/**
 * Subdomain discovery
 */

import { randomBytes } from 'crypto';
import { logger } from '../utils/logger.js';
import { linkSignals, type ScanTask, type WorkerPool } from '../utils/concurrency.js';
import { isValidHostname, normalizeHostname } from '../utils/hostname.js';
import { errorMessage } from './errors.js';
import type { HttpFetcher } from './fingerprint.js';
import type { HostResolver } from './resolver.js';
import type {
  Candidate,
  DiscoveredHost,
  DiscoveryOutput,
  ResolutionFailureKind,
  ResolvedHost,
  WildcardInfo,
  WildcardPolicy,
} from './types.js';

// outer bound on top of the resolver's own deadline
const RESOLVE_GRACE_MS = 500;
const CRTSH_TIMEOUT_MS = 30000;

export interface LivenessChecker {
  isAlive(hostname: string, signal: AbortSignal): Promise<boolean>;
}

/**
 * A host is alive when https or http answers below 400
 */
export class HttpLivenessChecker implements LivenessChecker {
  private http: HttpFetcher;

  constructor(http: HttpFetcher) {
    this.http = http;
  }

  async isAlive(hostname: string, signal: AbortSignal): Promise<boolean> {
    for (const protocol of ['https', 'http']) {
      try {
        const response = await this.http.get(`${protocol}://${hostname}`, { signal });
        if (response.statusCode < 400) {
          return true;
        }
      } catch (error) {
        logger.debug(`${protocol}://${hostname} unreachable: ${errorMessage(error)}`);
      }
    }
    return false;
  }
}

export interface DiscovererOptions {
  timeoutMs: number;
  certificateTransparency?: boolean;
  validateHttp?: boolean;
  wildcardPolicy?: WildcardPolicy;
  liveness?: LivenessChecker;
  /** label used to probe for wildcard DNS */
  wildcardLabel?: () => string;
  signal?: AbortSignal;
}

/**
 * The bare target followed by one candidate per word. No deduplication.
 */
export function buildCandidates(target: string, wordlist: readonly string[]): Candidate[] {
  return [
    { hostname: target, source: 'target' },
    ...wordlist.map((word): Candidate => ({ hostname: `${word}.${target}`, source: 'wordlist' })),
  ];
}

/**
 * Names under `target` found in certificate transparency logs (crt.sh)
 */
export async function fetchCertificateNames(target: string, signal?: AbortSignal): Promise<string[]> {
  const url = `https://crt.sh/?q=%25.${encodeURIComponent(target)}&output=json`;
  const timeout = AbortSignal.timeout(CRTSH_TIMEOUT_MS);

  const response = await fetch(url, {
    headers: { 'User-Agent': 'reconpipe/1.0' },
    signal: linkSignals(timeout, signal),
  });
  if (!response.ok) {
    throw new Error(`crt.sh returned ${response.status}`);
  }

  const data: unknown = await response.json();
  if (!Array.isArray(data)) {
    throw new Error('crt.sh returned an unexpected payload');
  }

  const entries: unknown[] = data;
  const names = new Set<string>();
  for (const entry of entries) {
    if (typeof entry !== 'object' || entry === null) {
      continue;
    }
    const values = [
      'name_value' in entry ? entry.name_value : undefined,
      'common_name' in entry ? entry.common_name : undefined,
    ];
    for (const value of values) {
      if (typeof value !== 'string') {
        continue;
      }
      for (const name of value.split('\n')) {
        const cleaned = normalizeHostname(name);
        if (!cleaned.includes('*') && (cleaned === target || cleaned.endsWith(`.${target}`))) {
          names.add(cleaned);
        }
      }
    }
  }

  return [...names];
}

/**
 * Resolves candidate subdomains through the shared worker pool
 */
export class SubdomainDiscoverer {
  private resolver: HostResolver;
  private pool: WorkerPool;
  private options: DiscovererOptions;

  constructor(resolver: HostResolver, pool: WorkerPool, options: DiscovererOptions) {
    this.resolver = resolver;
    this.pool = pool;
    this.options = options;
  }

  async discover(target: string, wordlist: readonly string[]): Promise<DiscoveryOutput> {
    const candidates = buildCandidates(target, wordlist);

    if (this.options.certificateTransparency) {
      logger.info('Querying crt.sh...');
      try {
        const names = await fetchCertificateNames(target, this.options.signal);
        logger.info(`Found ${names.length} names in certificate transparency logs`);
        candidates.push(...names.map((hostname): Candidate => ({ hostname, source: 'crt.sh' })));
      } catch (error) {
        logger.warn(`crt.sh lookup failed: ${errorMessage(error)}`);
      }
    }

    const unique = uniqueCandidates(candidates, target);
    logger.info(`Resolving ${unique.length} candidates (${candidates.length} before deduplication)`);

    const wildcard = await this.detectWildcard(target);
    if (wildcard.detected) {
      logger.warn(`Wildcard DNS detected for *.${target} -> ${wildcard.addresses.join(', ')}`);
    }

    const tasks: ScanTask<Candidate>[] = unique.map((candidate) => ({
      id: candidate.hostname,
      input: candidate,
      timeoutMs: this.options.timeoutMs + RESOLVE_GRACE_MS,
    }));

    const results = await this.pool.run(
      tasks,
      (candidate, signal) =>
        this.resolver.resolve(candidate.hostname, { timeoutMs: this.options.timeoutMs, signal }),
      {
        onProgress: (done, total) => {
          if (done % 100 === 0 || done === total) {
            logger.progress('Resolving', done, total);
          }
        },
      }
    );

    const hosts = new Map<string, DiscoveredHost>();
    const failures: Partial<Record<ResolutionFailureKind, number>> = {};
    const countFailure = (kind: ResolutionFailureKind) => {
      failures[kind] = (failures[kind] ?? 0) + 1;
    };

    for (const { task, outcome } of results) {
      if (outcome.status === 'timeout') {
        countFailure('timeout');
        continue;
      }
      if (outcome.status === 'error') {
        countFailure('error');
        continue;
      }
      if (outcome.status === 'cancelled') {
        continue;
      }

      const resolved = outcome.value;
      if (!resolved.success) {
        countFailure(resolved.failure ?? 'error');
        continue;
      }

      const matchesWildcard = wildcard.detected && sameAddresses(resolved.addresses, wildcard.addresses);
      if (matchesWildcard && this.options.wildcardPolicy === 'drop' && task.input.source !== 'target') {
        logger.debug(`Dropping wildcard match ${resolved.hostname}`);
        continue;
      }

      if (!hosts.has(resolved.hostname)) {
        hosts.set(resolved.hostname, { ...resolved, source: task.input.source, wildcard: matchesWildcard });
      }
    }

    const discovered = [...hosts.values()];
    logger.info(`${discovered.length} hosts resolved`);

    return {
      candidates: candidates.length,
      hosts: discovered,
      active: await this.checkLiveness(discovered),
      failures,
      wildcard,
    };
  }

  /**
   * Resolve a random label; an answer means every name under the target resolves
   */
  private async detectWildcard(target: string): Promise<WildcardInfo> {
    const label = this.options.wildcardLabel?.() ?? `wc-${randomBytes(6).toString('hex')}`;
    const probe = `${label}.${target}`;

    let resolved: ResolvedHost;
    try {
      resolved = await this.resolver.resolve(probe, { timeoutMs: this.options.timeoutMs, signal: this.options.signal });
    } catch (error) {
      logger.debug(`Wildcard probe ${probe} failed: ${errorMessage(error)}`);
      return { detected: false, probe, addresses: [] };
    }

    return { detected: resolved.success, probe, addresses: resolved.addresses };
  }

  private async checkLiveness(hosts: DiscoveredHost[]): Promise<string[] | null> {
    const liveness = this.options.liveness;
    if (!this.options.validateHttp || !liveness) {
      return null;
    }

    logger.info(`Checking HTTP liveness of ${hosts.length} hosts...`);
    const results = await this.pool.run(
      hosts.map((host) => ({ id: host.hostname, input: host.hostname, timeoutMs: this.options.timeoutMs * 4 })),
      (hostname, signal) => liveness.isAlive(hostname, signal)
    );

    return results
      .filter(({ outcome }) => outcome.status === 'success' && outcome.value)
      .map(({ task }) => task.input);
  }
}

/**
 * Normalized, valid names under the target, first occurrence wins
 */
function uniqueCandidates(candidates: Candidate[], target: string): Candidate[] {
  const seen = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const hostname = normalizeHostname(candidate.hostname);
    const inScope = hostname === target || hostname.endsWith(`.${target}`);
    if (!inScope || !isValidHostname(hostname)) {
      logger.debug(`Skipping invalid candidate ${candidate.hostname}`);
      continue;
    }
    if (!seen.has(hostname)) {
      seen.set(hostname, { hostname, source: candidate.source });
    }
  }
  return [...seen.values()];
}

function sameAddresses(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((address, index) => address === b[index]);
}
