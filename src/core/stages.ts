/**
 * Pipeline stages. Each reads the aggregate so far and returns its own output.
 */

import { join } from 'path';
import { HttpLivenessChecker, SubdomainDiscoverer } from './enumerator.js';
import { HttpFingerprinter, type HttpFetcher } from './fingerprint.js';
import { mergePortResults, NodeTcpTransport, PortProber, type TcpTransport } from './scanner.js';
import { collectWebEndpoints, selectScanHosts } from './targets.js';
import { errorMessage } from './errors.js';
import { HttpClient } from '../utils/http.js';
import { logger } from '../utils/logger.js';
import { WorkerPool, type TaskOutcome } from '../utils/concurrency.js';
import { NmapRunner } from '../nmap/runner.js';
import { WhatWebRunner } from '../whatweb/runner.js';
import { inspectPage, ScreenshotRunner } from '../screenshot/runner.js';
import type { HostResolver } from './resolver.js';
import type { ServiceDetector } from './services.js';
import type { SignatureCatalog } from './catalog.js';
import type { Fingerprint } from './fingerprint.js';
import type { ProbeTarget } from './scanner.js';
import type {
  HostPortScan,
  PageInfo,
  PhaseName,
  PortResult,
  ScanConfig,
  ScanResult,
  ScreenshotResult,
  StageName,
  StageOutputs,
  TechResult,
} from './types.js';

export const MAX_SCREENSHOT_WORKERS = 3;

// headroom over the collaborator's own timeout before the pool detaches the task
const EXTERNAL_GRACE_MS = 1000;

/**
 * Everything a stage may use besides the previous aggregate
 */
export interface StageContext {
  config: ScanConfig;
  pool: WorkerPool;
  signal: AbortSignal;
  wordlist: string[];
  ports: number[];
  services: ServiceDetector;
  signatures: SignatureCatalog;
  runDir: string;
}

export interface StageReport<K extends StageName> {
  output: StageOutputs[K];
  /** Non-fatal problems; any warning marks the phase partial */
  warnings: string[];
}

export interface Stage<K extends StageName> {
  readonly name: K;
  readonly phase: PhaseName;
  run(previous: ScanResult, context: StageContext): Promise<StageReport<K>>;
  /** Output recorded when the stage is skipped or never reached */
  empty(): StageOutputs[K];
  close?(): Promise<void>;
}

export type AnyStage = { [K in StageName]: Stage<K> }[StageName];

/**
 * Builds a fresh set of stages for one run; the run closes them when it ends
 */
export type StageFactory = (config: ScanConfig, resolver: HostResolver) => AnyStage[];

export class SubdomainStage implements Stage<'subdomains'> {
  readonly name = 'subdomains';
  readonly phase = 'subdomains';
  private resolver: HostResolver;
  private http?: HttpFetcher;

  constructor(resolver: HostResolver, http?: HttpFetcher) {
    this.resolver = resolver;
    this.http = http;
  }

  empty(): StageOutputs['subdomains'] {
    return { candidates: 0, hosts: [], active: null, failures: {}, wildcard: null };
  }

  async run(previous: ScanResult, context: StageContext): Promise<StageReport<'subdomains'>> {
    const { config } = context;
    const discoverer = new SubdomainDiscoverer(this.resolver, context.pool, {
      timeoutMs: config.timeoutMs,
      certificateTransparency: config.certificateTransparency,
      validateHttp: config.validateHttp,
      wildcardPolicy: config.wildcardPolicy,
      liveness: this.http ? new HttpLivenessChecker(this.http) : undefined,
      signal: context.signal,
    });

    const output = await discoverer.discover(previous.target, context.wordlist);

    const warnings: string[] = [];
    const timeouts = output.failures.timeout ?? 0;
    if (timeouts > 0) {
      warnings.push(`${timeouts} DNS lookups timed out`);
    }
    return { output, warnings };
  }

  async close(): Promise<void> {
    await this.http?.close?.();
  }
}

/**
 * Second opinion on a host's ports, e.g. nmap
 */
export interface PortSupplement {
  isAvailable(): Promise<boolean>;
  scan(target: ProbeTarget, signal?: AbortSignal): Promise<PortResult[]>;
}

export class PortStage implements Stage<'ports'> {
  readonly name = 'ports';
  readonly phase = 'ports';
  private transport: TcpTransport;
  private nmap?: PortSupplement;

  constructor(transport: TcpTransport, nmap?: PortSupplement) {
    this.transport = transport;
    this.nmap = nmap;
  }

  empty(): StageOutputs['ports'] {
    return { hosts: [], portsPerHost: 0 };
  }

  async run(previous: ScanResult, context: StageContext): Promise<StageReport<'ports'>> {
    const { config } = context;
    const targets = selectScanHosts(previous.subdomains, previous.targetHost, {
      activeOnly: config.activeOnly,
    });
    if (targets.length === 0) {
      return { output: { hosts: [], portsPerHost: context.ports.length }, warnings: ['No resolved hosts to scan'] };
    }

    logger.info(`Scanning ${context.ports.length} ports on ${targets.length} hosts...`);
    const prober = new PortProber(context.pool, this.transport, context.services, {
      timeoutMs: config.timeoutMs,
      bannerTimeoutMs: config.bannerTimeoutMs,
    });
    const report = await prober.probeHosts(targets, context.ports);
    const warnings = [...report.warnings];
    let hosts = report.hosts;

    if (this.nmap && !context.signal.aborted) {
      hosts = await this.supplementWithNmap(hosts, context.signal, warnings);
    }

    return { output: { hosts, portsPerHost: context.ports.length }, warnings };
  }

  /**
   * nmap fills in ports the direct probe did not observe
   */
  private async supplementWithNmap(
    hosts: HostPortScan[],
    signal: AbortSignal,
    warnings: string[]
  ): Promise<HostPortScan[]> {
    const nmap = this.nmap;
    if (!nmap || !(await nmap.isAvailable())) {
      warnings.push('nmap not found in PATH; skipped');
      return hosts;
    }

    const merged: HostPortScan[] = [];
    for (const host of hosts) {
      if (signal.aborted) {
        merged.push(host);
        continue;
      }
      try {
        const extra = await nmap.scan({ hostname: host.hostname, address: host.address }, signal);
        merged.push({ ...host, ports: mergePortResults(host.ports, extra) });
      } catch (error) {
        warnings.push(`nmap failed for ${host.hostname}: ${errorMessage(error)}`);
        merged.push(host);
      }
    }
    return merged;
  }
}

export class TechnologyStage implements Stage<'technologies'> {
  readonly name = 'technologies';
  readonly phase = 'enrichment';
  private http: HttpFetcher;
  private whatweb?: WhatWebRunner;

  constructor(http: HttpFetcher, whatweb?: WhatWebRunner) {
    this.http = http;
    this.whatweb = whatweb;
  }

  empty(): StageOutputs['technologies'] {
    return [];
  }

  async run(previous: ScanResult, context: StageContext): Promise<StageReport<'technologies'>> {
    const { config } = context;
    const endpoints = webEndpoints(previous, config);
    if (endpoints.length === 0) {
      logger.info('No web endpoints to fingerprint');
      return { output: [], warnings: [] };
    }

    const warnings: string[] = [];
    let whatweb: WhatWebRunner | undefined;
    if (this.whatweb) {
      if (await this.whatweb.isAvailable()) {
        whatweb = this.whatweb;
      } else {
        warnings.push('whatweb not found in PATH; skipped');
      }
    }

    logger.info(`Fingerprinting ${endpoints.length} endpoints...`);
    const fingerprinter = new HttpFingerprinter(this.http, context.signatures, whatweb);
    const timeoutMs = config.enrichmentTimeoutMs + (whatweb ? 30000 : 0) + EXTERNAL_GRACE_MS;

    const results = await context.pool.run(
      endpoints.map((url) => ({ id: url, input: url, timeoutMs })),
      (url, signal) => fingerprinter.fingerprint(url, signal)
    );

    const output = results.flatMap(({ task, outcome }) => toTechResult(task.input, outcome));
    const failed = output.filter((result) => result.status === 'failed').length;
    if (failed > 0) {
      warnings.push(`${failed} of ${output.length} endpoints could not be fingerprinted`);
    }
    return { output, warnings };
  }

  async close(): Promise<void> {
    await this.http.close?.();
  }
}

/**
 * Minimal surface of a screenshot backend
 */
export interface ScreenshotCapturer {
  isAvailable(): Promise<boolean>;
  capture(url: string, signal?: AbortSignal): Promise<string>;
}

export type CapturerFactory = (options: { outputDir: string; timeoutMs: number; chromePath?: string }) => ScreenshotCapturer;

interface Capture {
  path: string;
  page?: PageInfo;
}

/**
 * Captures each web endpoint. With an HTTP client, page metadata is recorded beside the image.
 */
export class ScreenshotStage implements Stage<'screenshots'> {
  readonly name = 'screenshots';
  readonly phase = 'enrichment';
  private http?: HttpFetcher;
  private createCapturer: CapturerFactory;

  constructor(http?: HttpFetcher, createCapturer: CapturerFactory = (options) => new ScreenshotRunner(options)) {
    this.http = http;
    this.createCapturer = createCapturer;
  }

  empty(): StageOutputs['screenshots'] {
    return [];
  }

  async run(previous: ScanResult, context: StageContext): Promise<StageReport<'screenshots'>> {
    const { config } = context;
    const endpoints = webEndpoints(previous, config);
    if (endpoints.length === 0) {
      logger.info('No web endpoints to capture');
      return { output: [], warnings: [] };
    }

    const capturer = this.createCapturer({
      outputDir: join(context.runDir, 'screenshots'),
      timeoutMs: config.screenshotTimeoutMs,
      chromePath: config.chromePath,
    });

    if (!(await capturer.isAvailable())) {
      const error = 'No Chrome or Chromium binary found';
      return {
        output: endpoints.map((url): ScreenshotResult => ({ url, status: 'failed', error })),
        warnings: [`${error}; screenshots skipped`],
      };
    }

    // one browser per worker; keep the count low
    const pool = new WorkerPool(Math.min(MAX_SCREENSHOT_WORKERS, config.workers), context.signal);
    logger.info(`Capturing ${endpoints.length} screenshots with ${pool.concurrency} workers...`);

    const timeoutMs = config.screenshotTimeoutMs + (this.http ? config.enrichmentTimeoutMs : 0) + EXTERNAL_GRACE_MS;
    const results = await pool.run(
      endpoints.map((url) => ({ id: url, input: url, timeoutMs })),
      async (url, signal): Promise<Capture> => {
        const path = await capturer.capture(url, signal);
        const page = await this.describe(url, signal);
        return page ? { path, page } : { path };
      }
    );

    const output = results.flatMap(({ task, outcome }): ScreenshotResult[] => {
      switch (outcome.status) {
        case 'success':
          return [{ url: task.input, status: 'success', ...outcome.value }];
        case 'cancelled':
          return [];
        default:
          return [{ url: task.input, status: 'failed', error: failureReason(outcome) }];
      }
    });

    const failed = output.filter((result) => result.status === 'failed').length;
    return {
      output,
      warnings: failed > 0 ? [`${failed} of ${output.length} screenshots failed`] : [],
    };
  }

  async close(): Promise<void> {
    await this.http?.close?.();
  }

  /**
   * Missing metadata does not fail a capture
   */
  private async describe(url: string, signal: AbortSignal): Promise<PageInfo | undefined> {
    if (!this.http) {
      return undefined;
    }
    try {
      return await inspectPage(this.http, url, signal);
    } catch (error) {
      logger.debug(`No page info for ${url}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}

/**
 * Stages wired to the real network collaborators
 */
export const createDefaultStages: StageFactory = (config, resolver) => [
  new SubdomainStage(resolver, config.validateHttp ? new HttpClient(config.timeoutMs * 2) : undefined),
  new PortStage(new NodeTcpTransport(), config.nmap ? new NmapRunner() : undefined),
  new TechnologyStage(new HttpClient(config.enrichmentTimeoutMs), config.whatweb ? new WhatWebRunner() : undefined),
  new ScreenshotStage(new HttpClient(config.enrichmentTimeoutMs)),
];

/**
 * Endpoints come from open web ports when the port phase ran, else from the host list
 */
function webEndpoints(previous: ScanResult, config: ScanConfig): string[] {
  const portPhase = previous.phases.find((record) => record.stage === 'ports');
  const portsObserved = portPhase?.status === 'success' || portPhase?.status === 'partial';
  const hosts = selectScanHosts(previous.subdomains, previous.targetHost, { activeOnly: config.activeOnly });
  return collectWebEndpoints(portsObserved ? previous.ports : null, hosts);
}

function toTechResult(url: string, outcome: TaskOutcome<Fingerprint>): TechResult[] {
  switch (outcome.status) {
    case 'success':
      return [
        { url, status: 'success', statusCode: outcome.value.statusCode, technologies: outcome.value.technologies },
      ];
    case 'cancelled':
      return [];
    default:
      return [{ url, status: 'failed', error: failureReason(outcome) }];
  }
}

function failureReason(outcome: TaskOutcome<unknown>): string {
  switch (outcome.status) {
    case 'timeout':
      return `timed out after ${outcome.durationMs}ms`;
    case 'error':
      return outcome.error.message;
    default:
      return outcome.status;
  }
}
