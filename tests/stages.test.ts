/**
 * Tests for the pipeline stages with in-process collaborators
 */

import { describe, it, expect, vi } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';
import { ScanAccumulator } from '../src/core/accumulator.js';
import { loadSignatures } from '../src/core/catalog.js';
import { resolveConfig } from '../src/core/config.js';
import { ServiceDetector } from '../src/core/services.js';
import {
  PortStage,
  ScreenshotStage,
  SubdomainStage,
  type CapturerFactory,
  type PortSupplement,
  type StageContext,
} from '../src/core/stages.js';
import { WorkerPool } from '../src/utils/concurrency.js';
import type { HttpFetcher } from '../src/core/fingerprint.js';
import type { HostResolver, ResolveOptions } from '../src/core/resolver.js';
import type { TcpTransport } from '../src/core/scanner.js';
import type { AppConfig, PortResult, ResolvedHost, ScanResult } from '../src/core/types.js';

const RUN_DIR = join(tmpdir(), 'reconpipe-stage-test');

const createContext = async (overrides: Partial<AppConfig> = {}, ports = [80, 443]): Promise<StageContext> => ({
  config: resolveConfig({ domain: 'example.com', ...overrides }),
  pool: new WorkerPool(5),
  signal: new AbortController().signal,
  wordlist: [],
  ports,
  services: new ServiceDetector({
    services: new Map([
      [80, 'http'],
      [443, 'https'],
    ]),
  }),
  signatures: await loadSignatures(),
  runDir: RUN_DIR,
});

const resolvedTarget: ResolvedHost = { hostname: 'example.com', addresses: ['192.0.2.1'], success: true };

/**
 * Snapshot after a subdomain phase that found only the target
 */
const afterDiscovery = (targetHost: ResolvedHost = resolvedTarget): ScanResult => {
  const accumulator = new ScanAccumulator('example.com', 0);
  accumulator.setTargetHost(targetHost);
  accumulator.append('subdomains', {
    candidates: 1,
    hosts: targetHost.success ? [{ ...targetHost, source: 'target', wildcard: false }] : [],
    active: null,
    failures: {},
    wildcard: null,
  });
  return accumulator.snapshot();
};

/**
 * Snapshot after a port phase that found 80 and 443 open
 */
const afterPorts = (): ScanResult => {
  const accumulator = new ScanAccumulator('example.com', 0);
  accumulator.setTargetHost(resolvedTarget);
  const open = (port: number, service: string): PortResult => ({
    host: 'example.com',
    address: '192.0.2.1',
    port,
    state: 'open',
    service,
    source: 'tcp',
  });
  accumulator.append('ports', {
    portsPerHost: 2,
    hosts: [
      { hostname: 'example.com', address: '192.0.2.1', status: 'complete', ports: [open(80, 'http'), open(443, 'https')] },
    ],
  });
  accumulator.recordPhase({
    stage: 'ports',
    phase: 'ports',
    status: 'success',
    startedAt: '1970-01-01T00:00:00.000Z',
    durationMs: 0,
    warnings: [],
  });
  return accumulator.snapshot();
};

describe('SubdomainStage', () => {
  const resolver: HostResolver = {
    resolve: async (hostname: string, options: ResolveOptions = {}): Promise<ResolvedHost> => {
      if (hostname === 'slow.example.com') {
        return new Promise((_, reject) =>
          options.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        );
      }
      if (hostname === 'example.com' || hostname === 'www.example.com') {
        return { hostname, addresses: ['192.0.2.1'], success: true };
      }
      return { hostname, addresses: [], success: false, failure: 'nxdomain' };
    },
  };

  it('should report lookups that timed out as a warning', async () => {
    const context = { ...(await createContext({ timeout: 50 })), wordlist: ['www', 'slow', 'mail'] };

    const report = await new SubdomainStage(resolver).run(afterDiscovery(), context);

    expect(report.output.candidates).toBe(4);
    expect(report.output.hosts.map((host) => host.hostname)).toEqual(['example.com', 'www.example.com']);
    expect(report.output.failures).toEqual({ timeout: 1, nxdomain: 1 });
    expect(report.warnings).toEqual(['1 DNS lookups timed out']);
  });

  it('should close its HTTP client', async () => {
    const http: HttpFetcher = { get: vi.fn(), close: vi.fn(async () => undefined) };

    await new SubdomainStage(resolver, http).close();

    expect(http.close).toHaveBeenCalledTimes(1);
  });
});

describe('PortStage', () => {
  const transport: TcpTransport = {
    connect: async (_address, port) => {
      if (port !== 80) {
        throw Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
      }
    },
    readBanner: async () => 'HTTP/1.1 200 OK\r\n',
  };

  const nmapResult = (port: number, state: PortResult['state']): PortResult => ({
    host: 'example.com',
    address: '192.0.2.1',
    port,
    state,
    service: 'unknown',
    source: 'nmap',
  });

  const supplement = (overrides: Partial<PortSupplement> = {}) => ({
    isAvailable: vi.fn(overrides.isAvailable ?? (async () => true)),
    scan: vi.fn<PortSupplement['scan']>(
      overrides.scan ?? (async () => [nmapResult(443, 'open'), nmapResult(3306, 'open')])
    ),
  });

  it('should scan the discovered hosts and merge nmap findings under the direct results', async () => {
    const nmap = supplement();

    const report = await new PortStage(transport, nmap).run(afterDiscovery(), await createContext());

    expect(report.output.portsPerHost).toBe(2);
    expect(report.output.hosts).toHaveLength(1);
    expect(report.output.hosts[0]?.ports.map(({ port, state, source }) => [port, state, source])).toEqual([
      [80, 'open', 'tcp'],
      [443, 'closed', 'tcp'],
      [3306, 'open', 'nmap'],
    ]);
    expect(nmap.scan).toHaveBeenCalledWith({ hostname: 'example.com', address: '192.0.2.1' }, expect.any(AbortSignal));
    expect(report.warnings).toEqual([]);
  });

  it('should warn and keep direct results when nmap is missing', async () => {
    const nmap = supplement({ isAvailable: async () => false });

    const report = await new PortStage(transport, nmap).run(afterDiscovery(), await createContext());

    expect(report.output.hosts[0]?.ports.map((result) => result.port)).toEqual([80, 443]);
    expect(nmap.scan).not.toHaveBeenCalled();
    expect(report.warnings).toEqual(['nmap not found in PATH; skipped']);
  });

  it('should warn when nmap fails for a host', async () => {
    const nmap = supplement({
      scan: async () => {
        throw new Error('nmap exited with code 1: permission denied');
      },
    });

    const report = await new PortStage(transport, nmap).run(afterDiscovery(), await createContext());

    expect(report.output.hosts[0]?.ports.map((result) => result.port)).toEqual([80, 443]);
    expect(report.warnings).toEqual(['nmap failed for example.com: nmap exited with code 1: permission denied']);
  });

  it('should warn when there is nothing to scan', async () => {
    const unresolved: ResolvedHost = { hostname: 'example.com', addresses: [], success: false, failure: 'nxdomain' };

    const report = await new PortStage(transport).run(afterDiscovery(unresolved), await createContext());

    expect(report.output).toEqual({ hosts: [], portsPerHost: 2 });
    expect(report.warnings).toEqual(['No resolved hosts to scan']);
  });
});

describe('ScreenshotStage', () => {
  const capturer = (available: boolean) => {
    const capture = vi.fn(async (url: string) => {
      if (url.startsWith('https:')) {
        throw new Error('Browser exited with code 1');
      }
      return '/shots/example_com_http.png';
    });
    const factory = vi.fn<CapturerFactory>(() => ({ isAvailable: async () => available, capture }));
    return { capture, factory };
  };

  const titledBody = '<html><head><title> Example \n Home </title></head></html>';

  const redirectingSite = (): HttpFetcher => ({
    get: vi.fn(async (url: string) =>
      url === 'http://example.com'
        ? { statusCode: 301, headers: { location: 'https://www.example.com/' }, body: '' }
        : { statusCode: 200, headers: {}, body: titledBody }
    ),
    close: vi.fn(async () => undefined),
  });

  it('should fail every endpoint when no browser is available', async () => {
    const { capture, factory } = capturer(false);

    const report = await new ScreenshotStage(undefined, factory).run(afterPorts(), await createContext());

    const error = 'No Chrome or Chromium binary found';
    expect(report.output).toEqual([
      { url: 'http://example.com', status: 'failed', error },
      { url: 'https://example.com', status: 'failed', error },
    ]);
    expect(report.warnings).toEqual(['No Chrome or Chromium binary found; screenshots skipped']);
    expect(capture).not.toHaveBeenCalled();
  });

  it('should keep captures that worked and record page details beside them', async () => {
    const { factory } = capturer(true);
    const http = redirectingSite();

    const report = await new ScreenshotStage(http, factory).run(afterPorts(), await createContext());

    expect(factory).toHaveBeenCalledWith({
      outputDir: join(RUN_DIR, 'screenshots'),
      timeoutMs: 30000,
      chromePath: undefined,
    });
    expect(report.output).toEqual([
      {
        url: 'http://example.com',
        status: 'success',
        path: '/shots/example_com_http.png',
        page: {
          title: 'Example Home',
          finalUrl: 'https://www.example.com/',
          statusCode: 200,
          sourceLength: titledBody.length,
          capturedAt: expect.any(String),
        },
      },
      { url: 'https://example.com', status: 'failed', error: 'Browser exited with code 1' },
    ]);
    expect(http.get).toHaveBeenCalledWith('http://example.com', expect.objectContaining({ maxRedirections: 0 }));
    expect(report.warnings).toEqual(['1 of 2 screenshots failed']);
  });

  it('should keep a capture when its page details cannot be fetched', async () => {
    const { factory } = capturer(true);
    const http: HttpFetcher = {
      get: async (url: string) => {
        throw new Error(`HTTP GET ${url} failed: connection reset`);
      },
    };

    const report = await new ScreenshotStage(http, factory).run(afterPorts(), await createContext());

    expect(report.output[0]).toEqual({ url: 'http://example.com', status: 'success', path: '/shots/example_com_http.png' });
  });

  it('should close its HTTP client', async () => {
    const http = redirectingSite();

    await new ScreenshotStage(http).close();

    expect(http.close).toHaveBeenCalledTimes(1);
  });
});
