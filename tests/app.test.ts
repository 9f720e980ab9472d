/**
 * Tests for the pipeline orchestrator
 */

import { describe, it, expect, vi } from 'vitest';
import { createServer } from 'http';
import { join } from 'path';
import { tmpdir } from 'os';
import { App } from '../src/core/app.js';
import { TechnologyStage, type Stage, type StageFactory } from '../src/core/stages.js';
import { ConfigurationError } from '../src/core/errors.js';
import { HttpClient } from '../src/utils/http.js';
import type { HttpFetcher } from '../src/core/fingerprint.js';
import type { HostResolver } from '../src/core/resolver.js';
import type { ReportSink } from '../src/core/report.js';
import type {
  AppConfig,
  DiscoveryOutput,
  PhaseName,
  PortScanOutput,
  ResolvedHost,
  ScanResult,
  StageName,
  StageOutputs,
} from '../src/core/types.js';

type RunFn<K extends StageName> = Stage<K>['run'];

interface StageOverrides {
  subdomains?: RunFn<'subdomains'>;
  ports?: RunFn<'ports'>;
  technologies?: RunFn<'technologies'>;
  screenshots?: RunFn<'screenshots'>;
}

const discovery = (hosts: string[] = ['example.com']): DiscoveryOutput => ({
  candidates: hosts.length + 1,
  hosts: hosts.map((hostname) => ({
    hostname,
    addresses: ['192.0.2.1'],
    success: true,
    source: hostname === 'example.com' ? 'target' : 'wordlist',
    wildcard: false,
  })),
  active: null,
  failures: { nxdomain: 1 },
  wildcard: null,
});

const openPorts = (ports: number[]): PortScanOutput => ({
  portsPerHost: ports.length,
  hosts: [
    {
      hostname: 'example.com',
      address: '192.0.2.1',
      status: 'complete',
      ports: ports.map((port) => ({
        host: 'example.com',
        address: '192.0.2.1',
        port,
        state: 'open',
        service: 'http',
        source: 'tcp',
      })),
    },
  ],
});

function fakeStage<K extends StageName>(
  name: K,
  phase: PhaseName,
  empty: () => StageOutputs[K],
  run: RunFn<K>,
  calls: StageName[]
): Stage<K> {
  return {
    name,
    phase,
    empty,
    run: (previous, context) => {
      calls.push(name);
      return run(previous, context);
    },
  };
}

function createStages(overrides: StageOverrides = {}) {
  const calls: StageName[] = [];
  const stages = [
    fakeStage(
      'subdomains',
      'subdomains',
      () => ({ candidates: 0, hosts: [], active: null, failures: {}, wildcard: null }),
      overrides.subdomains ?? (async () => ({ output: discovery(), warnings: [] })),
      calls
    ),
    fakeStage(
      'ports',
      'ports',
      () => ({ hosts: [], portsPerHost: 0 }),
      overrides.ports ?? (async () => ({ output: openPorts([80]), warnings: [] })),
      calls
    ),
    fakeStage('technologies', 'enrichment', () => [], overrides.technologies ?? (async () => ({ output: [], warnings: [] })), calls),
    fakeStage('screenshots', 'enrichment', () => [], overrides.screenshots ?? (async () => ({ output: [], warnings: [] })), calls),
  ];
  return { calls, stages };
}

const resolvingTo = (addresses: string[]): HostResolver => ({
  resolve: vi.fn(
    async (hostname: string): Promise<ResolvedHost> =>
      addresses.length > 0
        ? { hostname, addresses, success: true }
        : { hostname, addresses: [], success: false, failure: 'nxdomain' }
  ),
});

const createWriter = () => ({
  write: vi.fn<ReportSink['write']>(async (_result, runDir) => [join(runDir, 'summary.txt')]),
});

const baseConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  domain: 'example.com',
  quiet: true,
  output: join(tmpdir(), 'reconpipe-app-test'),
  ...overrides,
});

const statuses = (result: ScanResult) => result.phases.map((phase) => [phase.stage, phase.status]);

describe('App', () => {
  it('should run the phases in order and write reports', async () => {
    const { calls, stages } = createStages();
    const reportWriter = createWriter();
    const app = new App(baseConfig(), { resolver: resolvingTo(['192.0.2.1']), stages, reportWriter });

    const result = await app.run();

    expect(result.transitions).toEqual(['init', 'subdomains', 'ports', 'enrichment', 'report', 'done']);
    expect(calls).toEqual(['subdomains', 'ports', 'technologies', 'screenshots']);
    expect(result.phases.map((phase) => [phase.stage, phase.phase, phase.status])).toEqual([
      ['subdomains', 'subdomains', 'success'],
      ['ports', 'ports', 'success'],
      ['technologies', 'enrichment', 'success'],
      ['screenshots', 'enrichment', 'success'],
    ]);
    expect(result.targetHost).toEqual({ hostname: 'example.com', addresses: ['192.0.2.1'], success: true });
    expect(reportWriter.write).toHaveBeenCalledTimes(1);
    expect(result.reports).toHaveLength(1);
    expect(result.reports[0]?.endsWith('summary.txt')).toBe(true);
    expect(result.finishedAt).not.toBeNull();
  });

  it('should hand each stage the results of the stages before it', async () => {
    let seenHosts: string[] = [];
    const { stages } = createStages({
      subdomains: async () => ({ output: discovery(['example.com', 'www.example.com']), warnings: [] }),
      ports: async (previous) => {
        seenHosts = previous.subdomains?.hosts.map((host) => host.hostname) ?? [];
        return { output: openPorts([80]), warnings: [] };
      },
    });
    const app = new App(baseConfig(), { resolver: resolvingTo(['192.0.2.1']), stages, reportWriter: createWriter() });

    await app.run();

    expect(seenHosts).toEqual(['example.com', 'www.example.com']);
  });

  it('should record disabled stages as skipped with empty output', async () => {
    const { calls, stages } = createStages();
    const app = new App(baseConfig({ phases: { ports: false, screenshots: false } }), {
      resolver: resolvingTo(['192.0.2.1']),
      stages,
      reportWriter: createWriter(),
    });

    const result = await app.run();

    expect(calls).toEqual(['subdomains', 'technologies']);
    expect(statuses(result)).toEqual([
      ['subdomains', 'success'],
      ['ports', 'skipped'],
      ['technologies', 'success'],
      ['screenshots', 'skipped'],
    ]);
    expect(result.ports).toEqual({ hosts: [], portsPerHost: 0 });
    expect(result.screenshots).toEqual([]);
    expect(result.state).toBe('done');
  });

  it('should mark a phase partial when its stage reports warnings', async () => {
    const { stages } = createStages({
      ports: async () => ({ output: openPorts([80]), warnings: ['nmap not found in PATH; skipped'] }),
    });
    const app = new App(baseConfig(), { resolver: resolvingTo(['192.0.2.1']), stages, reportWriter: createWriter() });

    const result = await app.run();

    const ports = result.phases.find((phase) => phase.stage === 'ports');
    expect(ports?.status).toBe('partial');
    expect(ports?.warnings).toEqual(['nmap not found in PATH; skipped']);
  });

  it('should fail when neither the target nor any subdomain resolves, and still write reports', async () => {
    const { calls, stages } = createStages({
      subdomains: async () => ({ output: discovery([]), warnings: [] }),
    });
    const reportWriter = createWriter();
    const app = new App(baseConfig(), { resolver: resolvingTo([]), stages, reportWriter });

    const result = await app.run();

    expect(result.state).toBe('failed');
    expect(result.transitions).toEqual(['init', 'subdomains', 'failed']);
    expect(result.error).toBe('Target example.com did not resolve and no subdomains were found');
    expect(calls).toEqual(['subdomains']);
    expect(result.ports).toBeNull();
    expect(reportWriter.write).toHaveBeenCalledTimes(1);
  });

  it('should scan the bare target when discovery is skipped', async () => {
    const { calls, stages } = createStages();
    const app = new App(baseConfig({ phases: { subdomains: false } }), {
      resolver: resolvingTo(['192.0.2.1']),
      stages,
      reportWriter: createWriter(),
    });

    const result = await app.run();

    expect(result.state).toBe('done');
    expect(calls).toEqual(['ports', 'technologies', 'screenshots']);
  });

  it('should record a throwing stage as failed and continue', async () => {
    const { calls, stages } = createStages({
      ports: async () => {
        throw new Error('socket table full');
      },
    });
    const app = new App(baseConfig(), { resolver: resolvingTo(['192.0.2.1']), stages, reportWriter: createWriter() });

    const result = await app.run();

    const ports = result.phases.find((phase) => phase.stage === 'ports');
    expect(ports?.status).toBe('failed');
    expect(ports?.error).toBe('ports: socket table full');
    expect(result.ports).toEqual({ hosts: [], portsPerHost: 0 });
    expect(calls).toEqual(['subdomains', 'ports', 'technologies', 'screenshots']);
    expect(result.state).toBe('done');
  });

  it('should keep successful enrichment results when some endpoints fail', async () => {
    const http: HttpFetcher = {
      get: vi.fn(async (url: string) => {
        if (url.endsWith(':8000') || url.endsWith(':8443')) {
          throw new Error(`HTTP GET ${url} failed: connection refused`);
        }
        return { statusCode: 200, headers: { server: 'nginx' }, body: '' };
      }),
    };
    const { stages } = createStages({
      ports: async () => ({ output: openPorts([80, 443, 8000, 8080, 8443]), warnings: [] }),
    });
    const withTechnology = stages.map((stage) => (stage.name === 'technologies' ? new TechnologyStage(http) : stage));
    const app = new App(baseConfig({ phases: { screenshots: false } }), {
      resolver: resolvingTo(['192.0.2.1']),
      stages: withTechnology,
      reportWriter: createWriter(),
    });

    const result = await app.run();

    const nginx = [{ name: 'Nginx', category: 'web_server', source: 'headers' }];
    expect(result.technologies).toEqual([
      { url: 'http://example.com', status: 'success', statusCode: 200, technologies: nginx },
      { url: 'https://example.com', status: 'success', statusCode: 200, technologies: nginx },
      {
        url: 'http://example.com:8000',
        status: 'failed',
        error: 'HTTP GET http://example.com:8000 failed: connection refused',
      },
      { url: 'http://example.com:8080', status: 'success', statusCode: 200, technologies: nginx },
      {
        url: 'https://example.com:8443',
        status: 'failed',
        error: 'HTTP GET https://example.com:8443 failed: connection refused',
      },
    ]);
    expect(result.counts.endpointsFingerprinted).toBe(3);
    expect(result.counts.endpointsFailed).toBe(2);
    const technologies = result.phases.find((phase) => phase.stage === 'technologies');
    expect(technologies?.status).toBe('partial');
    expect(technologies?.warnings).toEqual(['2 of 5 endpoints could not be fingerprinted']);
    expect(result.state).toBe('done');
  });

  it('should keep partial results when interrupted', async () => {
    const controller = new AbortController();
    const { calls, stages } = createStages({
      subdomains: async () => {
        controller.abort();
        return { output: discovery(), warnings: [] };
      },
    });
    const reportWriter = createWriter();
    const app = new App(baseConfig(), { resolver: resolvingTo(['192.0.2.1']), stages, reportWriter });

    const result = await app.run(controller.signal);

    expect(result.interrupted).toBe(true);
    expect(result.state).toBe('done');
    expect(calls).toEqual(['subdomains']);
    expect(statuses(result)).toEqual([
      ['subdomains', 'cancelled'],
      ['ports', 'cancelled'],
      ['technologies', 'cancelled'],
      ['screenshots', 'cancelled'],
    ]);
    expect(result.subdomains?.hosts).toHaveLength(1);
    expect(result.ports).toEqual({ hosts: [], portsPerHost: 0 });
    expect(reportWriter.write).toHaveBeenCalledTimes(1);
  });

  it('should stop at the maximum run time', async () => {
    const { stages } = createStages({
      subdomains: (_previous, context) =>
        new Promise((resolve) => {
          context.signal.addEventListener('abort', () => resolve({ output: discovery(), warnings: [] }));
        }),
    });
    const app = new App(baseConfig({ maxRunTime: 50 }), {
      resolver: resolvingTo(['192.0.2.1']),
      stages,
      reportWriter: createWriter(),
    });

    const result = await app.run();

    expect(result.interrupted).toBe(true);
    expect(result.phases[0]?.status).toBe('cancelled');
  });

  it('should not write reports when the report phase is off', async () => {
    const { stages } = createStages();
    const reportWriter = createWriter();
    const app = new App(baseConfig({ phases: { report: false } }), {
      resolver: resolvingTo(['192.0.2.1']),
      stages,
      reportWriter,
    });

    const result = await app.run();

    expect(reportWriter.write).not.toHaveBeenCalled();
    expect(result.transitions).toEqual(['init', 'subdomains', 'ports', 'enrichment', 'done']);
    expect(result.reports).toEqual([]);
  });

  it('should build fresh stages for every run of the same App', async () => {
    const server = createServer((_request, response) => {
      response.setHeader('server', 'nginx');
      response.end();
    });
    const port = await new Promise<number>((resolve, reject) => {
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (address && typeof address !== 'string') {
          resolve(address.port);
        } else {
          reject(new Error('Server has no TCP address'));
        }
      });
    });

    const clients: HttpClient[] = [];
    const createLocalStages: StageFactory = () => {
      const client = new HttpClient(2000);
      clients.push(client);
      // every endpoint is served by the local server
      const local: HttpFetcher = {
        get: (_url, options) => client.get(`http://127.0.0.1:${port}/`, options),
        close: () => client.close(),
      };
      const { stages } = createStages();
      return stages.map((stage) => (stage.name === 'technologies' ? new TechnologyStage(local) : stage));
    };

    try {
      const app = new App(baseConfig({ phases: { screenshots: false } }), {
        resolver: resolvingTo(['192.0.2.1']),
        createStages: createLocalStages,
        reportWriter: createWriter(),
      });

      const first = await app.run();
      const second = await app.run();

      const expected = [
        {
          url: 'http://example.com',
          status: 'success',
          statusCode: 200,
          technologies: [{ name: 'Nginx', category: 'web_server', source: 'headers' }],
        },
      ];
      expect(first.technologies).toEqual(expected);
      expect(second.technologies).toEqual(expected);
      expect(clients).toHaveLength(2);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it('should leave injected stages open for the caller to close', async () => {
    const { stages } = createStages();
    const close = vi.fn(async () => undefined);
    const app = new App(baseConfig(), {
      resolver: resolvingTo(['192.0.2.1']),
      stages: stages.map((stage) => ({ ...stage, close })),
      reportWriter: createWriter(),
    });

    await app.run();
    await app.run();

    expect(close).not.toHaveBeenCalled();
  });

  it('should reject invalid configuration before any phase runs', async () => {
    expect(() => new App(baseConfig({ domain: 'not a domain' }))).toThrow(ConfigurationError);

    const { calls, stages } = createStages();
    const resolver = resolvingTo(['192.0.2.1']);
    const app = new App(baseConfig({ wordlist: join(tmpdir(), 'reconpipe-missing-wordlist.txt') }), {
      resolver,
      stages,
      reportWriter: createWriter(),
    });

    await expect(app.run()).rejects.toThrow(ConfigurationError);
    expect(calls).toEqual([]);
    expect(resolver.resolve).not.toHaveBeenCalled();
  });
});
