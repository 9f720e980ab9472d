/**
 * TCP connect scanning and banner grabbing
 */

import { Socket } from 'net';
import { errorCode } from './errors.js';
import { cleanBanner, probePayload, type ServiceDetector } from './services.js';
import type { ScanTask, TaskOutcome, WorkerPool } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type { HostPortScan, PortResult, PortState } from './types.js';

/**
 * Raw TCP operations. Both must settle once `signal` aborts.
 */
export interface TcpTransport {
  connect(address: string, port: number, signal: AbortSignal): Promise<void>;
  readBanner(address: string, port: number, payload: string | undefined, signal: AbortSignal): Promise<string>;
}

export interface ProbeTarget {
  hostname: string;
  address: string;
}

export interface PortProberOptions {
  timeoutMs: number;
  bannerTimeoutMs: number;
}

export interface PortProbeReport {
  hosts: HostPortScan[];
  warnings: string[];
}

interface PortProbe {
  target: ProbeTarget;
  port: number;
}

// local socket exhaustion, says nothing about the remote port
const RESOURCE_CODES = new Set(['EMFILE', 'ENFILE', 'ENOBUFS', 'EADDRNOTAVAIL']);

const BANNER_BYTES = 1024;

export class NodeTcpTransport implements TcpTransport {
  connect(address: string, port: number, signal: AbortSignal): Promise<void> {
    return this.open(address, port, signal, (socket, finalize) => {
      socket.once('connect', () => finalize());
    }).then(() => undefined);
  }

  readBanner(address: string, port: number, payload: string | undefined, signal: AbortSignal): Promise<string> {
    return this.open(address, port, signal, (socket, finalize) => {
      const chunks: Buffer[] = [];
      let received = 0;

      socket.once('connect', () => {
        if (payload) {
          socket.write(payload);
        }
      });
      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
        received += chunk.length;
        // one read is enough to identify most services
        finalize(Buffer.concat(chunks, Math.min(received, BANNER_BYTES)).toString('latin1'));
      });
      socket.once('end', () => finalize(Buffer.concat(chunks).toString('latin1')));
    });
  }

  private open(
    address: string,
    port: number,
    signal: AbortSignal,
    attach: (socket: Socket, finalize: (value?: string) => void) => void
  ): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const socket = new Socket();
      let settled = false;

      const settle = (callback: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        signal.removeEventListener('abort', onAbort);
        socket.destroy();
        callback();
      };

      const onAbort = () => settle(() => reject(signal.reason));

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      socket.once('error', (error) => settle(() => reject(error)));
      attach(socket, (value = '') => settle(() => resolve(value)));
      socket.connect(port, address);
    });
  }
}

/**
 * Probes (host, port) pairs through the shared worker pool
 */
export class PortProber {
  private pool: WorkerPool;
  private transport: TcpTransport;
  private detector: ServiceDetector;
  private options: PortProberOptions;

  constructor(pool: WorkerPool, transport: TcpTransport, detector: ServiceDetector, options: PortProberOptions) {
    this.pool = pool;
    this.transport = transport;
    this.detector = detector;
    this.options = options;
  }

  /**
   * Probe one host. Results are sorted by port, one per port.
   */
  async probe(target: ProbeTarget, ports: number[]): Promise<PortResult[]> {
    const report = await this.probeHosts([target], ports);
    return report.hosts[0]?.ports ?? [];
  }

  /**
   * Probe every port of every host as a single batch
   */
  async probeHosts(targets: ProbeTarget[], ports: number[]): Promise<PortProbeReport> {
    const portList = [...new Set(ports)].sort((a, b) => a - b);
    const tasks: ScanTask<PortProbe>[] = targets.flatMap((target) =>
      portList.map((port) => ({
        id: `${target.hostname}:${port}`,
        input: { target, port },
        timeoutMs: this.options.timeoutMs,
      }))
    );

    logger.debug(`Probing ${tasks.length} ports across ${targets.length} hosts`);

    const results = await this.pool.run(
      tasks,
      (input, signal) => this.transport.connect(input.target.address, input.port, signal),
      {
        onProgress: (done, total) => {
          if (done % 500 === 0 || done === total) {
            logger.progress('Port probes', done, total);
          }
        },
      }
    );

    const scans = new Map<ProbeTarget, HostPortScan>(
      targets.map((target) => [
        target,
        { hostname: target.hostname, address: target.address, status: 'complete', ports: [] },
      ])
    );
    const open: PortProbe[] = [];
    const pending: Array<{ id: string; target: ProbeTarget; result: Omit<PortResult, 'service'> }> = [];
    const exhausted = new Set<string>();
    let cancelled = 0;

    for (const { task, outcome } of results) {
      const { target, port } = task.input;
      const classified = classifyConnect(outcome);
      if (classified === 'exhausted' || classified === 'cancelled') {
        const scan = scans.get(target);
        if (scan) {
          scan.status = 'partial';
        }
        if (classified === 'exhausted') {
          exhausted.add(target.hostname);
        } else {
          cancelled++;
        }
        continue;
      }

      pending.push({
        id: task.id,
        target,
        result: {
          host: target.hostname,
          address: target.address,
          port,
          state: classified.state,
          source: 'tcp',
          ...(classified.reason !== undefined ? { reason: classified.reason } : {}),
          latencyMs: outcome.durationMs,
        },
      });
      if (classified.state === 'open') {
        open.push(task.input);
      }
    }

    const banners = await this.grabBanners(open);

    for (const { id, target, result } of pending) {
      const banner = banners.get(id);
      scans.get(target)?.ports.push({
        ...result,
        ...(banner !== undefined ? { banner } : {}),
        service: this.detector.identify(result.port, banner),
      });
    }

    const warnings: string[] = [];
    if (exhausted.size > 0) {
      warnings.push(`Local resources exhausted while probing ${[...exhausted].join(', ')}; some ports were not probed`);
    }
    if (cancelled > 0) {
      warnings.push(`${cancelled} probes cancelled before completion`);
    }

    const hosts = [...scans.values()].map((scan) => ({ ...scan, ports: sortUniquePorts(scan.ports) }));
    return { hosts, warnings };
  }

  /**
   * Second, shorter pass over open ports. A missing banner is not an error.
   */
  private async grabBanners(open: PortProbe[]): Promise<Map<string, string>> {
    const banners = new Map<string, string>();
    if (open.length === 0) {
      return banners;
    }

    const tasks: ScanTask<PortProbe>[] = open.map((input) => ({
      id: `${input.target.hostname}:${input.port}`,
      input,
      timeoutMs: this.options.bannerTimeoutMs,
    }));

    const results = await this.pool.run(tasks, (input, signal) =>
      this.transport.readBanner(
        input.target.address,
        input.port,
        probePayload(input.target.hostname, input.port),
        signal
      )
    );

    for (const { task, outcome } of results) {
      if (outcome.status === 'success') {
        const banner = cleanBanner(outcome.value);
        if (banner !== undefined) {
          banners.set(task.id, banner);
        }
      }
    }

    return banners;
  }
}

type ConnectClassification = { state: PortState; reason?: string } | 'exhausted' | 'cancelled';

function classifyConnect(outcome: TaskOutcome<void>): ConnectClassification {
  switch (outcome.status) {
    case 'success':
      return { state: 'open' };
    case 'timeout':
      return { state: 'filtered', reason: 'timeout' };
    case 'cancelled':
      return 'cancelled';
    case 'error': {
      const code = errorCode(outcome.error);
      if (code === 'ECONNREFUSED') {
        return { state: 'closed', reason: 'refused' };
      }
      if (code !== undefined && RESOURCE_CODES.has(code)) {
        return 'exhausted';
      }
      return { state: 'filtered', reason: code ?? outcome.error.message };
    }
  }
}

/**
 * Combine direct probe results with a supplemental source. Direct results win per port.
 */
export function mergePortResults(direct: PortResult[], supplemental: PortResult[]): PortResult[] {
  const byPort = new Map<number, PortResult>();
  for (const result of supplemental) {
    byPort.set(result.port, result);
  }
  for (const result of direct) {
    byPort.set(result.port, result);
  }
  return sortUniquePorts([...byPort.values()]);
}

function sortUniquePorts(results: PortResult[]): PortResult[] {
  const seen = new Set<number>();
  return [...results]
    .sort((a, b) => a.port - b.port)
    .filter((result) => {
      if (seen.has(result.port)) {
        return false;
      }
      seen.add(result.port);
      return true;
    });
}
