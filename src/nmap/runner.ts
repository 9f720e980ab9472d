/**
 * nmap integration
 */

import { isCommandAvailable, runCommand } from '../utils/process.js';
import { logger } from '../utils/logger.js';
import type { ProbeTarget } from '../core/scanner.js';
import type { PortResult, PortState } from '../core/types.js';

/**
 * Runs nmap as an unprivileged TCP connect scan with version detection
 */
export class NmapRunner {
  private nmapPath: string;
  private timeoutMs: number;
  private available?: Promise<boolean>;

  constructor(nmapPath = 'nmap', timeoutMs = 300000) {
    this.nmapPath = nmapPath;
    this.timeoutMs = timeoutMs;
  }

  isAvailable(): Promise<boolean> {
    this.available ??= isCommandAvailable(this.nmapPath, ['--version']);
    return this.available;
  }

  /**
   * Scan the top 1000 TCP ports of one host
   */
  async scan(target: ProbeTarget, signal?: AbortSignal): Promise<PortResult[]> {
    const args = ['-Pn', '-sT', '-sV', '--top-ports', '1000', '-oG', '-', target.address];
    logger.debug(`${this.nmapPath} ${args.join(' ')}`);

    const result = await runCommand(this.nmapPath, args, { timeoutMs: this.timeoutMs, signal });
    if (result.timedOut) {
      throw new Error(`nmap timed out after ${this.timeoutMs}ms on ${target.hostname}`);
    }
    if (result.code !== 0) {
      throw new Error(`nmap exited with code ${result.code}: ${result.stderr.trim()}`);
    }

    return parseGreppable(result.stdout, target);
  }
}

/**
 * Parse `-oG` output. Only TCP entries are kept.
 *
 * Entry layout: port/state/protocol/owner/service/rpc/version/
 */
export function parseGreppable(output: string, target: ProbeTarget): PortResult[] {
  const results: PortResult[] = [];

  for (const line of output.split('\n')) {
    const match = /\tPorts: ([^\t]*)/.exec(line) ?? /^Host: .*Ports: ([^\t]*)/.exec(line);
    const ports = match?.[1];
    if (!ports) {
      continue;
    }

    for (const entry of ports.split(/,\s*/)) {
      const [portField = '', stateField = '', protocol = '', , serviceField = '', , versionField = ''] =
        entry.trim().split('/');
      const port = Number(portField);
      if (protocol !== 'tcp' || !Number.isInteger(port) || port < 1 || port > 65535) {
        continue;
      }

      const version = versionField.trim();
      results.push({
        host: target.hostname,
        address: target.address,
        port,
        state: toPortState(stateField),
        ...(version ? { banner: version } : {}),
        service: serviceField || 'unknown',
        source: 'nmap',
      });
    }
  }

  return results.sort((a, b) => a.port - b.port);
}

function toPortState(state: string): PortState {
  switch (state) {
    case 'open':
      return 'open';
    case 'closed':
      return 'closed';
    default:
      // filtered, open|filtered, closed|filtered, unfiltered
      return 'filtered';
  }
}
