/**
 * Summary and JSON reports
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { PhaseRecord, PortResult, ScanResult, StageName } from './types.js';

export interface ReportSink {
  write(result: ScanResult, runDir: string): Promise<string[]>;
}

/**
 * Writes `summary.txt` and `results.json` into the run directory
 */
export class ReportWriter implements ReportSink {
  async write(result: ScanResult, runDir: string): Promise<string[]> {
    await mkdir(runDir, { recursive: true });
    const summaryPath = join(runDir, 'summary.txt');
    const jsonPath = join(runDir, 'results.json');
    const final: ScanResult = { ...result, reports: [...result.reports, summaryPath, jsonPath] };

    await writeFile(summaryPath, formatSummary(final, { color: false }) + '\n', 'utf-8');
    await writeFile(jsonPath, formatJson(final) + '\n', 'utf-8');
    return [summaryPath, jsonPath];
  }
}

/**
 * `<output>/<target>_<YYYYMMDD_HHMMSS>`, local time
 */
export function runDirectory(outputDir: string, target: string, date: Date): string {
  return join(outputDir, `${target}_${formatTimestamp(date)}`);
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function formatJson(result: ScanResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Human-readable summary. Sections for stages that never ran say "not attempted".
 */
export function formatSummary(result: ScanResult, options: { color?: boolean } = {}): string {
  const c: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : chalk;
  const lines: string[] = [];

  lines.push(c.cyan.bold(`Recon report: ${result.target}`));
  const state = result.interrupted ? `${result.state} (interrupted)` : result.state;
  lines.push(`State: ${result.state === 'failed' ? c.red(state) : c.green(state)}`);
  if (result.error) {
    lines.push(`Error: ${c.red(result.error)}`);
  }
  lines.push(`Duration: ${(result.durationMs / 1000).toFixed(2)}s`);
  if (result.targetHost) {
    const addresses = result.targetHost.success
      ? result.targetHost.addresses.join(', ')
      : `unresolved (${result.targetHost.failure ?? 'error'})`;
    lines.push(`Target address: ${addresses}`);
  }

  lines.push('', c.bold('PHASES'));
  if (result.phases.length === 0) {
    lines.push('  none');
  }
  for (const phase of result.phases) {
    lines.push(`  ${phase.stage.padEnd(14)}${colorStatus(c, phase)}  ${phase.durationMs}ms`);
    for (const warning of phase.warnings) {
      lines.push(c.yellow(`    ! ${warning}`));
    }
    if (phase.error) {
      lines.push(c.red(`    x ${phase.error}`));
    }
  }

  lines.push('', c.bold('SUBDOMAINS'));
  const subdomains = result.subdomains;
  if (!attempted(result, 'subdomains') || !subdomains) {
    lines.push(`  ${notAttempted(result, 'subdomains')}`);
  } else {
    lines.push(`  ${subdomains.hosts.length} resolved of ${subdomains.candidates} candidates`);
    for (const host of subdomains.hosts) {
      const flags = [host.wildcard ? 'wildcard' : '', host.source === 'crt.sh' ? 'crt.sh' : '']
        .filter(Boolean)
        .map((flag) => ` [${flag}]`)
        .join('');
      lines.push(`  ${c.cyan(host.hostname)}  ${host.addresses.join(', ')}${flags}`);
    }
    const failures = Object.entries(subdomains.failures)
      .map(([kind, count]) => `${kind}=${count}`)
      .join(', ');
    if (failures) {
      lines.push(`  Unresolved: ${failures}`);
    }
    if (subdomains.active) {
      lines.push(`  HTTP active: ${subdomains.active.length ? subdomains.active.join(', ') : 'none'}`);
    }
  }

  lines.push('', c.bold('PORTS'));
  const ports = result.ports;
  if (!attempted(result, 'ports') || !ports) {
    lines.push(`  ${notAttempted(result, 'ports')}`);
  } else if (ports.hosts.length === 0) {
    lines.push('  no hosts scanned');
  } else {
    for (const host of ports.hosts) {
      const partial = host.status === 'partial' ? ' [partial]' : '';
      lines.push(`  ${c.cyan(host.hostname)} (${host.address})${partial}`);
      const open = host.ports.filter((port) => port.state === 'open');
      for (const port of open) {
        lines.push(`    ${formatPort(port)}`);
      }
      const closed = host.ports.filter((port) => port.state === 'closed').length;
      const filtered = host.ports.filter((port) => port.state === 'filtered').length;
      lines.push(`    ${open.length} open, ${closed} closed, ${filtered} filtered`);
    }
  }

  lines.push('', c.bold('TECHNOLOGIES'));
  const technologies = result.technologies;
  if (!attempted(result, 'technologies') || !technologies) {
    lines.push(`  ${notAttempted(result, 'technologies')}`);
  } else if (technologies.length === 0) {
    lines.push('  no web endpoints');
  } else {
    for (const entry of technologies) {
      if (entry.status === 'failed') {
        lines.push(`  ${entry.url}  ${c.red(`FAILED: ${entry.error}`)}`);
        continue;
      }
      const names = entry.technologies.map((technology) => `${technology.name} (${technology.category})`);
      lines.push(`  ${entry.url}  [${entry.statusCode}] ${names.length ? names.join(', ') : 'nothing identified'}`);
    }
  }

  lines.push('', c.bold('SCREENSHOTS'));
  const screenshots = result.screenshots;
  if (!attempted(result, 'screenshots') || !screenshots) {
    lines.push(`  ${notAttempted(result, 'screenshots')}`);
  } else if (screenshots.length === 0) {
    lines.push('  no web endpoints');
  } else {
    for (const entry of screenshots) {
      if (entry.status === 'failed') {
        lines.push(`  ${entry.url}  ${c.red(`FAILED: ${entry.error}`)}`);
        continue;
      }
      lines.push(`  ${entry.url}  -> ${entry.path}`);
      if (entry.page) {
        const { statusCode, title, finalUrl } = entry.page;
        const moved = finalUrl === entry.url ? '' : `  (now ${finalUrl})`;
        lines.push(`    [${statusCode}] ${title ?? 'untitled'}${moved}`);
      }
    }
  }

  return lines.join('\n');
}

function phaseOf(result: ScanResult, stage: StageName): PhaseRecord | undefined {
  return result.phases.find((phase) => phase.stage === stage);
}

/**
 * A stage counts as attempted when it started, even if it later failed
 */
function attempted(result: ScanResult, stage: StageName): boolean {
  const status = phaseOf(result, stage)?.status;
  return status === 'success' || status === 'partial' || status === 'failed' || (status === 'cancelled' && hasData(result, stage));
}

function hasData(result: ScanResult, stage: StageName): boolean {
  switch (stage) {
    case 'subdomains':
      return (result.subdomains?.candidates ?? 0) > 0;
    case 'ports':
      return (result.ports?.hosts.length ?? 0) > 0;
    case 'technologies':
      return (result.technologies?.length ?? 0) > 0;
    case 'screenshots':
      return (result.screenshots?.length ?? 0) > 0;
  }
}

function notAttempted(result: ScanResult, stage: StageName): string {
  const status = phaseOf(result, stage)?.status;
  return status === 'skipped' || status === 'cancelled' ? `not attempted (${status})` : 'not attempted';
}

function colorStatus(c: ChalkInstance, phase: PhaseRecord): string {
  const label = phase.status.padEnd(10);
  switch (phase.status) {
    case 'success':
      return c.green(label);
    case 'partial':
      return c.yellow(label);
    case 'failed':
      return c.red(label);
    default:
      return c.gray(label);
  }
}

function formatPort(port: PortResult): string {
  const banner = port.banner ? `  ${port.banner}` : '';
  const via = port.source === 'nmap' ? ' (nmap)' : '';
  return `${`${port.port}/tcp`.padEnd(10)}${port.state.padEnd(9)}${port.service}${via}${banner}`;
}
