/**
 * Scan command implementation
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import type { AppConfig, OutputFormat, PortProfile, ScanResult } from '../../core/types.js';

interface ScanOptions {
  domain: string;
  output: string;
  workers: number;
  timeout: number;
  bannerTimeout?: number;
  enrichmentTimeout?: number;
  screenshotTimeout?: number;
  retries: number;
  wordlist?: string;
  ports?: number[] | false;
  topPorts: boolean;
  full: boolean;
  maxTime?: number;
  subdomains: boolean;
  tech: boolean;
  screenshots: boolean;
  report: boolean;
  nmap: boolean;
  whatweb: boolean;
  ct: boolean;
  validateHttp: boolean;
  activeOnly: boolean;
  dropWildcard: boolean;
  dnsServer: string[];
  chromePath?: string;
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export const scanCommand = new Command('scan')
  .description('Discover subdomains, probe ports and fingerprint web endpoints of a domain')
  .requiredOption('-d, --domain <domain>', 'Target domain to scan')
  .option('-o, --output <dir>', 'Directory for run reports', 'output')
  .option('-w, --workers <number>', 'Concurrent workers', parseInteger, 10)
  .option('-t, --timeout <ms>', 'DNS and TCP connect timeout in milliseconds', parseInteger, 3000)
  .option('--banner-timeout <ms>', 'Banner read timeout in milliseconds', parseInteger)
  .option('--enrichment-timeout <ms>', 'HTTP fingerprint timeout in milliseconds', parseInteger)
  .option('--screenshot-timeout <ms>', 'Screenshot timeout in milliseconds', parseInteger)
  .option('--retries <number>', 'Retries for transient DNS failures', parseInteger, 1)
  .option('-W, --wordlist <file>', 'Subdomain wordlist (one label per line)')
  .option('-p, --ports <list>', 'Comma-separated ports to probe, e.g. 22,80,443', parsePortList)
  .option('--top-ports', 'Probe the extended top ports list', false)
  .option('--full', 'Probe all 65535 ports', false)
  .option('--max-time <ms>', 'Stop the run after this many milliseconds', parseInteger)
  .option('--no-subdomains', 'Skip subdomain discovery')
  .option('--no-ports', 'Skip port probing')
  .option('--no-tech', 'Skip technology fingerprinting')
  .option('--no-screenshots', 'Skip screenshots')
  .option('--no-report', 'Do not write report files')
  .option('--nmap', 'Supplement the port scan with nmap', false)
  .option('--whatweb', 'Supplement fingerprinting with whatweb', false)
  .option('--ct', 'Add names from certificate transparency logs (crt.sh)', false)
  .option('--validate-http', 'Check discovered hosts for an HTTP response', false)
  .option('--active-only', 'Only scan hosts that answered HTTP (needs --validate-http)', false)
  .option('--drop-wildcard', 'Drop hosts matching a wildcard DNS record', false)
  .option('--dns-server <ip>', 'DNS server to query (repeatable)', collect, [])
  .option('--chrome-path <path>', 'Chrome or Chromium binary for screenshots')
  .option('-f, --format <type>', 'Console output format: text|json', parseFormat, 'text')
  .option('-q, --quiet', 'Suppress output', false)
  .option('-v, --verbose', 'Debug logging', false)
  .action(async (options: ScanOptions) => {
    try {
      const config = toAppConfig(options);
      const app = new App(config);
      // in json mode stdout carries only the result document
      const decorate = !config.quiet && options.format !== 'json';

      if (decorate) {
        printBanner(app.settings.target, options);
      }

      const controller = new AbortController();
      process.once('SIGINT', () => {
        console.error(chalk.yellow('\n   Interrupted; finishing the current phase and writing reports...'));
        controller.abort();
      });

      const results = await app.run(controller.signal);

      if (decorate) {
        printSummary(results);
      }

      process.exit(results.state === 'failed' ? 1 : 0);
    } catch (error) {
      if (error instanceof Error) {
        console.log(
          chalk.red.bold('\n   ✘ Scan failed\n') +
            chalk.red.bold('   ──────────────────────────────────────────────────────────────\n')
        );
        console.log(chalk.red(`   Error: `) + chalk.white(error.message));
        console.log(chalk.dim('\n   Check your input arguments or network connectivity.\n'));
      }
      process.exit(1);
    }
  });

function toAppConfig(options: ScanOptions): AppConfig {
  const profile: PortProfile = options.full ? 'full' : options.topPorts ? 'top' : 'common';
  return {
    domain: options.domain,
    workers: options.workers,
    timeout: options.timeout,
    bannerTimeout: options.bannerTimeout,
    enrichmentTimeout: options.enrichmentTimeout,
    screenshotTimeout: options.screenshotTimeout,
    retries: options.retries,
    wordlist: options.wordlist,
    ports: options.ports || undefined,
    portProfile: profile,
    output: options.output,
    format: options.format,
    phases: {
      subdomains: options.subdomains,
      ports: options.ports !== false,
      technologies: options.tech,
      screenshots: options.screenshots,
      report: options.report,
    },
    nmap: options.nmap,
    whatweb: options.whatweb,
    certificateTransparency: options.ct,
    validateHttp: options.validateHttp,
    activeOnly: options.activeOnly,
    wildcardPolicy: options.dropWildcard ? 'drop' : 'keep',
    dnsServers: options.dnsServer,
    chromePath: options.chromePath,
    maxRunTime: options.maxTime,
    quiet: options.quiet,
    verbose: options.verbose,
  };
}

function printBanner(target: string, options: ScanOptions): void {
  console.log(
    chalk.cyan.bold('\n╔════════════════════════════════════════════════════════════╗\n') +
      chalk.cyan.bold('║                       🔍 RECONPIPE                          ║\n') +
      chalk.cyan.bold('╚════════════════════════════════════════════════════════════╝\n')
  );

  console.log(chalk.bold('   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(target) + '\n');

  const enabled = (flag: boolean) => (flag ? chalk.green('on') : chalk.dim('off'));
  const ports = options.ports
    ? options.ports.join(',')
    : options.full
      ? 'all'
      : options.topPorts
        ? 'top'
        : 'common';

  console.log(chalk.dim('   Configuration'));
  console.log(chalk.gray('   ├─ Workers          : ') + chalk.white.bold(options.workers.toString()));
  console.log(chalk.gray('   ├─ Timeout          : ') + chalk.white(`${options.timeout}ms`));
  console.log(chalk.gray('   ├─ Ports            : ') + chalk.white(options.ports === false ? 'skipped' : ports));
  console.log(chalk.gray('   ├─ Subdomains       : ') + enabled(options.subdomains));
  console.log(chalk.gray('   ├─ Technologies     : ') + enabled(options.tech));
  console.log(chalk.gray('   ├─ Screenshots      : ') + enabled(options.screenshots));
  if (options.nmap) {
    console.log(chalk.gray('   ├─ nmap             : ') + chalk.red.bold('Enabled'));
  }
  if (options.whatweb) {
    console.log(chalk.gray('   ├─ whatweb          : ') + chalk.red.bold('Enabled'));
  }
  if (options.maxTime !== undefined) {
    console.log(chalk.gray('   ├─ Max run time     : ') + chalk.white(`${options.maxTime}ms`));
  }
  console.log(chalk.gray('   └─ Output           : ') + chalk.blue(options.report ? options.output : 'disabled'));
  console.log(chalk.dim('\n   ┌─ Starting reconnaissance scan... ─────────────────────────────┐'));
  console.log(chalk.dim('   └──────────────────────────────────────────────────────────────┘\n'));
}

function printSummary(results: ScanResult): void {
  if (results.state === 'failed') {
    console.log(
      chalk.red.bold('\n   ✘ Scan failed\n') +
        chalk.red.bold('   ──────────────────────────────────────────────────────────────\n')
    );
    console.log(chalk.red(`   Error: `) + chalk.white(results.error ?? 'unknown error'));
  } else if (results.interrupted) {
    console.log(
      chalk.yellow.bold('\n   ⚠ Scan interrupted; partial results kept\n') +
        chalk.yellow.bold('   ──────────────────────────────────────────────────────────────\n')
    );
  } else {
    console.log(
      chalk.green.bold('\n   ✔ Scan completed successfully!\n') +
        chalk.green.bold('   ──────────────────────────────────────────────────────────────\n')
    );
  }

  const { counts } = results;
  console.log(chalk.bold('   Results Summary'));
  console.log(chalk.gray('   ├─ Hosts resolved          : ') + chalk.cyan.bold(`${counts.hosts} of ${counts.candidates}`));
  console.log(chalk.gray('   ├─ Open ports              : ') + chalk.green.bold(counts.openPorts.toString()));
  console.log(
    chalk.gray('   ├─ Endpoints fingerprinted : ') +
      chalk.green.bold(counts.endpointsFingerprinted.toString()) +
      (counts.endpointsFailed > 0 ? chalk.red(` (${counts.endpointsFailed} failed)`) : '')
  );
  console.log(chalk.gray('   ├─ Technologies            : ') + chalk.magenta.bold(counts.technologies.toString()));
  console.log(
    chalk.gray('   ├─ Screenshots             : ') +
      chalk.green.bold(counts.screenshots.toString()) +
      (counts.screenshotsFailed > 0 ? chalk.red(` (${counts.screenshotsFailed} failed)`) : '')
  );

  if (results.reports.length > 0) {
    console.log(chalk.gray('   └─ Reports                 : ') + chalk.blue.underline(results.reports.join(', ')));
  } else {
    console.log(chalk.gray('   └─ Reports                 : ') + chalk.dim('Disabled'));
  }
  console.log();
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parsePortList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const port = Number(part);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new InvalidArgumentError(`Invalid port: ${part}`);
      }
      return port;
    });
}

function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') {
    return value;
  }
  throw new InvalidArgumentError(`Invalid format: ${value}. Use text or json.`);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
