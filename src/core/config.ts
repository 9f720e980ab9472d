/**
 * Configuration defaults and validation
 */

import { ConfigurationError } from './errors.js';
import { isValidDomain, normalizeTarget } from '../utils/hostname.js';
import type { AppConfig, PhaseConfig, ScanConfig } from './types.js';

export const DEFAULT_WORKERS = 10;
export const MAX_WORKERS = 1000;
export const DEFAULT_TIMEOUT_MS = 3000;

const DEFAULT_PHASES: PhaseConfig = {
  subdomains: true,
  ports: true,
  technologies: true,
  screenshots: true,
  report: true,
};

/**
 * Validate raw configuration and fill in defaults. Throws ConfigurationError before anything runs.
 */
export function resolveConfig(config: AppConfig): ScanConfig {
  const target = normalizeTarget(config.domain);
  if (!isValidDomain(target)) {
    throw new ConfigurationError(`Invalid domain: ${config.domain}`);
  }

  const workers = config.workers ?? DEFAULT_WORKERS;
  if (!Number.isInteger(workers) || workers < 1 || workers > MAX_WORKERS) {
    throw new ConfigurationError(`Workers must be an integer between 1 and ${MAX_WORKERS}, got ${workers}`);
  }

  const timeoutMs = positive('Timeout', config.timeout ?? DEFAULT_TIMEOUT_MS);
  const bannerTimeoutMs = positive(
    'Banner timeout',
    config.bannerTimeout ?? Math.max(250, Math.floor(timeoutMs / 2))
  );
  const enrichmentTimeoutMs = positive('Enrichment timeout', config.enrichmentTimeout ?? 15000);
  const screenshotTimeoutMs = positive('Screenshot timeout', config.screenshotTimeout ?? 30000);
  const maxRunTimeMs = config.maxRunTime === undefined ? undefined : positive('Max run time', config.maxRunTime);

  const retries = config.retries ?? 1;
  if (!Number.isInteger(retries) || retries < 0 || retries > 10) {
    throw new ConfigurationError(`Retries must be an integer between 0 and 10, got ${retries}`);
  }

  const ports = config.ports;
  if (ports) {
    const invalid = ports.filter((port) => !Number.isInteger(port) || port < 1 || port > 65535);
    if (invalid.length > 0) {
      throw new ConfigurationError(`Invalid ports: ${invalid.join(', ')}`);
    }
    if (ports.length === 0) {
      throw new ConfigurationError('Port list is empty');
    }
  }

  const format = config.format ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new ConfigurationError(`Invalid format: ${String(format)}. Use text or json.`);
  }

  return {
    target,
    workers,
    timeoutMs,
    bannerTimeoutMs,
    enrichmentTimeoutMs,
    screenshotTimeoutMs,
    retries,
    retryDelayMs: 200,
    wordlistPath: config.wordlist,
    ports: ports ? [...new Set(ports)].sort((a, b) => a - b) : undefined,
    portProfile: config.portProfile ?? 'common',
    outputDir: config.output ?? 'output',
    format,
    phases: {
      subdomains: config.phases?.subdomains ?? DEFAULT_PHASES.subdomains,
      ports: config.phases?.ports ?? DEFAULT_PHASES.ports,
      technologies: config.phases?.technologies ?? DEFAULT_PHASES.technologies,
      screenshots: config.phases?.screenshots ?? DEFAULT_PHASES.screenshots,
      report: config.phases?.report ?? DEFAULT_PHASES.report,
    },
    nmap: config.nmap ?? false,
    whatweb: config.whatweb ?? false,
    certificateTransparency: config.certificateTransparency ?? false,
    validateHttp: config.validateHttp ?? false,
    activeOnly: config.activeOnly ?? false,
    wildcardPolicy: config.wildcardPolicy ?? 'keep',
    dnsServers: config.dnsServers ?? [],
    chromePath: config.chromePath,
    maxRunTimeMs,
    quiet: config.quiet ?? false,
    verbose: config.verbose ?? false,
  };
}

function positive(label: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${label} must be a positive number of milliseconds, got ${value}`);
  }
  return value;
}
