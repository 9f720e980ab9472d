/**
 * reconpipe - concurrent network reconnaissance pipeline
 * Main entry point for programmatic usage
 */

import { App } from './core/app.js';
import type { ScanResult } from './core/types.js';

export { App, type AppDependencies } from './core/app.js';
export { ScanAccumulator } from './core/accumulator.js';
export { resolveConfig } from './core/config.js';
export { DnsResolver, SystemDnsBackend, type DnsBackend, type HostResolver } from './core/resolver.js';
export { SubdomainDiscoverer, buildCandidates } from './core/enumerator.js';
export { PortProber, NodeTcpTransport, mergePortResults, type TcpTransport } from './core/scanner.js';
export { HttpFingerprinter, analyzeResponse } from './core/fingerprint.js';
export { ServiceDetector } from './core/services.js';
export { ReportWriter, formatSummary, formatJson } from './core/report.js';
export {
  SubdomainStage,
  PortStage,
  TechnologyStage,
  ScreenshotStage,
  createDefaultStages,
  type Stage,
  type AnyStage,
  type StageContext,
  type StageFactory,
  type PortSupplement,
  type ScreenshotCapturer,
  type CapturerFactory,
} from './core/stages.js';
export { WorkerPool } from './utils/concurrency.js';
export { NmapRunner } from './nmap/runner.js';
export { WhatWebRunner } from './whatweb/runner.js';
export { ScreenshotRunner, inspectPage } from './screenshot/runner.js';
export * from './core/errors.js';
export type * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'reconpipe';
 *
 * const results = await quickScan('example.com', {
 *   workers: 20,
 *   timeout: 5000,
 * });
 * ```
 */
export async function quickScan(
  domain: string,
  options: {
    workers?: number;
    timeout?: number;
    screenshots?: boolean;
    quiet?: boolean;
  } = {}
): Promise<ScanResult> {
  const app = new App({
    domain,
    workers: options.workers ?? 10,
    timeout: options.timeout ?? 3000,
    phases: { screenshots: options.screenshots ?? false, report: false },
    quiet: options.quiet ?? true,
    format: 'json',
  });

  return await app.run();
}
