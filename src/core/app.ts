/**
 * Main application orchestrator
 */

import chalk from 'chalk';
import { ScanAccumulator } from './accumulator.js';
import { loadPortCatalog, loadSignatures, loadWordlist, selectPorts } from './catalog.js';
import { resolveConfig } from './config.js';
import {
  ConfigurationError,
  DeadlineExceededError,
  PhaseAbortError,
  TargetUnresolvableError,
  errorMessage,
} from './errors.js';
import { formatJson, formatSummary, ReportWriter, runDirectory, type ReportSink } from './report.js';
import { DnsResolver, type HostResolver } from './resolver.js';
import { ServiceDetector } from './services.js';
import { createDefaultStages, type AnyStage, type Stage, type StageContext, type StageFactory } from './stages.js';
import { selectScanHosts } from './targets.js';
import { WorkerPool } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type { AppConfig, PhaseName, PhaseStatus, ScanConfig, ScanResult, StageName } from './types.js';

const PHASES: ReadonlyArray<{ phase: PhaseName; title: string }> = [
  { phase: 'subdomains', title: 'Discovering subdomains...' },
  { phase: 'ports', title: 'Probing ports...' },
  { phase: 'enrichment', title: 'Enriching web endpoints...' },
];

export interface AppDependencies {
  resolver?: HostResolver;
  /** Built and closed once per run; defaults to the network stages */
  createStages?: StageFactory;
  /** Fixed instances shared by every run. The caller owns and closes them. */
  stages?: AnyStage[];
  reportWriter?: ReportSink;
}

/**
 * Runs the pipeline: subdomains, ports, enrichment, report.
 * Each call to `run` gets its own accumulator, worker pool, stages and run directory.
 */
export class App {
  private config: ScanConfig;
  private resolver: HostResolver;
  private createStages: StageFactory;
  private sharedStages?: AnyStage[];
  private reportWriter: ReportSink;

  constructor(config: AppConfig, dependencies: AppDependencies = {}) {
    this.config = resolveConfig(config);
    this.resolver =
      dependencies.resolver ??
      new DnsResolver({
        timeoutMs: this.config.timeoutMs,
        retries: this.config.retries,
        retryDelayMs: this.config.retryDelayMs,
        servers: this.config.dnsServers,
      });
    this.createStages = dependencies.createStages ?? createDefaultStages;
    this.sharedStages = dependencies.stages;
    this.reportWriter = dependencies.reportWriter ?? new ReportWriter();

    logger.setQuiet(this.config.quiet);
    // keep stdout parseable
    logger.setStderr(this.config.format === 'json');
    if (this.config.verbose) {
      logger.setLevel('debug');
    }
  }

  get settings(): Readonly<ScanConfig> {
    return this.config;
  }

  /**
   * Run the complete scan workflow. Aborting `signal` stops new work and keeps what finished.
   */
  async run(signal?: AbortSignal): Promise<ScanResult> {
    const startTime = new Date();
    const { target, maxRunTimeMs } = this.config;
    const accumulator = new ScanAccumulator(target, startTime.getTime());
    const runDir = runDirectory(this.config.outputDir, target, startTime);

    const deadline = new AbortController();
    const timer =
      maxRunTimeMs === undefined
        ? undefined
        : setTimeout(() => deadline.abort(new DeadlineExceededError(maxRunTimeMs)), maxRunTimeMs);
    const runSignal = signal ? AbortSignal.any([signal, deadline.signal]) : deadline.signal;
    const stages = this.sharedStages ?? this.createStages(this.config, this.resolver);

    try {
      const context = await this.prepare(runSignal, runDir);

      try {
        await this.execute(stages, accumulator, context);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        logger.error(`Scan failed: ${errorMessage(error)}`);
        accumulator.fail(errorMessage(error));
      }

      if (runSignal.aborted) {
        accumulator.markInterrupted();
        logger.warn('Scan interrupted; keeping partial results');
      }

      if (this.config.phases.report) {
        if (accumulator.state !== 'failed') {
          accumulator.transition('report');
        }
        await this.writeReports(accumulator, runDir);
      }

      if (accumulator.state !== 'failed') {
        accumulator.transition('done');
      }
    } finally {
      clearTimeout(timer);
      if (!this.sharedStages) {
        await closeStages(stages);
      }
    }

    accumulator.finish();
    const results = accumulator.snapshot();
    this.outputResults(results);
    return results;
  }

  /**
   * Load run inputs. Any failure here is a configuration problem.
   */
  private async prepare(signal: AbortSignal, runDir: string): Promise<StageContext> {
    const [wordlist, catalog, signatures] = await Promise.all([
      this.config.phases.subdomains ? loadWordlist(this.config.wordlistPath) : Promise.resolve([]),
      loadPortCatalog(),
      loadSignatures(),
    ]);

    return {
      config: this.config,
      pool: new WorkerPool(this.config.workers, signal),
      signal,
      wordlist,
      ports: selectPorts(catalog, this.config.portProfile, this.config.ports),
      services: new ServiceDetector(catalog, signatures.banners),
      signatures,
      runDir,
    };
  }

  private async execute(stages: AnyStage[], accumulator: ScanAccumulator, context: StageContext): Promise<void> {
    const { target } = this.config;

    logger.info(`Resolving ${target}...`);
    const targetHost = await this.resolver.resolve(target, {
      timeoutMs: this.config.timeoutMs,
      signal: context.signal,
    });
    accumulator.setTargetHost(targetHost);
    if (targetHost.success) {
      logger.info(`${target} -> ${targetHost.addresses.join(', ')}`);
    } else {
      logger.warn(`${target} did not resolve (${targetHost.failure ?? 'error'})`);
    }

    for (const [index, { phase, title }] of PHASES.entries()) {
      accumulator.transition(phase);
      logger.step(index + 1, PHASES.length + 1, title);

      for (const stage of stages.filter((candidate) => candidate.phase === phase)) {
        await this.runStage(stage, accumulator, context);
      }

      if (phase === 'subdomains' && !context.signal.aborted) {
        const snapshot = accumulator.snapshot();
        if (selectScanHosts(snapshot.subdomains, snapshot.targetHost).length === 0) {
          throw new TargetUnresolvableError(target);
        }
      }
    }
  }

  /**
   * Run one stage and record its phase. A throwing stage aborts only itself.
   */
  private async runStage<K extends StageName>(
    stage: Stage<K>,
    accumulator: ScanAccumulator,
    context: StageContext
  ): Promise<void> {
    const startedAt = new Date();
    const record = (status: PhaseStatus, warnings: string[] = [], error?: string) =>
      accumulator.recordPhase({
        stage: stage.name,
        phase: stage.phase,
        status,
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - startedAt.getTime(),
        warnings,
        ...(error !== undefined ? { error } : {}),
      });

    if (!this.config.phases[stage.name]) {
      logger.info(chalk.gray(`${stage.name}: skipped`));
      accumulator.append(stage.name, stage.empty());
      record('skipped');
      return;
    }

    if (context.signal.aborted) {
      accumulator.append(stage.name, stage.empty());
      record('cancelled');
      return;
    }

    try {
      const report = await stage.run(accumulator.snapshot(), context);
      accumulator.append(stage.name, report.output);
      for (const warning of report.warnings) {
        logger.warn(`${stage.name}: ${warning}`);
      }
      const status: PhaseStatus = context.signal.aborted
        ? 'cancelled'
        : report.warnings.length > 0
          ? 'partial'
          : 'success';
      record(status, report.warnings);
      logger.success(`${stage.name}: ${status}`);
    } catch (error) {
      const abort =
        error instanceof PhaseAbortError
          ? error
          : new PhaseAbortError(stage.name, errorMessage(error), { cause: error });
      logger.error(abort.message);
      accumulator.append(stage.name, stage.empty());
      record('failed', [], abort.message);
    }
  }

  private async writeReports(accumulator: ScanAccumulator, runDir: string): Promise<void> {
    logger.step(PHASES.length + 1, PHASES.length + 1, 'Writing reports...');
    try {
      const paths = await this.reportWriter.write(accumulator.snapshot(), runDir);
      accumulator.addReports(paths);
      logger.success(`Reports written to ${runDir}`);
    } catch (error) {
      logger.error(`Failed to write reports: ${errorMessage(error)}`);
    }
  }

  /**
   * Print results in the configured format
   */
  private outputResults(results: ScanResult): void {
    if (this.config.quiet) {
      return;
    }
    const output = this.config.format === 'json' ? formatJson(results) : formatSummary(results);
    console.log('\n' + output);
  }
}

async function closeStages(stages: AnyStage[]): Promise<void> {
  for (const stage of stages) {
    try {
      await stage.close?.();
    } catch (error) {
      logger.debug(`Closing ${stage.name} failed: ${errorMessage(error)}`);
    }
  }
}
