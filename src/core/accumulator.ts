/**
 * Run-scoped, append-only result accumulator
 */

import type {
  PhaseRecord,
  PipelineState,
  ResolvedHost,
  ScanCounts,
  ScanResult,
  StageName,
  StageOutputs,
} from './types.js';

type StageSlots = { [K in StageName]: StageOutputs[K] | null };

export class ScanAccumulator {
  private target: string;
  private startTime: number;
  private slots: StageSlots = { subdomains: null, ports: null, technologies: null, screenshots: null };
  private phaseRecords: PhaseRecord[] = [];
  private history: PipelineState[] = ['init'];
  private reportPaths: string[] = [];
  private resolvedTarget: ResolvedHost | null = null;
  private endTime: number | null = null;
  private failure?: string;
  private wasInterrupted = false;

  constructor(target: string, startTime = Date.now()) {
    this.target = target;
    this.startTime = startTime;
  }

  get state(): PipelineState {
    return this.history[this.history.length - 1] ?? 'init';
  }

  transition(state: PipelineState): void {
    if (this.endTime !== null) {
      throw new Error(`Run already finished in state ${this.state}`);
    }
    this.history.push(state);
  }

  setTargetHost(host: ResolvedHost): void {
    if (this.resolvedTarget) {
      throw new Error('Target host already recorded');
    }
    this.resolvedTarget = host;
  }

  /**
   * Record a stage's output. Each slot is written once.
   */
  append<K extends StageName>(stage: K, output: StageOutputs[K]): void {
    if (this.slots[stage] !== null) {
      throw new Error(`Stage ${stage} already recorded`);
    }
    this.slots[stage] = output;
  }

  has(stage: StageName): boolean {
    return this.slots[stage] !== null;
  }

  recordPhase(record: PhaseRecord): void {
    this.phaseRecords.push(record);
  }

  addReports(paths: string[]): void {
    this.reportPaths.push(...paths);
  }

  markInterrupted(): void {
    this.wasInterrupted = true;
  }

  fail(message: string): void {
    this.failure = message;
    this.transition('failed');
  }

  /**
   * Stamp the end time. Later transitions are rejected.
   */
  finish(endTime = Date.now()): void {
    this.endTime ??= endTime;
  }

  snapshot(): ScanResult {
    const finishedAt = this.endTime;
    return {
      target: this.target,
      targetHost: this.resolvedTarget,
      state: this.state,
      transitions: [...this.history],
      startedAt: new Date(this.startTime).toISOString(),
      finishedAt: finishedAt === null ? null : new Date(finishedAt).toISOString(),
      durationMs: (finishedAt ?? Date.now()) - this.startTime,
      interrupted: this.wasInterrupted,
      ...(this.failure !== undefined ? { error: this.failure } : {}),
      phases: [...this.phaseRecords],
      subdomains: this.slots.subdomains,
      ports: this.slots.ports,
      technologies: this.slots.technologies,
      screenshots: this.slots.screenshots,
      counts: this.counts(),
      reports: [...this.reportPaths],
    };
  }

  private counts(): ScanCounts {
    const { subdomains, ports, technologies, screenshots } = this.slots;
    return {
      candidates: subdomains?.candidates ?? 0,
      hosts: subdomains?.hosts.length ?? 0,
      openPorts:
        ports?.hosts.reduce(
          (total, host) => total + host.ports.filter((port) => port.state === 'open').length,
          0
        ) ?? 0,
      technologies: new Set(
        (technologies ?? []).flatMap((result) =>
          result.status === 'success' ? result.technologies.map((technology) => technology.name) : []
        )
      ).size,
      endpointsFingerprinted: technologies?.filter((result) => result.status === 'success').length ?? 0,
      endpointsFailed: technologies?.filter((result) => result.status === 'failed').length ?? 0,
      screenshots: screenshots?.filter((result) => result.status === 'success').length ?? 0,
      screenshotsFailed: screenshots?.filter((result) => result.status === 'failed').length ?? 0,
    };
  }
}
