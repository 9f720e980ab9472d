/**
 * Error hierarchy. Per-entity failures are recorded as data; only these are thrown.
 */

export class ReconError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid input detected before any phase runs
 */
export class ConfigurationError extends ReconError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('E_CONFIG', message, options);
  }
}

/**
 * Neither the target nor any discovered subdomain resolved
 */
export class TargetUnresolvableError extends ReconError {
  constructor(target: string) {
    super('E_UNRESOLVABLE', `Target ${target} did not resolve and no subdomains were found`);
  }
}

/**
 * A stage gave up; the pipeline records it on the phase and moves on
 */
export class PhaseAbortError extends ReconError {
  readonly stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super('E_PHASE_ABORT', `${stage}: ${message}`, options);
    this.stage = stage;
  }
}

export class InvalidHostnameError extends ReconError {
  constructor(hostname: string) {
    super('E_HOSTNAME', `Invalid hostname: ${hostname}`);
  }
}

export class PoolBusyError extends ReconError {
  constructor() {
    super('E_POOL_BUSY', 'Worker pool is already running a batch');
  }
}

export class DeadlineExceededError extends ReconError {
  constructor(timeoutMs: number) {
    super('E_DEADLINE', `Deadline of ${timeoutMs}ms exceeded`);
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The `code` of a Node system error, if it has one
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
