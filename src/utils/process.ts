/**
 * Child process helpers for external tools
 */

import { spawn } from 'child_process';
import { logger } from './logger.js';

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  input?: string;
}

/**
 * Run a command to completion, killing it on timeout or abort.
 * Rejects only when the process cannot be spawned.
 */
export function runCommand(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const kill = () => {
      if (proc.exitCode === null) {
        proc.kill('SIGKILL');
      }
    };

    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, options.timeoutMs);

    const onAbort = () => kill();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => {
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (error) => {
      if (!settled) {
        cleanup();
        reject(error);
      }
    });

    proc.on('close', (code) => {
      if (!settled) {
        cleanup();
        resolve({ code, stdout, stderr, timedOut });
      }
    });

    // EPIPE when the tool exits without reading stdin
    proc.stdin.on('error', (error) => logger.debug(`${command} stdin: ${error.message}`));
    if (options.input !== undefined) {
      proc.stdin.write(options.input);
    }
    proc.stdin.end();

    if (options.signal?.aborted) {
      kill();
    }
  });
}

/**
 * True when the binary can be spawned and exits cleanly for the probe arguments
 */
export function isCommandAvailable(command: string, args: string[] = ['--version']): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(command, args, { stdio: 'ignore' });

    proc.on('close', (code) => {
      resolve(code === 0);
    });

    proc.on('error', () => {
      resolve(false);
    });
  });
}
