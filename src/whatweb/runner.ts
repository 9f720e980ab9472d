/**
 * WhatWeb integration
 */

import { isCommandAvailable, runCommand } from '../utils/process.js';
import type { WhatWebSignature } from '../core/catalog.js';
import type { DetectedTechnology } from '../core/types.js';

export class WhatWebRunner {
  private whatwebPath: string;
  private timeoutMs: number;
  private available?: Promise<boolean>;

  constructor(whatwebPath = 'whatweb', timeoutMs = 30000) {
    this.whatwebPath = whatwebPath;
    this.timeoutMs = timeoutMs;
  }

  isAvailable(): Promise<boolean> {
    this.available ??= isCommandAvailable(this.whatwebPath, ['--version']);
    return this.available;
  }

  /**
   * Raw WhatWeb report for one URL
   */
  async fingerprint(url: string, signal?: AbortSignal): Promise<string> {
    const result = await runCommand(this.whatwebPath, ['--color=never', '--no-errors', url], {
      timeoutMs: this.timeoutMs,
      signal,
    });
    if (result.timedOut) {
      throw new Error(`whatweb timed out after ${this.timeoutMs}ms`);
    }
    if (result.code !== 0) {
      throw new Error(`whatweb exited with code ${result.code}`);
    }
    return result.stdout;
  }
}

/**
 * Plugin names reported by WhatWeb, e.g. `HTTPServer[nginx], PHP[7.4], WordPress`
 */
export function extractPluginNames(output: string): string[] {
  const names = new Set<string>();
  for (const line of output.split('\n')) {
    // skip the "<url> [200 OK]" prefix, then drop plugin arguments
    const body = line.replace(/^\S+\s+\[[^\]]*\]\s*/, '').replace(/\[[^\]]*\]/g, '');
    for (const token of body.split(',')) {
      const name = token.trim();
      if (/^[A-Za-z][\w.-]*$/.test(name)) {
        names.add(name.toLowerCase());
      }
    }
  }
  return [...names];
}

/**
 * Known technologies named in WhatWeb output
 */
export function parseWhatWebOutput(output: string, signatures: WhatWebSignature[]): DetectedTechnology[] {
  const plugins = new Set(extractPluginNames(output));
  return signatures
    .filter((signature) => plugins.has(signature.name.toLowerCase()))
    .map((signature): DetectedTechnology => ({ name: signature.name, category: signature.category, source: 'whatweb' }));
}
