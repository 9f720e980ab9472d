/**
 * Tests for external command helpers, using the running node binary as the tool
 */

import { describe, it, expect } from 'vitest';
import { isCommandAvailable, runCommand } from '../src/utils/process.js';

const node = process.execPath;
const MISSING = 'reconpipe-no-such-binary';

describe('runCommand', () => {
  it('should collect output and the exit code', async () => {
    const result = await runCommand(
      node,
      ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      { timeoutMs: 10000 }
    );

    expect(result).toEqual({ code: 3, stdout: 'out', stderr: 'err', timedOut: false });
  });

  it('should write input to stdin', async () => {
    const result = await runCommand(node, ['-e', 'process.stdin.pipe(process.stdout)'], {
      timeoutMs: 10000,
      input: 'https://example.com\n',
    });

    expect(result.code).toBe(0);
    expect(result.stdout).toBe('https://example.com\n');
  });

  it('should kill a process that outlives its timeout', async () => {
    const result = await runCommand(node, ['-e', 'setTimeout(() => {}, 30000)'], { timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.code).toBeNull();
  });

  it('should kill the process when aborted', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);

    const result = await runCommand(node, ['-e', 'setTimeout(() => {}, 30000)'], {
      timeoutMs: 30000,
      signal: controller.signal,
    });

    expect(result.timedOut).toBe(false);
    expect(result.code).toBeNull();
  });

  it('should reject when the binary cannot be spawned', async () => {
    await expect(runCommand(MISSING, [], { timeoutMs: 1000 })).rejects.toMatchObject({ code: 'ENOENT' });
  });
});

describe('isCommandAvailable', () => {
  it('should accept a binary that exits cleanly', async () => {
    await expect(isCommandAvailable(node, ['--version'])).resolves.toBe(true);
  });

  it('should reject a missing binary or a failing check', async () => {
    await expect(isCommandAvailable(MISSING)).resolves.toBe(false);
    await expect(isCommandAvailable(node, ['-e', 'process.exit(1)'])).resolves.toBe(false);
  });
});
