/**
 * Command Runner Tests
 *
 * Spawns the current Node.js binary so the tests run wherever the suite runs.
 */

import { describe, expect, it } from 'vitest';

import { runCommand, withTimeout } from './command-runner.js';
import { CommandNotFoundError, CommandTimeoutError } from './errors.js';

const NODE = process.execPath;

describe('runCommand', () => {
  it('captures stdout of a successful command', async () => {
    const result = await runCommand(NODE, ['-e', 'process.stdout.write("hello")'], {
      timeoutMs: 10_000,
    });

    expect(result).toEqual({ exitCode: 0, stdout: 'hello', stderr: '' });
  });

  it('resolves with the exit code of a failing command', async () => {
    const result = await runCommand(NODE, ['-e', 'process.stderr.write("bad"); process.exit(3)'], {
      timeoutMs: 10_000,
    });

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('bad');
  });

  it('rejects with CommandNotFoundError for a missing binary', async () => {
    await expect(
      runCommand('dmi-identity-no-such-binary', [], { timeoutMs: 10_000 })
    ).rejects.toBeInstanceOf(CommandNotFoundError);
  });

  it('kills a command that exceeds its timeout', async () => {
    const startedAt = Date.now();

    await expect(
      runCommand(NODE, ['-e', 'setTimeout(() => {}, 60_000)'], { timeoutMs: 300 })
    ).rejects.toBeInstanceOf(CommandTimeoutError);

    expect(Date.now() - startedAt).toBeLessThan(10_000);
  }, 15_000);
});

describe('withTimeout', () => {
  it('returns the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'query')).resolves.toBe('done');
  });

  it('rejects when the promise never settles', async () => {
    const never = new Promise<string>(() => {});

    await expect(withTimeout(never, 50, 'query')).rejects.toThrow('query timed out after 50ms');
  });

  it('passes through rejections of the wrapped promise', async () => {
    await expect(withTimeout(Promise.reject(new Error('failed')), 1000, 'query')).rejects.toThrow(
      'failed'
    );
  });
});
