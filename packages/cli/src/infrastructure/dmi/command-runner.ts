/**
 * Bounded Command Execution
 *
 * Every external tool the probes call (powershell, system_profiler, reg, ioreg)
 * goes through runCommand so that it has an upper bound and is killed on timeout.
 *
 * SECURITY: commands are spawned with shell: false; arguments are never
 * interpreted by a shell.
 */

import { execFile } from 'node:child_process';

import { CommandNotFoundError, CommandTimeoutError } from './errors.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeoutMs: number;
}

/**
 * Signature shared by the real runner and test fakes
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: RunCommandOptions
) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/**
 * Run a command and capture its output.
 *
 * Resolves with the exit code for normal exits (including non-zero).
 * Rejects with CommandNotFoundError when the binary is missing and
 * CommandTimeoutError when it had to be killed.
 */
export const runCommand: CommandRunner = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs,
        killSignal: 'SIGKILL',
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
        shell: false,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }

        const code: unknown = error.code;
        if (code === 'ENOENT') {
          reject(new CommandNotFoundError(file));
          return;
        }

        if (error.killed) {
          reject(new CommandTimeoutError(file, options.timeoutMs));
          return;
        }

        if (typeof code === 'number') {
          resolve({ exitCode: code, stdout, stderr });
          return;
        }

        reject(error);
      }
    );
  });

/**
 * Race a promise against an upper bound.
 * The timer is always cleared, whichever side settles first.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CommandTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
