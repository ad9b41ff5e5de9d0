/**
 * Fallback Identifiers
 *
 * Weaker identifiers used when no system UUID can be read from firmware:
 * - machine_id: the OS's own locally generated ID (changes on reinstall)
 *   - Linux: /etc/machine-id, then /var/lib/dbus/machine-id
 *   - Windows: MachineGuid from the Cryptography registry key
 *   - macOS: IOPlatformUUID from ioreg
 * - hostname: the network host name (not unique, user-editable)
 *
 * Each source is best-effort; a failing source leaves its key out.
 */

import { readFile } from 'node:fs/promises';
import { hostname as osHostname } from 'node:os';

import { FALLBACK_COMMAND_TIMEOUT_MS, LINUX_MACHINE_ID_PATHS } from '../../config.js';
import { debugLog } from '../../utils/debug.js';
import { runCommand, withTimeout, type CommandRunner } from './command-runner.js';
import { describeError } from './probes/outcomes.js';
import type { FallbackMap } from './types.js';

const INVALID_MACHINE_IDS = new Set(['unavailable', 'uninitialized']);
const INVALID_HOSTNAMES = new Set(['localhost', 'none']);

export interface FallbackResolverOptions {
  platform?: NodeJS.Platform;
  /** Linux machine-id files, in priority order */
  machineIdPaths?: string[];
  runner?: CommandRunner;
  timeoutMs?: number;
  hostname?: () => string;
}

export class FallbackResolver {
  private readonly platform: NodeJS.Platform;
  private readonly machineIdPaths: string[];
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly hostname: () => string;

  constructor(options: FallbackResolverOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.machineIdPaths = options.machineIdPaths ?? LINUX_MACHINE_ID_PATHS;
    this.runner = options.runner ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? FALLBACK_COMMAND_TIMEOUT_MS;
    this.hostname = options.hostname ?? osHostname;
  }

  async resolve(): Promise<FallbackMap> {
    const fallback: FallbackMap = {};

    const machineId = await this.readMachineId();
    if (machineId) {
      fallback.machine_id = machineId;
    }

    const hostname = this.readHostname();
    if (hostname) {
      fallback.hostname = hostname;
    }

    return fallback;
  }

  private async readMachineId(): Promise<string | null> {
    try {
      const raw = await this.readRawMachineId();
      const id = raw?.trim() ?? '';
      if (id.length === 0 || INVALID_MACHINE_IDS.has(id.toLowerCase())) {
        return null;
      }
      return id;
    } catch (error) {
      debugLog(`machine id: ${describeError(error)}`);
      return null;
    }
  }

  private async readRawMachineId(): Promise<string | null> {
    switch (this.platform) {
      case 'win32':
        return this.queryCommand(
          'reg',
          ['query', 'HKLM\\SOFTWARE\\Microsoft\\Cryptography', '/v', 'MachineGuid'],
          /MachineGuid\s+REG_SZ\s+(\S+)/
        );
      case 'darwin':
        return this.queryCommand(
          'ioreg',
          ['-rd1', '-c', 'IOPlatformExpertDevice'],
          /"IOPlatformUUID"\s*=\s*"([^"]+)"/
        );
      default:
        return this.readMachineIdFile();
    }
  }

  private async readMachineIdFile(): Promise<string | null> {
    for (const filePath of this.machineIdPaths) {
      try {
        const id = (await readFile(filePath, 'utf-8')).trim();
        if (id) return id;
      } catch {
        // Try next path
      }
    }
    return null;
  }

  private async queryCommand(file: string, args: string[], pattern: RegExp): Promise<string | null> {
    const result = await withTimeout(
      this.runner(file, args, { timeoutMs: this.timeoutMs }),
      this.timeoutMs,
      file
    );
    if (result.exitCode !== 0) {
      debugLog(`${file} exited with code ${result.exitCode}`);
      return null;
    }
    const match = result.stdout.match(pattern);
    return match ? match[1] : null;
  }

  private readHostname(): string | null {
    try {
      const name = this.hostname().trim();
      if (name.length === 0 || INVALID_HOSTNAMES.has(name.toLowerCase())) {
        return null;
      }
      return name;
    } catch (error) {
      debugLog(`hostname: ${describeError(error)}`);
      return null;
    }
  }
}
