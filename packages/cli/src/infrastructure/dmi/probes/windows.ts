/**
 * Windows Probe
 *
 * Queries the CIM/WMI hardware classes through PowerShell. WMI queries can
 * hang on some drivers, so the query is bounded twice: execFile kills the
 * process at the timeout, and withTimeout stops waiting for it.
 */

import { WINDOWS_QUERY_TIMEOUT_MS } from '../../../config.js';
import { debugLog } from '../../../utils/debug.js';
import { isRecord } from '../../../utils/json.js';
import { runCommand, withTimeout, type CommandRunner } from '../command-runner.js';
import { CommandTimeoutError, DmiParseError } from '../errors.js';
import type { DmiField, PlatformProbe, ProbeReport } from '../types.js';
import { describeError, unavailableOutcome, unavailableReport, valueOutcome } from './outcomes.js';

/**
 * Property of the emitted JSON object for each field
 */
const WINDOWS_PROPERTIES: ReadonlyArray<readonly [DmiField, string]> = [
  ['system_uuid', 'UUID'],
  ['product_serial', 'IdentifyingNumber'],
  ['board_serial', 'BoardSerial'],
  ['chassis_serial', 'ChassisSerial'],
  ['bios_serial', 'BiosSerial'],
  ['product_name', 'Name'],
  ['manufacturer', 'Vendor'],
];

const WINDOWS_FIELDS = WINDOWS_PROPERTIES.map(([field]) => field);

export const CIM_QUERY_SCRIPT = [
  "$ErrorActionPreference = 'SilentlyContinue'",
  '$p = Get-CimInstance -ClassName Win32_ComputerSystemProduct | Select-Object -First 1',
  '$b = Get-CimInstance -ClassName Win32_BIOS | Select-Object -First 1',
  '$m = Get-CimInstance -ClassName Win32_BaseBoard | Select-Object -First 1',
  '$e = Get-CimInstance -ClassName Win32_SystemEnclosure | Select-Object -First 1',
  '[pscustomobject]@{ UUID = $p.UUID; IdentifyingNumber = $p.IdentifyingNumber; Name = $p.Name; Vendor = $p.Vendor; BiosSerial = $b.SerialNumber; BoardSerial = $m.SerialNumber; ChassisSerial = $e.SerialNumber } | ConvertTo-Json -Compress',
].join('; ');

export interface WindowsProbeOptions {
  runner?: CommandRunner;
  timeoutMs?: number;
}

export class WindowsProbe implements PlatformProbe {
  readonly platform = 'win32' as const;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: WindowsProbeOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? WINDOWS_QUERY_TIMEOUT_MS;
  }

  async probe(): Promise<ProbeReport> {
    let stdout: string;
    try {
      const result = await withTimeout(
        this.runner(
          'powershell.exe',
          ['-NoProfile', '-NonInteractive', '-Command', CIM_QUERY_SCRIPT],
          { timeoutMs: this.timeoutMs }
        ),
        this.timeoutMs,
        'CIM query'
      );
      if (result.exitCode !== 0) {
        debugLog(`powershell exited with code ${result.exitCode}: ${result.stderr.trim()}`);
        return unavailableReport(WINDOWS_FIELDS, `powershell exited with code ${result.exitCode}`);
      }
      stdout = result.stdout;
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        console.warn(`⚠️  Hardware query timed out after ${this.timeoutMs}ms and was abandoned`);
      }
      return unavailableReport(WINDOWS_FIELDS, describeError(error));
    }

    let properties: Record<string, unknown>;
    try {
      properties = parseCimOutput(stdout);
    } catch (error) {
      debugLog(describeError(error));
      return unavailableReport(WINDOWS_FIELDS, describeError(error));
    }

    const report: ProbeReport = {};
    for (const [field, property] of WINDOWS_PROPERTIES) {
      const value = properties[property];
      report[field] =
        typeof value === 'string' ? valueOutcome(value) : unavailableOutcome(`${property} not reported`);
    }
    return report;
  }
}

/**
 * Parse the compact JSON object printed by CIM_QUERY_SCRIPT.
 */
export function parseCimOutput(stdout: string): Record<string, unknown> {
  const text = stdout.trim();
  if (text.length === 0) {
    throw new DmiParseError('CIM query', 'empty output');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DmiParseError('CIM query', describeError(error));
  }

  if (!isRecord(parsed)) {
    throw new DmiParseError('CIM query', 'expected a JSON object');
  }
  return parsed;
}
