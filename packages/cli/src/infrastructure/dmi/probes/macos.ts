/**
 * macOS Probe
 *
 * Runs `system_profiler SPHardwareDataType -json`, which any user may call,
 * and reads the hardware overview entry.
 */

import { MACOS_PROFILER_TIMEOUT_MS } from '../../../config.js';
import { debugLog } from '../../../utils/debug.js';
import { isRecord } from '../../../utils/json.js';
import { runCommand, withTimeout, type CommandRunner } from '../command-runner.js';
import { DmiParseError } from '../errors.js';
import type { DmiField, PlatformProbe, ProbeReport } from '../types.js';
import { describeError, unavailableOutcome, unavailableReport, valueOutcome } from './outcomes.js';

const HARDWARE_DATA_TYPE = 'SPHardwareDataType';

/**
 * Key in the hardware entry for each field
 */
const PROFILER_KEYS: ReadonlyArray<readonly [DmiField, string]> = [
  ['system_uuid', 'platform_UUID'],
  ['product_serial', 'serial_number'],
  ['product_name', 'machine_model'],
];

const MACOS_FIELDS: readonly DmiField[] = [...PROFILER_KEYS.map(([field]) => field), 'manufacturer'];

export interface MacosProbeOptions {
  runner?: CommandRunner;
  timeoutMs?: number;
}

export class MacosProbe implements PlatformProbe {
  readonly platform = 'darwin' as const;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: MacosProbeOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? MACOS_PROFILER_TIMEOUT_MS;
  }

  async probe(): Promise<ProbeReport> {
    let hardware: Record<string, unknown>;
    try {
      const result = await withTimeout(
        this.runner('system_profiler', [HARDWARE_DATA_TYPE, '-json'], { timeoutMs: this.timeoutMs }),
        this.timeoutMs,
        'system_profiler'
      );
      if (result.exitCode !== 0) {
        debugLog(`system_profiler exited with code ${result.exitCode}: ${result.stderr.trim()}`);
        return unavailableReport(MACOS_FIELDS, `system_profiler exited with code ${result.exitCode}`);
      }
      hardware = parseHardwareOverview(result.stdout);
    } catch (error) {
      debugLog(describeError(error));
      return unavailableReport(MACOS_FIELDS, describeError(error));
    }

    const report: ProbeReport = {};
    for (const [field, key] of PROFILER_KEYS) {
      const value = hardware[key];
      report[field] = typeof value === 'string' ? valueOutcome(value) : unavailableOutcome(`${key} not reported`);
    }
    // system_profiler only runs on Apple hardware
    report.manufacturer = valueOutcome('Apple Inc.');
    return report;
  }
}

/**
 * Extract the first SPHardwareDataType entry from system_profiler JSON output.
 */
export function parseHardwareOverview(stdout: string): Record<string, unknown> {
  if (stdout.trim().length === 0) {
    throw new DmiParseError('system_profiler', 'empty output');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new DmiParseError('system_profiler', describeError(error));
  }

  const entries = isRecord(parsed) ? parsed[HARDWARE_DATA_TYPE] : undefined;
  if (!Array.isArray(entries) || entries.length === 0) {
    throw new DmiParseError('system_profiler', `missing ${HARDWARE_DATA_TYPE} entries`);
  }

  const [first]: unknown[] = entries;
  if (!isRecord(first)) {
    throw new DmiParseError('system_profiler', `${HARDWARE_DATA_TYPE} entry is not an object`);
  }
  return first;
}
