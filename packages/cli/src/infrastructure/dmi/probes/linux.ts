/**
 * Linux Probe
 *
 * Reads the DMI fields the kernel exposes under /sys/class/dmi/id.
 * Most of them are world-readable; the serial numbers are root-only on many
 * distributions and come back as `denied`.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { LINUX_DMI_DIR } from '../../../config.js';
import { debugLog } from '../../../utils/debug.js';
import type { DmiField, PlatformProbe, ProbeOutcome, ProbeReport } from '../types.js';
import { outcomeFromFsError, valueOutcome } from './outcomes.js';

/**
 * sysfs file name for each field. The kernel has no BIOS serial entry.
 */
export const LINUX_DMI_FILES: ReadonlyArray<readonly [DmiField, string]> = [
  ['system_uuid', 'product_uuid'],
  ['board_serial', 'board_serial'],
  ['product_serial', 'product_serial'],
  ['chassis_serial', 'chassis_serial'],
  ['product_name', 'product_name'],
  ['manufacturer', 'sys_vendor'],
];

export interface LinuxProbeOptions {
  /** Directory holding the DMI files (default: /sys/class/dmi/id) */
  dmiDir?: string;
}

export class LinuxProbe implements PlatformProbe {
  readonly platform = 'linux' as const;
  private readonly dmiDir: string;

  constructor(options: LinuxProbeOptions = {}) {
    this.dmiDir = options.dmiDir ?? LINUX_DMI_DIR;
  }

  async probe(): Promise<ProbeReport> {
    const outcomes = await Promise.all(
      LINUX_DMI_FILES.map(async ([field, fileName]) => [field, await this.read(fileName)] as const)
    );

    const report: ProbeReport = {};
    for (const [field, outcome] of outcomes) {
      report[field] = outcome;
    }
    return report;
  }

  private async read(fileName: string): Promise<ProbeOutcome> {
    const filePath = join(this.dmiDir, fileName);
    try {
      return valueOutcome(await readFile(filePath, 'utf-8'));
    } catch (error) {
      const outcome = outcomeFromFsError(error);
      debugLog(`${filePath}: ${outcome.status}`);
      return outcome;
    }
  }
}
