/**
 * Platform Probe Selection
 *
 * Maps the running platform to its probe. The set of variants is closed:
 * any platform not listed here has no probe.
 */

import type { PlatformProbe } from '../types.js';
import { LinuxProbe } from './linux.js';
import { MacosProbe } from './macos.js';
import { WindowsProbe } from './windows.js';

/**
 * Create the probe for a platform, or null when the platform is unsupported.
 */
export function createPlatformProbe(platform: NodeJS.Platform = process.platform): PlatformProbe | null {
  switch (platform) {
    case 'linux':
      return new LinuxProbe();
    case 'win32':
      return new WindowsProbe();
    case 'darwin':
      return new MacosProbe();
    default:
      return null;
  }
}

export { LinuxProbe, type LinuxProbeOptions } from './linux.js';
export { MacosProbe, type MacosProbeOptions } from './macos.js';
export { WindowsProbe, type WindowsProbeOptions } from './windows.js';
