/**
 * Show command
 * Resolves and prints the hardware identifiers of this machine
 */

import {
  getDmiInfo,
  UnsupportedPlatformError,
  type DmiInfo,
  type ResolverConfig,
} from '../infrastructure/dmi/index.js';
import { formatError } from '../utils/error-formatting.js';

export interface ShowOptions {
  /** Add machine-id/hostname when no system UUID is available */
  fallback: boolean;
  /** Print the result as JSON */
  json: boolean;
}

export interface ShowDeps {
  resolve: (config: Partial<ResolverConfig>) => Promise<DmiInfo>;
}

const LABEL_WIDTH = 16;

/**
 * Render resolved identifiers as display lines
 */
export function formatDmiInfo(info: DmiInfo): string[] {
  const lines: string[] = [];
  const identifiers = Object.entries(info.identifiers);
  const fallback = Object.entries(info.fallback);

  if (identifiers.length === 0 && fallback.length === 0) {
    lines.push('⚪ No identifiers could be resolved');
  }

  for (const [key, value] of identifiers) {
    lines.push(`   ${key.padEnd(LABEL_WIDTH)}${value}`);
  }

  if (fallback.length > 0) {
    lines.push('');
    lines.push('⚠️  Fallback identifiers (not hardware-bound):');
    for (const [key, value] of fallback) {
      lines.push(`   ${key.padEnd(LABEL_WIDTH)}${value}`);
    }
  }

  if (info.containerized) {
    lines.push('');
    lines.push('📦 Running inside a container: identifiers may be shared with other containers');
  }

  return lines;
}

/**
 * @returns process exit code
 */
export async function showDmiInfo(
  options: ShowOptions,
  deps: ShowDeps = { resolve: getDmiInfo }
): Promise<number> {
  let info: DmiInfo;
  try {
    info = await deps.resolve({ includeFallback: options.fallback });
  } catch (error) {
    if (error instanceof UnsupportedPlatformError) {
      formatError(error.message, ['Hardware identifiers can be read on Linux, Windows and macOS']);
      return 1;
    }
    throw error;
  }

  if (options.json) {
    console.log(JSON.stringify(info, null, 2));
    return 0;
  }

  console.log(`\n${'═'.repeat(50)}`);
  console.log(`🖥️  HARDWARE IDENTIFIERS`);
  console.log(`${'═'.repeat(50)}\n`);
  for (const line of formatDmiInfo(info)) {
    console.log(line);
  }
  return 0;
}
