/**
 * Helpers shared by the platform probes for building ProbeOutcome values.
 */

import type { DmiField, ProbeOutcome, ProbeReport } from '../types.js';

export function valueOutcome(value: string): ProbeOutcome {
  return { status: 'value', value };
}

export function unavailableOutcome(reason: string): ProbeOutcome {
  return { status: 'unavailable', reason };
}

/**
 * Mark every field a probe is responsible for as unavailable.
 * Used when the single query behind all fields failed.
 */
export function unavailableReport(fields: readonly DmiField[], reason: string): ProbeReport {
  const report: ProbeReport = {};
  for (const field of fields) {
    report[field] = unavailableOutcome(reason);
  }
  return report;
}

/**
 * Map a filesystem error to an outcome. Permission errors become `denied`,
 * everything else (missing file, I/O error) `unavailable`.
 */
export function outcomeFromFsError(error: unknown): ProbeOutcome {
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'EACCES' || code === 'EPERM') {
    return { status: 'denied', reason: message };
  }
  return unavailableOutcome(message);
}

/**
 * Short description of a failure, for outcome reasons and debug output
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
