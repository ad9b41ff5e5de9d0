/**
 * Identifier Sanity Filter
 *
 * Many vendors ship unconfigured DMI tables. Values such as
 * "To be filled by O.E.M." would otherwise identify thousands of unrelated
 * machines as the same one.
 */

import { DMI_FIELDS, type IdentifierMap, type ProbeReport } from './types.js';

/**
 * Vendor default strings, compared lowercase
 */
const PLACEHOLDER_VALUES = new Set([
  'to be filled by o.e.m.',
  'default string',
  'none',
  'n/a',
  'not specified',
  'not applicable',
  'unknown',
  'system serial number',
  'system product name',
  'chassis serial number',
  'base board serial number',
  'o.e.m.',
  '0123456789',
]);

/**
 * Values made only of one repeated hex digit and dashes,
 * e.g. 00000000-0000-0000-0000-000000000000 or FFFFFFFF-FFFF-...
 */
const ALL_ZERO = /^[0-]+$/;
const ALL_F = /^[f-]+$/i;

/**
 * Clean a raw identifier.
 *
 * @returns the trimmed value, or null when it is empty or a known placeholder
 */
export function sanitizeIdentifier(raw: string): string | null {
  const value = raw.trim();
  if (value.length === 0) return null;
  if (PLACEHOLDER_VALUES.has(value.toLowerCase())) return null;
  if (ALL_ZERO.test(value) || ALL_F.test(value)) return null;
  return value;
}

/**
 * Keep only the fields of a probe report that hold a usable value.
 */
export function sanitizeProbeReport(report: ProbeReport): IdentifierMap {
  const identifiers: IdentifierMap = {};

  for (const field of DMI_FIELDS) {
    const outcome = report[field];
    if (outcome?.status !== 'value') continue;

    const value = sanitizeIdentifier(outcome.value);
    if (value !== null) {
      identifiers[field] = value;
    }
  }

  return identifiers;
}
