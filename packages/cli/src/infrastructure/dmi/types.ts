/**
 * DMI Identity Types
 *
 * Type definitions for hardware identifier probing and resolution.
 */

/**
 * Identifiers read from the firmware descriptor tables (primary provenance)
 */
export type DmiField =
  | 'system_uuid'
  | 'board_serial'
  | 'product_serial'
  | 'chassis_serial'
  | 'bios_serial'
  | 'product_name'
  | 'manufacturer';

/**
 * All primary fields, in display order
 */
export const DMI_FIELDS: readonly DmiField[] = [
  'system_uuid',
  'board_serial',
  'product_serial',
  'chassis_serial',
  'bios_serial',
  'product_name',
  'manufacturer',
];

/**
 * Weaker OS-generated or network-derived identifiers (fallback provenance)
 */
export type FallbackField = 'machine_id' | 'hostname';

export const FALLBACK_FIELDS: readonly FallbackField[] = ['machine_id', 'hostname'];

export type IdentifierKey = DmiField | FallbackField;

/**
 * Per-field result of one probe attempt.
 *
 * `denied` means the source exists but needs privilege. It is reported
 * separately from `unavailable` for diagnostics only; neither aborts resolution.
 */
export type ProbeOutcome =
  | { status: 'value'; value: string }
  | { status: 'unavailable'; reason: string }
  | { status: 'denied'; reason: string };

export type ProbeReport = Partial<Record<DmiField, ProbeOutcome>>;

/**
 * Platforms that have a probe implementation
 */
export type SupportedPlatform = 'linux' | 'win32' | 'darwin';

/**
 * Reads raw identifier fields from the OS.
 * Implementations never reject: every failure is folded into the report.
 */
export interface PlatformProbe {
  readonly platform: SupportedPlatform;
  probe(): Promise<ProbeReport>;
}

export type IdentifierMap = Partial<Record<DmiField, string>>;
export type FallbackMap = Partial<Record<FallbackField, string>>;

/**
 * Resolved identifiers for the current host
 */
export interface DmiInfo {
  /** Firmware identifiers that passed the sanity filter */
  identifiers: IdentifierMap;
  /** Fallback identifiers, only filled when system_uuid is missing and fallback is enabled */
  fallback: FallbackMap;
  /** Whether the process appears to run inside a container runtime */
  containerized: boolean;
}

/**
 * Caller-supplied resolution options
 */
export interface ResolverConfig {
  /** Add machine-id/hostname when no system UUID can be resolved (default: true) */
  includeFallback: boolean;
}
