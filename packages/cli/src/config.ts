/**
 * DMI Identity Configuration
 *
 * Centralized configuration for probe locations and timeouts.
 */

/** Directory where the Linux kernel exposes DMI fields as text files */
export const LINUX_DMI_DIR = '/sys/class/dmi/id';

/** Candidate locations of the persistent machine identifier on Linux, in priority order */
export const LINUX_MACHINE_ID_PATHS = ['/etc/machine-id', '/var/lib/dbus/machine-id'];

/** Upper bound for the PowerShell CIM query on Windows */
export const WINDOWS_QUERY_TIMEOUT_MS = 5000;

/** Upper bound for `system_profiler` on macOS */
export const MACOS_PROFILER_TIMEOUT_MS = 3000;

/** Upper bound for the commands that read fallback identifiers (reg, ioreg) */
export const FALLBACK_COMMAND_TIMEOUT_MS = 3000;
