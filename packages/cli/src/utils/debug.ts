/**
 * Diagnostic output, enabled with DMI_DEBUG=true
 */
export function debugLog(message: string): void {
  if (process.env.DMI_DEBUG === 'true') {
    console.error(`[dmi] ${message}`);
  }
}
