/**
 * DMI Error Types
 *
 * Only UnsupportedPlatformError ever reaches callers of the resolver.
 * The others are raised inside probes and folded into `unavailable` outcomes.
 */

/** The executable was not found on PATH */
export class CommandNotFoundError extends Error {
  readonly name = 'CommandNotFoundError';

  constructor(readonly command: string) {
    super(`Command not found: ${command}`);
  }
}

/** A platform query exceeded its upper bound */
export class CommandTimeoutError extends Error {
  readonly name = 'CommandTimeoutError';

  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

/** Command or file output did not have the expected structure */
export class DmiParseError extends Error {
  readonly name = 'DmiParseError';

  constructor(
    readonly source: string,
    detail: string
  ) {
    super(`Could not parse ${source} output: ${detail}`);
  }
}

/** No probe exists for the current operating system */
export class UnsupportedPlatformError extends Error {
  readonly name = 'UnsupportedPlatformError';

  constructor(readonly platform: string) {
    super(`Unsupported platform: ${platform}. Supported platforms are linux, win32 and darwin.`);
  }
}
