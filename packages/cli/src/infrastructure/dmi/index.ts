/**
 * DMI Infrastructure
 *
 * Public API for hardware identifier resolution.
 * Only exports symbols that are used by consumers outside this module.
 */

// Types
export type {
  DmiField,
  DmiInfo,
  FallbackField,
  FallbackMap,
  IdentifierKey,
  IdentifierMap,
  PlatformProbe,
  ProbeOutcome,
  ProbeReport,
  ResolverConfig,
  SupportedPlatform,
} from './types.js';
export { DMI_FIELDS, FALLBACK_FIELDS } from './types.js';

// Errors
export {
  CommandNotFoundError,
  CommandTimeoutError,
  DmiParseError,
  UnsupportedPlatformError,
} from './errors.js';

// Resolution
export { getDmiInfo, getIdentifierResolver, IdentifierResolver } from './resolver.js';
export { isContainerized, detectContainer } from './container.js';
export { sanitizeIdentifier } from './sanitize.js';
