/**
 * Identifier Resolver
 *
 * Composes probe, sanity filter, fallback and container detection into the
 * single getDmiInfo() call.
 *
 * Flow for a cache miss:
 *   probe (current OS) → sanitize → [fallback if system_uuid missing] → annotate → cache
 *
 * The `with-fallback` entry is built on top of the `dmi-only` entry, so the
 * platform probe runs at most once per process whichever configs are requested.
 */

import { ResolutionCache } from './cache.js';
import { isContainerized } from './container.js';
import { UnsupportedPlatformError } from './errors.js';
import { FallbackResolver } from './fallback.js';
import { createPlatformProbe } from './probes/index.js';
import { sanitizeProbeReport } from './sanitize.js';
import type { DmiInfo, FallbackMap, PlatformProbe, ResolverConfig } from './types.js';

type CacheKey = 'dmi-only' | 'with-fallback';

export interface IdentifierResolverOptions {
  /** Probe for the current OS; null means the platform is unsupported */
  probe: PlatformProbe | null;
  fallback: { resolve(): Promise<FallbackMap> };
  containerized: () => Promise<boolean>;
  /** Platform name used in the unsupported-platform error */
  platform?: string;
}

export class IdentifierResolver {
  private readonly cache = new ResolutionCache<CacheKey, DmiInfo>();

  constructor(private readonly options: IdentifierResolverOptions) {}

  /**
   * Resolve identifiers for this host.
   *
   * Never rejects for missing, denied or unparsable sources; those fields are
   * simply absent. Rejects with UnsupportedPlatformError when there is no probe.
   */
  getDmiInfo(config: Partial<ResolverConfig> = {}): Promise<DmiInfo> {
    const includeFallback = config.includeFallback ?? true;
    return includeFallback
      ? this.cache.getOrCompute('with-fallback', () => this.resolveWithFallback())
      : this.cache.getOrCompute('dmi-only', () => this.resolvePrimary());
  }

  /** Whether a result (or an in-flight resolution) is cached for this config */
  isCached(config: Partial<ResolverConfig> = {}): boolean {
    return this.cache.has((config.includeFallback ?? true) ? 'with-fallback' : 'dmi-only');
  }

  private async resolvePrimary(): Promise<DmiInfo> {
    const { probe } = this.options;
    if (!probe) {
      throw new UnsupportedPlatformError(this.options.platform ?? process.platform);
    }

    const [report, containerized] = await Promise.all([probe.probe(), this.options.containerized()]);
    return freezeInfo({
      identifiers: sanitizeProbeReport(report),
      fallback: {},
      containerized,
    });
  }

  private async resolveWithFallback(): Promise<DmiInfo> {
    const primary = await this.getDmiInfo({ includeFallback: false });
    if (primary.identifiers.system_uuid) {
      return primary;
    }

    const fallback = await this.options.fallback.resolve();
    return freezeInfo({ ...primary, fallback });
  }
}

/**
 * Cached results are shared by every caller; freeze them so none can alter another's copy.
 */
function freezeInfo(info: DmiInfo): DmiInfo {
  Object.freeze(info.identifiers);
  Object.freeze(info.fallback);
  return Object.freeze(info);
}

// ─── Singleton ───────────────────────────────────────────────────────────────

let resolverInstance: IdentifierResolver | null = null;

/**
 * Get the process-wide resolver.
 * The platform probe is selected once, when the resolver is first created.
 */
export function getIdentifierResolver(): IdentifierResolver {
  if (!resolverInstance) {
    resolverInstance = new IdentifierResolver({
      probe: createPlatformProbe(process.platform),
      fallback: new FallbackResolver(),
      containerized: isContainerized,
      platform: process.platform,
    });
  }
  return resolverInstance;
}

/**
 * Resolve identifiers for this host using the process-wide resolver.
 */
export function getDmiInfo(config: Partial<ResolverConfig> = {}): Promise<DmiInfo> {
  return getIdentifierResolver().getDmiInfo(config);
}

/**
 * Reset the resolver and its cache (for testing).
 * @internal
 */
export function _resetResolverForTesting(): void {
  resolverInstance = null;
}
