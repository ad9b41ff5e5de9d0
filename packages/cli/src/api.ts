/**
 * Library entry point
 *
 *   import { getDmiInfo } from 'dmi-identity';
 *   const info = await getDmiInfo({ includeFallback: true });
 *   info.identifiers.system_uuid; // primary, from firmware
 *   info.fallback.hostname;       // weaker, only when no system UUID was found
 */

export * from './infrastructure/dmi/index.js';
