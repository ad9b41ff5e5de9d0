/**
 * Package version, read from package.json at runtime.
 */

import { readFileSync } from 'node:fs';

import { isRecord } from './utils/json.js';

// src/version.ts and dist/version.js both sit one level below package.json
const PACKAGE_JSON_URL = new URL('../package.json', import.meta.url);

export function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, 'utf-8'));
    if (isRecord(packageJson) && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    console.warn(`⚠️  Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return 'unknown';
}
