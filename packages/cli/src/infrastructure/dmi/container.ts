/**
 * Container Detection
 *
 * Inside containers the DMI tables are the host's (or a hypervisor's) and are
 * shared by every container on that host. The flag lets callers decide how far
 * to trust the identifiers; it never changes which identifiers are returned.
 *
 * Fingerprints checked:
 * - marker files: /.dockerenv (Docker), /run/.containerenv (Podman)
 * - /proc/self/cgroup mentioning a container runtime
 * - environment: `container` (systemd convention) or KUBERNETES_SERVICE_HOST
 */

import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';

const MARKER_FILES = ['.dockerenv', join('run', '.containerenv')];
const CGROUP_FILE = join('proc', 'self', 'cgroup');
const CGROUP_RUNTIME_PATTERN = /docker|containerd|kubepods|lxc|podman/;
const ENV_MARKERS = ['container', 'KUBERNETES_SERVICE_HOST'];

export interface ContainerDetectionOptions {
  /** Filesystem root to look for markers under (default: /) */
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Check the current environment for container-runtime fingerprints.
 */
export async function detectContainer(options: ContainerDetectionOptions = {}): Promise<boolean> {
  const rootDir = options.rootDir ?? '/';
  const env = options.env ?? process.env;

  if (ENV_MARKERS.some((name) => Boolean(env[name]))) {
    return true;
  }

  for (const marker of MARKER_FILES) {
    if (await exists(join(rootDir, marker))) {
      return true;
    }
  }

  try {
    const cgroup = await readFile(join(rootDir, CGROUP_FILE), 'utf-8');
    return CGROUP_RUNTIME_PATTERN.test(cgroup);
  } catch {
    // No cgroup file (macOS, Windows) or unreadable: no fingerprint
    return false;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

// ─── Process-wide flag ───────────────────────────────────────────────────────

let containerFlag: Promise<boolean> | null = null;

/**
 * Whether this process runs in a container. Detected once per process.
 */
export function isContainerized(): Promise<boolean> {
  if (!containerFlag) {
    containerFlag = detectContainer();
  }
  return containerFlag;
}

/**
 * Forget the detected flag (for testing).
 * @internal
 */
export function _resetContainerFlagForTesting(): void {
  containerFlag = null;
}
