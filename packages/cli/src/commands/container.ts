/**
 * Container command
 * Reports whether this process runs inside a container runtime
 */

import { isContainerized } from '../infrastructure/dmi/index.js';

export async function showContainerStatus(
  detect: () => Promise<boolean> = isContainerized
): Promise<void> {
  if (await detect()) {
    console.log(`📦 Running inside a container`);
    console.log(`   DMI identifiers may belong to the host and be shared across containers.`);
  } else {
    console.log(`✅ Not running inside a container`);
  }
}
