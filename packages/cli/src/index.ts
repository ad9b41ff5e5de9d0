#!/usr/bin/env node
/**
 * dmi-info CLI
 *
 * Prints the hardware identifiers of this machine.
 * Run `dmi-info --help` for usage information.
 */

import { Command } from 'commander';

import { getVersion } from './version.js';

const program = new Command();

program
  .name('dmi-info')
  .description('Read stable hardware identifiers without elevated privileges')
  .version(getVersion());

program
  .command('show', { isDefault: true })
  .description('Print the resolved hardware identifiers')
  .option('--no-fallback', 'Do not add machine-id/hostname when no system UUID is available')
  .option('--json', 'Print the result as JSON')
  .action(async (options: { fallback: boolean; json?: boolean }) => {
    const { showDmiInfo } = await import('./commands/show.js');
    process.exitCode = await showDmiInfo({
      fallback: options.fallback,
      json: options.json === true,
    });
  });

program
  .command('container')
  .description('Report whether this process runs inside a container')
  .action(async () => {
    const { showContainerStatus } = await import('./commands/container.js');
    await showContainerStatus();
  });

await program.parseAsync();
