import type { Command } from 'commander';

import { jsonOption } from '@/commands/shared/commonOptions.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { loadConfig, type LoadedConfig } from '@/config/index.js';
import { formatSplitConfig } from '@/ui/formatters/index.js';

interface SplitConfigCommandOptions extends BaseCommandOptions {
  json?: boolean;
}

/**
 * Register the split-config command.
 *
 * The residual file is left in place for the consumer that reads it.
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerSplitConfigCommand(program: Command): void {
  program
    .command('split-config')
    .description('Split an instrument configuration into server, GUI and full views')
    .argument('<file>', 'YAML configuration file')
    .addOption(jsonOption)
    .action(async (file: string, options: SplitConfigCommandOptions) => {
      await runCommand<SplitConfigCommandOptions, LoadedConfig>(
        async () => ({ success: true, data: await loadConfig(file) }),
        options,
        formatSplitConfig
      );
    });
}
