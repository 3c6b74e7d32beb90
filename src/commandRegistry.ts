import type { Command } from 'commander';

import { registerAskCommand } from '@/commands/ask.js';
import { registerSplitConfigCommand } from '@/commands/splitConfig.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Server Requests:'),
  registerAskCommand,

  addCommandGroup('Configuration:'),
  registerSplitConfigCommand,
];
