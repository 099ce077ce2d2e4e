import { Command } from 'commander';
import type { RawArgs } from '../lib/normalizer.js';
import { execute } from './run.js';

/**
 * Register datasource setup commands with Commander
 */
export function registerSetupCommands(program: Command): void {
  const setupCmd = program
    .command('setup')
    .description('Datasource setup commands');

  setupCmd
    .command('hackernews')
    .description('Connect the HackerNews datasource')
    .option('--name <name>', 'Datasource name (default: hackernews)')
    .action(async (options: RawArgs, command: Command) => {
      await execute('setup.hackernews', options, command);
    });
}
