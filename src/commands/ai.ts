import { Command } from 'commander';
import type { RawArgs } from '../lib/normalizer.js';
import * as output from '../utils/output.js';
import { confirmDestructive, execute, runOptionsOf } from './run.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Register AI model commands with Commander
 */
export function registerAiCommands(program: Command): void {
  const aiCmd = program
    .command('ai')
    .description('AI model commands');

  aiCmd
    .command('create-model')
    .description('Create a model that predicts a column from a query')
    .argument('<model_name>', 'Model name')
    .option('--project-name <project>', 'Project that owns the model')
    .option('--select-data-query <sql>', 'Training data query')
    .option('--predict-column <column>', 'Column to predict')
    .option('--engine <engine>', 'ML engine (default: openai)')
    .option('--prompt-template <template>', 'Prompt template for LLM engines')
    .option('--param <key=value>', 'Extra USING parameter, repeatable', collect, [])
    .action(async (modelName: string, options: RawArgs, command: Command) => {
      await execute('ai.create-model', { ...options, modelName }, command);
    });

  aiCmd
    .command('list-models')
    .description('List models')
    .option('--project-name <project>', 'Only list models of this project')
    .action(async (options: RawArgs, command: Command) => {
      await execute('ai.list-models', options, command);
    });

  aiCmd
    .command('describe-model')
    .description('Show details of a model')
    .argument('<model_name>', 'Model name')
    .option('--project-name <project>', 'Project that owns the model')
    .action(async (modelName: string, options: RawArgs, command: Command) => {
      await execute('ai.describe-model', { ...options, modelName }, command);
    });

  aiCmd
    .command('drop-model')
    .description('Delete a model')
    .argument('<model_name>', 'Model name')
    .option('--project-name <project>', 'Project that owns the model')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (modelName: string, options: RawArgs, command: Command) => {
      const confirmed = await confirmDestructive(`Drop model '${modelName}'?`, {
        ...runOptionsOf(command),
        yes: options.yes === true,
      });
      if (!confirmed) {
        output.info('Cancelled.');
        return;
      }
      await execute('ai.drop-model', { ...options, modelName }, command);
    });

  aiCmd
    .command('refresh-model')
    .description('Retrain a model on fresh data')
    .argument('<model_name>', 'Model name')
    .option('--project-name <project>', 'Project that owns the model')
    .action(async (modelName: string, options: RawArgs, command: Command) => {
      await execute('ai.refresh-model', { ...options, modelName }, command);
    });

  aiCmd
    .command('query')
    .description('Run a raw SQL statement')
    .argument('<query_string>', 'SQL to run')
    .action(async (queryString: string, _options: RawArgs, command: Command) => {
      await execute('ai.query', { queryString }, command);
    });
}
