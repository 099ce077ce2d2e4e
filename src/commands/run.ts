import { Command } from 'commander';
import inquirer from 'inquirer';
import { loadSettings } from '../lib/config-store.js';
import { dispatch, type DispatchResult } from '../lib/dispatcher.js';
import type { RawArgs } from '../lib/normalizer.js';
import type { OperationKind } from '../lib/operations.js';
import { NO_RESULTS_MESSAGE } from '../lib/renderer.js';
import { createSqlExecutor } from '../lib/sql-client.js';
import * as output from '../utils/output.js';

export interface RunOptions {
  json?: boolean;
  dryRun?: boolean;
  quiet?: boolean;
}

/**
 * Read the program-level flags (--json, --dry-run, --quiet) for a subcommand
 */
export function runOptionsOf(command: Command): RunOptions {
  const globals = command.optsWithGlobals();
  return {
    json: globals.json === true,
    dryRun: globals.dryRun === true,
    quiet: globals.quiet === true,
  };
}

/**
 * Print a dispatch result the way the rest of the CLI prints things
 */
export function printResult(result: DispatchResult, options: RunOptions): void {
  if (options.json) {
    console.log(
      JSON.stringify(
        { sql: result.statements, outcome: result.outcome, warnings: result.warnings },
        null,
        2
      )
    );
    return;
  }

  for (const warning of result.warnings) {
    output.warn(`Warning: ${warning}`);
  }

  if (!result.executed && result.outcome.type !== 'failure') {
    output.block(result.text);
    return;
  }

  switch (result.outcome.type) {
    case 'failure':
      output.block(result.text, 'error');
      break;
    case 'empty':
      output.block(result.text, result.text === NO_RESULTS_MESSAGE ? 'warn' : 'success');
      break;
    case 'rows':
      output.block(result.text);
      break;
  }
}

/**
 * Run one operation against the configured server and print the result
 * Throws on transport-independent errors - caller handles error display and exit
 */
export async function runOperation(
  kind: OperationKind,
  raw: RawArgs,
  options: RunOptions = {}
): Promise<DispatchResult> {
  const settings = loadSettings();
  const result = await dispatch(kind, raw, createSqlExecutor(settings), settings, {
    dryRun: options.dryRun,
    onStatement: options.quiet || options.json ? undefined : output.sql,
  });

  printResult(result, options);
  return result;
}

/**
 * Ask before a destructive statement unless --yes or --dry-run was given
 */
export async function confirmDestructive(
  message: string,
  options: { yes?: boolean; dryRun?: boolean }
): Promise<boolean> {
  if (options.yes || options.dryRun) {
    return true;
  }

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message,
      default: false,
    },
  ]);
  return confirm;
}

/**
 * Commander action body shared by every SQL-backed command
 */
export async function execute(
  kind: OperationKind,
  raw: RawArgs,
  command: Command
): Promise<void> {
  try {
    const result = await runOperation(kind, raw, runOptionsOf(command));
    if (result.outcome.type === 'failure') {
      process.exitCode = 1;
    }
  } catch (error) {
    output.error((error as Error).message);
    process.exit(1);
  }
}
