import { Command } from 'commander';
import type { RawArgs } from '../lib/normalizer.js';
import * as output from '../utils/output.js';
import { confirmDestructive, execute, runOptionsOf } from './run.js';

/**
 * Register scheduled job commands with Commander
 */
export function registerJobCommands(program: Command): void {
  const jobCmd = program
    .command('job')
    .description('Scheduled job commands');

  jobCmd
    .command('create')
    .description('Create a job running one or more statements')
    .argument('<job_name>', 'Job name')
    .argument('<statements...>', 'SQL statements, one argument each')
    .option('--project-name <project>', 'Project that owns the job')
    .option('--every <schedule>', 'Schedule, e.g. "every 2 hours" or "day"')
    .option('--start <timestamp>', 'First run, "YYYY-MM-DD[ HH:MM:SS]"')
    .option('--end <timestamp>', 'Last run, "YYYY-MM-DD[ HH:MM:SS]"')
    .option('--if <condition>', 'Only run when this query returns rows')
    .action(
      async (jobName: string, statements: string[], options: RawArgs, command: Command) => {
        await execute('job.create', { ...options, jobName, statements }, command);
      }
    );

  jobCmd
    .command('create-hn-ingest')
    .description('Create a job that keeps ingesting new HackerNews rows into a knowledge base')
    .argument('<job_name>', 'Job name')
    .argument('<kb_name>', 'Knowledge base name')
    .argument('<hn_table>', 'HackerNews table (stories, comments, ...)')
    .option('--project-name <project>', 'Project that owns the job')
    .option('--hn-datasource <name>', 'HackerNews datasource name (default: hackernews)')
    .option('--every <schedule>', 'Schedule (default: "every 1 day")')
    .option('--content-columns <columns>', 'Comma-separated content columns')
    .option('--metadata-map <json>', 'JSON object mapping metadata keys to source columns')
    .option('--id-column <column>', 'ID column (default: id)')
    .option('-l, --limit <number>', 'Maximum rows per run (default: 100)')
    .action(
      async (
        jobName: string,
        kbName: string,
        hnTable: string,
        options: RawArgs,
        command: Command
      ) => {
        await execute('job.create-hn-ingest', { ...options, jobName, kbName, hnTable }, command);
      }
    );

  jobCmd
    .command('list')
    .description('List jobs')
    .option('--project-name <project>', 'Project to list (default: MINDSDB_PROJECT)')
    .action(async (options: RawArgs, command: Command) => {
      await execute('job.list', options, command);
    });

  jobCmd
    .command('status')
    .description('Show the current state of a job')
    .argument('<job_name>', 'Job name')
    .option('--project-name <project>', 'Project that owns the job')
    .action(async (jobName: string, options: RawArgs, command: Command) => {
      await execute('job.status', { ...options, jobName }, command);
    });

  jobCmd
    .command('history')
    .description('Show the run history of a job')
    .argument('<job_name>', 'Job name')
    .option('--project-name <project>', 'Project that owns the job')
    .action(async (jobName: string, options: RawArgs, command: Command) => {
      await execute('job.history', { ...options, jobName }, command);
    });

  jobCmd
    .command('logs')
    .description('Show the latest runs of a job with their errors')
    .argument('<job_name>', 'Job name')
    .option('--project-name <project>', 'Project that owns the job')
    .option('-l, --limit <number>', 'Number of runs (default: 20)')
    .action(async (jobName: string, options: RawArgs, command: Command) => {
      await execute('job.logs', { ...options, jobName }, command);
    });

  jobCmd
    .command('drop')
    .description('Delete a job')
    .argument('<job_name>', 'Job name')
    .option('--project-name <project>', 'Project that owns the job')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (jobName: string, options: RawArgs, command: Command) => {
      const confirmed = await confirmDestructive(`Drop job '${jobName}'?`, {
        ...runOptionsOf(command),
        yes: options.yes === true,
      });
      if (!confirmed) {
        output.info('Cancelled.');
        return;
      }
      await execute('job.drop', { ...options, jobName }, command);
    });
}
