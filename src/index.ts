#!/usr/bin/env node

import { Command } from 'commander';
import { registerKbCommands } from './commands/kb.js';
import { registerAiCommands } from './commands/ai.js';
import { registerJobCommands } from './commands/job.js';
import { registerSetupCommands } from './commands/setup.js';
import { registerConfigCommands } from './commands/config.js';
import { showMainMenu } from './interactive/main-menu.js';

const program = new Command();

program
  .name('kbforge')
  .description('Manage MindsDB knowledge bases, agents, models and jobs from the command line')
  .version('0.1.0')
  .option('--json', 'Print SQL, outcome and warnings as JSON')
  .option('--dry-run', 'Print the compiled SQL without sending it')
  .option('-q, --quiet', 'Do not echo SQL before running it')
  .option('-i, --interactive', 'Force interactive mode');

// Register all command groups
registerKbCommands(program);
registerAiCommands(program);
registerJobCommands(program);
registerSetupCommands(program);
registerConfigCommands(program);

// Add help examples
program.addHelpText(
  'after',
  `
Examples:
  Setup:
    $ kbforge setup hackernews                      # Connect the HackerNews datasource
    $ kbforge config set-url http://127.0.0.1:47334 # Point at a MindsDB server

  Knowledge bases:
    $ kbforge kb create hn_kb --content-columns title,text
    $ kbforge kb ingest hn_kb --from-hackernews stories --limit 500
    $ kbforge kb query hn_kb "rust async" --metadata-filter '{"score": {"$gt": 50}}'
    $ kbforge kb create-agent hn_agent hn_kb --prompt-template "Answer from HN posts"
    $ kbforge kb query-agent hn_agent "What do people think of Zig?"

  Models:
    $ kbforge ai list-models
    $ kbforge ai drop-model sentiment --yes

  Jobs:
    $ kbforge job create-hn-ingest hn_refresh hn_kb stories --every "every 6 hours"
    $ kbforge job logs hn_refresh --limit 5

  Inspect without running:
    $ kbforge --dry-run kb ingest hn_kb --from-hackernews comments

  Interactive:
    $ kbforge                    # Launch interactive menu
    $ kbforge -i                 # Force interactive mode
`
);

// Parse arguments
const args = process.argv.slice(2);

// If no arguments or -i flag, show interactive menu
if (args.length === 0 || args[0] === '-i' || args[0] === '--interactive') {
  showMainMenu().catch((error: Error) => {
    console.error('Error:', error.message);
    process.exit(1);
  });
} else {
  program.parseAsync().catch((error: Error) => {
    console.error('Error:', error.message);
    process.exit(1);
  });
}
