import inquirer from 'inquirer';
import { runOperation } from '../commands/run.js';
import type { RawArgs } from '../lib/normalizer.js';
import type { OperationKind } from '../lib/operations.js';
import { isPositiveInteger, validateIdentifier, validateRequired } from '../lib/validators.js';
import { showSettingsMenu } from './settings-menu.js';
import * as output from '../utils/output.js';
import { getIcon } from '../utils/config.js';

async function run(kind: OperationKind, raw: RawArgs = {}): Promise<void> {
  try {
    await runOperation(kind, raw);
  } catch (error) {
    output.error((error as Error).message);
  }
}

async function queryKnowledgeBase(): Promise<void> {
  const answers = await inquirer.prompt<{ kbName: string; queryText: string; limit: string }>([
    {
      type: 'input',
      name: 'kbName',
      message: 'Knowledge base:',
      validate: validateIdentifier,
    },
    {
      type: 'input',
      name: 'queryText',
      message: 'Search for:',
      validate: validateRequired('Search text'),
    },
    {
      type: 'input',
      name: 'limit',
      message: 'Maximum results:',
      default: '5',
      validate: (input: string) => isPositiveInteger(input) || 'Enter a whole number above 0',
    },
  ]);
  await run('kb.query', answers);
}

async function askAgent(): Promise<void> {
  const answers = await inquirer.prompt<{ agentName: string; question: string }>([
    {
      type: 'input',
      name: 'agentName',
      message: 'Agent:',
      validate: validateIdentifier,
    },
    {
      type: 'input',
      name: 'question',
      message: 'Question:',
      validate: validateRequired('Question'),
    },
  ]);
  await run('kb.query-agent', answers);
}

/**
 * Show the main interactive menu
 */
export async function showMainMenu(): Promise<void> {
  output.blank();
  output.bold('kbforge');
  output.dim('Interactive mode - Use arrow keys to navigate');
  output.blank();

  while (true) {
    const { action } = await inquirer.prompt<{ action: string }>([
      {
        type: 'list',
        name: 'action',
        message: 'What would you like to do?',
        choices: [
          {
            name: `${getIcon('🗄️', '>')} List databases`,
            value: 'databases',
          },
          {
            name: `${getIcon('🤖', '>')} List models`,
            value: 'models',
          },
          {
            name: `${getIcon('⏱️', '>')} List jobs`,
            value: 'jobs',
          },
          {
            name: `${getIcon('🔍', '>')} Query a knowledge base`,
            value: 'query',
          },
          {
            name: `${getIcon('💬', '>')} Ask an agent`,
            value: 'agent',
          },
          {
            name: `${getIcon('⚙️', '>')} Settings (MindsDB URL, project...)`,
            value: 'settings',
          },
          new inquirer.Separator(),
          {
            name: `${getIcon('❌', 'x')} Exit`,
            value: 'exit',
          },
        ],
      },
    ]);

    switch (action) {
      case 'databases':
        await run('kb.list-databases');
        break;
      case 'models':
        await run('ai.list-models');
        break;
      case 'jobs':
        await run('job.list');
        break;
      case 'query':
        await queryKnowledgeBase();
        break;
      case 'agent':
        await askAgent();
        break;
      case 'settings':
        await showSettingsMenu();
        break;
      case 'exit':
        output.info('Goodbye!');
        return;
    }
  }
}
