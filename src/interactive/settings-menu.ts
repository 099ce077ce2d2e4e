import inquirer from 'inquirer';
import {
  clearConfig,
  getProject,
  getServerUrl,
  getServerUrlSource,
  setProject,
  setServerUrl,
} from '../lib/config-store.js';
import { validateIdentifier, validateUrl, normalizeUrl } from '../lib/validators.js';
import { configShow, probeServer } from '../commands/config.js';
import * as output from '../utils/output.js';
import { getIcon } from '../utils/config.js';

/**
 * Configure the MindsDB URL interactively
 */
async function configureServerUrl(): Promise<void> {
  const currentUrl = getServerUrl();

  output.blank();
  output.keyValue('Current MindsDB URL', currentUrl);

  switch (getServerUrlSource()) {
    case 'environment':
      output.dim('(from environment variable - cannot be changed here)');
      output.info('To change, update the MINDSDB_URL environment variable.');
      return;
    case 'config':
      output.dim('(from saved configuration)');
      break;
    case 'default':
      output.dim('(using default - not configured)');
      break;
  }

  output.blank();

  const { url } = await inquirer.prompt<{ url: string }>([
    {
      type: 'input',
      name: 'url',
      message: 'Enter MindsDB URL:',
      default: currentUrl,
      validate: validateUrl,
    },
  ]);

  const normalized = normalizeUrl(url);
  await probeServer(normalized);

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: 'Save this URL?',
      default: true,
    },
  ]);

  if (confirm) {
    setServerUrl(normalized);
    output.success(`MindsDB URL saved: ${normalized}`);
  } else {
    output.info('Cancelled.');
  }
}

async function configureProject(): Promise<void> {
  const { project } = await inquirer.prompt<{ project: string }>([
    {
      type: 'input',
      name: 'project',
      message: 'Default project:',
      default: getProject(),
      validate: validateIdentifier,
    },
  ]);

  setProject(project.trim());
  output.success(`Default project saved: ${project.trim()}`);
}

async function resetConfig(): Promise<void> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: 'Reset all configuration to defaults?',
      default: false,
    },
  ]);

  if (confirm) {
    clearConfig();
    output.success('Configuration reset to defaults.');
    output.blank();
    output.keyValue('MindsDB URL', getServerUrl());
    output.keyValue('Project', getProject());
  } else {
    output.info('Cancelled.');
  }
}

/**
 * Show the settings menu
 */
export async function showSettingsMenu(): Promise<void> {
  while (true) {
    output.blank();
    output.dim(`MindsDB URL: ${getServerUrl()}  Project: ${getProject()}`);

    const { action } = await inquirer.prompt<{ action: string }>([
      {
        type: 'list',
        name: 'action',
        message: 'Settings:',
        choices: [
          {
            name: `${getIcon('🔗', '>')} Configure MindsDB URL`,
            value: 'config-url',
          },
          {
            name: `${getIcon('📁', '>')} Set default project`,
            value: 'project',
          },
          {
            name: `${getIcon('📋', '>')} View current configuration`,
            value: 'show',
          },
          {
            name: `${getIcon('🔄', '>')} Reset to defaults`,
            value: 'reset',
          },
          new inquirer.Separator(),
          {
            name: `${getIcon('←', '<')} Back`,
            value: 'back',
          },
        ],
      },
    ]);

    if (action === 'back') {
      return;
    }

    switch (action) {
      case 'config-url':
        await configureServerUrl();
        break;
      case 'project':
        await configureProject();
        break;
      case 'show':
        await configShow();
        break;
      case 'reset':
        await resetConfig();
        break;
    }

    // Wait for user to press enter before showing menu again
    await inquirer.prompt([
      {
        type: 'input',
        name: 'continue',
        message: 'Press Enter to continue...',
      },
    ]);
  }
}
