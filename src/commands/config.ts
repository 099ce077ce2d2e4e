import { Command } from 'commander';
import inquirer from 'inquirer';
import {
  clearConfig,
  getProject,
  getServerUrl,
  getServerUrlSource,
  loadSettings,
  setProject,
  setServerUrl,
} from '../lib/config-store.js';
import { validateIdentifier, validateUrl, normalizeUrl } from '../lib/validators.js';
import * as output from '../utils/output.js';

/**
 * Show current configuration
 */
async function configShow(): Promise<void> {
  output.header('CLI Configuration');
  output.blank();

  const settings = loadSettings();
  output.keyValue('MindsDB URL', settings.serverUrl);
  output.keyValue('Project', settings.project);
  output.keyValue('User', settings.user ?? '(none)');
  output.keyValue('Password', output.maskPassword(settings.password));
  output.keyValue('Google model', settings.googleModel);
  output.keyValue('Google API key', output.maskPassword(settings.googleApiKey));
  output.keyValue('Ollama URL', settings.ollamaBaseUrl);
  output.keyValue('Embedding model', settings.embeddingModel);
  output.keyValue('Reranking model', settings.rerankingModel);
  output.blank();

  switch (getServerUrlSource()) {
    case 'environment':
      output.dim('(URL from MINDSDB_URL)');
      break;
    case 'config':
      output.dim('(URL from saved configuration)');
      break;
    case 'default':
      output.dim('(Using default URL - not configured)');
      break;
  }
}

/**
 * Check that a MindsDB server answers at the given URL
 */
async function probeServer(url: string): Promise<void> {
  output.info(`Testing connection to ${url}...`);
  try {
    const response = await fetch(`${url}/api/status`);
    if (response.ok) {
      output.success('Connection successful!');
    } else {
      output.warn(`Server responded with HTTP ${response.status}. Saving URL anyway.`);
    }
  } catch {
    output.warn('Could not connect to server. Saving URL anyway.');
    output.dim('(You can configure the URL now and start MindsDB later)');
  }
}

/**
 * Set the MindsDB URL interactively or from argument
 */
async function configSetUrl(url?: string): Promise<void> {
  let targetUrl = url;

  if (!targetUrl) {
    const answer = await inquirer.prompt<{ url: string }>([
      {
        type: 'input',
        name: 'url',
        message: 'Enter MindsDB URL (e.g., http://127.0.0.1:47334):',
        default: getServerUrl(),
        validate: validateUrl,
      },
    ]);
    targetUrl = answer.url;
  }

  const normalized = normalizeUrl(targetUrl);

  const validation = validateUrl(normalized);
  if (validation !== true) {
    output.error(validation === false ? 'Invalid URL' : validation);
    process.exit(1);
  }

  await probeServer(normalized);
  setServerUrl(normalized);

  output.blank();
  output.success(`MindsDB URL set to: ${normalized}`);
  if (getServerUrlSource() === 'environment') {
    output.warn('MINDSDB_URL is set and still takes precedence.');
  }
}

/**
 * Set the default project
 */
async function configSetProject(project: string): Promise<void> {
  const validation = validateIdentifier(project);
  if (validation !== true) {
    output.error(validation === false ? 'Invalid project name' : validation);
    process.exit(1);
  }

  setProject(project.trim());
  output.success(`Default project set to: ${getProject()}`);
}

/**
 * Reset configuration to defaults
 */
async function configReset(): Promise<void> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: 'Reset configuration to defaults?',
      default: false,
    },
  ]);

  if (!confirm) {
    output.info('Cancelled.');
    return;
  }

  clearConfig();
  output.success('Configuration reset to defaults.');
  output.blank();
  output.keyValue('MindsDB URL', getServerUrl());
  output.keyValue('Project', getProject());
}

/**
 * Register config commands with Commander
 */
export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('CLI configuration commands');

  configCmd
    .command('show')
    .description('Show current configuration')
    .action(async () => {
      await configShow();
    });

  configCmd
    .command('set-url [url]')
    .description('Set the MindsDB server URL')
    .action(async (url?: string) => {
      await configSetUrl(url);
    });

  configCmd
    .command('set-project <project>')
    .description('Set the default project for models and jobs')
    .action(async (project: string) => {
      await configSetProject(project);
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await configReset();
    });
}

// Export for interactive mode
export { configShow, configSetUrl, configSetProject, configReset, probeServer };
