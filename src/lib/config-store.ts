import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';

/**
 * Persisted CLI configuration (config.json)
 */
export interface AppConfig {
  serverUrl?: string;
  project?: string;
}

/**
 * Everything the normalizer and the SQL client need from the environment
 */
export interface Settings {
  serverUrl: string;
  user?: string;
  password?: string;
  project: string;
  googleApiKey?: string;
  googleModel: string;
  ollamaBaseUrl: string;
  embeddingModel: string;
  rerankingModel: string;
}

export const DEFAULT_SERVER_URL = 'http://127.0.0.1:47334';
export const DEFAULT_PROJECT = 'mindsdb';
export const DEFAULT_GOOGLE_MODEL = 'gemini-2.0-flash';
export const DEFAULT_OLLAMA_BASE_URL = 'http://127.0.0.1:11434';
export const DEFAULT_EMBEDDING_MODEL = 'nomic-embed-text';
export const DEFAULT_RERANKING_MODEL = 'llama3';

export type SettingSource = 'environment' | 'config' | 'default';

/**
 * Get the config directory path
 */
export function getConfigDir(): string {
  return process.env.KBFORGE_CONFIG_DIR || join(homedir(), '.config', 'kbforge');
}

/**
 * Get the config file path
 */
export function getConfigFile(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Load configuration from file
 */
export function loadConfig(): AppConfig {
  try {
    const configFile = getConfigFile();
    if (!existsSync(configFile)) {
      return {};
    }

    const parsed: unknown = JSON.parse(readFileSync(configFile, 'utf-8'));
    if (parsed === null || typeof parsed !== 'object') {
      return {};
    }

    const config: AppConfig = {};
    if ('serverUrl' in parsed && typeof parsed.serverUrl === 'string') {
      config.serverUrl = parsed.serverUrl;
    }
    if ('project' in parsed && typeof parsed.project === 'string') {
      config.project = parsed.project;
    }
    return config;
  } catch {
    return {};
  }
}

/**
 * Save configuration to file
 */
export function saveConfig(config: AppConfig): void {
  const configFile = getConfigFile();
  const dir = dirname(configFile);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  // Owner read/write only
  writeFileSync(configFile, JSON.stringify(config, null, 2), {
    mode: 0o600,
  });
}

/**
 * Get the MindsDB URL with priority: env var > persisted config > default
 */
export function getServerUrl(): string {
  return process.env.MINDSDB_URL || loadConfig().serverUrl || DEFAULT_SERVER_URL;
}

export function getServerUrlSource(): SettingSource {
  if (process.env.MINDSDB_URL) {
    return 'environment';
  }
  return loadConfig().serverUrl ? 'config' : 'default';
}

/**
 * Get the default project with priority: env var > persisted config > default
 */
export function getProject(): string {
  return process.env.MINDSDB_PROJECT || loadConfig().project || DEFAULT_PROJECT;
}

export function setServerUrl(url: string): void {
  const config = loadConfig();
  config.serverUrl = url;
  saveConfig(config);
}

export function setProject(project: string): void {
  const config = loadConfig();
  config.project = project;
  saveConfig(config);
}

/**
 * Clear the config (revert to defaults)
 */
export function clearConfig(): void {
  saveConfig({});
}

/**
 * Resolve the full settings struct for one invocation
 */
export function loadSettings(): Settings {
  const env = process.env;
  return {
    serverUrl: getServerUrl(),
    user: env.MINDSDB_USER || undefined,
    password: env.MINDSDB_PASSWORD || undefined,
    project: getProject(),
    googleApiKey: env.GOOGLE_GEMINI_API_KEY || undefined,
    googleModel: env.GOOGLE_MODEL || DEFAULT_GOOGLE_MODEL,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_BASE_URL,
    embeddingModel: env.OLLAMA_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
    rerankingModel: env.OLLAMA_RERANKING_MODEL || DEFAULT_RERANKING_MODEL,
  };
}
