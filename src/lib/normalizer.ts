import { CliError, ErrorKind, missingField } from './errors.js';
import { toFilterExpression } from './filters.js';
import type {
  ColumnSpec,
  CommandRequest,
  CreateAgentRequest,
  IngestRequest,
  JsonValue,
  ModelConfig,
  ObjectRef,
  OperationKind,
  OrderBy,
  Schedule,
  TableRef,
} from './operations.js';
import type { Settings } from './config-store.js';
import { isPositiveInteger, normalizeUrl } from './validators.js';

export const DEFAULT_INGEST_LIMIT = 100;
export const DEFAULT_QUERY_LIMIT = 5;
export const DEFAULT_JOB_LOG_LIMIT = 20;
export const DEFAULT_EVALUATE_COUNT = 100;
export const DEFAULT_HN_DATASOURCE = 'hackernews';
export const DEFAULT_HN_JOB_SCHEDULE = 'every 1 day';
export const DEFAULT_EMBEDDING_PROVIDER = 'ollama';
export const DEFAULT_MODEL_ENGINE = 'openai';

/**
 * Values as Commander hands them over: option values plus named positionals
 */
export type RawValue = string | boolean | string[] | undefined;
export type RawArgs = Record<string, RawValue>;

/**
 * Default ingestion columns per HackerNews table kind
 */
export function defaultColumnsFor(tableKind: string): ColumnSpec {
  const identity = (...columns: string[]): Array<[string, string]> =>
    columns.map((column) => [column, column]);

  switch (tableKind) {
    case 'stories':
      return {
        contentColumns: ['title', 'text'],
        metadata: identity('id', 'by', 'score', 'time', 'descendants', 'url'),
      };
    case 'comments':
      return {
        contentColumns: ['text'],
        metadata: identity('id', 'by', 'parent', 'time'),
      };
    default:
      return {
        contentColumns: ['text'],
        metadata: identity('id'),
      };
  }
}

export function parseColumnList(text: string, label: string): string[] {
  const columns = text.split(',').map((column) => column.trim());
  if (columns.some((column) => column === '')) {
    throw new CliError(
      ErrorKind.InvalidValue,
      `${label} contains an empty entry: "${text}"`,
      label
    );
  }
  return columns;
}

export function parseJsonOption(text: string, flag: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CliError(
      ErrorKind.InvalidJSON,
      `Invalid JSON in ${flag}: ${(error as Error).message}. Received: ${text}\n` +
        `Hint: in bash/zsh wrap the JSON in single quotes; in PowerShell or cmd escape the inner double quotes (\\").`,
      flag
    );
  }
}

export function parseTableRef(text: string, label: string): TableRef {
  const parts = text.split('.').map((part) => part.trim());
  if (parts.length !== 2 || parts.some((part) => part === '')) {
    throw new CliError(
      ErrorKind.InvalidValue,
      `${label} must look like <datasource>.<table>, got "${text}"`,
      label
    );
  }
  return { datasource: parts[0], table: parts[1] };
}

export function parseOrderBy(text: string): OrderBy {
  const match = /^(\S+)(?:\s+(asc|desc))?$/i.exec(text.trim());
  if (!match) {
    throw new CliError(
      ErrorKind.InvalidValue,
      `--order-by must look like "<column> [ASC|DESC]", got "${text}"`,
      '--order-by'
    );
  }
  const direction = match[2]?.toUpperCase();
  return {
    column: match[1],
    direction: direction === 'ASC' || direction === 'DESC' ? direction : undefined,
  };
}

export function parseSchedule(text: string): Schedule {
  const match = /^(?:every\s+)?(?:(\d+)\s+)?(minute|hour|day|week|month)s?$/i.exec(
    text.trim()
  );
  if (!match) {
    throw new CliError(
      ErrorKind.InvalidValue,
      `Schedule must look like "every 2 hours" or "day", got "${text}"`,
      '--every'
    );
  }

  const unit = match[2].toLowerCase();
  if (
    unit !== 'minute' &&
    unit !== 'hour' &&
    unit !== 'day' &&
    unit !== 'week' &&
    unit !== 'month'
  ) {
    throw new CliError(ErrorKind.InvalidValue, `Unknown schedule unit "${unit}"`, '--every');
  }

  const count = match[1] === undefined ? undefined : parseInt(match[1], 10);
  if (count === 0) {
    throw new CliError(
      ErrorKind.InvalidValue,
      `Schedule count must be at least 1, got "${text}"`,
      '--every'
    );
  }

  return { count, unit };
}

/**
 * Accepts YYYY-MM-DD and YYYY-MM-DD HH:MM:SS
 */
export function parseTimestamp(text: string, flag: string): string {
  const value = text.trim();
  if (!/^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/.test(value)) {
    throw new CliError(
      ErrorKind.InvalidValue,
      `${flag} must be "YYYY-MM-DD" or "YYYY-MM-DD HH:MM:SS", got "${text}"`,
      flag
    );
  }
  return value;
}

/**
 * Parse repeated key=value options, keeping order and duplicates
 */
export function parseParamPairs(values: string[]): Array<[string, string]> {
  return values.map((pair) => {
    const separator = pair.indexOf('=');
    const key = separator === -1 ? '' : pair.slice(0, separator).trim();
    if (!key) {
      throw new CliError(
        ErrorKind.InvalidValue,
        `--param expects key=value, got "${pair}"`,
        '--param'
      );
    }
    return [key, pair.slice(separator + 1)];
  });
}

function parseMetadataMap(value: JsonValue, flag: string): Array<[string, string]> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new CliError(ErrorKind.InvalidJSON, `${flag} must be a JSON object`, flag);
  }
  return Object.entries(value).map(([key, source]) => {
    if (typeof source !== 'string') {
      throw new CliError(
        ErrorKind.InvalidJSON,
        `${flag} values must be source column names (strings); '${key}' is not`,
        flag
      );
    }
    return [key, source];
  });
}

/**
 * Typed accessors over the raw Commander values
 */
class RawReader {
  constructor(private readonly raw: RawArgs) {}

  string(key: string): string | undefined {
    const value = this.raw[key];
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }

  /** Untrimmed text, for values where whitespace is content */
  text(key: string): string | undefined {
    const value = this.raw[key];
    return typeof value === 'string' && value.trim() !== '' ? value : undefined;
  }

  required(key: string, label: string): string {
    const value = this.string(key);
    if (value === undefined) throw missingField(label);
    return value;
  }

  requiredText(key: string, label: string): string {
    const value = this.text(key);
    if (value === undefined) throw missingField(label);
    return value;
  }

  list(key: string, label: string): string[] | undefined {
    const value = this.string(key);
    return value === undefined ? undefined : parseColumnList(value, label);
  }

  repeated(key: string): string[] {
    const value = this.raw[key];
    if (Array.isArray(value)) return value;
    return typeof value === 'string' ? [value] : [];
  }

  flag(key: string): boolean {
    return this.raw[key] === true;
  }

  positiveInt(key: string, label: string, fallback: number): number {
    const value = this.string(key);
    if (value === undefined) return fallback;
    if (!isPositiveInteger(value)) {
      throw new CliError(
        ErrorKind.InvalidValue,
        `${label} must be a positive integer, got "${value}"`,
        label
      );
    }
    return parseInt(value, 10);
  }

  json(key: string, label: string): JsonValue | undefined {
    const value = this.string(key);
    return value === undefined ? undefined : parseJsonOption(value, label);
  }

  objectRef(nameKey: string, label: string): ObjectRef {
    return { project: this.string('projectName'), name: this.required(nameKey, label) };
  }
}

function modelConfig(
  provider: string,
  modelName: string,
  baseUrl: string | undefined,
  apiKey: string | undefined
): ModelConfig {
  const config: ModelConfig = { provider, modelName };
  if (baseUrl) config.baseUrl = normalizeUrl(baseUrl);
  if (apiKey) config.apiKey = apiKey;
  return config;
}

function normalizeIngest(args: RawReader): IngestRequest {
  const kbName = args.required('kbName', 'kb_name');
  const from = args.string('from');
  const hnTable = args.string('fromHackernews');

  if (from && hnTable) {
    throw new CliError(
      ErrorKind.InvalidValue,
      'Use either --from or --from-hackernews, not both',
      '--from'
    );
  }

  let source: TableRef;
  if (from) {
    source = parseTableRef(from, '--from');
  } else if (hnTable) {
    source = {
      datasource: args.string('hnDatasource') ?? DEFAULT_HN_DATASOURCE,
      table: hnTable,
    };
  } else {
    throw missingField('--from-hackernews');
  }

  const defaults = defaultColumnsFor(source.table);
  const metadataMap = args.json('metadataMap', '--metadata-map');
  const orderBy = args.string('orderBy');

  return {
    kind: 'kb.ingest',
    kbName,
    source,
    columns: {
      contentColumns:
        args.list('contentColumns', '--content-columns') ?? defaults.contentColumns,
      metadata:
        metadataMap === undefined
          ? defaults.metadata
          : parseMetadataMap(metadataMap, '--metadata-map'),
    },
    idColumn: args.string('idColumn') ?? 'id',
    limit: args.positiveInt('limit', '--limit', DEFAULT_INGEST_LIMIT),
    orderBy: orderBy === undefined ? undefined : parseOrderBy(orderBy),
    ensureDatasource: hnTable !== undefined,
  };
}

const RESERVED_AGENT_PARAMS = [
  'model',
  'google_api_key',
  'include_knowledge_bases',
  'include_tables',
  'prompt_template',
];

function normalizeCreateAgent(args: RawReader, settings: Settings): CreateAgentRequest {
  const request: CreateAgentRequest = {
    kind: 'kb.create-agent',
    agentName: args.required('agentName', 'agent_name'),
    model: args.string('model') ?? settings.googleModel,
    googleApiKey: args.string('googleApiKey') ?? settings.googleApiKey,
    knowledgeBases: args.list('knowledgeBases', 'kb_names') ?? [],
    tables: (args.list('tables', '--tables') ?? []).map((table) =>
      parseTableRef(table, '--tables')
    ),
    promptTemplate: args.text('promptTemplate'),
    params: [],
    ignoredParams: [],
  };

  if (request.knowledgeBases.length === 0) {
    throw missingField('kb_names');
  }

  const params = args.json('params', '--params');
  if (params === undefined) {
    return request;
  }
  if (params === null || typeof params !== 'object' || Array.isArray(params)) {
    throw new CliError(ErrorKind.InvalidJSON, '--params must be a JSON object', '--params');
  }

  for (const [key, value] of Object.entries(params)) {
    if (!RESERVED_AGENT_PARAMS.includes(key)) {
      request.params.push([key, value]);
      continue;
    }

    // A reserved key only fills a named option that has no value yet
    if (key === 'google_api_key' && !request.googleApiKey && typeof value === 'string') {
      request.googleApiKey = value;
    } else if (key === 'prompt_template' && !request.promptTemplate && typeof value === 'string') {
      request.promptTemplate = value;
    } else if (
      key === 'include_tables' &&
      request.tables.length === 0 &&
      Array.isArray(value) &&
      value.every((table): table is string => typeof table === 'string')
    ) {
      request.tables = value.map((table) => parseTableRef(table, '--params include_tables'));
    } else {
      request.ignoredParams.push(key);
    }
  }

  return request;
}

/**
 * Turn raw CLI input for an operation into a validated request
 */
export function normalize(
  kind: OperationKind,
  raw: RawArgs,
  settings: Settings
): CommandRequest {
  const args = new RawReader(raw);

  switch (kind) {
    case 'kb.create': {
      const provider = args.string('embeddingProvider') ?? DEFAULT_EMBEDDING_PROVIDER;
      const embedding = modelConfig(
        provider,
        args.string('embeddingModel') ?? settings.embeddingModel,
        args.string('embeddingBaseUrl') ??
          (provider === 'ollama' ? settings.ollamaBaseUrl : undefined),
        args.string('embeddingApiKey')
      );

      const rerankingModel =
        args.string('rerankingModel') ??
        (args.flag('withReranking') ? settings.rerankingModel : undefined);
      const rerankingRequested =
        rerankingModel !== undefined ||
        args.string('rerankingProvider') !== undefined ||
        args.string('rerankingBaseUrl') !== undefined ||
        args.string('rerankingApiKey') !== undefined;
      if (rerankingRequested && rerankingModel === undefined) {
        throw missingField('--reranking-model');
      }

      let reranking: ModelConfig | undefined;
      if (rerankingModel !== undefined) {
        const rerankingProvider =
          args.string('rerankingProvider') ?? DEFAULT_EMBEDDING_PROVIDER;
        reranking = modelConfig(
          rerankingProvider,
          rerankingModel,
          args.string('rerankingBaseUrl') ??
            (rerankingProvider === 'ollama' ? settings.ollamaBaseUrl : undefined),
          args.string('rerankingApiKey')
        );
      }

      return {
        kind,
        kbName: args.required('kbName', 'kb_name'),
        embedding,
        reranking,
        contentColumns: args.list('contentColumns', '--content-columns'),
        metadataColumns: args.list('metadataColumns', '--metadata-columns'),
        idColumn: args.string('idColumn'),
      };
    }

    case 'kb.ingest':
      return normalizeIngest(args);

    case 'kb.query': {
      const filter = args.json('metadataFilter', '--metadata-filter');
      return {
        kind,
        kbName: args.required('kbName', 'kb_name'),
        queryText: args.requiredText('queryText', 'query_text'),
        filter: filter === undefined ? {} : toFilterExpression(filter, '--metadata-filter'),
        limit: args.positiveInt('limit', '--limit', DEFAULT_QUERY_LIMIT),
      };
    }

    case 'kb.index':
      return { kind, kbName: args.required('kbName', 'kb_name') };

    case 'kb.list-databases':
      return { kind };

    case 'kb.create-agent':
      return normalizeCreateAgent(args, settings);

    case 'kb.query-agent':
      return {
        kind,
        agentName: args.required('agentName', 'agent_name'),
        question: args.requiredText('question', 'question'),
      };

    case 'kb.evaluate': {
      const version = args.string('evalVersion') ?? 'doc_id';
      if (version !== 'doc_id' && version !== 'llm_relevancy') {
        throw new CliError(
          ErrorKind.InvalidValue,
          `--eval-version must be doc_id or llm_relevancy, got "${version}"`,
          '--eval-version'
        );
      }

      const fromSql = args.text('generateFromSql');
      const generateRequested =
        args.flag('generateData') ||
        fromSql !== undefined ||
        args.string('generateCount') !== undefined;
      const evaluate = raw.evaluate !== false;
      if (!evaluate && !generateRequested) {
        throw new CliError(
          ErrorKind.InvalidValue,
          '--no-evaluate only makes sense together with --generate-data',
          '--no-evaluate'
        );
      }

      const llmModel = args.string('llmModel');
      const llmProvider = args.string('llmProvider') ?? DEFAULT_EMBEDDING_PROVIDER;
      const saveTo = args.string('saveTo');

      return {
        kind,
        kbName: args.required('kbName', 'kb_name'),
        testTable: parseTableRef(args.required('testTable', '--test-table'), '--test-table'),
        version,
        generate: generateRequested
          ? {
              fromSql,
              count: args.positiveInt('generateCount', '--generate-count', DEFAULT_EVALUATE_COUNT),
            }
          : undefined,
        evaluate,
        llm:
          llmModel === undefined
            ? undefined
            : modelConfig(
                llmProvider,
                llmModel,
                args.string('llmBaseUrl') ??
                  (llmProvider === 'ollama' ? settings.ollamaBaseUrl : undefined),
                args.string('llmApiKey')
              ),
        saveTo: saveTo === undefined ? undefined : parseTableRef(saveTo, '--save-to'),
      };
    }

    case 'ai.create-model': {
      const engine = args.string('engine') ?? DEFAULT_MODEL_ENGINE;
      const params = parseParamPairs(args.repeated('param'));
      if (
        engine === 'google_gemini' &&
        settings.googleApiKey &&
        !params.some(([key]) => key === 'api_key')
      ) {
        params.push(['api_key', settings.googleApiKey]);
      }

      return {
        kind,
        model: args.objectRef('modelName', 'model_name'),
        spec: {
          engine,
          selectDataQuery: args.requiredText('selectDataQuery', '--select-data-query'),
          predictColumn: args.required('predictColumn', '--predict-column'),
          promptTemplate: args.text('promptTemplate'),
          params,
        },
      };
    }

    case 'ai.list-models':
      return { kind, project: args.string('projectName') };

    case 'ai.describe-model':
    case 'ai.drop-model':
    case 'ai.refresh-model':
      return { kind, model: args.objectRef('modelName', 'model_name') };

    case 'ai.query':
      return { kind, sql: args.requiredText('queryString', 'query_string') };

    case 'job.create': {
      const statements = args
        .repeated('statements')
        .map((statement) => statement.trim().replace(/;+$/, '').trim())
        .filter((statement) => statement !== '');
      if (statements.length === 0) {
        throw missingField('statements');
      }

      const every = args.string('every');
      const start = args.string('start');
      const end = args.string('end');

      return {
        kind,
        spec: {
          job: args.objectRef('jobName', 'job_name'),
          statements,
          schedule: every === undefined ? undefined : parseSchedule(every),
          start: start === undefined ? undefined : parseTimestamp(start, '--start'),
          end: end === undefined ? undefined : parseTimestamp(end, '--end'),
          condition: args.text('if'),
        },
      };
    }

    case 'job.create-hn-ingest':
      return {
        kind,
        job: args.objectRef('jobName', 'job_name'),
        ingest: normalizeIngest(
          new RawReader({ ...raw, fromHackernews: args.required('hnTable', 'hn_table') })
        ),
        schedule: parseSchedule(args.string('every') ?? DEFAULT_HN_JOB_SCHEDULE),
      };

    case 'job.list':
      return { kind, project: args.string('projectName') ?? settings.project };

    case 'job.status':
    case 'job.history':
    case 'job.drop':
      return {
        kind,
        job: {
          project: args.string('projectName') ?? (kind === 'job.drop' ? undefined : settings.project),
          name: args.required('jobName', 'job_name'),
        },
      };

    case 'job.logs':
      return {
        kind,
        job: {
          project: args.string('projectName') ?? settings.project,
          name: args.required('jobName', 'job_name'),
        },
        limit: args.positiveInt('limit', '--limit', DEFAULT_JOB_LOG_LIMIT),
      };

    case 'setup.hackernews':
      return { kind, datasource: args.string('name') ?? DEFAULT_HN_DATASOURCE };
  }
}
