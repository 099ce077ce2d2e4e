import { CliError, ErrorKind, missingField } from './errors.js';
import { compileFilter } from './filters.js';
import type {
  CommandRequest,
  CreateAgentRequest,
  CreateKnowledgeBaseRequest,
  EvaluateRequest,
  IngestRequest,
  JobSpec,
  ModelConfig,
  ModelSpec,
  ObjectRef,
  Scalar,
  Schedule,
} from './operations.js';
import {
  MINDSDB_DIALECT,
  arrayLiteral,
  columnName,
  identifier,
  jsonLiteral,
  numberLiteral,
  objectLiteral,
  objectName,
  stringLiteral,
  tableName,
  type SqlDialect,
} from './sql-literals.js';

function modelObject(config: ModelConfig): string {
  const entries: Array<[string, Scalar]> = [
    ['provider', config.provider],
    ['model_name', config.modelName],
  ];
  if (config.baseUrl) entries.push(['base_url', config.baseUrl]);
  if (config.apiKey) entries.push(['api_key', config.apiKey]);
  return objectLiteral(entries);
}

function columnNames(columns: string[], field: string): string[] {
  return columns.map((column) => identifier(column, field));
}

/** `source` when it already has the wanted name, else `source AS alias` */
function projection(source: string, alias: string, dialect: SqlDialect): string {
  const column = columnName(source, 'source column', dialect);
  return source === alias ? column : `${column} AS ${columnName(alias, 'alias', dialect)}`;
}

function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/;+$/, '').trim();
}

function compileCreateKnowledgeBase(
  request: CreateKnowledgeBaseRequest,
  dialect: SqlDialect
): string {
  const options = [`embedding_model = ${modelObject(request.embedding)}`];

  if (request.reranking) {
    options.push(`reranking_model = ${modelObject(request.reranking)}`);
  }
  if (request.contentColumns && request.contentColumns.length > 0) {
    const columns = columnNames(request.contentColumns, 'content column');
    options.push(`content_columns = ${arrayLiteral(columns, dialect)}`);
  }
  if (request.metadataColumns && request.metadataColumns.length > 0) {
    const columns = columnNames(request.metadataColumns, 'metadata column');
    options.push(`metadata_columns = ${arrayLiteral(columns, dialect)}`);
  }
  if (request.idColumn) {
    options.push(`id_column = ${stringLiteral(identifier(request.idColumn, 'id column'), dialect)}`);
  }

  return `CREATE KNOWLEDGE_BASE ${identifier(request.kbName, 'knowledge base name')} USING ${options.join(', ')};`;
}

function contentExpression(columns: string[], dialect: SqlDialect): string {
  if (columns.length === 0) {
    throw missingField('--content-columns');
  }
  const names = columns.map((column) => columnName(column, 'content column', dialect));
  if (names.length === 1) {
    return names[0];
  }
  // A NULL column must not blank out the whole row
  return names
    .map((name) => `COALESCE(${name}, ${stringLiteral('', dialect)})`)
    .join(` || ${stringLiteral(' ', dialect)} || `);
}

/**
 * Projection list for INSERT ... SELECT, following the dialect's metadata strategy
 */
function ingestProjection(request: IngestRequest, dialect: SqlDialect): {
  targets?: string;
  select: string;
} {
  const content = `${contentExpression(request.columns.contentColumns, dialect)} AS content`;
  const idSource = identifier(request.idColumn, 'id column');
  const id = projection(idSource, 'id', dialect);

  if (dialect.metadataStrategy === 'json') {
    const pairs = request.columns.metadata
      .map(
        ([key, source]) =>
          `${stringLiteral(identifier(key, 'metadata key'), dialect)}, ` +
          columnName(source, 'metadata source column', dialect)
      )
      .join(', ');
    return {
      targets: '(content, metadata, id)',
      select: `${content}, JSON_OBJECT(${pairs}) AS metadata, ${id}`,
    };
  }

  const columns = [content, id];
  for (const [key, source] of request.columns.metadata) {
    identifier(key, 'metadata key');
    identifier(source, 'metadata source column');
    if (key === 'content' || (key === 'id' && source !== idSource)) {
      throw new CliError(
        ErrorKind.InvalidValue,
        `Metadata key '${key}' collides with the ${key} column`,
        '--metadata-map'
      );
    }
    if (key === 'id') continue;
    columns.push(projection(source, key, dialect));
  }
  return { select: columns.join(', ') };
}

function compileIngest(
  request: IngestRequest,
  dialect: SqlDialect,
  incremental = false
): string {
  const { targets, select } = ingestProjection(request, dialect);
  let sql = `INSERT INTO ${identifier(request.kbName, 'knowledge base name')}`;
  if (targets) sql += ` ${targets}`;
  sql += ` SELECT ${select} FROM ${tableName(request.source)}`;

  if (incremental) {
    sql += ` WHERE ${columnName(request.idColumn, 'id column', dialect)} > LAST`;
  }
  if (request.orderBy) {
    sql += ` ORDER BY ${columnName(request.orderBy.column, 'order by column', dialect)}`;
    if (request.orderBy.direction) sql += ` ${request.orderBy.direction}`;
  }
  sql += ` LIMIT ${numberLiteral(request.limit)}`;

  return `${sql};`;
}

function createHackernewsDatasource(datasource: string, dialect: SqlDialect): string {
  return (
    `CREATE DATABASE ${identifier(datasource, 'datasource name')} ` +
    `WITH ENGINE = ${stringLiteral('hackernews', dialect)};`
  );
}

function compileCreateAgent(request: CreateAgentRequest, dialect: SqlDialect): string {
  if (request.knowledgeBases.length === 0) {
    throw missingField('kb_names');
  }

  const options = [`model = ${stringLiteral(request.model, dialect)}`];
  if (request.googleApiKey) {
    options.push(`google_api_key = ${stringLiteral(request.googleApiKey, dialect)}`);
  }
  options.push(
    `include_knowledge_bases = ${arrayLiteral(
      columnNames(request.knowledgeBases, 'knowledge base name'),
      dialect
    )}`
  );
  if (request.tables.length > 0) {
    options.push(`include_tables = ${arrayLiteral(request.tables.map(tableName), dialect)}`);
  }
  if (request.promptTemplate) {
    options.push(`prompt_template = ${stringLiteral(request.promptTemplate, dialect)}`);
  }
  for (const [key, value] of request.params) {
    options.push(`${identifier(key, 'agent parameter')} = ${jsonLiteral(value, dialect)}`);
  }

  return `CREATE AGENT ${identifier(request.agentName, 'agent name')} USING ${options.join(', ')};`;
}

/**
 * One statement, or generate + evaluate when test data is generated first
 */
function compileEvaluate(request: EvaluateRequest, dialect: SqlDialect): string[] {
  const target = `EVALUATE KNOWLEDGE_BASE ${identifier(request.kbName, 'knowledge base name')}`;
  const testTable = `test_table = ${tableName(request.testTable)}`;
  const llm = request.llm ? [`llm = ${modelObject(request.llm)}`] : [];
  const statements: string[] = [];

  if (request.generate) {
    const generation: Array<[string, Scalar]> = [];
    if (request.generate.fromSql) {
      generation.push(['from_sql', stripTrailingSemicolons(request.generate.fromSql)]);
    }
    generation.push(['count', request.generate.count]);

    const options = [
      testTable,
      `generate_data = ${objectLiteral(generation)}`,
      'evaluate = false',
      ...llm,
    ];
    statements.push(`${target} USING ${options.join(', ')};`);
  }

  if (request.evaluate) {
    const options = [testTable, `version = ${stringLiteral(request.version, dialect)}`, ...llm];
    if (request.saveTo) {
      options.push(`save_to = ${tableName(request.saveTo)}`);
    }
    statements.push(`${target} USING ${options.join(', ')};`);
  }

  return statements;
}

function compileCreateModel(ref: ObjectRef, spec: ModelSpec, dialect: SqlDialect): string {
  const query = stripTrailingSemicolons(spec.selectDataQuery);
  if (!query) {
    throw missingField('--select-data-query');
  }

  const options = [`engine = ${stringLiteral(spec.engine, dialect)}`];
  if (spec.promptTemplate) {
    options.push(`prompt_template = ${stringLiteral(spec.promptTemplate, dialect)}`);
  }
  for (const [key, value] of spec.params) {
    options.push(`${identifier(key, 'model parameter')} = ${stringLiteral(value, dialect)}`);
  }

  return (
    `CREATE MODEL ${objectName(ref, 'model name')} FROM (${query}) ` +
    `PREDICT ${identifier(spec.predictColumn, 'predict column')} USING ${options.join(', ')};`
  );
}

function scheduleClause(schedule: Schedule): string {
  const count = schedule.count ?? 1;
  return `SCHEDULE EVERY ${count} ${schedule.unit}${count === 1 ? '' : 's'}`;
}

function compileCreateJob(spec: JobSpec, dialect: SqlDialect): string {
  if (spec.statements.length === 0) {
    throw missingField('statements');
  }

  let sql = `CREATE JOB ${objectName(spec.job, 'job name')} (${spec.statements.join('; ')})`;
  if (spec.schedule) sql += ` ${scheduleClause(spec.schedule)}`;
  if (spec.start) sql += ` START ${stringLiteral(spec.start, dialect)}`;
  if (spec.end) sql += ` END ${stringLiteral(spec.end, dialect)}`;
  if (spec.condition) sql += ` IF (${stripTrailingSemicolons(spec.condition)})`;

  return `${sql};`;
}

function jobsTable(project: string | undefined, table: 'jobs' | 'jobs_history'): string {
  return project ? `${identifier(project, 'project name')}.${table}` : table;
}

/**
 * Render the SQL statements for a request, in execution order
 */
export function compile(
  request: CommandRequest,
  dialect: SqlDialect = MINDSDB_DIALECT
): string[] {
  switch (request.kind) {
    case 'kb.create':
      return [compileCreateKnowledgeBase(request, dialect)];

    case 'kb.ingest':
      if (!request.ensureDatasource) {
        return [compileIngest(request, dialect)];
      }
      return [
        createHackernewsDatasource(request.source.datasource, dialect),
        compileIngest(request, dialect),
      ];

    case 'kb.query': {
      const conditions = [
        `content LIKE ${stringLiteral(request.queryText, dialect)}`,
        ...compileFilter(request.filter, dialect),
      ];
      return [
        `SELECT * FROM ${identifier(request.kbName, 'knowledge base name')} ` +
          `WHERE ${conditions.join(' AND ')} LIMIT ${numberLiteral(request.limit)};`,
      ];
    }

    case 'kb.index':
      return [`CREATE INDEX ON KNOWLEDGE_BASE ${identifier(request.kbName, 'knowledge base name')};`];

    case 'kb.list-databases':
      return ['SHOW DATABASES;'];

    case 'kb.create-agent':
      return [compileCreateAgent(request, dialect)];

    case 'kb.query-agent':
      return [
        `SELECT answer FROM ${identifier(request.agentName, 'agent name')} ` +
          `WHERE question = ${stringLiteral(request.question, dialect)};`,
      ];

    case 'kb.evaluate':
      return compileEvaluate(request, dialect);

    case 'ai.create-model':
      return [compileCreateModel(request.model, request.spec, dialect)];

    case 'ai.list-models':
      return [
        request.project
          ? `SHOW MODELS FROM ${identifier(request.project, 'project name')};`
          : 'SHOW MODELS;',
      ];

    case 'ai.describe-model':
      return [`DESCRIBE MODEL ${objectName(request.model, 'model name')};`];

    case 'ai.drop-model':
      return [`DROP MODEL ${objectName(request.model, 'model name')};`];

    case 'ai.refresh-model':
      return [`RETRAIN ${objectName(request.model, 'model name')};`];

    case 'ai.query': {
      const sql = stripTrailingSemicolons(request.sql);
      if (!sql) {
        throw missingField('query_string');
      }
      return [`${sql};`];
    }

    case 'job.create':
      return [compileCreateJob(request.spec, dialect)];

    case 'job.create-hn-ingest': {
      const body = compileIngest(request.ingest, dialect, true).slice(0, -1);
      return [
        createHackernewsDatasource(request.ingest.source.datasource, dialect),
        `CREATE JOB ${objectName(request.job, 'job name')} (${body}) ${scheduleClause(request.schedule)};`,
      ];
    }

    case 'job.list':
      return [
        request.project ? `SELECT * FROM ${jobsTable(request.project, 'jobs')};` : 'SHOW JOBS;',
      ];

    case 'job.status':
      return [
        `SELECT * FROM ${jobsTable(request.job.project, 'jobs')} ` +
          `WHERE name = ${stringLiteral(identifier(request.job.name, 'job name'), dialect)};`,
      ];

    case 'job.history':
      return [
        `SELECT * FROM ${jobsTable(request.job.project, 'jobs_history')} ` +
          `WHERE name = ${stringLiteral(identifier(request.job.name, 'job name'), dialect)};`,
      ];

    case 'job.logs':
      return [
        `SELECT run_start, run_end, error, query FROM ${jobsTable(request.job.project, 'jobs_history')} ` +
          `WHERE name = ${stringLiteral(identifier(request.job.name, 'job name'), dialect)} ` +
          `ORDER BY run_start DESC LIMIT ${numberLiteral(request.limit)};`,
      ];

    case 'job.drop':
      return [`DROP JOB ${objectName(request.job, 'job name')};`];

    case 'setup.hackernews':
      return [createHackernewsDatasource(request.datasource, dialect)];
  }
}
