/**
 * Canonical request model: one variant per CLI operation
 */

export const OPERATION_KINDS = [
  'kb.create',
  'kb.ingest',
  'kb.query',
  'kb.index',
  'kb.list-databases',
  'kb.create-agent',
  'kb.query-agent',
  'kb.evaluate',
  'ai.create-model',
  'ai.list-models',
  'ai.describe-model',
  'ai.drop-model',
  'ai.refresh-model',
  'ai.query',
  'job.create',
  'job.create-hn-ingest',
  'job.list',
  'job.status',
  'job.history',
  'job.logs',
  'job.drop',
  'setup.hackernews',
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export function isOperationKind(value: string): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value);
}

export type Scalar = string | number | boolean;

export type JsonValue =
  | Scalar
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Provider/model pair used for embedding, reranking and evaluation LLMs
 */
export interface ModelConfig {
  provider: string;
  modelName: string;
  baseUrl?: string;
  apiKey?: string;
}

export interface TableRef {
  datasource: string;
  table: string;
}

/** Optional project qualifier for models and jobs */
export interface ObjectRef {
  project?: string;
  name: string;
}

export interface ColumnSpec {
  contentColumns: string[];
  /** Destination metadata key -> source column, in declaration order */
  metadata: Array<[string, string]>;
}

export type FilterExpression = Record<string, Scalar | Record<string, Scalar>>;

export interface OrderBy {
  column: string;
  direction?: 'ASC' | 'DESC';
}

export interface ModelSpec {
  engine: string;
  selectDataQuery: string;
  predictColumn: string;
  promptTemplate?: string;
  /** Duplicate keys are legal; order is preserved */
  params: Array<[string, string]>;
}

export interface Schedule {
  count?: number;
  unit: 'minute' | 'hour' | 'day' | 'week' | 'month';
}

export interface JobSpec {
  job: ObjectRef;
  statements: string[];
  schedule?: Schedule;
  start?: string;
  end?: string;
  condition?: string;
}

export interface CreateKnowledgeBaseRequest {
  kind: 'kb.create';
  kbName: string;
  embedding: ModelConfig;
  reranking?: ModelConfig;
  contentColumns?: string[];
  metadataColumns?: string[];
  idColumn?: string;
}

export interface IngestRequest {
  kind: 'kb.ingest';
  kbName: string;
  source: TableRef;
  columns: ColumnSpec;
  idColumn: string;
  limit: number;
  orderBy?: OrderBy;
  /** Create the HackerNews datasource first, tolerating an existing one */
  ensureDatasource: boolean;
}

export interface SemanticQueryRequest {
  kind: 'kb.query';
  kbName: string;
  queryText: string;
  filter: FilterExpression;
  limit: number;
}

export interface CreateAgentRequest {
  kind: 'kb.create-agent';
  agentName: string;
  model: string;
  googleApiKey?: string;
  knowledgeBases: string[];
  tables: TableRef[];
  promptTemplate?: string;
  params: Array<[string, JsonValue]>;
  /** Pass-through keys dropped because a named option already set them */
  ignoredParams: string[];
}

export interface EvaluateRequest {
  kind: 'kb.evaluate';
  kbName: string;
  testTable: TableRef;
  version: 'doc_id' | 'llm_relevancy';
  generate?: {
    fromSql?: string;
    count: number;
  };
  evaluate: boolean;
  llm?: ModelConfig;
  saveTo?: TableRef;
}

export interface CreateHnIngestJobRequest {
  kind: 'job.create-hn-ingest';
  job: ObjectRef;
  ingest: IngestRequest;
  schedule: Schedule;
}

export type CommandRequest =
  | CreateKnowledgeBaseRequest
  | IngestRequest
  | SemanticQueryRequest
  | { kind: 'kb.index'; kbName: string }
  | { kind: 'kb.list-databases' }
  | CreateAgentRequest
  | { kind: 'kb.query-agent'; agentName: string; question: string }
  | EvaluateRequest
  | { kind: 'ai.create-model'; model: ObjectRef; spec: ModelSpec }
  | { kind: 'ai.list-models'; project?: string }
  | {
      kind: 'ai.describe-model' | 'ai.drop-model' | 'ai.refresh-model';
      model: ObjectRef;
    }
  | { kind: 'ai.query'; sql: string }
  | { kind: 'job.create'; spec: JobSpec }
  | CreateHnIngestJobRequest
  | { kind: 'job.list'; project?: string }
  | { kind: 'job.status' | 'job.history' | 'job.drop'; job: ObjectRef }
  | { kind: 'job.logs'; job: ObjectRef; limit: number }
  | { kind: 'setup.hackernews'; datasource: string };
