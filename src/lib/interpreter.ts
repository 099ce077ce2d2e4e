import { CliError, ErrorKind, RemoteError } from './errors.js';

export type Cell = string | number | boolean | null;
export type Row = Record<string, Cell>;

export interface TabularResult {
  columns: string[];
  rows: Row[];
}

/**
 * Runs one SQL statement on the server.
 * Resolves with the result set (possibly empty) or rejects with a RemoteError.
 */
export type Executor = (sql: string) => Promise<TabularResult>;

export type ExecResult =
  | { ok: true; result: TabularResult }
  | { ok: false; error: unknown };

export type Outcome =
  | { type: 'rows'; columns: string[]; rows: Row[] }
  | { type: 'empty' }
  | { type: 'failure'; kind: ErrorKind; message: string };

export const ALREADY_EXISTS = 'object already exists';

const REMOTE_CATEGORIES: Array<[RegExp, string]> = [
  [/already exists|already created/i, ALREADY_EXISTS],
  [/ECONNREFUSED|ENOTFOUND|ETIMEDOUT|fetch failed|could not reach|connection|network|socket/i, 'connection error'],
  [/unauthori[sz]ed|forbidden|login|password|credentials/i, 'authentication error'],
  [/can't select from|table .*(not found|does(n't| not) exist)|unknown table|no such table|database .*(not found|does(n't| not) exist)/i, 'table not found'],
  [/syntax|parse|parsing|unexpected token/i, 'SQL syntax error'],
  [/model|agent|engine|api[ _-]?key|predictor/i, 'model/agent creation failure'],
];

/**
 * Map a remote message to a stable local category
 */
export function classifyRemoteMessage(message: string): string {
  for (const [pattern, category] of REMOTE_CATEGORIES) {
    if (pattern.test(message)) {
      return category;
    }
  }
  return 'remote error';
}

/**
 * Whether a server error only says the object to create is already there
 */
export function isAlreadyExists(error: unknown): boolean {
  if (error instanceof CliError) {
    return false;
  }
  const message = error instanceof Error ? error.message : String(error);
  return classifyRemoteMessage(message) === ALREADY_EXISTS;
}

/**
 * Turn a thrown error into a failure outcome
 */
export function failureFromError(error: unknown): Outcome {
  if (error instanceof CliError) {
    return { type: 'failure', kind: error.kind, message: error.message };
  }

  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof RemoteError && error.code !== undefined ? ` (code ${error.code})` : '';

  return {
    type: 'failure',
    kind: ErrorKind.RemoteFailure,
    message: `${classifyRemoteMessage(message)}: ${message}${code}`,
  };
}

/**
 * Classify the result of one statement
 */
export function interpret(execResult: ExecResult): Outcome {
  if (!execResult.ok) {
    return failureFromError(execResult.error);
  }

  const { columns, rows } = execResult.result;
  if (rows.length === 0) {
    return { type: 'empty' };
  }
  return { type: 'rows', columns, rows };
}
