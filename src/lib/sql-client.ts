import { RemoteError } from './errors.js';
import type { Cell, Executor, Row, TabularResult } from './interpreter.js';
import type { Settings } from './config-store.js';

/**
 * Body of POST /api/sql/query
 */
interface QueryResponse {
  type?: string;
  column_names?: unknown;
  data?: unknown;
  error_code?: string | number;
  error_message?: string;
}

function toQueryResponse(value: unknown): QueryResponse {
  if (value === null || typeof value !== 'object') {
    return {};
  }
  const response: QueryResponse = {};
  if ('type' in value && typeof value.type === 'string') response.type = value.type;
  if ('column_names' in value) response.column_names = value.column_names;
  if ('data' in value) response.data = value.data;
  if (
    'error_code' in value &&
    (typeof value.error_code === 'string' || typeof value.error_code === 'number')
  ) {
    response.error_code = value.error_code;
  }
  if ('error_message' in value && typeof value.error_message === 'string') {
    response.error_message = value.error_message;
  }
  return response;
}

function toCell(value: unknown): Cell {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  return value === undefined ? null : JSON.stringify(value);
}

/**
 * Convert a MindsDB response into rows keyed by column name
 */
export function parseQueryResponse(body: unknown): TabularResult {
  const response = toQueryResponse(body);

  if (response.type === 'error') {
    throw new RemoteError(response.error_message || 'Query failed', response.error_code);
  }

  if (response.type !== 'table' || !Array.isArray(response.column_names)) {
    return { columns: [], rows: [] };
  }

  const columns = response.column_names.map((name) => String(name));
  const data = Array.isArray(response.data) ? response.data : [];
  const rows = data.map((values: unknown): Row => {
    const row: Row = {};
    columns.forEach((column, i) => {
      row[column] = Array.isArray(values) ? toCell(values[i]) : null;
    });
    return row;
  });

  return { columns, rows };
}

async function post(url: string, body: unknown, cookie?: string): Promise<Response> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (cookie) {
    headers['Cookie'] = cookie;
  }

  try {
    return await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
    });
  } catch (error) {
    throw new RemoteError(
      `Could not reach MindsDB at ${url}: ${(error as Error).message}`
    );
  }
}

async function errorMessage(response: Response, fallback: string): Promise<string> {
  try {
    const body = toQueryResponse(await response.json());
    return body.error_message || fallback;
  } catch {
    return fallback;
  }
}

/**
 * Log in with user/password and return the session cookie
 */
async function login(settings: Settings): Promise<string | undefined> {
  const response = await post(`${settings.serverUrl}/api/login`, {
    username: settings.user,
    password: settings.password,
  });

  if (!response.ok) {
    throw new RemoteError(
      await errorMessage(response, `Login failed for user '${settings.user}'`),
      response.status
    );
  }

  const cookie = response.headers.get('set-cookie');
  return cookie ? cookie.split(';')[0] : undefined;
}

/**
 * Create an executor that runs SQL through the MindsDB HTTP API.
 * Logs in at most once, on the first statement, when credentials are set.
 */
export function createSqlExecutor(settings: Settings): Executor {
  let session: Promise<string | undefined> | undefined;

  return async (sql: string): Promise<TabularResult> => {
    if (settings.user && settings.password) {
      session ??= login(settings);
    }
    const cookie = session ? await session : undefined;

    const response = await post(
      `${settings.serverUrl}/api/sql/query`,
      { query: sql, context: { db: settings.project } },
      cookie
    );

    if (!response.ok) {
      throw new RemoteError(
        await errorMessage(response, `MindsDB responded with HTTP ${response.status}`),
        response.status
      );
    }

    return parseQueryResponse(await response.json());
  };
}
