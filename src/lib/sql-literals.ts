import { CliError, ErrorKind } from './errors.js';
import type { JsonValue, ObjectRef, Scalar, TableRef } from './operations.js';
import { isSafeIdentifier } from './validators.js';

/**
 * How ingested metadata is packaged in the INSERT ... SELECT projection
 * - columns: one projected column per metadata key
 * - json: a single JSON_OBJECT(...) column named metadata
 */
export type MetadataStrategy = 'columns' | 'json';

export interface SqlDialect {
  name: string;
  /** Double backslashes inside string literals */
  escapeBackslash: boolean;
  metadataStrategy: MetadataStrategy;
  /** Column names that must be backquoted, lower case */
  reservedWords: readonly string[];
}

export const MINDSDB_DIALECT: SqlDialect = {
  name: 'mindsdb',
  escapeBackslash: false,
  metadataStrategy: 'columns',
  reservedWords: [
    'asc',
    'by',
    'date',
    'desc',
    'from',
    'group',
    'index',
    'key',
    'limit',
    'order',
    'select',
    'table',
    'time',
    'timestamp',
    'user',
    'where',
  ],
};

/**
 * Return the name unchanged if it is a safe bare identifier, else throw
 */
export function identifier(name: string, field: string): string {
  if (!isSafeIdentifier(name)) {
    throw new CliError(
      ErrorKind.InvalidIdentifier,
      `Invalid ${field} '${name}': use only letters, digits and underscores`,
      field
    );
  }
  return name;
}

/**
 * A validated column name, backquoted when the dialect reserves it
 */
export function columnName(
  name: string,
  field: string,
  dialect: SqlDialect = MINDSDB_DIALECT
): string {
  const column = identifier(name, field);
  return dialect.reservedWords.includes(column.toLowerCase()) ? `\`${column}\`` : column;
}

export function objectName(ref: ObjectRef, field: string): string {
  const name = identifier(ref.name, field);
  return ref.project ? `${identifier(ref.project, 'project name')}.${name}` : name;
}

export function tableName(ref: TableRef): string {
  return `${identifier(ref.datasource, 'datasource name')}.${identifier(ref.table, 'table name')}`;
}

export function stringLiteral(
  value: string,
  dialect: SqlDialect = MINDSDB_DIALECT
): string {
  const escaped = dialect.escapeBackslash ? value.replace(/\\/g, '\\\\') : value;
  return `'${escaped.replace(/'/g, "''")}'`;
}

export function numberLiteral(value: number): string {
  if (!Number.isFinite(value)) {
    throw new CliError(ErrorKind.InvalidValue, `Not a finite number: ${value}`);
  }
  return String(value);
}

export function scalarLiteral(
  value: Scalar,
  dialect: SqlDialect = MINDSDB_DIALECT
): string {
  if (typeof value === 'string') {
    return stringLiteral(value, dialect);
  }
  if (typeof value === 'number') {
    return numberLiteral(value);
  }
  return value ? 'true' : 'false';
}

/**
 * ['a', 'b']
 */
export function arrayLiteral(
  values: string[],
  dialect: SqlDialect = MINDSDB_DIALECT
): string {
  return `[${values.map((value) => stringLiteral(value, dialect)).join(', ')}]`;
}

/**
 * {"key": "value", "count": 3} - the nested option syntax of USING clauses
 */
export function objectLiteral(entries: Array<[string, Scalar]>): string {
  const body = entries
    .map(([key, value]) => `${JSON.stringify(key)}: ${JSON.stringify(value)}`)
    .join(', ');
  return `{${body}}`;
}

/**
 * Structured values travel as a quoted JSON string
 */
export function jsonLiteral(
  value: JsonValue,
  dialect: SqlDialect = MINDSDB_DIALECT
): string {
  if (value === null) {
    return 'NULL';
  }
  if (typeof value === 'object') {
    return stringLiteral(JSON.stringify(value), dialect);
  }
  return scalarLiteral(value, dialect);
}
