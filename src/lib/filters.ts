import { CliError, ErrorKind } from './errors.js';
import type { FilterExpression, JsonValue, Scalar } from './operations.js';
import { columnName, scalarLiteral, type SqlDialect } from './sql-literals.js';

const COMPARISON_OPERATORS = new Map<string, string>([
  ['$gt', '>'],
  ['$gte', '>='],
  ['$lt', '<'],
  ['$lte', '<='],
]);

function isScalar(value: JsonValue): value is Scalar {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Check the shape of a parsed --metadata-filter value.
 * Operator names are not checked here; the compiler rejects unknown ones.
 */
export function toFilterExpression(value: JsonValue, flag: string): FilterExpression {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new CliError(
      ErrorKind.InvalidJSON,
      `${flag} must be a JSON object, e.g. '{"author": "pg"}'`,
      flag
    );
  }

  const filter: FilterExpression = {};
  for (const [key, condition] of Object.entries(value)) {
    if (isScalar(condition)) {
      filter[key] = condition;
      continue;
    }
    if (condition === null || typeof condition !== 'object' || Array.isArray(condition)) {
      throw new CliError(
        ErrorKind.InvalidJSON,
        `${flag}: value for '${key}' must be a string, number, boolean or an operator object`,
        flag
      );
    }

    const operators: Record<string, Scalar> = {};
    for (const [operator, operand] of Object.entries(condition)) {
      if (!isScalar(operand)) {
        throw new CliError(
          ErrorKind.InvalidJSON,
          `${flag}: operand of '${key}.${operator}' must be a string, number or boolean`,
          flag
        );
      }
      operators[operator] = operand;
    }
    filter[key] = operators;
  }

  return filter;
}

/**
 * Translate a filter into WHERE conditions, one per metadata key
 */
export function compileFilter(filter: FilterExpression, dialect: SqlDialect): string[] {
  return Object.entries(filter).map(([key, condition]) => {
    const column = columnName(key, 'metadata filter key', dialect);

    if (typeof condition !== 'object') {
      return `${column} = ${scalarLiteral(condition, dialect)}`;
    }

    const entries = Object.entries(condition);
    if (entries.length !== 1) {
      throw new CliError(
        ErrorKind.UnsupportedOperator,
        `Filter on '${key}' must use exactly one operator (got ${entries.length})`,
        key
      );
    }

    const [operator, operand] = entries[0];
    const symbol = COMPARISON_OPERATORS.get(operator);
    if (symbol === undefined) {
      throw new CliError(
        ErrorKind.UnsupportedOperator,
        `Unsupported filter operator '${operator}' on '${key}'. Supported: ${[...COMPARISON_OPERATORS.keys()].join(', ')}`,
        key
      );
    }

    return `${column} ${symbol} ${scalarLiteral(operand, dialect)}`;
  });
}
