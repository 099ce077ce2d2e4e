import { describe, it, expect } from '@jest/globals';
import { ErrorKind } from '../../src/lib/errors.js';
import { compileFilter, toFilterExpression } from '../../src/lib/filters.js';
import {
  MINDSDB_DIALECT,
  arrayLiteral,
  columnName,
  jsonLiteral,
  numberLiteral,
  objectLiteral,
  objectName,
  stringLiteral,
} from '../../src/lib/sql-literals.js';
import { captureCliError } from '../fixtures/errors.js';

describe('sql-literals', () => {
  describe('stringLiteral', () => {
    it('should double single quotes', () => {
      expect(stringLiteral("it's")).toBe("'it''s'");
    });

    it('should double backslashes only when the dialect asks for it', () => {
      expect(stringLiteral('a\\b')).toBe("'a\\b'");
      expect(stringLiteral('a\\b', { ...MINDSDB_DIALECT, escapeBackslash: true })).toBe(
        "'a\\\\b'"
      );
    });
  });

  it('should reject non-finite numbers', () => {
    expect(captureCliError(() => numberLiteral(Infinity)).kind).toBe(ErrorKind.InvalidValue);
  });

  it('should render arrays and USING objects', () => {
    expect(arrayLiteral(['title', "o'clock"])).toBe("['title', 'o''clock']");
    expect(objectLiteral([['provider', 'ollama'], ['count', 3], ['strict', false]])).toBe(
      '{"provider": "ollama", "count": 3, "strict": false}'
    );
  });

  it('should render JSON values by type', () => {
    expect(jsonLiteral(null)).toBe('NULL');
    expect(jsonLiteral(true)).toBe('true');
    expect(jsonLiteral(['a', 1])).toBe('\'["a",1]\'');
  });

  it('should qualify object names with their project', () => {
    expect(objectName({ name: 'sentiment' }, 'model name')).toBe('sentiment');
    expect(objectName({ project: 'analytics', name: 'sentiment' }, 'model name')).toBe(
      'analytics.sentiment'
    );
    expect(
      captureCliError(() => objectName({ project: 'a-b', name: 'sentiment' }, 'model name')).message
    ).toBe("Invalid project name 'a-b': use only letters, digits and underscores");
  });

  it('should backquote reserved column names in any case', () => {
    expect(columnName('by', 'column')).toBe('`by`');
    expect(columnName('Time', 'column')).toBe('`Time`');
    expect(columnName('score', 'column')).toBe('score');
    expect(columnName('by', 'column', { ...MINDSDB_DIALECT, reservedWords: [] })).toBe('by');
  });
});

describe('filters', () => {
  it('should compile every supported operator', () => {
    const filter = toFilterExpression(
      { a: { $gt: 1 }, b: { $gte: 2 }, c: { $lt: 3 }, d: { $lte: 'x' } },
      '--metadata-filter'
    );
    expect(compileFilter(filter, MINDSDB_DIALECT)).toEqual([
      'a > 1',
      'b >= 2',
      'c < 3',
      "d <= 'x'",
    ]);
  });

  it('should require exactly one operator per key', () => {
    const filter = toFilterExpression({ score: { $gt: 1, $lt: 9 } }, '--metadata-filter');
    const error = captureCliError(() => compileFilter(filter, MINDSDB_DIALECT));
    expect(error.kind).toBe(ErrorKind.UnsupportedOperator);
    expect(error.message).toBe("Filter on 'score' must use exactly one operator (got 2)");
  });

  it('should not treat object prototype names as operators', () => {
    const filter = toFilterExpression({ score: { toString: 1 } }, '--metadata-filter');
    expect(captureCliError(() => compileFilter(filter, MINDSDB_DIALECT)).kind).toBe(
      ErrorKind.UnsupportedOperator
    );
  });

  it('should reject nested operands that are not scalars', () => {
    const error = captureCliError(() =>
      toFilterExpression({ score: { $gt: [1] } }, '--metadata-filter')
    );
    expect(error.kind).toBe(ErrorKind.InvalidJSON);
    expect(error.message).toBe(
      "--metadata-filter: operand of 'score.$gt' must be a string, number or boolean"
    );
  });
});
