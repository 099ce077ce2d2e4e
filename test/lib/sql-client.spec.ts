import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { RemoteError } from '../../src/lib/errors.js';
import { createSqlExecutor, parseQueryResponse } from '../../src/lib/sql-client.js';
import { testSettings } from '../fixtures/settings.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}

describe('sql-client', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('parseQueryResponse', () => {
    it('should key table rows by column name', () => {
      expect(
        parseQueryResponse({
          type: 'table',
          column_names: ['id', 'title'],
          data: [
            [1, 'Show HN: kbforge'],
            [2, null],
          ],
        })
      ).toEqual({
        columns: ['id', 'title'],
        rows: [
          { id: 1, title: 'Show HN: kbforge' },
          { id: 2, title: null },
        ],
      });
    });

    it('should serialise nested cell values', () => {
      expect(
        parseQueryResponse({ type: 'table', column_names: ['metadata'], data: [[{ score: 3 }]] })
          .rows
      ).toEqual([{ metadata: '{"score":3}' }]);
    });

    it('should treat ok responses as empty', () => {
      expect(parseQueryResponse({ type: 'ok' })).toEqual({ columns: [], rows: [] });
    });

    it('should throw the server error with its code', () => {
      let caught: unknown;
      try {
        parseQueryResponse({ type: 'error', error_code: 0, error_message: "Table 'x' not found" });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RemoteError);
      if (caught instanceof RemoteError) {
        expect(caught.message).toBe("Table 'x' not found");
        expect(caught.code).toBe(0);
      }
    });
  });

  describe('createSqlExecutor', () => {
    it('should post the statement with the project as context', async () => {
      const fetchSpy = jest
        .spyOn(global, 'fetch')
        .mockImplementation(async () => jsonResponse({ type: 'ok' }));

      const executor = createSqlExecutor(testSettings({ project: 'analytics' }));
      await expect(executor('SHOW DATABASES;')).resolves.toEqual({ columns: [], rows: [] });

      expect(fetchSpy).toHaveBeenCalledTimes(1);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('http://127.0.0.1:47334/api/sql/query');
      expect(init?.method).toBe('POST');
      expect(requestBody(init)).toEqual({
        query: 'SHOW DATABASES;',
        context: { db: 'analytics' },
      });
    });

    it('should log in once before the first statement when credentials are set', async () => {
      const fetchSpy = jest
        .spyOn(global, 'fetch')
        .mockImplementation(async () => jsonResponse({ type: 'ok' }));

      const executor = createSqlExecutor(testSettings({ user: 'admin', password: 'test-secret' }));
      await executor('SHOW DATABASES;');
      await executor('SHOW MODELS;');

      const urls = fetchSpy.mock.calls.map(([url]) => url);
      expect(urls).toEqual([
        'http://127.0.0.1:47334/api/login',
        'http://127.0.0.1:47334/api/sql/query',
        'http://127.0.0.1:47334/api/sql/query',
      ]);
      expect(requestBody(fetchSpy.mock.calls[0][1])).toEqual({
        username: 'admin',
        password: 'test-secret',
      });
    });

    it('should report an unreachable server', async () => {
      jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

      const executor = createSqlExecutor(testSettings());

      await expect(executor('SHOW DATABASES;')).rejects.toThrow(
        'Could not reach MindsDB at http://127.0.0.1:47334/api/sql/query: fetch failed'
      );
    });

    it('should surface HTTP errors with the status code', async () => {
      jest
        .spyOn(global, 'fetch')
        .mockImplementation(async () => jsonResponse({ error_message: 'Internal failure' }, 500));

      const executor = createSqlExecutor(testSettings());

      await expect(executor('SHOW DATABASES;')).rejects.toMatchObject({
        name: 'RemoteError',
        message: 'Internal failure',
        code: 500,
      });
    });

    it('should surface a failed login', async () => {
      jest
        .spyOn(global, 'fetch')
        .mockImplementation(async () => jsonResponse({}, 401));

      const executor = createSqlExecutor(testSettings({ user: 'admin', password: 'test-secret' }));

      await expect(executor('SHOW DATABASES;')).rejects.toThrow("Login failed for user 'admin'");
    });
  });
});
