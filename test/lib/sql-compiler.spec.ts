import { describe, it, expect } from '@jest/globals';
import { ErrorKind } from '../../src/lib/errors.js';
import { normalize, type RawArgs } from '../../src/lib/normalizer.js';
import type { OperationKind } from '../../src/lib/operations.js';
import { compile } from '../../src/lib/sql-compiler.js';
import { MINDSDB_DIALECT, type SqlDialect } from '../../src/lib/sql-literals.js';
import { captureCliError } from '../fixtures/errors.js';
import { testSettings } from '../fixtures/settings.js';

const JSON_METADATA_DIALECT: SqlDialect = {
  ...MINDSDB_DIALECT,
  name: 'json-metadata',
  metadataStrategy: 'json',
};

function sqlFor(kind: OperationKind, raw: RawArgs, dialect: SqlDialect = MINDSDB_DIALECT): string[] {
  return compile(normalize(kind, raw, testSettings({ googleApiKey: 'test-secret' })), dialect);
}

describe('sql-compiler', () => {
  describe('kb.create', () => {
    it('should default the embedding model to the local ollama one', () => {
      expect(
        sqlFor('kb.create', {
          kbName: 'hn_kb',
          contentColumns: 'title,text',
          metadataColumns: 'id,score',
          idColumn: 'id',
        })
      ).toEqual([
        'CREATE KNOWLEDGE_BASE hn_kb USING embedding_model = {"provider": "ollama", "model_name": "nomic-embed-text", "base_url": "http://127.0.0.1:11434"}, ' +
          "content_columns = ['title', 'text'], metadata_columns = ['id', 'score'], id_column = 'id';",
      ]);
    });

    it('should add a reranking model and provider credentials', () => {
      expect(
        sqlFor('kb.create', {
          kbName: 'docs_kb',
          embeddingProvider: 'openai',
          embeddingModel: 'text-embedding-3-small',
          embeddingApiKey: 'test-secret',
          withReranking: true,
        })
      ).toEqual([
        'CREATE KNOWLEDGE_BASE docs_kb USING embedding_model = {"provider": "openai", "model_name": "text-embedding-3-small", "api_key": "test-secret"}, ' +
          'reranking_model = {"provider": "ollama", "model_name": "llama3", "base_url": "http://127.0.0.1:11434"};',
      ]);
    });
  });

  describe('kb.ingest', () => {
    it('should use the stories columns when no column flags are given', () => {
      expect(sqlFor('kb.ingest', { kbName: 'hn_kb', fromHackernews: 'stories', limit: '50' })).toEqual([
        "CREATE DATABASE hackernews WITH ENGINE = 'hackernews';",
        "INSERT INTO hn_kb SELECT COALESCE(title, '') || ' ' || COALESCE(text, '') AS content, id, `by`, score, `time`, descendants, url FROM hackernews.stories LIMIT 50;",
      ]);
    });

    it('should join several content columns so a NULL column keeps the row', () => {
      expect(
        sqlFor('kb.ingest', {
          kbName: 'docs_kb',
          from: 'warehouse.pages',
          contentColumns: 'heading,body,footer',
          metadataMap: '{"id": "id"}',
        })
      ).toEqual([
        "INSERT INTO docs_kb SELECT COALESCE(heading, '') || ' ' || COALESCE(body, '') || ' ' || COALESCE(footer, '') AS content, id FROM warehouse.pages LIMIT 100;",
      ]);
    });

    it('should backquote reserved words used as columns or aliases', () => {
      expect(
        sqlFor('kb.ingest', {
          kbName: 'docs_kb',
          from: 'warehouse.events',
          contentColumns: 'desc',
          metadataMap: '{"id": "id", "when_at": "timestamp", "order": "rank"}',
          orderBy: 'date',
        })
      ).toEqual([
        'INSERT INTO docs_kb SELECT `desc` AS content, id, `timestamp` AS when_at, rank AS `order` FROM warehouse.events ORDER BY `date` LIMIT 100;',
      ]);
    });

    it('should alias mapped metadata and a custom id column', () => {
      expect(
        sqlFor('kb.ingest', {
          kbName: 'hn_kb',
          from: 'warehouse.posts',
          contentColumns: 'body',
          metadataMap: '{"author": "user_name", "id": "post_id"}',
          idColumn: 'post_id',
          orderBy: 'created_at desc',
          limit: '10',
        })
      ).toEqual([
        'INSERT INTO hn_kb SELECT body AS content, post_id AS id, user_name AS author FROM warehouse.posts ORDER BY created_at DESC LIMIT 10;',
      ]);
    });

    it('should pack metadata into one JSON column under the json strategy', () => {
      expect(
        sqlFor('kb.ingest', { kbName: 'hn_kb', fromHackernews: 'comments' }, JSON_METADATA_DIALECT)
      ).toEqual([
        "CREATE DATABASE hackernews WITH ENGINE = 'hackernews';",
        "INSERT INTO hn_kb (content, metadata, id) SELECT text AS content, JSON_OBJECT('id', id, 'by', `by`, 'parent', parent, 'time', `time`) AS metadata, id FROM hackernews.comments LIMIT 100;",
      ]);
    });

    it('should reject a metadata key that shadows the content column', () => {
      const error = captureCliError(() =>
        sqlFor('kb.ingest', {
          kbName: 'hn_kb',
          fromHackernews: 'stories',
          metadataMap: '{"content": "title"}',
        })
      );
      expect(error.kind).toBe(ErrorKind.InvalidValue);
      expect(error.field).toBe('--metadata-map');
    });
  });

  describe('kb.query', () => {
    it('should translate an operator filter into a comparison', () => {
      expect(
        sqlFor('kb.query', {
          kbName: 'hn_kb',
          queryText: 'funding',
          metadataFilter: '{"score":{"$gt":50}}',
        })
      ).toEqual(["SELECT * FROM hn_kb WHERE content LIKE 'funding' AND score > 50 LIMIT 5;"]);
    });

    it('should escape quotes in the search text and compare plain values with =', () => {
      expect(
        sqlFor('kb.query', {
          kbName: 'hn_kb',
          queryText: "what's new",
          metadataFilter: '{"by": "pg", "score": {"$lte": 10}}',
          limit: '3',
        })
      ).toEqual([
        "SELECT * FROM hn_kb WHERE content LIKE 'what''s new' AND `by` = 'pg' AND score <= 10 LIMIT 3;",
      ]);
    });

    it('should reject unsupported operators', () => {
      const error = captureCliError(() =>
        sqlFor('kb.query', {
          kbName: 'hn_kb',
          queryText: 'funding',
          metadataFilter: '{"score":{"$ne":3}}',
        })
      );
      expect(error.kind).toBe(ErrorKind.UnsupportedOperator);
      expect(error.message).toBe(
        "Unsupported filter operator '$ne' on 'score'. Supported: $gt, $gte, $lt, $lte"
      );
    });

    it('should produce the same SQL for the same input', () => {
      const raw = { kbName: 'hn_kb', queryText: 'rust', metadataFilter: '{"score":{"$gte":5}}' };
      expect(sqlFor('kb.query', raw)).toEqual(sqlFor('kb.query', raw));
    });
  });

  describe('identifiers', () => {
    it('should reject names with spaces', () => {
      const error = captureCliError(() => sqlFor('kb.index', { kbName: 'hn kb' }));
      expect(error.kind).toBe(ErrorKind.InvalidIdentifier);
      expect(error.message).toBe(
        "Invalid knowledge base name 'hn kb': use only letters, digits and underscores"
      );
    });

    it('should reject names carrying a statement separator', () => {
      const error = captureCliError(() =>
        sqlFor('kb.query', { kbName: 'hn_kb; DROP DATABASE x', queryText: 'q' })
      );
      expect(error.kind).toBe(ErrorKind.InvalidIdentifier);
    });

    it('should reject unsafe metadata filter keys', () => {
      const error = captureCliError(() =>
        sqlFor('kb.query', { kbName: 'hn_kb', queryText: 'q', metadataFilter: '{"a b": 1}' })
      );
      expect(error.kind).toBe(ErrorKind.InvalidIdentifier);
    });
  });

  describe('agents', () => {
    it('should build CREATE AGENT with extra parameters after the named ones', () => {
      expect(
        sqlFor('kb.create-agent', {
          agentName: 'hn_agent',
          knowledgeBases: 'hn_kb,docs_kb',
          promptTemplate: "Answer from HN's posts",
          params: '{"temperature": 0.2, "prompt_template": "ignored", "timeout": 30}',
        })
      ).toEqual([
        "CREATE AGENT hn_agent USING model = 'gemini-2.0-flash', google_api_key = 'test-secret', " +
          "include_knowledge_bases = ['hn_kb', 'docs_kb'], prompt_template = 'Answer from HN''s posts', " +
          'temperature = 0.2, timeout = 30;',
      ]);
    });

    it('should include tables and quote structured parameters as JSON', () => {
      expect(
        sqlFor('kb.create-agent', {
          agentName: 'hn_agent',
          knowledgeBases: 'hn_kb',
          model: 'gemini-1.5-pro',
          tables: 'hackernews.stories',
          params: '{"mode": {"verbose": true}}',
        })
      ).toEqual([
        "CREATE AGENT hn_agent USING model = 'gemini-1.5-pro', google_api_key = 'test-secret', " +
          "include_knowledge_bases = ['hn_kb'], include_tables = ['hackernews.stories'], " +
          'mode = \'{"verbose":true}\';',
      ]);
    });

    it('should ask the agent through its answer column', () => {
      expect(sqlFor('kb.query-agent', { agentName: 'hn_agent', question: "What's new?" })).toEqual([
        "SELECT answer FROM hn_agent WHERE question = 'What''s new?';",
      ]);
    });
  });

  describe('kb.evaluate', () => {
    it('should generate test data before evaluating', () => {
      expect(
        sqlFor('kb.evaluate', {
          kbName: 'hn_kb',
          testTable: 'files.hn_test',
          generateFromSql: 'SELECT text FROM hackernews.stories;',
          generateCount: '20',
        })
      ).toEqual([
        'EVALUATE KNOWLEDGE_BASE hn_kb USING test_table = files.hn_test, generate_data = {"from_sql": "SELECT text FROM hackernews.stories", "count": 20}, evaluate = false;',
        "EVALUATE KNOWLEDGE_BASE hn_kb USING test_table = files.hn_test, version = 'doc_id';",
      ]);
    });

    it('should pass the judge model and the report table', () => {
      expect(
        sqlFor('kb.evaluate', {
          kbName: 'hn_kb',
          testTable: 'files.hn_test',
          evalVersion: 'llm_relevancy',
          llmModel: 'llama3',
          saveTo: 'files.hn_report',
        })
      ).toEqual([
        "EVALUATE KNOWLEDGE_BASE hn_kb USING test_table = files.hn_test, version = 'llm_relevancy', " +
          'llm = {"provider": "ollama", "model_name": "llama3", "base_url": "http://127.0.0.1:11434"}, save_to = files.hn_report;',
      ]);
    });

    it('should only generate when evaluation is switched off', () => {
      expect(
        sqlFor('kb.evaluate', {
          kbName: 'hn_kb',
          testTable: 'files.hn_test',
          generateData: true,
          evaluate: false,
        })
      ).toEqual([
        'EVALUATE KNOWLEDGE_BASE hn_kb USING test_table = files.hn_test, generate_data = {"count": 100}, evaluate = false;',
      ]);
    });
  });

  describe('models', () => {
    it('should build CREATE MODEL with a project, a prompt and parameters', () => {
      expect(
        sqlFor('ai.create-model', {
          modelName: 'sentiment',
          projectName: 'analytics',
          selectDataQuery: 'SELECT * FROM files.reviews;',
          predictColumn: 'label',
          promptTemplate: 'Classify: {{review}}',
          param: ['api_key=test-secret', 'temperature=0'],
        })
      ).toEqual([
        'CREATE MODEL analytics.sentiment FROM (SELECT * FROM files.reviews) PREDICT label ' +
          "USING engine = 'openai', prompt_template = 'Classify: {{review}}', api_key = 'test-secret', temperature = '0';",
      ]);
    });

    it('should fill in the Google key for gemini models', () => {
      expect(
        sqlFor('ai.create-model', {
          modelName: 'summarizer',
          selectDataQuery: 'SELECT text FROM hackernews.stories',
          predictColumn: 'summary',
          engine: 'google_gemini',
        })
      ).toEqual([
        'CREATE MODEL summarizer FROM (SELECT text FROM hackernews.stories) PREDICT summary ' +
          "USING engine = 'google_gemini', api_key = 'test-secret';",
      ]);
    });

    it('should compile the model management statements', () => {
      expect(sqlFor('ai.list-models', {})).toEqual(['SHOW MODELS;']);
      expect(sqlFor('ai.list-models', { projectName: 'analytics' })).toEqual([
        'SHOW MODELS FROM analytics;',
      ]);
      expect(sqlFor('ai.describe-model', { modelName: 'sentiment' })).toEqual([
        'DESCRIBE MODEL sentiment;',
      ]);
      expect(sqlFor('ai.drop-model', { modelName: 'sentiment', projectName: 'analytics' })).toEqual([
        'DROP MODEL analytics.sentiment;',
      ]);
      expect(sqlFor('ai.refresh-model', { modelName: 'sentiment' })).toEqual([
        'RETRAIN sentiment;',
      ]);
    });

    it('should pass raw queries through with a single terminator', () => {
      expect(sqlFor('ai.query', { queryString: 'SELECT 1;;' })).toEqual(['SELECT 1;']);
    });
  });

  describe('jobs', () => {
    it('should emit SCHEDULE, START and IF in that order', () => {
      expect(
        sqlFor('job.create', {
          jobName: 'nightly',
          statements: ['INSERT INTO hn_kb SELECT * FROM hackernews.stories;', 'RETRAIN sentiment'],
          every: '2 hours',
          start: '2026-01-01',
          if: 'SELECT 1;',
        })
      ).toEqual([
        "CREATE JOB nightly (INSERT INTO hn_kb SELECT * FROM hackernews.stories; RETRAIN sentiment) SCHEDULE EVERY 2 hours START '2026-01-01' IF (SELECT 1);",
      ]);
    });

    it('should default the schedule count to one', () => {
      expect(
        sqlFor('job.create', { jobName: 'daily', statements: ['RETRAIN sentiment'], every: 'every day' })
      ).toEqual(['CREATE JOB daily (RETRAIN sentiment) SCHEDULE EVERY 1 day;']);
    });

    it('should wrap an incremental HackerNews ingest in a job', () => {
      expect(
        sqlFor('job.create-hn-ingest', { jobName: 'hn_refresh', kbName: 'hn_kb', hnTable: 'comments' })
      ).toEqual([
        "CREATE DATABASE hackernews WITH ENGINE = 'hackernews';",
        'CREATE JOB hn_refresh (INSERT INTO hn_kb SELECT text AS content, id, `by`, parent, `time` FROM hackernews.comments WHERE id > LAST LIMIT 100) SCHEDULE EVERY 1 day;',
      ]);
    });

    it('should read jobs from the project tables', () => {
      expect(sqlFor('job.list', {})).toEqual(['SELECT * FROM mindsdb.jobs;']);
      expect(sqlFor('job.status', { jobName: 'nightly', projectName: 'ops' })).toEqual([
        "SELECT * FROM ops.jobs WHERE name = 'nightly';",
      ]);
      expect(sqlFor('job.history', { jobName: 'nightly' })).toEqual([
        "SELECT * FROM mindsdb.jobs_history WHERE name = 'nightly';",
      ]);
      expect(sqlFor('job.logs', { jobName: 'nightly' })).toEqual([
        "SELECT run_start, run_end, error, query FROM mindsdb.jobs_history WHERE name = 'nightly' ORDER BY run_start DESC LIMIT 20;",
      ]);
      expect(sqlFor('job.drop', { jobName: 'nightly' })).toEqual(['DROP JOB nightly;']);
    });
  });

  describe('setup and housekeeping', () => {
    it('should compile the remaining fixed statements', () => {
      expect(sqlFor('kb.index', { kbName: 'hn_kb' })).toEqual([
        'CREATE INDEX ON KNOWLEDGE_BASE hn_kb;',
      ]);
      expect(sqlFor('kb.list-databases', {})).toEqual(['SHOW DATABASES;']);
      expect(sqlFor('setup.hackernews', {})).toEqual([
        "CREATE DATABASE hackernews WITH ENGINE = 'hackernews';",
      ]);
    });
  });
});
