import { Command } from 'commander';
import type { RawArgs } from '../lib/normalizer.js';
import { execute } from './run.js';

/**
 * Register knowledge base and agent commands with Commander
 */
export function registerKbCommands(program: Command): void {
  const kbCmd = program
    .command('kb')
    .description('Knowledge base and agent commands');

  kbCmd
    .command('create')
    .description('Create a knowledge base')
    .argument('<kb_name>', 'Knowledge base name')
    .option('--embedding-provider <provider>', 'Embedding model provider (default: ollama)')
    .option('--embedding-model <model>', 'Embedding model name (default: OLLAMA_EMBEDDING_MODEL or nomic-embed-text)')
    .option('--embedding-base-url <url>', 'Embedding provider base URL (default for ollama: OLLAMA_BASE_URL)')
    .option('--embedding-api-key <key>', 'Embedding provider API key')
    .option('--with-reranking', 'Add a reranking model (default: OLLAMA_RERANKING_MODEL or llama3)')
    .option('--reranking-provider <provider>', 'Reranking model provider (default: ollama)')
    .option('--reranking-model <model>', 'Reranking model name')
    .option('--reranking-base-url <url>', 'Reranking provider base URL')
    .option('--reranking-api-key <key>', 'Reranking provider API key')
    .option('--content-columns <columns>', 'Comma-separated content columns, e.g. "title,text"')
    .option('--metadata-columns <columns>', 'Comma-separated metadata columns, e.g. "id,score"')
    .option('--id-column <column>', 'ID column')
    .action(async (kbName: string, options: RawArgs, command: Command) => {
      await execute('kb.create', { ...options, kbName }, command);
    });

  kbCmd
    .command('ingest')
    .description('Insert rows from a source table into a knowledge base')
    .argument('<kb_name>', 'Knowledge base name')
    .option('--from-hackernews <table>', 'HackerNews table (stories, comments, ...)')
    .option('--hn-datasource <name>', 'HackerNews datasource name (default: hackernews)')
    .option('--from <source>', 'Any source table as <datasource>.<table>')
    .option('--content-columns <columns>', 'Comma-separated content columns (auto-detected for HackerNews tables)')
    .option('--metadata-map <json>', 'JSON object mapping metadata keys to source columns')
    .option('--id-column <column>', 'ID column (default: id)')
    .option('-l, --limit <number>', 'Maximum rows to ingest (default: 100)')
    .option('--order-by <expr>', 'Ordering, e.g. "id DESC"')
    .action(async (kbName: string, options: RawArgs, command: Command) => {
      await execute('kb.ingest', { ...options, kbName }, command);
    });

  kbCmd
    .command('query')
    .description('Semantic search over a knowledge base')
    .argument('<kb_name>', 'Knowledge base name')
    .argument('<query_text>', 'Search text')
    .option('--metadata-filter <json>', 'Metadata filter, e.g. \'{"score": {"$gt": 50}}\'')
    .option('-l, --limit <number>', 'Maximum results (default: 5)')
    .action(async (kbName: string, queryText: string, options: RawArgs, command: Command) => {
      await execute('kb.query', { ...options, kbName, queryText }, command);
    });

  kbCmd
    .command('index')
    .description('Create or rebuild the index of a knowledge base')
    .argument('<kb_name>', 'Knowledge base name')
    .action(async (kbName: string, _options: RawArgs, command: Command) => {
      await execute('kb.index', { kbName }, command);
    });

  kbCmd
    .command('list-databases')
    .description('List databases and datasources')
    .action(async (_options: RawArgs, command: Command) => {
      await execute('kb.list-databases', {}, command);
    });

  kbCmd
    .command('create-agent')
    .description('Create an agent that answers questions from knowledge bases')
    .argument('<agent_name>', 'Agent name')
    .argument('<kb_names>', 'Comma-separated knowledge base names')
    .option('--model <model>', 'LLM name (default: GOOGLE_MODEL or gemini-2.0-flash)')
    .option('--google-api-key <key>', 'Google API key (default: GOOGLE_GEMINI_API_KEY)')
    .option('--tables <tables>', 'Comma-separated <datasource>.<table> list')
    .option('--prompt-template <template>', 'Instructions for the agent')
    .option('--params <json>', 'Additional USING parameters as a JSON object')
    .action(
      async (agentName: string, knowledgeBases: string, options: RawArgs, command: Command) => {
        await execute('kb.create-agent', { ...options, agentName, knowledgeBases }, command);
      }
    );

  kbCmd
    .command('query-agent')
    .description('Ask an agent a question')
    .argument('<agent_name>', 'Agent name')
    .argument('<question>', 'Question in natural language')
    .action(async (agentName: string, question: string, _options: RawArgs, command: Command) => {
      await execute('kb.query-agent', { agentName, question }, command);
    });

  kbCmd
    .command('evaluate')
    .description('Evaluate retrieval quality of a knowledge base')
    .argument('<kb_name>', 'Knowledge base name')
    .option('--test-table <table>', 'Test data table as <datasource>.<table>')
    .option('--eval-version <version>', 'doc_id or llm_relevancy (default: doc_id)')
    .option('--generate-data', 'Generate test data before evaluating')
    .option('--generate-from-sql <sql>', 'Query selecting the content to generate test data from')
    .option('--generate-count <number>', 'Number of test rows to generate (default: 100)')
    .option('--no-evaluate', 'Only generate test data')
    .option('--llm-provider <provider>', 'LLM provider for generation/judging (default: ollama)')
    .option('--llm-model <model>', 'LLM model name')
    .option('--llm-base-url <url>', 'LLM provider base URL')
    .option('--llm-api-key <key>', 'LLM provider API key')
    .option('--save-to <table>', 'Store the report in <datasource>.<table>')
    .action(async (kbName: string, options: RawArgs, command: Command) => {
      await execute('kb.evaluate', { ...options, kbName }, command);
    });
}
