import type { Settings } from './config-store.js';
import { CliError, ErrorKind } from './errors.js';
import {
  failureFromError,
  interpret,
  isAlreadyExists,
  type Executor,
  type Outcome,
} from './interpreter.js';
import { normalize, type RawArgs } from './normalizer.js';
import { isOperationKind, type CommandRequest } from './operations.js';
import { NO_RESULTS_MESSAGE, render } from './renderer.js';
import { compile } from './sql-compiler.js';
import { MINDSDB_DIALECT, type SqlDialect } from './sql-literals.js';

const HOSTED_ENGINES = ['openai', 'anthropic', 'google_gemini'];

export interface DispatchOptions {
  /** Compile only; nothing is sent to the server */
  dryRun?: boolean;
  dialect?: SqlDialect;
  /** Called with each statement right before it is executed */
  onStatement?: (sql: string) => void;
}

export interface DispatchResult {
  statements: string[];
  /** One per executed statement */
  outcomes: Outcome[];
  /** Outcome of the last executed statement, or of the failed stage */
  outcome: Outcome;
  text: string;
  warnings: string[];
  executed: boolean;
}

function qualified(project: string | undefined, name: string): string {
  return project ? `${project}.${name}` : name;
}

/**
 * What to print when a statement succeeds without returning rows
 */
export function acknowledgement(request: CommandRequest): string {
  switch (request.kind) {
    case 'kb.create':
      return `Knowledge base '${request.kbName}' created.`;
    case 'kb.ingest':
      return `Ingestion into '${request.kbName}' from '${request.source.datasource}.${request.source.table}' submitted.`;
    case 'kb.index':
      return `Index creation for knowledge base '${request.kbName}' initiated.`;
    case 'kb.create-agent':
      return `Agent '${request.agentName}' created.`;
    case 'kb.evaluate':
      return `Evaluation statement for '${request.kbName}' completed.`;
    case 'ai.create-model':
      return `Model '${qualified(request.model.project, request.model.name)}' created. Training may take a while; check it with: kbforge ai describe-model ${request.model.name}`;
    case 'ai.drop-model':
      return `Model '${qualified(request.model.project, request.model.name)}' dropped.`;
    case 'ai.refresh-model':
      return `Retraining of '${qualified(request.model.project, request.model.name)}' started.`;
    case 'job.create':
      return `Job '${qualified(request.spec.job.project, request.spec.job.name)}' created.`;
    case 'job.create-hn-ingest':
      return `Job '${qualified(request.job.project, request.job.name)}' created.`;
    case 'job.drop':
      return `Job '${qualified(request.job.project, request.job.name)}' dropped.`;
    case 'setup.hackernews':
      return `HackerNews datasource '${request.datasource}' is ready.`;
    default:
      return NO_RESULTS_MESSAGE;
  }
}

/**
 * Non-fatal remarks about a request
 */
export function collectWarnings(request: CommandRequest): string[] {
  const warnings: string[] = [];

  if (request.kind === 'kb.create-agent') {
    if (request.ignoredParams.length > 0) {
      warnings.push(
        `Ignored --params keys already set by named options: ${request.ignoredParams.join(', ')}`
      );
    }
    if (!request.googleApiKey && request.model.startsWith('gemini')) {
      warnings.push(
        'No Google API key given (--google-api-key or GOOGLE_GEMINI_API_KEY); agent creation may fail.'
      );
    }
  }

  if (
    request.kind === 'ai.create-model' &&
    HOSTED_ENGINES.includes(request.spec.engine) &&
    !request.spec.params.some(([key]) => key === 'api_key')
  ) {
    warnings.push(
      `Engine '${request.spec.engine}' usually needs an API key: pass --param api_key=<key>.`
    );
  }

  return warnings;
}

const CREATED_OBJECT = /^CREATE (DATABASE|KNOWLEDGE_BASE|AGENT|MODEL|JOB) ([\w.`]+)/i;

const OBJECT_LABELS: Record<string, string> = {
  DATABASE: 'Datasource',
  KNOWLEDGE_BASE: 'Knowledge base',
  AGENT: 'Agent',
  MODEL: 'Model',
  JOB: 'Job',
};

/**
 * Label and name of the object a CREATE statement makes, if it makes one
 */
function createdObject(sql: string): { label: string; name: string } | undefined {
  const match = CREATED_OBJECT.exec(sql);
  if (!match) {
    return undefined;
  }
  const [, keyword, name] = match;
  return { label: OBJECT_LABELS[keyword.toUpperCase()] ?? 'Object', name: name.replace(/`/g, '') };
}

function failed(outcome: Outcome, statements: string[] = []): DispatchResult {
  return {
    statements,
    outcomes: [],
    outcome,
    text: render(outcome),
    warnings: [],
    executed: false,
  };
}

/**
 * Normalize, compile, execute, interpret and render one operation.
 * Input errors stop the pipeline before anything is sent; a failed
 * statement stops the ones after it.
 */
export async function dispatch(
  operationKind: string,
  raw: RawArgs,
  executor: Executor,
  settings: Settings,
  options: DispatchOptions = {}
): Promise<DispatchResult> {
  if (!isOperationKind(operationKind)) {
    return failed({
      type: 'failure',
      kind: ErrorKind.UnknownOperation,
      message: `Unknown operation '${operationKind}'`,
    });
  }

  let request: CommandRequest;
  let statements: string[];
  try {
    request = normalize(operationKind, raw, settings);
    statements = compile(request, options.dialect ?? MINDSDB_DIALECT);
  } catch (error) {
    if (error instanceof CliError) {
      return failed(failureFromError(error));
    }
    throw error;
  }

  const warnings = collectWarnings(request);

  if (options.dryRun) {
    return {
      statements,
      outcomes: [],
      outcome: { type: 'empty' },
      text: statements.join('\n'),
      warnings,
      executed: false,
    };
  }

  const outcomes: Outcome[] = [];
  const texts: string[] = [];
  const emptyMessage = acknowledgement(request);
  for (const [index, sql] of statements.entries()) {
    options.onStatement?.(sql);
    const created = createdObject(sql);
    const isLast = index === statements.length - 1;

    let outcome: Outcome;
    let text: string;
    try {
      outcome = interpret({ ok: true, result: await executor(sql) });
      text = render(
        outcome,
        isLast || !created ? emptyMessage : `${created.label} '${created.name}' is ready.`
      );
    } catch (error) {
      if (created && isAlreadyExists(error)) {
        outcome = { type: 'empty' };
        text = `${created.label} '${created.name}' already exists.`;
      } else {
        outcome = interpret({ ok: false, error });
        text = render(outcome);
      }
    }

    outcomes.push(outcome);
    texts.push(text);
    if (outcome.type === 'failure') {
      break;
    }
  }

  return {
    statements,
    outcomes,
    outcome: outcomes[outcomes.length - 1] ?? { type: 'empty' },
    text: texts.join('\n\n'),
    warnings,
    executed: true,
  };
}
