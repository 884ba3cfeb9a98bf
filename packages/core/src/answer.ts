/**
 * Answer pipeline: completion → guarded queries → rendered text.
 *
 * The pipeline always produces a response string. A completion that does not
 * parse, or anything that goes wrong on the way, yields the fallback message
 * followed by the raw completion.
 */

import type { QueryRequest, QueryResult } from './guard/types.js';
import { parseCompletion } from './llm/completion.js';
import type { AssistantPlan, CompletionInput, CompletionProvider, CompletionResult } from './llm/types.js';
import { silentLogger, type Logger } from './log.js';
import { renderTemplate } from './render/renderer.js';
import type { RenderOptions, ResultBinding } from './render/types.js';
import type { Row } from './db/types.js';

export const FALLBACK_PREFIX = "I analyzed your question but encountered an error. Here's what I found:\n\n";

/** Anything that runs one guarded statement; QueryGuard is the real one */
export interface QueryRunner {
  execute(sql: string, doctype?: string | null): Promise<QueryResult>;
}

export interface QueryOutcome {
  request: QueryRequest;
  result: QueryResult;
}

export interface QueryError {
  key: string;
  error: string;
}

export interface RunQueriesResult {
  binding: ResultBinding;
  /** One outcome per request, in request order */
  results: QueryOutcome[];
  errors: QueryError[];
}

/**
 * Run every request through the guard concurrently. Only successful keys are
 * bound; failed ones surface as unresolved placeholders or empty loops.
 */
export async function runQueries(requests: QueryRequest[], guard: QueryRunner): Promise<RunQueriesResult> {
  const results = await Promise.all(
    requests.map(async (request): Promise<QueryOutcome> => ({
      request,
      result: await guard.execute(request.sql, request.doctype),
    })),
  );

  const binding: Record<string, readonly Row[]> = {};
  const errors: QueryError[] = [];
  for (const { request, result } of results) {
    if (result.success) {
      binding[request.key] = result.rows;
    } else {
      errors.push({ key: request.key, error: result.error });
    }
  }
  return { binding, results, errors };
}

export type AnswerStatus = 'direct' | 'rendered' | 'fallback';

export interface AnswerResult {
  status: AnswerStatus;
  response: string;
  /** Null when the completion did not parse */
  plan: AssistantPlan | null;
  results: QueryOutcome[];
  errors: QueryError[];
}

export interface AnswerOptions {
  guard: QueryRunner;
  render?: RenderOptions;
  logger?: Logger;
}

function fallback(raw: string, plan: AssistantPlan | null, errors: QueryError[] = []): AnswerResult {
  return { status: 'fallback', response: `${FALLBACK_PREFIX}${raw}`, plan, results: [], errors };
}

export async function answerCompletion(raw: string, options: AnswerOptions): Promise<AnswerResult> {
  const logger = options.logger ?? silentLogger;

  const parsed = parseCompletion(raw);
  if (!parsed.ok) {
    logger.warn('Completion could not be parsed', { error: parsed.error });
    return fallback(raw, null);
  }

  const plan = parsed.plan;
  if (plan.kind === 'direct') {
    return { status: 'direct', response: plan.response, plan, results: [], errors: [] };
  }

  try {
    const { binding, results, errors } = await runQueries(plan.queries, options.guard);
    for (const e of errors) {
      logger.warn('Query failed', { key: e.key, error: e.error });
    }
    const response = renderTemplate(plan.template, binding, options.render);
    return { status: 'rendered', response, plan, results, errors };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.error('Answer pipeline failed', { error: msg });
    return fallback(raw, plan, [{ key: '', error: msg }]);
  }
}

export interface AskResult {
  completion: CompletionResult;
  answer: AnswerResult;
}

/**
 * Ask the model, then answer from its completion. Provider failures
 * (missing key, network) propagate; everything after that falls back.
 */
export async function askAssistant(
  input: CompletionInput,
  provider: CompletionProvider,
  options: AnswerOptions,
): Promise<AskResult> {
  const completion = await provider.complete(input);
  const answer = await answerCompletion(completion.raw, options);
  return { completion, answer };
}
