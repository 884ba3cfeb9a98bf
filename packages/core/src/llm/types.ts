/**
 * Completion contract between the model and the answer pipeline.
 */

import type { QueryRequest } from '../guard/types.js';

/** The model either needs data (queries + a template) or answers directly */
export type AssistantPlan =
  | { kind: 'needs_data'; queries: QueryRequest[]; template: string }
  | { kind: 'direct'; response: string };

export type ParseCompletionResult = { ok: true; plan: AssistantPlan } | { ok: false; error: string };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionInput {
  question: string;
  /** Table and column notes for the model, already rendered to text */
  schemaContext?: string;
  /** Earlier turns of the same conversation, oldest first */
  history?: ChatTurn[];
}

export interface CompletionResult {
  /** Raw model output, handed as-is to the answer pipeline */
  raw: string;
  model: string;
  retried: boolean;
}

export interface CompletionProvider {
  complete(input: CompletionInput): Promise<CompletionResult>;
}
