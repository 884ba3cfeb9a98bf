/**
 * LLM module barrel export.
 */

export type {
  AssistantPlan,
  ChatMessage,
  ChatTurn,
  CompletionInput,
  CompletionProvider,
  CompletionResult,
  ParseCompletionResult,
} from './types.js';
export { OpenAIProvider } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
export { buildMessages, buildRepairMessages, buildSystemPrompt } from './prompt.js';
export type { PromptInput } from './prompt.js';
export { DEFAULT_DIRECT_RESPONSE, extractJson, parseCompletion, toPlan } from './completion.js';
export { completionSchema } from './schema_json.js';
export type { RawCompletion } from './schema_json.js';
