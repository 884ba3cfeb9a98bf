/**
 * OpenAI chat-completions provider. DeepSeek and other OpenAI-compatible
 * services go through the same client with a base URL.
 */

import OpenAI from 'openai';
import type { AssistantSettings } from '../config/settings.js';
import { silentLogger, type Logger } from '../log.js';
import { parseCompletion } from './completion.js';
import { buildMessages, buildRepairMessages, type PromptInput } from './prompt.js';
import type { ChatMessage, CompletionInput, CompletionProvider, CompletionResult } from './types.js';

export interface OpenAIProviderOptions {
  logger?: Logger;
  /** Extra prompt settings (product name, creatable entities) */
  prompt?: Omit<PromptInput, 'question' | 'schemaContext' | 'history'>;
  maxTokens?: number;
}

function toParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIProvider implements CompletionProvider {
  private client: OpenAI;
  private readonly logger: Logger;

  constructor(
    private readonly settings: AssistantSettings,
    private readonly options: OpenAIProviderOptions = {},
  ) {
    if (!settings.apiKey) {
      throw new Error(
        `${settings.provider} API key is not configured. ` +
          'Run `askerp settings set api_key <key>` or set ASKERP_API_KEY in your shell.',
      );
    }
    this.client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl });
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Ask once; when the answer does not parse, ask again with a repair prompt.
   * The second answer is returned whatever it holds: the answer pipeline
   * falls back to showing it raw.
   */
  async complete(input: CompletionInput): Promise<CompletionResult> {
    const model = this.settings.model;
    const messages = buildMessages({ ...this.options.prompt, ...input });

    const raw = await this.callModel(model, messages);
    const first = parseCompletion(raw);
    if (first.ok) {
      return { raw, model, retried: false };
    }

    this.logger.warn('Completion did not parse, retrying with repair prompt', { error: first.error });
    const repaired = await this.callModel(model, buildRepairMessages(messages, raw, first.error));
    return { raw: repaired, model, retried: true };
  }

  private async callModel(model: string, messages: ChatMessage[]): Promise<string> {
    const response = await this.client.chat.completions.create({
      model,
      messages: messages.map(toParam),
      temperature: this.settings.temperature,
      max_tokens: this.options.maxTokens ?? 2048,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`${this.settings.provider} returned an empty response.`);
    }
    return content;
  }
}
