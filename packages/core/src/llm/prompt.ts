/**
 * Prompt construction for the ERP assistant.
 */

import type { ChatMessage, ChatTurn } from './types.js';

export interface PromptInput {
  question: string;
  schemaContext?: string;
  history?: ChatTurn[];
  /** How the assistant names the product to users */
  productName?: string;
  /** Record types the assistant may create */
  creatableEntities?: string[];
}

const DEFAULT_PRODUCT = 'the ERP';

const QUERY_GUIDELINES = `QUERY GUIDELINES:
- Use backtick quotes around table and field names: \`tabItem\`, \`item_code\`
- Tables have a 'tab' prefix: the Item record type is stored in the \`tabItem\` table
- For submitted documents filter on docstatus = 1
- Use proper joins when working with multiple tables
- Only SELECT, SHOW and DESCRIBE may read data; never UPDATE, DELETE, DROP or ALTER
- One statement per query, no comments, no semicolons
- For "second most X" use ORDER BY metric DESC LIMIT 1 OFFSET 1 (not LIMIT 2,1)`;

const RESPONSE_FORMAT = `RESPONSE FORMAT - CHOOSE ONE OF THESE TWO:

1. For questions requiring database queries:
{
  "needs_data": true,
  "queries": [
    { "key": "unique_key_name", "query": "SQL query", "doctype": "Related DocType" }
  ],
  "template": "Your response template with {{placeholder}} variables"
}

2. For questions NOT requiring database queries:
{
  "needs_data": false,
  "response": "Your complete response to the user's question"
}

Template placeholders must match query keys:
- "{{key}}" for a single value
- "{{key.field}}" for a field of the first row
- "{{key[1].field}}" for a field of the second row
- "{% for row in key %}- {{row.field}} ({{loop.index}}){% endfor %}" for lists

Rules:
- Respond with ONLY the JSON object.
- Do NOT include any text before or after the JSON.`;

export function buildSystemPrompt(input: Omit<PromptInput, 'question' | 'history'> = {}): string {
  const product = input.productName ?? DEFAULT_PRODUCT;
  const creatable =
    input.creatableEntities && input.creatableEntities.length > 0
      ? `\n- New records may only be created for: ${input.creatableEntities.join(', ')}; they are saved as drafts`
      : '';

  return `You are a business assistant for ${product}. You answer questions about the
company's data and about using ${product}. Politely decline topics unrelated to
business or ${product}.

${QUERY_GUIDELINES}${creatable}

${RESPONSE_FORMAT}`;
}

export function buildMessages(input: PromptInput): ChatMessage[] {
  const context = input.schemaContext ? `${input.schemaContext}\n\n` : '';
  return [
    { role: 'system', content: buildSystemPrompt(input) },
    ...(input.history ?? []).map((turn): ChatMessage => ({ role: turn.role, content: turn.content })),
    { role: 'user', content: `${context}Question: ${input.question}` },
  ];
}

/**
 * Build a repair prompt when the first attempt produced invalid JSON/schema.
 */
export function buildRepairMessages(
  originalMessages: ChatMessage[],
  rawAssistantOutput: string,
  validationErrors: string,
): ChatMessage[] {
  return [
    ...originalMessages,
    { role: 'assistant', content: rawAssistantOutput },
    {
      role: 'user',
      content: `Your previous response was invalid. Errors:\n${validationErrors}\n\nPlease return ONLY a corrected JSON object in one of the two formats. No explanation, no markdown fences.`,
    },
  ];
}
