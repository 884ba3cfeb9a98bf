/**
 * AJV JSON Schema for the model's completion object.
 * Plain object schema (not JSONSchemaType); optional parts are checked for
 * type only, since the parser supplies defaults for whatever is missing.
 */

export interface RawCompletion {
  needs_data?: boolean;
  queries?: Array<{ key?: string; query?: string; doctype?: string | null }>;
  template?: string;
  response?: string;
}

export const completionSchema = {
  type: 'object' as const,
  properties: {
    needs_data: { type: 'boolean' as const },
    queries: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          key: { type: 'string' as const },
          query: { type: 'string' as const },
          doctype: { type: 'string' as const, nullable: true },
        },
      },
    },
    template: { type: 'string' as const },
    response: { type: 'string' as const },
  },
};
