import type { z } from 'zod';
import type { Tool, ToolContext, ToolInputSchema } from './types.js';

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** Validates the model-supplied input before the handler sees it */
  schema: S;
  /** JSON schema advertised to the model */
  inputSchema: ToolInputSchema;
  handler: (input: z.infer<S>, context: ToolContext) => Promise<string>;
  timeoutMs?: number;
}

/**
 * Build a Tool whose handler receives zod-validated input.
 *
 * @example
 * const lookup = defineTool({
 *   name: 'lookup',
 *   description: 'Look up a term',
 *   schema: z.object({ term: z.string() }),
 *   inputSchema: { type: 'object', properties: { term: { type: 'string' } }, required: ['term'] },
 *   handler: async ({ term }) => glossary.get(term) ?? 'no entry',
 * });
 */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): Tool {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    timeoutMs: spec.timeoutMs,
    handler: async (input, context) => {
      const parsed = spec.schema.safeParse(input);
      if (!parsed.success) {
        const issues = parsed.error.errors.map((e) => `${e.path.join('.') || 'input'}: ${e.message}`);
        throw new Error(`Invalid input: ${issues.join('; ')}`);
      }
      return spec.handler(parsed.data, context);
    },
  };
}
