import { z } from 'zod';
import { defineTool } from './define-tool.js';
import type { Tool } from './types.js';

/**
 * Current date and time, optionally in an IANA time zone.
 */
export const currentTimeTool: Tool = defineTool({
  name: 'current_time',
  description: 'Get the current date and time. Optionally pass an IANA time zone such as "Europe/Paris".',
  schema: z.object({ timezone: z.string().min(1).optional() }),
  inputSchema: {
    type: 'object',
    properties: {
      timezone: { type: 'string', description: 'IANA time zone name' },
    },
  },
  handler: async ({ timezone }) => {
    const now = new Date();
    if (!timezone) {
      return now.toISOString();
    }
    const formatted = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      dateStyle: 'full',
      timeStyle: 'long',
    }).format(now);
    return `${formatted} (${timezone})`;
  },
});

export const BUILTIN_TOOLS: readonly Tool[] = [currentTimeTool];
