import * as fs from 'fs';
import { z } from 'zod';
import type { AgentDefinition } from '../agent/types.js';
import { errorMessage } from '../utils/logger.js';

export const agentDefinitionSchema = z.object({
  id: z
    .string()
    .min(1)
    .regex(/^[^#]+$/, 'Agent ids may not contain "#" (reserved for worker agents)'),
  role: z.string().min(1).optional(),
  description: z.string().optional(),
  model: z.string().min(1),
  systemPrompt: z.string().default(''),
  tools: z.array(z.string()).default([]),
  maxTokens: z.number().int().positive().optional(),
});

export const agentsFileSchema = z.object({
  agents: z.array(agentDefinitionSchema).min(1, 'At least one agent must be defined'),
});

/**
 * Parse and validate agent definitions from already-loaded JSON.
 */
export function parseAgentDefinitions(raw: unknown, source = 'agents file'): AgentDefinition[] {
  const result = agentsFileSchema.safeParse(raw);
  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Invalid ${source}:\n${errorMessages}`);
  }
  return result.data.agents;
}

/**
 * Load agent definitions from a JSON file: `{ "agents": [...] }`.
 */
export function loadAgentDefinitions(filePath: string): AgentDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read agents file ${filePath}: ${errorMessage(error)}`);
  }
  return parseAgentDefinitions(raw, filePath);
}
