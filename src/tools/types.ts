import type { Logger } from 'pino';
import type { ToolError } from './errors.js';

/**
 * Context handed to every tool invocation
 */
export interface ToolContext {
  agentId: string;
  runId: string;
  /** Aborted when the owning run is cancelled */
  signal: AbortSignal;
  logger: Logger;
}

export type ToolHandler = (input: Record<string, unknown>, context: ToolContext) => Promise<string>;

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface Tool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
  /** Overrides the registry's default deadline */
  timeoutMs?: number;
}

export type ToolExecutionResult =
  | { success: true; output: string }
  | { success: false; error: ToolError };
