import type { ModelErrorKind, TokenUsage } from '../providers/types.js';
import type { ToolErrorKind } from '../tools/errors.js';

/**
 * A configured agent: model, prompt and enabled tools.
 * Worker agents (`<templateId>#<key>`) share their template's definition.
 */
export interface AgentDefinition {
  id: string;
  role?: string;
  description?: string;
  model: string;
  systemPrompt: string;
  tools: string[];
  maxTokens?: number;
}

export type RunFailureKind = ModelErrorKind | 'tool_loop_exceeded' | 'cursor_conflict' | 'unknown_agent';

export interface RunFailure {
  kind: RunFailureKind;
  message: string;
  retryable: boolean;
}

export interface ToolInvocationRecord {
  toolName: string;
  toolUseId: string;
  input: Record<string, unknown>;
  output?: string;
  error?: { kind: ToolErrorKind; message: string };
  attempt: number;
  startedAt: number;
  durationMs: number;
}

export type AgentRunResult =
  | {
      status: 'completed';
      agentId: string;
      runId: string;
      response: string;
      cursor: number;
      sessionId: string | null;
      consumedSeqs: number[];
      usage: TokenUsage;
      toolInvocations: ToolInvocationRecord[];
      attempts: number;
    }
  | {
      status: 'failed';
      agentId: string;
      runId: string;
      error: RunFailure;
      toolInvocations: ToolInvocationRecord[];
      attempts: number;
    }
  | { status: 'cancelled'; agentId: string; runId: string; attempts: number }
  | { status: 'idle'; agentId: string; runId: string };

export type RunStatus = AgentRunResult['status'];

export interface RunOptions {
  signal?: AbortSignal;
}
