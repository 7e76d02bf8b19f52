/**
 * Model Stream Client Types
 * Provider-neutral message, tool and streaming event shapes
 */

// Content block types for messages
export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolUseContent {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContent {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type ContentBlock = TextContent | ToolUseContent | ToolResultContent;

// Message types
export interface Message {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

// Tool declaration sent to the model
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

// Token usage tracking
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

/**
 * Provider failure categories. The first four are transient and retried by the
 * run loop; the rest are surfaced immediately.
 */
export type ModelErrorKind =
  | 'rate_limited'
  | 'overloaded'
  | 'server_error'
  | 'network_failure'
  | 'invalid_request'
  | 'auth_failure'
  | 'unknown';

// Streaming event types
export type StreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'stop'; reason: StopReason; sessionId?: string; usage?: TokenUsage }
  | { type: 'error'; kind: ModelErrorKind; message: string };

export interface StreamRequest {
  model: string;
  system: string;
  messages: Message[];
  tools: ToolDefinition[];
  /** Opaque conversation token returned by a previous exchange */
  sessionId?: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

// Client interface
export interface ModelStreamClient {
  name: string;

  /**
   * Open one streaming exchange. The sequence is finite and ends with either a
   * `stop` or an `error` event.
   */
  streamMessage(request: StreamRequest): AsyncIterable<StreamEvent>;
}

// Client configuration
export interface ClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  defaultMaxTokens?: number;
}
