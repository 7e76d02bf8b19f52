import Anthropic from '@anthropic-ai/sdk';
import type {
  ClientOptions,
  ContentBlock,
  Message,
  ModelStreamClient,
  StopReason,
  StreamEvent,
  StreamRequest,
  TokenUsage,
  ToolDefinition,
} from './types.js';
import { classifyError, kindFromStatus } from './errors.js';
import { AbortError } from '../utils/abort.js';
import { errorMessage } from '../utils/logger.js';

/**
 * Short aliases accepted in agent definitions.
 */
export const ANTHROPIC_MODELS = {
  'claude-opus-4-5': 'claude-opus-4-5-20251101',
  'claude-sonnet-4-5': 'claude-sonnet-4-5-20250929',
  'claude-sonnet-4': 'claude-sonnet-4-20250514',
  opus: 'claude-opus-4-5-20251101',
  sonnet: 'claude-sonnet-4-5-20250929',
} as const;

const DEFAULT_MAX_TOKENS = 8192;

function resolveModel(model: string): string {
  for (const [alias, id] of Object.entries(ANTHROPIC_MODELS)) {
    if (alias === model) return id;
  }
  return model;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mapStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'tool_use':
      return 'tool_use';
    case 'max_tokens':
      return 'max_tokens';
    case 'stop_sequence':
      return 'stop_sequence';
    default:
      return 'end_turn';
  }
}

/**
 * Tool input arrives as `input_json_delta` fragments; parse once the block closes.
 */
function parseToolInput(json: string): Record<string, unknown> {
  if (json.trim() === '') return {};
  const parsed: unknown = JSON.parse(json);
  return isRecord(parsed) ? parsed : { value: parsed };
}

/**
 * Turns raw Anthropic stream events into provider-neutral StreamEvents.
 * One mapper per exchange.
 */
export class AnthropicStreamMapper {
  private toolBlocks: Map<number, { id: string; name: string; json: string }> = new Map();
  private messageId: string | undefined;
  private stopReason: StopReason = 'end_turn';
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  map(event: Anthropic.RawMessageStreamEvent): StreamEvent[] {
    switch (event.type) {
      case 'message_start':
        this.messageId = event.message.id;
        this.usage.inputTokens = event.message.usage.input_tokens;
        return [];

      case 'content_block_start': {
        const block = event.content_block;
        if (block.type === 'tool_use') {
          this.toolBlocks.set(event.index, { id: block.id, name: block.name, json: '' });
        } else if (block.type === 'text' && block.text) {
          return [{ type: 'text_delta', text: block.text }];
        }
        return [];
      }

      case 'content_block_delta': {
        const delta = event.delta;
        if (delta.type === 'text_delta') {
          return [{ type: 'text_delta', text: delta.text }];
        }
        if (delta.type === 'input_json_delta') {
          const pending = this.toolBlocks.get(event.index);
          if (pending) pending.json += delta.partial_json;
        }
        return [];
      }

      case 'content_block_stop': {
        const pending = this.toolBlocks.get(event.index);
        if (!pending) return [];
        this.toolBlocks.delete(event.index);
        return [{ type: 'tool_use', id: pending.id, name: pending.name, input: parseToolInput(pending.json) }];
      }

      case 'message_delta':
        this.stopReason = mapStopReason(event.delta.stop_reason);
        this.usage.outputTokens = event.usage.output_tokens;
        return [];

      case 'message_stop':
        return [{ type: 'stop', reason: this.stopReason, sessionId: this.messageId, usage: { ...this.usage } }];

      default:
        return [];
    }
  }
}

export class AnthropicStreamClient implements ModelStreamClient {
  public readonly name = 'anthropic';

  private client: Anthropic;
  private defaultMaxTokens: number;

  constructor(options: ClientOptions) {
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;

    // Retries belong to the run loop, which re-reads from the committed cursor
    this.client = new Anthropic({
      apiKey: options.apiKey,
      maxRetries: 0,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
      ...(options.timeout ? { timeout: options.timeout } : {}),
    });
  }

  async *streamMessage(request: StreamRequest): AsyncIterable<StreamEvent> {
    const params: Anthropic.MessageCreateParamsStreaming = {
      model: resolveModel(request.model),
      messages: this.formatMessages(request.messages),
      max_tokens: request.maxTokens ?? this.defaultMaxTokens,
      stream: true,
      ...(request.system ? { system: request.system } : {}),
      ...(request.tools.length > 0 ? { tools: this.formatTools(request.tools) } : {}),
    };

    const mapper = new AnthropicStreamMapper();

    try {
      const events: AsyncIterable<Anthropic.RawMessageStreamEvent> = await this.client.messages.create(params, {
        signal: request.signal,
      });

      for await (const event of events) {
        for (const mapped of mapper.map(event)) {
          yield mapped;
        }
      }
    } catch (error) {
      if (error instanceof Anthropic.APIUserAbortError || request.signal?.aborted) {
        throw new AbortError();
      }
      yield this.toErrorEvent(error);
    }
  }

  private toErrorEvent(error: unknown): StreamEvent {
    const message = errorMessage(error);
    if (error instanceof Anthropic.APIConnectionError) {
      return { type: 'error', kind: 'network_failure', message };
    }
    if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
      return { type: 'error', kind: kindFromStatus(error.status), message };
    }
    return { type: 'error', kind: classifyError(error), message };
  }

  private formatMessages(messages: Message[]): Anthropic.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: typeof msg.content === 'string' ? msg.content : msg.content.map(toBlockParam),
    }));
  }

  private formatTools(tools: ToolDefinition[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.input_schema,
    }));
  }
}

function toBlockParam(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.tool_use_id,
        content: block.content,
        ...(block.is_error ? { is_error: true } : {}),
      };
  }
}
