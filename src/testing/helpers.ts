/**
 * Test Helpers
 *
 * In-process stand-ins for the model provider and the store, so runs can be
 * driven end to end without network access.
 */

import { pino } from 'pino';
import type {
  ModelErrorKind,
  ModelStreamClient,
  StreamEvent,
  StreamRequest,
} from '../providers/types.js';
import { SqliteAgentStore } from '../store/sqlite-store.js';
import type { StoredMessage } from '../store/types.js';
import { createDeferred } from '../utils/deferred.js';
import { AgentCatalog } from '../agent/catalog.js';
import type { AgentDefinition } from '../agent/types.js';

// ---------------------------------------------------------------------------
// Silent logger for tests
// ---------------------------------------------------------------------------
export const testLogger = pino({ level: 'silent' });

// ---------------------------------------------------------------------------
// Scripted stream client
// ---------------------------------------------------------------------------

/** Events for one exchange, or a function producing them from the request */
export type ScriptedTurn = StreamEvent[] | ((request: StreamRequest) => StreamEvent[] | Promise<StreamEvent[]>);

/**
 * A ModelStreamClient that plays back one scripted turn per streamMessage call.
 */
export class ScriptedStreamClient implements ModelStreamClient {
  readonly name = 'scripted';
  readonly requests: StreamRequest[] = [];
  private turns: ScriptedTurn[];

  constructor(turns: ScriptedTurn[] = []) {
    this.turns = [...turns];
  }

  push(...turns: ScriptedTurn[]): void {
    this.turns.push(...turns);
  }

  get callCount(): number {
    return this.requests.length;
  }

  async *streamMessage(request: StreamRequest): AsyncIterable<StreamEvent> {
    this.requests.push(request);
    const turn = this.turns.shift();
    if (!turn) {
      throw new Error(`No scripted turn left for call ${this.requests.length}`);
    }
    const events = typeof turn === 'function' ? await turn(request) : turn;
    for (const event of events) {
      yield event;
    }
  }
}

/**
 * A ModelStreamClient that answers every call with `respond(request)`.
 */
export function createRespondingClient(
  respond: (request: StreamRequest) => StreamEvent[] | Promise<StreamEvent[]>
): ModelStreamClient & { requests: StreamRequest[] } {
  const requests: StreamRequest[] = [];
  return {
    name: 'responding',
    requests,
    async *streamMessage(request: StreamRequest): AsyncIterable<StreamEvent> {
      requests.push(request);
      for (const event of await respond(request)) {
        yield event;
      }
    },
  };
}

export function textTurn(text: string, sessionId = 'session-1'): StreamEvent[] {
  return [
    { type: 'text_delta', text },
    { type: 'stop', reason: 'end_turn', sessionId, usage: { inputTokens: 10, outputTokens: 5 } },
  ];
}

export function toolTurn(
  toolUseId: string,
  name: string,
  input: Record<string, unknown> = {},
  sessionId = 'session-1'
): StreamEvent[] {
  return [
    { type: 'tool_use', id: toolUseId, name, input },
    { type: 'stop', reason: 'tool_use', sessionId, usage: { inputTokens: 10, outputTokens: 5 } },
  ];
}

export function errorTurn(kind: ModelErrorKind, message = `${kind} from provider`): StreamEvent[] {
  return [{ type: 'error', kind, message }];
}

/** Text of the last user turn in a request */
export function lastUserText(request: StreamRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    const message = request.messages[i];
    if (message.role !== 'user') continue;
    if (typeof message.content === 'string') return message.content;
    return message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');
  }
  return '';
}

// ---------------------------------------------------------------------------
// Store and catalog
// ---------------------------------------------------------------------------

export function createTestStore(): SqliteAgentStore {
  return new SqliteAgentStore(':memory:');
}

/**
 * Store that holds message delivery for matching agents until the test opens the gate.
 */
export class GatedAppendStore extends SqliteAgentStore {
  readonly gate = createDeferred<void>();
  readonly held: string[] = [];

  constructor(private shouldHold: (agentId: string) => boolean) {
    super(':memory:');
  }

  async appendMessage(agentId: string, content: string): Promise<StoredMessage> {
    if (this.shouldHold(agentId)) {
      this.held.push(agentId);
      await this.gate.promise;
    }
    return super.appendMessage(agentId, content);
  }
}

export function testAgent(id: string, overrides: Partial<AgentDefinition> = {}): AgentDefinition {
  return {
    id,
    model: 'claude-sonnet-4-5',
    systemPrompt: `You are ${id}.`,
    tools: [],
    ...overrides,
  };
}

export function createTestCatalog(...definitions: AgentDefinition[]): AgentCatalog {
  return new AgentCatalog(definitions);
}

/** Let pending promise callbacks run */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
