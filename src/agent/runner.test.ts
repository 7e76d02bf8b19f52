import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AgentRunner, type AgentRunnerOptions } from './runner.js';
import { ToolRegistry } from '../tools/registry.js';
import type { OutputChannel } from './output.js';
import type { ModelStreamClient, StreamEvent } from '../providers/types.js';
import type { SqliteAgentStore } from '../store/sqlite-store.js';
import {
  ScriptedStreamClient,
  createRespondingClient,
  createTestCatalog,
  createTestStore,
  errorTurn,
  flushPromises,
  testAgent,
  testLogger,
  textTurn,
  toolTurn,
} from '../testing/helpers.js';

describe('AgentRunner', () => {
  let store: SqliteAgentStore;
  let tools: ToolRegistry;
  let delays: number[];

  beforeEach(() => {
    store = createTestStore();
    tools = new ToolRegistry({ logger: testLogger });
    delays = [];
  });

  afterEach(() => {
    store.close();
  });

  function createRunner(client: ModelStreamClient, overrides: Partial<AgentRunnerOptions> = {}): AgentRunner {
    return new AgentRunner({
      store,
      catalog: createTestCatalog(testAgent('alpha', { tools: ['lookup', 'echo'] })),
      tools,
      client,
      logger: testLogger,
      sleep: async (ms) => {
        delays.push(ms);
      },
      random: () => 0,
      ...overrides,
    });
  }

  it('should return idle when nothing is pending', async () => {
    const client = new ScriptedStreamClient();
    const result = await createRunner(client).run('alpha');

    expect(result.status).toBe('idle');
    expect(client.callCount).toBe(0);
  });

  it('should fail fast for an unknown agent', async () => {
    const result = await createRunner(new ScriptedStreamClient()).run('ghost');

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toEqual({ kind: 'unknown_agent', message: 'Agent "ghost" is not defined', retryable: false });
    }
  });

  it('should stream a reply and commit cursor, session and reply together', async () => {
    await store.appendMessage('alpha', 'hi');
    const client = new ScriptedStreamClient([textTurn('Hello there', 'msg_abc')]);

    const result = await createRunner(client).run('alpha');

    expect(result).toMatchObject({
      status: 'completed',
      response: 'Hello there',
      cursor: 1,
      sessionId: 'msg_abc',
      consumedSeqs: [1],
      usage: { inputTokens: 10, outputTokens: 5 },
      attempts: 1,
    });
    expect(client.requests[0]).toMatchObject({
      model: 'claude-sonnet-4-5',
      system: 'You are alpha.',
      messages: [{ role: 'user', content: 'hi' }],
    });

    const history = await store.listMessages('alpha');
    expect(history.map((m) => [m.role, m.content])).toEqual([
      ['user', 'hi'],
      ['assistant', [{ type: 'text', text: 'Hello there' }]],
    ]);
    expect(await store.getAgentState('alpha')).toMatchObject({ cursor: 1, sessionId: 'msg_abc' });
  });

  it('should merge a pending batch into one user turn and pass the session on', async () => {
    await store.appendMessage('alpha', 'first');
    const client = new ScriptedStreamClient([textTurn('one', 'msg_1'), textTurn('two', 'msg_2')]);
    const runner = createRunner(client);
    await runner.run('alpha');

    await store.appendMessage('alpha', 'second');
    await store.appendMessage('alpha', 'third');
    const result = await runner.run('alpha');

    expect(result).toMatchObject({ status: 'completed', cursor: 4, consumedSeqs: [3, 4] });
    expect(client.requests[1].sessionId).toBe('msg_1');
    expect(client.requests[1].messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: [{ type: 'text', text: 'one' }] },
      {
        role: 'user',
        content: [
          { type: 'text', text: 'second' },
          { type: 'text', text: 'third' },
        ],
      },
    ]);
  });

  it('should answer an unregistered tool with an error result and keep going', async () => {
    await store.appendMessage('alpha', 'look something up');
    const client = new ScriptedStreamClient([toolTurn('tu_1', 'lookup', { q: 'tides' }), textTurn('No lookup today.')]);

    const result = await createRunner(client).run('alpha');

    expect(result.status).toBe('completed');
    if (result.status === 'completed') {
      expect(result.response).toBe('No lookup today.');
      expect(result.toolInvocations).toHaveLength(1);
      expect(result.toolInvocations[0].error).toEqual({ kind: 'not_found', message: 'Tool "lookup" is not available' });
    }

    expect(client.requests[1].messages[2]).toEqual({
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: 'tu_1', content: 'Tool "lookup" is not available', is_error: true }],
    });

    const roles = (await store.listMessages('alpha')).map((m) => m.role);
    expect(roles).toEqual(['user', 'assistant', 'tool_result', 'assistant']);
  });

  it('should refuse a registered tool the agent has not enabled', async () => {
    const handler = vi.fn(async () => 'secret');
    tools.register({ name: 'admin', description: 'Admin', inputSchema: { type: 'object', properties: {} }, handler });
    await store.appendMessage('alpha', 'go');
    const client = new ScriptedStreamClient([toolTurn('tu_1', 'admin'), textTurn('ok')]);

    const result = await createRunner(client).run('alpha');

    expect(result.status).toBe('completed');
    expect(handler).not.toHaveBeenCalled();
  });

  it('should only advertise enabled, registered tools', async () => {
    tools.register({ name: 'echo', description: 'Echo', inputSchema: { type: 'object', properties: {} }, handler: async () => 'e' });
    tools.register({ name: 'admin', description: 'Admin', inputSchema: { type: 'object', properties: {} }, handler: async () => 'a' });
    await store.appendMessage('alpha', 'hi');
    const client = new ScriptedStreamClient([textTurn('ok')]);

    await createRunner(client).run('alpha');

    expect(client.requests[0].tools.map((t) => t.name)).toEqual(['echo']);
  });

  it('should retry overloaded responses with exponential backoff', async () => {
    await store.appendMessage('alpha', 'hello');
    const client = new ScriptedStreamClient([
      errorTurn('overloaded'),
      errorTurn('overloaded'),
      errorTurn('overloaded'),
      textTurn('Finally'),
    ]);

    const result = await createRunner(client).run('alpha');

    expect(result).toMatchObject({ status: 'completed', response: 'Finally', attempts: 4 });
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(delays.reduce((sum, ms) => sum + ms, 0)).toBeGreaterThanOrEqual(7000);
  });

  it('should add jitter on top of the exponential delay', async () => {
    await store.appendMessage('alpha', 'hello');
    const client = new ScriptedStreamClient([errorTurn('rate_limited'), textTurn('ok')]);

    await createRunner(client, { random: () => 0.5 }).run('alpha');

    // 1000 + 1000 * 0.2 * 0.5
    expect(delays).toEqual([1100]);
  });

  it('should stop after the configured number of attempts', async () => {
    await store.appendMessage('alpha', 'hello');
    const client = createRespondingClient(() => errorTurn('server_error', 'upstream 500'));

    const result = await createRunner(client).run('alpha');

    expect(result).toMatchObject({
      status: 'failed',
      attempts: 5,
      error: { kind: 'server_error', message: 'upstream 500', retryable: true },
    });
    expect(delays).toEqual([1000, 2000, 4000, 8000]);
    expect((await store.getAgentState('alpha')).cursor).toBe(0);
  });

  it('should not retry an auth failure', async () => {
    await store.appendMessage('alpha', 'hello');
    const client = new ScriptedStreamClient([errorTurn('auth_failure', 'invalid x-api-key')]);

    const result = await createRunner(client).run('alpha');

    expect(result).toMatchObject({
      status: 'failed',
      attempts: 1,
      error: { kind: 'auth_failure', retryable: false },
    });
    expect(delays).toEqual([]);
    expect(await store.listMessages('alpha')).toHaveLength(1);
  });

  it('should treat a stream that ends without stopping as a network failure', async () => {
    await store.appendMessage('alpha', 'hello');
    const client = new ScriptedStreamClient([[{ type: 'text_delta', text: 'partial' }], textTurn('whole')]);

    const result = await createRunner(client).run('alpha');

    expect(result).toMatchObject({ status: 'completed', response: 'whole', attempts: 2 });
    expect(delays).toEqual([1000]);
  });

  it('should re-run from the unchanged cursor after a failure that followed tool calls', async () => {
    let echoCalls = 0;
    tools.register({
      name: 'echo',
      description: 'Echo',
      inputSchema: { type: 'object', properties: {} },
      handler: async () => {
        echoCalls++;
        return 'echoed';
      },
    });
    await store.appendMessage('alpha', 'use echo');
    const client = new ScriptedStreamClient([
      toolTurn('tu_1', 'echo'),
      errorTurn('network_failure'),
      toolTurn('tu_1', 'echo', {}, 'msg_final'),
      textTurn('echo said echoed', 'msg_final'),
    ]);

    const result = await createRunner(client).run('alpha');

    expect(result).toMatchObject({ status: 'completed', cursor: 1, sessionId: 'msg_final', attempts: 2 });
    if (result.status === 'completed') {
      expect(result.toolInvocations.map((t) => t.attempt)).toEqual([1, 2]);
    }
    expect(echoCalls).toBe(2);
    // Second attempt started from the original history, not the failed attempt's turns
    expect(client.requests[2].messages).toEqual([{ role: 'user', content: 'use echo' }]);

    const stored = await store.listMessages('alpha');
    expect(stored.map((m) => m.role)).toEqual(['user', 'assistant', 'tool_result', 'assistant']);
    expect(await store.getAgentState('alpha')).toMatchObject({ cursor: 1, sessionId: 'msg_final' });
  });

  it('should fail without running the tool batch past the round-trip cap', async () => {
    const handler = vi.fn(async () => 'again');
    tools.register({
      name: 'echo',
      description: 'Echo',
      inputSchema: { type: 'object', properties: {} },
      handler,
    });
    await store.appendMessage('alpha', 'loop forever');
    let call = 0;
    const client = createRespondingClient(() => toolTurn(`tu_${++call}`, 'echo'));

    const result = await createRunner(client, { maxToolRoundTrips: 2 }).run('alpha');

    expect(result).toMatchObject({ status: 'failed', error: { kind: 'tool_loop_exceeded', retryable: false } });
    expect(client.requests).toHaveLength(3);
    expect(handler).toHaveBeenCalledTimes(2);
    expect((await store.getAgentState('alpha')).cursor).toBe(0);
  });

  it('should forward text deltas to the output channel and survive a failing sink', async () => {
    await store.appendMessage('alpha', 'hi');
    const seen: string[] = [];
    const output: OutputChannel = {
      emit: (agentId, text) => {
        seen.push(`${agentId}:${text}`);
        throw new Error('sink closed');
      },
    };
    const events: StreamEvent[] = [
      { type: 'text_delta', text: 'Hel' },
      { type: 'text_delta', text: 'lo' },
      { type: 'stop', reason: 'end_turn' },
    ];
    const client = new ScriptedStreamClient([events]);

    const result = await createRunner(client, { output }).run('alpha');

    expect(result).toMatchObject({ status: 'completed', response: 'Hello' });
    expect(seen).toEqual(['alpha:Hel', 'alpha:lo']);
  });

  it('should stop waiting on the stream as soon as the run is cancelled', async () => {
    await store.appendMessage('alpha', 'hi');
    const client = new ScriptedStreamClient([() => new Promise<StreamEvent[]>(() => undefined)]);
    const controller = new AbortController();

    const pending = createRunner(client).run('alpha', { signal: controller.signal });
    await flushPromises();
    expect(client.callCount).toBe(1);
    controller.abort();

    const result = await pending;
    expect(result.status).toBe('cancelled');
    expect((await store.getAgentState('alpha')).cursor).toBe(0);
    expect(await store.listMessages('alpha')).toHaveLength(1);
  });

  it('should stop waiting on a tool as soon as the run is cancelled', async () => {
    tools.register({
      name: 'echo',
      description: 'Echo',
      inputSchema: { type: 'object', properties: {} },
      handler: () => new Promise<string>(() => undefined),
    });
    await store.appendMessage('alpha', 'hi');
    const client = new ScriptedStreamClient([toolTurn('tu_1', 'echo')]);
    const controller = new AbortController();

    const pending = createRunner(client).run('alpha', { signal: controller.signal });
    await flushPromises();
    controller.abort();

    expect((await pending).status).toBe('cancelled');
    expect(client.callCount).toBe(1);
  });

  it('should cancel during the backoff sleep', async () => {
    await store.appendMessage('alpha', 'hi');
    const client = new ScriptedStreamClient([errorTurn('overloaded'), textTurn('never')]);
    const controller = new AbortController();
    const runner = createRunner(client, {
      sleep: (_ms, signal) =>
        new Promise<void>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
    });

    const pending = runner.run('alpha', { signal: controller.signal });
    await flushPromises();
    controller.abort();

    expect(await pending).toMatchObject({ status: 'cancelled', attempts: 1 });
    expect(client.callCount).toBe(1);
  });
});
