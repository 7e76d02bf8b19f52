import { describe, it, expect, afterEach } from 'vitest';
import { Runtime } from './runtime.js';
import { loadConfig } from '../config/config.js';
import type { StreamEvent } from '../providers/types.js';
import {
  ScriptedStreamClient,
  createRespondingClient,
  createTestStore,
  lastUserText,
  testAgent,
  testLogger,
  textTurn,
  toolTurn,
} from '../testing/helpers.js';

const config = loadConfig({ LOG_LEVEL: 'silent', CONDUCTOR_DB_PATH: ':memory:' });
const agents = [testAgent('coordinator'), testAgent('assistant', { role: 'general', tools: ['current_time'] })];

describe('Runtime', () => {
  let runtime: Runtime | undefined;

  afterEach(async () => {
    await runtime?.stop();
    runtime = undefined;
  });

  it('should deliver a message and commit the reply', async () => {
    const client = new ScriptedStreamClient([textTurn('Hi!')]);
    runtime = new Runtime({ config, logger: testLogger, agents, client, store: createTestStore() });
    await runtime.initialize();

    const result = await runtime.sendMessage('assistant', 'hello');

    expect(result).toMatchObject({ status: 'completed', response: 'Hi!', cursor: 1 });
    expect((await runtime.getStore().getAgentState('assistant')).cursor).toBe(1);
  });

  it('should expose the built-in tools to agents that enable them', async () => {
    const client = new ScriptedStreamClient([toolTurn('tu_1', 'current_time'), textTurn('It is now.')]);
    runtime = new Runtime({ config, logger: testLogger, agents, client, store: createTestStore() });
    await runtime.initialize();

    const result = await runtime.sendMessage('assistant', 'what time is it?');

    expect(client.requests[0].tools.map((t) => t.name)).toEqual(['current_time']);
    expect(result.status).toBe('completed');
    if (result.status === 'completed') {
      expect(result.toolInvocations[0].error).toBeUndefined();
    }
  });

  it('should reject messages for unknown agents', async () => {
    runtime = new Runtime({ config, logger: testLogger, agents, client: new ScriptedStreamClient(), store: createTestStore() });
    await runtime.initialize();

    await expect(runtime.sendMessage('nobody', 'hi')).rejects.toThrow('Unknown agent: nobody');
  });

  it('should orchestrate through the configured coordinator', async () => {
    const client = createRespondingClient((request): StreamEvent[] => {
      const prompt = lastUserText(request);
      if (prompt.startsWith('Break the objective')) {
        return textTurn('{"subtasks": [{"role": "general", "objective": "say hi"}]}');
      }
      if (prompt.startsWith('Write the final answer')) {
        return textTurn('hi from the team');
      }
      return textTurn('hi');
    });
    runtime = new Runtime({ config, logger: testLogger, agents, client, store: createTestStore() });
    await runtime.initialize();

    const result = await runtime.orchestrate('greet');

    expect(result).toMatchObject({ status: 'succeeded', result: 'hi from the team' });
  });

  it('should require an API key when no client is supplied', async () => {
    runtime = new Runtime({ config, logger: testLogger, agents, store: createTestStore() });
    await expect(runtime.initialize()).rejects.toThrow('ANTHROPIC_API_KEY is required');
  });

  it('should refuse work after stop', async () => {
    runtime = new Runtime({ config, logger: testLogger, agents, client: new ScriptedStreamClient(), store: createTestStore() });
    await runtime.initialize();
    await runtime.stop();
    await runtime.stop();

    expect(() => runtime?.getQueue()).toThrow('Runtime is not initialized');
  });
});
