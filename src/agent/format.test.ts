import { describe, it, expect } from 'vitest';
import { appendTurn, buildModelMessages } from './format.js';
import type { Message } from '../providers/types.js';

describe('appendTurn', () => {
  it('should merge a same-role turn into text blocks', () => {
    const turns: Message[] = [{ role: 'user', content: 'first' }];

    expect(appendTurn(turns, { role: 'user', content: 'second' })).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'first' },
          { type: 'text', text: 'second' },
        ],
      },
    ]);
    expect(turns).toEqual([{ role: 'user', content: 'first' }]);
  });

  it('should append a turn with a different role', () => {
    const turns: Message[] = [{ role: 'user', content: 'hi' }];

    expect(appendTurn(turns, { role: 'assistant', content: 'hello' })).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
    ]);
  });
});

describe('buildModelMessages', () => {
  it('should send tool results as user turns and merge adjacent user turns', () => {
    const messages = buildModelMessages([
      { agentId: 'a', seq: 1, role: 'user', content: 'find it', replyTo: null, createdAt: 0 },
      {
        agentId: 'a',
        seq: 2,
        role: 'assistant',
        content: [{ type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }],
        replyTo: 1,
        createdAt: 0,
      },
      {
        agentId: 'a',
        seq: 3,
        role: 'tool_result',
        content: [{ type: 'tool_result', tool_use_id: 'tu_1', content: 'found' }],
        replyTo: 1,
        createdAt: 0,
      },
      { agentId: 'a', seq: 4, role: 'user', content: 'thanks', replyTo: null, createdAt: 0 },
    ]);

    expect(messages).toEqual([
      { role: 'user', content: 'find it' },
      { role: 'assistant', content: [{ type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} }] },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'tu_1', content: 'found' },
          { type: 'text', text: 'thanks' },
        ],
      },
    ]);
  });
});
