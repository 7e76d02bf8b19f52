import { describe, it, expect } from 'vitest';
import { ModelStreamError, classifyError, isRetryableKind, kindFromStatus } from './errors.js';
import { AnthropicStreamMapper } from './anthropic.js';

describe('kindFromStatus', () => {
  it('should map provider status codes', () => {
    expect(kindFromStatus(429)).toBe('rate_limited');
    expect(kindFromStatus(529)).toBe('overloaded');
    expect(kindFromStatus(401)).toBe('auth_failure');
    expect(kindFromStatus(403)).toBe('auth_failure');
    expect(kindFromStatus(500)).toBe('server_error');
    expect(kindFromStatus(400)).toBe('invalid_request');
    expect(kindFromStatus(200)).toBe('unknown');
  });
});

describe('classifyError', () => {
  it('should prefer the status code over the message', () => {
    const error = Object.assign(new Error('overloaded'), { status: 401 });
    expect(classifyError(error)).toBe('auth_failure');
  });

  it('should read statusCode when status is absent', () => {
    const error = Object.assign(new Error('boom'), { statusCode: 503 });
    expect(classifyError(error)).toBe('server_error');
  });

  it('should fall back to message keywords', () => {
    expect(classifyError(new Error('Overloaded, try later'))).toBe('overloaded');
    expect(classifyError(new Error('Rate limit hit'))).toBe('rate_limited');
    expect(classifyError(new Error('socket hang up'))).toBe('network_failure');
    expect(classifyError(new Error('Unauthorized'))).toBe('auth_failure');
    expect(classifyError(new Error('something odd'))).toBe('unknown');
  });

  it('should keep the kind of a ModelStreamError', () => {
    expect(classifyError(new ModelStreamError('invalid_request', 'bad'))).toBe('invalid_request');
  });

  it('should treat non-errors as unknown', () => {
    expect(classifyError('nope')).toBe('unknown');
  });
});

describe('isRetryableKind', () => {
  it('should retry only transient kinds', () => {
    expect(isRetryableKind('rate_limited')).toBe(true);
    expect(isRetryableKind('overloaded')).toBe(true);
    expect(isRetryableKind('server_error')).toBe(true);
    expect(isRetryableKind('network_failure')).toBe(true);
    expect(isRetryableKind('auth_failure')).toBe(false);
    expect(isRetryableKind('invalid_request')).toBe(false);
    expect(isRetryableKind('tool_loop_exceeded')).toBe(false);
    expect(new ModelStreamError('overloaded', 'busy').retryable).toBe(true);
  });
});

describe('AnthropicStreamMapper', () => {
  it('should accumulate tool input fragments and report the message id as session', () => {
    const mapper = new AnthropicStreamMapper();
    const out = [
      ...mapper.map({
        type: 'message_start',
        message: {
          id: 'msg_1',
          type: 'message',
          role: 'assistant',
          model: 'claude-sonnet-4-5',
          content: [],
          stop_reason: null,
          stop_sequence: null,
          usage: { input_tokens: 12, output_tokens: 0, cache_creation_input_tokens: null, cache_read_input_tokens: null },
        },
      }),
      ...mapper.map({ type: 'content_block_start', index: 0, content_block: { type: 'text', text: '', citations: null } }),
      ...mapper.map({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Looking' } }),
      ...mapper.map({ type: 'content_block_stop', index: 0 }),
      ...mapper.map({
        type: 'content_block_start',
        index: 1,
        content_block: { type: 'tool_use', id: 'tu_1', name: 'lookup', input: {} },
      }),
      ...mapper.map({ type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"q":' } }),
      ...mapper.map({ type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '"tides"}' } }),
      ...mapper.map({ type: 'content_block_stop', index: 1 }),
      ...mapper.map({
        type: 'message_delta',
        delta: { stop_reason: 'tool_use', stop_sequence: null },
        usage: { output_tokens: 30 },
      }),
      ...mapper.map({ type: 'message_stop' }),
    ];

    expect(out).toEqual([
      { type: 'text_delta', text: 'Looking' },
      { type: 'tool_use', id: 'tu_1', name: 'lookup', input: { q: 'tides' } },
      { type: 'stop', reason: 'tool_use', sessionId: 'msg_1', usage: { inputTokens: 12, outputTokens: 30 } },
    ]);
  });

  it('should give an empty object for a tool with no input', () => {
    const mapper = new AnthropicStreamMapper();
    mapper.map({
      type: 'content_block_start',
      index: 0,
      content_block: { type: 'tool_use', id: 'tu_2', name: 'ping', input: {} },
    });
    expect(mapper.map({ type: 'content_block_stop', index: 0 })).toEqual([
      { type: 'tool_use', id: 'tu_2', name: 'ping', input: {} },
    ]);
  });
});
