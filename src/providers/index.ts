export * from './types.js';
export { ModelStreamError, classifyError, isRetryableKind, kindFromStatus } from './errors.js';
export { AnthropicStreamClient, AnthropicStreamMapper, ANTHROPIC_MODELS } from './anthropic.js';
