import type { Logger } from 'pino';
import type { AgentQueue } from '../agent/agent-queue.js';
import { workerAgentId } from '../agent/catalog.js';
import type { AgentStore } from '../store/types.js';
import type { SynthesisInput, Synthesizer } from './types.js';
import { askAgent } from './ask-agent.js';
import { AbortError } from '../utils/abort.js';

/**
 * Deterministic synthesis: one section per succeeded subtask, in plan order.
 */
export class ComposeSynthesizer implements Synthesizer {
  async synthesize(input: SynthesisInput): Promise<string> {
    return input.succeeded.map((task) => `## ${task.objective}\n\n${task.result ?? ''}`.trimEnd()).join('\n\n');
  }
}

export interface AgentSynthesizerOptions {
  store: AgentStore;
  queue: AgentQueue;
  coordinatorId: string;
  logger: Logger;
  fallback?: Synthesizer;
}

/**
 * Asks the root's coordinator worker to write the final answer. Falls back
 * to composing the results when that run does not complete.
 */
export class AgentSynthesizer implements Synthesizer {
  private store: AgentStore;
  private queue: AgentQueue;
  private coordinatorId: string;
  private logger: Logger;
  private fallback: Synthesizer;

  constructor(options: AgentSynthesizerOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.coordinatorId = options.coordinatorId;
    this.logger = options.logger.child({ module: 'synthesizer' });
    this.fallback = options.fallback ?? new ComposeSynthesizer();
  }

  async synthesize(input: SynthesisInput): Promise<string> {
    const workerId = workerAgentId(this.coordinatorId, input.rootTaskId);
    const result = await askAgent(this.store, this.queue, workerId, buildPrompt(input), input.signal);

    if (result.status === 'cancelled') {
      throw new AbortError();
    }
    if (result.status === 'completed' && result.response.trim() !== '') {
      return result.response;
    }

    this.logger.warn(
      { rootTaskId: input.rootTaskId, status: result.status },
      'Synthesis run did not produce an answer, composing results instead'
    );
    return this.fallback.synthesize(input);
  }
}

function buildPrompt(input: SynthesisInput): string {
  const sections = input.succeeded.map((task) => `### ${task.objective}\n${task.result ?? ''}`);
  const missing = input.unsuccessful.map((task) => `- ${task.objective} (${task.status})`);

  return [
    `Write the final answer to: ${input.objective}`,
    '',
    'Subtask results:',
    ...sections,
    ...(missing.length > 0 ? ['', 'These subtasks did not complete; do not invent their results:', ...missing] : []),
  ].join('\n');
}
