import type { AgentQueue } from '../agent/agent-queue.js';
import type { AgentRunResult } from '../agent/types.js';
import type { AgentStore } from '../store/types.js';
import { throwIfAborted } from '../utils/abort.js';

/**
 * Send `prompt` to an agent through the queue and wait for the run that
 * covers it. Aborting `signal` cancels that agent's lane.
 */
export async function askAgent(
  store: AgentStore,
  queue: AgentQueue,
  agentId: string,
  prompt: string,
  signal: AbortSignal
): Promise<AgentRunResult> {
  throwIfAborted(signal);

  const onAbort = () => {
    queue.cancel(agentId);
  };
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    await store.appendMessage(agentId, prompt);
    throwIfAborted(signal);
    return await queue.enqueue(agentId);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}
