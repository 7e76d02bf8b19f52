/**
 * Execution loop
 *
 * One run advances an agent from its committed cursor:
 * 1. read state, pending inbound messages and prior history
 * 2. stream an exchange, executing requested tools and re-opening the
 *    stream with their results until the model stops asking
 * 3. commit cursor, session and replies atomically
 *
 * A failed attempt leaves the store untouched, so a retry starts again from
 * the same cursor. Text already emitted by a failed attempt is not retracted.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type {
  Message,
  ModelStreamClient,
  StopReason,
  TokenUsage,
  ToolDefinition,
  ToolResultContent,
  ToolUseContent,
} from '../providers/types.js';
import { ModelStreamError, classifyError, isRetryableKind } from '../providers/errors.js';
import type { AgentStore, ReplyMessage } from '../store/types.js';
import { CursorConflictError } from '../store/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import { ToolError } from '../tools/errors.js';
import type { ToolExecutionResult } from '../tools/types.js';
import type { AgentCatalog } from './catalog.js';
import type { AgentDefinition, AgentRunResult, RunFailure, RunOptions, ToolInvocationRecord } from './types.js';
import { RunError } from './errors.js';
import { DEFAULT_RETRY_POLICY, computeBackoffDelay, type RetryPolicy } from './retry.js';
import { appendTurn, buildModelMessages } from './format.js';
import { NullOutputChannel, emitSafely, type OutputChannel } from './output.js';
import { isAbortError, raceAbort, sleep as abortableSleep, throwIfAborted, type SleepFn } from '../utils/abort.js';
import { errorMessage } from '../utils/logger.js';

export const DEFAULT_MAX_TOOL_ROUND_TRIPS = 25;

export interface AgentRunnerOptions {
  store: AgentStore;
  catalog: AgentCatalog;
  tools: ToolRegistry;
  client: ModelStreamClient;
  logger: Logger;
  output?: OutputChannel;
  retry?: Partial<RetryPolicy>;
  maxToolRoundTrips?: number;
  /** Injected for tests */
  sleep?: SleepFn;
  random?: () => number;
}

interface RunContext {
  agent: AgentDefinition;
  runId: string;
  attempt: number;
  signal: AbortSignal;
  log: Logger;
  toolInvocations: ToolInvocationRecord[];
}

interface Exchange {
  text: string;
  toolUses: ToolUseContent[];
  stopReason: StopReason;
  sessionId?: string;
  usage?: TokenUsage;
}

interface CommittedAttempt {
  response: string;
  cursor: number;
  sessionId: string | null;
  consumedSeqs: number[];
  usage: TokenUsage;
}

export class AgentRunner {
  private store: AgentStore;
  private catalog: AgentCatalog;
  private tools: ToolRegistry;
  private client: ModelStreamClient;
  private output: OutputChannel;
  private logger: Logger;
  private retryPolicy: RetryPolicy;
  private maxToolRoundTrips: number;
  private sleep: SleepFn;
  private random: () => number;

  constructor(options: AgentRunnerOptions) {
    this.store = options.store;
    this.catalog = options.catalog;
    this.tools = options.tools;
    this.client = options.client;
    this.output = options.output ?? new NullOutputChannel();
    this.logger = options.logger.child({ module: 'agent-runner' });
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.maxToolRoundTrips = options.maxToolRoundTrips ?? DEFAULT_MAX_TOOL_ROUND_TRIPS;
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Advance `agentId` past its pending inbound messages. Never rejects.
   */
  async run(agentId: string, options: RunOptions = {}): Promise<AgentRunResult> {
    const runId = nanoid();
    const signal = options.signal ?? new AbortController().signal;
    const log = this.logger.child({ agentId, runId });
    const toolInvocations: ToolInvocationRecord[] = [];

    const agent = this.catalog.get(agentId);
    if (!agent) {
      log.warn('Run requested for unknown agent');
      return {
        status: 'failed',
        agentId,
        runId,
        error: { kind: 'unknown_agent', message: `Agent "${agentId}" is not defined`, retryable: false },
        toolInvocations,
        attempts: 0,
      };
    }

    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) {
        return { status: 'cancelled', agentId, runId, attempts: attempt - 1 };
      }

      try {
        const committed = await this.attempt({ agent, runId, attempt, signal, log, toolInvocations });
        if (!committed) {
          log.debug('Nothing pending');
          return { status: 'idle', agentId, runId };
        }

        log.info(
          { cursor: committed.cursor, consumed: committed.consumedSeqs.length, attempts: attempt },
          'Run completed'
        );
        return { status: 'completed', agentId, runId, ...committed, toolInvocations, attempts: attempt };
      } catch (error) {
        if (isAbortError(error) || signal.aborted) {
          log.info({ attempt }, 'Run cancelled');
          return { status: 'cancelled', agentId, runId, attempts: attempt };
        }

        const failure = toRunFailure(error);
        if (!failure.retryable || attempt >= this.retryPolicy.maxAttempts) {
          log.warn({ attempt, kind: failure.kind, error: failure.message }, 'Run failed');
          return { status: 'failed', agentId, runId, error: failure, toolInvocations, attempts: attempt };
        }

        const delayMs = computeBackoffDelay(attempt, this.retryPolicy, this.random);
        log.warn({ attempt, kind: failure.kind, delayMs }, 'Run attempt failed, retrying');

        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          log.info({ attempt, reason: errorMessage(sleepError) }, 'Run cancelled during backoff');
          return { status: 'cancelled', agentId, runId, attempts: attempt };
        }
      }
    }
  }

  /**
   * One attempt. Resolves to null when there is nothing to consume.
   */
  private async attempt(ctx: RunContext): Promise<CommittedAttempt | null> {
    const { agent, signal } = ctx;

    const state = await raceAbort(this.store.getAgentState(agent.id), signal);
    const pending = await raceAbort(this.store.readMessagesSince(agent.id, state.cursor), signal);
    if (pending.length === 0) {
      return null;
    }
    const history = await raceAbort(this.store.readHistory(agent.id, state.cursor), signal);

    let messages: Message[] = buildModelMessages([...history, ...pending]);
    const toolDefinitions = this.tools.getToolDefinitions(agent.tools);
    const enabledTools = new Set(agent.tools);
    const replies: ReplyMessage[] = [];
    const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    const responseParts: string[] = [];
    let sessionId = state.sessionId;
    let roundTrips = 0;

    ctx.log.debug({ attempt: ctx.attempt, cursor: state.cursor, pending: pending.length }, 'Attempt started');

    for (;;) {
      const exchange = await this.streamExchange(ctx, messages, toolDefinitions, sessionId);

      if (exchange.sessionId) sessionId = exchange.sessionId;
      if (exchange.usage) {
        usage.inputTokens += exchange.usage.inputTokens;
        usage.outputTokens += exchange.usage.outputTokens;
      }
      if (exchange.text) responseParts.push(exchange.text);

      const assistantContent = [
        ...(exchange.text ? [{ type: 'text' as const, text: exchange.text }] : []),
        ...exchange.toolUses,
      ];
      if (assistantContent.length > 0) {
        replies.push({ role: 'assistant', content: assistantContent });
        messages = appendTurn(messages, { role: 'assistant', content: assistantContent });
      }

      if (exchange.toolUses.length === 0) {
        break;
      }

      if (roundTrips >= this.maxToolRoundTrips) {
        throw new RunError(
          'tool_loop_exceeded',
          `Exceeded ${this.maxToolRoundTrips} tool round trips without a final answer`
        );
      }
      roundTrips++;

      const results: ToolResultContent[] = [];
      for (const toolUse of exchange.toolUses) {
        results.push(await this.invokeTool(ctx, toolUse, enabledTools));
      }
      replies.push({ role: 'tool_result', content: results });
      messages = appendTurn(messages, { role: 'user', content: results });
    }

    // A cancelled run must not advance the cursor
    throwIfAborted(signal);

    const consumedSeqs = pending.map((message) => message.seq);
    const cursor = Math.max(...consumedSeqs);
    const committed = await this.store.commitCursor({
      agentId: agent.id,
      expectedCursor: state.cursor,
      cursor,
      sessionId,
      replies,
    });

    return {
      response: responseParts.join('\n\n'),
      cursor: committed.cursor,
      sessionId: committed.sessionId,
      consumedSeqs,
      usage,
    };
  }

  private async streamExchange(
    ctx: RunContext,
    messages: Message[],
    tools: ToolDefinition[],
    sessionId: string | null
  ): Promise<Exchange> {
    const { agent, signal } = ctx;
    const exchange: Exchange = { text: '', toolUses: [], stopReason: 'end_turn' };

    const stream = this.client.streamMessage({
      model: agent.model,
      system: agent.systemPrompt,
      messages,
      tools,
      sessionId: sessionId ?? undefined,
      maxTokens: agent.maxTokens,
      signal,
    });
    const iterator = stream[Symbol.asyncIterator]();
    let finished = false;

    try {
      for (;;) {
        const next = await raceAbort(iterator.next(), signal);
        if (next.done) {
          finished = true;
          throw new ModelStreamError('network_failure', 'Stream ended without a stop event');
        }

        const event = next.value;
        switch (event.type) {
          case 'text_delta':
            exchange.text += event.text;
            emitSafely(this.output, agent.id, event.text, ctx.log);
            break;
          case 'tool_use':
            exchange.toolUses.push({ type: 'tool_use', id: event.id, name: event.name, input: event.input });
            break;
          case 'error':
            throw new ModelStreamError(event.kind, event.message);
          case 'stop':
            exchange.stopReason = event.reason;
            exchange.sessionId = event.sessionId;
            exchange.usage = event.usage;
            return exchange;
        }
      }
    } finally {
      if (!finished && iterator.return) {
        void iterator.return().catch((error: unknown) => {
          ctx.log.debug({ error: errorMessage(error) }, 'Stream cleanup failed');
        });
      }
    }
  }

  private async invokeTool(
    ctx: RunContext,
    toolUse: ToolUseContent,
    enabledTools: ReadonlySet<string>
  ): Promise<ToolResultContent> {
    const startedAt = Date.now();

    const result: ToolExecutionResult = enabledTools.has(toolUse.name)
      ? await this.tools.execute(toolUse.name, toolUse.input, {
          agentId: ctx.agent.id,
          runId: ctx.runId,
          signal: ctx.signal,
          logger: ctx.log,
        })
      : { success: false, error: ToolError.notFound(toolUse.name) };

    const record: ToolInvocationRecord = {
      toolName: toolUse.name,
      toolUseId: toolUse.id,
      input: toolUse.input,
      attempt: ctx.attempt,
      startedAt,
      durationMs: Date.now() - startedAt,
    };

    if (result.success) {
      ctx.toolInvocations.push({ ...record, output: result.output });
      return { type: 'tool_result', tool_use_id: toolUse.id, content: result.output };
    }

    ctx.log.debug({ tool: toolUse.name, kind: result.error.kind }, 'Tool returned an error');
    ctx.toolInvocations.push({ ...record, error: { kind: result.error.kind, message: result.error.message } });
    return { type: 'tool_result', tool_use_id: toolUse.id, content: result.error.message, is_error: true };
  }
}

function toRunFailure(error: unknown): RunFailure {
  if (error instanceof RunError) {
    return { kind: error.kind, message: error.message, retryable: error.retryable };
  }
  if (error instanceof CursorConflictError) {
    return { kind: 'cursor_conflict', message: error.message, retryable: false };
  }
  if (error instanceof ModelStreamError) {
    return { kind: error.kind, message: error.message, retryable: error.retryable };
  }
  const kind = classifyError(error);
  return { kind, message: errorMessage(error), retryable: isRetryableKind(kind) };
}
