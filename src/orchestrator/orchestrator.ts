/**
 * Orchestrator
 *
 * Runs one task tree: plan, fan subtasks out to worker agents under a
 * concurrency limit, settle each child from its run result, then synthesize.
 * Failed or cancelled children become caveats on a succeeded root unless
 * nothing succeeded.
 */

import type { Logger } from 'pino';
import type { AgentQueue } from '../agent/agent-queue.js';
import { workerAgentId, type AgentCatalog } from '../agent/catalog.js';
import type { AgentDefinition, AgentRunResult } from '../agent/types.js';
import type { AgentStore, TaskNode, TaskRecord, TaskStatus, TaskUpdate } from '../store/types.js';
import { InvalidTransitionError, TaskNotFoundError } from '../store/errors.js';
import { isTerminal } from '../store/task-transitions.js';
import type { OrchestrateOptions, OrchestrationResult, Plan, PlannedSubtask, Planner, Synthesizer } from './types.js';
import { ConcurrencyGate, type Release } from './concurrency-gate.js';
import { PlanningError } from './errors.js';
import { StaticPlanner } from './planner.js';
import { ComposeSynthesizer } from './synthesizer.js';
import { isAbortError } from '../utils/abort.js';
import { createDeferred, type Deferred } from '../utils/deferred.js';
import { errorMessage } from '../utils/logger.js';

export const DEFAULT_MAX_CONCURRENT = 5;

export interface OrchestratorOptions {
  store: AgentStore;
  queue: AgentQueue;
  catalog: AgentCatalog;
  logger: Logger;
  planner?: Planner;
  synthesizer?: Synthesizer;
  maxConcurrent?: number;
}

/** State of an orchestration that is still running in this process */
interface LiveOrchestration {
  controller: AbortController;
  done: Deferred<void>;
}

export class Orchestrator {
  private store: AgentStore;
  private queue: AgentQueue;
  private catalog: AgentCatalog;
  private logger: Logger;
  private planner: Planner;
  private synthesizer: Synthesizer;
  private maxConcurrent: number;
  private live: Map<string, LiveOrchestration> = new Map();

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.catalog = options.catalog;
    this.logger = options.logger.child({ module: 'orchestrator' });
    this.planner = options.planner ?? new StaticPlanner({ subtasks: [] });
    this.synthesizer = options.synthesizer ?? new ComposeSynthesizer();
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
  }

  /**
   * Run an objective to completion. Resolves with the settled root task;
   * failures are reported in the result, not thrown.
   */
  async run(objective: string, options: OrchestrateOptions = {}): Promise<OrchestrationResult> {
    const root = await this.store.createTask({ objective, parentId: options.parentId ?? null, status: 'running' });
    const live: LiveOrchestration = { controller: new AbortController(), done: createDeferred<void>() };
    this.live.set(root.id, live);
    const log = this.logger.child({ rootTaskId: root.id });
    log.info({ objective }, 'Orchestration started');

    try {
      try {
        await this.execute(root, options.plan, live.controller.signal, log);
      } catch (error) {
        if (isAbortError(error) || live.controller.signal.aborted) {
          await this.settle(root.id, 'cancelled');
        } else {
          const kind = error instanceof PlanningError ? error.kind : 'orchestration_failed';
          log.warn({ kind, error: errorMessage(error) }, 'Orchestration failed');
          await this.cancelActiveChildren(root.id);
          await this.settle(root.id, 'failed', { error: { kind, message: errorMessage(error) } });
        }
      }

      const result = await this.toResult(root.id);
      log.info({ status: result.status, caveats: result.caveats.length }, 'Orchestration finished');
      return result;
    } finally {
      this.live.delete(root.id);
      live.done.resolve();
    }
  }

  /**
   * Cancel a task and every unfinished descendant. Returns how many tasks
   * were cancelled.
   */
  async cancel(taskId: string): Promise<number> {
    const tree = await this.store.getTaskTree(taskId);
    if (!tree) {
      throw new TaskNotFoundError(taskId);
    }

    const nodes = flatten(tree);
    for (const node of nodes) {
      this.live.get(node.id)?.controller.abort();
    }

    let cancelled = 0;
    // Children before parents
    for (const node of nodes.reverse()) {
      if (isTerminal(node.status)) continue;
      const settled = await this.settle(node.id, 'cancelled');
      // The settled record carries a worker bound after the tree was read
      const workerId = settled.agentId ?? node.agentId;
      if (workerId) {
        this.queue.cancel(workerId);
      }
      if (settled.status === 'cancelled') cancelled++;
    }

    this.logger.info({ taskId, cancelled }, 'Task tree cancelled');
    return cancelled;
  }

  async getTaskTree(rootId: string): Promise<TaskNode | undefined> {
    return this.store.getTaskTree(rootId);
  }

  /**
   * Cancel every orchestration running in this process and wait for each
   * to settle.
   */
  async shutdown(): Promise<void> {
    const running = Array.from(this.live.entries());
    for (const [rootId] of running) {
      await this.cancel(rootId);
    }
    await Promise.all(running.map(([, live]) => live.done.promise));
  }

  private async execute(root: TaskRecord, givenPlan: Plan | undefined, signal: AbortSignal, log: Logger): Promise<void> {
    const plan = givenPlan ?? (await this.planner.plan(root.objective, { rootTaskId: root.id, signal }));

    if (plan.subtasks.length === 0) {
      await this.settle(root.id, 'succeeded', { result: plan.answer ?? '' });
      return;
    }

    const children: TaskRecord[] = [];
    for (const subtask of plan.subtasks) {
      children.push(await this.store.createTask({ objective: subtask.objective, parentId: root.id }));
    }
    log.debug({ subtasks: children.length, maxConcurrent: this.maxConcurrent }, 'Dispatching subtasks');

    const gate = new ConcurrencyGate(this.maxConcurrent);
    const settled = await Promise.all(
      children.map((child, index) => this.runChild(child, plan.subtasks[index], gate, signal, log))
    );

    if (signal.aborted) {
      await this.settle(root.id, 'cancelled');
      return;
    }

    const succeeded = settled.filter((task) => task.status === 'succeeded');
    const unsuccessful = settled.filter((task) => task.status !== 'succeeded');
    const caveats = unsuccessful.map(describeCaveat);

    if (succeeded.length === 0) {
      await this.settle(root.id, 'failed', {
        caveats,
        error: { kind: 'all_subtasks_failed', message: `All ${settled.length} subtasks failed or were cancelled` },
      });
      return;
    }

    const body = await this.synthesizer.synthesize({
      objective: root.objective,
      rootTaskId: root.id,
      succeeded,
      unsuccessful,
      signal,
    });
    const result = caveats.length > 0 ? `${body}\n\nCaveats:\n${caveats.map((c) => `- ${c}`).join('\n')}` : body;
    await this.settle(root.id, 'succeeded', { result, caveats });
  }

  private async runChild(
    child: TaskRecord,
    subtask: PlannedSubtask,
    gate: ConcurrencyGate,
    signal: AbortSignal,
    log: Logger
  ): Promise<TaskRecord> {
    let release: Release;
    try {
      release = await gate.acquire(signal);
    } catch (error) {
      if (isAbortError(error)) {
        return this.settle(child.id, 'cancelled');
      }
      throw error;
    }

    try {
      if (signal.aborted) {
        return await this.settle(child.id, 'cancelled');
      }

      const template = this.resolveTemplate(subtask);
      if (!template) {
        await this.settle(child.id, 'running');
        return await this.settle(child.id, 'failed', {
          error: { kind: 'unknown_agent', message: describeMissingAgent(subtask) },
        });
      }

      const workerId = workerAgentId(template.id, child.id);
      const running = await this.settle(child.id, 'running', { agentId: workerId });
      if (running.status !== 'running') {
        return running;
      }

      log.debug({ taskId: child.id, workerId }, 'Subtask started');
      const onAbort = () => {
        this.queue.cancel(workerId);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      try {
        await this.store.appendMessage(workerId, child.objective);

        // Cancelled while the objective was being delivered: never start the run
        if (signal.aborted) {
          return await this.settle(child.id, 'cancelled');
        }
        const current = await this.store.getTask(child.id);
        if (!current || current.status !== 'running') {
          return current ?? (await this.settle(child.id, 'cancelled'));
        }

        const result = await this.queue.enqueue(workerId);
        return await this.settleFromRun(child.id, result, log);
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
    } finally {
      release();
    }
  }

  private resolveTemplate(subtask: PlannedSubtask): AgentDefinition | undefined {
    if (subtask.agent) {
      return this.catalog.get(subtask.agent);
    }
    if (subtask.role) {
      return this.catalog.findByRole(subtask.role);
    }
    return undefined;
  }

  private async settleFromRun(taskId: string, result: AgentRunResult, log: Logger): Promise<TaskRecord> {
    switch (result.status) {
      case 'completed':
        return this.settle(taskId, 'succeeded', { result: result.response });
      case 'failed':
        log.warn({ taskId, kind: result.error.kind }, 'Subtask failed');
        return this.settle(taskId, 'failed', { error: { kind: result.error.kind, message: result.error.message } });
      case 'cancelled':
        return this.settle(taskId, 'cancelled');
      case 'idle':
        return this.settle(taskId, 'failed', {
          error: { kind: 'empty_run', message: 'Worker agent found no message to process' },
        });
    }
  }

  /**
   * Move a task to `status`, unless it already reached a terminal status
   * (e.g. through cancel), in which case the current record is returned.
   */
  private async settle(taskId: string, status: TaskStatus, update?: TaskUpdate): Promise<TaskRecord> {
    try {
      return await this.store.updateTaskStatus(taskId, status, update);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        const current = await this.store.getTask(taskId);
        if (current && isTerminal(current.status)) {
          return current;
        }
      }
      throw error;
    }
  }

  private async cancelActiveChildren(rootId: string): Promise<void> {
    const tree = await this.store.getTaskTree(rootId);
    if (!tree) return;
    for (const node of flatten(tree).slice(1).reverse()) {
      if (isTerminal(node.status)) continue;
      const settled = await this.settle(node.id, 'cancelled');
      const workerId = settled.agentId ?? node.agentId;
      if (workerId) this.queue.cancel(workerId);
    }
  }

  private async toResult(rootId: string): Promise<OrchestrationResult> {
    const tree = await this.store.getTaskTree(rootId);
    if (!tree) {
      throw new TaskNotFoundError(rootId);
    }
    const { children, ...root } = tree;
    return {
      rootTaskId: root.id,
      status: root.status,
      result: root.result,
      caveats: root.caveats,
      error: root.error,
      subtasks: children.map(({ children: _nested, ...task }) => task),
    };
  }
}

function flatten(node: TaskNode): TaskNode[] {
  return [node, ...node.children.flatMap(flatten)];
}

function describeCaveat(task: TaskRecord): string {
  if (task.status === 'cancelled') {
    return `Subtask "${task.objective}" was cancelled`;
  }
  const error = task.error;
  return error
    ? `Subtask "${task.objective}" failed (${error.kind}): ${error.message}`
    : `Subtask "${task.objective}" failed`;
}

function describeMissingAgent(subtask: PlannedSubtask): string {
  if (subtask.agent) return `No agent named "${subtask.agent}"`;
  if (subtask.role) return `No agent with role "${subtask.role}"`;
  return 'Subtask names neither an agent nor a role';
}
