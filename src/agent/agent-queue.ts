/**
 * Agent Scheduler
 *
 * One lane per agent id. A lane runs at most one execution at a time;
 * lanes for different agents run independently.
 *
 * Debounced re-run: enqueueing a running agent only marks pending work.
 * When the current run finishes, a single follow-up run starts and every
 * caller that asked during the previous run shares its result.
 *
 * All lane transitions happen synchronously between awaits.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { AgentRunResult } from './types.js';
import { classifyError } from '../providers/errors.js';
import { createDeferred, type Deferred } from '../utils/deferred.js';
import { errorMessage } from '../utils/logger.js';

export type RunExecutor = (agentId: string, signal: AbortSignal) => Promise<AgentRunResult>;

export type AgentLaneStatus = 'idle' | 'running';

export type RunCompleteListener = (result: AgentRunResult) => void;

export interface AgentQueueOptions {
  execute: RunExecutor;
  logger: Logger;
}

interface Lane {
  status: AgentLaneStatus;
  pendingWork: boolean;
  controller: AbortController | null;
  /** Shared by every caller that enqueued while the lane was running */
  followUp: Deferred<AgentRunResult> | null;
  idleWaiters: Array<() => void>;
}

export class AgentQueue {
  private lanes: Map<string, Lane> = new Map();
  private listeners: Set<RunCompleteListener> = new Set();
  private execute: RunExecutor;
  private logger: Logger;
  private closed = false;

  constructor(options: AgentQueueOptions) {
    this.execute = options.execute;
    this.logger = options.logger.child({ module: 'agent-queue' });
  }

  /**
   * Request a run for `agentId`. Resolves with the result of the run that
   * covers work present at the time of the call. Never rejects.
   */
  enqueue(agentId: string): Promise<AgentRunResult> {
    if (this.closed) {
      return Promise.resolve(cancelledResult(agentId));
    }

    const lane = this.getLane(agentId);
    if (lane.status === 'idle') {
      return this.start(agentId, lane);
    }

    lane.pendingWork = true;
    if (!lane.followUp) {
      lane.followUp = createDeferred<AgentRunResult>();
    }
    this.logger.debug({ agentId }, 'Agent busy, follow-up run scheduled');
    return lane.followUp.promise;
  }

  /**
   * Abort the active run and drop pending work. Returns true if anything
   * was cancelled.
   */
  cancel(agentId: string): boolean {
    const lane = this.lanes.get(agentId);
    if (!lane) return false;

    lane.pendingWork = false;
    const followUp = lane.followUp;
    lane.followUp = null;
    followUp?.resolve(cancelledResult(agentId));

    if (lane.controller) {
      lane.controller.abort();
      this.logger.info({ agentId }, 'Agent run cancelled');
      return true;
    }
    return followUp !== null;
  }

  getState(agentId: string): AgentLaneStatus {
    return this.lanes.get(agentId)?.status ?? 'idle';
  }

  hasPendingWork(agentId: string): boolean {
    return this.lanes.get(agentId)?.pendingWork ?? false;
  }

  /**
   * Agents with a run in progress.
   */
  activeAgents(): string[] {
    return Array.from(this.lanes.entries())
      .filter(([, lane]) => lane.status === 'running')
      .map(([agentId]) => agentId);
  }

  /**
   * Number of agents holding a lane: running, or with work pending.
   */
  get laneCount(): number {
    return this.lanes.size;
  }

  whenIdle(agentId: string): Promise<void> {
    const lane = this.lanes.get(agentId);
    if (!lane || lane.status === 'idle') {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => lane.idleWaiters.push(resolve));
  }

  onRunComplete(listener: RunCompleteListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancel every lane and wait until all are idle. Later enqueues resolve
   * as cancelled.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    const agentIds = Array.from(this.lanes.keys());
    for (const agentId of agentIds) {
      this.cancel(agentId);
    }
    await Promise.all(agentIds.map((agentId) => this.whenIdle(agentId)));
  }

  private getLane(agentId: string): Lane {
    let lane = this.lanes.get(agentId);
    if (!lane) {
      lane = { status: 'idle', pendingWork: false, controller: null, followUp: null, idleWaiters: [] };
      this.lanes.set(agentId, lane);
    }
    return lane;
  }

  private start(agentId: string, lane: Lane): Promise<AgentRunResult> {
    lane.status = 'running';
    lane.pendingWork = false;
    const controller = new AbortController();
    lane.controller = controller;

    return this.executeSafely(agentId, controller.signal).then((result) => {
      this.finish(agentId, lane, result);
      return result;
    });
  }

  private async executeSafely(agentId: string, signal: AbortSignal): Promise<AgentRunResult> {
    try {
      return await this.execute(agentId, signal);
    } catch (error) {
      this.logger.error({ agentId, error: errorMessage(error) }, 'Run executor threw');
      return {
        status: 'failed',
        agentId,
        runId: nanoid(),
        error: { kind: classifyError(error), message: errorMessage(error), retryable: false },
        toolInvocations: [],
        attempts: 0,
      };
    }
  }

  private finish(agentId: string, lane: Lane, result: AgentRunResult): void {
    lane.controller = null;

    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (error) {
        this.logger.warn({ agentId, error: errorMessage(error) }, 'Run listener threw');
      }
    }

    if (lane.pendingWork && !this.closed) {
      const followUp = lane.followUp;
      lane.followUp = null;
      const next = this.start(agentId, lane);
      followUp?.resolve(next);
      return;
    }

    lane.status = 'idle';
    const waiters = lane.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
    // Worker ids are single-use, so idle lanes are dropped
    if (!lane.pendingWork && !lane.followUp && this.lanes.get(agentId) === lane) {
      this.lanes.delete(agentId);
    }
  }
}

function cancelledResult(agentId: string): AgentRunResult {
  return { status: 'cancelled', agentId, runId: nanoid(), attempts: 0 };
}
