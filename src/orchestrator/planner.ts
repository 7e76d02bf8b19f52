import type { Logger } from 'pino';
import { z } from 'zod';
import type { AgentQueue } from '../agent/agent-queue.js';
import { workerAgentId, type AgentCatalog } from '../agent/catalog.js';
import type { AgentStore } from '../store/types.js';
import type { Plan, PlanContext, Planner } from './types.js';
import { PlanningError } from './errors.js';
import { askAgent } from './ask-agent.js';
import { AbortError } from '../utils/abort.js';
import { errorMessage } from '../utils/logger.js';

export const planSchema = z.object({
  subtasks: z
    .array(
      z.object({
        agent: z.string().min(1).optional(),
        role: z.string().min(1).optional(),
        objective: z.string().min(1),
      })
    )
    .default([]),
  answer: z.string().optional(),
});

/**
 * Always returns the same plan.
 */
export class StaticPlanner implements Planner {
  constructor(private readonly fixed: Plan) {}

  async plan(): Promise<Plan> {
    return this.fixed;
  }
}

export interface AgentPlannerOptions {
  store: AgentStore;
  queue: AgentQueue;
  catalog: AgentCatalog;
  /** Template id of the coordinating agent */
  coordinatorId: string;
  logger: Logger;
}

/**
 * Asks a coordinator worker (one per root task) to break the objective into
 * subtasks, and validates its JSON reply.
 */
export class AgentPlanner implements Planner {
  private store: AgentStore;
  private queue: AgentQueue;
  private catalog: AgentCatalog;
  private coordinatorId: string;
  private logger: Logger;

  constructor(options: AgentPlannerOptions) {
    this.store = options.store;
    this.queue = options.queue;
    this.catalog = options.catalog;
    this.coordinatorId = options.coordinatorId;
    this.logger = options.logger.child({ module: 'planner' });
  }

  async plan(objective: string, context: PlanContext): Promise<Plan> {
    const workerId = workerAgentId(this.coordinatorId, context.rootTaskId);
    const result = await askAgent(this.store, this.queue, workerId, this.buildPrompt(objective), context.signal);

    if (result.status === 'cancelled') {
      throw new AbortError();
    }
    if (result.status === 'failed') {
      throw new PlanningError(result.error.kind, `Planning failed: ${result.error.message}`);
    }
    if (result.status === 'idle') {
      throw new PlanningError('planning_failed', 'Planner produced no reply');
    }

    const plan = parsePlan(result.response);
    this.logger.info({ rootTaskId: context.rootTaskId, subtasks: plan.subtasks.length }, 'Plan ready');
    return plan;
  }

  private buildPrompt(objective: string): string {
    const agents = this.catalog
      .list()
      .filter((agent) => agent.id !== this.coordinatorId)
      .map((agent) => {
        const role = agent.role ? ` (role: ${agent.role})` : '';
        const description = agent.description ? `: ${agent.description}` : '';
        return `- ${agent.id}${role}${description}`;
      });

    return [
      'Break the objective below into independent subtasks for the available agents.',
      '',
      `Objective: ${objective}`,
      '',
      'Available agents:',
      ...agents,
      '',
      'Reply with only a JSON object of the form',
      '{"subtasks": [{"agent": "<agent id>", "objective": "<what that agent should do>"}], "answer": "<direct answer when no subtasks are needed>"}',
    ].join('\n');
  }
}

/**
 * Extract and validate a plan from model text, which may wrap the JSON in
 * prose or a code fence.
 */
export function parsePlan(text: string): Plan {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new PlanningError('invalid_plan', 'Planner reply contains no JSON object');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new PlanningError('invalid_plan', `Planner reply is not valid JSON: ${errorMessage(error)}`);
  }

  const result = planSchema.safeParse(raw);
  if (!result.success) {
    const errorMessages = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new PlanningError('invalid_plan', `Planner reply does not match the plan format: ${errorMessages}`);
  }
  return result.data;
}
