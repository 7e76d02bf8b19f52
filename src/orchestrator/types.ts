import type { TaskError, TaskRecord, TaskStatus } from '../store/types.js';

export interface PlannedSubtask {
  /** Agent template id; takes precedence over `role` */
  agent?: string;
  role?: string;
  objective: string;
}

export interface Plan {
  subtasks: PlannedSubtask[];
  /** Final answer when no subtasks are needed */
  answer?: string;
}

export interface PlanContext {
  rootTaskId: string;
  signal: AbortSignal;
}

export interface Planner {
  plan(objective: string, context: PlanContext): Promise<Plan>;
}

export interface SynthesisInput {
  objective: string;
  rootTaskId: string;
  succeeded: TaskRecord[];
  unsuccessful: TaskRecord[];
  signal: AbortSignal;
}

/**
 * Builds the body of the final result from the succeeded subtasks.
 * Caveats for the rest are appended by the orchestrator.
 */
export interface Synthesizer {
  synthesize(input: SynthesisInput): Promise<string>;
}

export interface OrchestrateOptions {
  /** Skip the planner and use this plan */
  plan?: Plan;
  /** Nest the new tree under an existing running task */
  parentId?: string;
}

export interface OrchestrationResult {
  rootTaskId: string;
  status: TaskStatus;
  result: string | null;
  caveats: string[];
  error: TaskError | null;
  subtasks: TaskRecord[];
}
