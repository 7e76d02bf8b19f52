export type {
  OrchestrateOptions,
  OrchestrationResult,
  Plan,
  PlanContext,
  PlannedSubtask,
  Planner,
  SynthesisInput,
  Synthesizer,
} from './types.js';
export { PlanningError } from './errors.js';
export { ConcurrencyGate, type Release } from './concurrency-gate.js';
export { AgentPlanner, StaticPlanner, parsePlan, planSchema, type AgentPlannerOptions } from './planner.js';
export { AgentSynthesizer, ComposeSynthesizer, type AgentSynthesizerOptions } from './synthesizer.js';
export { Orchestrator, DEFAULT_MAX_CONCURRENT, type OrchestratorOptions } from './orchestrator.js';
