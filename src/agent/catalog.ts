import type { AgentDefinition } from './types.js';

const WORKER_SEPARATOR = '#';

/**
 * Id of a worker agent derived from a template, e.g. `researcher#k3J9`.
 * Each worker has its own history and cursor.
 */
export function workerAgentId(templateId: string, key: string): string {
  return `${templateId}${WORKER_SEPARATOR}${key}`;
}

export function templateIdOf(agentId: string): string {
  const index = agentId.indexOf(WORKER_SEPARATOR);
  return index === -1 ? agentId : agentId.slice(0, index);
}

/**
 * Registry of configured agents.
 */
export class AgentCatalog {
  private agents: Map<string, AgentDefinition> = new Map();

  constructor(definitions: AgentDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: AgentDefinition): void {
    if (this.agents.has(definition.id)) {
      throw new Error(`Agent "${definition.id}" is already defined`);
    }
    this.agents.set(definition.id, definition);
  }

  /**
   * Resolve an agent id, including worker ids, to its definition.
   */
  get(agentId: string): AgentDefinition | undefined {
    const exact = this.agents.get(agentId);
    if (exact) return exact;

    const template = this.agents.get(templateIdOf(agentId));
    return template ? { ...template, id: agentId } : undefined;
  }

  has(agentId: string): boolean {
    return this.get(agentId) !== undefined;
  }

  findByRole(role: string): AgentDefinition | undefined {
    for (const definition of this.agents.values()) {
      if (definition.role === role) return definition;
    }
    return undefined;
  }

  list(): AgentDefinition[] {
    return Array.from(this.agents.values());
  }
}
