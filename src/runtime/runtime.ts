import type { Logger } from 'pino';
import type { Config } from '../config/config.js';
import { loadAgentDefinitions } from '../config/agents.js';
import { AnthropicStreamClient } from '../providers/anthropic.js';
import type { ModelStreamClient } from '../providers/types.js';
import { SqliteAgentStore } from '../store/sqlite-store.js';
import type { AgentStore } from '../store/types.js';
import { ToolRegistry } from '../tools/registry.js';
import { BUILTIN_TOOLS } from '../tools/builtin.js';
import type { Tool } from '../tools/types.js';
import { AgentCatalog } from '../agent/catalog.js';
import { AgentRunner } from '../agent/runner.js';
import { AgentQueue } from '../agent/agent-queue.js';
import { NullOutputChannel, type OutputChannel } from '../agent/output.js';
import type { AgentDefinition, AgentRunResult } from '../agent/types.js';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { AgentPlanner } from '../orchestrator/planner.js';
import { AgentSynthesizer } from '../orchestrator/synthesizer.js';
import type { OrchestrateOptions, OrchestrationResult } from '../orchestrator/types.js';
import { errorMessage } from '../utils/logger.js';

export interface RuntimeOptions {
  config: Config;
  logger: Logger;
  /** Overrides the agents file */
  agents?: AgentDefinition[];
  /** Overrides the Anthropic client */
  client?: ModelStreamClient;
  /** Overrides the SQLite store at `config.store.dbPath` */
  store?: AgentStore;
  output?: OutputChannel;
  /** Registered in addition to the built-in tools */
  tools?: Tool[];
}

interface RuntimeComponents {
  store: AgentStore;
  catalog: AgentCatalog;
  tools: ToolRegistry;
  queue: AgentQueue;
  orchestrator: Orchestrator;
}

/**
 * Composition root: builds the store, tool registry, agent catalog, model
 * client, run loop, scheduler and orchestrator from configuration.
 */
export class Runtime {
  private config: Config;
  private logger: Logger;
  private options: RuntimeOptions;
  private components: RuntimeComponents | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: RuntimeOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.options = options;
  }

  async initialize(): Promise<void> {
    if (this.components) {
      return;
    }
    this.stopping = null;

    this.logger.info('Initializing runtime...');

    const definitions = this.options.agents ?? loadAgentDefinitions(this.config.agents.file);
    const catalog = new AgentCatalog(definitions);
    this.logger.info({ agents: definitions.map((d) => d.id) }, 'Agents loaded');

    const tools = new ToolRegistry({ logger: this.logger, defaultTimeoutMs: this.config.runtime.toolTimeoutMs });
    for (const tool of [...BUILTIN_TOOLS, ...(this.options.tools ?? [])]) {
      tools.register(tool);
    }

    const store = this.options.store ?? new SqliteAgentStore(this.config.store.dbPath);
    const client = this.options.client ?? this.createAnthropicClient();

    const runner = new AgentRunner({
      store,
      catalog,
      tools,
      client,
      logger: this.logger,
      output: this.options.output ?? new NullOutputChannel(),
      retry: {
        maxAttempts: this.config.runtime.maxAttempts,
        baseDelayMs: this.config.runtime.baseDelayMs,
        maxDelayMs: this.config.runtime.maxDelayMs,
        jitterFactor: this.config.runtime.jitterFactor,
      },
      maxToolRoundTrips: this.config.runtime.maxToolRoundTrips,
    });

    const queue = new AgentQueue({
      execute: (agentId, signal) => runner.run(agentId, { signal }),
      logger: this.logger,
    });

    const coordinatorId = this.config.agents.coordinator;
    if (!catalog.has(coordinatorId)) {
      this.logger.warn({ coordinatorId }, 'Coordinator agent is not defined; orchestration planning will fail');
    }

    const orchestrator = new Orchestrator({
      store,
      queue,
      catalog,
      logger: this.logger,
      maxConcurrent: this.config.orchestrator.maxConcurrent,
      planner: new AgentPlanner({ store, queue, catalog, coordinatorId, logger: this.logger }),
      synthesizer: new AgentSynthesizer({ store, queue, coordinatorId, logger: this.logger }),
    });

    this.components = { store, catalog, tools, queue, orchestrator };
    this.logger.info('Runtime initialized');
  }

  /**
   * Append an inbound message and schedule the agent.
   */
  async sendMessage(agentId: string, text: string): Promise<AgentRunResult> {
    const { store, catalog, queue } = this.require();
    if (!catalog.has(agentId)) {
      throw new Error(`Unknown agent: ${agentId}`);
    }
    const message = await store.appendMessage(agentId, text);
    this.logger.debug({ agentId, seq: message.seq }, 'Message appended');
    return queue.enqueue(agentId);
  }

  async orchestrate(objective: string, options?: OrchestrateOptions): Promise<OrchestrationResult> {
    return this.require().orchestrator.run(objective, options);
  }

  getStore(): AgentStore {
    return this.require().store;
  }

  getCatalog(): AgentCatalog {
    return this.require().catalog;
  }

  getQueue(): AgentQueue {
    return this.require().queue;
  }

  getOrchestrator(): Orchestrator {
    return this.require().orchestrator;
  }

  getToolRegistry(): ToolRegistry {
    return this.require().tools;
  }

  /**
   * Cancel live orchestrations and runs, then close the store.
   */
  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const components = this.components;
    if (!components) {
      return;
    }

    this.logger.info('Stopping runtime...');
    await components.orchestrator.shutdown();
    await components.queue.shutdown();
    components.store.close();
    this.components = null;
    this.logger.info('Runtime stopped');
  }

  private require(): RuntimeComponents {
    if (!this.components) {
      throw new Error('Runtime is not initialized');
    }
    return this.components;
  }

  private createAnthropicClient(): ModelStreamClient {
    const anthropic = this.config.providers.anthropic;
    if (!anthropic.apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required');
    }
    return new AnthropicStreamClient({
      apiKey: anthropic.apiKey,
      baseUrl: anthropic.baseUrl,
      timeout: anthropic.timeoutMs,
    });
  }
}

/**
 * Stop the runtime on SIGINT/SIGTERM.
 */
export function setupGracefulShutdown(runtime: Runtime, logger: Logger): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await runtime.stop();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
}
