import type { Logger } from 'pino';
import type { ToolDefinition } from '../providers/types.js';
import type { Tool, ToolContext, ToolExecutionResult } from './types.js';
import { DuplicateToolError, ToolError } from './errors.js';
import { AbortError, isAbortError, raceAbort, withDeadline } from '../utils/abort.js';
import { errorMessage } from '../utils/logger.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface ToolRegistryOptions {
  logger: Logger;
  defaultTimeoutMs?: number;
}

/**
 * Name-to-handler table. Populated at startup; lookups are plain map reads.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private logger: Logger;
  private defaultTimeoutMs: number;

  constructor(options: ToolRegistryOptions) {
    this.logger = options.logger.child({ module: 'tool-registry' });
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    this.logger.debug({ tool: tool.name }, 'Tool registered');
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Declarations for the enabled names that are actually registered.
   */
  getToolDefinitions(names: readonly string[]): ToolDefinition[] {
    const definitions: ToolDefinition[] = [];
    for (const name of names) {
      const tool = this.tools.get(name);
      if (!tool) continue;
      definitions.push({ name: tool.name, description: tool.description, input_schema: tool.inputSchema });
    }
    return definitions;
  }

  /**
   * Run a tool under its deadline. Failures come back as values; only
   * cancellation of `context.signal` rejects (with AbortError).
   */
  async execute(name: string, input: Record<string, unknown>, context: ToolContext): Promise<ToolExecutionResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: ToolError.notFound(name) };
    }

    if (context.signal.aborted) {
      throw new AbortError();
    }

    const timeoutMs = tool.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    context.signal.addEventListener('abort', forwardAbort, { once: true });

    const startTime = Date.now();
    try {
      const pending = tool.handler(input, { ...context, signal: controller.signal });
      const output = await raceAbort(
        withDeadline(pending, timeoutMs, () => ToolError.timeout(name, timeoutMs)),
        context.signal
      );
      this.logger.debug({ tool: name, agentId: context.agentId, durationMs: Date.now() - startTime }, 'Tool completed');
      return { success: true, output };
    } catch (error) {
      if (context.signal.aborted) {
        throw isAbortError(error) ? error : new AbortError();
      }
      if (error instanceof ToolError && error.kind === 'timeout') {
        controller.abort();
        this.logger.warn({ tool: name, agentId: context.agentId, timeoutMs }, 'Tool timed out');
        return { success: false, error };
      }
      this.logger.warn({ tool: name, agentId: context.agentId, error: errorMessage(error) }, 'Tool failed');
      return { success: false, error: ToolError.executionFailed(name, errorMessage(error)) };
    } finally {
      context.signal.removeEventListener('abort', forwardAbort);
    }
  }
}
