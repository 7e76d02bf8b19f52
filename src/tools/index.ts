export type { Tool, ToolContext, ToolHandler, ToolInputSchema, ToolExecutionResult } from './types.js';
export { ToolError, DuplicateToolError, type ToolErrorKind } from './errors.js';
export { ToolRegistry, DEFAULT_TOOL_TIMEOUT_MS, type ToolRegistryOptions } from './registry.js';
export { defineTool, type ToolSpec } from './define-tool.js';
export { BUILTIN_TOOLS, currentTimeTool } from './builtin.js';
