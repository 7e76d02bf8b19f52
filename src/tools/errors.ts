export type ToolErrorKind = 'not_found' | 'execution_failed' | 'timeout';

export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly toolName: string;

  constructor(kind: ToolErrorKind, toolName: string, message: string) {
    super(message);
    this.name = 'ToolError';
    this.kind = kind;
    this.toolName = toolName;
  }

  static notFound(toolName: string): ToolError {
    return new ToolError('not_found', toolName, `Tool "${toolName}" is not available`);
  }

  static executionFailed(toolName: string, reason: string): ToolError {
    return new ToolError('execution_failed', toolName, `Tool "${toolName}" failed: ${reason}`);
  }

  static timeout(toolName: string, timeoutMs: number): ToolError {
    return new ToolError('timeout', toolName, `Tool "${toolName}" timed out after ${timeoutMs}ms`);
  }
}

export class DuplicateToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`);
    this.name = 'DuplicateToolError';
  }
}
