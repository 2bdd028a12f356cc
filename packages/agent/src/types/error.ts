import { ConfigurationError } from '@toolloop/llm';

export class AgentError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class ToolNotFoundError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool '${toolName}' not found`);
    this.toolName = toolName;
  }
}

export class ToolDeniedError extends AgentError {
  readonly toolName: string;

  constructor(toolName: string, reason: string) {
    super(reason);
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends AgentError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, cause?: Error) {
    super(message, cause);
    this.exitCode = exitCode;
  }
}

export class DuplicateToolError extends AgentError {
  constructor(toolName: string) {
    super(`Tool '${toolName}' is already registered`);
  }
}

export class InvalidToolDefinitionError extends AgentError {}

export class CompletionTimeoutError extends AgentError {
  constructor(iteration: number, timeoutMs: number, cause?: Error) {
    super(`Iteration ${iteration} timed out after ${timeoutMs}ms`, cause);
  }
}

export class IterationLimitError extends AgentError {
  constructor(maxIterations: number) {
    super(`Maximum iterations (${maxIterations}) reached`);
  }
}

export class InvalidConfigError extends ConfigurationError {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid run config: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
