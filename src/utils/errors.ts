/**
 * Error types raised across the model, resolver, runner and debug layers.
 */

export class WorkflowValidationError extends Error {
  constructor(
    public readonly issues: string[],
    public readonly source?: string
  ) {
    const header = source ? `Invalid workflow ${source}` : 'Invalid workflow';
    super(`${header}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'WorkflowValidationError';
  }
}

export class InputValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid inputs:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'InputValidationError';
  }
}

export class MissingVariableError extends Error {
  constructor(
    public readonly token: string,
    public readonly variable: string
  ) {
    super(`Missing variable "${variable}" for placeholder ${token}`);
    this.name = 'MissingVariableError';
  }
}

export class UnsupportedValueError extends Error {
  constructor(
    public readonly token: string,
    public readonly variable: string,
    public readonly kind: string
  ) {
    super(`Variable "${variable}" holds ${kind} and cannot be substituted into ${token}`);
    this.name = 'UnsupportedValueError';
  }
}

export class ToolNotFoundError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`);
    this.name = 'ToolNotFoundError';
  }
}

export class PluginNotFoundError extends Error {
  constructor(public readonly pluginName: string) {
    super(`Plugin not found: ${pluginName}`);
    this.name = 'PluginNotFoundError';
  }
}

export class PluginActionNotFoundError extends Error {
  constructor(
    public readonly pluginName: string,
    public readonly actionName: string
  ) {
    super(`Plugin "${pluginName}" has no action "${actionName}"`);
    this.name = 'PluginActionNotFoundError';
  }
}

export class WorkflowNotFoundError extends Error {
  constructor(public readonly workflowName: string) {
    super(`Workflow not found: ${workflowName}`);
    this.name = 'WorkflowNotFoundError';
  }
}

export class ProcessExitError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly output: string
  ) {
    const detail = output.trim();
    super(detail ? `Command exited with code ${exitCode}: ${detail}` : `Command exited with code ${exitCode}`);
    this.name = 'ProcessExitError';
  }
}

export class OutputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutputFormatError';
  }
}

export class PromptTimeoutError extends Error {
  constructor(
    public readonly promptId: string,
    public readonly timeoutMs: number
  ) {
    super(`No response to prompt ${promptId} within ${timeoutMs}ms`);
    this.name = 'PromptTimeoutError';
  }
}

export class PromptCanceledError extends Error {
  constructor(public readonly promptId: string) {
    super(`Prompt ${promptId} was canceled`);
    this.name = 'PromptCanceledError';
  }
}

export class PromptNotPendingError extends Error {
  constructor(public readonly promptId: string) {
    super(`No pending prompt with id ${promptId}`);
    this.name = 'PromptNotPendingError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Debug session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

export class ToolCallAssemblyError extends Error {
  constructor(
    public readonly callKey: string,
    message: string
  ) {
    super(`Tool call ${callKey}: ${message}`);
    this.name = 'ToolCallAssemblyError';
  }
}
