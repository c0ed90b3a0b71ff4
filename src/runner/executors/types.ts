import type { Config } from '../../parser/config-schema.ts';
import type { ContextValue, ExecutionContext, Step, Workflow } from '../../parser/schema.ts';
import type { Logger } from '../../utils/logger.ts';
import type { WorkflowEvent } from '../events.ts';
import type { RunOutcome } from '../workflow-state.ts';

// ===== Collaborator contracts =====

export interface ProcessRequest {
  executable: string;
  /** Spawned directly when non-empty, otherwise executable runs through the shell */
  args: string[];
  shell: string;
  cwd?: string;
  env: Record<string, string>;
  signal?: AbortSignal;
  onOutput?: (chunk: string) => void;
}

export interface ProcessResult {
  /** Merged stdout and stderr */
  output: string;
  exitCode: number;
  truncated: boolean;
}

export interface ProcessRunner {
  run(request: ProcessRequest): Promise<ProcessResult>;
}

export interface ToolInvoker {
  invoke(name: string, args: Record<string, ContextValue>, signal?: AbortSignal): Promise<string>;
}

export interface PluginHost {
  invoke(plugin: string, action: string, args: Record<string, ContextValue>, signal?: AbortSignal): Promise<string>;
}

export interface PromptRequest {
  promptId: string;
  runId: string;
  stepId: string;
  message: string;
}

export interface PromptOptions {
  /** null waits without bound */
  timeoutMs: number | null;
  signal?: AbortSignal;
}

export interface HumanInputBridge {
  request(prompt: PromptRequest, options: PromptOptions): Promise<string>;
}

export interface WorkflowSource {
  get(name: string): Workflow | undefined;
}

export interface ExecutorServices {
  processRunner: ProcessRunner;
  tools: ToolInvoker;
  plugins: PluginHost;
  humanInput: HumanInputBridge;
  workflows: WorkflowSource;
}

// ===== Step execution =====

/**
 * What a step kind produced. assignments are written to the context on success.
 */
export interface StepOutput {
  output: string;
  assignments?: ExecutionContext;
}

export type SubWorkflowRunner = (
  workflow: Workflow,
  inputs: ExecutionContext,
  signal: AbortSignal
) => Promise<RunOutcome>;

export interface StepRunContext<S extends Step = Step> {
  runId: string;
  workflow: Workflow;
  step: S;
  context: ExecutionContext;
  config: Config;
  services: ExecutorServices;
  logger: Logger;
  signal: AbortSignal;
  emit: (event: WorkflowEvent) => void;
  runSubWorkflow: SubWorkflowRunner;
}
