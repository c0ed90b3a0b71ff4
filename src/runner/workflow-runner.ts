import { randomUUID } from 'node:crypto';
import { evaluateCondition, hasCondition } from '../expression/condition.ts';
import { type Config, defaultConfig } from '../parser/config-schema.ts';
import { buildInitialContext } from '../parser/arguments.ts';
import type { ExecutionContext, Workflow } from '../parser/schema.ts';
import { validateWorkflow } from '../parser/workflow-validator.ts';
import { WorkflowStatus, type WorkflowOutcomeStatus, type WorkflowStatusType } from '../types/status.ts';
import { LIMITS } from '../utils/constants.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { WorkflowRegistry } from '../utils/workflow-registry.ts';
import { EventBus, type EventHandler, timestamp, type WorkflowEvent } from './events.ts';
import type { ExecutorServices, SubWorkflowRunner } from './executors/types.ts';
import { PromptBroker } from './human-input.ts';
import { PluginRegistry } from './plugin-registry.ts';
import { NodeProcessRunner } from './process-runner.ts';
import { executeStep, type StepResult } from './step-executor.ts';
import { TimeoutError } from './timeout.ts';
import { ToolRegistry } from './tool-registry.ts';
import { cloneContext, ExecutionHistory, type RunOutcome, type StepExecutionRecord } from './workflow-state.ts';

export interface RunOptions {
  config?: Config;
  logger?: Logger;
  /** Collaborators; missing ones get in-process defaults */
  services?: Partial<ExecutorServices>;
  /** Shared bus, used to forward sub-workflow events to the parent's subscribers */
  events?: EventBus<WorkflowEvent>;
  onEvent?: EventHandler<WorkflowEvent>;
  runId?: string;
  /** Sub-workflow nesting level, 0 for a top-level run */
  depth?: number;
  /** Aborting this signal aborts the run and its in-flight step */
  signal?: AbortSignal;
}

export function createDefaultServices(config: Config, overrides: Partial<ExecutorServices> = {}): ExecutorServices {
  const processRunner = overrides.processRunner ?? new NodeProcessRunner({ maxOutputBytes: config.max_output_bytes });
  return {
    processRunner,
    tools: overrides.tools ?? new ToolRegistry({ shell: config.shell, processRunner }),
    plugins: overrides.plugins ?? new PluginRegistry(),
    humanInput: overrides.humanInput ?? new PromptBroker(),
    workflows: overrides.workflows ?? new WorkflowRegistry({ directories: config.workflow_dirs }),
  };
}

/**
 * Runs one workflow instance to completion or first failure.
 */
export class WorkflowRunner {
  readonly runId: string;
  readonly workflow: Workflow;
  readonly config: Config;
  readonly services: ExecutorServices;
  readonly events: EventBus<WorkflowEvent>;
  private readonly logger: Logger;
  private readonly depth: number;
  private readonly controller = new AbortController();
  private stopRequested = false;
  private currentStatus: WorkflowStatusType = WorkflowStatus.RUNNING;

  constructor(workflow: Workflow, options: RunOptions = {}) {
    this.workflow = workflow;
    this.config = options.config ?? defaultConfig();
    this.logger = options.logger ?? new ConsoleLogger();
    this.runId = options.runId ?? randomUUID();
    this.depth = options.depth ?? 0;
    this.services = createDefaultServices(this.config, options.services);
    this.events = options.events ?? new EventBus<WorkflowEvent>(this.logger);
    if (options.onEvent) {
      this.events.subscribe(options.onEvent);
    }
    if (options.signal) {
      const parent = options.signal;
      if (parent.aborted) {
        this.controller.abort(parent.reason);
      } else {
        parent.addEventListener('abort', () => this.controller.abort(parent.reason), { once: true });
      }
    }
  }

  get status(): WorkflowStatusType {
    return this.currentStatus;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  subscribe(handler: EventHandler<WorkflowEvent>): () => void {
    return this.events.subscribe(handler);
  }

  /**
   * Cooperative cancellation: the in-flight step finishes, no further step starts
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.logger.log(`\n🛑 Stop requested for ${this.workflow.name}. Canceling after the current step...`);
  }

  /**
   * Validate the workflow and build the initial context from defaults and inputs
   *
   * @throws WorkflowValidationError | InputValidationError
   */
  prepareContext(inputs: ExecutionContext = {}): ExecutionContext {
    validateWorkflow(this.workflow);
    return buildInitialContext(this.workflow, inputs);
  }

  async run(inputs: ExecutionContext = {}): Promise<RunOutcome> {
    try {
      return await this.runSteps(this.prepareContext(inputs));
    } catch (error) {
      this.emit({
        type: 'workflow.error',
        timestamp: timestamp(),
        runId: this.runId,
        workflow: this.workflow.name,
        error: errorMessage(error),
      });
      this.logger.error(`✗ Workflow ${this.workflow.name} could not run: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async runSteps(context: ExecutionContext): Promise<RunOutcome> {
    const history = new ExecutionHistory();
    const startedAt = Date.now();
    const total = this.workflow.steps.length;

    this.emit({
      type: 'workflow.start',
      timestamp: timestamp(),
      runId: this.runId,
      workflow: this.workflow.name,
      inputs: cloneContext(context),
      totalSteps: total,
      depth: this.depth,
    });
    this.logger.log(`🚀 Running workflow: ${this.workflow.name} (${total} step${total === 1 ? '' : 's'})\n`);

    const timer = this.startWorkflowTimer();
    try {
      for (let index = 0; index < total; index++) {
        if (this.stopRequested) {
          return this.finish(WorkflowStatus.CANCELED, context, history, startedAt, 'Workflow stopped');
        }
        if (this.controller.signal.aborted) {
          return this.finish(WorkflowStatus.FAILED, context, history, startedAt, errorMessage(this.controller.signal.reason));
        }

        const record = await this.executeStep(index, context);
        history.push(record);
        if (record.status === 'failed') {
          return this.finish(WorkflowStatus.FAILED, context, history, startedAt, record.error, record.stepId);
        }
      }
      return this.finish(WorkflowStatus.SUCCESS, context, history, startedAt);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute the step at index against context, mutating context with its
   * results. Shared by run() and the debug session.
   */
  async executeStep(
    index: number,
    context: ExecutionContext,
    signal: AbortSignal = this.controller.signal
  ): Promise<StepExecutionRecord> {
    const step = this.workflow.steps[index];
    if (!step) {
      throw new RangeError(`Workflow ${this.workflow.name} has no step at index ${index}`);
    }
    const total = this.workflow.steps.length;
    const startedMs = Date.now();
    const record: StepExecutionRecord = {
      index,
      stepId: step.id,
      stepName: step.name,
      stepType: step.type,
      startedAt: new Date(startedMs).toISOString(),
      status: 'running',
      attempts: 0,
      variablesBefore: cloneContext(context),
    };

    this.emit({
      type: 'step.start',
      timestamp: record.startedAt,
      runId: this.runId,
      workflow: this.workflow.name,
      stepId: step.id,
      stepName: step.name,
      stepType: step.type,
      stepIndex: index,
      totalSteps: total,
    });
    this.logger.log(`[${index + 1}/${total}] ▶ Executing step: ${step.id} (${step.type})`);

    if (hasCondition(step.condition)) {
      let proceed: boolean;
      try {
        proceed = evaluateCondition(step.condition, context);
      } catch (error) {
        return this.finishStep(record, startedMs, { status: 'failed', error: errorMessage(error) });
      }
      if (!proceed) {
        this.logger.log(`  ⊘ Skipping step ${step.id} (condition not met)`);
        return this.finishStep(record, startedMs, { status: 'skipped' });
      }
    }

    const result: StepResult = await executeStep(
      {
        runId: this.runId,
        workflow: this.workflow,
        step,
        context,
        config: this.config,
        services: this.services,
        logger: this.logger,
        signal,
        emit: (event) => this.emit(event),
        runSubWorkflow: this.runSubWorkflow,
      },
      {
        retryBaseDelayMs: this.config.retry.base_delay_ms,
        onRetry: (attempt, error) => {
          this.logger.log(`  ↻ Retry ${attempt}/${step.retry_count} for step ${step.id}`);
          this.emit({
            type: 'step.retry',
            timestamp: timestamp(),
            runId: this.runId,
            workflow: this.workflow.name,
            stepId: step.id,
            attempt,
            error: error.message,
          });
        },
      }
    );

    record.attempts = result.attempts;
    if (result.status === 'failed') {
      return this.finishStep(record, startedMs, { status: 'failed', error: result.error });
    }

    Object.assign(context, result.assignments);
    if (step.output_variable) {
      context[step.output_variable] = result.value;
    }
    return this.finishStep(record, startedMs, { status: 'completed', output: result.output });
  }

  private finishStep(
    record: StepExecutionRecord,
    startedMs: number,
    result: { status: 'completed'; output: string } | { status: 'failed'; error: string } | { status: 'skipped' }
  ): StepExecutionRecord {
    const endedMs = Date.now();
    record.endedAt = new Date(endedMs).toISOString();
    record.status = result.status;
    if (result.status === 'completed') {
      record.output = result.output;
      this.logger.log(`  ✓ Step ${record.stepId} completed`);
    } else if (result.status === 'failed') {
      record.error = result.error;
      this.logger.error(`  ✗ Step ${record.stepId} failed: ${result.error}`);
    }

    this.emit({
      type: 'step.end',
      timestamp: record.endedAt,
      runId: this.runId,
      workflow: this.workflow.name,
      stepId: record.stepId,
      stepType: record.stepType,
      stepIndex: record.index,
      totalSteps: this.workflow.steps.length,
      status: result.status,
      output: record.output,
      error: record.error,
      durationMs: endedMs - startedMs,
    });
    return record;
  }

  private finish(
    status: WorkflowOutcomeStatus,
    context: ExecutionContext,
    history: ExecutionHistory,
    startedAt: number,
    error?: string,
    failedStep?: string
  ): RunOutcome {
    this.currentStatus = status;
    const variables = cloneContext(context);
    this.emit({
      type: 'workflow.complete',
      timestamp: timestamp(),
      runId: this.runId,
      workflow: this.workflow.name,
      status,
      variables,
      error,
      failedStep,
    });

    if (status === WorkflowStatus.SUCCESS) {
      this.logger.log('\n✨ Workflow completed successfully!\n');
    } else if (status === WorkflowStatus.CANCELED) {
      this.logger.log('\n🛑 Workflow canceled\n');
    } else {
      this.logger.error(`\n✗ Workflow failed: ${error ?? 'unknown error'}\n`);
    }

    return {
      runId: this.runId,
      workflow: this.workflow.name,
      status,
      variables,
      history: history.list(),
      error,
      failedStep,
      durationMs: Date.now() - startedAt,
    };
  }

  private startWorkflowTimer(): NodeJS.Timeout | undefined {
    if (this.workflow.timeout === undefined) return undefined;
    const timeoutMs = this.workflow.timeout * 1000;
    return setTimeout(() => {
      this.controller.abort(new TimeoutError(`Workflow ${this.workflow.name} timed out after ${timeoutMs}ms`, timeoutMs));
    }, Math.min(timeoutMs, LIMITS.MAX_TIMER_MS));
  }

  private readonly runSubWorkflow: SubWorkflowRunner = async (workflow, inputs, signal) => {
    const depth = this.depth + 1;
    if (depth > this.config.max_depth) {
      throw new Error(`Maximum sub-workflow depth of ${this.config.max_depth} exceeded`);
    }
    const child = new WorkflowRunner(workflow, {
      config: this.config,
      logger: this.logger,
      services: this.services,
      events: this.events,
      depth,
      signal,
    });
    return child.run(inputs);
  };

  private emit(event: WorkflowEvent): void {
    this.events.emit(event);
  }
}
