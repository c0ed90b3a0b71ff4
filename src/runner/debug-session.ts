import { randomUUID } from 'node:crypto';
import { type Config, defaultConfig } from '../parser/config-schema.ts';
import type { ContextValue, ExecutionContext, Workflow } from '../parser/schema.ts';
import { BLOCKED_INPUT_KEYS } from '../utils/constants.ts';
import { Channel } from '../utils/channel.ts';
import { ChannelClosedError } from '../utils/errors.ts';
import { errorMessage } from '../utils/guards.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { EventBus, type EventHandler, timestamp, type WorkflowEvent } from './events.ts';
import type { ExecutorServices } from './executors/types.ts';
import { WorkflowRunner } from './workflow-runner.ts';
import { countByStatus } from './workflow-summary.ts';
import { cloneContext, ExecutionHistory, type StepExecutionRecord } from './workflow-state.ts';

// ===== State, commands and events =====

export type ExecutionState =
  | { kind: 'not_started' | 'running' | 'paused' | 'step_breakpoint' | 'completed' | 'stopped' }
  | { kind: 'failed'; reason: string };

export type ExecutionStateKind = ExecutionState['kind'];

export type DebugCommand =
  | { type: 'start' }
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'step_over' }
  | { type: 'step_into' }
  | { type: 'step_out' }
  | { type: 'stop' }
  | { type: 'set_breakpoint'; index: number }
  | { type: 'remove_breakpoint'; index: number }
  | { type: 'set_variable'; name: string; value: ContextValue }
  | { type: 'restart' };

type EditCommand = Extract<DebugCommand, { type: 'set_breakpoint' | 'remove_breakpoint' | 'set_variable' }>;

interface DebugEventBase {
  timestamp: string;
  /** Session id */
  runId: string;
  workflow: string;
}

export type DebugControlEvent =
  | (DebugEventBase & { type: 'debug.session_started'; totalSteps: number; breakpoints: number[] })
  | (DebugEventBase & {
      type: 'debug.breakpoint_hit';
      stepIndex: number;
      stepId: string;
      /** 'step' when the pause comes from a step command rather than a breakpoint */
      reason: 'breakpoint' | 'step';
      variables: ExecutionContext;
    })
  | (DebugEventBase & { type: 'debug.paused'; stepIndex: number })
  | (DebugEventBase & { type: 'debug.resumed'; stepIndex: number; mode: 'continue' | 'step' })
  | (DebugEventBase & { type: 'debug.breakpoints_changed'; breakpoints: number[] })
  | (DebugEventBase & { type: 'debug.variable_updated'; name: string; value: ContextValue })
  | (DebugEventBase & { type: 'debug.restarted' })
  | (DebugEventBase & { type: 'debug.completed'; variables: ExecutionContext })
  | (DebugEventBase & { type: 'debug.failed'; stepIndex: number; stepId: string; reason: string })
  | (DebugEventBase & { type: 'debug.stopped'; stepIndex: number })
  | (DebugEventBase & { type: 'debug.error'; error: string });

export type DebugEvent = WorkflowEvent | DebugControlEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type ControlEventInit = DistributiveOmit<DebugControlEvent, keyof DebugEventBase>;

export interface DebugSessionSnapshot {
  id: string;
  workflow: string;
  currentStep: number;
  totalSteps: number;
  state: ExecutionState;
  breakpoints: number[];
  variables: ExecutionContext;
  history: StepExecutionRecord[];
  createdAt: string;
  startedAt?: string;
}

export interface DebugSessionOptions {
  id?: string;
  config?: Config;
  logger?: Logger;
  services?: Partial<ExecutorServices>;
  breakpoints?: number[];
  onEvent?: EventHandler<DebugEvent>;
}

type LoopAction = 'run' | 'stop' | 'restart';

type StepPass = { action: 'stop' | 'restart' } | { action: 'end'; failure?: StepExecutionRecord };

const STATE_LABELS: Record<ExecutionStateKind, string> = {
  not_started: 'NotStarted',
  running: 'Running',
  paused: 'Paused',
  step_breakpoint: 'StepBreakpoint',
  completed: 'Completed',
  stopped: 'Stopped',
  failed: 'Failed',
};

export function describeState(state: ExecutionState): string {
  return state.kind === 'failed' ? `Failed(${state.reason})` : STATE_LABELS[state.kind];
}

const VARIABLE_NAME = /^[A-Za-z0-9_]+$/;

/**
 * A controllable run of one workflow. Commands arrive through an ordered
 * channel and are observed between steps, or while the loop is parked at a
 * breakpoint or pause. The session owns its copy of the workflow and its
 * execution context.
 */
export class DebugSession {
  readonly id: string;
  readonly workflow: Workflow;
  readonly createdAt: string;
  private readonly runner: WorkflowRunner;
  private readonly logger: Logger;
  private readonly commands = new Channel<DebugCommand>();
  private readonly events: EventBus<DebugEvent>;
  private readonly initialVariables: ExecutionContext;
  private variables: ExecutionContext;
  private readonly records: ExecutionHistory;
  private readonly breakpoints = new Set<number>();
  private currentStep = 0;
  private executionState: ExecutionState = { kind: 'not_started' };
  private stepping = false;
  private looping = false;
  private terminated = false;
  private startedAt?: string;
  private finished: Promise<void> = Promise.resolve();
  private resolveFinished: () => void = () => {};
  private settled = false;

  /**
   * @throws WorkflowValidationError | InputValidationError before any step runs
   */
  constructor(workflow: Workflow, inputs: ExecutionContext = {}, options: DebugSessionOptions = {}) {
    this.id = options.id ?? randomUUID();
    this.workflow = structuredClone(workflow);
    this.createdAt = timestamp();
    this.logger = options.logger ?? new ConsoleLogger();
    const config = options.config ?? defaultConfig();

    this.events = new EventBus<DebugEvent>(this.logger);
    if (options.onEvent) {
      this.events.subscribe(options.onEvent);
    }

    this.runner = new WorkflowRunner(this.workflow, {
      config,
      logger: this.logger,
      services: options.services,
      runId: this.id,
    });
    this.runner.subscribe((event) => this.emit(event));

    this.initialVariables = this.runner.prepareContext(inputs);
    this.variables = cloneContext(this.initialVariables);
    this.records = new ExecutionHistory(config.debug.history_limit);
    for (const index of options.breakpoints ?? []) {
      if (this.isValidIndex(index)) this.breakpoints.add(index);
    }
    this.resetFinished();
  }

  get state(): ExecutionState {
    return this.executionState;
  }

  get totalSteps(): number {
    return this.workflow.steps.length;
  }

  /** True while the command loop is alive */
  get active(): boolean {
    return this.looping;
  }

  subscribe(handler: EventHandler<DebugEvent>): () => void {
    return this.events.subscribe(handler);
  }

  /**
   * Deliver a command. While the loop runs, commands are queued in order;
   * otherwise breakpoint and variable edits apply at once.
   */
  send(command: DebugCommand): void {
    if (this.terminated) {
      this.logger.debug?.(`Debug session ${this.id} has stopped; ignoring ${command.type}`);
      return;
    }
    if (this.looping) {
      this.commands.send(command);
      return;
    }

    switch (command.type) {
      case 'start':
        this.start();
        return;
      case 'restart':
        this.restart();
        return;
      case 'stop':
        this.finishStopped();
        return;
      case 'set_breakpoint':
      case 'remove_breakpoint':
      case 'set_variable':
        this.applyEdit(command);
        return;
      default:
        if (this.executionState.kind === 'not_started') {
          // Observed before the first step
          this.commands.send(command);
        } else {
          this.logger.debug?.(`Debug session ${this.id} is ${this.executionState.kind}; ignoring ${command.type}`);
        }
    }
  }

  start(): void {
    if (this.terminated || this.looping || this.executionState.kind !== 'not_started') {
      this.logger.warn(`Debug session ${this.id} cannot start from state ${describeState(this.executionState)}`);
      return;
    }
    this.startedAt = timestamp();
    this.launch('start');
  }

  pause(): void {
    this.send({ type: 'pause' });
  }

  resume(): void {
    this.send({ type: 'resume' });
  }

  stepOver(): void {
    this.send({ type: 'step_over' });
  }

  stop(): void {
    this.send({ type: 'stop' });
  }

  setBreakpoint(index: number): void {
    this.send({ type: 'set_breakpoint', index });
  }

  removeBreakpoint(index: number): void {
    this.send({ type: 'remove_breakpoint', index });
  }

  setVariable(name: string, value: ContextValue): void {
    this.send({ type: 'set_variable', name, value });
  }

  /**
   * Reset step index, history and variables while keeping breakpoints. A
   * running loop restarts at its next checkpoint; a finished one runs again.
   */
  restart(): void {
    if (this.terminated) return;
    if (this.looping) {
      this.commands.send({ type: 'restart' });
      return;
    }
    this.reset();
    this.startedAt ??= timestamp();
    this.launch('restart');
  }

  /**
   * Resolves when the command loop exits (completed, failed or stopped)
   */
  done(): Promise<void> {
    return this.finished;
  }

  /**
   * Stop silently and release the command channel. Used when a session is dropped.
   */
  dispose(): Promise<void> {
    if (!this.terminated) {
      this.terminated = true;
      this.executionState = { kind: 'stopped' };
      this.commands.close();
      if (!this.looping) this.settle();
    }
    return this.finished;
  }

  snapshot(): DebugSessionSnapshot {
    return {
      id: this.id,
      workflow: this.workflow.name,
      currentStep: this.currentStep,
      totalSteps: this.totalSteps,
      state: this.executionState,
      breakpoints: this.sortedBreakpoints(),
      variables: cloneContext(this.variables),
      history: this.records.list(),
      createdAt: this.createdAt,
      startedAt: this.startedAt,
    };
  }

  summary(): string {
    const history = this.records.list();
    const completed = countByStatus(history, 'completed');
    const failed = countByStatus(history, 'failed');
    return `Workflow: ${this.workflow.name} | Steps: ${completed}/${this.totalSteps} | Failed: ${failed} | State: ${describeState(this.executionState)}`;
  }

  history(): StepExecutionRecord[] {
    return this.records.list();
  }

  /**
   * Record by its position in the run, 0 being the first step executed
   */
  historyAt(position: number): StepExecutionRecord | undefined {
    return this.records.at(position);
  }

  /**
   * Context as it was before the most recent execution of a step
   */
  variablesAt(stepIndex: number): ExecutionContext | undefined {
    const record = this.records.forStep(stepIndex);
    return record ? cloneContext(record.variablesBefore) : undefined;
  }

  currentVariables(): ExecutionContext {
    return cloneContext(this.variables);
  }

  // ===== Loop =====

  private launch(mode: 'start' | 'restart'): void {
    this.looping = true;
    // done() callers from before the first start keep their promise
    if (this.settled) this.resetFinished();
    this.loop(mode).catch((error: unknown) => this.reportFatal(error));
  }

  private async loop(mode: 'start' | 'restart'): Promise<void> {
    try {
      this.executionState = { kind: 'running' };
      if (mode === 'start') {
        this.emitControl({
          type: 'debug.session_started',
          totalSteps: this.totalSteps,
          breakpoints: this.sortedBreakpoints(),
        });
        this.logger.log(`🐞 Debugging workflow: ${this.workflow.name} (session ${this.id})`);
      } else {
        this.announceRestart();
      }

      while (true) {
        const pass = await this.runSteps();
        if (pass.action === 'end' && this.terminated) return;
        // a stop or restart sent while the last step ran
        const action = pass.action === 'end' ? this.takeQueuedControl() : pass.action;
        if (action === 'stop') {
          this.finishStopped();
          return;
        }
        if (action === 'restart') {
          this.reset();
          this.announceRestart();
          continue;
        }
        if (pass.action === 'end' && pass.failure) {
          const failure = pass.failure;
          const reason = failure.error ?? 'Step failed';
          this.executionState = { kind: 'failed', reason };
          this.emitControl({ type: 'debug.failed', stepIndex: failure.index, stepId: failure.stepId, reason });
          return;
        }
        this.executionState = { kind: 'completed' };
        this.emitControl({ type: 'debug.completed', variables: cloneContext(this.variables) });
        this.logger.log(`✨ Debug session ${this.id} completed`);
        return;
      }
    } catch (error) {
      // dispose() closed the channel while the loop was parked
      if (error instanceof ChannelClosedError && this.terminated) return;
      this.reportFatal(error);
    } finally {
      this.looping = false;
      this.discardQueued();
      this.settle();
    }
  }

  /**
   * Run from the current step until the last step, a failure or a control command
   */
  private async runSteps(): Promise<StepPass> {
    while (this.currentStep < this.totalSteps) {
      if (this.terminated) return { action: 'end' };
      const action = await this.checkpoint();
      if (action === 'stop' || action === 'restart') return { action };

      const record = await this.runner.executeStep(this.currentStep, this.variables);
      this.records.push(record);
      if (record.status === 'failed') return { action: 'end', failure: record };
      this.currentStep++;
    }
    return { action: 'end' };
  }

  private announceRestart(): void {
    this.executionState = { kind: 'running' };
    this.emitControl({ type: 'debug.restarted' });
    this.logger.log(`↺ Restarting workflow: ${this.workflow.name}`);
  }

  /**
   * Drain queued commands, then park on a pause, breakpoint or pending step
   */
  private async checkpoint(): Promise<LoopAction> {
    let pauseRequested = false;
    for (let next = this.commands.tryReceive(); next.ok; next = this.commands.tryReceive()) {
      const command = next.value;
      switch (command.type) {
        case 'stop':
          return 'stop';
        case 'restart':
          return 'restart';
        case 'pause':
          pauseRequested = true;
          break;
        case 'resume':
          pauseRequested = false;
          this.stepping = false;
          break;
        case 'step_over':
        case 'step_into':
        case 'step_out':
          this.stepping = true;
          break;
        case 'start':
          break;
        default:
          this.applyEdit(command);
      }
    }

    if (pauseRequested) {
      this.executionState = { kind: 'paused' };
      this.emitControl({ type: 'debug.paused', stepIndex: this.currentStep });
      this.logger.log(`⏸  Paused before step ${this.currentStep}`);
      const action = await this.waitForCommand();
      // resume still honors a breakpoint on the current step; a step command runs it
      if (action !== 'run' || this.stepping) return action;
    }

    const atBreakpoint = this.breakpoints.has(this.currentStep);
    if (atBreakpoint || this.stepping) {
      const step = this.workflow.steps[this.currentStep];
      this.executionState = { kind: 'step_breakpoint' };
      this.emitControl({
        type: 'debug.breakpoint_hit',
        stepIndex: this.currentStep,
        stepId: step.id,
        reason: atBreakpoint ? 'breakpoint' : 'step',
        variables: cloneContext(this.variables),
      });
      this.logger.log(`🔴 Breakpoint before step ${this.currentStep}: ${step.id}`);
      return this.waitForCommand();
    }

    return 'run';
  }

  private async waitForCommand(): Promise<LoopAction> {
    while (true) {
      const command = await this.commands.receive();
      switch (command.type) {
        case 'resume':
          this.stepping = false;
          this.executionState = { kind: 'running' };
          this.emitControl({ type: 'debug.resumed', stepIndex: this.currentStep, mode: 'continue' });
          return 'run';
        case 'step_over':
        case 'step_into':
        case 'step_out':
          this.stepping = true;
          this.executionState = { kind: 'running' };
          this.emitControl({ type: 'debug.resumed', stepIndex: this.currentStep, mode: 'step' });
          return 'run';
        case 'stop':
          return 'stop';
        case 'restart':
          return 'restart';
        case 'start':
        case 'pause':
          break;
        default:
          this.applyEdit(command);
      }
    }
  }

  private applyEdit(command: EditCommand): void {
    switch (command.type) {
      case 'set_breakpoint':
        if (!this.isValidIndex(command.index)) return;
        this.breakpoints.add(command.index);
        this.emitControl({ type: 'debug.breakpoints_changed', breakpoints: this.sortedBreakpoints() });
        break;
      case 'remove_breakpoint':
        this.breakpoints.delete(command.index);
        this.emitControl({ type: 'debug.breakpoints_changed', breakpoints: this.sortedBreakpoints() });
        break;
      case 'set_variable':
        if (!VARIABLE_NAME.test(command.name) || BLOCKED_INPUT_KEYS.has(command.name)) {
          this.logger.warn(`Ignoring invalid variable name "${command.name}"`);
          return;
        }
        this.variables[command.name] = structuredClone(command.value);
        this.emitControl({ type: 'debug.variable_updated', name: command.name, value: command.value });
        break;
    }
  }

  private reset(): void {
    this.currentStep = 0;
    this.stepping = false;
    this.records.clear();
    this.variables = cloneContext(this.initialVariables);
  }

  private finishStopped(): void {
    this.executionState = { kind: 'stopped' };
    this.emitControl({ type: 'debug.stopped', stepIndex: this.currentStep });
    this.logger.log(`🛑 Debug session ${this.id} stopped`);
    this.terminated = true;
    this.commands.close();
    if (!this.looping) this.settle();
  }

  private reportFatal(error: unknown): void {
    const message = errorMessage(error);
    this.executionState = { kind: 'failed', reason: message };
    this.logger.error(`✗ Debug session ${this.id} error: ${message}`);
    this.emitControl({ type: 'debug.error', error: message });
  }

  /**
   * Stop or restart queued behind the final step. Edits ahead of it apply.
   */
  private takeQueuedControl(): 'stop' | 'restart' | undefined {
    for (let next = this.commands.tryReceive(); next.ok; next = this.commands.tryReceive()) {
      const command = next.value;
      switch (command.type) {
        case 'stop':
        case 'restart':
          return command.type;
        case 'set_breakpoint':
        case 'remove_breakpoint':
        case 'set_variable':
          this.applyEdit(command);
          break;
        default:
          this.logger.debug?.(`Debug session ${this.id} finished; dropping ${command.type}`);
      }
    }
    return undefined;
  }

  /**
   * Commands left in the channel when the loop exits. Edits still apply.
   */
  private discardQueued(): void {
    if (this.terminated) return;
    for (let next = this.commands.tryReceive(); next.ok; next = this.commands.tryReceive()) {
      const command = next.value;
      if (command.type === 'set_breakpoint' || command.type === 'remove_breakpoint' || command.type === 'set_variable') {
        this.applyEdit(command);
      } else {
        this.logger.debug?.(`Debug session ${this.id} finished; dropping ${command.type}`);
      }
    }
  }

  private resetFinished(): void {
    this.settled = false;
    this.finished = new Promise<void>((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  private settle(): void {
    this.settled = true;
    this.resolveFinished();
  }

  private isValidIndex(index: number): boolean {
    if (Number.isInteger(index) && index >= 0) return true;
    this.logger.warn(`Ignoring invalid breakpoint index ${index}`);
    return false;
  }

  private sortedBreakpoints(): number[] {
    return [...this.breakpoints].sort((a, b) => a - b);
  }

  private emitControl(event: ControlEventInit): void {
    this.emit({ ...event, timestamp: timestamp(), runId: this.id, workflow: this.workflow.name });
  }

  private emit(event: DebugEvent): void {
    if (this.terminated) return;
    this.events.emit(event);
  }
}
