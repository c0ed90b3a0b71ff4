import type { ExecutionContext, StepType } from '../parser/schema.ts';
import type { StepOutcomeStatus, WorkflowOutcomeStatus } from '../types/status.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

interface EventBase {
  timestamp: string;
  runId: string;
  workflow: string;
}

export type WorkflowEvent =
  | (EventBase & {
      type: 'workflow.start';
      inputs: ExecutionContext;
      totalSteps: number;
      depth: number;
    })
  | (EventBase & {
      type: 'step.start';
      stepId: string;
      stepName: string;
      stepType: StepType;
      stepIndex: number;
      totalSteps: number;
    })
  | (EventBase & {
      type: 'step.retry';
      stepId: string;
      attempt: number;
      error: string;
    })
  | (EventBase & {
      type: 'step.end';
      stepId: string;
      stepType: StepType;
      stepIndex: number;
      totalSteps: number;
      status: StepOutcomeStatus;
      output?: string;
      error?: string;
      durationMs: number;
    })
  | (EventBase & {
      type: 'prompt.request';
      stepId: string;
      promptId: string;
      message: string;
    })
  | (EventBase & {
      type: 'workflow.complete';
      status: WorkflowOutcomeStatus;
      variables: ExecutionContext;
      error?: string;
      failedStep?: string;
    })
  | (EventBase & {
      /** Engine-fatal problem, distinct from a step failure */
      type: 'workflow.error';
      error: string;
    });

export type WorkflowEventType = WorkflowEvent['type'];

export type EventHandler<E> = (event: E) => void | Promise<void>;

/**
 * Fan-out delivery of events to subscribers.
 *
 * A failing handler never affects the emitter or other handlers.
 */
export class EventBus<E extends { type: string }> {
  private handlers = new Set<EventHandler<E>>();

  constructor(private readonly logger: Logger = new ConsoleLogger()) {}

  subscribe(handler: EventHandler<E>): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(event: E): void {
    if (this.handlers.size === 0) {
      this.logger.debug?.(`No listener for event ${event.type}`);
      return;
    }
    for (const handler of [...this.handlers]) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportFailure(event, error));
        }
      } catch (error) {
        this.reportFailure(event, error);
      }
    }
  }

  get size(): number {
    return this.handlers.size;
  }

  clear(): void {
    this.handlers.clear();
  }

  private reportFailure(event: E, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn(`Event handler failed for ${event.type}: ${message}`);
  }
}

export function timestamp(): string {
  return new Date().toISOString();
}
