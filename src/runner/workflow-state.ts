import type { ExecutionContext, StepType } from '../parser/schema.ts';
import type { StepStatusType, WorkflowOutcomeStatus } from '../types/status.ts';

/**
 * One executed, skipped or failed step. variablesBefore is the context as it
 * was before the step ran.
 */
export interface StepExecutionRecord {
  index: number;
  stepId: string;
  stepName: string;
  stepType: StepType;
  startedAt: string;
  endedAt?: string;
  status: StepStatusType;
  output?: string;
  error?: string;
  attempts: number;
  variablesBefore: ExecutionContext;
}

export interface RunOutcome {
  runId: string;
  workflow: string;
  status: WorkflowOutcomeStatus;
  variables: ExecutionContext;
  history: StepExecutionRecord[];
  error?: string;
  failedStep?: string;
  durationMs: number;
}

export function cloneContext(context: ExecutionContext): ExecutionContext {
  return structuredClone(context);
}

/**
 * Ordered step records with an upper bound; the oldest records are dropped first.
 */
export class ExecutionHistory {
  private records: StepExecutionRecord[] = [];
  private dropped = 0;

  constructor(private readonly limit = Number.POSITIVE_INFINITY) {}

  push(record: StepExecutionRecord): void {
    this.records.push(record);
    if (this.records.length > this.limit) {
      this.records.shift();
      this.dropped++;
    }
  }

  /**
   * Record by its position in the run (0 = first step executed)
   */
  at(position: number): StepExecutionRecord | undefined {
    return this.records[position - this.dropped];
  }

  /**
   * Most recent record for a step index
   */
  forStep(index: number): StepExecutionRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.records[i].index === index) return this.records[i];
    }
    return undefined;
  }

  list(): StepExecutionRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records = [];
    this.dropped = 0;
  }

  get length(): number {
    return this.records.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }
}
