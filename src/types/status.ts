/**
 * Centralized status constants for workflow and step execution
 */

export const StepStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
} as const;

export type StepStatusType = (typeof StepStatus)[keyof typeof StepStatus];

/** Statuses a finished step can end in */
export type StepOutcomeStatus = Extract<StepStatusType, 'completed' | 'failed' | 'skipped'>;

export const WorkflowStatus = {
  RUNNING: 'running',
  SUCCESS: 'success',
  FAILED: 'failed',
  CANCELED: 'canceled',
} as const;

export type WorkflowStatusType = (typeof WorkflowStatus)[keyof typeof WorkflowStatus];

/** Statuses a finished run can end in */
export type WorkflowOutcomeStatus = Exclude<WorkflowStatusType, 'running'>;
