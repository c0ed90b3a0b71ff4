import type { WorkflowEvent } from './events.ts';
import type { RunOutcome, StepExecutionRecord } from './workflow-state.ts';

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

interface StepTiming {
  stepId: string;
  stepType: string;
  durationMs: number;
}

/**
 * Extract timing information from step.end events
 */
export function extractStepTimings(events: WorkflowEvent[]): StepTiming[] {
  const timings: StepTiming[] = [];

  for (const event of events) {
    if (event.type === 'step.end' && event.status !== 'skipped') {
      timings.push({
        stepId: event.stepId,
        stepType: event.stepType,
        durationMs: event.durationMs,
      });
    }
  }

  return timings;
}

/**
 * Format timing summary from step events
 */
export function formatTimingSummary(events: WorkflowEvent[]): string | null {
  const timings = extractStepTimings(events);

  if (timings.length === 0) {
    return null;
  }

  const totalMs = timings.reduce((sum, t) => sum + t.durationMs, 0);

  if (totalMs === 0) {
    return null;
  }

  // Slowest first
  const sorted = [...timings].sort((a, b) => b.durationMs - a.durationMs);

  const lines: string[] = [];
  lines.push(`\n⏱️  Timing Summary (total: ${formatDuration(totalMs)})`);

  for (const timing of sorted) {
    const percentage = Math.round((timing.durationMs / totalMs) * 100);
    lines.push(`  • ${timing.stepId}: ${formatDuration(timing.durationMs)} (${percentage}%)`);
  }

  return lines.join('\n');
}

const STATUS_ICONS: Record<StepExecutionRecord['status'], string> = {
  pending: '·',
  running: '▶',
  completed: '✓',
  failed: '✗',
  skipped: '⊘',
};

/**
 * Multi-line report of a finished run: one line per recorded step, then the outcome
 */
export function formatRunSummary(outcome: RunOutcome): string {
  const lines: string[] = [`Workflow: ${outcome.workflow} (${outcome.runId})`];

  for (const record of outcome.history) {
    let line = `  ${STATUS_ICONS[record.status]} [${record.index}] ${record.stepId}: ${record.status}`;
    if (record.attempts > 1) line += ` after ${record.attempts} attempts`;
    if (record.error) line += ` (${record.error})`;
    lines.push(line);
  }

  let status = `Status: ${outcome.status} in ${formatDuration(outcome.durationMs)}`;
  if (outcome.failedStep) status += ` at step ${outcome.failedStep}`;
  lines.push(status);
  if (outcome.error) lines.push(`Error: ${outcome.error}`);

  return lines.join('\n');
}

export function countByStatus(history: StepExecutionRecord[], status: StepExecutionRecord['status']): number {
  return history.filter((record) => record.status === status).length;
}
