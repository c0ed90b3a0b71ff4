import type { ContextValue, ExecutionContext, Step } from '../parser/schema.ts';
import { errorMessage } from '../utils/guards.ts';
import { executeCommandStep } from './executors/command-executor.ts';
import { executePluginStep } from './executors/plugin-executor.ts';
import { executePromptStep } from './executors/prompt-executor.ts';
import { executeSubWorkflowStep } from './executors/subworkflow-executor.ts';
import { executeToolStep } from './executors/tool-executor.ts';
import type { StepOutput, StepRunContext } from './executors/types.ts';
import { applyOutputFormat } from './output-handler.ts';
import { withRetry } from './retry.ts';
import { abortError, raceAbort, TimeoutError, withTimeout } from './timeout.ts';

export type StepResult =
  | {
      status: 'completed';
      output: string;
      /** Formatted output, stored under output_variable */
      value: ContextValue;
      assignments: ExecutionContext;
      attempts: number;
    }
  | {
      status: 'failed';
      error: string;
      cause: unknown;
      attempts: number;
    };

export interface StepExecutorOptions {
  retryBaseDelayMs: number;
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Main dispatcher for step kinds
 */
export async function dispatchStep(run: StepRunContext): Promise<StepOutput> {
  const { step } = run;
  switch (step.type) {
    case 'command':
      return executeCommandStep({ ...run, step });
    case 'agent_prompt':
      return executePromptStep({ ...run, step });
    case 'tool_call':
      return executeToolStep({ ...run, step });
    case 'sub_workflow':
      return executeSubWorkflowStep({ ...run, step });
    case 'plugin_action':
      return executePluginStep({ ...run, step });
  }
}

/**
 * Prompt steps bound their wait through the bridge instead
 */
function stepTimeoutMs(step: Step): number | undefined {
  if (step.type === 'agent_prompt' || step.timeout === undefined) return undefined;
  return step.timeout * 1000;
}

async function runAttempt(run: StepRunContext): Promise<Extract<StepResult, { status: 'completed' }>> {
  if (run.signal.aborted) {
    throw abortError(run.signal);
  }
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(run.signal.reason);
  run.signal.addEventListener('abort', onAbort, { once: true });

  try {
    const work = raceAbort(dispatchStep({ ...run, signal: controller.signal }), controller.signal);
    const timeoutMs = stepTimeoutMs(run.step);
    const produced = timeoutMs === undefined ? await work : await withTimeout(work, timeoutMs, `Step ${run.step.id}`);
    const value = applyOutputFormat(produced.output, run.step.output_format);
    return { status: 'completed', output: produced.output, value, assignments: produced.assignments ?? {}, attempts: 1 };
  } catch (error) {
    if (error instanceof TimeoutError) {
      controller.abort(error);
    }
    throw error;
  } finally {
    run.signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Run one step with retries, timeout and output handling.
 * Errors are converted to a failed result and never thrown.
 */
export async function executeStep(run: StepRunContext, options: StepExecutorOptions): Promise<StepResult> {
  let attempts = 0;
  try {
    const result = await withRetry(
      async () => {
        attempts++;
        return runAttempt(run);
      },
      { count: run.step.retry_count, backoff: 'linear', baseDelay: options.retryBaseDelayMs },
      options.onRetry,
      run.signal
    );
    return { ...result, attempts };
  } catch (error) {
    return { status: 'failed', error: errorMessage(error), cause: error, attempts };
  }
}
