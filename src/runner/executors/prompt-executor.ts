import { randomUUID } from 'node:crypto';
import { resolveText } from '../../expression/placeholders.ts';
import type { AgentPromptStep } from '../../parser/schema.ts';
import { timestamp } from '../events.ts';
import type { StepOutput, StepRunContext } from './types.ts';

/**
 * Suspend on the human-input bridge until the correlated reply arrives.
 *
 * The wait is bounded by the step timeout, else by prompts.timeout_ms.
 */
export async function executePromptStep(run: StepRunContext<AgentPromptStep>): Promise<StepOutput> {
  const { step } = run;
  const message = resolveText(step.message, run.context);
  const promptId = randomUUID();
  const timeoutMs = step.timeout !== undefined ? step.timeout * 1000 : run.config.prompts.timeout_ms;

  // Registered before the event goes out so an immediate reply finds it
  const reply = run.services.humanInput.request(
    { promptId, runId: run.runId, stepId: step.id, message },
    { timeoutMs, signal: run.signal }
  );
  run.emit({
    type: 'prompt.request',
    timestamp: timestamp(),
    runId: run.runId,
    workflow: run.workflow.name,
    stepId: step.id,
    promptId,
    message,
  });
  run.logger.log(`  ⏳ Waiting for input: ${message}`);

  const text = await reply;
  return {
    output: text,
    assignments: step.input_variable ? { [step.input_variable]: text } : undefined,
  };
}
