import { resolveStructured } from '../../expression/placeholders.ts';
import type { ExecutionContext, SubWorkflowStep } from '../../parser/schema.ts';
import { WorkflowNotFoundError } from '../../utils/errors.ts';
import type { StepOutput, StepRunContext } from './types.ts';

/**
 * Run a nested workflow. The output is the JSON of the child's final variables.
 */
export async function executeSubWorkflowStep(run: StepRunContext<SubWorkflowStep>): Promise<StepOutput> {
  const { step } = run;
  const child = run.services.workflows.get(step.workflow_name);
  if (!child) {
    throw new WorkflowNotFoundError(step.workflow_name);
  }

  const inputs: ExecutionContext = {};
  for (const [key, value] of Object.entries(step.arguments)) {
    inputs[key] = resolveStructured(value, run.context);
  }

  run.logger.log(`  ↳ Entering sub-workflow: ${child.name}`);
  const outcome = await run.runSubWorkflow(child, inputs, run.signal);
  if (outcome.status !== 'success') {
    const reason = outcome.error ?? outcome.status;
    throw new Error(`Sub-workflow ${child.name} ${outcome.status}: ${reason}`);
  }
  return { output: JSON.stringify(outcome.variables) };
}
