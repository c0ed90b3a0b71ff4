import { resolveStructured } from '../../expression/placeholders.ts';
import { isContextObject, type ToolCallStep } from '../../parser/schema.ts';
import type { StepOutput, StepRunContext } from './types.ts';

/**
 * Invoke a named tool with resolved arguments
 */
export async function executeToolStep(run: StepRunContext<ToolCallStep>): Promise<StepOutput> {
  const { step } = run;
  const args = resolveStructured(step.arguments, run.context);
  if (!isContextObject(args)) {
    throw new Error(`Arguments of tool ${step.tool_name} must be an object`);
  }
  run.logger.debug?.(`  🛠️ ${step.tool_name} ${JSON.stringify(args)}`);
  const output = await run.services.tools.invoke(step.tool_name, args, run.signal);
  return { output };
}
