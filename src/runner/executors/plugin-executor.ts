import { resolveStructured } from '../../expression/placeholders.ts';
import { isContextObject, type PluginActionStep } from '../../parser/schema.ts';
import type { StepOutput, StepRunContext } from './types.ts';

/**
 * Dispatch a plugin action with resolved arguments
 */
export async function executePluginStep(run: StepRunContext<PluginActionStep>): Promise<StepOutput> {
  const { step } = run;
  const args = resolveStructured(step.arguments, run.context);
  if (!isContextObject(args)) {
    throw new Error(`Arguments of plugin action ${step.plugin_name}.${step.action_name} must be an object`);
  }
  const output = await run.services.plugins.invoke(step.plugin_name, step.action_name, args, run.signal);
  return { output };
}
