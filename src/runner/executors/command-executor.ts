import { resolve } from 'node:path';
import { resolveText } from '../../expression/placeholders.ts';
import type { CommandStep, ExecutionContext } from '../../parser/schema.ts';
import { ProcessExitError } from '../../utils/errors.ts';
import type { StepOutput, StepRunContext } from './types.ts';

/**
 * Workflow environment overlaid with the step environment, values resolved
 */
export function resolveEnvironment(
  workflowEnv: Record<string, string>,
  stepEnv: Record<string, string>,
  context: ExecutionContext
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries({ ...workflowEnv, ...stepEnv })) {
    env[key] = resolveText(value, context);
  }
  return env;
}

/**
 * Execute a command step through the process runner
 */
export async function executeCommandStep(run: StepRunContext<CommandStep>): Promise<StepOutput> {
  const { step, context } = run;
  const executable = resolveText(step.command, context);
  const args = step.args.map((arg) => resolveText(arg, context));
  const cwd = step.working_directory ? resolve(resolveText(step.working_directory, context)) : undefined;
  const env = resolveEnvironment(run.workflow.environment, step.environment, context);

  run.logger.debug?.(`  $ ${[executable, ...args].join(' ')}`);
  const result = await run.services.processRunner.run({
    executable,
    args,
    shell: run.config.shell,
    cwd,
    env,
    signal: run.signal,
  });

  if (result.truncated) {
    run.logger.warn(`  ⚠️ Output of step ${step.id} was truncated`);
  }
  if (result.exitCode !== 0) {
    throw new ProcessExitError(result.exitCode, result.output);
  }
  return { output: result.output };
}
