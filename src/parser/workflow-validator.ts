import { WorkflowValidationError } from '../utils/errors.ts';
import { coerceArgumentValue } from './arguments.ts';
import { isContextObject, type OutputFormat, type Step, type Workflow } from './schema.ts';

const VARIABLE_NAME = /^[A-Za-z0-9_]+$/;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

/**
 * Number of capture groups in a pattern. Throws if the pattern does not compile.
 */
export function countCaptureGroups(pattern: string): number {
  new RegExp(pattern);
  const match = new RegExp(`(?:${pattern})|`).exec('');
  return match ? match.length - 1 : 0;
}

function checkOutputFormat(format: OutputFormat, path: string, issues: string[]): void {
  if (typeof format === 'string') return;
  let groups: number;
  try {
    groups = countCaptureGroups(format.regex);
  } catch (error) {
    issues.push(`${path}.output_format.regex: invalid pattern (${error instanceof Error ? error.message : String(error)})`);
    return;
  }
  if (groups !== 1) {
    issues.push(`${path}.output_format.regex: pattern must contain exactly one capture group, found ${groups}`);
  }
}

function checkStepKind(step: Step, path: string, issues: string[]): void {
  switch (step.type) {
    case 'command':
      if (isBlank(step.command)) issues.push(`${path}.command: must not be empty`);
      break;
    case 'agent_prompt':
      if (isBlank(step.message)) issues.push(`${path}.message: must not be empty`);
      if (step.input_variable !== undefined && !VARIABLE_NAME.test(step.input_variable)) {
        issues.push(`${path}.input_variable: "${step.input_variable}" is not a valid variable name`);
      }
      break;
    case 'tool_call':
      if (isBlank(step.tool_name)) issues.push(`${path}.tool_name: must not be empty`);
      if (!isContextObject(step.arguments)) issues.push(`${path}.arguments: must be an object`);
      break;
    case 'sub_workflow':
      if (isBlank(step.workflow_name)) issues.push(`${path}.workflow_name: must not be empty`);
      break;
    case 'plugin_action':
      if (isBlank(step.plugin_name)) issues.push(`${path}.plugin_name: must not be empty`);
      if (isBlank(step.action_name)) issues.push(`${path}.action_name: must not be empty`);
      if (!isContextObject(step.arguments)) issues.push(`${path}.arguments: must be an object`);
      break;
  }
}

/**
 * Collect every structural problem in a workflow without throwing.
 */
export function collectWorkflowIssues(workflow: Workflow): string[] {
  const issues: string[] = [];

  if (isBlank(workflow.id)) issues.push('id: must not be empty');
  if (isBlank(workflow.name)) issues.push('name: must not be empty');

  const argumentNames = new Set<string>();
  workflow.arguments.forEach((argument, index) => {
    const path = `arguments.${index}`;
    if (isBlank(argument.name)) {
      issues.push(`${path}.name: must not be empty`);
    } else if (argumentNames.has(argument.name)) {
      issues.push(`${path}.name: duplicate argument "${argument.name}"`);
    } else {
      argumentNames.add(argument.name);
    }

    if (argument.type === 'enum' && (!argument.options || argument.options.length === 0)) {
      issues.push(`${path}.options: enum argument "${argument.name}" requires a non-empty option list`);
    } else if (argument.default !== undefined) {
      const result = coerceArgumentValue(argument, argument.default);
      if (!result.ok) issues.push(`${path}.default: ${result.error}`);
    }
  });

  const stepIds = new Set<string>();
  workflow.steps.forEach((step, index) => {
    const path = `steps.${index}`;
    if (isBlank(step.id)) {
      issues.push(`${path}.id: must not be empty`);
    } else if (stepIds.has(step.id)) {
      issues.push(`${path}.id: duplicate step id "${step.id}"`);
    } else {
      stepIds.add(step.id);
    }
    if (isBlank(step.name)) issues.push(`${path}.name: must not be empty`);
    if (step.output_variable !== undefined && !VARIABLE_NAME.test(step.output_variable)) {
      issues.push(`${path}.output_variable: "${step.output_variable}" is not a valid variable name`);
    }
    checkStepKind(step, path, issues);
    checkOutputFormat(step.output_format, path, issues);
  });

  return issues;
}

/**
 * @throws WorkflowValidationError with every issue found
 */
export function validateWorkflow(workflow: Workflow, source?: string): void {
  const issues = collectWorkflowIssues(workflow);
  if (issues.length > 0) {
    throw new WorkflowValidationError(issues, source);
  }
}
