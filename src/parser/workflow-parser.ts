import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { findPlaceholders } from '../expression/placeholders.ts';
import { isRecord } from '../utils/guards.ts';
import { WorkflowValidationError } from '../utils/errors.ts';
import { type ContextValue, type Step, type Workflow, WorkflowSchema } from './schema.ts';
import { validateWorkflow } from './workflow-validator.ts';

const STEP_TYPE_ALIASES: Record<string, string> = {
  agentprompt: 'agent_prompt',
  toolcall: 'tool_call',
  subworkflow: 'sub_workflow',
  pluginaction: 'plugin_action',
};

const FIELD_ALIASES: Record<string, string> = {
  default_value: 'default',
  arg_type: 'type',
};

export class WorkflowParser {
  /**
   * Load and validate a workflow from a YAML file
   */
  static loadWorkflow(path: string): Workflow {
    if (!existsSync(path)) {
      throw new Error(`Workflow file not found at ${path}`);
    }
    return WorkflowParser.parse(readFileSync(path, 'utf-8'), path);
  }

  /**
   * Parse YAML text into a validated workflow
   */
  static parse(content: string, source?: string): Workflow {
    let raw: unknown;
    try {
      raw = yaml.load(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new WorkflowValidationError([`invalid YAML: ${message}`], source);
    }
    return WorkflowParser.parseObject(raw, source);
  }

  /**
   * Validate an already-decoded definition (YAML or JSON object)
   */
  static parseObject(raw: unknown, source?: string): Workflow {
    const normalized = WorkflowParser.normalizeAliases(raw);
    let workflow: Workflow;
    try {
      workflow = WorkflowSchema.parse(normalized);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new WorkflowValidationError(
          error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
          source
        );
      }
      throw error;
    }
    validateWorkflow(workflow, source);
    return workflow;
  }

  /**
   * Map legacy field names onto the current schema. Returns a new value.
   */
  static normalizeAliases(raw: unknown): unknown {
    if (!isRecord(raw)) return raw;
    const workflow: Record<string, unknown> = { ...raw };

    if (workflow.id === undefined && typeof workflow.name === 'string') {
      workflow.id = workflow.name;
    }
    if (Array.isArray(workflow.arguments)) {
      workflow.arguments = workflow.arguments.map((argument) => WorkflowParser.renameFields(argument));
    }
    if (Array.isArray(workflow.steps)) {
      workflow.steps = workflow.steps.map((step) => WorkflowParser.normalizeStep(step));
    }
    return workflow;
  }

  private static renameFields(value: unknown): unknown {
    if (!isRecord(value)) return value;
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const target = FIELD_ALIASES[key] ?? key;
      if (target !== key && Object.hasOwn(value, target)) continue;
      result[target] = item;
    }
    if (typeof result.type === 'string') {
      result.type = result.type.toLowerCase();
    }
    return result;
  }

  private static normalizeStep(value: unknown): unknown {
    if (!isRecord(value)) return value;
    const step: Record<string, unknown> = { ...value };

    if (step.type === undefined && typeof step.command === 'string') {
      step.type = 'command';
    } else if (typeof step.type === 'string') {
      const key = step.type.toLowerCase();
      step.type = STEP_TYPE_ALIASES[key] ?? key;
    }
    if (step.output_format === 'plaintext') {
      step.output_format = 'text';
    }
    return step;
  }

  /**
   * Every placeholder name referenced by argument defaults, environments and step fields
   */
  static extractPlaceholders(workflow: Workflow): string[] {
    const names = new Set<string>();
    const scan = (value: ContextValue | undefined): void => {
      if (typeof value === 'string') {
        for (const name of findPlaceholders(value)) names.add(name);
      } else if (Array.isArray(value)) {
        for (const item of value) scan(item);
      } else if (value !== null && typeof value === 'object') {
        for (const item of Object.values(value)) scan(item);
      }
    };

    for (const argument of workflow.arguments) scan(argument.default);
    for (const value of Object.values(workflow.environment)) scan(value);
    for (const step of workflow.steps) {
      scan(step.condition);
      for (const value of Object.values(step.environment)) scan(value);
      for (const field of WorkflowParser.stepTextFields(step)) scan(field);
    }
    return [...names];
  }

  private static stepTextFields(step: Step): Array<ContextValue | undefined> {
    switch (step.type) {
      case 'command':
        return [step.command, step.args, step.working_directory];
      case 'agent_prompt':
        return [step.message];
      case 'tool_call':
        return [step.arguments];
      case 'sub_workflow':
        return [step.arguments];
      case 'plugin_action':
        return [step.arguments];
    }
  }

  /**
   * Serialize a workflow back to YAML
   */
  static toYaml(workflow: Workflow): string {
    return yaml.dump(workflow, { noRefs: true, lineWidth: 120, skipInvalid: true });
  }
}
