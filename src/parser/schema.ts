import { z } from 'zod';
import { LIMITS } from '../utils/constants.ts';

// ===== Context Values =====

export type ContextValue = string | number | boolean | null | ContextValue[] | { [key: string]: ContextValue };

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(ContextValueSchema), z.record(ContextValueSchema)])
);

/** Variable bindings accumulated while a workflow runs */
export type ExecutionContext = Record<string, ContextValue>;

// ===== Argument Schema =====

export const ArgumentTypeSchema = z.enum(['string', 'number', 'boolean', 'path', 'url', 'email', 'enum']);

export const ArgumentSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  default: z.union([z.string(), z.number(), z.boolean()]).optional(),
  type: ArgumentTypeSchema.default('string'),
  required: z.boolean().default(false),
  options: z.array(z.string()).optional(),
});

// ===== Output Format Schema =====

export const OutputFormatSchema = z.union([
  z.literal('text'),
  z.literal('json'),
  z.object({ regex: z.string() }).strict(),
]);

const TimeoutSecondsSchema = z
  .number()
  .positive()
  .max(LIMITS.MAX_TIMEOUT_SECONDS, { message: `must be at most ${LIMITS.MAX_TIMEOUT_SECONDS} seconds` });

// ===== Base Step Schema =====

export const BaseStepSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  environment: z.record(z.string()).default({}),
  /** Seconds */
  timeout: TimeoutSecondsSchema.optional(),
  retry_count: z.number().int().min(0).default(0),
  condition: z.string().optional(),
  output_format: OutputFormatSchema.default('text'),
  output_variable: z.string().optional(),
});

// ===== Step Kinds =====

const CommandStepSchema = BaseStepSchema.extend({
  type: z.literal('command'),
  command: z.string(),
  args: z.array(z.string()).default([]),
  working_directory: z.string().optional(),
});

const AgentPromptStepSchema = BaseStepSchema.extend({
  type: z.literal('agent_prompt'),
  message: z.string(),
  input_variable: z.string().optional(),
});

const ToolCallStepSchema = BaseStepSchema.extend({
  type: z.literal('tool_call'),
  tool_name: z.string(),
  arguments: ContextValueSchema.default({}),
});

const SubWorkflowStepSchema = BaseStepSchema.extend({
  type: z.literal('sub_workflow'),
  workflow_name: z.string(),
  arguments: z.record(ContextValueSchema).default({}),
});

const PluginActionStepSchema = BaseStepSchema.extend({
  type: z.literal('plugin_action'),
  plugin_name: z.string(),
  action_name: z.string(),
  arguments: ContextValueSchema.default({}),
});

export const StepSchema = z.discriminatedUnion('type', [
  CommandStepSchema,
  AgentPromptStepSchema,
  ToolCallStepSchema,
  SubWorkflowStepSchema,
  PluginActionStepSchema,
]);

// ===== Workflow Schema =====

export const WorkflowSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
  author: z.string().optional(),
  arguments: z.array(ArgumentSchema).default([]),
  steps: z.array(StepSchema),
  environment: z.record(z.string()).default({}),
  /** Seconds */
  timeout: TimeoutSecondsSchema.optional(),
});

// ===== Types =====

export type ArgumentType = z.infer<typeof ArgumentTypeSchema>;
export type WorkflowArgument = z.infer<typeof ArgumentSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Step = z.infer<typeof StepSchema>;
export type StepType = Step['type'];
export type CommandStep = z.infer<typeof CommandStepSchema>;
export type AgentPromptStep = z.infer<typeof AgentPromptStepSchema>;
export type ToolCallStep = z.infer<typeof ToolCallStepSchema>;
export type SubWorkflowStep = z.infer<typeof SubWorkflowStepSchema>;
export type PluginActionStep = z.infer<typeof PluginActionStepSchema>;
export type Workflow = z.infer<typeof WorkflowSchema>;

export function isContextObject(value: ContextValue | undefined): value is { [key: string]: ContextValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
