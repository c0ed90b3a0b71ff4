/**
 * Shared utilities for CLI commands
 */

import type { Config } from '../parser/config-schema.ts';
import { type ContextValue, ContextValueSchema, type ExecutionContext } from '../parser/schema.ts';
import { BLOCKED_INPUT_KEYS, LIMITS } from '../utils/constants.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { PathResolver } from '../utils/paths.ts';
import { WorkflowRegistry } from '../utils/workflow-registry.ts';

const MAX_INPUT_STRING_LENGTH = LIMITS.MAX_INPUT_STRING_LENGTH;

function parseInputValue(key: string, value: string, logger: Logger): ContextValue | undefined {
  if (value.length > MAX_INPUT_STRING_LENGTH) {
    logger.warn(`⚠️  Input "${key}" exceeds maximum length of ${MAX_INPUT_STRING_LENGTH} characters`);
    return undefined;
  }
  if (value.includes('\u0000')) {
    logger.warn(`⚠️  Input "${key}" contains invalid null characters`);
    return undefined;
  }

  try {
    // JSON for objects, arrays, booleans and numbers
    const parsed = ContextValueSchema.safeParse(JSON.parse(value));
    if (parsed.success) return parsed.data;
  } catch {
    if ((value.startsWith('{') || value.startsWith('[')) && value.length > 1) {
      logger.warn(`⚠️  Input "${key}" looks like JSON but failed to parse. Check for syntax errors.`);
      logger.warn(`   Value: ${value.slice(0, 50)}${value.length > 50 ? '...' : ''}`);
    }
  }
  return value;
}

/**
 * Parse CLI input pairs (key=value) into a context.
 * JSON values keep their type, anything else is taken as text.
 */
export function parseInputs(pairs: string[] | undefined, logger: Logger = new ConsoleLogger()): ExecutionContext {
  const inputs: ExecutionContext = {};
  if (!pairs) return inputs;
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      logger.warn(`⚠️  Invalid input format: "${pair}" (expected key=value)`);
      continue;
    }
    const key = pair.slice(0, index);
    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) {
      logger.warn(`⚠️  Invalid input key: "${key}" (use alphanumeric and underscores only)`);
      continue;
    }
    if (BLOCKED_INPUT_KEYS.has(key)) {
      logger.warn(`⚠️  Invalid input key: "${key}" (reserved keyword)`);
      continue;
    }
    const value = parseInputValue(key, pair.slice(index + 1), logger);
    if (value !== undefined) {
      inputs[key] = value;
    }
  }
  return inputs;
}

/**
 * Parse -b/--break values into sorted, unique step indexes
 */
export function parseBreakpoints(values: string[] | undefined, logger: Logger = new ConsoleLogger()): number[] {
  const indexes = new Set<number>();
  for (const value of values ?? []) {
    if (!/^\d+$/.test(value)) {
      logger.warn(`⚠️  Invalid breakpoint: "${value}" (expected a step index)`);
      continue;
    }
    indexes.add(Number(value));
  }
  return [...indexes].sort((a, b) => a - b);
}

/**
 * Registry over the configured workflow directories, or the default ones
 */
export function createWorkflowRegistry(config: Config, logger: Logger, cwd = process.cwd()): WorkflowRegistry {
  const directories = config.workflow_dirs.length > 0 ? config.workflow_dirs : PathResolver.getDefaultWorkflowDirs(cwd);
  return new WorkflowRegistry({ directories, logger });
}
