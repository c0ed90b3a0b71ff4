import { z } from 'zod';
import { InputValidationError } from '../utils/errors.ts';
import type { ContextValue, ExecutionContext, Workflow, WorkflowArgument } from './schema.ts';

export type Coercion = { ok: true; value: ContextValue } | { ok: false; error: string };

const TRUE_WORDS = new Set(['true', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'no', '0']);

const UrlSchema = z.string().url();
const EmailSchema = z.string().email();

function asText(value: ContextValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Check a value against an argument declaration, converting textual forms of
 * numbers and booleans.
 */
export function coerceArgumentValue(argument: WorkflowArgument, value: ContextValue): Coercion {
  const label = `argument "${argument.name}"`;
  const text = asText(value);
  if (text === undefined) {
    return { ok: false, error: `${label} must be a scalar value` };
  }

  switch (argument.type) {
    case 'string':
      return { ok: true, value: text };
    case 'number': {
      if (typeof value === 'number') return { ok: true, value };
      const parsed = Number(text.trim());
      if (text.trim() === '' || !Number.isFinite(parsed)) {
        return { ok: false, error: `${label} must be a number, got "${text}"` };
      }
      return { ok: true, value: parsed };
    }
    case 'boolean': {
      if (typeof value === 'boolean') return { ok: true, value };
      const word = text.trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return { ok: true, value: true };
      if (FALSE_WORDS.has(word)) return { ok: true, value: false };
      return { ok: false, error: `${label} must be a boolean, got "${text}"` };
    }
    case 'path':
      return text.trim() === '' ? { ok: false, error: `${label} must be a non-empty path` } : { ok: true, value: text };
    case 'url':
      return UrlSchema.safeParse(text).success
        ? { ok: true, value: text }
        : { ok: false, error: `${label} must be a URL, got "${text}"` };
    case 'email':
      return EmailSchema.safeParse(text).success
        ? { ok: true, value: text }
        : { ok: false, error: `${label} must be an email address, got "${text}"` };
    case 'enum': {
      const options = argument.options ?? [];
      return options.includes(text)
        ? { ok: true, value: text }
        : { ok: false, error: `${label} must be one of: ${options.join(', ')} (got "${text}")` };
    }
  }
}

/**
 * Seed the execution context from argument defaults overridden by inputs.
 *
 * @throws InputValidationError listing every problem found
 */
export function buildInitialContext(workflow: Workflow, inputs: ExecutionContext = {}): ExecutionContext {
  const issues: string[] = [];
  const context: ExecutionContext = {};
  const declared = new Map(workflow.arguments.map((argument) => [argument.name, argument]));

  for (const name of Object.keys(inputs)) {
    if (!declared.has(name)) {
      issues.push(`unknown argument "${name}"`);
    }
  }

  for (const argument of workflow.arguments) {
    const supplied = Object.hasOwn(inputs, argument.name) ? inputs[argument.name] : argument.default;
    if (supplied === undefined) {
      if (argument.required) {
        issues.push(`missing required argument "${argument.name}"`);
      }
      continue;
    }
    const result = coerceArgumentValue(argument, supplied);
    if (result.ok) {
      context[argument.name] = result.value;
    } else {
      issues.push(result.error);
    }
  }

  if (issues.length > 0) {
    throw new InputValidationError(issues);
  }
  return context;
}
