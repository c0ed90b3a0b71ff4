import type { ContextValue, ExecutionContext } from '../parser/schema.ts';
import { MissingVariableError, UnsupportedValueError } from '../utils/errors.ts';

const PLACEHOLDER_PATTERN = /\{\{([A-Za-z0-9_]+)\}\}/g;

function describeKind(value: ContextValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return 'an object';
}

/**
 * Render one context value for substitution into text.
 */
export function renderValue(token: string, name: string, context: ExecutionContext): string {
  if (!Object.hasOwn(context, name)) {
    throw new MissingVariableError(token, name);
  }
  const value = context[name];
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
      return String(value);
    default:
      throw new UnsupportedValueError(token, name, describeKind(value));
  }
}

/**
 * Replace every {{name}} token in text with its bound value.
 * Text without tokens is returned as is.
 */
export function resolveText(text: string, context: ExecutionContext): string {
  if (!text.includes('{{')) return text;
  return text.replace(PLACEHOLDER_PATTERN, (token: string, name: string) => renderValue(token, name, context));
}

/**
 * Resolve every string leaf of a structured value. Containers are rebuilt,
 * other leaves are returned untouched.
 */
export function resolveStructured(value: ContextValue, context: ExecutionContext): ContextValue {
  if (typeof value === 'string') {
    return resolveText(value, context);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveStructured(item, context));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, ContextValue> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveStructured(item, context);
    }
    return result;
  }
  return value;
}

/**
 * Distinct placeholder names in order of first appearance
 */
export function findPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1]);
  }
  return [...names];
}
