import type { ExecutionContext } from '../parser/schema.ts';
import { resolveText } from './placeholders.ts';

const FALSY = new Set(['', 'false', '0', 'no', 'off']);

/**
 * Truthiness check for step conditions.
 *
 * The expression is resolved as text and compared against a fixed falsy set.
 * A single leading "!" negates the result. There are no operators.
 */
export function evaluateCondition(expression: string, context: ExecutionContext): boolean {
  let text = expression.trim();
  let negate = false;
  if (text.startsWith('!')) {
    negate = true;
    text = text.slice(1).trim();
  }
  const resolved = resolveText(text, context).trim().toLowerCase();
  const truthy = !FALSY.has(resolved);
  return negate ? !truthy : truthy;
}

/**
 * Blank conditions are treated as absent
 */
export function hasCondition(condition: string | undefined): condition is string {
  return condition !== undefined && condition.trim().length > 0;
}
