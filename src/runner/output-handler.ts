import { type ContextValue, ContextValueSchema, type OutputFormat } from '../parser/schema.ts';
import { countCaptureGroups } from '../parser/workflow-validator.ts';
import { OutputFormatError } from '../utils/errors.ts';

/**
 * Turn raw step output into the value stored under output_variable.
 *
 * @throws OutputFormatError when the output does not fit the format
 */
export function applyOutputFormat(raw: string, format: OutputFormat): ContextValue {
  if (format === 'text') {
    return raw;
  }

  if (format === 'json') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new OutputFormatError(`Output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const result = ContextValueSchema.safeParse(parsed);
    if (!result.success) {
      throw new OutputFormatError('Output JSON cannot be stored as a variable');
    }
    return result.data;
  }

  let groups: number;
  let pattern: RegExp;
  try {
    groups = countCaptureGroups(format.regex);
    pattern = new RegExp(format.regex);
  } catch (error) {
    throw new OutputFormatError(`Invalid output pattern: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (groups !== 1) {
    throw new OutputFormatError(`Output pattern must contain exactly one capture group, found ${groups}`);
  }

  const match = pattern.exec(raw);
  if (!match) {
    throw new OutputFormatError(`Output did not match pattern /${format.regex}/`);
  }
  const captured = match[1];
  if (captured === undefined) {
    throw new OutputFormatError(`Pattern /${format.regex}/ matched without its capture group`);
  }
  return captured;
}
