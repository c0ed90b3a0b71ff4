import { describe, expect, it } from 'vitest';
import { InputValidationError } from '../utils/errors.ts';
import { buildInitialContext, coerceArgumentValue } from './arguments.ts';
import { WorkflowParser } from './workflow-parser.ts';

const workflow = WorkflowParser.parseObject({
  id: 'deploy',
  name: 'Deploy',
  arguments: [
    { name: 'name', default: 'world' },
    { name: 'replicas', type: 'number', default: 2 },
    { name: 'dry_run', type: 'boolean', default: false },
    { name: 'env', type: 'enum', options: ['dev', 'prod'], required: true },
    { name: 'notes' },
  ],
  steps: [],
});

describe('buildInitialContext', () => {
  it('merges inputs over defaults', () => {
    expect(buildInitialContext(workflow, { env: 'dev', name: 'ops' })).toEqual({
      name: 'ops',
      replicas: 2,
      dry_run: false,
      env: 'dev',
    });
  });

  it('coerces textual numbers and booleans', () => {
    const context = buildInitialContext(workflow, { env: 'prod', replicas: '5', dry_run: 'yes' });
    expect(context.replicas).toBe(5);
    expect(context.dry_run).toBe(true);
  });

  it('reports every input problem at once', () => {
    try {
      buildInitialContext(workflow, { replicas: 'many', extra: 'x' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InputValidationError);
      if (error instanceof InputValidationError) {
        expect(error.issues).toEqual([
          'unknown argument "extra"',
          'argument "replicas" must be a number, got "many"',
          'missing required argument "env"',
        ]);
      }
    }
  });
});

describe('coerceArgumentValue', () => {
  it('checks url and email formats', () => {
    expect(coerceArgumentValue({ name: 'u', type: 'url', required: false }, 'https://example.com')).toEqual({
      ok: true,
      value: 'https://example.com',
    });
    expect(coerceArgumentValue({ name: 'u', type: 'url', required: false }, 'not a url').ok).toBe(false);
    expect(coerceArgumentValue({ name: 'e', type: 'email', required: false }, 'ops@example.com').ok).toBe(true);
    expect(coerceArgumentValue({ name: 'e', type: 'email', required: false }, 'ops').ok).toBe(false);
  });

  it('rejects structured values', () => {
    expect(coerceArgumentValue({ name: 's', type: 'string', required: false }, ['a'])).toEqual({
      ok: false,
      error: 'argument "s" must be a scalar value',
    });
  });

  it('renders numbers as text for string arguments', () => {
    expect(coerceArgumentValue({ name: 's', type: 'string', required: false }, 7)).toEqual({ ok: true, value: '7' });
  });
});
